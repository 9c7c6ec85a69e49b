// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
/**
 * qr-page-maker — end-to-end demo
 *
 * Generates one page directly, then a batch from examples/demo.csv, which
 * includes a filename collision, an empty row and an invalid URL.
 *
 * Usage:
 *   npm run demo -- [--font <path>] [--out <dir>]
 *   npx tsx examples/demo.ts [--font <path>] [--out <dir>]
 */

import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { resolveConfig, runBatchFromCsv, runSingle } from "../src/index.js";

function getArg(name: string): string | undefined {
  const idx = process.argv.indexOf(`--${name}`);
  if (idx === -1 || idx + 1 >= process.argv.length) return undefined;
  return process.argv[idx + 1];
}

const here = fileURLToPath(new URL(".", import.meta.url));
const outputDirectory = getArg("out") ?? "./qr-output";

async function main(): Promise<void> {
  console.log("=== qr-page-maker demo ===\n");

  const config = resolveConfig({ outputDirectory, fontPath: getArg("font") });

  // 1. A single page
  const single = await runSingle(
    { title: "Spring Fair", url: "https://example.com/spring-fair" },
    config,
  );
  if (single.status === "success") {
    console.log(`Single page: ${single.outputPath}`);
  } else {
    console.log(`Single page failed: ${single.reason.kind} (${single.reason.message})`);
  }
  for (const w of single.warnings) console.log(`  warning: ${w}`);

  // 2. A batch from CSV
  const summary = await runBatchFromCsv(join(here, "demo.csv"), config, {
    onProgress: ({ index, total, entry }) => {
      console.log(`Processing (${index}/${total}): ${entry.title || "(no title)"}`);
    },
  });

  console.log(`\n${summary.succeeded}/${summary.total} pages written to ${outputDirectory}`);
  for (const f of summary.failures) {
    console.log(`  row ${f.entry.row ?? "?"}: ${f.reason.kind} - ${f.reason.message}`);
  }
}

main().catch((err: unknown) => {
  console.error(err);
  process.exitCode = 1;
});
