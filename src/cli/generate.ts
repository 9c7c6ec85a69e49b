// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
import type { Command } from "commander";
import { FatalInputError, ValidationError } from "../errors.js";
import { runBatchFromCsv } from "../page/batch.js";
import { resolveConfig } from "../page/config.js";
import { runSingle } from "../page/generate.js";
import type { GenerationResult, QrEntry } from "../page/types.js";
import {
  DEFAULT_OUTPUT_DIR,
  parseLevel,
  parsePageSize,
  parsePositiveInt,
  pageSettings,
} from "./options.js";
import type { PageOptions } from "./options.js";

/** Every entry succeeded. */
export const EXIT_OK = 0;
/** At least one entry failed. */
export const EXIT_ENTRY_FAILED = 1;
/** Unusable input: bad arguments, unreadable CSV, missing headers. */
export const EXIT_FATAL = 2;

interface GenerateOptions extends PageOptions {
  output?: string;
  json?: boolean;
}

/**
 * The default command:
 *
 *   qr-page-maker "<title>" "<url>"                      single page
 *   qr-page-maker <input.csv> [output_dir] [font_path]   one page per CSV row
 */
export function registerGenerateCommand(program: Command): void {
  program
    .argument("<title|input.csv>", "Page title, or a CSV file with Title and URL columns")
    .argument("[url|output_dir]", "URL to encode, or the output directory in batch mode")
    .argument("[font_path]", "Font file (batch mode)")
    .option("-o, --output <dir>", `Output directory (default: "${DEFAULT_OUTPUT_DIR}")`)
    .option("--font <path>", "TrueType/OpenType font for the title and URL")
    .option("--ec <level>", "QR error correction level: L, M, Q or H", parseLevel, "M")
    .option("--box-size <n>", "Pixels per QR module before scaling", parsePositiveInt, 10)
    .option("--page <size>", "Page size: letter or a4", parsePageSize, "letter")
    .option("--dpi <n>", "Page resolution", parsePositiveInt, 300)
    .option("--json", "Output the result as JSON")
    .action(async (first: string, second: string | undefined, third: string | undefined, opts: GenerateOptions) => {
      try {
        if (first.toLowerCase().endsWith(".csv")) {
          await batch(first, second ?? opts.output ?? DEFAULT_OUTPUT_DIR, third ?? opts.font, opts);
        } else if (second !== undefined && third === undefined) {
          await single({ title: first, url: second }, opts);
        } else {
          console.error(
            `Error: expected "<title>" "<url>" or <input.csv> [output_dir] [font_path]; run with --help for usage`,
          );
          process.exitCode = EXIT_FATAL;
        }
      } catch (err) {
        if (err instanceof FatalInputError || err instanceof ValidationError) {
          console.error(`\x1b[31mError: ${err.message}\x1b[0m`);
          process.exitCode = EXIT_FATAL;
          return;
        }
        throw err;
      }
    });
}

async function single(entry: QrEntry, opts: GenerateOptions): Promise<void> {
  const config = resolveConfig({
    ...pageSettings(opts),
    outputDirectory: opts.output ?? DEFAULT_OUTPUT_DIR,
    fontPath: opts.font,
  });
  const result = await runSingle(entry, config);

  if (opts.json) {
    console.log(JSON.stringify(result, null, 2));
  } else {
    printResult(result);
    printWarnings(result.warnings);
  }
  process.exitCode = result.status === "success" ? EXIT_OK : EXIT_ENTRY_FAILED;
}

async function batch(
  csvPath: string,
  outputDirectory: string,
  fontPath: string | undefined,
  opts: GenerateOptions,
): Promise<void> {
  const config = resolveConfig({ ...pageSettings(opts), outputDirectory, fontPath });
  const summary = await runBatchFromCsv(
    csvPath,
    config,
    opts.json
      ? {}
      : {
          onProgress: ({ index, total, entry }) => {
            console.log(`Processing (${index}/${total}): ${entry.title} - ${entry.url}`);
          },
          onResult: (result) => printResult(result),
        },
  );

  if (opts.json) {
    console.log(JSON.stringify(summary, null, 2));
  } else {
    printWarnings(summary.warnings);
    const line = `Done: ${summary.total} total, ${summary.succeeded} succeeded, ${summary.failed} failed`;
    console.log(summary.failed === 0 ? `\x1b[32m✓ ${line}\x1b[0m` : `\x1b[31m✗ ${line}\x1b[0m`);
    console.log(`  Output: ${config.outputDirectory}`);
  }
  process.exitCode = summary.failed === 0 ? EXIT_OK : EXIT_ENTRY_FAILED;
}

function printResult(result: GenerationResult): void {
  if (result.status === "success") {
    console.log(`  \x1b[32m✓ Saved: ${result.outputPath}\x1b[0m`);
    return;
  }
  const where = result.entry.row !== undefined ? `Row ${result.entry.row}: ` : "";
  console.error(`  \x1b[31m✗ ${where}${result.reason.kind}: ${result.reason.message}\x1b[0m`);
}

function printWarnings(warnings: string[]): void {
  for (const w of warnings) {
    console.warn(`\x1b[33m⚠ ${w}\x1b[0m`);
  }
}
