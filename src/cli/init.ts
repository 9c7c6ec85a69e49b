// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
import type { Command } from "commander";
import { existsSync, writeFileSync } from "node:fs";
import { resolve } from "node:path";
import { EXIT_FATAL } from "./generate.js";

export const SAMPLE_CSV = [
  "Title,URL",
  "Event Registration,https://example.com/register",
  "Survey Link,https://example.com/survey",
  "Website,https://example.com",
  "",
].join("\n");

export function registerInitCommand(program: Command): void {
  program
    .command("init")
    .description("Write a sample CSV to start a batch from")
    .argument("[file]", "Where to write the sample", "demo.csv")
    .option("--force", "Overwrite an existing file")
    .action((file: string, opts: { force?: boolean }) => {
      const path = resolve(file);
      if (existsSync(path) && !opts.force) {
        console.error(`Error: ${path} already exists (use --force to overwrite)`);
        process.exitCode = EXIT_FATAL;
        return;
      }
      writeFileSync(path, SAMPLE_CSV, "utf8");
      console.log(`\x1b[32m✓ Sample CSV written\x1b[0m`);
      console.log(`  File: ${path}`);
      console.log(`\n  Generate pages with: qr-page-maker ${file}`);
    });
}
