#!/usr/bin/env node
// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
/**
 * CLI entry point for qr-page-maker.
 *
 * Usage:
 *   qr-page-maker "<title>" "<url>"
 *   qr-page-maker <input.csv> [output_dir] [font_path]
 *   qr-page-maker gui
 *
 * Exit codes: 0 all pages written, 1 some entries failed, 2 unusable input.
 */

import { CommanderError } from "commander";
import { createProgram } from "./program.js";
import { EXIT_FATAL } from "./generate.js";

try {
  await createProgram().parseAsync(process.argv);
} catch (err) {
  if (err instanceof CommanderError) {
    // --help and --version arrive here with exit code 0
    process.exitCode = err.exitCode === 0 ? 0 : EXIT_FATAL;
  } else {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    process.exitCode = EXIT_FATAL;
  }
}
