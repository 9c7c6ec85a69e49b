// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
import { Command } from "commander";
import { readFileSync } from "node:fs";
import { resolve, dirname } from "node:path";
import { fileURLToPath } from "node:url";
import { registerGenerateCommand } from "./generate.js";
import { registerGuiCommand } from "./gui.js";
import { registerInitCommand } from "./init.js";

const __dirname = dirname(fileURLToPath(import.meta.url));

function getVersion(): string {
  try {
    // src/cli/ and dist/cli/ both sit two levels below package.json
    const pkgPath = resolve(__dirname, "..", "..", "package.json");
    const pkg = JSON.parse(readFileSync(pkgPath, "utf8")) as { version: string };
    return pkg.version;
  } catch {
    return "0.0.0";
  }
}

/**
 * Build the CLI. Errors from commander itself (unknown options, bad option
 * values) are thrown as `CommanderError` instead of exiting the process.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name("qr-page-maker")
    .description("Printable QR-code pages from a title and a URL, one at a time or from a CSV file")
    .version(getVersion())
    .enablePositionalOptions()
    .exitOverride();

  registerGuiCommand(program);
  registerInitCommand(program);
  registerGenerateCommand(program);

  return program;
}
