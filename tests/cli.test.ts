// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import type { MockInstance } from "vitest";
import { existsSync, readFileSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { CommanderError } from "commander";
import { createProgram } from "../src/cli/program.js";
import { SAMPLE_CSV } from "../src/cli/init.js";
import { makeTempDir } from "./helpers.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

let log: MockInstance<typeof console.log>;
let error: MockInstance<typeof console.error>;
let warn: MockInstance<typeof console.warn>;

beforeEach(() => {
  log = vi.spyOn(console, "log").mockImplementation(() => undefined);
  error = vi.spyOn(console, "error").mockImplementation(() => undefined);
  warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
});

afterEach(() => {
  vi.restoreAllMocks();
  process.exitCode = undefined;
});

async function run(...args: string[]): Promise<number | string | undefined> {
  process.exitCode = undefined;
  await createProgram().parseAsync(["node", "qr-page-maker", ...args]);
  return process.exitCode;
}

function lines(spy: { mock: { calls: unknown[][] } }): string[] {
  return spy.mock.calls.map((call) => call.map(String).join(" "));
}

function writeCsv(content: string): string {
  const path = join(makeTempDir("cli-csv"), "input.csv");
  writeFileSync(path, content, "utf8");
  return path;
}

// ---------------------------------------------------------------------------
// --version and option errors
// ---------------------------------------------------------------------------

describe("CLI basics", () => {
  it("prints the package version", async () => {
    const program = createProgram();
    let out = "";
    program.configureOutput({ writeOut: (s) => { out += s; } });

    await expect(program.parseAsync(["node", "qr-page-maker", "--version"])).rejects.toMatchObject({
      code: "commander.version",
      exitCode: 0,
    });
    expect(out).toBe("1.0.0\n");
  });

  it("rejects an unknown error-correction level", async () => {
    const program = createProgram();
    let err = "";
    program.configureOutput({ writeErr: (s) => { err += s; } });

    const parsing = program.parseAsync(["node", "qr-page-maker", "Launch", "https://a.example/x", "--ec", "X"]);
    await expect(parsing).rejects.toThrow(CommanderError);
    await expect(parsing).rejects.toMatchObject({ code: "commander.invalidArgument" });
    expect(err).toContain("Use one of L, M, Q, H.");
  });

  it("exits 2 on a usage error", async () => {
    expect(await run("Launch")).toBe(2);
    expect(lines(error)).toEqual([
      'Error: expected "<title>" "<url>" or <input.csv> [output_dir] [font_path]; run with --help for usage',
    ]);
  });
});

// ---------------------------------------------------------------------------
// single mode
// ---------------------------------------------------------------------------

describe("CLI single mode", () => {
  it("writes one page and exits 0", async () => {
    const dir = makeTempDir("cli");

    expect(await run("Launch", "https://a.example/x", "-o", dir, "--dpi", "100")).toBe(0);
    expect(existsSync(join(dir, "Launch.png"))).toBe(true);
    expect(lines(log)).toEqual([`  \x1b[32m✓ Saved: ${join(dir, "Launch.png")}\x1b[0m`]);
  });

  it("exits 1 for an invalid URL", async () => {
    const dir = makeTempDir("cli");

    expect(await run("Demo", "not a url", "-o", dir)).toBe(1);
    expect(lines(error)).toEqual([
      `  \x1b[31m✗ InvalidUrl: "not a url" is not an absolute URL\x1b[0m`,
    ]);
  });

  it("prints the result as JSON", async () => {
    const dir = makeTempDir("cli");

    expect(await run("Launch", "https://a.example/x", "-o", dir, "--dpi", "100", "--json")).toBe(0);
    const [output] = lines(log);
    expect(JSON.parse(output ?? "")).toMatchObject({
      status: "success",
      entry: { title: "Launch", url: "https://a.example/x" },
      outputPath: join(dir, "Launch.png"),
    });
  });
});

// ---------------------------------------------------------------------------
// batch mode
// ---------------------------------------------------------------------------

describe("CLI batch mode", () => {
  it("reports progress and failures and exits 1", async () => {
    const dir = makeTempDir("cli");
    const csv = writeCsv("Title,URL\nLaunch,https://a.example/x\n,\nDemo,not a url\n");

    expect(await run(csv, dir, "--dpi", "100")).toBe(1);
    expect(lines(log)).toEqual([
      "Processing (1/3): Launch - https://a.example/x",
      `  \x1b[32m✓ Saved: ${join(dir, "Launch.png")}\x1b[0m`,
      "Processing (2/3):  - ",
      "Processing (3/3): Demo - not a url",
      "\x1b[31m✗ Done: 3 total, 1 succeeded, 2 failed\x1b[0m",
      `  Output: ${dir}`,
    ]);
    expect(lines(error)).toEqual([
      "  \x1b[31m✗ Row 2: MalformedRow: Title and URL are both empty\x1b[0m",
      `  \x1b[31m✗ Row 3: InvalidUrl: "not a url" is not an absolute URL\x1b[0m`,
    ]);
  });

  it("exits 0 when every row succeeds", async () => {
    const dir = makeTempDir("cli");
    const csv = writeCsv("Title,URL\nOne,https://a.example/1\n");

    expect(await run(csv, "-o", dir, "--dpi", "100")).toBe(0);
    expect(lines(log)).toContain("\x1b[32m✓ Done: 1 total, 1 succeeded, 0 failed\x1b[0m");
  });

  it("warns once when the font cannot be loaded", async () => {
    const dir = makeTempDir("cli");
    const font = join(dir, "missing.ttf");
    const csv = writeCsv("Title,URL\nOne,https://a.example/1\nTwo,https://a.example/2\n");

    expect(await run(csv, dir, font, "--dpi", "100")).toBe(0);
    expect(lines(warn)).toEqual([
      `\x1b[33m⚠ FontLoadFailed: font not found at ${font}; using the default font\x1b[0m`,
    ]);
  });

  it("exits 2 when the CSV lacks a required header", async () => {
    const dir = join(makeTempDir("cli"), "out");
    const csv = writeCsv("Title,Link\nLaunch,https://a.example/x\n");

    expect(await run(csv, dir)).toBe(2);
    expect(lines(error)).toEqual([
      "\x1b[31mError: CSV is missing required header(s): URL (found: Title, Link)\x1b[0m",
    ]);
    expect(existsSync(dir)).toBe(false);
  });

  it("exits 2 when the CSV does not exist", async () => {
    const csv = join(makeTempDir("cli"), "missing.csv");

    expect(await run(csv)).toBe(2);
    expect(lines(error)[0]).toMatch(/^\x1b\[31mError: Cannot read CSV file /);
  });

  it("prints the summary as JSON", async () => {
    const dir = makeTempDir("cli");
    const csv = writeCsv("Title,URL\nOne,https://a.example/1\nDemo,not a url\n");

    expect(await run(csv, dir, "--json", "--dpi", "100")).toBe(1);
    expect(log).toHaveBeenCalledTimes(1);
    expect(JSON.parse(lines(log)[0] ?? "")).toMatchObject({ total: 2, succeeded: 1, failed: 1 });
  });
});

// ---------------------------------------------------------------------------
// init
// ---------------------------------------------------------------------------

describe("CLI init", () => {
  it("writes the sample CSV once", async () => {
    const file = join(makeTempDir("cli-init"), "demo.csv");

    expect(await run("init", file)).toBeUndefined();
    expect(readFileSync(file, "utf8")).toBe(SAMPLE_CSV);

    expect(await run("init", file)).toBe(2);
    expect(lines(error)).toEqual([`Error: ${file} already exists (use --force to overwrite)`]);

    expect(await run("init", file, "--force")).toBeUndefined();
  });
});
