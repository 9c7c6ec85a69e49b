// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
import { MalformedRowError, toFailureReason } from "../errors.js";
import { compose } from "./compose.js";
import { disambiguate, sanitize } from "./filename.js";
import { encodePng, writePage } from "./png.js";
import { makeQr } from "./qrcode.js";
import type { GenerationConfig, GenerationResult, QrEntry } from "./types.js";

/**
 * Run one entry through the whole pipeline: validate, encode the QR code,
 * compose the page, encode the PNG and write it under a name not yet in
 * `taken`. A name whose write fails is released again, so a later entry
 * with the same title gets it. Every failure is returned as a `failed`
 * result; nothing throws.
 */
export async function processEntry(
  entry: QrEntry,
  config: GenerationConfig,
  taken: Set<string>,
): Promise<GenerationResult> {
  const warnings: string[] = [];
  let reserved: string | undefined;
  try {
    const title = entry.title.trim();
    const url = entry.url.trim();
    if (title === "" && url === "") {
      throw new MalformedRowError("Title and URL are both empty");
    }
    if (title === "") {
      throw new MalformedRowError("Title is empty");
    }
    if (url === "") {
      throw new MalformedRowError("URL is empty");
    }

    const qr = await makeQr(url, config.errorCorrectionLevel, config.boxSize);
    const page = await compose(title, qr, url, config);
    warnings.push(...page.warnings);
    const png = await encodePng(page, config.dpi);

    reserved = disambiguate(sanitize(title), taken);
    const outputPath = await writePage(config.outputDirectory, reserved, png);
    return { status: "success", entry, outputPath, warnings };
  } catch (err) {
    if (reserved !== undefined) taken.delete(reserved.toLowerCase());
    return { status: "failed", entry, reason: toFailureReason(err), warnings };
  }
}

/**
 * Generate the page for a single title/URL pair.
 *
 * @example
 * ```ts
 * const result = await runSingle(
 *   { title: "Spring Fair", url: "https://example.com/fair" },
 *   resolveConfig({ outputDirectory: "./output" }),
 * );
 * if (result.status === "success") console.log(result.outputPath);
 * ```
 */
export async function runSingle(entry: QrEntry, config: GenerationConfig): Promise<GenerationResult> {
  return processEntry(entry, config, new Set());
}
