// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
import { ValidationError } from "../errors.js";
import { ERROR_CORRECTION_LEVELS } from "./qrcode.js";
import type { GenerationConfig, GenerationOptions } from "./types.js";

/** Page sizes in pixels at 300 DPI. */
export const PAGE_SIZES = {
  letter: { width: 2550, height: 3300 },
  a4: { width: 2480, height: 3508 },
} as const;

export type PageSizeName = keyof typeof PAGE_SIZES;

export const DEFAULT_DPI = 300;

export const DEFAULT_CONFIG: Omit<GenerationConfig, "outputDirectory" | "fontPath"> = {
  pageWidth: PAGE_SIZES.letter.width,
  pageHeight: PAGE_SIZES.letter.height,
  dpi: DEFAULT_DPI,
  errorCorrectionLevel: "M",
  boxSize: 10,
  qrWidthRatio: 0.75,
  margin: 300,
  titleFontSize: 150,
  urlFontSize: 80,
  minUrlFontSize: 40,
  sectionGap: 100,
  frameWidth: 20,
};

const POSITIVE_INTEGER_FIELDS = [
  "pageWidth",
  "pageHeight",
  "dpi",
  "boxSize",
  "titleFontSize",
  "urlFontSize",
  "minUrlFontSize",
  "frameWidth",
] as const;

/**
 * Page dimensions for a named size at the given resolution.
 */
export function pageSize(name: PageSizeName, dpi = DEFAULT_DPI): { width: number; height: number } {
  const base = PAGE_SIZES[name];
  return { width: atDpi(base.width, dpi), height: atDpi(base.height, dpi) };
}

/** Convert a length in 300 DPI pixels to pixels at `dpi`, never below 1. */
function atDpi(pixels: number, dpi: number): number {
  return Math.max(1, Math.round((pixels * dpi) / DEFAULT_DPI));
}

/**
 * Apply defaults to caller options and validate the result.
 *
 * Options set to `undefined` count as absent, and a blank `fontPath` means
 * the default font. Pixel defaults (page size, margin, font sizes, gap and
 * frame) are scaled from 300 DPI to `dpi`; explicit values are used as
 * given. The page must be tall enough to hold the margins, both text lines,
 * the gaps and the frame with room left for the QR code.
 *
 * The returned object is frozen; one config is shared by every entry of a
 * run.
 *
 * @throws {ValidationError} listing every invalid field
 */
export function resolveConfig(options: GenerationOptions): GenerationConfig {
  const dpi = options.dpi ?? DEFAULT_CONFIG.dpi;
  // A bad dpi is reported below; the pixel defaults stay at 300 DPI meanwhile.
  const scaleDpi = Number.isInteger(dpi) && dpi > 0 ? dpi : DEFAULT_DPI;
  const scaled = (pixels: number): number => atDpi(pixels, scaleDpi);

  const config: GenerationConfig = {
    outputDirectory: options.outputDirectory,
    fontPath: options.fontPath?.trim() ? options.fontPath : undefined,
    pageWidth: options.pageWidth ?? scaled(DEFAULT_CONFIG.pageWidth),
    pageHeight: options.pageHeight ?? scaled(DEFAULT_CONFIG.pageHeight),
    dpi,
    errorCorrectionLevel: options.errorCorrectionLevel ?? DEFAULT_CONFIG.errorCorrectionLevel,
    boxSize: options.boxSize ?? DEFAULT_CONFIG.boxSize,
    qrWidthRatio: options.qrWidthRatio ?? DEFAULT_CONFIG.qrWidthRatio,
    margin: options.margin ?? scaled(DEFAULT_CONFIG.margin),
    titleFontSize: options.titleFontSize ?? scaled(DEFAULT_CONFIG.titleFontSize),
    urlFontSize: options.urlFontSize ?? scaled(DEFAULT_CONFIG.urlFontSize),
    minUrlFontSize: options.minUrlFontSize ?? scaled(DEFAULT_CONFIG.minUrlFontSize),
    sectionGap: options.sectionGap ?? scaled(DEFAULT_CONFIG.sectionGap),
    frameWidth: options.frameWidth ?? scaled(DEFAULT_CONFIG.frameWidth),
  };

  const issues: string[] = [];
  if (typeof config.outputDirectory !== "string" || config.outputDirectory.trim() === "") {
    issues.push("outputDirectory is required");
  }
  for (const field of POSITIVE_INTEGER_FIELDS) {
    const value = config[field];
    if (!Number.isInteger(value) || value <= 0) {
      issues.push(`${field} must be a positive integer, got ${String(value)}`);
    }
  }
  if (config.minUrlFontSize > config.urlFontSize) {
    issues.push("minUrlFontSize must not exceed urlFontSize");
  }
  for (const field of ["margin", "sectionGap"] as const) {
    const value = config[field];
    if (!Number.isInteger(value) || value < 0) {
      issues.push(`${field} must be a non-negative integer, got ${String(value)}`);
    }
  }
  if (issues.length === 0 && qrRoom(config) < 1) {
    issues.push(
      `pageHeight ${config.pageHeight} leaves no room for the QR code after margins, text, gaps and frame`,
    );
  }
  if (!(config.qrWidthRatio > 0 && config.qrWidthRatio <= 1)) {
    issues.push(`qrWidthRatio must be in (0, 1], got ${String(config.qrWidthRatio)}`);
  }
  if (!ERROR_CORRECTION_LEVELS.includes(config.errorCorrectionLevel)) {
    issues.push(
      `errorCorrectionLevel must be one of ${ERROR_CORRECTION_LEVELS.join(", ")}, got ${String(config.errorCorrectionLevel)}`,
    );
  }

  if (issues.length > 0) {
    throw new ValidationError(`Invalid generation config: ${issues.join("; ")}`, issues);
  }
  return Object.freeze(config);
}

/**
 * Height left for the QR code once the top margin, title, gaps, frame,
 * URL line and bottom margin are placed.
 */
export function qrRoom(config: GenerationConfig): number {
  const bands =
    2 * config.margin +
    config.titleFontSize +
    config.urlFontSize +
    2 * (config.sectionGap + config.frameWidth);
  return config.pageHeight - bands;
}
