// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
import { InvalidArgumentError } from "commander";
import { ERROR_CORRECTION_LEVELS } from "../page/qrcode.js";
import { PAGE_SIZES, pageSize } from "../page/config.js";
import type { PageSizeName } from "../page/config.js";
import type { ErrorCorrectionLevel, GenerationOptions } from "../page/types.js";

export const DEFAULT_OUTPUT_DIR = "output";

/** Options shared by every command that generates pages. */
export interface PageOptions {
  font?: string;
  ec: ErrorCorrectionLevel;
  boxSize: number;
  page: PageSizeName;
  dpi: number;
}

export function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!/^\d+$/.test(value) || !Number.isInteger(n) || n <= 0) {
    throw new InvalidArgumentError("Not a positive integer.");
  }
  return n;
}

export function parseLevel(value: string): ErrorCorrectionLevel {
  const level = ERROR_CORRECTION_LEVELS.find((l) => l === value.toUpperCase());
  if (!level) {
    throw new InvalidArgumentError(`Use one of ${ERROR_CORRECTION_LEVELS.join(", ")}.`);
  }
  return level;
}

export function parsePageSize(value: string): PageSizeName {
  const name = value.toLowerCase();
  if (name !== "letter" && name !== "a4") {
    throw new InvalidArgumentError(`Use one of ${Object.keys(PAGE_SIZES).join(", ")}.`);
  }
  return name;
}

/** Page, resolution and QR settings from parsed CLI flags. */
export function pageSettings(opts: PageOptions): Omit<GenerationOptions, "outputDirectory" | "fontPath"> {
  const { width, height } = pageSize(opts.page, opts.dpi);
  return {
    pageWidth: width,
    pageHeight: height,
    dpi: opts.dpi,
    errorCorrectionLevel: opts.ec,
    boxSize: opts.boxSize,
  };
}
