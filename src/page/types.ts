// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
import type { Canvas } from "@napi-rs/canvas";

/**
 * QR error-correction level: L (~7%), M (~15%), Q (~25%) or H (~30%)
 * of the symbol can be damaged and still scan.
 */
export type ErrorCorrectionLevel = "L" | "M" | "Q" | "H";

/**
 * One title/URL pair to turn into a page.
 */
export interface QrEntry {
  /** Text printed above the QR code; also the output filename */
  title: string;
  /** URL encoded in the QR code and printed below it */
  url: string;
  /** 1-based data row in the source CSV, when the entry came from one */
  row?: number;
}

/**
 * Caller-supplied generation options. Everything except the output
 * directory has a default; see {@link resolveConfig}. Pixel defaults are
 * given at 300 DPI and scale with `dpi`.
 */
export interface GenerationOptions {
  /** Directory the PNG pages are written to */
  outputDirectory: string;
  /** TrueType/OpenType font for the title and URL; the default font is used when absent */
  fontPath?: string;
  /** Page width in pixels (default 2550, US Letter at 300 DPI) */
  pageWidth?: number;
  /** Page height in pixels (default 3300) */
  pageHeight?: number;
  /** Resolution written into the PNG (default 300) */
  dpi?: number;
  /** Default "M" */
  errorCorrectionLevel?: ErrorCorrectionLevel;
  /** Pixels per QR module before the code is scaled onto the page (default 10) */
  boxSize?: number;
  /** Width of the QR code as a fraction of the page width (default 0.75) */
  qrWidthRatio?: number;
  /** Margin on every side in pixels (default 300) */
  margin?: number;
  /** Title font size in pixels (default 150) */
  titleFontSize?: number;
  /** Starting URL font size in pixels (default 80) */
  urlFontSize?: number;
  /** The URL font is never shrunk below this size (default 40) */
  minUrlFontSize?: number;
  /** Gap between the title and the QR frame, and between the frame and the URL (default 100) */
  sectionGap?: number;
  /** Width of the black frame around the QR code (default 20) */
  frameWidth?: number;
}

/**
 * Fully resolved, frozen configuration for one run.
 */
export type GenerationConfig = Readonly<
  Required<Omit<GenerationOptions, "fontPath">> & Pick<GenerationOptions, "fontPath">
>;

/**
 * A rendered QR code: square PNG with a 4-module transparent quiet zone.
 */
export interface QrImage {
  /** PNG bytes */
  png: Buffer;
  /** Side length in pixels, always `(moduleCount + 8) * boxSize` */
  size: number;
  /** Modules per side of the symbol (depends on payload length and level) */
  moduleCount: number;
  boxSize: number;
  errorCorrectionLevel: ErrorCorrectionLevel;
}

/**
 * Where the composer placed each region, in page pixels.
 */
export interface PageLayout {
  /** Top edge of the title line */
  titleTop: number;
  /** Top-left corner and drawn size of the QR code (inside its frame) */
  qr: { x: number; y: number; width: number; height: number };
  /** Top edge of the URL line */
  urlTop: number;
  /** URL font size after shrinking to fit */
  urlFontSize: number;
}

/**
 * A composed page, ready to be encoded.
 */
export interface PageImage {
  canvas: Canvas;
  width: number;
  height: number;
  layout: PageLayout;
  /** Non-fatal problems hit while composing (e.g. font fallback) */
  warnings: string[];
}

/** Why an entry failed. */
export type FailureKind = "InvalidUrl" | "MalformedRow" | "FileWriteFailed" | "RenderFailed";

export interface FailureReason {
  kind: FailureKind;
  /** Human-readable explanation */
  message: string;
}

/**
 * Outcome of processing one entry.
 */
export type GenerationResult =
  | {
      status: "success";
      entry: QrEntry;
      /** Absolute path of the written PNG */
      outputPath: string;
      warnings: string[];
    }
  | {
      status: "failed";
      entry: QrEntry;
      reason: FailureReason;
      warnings: string[];
    };

/**
 * A failed entry, as listed in {@link BatchSummary.failures}.
 */
export interface BatchFailure {
  entry: QrEntry;
  reason: FailureReason;
}

/**
 * Aggregate outcome of a batch run. `succeeded + failed === total`.
 */
export interface BatchSummary {
  total: number;
  succeeded: number;
  failed: number;
  /** Failed entries in input order */
  failures: BatchFailure[];
  /** One result per entry, in input order */
  results: GenerationResult[];
  /** Distinct warnings raised during the run */
  warnings: string[];
}

/**
 * Reported before each entry of a batch is processed.
 */
export interface BatchProgress {
  /** 1-based position of the entry */
  index: number;
  total: number;
  entry: QrEntry;
}

export interface BatchOptions {
  /** Called before each entry is processed */
  onProgress?: (progress: BatchProgress) => void;
  /** Called with each entry's result as soon as it is known */
  onResult?: (result: GenerationResult, progress: BatchProgress) => void;
}
