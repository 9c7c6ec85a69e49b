// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
export {
  sanitize,
  disambiguate,
  FALLBACK_FILENAME,
  MAX_FILENAME_LENGTH,
  MAX_FILENAME_BYTES,
} from "./filename.js";
export { validateUrl } from "./url.js";
export { makeQr, ERROR_CORRECTION_LEVELS, QUIET_ZONE } from "./qrcode.js";
export { loadFont, DEFAULT_FONT_FAMILY } from "./font.js";
export type { FontHandle, FontLoad } from "./font.js";
export { compose } from "./compose.js";
export { encodePng, writePage } from "./png.js";
export { runSingle } from "./generate.js";
export { runBatch, runBatchFromCsv, summarize } from "./batch.js";
export { parseEntries, readEntries, TITLE_HEADER, URL_HEADER } from "./csv.js";
export { resolveConfig, pageSize, qrRoom, PAGE_SIZES, DEFAULT_CONFIG, DEFAULT_DPI } from "./config.js";
export type { PageSizeName } from "./config.js";
export type {
  ErrorCorrectionLevel,
  QrEntry,
  GenerationOptions,
  GenerationConfig,
  QrImage,
  PageLayout,
  PageImage,
  FailureKind,
  FailureReason,
  GenerationResult,
  BatchFailure,
  BatchSummary,
  BatchProgress,
  BatchOptions,
} from "./types.js";
