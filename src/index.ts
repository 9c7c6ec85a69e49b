// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
/**
 * qr-page-maker - printable QR-code pages from a title and a URL
 *
 * Generate one page for a title/URL pair, or a page per row of a
 * `Title,URL` CSV file. Each page is a transparent PNG with the title on
 * top, the QR code in the middle and the URL underneath.
 *
 * @packageDocumentation
 */

export * from "./page/index.js";

// Errors
export {
  QrPageError,
  ValidationError,
  EntryError,
  InvalidUrlError,
  MalformedRowError,
  FileWriteError,
  FatalInputError,
  toFailureReason,
} from "./errors.js";

// GUI request handler
export { createGuiHandler } from "./gui/index.js";
export type { GuiRequest, GuiResponse, GuiHandlerConfig, GuiRunEvent } from "./gui/index.js";
