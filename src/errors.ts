// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
import type { FailureKind, FailureReason } from "./page/types.js";

/**
 * Base error class for all qr-page-maker errors.
 */
export class QrPageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "QrPageError";
    Object.setPrototypeOf(this, QrPageError.prototype);
  }
}

/**
 * Error thrown when a generation configuration is invalid.
 */
export class ValidationError extends QrPageError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message);
    this.name = "ValidationError";
    this.issues = issues;
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

/**
 * Error raised for a single entry. The batch driver turns these into
 * failure records instead of letting them escape.
 */
export abstract class EntryError extends QrPageError {
  abstract readonly kind: FailureKind;
}

/**
 * The URL is empty, not an http(s) URL, or rejected by the QR encoder.
 */
export class InvalidUrlError extends EntryError {
  readonly kind = "InvalidUrl";

  constructor(message: string) {
    super(message);
    this.name = "InvalidUrlError";
    Object.setPrototypeOf(this, InvalidUrlError.prototype);
  }
}

/**
 * A row is missing its title or URL.
 */
export class MalformedRowError extends EntryError {
  readonly kind = "MalformedRow";

  constructor(message: string) {
    super(message);
    this.name = "MalformedRowError";
    Object.setPrototypeOf(this, MalformedRowError.prototype);
  }
}

/**
 * Writing a page (or creating its directory) failed.
 */
export class FileWriteError extends EntryError {
  readonly kind = "FileWriteFailed";
  readonly path: string;

  constructor(message: string, path: string) {
    super(message);
    this.name = "FileWriteError";
    this.path = path;
    Object.setPrototypeOf(this, FileWriteError.prototype);
  }
}

/**
 * The input as a whole cannot be processed (unreadable CSV, missing
 * `Title`/`URL` headers). Thrown before any page is written.
 */
export class FatalInputError extends QrPageError {
  constructor(message: string) {
    super(message);
    this.name = "FatalInputError";
    Object.setPrototypeOf(this, FatalInputError.prototype);
  }
}

/** Convert anything thrown while processing an entry into a failure reason. */
export function toFailureReason(err: unknown): FailureReason {
  if (err instanceof EntryError) {
    return { kind: err.kind, message: err.message };
  }
  return {
    kind: "RenderFailed",
    message: err instanceof Error ? err.message : String(err),
  };
}
