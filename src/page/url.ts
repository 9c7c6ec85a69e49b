// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
import { InvalidUrlError } from "../errors.js";

const ALLOWED_PROTOCOLS = new Set(["http:", "https:"]);

/**
 * Check that `url` is an absolute http(s) URL with a host.
 *
 * The QR encoder would accept any string, so the rule is applied here:
 * the trimmed value must parse as a WHATWG URL, use `http:` or `https:`,
 * and name a host. Returns the trimmed URL.
 *
 * @throws {InvalidUrlError} when the rule is not met
 */
export function validateUrl(url: string): string {
  const trimmed = url.trim();
  if (trimmed.length === 0) {
    throw new InvalidUrlError("URL is empty");
  }

  let parsed: URL;
  try {
    parsed = new URL(trimmed);
  } catch {
    throw new InvalidUrlError(`"${trimmed}" is not an absolute URL`);
  }

  if (!ALLOWED_PROTOCOLS.has(parsed.protocol)) {
    throw new InvalidUrlError(
      `Unsupported URL scheme "${parsed.protocol}" in "${trimmed}" (use http or https)`,
    );
  }
  if (parsed.hostname.length === 0) {
    throw new InvalidUrlError(`URL "${trimmed}" has no host`);
  }
  return trimmed;
}
