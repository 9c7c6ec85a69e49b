// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
export const FALLBACK_FILENAME = "untitled";
export const MAX_FILENAME_LENGTH = 100;
/**
 * UTF-8 byte budget for a sanitized name. Filesystems cap a name at 255
 * bytes; the rest is left for a `-N` suffix and the `.png` extension.
 */
export const MAX_FILENAME_BYTES = 200;

// Device names Windows refuses as a file's base name, whatever the extension.
const RESERVED_NAMES = /^(con|prn|aux|nul|com[1-9]|lpt[1-9])$/i;

/**
 * Turn a free-text title into a filename (without extension) that is safe
 * on Windows, macOS and Linux.
 *
 * Letters, digits, spaces, `_` and `-` are kept; anything else becomes a space.
 * Whitespace runs collapse to one space and the result is cut to
 * {@link MAX_FILENAME_LENGTH} characters and {@link MAX_FILENAME_BYTES}
 * bytes of UTF-8, never inside a character. Returns {@link FALLBACK_FILENAME}
 * when nothing usable is left.
 *
 * @example
 * ```ts
 * sanitize("Event: Registration!"); // "Event Registration"
 * sanitize("???");                  // "untitled"
 * ```
 */
export function sanitize(title: string): string {
  const cleaned = title
    .normalize("NFC")
    .replace(/[^\p{L}\p{N}\p{M} _-]/gu, " ")
    .replace(/\s+/g, " ")
    .trim();

  const truncated = truncate(cleaned).trim();
  if (truncated.length === 0) {
    return FALLBACK_FILENAME;
  }
  return RESERVED_NAMES.test(truncated) ? `${truncated}_` : truncated;
}

function truncate(name: string): string {
  let out = "";
  let bytes = 0;
  for (const ch of Array.from(name).slice(0, MAX_FILENAME_LENGTH)) {
    bytes += Buffer.byteLength(ch, "utf8");
    if (bytes > MAX_FILENAME_BYTES) break;
    out += ch;
  }
  return out;
}

/**
 * Pick a name not yet used in this run: `name`, then `name-2`, `name-3`, …
 * The comparison ignores case so two pages never overwrite each other on a
 * case-insensitive filesystem. The chosen name is recorded in `taken`.
 */
export function disambiguate(name: string, taken: Set<string>): string {
  let candidate = name;
  for (let n = 2; taken.has(candidate.toLowerCase()); n++) {
    candidate = `${name}-${n}`;
  }
  taken.add(candidate.toLowerCase());
  return candidate;
}
