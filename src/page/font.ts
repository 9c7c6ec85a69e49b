// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
import { statSync } from "node:fs";
import { resolve } from "node:path";
import canvas from "@napi-rs/canvas";

const { GlobalFonts } = canvas;

/** Generic family used when no font is configured or the configured one fails. */
export const DEFAULT_FONT_FAMILY = "sans-serif";

/**
 * A loaded font, usable as a canvas `font` string at any size.
 */
export interface FontHandle {
  family: string;
  /** Canvas font shorthand for the given pixel size */
  at(size: number): string;
}

/**
 * Result of {@link loadFont}. `warning` is set when the configured font
 * could not be used and the default font was substituted.
 */
export interface FontLoad {
  font: FontHandle;
  warning?: string;
}

const registered = new Map<string, FontLoad>();

function handle(family: string): FontHandle {
  const quoted = family === DEFAULT_FONT_FAMILY ? family : `"${family}"`;
  return { family, at: (size) => `${size}px ${quoted}` };
}

/**
 * Load the configured font, falling back to {@link DEFAULT_FONT_FAMILY}.
 *
 * Never throws: a missing or unreadable font file yields the default font
 * plus a `FontLoadFailed` warning. A font that loads is registered once per
 * path and reused.
 */
export function loadFont(fontPath?: string): FontLoad {
  if (fontPath === undefined || fontPath.trim() === "") {
    return { font: handle(DEFAULT_FONT_FAMILY) };
  }

  const path = resolve(fontPath);
  const cached = registered.get(path);
  if (cached) return cached;

  if (!isFile(path)) {
    return {
      font: handle(DEFAULT_FONT_FAMILY),
      warning: `FontLoadFailed: font not found at ${path}; using the default font`,
    };
  }

  const family = `qr-page-font-${registered.size + 1}`;
  let ok: boolean;
  try {
    ok = GlobalFonts.registerFromPath(path, family);
  } catch {
    ok = false;
  }
  if (!ok) {
    return {
      font: handle(DEFAULT_FONT_FAMILY),
      warning: `FontLoadFailed: could not load font from ${path}; using the default font`,
    };
  }

  const load: FontLoad = { font: handle(family) };
  registered.set(path, load);
  return load;
}

function isFile(path: string): boolean {
  try {
    return statSync(path).isFile();
  } catch {
    return false;
  }
}
