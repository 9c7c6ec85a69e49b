// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
import { mkdirSync, writeFileSync } from "node:fs";
import { join, resolve } from "node:path";
import sharp from "sharp";
import { FileWriteError } from "../errors.js";
import type { PageImage } from "./types.js";

/**
 * Encode a composed page as an RGBA PNG whose `pHYs` chunk records `dpi`,
 * so printing software sizes it correctly.
 */
export async function encodePng(page: PageImage, dpi: number): Promise<Buffer> {
  const raw = await page.canvas.encode("png");
  return sharp(raw).withMetadata({ density: dpi }).png().toBuffer();
}

/**
 * Write `png` to `<directory>/<name>.png`, creating the directory if needed.
 * Returns the absolute path written.
 *
 * @throws {FileWriteError} if the directory cannot be created or the file cannot be written
 */
export async function writePage(directory: string, name: string, png: Uint8Array): Promise<string> {
  const dir = resolve(directory);
  const filePath = join(dir, `${name}.png`);
  try {
    mkdirSync(dir, { recursive: true });
    writeFileSync(filePath, png);
  } catch (err) {
    throw new FileWriteError(
      `Failed to write ${filePath}: ${err instanceof Error ? err.message : String(err)}`,
      filePath,
    );
  }
  return filePath;
}
