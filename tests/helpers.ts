import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import type { GenerationOptions } from "../src/page/types.js";

/** Lato Regular, SIL Open Font License 1.1 (see fixtures/Lato-OFL.txt). */
export const FIXTURE_FONT = fileURLToPath(new URL("./fixtures/Lato-Regular.ttf", import.meta.url));

/** A small page so tests render quickly; layout rules are the same at any size. */
export const SMALL_PAGE = {
  pageWidth: 600,
  pageHeight: 800,
  margin: 40,
  titleFontSize: 30,
  urlFontSize: 20,
  minUrlFontSize: 10,
  sectionGap: 40,
  frameWidth: 10,
} satisfies Omit<GenerationOptions, "outputDirectory">;

const tempDirs: string[] = [];

export function makeTempDir(prefix: string): string {
  const dir = mkdtempSync(join(tmpdir(), `qr-page-${prefix}-`));
  tempDirs.push(dir);
  return dir;
}

export function removeTempDirs(): void {
  for (const dir of tempDirs.splice(0)) {
    rmSync(dir, { recursive: true, force: true });
  }
}

/** Width and height from a PNG's IHDR chunk. */
export function pngDimensions(png: Uint8Array): { width: number; height: number } {
  const buf = Buffer.from(png);
  return { width: buf.readUInt32BE(16), height: buf.readUInt32BE(20) };
}

/** Pixels per inch from a PNG's pHYs chunk, or undefined when there is none. */
export function pngDpi(png: Uint8Array): number | undefined {
  const buf = Buffer.from(png);
  const at = buf.indexOf("pHYs");
  if (at === -1) return undefined;
  const pixelsPerMeter = buf.readUInt32BE(at + 4);
  return Math.round(pixelsPerMeter * 0.0254);
}

export const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];
