// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
import QRCode from "qrcode";
import { InvalidUrlError, ValidationError } from "../errors.js";
import { validateUrl } from "./url.js";
import type { ErrorCorrectionLevel, QrImage } from "./types.js";

/** Quiet zone around the symbol, in modules. */
export const QUIET_ZONE = 4;

export const ERROR_CORRECTION_LEVELS: readonly ErrorCorrectionLevel[] = ["L", "M", "Q", "H"];

/**
 * Render a URL as a QR code PNG.
 *
 * Modules are black, everything else (quiet zone included) is transparent.
 * The module count follows from the payload length and the level, so the
 * image size varies: it is `(moduleCount + 2 * QUIET_ZONE) * boxSize`.
 *
 * @throws {InvalidUrlError} if the URL fails {@link validateUrl} or is too long to encode
 * @throws {ValidationError} if `boxSize` is not a positive integer
 */
export async function makeQr(
  url: string,
  errorCorrectionLevel: ErrorCorrectionLevel = "M",
  boxSize = 10,
): Promise<QrImage> {
  if (!Number.isInteger(boxSize) || boxSize <= 0) {
    throw new ValidationError(`boxSize must be a positive integer, got ${boxSize}`);
  }
  const payload = validateUrl(url);

  let moduleCount: number;
  try {
    moduleCount = QRCode.create(payload, { errorCorrectionLevel }).modules.size;
  } catch (err) {
    throw new InvalidUrlError(
      `Cannot encode URL at level ${errorCorrectionLevel}: ${err instanceof Error ? err.message : String(err)}`,
    );
  }

  const png = await QRCode.toBuffer(payload, {
    type: "png",
    errorCorrectionLevel,
    margin: QUIET_ZONE,
    scale: boxSize,
    color: { dark: "#000000ff", light: "#00000000" },
  });

  return {
    png,
    size: (moduleCount + 2 * QUIET_ZONE) * boxSize,
    moduleCount,
    boxSize,
    errorCorrectionLevel,
  };
}
