// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
import canvas from "@napi-rs/canvas";
import { qrRoom } from "./config.js";
import { loadFont } from "./font.js";
import type { GenerationConfig, PageImage, QrImage } from "./types.js";

const { createCanvas, loadImage } = canvas;

const INK = "#000000";

/**
 * Lay out a page: title on top, QR code in the middle, URL underneath,
 * all horizontally centred on a transparent background.
 *
 * The QR code is scaled to `qrWidthRatio` of the page width without
 * smoothing, so modules stay sharp. On a page too short for that it shrinks
 * to the height left between the title and URL bands, so the URL line and
 * the bottom margin always fit. The URL font shrinks in 2 px steps
 * (down to `minUrlFontSize`) until the URL fits between the side margins;
 * the title is drawn at its configured size and may overflow.
 */
export async function compose(
  title: string,
  qr: QrImage,
  url: string,
  config: GenerationConfig,
): Promise<PageImage> {
  const { pageWidth: width, pageHeight: height, margin, sectionGap, frameWidth } = config;
  const page = createCanvas(width, height);
  const ctx = page.getContext("2d");
  const warnings: string[] = [];

  const { font, warning } = loadFont(config.fontPath);
  if (warning) warnings.push(warning);

  ctx.fillStyle = INK;
  ctx.textAlign = "center";
  ctx.textBaseline = "top";

  const centerX = width / 2;
  const titleTop = margin;
  ctx.font = font.at(config.titleFontSize);
  ctx.fillText(title, centerX, titleTop);

  const image = await loadImage(qr.png);
  let qrWidth = Math.round(width * config.qrWidthRatio);
  let qrHeight = Math.round((image.height * qrWidth) / image.width);
  const room = qrRoom(config);
  if (qrHeight > room) {
    qrWidth = Math.max(1, Math.round((qrWidth * room) / qrHeight));
    qrHeight = room;
  }
  const qrX = Math.round((width - qrWidth) / 2);
  const qrY = titleTop + config.titleFontSize + sectionGap + frameWidth;

  ctx.strokeStyle = INK;
  ctx.lineWidth = frameWidth;
  ctx.strokeRect(
    qrX - frameWidth / 2,
    qrY - frameWidth / 2,
    qrWidth + frameWidth,
    qrHeight + frameWidth,
  );
  ctx.imageSmoothingEnabled = false;
  ctx.drawImage(image, qrX, qrY, qrWidth, qrHeight);

  const maxTextWidth = width - 2 * margin;
  let urlFontSize = config.urlFontSize;
  ctx.font = font.at(urlFontSize);
  while (urlFontSize > config.minUrlFontSize && ctx.measureText(url).width > maxTextWidth) {
    urlFontSize = Math.max(config.minUrlFontSize, urlFontSize - 2);
    ctx.font = font.at(urlFontSize);
  }
  const urlTop = qrY + qrHeight + frameWidth + sectionGap;
  ctx.fillText(url, centerX, urlTop);

  return {
    canvas: page,
    width,
    height,
    layout: {
      titleTop,
      qr: { x: qrX, y: qrY, width: qrWidth, height: qrHeight },
      urlTop,
      urlFontSize,
    },
    warnings,
  };
}
