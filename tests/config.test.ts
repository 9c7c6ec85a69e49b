import { describe, it, expect } from "vitest";
import { DEFAULT_CONFIG, pageSize, qrRoom, resolveConfig } from "../src/page/config.js";
import { ValidationError } from "../src/errors.js";
import { SMALL_PAGE } from "./helpers.js";

describe("resolveConfig", () => {
  it("applies defaults", () => {
    const config = resolveConfig({ outputDirectory: "out" });

    expect(config).toEqual({
      outputDirectory: "out",
      fontPath: undefined,
      pageWidth: 2550,
      pageHeight: 3300,
      dpi: 300,
      errorCorrectionLevel: "M",
      boxSize: 10,
      qrWidthRatio: 0.75,
      margin: 300,
      titleFontSize: 150,
      urlFontSize: 80,
      minUrlFontSize: 40,
      sectionGap: 100,
      frameWidth: 20,
    });
  });

  it("scales pixel defaults with the resolution", () => {
    const config = resolveConfig({ outputDirectory: "out", dpi: 150 });

    expect(config).toMatchObject({
      pageWidth: 1275,
      pageHeight: 1650,
      dpi: 150,
      boxSize: 10,
      margin: 150,
      titleFontSize: 75,
      urlFontSize: 40,
      minUrlFontSize: 20,
      sectionGap: 50,
      frameWidth: 10,
    });
  });

  it("does not scale explicit values", () => {
    const config = resolveConfig({ outputDirectory: "out", dpi: 150, margin: 300, pageHeight: 3300 });

    expect(config.margin).toBe(300);
    expect(config.pageHeight).toBe(3300);
    expect(config.titleFontSize).toBe(75);
  });

  it("rejects a page too short to hold the QR code", () => {
    expect(() =>
      resolveConfig({ outputDirectory: "out", ...SMALL_PAGE, pageHeight: 230 }),
    ).toThrow("pageHeight 230 leaves no room for the QR code after margins, text, gaps and frame");
    expect(qrRoom(resolveConfig({ outputDirectory: "out", ...SMALL_PAGE, pageHeight: 231 }))).toBe(1);
  });

  it("keeps explicit values and ignores undefined ones", () => {
    const config = resolveConfig({
      outputDirectory: "out",
      errorCorrectionLevel: "H",
      boxSize: undefined,
      margin: 0,
    });

    expect(config.errorCorrectionLevel).toBe("H");
    expect(config.boxSize).toBe(DEFAULT_CONFIG.boxSize);
    expect(config.margin).toBe(0);
  });

  it("treats a blank font path as the default font", () => {
    expect(resolveConfig({ outputDirectory: "out", fontPath: "  " }).fontPath).toBeUndefined();
    expect(resolveConfig({ outputDirectory: "out", fontPath: "fonts/a.ttf" }).fontPath).toBe("fonts/a.ttf");
  });

  it("returns a frozen object", () => {
    expect(Object.isFrozen(resolveConfig({ outputDirectory: "out" }))).toBe(true);
  });

  it("requires an output directory", () => {
    expect(() => resolveConfig({ outputDirectory: " " })).toThrow(
      "Invalid generation config: outputDirectory is required",
    );
  });

  it("lists every invalid field", () => {
    try {
      resolveConfig({
        outputDirectory: "out",
        pageWidth: 0,
        dpi: 72.5,
        qrWidthRatio: 1.5,
        margin: -1,
      });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ValidationError);
      if (!(err instanceof ValidationError)) return;
      expect(err.issues).toEqual([
        "pageWidth must be a positive integer, got 0",
        "dpi must be a positive integer, got 72.5",
        "margin must be a non-negative integer, got -1",
        "qrWidthRatio must be in (0, 1], got 1.5",
      ]);
    }
  });

  it("rejects a minimum URL font larger than the starting size", () => {
    expect(() =>
      resolveConfig({ outputDirectory: "out", urlFontSize: 30, minUrlFontSize: 40 }),
    ).toThrow("minUrlFontSize must not exceed urlFontSize");
  });
});

describe("pageSize", () => {
  it("returns pixel sizes at 300 DPI", () => {
    expect(pageSize("letter")).toEqual({ width: 2550, height: 3300 });
    expect(pageSize("a4")).toEqual({ width: 2480, height: 3508 });
  });

  it("scales with the resolution", () => {
    expect(pageSize("letter", 150)).toEqual({ width: 1275, height: 1650 });
    expect(pageSize("a4", 600)).toEqual({ width: 4960, height: 7016 });
  });
});
