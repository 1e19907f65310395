import { describe, expect, it } from "vitest";
import { ConfigurationError } from "../src/errors.js";
import { encodePng, loadImage, parseBitDepth } from "../src/image-io.js";
import { createPixelBuffer, writePixel } from "../src/pixel-buffer.js";

describe("PNG round trip", () => {
  it("decodes what it encodes at 8 bits", async () => {
    const buffer = createPixelBuffer(2, 1);
    writePixel(buffer, 0, 0, { r: 1, g: 0, b: 0.5, a: 1 });
    writePixel(buffer, 1, 0, { r: 0, g: 1, b: 2, a: 1 });

    const png = await encodePng(buffer);
    const decoded = await loadImage(png);

    expect(decoded.width).toBe(2);
    expect(decoded.height).toBe(1);
    expect(decoded.data[0]).toBe(1);
    expect(decoded.data[1]).toBe(0);
    expect(decoded.data[2]).toBeCloseTo(127 / 255, 6);
    expect(decoded.data[3]).toBe(1);
    expect(Array.from(decoded.data.slice(4))).toEqual([0, 1, 1, 1]);
  });

  it("keeps 16-bit precision when the source carries it", async () => {
    const buffer = createPixelBuffer(1, 1);
    writePixel(buffer, 0, 0, { r: 0.25, g: 0.5, b: 1, a: 1 });

    const decoded = await loadImage(await encodePng(buffer, 16));

    expect(decoded.data[0]).toBeCloseTo(16_383 / 65_535, 6);
    expect(decoded.data[1]).toBeCloseTo(32_767 / 65_535, 6);
    expect(decoded.data[2]).toBe(1);
    expect(decoded.data[3]).toBe(1);
  });
});

describe("parseBitDepth", () => {
  it("accepts 8 and 16 only", () => {
    expect(parseBitDepth("8")).toBe(8);
    expect(parseBitDepth("16")).toBe(16);
    expect(() => parseBitDepth("12")).toThrow(ConfigurationError);
  });
});
