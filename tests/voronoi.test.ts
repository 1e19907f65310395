import { describe, expect, it } from "vitest";
import type { DistanceMetricKind } from "../src/distance.js";
import { ConfigurationError } from "../src/errors.js";
import { createPixelBuffer, readPixel } from "../src/pixel-buffer.js";
import {
  cellSite,
  RENDER_MODES,
  smoothBlend,
  smoothstep01,
  VoronoiGenerator,
} from "../src/voronoi.js";

const METRICS: DistanceMetricKind[] = [
  "euclidean",
  "manhattan",
  "chebyshev",
  "minkowski",
];

describe("cellSite", () => {
  it("sits at the cell centre without randomness", () => {
    const site = cellSite(-2, 3, 5, 0, 1234);
    expect(site.x).toBe(-1.5);
    expect(site.y).toBe(3.5);
    expect(site.w).toBe(5.5);
  });

  it("stays inside its cell at full randomness", () => {
    for (let i = -10; i <= 10; i++) {
      const site = cellSite(i, i * 2, -i, 1, 99);
      expect(site.x).toBeGreaterThanOrEqual(i);
      expect(site.x).toBeLessThanOrEqual(i + 1);
      expect(site.y).toBeGreaterThanOrEqual(i * 2);
      expect(site.y).toBeLessThanOrEqual(i * 2 + 1);
      expect(site.w).toBeGreaterThanOrEqual(-i);
      expect(site.w).toBeLessThanOrEqual(-i + 1);
    }
  });
});

describe("smoothBlend", () => {
  it("is 0.5 on a boundary and decays to 0", () => {
    expect(smoothBlend(1, 1, 0.5)).toBe(0.5);
    expect(smoothBlend(1, 1.25, 0.5)).toBe(0.25);
    expect(smoothBlend(1, 1.5, 0.5)).toBe(0);
    expect(smoothBlend(1, 3, 0.5)).toBe(0);
  });

  it("is 0 without smoothness", () => {
    expect(smoothBlend(1, 1, 0)).toBe(0);
    expect(smoothBlend(1, 1, -1)).toBe(0);
  });

  it("uses the cubic smoothstep", () => {
    expect(smoothstep01(0.5)).toBe(0.5);
    expect(smoothstep01(2)).toBe(1);
    expect(smoothstep01(-1)).toBe(0);
  });
});

describe("VoronoiGenerator", () => {
  it("reproduces the distance to a single centred point", () => {
    const generator = new VoronoiGenerator({
      width: 4,
      height: 4,
      cellSize: { x: 4, y: 4, w: 1 },
      randomness: 0,
      seed: 0,
      metric: "euclidean",
      renderMode: "nearest-distance",
    });
    const result = generator.generate();

    expect(result.width).toBe(4);
    expect(result.height).toBe(4);
    for (let y = 0; y < 4; y++) {
      for (let x = 0; x < 4; x++) {
        // lattice units: the centre is at (0.5, 0.5) and the w sites sit 0.5 away
        const dx = (x + 0.5) / 4 - 0.5;
        const dy = (y + 0.5) / 4 - 0.5;
        const expected = Math.sqrt(dx * dx + dy * dy + 0.25);
        const pixel = readPixel(result, x, y);
        expect(pixel.r).toBeCloseTo(expected, 6);
        expect(pixel.g).toBe(pixel.r);
        expect(pixel.b).toBe(pixel.r);
        expect(pixel.a).toBe(1);
      }
    }
    expect(readPixel(result, 1, 1).r).toBeCloseTo(Math.sqrt(0.28125), 6);
  });

  it("matches the nearest cell centre on a regular lattice", () => {
    for (const metric of METRICS) {
      const generator = new VoronoiGenerator({
        width: 10,
        height: 6,
        cellSize: { x: 3, y: 2, w: 1 },
        offset: { x: 0.7, y: -0.3 },
        w: 0.5,
        randomness: 0,
        metric,
        minkowskiExponent: 3,
      });
      for (let y = 0; y < 6; y++) {
        for (let x = 0; x < 10; x++) {
          const px = (x + 0.5 - 0.7) / 3;
          const py = (y + 0.5 + 0.3) / 2;
          const dx = Math.abs(px - (Math.floor(px) + 0.5));
          const dy = Math.abs(py - (Math.floor(py) + 0.5));
          let expected: number;
          switch (metric) {
            case "euclidean":
              expected = Math.hypot(dx, dy);
              break;
            case "manhattan":
              expected = dx + dy;
              break;
            case "chebyshev":
              expected = Math.max(dx, dy);
              break;
            default:
              expected = (dx ** 3 + dy ** 3) ** (1 / 3);
          }
          expect(generator.evaluate(x, y).d1).toBeCloseTo(expected, 9);
        }
      }
    }
  });

  it("keeps the nearest distance no larger than the second", () => {
    for (const metric of METRICS) {
      const generator = new VoronoiGenerator({
        width: 32,
        height: 32,
        cellSize: { x: 5, y: 7, w: 3 },
        seed: 17,
        w: 4.2,
        metric,
        minkowskiExponent: 0.7,
        randomness: 1,
      });
      for (let y = 0; y < 32; y += 3) {
        for (let x = 0; x < 32; x += 3) {
          const { d1, d2 } = generator.evaluate(x, y);
          expect(d1).toBeGreaterThanOrEqual(0);
          expect(d2).toBeGreaterThanOrEqual(d1);
        }
      }
    }
  });

  it("measures the gap to the second-nearest point", () => {
    const generator = new VoronoiGenerator({
      width: 4,
      height: 4,
      cellSize: { x: 4, y: 4, w: 1 },
      w: 0.5,
      randomness: 0,
      renderMode: "distance-gap",
    });
    const pixel = readPixel(generator.generate(), 1, 1);
    expect(pixel.r).toBeCloseTo(Math.sqrt(0.78125) - Math.sqrt(0.03125), 6);
  });

  it("blends the smooth distance towards the second point", () => {
    const generator = new VoronoiGenerator({
      width: 4,
      height: 4,
      cellSize: { x: 4, y: 4, w: 1 },
      w: 0.5,
      randomness: 0,
      smoothness: 1,
      renderMode: "smooth-distance",
    });
    const d1 = Math.sqrt(0.03125);
    const d2 = Math.sqrt(0.78125);
    const t = d2 - d1;
    const blend = 0.5 * (1 - t * t * (3 - 2 * t));
    const sample = generator.evaluate(1, 1);
    expect(sample.blend).toBeCloseTo(blend, 9);
    const pixel = readPixel(generator.generate(), 1, 1);
    expect(pixel.r).toBeCloseTo(d1 + (d2 - d1) * blend, 6);
  });

  it("never blends without smoothness", () => {
    const generator = new VoronoiGenerator({
      width: 24,
      height: 24,
      cellSize: { x: 6, y: 6, w: 1 },
      seed: 5,
      smoothness: 0,
    });
    for (let y = 0; y < 24; y += 2) {
      for (let x = 0; x < 24; x += 2) {
        expect(generator.evaluate(x, y).blend).toBe(0);
      }
    }
  });

  it("encodes the nearest point position", () => {
    const generator = new VoronoiGenerator({
      width: 8,
      height: 8,
      cellSize: { x: 4, y: 4, w: 1 },
      randomness: 0,
      renderMode: "position",
    });
    const result = generator.generate();
    expect(readPixel(result, 0, 0)).toEqual({ r: 0.25, g: 0.25, b: 0, a: 1 });
    expect(readPixel(result, 7, 2)).toEqual({ r: 0.75, g: 0.25, b: 0, a: 1 });
  });

  it("is deterministic for a seed and differs across seeds", () => {
    const config = {
      width: 16,
      height: 16,
      cellSize: { x: 4, y: 4, w: 1 },
      seed: 3,
    };
    const a = new VoronoiGenerator(config).generate();
    const b = new VoronoiGenerator(config).generate();
    const c = new VoronoiGenerator({ ...config, seed: 4 }).generate();

    expect(b.data).toEqual(a.data);
    let differing = 0;
    for (let i = 0; i < a.data.length; i++) {
      if (a.data[i] !== c.data[i]) {
        differing++;
      }
    }
    expect(differing).toBeGreaterThan(0);
  });

  it("writes finite values in every mode", () => {
    for (const renderMode of RENDER_MODES) {
      const result = new VoronoiGenerator({
        width: 12,
        height: 9,
        cellSize: { x: 3, y: 3, w: 2 },
        smoothness: 0.4,
        renderMode,
        metric: "minkowski",
        minkowskiExponent: 0.2,
      }).generate();
      for (const v of result.data) {
        expect(Number.isFinite(v)).toBe(true);
      }
    }
  });

  it("keeps color output in [0, 1]", () => {
    const result = new VoronoiGenerator({
      width: 12,
      height: 12,
      cellSize: { x: 4, y: 4, w: 1 },
      smoothness: 1,
    }).generate();
    for (const v of result.data) {
      expect(v).toBeGreaterThanOrEqual(0);
      expect(v).toBeLessThanOrEqual(1);
    }
  });

  it("clamps output values when asked", () => {
    const config = {
      width: 4,
      height: 4,
      cellSize: { x: 4, y: 4, w: 1 },
      randomness: 0,
      metric: "minkowski" as const,
      minkowskiExponent: 0.5,
      renderMode: "nearest-distance" as const,
    };
    const raw = readPixel(new VoronoiGenerator(config).generate(), 0, 0);
    const clamped = readPixel(
      new VoronoiGenerator({ ...config, clampOutput: true }).generate(),
      0,
      0
    );
    expect(raw.r).toBeGreaterThan(1);
    expect(clamped.r).toBe(1);
  });

  it("takes alpha from a source image and premultiplies", () => {
    const alphaSource = createPixelBuffer(4, 4);
    for (let i = 3; i < alphaSource.data.length; i += 4) {
      alphaSource.data[i] = 0.5;
    }
    alphaSource.data[3] = Number.NaN;

    const config = {
      width: 4,
      height: 4,
      cellSize: { x: 4, y: 4, w: 1 },
      randomness: 0,
      renderMode: "nearest-distance" as const,
    };
    const plain = new VoronoiGenerator(config).generate();
    const masked = new VoronoiGenerator({ ...config, alphaSource }).generate();

    expect(readPixel(masked, 0, 0)).toEqual({ r: 0, g: 0, b: 0, a: 0 });
    const pixel = readPixel(masked, 2, 1);
    expect(pixel.a).toBe(0.5);
    expect(pixel.r).toBeCloseTo(readPixel(plain, 2, 1).r * 0.5, 6);
  });

  it("finishes for lattice coordinates beyond 2^53", () => {
    const output = new VoronoiGenerator({
      width: 1,
      height: 1,
      w: 1,
      cellSize: { x: 4, y: 4, w: 1e-16 },
    }).generate();
    expect(output.data.length).toBe(4);
    for (const v of output.data) {
      expect(Number.isFinite(v)).toBe(true);
    }
    expect(output.data[3]).toBe(1);
  });

  it("zeroes values that overflow the float32 range", () => {
    const output = new VoronoiGenerator({
      width: 1,
      height: 1,
      randomness: 0,
      offset: { x: 1e300, y: 0 },
      renderMode: "position",
    }).generate();
    expect(readPixel(output, 0, 0)).toEqual({ r: 0, g: 64, b: 0, a: 1 });
  });

  it("rejects a non-positive cell size before rendering", () => {
    expect(
      () =>
        new VoronoiGenerator({
          width: 4,
          height: 4,
          cellSize: { x: 4, y: 0, w: 1 },
        })
    ).toThrow(ConfigurationError);
    expect(
      () =>
        new VoronoiGenerator({
          width: 4,
          height: 4,
          cellSize: { x: 4, y: 4, w: -1 },
        })
    ).toThrow("Cell size must be positive on every axis (got w=-1)");
  });

  it("rejects empty or fractional dimensions", () => {
    expect(() => new VoronoiGenerator({ width: 0, height: 4 })).toThrow(
      ConfigurationError
    );
    expect(() => new VoronoiGenerator({ width: 2.5, height: 4 })).toThrow(
      "Width and height must be integers"
    );
  });

  it("rejects an alpha source of another size", () => {
    expect(
      () =>
        new VoronoiGenerator({
          width: 4,
          height: 4,
          alphaSource: createPixelBuffer(3, 4),
        })
    ).toThrow("Alpha source must have the same dimensions as the output");
  });
});
