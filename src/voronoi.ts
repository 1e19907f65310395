/**
 * Voronoi Texture Generator using a Jittered 3-D Lattice
 *
 * Every integer cell of a 3-D lattice (x, y and a "w" axis used for
 * animation) owns one feature point. The point's position inside its cell is
 * derived from a hash of the cell coordinate and the seed, so the lattice is
 * never stored: any cell can be recomputed on demand.
 *
 * NEIGHBOURHOOD SEARCH
 * ====================
 * A point is displaced by at most half a cell from its cell centre, so the
 * nearest and second-nearest points to any sample position always lie in
 * the 3×3×3 block of cells around the sample's own cell. The block is
 * scanned once, keeping the two smallest distances as it goes.
 *
 * SMOOTH BOUNDARIES
 * =================
 * With a positive smoothness, outputs blend from the nearest towards the
 * second-nearest point as the two distances approach each other. The blend
 * weight is 0.5 exactly on a cell boundary (F1 = F2) and falls to 0 once
 * F2 - F1 exceeds the smoothness:
 *
 *   blend = 0.5 * (1 - smoothstep(clamp((F2 - F1) / smoothness, 0, 1)))
 *
 * OUTPUTS
 * =======
 * - color:            per-cell random RGB, blended across boundaries
 * - position:         nearest point's lattice position / grid coverage
 * - smooth-distance:  lerp(F1, F2, blend)
 * - nearest-distance: F1
 * - distance-gap:     F2 - F1, bright along cell edges
 *
 * Distances are measured in lattice units (pixels divided by cell size).
 */

import { ConfigurationError } from "./errors.js";
import {
  type DistanceMetric,
  type DistanceMetricKind,
  distance,
  resolveMetric,
} from "./distance.js";
import { HashSalt, hash3, saltedRand01 } from "./hash.js";
import {
  assertDimensions,
  assertPixelBuffer,
  finiteFloat32,
  type PixelBuffer,
} from "./pixel-buffer.js";
import { type PixelKernel, type RenderBackend, serialBackend } from "./render.js";

export type RenderMode =
  | "color"
  | "position"
  | "smooth-distance"
  | "nearest-distance"
  | "distance-gap";

export const RENDER_MODES: readonly RenderMode[] = [
  "color",
  "position",
  "smooth-distance",
  "nearest-distance",
  "distance-gap",
];

export interface Vec2 {
  x: number;
  y: number;
}

export interface Vec3 {
  x: number;
  y: number;
  w: number;
}

/**
 * Configuration for Voronoi generation
 */
export interface VoronoiConfig {
  width: number;
  height: number;
  seed?: number;
  metric?: DistanceMetricKind;
  /** Exponent for the Minkowski metric, raised to 0.1 when smaller */
  minkowskiExponent?: number;
  /** Jitter amount in [0, 1]; 0 gives a regular grid */
  randomness?: number;
  /** Boundary blend width in [0, 1] lattice units */
  smoothness?: number;
  /** Position along the third lattice axis, in pixels */
  w?: number;
  /** Cell extent in pixels per axis */
  cellSize?: Vec3;
  /** Pixel offset of the lattice origin */
  offset?: Vec2;
  renderMode?: RenderMode;
  /** Clamp every RGB value to [0, 1] */
  clampOutput?: boolean;
  /** Take alpha from this buffer and premultiply RGB by it */
  alphaSource?: PixelBuffer;
  backend?: RenderBackend;
  verbose?: boolean;
}

export interface LatticeSite {
  x: number;
  y: number;
  w: number;
  hash: number;
}

/**
 * Nearest-neighbour search result for one sample position
 */
export interface VoronoiSample {
  d1: number;
  d2: number;
  nearest: LatticeSite;
  second: LatticeSite;
  blend: number;
}

/**
 * Feature point of an integer lattice cell
 */
export function cellSite(
  cellX: number,
  cellY: number,
  cellW: number,
  randomness: number,
  seed: number
): LatticeSite {
  const hash = hash3(cellX, cellY, cellW, seed);
  const ox = 0.5 + (saltedRand01(hash, HashSalt.jitterX) - 0.5) * randomness;
  const oy = 0.5 + (saltedRand01(hash, HashSalt.jitterY) - 0.5) * randomness;
  const ow = 0.5 + (saltedRand01(hash, HashSalt.jitterW) - 0.5) * randomness;
  return { x: cellX + ox, y: cellY + oy, w: cellW + ow, hash };
}

/**
 * Pseudo-random RGB in [0, 1] for a cell hash
 */
export function siteColor(hash: number): [number, number, number] {
  return [
    saltedRand01(hash, HashSalt.red),
    saltedRand01(hash, HashSalt.green),
    saltedRand01(hash, HashSalt.blue),
  ];
}

export function smoothstep01(x: number): number {
  const t = Math.min(Math.max(x, 0), 1);
  return t * t * (3 - 2 * t);
}

export function smoothBlend(d1: number, d2: number, smoothness: number): number {
  if (smoothness <= 0 || !Number.isFinite(d1) || !Number.isFinite(d2)) {
    return 0;
  }
  const t = Math.min(Math.max((d2 - d1) / smoothness, 0), 1);
  return 0.5 * (1 - smoothstep01(t));
}

function lerp(a: number, b: number, t: number): number {
  return a + (b - a) * t;
}

/**
 * Main class for generating Voronoi textures
 */
export class VoronoiGenerator implements PixelKernel {
  // Defaults follow a 128px cell with the w axis scaled by 100
  static readonly DEFAULT_CELL_SIZE: Readonly<Vec3> = { x: 128, y: 128, w: 1.28 };
  static readonly DEFAULT_RANDOMNESS = 1;
  static readonly DEFAULT_SMOOTHNESS = 0;
  static readonly DEFAULT_MINKOWSKI_EXPONENT = 2;
  static readonly DEFAULT_RENDER_MODE: RenderMode = "color";
  private static readonly MIN_GRID_COVERAGE = 1e-6;

  readonly width: number;
  readonly height: number;
  readonly seed: number;
  readonly metric: DistanceMetric;
  readonly randomness: number;
  readonly smoothness: number;
  readonly renderMode: RenderMode;

  private readonly invCellX: number;
  private readonly invCellY: number;
  private readonly pw: number;
  private readonly offsetX: number;
  private readonly offsetY: number;
  private readonly gridW: number;
  private readonly gridH: number;
  private readonly clampOutput: boolean;
  private readonly alphaSource: PixelBuffer | null;
  private readonly backend: RenderBackend;
  private readonly verbose: boolean;

  constructor(config: VoronoiConfig) {
    assertDimensions(config.width, config.height);

    const cellSize = config.cellSize ?? VoronoiGenerator.DEFAULT_CELL_SIZE;
    for (const axis of ["x", "y", "w"] as const) {
      const size = cellSize[axis];
      if (!Number.isFinite(size) || size <= 0) {
        throw new ConfigurationError(
          `Cell size must be positive on every axis (got ${axis}=${size})`
        );
      }
    }

    if (config.alphaSource) {
      assertPixelBuffer(config.alphaSource, "Alpha source");
      if (
        config.alphaSource.width !== config.width ||
        config.alphaSource.height !== config.height
      ) {
        throw new ConfigurationError(
          "Alpha source must have the same dimensions as the output"
        );
      }
    }

    this.width = config.width;
    this.height = config.height;
    // biome-ignore lint/suspicious/noBitwiseOperators: Seeds are unsigned 32-bit
    this.seed = Math.trunc(config.seed ?? 0) >>> 0;
    this.metric = resolveMetric(
      config.metric ?? "euclidean",
      config.minkowskiExponent ?? VoronoiGenerator.DEFAULT_MINKOWSKI_EXPONENT
    );
    this.randomness = clampUnit(
      config.randomness ?? VoronoiGenerator.DEFAULT_RANDOMNESS
    );
    this.smoothness = clampUnit(
      config.smoothness ?? VoronoiGenerator.DEFAULT_SMOOTHNESS
    );
    this.renderMode = config.renderMode ?? VoronoiGenerator.DEFAULT_RENDER_MODE;

    this.invCellX = 1 / cellSize.x;
    this.invCellY = 1 / cellSize.y;
    this.pw = finiteOr(config.w ?? 0, 0) / cellSize.w;
    this.offsetX = finiteOr(config.offset?.x ?? 0, 0);
    this.offsetY = finiteOr(config.offset?.y ?? 0, 0);
    this.gridW = Math.max(
      this.width * this.invCellX,
      VoronoiGenerator.MIN_GRID_COVERAGE
    );
    this.gridH = Math.max(
      this.height * this.invCellY,
      VoronoiGenerator.MIN_GRID_COVERAGE
    );
    this.clampOutput = config.clampOutput ?? false;
    this.alphaSource = config.alphaSource ?? null;
    this.backend = config.backend ?? serialBackend;
    this.verbose = config.verbose ?? false;
  }

  /**
   * Find the nearest and second-nearest feature points for pixel (x, y)
   */
  evaluate(x: number, y: number): VoronoiSample {
    const px = (x + 0.5 - this.offsetX) * this.invCellX;
    const py = (y + 0.5 - this.offsetY) * this.invCellY;
    const pw = this.pw;
    const cellX = Math.floor(px);
    const cellY = Math.floor(py);
    const cellW = Math.floor(pw);

    let d1 = Number.POSITIVE_INFINITY;
    let d2 = Number.POSITIVE_INFINITY;
    let nearest: LatticeSite | null = null;
    let second: LatticeSite | null = null;

    // Offsets rather than absolute cells: past 2^53 a cell index plus one
    // is the same index
    for (let dw = -1; dw <= 1; dw++) {
      for (let dy = -1; dy <= 1; dy++) {
        for (let dx = -1; dx <= 1; dx++) {
          const site = cellSite(
            cellX + dx,
            cellY + dy,
            cellW + dw,
            this.randomness,
            this.seed
          );
          const d = distance(px - site.x, py - site.y, pw - site.w, this.metric);

          if (d < d1) {
            d2 = d1;
            second = nearest;
            d1 = d;
            nearest = site;
          } else if (d < d2) {
            d2 = d;
            second = site;
          }
        }
      }
    }

    // Non-finite distances never enter the comparison above, so fall back to
    // the home cell's point.
    const home = nearest ?? cellSite(cellX, cellY, cellW, this.randomness, this.seed);
    let s1 = home;
    let s2 = second ?? home;
    if (!Number.isFinite(d1)) {
      d1 = 0;
    }
    if (!Number.isFinite(d2)) {
      d2 = d1;
      s2 = s1;
    }
    if (d2 < d1) {
      [d1, d2] = [d2, d1];
      [s1, s2] = [s2, s1];
    }

    return {
      d1,
      d2,
      nearest: s1,
      second: s2,
      blend: smoothBlend(d1, d2, this.smoothness),
    };
  }

  evaluatePixel(x: number, y: number, out: Float32Array, offset: number): void {
    const sample = this.evaluate(x, y);
    let [r, g, b] = this.shade(sample);

    r = this.sanitize(r);
    g = this.sanitize(g);
    b = this.sanitize(b);
    let a = 1;

    if (this.alphaSource) {
      const i = (y * this.width + x) * 4 + 3;
      a = Math.min(Math.max(finiteOr(this.alphaSource.data[i], 0), 0), 1);
      r *= a;
      g *= a;
      b *= a;
    }

    out[offset] = r;
    out[offset + 1] = g;
    out[offset + 2] = b;
    out[offset + 3] = a;
  }

  /**
   * Render the full texture
   */
  generate(): PixelBuffer {
    const startTime = this.verbose ? Date.now() : 0;

    if (this.verbose) {
      console.log(
        `Generating ${this.width}x${this.height} Voronoi texture (${this.renderMode}, ${this.metric.kind})...`
      );
    }

    const buffer = this.backend(this, this.width, this.height);

    if (this.verbose) {
      const elapsed = Date.now() - startTime;
      console.log(
        `✓ Voronoi generation complete in ${(elapsed / 1000).toFixed(2)}s`
      );
    }

    return buffer;
  }

  /**
   * Raw RGB for a sample under the configured render mode
   */
  private shade(sample: VoronoiSample): [number, number, number] {
    switch (this.renderMode) {
      case "color": {
        const [r1, g1, b1] = siteColor(sample.nearest.hash);
        const [r2, g2, b2] = siteColor(sample.second.hash);
        return [
          lerp(r1, r2, sample.blend),
          lerp(g1, g2, sample.blend),
          lerp(b1, b2, sample.blend),
        ];
      }
      case "position":
        return [sample.nearest.x / this.gridW, sample.nearest.y / this.gridH, 0];
      case "smooth-distance":
        return gray(lerp(sample.d1, sample.d2, sample.blend));
      case "nearest-distance":
        return gray(sample.d1);
      case "distance-gap":
        return gray(Math.max(sample.d2 - sample.d1, 0));
    }
  }

  private sanitize(v: number): number {
    const value = finiteFloat32(v);
    return this.clampOutput ? Math.min(Math.max(value, 0), 1) : value;
  }
}

function gray(v: number): [number, number, number] {
  return [v, v, v];
}

function finiteOr(value: number, fallback: number): number {
  return Number.isFinite(value) ? value : fallback;
}

function clampUnit(value: number): number {
  return Number.isFinite(value) ? Math.min(Math.max(value, 0), 1) : 0;
}

/**
 * Convenience function to render a Voronoi texture
 */
export function generateVoronoi(config: VoronoiConfig): PixelBuffer {
  return new VoronoiGenerator(config).generate();
}
