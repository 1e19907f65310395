import { type EdgeMode, resolveCoord } from "./boundary.js";
import { ConfigurationError } from "./errors.js";
import { assertPixelBuffer, type PixelBuffer } from "./pixel-buffer.js";
import { type PixelKernel, type RenderBackend, serialBackend } from "./render.js";
import { createRemap, type ResponseMode } from "./response.js";

export type DiffAxis = "x" | "y" | "magnitude";

export const DIFF_AXES: readonly DiffAxis[] = ["x", "y", "magnitude"];

const AXIS_SELECTORS: Record<DiffAxis, (gx: number, gy: number) => number> = {
  x: (gx) => gx,
  y: (_gx, gy) => gy,
  magnitude: (gx, gy) => Math.sqrt(gx * gx + gy * gy),
};

/**
 * Configuration for differential map extraction
 */
export interface DifferentialConfig {
  axis?: DiffAxis;
  edgeMode?: EdgeMode;
  responseMode?: ResponseMode;
  /** Treat the offset as a signed shift around 0.5 instead of an output level */
  rawOutput?: boolean;
  /** Copy the source alpha instead of differentiating it */
  alphaPassthrough?: boolean;
  offset?: number;
  scale?: number;
  backend?: RenderBackend;
  verbose?: boolean;
}

/**
 * Central-difference gradient maps of an RGBA raster
 */
export class DifferentialExtractor {
  static readonly DEFAULT_AXIS: DiffAxis = "x";
  static readonly DEFAULT_EDGE_MODE: EdgeMode = "repeat";
  static readonly DEFAULT_RESPONSE_MODE: ResponseMode = "soft-clamp";
  static readonly DEFAULT_OFFSET = 0.5;
  static readonly DEFAULT_SCALE = 1;

  readonly axis: DiffAxis;
  readonly edgeMode: EdgeMode;
  readonly responseMode: ResponseMode;
  readonly rawOutput: boolean;
  readonly alphaPassthrough: boolean;
  readonly offset: number;
  readonly scale: number;
  private readonly backend: RenderBackend;
  private readonly verbose: boolean;

  constructor(config: DifferentialConfig = {}) {
    const offset = config.offset ?? DifferentialExtractor.DEFAULT_OFFSET;
    const scale = config.scale ?? DifferentialExtractor.DEFAULT_SCALE;
    if (!(Number.isFinite(offset) && Number.isFinite(scale))) {
      throw new ConfigurationError("Offset and scale must be finite numbers");
    }

    this.axis = config.axis ?? DifferentialExtractor.DEFAULT_AXIS;
    this.edgeMode = config.edgeMode ?? DifferentialExtractor.DEFAULT_EDGE_MODE;
    this.responseMode =
      config.responseMode ?? DifferentialExtractor.DEFAULT_RESPONSE_MODE;
    this.rawOutput = config.rawOutput ?? false;
    this.alphaPassthrough = config.alphaPassthrough ?? false;
    this.offset = offset;
    this.scale = scale;
    this.backend = config.backend ?? serialBackend;
    this.verbose = config.verbose ?? false;
  }

  /**
   * Build the differential map of `source`.
   *
   * The source is only read; the result is a new buffer of the same size.
   */
  extract(source: PixelBuffer): PixelBuffer {
    assertPixelBuffer(source, "Source image");
    const startTime = this.verbose ? Date.now() : 0;

    if (this.verbose) {
      console.log(
        `Extracting ${this.axis} differential from ${source.width}x${source.height} image (edge: ${this.edgeMode}, response: ${this.responseMode})...`
      );
    }

    const output = this.backend(
      this.createKernel(source),
      source.width,
      source.height
    );

    if (this.verbose) {
      const elapsed = Date.now() - startTime;
      console.log(
        `✓ Differential extraction complete in ${(elapsed / 1000).toFixed(2)}s`
      );
    }

    return output;
  }

  /**
   * Per-pixel kernel bound to one source image
   */
  createKernel(source: PixelBuffer): PixelKernel {
    const { width, height, data } = source;
    const { edgeMode, alphaPassthrough } = this;
    const select = AXIS_SELECTORS[this.axis];
    const remap = createRemap(
      this.offset,
      this.scale,
      this.responseMode,
      this.rawOutput
    );

    // Index of the sample at (x, y), or -1 for the transparent zero pixel
    const sampleIndex = (x: number, y: number): number => {
      const sx = resolveCoord(x, width, edgeMode);
      const sy = resolveCoord(y, height, edgeMode);
      if (sx === null || sy === null) {
        return -1;
      }
      return (sy * width + sx) * 4;
    };
    const channel = (index: number, c: number): number =>
      index < 0 ? 0 : data[index + c];

    return {
      evaluatePixel(x, y, out, outOffset) {
        const left = sampleIndex(x - 1, y);
        const right = sampleIndex(x + 1, y);
        const up = sampleIndex(x, y - 1);
        const down = sampleIndex(x, y + 1);

        for (let c = 0; c < 4; c++) {
          if (c === 3 && alphaPassthrough) {
            const alpha = data[(y * width + x) * 4 + 3];
            out[outOffset + 3] = Number.isFinite(alpha) ? alpha : 0;
            continue;
          }

          const gx = 0.5 * (channel(right, c) - channel(left, c));
          const gy = 0.5 * (channel(down, c) - channel(up, c));
          out[outOffset + c] = remap(select(gx, gy));
        }
      },
    };
  }
}

/**
 * Convenience function to extract a differential map
 */
export function extractDifferential(
  source: PixelBuffer,
  config: DifferentialConfig = {}
): PixelBuffer {
  return new DifferentialExtractor(config).extract(source);
}
