import { createPixelBuffer, type PixelBuffer } from "./pixel-buffer.js";

/**
 * A pure per-pixel function. Implementations write the RGBA result for
 * (x, y) into `out` starting at `offset` and keep no state between calls.
 */
export interface PixelKernel {
  evaluatePixel(x: number, y: number, out: Float32Array, offset: number): void;
}

/**
 * Execution strategy for a kernel over a whole raster
 */
export type RenderBackend = (
  kernel: PixelKernel,
  width: number,
  height: number
) => PixelBuffer;

/**
 * Compute rows [startRow, endRow) of a kernel into an existing buffer
 */
export function renderRows(
  kernel: PixelKernel,
  target: PixelBuffer,
  startRow: number,
  endRow: number
): void {
  const { width, data } = target;
  for (let y = startRow; y < endRow; y++) {
    let offset = y * width * 4;
    for (let x = 0; x < width; x++) {
      kernel.evaluatePixel(x, y, data, offset);
      offset += 4;
    }
  }
}

/**
 * Row-major single pass
 */
export const serialBackend: RenderBackend = (kernel, width, height) => {
  const buffer = createPixelBuffer(width, height);
  renderRows(kernel, buffer, 0, height);
  return buffer;
};

/**
 * Split the raster into horizontal bands of `bandRows` rows and compute them
 * last band first. Output matches {@link serialBackend} exactly.
 */
export function bandedBackend(bandRows: number): RenderBackend {
  const rows = Math.max(1, Math.floor(bandRows));
  return (kernel, width, height) => {
    const buffer = createPixelBuffer(width, height);
    const bands: Array<[number, number]> = [];
    for (let start = 0; start < height; start += rows) {
      bands.push([start, Math.min(start + rows, height)]);
    }
    for (let i = bands.length - 1; i >= 0; i--) {
      const [start, end] = bands[i];
      renderRows(kernel, buffer, start, end);
    }
    return buffer;
  };
}
