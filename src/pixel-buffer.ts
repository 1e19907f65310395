import { ConfigurationError } from "./errors.js";

export const CHANNELS = 4 as const;

/**
 * Dense row-major RGBA raster of float channels, row 0 at the top
 */
export interface PixelBuffer {
  width: number;
  height: number;
  data: Float32Array;
}

export interface Pixel {
  r: number;
  g: number;
  b: number;
  a: number;
}

/**
 * Validate raster dimensions
 */
export function assertDimensions(width: number, height: number): void {
  if (!(Number.isInteger(width) && Number.isInteger(height))) {
    throw new ConfigurationError("Width and height must be integers");
  }
  if (width <= 0 || height <= 0) {
    throw new ConfigurationError("Width and height must be positive");
  }
}

export function createPixelBuffer(width: number, height: number): PixelBuffer {
  assertDimensions(width, height);
  return { width, height, data: new Float32Array(width * height * CHANNELS) };
}

/**
 * Check that a caller-supplied buffer is well formed
 */
export function assertPixelBuffer(buffer: PixelBuffer, label = "Buffer"): void {
  assertDimensions(buffer.width, buffer.height);
  const expected = buffer.width * buffer.height * CHANNELS;
  if (buffer.data.length !== expected) {
    throw new ConfigurationError(
      `${label} holds ${buffer.data.length} values, expected ${expected} for ${buffer.width}x${buffer.height} RGBA`
    );
  }
}

/**
 * `v` if it stays finite once stored in a Float32Array, otherwise 0
 */
export function finiteFloat32(v: number): number {
  return Number.isFinite(Math.fround(v)) ? v : 0;
}

export function pixelIndex(buffer: PixelBuffer, x: number, y: number): number {
  return (y * buffer.width + x) * CHANNELS;
}

export function readPixel(buffer: PixelBuffer, x: number, y: number): Pixel {
  const i = pixelIndex(buffer, x, y);
  const d = buffer.data;
  return { r: d[i], g: d[i + 1], b: d[i + 2], a: d[i + 3] };
}

export function writePixel(
  buffer: PixelBuffer,
  x: number,
  y: number,
  pixel: Pixel
): void {
  const i = pixelIndex(buffer, x, y);
  buffer.data[i] = pixel.r;
  buffer.data[i + 1] = pixel.g;
  buffer.data[i + 2] = pixel.b;
  buffer.data[i + 3] = pixel.a;
}

/**
 * Build a buffer from 8- or 16-bit integer channel data
 */
export function fromIntegerChannels(
  data: Uint8Array | Uint16Array,
  width: number,
  height: number,
  maxValue: number
): PixelBuffer {
  const buffer = createPixelBuffer(width, height);
  if (data.length !== buffer.data.length) {
    throw new ConfigurationError(
      `Expected ${buffer.data.length} channel values, got ${data.length}`
    );
  }
  for (let i = 0; i < data.length; i++) {
    buffer.data[i] = data[i] / maxValue;
  }
  return buffer;
}

/**
 * Quantize to 8 bits per channel; values are clamped to [0, 1] and truncated
 */
export function toUint8Channels(buffer: PixelBuffer): Uint8Array {
  return quantize(buffer, new Uint8Array(buffer.data.length), 255);
}

/**
 * Quantize to 16 bits per channel; values are clamped to [0, 1] and truncated
 */
export function toUint16Channels(buffer: PixelBuffer): Uint16Array {
  return quantize(buffer, new Uint16Array(buffer.data.length), 65_535);
}

function quantize<T extends Uint8Array | Uint16Array>(
  buffer: PixelBuffer,
  out: T,
  maxValue: number
): T {
  for (let i = 0; i < buffer.data.length; i++) {
    let v = buffer.data[i];
    if (!Number.isFinite(v)) {
      v = 0;
    }
    out[i] = Math.floor(Math.min(Math.max(v, 0), 1) * maxValue);
  }
  return out;
}
