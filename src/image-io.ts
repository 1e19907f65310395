import sharp from "sharp";
import { ConfigurationError } from "./errors.js";
import {
  CHANNELS,
  fromIntegerChannels,
  type PixelBuffer,
  toUint8Channels,
  toUint16Channels,
} from "./pixel-buffer.js";

export type BitDepth = 8 | 16;

const MAX_CHANNEL8 = 255;
const MAX_CHANNEL16 = 65_535;

/**
 * Decode an image file or encoded buffer to normalised RGBA floats.
 *
 * 16-bit sources are read at 16 bits per channel, everything else at 8.
 */
export async function loadImage(input: string | Buffer): Promise<PixelBuffer> {
  const image = sharp(input);
  const { depth } = await image.metadata();
  const wide = depth === "ushort";

  const { data, info } = await image
    .toColourspace(wide ? "rgb16" : "srgb")
    .ensureAlpha()
    .raw({ depth: wide ? "ushort" : "uchar" })
    .toBuffer({ resolveWithObject: true });

  if (!(info.width && info.height)) {
    throw new Error("Could not determine image dimensions");
  }
  if (info.channels !== CHANNELS) {
    throw new Error(`Expected RGBA data, got ${info.channels} channels`);
  }

  if (wide) {
    // Copy so the 16-bit view starts on an aligned offset
    const samples = new Uint16Array(
      data.buffer.slice(data.byteOffset, data.byteOffset + data.byteLength)
    );
    return fromIntegerChannels(
      samples,
      info.width,
      info.height,
      MAX_CHANNEL16
    );
  }
  return fromIntegerChannels(data, info.width, info.height, MAX_CHANNEL8);
}

function toPngPipeline(buffer: PixelBuffer, depth: BitDepth): sharp.Sharp {
  const raw = {
    width: buffer.width,
    height: buffer.height,
    channels: CHANNELS,
  };

  if (depth === 16) {
    return sharp(toUint16Channels(buffer), { raw })
      .toColourspace("rgb16")
      .png();
  }
  return sharp(toUint8Channels(buffer), { raw }).png();
}

/**
 * Encode a float buffer as PNG at 8 or 16 bits per channel
 */
export function encodePng(
  buffer: PixelBuffer,
  depth: BitDepth = 8
): Promise<Buffer> {
  return toPngPipeline(buffer, depth).toBuffer();
}

/**
 * Save a float buffer to a PNG file
 */
export async function savePng(
  buffer: PixelBuffer,
  filename: string,
  depth: BitDepth = 8
): Promise<void> {
  try {
    await toPngPipeline(buffer, depth).toFile(filename);
    console.log(` Saved ${buffer.width}x${buffer.height} image to ${filename}`);
  } catch (error) {
    console.error("Error saving PNG:", error);
    throw error;
  }
}

export function parseBitDepth(value: string): BitDepth {
  if (value === "8") {
    return 8;
  }
  if (value === "16") {
    return 16;
  }
  throw new ConfigurationError(`Bit depth must be 8 or 16 (got ${value})`);
}
