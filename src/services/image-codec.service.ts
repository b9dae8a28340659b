import sharp from 'sharp';

import { BadRequestError, toError } from '../utils/errors.js';
import type { RgbImage } from '../types/upscale.types.js';

const RGB_CHANNELS = 3;

/**
 * Wrap a raw RGB buffer, checking that its length matches the dimensions
 */
export function createRgbImage(data: Buffer, width: number, height: number): RgbImage {
  if (!Number.isInteger(width) || !Number.isInteger(height) || width < 1 || height < 1) {
    throw new RangeError(`Invalid image dimensions: ${width}x${height}`);
  }
  const expected = width * height * RGB_CHANNELS;
  if (data.length !== expected) {
    throw new RangeError(
      `RGB buffer length ${data.length} does not match ${width}x${height} (expected ${expected})`
    );
  }
  return { width, height, channels: RGB_CHANNELS, data };
}

/**
 * Decode encoded image bytes (PNG, JPEG, WebP, ...) into an RGB raster.
 * Alpha is dropped; greyscale is expanded to three channels.
 */
export async function decodeImage(bytes: Buffer): Promise<RgbImage> {
  try {
    const { data, info } = await sharp(bytes)
      .removeAlpha()
      .raw()
      .toBuffer({ resolveWithObject: true });

    return createRgbImage(toRgb(data, info.channels), info.width, info.height);
  } catch (error) {
    throw new BadRequestError(`Image processing failed: ${toError(error).message}`, 'INVALID_IMAGE');
  }
}

/**
 * Encode an RGB raster as PNG
 */
export async function encodePng(image: RgbImage, compressionLevel = 9): Promise<Buffer> {
  return rawPipeline(image).png({ compressionLevel }).toBuffer();
}

/**
 * Resize to exact dimensions with a Lanczos-3 kernel (aspect ratio is not preserved)
 */
export async function resizeRgb(image: RgbImage, width: number, height: number): Promise<RgbImage> {
  if (image.width === width && image.height === height) {
    return image;
  }

  const { data, info } = await rawPipeline(image)
    .resize(width, height, { fit: 'fill', kernel: 'lanczos3' })
    .raw()
    .toBuffer({ resolveWithObject: true });

  return createRgbImage(data, info.width, info.height);
}

function rawPipeline(image: RgbImage): sharp.Sharp {
  return sharp(image.data, {
    raw: { width: image.width, height: image.height, channels: RGB_CHANNELS },
  });
}

function toRgb(data: Buffer, channels: number): Buffer {
  if (channels === RGB_CHANNELS) {
    return data;
  }
  if (channels !== 1) {
    throw new Error(`Unsupported channel count: ${channels}`);
  }

  const rgb = Buffer.alloc(data.length * RGB_CHANNELS);
  for (let i = 0; i < data.length; i++) {
    const value = data[i];
    rgb[i * 3] = value;
    rgb[i * 3 + 1] = value;
    rgb[i * 3 + 2] = value;
  }
  return rgb;
}
