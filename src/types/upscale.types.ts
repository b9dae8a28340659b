import { z } from 'zod';

/**
 * Supported magnification factors
 */
export const SCALE_FACTORS = [2, 4, 8] as const;

export type ScaleFactor = (typeof SCALE_FACTORS)[number];

export const scaleFactorSchema = z.union([z.literal(2), z.literal(4), z.literal(8)]);

export function isScaleFactor(value: unknown): value is ScaleFactor {
  return SCALE_FACTORS.some((factor) => factor === value);
}

/**
 * Decoded raster with interleaved 8-bit RGB samples.
 * `data.length` is always `width * height * 3`.
 */
export interface RgbImage {
  width: number;
  height: number;
  channels: 3;
  data: Buffer;
}

export interface ImageDimensions {
  width: number;
  height: number;
}

/**
 * Base64 upscale request schema
 */
export const base64UpscaleRequestSchema = z.object({
  image: z.string().min(1),
  scale: z.number().int().optional(),
});

export type Base64UpscaleRequest = z.infer<typeof base64UpscaleRequestSchema>;

/**
 * Binary (multipart) upscale query schema
 */
export const binaryUpscaleQuerySchema = z.object({
  scale: z.coerce.number().int().optional(),
});

export type BinaryUpscaleQuery = z.infer<typeof binaryUpscaleQuerySchema>;
