import { resizeRgb } from './image-codec.service.js';
import type { ImageDimensions, RgbImage } from '../types/upscale.types.js';

export const DEFAULT_MAX_INPUT_EDGE = 2048;

/**
 * Dimensions after capping the longest edge at `maxEdge`.
 *
 * Each axis is rounded on its own, so the aspect ratio can drift by up to
 * one pixel per axis.
 */
export function computeNormalizedSize(
  width: number,
  height: number,
  maxEdge: number = DEFAULT_MAX_INPUT_EDGE
): ImageDimensions {
  const longest = Math.max(width, height);
  if (longest <= maxEdge) {
    return { width, height };
  }

  const ratio = maxEdge / longest;
  return {
    width: Math.max(1, Math.round(width * ratio)),
    height: Math.max(1, Math.round(height * ratio)),
  };
}

/**
 * ImageNormalizer - caps oversized inputs before any engine runs
 */
export class ImageNormalizer {
  constructor(private readonly maxEdge: number = DEFAULT_MAX_INPUT_EDGE) {}

  async normalize(image: RgbImage): Promise<RgbImage> {
    const { width, height } = computeNormalizedSize(image.width, image.height, this.maxEdge);
    return resizeRgb(image, width, height);
  }
}
