import { resizeRgb } from '../../services/image-codec.service.js';
import type { UpscaleEngine } from '../interfaces/upscale.provider.js';
import type { RgbImage, ScaleFactor } from '../../types/upscale.types.js';

/**
 * Sharp Interpolation Provider
 *
 * Lanczos-3 resize via Sharp (libvips). Terminal step of the fallback chain.
 */
export class SharpInterpolationProvider implements UpscaleEngine {
  readonly providerId = 'sharp-lanczos';
  readonly kind = 'interpolation';
  readonly device = 'cpu';

  async upscale(image: RgbImage, scale: ScaleFactor): Promise<RgbImage> {
    return resizeRgb(image, image.width * scale, image.height * scale);
  }

  async release(): Promise<void> {
    // Nothing held
  }
}

export const sharpInterpolationProvider = new SharpInterpolationProvider();
