import { createChildLogger } from '../utils/logger.js';
import { EngineError, ProcessingFailedError, toError } from '../utils/errors.js';
import { formatDuration, startTimer } from '../utils/timer.js';
import { resizeRgb } from './image-codec.service.js';
import { sharpInterpolationProvider } from '../providers/implementations/sharp-interpolation.provider.js';
import type {
  EngineAvailability,
  UpscaleEngine,
} from '../providers/interfaces/upscale.provider.js';
import type { RgbImage, ScaleFactor } from '../types/upscale.types.js';

const logger = createChildLogger({ service: 'upscale-orchestrator' });

export interface UpscaleOutcome {
  image: RgbImage;
  /** providerId of the engine that produced the image */
  engine: string;
  /** True when the image came from interpolation rather than a learned engine */
  degraded: boolean;
}

export interface UpscaleOrchestratorOptions {
  availability: EngineAvailability;
  /** Terminal engine, used when every learned engine failed or none loaded */
  fallback?: UpscaleEngine;
}

/**
 * UpscaleOrchestrator
 *
 * Runs the fallback chain primary -> secondary -> interpolation. Only
 * `EngineError` advances the chain; anything else propagates. The result is
 * always exactly `width * scale` by `height * scale`.
 */
export class UpscaleOrchestrator {
  private readonly chain: UpscaleEngine[];
  private readonly fallback: UpscaleEngine;

  constructor(options: UpscaleOrchestratorOptions) {
    const { availability } = options;
    this.fallback = options.fallback ?? sharpInterpolationProvider;
    this.chain =
      availability.status === 'available'
        ? [availability.primary, ...(availability.secondary ? [availability.secondary] : [])]
        : [];
  }

  /** Learned engines in the order they are tried */
  get engines(): readonly UpscaleEngine[] {
    return this.chain;
  }

  async upscale(image: RgbImage, scale: ScaleFactor): Promise<UpscaleOutcome> {
    const targetWidth = image.width * scale;
    const targetHeight = image.height * scale;

    for (const engine of this.chain) {
      const elapsed = startTimer();
      try {
        const raw = await engine.upscale(image, scale);
        const output = await this.conform(engine, raw, targetWidth, targetHeight);
        logger.debug(
          { engine: engine.providerId, scale, duration: formatDuration(elapsed()) },
          'Upscale complete'
        );
        return { image: output, engine: engine.providerId, degraded: false };
      } catch (error) {
        if (!(error instanceof EngineError)) {
          throw error;
        }
        logger.warn(
          { engine: engine.providerId, error: error.message, duration: formatDuration(elapsed()) },
          'Upscale engine failed, falling back'
        );
      }
    }

    try {
      const raw = await this.fallback.upscale(image, scale);
      const output = await resizeRgb(raw, targetWidth, targetHeight);
      return { image: output, engine: this.fallback.providerId, degraded: true };
    } catch (error) {
      const err = toError(error);
      logger.error({ engine: this.fallback.providerId, err }, 'Interpolation failed');
      throw new ProcessingFailedError(err.message, err);
    }
  }

  /**
   * Check the engine's raster and resize it to the requested output size
   */
  private async conform(
    engine: UpscaleEngine,
    raw: RgbImage,
    width: number,
    height: number
  ): Promise<RgbImage> {
    if (raw.channels !== 3 || raw.data.length !== raw.width * raw.height * 3) {
      throw new EngineError(
        engine.providerId,
        `malformed output raster ${raw.width}x${raw.height} (${raw.data.length} bytes)`
      );
    }
    try {
      return await resizeRgb(raw, width, height);
    } catch (error) {
      const err = toError(error);
      throw new EngineError(engine.providerId, `could not resize output: ${err.message}`, err);
    }
  }
}
