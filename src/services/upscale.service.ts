import { createChildLogger } from '../utils/logger.js';
import { AppError, BadRequestError, ProcessingFailedError, toError } from '../utils/errors.js';
import { formatDuration, startTimer } from '../utils/timer.js';
import { decodeImage, encodePng } from './image-codec.service.js';
import { ImageNormalizer } from './image-normalizer.service.js';
import { UpscaleOrchestrator } from './upscale-orchestrator.service.js';
import { sharpInterpolationProvider } from '../providers/implementations/sharp-interpolation.provider.js';
import { isScaleFactor, type ScaleFactor } from '../types/upscale.types.js';
import type { EngineAvailability } from '../providers/interfaces/upscale.provider.js';
import type { AppConfig } from '../config/index.js';

const logger = createChildLogger({ service: 'upscale' });

export interface UpscaleResult {
  png: Buffer;
  /** providerId of the engine that produced the image */
  engine: string;
  degraded: boolean;
  width: number;
  height: number;
}

export interface EngineStatus {
  device: string;
  engine: string;
  degraded: boolean;
}

/**
 * Reject anything outside the supported magnification factors
 */
export function parseScale(scale: number): ScaleFactor {
  if (!isScaleFactor(scale)) {
    throw new BadRequestError('Scale must be 2, 4, or 8', 'INVALID_SCALE');
  }
  return scale;
}

/**
 * UpscaleService
 *
 * Request-level pipeline: validate scale, decode, normalize, upscale, encode PNG.
 */
export class UpscaleService {
  private readonly orchestrator: UpscaleOrchestrator;
  private readonly normalizer: ImageNormalizer;
  private readonly availability: EngineAvailability;

  constructor(deps: {
    orchestrator: UpscaleOrchestrator;
    normalizer: ImageNormalizer;
    availability: EngineAvailability;
  }) {
    this.orchestrator = deps.orchestrator;
    this.normalizer = deps.normalizer;
    this.availability = deps.availability;
  }

  async processImage(bytes: Buffer, scale: number): Promise<UpscaleResult> {
    const factor = parseScale(scale);
    const elapsed = startTimer();

    try {
      const decoded = await decodeImage(bytes);
      const normalized = await this.normalizer.normalize(decoded);
      if (normalized !== decoded) {
        logger.info(
          {
            from: `${decoded.width}x${decoded.height}`,
            to: `${normalized.width}x${normalized.height}`,
          },
          'Input downscaled before upscaling'
        );
      }

      const outcome = await this.orchestrator.upscale(normalized, factor);
      const png = await encodePng(outcome.image);

      logger.info(
        {
          engine: outcome.engine,
          degraded: outcome.degraded,
          scale: factor,
          width: outcome.image.width,
          height: outcome.image.height,
          duration: formatDuration(elapsed()),
        },
        'Image upscaled'
      );

      return {
        png,
        engine: outcome.engine,
        degraded: outcome.degraded,
        width: outcome.image.width,
        height: outcome.image.height,
      };
    } catch (error) {
      if (error instanceof AppError) {
        throw error;
      }
      const err = toError(error);
      throw new ProcessingFailedError(err.message, err);
    }
  }

  /**
   * Engine summary for the health endpoint
   */
  getStatus(): EngineStatus {
    if (this.availability.status === 'unavailable') {
      return {
        device: sharpInterpolationProvider.device,
        engine: sharpInterpolationProvider.providerId,
        degraded: true,
      };
    }
    const { primary } = this.availability;
    return { device: primary.device, engine: primary.providerId, degraded: false };
  }
}

export function createUpscaleService(availability: EngineAvailability, config: AppConfig): UpscaleService {
  return new UpscaleService({
    orchestrator: new UpscaleOrchestrator({ availability }),
    normalizer: new ImageNormalizer(config.upscale.maxInputEdge),
    availability,
  });
}
