import { createChildLogger } from '../utils/logger.js';
import { toError } from '../utils/errors.js';
import type {
  EngineAvailability,
  EngineCandidate,
  UpscaleEngine,
} from './interfaces/upscale.provider.js';

const logger = createChildLogger({ service: 'engine-probe' });

/** The fallback chain retries once, so at most two engines are kept */
const MAX_ENGINES = 2;

/**
 * EngineProbe
 *
 * Tries engine candidates in priority order at startup and records which
 * ones loaded. The first loaded engine becomes primary, the next secondary.
 * Loading nothing is not an error: requests are then served by interpolation.
 */
export class EngineProbe {
  private result: Promise<EngineAvailability> | null = null;
  private loaded: UpscaleEngine[] = [];

  constructor(private readonly candidates: readonly EngineCandidate[]) {}

  /**
   * Probe once; later calls return the same availability
   */
  probe(): Promise<EngineAvailability> {
    if (!this.result) {
      this.result = this.runProbe();
    }
    return this.result;
  }

  /**
   * Release every loaded engine (process shutdown)
   */
  async release(): Promise<void> {
    const engines = this.loaded;
    this.loaded = [];
    for (const engine of engines) {
      try {
        await engine.release();
        logger.info({ providerId: engine.providerId }, 'Engine released');
      } catch (error) {
        logger.error({ providerId: engine.providerId, err: error }, 'Failed to release engine');
      }
    }
  }

  private async runProbe(): Promise<EngineAvailability> {
    for (const candidate of this.candidates) {
      if (this.loaded.length >= MAX_ENGINES) {
        break;
      }

      try {
        const engine = await candidate.load();
        this.loaded.push(engine);
        logger.info(
          { providerId: engine.providerId, kind: engine.kind, device: engine.device },
          'Upscale engine loaded'
        );
      } catch (error) {
        logger.warn(
          { providerId: candidate.providerId, error: toError(error).message },
          'Upscale engine unavailable, trying next'
        );
      }
    }

    const [primary, secondary] = this.loaded;
    if (!primary) {
      logger.warn('No upscale engine available, serving interpolation only (degraded mode)');
      return { status: 'unavailable' };
    }

    return { status: 'available', primary, secondary: secondary ?? null };
  }
}
