/**
 * Upscale Engine Interface
 *
 * Defines the contract shared by every upscaling engine: in-process neural
 * inference, an external native binary, and plain interpolation.
 */

import type { RgbImage, ScaleFactor } from '../../types/upscale.types.js';

export type EngineKind = 'neural' | 'binary' | 'interpolation';

/**
 * UpscaleEngine Interface
 *
 * Implementations: OnnxUpscaleProvider, BinaryUpscaleProvider,
 * SharpInterpolationProvider
 */
export interface UpscaleEngine {
  /** Engine identifier for logging/metrics */
  readonly providerId: string;

  readonly kind: EngineKind;

  /** Compute device the engine runs on (e.g. webgpu, wasm, cpu, external) */
  readonly device: string;

  /**
   * Upscale an image.
   *
   * An engine may return its native magnification instead of exactly
   * `scale`; the orchestrator resizes such output to the requested size.
   * Engine-specific failures must be thrown as `EngineError`.
   */
  upscale(image: RgbImage, scale: ScaleFactor): Promise<RgbImage>;

  /**
   * Release process-wide resources (sessions, device memory). Called once at shutdown.
   */
  release(): Promise<void>;
}

/**
 * A loader for one engine, attempted by the EngineProbe in priority order
 */
export interface EngineCandidate {
  readonly providerId: string;
  load(): Promise<UpscaleEngine>;
}

/**
 * Process-wide engine state, computed once at startup
 */
export type EngineAvailability =
  | {
      status: 'available';
      primary: UpscaleEngine;
      secondary: UpscaleEngine | null;
    }
  | {
      status: 'unavailable';
    };
