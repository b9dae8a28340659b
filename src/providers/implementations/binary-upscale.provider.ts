import { assertExecutable } from '../../utils/fs.js';
import { ProcessRunner, resolveModelName } from '../../services/process-runner.service.js';
import type { UpscaleEngine } from '../interfaces/upscale.provider.js';
import type { RgbImage, ScaleFactor } from '../../types/upscale.types.js';

export interface BinaryUpscaleOptions {
  binaryPath: string;
  timeoutMs?: number;
  stagingDir?: string;
}

/**
 * Binary Upscale Provider
 *
 * Runs an external native upscaler (realesrgan-ncnn-vulkan style CLI) through
 * the ProcessRunner.
 */
export class BinaryUpscaleProvider implements UpscaleEngine {
  readonly providerId = 'binary';
  readonly kind = 'binary';
  readonly device = 'external';

  constructor(
    readonly binaryPath: string,
    private readonly runner: ProcessRunner
  ) {}

  /**
   * Locate the binary and build the provider. Rejects when the path is
   * missing or not an executable file.
   */
  static async load(options: BinaryUpscaleOptions): Promise<BinaryUpscaleProvider> {
    await assertExecutable(options.binaryPath);
    return new BinaryUpscaleProvider(options.binaryPath, new ProcessRunner(options));
  }

  async upscale(image: RgbImage, scale: ScaleFactor): Promise<RgbImage> {
    return this.runner.runExternal(image, scale, resolveModelName(scale));
  }

  async release(): Promise<void> {
    // Each invocation owns its own process and files
  }
}
