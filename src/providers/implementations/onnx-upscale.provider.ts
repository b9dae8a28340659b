import { readFile } from 'fs/promises';
import type { InferenceSession, Tensor } from 'onnxruntime-web';

import { createChildLogger } from '../../utils/logger.js';
import { EngineError, toError } from '../../utils/errors.js';
import { createRgbImage } from '../../services/image-codec.service.js';
import type { UpscaleEngine } from '../interfaces/upscale.provider.js';
import type { RgbImage, ScaleFactor } from '../../types/upscale.types.js';

const logger = createChildLogger({ service: 'onnx-upscale' });

const ENGINE_ID = 'neural';

/**
 * Session surface used by this provider
 */
export interface OnnxSession {
  readonly inputNames: readonly string[];
  readonly outputNames: readonly string[];
  run(feeds: InferenceSession.FeedsType): Promise<InferenceSession.ReturnType>;
  release(): Promise<void>;
}

/**
 * The parts of onnxruntime-web the provider needs; swapped for a fake in tests
 */
export interface OnnxRuntime {
  InferenceSession: {
    create(model: Uint8Array, options: InferenceSession.SessionOptions): Promise<OnnxSession>;
  };
  Tensor: typeof Tensor;
}

/** onnxruntime-web execution providers, best first under "auto" */
export type NeuralDevice = 'webgpu' | 'wasm';

export interface OnnxUpscaleOptions {
  modelPath: string;
  /** Native magnification of the model */
  modelScale: number;
  /** Devices to try, best first */
  devices: NeuralDevice[];
  /** Tile edge in input pixels (0 = whole image) */
  tileSize: number;
  /** Context pixels added around each tile */
  tilePad: number;
  loadRuntime?: () => Promise<OnnxRuntime>;
  collectGarbage?: () => void;
}

interface Region {
  x: number;
  y: number;
  width: number;
  height: number;
}

/**
 * Load onnxruntime-web on first use so the wasm backend is only
 * initialised when the neural engine is configured
 */
export async function importOnnxRuntime(): Promise<OnnxRuntime> {
  return import('onnxruntime-web');
}

/**
 * Trigger a collection when node runs with --expose-gc
 */
function collectGarbageIfExposed(): void {
  const gc: unknown = Reflect.get(globalThis, 'gc');
  if (typeof gc === 'function') {
    gc();
  }
}

/**
 * ONNX Upscale Provider
 *
 * Runs a super-resolution network (Real-ESRGAN exported to ONNX) in process.
 * Input is processed in padded tiles to bound memory; output is returned at
 * the model's native magnification.
 */
export class OnnxUpscaleProvider implements UpscaleEngine {
  readonly providerId = 'onnx-realesrgan';
  readonly kind = 'neural';

  private constructor(
    private readonly runtime: OnnxRuntime,
    private readonly session: OnnxSession,
    readonly device: NeuralDevice,
    private readonly options: OnnxUpscaleOptions
  ) {}

  /**
   * Load the model on the first device that accepts it
   */
  static async load(options: OnnxUpscaleOptions): Promise<OnnxUpscaleProvider> {
    const model = await readFile(options.modelPath);
    const runtime = await (options.loadRuntime ?? importOnnxRuntime)();

    let lastError: Error | undefined;
    for (const device of options.devices) {
      try {
        const session = await runtime.InferenceSession.create(model, {
          executionProviders: [device],
          graphOptimizationLevel: 'all',
        });
        logger.info({ device, modelPath: options.modelPath }, 'ONNX session created');
        return new OnnxUpscaleProvider(runtime, session, device, options);
      } catch (error) {
        lastError = toError(error);
        logger.warn({ device, error: lastError.message }, 'Device unavailable for ONNX session');
      }
    }

    throw new Error(
      `No device could load ${options.modelPath}${lastError ? `: ${lastError.message}` : ''}`
    );
  }

  async upscale(image: RgbImage, _scale: ScaleFactor): Promise<RgbImage> {
    try {
      return await this.enhance(image);
    } catch (error) {
      if (error instanceof EngineError) {
        throw error;
      }
      throw new EngineError(ENGINE_ID, `inference failed: ${toError(error).message}`, toError(error));
    } finally {
      (this.options.collectGarbage ?? collectGarbageIfExposed)();
    }
  }

  async release(): Promise<void> {
    await this.session.release();
  }

  private async enhance(image: RgbImage): Promise<RgbImage> {
    const { modelScale, tilePad } = this.options;
    const tileSize = this.options.tileSize > 0 ? this.options.tileSize : Math.max(image.width, image.height);
    const outWidth = image.width * modelScale;
    const outHeight = image.height * modelScale;
    const output = Buffer.alloc(outWidth * outHeight * 3);

    for (let y0 = 0; y0 < image.height; y0 += tileSize) {
      for (let x0 = 0; x0 < image.width; x0 += tileSize) {
        const x1 = Math.min(x0 + tileSize, image.width);
        const y1 = Math.min(y0 + tileSize, image.height);
        const padded: Region = {
          x: Math.max(0, x0 - tilePad),
          y: Math.max(0, y0 - tilePad),
          width: Math.min(image.width, x1 + tilePad) - Math.max(0, x0 - tilePad),
          height: Math.min(image.height, y1 + tilePad) - Math.max(0, y0 - tilePad),
        };

        const tile = await this.infer(image, padded);

        // Copy the unpadded part of the tile into place
        const offsetX = (x0 - padded.x) * modelScale;
        const offsetY = (y0 - padded.y) * modelScale;
        const copyWidth = (x1 - x0) * modelScale;
        const copyHeight = (y1 - y0) * modelScale;
        const plane = tile.width * tile.height;

        for (let ry = 0; ry < copyHeight; ry++) {
          const srcRow = (offsetY + ry) * tile.width + offsetX;
          const dstRow = ((y0 * modelScale + ry) * outWidth + x0 * modelScale) * 3;
          for (let rx = 0; rx < copyWidth; rx++) {
            for (let c = 0; c < 3; c++) {
              const value = tile.data[c * plane + srcRow + rx];
              output[dstRow + rx * 3 + c] = Math.min(255, Math.max(0, Math.round(value * 255)));
            }
          }
        }
      }
    }

    return createRgbImage(output, outWidth, outHeight);
  }

  /**
   * Run the network on one region. Returns planar (CHW) float output.
   */
  private async infer(
    image: RgbImage,
    region: Region
  ): Promise<{ data: Float32Array; width: number; height: number }> {
    const plane = region.width * region.height;
    const input = new Float32Array(plane * 3);
    for (let y = 0; y < region.height; y++) {
      for (let x = 0; x < region.width; x++) {
        const src = ((region.y + y) * image.width + region.x + x) * 3;
        const dst = y * region.width + x;
        input[dst] = image.data[src] / 255;
        input[plane + dst] = image.data[src + 1] / 255;
        input[2 * plane + dst] = image.data[src + 2] / 255;
      }
    }

    const inputName = this.session.inputNames[0];
    const outputName = this.session.outputNames[0];
    const tensor = new this.runtime.Tensor('float32', input, [1, 3, region.height, region.width]);
    let result: Tensor | undefined;

    try {
      const outputs = await this.session.run({ [inputName]: tensor });
      result = outputs[outputName];
      const expectedWidth = region.width * this.options.modelScale;
      const expectedHeight = region.height * this.options.modelScale;

      if (!result || !(result.data instanceof Float32Array)) {
        throw new EngineError(ENGINE_ID, `model returned no float32 output "${outputName}"`);
      }
      if (result.dims[2] !== expectedHeight || result.dims[3] !== expectedWidth) {
        throw new EngineError(
          ENGINE_ID,
          `unexpected output shape [${result.dims.join(',')}] for ${region.width}x${region.height} tile`
        );
      }

      // Copy out before the tensor is disposed
      return { data: result.data.slice(), width: expectedWidth, height: expectedHeight };
    } finally {
      tensor.dispose();
      result?.dispose?.();
    }
  }
}
