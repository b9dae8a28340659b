import { spawn } from 'child_process';
import { randomUUID } from 'crypto';
import { readFile, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import path from 'path';

import { createChildLogger } from '../utils/logger.js';
import { EngineError, toError } from '../utils/errors.js';
import { ensureDir, fileExists, safeUnlink } from '../utils/fs.js';
import { formatDuration, startTimer } from '../utils/timer.js';
import { decodeImage, encodePng } from './image-codec.service.js';
import { isScaleFactor, type RgbImage, type ScaleFactor } from '../types/upscale.types.js';

const logger = createChildLogger({ service: 'process-runner' });

const ENGINE_ID = 'binary';

/** Keep only the tail of stderr for error messages */
const MAX_STDERR_CHARS = 2000;

export const DEFAULT_BINARY_TIMEOUT_MS = 60000;

export const DEFAULT_MODEL_NAME = 'general-x4-model';

const MODEL_BY_SCALE: Record<ScaleFactor, string> = {
  2: 'fast-video-model',
  4: 'general-x4-model',
  8: 'general-x4-model',
};

/**
 * Model asset passed to the binary for a scale factor
 */
export function resolveModelName(scale: number): string {
  return isScaleFactor(scale) ? MODEL_BY_SCALE[scale] : DEFAULT_MODEL_NAME;
}

export interface ProcessRunnerOptions {
  binaryPath: string;
  /** Wall-clock limit for one invocation */
  timeoutMs?: number;
  /** Directory for staging files (default: OS temp dir + "upscaler") */
  stagingDir?: string;
}

/**
 * Temp file pair owned by one runExternal call
 */
export interface StagingHandle {
  inputPath: string;
  outputPath: string;
}

/**
 * ProcessRunner - stages an image on disk, runs the external upscaling
 * binary and reads its output back. Staging files are removed before
 * runExternal returns, whatever the outcome.
 */
export class ProcessRunner {
  private readonly binaryPath: string;
  private readonly timeoutMs: number;
  private readonly stagingDir: string;

  constructor(options: ProcessRunnerOptions) {
    this.binaryPath = options.binaryPath;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_BINARY_TIMEOUT_MS;
    this.stagingDir = options.stagingDir ?? path.join(tmpdir(), 'upscaler');
  }

  async runExternal(image: RgbImage, scale: number, modelName: string): Promise<RgbImage> {
    const staging = await this.stageInput(image);

    try {
      const elapsed = startTimer();
      await this.invoke([
        '-i', staging.inputPath,
        '-o', staging.outputPath,
        '-n', modelName,
        '-s', String(scale),
        '-f', 'png',
      ]);

      if (!(await fileExists(staging.outputPath))) {
        throw new EngineError(ENGINE_ID, 'binary exited without writing an output file');
      }

      const output = await this.readOutput(staging.outputPath);
      const durationMs = elapsed();
      logger.debug(
        { modelName, scale, durationMs, duration: formatDuration(durationMs) },
        'External upscale completed'
      );
      return output;
    } finally {
      await this.removeStaging(staging);
    }
  }

  /**
   * Create the staging pair and write the input PNG. A staging directory that
   * cannot be created or a full disk is a failure of this engine, not of the
   * request.
   */
  private async stageInput(image: RgbImage): Promise<StagingHandle> {
    const id = randomUUID();
    const staging: StagingHandle = {
      inputPath: path.join(this.stagingDir, `${id}-input.png`),
      outputPath: path.join(this.stagingDir, `${id}-output.png`),
    };

    try {
      await ensureDir(this.stagingDir);
      await writeFile(staging.inputPath, await encodePng(image, 1));
      return staging;
    } catch (error) {
      await this.removeStaging(staging);
      throw new EngineError(ENGINE_ID, 'could not stage input', toError(error));
    }
  }

  private async removeStaging(staging: StagingHandle): Promise<void> {
    try {
      await Promise.all([safeUnlink(staging.inputPath), safeUnlink(staging.outputPath)]);
    } catch (error) {
      logger.error({ err: error, ...staging }, 'Failed to remove staging files');
    }
  }

  private async readOutput(outputPath: string): Promise<RgbImage> {
    try {
      // The raster is copied into memory; the file is deleted right after
      return await decodeImage(await readFile(outputPath));
    } catch (error) {
      throw new EngineError(ENGINE_ID, 'unreadable output file', toError(error));
    }
  }

  private invoke(args: string[]): Promise<void> {
    return new Promise((resolve, reject) => {
      let settled = false;
      let timer: NodeJS.Timeout | undefined;
      let stderr = '';

      const settle = (error?: EngineError): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      };

      const child = spawn(this.binaryPath, args, { stdio: ['ignore', 'ignore', 'pipe'] });

      timer = setTimeout(() => {
        child.kill('SIGKILL');
        settle(new EngineError(ENGINE_ID, `timed out after ${this.timeoutMs}ms`));
      }, this.timeoutMs);

      child.stderr?.on('data', (data: Buffer) => {
        stderr = (stderr + data.toString()).slice(-MAX_STDERR_CHARS);
      });

      child.on('close', (code: number | null, signal: NodeJS.Signals | null) => {
        if (code === 0) {
          settle();
          return;
        }
        const status = code !== null ? `code ${code}` : `signal ${signal}`;
        const detail = stderr.trim();
        settle(new EngineError(ENGINE_ID, `exited with ${status}${detail ? `: ${detail}` : ''}`));
      });

      child.on('error', (err: Error) => {
        settle(new EngineError(ENGINE_ID, `failed to start ${this.binaryPath}: ${err.message}`, err));
      });
    });
  }
}
