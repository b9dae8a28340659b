/**
 * Engine Setup
 *
 * Builds the engine candidates from configuration, in priority order.
 * Call this during application initialization.
 */

import { tmpdir } from 'os';
import path from 'path';

import { EngineProbe } from './engine-probe.js';
import { OnnxUpscaleProvider, type NeuralDevice } from './implementations/onnx-upscale.provider.js';
import { BinaryUpscaleProvider } from './implementations/binary-upscale.provider.js';
import type { AppConfig, EngineName, NeuralDevicePreference } from '../config/index.js';
import type { EngineCandidate } from './interfaces/upscale.provider.js';

export function resolveDevices(preference: NeuralDevicePreference): NeuralDevice[] {
  return preference === 'auto' ? ['webgpu', 'wasm'] : [preference];
}

function createCandidate(name: EngineName, config: AppConfig): EngineCandidate {
  switch (name) {
    case 'neural':
      return {
        providerId: 'onnx-realesrgan',
        load: () =>
          OnnxUpscaleProvider.load({
            modelPath: config.neural.modelPath,
            modelScale: config.neural.modelScale,
            devices: resolveDevices(config.neural.device),
            tileSize: config.neural.tileSize,
            tilePad: config.neural.tilePad,
          }),
      };
    case 'binary':
      return {
        providerId: 'binary',
        load: () =>
          BinaryUpscaleProvider.load({
            binaryPath: config.binary.path,
            timeoutMs: config.binary.timeoutMs,
            stagingDir: path.join(tmpdir(), config.binary.tempDirName),
          }),
      };
  }
}

/**
 * Engine candidates for the configured priority list (duplicates dropped)
 */
export function buildEngineCandidates(config: AppConfig): EngineCandidate[] {
  const names = [...new Set(config.upscale.engines)];
  return names.map((name) => createCandidate(name, config));
}

export function createEngineProbe(config: AppConfig): EngineProbe {
  return new EngineProbe(buildEngineCandidates(config));
}
