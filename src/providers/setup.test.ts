import { describe, it, expect, vi } from 'vitest';

vi.mock('../utils/logger.js', () => ({
  createChildLogger: vi.fn(() => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  })),
}));

import { buildEngineCandidates, createEngineProbe, resolveDevices } from './setup.js';
import { buildConfig } from '../config/index.js';
import { envSchema } from '../config/env.js';

const configFor = (env: Record<string, string>) => buildConfig(envSchema.parse(env));

describe('resolveDevices', () => {
  it('should prefer webgpu then wasm for auto', () => {
    expect(resolveDevices('auto')).toEqual(['webgpu', 'wasm']);
  });

  it('should pin an explicit device', () => {
    expect(resolveDevices('wasm')).toEqual(['wasm']);
  });
});

describe('buildEngineCandidates', () => {
  it('should follow the configured priority order', () => {
    const candidates = buildEngineCandidates(configFor({ UPSCALE_ENGINES: 'binary,neural' }));

    expect(candidates.map((c) => c.providerId)).toEqual(['binary', 'onnx-realesrgan']);
  });

  it('should drop duplicate entries', () => {
    const candidates = buildEngineCandidates(configFor({ UPSCALE_ENGINES: 'binary,binary' }));

    expect(candidates.map((c) => c.providerId)).toEqual(['binary']);
  });
});

describe('createEngineProbe', () => {
  it('should degrade to unavailable when the model and binary are missing', async () => {
    const probe = createEngineProbe(
      configFor({
        NEURAL_MODEL_PATH: '/nonexistent/model.onnx',
        UPSCALER_BINARY_PATH: '/nonexistent/upscaler',
      })
    );

    await expect(probe.probe()).resolves.toEqual({ status: 'unavailable' });
  });
});
