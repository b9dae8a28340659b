import { describe, it, expect, vi } from 'vitest';

vi.mock('../utils/logger.js', () => ({
  createChildLogger: vi.fn(() => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  })),
}));

import { EngineProbe } from './engine-probe.js';
import type { EngineCandidate, UpscaleEngine } from './interfaces/upscale.provider.js';

function fakeEngine(providerId: string, kind: UpscaleEngine['kind'] = 'neural'): UpscaleEngine {
  return {
    providerId,
    kind,
    device: 'cpu',
    upscale: vi.fn(),
    release: vi.fn(async () => {}),
  };
}

function candidate(providerId: string, load: () => Promise<UpscaleEngine>) {
  return { providerId, load: vi.fn(load) } satisfies EngineCandidate;
}

describe('EngineProbe', () => {
  it('should make the first loadable engine primary and the next secondary', async () => {
    const neural = fakeEngine('onnx-realesrgan');
    const binary = fakeEngine('binary', 'binary');
    const probe = new EngineProbe([
      candidate('onnx-realesrgan', async () => neural),
      candidate('binary', async () => binary),
    ]);

    const availability = await probe.probe();

    expect(availability).toEqual({ status: 'available', primary: neural, secondary: binary });
  });

  it('should skip candidates that fail to load', async () => {
    const binary = fakeEngine('binary', 'binary');
    const probe = new EngineProbe([
      candidate('onnx-realesrgan', async () => {
        throw new Error('model not found');
      }),
      candidate('binary', async () => binary),
    ]);

    const availability = await probe.probe();

    expect(availability).toEqual({ status: 'available', primary: binary, secondary: null });
  });

  it('should report unavailable instead of failing when nothing loads', async () => {
    const probe = new EngineProbe([
      candidate('onnx-realesrgan', async () => {
        throw new Error("Cannot find package 'onnxruntime-web'");
      }),
      candidate('binary', async () => {
        throw new Error('ENOENT');
      }),
    ]);

    await expect(probe.probe()).resolves.toEqual({ status: 'unavailable' });
  });

  it('should report unavailable with no candidates', async () => {
    await expect(new EngineProbe([]).probe()).resolves.toEqual({ status: 'unavailable' });
  });

  it('should load candidates only once across repeated probes', async () => {
    const first = candidate('onnx-realesrgan', async () => fakeEngine('onnx-realesrgan'));
    const probe = new EngineProbe([first]);

    const [a, b] = await Promise.all([probe.probe(), probe.probe()]);
    const c = await probe.probe();

    expect(first.load).toHaveBeenCalledTimes(1);
    expect(b).toBe(a);
    expect(c).toBe(a);
  });

  it('should stop probing once two engines are loaded', async () => {
    const third = candidate('third', async () => fakeEngine('third'));
    const probe = new EngineProbe([
      candidate('a', async () => fakeEngine('a')),
      candidate('b', async () => fakeEngine('b')),
      third,
    ]);

    await probe.probe();

    expect(third.load).not.toHaveBeenCalled();
  });

  it('should release every loaded engine once', async () => {
    const neural = fakeEngine('onnx-realesrgan');
    const binary = fakeEngine('binary', 'binary');
    const probe = new EngineProbe([
      candidate('onnx-realesrgan', async () => neural),
      candidate('binary', async () => binary),
    ]);
    await probe.probe();

    await probe.release();
    await probe.release();

    expect(neural.release).toHaveBeenCalledTimes(1);
    expect(binary.release).toHaveBeenCalledTimes(1);
  });

  it('should keep releasing when one engine fails to release', async () => {
    const failing = fakeEngine('onnx-realesrgan');
    vi.mocked(failing.release).mockRejectedValue(new Error('device lost'));
    const binary = fakeEngine('binary', 'binary');
    const probe = new EngineProbe([
      candidate('onnx-realesrgan', async () => failing),
      candidate('binary', async () => binary),
    ]);
    await probe.probe();

    await expect(probe.release()).resolves.toBeUndefined();
    expect(binary.release).toHaveBeenCalledTimes(1);
  });
});
