import { getEnv, parseEnv, type Env } from './env.js';
import type { ScaleFactor } from '../types/upscale.types.js';

export { getEnv, parseEnv, type Env };

export type EngineName = Env['UPSCALE_ENGINES'][number];
export type NeuralDevicePreference = Env['NEURAL_DEVICE'];

/**
 * Application configuration derived from environment
 */
export interface AppConfig {
  server: {
    port: number;
    host: string;
    env: 'development' | 'production' | 'test';
    maxUploadBytes: number;
  };
  cors: {
    allowedOrigins: string[];
  };
  logging: {
    level: string;
  };
  upscale: {
    engines: EngineName[];
    defaultScale: ScaleFactor;
    maxInputEdge: number;
  };
  neural: {
    modelPath: string;
    modelScale: number;
    device: NeuralDevicePreference;
    tileSize: number;
    tilePad: number;
  };
  binary: {
    path: string;
    timeoutMs: number;
    tempDirName: string;
  };
}

/**
 * Build application config from validated environment
 */
export function buildConfig(env: Env): AppConfig {
  return {
    server: {
      port: env.PORT,
      host: env.HOST,
      env: env.NODE_ENV,
      maxUploadBytes: env.MAX_UPLOAD_BYTES,
    },
    cors: {
      allowedOrigins: env.CORS_ALLOWED_ORIGINS,
    },
    logging: {
      level: env.LOG_LEVEL,
    },
    upscale: {
      engines: env.UPSCALE_ENGINES,
      defaultScale: env.UPSCALE_DEFAULT_SCALE,
      maxInputEdge: env.UPSCALE_MAX_INPUT_EDGE,
    },
    neural: {
      modelPath: env.NEURAL_MODEL_PATH,
      modelScale: env.NEURAL_MODEL_SCALE,
      device: env.NEURAL_DEVICE,
      tileSize: env.NEURAL_TILE_SIZE,
      tilePad: env.NEURAL_TILE_PAD,
    },
    binary: {
      path: env.UPSCALER_BINARY_PATH,
      timeoutMs: env.UPSCALER_BINARY_TIMEOUT_MS,
      tempDirName: env.TEMP_DIR_NAME,
    },
  };
}

let cachedConfig: AppConfig | null = null;

/**
 * Get application configuration
 */
export function getConfig(): AppConfig {
  if (!cachedConfig) {
    const env = getEnv();
    cachedConfig = buildConfig(env);
  }
  return cachedConfig;
}
