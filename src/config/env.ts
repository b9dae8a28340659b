import { z } from 'zod';
import { scaleFactorSchema } from '../types/upscale.types.js';

const splitList = (val: string): string[] =>
  val.split(',').map((item) => item.trim()).filter(Boolean);

/**
 * Environment variable schema validation using Zod
 */
export const envSchema = z.object({
  // Server
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().default(8000),
  HOST: z.string().default('0.0.0.0'),
  MAX_UPLOAD_BYTES: z.coerce.number().int().positive().default(20 * 1024 * 1024), // 20 MB

  // Logging
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  // CORS (empty = any origin)
  CORS_ALLOWED_ORIGINS: z.string().default('').transform(splitList),

  // Engine selection
  UPSCALE_ENGINES: z
    .string()
    .default('neural,binary')
    .transform(splitList)
    .pipe(z.array(z.enum(['neural', 'binary']))),
  UPSCALE_DEFAULT_SCALE: z.coerce.number().pipe(scaleFactorSchema).default(4),
  UPSCALE_MAX_INPUT_EDGE: z.coerce.number().int().positive().default(2048),

  // Neural engine (ONNX)
  NEURAL_MODEL_PATH: z.string().default('/app/models/realesrgan-x4plus.onnx'),
  NEURAL_MODEL_SCALE: z.coerce.number().int().positive().default(4),
  NEURAL_DEVICE: z.enum(['auto', 'webgpu', 'wasm']).default('auto'), // onnxruntime-web execution provider
  NEURAL_TILE_SIZE: z.coerce.number().int().min(0).default(400), // 0 = whole image
  NEURAL_TILE_PAD: z.coerce.number().int().min(0).default(10),

  // Binary engine
  UPSCALER_BINARY_PATH: z.string().default('/app/bin/realesrgan-ncnn-vulkan'),
  UPSCALER_BINARY_TIMEOUT_MS: z.coerce.number().int().positive().default(60000), // 60 seconds
  TEMP_DIR_NAME: z.string().default('upscaler'),
});

export type Env = z.infer<typeof envSchema>;

let cachedEnv: Env | null = null;

/**
 * Parse and validate environment variables
 */
export function parseEnv(): Env {
  if (cachedEnv) {
    return cachedEnv;
  }

  const result = envSchema.safeParse(process.env);

  if (!result.success) {
    const errors = result.error.format();
    // Use stderr for pre-logger initialization errors
    process.stderr.write('Environment validation failed:\n');
    process.stderr.write(JSON.stringify(errors, null, 2) + '\n');
    throw new Error('Invalid environment configuration');
  }

  cachedEnv = result.data;
  return cachedEnv;
}

/**
 * Get validated environment (throws if not initialized)
 */
export function getEnv(): Env {
  if (!cachedEnv) {
    return parseEnv();
  }
  return cachedEnv;
}
