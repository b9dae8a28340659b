import type { FastifyInstance } from 'fastify';
import { APP_VERSION } from '../utils/constants.js';
import type { UpscaleService } from '../services/upscale.service.js';

interface RootResponse {
  message: string;
  version: string;
}

interface HealthResponse {
  status: 'healthy';
  device: string;
  engine: string;
  degraded: boolean;
}

export interface HealthRoutesOptions {
  upscaleService: UpscaleService;
}

/**
 * Service info and health routes
 */
export async function healthRoutes(
  fastify: FastifyInstance,
  options: HealthRoutesOptions
): Promise<void> {
  const { upscaleService } = options;

  fastify.get<{ Reply: RootResponse }>(
    '/',
    {
      schema: {
        description: 'Service info',
        tags: ['Health'],
        response: {
          200: {
            type: 'object',
            properties: {
              message: { type: 'string' },
              version: { type: 'string' },
            },
          },
        },
      },
    },
    async (_request, reply) => {
      return reply.send({ message: 'AI Image Upscaler API', version: APP_VERSION });
    }
  );

  /**
   * Liveness probe; degraded mode still reports healthy
   */
  fastify.get<{ Reply: HealthResponse }>(
    '/health',
    {
      schema: {
        description: 'Liveness probe with the active upscale engine',
        tags: ['Health'],
        response: {
          200: {
            type: 'object',
            properties: {
              status: { type: 'string' },
              device: { type: 'string' },
              engine: { type: 'string' },
              degraded: { type: 'boolean' },
            },
          },
        },
      },
    },
    async (_request, reply) => {
      return reply.send({ status: 'healthy', ...upscaleService.getStatus() });
    }
  );
}
