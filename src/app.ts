import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import multipart from '@fastify/multipart';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';

import { getConfig } from './config/index.js';
import { getLogger } from './utils/logger.js';
import { APP_VERSION } from './utils/constants.js';
import { errorHandler } from './middleware/error.middleware.js';
import { healthRoutes } from './routes/health.routes.js';
import { upscaleRoutes } from './routes/upscale.routes.js';
import type { UpscaleService } from './services/upscale.service.js';

export interface BuildAppOptions {
  upscaleService: UpscaleService;
}

/**
 * Base64 inflates payloads by 4/3; leave room for the JSON envelope
 */
function base64BodyLimit(maxUploadBytes: number): number {
  return Math.ceil((maxUploadBytes * 4) / 3) + 1024;
}

/**
 * Build and configure Fastify application
 */
export async function buildApp(options: BuildAppOptions): Promise<FastifyInstance> {
  const config = getConfig();
  const logger = getLogger();

  const app = Fastify({
    logger: false, // We use our own Pino logger
    requestIdHeader: 'x-request-id',
    requestIdLogLabel: 'requestId',
    bodyLimit: base64BodyLimit(config.server.maxUploadBytes),
  });

  // Security plugins
  await app.register(helmet, {
    contentSecurityPolicy: false, // Disable for API
  });

  const { allowedOrigins } = config.cors;
  await app.register(cors, {
    // Empty list allows any origin
    origin: allowedOrigins.length > 0 ? allowedOrigins : true,
    exposedHeaders: ['Content-Disposition', 'X-Upscale-Engine'],
  });

  await app.register(multipart, {
    limits: {
      fileSize: config.server.maxUploadBytes,
      files: 1,
    },
  });

  // Swagger documentation
  await app.register(swagger, {
    openapi: {
      info: {
        title: 'AI Image Upscaler',
        description: 'Upscale images with a neural engine, an external binary or interpolation',
        version: APP_VERSION,
      },
      servers: [
        {
          url: `http://localhost:${config.server.port}`,
          description: 'Development server',
        },
      ],
    },
  });

  await app.register(swaggerUi, {
    routePrefix: '/docs',
    uiConfig: {
      docExpansion: 'list',
      deepLinking: false,
    },
  });

  // Request logging
  app.addHook('onRequest', async (request) => {
    logger.info(
      {
        requestId: request.id,
        method: request.method,
        url: request.url,
      },
      'Incoming request'
    );
  });

  app.addHook('onResponse', async (request, reply) => {
    logger.info(
      {
        requestId: request.id,
        method: request.method,
        url: request.url,
        statusCode: reply.statusCode,
        responseTime: reply.elapsedTime,
      },
      'Request completed'
    );
  });

  // Error handler
  app.setErrorHandler(errorHandler);

  // Register routes
  await app.register(healthRoutes, { upscaleService: options.upscaleService });
  await app.register(upscaleRoutes, {
    upscaleService: options.upscaleService,
    defaultScale: config.upscale.defaultScale,
  });

  return app;
}
