import 'dotenv/config';

import { parseEnv } from './config/env.js';
import { getConfig } from './config/index.js';
import { getLogger } from './utils/logger.js';
import { createEngineProbe } from './providers/setup.js';
import { createUpscaleService } from './services/upscale.service.js';
import { buildApp } from './app.js';

/**
 * Main entry point
 */
async function main(): Promise<void> {
  // Validate environment first
  parseEnv();

  const config = getConfig();
  const logger = getLogger();

  logger.info({ env: config.server.env, engines: config.upscale.engines }, 'Starting image upscaler');

  // Probe engines once; failures degrade to interpolation
  const probe = createEngineProbe(config);
  const availability = await probe.probe();
  const upscaleService = createUpscaleService(availability, config);
  logger.info(upscaleService.getStatus(), 'Upscale engine selected');

  // Build and start server
  const app = await buildApp({ upscaleService });

  try {
    await app.listen({
      port: config.server.port,
      host: config.server.host,
    });

    logger.info(
      { port: config.server.port, host: config.server.host },
      'Server started successfully'
    );
    logger.info(`Documentation available at http://localhost:${config.server.port}/docs`);
  } catch (error) {
    logger.error({ error }, 'Failed to start server');
    await probe.release();
    process.exit(1);
  }

  // Graceful shutdown
  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, 'Received shutdown signal');

    try {
      await app.close();
      await probe.release();
      logger.info('Graceful shutdown completed');
      process.exit(0);
    } catch (error) {
      logger.error({ error }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
