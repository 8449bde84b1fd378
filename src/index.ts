import { buildApp } from './app';
import { loadConfig } from './config/env';
import { logger } from './utils/logger';

// Start server
const start = async () => {
  try {
    const config = loadConfig();
    logger.level = config.logLevel;

    const fastify = await buildApp({ config });

    await fastify.listen({ port: config.port, host: '0.0.0.0' });

    logger.info(`🚀 Thread Radar API running on http://localhost:${config.port}`);
    logger.info(`📊 Health check: http://localhost:${config.port}/api/health`);
  } catch (err) {
    logger.error(err);
    process.exit(1);
  }
};

void start();
