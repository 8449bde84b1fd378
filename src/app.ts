import Fastify from 'fastify';
import cors from '@fastify/cors';
import { PipelineController } from './controllers/pipelineController';
import { PublishController } from './controllers/publishController';
import { ScanController } from './controllers/scanController';
import { ServiceFactory, type ServiceFactoryOptions } from './services/factory';
import { logger as rootLogger } from './utils/logger';

export async function buildApp(options: ServiceFactoryOptions) {
  const fastify = Fastify({
    logger: {
      name: 'thread-radar',
      level: (options.logger ?? rootLogger).level,
    },
  });

  const services = new ServiceFactory(options);
  const scanController = new ScanController(services);
  const pipelineController = new PipelineController(services);
  const publishController = new PublishController(services);

  // CORS
  await fastify.register(cors, {
    origin: options.config.frontendUrl,
  });

  // Health check
  fastify.get('/api/health', async () => {
    return {
      status: 'healthy',
      timestamp: new Date().toISOString(),
      sources: services.config.sources,
      services: {
        generation: services.config.anthropic.apiKey ? 'configured' : 'missing ANTHROPIC_API_KEY',
      },
    };
  });

  // Scan routes
  fastify.post('/api/scan', scanController.scan.bind(scanController));
  fastify.get('/api/topics', scanController.topics.bind(scanController));

  // Pipeline routes
  fastify.post('/api/pipeline', pipelineController.run.bind(pipelineController));

  // Publishing routes
  fastify.post('/api/publish', publishController.publish.bind(publishController));
  fastify.get('/api/publish/profiles', publishController.getProfiles.bind(publishController));
  fastify.get('/api/publish/pending', publishController.getPending.bind(publishController));

  return fastify;
}
