import Fastify, { type FastifyInstance } from 'fastify';
import type { GenerationService } from '../service/generationService.js';
import type { GenerationBackend } from '../backends/generationBackend.js';
import type { Logger } from '../logging/logger.js';
import { registerHealthRoute } from './routes/health.js';
import { registerGenerateRoutes } from './routes/generate.js';

export interface ApiServerDeps {
  service: GenerationService;
  backend: GenerationBackend;
  logger: Logger;
}

/**
 * HTTP gateway over the same GenerationService the gRPC server uses.
 * Does NOT call listen(); callers do that (or use server.inject() in tests).
 */
export function createApiServer(deps: ApiServerDeps): FastifyInstance {
  const app = Fastify({ logger: false });
  const logger = deps.logger.child({ component: 'gateway' });

  registerHealthRoute(app, deps.backend);
  registerGenerateRoutes(app, deps.service, logger);

  return app;
}
