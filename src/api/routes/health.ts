import type { FastifyInstance } from 'fastify';
import type { GenerationBackend } from '../../backends/generationBackend.js';
import type { HealthReply } from '../schemas.js';

export function registerHealthRoute(app: FastifyInstance, backend: GenerationBackend): void {
  app.get<{ Reply: HealthReply }>('/health', async (_req, reply) => {
    const reachable = await backend.isAvailable();
    return reply
      .status(reachable ? 200 : 503)
      .send(
        reachable
          ? { status: 'ok', backend: 'reachable' }
          : { status: 'degraded', backend: 'unreachable' },
      );
  });
}
