import type { Command } from 'commander';
import type { FastifyInstance } from 'fastify';
import { loadConfig, normalizeLogLevel, type DeepPartial } from '../../config/loader.js';
import { validateConfig } from '../../config/validator.js';
import { createLogger } from '../../logging/logger.js';
import { OllamaClient } from '../../backends/ollamaClient.js';
import { GenerationService } from '../../service/generationService.js';
import { createRpcServer, startRpcServer, stopRpcServer } from '../../rpc/server.js';
import { createApiServer } from '../../api/server.js';
import type { ServiceConfig } from '../../types/config.types.js';

interface ServeOptions {
  config?: string;
  port?: string;
  host?: string;
  workers?: string;
  ollamaUrl?: string;
  model?: string;
  logLevel?: string;
  gatewayPort?: string;
}

function toOverrides(opts: ServeOptions): DeepPartial<ServiceConfig> {
  return {
    server: {
      port: opts.port !== undefined ? parseInt(opts.port, 10) : undefined,
      host: opts.host,
      maxConcurrentStreams: opts.workers !== undefined ? parseInt(opts.workers, 10) : undefined,
    },
    gateway:
      opts.gatewayPort !== undefined
        ? { enabled: true, port: parseInt(opts.gatewayPort, 10) }
        : {},
    backend: {
      baseUrl: opts.ollamaUrl,
      model: opts.model,
    },
    logLevel: opts.logLevel !== undefined ? normalizeLogLevel(opts.logLevel) : undefined,
  };
}

export function registerServeCommand(program: Command): void {
  program
    .command('serve')
    .description('Start the gRPC generation service')
    .option('--config <path>', 'Path to a JSON configuration file')
    .option('--port <n>', 'gRPC port (overrides config)')
    .option('--host <h>', 'gRPC bind address (overrides config)')
    .option('--workers <n>', 'Maximum concurrent calls (overrides config)')
    .option('--ollama-url <url>', 'Ollama API URL (overrides config)')
    .option('--model <name>', 'Model name to use (overrides config)')
    .option('--log-level <level>', 'debug | info | warn | error (overrides config)')
    .option('--gateway-port <n>', 'Also serve the HTTP gateway on this port')
    .action(async (opts: ServeOptions) => {
      const config = loadConfig({
        ...(opts.config !== undefined && { configPath: opts.config }),
        overrides: toOverrides(opts),
      });
      validateConfig(config);

      const logger = createLogger({ level: config.logLevel });
      logger.info(
        {
          port: config.server.port,
          maxConcurrentStreams: config.server.maxConcurrentStreams,
          ollamaUrl: config.backend.baseUrl,
          model: config.backend.model,
        },
        'Starting generation service',
      );

      const backend = await OllamaClient.connect(config.backend, logger);
      const service = new GenerationService(backend, config.defaults, logger);

      const rpcServer = createRpcServer({
        service,
        logger,
        maxConcurrentStreams: config.server.maxConcurrentStreams,
      });
      const boundPort = await startRpcServer(rpcServer, config.server);
      logger.info(`gRPC server listening on ${config.server.host}:${boundPort}`);

      let gateway: FastifyInstance | undefined;
      if (config.gateway.enabled) {
        gateway = createApiServer({ service, backend, logger });
        await gateway.listen({ port: config.gateway.port, host: config.gateway.host });
        logger.info(`HTTP gateway listening on http://${config.gateway.host}:${config.gateway.port}`);
      }

      const shutdown = async (signal: string): Promise<void> => {
        logger.info(`Received ${signal}, shutting down`);
        await stopRpcServer(rpcServer);
        if (gateway) await gateway.close();
        backend.close();
        process.exit(0);
      };
      for (const signal of ['SIGINT', 'SIGTERM'] as const) {
        process.once(signal, () => {
          shutdown(signal).catch((err: unknown) => {
            logger.error({ err }, 'Shutdown failed');
            process.exit(1);
          });
        });
      }
    });
}
