import * as grpc from '@grpc/grpc-js';
import { readFileSync } from 'node:fs';
import type { GenerationService } from '../service/generationService.js';
import type { Logger } from '../logging/logger.js';
import type { ServerConfig, TlsConfig } from '../types/config.types.js';
import { loadGenerationService } from './proto.js';
import { createGenerateHandler, createGenerateStreamHandler } from './handlers.js';

export interface RpcServerDeps {
  service: GenerationService;
  logger: Logger;
  maxConcurrentStreams?: number;
}

/**
 * Creates a grpc-js server with GenerationService registered.
 * Does NOT bind; call startRpcServer() for that.
 */
export function createRpcServer(deps: RpcServerDeps): grpc.Server {
  const logger = deps.logger.child({ component: 'rpc' });
  const options: grpc.ServerOptions = {};
  if (deps.maxConcurrentStreams !== undefined) {
    options['grpc.max_concurrent_streams'] = deps.maxConcurrentStreams;
  }

  const server = new grpc.Server(options);
  server.addService(loadGenerationService(), {
    Generate: createGenerateHandler(deps.service, logger),
    GenerateStream: createGenerateStreamHandler(deps.service, logger),
  });
  return server;
}

export function createServerCredentials(tls: TlsConfig): grpc.ServerCredentials {
  if (!tls.enabled) {
    return grpc.ServerCredentials.createInsecure();
  }
  if (!tls.certPath || !tls.keyPath) {
    throw new Error('TLS is enabled but cert or key path is missing');
  }
  return grpc.ServerCredentials.createSsl(
    null,
    [{ cert_chain: readFileSync(tls.certPath), private_key: readFileSync(tls.keyPath) }],
    false,
  );
}

/** Binds the server and resolves with the port actually bound. */
export function startRpcServer(
  server: grpc.Server,
  config: Pick<ServerConfig, 'host' | 'port' | 'tls'>,
): Promise<number> {
  const credentials = createServerCredentials(config.tls);
  return new Promise((resolve, reject) => {
    server.bindAsync(`${config.host}:${config.port}`, credentials, (err, port) => {
      if (err) {
        reject(err);
        return;
      }
      resolve(port);
    });
  });
}

/** Graceful shutdown, forced once the grace period runs out. */
export function stopRpcServer(server: grpc.Server, graceMs = 5000): Promise<void> {
  return new Promise(resolve => {
    const timer = setTimeout(() => {
      server.forceShutdown();
      resolve();
    }, graceMs);
    server.tryShutdown(() => {
      clearTimeout(timer);
      resolve();
    });
  });
}
