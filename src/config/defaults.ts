import type { ServiceConfig } from '../types/config.types.js';

export const DEFAULT_CONFIG: ServiceConfig = {
  server: {
    host: '0.0.0.0',
    port: 50051,
    maxConcurrentStreams: 10,
    tls: {
      enabled: false,
    },
  },
  gateway: {
    enabled: false,
    host: '127.0.0.1',
    port: 8080,
  },
  backend: {
    baseUrl: 'http://localhost:11434',
    model: 'llama3',
    requestTimeoutMs: 30_000,
    probeTimeoutMs: 5_000,
    strictStreaming: false,
  },
  defaults: {
    temperature: 0.7,
    maxTokens: 2048,
    topP: 0.95,
    presencePenalty: 0,
    frequencyPenalty: 0,
  },
  logLevel: 'info',
};
