import type { LogLevel, ServiceConfig } from '../types/config.types.js';

export class ConfigValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigValidationError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

function validatePort(name: string, port: number): void {
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new ConfigValidationError(`${name} must be between 1 and 65535, got ${port}.`);
  }
}

export function validateConfig(config: ServiceConfig): void {
  const { server, gateway, backend, defaults } = config;

  validatePort('server.port', server.port);
  if (!Number.isInteger(server.maxConcurrentStreams) || server.maxConcurrentStreams < 1) {
    throw new ConfigValidationError(
      `server.maxConcurrentStreams must be >= 1, got ${server.maxConcurrentStreams}.`,
    );
  }
  if (server.tls.enabled && (!server.tls.certPath || !server.tls.keyPath)) {
    throw new ConfigValidationError('TLS is enabled but cert or key path is missing.');
  }

  if (gateway.enabled) {
    validatePort('gateway.port', gateway.port);
  }

  if (!/^https?:\/\//.test(backend.baseUrl)) {
    throw new ConfigValidationError(`Invalid Ollama URL: ${backend.baseUrl}`);
  }
  if (!backend.model || backend.model.trim() === '') {
    throw new ConfigValidationError('backend.model is required.');
  }
  if (!Number.isFinite(backend.requestTimeoutMs) || backend.requestTimeoutMs < 1000) {
    throw new ConfigValidationError(
      `backend.requestTimeoutMs must be >= 1000, got ${backend.requestTimeoutMs}.`,
    );
  }

  if (!(defaults.temperature >= 0 && defaults.temperature <= 2)) {
    throw new ConfigValidationError(`Invalid temperature: ${defaults.temperature}`);
  }
  if (!Number.isInteger(defaults.maxTokens) || defaults.maxTokens < 1) {
    throw new ConfigValidationError(`Invalid max tokens: ${defaults.maxTokens}`);
  }
  if (!(defaults.topP > 0 && defaults.topP <= 1)) {
    throw new ConfigValidationError(`Invalid top-p: ${defaults.topP}`);
  }
  if (!Number.isFinite(defaults.presencePenalty) || !Number.isFinite(defaults.frequencyPenalty)) {
    throw new ConfigValidationError('Penalties must be finite numbers.');
  }

  if (!isLogLevel(config.logLevel)) {
    throw new ConfigValidationError(`Unknown log level: ${String(config.logLevel)}`);
  }
}
