import type { GenerationParameters } from './generation.types.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface TlsConfig {
  enabled: boolean;
  certPath?: string;
  keyPath?: string;
}

export interface ServerConfig {
  host: string;
  port: number;
  maxConcurrentStreams: number;
  tls: TlsConfig;
}

export interface GatewayConfig {
  enabled: boolean;
  host: string;
  port: number;
}

export interface BackendConfig {
  baseUrl: string;
  model: string;
  requestTimeoutMs: number;
  probeTimeoutMs: number;
  strictStreaming: boolean;
}

export interface ServiceConfig {
  server: ServerConfig;
  gateway: GatewayConfig;
  backend: BackendConfig;
  defaults: GenerationParameters;
  logLevel: LogLevel;
}
