import type { LogLevel, ServiceConfig } from '../types/config.types.js';
import { DEFAULT_CONFIG } from './defaults.js';
import { ConfigValidationError, isLogLevel } from './validator.js';
import { readFileSync, existsSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { z } from 'zod';

export type DeepPartial<T> = {
  [K in keyof T]?: T[K] extends object ? DeepPartial<T[K]> : T[K];
};

export interface LoadConfigOptions {
  cwd?: string;
  /** Explicit config file; when absent the cwd is searched. */
  configPath?: string;
  /** Highest-precedence overrides, typically from CLI flags. */
  overrides?: DeepPartial<ServiceConfig>;
}

const CONFIG_FILE_NAMES = ['textgen-bridge.config.json', '.textgen-bridge.json'];

const fileConfigSchema = z
  .object({
    server: z
      .object({
        host: z.string(),
        port: z.number().int(),
        maxConcurrentStreams: z.number().int(),
        tls: z
          .object({ enabled: z.boolean(), certPath: z.string(), keyPath: z.string() })
          .partial(),
      })
      .partial(),
    gateway: z.object({ enabled: z.boolean(), host: z.string(), port: z.number().int() }).partial(),
    backend: z
      .object({
        baseUrl: z.string(),
        model: z.string(),
        requestTimeoutMs: z.number(),
        probeTimeoutMs: z.number(),
        strictStreaming: z.boolean(),
      })
      .partial(),
    defaults: z
      .object({
        temperature: z.number(),
        maxTokens: z.number().int(),
        topP: z.number(),
        presencePenalty: z.number(),
        frequencyPenalty: z.number(),
      })
      .partial(),
    logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']),
  })
  .partial()
  .strict();

function deepMerge<T>(base: T, override: DeepPartial<T>): T {
  const result = { ...base };
  for (const key of Object.keys(override) as Array<keyof T>) {
    const val = override[key];
    if (val !== undefined && val !== null) {
      if (
        typeof val === 'object' &&
        !Array.isArray(val) &&
        typeof base[key] === 'object' &&
        base[key] !== null
      ) {
        result[key] = deepMerge(base[key], val as DeepPartial<T[keyof T]>);
      } else {
        result[key] = val as T[keyof T];
      }
    }
  }
  return result;
}

function readConfigFile(path: string): DeepPartial<ServiceConfig> {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigValidationError(`Failed to load configuration from ${path}: ${reason}`);
  }
  const parsed = fileConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue?.path.join('.') || '(root)';
    throw new ConfigValidationError(
      `Invalid configuration in ${path} at ${where}: ${issue?.message ?? 'unknown error'}`,
    );
  }
  return parsed.data;
}

function loadFileConfig(cwd: string, configPath?: string): DeepPartial<ServiceConfig> {
  if (configPath) {
    return readConfigFile(resolve(cwd, configPath));
  }
  for (const name of CONFIG_FILE_NAMES) {
    const candidate = join(cwd, name);
    if (existsSync(candidate)) {
      return readConfigFile(candidate);
    }
  }
  return {};
}

function envString(name: string): string | undefined {
  const value = process.env[name];
  return value === undefined || value === '' ? undefined : value;
}

function envInt(name: string): number | undefined {
  const value = envString(name);
  return value === undefined ? undefined : Number.parseInt(value, 10);
}

function envFloat(name: string): number | undefined {
  const value = envString(name);
  return value === undefined ? undefined : Number.parseFloat(value);
}

function envBool(name: string): boolean | undefined {
  const value = envString(name);
  return value === undefined ? undefined : ['true', 'yes', '1'].includes(value.toLowerCase());
}

/** Accepts the usual spellings (`INFO`, `WARNING`, `CRITICAL`) as well as pino's. */
export function normalizeLogLevel(value: string): LogLevel {
  const lower = value.toLowerCase();
  const level = lower === 'warning' ? 'warn' : lower === 'critical' ? 'error' : lower;
  if (!isLogLevel(level)) {
    throw new ConfigValidationError(`Unknown log level: ${value}`);
  }
  return level;
}

function loadEnvOverrides(): DeepPartial<ServiceConfig> {
  const timeoutSeconds = envFloat('REQUEST_TIMEOUT');
  const logLevel = envString('LOG_LEVEL');

  return {
    server: {
      host: envString('HOST'),
      port: envInt('PORT'),
      maxConcurrentStreams: envInt('MAX_CONCURRENT_STREAMS') ?? envInt('WORKER_THREADS'),
      tls: {
        enabled: envBool('USE_TLS'),
        certPath: envString('TLS_CERT_PATH'),
        keyPath: envString('TLS_KEY_PATH'),
      },
    },
    gateway: {
      enabled: envBool('GATEWAY_ENABLED'),
      host: envString('GATEWAY_HOST'),
      port: envInt('GATEWAY_PORT'),
    },
    backend: {
      baseUrl: envString('OLLAMA_URL'),
      model: envString('MODEL_NAME'),
      requestTimeoutMs: timeoutSeconds === undefined ? undefined : timeoutSeconds * 1000,
      strictStreaming: envBool('STRICT_STREAMING'),
    },
    defaults: {
      temperature: envFloat('DEFAULT_TEMPERATURE'),
      maxTokens: envInt('DEFAULT_MAX_TOKENS'),
      topP: envFloat('DEFAULT_TOP_P'),
      presencePenalty: envFloat('DEFAULT_PRESENCE_PENALTY'),
      frequencyPenalty: envFloat('DEFAULT_FREQUENCY_PENALTY'),
    },
    logLevel: logLevel === undefined ? undefined : normalizeLogLevel(logLevel),
  };
}

/** defaults ← config file ← environment ← overrides. Not validated; see validateConfig(). */
export function loadConfig(options: LoadConfigOptions = {}): ServiceConfig {
  const cwd = options.cwd ?? process.cwd();
  const fileConfig = loadFileConfig(cwd, options.configPath);
  const envOverrides = loadEnvOverrides();

  let config = deepMerge(DEFAULT_CONFIG, fileConfig);
  config = deepMerge(config, envOverrides);
  if (options.overrides) {
    config = deepMerge(config, options.overrides);
  }
  return config;
}
