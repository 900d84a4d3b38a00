import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { loadConfig, normalizeLogLevel } from '../../../src/config/loader.js';
import { DEFAULT_CONFIG } from '../../../src/config/defaults.js';
import { ConfigValidationError } from '../../../src/config/validator.js';

const ENV_NAMES = [
  'HOST',
  'PORT',
  'MAX_CONCURRENT_STREAMS',
  'WORKER_THREADS',
  'USE_TLS',
  'TLS_CERT_PATH',
  'TLS_KEY_PATH',
  'GATEWAY_ENABLED',
  'GATEWAY_HOST',
  'GATEWAY_PORT',
  'OLLAMA_URL',
  'MODEL_NAME',
  'REQUEST_TIMEOUT',
  'STRICT_STREAMING',
  'DEFAULT_TEMPERATURE',
  'DEFAULT_MAX_TOKENS',
  'DEFAULT_TOP_P',
  'DEFAULT_PRESENCE_PENALTY',
  'DEFAULT_FREQUENCY_PENALTY',
  'LOG_LEVEL',
];

describe('loadConfig', () => {
  let cwd: string;

  beforeEach(() => {
    // Empty values count as unset.
    for (const name of ENV_NAMES) vi.stubEnv(name, '');
    cwd = mkdtempSync(join(tmpdir(), 'textgen-bridge-config-'));
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    rmSync(cwd, { recursive: true, force: true });
  });

  it('returns the defaults when nothing is configured', () => {
    expect(loadConfig({ cwd })).toEqual(DEFAULT_CONFIG);
  });

  it('does not mutate the defaults', () => {
    vi.stubEnv('PORT', '6000');
    loadConfig({ cwd });
    expect(DEFAULT_CONFIG.server.port).toBe(50051);
  });

  it('reads server settings from the environment', () => {
    vi.stubEnv('HOST', '127.0.0.1');
    vi.stubEnv('PORT', '6000');
    vi.stubEnv('MAX_CONCURRENT_STREAMS', '32');
    vi.stubEnv('USE_TLS', 'yes');
    vi.stubEnv('TLS_CERT_PATH', '/certs/server.crt');
    vi.stubEnv('TLS_KEY_PATH', '/certs/server.key');

    const config = loadConfig({ cwd });

    expect(config.server).toEqual({
      host: '127.0.0.1',
      port: 6000,
      maxConcurrentStreams: 32,
      tls: { enabled: true, certPath: '/certs/server.crt', keyPath: '/certs/server.key' },
    });
  });

  it('accepts WORKER_THREADS as the concurrency limit', () => {
    vi.stubEnv('WORKER_THREADS', '4');
    expect(loadConfig({ cwd }).server.maxConcurrentStreams).toBe(4);
  });

  it('reads backend settings and converts the timeout from seconds', () => {
    vi.stubEnv('OLLAMA_URL', 'http://ollama:11434');
    vi.stubEnv('MODEL_NAME', 'mistral');
    vi.stubEnv('REQUEST_TIMEOUT', '45');
    vi.stubEnv('STRICT_STREAMING', 'TRUE');

    const config = loadConfig({ cwd });

    expect(config.backend).toEqual({
      baseUrl: 'http://ollama:11434',
      model: 'mistral',
      requestTimeoutMs: 45_000,
      probeTimeoutMs: 5_000,
      strictStreaming: true,
    });
  });

  it('reads default generation parameters from the environment', () => {
    vi.stubEnv('DEFAULT_TEMPERATURE', '0.2');
    vi.stubEnv('DEFAULT_MAX_TOKENS', '256');

    const config = loadConfig({ cwd });

    expect(config.defaults.temperature).toBe(0.2);
    expect(config.defaults.maxTokens).toBe(256);
    expect(config.defaults.topP).toBe(0.95);
  });

  it('treats anything but true, yes or 1 as false', () => {
    vi.stubEnv('USE_TLS', 'no');
    expect(loadConfig({ cwd }).server.tls.enabled).toBe(false);
  });

  it('normalises LOG_LEVEL', () => {
    vi.stubEnv('LOG_LEVEL', 'WARNING');
    expect(loadConfig({ cwd }).logLevel).toBe('warn');
  });

  it('reads a config file from the working directory', () => {
    writeFileSync(
      join(cwd, 'textgen-bridge.config.json'),
      JSON.stringify({ backend: { model: 'mistral' }, gateway: { enabled: true } }),
    );

    const config = loadConfig({ cwd });

    expect(config.backend.model).toBe('mistral');
    expect(config.backend.baseUrl).toBe('http://localhost:11434');
    expect(config.gateway).toEqual({ enabled: true, host: '127.0.0.1', port: 8080 });
  });

  it('falls back to the dotfile name', () => {
    writeFileSync(join(cwd, '.textgen-bridge.json'), JSON.stringify({ logLevel: 'debug' }));
    expect(loadConfig({ cwd }).logLevel).toBe('debug');
  });

  it('reads an explicit config path relative to cwd', () => {
    writeFileSync(join(cwd, 'custom.json'), JSON.stringify({ server: { port: 7000 } }));
    expect(loadConfig({ cwd, configPath: 'custom.json' }).server.port).toBe(7000);
  });

  it('lets the environment win over the file and overrides win over both', () => {
    writeFileSync(
      join(cwd, 'textgen-bridge.config.json'),
      JSON.stringify({ backend: { model: 'mistral' }, server: { port: 7000 } }),
    );
    vi.stubEnv('MODEL_NAME', 'phi3');
    vi.stubEnv('PORT', '7001');

    const config = loadConfig({ cwd, overrides: { server: { port: 7002 } } });

    expect(config.backend.model).toBe('phi3');
    expect(config.server.port).toBe(7002);
  });

  it('rejects unknown keys in the file', () => {
    writeFileSync(join(cwd, 'textgen-bridge.config.json'), JSON.stringify({ bogus: true }));

    expect(() => loadConfig({ cwd })).toThrow(ConfigValidationError);
    expect(() => loadConfig({ cwd })).toThrow(/at \(root\): Unrecognized key/);
  });

  it('names the offending field on a type mismatch', () => {
    writeFileSync(join(cwd, 'textgen-bridge.config.json'), JSON.stringify({ server: { port: '80' } }));

    expect(() => loadConfig({ cwd })).toThrow(/at server\.port: Expected number, received string$/);
  });

  it('reports a file that is not JSON', () => {
    writeFileSync(join(cwd, 'textgen-bridge.config.json'), '{ not json');

    expect(() => loadConfig({ cwd })).toThrow(/^Failed to load configuration from /);
  });

  it('reports a missing explicit config file', () => {
    expect(() => loadConfig({ cwd, configPath: 'missing.json' })).toThrow(ConfigValidationError);
  });
});

describe('normalizeLogLevel', () => {
  it('maps common aliases onto pino levels', () => {
    expect(normalizeLogLevel('INFO')).toBe('info');
    expect(normalizeLogLevel('critical')).toBe('error');
  });

  it('rejects unknown levels', () => {
    expect(() => normalizeLogLevel('verbose')).toThrow('Unknown log level: verbose');
  });
});
