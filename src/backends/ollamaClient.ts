import { z } from 'zod';
import type { BackendConfig } from '../types/config.types.js';
import type {
  GenerationChunk,
  GenerationParameters,
  GenerationRequest,
  GenerationResult,
} from '../types/generation.types.js';
import type { OllamaGenerateRequest, OllamaOptions, ProbeResult } from '../types/ollama.types.js';
import type { GenerationBackend } from './generationBackend.js';
import type { Logger } from '../logging/logger.js';
import { BackendError } from '../errors/backend.js';
import { CallCancelledError } from '../errors/call.js';
import { Exchange } from './exchange.js';
import { LineBuffer } from './lineBuffer.js';
import { decodeGenerateBody, decodeGenerateLine } from './streamDecoder.js';

export type OllamaClientOptions = Pick<
  BackendConfig,
  'baseUrl' | 'model' | 'requestTimeoutMs' | 'probeTimeoutMs' | 'strictStreaming'
>;

const tagsSchema = z.object({
  models: z.array(z.object({ name: z.string() }).passthrough()).default([]),
});

const CALL_LABELS = {
  unary: { what: 'Request', failure: 'Error communicating with Ollama API' },
  stream: { what: 'Streaming request', failure: 'Error in streaming request to Ollama API' },
} as const;

type CallKind = keyof typeof CALL_LABELS;

export function toOllamaOptions(parameters: Readonly<GenerationParameters>): OllamaOptions {
  return {
    temperature: parameters.temperature,
    num_predict: parameters.maxTokens,
    top_p: parameters.topP,
    presence_penalty: parameters.presencePenalty,
    frequency_penalty: parameters.frequencyPenalty,
  };
}

/**
 * HTTP client for an Ollama-compatible `/api/generate` endpoint.
 *
 * All calls share fetch's connection pool; `close()` aborts whatever is
 * still in flight and refuses further calls.
 */
export class OllamaClient implements GenerationBackend {
  private readonly baseUrl: string;
  private readonly model: string;
  private readonly timeoutMs: number;
  private readonly probeTimeoutMs: number;
  private readonly strict: boolean;
  private readonly logger: Logger;
  private readonly inFlight = new Set<Exchange>();
  private closed = false;

  constructor(options: OllamaClientOptions, logger: Logger) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.model = options.model;
    this.timeoutMs = options.requestTimeoutMs;
    this.probeTimeoutMs = options.probeTimeoutMs;
    this.strict = options.strictStreaming;
    this.logger = logger.child({ component: 'ollama-client' });
  }

  /** Builds a client and runs the diagnostic probe once. Never fails on probe results. */
  static async connect(options: OllamaClientOptions, logger: Logger): Promise<OllamaClient> {
    const client = new OllamaClient(options, logger);
    await client.probe();
    return client;
  }

  async probe(): Promise<ProbeResult> {
    let res: Response;
    try {
      res = await fetch(`${this.baseUrl}/api/tags`, {
        signal: AbortSignal.timeout(this.probeTimeoutMs),
      });
    } catch (err) {
      return this.unreachable(err instanceof Error ? err.message : String(err));
    }
    if (!res.ok) {
      return this.unreachable(`${res.status} ${res.statusText}`);
    }

    let models: string[];
    try {
      models = tagsSchema.parse(await res.json()).models.map(m => m.name);
    } catch (err) {
      return this.unreachable(
        `unexpected /api/tags payload: ${err instanceof Error ? err.message : String(err)}`,
      );
    }

    const modelAvailable = models.some(name => name.includes(this.model));
    if (!modelAvailable) {
      this.logger.warn(
        `Model '${this.model}' not found in Ollama. Available models: ${models.join(', ')}`,
      );
      this.logger.info(`Model '${this.model}' will be pulled on first request if needed`);
    }
    return { reachable: true, modelAvailable, models };
  }

  async isAvailable(): Promise<boolean> {
    return (await this.probe()).reachable;
  }

  async generate(request: GenerationRequest, signal?: AbortSignal): Promise<GenerationResult> {
    const body = this.buildRequest(request, false);
    this.logger.debug({ request: body }, 'Sending non-streaming request to Ollama');

    const exchange = this.open(signal);
    try {
      const res = await this.post(body, exchange);
      exchange.arm();
      const raw = await res.text();
      exchange.disarm();

      const decoded = decodeGenerateBody(parseJson(raw));
      if (decoded.type === 'error') {
        throw new BackendError('backend-status-error', `Ollama reported an error: ${decoded.message}`, {
          statusCode: res.status,
          body: raw,
        });
      }
      if (decoded.type === 'malformed') {
        throw new BackendError('malformed-response', `Malformed response from Ollama: ${decoded.reason}`, {
          body: raw,
        });
      }
      this.logger.debug({ length: decoded.text.length }, 'Received response from Ollama');
      return { text: decoded.text };
    } catch (err) {
      throw this.classify(err, exchange, 'unary');
    } finally {
      this.release(exchange);
    }
  }

  async *generateStream(
    request: GenerationRequest,
    signal?: AbortSignal,
  ): AsyncGenerator<GenerationChunk, void, undefined> {
    const body = this.buildRequest(request, true);
    this.logger.debug({ request: body }, 'Sending streaming request to Ollama');

    const exchange = this.open(signal);
    try {
      const res = await this.post(body, exchange);
      if (!res.body) {
        throw new BackendError('malformed-response', 'No response body for stream');
      }

      const reader = res.body.getReader();
      const decoder = new TextDecoder();
      const lines = new LineBuffer();
      let completed = false;

      try {
        while (!completed) {
          exchange.arm();
          const { done, value } = await reader.read();
          exchange.disarm();

          const batch = done
            ? lines.flush(decoder.decode())
            : lines.push(decoder.decode(value, { stream: true }));
          for (const line of batch) {
            const chunk = this.decodeLine(line);
            if (!chunk) continue;
            yield chunk;
            if (chunk.isComplete) {
              completed = true;
              break;
            }
          }
          if (done) break;
        }
      } finally {
        exchange.disarm();
        await reader.cancel().catch((err: unknown) => {
          this.logger.debug({ err }, 'Stream body was already errored when released');
        });
        reader.releaseLock();
      }

      if (!completed) {
        if (this.strict) {
          throw new BackendError('malformed-response', 'Ollama stream ended without a completion chunk');
        }
        this.logger.warn('Ollama stream ended without a completion chunk');
      }
    } catch (err) {
      throw this.classify(err, exchange, 'stream');
    } finally {
      this.release(exchange);
    }
  }

  close(): void {
    this.closed = true;
    for (const exchange of this.inFlight) {
      exchange.abort(new Error('client closed'));
    }
    this.inFlight.clear();
  }

  private buildRequest(request: GenerationRequest, stream: boolean): OllamaGenerateRequest {
    return {
      model: this.model,
      prompt: request.prompt,
      stream,
      options: toOllamaOptions(request.parameters),
    };
  }

  private open(signal: AbortSignal | undefined): Exchange {
    if (this.closed) {
      throw new BackendError('connection-failure', 'Ollama client is closed');
    }
    const exchange = new Exchange(this.timeoutMs, signal);
    this.inFlight.add(exchange);
    return exchange;
  }

  private release(exchange: Exchange): void {
    exchange.dispose();
    this.inFlight.delete(exchange);
  }

  private async post(body: OllamaGenerateRequest, exchange: Exchange): Promise<Response> {
    exchange.arm();
    const res = await fetch(`${this.baseUrl}/api/generate`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
      signal: exchange.signal,
    });
    exchange.disarm();

    if (!res.ok) {
      const text = await res.text().catch((err: unknown) => {
        this.logger.debug({ err }, 'Could not read error body');
        return '';
      });
      throw new BackendError(
        'backend-status-error',
        `Ollama request failed: ${res.status} ${res.statusText}${text ? ` - ${text}` : ''}`,
        { statusCode: res.status, body: text },
      );
    }
    return res;
  }

  private decodeLine(line: string): GenerationChunk | undefined {
    const decoded = decodeGenerateLine(line);
    switch (decoded.type) {
      case 'chunk':
        return decoded.chunk;
      case 'error':
        throw new BackendError('backend-status-error', `Ollama reported an error: ${decoded.message}`);
      case 'malformed':
        if (this.strict) {
          throw new BackendError('malformed-response', `Malformed stream line: ${decoded.reason}`, {
            body: line,
          });
        }
        this.logger.warn(`Error parsing streaming response: ${decoded.reason}`);
        this.logger.debug({ line }, 'Problematic line');
        return undefined;
    }
  }

  private classify(err: unknown, exchange: Exchange, kind: CallKind): Error {
    const { what, failure } = CALL_LABELS[kind];
    if (err instanceof CallCancelledError) return err;
    if (exchange.cancelled) {
      this.logger.info(`${what} to Ollama cancelled by caller`);
      return new CallCancelledError('Call cancelled by client', err);
    }
    if (err instanceof BackendError) {
      this.logger.error(`${what} to Ollama failed: ${err.message}`);
      return err;
    }
    if (exchange.timedOut) {
      const seconds = this.timeoutMs / 1000;
      this.logger.error(`${what} to Ollama timed out after ${seconds}s`);
      return new BackendError('timeout', `${what} to Ollama timed out after ${seconds}s`, { cause: err });
    }
    if (this.closed) {
      return new BackendError('connection-failure', 'Ollama client is closed', { cause: err });
    }
    const message = err instanceof Error ? err.message : String(err);
    this.logger.error(`${failure}: ${message}`);
    return new BackendError('connection-failure', `${failure}: ${message}`, { cause: err });
  }

  private unreachable(reason: string): ProbeResult {
    this.logger.warn(`Could not connect to Ollama API at ${this.baseUrl}: ${reason}`);
    this.logger.info('Proceeding anyway, will retry when handling requests');
    return { reachable: false, modelAvailable: false, models: [] };
  }
}

function parseJson(raw: string): unknown {
  try {
    return JSON.parse(raw) as unknown;
  } catch (err) {
    throw new BackendError(
      'malformed-response',
      `Malformed response from Ollama: ${err instanceof Error ? err.message : String(err)}`,
      { body: raw },
    );
  }
}
