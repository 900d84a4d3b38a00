import { status } from '@grpc/grpc-js';
import type { GenerationBackend } from '../backends/generationBackend.js';
import type { Logger } from '../logging/logger.js';
import type { GenerationParameters, GenerationRequest } from '../types/generation.types.js';
import type {
  GenerateRequestMessage,
  GenerateResponseMessage,
  GenerateStreamResponseMessage,
  GenerationParametersMessage,
} from '../types/rpc.types.js';
import { CallAbortedError, CallCancelledError } from '../errors/call.js';

export interface CallContext {
  /** Aborts when the caller goes away. */
  readonly signal?: AbortSignal;
  readonly peer?: string;
}

export type CallState = 'started' | 'streaming' | 'completed' | 'failed' | 'cancelled';

export function resolveParameters(
  input: GenerationParametersMessage | null | undefined,
  defaults: Readonly<GenerationParameters>,
): GenerationParameters {
  return {
    temperature: input?.temperature ?? defaults.temperature,
    maxTokens: input?.max_tokens ?? defaults.maxTokens,
    topP: input?.top_p ?? defaults.topP,
    presencePenalty: input?.presence_penalty ?? defaults.presencePenalty,
    frequencyPenalty: input?.frequency_penalty ?? defaults.frequencyPenalty,
  };
}

export function toGenerationRequest(
  message: GenerateRequestMessage,
  defaults: Readonly<GenerationParameters>,
): GenerationRequest {
  const prompt = message.prompt ?? '';
  if (prompt === '') {
    throw new CallAbortedError(status.INVALID_ARGUMENT, 'prompt must not be empty');
  }
  return Object.freeze({
    prompt,
    parameters: Object.freeze(resolveParameters(message.parameters, defaults)),
  });
}

/**
 * Transport-neutral side of the RPC surface. Each call makes exactly one
 * backend invocation and never retries; failures surface as
 * {@link CallAbortedError} carrying the status the transport should report.
 */
export class GenerationService {
  private readonly logger: Logger;

  constructor(
    private readonly backend: GenerationBackend,
    private readonly defaults: Readonly<GenerationParameters>,
    logger: Logger,
  ) {
    this.logger = logger.child({ component: 'generation-service' });
  }

  async generate(message: GenerateRequestMessage, ctx: CallContext = {}): Promise<GenerateResponseMessage> {
    const request = toGenerationRequest(message, this.defaults);
    this.logger.info({ peer: ctx.peer }, 'Generate call started');

    try {
      const result = await this.backend.generate(request, ctx.signal);
      this.logger.info({ peer: ctx.peer, state: 'completed' }, 'Generate call finished');
      return { text: result.text };
    } catch (err) {
      throw this.abortFor(err, ctx, 'Generate');
    }
  }

  async *generateStream(
    message: GenerateRequestMessage,
    ctx: CallContext = {},
  ): AsyncGenerator<GenerateStreamResponseMessage, void, undefined> {
    const request = toGenerationRequest(message, this.defaults);
    let state: CallState = 'started';
    let emitted = 0;
    this.logger.info({ peer: ctx.peer }, 'GenerateStream call started');

    try {
      for await (const chunk of this.backend.generateStream(request, ctx.signal)) {
        if (ctx.signal?.aborted) {
          state = 'cancelled';
          return;
        }
        state = 'streaming';
        emitted += 1;
        yield { text: chunk.text, is_complete: chunk.isComplete };
        if (chunk.isComplete) break;
      }
      state = ctx.signal?.aborted ? 'cancelled' : 'completed';
    } catch (err) {
      if (err instanceof CallCancelledError || ctx.signal?.aborted) {
        state = 'cancelled';
        return;
      }
      state = 'failed';
      throw this.abortFor(err, ctx, 'GenerateStream');
    } finally {
      this.logger.info({ peer: ctx.peer, state, emitted }, 'GenerateStream call finished');
    }
  }

  private abortFor(err: unknown, ctx: CallContext, method: string): CallAbortedError {
    if (err instanceof CallAbortedError) return err;
    if (err instanceof CallCancelledError || ctx.signal?.aborted) {
      this.logger.info({ peer: ctx.peer, state: 'cancelled' }, `${method} call cancelled`);
      return new CallAbortedError(status.CANCELLED, 'Call cancelled by client', err);
    }
    const message = err instanceof Error ? err.message : String(err);
    this.logger.error({ peer: ctx.peer, state: 'failed' }, `Error in ${method}: ${message}`);
    return new CallAbortedError(status.INTERNAL, `Error generating response: ${message}`, err);
  }
}
