import { describe, it, expect, beforeEach, vi } from 'vitest';
import { EventEmitter } from 'node:events';
import { status } from '@grpc/grpc-js';
import type { ServerStatusResponse } from '@grpc/grpc-js/build/src/server-call.js';
import {
  createGenerateHandler,
  createGenerateStreamHandler,
  toServiceStatus,
} from '../../../src/rpc/handlers.js';
import { GenerationService } from '../../../src/service/generationService.js';
import { BackendError } from '../../../src/errors/backend.js';
import { CallAbortedError } from '../../../src/errors/call.js';
import type {
  GenerateRequestMessage,
  GenerateResponseMessage,
  GenerateStreamResponseMessage,
} from '../../../src/types/rpc.types.js';
import { MockGenerationBackend } from '../../fixtures/mockGenerationBackend.js';
import { captureLogger } from '../../fixtures/captureLogger.js';

class FakeUnaryCall extends EventEmitter {
  cancelled = false;

  constructor(readonly request: GenerateRequestMessage) {
    super();
  }

  getPeer(): string {
    return 'ipv4:127.0.0.1:40000';
  }
}

class FakeStreamCall extends FakeUnaryCall {
  written: GenerateStreamResponseMessage[] = [];
  ended = false;
  errors: ServerStatusResponse[] = [];
  /** What write() reports; false simulates a full transport buffer. */
  writable = true;

  constructor(request: GenerateRequestMessage) {
    super(request);
    this.on('error', (error: ServerStatusResponse) => this.errors.push(error));
  }

  write(message: GenerateStreamResponseMessage): boolean {
    this.written.push(message);
    return this.writable;
  }

  end(): void {
    this.ended = true;
  }
}

interface UnaryOutcome {
  err: unknown;
  value: GenerateResponseMessage | null | undefined;
}

function callUnary(
  handler: ReturnType<typeof createGenerateHandler>,
  call: FakeUnaryCall,
): Promise<UnaryOutcome> {
  return new Promise(resolve => {
    handler(call, (err, value) => resolve({ err, value }));
  });
}

describe('toServiceStatus', () => {
  it('keeps the status of a CallAbortedError', () => {
    expect(toServiceStatus(new CallAbortedError(status.INVALID_ARGUMENT, 'prompt must not be empty'))).toEqual({
      code: status.INVALID_ARGUMENT,
      details: 'prompt must not be empty',
    });
  });

  it('maps anything else to INTERNAL', () => {
    expect(toServiceStatus(new Error('boom'))).toEqual({
      code: status.INTERNAL,
      details: 'Error generating response: boom',
    });
  });
});

describe('gRPC handlers', () => {
  let backend: MockGenerationBackend;
  let service: GenerationService;
  const { logger } = captureLogger();

  beforeEach(() => {
    backend = new MockGenerationBackend();
    service = new GenerationService(
      backend,
      { temperature: 0.7, maxTokens: 2048, topP: 0.95, presencePenalty: 0, frequencyPenalty: 0 },
      logger,
    );
  });

  describe('Generate', () => {
    it('answers with the generated text', async () => {
      backend.result = { text: 'Hello!' };
      const handler = createGenerateHandler(service, logger);

      const outcome = await callUnary(handler, new FakeUnaryCall({ prompt: 'Hi' }));

      expect(outcome).toEqual({ err: null, value: { text: 'Hello!' } });
    });

    it('fails with INTERNAL when the backend fails', async () => {
      backend.failWith = new BackendError('backend-status-error', 'Ollama request failed: 500 Internal Server Error');
      const handler = createGenerateHandler(service, logger);

      const outcome = await callUnary(handler, new FakeUnaryCall({ prompt: 'Hi' }));

      expect(outcome.err).toEqual({
        code: status.INTERNAL,
        details: 'Error generating response: Ollama request failed: 500 Internal Server Error',
      });
    });

    it('fails with INVALID_ARGUMENT on an empty prompt', async () => {
      const handler = createGenerateHandler(service, logger);

      const outcome = await callUnary(handler, new FakeUnaryCall({ prompt: '' }));

      expect(outcome.err).toEqual({ code: status.INVALID_ARGUMENT, details: 'prompt must not be empty' });
      expect(backend.requests).toHaveLength(0);
    });

    it('applies request parameters over the defaults', async () => {
      const handler = createGenerateHandler(service, logger);

      await callUnary(
        handler,
        new FakeUnaryCall({ prompt: 'Hi', parameters: { temperature: 0, max_tokens: 32 } }),
      );

      expect(backend.requests[0]?.parameters).toEqual({
        temperature: 0,
        maxTokens: 32,
        topP: 0.95,
        presencePenalty: 0,
        frequencyPenalty: 0,
      });
    });

    it('aborts the backend signal when the client cancels', async () => {
      const handler = createGenerateHandler(service, logger);
      const call = new FakeUnaryCall({ prompt: 'Hi' });

      const outcome = callUnary(handler, call);
      call.cancelled = true;
      call.emit('cancelled');
      await outcome;

      expect(backend.signals[0]?.aborted).toBe(true);
    });
  });

  describe('GenerateStream', () => {
    it('writes every chunk and ends the call', async () => {
      backend.chunks = [
        { text: 'Hi', isComplete: false },
        { text: ' there', isComplete: false },
        { text: '', isComplete: true },
      ];
      const call = new FakeStreamCall({ prompt: 'Hi' });

      createGenerateStreamHandler(service, logger)(call);

      await vi.waitFor(() => expect(call.ended).toBe(true));
      expect(call.written).toEqual([
        { text: 'Hi', is_complete: false },
        { text: ' there', is_complete: false },
        { text: '', is_complete: true },
      ]);
      expect(call.errors).toEqual([]);
    });

    it('emits INTERNAL after the chunks already written when the backend fails', async () => {
      backend.failWith = new BackendError('connection-failure', 'Error communicating with Ollama API: terminated');
      backend.failAfter = 1;
      const call = new FakeStreamCall({ prompt: 'Hi' });

      createGenerateStreamHandler(service, logger)(call);

      await vi.waitFor(() => expect(call.errors).toHaveLength(1));
      expect(call.written).toEqual([{ text: 'mock', is_complete: false }]);
      expect(call.errors[0]).toEqual({
        code: status.INTERNAL,
        details: 'Error generating response: Error communicating with Ollama API: terminated',
      });
      expect(call.ended).toBe(false);
    });

    it('emits INVALID_ARGUMENT on an empty prompt', async () => {
      const call = new FakeStreamCall({});

      createGenerateStreamHandler(service, logger)(call);

      await vi.waitFor(() => expect(call.errors).toHaveLength(1));
      expect(call.errors[0]?.code).toBe(status.INVALID_ARGUMENT);
      expect(call.written).toEqual([]);
    });

    it('waits for drain before writing more', async () => {
      const call = new FakeStreamCall({ prompt: 'Hi' });
      call.writable = false;

      createGenerateStreamHandler(service, logger)(call);

      await vi.waitFor(() => expect(call.written).toHaveLength(1));
      await new Promise(resolve => setTimeout(resolve, 10));
      expect(call.written).toHaveLength(1);

      call.writable = true;
      call.emit('drain');

      await vi.waitFor(() => expect(call.ended).toBe(true));
      expect(call.written).toHaveLength(2);
    });

    it('stops the backend stream and does not end the call after the client cancels', async () => {
      backend.chunks = [
        { text: 'a', isComplete: false },
        { text: 'b', isComplete: false },
        { text: '', isComplete: true },
      ];
      const call = new FakeStreamCall({ prompt: 'Hi' });
      call.writable = false;

      createGenerateStreamHandler(service, logger)(call);
      await vi.waitFor(() => expect(call.written).toHaveLength(1));

      call.cancelled = true;
      call.emit('cancelled');

      await vi.waitFor(() => expect(backend.released).toBe(true));
      expect(call.written).toEqual([{ text: 'a', is_complete: false }]);
      expect(call.ended).toBe(false);
      expect(call.errors).toEqual([]);
      expect(backend.signals[0]?.aborted).toBe(true);
    });
  });
});
