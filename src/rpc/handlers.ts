import { status, type sendUnaryData } from '@grpc/grpc-js';
import type { ServerStatusResponse } from '@grpc/grpc-js/build/src/server-call.js';
import type { GenerationService } from '../service/generationService.js';
import type { Logger } from '../logging/logger.js';
import type {
  GenerateRequestMessage,
  GenerateResponseMessage,
  GenerateStreamResponseMessage,
} from '../types/rpc.types.js';
import { CallAbortedError } from '../errors/call.js';

// The parts of grpc-js server calls the handlers rely on. ServerUnaryCall and
// ServerWritableStream satisfy these structurally.

export interface InboundCall<RequestType> {
  readonly request: RequestType;
  readonly cancelled: boolean;
  getPeer(): string;
  on(event: 'cancelled', listener: () => void): unknown;
}

export interface OutboundStream<RequestType, ResponseType> extends InboundCall<RequestType> {
  write(message: ResponseType): boolean;
  once(event: 'drain' | 'cancelled', listener: () => void): unknown;
  removeListener(event: 'drain' | 'cancelled', listener: () => void): unknown;
  end(): void;
  emit(event: 'error', error: ServerStatusResponse): boolean;
}

export function toServiceStatus(err: unknown): ServerStatusResponse {
  if (err instanceof CallAbortedError) {
    return { code: err.status, details: err.message };
  }
  const message = err instanceof Error ? err.message : String(err);
  return { code: status.INTERNAL, details: `Error generating response: ${message}` };
}

function linkCancellation(call: InboundCall<unknown>): AbortController {
  const controller = new AbortController();
  if (call.cancelled) {
    controller.abort();
  } else {
    call.on('cancelled', () => controller.abort());
  }
  return controller;
}

function drained(call: OutboundStream<unknown, unknown>): Promise<void> {
  return new Promise(resolve => {
    const settle = (): void => {
      call.removeListener('drain', settle);
      call.removeListener('cancelled', settle);
      resolve();
    };
    call.once('drain', settle);
    call.once('cancelled', settle);
  });
}

export function createGenerateHandler(service: GenerationService, logger: Logger) {
  return (
    call: InboundCall<GenerateRequestMessage>,
    callback: sendUnaryData<GenerateResponseMessage>,
  ): void => {
    const controller = linkCancellation(call);
    void service
      .generate(call.request, { signal: controller.signal, peer: call.getPeer() })
      .then(
        response => callback(null, response),
        (err: unknown) => {
          const serviceStatus = toServiceStatus(err);
          logger.debug({ code: serviceStatus.code }, 'Generate aborted');
          callback(serviceStatus);
        },
      );
  };
}

export function createGenerateStreamHandler(service: GenerationService, logger: Logger) {
  return (call: OutboundStream<GenerateRequestMessage, GenerateStreamResponseMessage>): void => {
    const controller = linkCancellation(call);
    const messages = service.generateStream(call.request, {
      signal: controller.signal,
      peer: call.getPeer(),
    });
    void pump(messages, call, logger);
  };
}

async function pump(
  messages: AsyncIterable<GenerateStreamResponseMessage>,
  call: OutboundStream<GenerateRequestMessage, GenerateStreamResponseMessage>,
  logger: Logger,
): Promise<void> {
  try {
    for await (const message of messages) {
      if (call.cancelled) break;
      if (!call.write(message)) {
        await drained(call);
      }
    }
    if (call.cancelled) {
      logger.debug('GenerateStream cancelled by client');
      return;
    }
    call.end();
  } catch (err) {
    if (call.cancelled) {
      logger.debug({ err }, 'GenerateStream failed after client cancelled');
      return;
    }
    const serviceStatus = toServiceStatus(err);
    logger.debug({ code: serviceStatus.code }, 'GenerateStream aborted');
    // grpc-js turns an 'error' event into the call's final status.
    call.emit('error', serviceStatus);
  }
}
