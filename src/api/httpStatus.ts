import { status } from '@grpc/grpc-js';
import { CallAbortedError } from '../errors/call.js';

const HTTP_STATUS: Partial<Record<status, number>> = {
  [status.INVALID_ARGUMENT]: 400,
  [status.CANCELLED]: 499,
  [status.DEADLINE_EXCEEDED]: 504,
  [status.UNAVAILABLE]: 503,
  [status.INTERNAL]: 500,
};

export function httpStatusFor(code: status): number {
  return HTTP_STATUS[code] ?? 500;
}

/** Normalises anything thrown by the service into a status code and message. */
export function describeFailure(err: unknown): { code: status; message: string } {
  if (err instanceof CallAbortedError) {
    return { code: err.status, message: err.message };
  }
  const message = err instanceof Error ? err.message : String(err);
  return { code: status.INTERNAL, message: `Error generating response: ${message}` };
}
