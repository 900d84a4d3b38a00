import { status } from '@grpc/grpc-js';
import { ServiceError } from './base.js';

/** The caller went away; the exchange was torn down on its behalf. */
export class CallCancelledError extends ServiceError {
  constructor(message = 'Call cancelled by client', cause?: unknown) {
    super(message, 'CANCELLED', cause);
  }
}

/**
 * Terminal failure of an inbound call, carrying the gRPC status the
 * transport should report.
 */
export class CallAbortedError extends ServiceError {
  constructor(
    public readonly status: status,
    message: string,
    cause?: unknown,
  ) {
    super(message, 'CALL_ABORTED', cause);
  }
}
