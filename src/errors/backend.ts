import { ServiceError } from './base.js';

export type BackendErrorKind =
  | 'timeout'
  | 'connection-failure'
  | 'malformed-response'
  | 'backend-status-error';

export interface BackendErrorDetails {
  statusCode?: number;
  body?: string;
  cause?: unknown;
}

/** A failed exchange with the inference backend. Never carries partial output. */
export class BackendError extends ServiceError {
  public readonly statusCode: number | undefined;
  public readonly body: string | undefined;

  constructor(
    public readonly kind: BackendErrorKind,
    message: string,
    details: BackendErrorDetails = {},
  ) {
    super(message, 'BACKEND_ERROR', details.cause);
    this.statusCode = details.statusCode;
    this.body = details.body;
  }
}
