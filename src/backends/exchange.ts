/**
 * One HTTP exchange with the backend: an abort handle tied to the caller's
 * signal, plus a deadline that only runs while the exchange is waiting on
 * the backend (headers, body reads). Time spent by the consumer between
 * reads is not counted.
 */
export class Exchange {
  private readonly controller = new AbortController();
  private timer: NodeJS.Timeout | undefined;
  private expired = false;
  private readonly onCallerAbort = (): void => {
    this.disarm();
    this.controller.abort(this.callerSignal?.reason);
  };

  constructor(
    private readonly timeoutMs: number,
    private readonly callerSignal?: AbortSignal,
  ) {
    if (callerSignal?.aborted) {
      this.controller.abort(callerSignal.reason);
    } else {
      callerSignal?.addEventListener('abort', this.onCallerAbort, { once: true });
    }
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get timedOut(): boolean {
    return this.expired;
  }

  get cancelled(): boolean {
    return this.callerSignal?.aborted === true;
  }

  /** Starts (or restarts) the deadline before a wait on the backend. */
  arm(): void {
    this.disarm();
    this.timer = setTimeout(() => {
      this.expired = true;
      this.controller.abort(new Error(`deadline of ${this.timeoutMs}ms exceeded`));
    }, this.timeoutMs);
  }

  disarm(): void {
    if (this.timer !== undefined) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
  }

  abort(reason?: unknown): void {
    this.disarm();
    this.controller.abort(reason);
  }

  /** Drops the timer and the caller-signal listener. Safe to call twice. */
  dispose(): void {
    this.disarm();
    this.callerSignal?.removeEventListener('abort', this.onCallerAbort);
  }
}
