// src/core/http/CallScope.ts

import { setTimeout as delay } from 'timers/promises';
import {
  ClientClosedError,
  RequestCancelledError,
  RequestTimeoutError,
  SDKError,
} from '../../utils/errors';

type AbortCause = 'cancelled' | 'timeout' | 'closed';

/**
 * Cancellation scope of one logical call: links the caller's AbortSignal,
 * the overall timeout and the owning client's lifetime into a single signal
 * for every queue wait, send and backoff wait.
 */
export class CallScope {
  readonly deadline?: number;
  private controller = new AbortController();
  private timer?: NodeJS.Timeout;
  private cause?: AbortCause;

  constructor(
    private parent?: AbortSignal,
    private timeoutMs?: number,
    private lifetime?: AbortSignal
  ) {
    this.link(lifetime, 'closed', this.onClose);
    this.link(parent, 'cancelled', this.onParentAbort);

    if (timeoutMs !== undefined && !this.aborted) {
      this.deadline = Date.now() + timeoutMs;
      this.timer = setTimeout(() => this.abort('timeout'), timeoutMs);
    }
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get aborted(): boolean {
    return this.controller.signal.aborted;
  }

  abortError(): SDKError {
    switch (this.cause) {
      case 'closed':
        return new ClientClosedError();
      case 'timeout':
        return new RequestTimeoutError(`Request exceeded ${this.timeoutMs}ms`, {
          timeoutMs: this.timeoutMs,
        });
      default:
        return new RequestCancelledError();
    }
  }

  /**
   * Settle with `promise`, or reject as soon as the scope is aborted. The
   * promise itself keeps running (it may be shared with other calls).
   */
  race<T>(promise: Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const onAbort = () => reject(this.abortError());
      if (this.aborted) onAbort();
      else this.signal.addEventListener('abort', onAbort, { once: true });
      promise.then(
        (value) => {
          this.signal.removeEventListener('abort', onAbort);
          resolve(value);
        },
        (error: unknown) => {
          this.signal.removeEventListener('abort', onAbort);
          reject(error);
        }
      );
    });
  }

  async sleep(ms: number): Promise<void> {
    try {
      await delay(ms, undefined, { signal: this.signal });
    } catch (error: unknown) {
      if (this.aborted) throw this.abortError();
      throw error;
    }
  }

  dispose(): void {
    if (this.timer) clearTimeout(this.timer);
    this.parent?.removeEventListener('abort', this.onParentAbort);
    this.lifetime?.removeEventListener('abort', this.onClose);
  }

  private link(signal: AbortSignal | undefined, cause: AbortCause, listener: () => void): void {
    if (!signal) return;
    if (signal.aborted) this.abort(cause);
    else signal.addEventListener('abort', listener, { once: true });
  }

  private abort(cause: AbortCause): void {
    if (this.aborted) return;
    this.cause = cause;
    if (this.timer) clearTimeout(this.timer);
    this.controller.abort();
  }

  private onParentAbort = (): void => {
    this.abort('cancelled');
  };

  private onClose = (): void => {
    this.abort('closed');
  };
}
