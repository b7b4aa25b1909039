import { CancellationError } from '../../types/index.js';
import type { RequestId } from '../../types/jsonrpc.js';

/**
 * One-shot cancellation signal bound to a single request.
 *
 * Cancellation is cooperative: handlers observe it through `isCancelled`,
 * `throwIfCancelled()`, the `signal` (for APIs that take an AbortSignal) or
 * by awaiting `onCancel`.
 */
export class CancellationToken {
  private readonly controller = new AbortController();
  private readonly resolveCancel: () => void;
  readonly onCancel: Promise<void>;

  constructor(readonly requestId?: RequestId) {
    let resolve: () => void = () => undefined;
    this.onCancel = new Promise<void>((r) => {
      resolve = r;
    });
    this.resolveCancel = resolve;
  }

  get isCancelled(): boolean {
    return this.controller.signal.aborted;
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  /** Idempotent */
  cancel(): void {
    if (this.isCancelled) {
      return;
    }
    this.controller.abort(new CancellationError(this.requestId));
    this.resolveCancel();
  }

  throwIfCancelled(): void {
    if (this.isCancelled) {
      throw new CancellationError(this.requestId);
    }
  }
}

/**
 * Live tokens of in-flight requests, keyed by request id
 */
export class CancellationRegistry {
  private readonly tokens = new Map<RequestId, CancellationToken>();

  register(requestId: RequestId, token: CancellationToken): void {
    this.tokens.set(requestId, token);
  }

  /**
   * Signal and forget the token. Unknown ids are ignored: the request may
   * have completed already. Returns whether a token was found.
   */
  cancel(requestId: RequestId): boolean {
    const token = this.tokens.get(requestId);
    if (!token) {
      return false;
    }
    this.tokens.delete(requestId);
    token.cancel();
    return true;
  }

  remove(requestId: RequestId): void {
    this.tokens.delete(requestId);
  }

  get(requestId: RequestId): CancellationToken | undefined {
    return this.tokens.get(requestId);
  }

  has(requestId: RequestId): boolean {
    return this.tokens.has(requestId);
  }

  get size(): number {
    return this.tokens.size;
  }

  /** Cancel every live token; returns how many there were */
  cancelAll(): number {
    const tokens = [...this.tokens.values()];
    this.tokens.clear();
    for (const token of tokens) {
      token.cancel();
    }
    return tokens.length;
  }
}
