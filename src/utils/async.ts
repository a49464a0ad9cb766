/**
 * Async Utility Functions
 *
 * Bounded concurrency and cooperative cancellation for the extraction stage.
 *
 * @module
 */

// =============================================================================
// Cancellation
// =============================================================================

/**
 * A token that can be used to cancel async operations.
 * Follows the cancellation token pattern for cooperative cancellation.
 */
export class CancellationToken {
  private _cancelled = false;
  private _reason?: string;
  private listeners: Array<() => void> = [];

  /** Whether the token has been cancelled */
  get cancelled(): boolean {
    return this._cancelled;
  }

  /** The reason for cancellation (if any) */
  get reason(): string | undefined {
    return this._reason;
  }

  /**
   * Cancels the token, notifying all listeners.
   */
  cancel(reason?: string): void {
    if (!this._cancelled) {
      this._cancelled = true;
      this._reason = reason;
      this.listeners.forEach((fn) => fn());
      this.listeners = [];
    }
  }

  /**
   * Registers a callback to be called when the token is cancelled.
   * If already cancelled, the callback is invoked immediately.
   *
   * @returns Unsubscribe function
   */
  onCancel(fn: () => void): () => void {
    if (this._cancelled) {
      fn();
      return () => {};
    }
    this.listeners.push(fn);
    return () => {
      const idx = this.listeners.indexOf(fn);
      if (idx >= 0) this.listeners.splice(idx, 1);
    };
  }
}

/**
 * Owns a CancellationToken; optionally cancels it after a deadline.
 */
export class CancellationTokenSource {
  readonly token: CancellationToken;
  private timer: ReturnType<typeof setTimeout> | null = null;

  constructor() {
    this.token = new CancellationToken();
  }

  cancel(reason?: string): void {
    this.clearTimer();
    this.token.cancel(reason);
  }

  /**
   * Schedules cancellation after `ms` milliseconds. The timer does not keep
   * the process alive.
   */
  cancelAfter(ms: number, reason = `Timed out after ${ms}ms`): void {
    this.clearTimer();
    this.timer = setTimeout(() => this.token.cancel(reason), ms);
    this.timer.unref();
  }

  /**
   * Clears any pending deadline. Call once the guarded work has finished.
   */
  dispose(): void {
    this.clearTimer();
  }

  private clearTimer(): void {
    if (this.timer !== null) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }
}

// =============================================================================
// Concurrency Utilities
// =============================================================================

/**
 * Runs an async function over items with a concurrency limit.
 * Results keep the order of `items`, whatever order the calls finish in.
 *
 * @param concurrency - Maximum concurrent operations (at least 1)
 */
export async function mapConcurrent<T, U>(
  items: readonly T[],
  fn: (item: T, index: number) => Promise<U>,
  concurrency: number
): Promise<U[]> {
  const results: U[] = new Array<U>(items.length);
  const entries = Array.from(items.entries());
  let cursor = 0;

  async function worker(): Promise<void> {
    while (cursor < entries.length) {
      const entry = entries[cursor++];
      if (entry === undefined) return;
      const [index, item] = entry;
      results[index] = await fn(item, index);
    }
  }

  const workers = Array.from({ length: Math.max(1, Math.min(concurrency, items.length)) }, () =>
    worker()
  );

  await Promise.all(workers);
  return results;
}
