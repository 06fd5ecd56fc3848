// packages/core/src/engine/cancellation.ts — Build cancellation support

export class CancellationToken {
  private cancelled = false;
  private cancelReason: string | null = null;
  private callbacks = new Set<() => void>();
  private controller: AbortController | null = null;

  /** Signal cancellation. Idempotent; only the first reason is kept. */
  cancel(reason = 'Build was cancelled'): void {
    if (this.cancelled) return;
    this.cancelled = true;
    this.cancelReason = reason;
    for (const cb of [...this.callbacks]) {
      try {
        cb();
      } catch {
        // Callback errors must not stop the remaining callbacks
      }
    }
    this.callbacks.clear();
  }

  get isCancelled(): boolean {
    return this.cancelled;
  }

  get reason(): string | null {
    return this.cancelReason;
  }

  /** AbortSignal view of this token, for APIs that take one. */
  get signal(): AbortSignal {
    if (!this.controller) {
      const controller = new AbortController();
      this.controller = controller;
      this.onCancel(() => controller.abort());
    }
    return this.controller.signal;
  }

  /** Throw if already cancelled. Call at phase boundaries. */
  throwIfCancelled(): void {
    if (this.cancelled) {
      throw new CancellationError(this.cancelReason ?? 'Build was cancelled');
    }
  }

  /**
   * Register a callback to run on cancellation. Returns a disposer.
   * If already cancelled, the callback fires immediately.
   */
  onCancel(callback: () => void): () => void {
    if (this.cancelled) {
      callback();
      return () => {};
    }
    this.callbacks.add(callback);
    return () => {
      this.callbacks.delete(callback);
    };
  }

  /**
   * Resolve after `ms` unless cancelled first.
   * Returns true if the sleep completed, false if cancelled.
   */
  sleep(ms: number): Promise<boolean> {
    return new Promise((resolve) => {
      if (this.cancelled) {
        resolve(false);
        return;
      }
      const timer = setTimeout(() => {
        dispose();
        resolve(true);
      }, ms);
      const dispose = this.onCancel(() => {
        clearTimeout(timer);
        resolve(false);
      });
    });
  }
}

export class CancellationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CancellationError';
  }
}
