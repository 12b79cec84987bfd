// packages/core/src/engine/cancellation.ts — Cooperative stop signal for running jobs

export class CancellationToken {
  private cancelled = false;
  private cancelReason: string | null = null;

  /** Signal cancellation. Idempotent: only the first reason is kept. */
  cancel(reason = 'Stopped by request'): void {
    if (this.cancelled) return;
    this.cancelled = true;
    this.cancelReason = reason;
  }

  get isCancelled(): boolean {
    return this.cancelled;
  }

  get reason(): string | null {
    return this.cancelReason;
  }

  /** Throw if already cancelled. Executors call this between items. */
  throwIfCancelled(): void {
    if (this.cancelled) {
      throw new CancellationError(this.cancelReason ?? 'Operation was cancelled');
    }
  }
}

export class CancellationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CancellationError';
  }
}
