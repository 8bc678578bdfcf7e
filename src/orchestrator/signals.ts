export type ResumeOutcome = 'resumed' | 'cancelled';

/**
 * Pause and cancel flags shared between the manager (writer) and the
 * controller (reader). Cancel is one-way for the lifetime of a run and is
 * exposed as an `AbortSignal` so in-flight waits wake immediately.
 */
export class RunSignals {
  private paused = false;
  private abort = new AbortController();
  private resumeWaiters: Array<() => void> = [];

  get pauseRequested(): boolean {
    return this.paused;
  }

  get cancelRequested(): boolean {
    return this.abort.signal.aborted;
  }

  get cancelSignal(): AbortSignal {
    return this.abort.signal;
  }

  requestPause(): void {
    this.paused = true;
  }

  clearPause(): void {
    this.paused = false;
    const waiters = this.resumeWaiters;
    this.resumeWaiters = [];
    waiters.forEach((wake) => wake());
  }

  requestCancel(): void {
    this.abort.abort();
  }

  /** Suspends while paused; cancel wins over a simultaneous resume */
  waitForResumeOrCancel(): Promise<ResumeOutcome> {
    if (this.cancelRequested) return Promise.resolve('cancelled');
    if (!this.paused) return Promise.resolve('resumed');

    return new Promise((resolve) => {
      const onCancel = (): void => resolve('cancelled');
      this.abort.signal.addEventListener('abort', onCancel, { once: true });
      this.resumeWaiters.push(() => {
        this.abort.signal.removeEventListener('abort', onCancel);
        resolve(this.cancelRequested ? 'cancelled' : 'resumed');
      });
    });
  }
}
