export type ScopedTask = (signal: AbortSignal) => Promise<void>;

/**
 * Task scope tied to the lifetime of a controller. Closing the scope aborts
 * its signal; tasks check the signal before delivering results.
 */
export class LifecycleScope {
  private readonly controller = new AbortController();

  private readonly running = new Set<Promise<void>>();

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get isActive(): boolean {
    return !this.controller.signal.aborted;
  }

  launch(task: ScopedTask): Promise<void> {
    if (!this.isActive) {
      return Promise.resolve();
    }

    const execution = task(this.controller.signal);
    this.running.add(execution);
    const forget = () => {
      this.running.delete(execution);
    };
    execution.then(forget, forget);
    return execution;
  }

  async waitForIdle(): Promise<void> {
    while (this.running.size > 0) {
      await Promise.allSettled([...this.running]);
    }
  }

  close(): void {
    this.controller.abort();
  }
}
