import { LifecycleScope, type ScopedTask } from './lifecycleScope.js';
import { StateStore, type StateListener } from './stateStore.js';

export type Logger = Pick<Console, 'warn' | 'error'>;

export interface ScreenControllerOptions {
  logger?: Logger;
}

export function describeFailure(error: unknown, fallbackMessage: string): string {
  if (error instanceof Error && error.message) {
    return error.message;
  }
  if (typeof error === 'string' && error) {
    return error;
  }
  return fallbackMessage;
}

/**
 * Owns one screen's state cell and the task scope its async intents run in.
 * Subclasses only write state through `updateState`.
 */
export abstract class ScreenController<S> {
  private readonly store: StateStore<S>;

  private readonly scope = new LifecycleScope();

  protected readonly logger: Logger;

  protected constructor(initialState: S, options: ScreenControllerOptions = {}) {
    this.store = new StateStore(initialState);
    this.logger = options.logger ?? console;
  }

  get state(): S {
    return this.store.getState();
  }

  get isActive(): boolean {
    return this.scope.isActive;
  }

  subscribe(listener: StateListener<S>): () => void {
    return this.store.subscribe(listener);
  }

  waitForIdle(): Promise<void> {
    return this.scope.waitForIdle();
  }

  dispose(): void {
    this.scope.close();
    this.store.dispose();
  }

  protected updateState(updater: (current: S) => S): void {
    this.store.update(updater);
  }

  protected launch(task: ScopedTask): Promise<void> {
    return this.scope.launch(task);
  }
}
