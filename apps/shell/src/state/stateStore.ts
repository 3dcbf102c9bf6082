export type StateListener<T> = (state: T) => void;

/**
 * Single observable state cell. Every write replaces the whole snapshot, so
 * listeners never see a partially updated value.
 */
export class StateStore<T> {
  private state: T;

  private readonly listeners = new Set<StateListener<T>>();

  private disposed = false;

  constructor(initialState: T) {
    this.state = initialState;
  }

  getState(): T {
    return this.state;
  }

  setState(next: T): void {
    if (this.disposed || this.state === next) {
      return;
    }
    this.state = next;
    this.listeners.forEach((listener) => listener(this.state));
  }

  update(updater: (current: T) => T): void {
    this.setState(updater(this.state));
  }

  subscribe(listener: StateListener<T>): () => void {
    if (this.disposed) {
      listener(this.state);
      return () => {};
    }
    this.listeners.add(listener);
    listener(this.state);
    return () => {
      this.listeners.delete(listener);
    };
  }

  dispose(): void {
    this.disposed = true;
    this.listeners.clear();
  }
}
