import type {
  NameGenerationResult,
  NameGenerator,
  NameGenerationRequest,
} from '@contents-generator/generation-core';

import type { UserSettings } from '../../../data/models/userSettings.js';
import type { UserSettingsRepository } from '../../../data/settings/userSettingsRepository.js';
import type { Logger } from '../../../state/screenController.js';

export type Deferred<T> = {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (reason: unknown) => void;
};

export function createDeferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => {};
  let reject: (reason: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

export class RecordingLogger implements Logger {
  public readonly warnings: unknown[][] = [];

  public readonly errors: unknown[][] = [];

  warn(...args: unknown[]): void {
    this.warnings.push(args);
  }

  error(...args: unknown[]): void {
    this.errors.push(args);
  }
}

export class FakeUserSettingsRepository implements UserSettingsRepository {
  public loadCalls = 0;

  public readonly saveCalls: string[] = [];

  public loadFailure?: unknown;

  public saveFailure?: unknown;

  public loadGate?: Promise<void>;

  public saveGate?: Promise<void>;

  public onSave?: (apiKey: string) => void;

  constructor(public stored: UserSettings = { apiKey: '' }) {}

  async getUserSettings(): Promise<UserSettings> {
    this.loadCalls += 1;
    if (this.loadGate) {
      await this.loadGate;
    }
    if (this.loadFailure !== undefined) {
      throw this.loadFailure;
    }
    return { ...this.stored };
  }

  async saveUserSettings(apiKey: string): Promise<void> {
    this.saveCalls.push(apiKey);
    this.onSave?.(apiKey);
    if (this.saveGate) {
      await this.saveGate;
    }
    if (this.saveFailure !== undefined) {
      throw this.saveFailure;
    }
    this.stored = { apiKey };
  }
}

export class StubNameGenerator implements NameGenerator {
  public readonly requests: Array<{ prompt: string; signal?: AbortSignal }> = [];

  constructor(private readonly respond: (prompt: string) => Promise<NameGenerationResult>) {}

  generate(request: NameGenerationRequest, signal?: AbortSignal): Promise<NameGenerationResult> {
    this.requests.push({ prompt: request.prompt, signal });
    return this.respond(request.prompt);
  }
}
