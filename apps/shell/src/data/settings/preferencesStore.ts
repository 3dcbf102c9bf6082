import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { z } from 'zod';

export type Preferences = Readonly<Record<string, string>>;

export type PreferencesTransform = (current: Preferences) => Preferences;

const PreferencesSchema = z.record(z.string(), z.string());

export interface PreferencesStoreBackend {
  read(): Promise<Preferences>;
  edit(transform: PreferencesTransform): Promise<Preferences>;
}

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * One preferences namespace kept as a flat JSON object on disk.
 * Reads and edits run one at a time in call order.
 */
export class JsonFilePreferencesStore implements PreferencesStoreBackend {
  private readonly filePath: string;

  private tail: Promise<unknown> = Promise.resolve();

  constructor(namespace: string, directory: string) {
    this.filePath = path.join(directory, `${namespace}.preferences.json`);
  }

  getPath(): string {
    return this.filePath;
  }

  read(): Promise<Preferences> {
    return this.enqueue(() => this.load());
  }

  edit(transform: PreferencesTransform): Promise<Preferences> {
    return this.enqueue(async () => {
      const next = transform(await this.load());
      await this.persist(next);
      return next;
    });
  }

  private enqueue<T>(operation: () => Promise<T>): Promise<T> {
    const result = this.tail.then(operation);
    this.tail = result.catch(() => undefined);
    return result;
  }

  private async load(): Promise<Preferences> {
    let content: string;
    try {
      content = await readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isMissingFileError(error)) {
        return {};
      }
      throw error;
    }

    const parsed = PreferencesSchema.safeParse(JSON.parse(content));
    if (!parsed.success) {
      throw new Error(`Preferences file is malformed: ${this.filePath}`);
    }
    return parsed.data;
  }

  private async persist(preferences: Preferences): Promise<void> {
    await mkdir(path.dirname(this.filePath), { recursive: true });
    const tempPath = `${this.filePath}.${process.pid}.tmp`;
    await writeFile(tempPath, JSON.stringify(preferences, null, 2), 'utf-8');
    await rename(tempPath, this.filePath);
  }
}
