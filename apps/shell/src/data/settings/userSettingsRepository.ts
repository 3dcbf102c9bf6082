import { StorageError } from '../errors.js';
import { createDefaultUserSettings, type UserSettings } from '../models/userSettings.js';
import { JsonFilePreferencesStore, type PreferencesStoreBackend } from './preferencesStore.js';

export const USER_SETTINGS_NAMESPACE = 'user_settings';

export const API_KEY_PREFERENCE = 'api_key';

/**
 * Persistence boundary for the settings screen.
 *
 * Both operations reject with `StorageError` when the underlying store fails.
 * `saveUserSettings` accepts any string, including the empty string.
 */
export interface UserSettingsRepository {
  getUserSettings(): Promise<UserSettings>;
  saveUserSettings(apiKey: string): Promise<void>;
}

function toStorageError(error: unknown, fallbackMessage: string): StorageError {
  if (error instanceof StorageError) {
    return error;
  }
  const message = error instanceof Error && error.message ? error.message : fallbackMessage;
  return new StorageError(message, { cause: error });
}

export class PreferencesUserSettingsRepository implements UserSettingsRepository {
  constructor(private readonly store: PreferencesStoreBackend) {}

  async getUserSettings(): Promise<UserSettings> {
    try {
      const preferences = await this.store.read();
      return {
        ...createDefaultUserSettings(),
        apiKey: preferences[API_KEY_PREFERENCE] ?? '',
      };
    } catch (error) {
      throw toStorageError(error, '設定の読み込みに失敗しました');
    }
  }

  async saveUserSettings(apiKey: string): Promise<void> {
    try {
      await this.store.edit((current) => ({
        ...current,
        [API_KEY_PREFERENCE]: apiKey,
      }));
    } catch (error) {
      throw toStorageError(error, '設定の保存に失敗しました');
    }
  }
}

export function createUserSettingsRepository(directory: string): UserSettingsRepository {
  return new PreferencesUserSettingsRepository(
    new JsonFilePreferencesStore(USER_SETTINGS_NAMESPACE, directory),
  );
}
