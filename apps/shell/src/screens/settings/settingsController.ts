import type { UserSettings } from '../../data/models/userSettings.js';
import type { UserSettingsRepository } from '../../data/settings/userSettingsRepository.js';
import {
  ScreenController,
  describeFailure,
  type ScreenControllerOptions,
} from '../../state/screenController.js';
import {
  applyApiKeyInput,
  applyLoadedSettings,
  beginSaving,
  clearSettingsError,
  createInitialSettingsState,
  failLoading,
  failSaving,
  finishSaving,
  type SettingsState,
} from './settingsState.js';

export class SettingsController extends ScreenController<SettingsState> {
  constructor(
    private readonly repository: UserSettingsRepository,
    options: ScreenControllerOptions = {},
  ) {
    super(createInitialSettingsState(), options);
  }

  /**
   * Loads the stored settings. Runs once per call; callers decide when a
   * screen entry needs it.
   */
  initialize(): Promise<void> {
    return this.launch(async (signal) => {
      let settings: UserSettings;
      try {
        settings = await this.repository.getUserSettings();
      } catch (error) {
        if (signal.aborted) {
          return;
        }
        this.logger.warn('[settings] failed to load user settings', error);
        const message = describeFailure(error, '設定の読み込みに失敗しました');
        this.updateState((state) => failLoading(state, message));
        return;
      }

      if (signal.aborted) {
        return;
      }
      this.updateState((state) => applyLoadedSettings(state, settings));
    });
  }

  updateApiKey(apiKey: string): void {
    this.updateState((state) => applyApiKeyInput(state, apiKey));
  }

  retry(): void {
    this.updateState(clearSettingsError);
  }

  /**
   * Persists the current api key. `onFinished` runs only after a successful
   * save, once `isSaving` is back to false.
   */
  saveSettings(onFinished: () => void = () => {}): Promise<void> {
    return this.launch(async (signal) => {
      this.updateState(beginSaving);
      const apiKey = this.state.apiKey ?? '';

      try {
        await this.repository.saveUserSettings(apiKey);
      } catch (error) {
        if (signal.aborted) {
          return;
        }
        this.logger.warn('[settings] failed to save user settings', error);
        const message = describeFailure(error, '設定の保存に失敗しました');
        this.updateState((state) => failSaving(state, message));
        return;
      }

      if (signal.aborted) {
        return;
      }
      this.updateState(finishSaving);
      onFinished();
    });
  }
}
