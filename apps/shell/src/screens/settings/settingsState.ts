import type { UserSettings } from '../../data/models/userSettings.js';

/**
 * `apiKey === null` means the stored settings have not been loaded yet.
 */
export type SettingsState = {
  isSaving: boolean;
  apiKey: string | null;
  errorMessage: string | null;
};

export function createInitialSettingsState(): SettingsState {
  return {
    isSaving: false,
    apiKey: null,
    errorMessage: null,
  };
}

export function applyLoadedSettings(state: SettingsState, settings: UserSettings): SettingsState {
  return {
    ...state,
    apiKey: settings.apiKey,
  };
}

export function applyApiKeyInput(state: SettingsState, apiKey: string): SettingsState {
  if (state.apiKey === apiKey) {
    return state;
  }
  return {
    ...state,
    apiKey,
  };
}

export function clearSettingsError(state: SettingsState): SettingsState {
  if (state.errorMessage === null) {
    return state;
  }
  return {
    ...state,
    errorMessage: null,
  };
}

export function beginSaving(state: SettingsState): SettingsState {
  return {
    ...state,
    isSaving: true,
  };
}

export function finishSaving(state: SettingsState): SettingsState {
  return {
    ...state,
    isSaving: false,
  };
}

export function failLoading(state: SettingsState, message: string): SettingsState {
  return {
    ...state,
    errorMessage: message,
  };
}

export function failSaving(state: SettingsState, message: string): SettingsState {
  return {
    ...state,
    isSaving: false,
    errorMessage: message,
  };
}
