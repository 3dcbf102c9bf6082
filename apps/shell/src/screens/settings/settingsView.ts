import type { SettingsState } from './settingsState.js';

export type SettingsView =
  | { kind: 'error'; message: string }
  | { kind: 'loading' }
  | { kind: 'ready'; apiKey: string; isSaving: boolean; canSave: boolean };

// Error wins over loading, so a failed first load still shows the retry view.
export function resolveSettingsView(state: SettingsState): SettingsView {
  if (state.errorMessage !== null) {
    return { kind: 'error', message: state.errorMessage };
  }
  if (state.apiKey === null) {
    return { kind: 'loading' };
  }
  return {
    kind: 'ready',
    apiKey: state.apiKey,
    isSaving: state.isSaving,
    canSave: !state.isSaving,
  };
}

export const API_KEY_NOT_SET_LABEL = '(未設定)';

const VISIBLE_SUFFIX_LENGTH = 4;

const MAX_MASK_LENGTH = 8;

export function maskApiKey(apiKey: string): string {
  if (!apiKey) {
    return API_KEY_NOT_SET_LABEL;
  }
  if (apiKey.length <= VISIBLE_SUFFIX_LENGTH) {
    return '*'.repeat(apiKey.length);
  }
  const hidden = Math.min(apiKey.length - VISIBLE_SUFFIX_LENGTH, MAX_MASK_LENGTH);
  return `${'*'.repeat(hidden)}${apiKey.slice(-VISIBLE_SUFFIX_LENGTH)}`;
}
