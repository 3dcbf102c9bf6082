export { StorageError } from './data/errors.js';
export { createDefaultUserSettings, type UserSettings } from './data/models/userSettings.js';
export {
  JsonFilePreferencesStore,
  type Preferences,
  type PreferencesStoreBackend,
  type PreferencesTransform,
} from './data/settings/preferencesStore.js';
export { resolveDataDirectory } from './data/settings/settingsPaths.js';
export {
  API_KEY_PREFERENCE,
  PreferencesUserSettingsRepository,
  USER_SETTINGS_NAMESPACE,
  createUserSettingsRepository,
  type UserSettingsRepository,
} from './data/settings/userSettingsRepository.js';
export { LifecycleScope, type ScopedTask } from './state/lifecycleScope.js';
export { StateStore, type StateListener } from './state/stateStore.js';
export {
  ScreenController,
  describeFailure,
  type Logger,
  type ScreenControllerOptions,
} from './state/screenController.js';
export { SettingsController } from './screens/settings/settingsController.js';
export type { SettingsState } from './screens/settings/settingsState.js';
export {
  API_KEY_NOT_SET_LABEL,
  maskApiKey,
  resolveSettingsView,
  type SettingsView,
} from './screens/settings/settingsView.js';
export { NameGeneratorController } from './screens/nameGenerator/nameGeneratorController.js';
export type { NameGeneratorState } from './screens/nameGenerator/nameGeneratorState.js';
export {
  PROMPT_PLACEHOLDER,
  resolveNameGeneratorView,
  type NameGeneratorView,
} from './screens/nameGenerator/nameGeneratorView.js';
export {
  AppRoutes,
  ROUTE_TITLES,
  START_ROUTE,
  isAppRoute,
  openScreen,
  type AppRoute,
  type ScreenControllers,
  type ScreenDependencies,
} from './navigation/appRoutes.js';
