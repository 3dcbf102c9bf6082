import type { NameGenerator } from '@contents-generator/generation-core';

import type { UserSettingsRepository } from '../data/settings/userSettingsRepository.js';
import { NameGeneratorController } from '../screens/nameGenerator/nameGeneratorController.js';
import { SettingsController } from '../screens/settings/settingsController.js';
import type { Logger } from '../state/screenController.js';

export const AppRoutes = {
  NameGenerator: 'name_generator',
  Settings: 'settings',
} as const;

export type AppRoute = (typeof AppRoutes)[keyof typeof AppRoutes];

export const START_ROUTE: AppRoute = AppRoutes.NameGenerator;

export const ROUTE_TITLES: Record<AppRoute, string> = {
  name_generator: 'Name Generator',
  settings: '設定',
};

export type ScreenDependencies = {
  settingsRepository: UserSettingsRepository;
  nameGenerator: NameGenerator;
  logger?: Logger;
};

export type ScreenControllers = {
  name_generator: NameGeneratorController;
  settings: SettingsController;
};

const screenFactories: { [R in AppRoute]: (deps: ScreenDependencies) => ScreenControllers[R] } = {
  name_generator: (deps) => new NameGeneratorController(deps.nameGenerator, { logger: deps.logger }),
  settings: (deps) => new SettingsController(deps.settingsRepository, { logger: deps.logger }),
};

/**
 * Creates a fresh controller for one entry into `route`. The caller owns it
 * and disposes it when the screen is left.
 */
export function openScreen<R extends AppRoute>(route: R, deps: ScreenDependencies): ScreenControllers[R] {
  return screenFactories[route](deps);
}

export function isAppRoute(value: string): value is AppRoute {
  return value === AppRoutes.NameGenerator || value === AppRoutes.Settings;
}
