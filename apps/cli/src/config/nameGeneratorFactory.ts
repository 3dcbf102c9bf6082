import {
  LlmNameGenerator,
  OpenAICompatibleClient,
  PlaceholderNameGenerator,
  type NameGenerator,
} from '@contents-generator/generation-core';
import type { UserSettingsRepository } from '@contents-generator/shell';

import type { GenerationConfig } from './appConfig.js';

export type NameGeneratorFactory = () => Promise<NameGenerator>;

export interface NameGeneratorFactoryOptions {
  fetchImpl?: typeof globalThis.fetch;
}

/**
 * Without an endpoint the placeholder generator is used. With one, the
 * stored api key is read at creation time and sent as a bearer token.
 */
export function createNameGeneratorFactory(
  config: GenerationConfig,
  settingsRepository: UserSettingsRepository,
  options: NameGeneratorFactoryOptions = {},
): NameGeneratorFactory {
  return async () => {
    if (!config.endpointUrl) {
      return new PlaceholderNameGenerator({ delayMs: config.placeholderDelayMs });
    }

    const { apiKey } = await settingsRepository.getUserSettings();
    const client = new OpenAICompatibleClient(config.endpointUrl, apiKey, config.model, {
      fetchImpl: options.fetchImpl,
    });
    return new LlmNameGenerator(client, { model: config.model });
  };
}
