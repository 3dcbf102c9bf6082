import { DEFAULT_PLACEHOLDER_DELAY_MS } from '@contents-generator/generation-core';
import { resolveDataDirectory } from '@contents-generator/shell';

export const DEFAULT_MODEL = 'gpt-4o-mini';

export interface GenerationConfig {
  endpointUrl?: string;
  model: string;
  placeholderDelayMs: number;
}

export interface AppConfig {
  dataDirectory: string;
  generation: GenerationConfig;
}

function parseDelay(value: string | undefined): number | undefined {
  if (!value) {
    return undefined;
  }
  const parsed = Number(value);
  if (Number.isFinite(parsed) && parsed >= 0) {
    return parsed;
  }
  return undefined;
}

function normalize(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

export function resolveAppConfig(
  env: NodeJS.ProcessEnv = process.env,
  platform: NodeJS.Platform = process.platform,
): AppConfig {
  return {
    dataDirectory: resolveDataDirectory(env, platform),
    generation: {
      endpointUrl: normalize(env.CONTENTS_GENERATOR_ENDPOINT_URL),
      model: normalize(env.CONTENTS_GENERATOR_MODEL) ?? DEFAULT_MODEL,
      placeholderDelayMs:
        parseDelay(env.CONTENTS_GENERATOR_PLACEHOLDER_DELAY_MS) ?? DEFAULT_PLACEHOLDER_DELAY_MS,
    },
  };
}
