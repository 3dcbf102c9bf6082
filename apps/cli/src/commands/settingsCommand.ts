import {
  AppRoutes,
  SettingsController,
  maskApiKey,
  resolveSettingsView,
  type Logger,
  type UserSettingsRepository,
} from '@contents-generator/shell';

import { ErrorCodes, STORAGE_SUGGESTIONS } from '../errorDomainMapper.js';
import { CliUsageError } from '../errors.js';
import type { CliGlobals, CommandDescriptor, CommandResult } from '../types.js';

export interface SettingsCommandDependencies {
  settingsRepository: UserSettingsRepository;
  logger?: Logger;
  settingsLocation?: string;
}

function buildUsage(): string {
  return `設定 - API キーの管理

Usage:
  contents-generator settings show                 # Show the stored API key (masked)
  contents-generator settings set-api-key <value>  # Store a new API key
  contents-generator settings clear-api-key        # Store an empty API key

Sub-commands:
  show            Load the settings and print the masked API key
  set-api-key     Replace the API key and save it
  clear-api-key   Save an empty API key
`;
}

function storageFailure(message: string): CommandResult {
  return {
    exitCode: 1,
    output: {
      kind: 'error',
      code: ErrorCodes.Storage,
      message,
      suggestions: STORAGE_SUGGESTIONS,
    },
    telemetry: { screen: AppRoutes.Settings, errorCode: ErrorCodes.Storage },
  };
}

async function withSettingsScreen(
  deps: SettingsCommandDependencies,
  body: (controller: SettingsController) => Promise<CommandResult>,
): Promise<CommandResult> {
  const controller = new SettingsController(deps.settingsRepository, { logger: deps.logger });
  try {
    await controller.initialize();
    const view = resolveSettingsView(controller.state);
    if (view.kind === 'error') {
      return storageFailure(view.message);
    }
    return await body(controller);
  } finally {
    controller.dispose();
  }
}

function handleShow(deps: SettingsCommandDependencies): Promise<CommandResult> {
  return withSettingsScreen(deps, async (controller) => {
    const view = resolveSettingsView(controller.state);
    if (view.kind !== 'ready') {
      throw new Error('設定を読み込めませんでした');
    }

    const lines = [`API キー: ${maskApiKey(view.apiKey)}`];
    if (deps.settingsLocation) {
      lines.push(`保存先: ${deps.settingsLocation}`);
    }
    return {
      exitCode: 0,
      output: { kind: 'text', text: `${lines.join('\n')}\n` },
      telemetry: { screen: AppRoutes.Settings },
    };
  });
}

function handleUpdate(
  deps: SettingsCommandDependencies,
  globals: CliGlobals,
  apiKey: string,
): Promise<CommandResult> {
  return withSettingsScreen(deps, async (controller) => {
    controller.updateApiKey(apiKey);

    if (globals.dryRun) {
      return {
        exitCode: 0,
        output: {
          kind: 'dry-run',
          summary: 'API キーは保存されません',
          details: { apiKey: maskApiKey(apiKey) },
        },
        telemetry: { screen: AppRoutes.Settings },
      };
    }

    let saved = false;
    await controller.saveSettings(() => {
      saved = true;
    });

    if (!saved) {
      const view = resolveSettingsView(controller.state);
      return storageFailure(view.kind === 'error' ? view.message : '設定の保存に失敗しました');
    }

    return {
      exitCode: 0,
      output: {
        kind: 'text',
        text: apiKey ? 'API キーを保存しました\n' : 'API キーを削除しました\n',
        scope: 'info',
      },
      telemetry: { screen: AppRoutes.Settings },
    };
  });
}

export function createSettingsCommandDescriptor(deps: SettingsCommandDependencies): CommandDescriptor {
  return {
    name: 'settings',
    summary: 'API キーを表示・保存する',
    usage: 'settings <sub-command>',
    handler: async (context) => {
      const [subcommand, value] = context.argv;

      if (!subcommand || subcommand === '--help' || subcommand === '-h') {
        return {
          exitCode: 0,
          output: { kind: 'text', text: `${buildUsage()}\n`, scope: 'info' },
        };
      }

      switch (subcommand) {
        case 'show':
          return handleShow(deps);
        case 'set-api-key':
          if (value === undefined) {
            throw new CliUsageError('API key is required for `contents-generator settings set-api-key <value>`');
          }
          return handleUpdate(deps, context.globals, value);
        case 'clear-api-key':
          return handleUpdate(deps, context.globals, '');
        default:
          throw new CliUsageError(
            `Unknown settings sub-command '${subcommand}'. Available: show, set-api-key, clear-api-key`,
          );
      }
    },
  };
}
