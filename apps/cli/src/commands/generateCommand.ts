import {
  AppRoutes,
  PROMPT_PLACEHOLDER,
  ROUTE_TITLES,
  openScreen,
  resolveNameGeneratorView,
  type Logger,
  type UserSettingsRepository,
} from '@contents-generator/shell';

import type { NameGeneratorFactory } from '../config/nameGeneratorFactory.js';
import { ErrorCodes, GENERATION_SUGGESTIONS } from '../errorDomainMapper.js';
import { CliUsageError } from '../errors.js';
import type { CommandDescriptor, CommandResult } from '../types.js';

export interface GenerateCommandDependencies {
  nameGeneratorFactory: NameGeneratorFactory;
  settingsRepository: UserSettingsRepository;
  logger?: Logger;
}

interface GenerateCommandOptions {
  prompt: string;
  format: 'text' | 'json';
  help: boolean;
}

function buildHelpMessage(): string {
  return `${ROUTE_TITLES[AppRoutes.NameGenerator]} - 名前生成コマンド

Usage:
  contents-generator generate [options] <prompt...>

  <prompt> には「${PROMPT_PLACEHOLDER}」への答えを指定します。

Options:
  --format <text|json>    出力形式 (default: text)
  --help                  このヘルプを表示`;
}

function parseGenerateArgs(args: string[]): GenerateCommandOptions {
  const parsed: GenerateCommandOptions = { prompt: '', format: 'text', help: false };
  const words: string[] = [];

  for (let i = 0; i < args.length; i += 1) {
    const arg = args[i];

    switch (arg) {
      case '--format': {
        const format = (args[++i] ?? '').toLowerCase();
        if (format !== 'text' && format !== 'json') {
          throw new CliUsageError(`Unsupported format '${format}'. Use text or json.`);
        }
        parsed.format = format;
        break;
      }
      case '--help':
      case '-h':
        parsed.help = true;
        break;
      default:
        words.push(arg);
    }
  }

  parsed.prompt = words.join(' ');
  return parsed;
}

export function createGenerateCommandDescriptor(deps: GenerateCommandDependencies): CommandDescriptor {
  return {
    name: 'generate',
    summary: 'プロンプトから名前を生成する',
    usage: 'generate <prompt...>',
    handler: async (context): Promise<CommandResult> => {
      const options = parseGenerateArgs(context.argv);

      if (options.help) {
        return {
          exitCode: 0,
          output: { kind: 'text', text: `${buildHelpMessage()}\n`, scope: 'info' },
        };
      }

      const nameGenerator = await deps.nameGeneratorFactory();
      const controller = openScreen(AppRoutes.NameGenerator, {
        nameGenerator,
        settingsRepository: deps.settingsRepository,
        logger: deps.logger,
      });

      try {
        controller.updatePrompt(options.prompt);
        const before = resolveNameGeneratorView(controller.state);
        if (before.kind !== 'form' || !before.canGenerate) {
          throw new CliUsageError('名前の条件 (prompt) を指定してください');
        }

        await controller.generateName();

        const view = resolveNameGeneratorView(controller.state);
        const promptBytes = Buffer.byteLength(options.prompt, 'utf-8');

        if (view.kind === 'error') {
          return {
            exitCode: 1,
            output: {
              kind: 'error',
              code: ErrorCodes.GenerationFailed,
              message: view.message,
              suggestions: GENERATION_SUGGESTIONS,
            },
            telemetry: {
              screen: AppRoutes.NameGenerator,
              promptBytes,
              errorCode: ErrorCodes.GenerationFailed,
            },
          };
        }

        return {
          exitCode: 0,
          output:
            options.format === 'json'
              ? { kind: 'json', data: { prompt: view.prompt, generatedText: view.generatedText } }
              : { kind: 'text', text: view.generatedText },
          telemetry: {
            screen: AppRoutes.NameGenerator,
            promptBytes,
            outputBytes: Buffer.byteLength(view.generatedText, 'utf-8'),
          },
        };
      } finally {
        controller.dispose();
      }
    },
  };
}
