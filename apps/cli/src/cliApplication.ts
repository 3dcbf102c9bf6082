import type {
  CliApplication,
  CliApplicationConfig,
  CliCommandContext,
  CliGlobals,
  CommandDescriptor,
  CommandResult,
  ExecutionTelemetry,
} from './types.js';

import { AuditLogger } from './auditLogger.js';
import { ErrorDomainMapper } from './errorDomainMapper.js';
import { OutputFormatter } from './outputFormatter.js';

interface ParsedArguments {
  command?: string;
  argv: string[];
  globals: CliGlobals;
  helpRequested: boolean;
  error?: string;
}

function parseArguments(rawArgs: string[]): ParsedArguments {
  const globals: CliGlobals = {
    quiet: false,
    dryRun: false,
    logFile: undefined,
  };

  const argv: string[] = [];
  let command: string | undefined;
  let helpRequested = false;

  for (let i = 0; i < rawArgs.length; i += 1) {
    const token = rawArgs[i];

    if (command) {
      argv.push(token);
      continue;
    }

    switch (token) {
      case '--help':
      case '-h':
        helpRequested = true;
        break;
      case '--quiet':
        globals.quiet = true;
        break;
      case '--dry-run':
        globals.dryRun = true;
        break;
      case '--log-file': {
        const value = rawArgs[i + 1];
        if (!value || value.startsWith('-')) {
          return { argv, globals, helpRequested, error: '--log-file option requires a file path' };
        }
        globals.logFile = value;
        i += 1;
        break;
      }
      default:
        if (token.startsWith('-')) {
          return { argv, globals, helpRequested, error: `Unknown option: ${token}` };
        }
        command = token;
    }
  }

  return {
    command,
    argv,
    globals,
    helpRequested,
  };
}

function formatUsage(config: CliApplicationConfig, commands: CommandDescriptor[]): string {
  const lines: string[] = [];
  lines.push(`${config.description}`);
  lines.push('');
  lines.push(`Usage: ${config.name} [global-options] <command> [options]`);
  lines.push('');

  if (commands.length === 0) {
    lines.push('No commands have been registered yet.');
    return lines.join('\n');
  }

  lines.push('Commands:');

  const width = Math.max(...commands.map((command) => command.usage.length)) + 2;
  for (const command of commands) {
    lines.push(`  ${command.usage.padEnd(width, ' ')}${command.summary}`);
  }

  lines.push('');
  lines.push('Global options:');
  lines.push('  --help       Show help for the CLI or a command');
  lines.push('  --quiet      Suppress informational output');
  lines.push('  --dry-run    Run without writing settings');
  lines.push('  --log-file   Append an execution log entry to the provided file');

  return lines.join('\n');
}

function buildTelemetry(
  commandName: string,
  startedAt: Date,
  finishedAt: Date,
  exitCode: number,
  partial?: Partial<ExecutionTelemetry>,
): ExecutionTelemetry {
  return {
    command: commandName,
    screen: partial?.screen,
    startedAt: startedAt.toISOString(),
    finishedAt: finishedAt.toISOString(),
    status: exitCode === 0 ? 'success' : 'failure',
    promptBytes: partial?.promptBytes,
    outputBytes: partial?.outputBytes,
    errorCode: partial?.errorCode,
  };
}

export function createCliApplication(config: CliApplicationConfig): CliApplication {
  const { router } = config;
  const auditLogger = config.auditLogger ?? new AuditLogger();
  const clock = config.clock ?? (() => new Date());
  const errorMapper = new ErrorDomainMapper();

  return {
    async run(argv, io) {
      const [, , ...rawArgs] = argv;
      const parsed = parseArguments(rawArgs);
      const formatter = new OutputFormatter(io, parsed.globals);

      if (parsed.error) {
        io.writeStderr(`Error: ${parsed.error}\n`);
        io.writeStderr('Use --help to list available commands.\n');
        io.setExitCode(1);
        return 1;
      }

      if (!parsed.command) {
        if (parsed.helpRequested) {
          io.writeStdout(`${formatUsage(config, router.list())}\n`);
          io.setExitCode(0);
          return 0;
        }

        io.writeStderr("No command provided. Use '--help' to list available commands.\n");
        io.setExitCode(1);
        return 1;
      }

      const descriptor = router.find(parsed.command);

      if (!descriptor) {
        io.writeStderr(`Unknown command '${parsed.command}'.\n`);
        io.writeStderr('Use --help to list available commands.\n');
        io.setExitCode(1);
        return 1;
      }

      const context: CliCommandContext = {
        globals: parsed.globals,
        argv: parsed.helpRequested ? ['--help', ...parsed.argv] : parsed.argv,
        io,
      };

      const startedAt = clock();
      let result: CommandResult;

      try {
        result = await descriptor.handler(context);
      } catch (error) {
        const mapped = errorMapper.map(error);
        result = {
          exitCode: mapped.exitCode,
          output: mapped.output,
          telemetry: { errorCode: mapped.errorCode },
        };
      }

      formatter.emit(result.output);

      const telemetry = buildTelemetry(
        descriptor.name,
        startedAt,
        clock(),
        result.exitCode,
        result.telemetry,
      );
      await auditLogger.record(telemetry, parsed.globals.logFile);

      io.setExitCode(result.exitCode);
      return result.exitCode;
    },
  };
}
