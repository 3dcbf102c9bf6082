import process from 'node:process';

import type { Logger } from '@contents-generator/shell';

import type { ProcessIO } from './types.js';

interface WritableStreamLike {
  write(chunk: string): unknown;
}

interface NodeLikeProcess {
  stdout: WritableStreamLike;
  stderr: WritableStreamLike;
  exitCode?: number | string | undefined;
}

export function createNodeProcessIO(proc: NodeLikeProcess = process): ProcessIO {
  return {
    writeStdout(message: string) {
      proc.stdout.write(message);
    },
    writeStderr(message: string) {
      proc.stderr.write(message);
    },
    setExitCode(code: number) {
      proc.exitCode = code;
    },
  };
}

interface ObservableProcess {
  on(event: 'uncaughtException' | 'unhandledRejection', listener: (reason: unknown) => void): unknown;
  exitCode?: number | string | undefined;
}

let observersRegistered = false;

export function registerProcessObservers(proc: ObservableProcess = process, logger: Logger = console): void {
  if (observersRegistered) {
    return;
  }

  proc.on('uncaughtException', (error) => {
    logger.error('[cli] uncaught exception', error);
    proc.exitCode = 1;
  });

  proc.on('unhandledRejection', (reason) => {
    logger.error('[cli] unhandled rejection', reason);
    proc.exitCode = 1;
  });

  observersRegistered = true;
}
