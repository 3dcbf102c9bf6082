import { GenerationError } from '@contents-generator/generation-core';
import { StorageError } from '@contents-generator/shell';

import { CliUsageError } from './errors.js';
import type { ErrorOutput } from './types.js';

export const ErrorCodes = {
  Usage: 'E_USAGE',
  Storage: 'E_STORAGE',
  GenerationFailed: 'E_GENERATION_FAILED',
  Unexpected: 'E_UNEXPECTED',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export interface MappedError {
  exitCode: number;
  output: ErrorOutput;
  errorCode: ErrorCode;
}

export const STORAGE_SUGGESTIONS = [
  '設定ファイルの保存先 (CONTENTS_GENERATOR_DATA_DIR) に読み書きできるか確認してください',
];

export const GENERATION_SUGGESTIONS = [
  "'contents-generator settings show' で API キーを確認してください",
];

export class ErrorDomainMapper {
  map(error: unknown): MappedError {
    if (error instanceof CliUsageError) {
      return this.build(ErrorCodes.Usage, error.message, 2, [
        "'contents-generator --help' で利用可能なコマンドを確認してください",
      ]);
    }

    if (error instanceof StorageError) {
      return this.build(ErrorCodes.Storage, error.message, 1, STORAGE_SUGGESTIONS);
    }

    if (error instanceof GenerationError) {
      return this.build(ErrorCodes.GenerationFailed, error.message, 1, GENERATION_SUGGESTIONS);
    }

    if (error instanceof Error) {
      return this.build(ErrorCodes.Unexpected, error.message, 1);
    }

    return this.build(ErrorCodes.Unexpected, String(error), 1);
  }

  build(code: ErrorCode, message: string, exitCode: number, suggestions: string[] = []): MappedError {
    return {
      exitCode,
      errorCode: code,
      output: {
        kind: 'error',
        code,
        message,
        suggestions,
      },
    };
  }
}
