import { appendFile, mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';

import type { Logger } from '@contents-generator/shell';

import type { ExecutionLogWriter, ExecutionTelemetry } from './types.js';

/**
 * Appends one JSON line per command run. A log that cannot be written is
 * reported on the logger and does not change the command's exit code.
 */
export class AuditLogger implements ExecutionLogWriter {
  constructor(private readonly logger: Logger = console) {}

  async record(entry: ExecutionTelemetry, filePath?: string): Promise<void> {
    if (!filePath) {
      return;
    }

    try {
      await mkdir(dirname(filePath), { recursive: true });
      await appendFile(filePath, `${JSON.stringify(entry)}\n`, 'utf-8');
    } catch (error) {
      this.logger.warn(`[cli] failed to write execution log to ${filePath}`, error);
    }
  }
}
