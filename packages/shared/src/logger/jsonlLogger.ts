import * as fs from 'fs/promises';
import type { PipelineEvent } from '../types/events';
import { redactForLogs } from '../redaction';
import { ConsoleLogger } from './consoleLogger';
import type { Logger } from './types';

/**
 * Appends every event, redacted, to a JSONL file. Plain messages go to
 * `messages`, which defaults to a quiet console logger.
 */
export class JsonlLogger implements Logger {
  constructor(
    private readonly filePath: string,
    private readonly messages: Logger = new ConsoleLogger(false),
  ) {}

  async log(event: PipelineEvent): Promise<void> {
    const line = JSON.stringify(redactForLogs(event)) + '\n';
    try {
      await fs.appendFile(this.filePath, line, 'utf8');
    } catch (error) {
      // A broken log file must not fail the run.
      console.error(`Failed to write to log file at ${this.filePath}`, error);
    }
  }

  async trace(event: PipelineEvent, message: string): Promise<void> {
    await this.log(event);
    await this.messages.debug(message);
  }

  debug(message: string) {
    return this.messages.debug(message);
  }

  info(message: string) {
    return this.messages.info(message);
  }

  warn(message: string) {
    return this.messages.warn(message);
  }

  error(error: Error, message?: string) {
    return this.messages.error(error, message);
  }

  child(bindings: Record<string, unknown>): Logger {
    return new JsonlLogger(this.filePath, this.messages.child(bindings));
  }
}
