import type { PipelineEvent } from '../types/events';
import type { Logger } from './types';

/** `[key=value ...] message`, or the bare message when there are no bindings */
function withBindings(bindings: Record<string, unknown>, message: string): string {
  const prefix = Object.entries(bindings)
    .map(([k, v]) => `${k}=${String(v)}`)
    .join(' ');
  return prefix ? `[${prefix}] ${message}` : message;
}

function summarize(event: PipelineEvent): string {
  return `[${event.type}] ${JSON.stringify(event.payload)}`;
}

/** Where events, debug and info lines go; warnings and errors always use stderr */
export type ConsoleStream = 'stdout' | 'stderr';

/**
 * Writes to the console. Events and debug lines only appear when verbose;
 * info, warnings and errors always do.
 */
export class ConsoleLogger implements Logger {
  constructor(
    private readonly verbose = true,
    private readonly bindings: Record<string, unknown> = {},
    private readonly stream: ConsoleStream = 'stdout',
  ) {}

  log(event: PipelineEvent): void {
    if (!this.verbose) return;
    this.print('log', summarize(event));
  }

  trace(event: PipelineEvent, message: string): void {
    if (!this.verbose) return;
    this.print('log', withBindings(this.bindings, message), summarize(event));
  }

  debug(message: string): void {
    if (!this.verbose) return;
    this.print('debug', withBindings(this.bindings, message));
  }

  info(message: string): void {
    this.print('info', withBindings(this.bindings, message));
  }

  warn(message: string): void {
    console.warn(withBindings(this.bindings, message));
  }

  error(error: Error, message?: string): void {
    if (message) {
      console.error(withBindings(this.bindings, message), error);
    } else {
      console.error(error);
    }
  }

  child(bindings: Record<string, unknown>): Logger {
    return new ConsoleLogger(this.verbose, { ...this.bindings, ...bindings }, this.stream);
  }

  private print(method: 'log' | 'debug' | 'info', ...args: unknown[]): void {
    if (this.stream === 'stderr') {
      console.error(...args);
    } else {
      console[method](...args);
    }
  }
}
