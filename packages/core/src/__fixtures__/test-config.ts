import { ConfigSchema, type Config, type Logger, type PipelineEvent } from '@synthloop/shared';
import type { Example } from '../examples/bank';

export function testConfig(overrides: Record<string, unknown> = {}): Config {
  return ConfigSchema.parse({
    provider: { type: 'fake', model: 'fake' },
    retry: { maxRetries: 2, initialDelayMs: 1, maxDelayMs: 1 },
    sandbox: { mode: 'inline', timeoutMs: 1000 },
    ...overrides,
  });
}

export const sampleExamples: Example[] = [
  {
    task: 'Write a JavaScript function to check if a number is prime with the provided signature',
    code_signature: 'function isPrime(n)',
    code: 'function isPrime(n) {\n  if (n < 2) return false;\n  for (let i = 2; i * i <= n; i++) {\n    if (n % i === 0) return false;\n  }\n  return true;\n}',
    test_1: 'assert.strictEqual(isPrime(2), true);',
    test_2: 'assert.strictEqual(isPrime(4), false);',
    edge_case_test_1: 'assert.strictEqual(isPrime(1), false);',
  },
  {
    task: 'Write a JavaScript function to reverse a string with the provided signature',
    code_signature: 'function reverseString(s)',
    code: "function reverseString(s) {\n  return s.split('').reverse().join('');\n}",
    test_1: "assert.strictEqual(reverseString('hello'), 'olleh');",
    test_2: "assert.strictEqual(reverseString('ab'), 'ba');",
    edge_case_test_1: "assert.strictEqual(reverseString(''), '');",
  },
];

/** Logger that records events and messages */
export class RecordingLogger implements Logger {
  readonly events: PipelineEvent[] = [];
  readonly messages: string[] = [];

  log(event: PipelineEvent): void {
    this.events.push(event);
  }

  trace(event: PipelineEvent, message: string): void {
    this.events.push(event);
    this.messages.push(message);
  }

  debug(message: string): void {
    this.messages.push(message);
  }

  info(message: string): void {
    this.messages.push(message);
  }

  warn(message: string): void {
    this.messages.push(message);
  }

  error(error: Error, message?: string): void {
    this.messages.push(message ?? error.message);
  }

  child(): Logger {
    return this;
  }
}
