import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { ConfigError, RepairExhaustedError, UsageError } from '@synthloop/shared';
import { createProgram, name, readVersion, reportError } from './program';

describe('cli package', () => {
  it('exports name', () => {
    expect(name).toBe('@synthloop/cli');
  });

  it('reads its version from package.json', () => {
    expect(readVersion()).toBe('0.1.0');
  });

  it('registers generate as the default command', () => {
    const program = createProgram();
    expect(program.name()).toBe('synthloop');
    expect(program.commands.map((c) => c.name())).toEqual(['generate']);
  });
});

describe('reportError', () => {
  let logSpy: ReturnType<typeof vi.spyOn>;
  let errSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    errSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('returns exit code 2 for errors the user can correct', () => {
    expect(reportError(new ConfigError('bad config'), {})).toBe(2);
    expect(reportError(new UsageError('bad usage'), {})).toBe(2);
  });

  it('returns exit code 1 for runtime errors', () => {
    expect(reportError(new RepairExhaustedError(5), {})).toBe(1);
    expect(reportError(new Error('boom'), {})).toBe(1);
  });

  it('prints code, message and details as JSON', () => {
    reportError(new RepairExhaustedError(2, { details: { failedArtifact: 'test_1' } }), {
      json: true,
    });

    expect(JSON.parse(String(logSpy.mock.calls[0][0]))).toEqual({
      error: {
        code: 'RepairExhausted',
        message: 'Code still failing after 2 repair attempt(s)',
        details: { failedArtifact: 'test_1' },
      },
    });
  });

  it('reports unknown errors as UnknownError in JSON', () => {
    reportError('plain failure', { json: true });

    expect(JSON.parse(String(logSpy.mock.calls[0][0]))).toEqual({
      error: { code: 'UnknownError', message: 'plain failure' },
    });
  });

  it('prints a human-readable message with details', () => {
    reportError(new ConfigError('Missing key', { details: 'set OPENAI_API_KEY' }), {});

    expect(errSpy.mock.calls[0][0]).toBe('❌ Error: Missing key');
    expect(errSpy.mock.calls[1][0]).toBe('  Details: set OPENAI_API_KEY');
    expect(errSpy.mock.calls[2][0]).toBe('\nFor more details, run with the --verbose flag.');
  });

  it('prints the stack trace when verbose', () => {
    const error = new UsageError('Task must be a non-empty string');
    reportError(error, { verbose: true });

    expect(errSpy.mock.calls[1][0]).toBe(`\nStack Trace:\n${error.stack}`);
  });
});
