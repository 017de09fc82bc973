import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import {
  ConfigError,
  ConsoleLogger,
  GenerationError,
  RateLimitError,
  TimeoutError,
  type PipelineEvent,
} from '@synthloop/shared';
import { backoffDelay, executeProviderRequest, isRetriableError } from './index';
import type { AdapterContext } from '../types';

describe('executeProviderRequest', () => {
  let ctx: AdapterContext;
  let logSpy: MockInstance<(event: PipelineEvent) => void>;

  beforeEach(() => {
    const logger = new ConsoleLogger(false);
    logSpy = vi.spyOn(logger, 'log');
    ctx = {
      runId: 'test-run',
      logger,
    };
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should execute successfully without retries', async () => {
    const fn = vi.fn().mockResolvedValue('success');

    const result = await executeProviderRequest(ctx, 'test', 'model', fn);

    expect(result).toBe('success');
    expect(fn).toHaveBeenCalledTimes(1);
    expect(logSpy).toHaveBeenCalledWith(
      expect.objectContaining({ type: 'ProviderRequestStarted' }),
    );
    expect(logSpy).toHaveBeenCalledWith(
      expect.objectContaining({
        type: 'ProviderRequestFinished',
        payload: expect.objectContaining({ success: true, retries: 0 }),
      }),
    );
  });

  it('should retry on retriable error', async () => {
    const fn = vi
      .fn()
      .mockRejectedValueOnce(new RateLimitError('Limit reached'))
      .mockResolvedValue('success');

    const result = await executeProviderRequest(ctx, 'test', 'model', fn, { initialDelayMs: 1 });

    expect(result).toBe('success');
    expect(fn).toHaveBeenCalledTimes(2);
    expect(logSpy).toHaveBeenCalledWith(
      expect.objectContaining({
        type: 'ProviderRequestFinished',
        payload: expect.objectContaining({ success: true, retries: 1 }),
      }),
    );
  });

  it('retries malformed replies reported as GenerationError', async () => {
    const fn = vi
      .fn()
      .mockRejectedValueOnce(new GenerationError('code', 'missing field "code"'))
      .mockResolvedValue('fixed');

    const result = await executeProviderRequest(ctx, 'test', 'model', fn, { initialDelayMs: 1 });

    expect(result).toBe('fixed');
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('should fail after max retries', async () => {
    const fn = vi.fn().mockRejectedValue(new RateLimitError('Limit reached'));

    await expect(
      executeProviderRequest(ctx, 'test', 'model', fn, { maxRetries: 2, initialDelayMs: 1 }),
    ).rejects.toThrow(RateLimitError);

    expect(fn).toHaveBeenCalledTimes(3); // Initial + 2 retries
    expect(logSpy).toHaveBeenCalledWith(
      expect.objectContaining({
        type: 'ProviderRequestFinished',
        payload: expect.objectContaining({ success: false, retries: 2 }),
      }),
    );
  });

  it('should not retry on non-retriable error', async () => {
    const fn = vi.fn().mockRejectedValue(new ConfigError('Bad config'));

    await expect(executeProviderRequest(ctx, 'test', 'model', fn)).rejects.toThrow(ConfigError);

    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('honours retry options from the context', async () => {
    ctx.retryOptions = { maxRetries: 1, initialDelayMs: 1 };
    const fn = vi.fn().mockRejectedValue(new RateLimitError('Limit reached'));

    await expect(executeProviderRequest(ctx, 'test', 'model', fn)).rejects.toThrow(RateLimitError);

    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('should handle timeouts', async () => {
    ctx.timeoutMs = 10;
    const fn = vi.fn(
      (signal: AbortSignal) =>
        new Promise<string>((resolve, reject) => {
          const timeout = setTimeout(() => resolve('late'), 50);
          signal.addEventListener('abort', () => {
            clearTimeout(timeout);
            reject(signal.reason);
          });
        }),
    );

    await expect(
      executeProviderRequest(ctx, 'test', 'model', fn, { maxRetries: 0 }),
    ).rejects.toThrow(TimeoutError);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('reports a timeout even when the request rejects with its own abort error', async () => {
    ctx.timeoutMs = 10;
    const fn = vi.fn(
      (signal: AbortSignal) =>
        new Promise<string>((_resolve, reject) => {
          signal.addEventListener('abort', () => reject(new Error('Request was aborted.')));
        }),
    );

    await expect(
      executeProviderRequest(ctx, 'test', 'model', fn, { maxRetries: 0 }),
    ).rejects.toThrow('Request timed out after 10ms');
  });

  it('aborts immediately when the abort signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    ctx.abortSignal = controller.signal;

    const fn = vi.fn(async (signal: AbortSignal) => {
      if (signal.aborted) {
        throw new RateLimitError('aborted');
      }
      return 'ok';
    });

    await expect(executeProviderRequest(ctx, 'test', 'model', fn)).rejects.toThrow('aborted');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('clears timeouts on success', async () => {
    const clearSpy = vi.spyOn(global, 'clearTimeout');

    const controller = new AbortController();
    ctx.abortSignal = controller.signal;
    ctx.timeoutMs = 1000;

    const fn = vi.fn().mockResolvedValue('ok');
    const result = await executeProviderRequest(ctx, 'test', 'model', fn);

    expect(result).toBe('ok');
    expect(clearSpy).toHaveBeenCalled();
  });

  it('logs non-Error failures with String(lastError)', async () => {
    const fn = vi.fn().mockRejectedValue('fail');

    await expect(executeProviderRequest(ctx, 'test', 'model', fn)).rejects.toBe('fail');

    const finished = logSpy.mock.calls
      .map(([event]) => event)
      .filter((e) => e.type === 'ProviderRequestFinished');

    expect(finished).toHaveLength(1);
    expect(finished[0]?.payload).toMatchObject({
      success: false,
      error: 'fail',
    });
  });
});

describe('isRetriableError', () => {
  it('classifies errors by type, status and network code', () => {
    expect(isRetriableError(new TimeoutError('slow'))).toBe(true);
    expect(isRetriableError(new ConfigError('bad key'))).toBe(false);
    expect(isRetriableError({ status: 503 })).toBe(true);
    expect(isRetriableError({ status: 400 })).toBe(false);
    expect(isRetriableError({ code: 'ECONNRESET' })).toBe(true);
    expect(isRetriableError({ cause: { code: 'ETIMEDOUT' } })).toBe(true);
    expect(isRetriableError(new Error('boom'))).toBe(false);
  });
});

describe('backoffDelay', () => {
  const options = { maxRetries: 3, initialDelayMs: 1000, maxDelayMs: 3000, backoffFactor: 2 };

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('grows exponentially up to the cap', () => {
    vi.spyOn(Math, 'random').mockReturnValue(0.5); // zero jitter
    expect(backoffDelay(1, options)).toBe(1000);
    expect(backoffDelay(2, options)).toBe(2000);
    expect(backoffDelay(3, options)).toBe(3000);
    expect(backoffDelay(4, options)).toBe(3000);
  });

  it('adds at most 10% jitter', () => {
    vi.spyOn(Math, 'random').mockReturnValue(1);
    expect(backoffDelay(1, options)).toBe(1100);
  });
});
