import {
  ConfigError,
  GenerationError,
  RateLimitError,
  RetryConfigSchema,
  TimeoutError,
  type RetryConfig,
} from '@synthloop/shared';
import type { AdapterContext, RetryOptions } from '../types';

/**
 * Default retry options for stage requests.
 *
 * ## Retriable Errors
 *
 * - `RateLimitError` (HTTP 429)
 * - `TimeoutError`
 * - `GenerationError` (the model replied, but not with the requested fields)
 * - Server errors (HTTP 5xx)
 * - Network errors (ETIMEDOUT, ECONNRESET, ECONNREFUSED)
 *
 * ## Non-Retriable Errors
 *
 * - `ConfigError` (HTTP 401 - authentication)
 * - Client errors (HTTP 4xx except 429)
 * - Abort signals (user cancellation)
 *
 * ## Delay Calculation
 *
 * ```
 * delay = min(maxDelayMs, initialDelayMs * (backoffFactor ^ (attempt - 1)))
 * jitter = delay * 0.1 * random(-1, 1)  // +/- 10%
 * finalDelay = max(0, delay + jitter)
 * ```
 */
export const DEFAULT_RETRY_OPTIONS: RetryConfig = RetryConfigSchema.parse({});

function numericField(value: unknown, key: string): number | undefined {
  if (typeof value !== 'object' || value === null || !(key in value)) return undefined;
  const field: unknown = Reflect.get(value, key);
  return typeof field === 'number' ? field : undefined;
}

function errorCode(value: unknown): string | undefined {
  if (typeof value !== 'object' || value === null) return undefined;
  const code: unknown = Reflect.get(value, 'code');
  if (typeof code === 'string') return code;
  const cause: unknown = Reflect.get(value, 'cause');
  if (typeof cause === 'object' && cause !== null) {
    const causeCode: unknown = Reflect.get(cause, 'code');
    return typeof causeCode === 'string' ? causeCode : undefined;
  }
  return undefined;
}

/**
 * Determines if an error is safe to retry.
 */
export function isRetriableError(error: unknown): boolean {
  if (
    error instanceof RateLimitError ||
    error instanceof TimeoutError ||
    error instanceof GenerationError
  ) {
    return true;
  }
  if (error instanceof ConfigError) {
    return false;
  }

  const status = numericField(error, 'status') ?? numericField(error, 'statusCode');
  if (status !== undefined) {
    return status === 429 || (status >= 500 && status < 600);
  }

  const code = errorCode(error);
  return code === 'ETIMEDOUT' || code === 'ECONNRESET' || code === 'ECONNREFUSED';
}

/**
 * Computes the wait before retry number `attempt` (1-based), jitter included.
 */
export function backoffDelay(attempt: number, options: RetryConfig): number {
  const delay = Math.min(
    options.maxDelayMs,
    options.initialDelayMs * Math.pow(options.backoffFactor, attempt - 1),
  );
  const jitter = delay * 0.1 * (Math.random() * 2 - 1);
  return Math.max(0, delay + jitter);
}

/**
 * Executes a provider request with automatic retry, timeout, and abort handling.
 *
 * The request function receives an AbortSignal that fires on user cancellation
 * or when `ctx.timeoutMs` elapses for the current attempt. Anything the function
 * throws is classified by `isRetriableError`, so callers that validate the reply
 * inside `requestFn` get malformed replies retried as well.
 *
 * ```typescript
 * const result = await executeProviderRequest(
 *   ctx,
 *   'openai',
 *   'gpt-4o',
 *   (signal) => adapter.generate(request, { ...ctx, abortSignal: signal }),
 *   { maxRetries: 5 },
 * );
 * ```
 */
export async function executeProviderRequest<T>(
  ctx: AdapterContext,
  provider: string,
  model: string,
  requestFn: (signal: AbortSignal) => Promise<T>,
  optionsOverride: RetryOptions = {},
): Promise<T> {
  const options: RetryConfig = {
    ...DEFAULT_RETRY_OPTIONS,
    ...ctx.retryOptions,
    ...optionsOverride,
  };

  const startTime = Date.now();

  await ctx.logger.log({
    type: 'ProviderRequestStarted',
    schemaVersion: 1,
    timestamp: new Date().toISOString(),
    runId: ctx.runId,
    payload: {
      provider,
      model,
    },
  });

  let attempts = 0;
  let lastError: unknown;

  while (attempts <= options.maxRetries) {
    const abortController = new AbortController();

    const abortHandler = () => {
      abortController.abort();
    };

    if (ctx.abortSignal) {
      if (ctx.abortSignal.aborted) {
        abortController.abort();
      } else {
        ctx.abortSignal.addEventListener('abort', abortHandler);
      }
    }

    let timedOut = false;
    let timeoutId: NodeJS.Timeout | undefined;
    if (ctx.timeoutMs) {
      const timeoutMs = ctx.timeoutMs;
      timeoutId = setTimeout(() => {
        timedOut = true;
        abortController.abort(new TimeoutError(`Request timed out after ${timeoutMs}ms`));
      }, timeoutMs);
    }

    try {
      const result = await requestFn(abortController.signal);

      if (timeoutId) clearTimeout(timeoutId);
      if (ctx.abortSignal) ctx.abortSignal.removeEventListener('abort', abortHandler);

      await ctx.logger.log({
        type: 'ProviderRequestFinished',
        schemaVersion: 1,
        timestamp: new Date().toISOString(),
        runId: ctx.runId,
        payload: {
          provider,
          durationMs: Date.now() - startTime,
          success: true,
          retries: attempts,
        },
      });

      return result;
    } catch (error: unknown) {
      if (timeoutId) clearTimeout(timeoutId);
      if (ctx.abortSignal) ctx.abortSignal.removeEventListener('abort', abortHandler);

      // SDKs reject with their own abort error; report the timeout instead.
      lastError =
        timedOut && !(error instanceof TimeoutError)
          ? new TimeoutError(`Request timed out after ${ctx.timeoutMs}ms`, { cause: error })
          : error;

      if (ctx.abortSignal?.aborted) {
        throw error;
      }

      if (!isRetriableError(lastError) || attempts >= options.maxRetries) {
        break;
      }

      attempts++;
      const delay = backoffDelay(attempts, options);
      await ctx.logger.debug(
        `Retrying ${provider} request (attempt ${attempts}/${options.maxRetries}) in ${Math.round(delay)}ms`,
      );
      await new Promise((resolve) => setTimeout(resolve, delay));
    }
  }

  await ctx.logger.log({
    type: 'ProviderRequestFinished',
    schemaVersion: 1,
    timestamp: new Date().toISOString(),
    runId: ctx.runId,
    payload: {
      provider,
      durationMs: Date.now() - startTime,
      success: false,
      error: lastError instanceof Error ? lastError.message : String(lastError),
      retries: attempts,
    },
  });

  throw lastError;
}
