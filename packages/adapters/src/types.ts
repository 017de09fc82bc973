import type { Logger, RetryConfig } from '@synthloop/shared';

/** Per-call retry overrides; unset fields fall back to the configured `retry` section */
export type RetryOptions = Partial<RetryConfig>;

/**
 * Everything an adapter call needs besides the request itself.
 * Stages build one per invocation from the run they belong to.
 */
export interface AdapterContext {
  runId: string;
  logger: Logger;
  /** Aborts the request and any pending retry */
  abortSignal?: AbortSignal;
  /** Maximum time in milliseconds for one request attempt */
  timeoutMs?: number;
  retryOptions?: RetryOptions;
}
