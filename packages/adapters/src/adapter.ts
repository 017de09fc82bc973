import type { ModelRequest, ModelResponse, ProviderCapabilities } from '@synthloop/shared';
import type { AdapterContext } from './types';

/**
 * Interface for LLM provider adapters.
 * Every stage of the pipeline talks to the model through one of these.
 *
 * @example
 * ```typescript
 * class MyAdapter implements ProviderAdapter {
 *   id() { return 'my-adapter'; }
 *   capabilities() { return { supportsJsonMode: true, ... }; }
 *   async generate(req, ctx) { return { text: '{"code": "..."}' }; }
 * }
 * ```
 */
export interface ProviderAdapter {
  /**
   * Returns the unique identifier for this adapter instance.
   */
  id(): string;
  /**
   * Returns the model identifier requests are sent to.
   */
  model(): string;
  /**
   * Returns the capabilities of this provider.
   */
  capabilities(): ProviderCapabilities;
  /**
   * Generate a response from the model. Implementations make one attempt;
   * retries are the caller's concern (see `executeProviderRequest`).
   */
  generate(req: ModelRequest, ctx: AdapterContext): Promise<ModelResponse>;
}
