import { ConfigError, type ProviderConfig } from '@synthloop/shared';
import {
  AnthropicAdapter,
  FakeAdapter,
  OpenAIAdapter,
  type ProviderAdapter,
} from '@synthloop/adapters';

/**
 * Factory function type for creating provider adapters.
 * @param config - The provider configuration
 * @returns A configured provider adapter instance
 */
export type AdapterFactory = (config: ProviderConfig) => ProviderAdapter;

/**
 * Maps provider types to adapter factories.
 *
 * @example
 * ```typescript
 * const registry = new ProviderRegistry();
 * registry.registerFactory('openai', (cfg) => new OpenAIAdapter(cfg));
 *
 * const adapter = registry.create(config.provider);
 * ```
 */
export class ProviderRegistry {
  private factories = new Map<string, AdapterFactory>();

  registerFactory(type: string, factory: AdapterFactory): this {
    this.factories.set(type, factory);
    return this;
  }

  has(type: string): boolean {
    return this.factories.has(type);
  }

  /**
   * Builds the adapter for a provider configuration.
   * Adapters check their credentials here, so a missing key fails before any stage runs.
   */
  create(config: ProviderConfig): ProviderAdapter {
    const factory = this.factories.get(config.type);
    if (!factory) {
      throw new ConfigError(`Unknown provider type: ${config.type}`, {
        details: { registered: [...this.factories.keys()] },
      });
    }
    return factory(config);
  }
}

export function createDefaultRegistry(env: NodeJS.ProcessEnv = process.env): ProviderRegistry {
  return new ProviderRegistry()
    .registerFactory('openai', (cfg) => new OpenAIAdapter(cfg, env))
    .registerFactory('anthropic', (cfg) => new AnthropicAdapter(cfg, env))
    .registerFactory('fake', (cfg) => new FakeAdapter(cfg));
}
