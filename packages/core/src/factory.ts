import type { Config, EventBus, Logger } from '@synthloop/shared';
import { createSandbox } from '@synthloop/exec';
import type { Example } from './examples/bank';
import { CodeGenerationPipeline } from './pipeline';
import { createDefaultRegistry, type ProviderRegistry } from './registry';

export interface CreatePipelineOptions {
  examples: readonly Example[];
  logger: Logger;
  eventBus?: EventBus;
  registry?: ProviderRegistry;
}

/**
 * Wires a pipeline from configuration: adapter from the registry, sandbox from `sandbox.mode`.
 */
export function createPipeline(config: Config, options: CreatePipelineOptions): CodeGenerationPipeline {
  const registry = options.registry ?? createDefaultRegistry();
  return new CodeGenerationPipeline({
    examples: options.examples,
    adapter: registry.create(config.provider),
    sandbox: createSandbox(config.sandbox, options.logger),
    config,
    logger: options.logger,
    eventBus: options.eventBus,
  });
}
