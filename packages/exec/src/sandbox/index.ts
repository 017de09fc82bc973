import type { Logger, SandboxConfig } from '@synthloop/shared';
import { InlineSandbox } from './inline-sandbox';
import { ProcessSandbox } from './process-sandbox';
import type { ExecutionSandbox } from './types';

export * from './types';
export { describeThrown } from './describe';
export { HARNESS_SOURCE } from './harness';
export { InlineSandbox } from './inline-sandbox';
export { ProcessSandbox, getSafeEnv, type ProcessSandboxOptions } from './process-sandbox';

/**
 * Factory function to create the execution sandbox selected by configuration
 */
export function createSandbox(config: SandboxConfig, logger?: Logger): ExecutionSandbox {
  switch (config.mode) {
    case 'inline':
      return new InlineSandbox(config);
    case 'process':
    default:
      return new ProcessSandbox({ ...config, logger });
  }
}
