import assert from 'assert';
import vm from 'vm';
import type { SandboxConfig } from '@synthloop/shared';
import { describeThrown } from './describe';
import type { ExecutionOutcome, ExecutionSandbox, SandboxProgram } from './types';

function isThenable(value: unknown): value is PromiseLike<unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    typeof Reflect.get(value, 'then') === 'function'
  );
}

async function settleWithin(value: PromiseLike<unknown>, timeoutMs: number): Promise<void> {
  let timer: NodeJS.Timeout | undefined;
  const limit = new Promise<never>((_, reject) => {
    timer = setTimeout(
      () => reject(new Error(`Async work did not settle within ${timeoutMs}ms`)),
      timeoutMs,
    );
  });
  try {
    await Promise.race([value, limit]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Runs programs with `node:vm` inside the current process.
 *
 * NOT an isolation boundary: generated code can reach the host through the
 * prototype chain of the injected bindings. Use for trusted demos and tests.
 *
 * A unit that evaluates to a promise is awaited. While a run is in progress,
 * any unhandled rejection in the process is charged to that run.
 */
export class InlineSandbox implements ExecutionSandbox {
  readonly mode = 'inline';

  constructor(private readonly options: Pick<SandboxConfig, 'timeoutMs'>) {}

  async run(program: SandboxProgram): Promise<ExecutionOutcome> {
    const rejections: unknown[] = [];
    const onRejection = (reason: unknown) => {
      rejections.push(reason);
    };
    process.on('unhandledRejection', onRejection);

    try {
      const context = vm.createContext({ assert, console });
      for (const unit of program.units) {
        const result: unknown = vm.runInContext(unit.source, context, {
          filename: unit.name,
          timeout: this.options.timeoutMs,
        });
        if (isThenable(result)) {
          await settleWithin(result, this.options.timeoutMs);
        }
        // Let rejections left unhandled by this unit surface before the next one runs.
        await new Promise((resolve) => setImmediate(resolve));
        if (rejections.length > 0) {
          return { status: 'failure', error: describeThrown(rejections[0]) };
        }
      }
      return { status: 'success' };
    } catch (err) {
      return { status: 'failure', error: describeThrown(err) };
    } finally {
      process.off('unhandledRejection', onRejection);
    }
  }
}
