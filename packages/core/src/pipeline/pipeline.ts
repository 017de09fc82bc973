import { randomUUID } from 'crypto';
import {
  RepairExhaustedError,
  UsageError,
  excerpt,
  type Config,
  type EventBus,
  type Logger,
  type PipelineEvent,
} from '@synthloop/shared';
import type { ProviderAdapter } from '@synthloop/adapters';
import type { ExecutionSandbox, SandboxProgram } from '@synthloop/exec';
import { parseExampleBank, type Example } from '../examples/bank';
import {
  Stage,
  TEST_NAMES,
  codeDefinition,
  repairDefinition,
  signatureDefinition,
  testsDefinition,
  type Fields,
  type StageContext,
  type TestName,
} from '../stages';

/** Identity reported to the repair stage when the code itself fails to run */
export const MAIN_CODE = 'main code';

export interface PipelineOptions {
  examples: readonly Example[];
  adapter: ProviderAdapter;
  sandbox: ExecutionSandbox;
  config: Config;
  logger: Logger;
  eventBus?: EventBus;
}

export interface GenerateOptions {
  runId?: string;
  abortSignal?: AbortSignal;
}

export type GeneratedTests = Fields<TestName>;

export interface GenerationResult {
  runId: string;
  task: string;
  signature: string;
  code: string;
  tests: GeneratedTests;
  repairIterations: number;
  durationMs: number;
}

/** First failure of a validation sweep */
export interface ValidationFailure {
  /** `main code` or the test name */
  artifact: string;
  /** What the repair stage is told failed: `main code` or the test's source */
  failedTest: string;
  error: string;
}

/**
 * Signature, code and tests are generated once; then the code is run and
 * tested, and every failure is fed back to the repair stage until the tests
 * pass or `pipeline.maxRepairAttempts` repairs have been spent.
 *
 * @example
 * ```typescript
 * const pipeline = new CodeGenerationPipeline({ examples, adapter, sandbox, config, logger });
 * const result = await pipeline.generate('A JavaScript function to get the nth Fibonacci number');
 * console.log(result.code);
 * ```
 */
export class CodeGenerationPipeline {
  readonly signatureStage: Stage<'task', 'code_signature'>;
  readonly codeStage: Stage<'task' | 'code_signature', 'code'>;
  readonly testsStage: Stage<'task' | 'code_signature', TestName>;
  readonly repairStage: Stage<'task' | 'old_code' | 'failed_test' | 'error_message', 'fixed_code'>;

  private readonly sandbox: ExecutionSandbox;
  private readonly config: Config;
  private readonly logger: Logger;
  private readonly eventBus?: EventBus;

  constructor(options: PipelineOptions) {
    const examples = parseExampleBank(options.examples);
    const stageOptions = {
      adapter: options.adapter,
      retry: options.config.retry,
      maxDemos: options.config.priming.maxDemos,
      timeoutMs: options.config.provider.timeoutMs,
    };

    this.signatureStage = new Stage(signatureDefinition, examples, stageOptions);
    this.codeStage = new Stage(codeDefinition, examples, stageOptions);
    this.testsStage = new Stage(testsDefinition, examples, stageOptions);
    this.repairStage = new Stage(repairDefinition, examples, stageOptions);

    this.sandbox = options.sandbox;
    this.config = options.config;
    this.logger = options.logger;
    this.eventBus = options.eventBus;
  }

  async generate(task: string, options: GenerateOptions = {}): Promise<GenerationResult> {
    if (!task.trim()) {
      throw new UsageError('Task must be a non-empty string');
    }

    const runId = options.runId ?? randomUUID();
    const startTime = Date.now();
    const ctx: StageContext = { runId, logger: this.logger, abortSignal: options.abortSignal };
    let repairIterations = 0;

    await this.publish('Run started', {
      ...this.base(runId),
      type: 'RunStarted',
      payload: { task },
    });

    try {
      const { code_signature: signature } = await this.signatureStage.invoke(
        {
          task: `Write the signature for a JavaScript function doing the following (if the function uses classes, also include the class definition and their methods): ${task}`,
        },
        ctx,
      );
      await this.publish('Signature generated', {
        ...this.base(runId),
        type: 'SignatureGenerated',
        payload: { codeSignature: signature },
      });

      const generated = await this.codeStage.invoke(
        { task: `Write ${task} with the provided code signature`, code_signature: signature },
        ctx,
      );
      let code = generated.code;
      await this.publish('Code generated', {
        ...this.base(runId),
        type: 'CodeGenerated',
        payload: { code },
      });

      const tests = await this.testsStage.invoke(
        {
          task: `Generate unit tests for the following task with the provided code signature: ${task}`,
          code_signature: signature,
        },
        ctx,
      );
      await this.publish('Tests generated', {
        ...this.base(runId),
        type: 'TestsGenerated',
        payload: { tests: TEST_NAMES.map((name) => ({ name, source: tests[name] })) },
      });

      for (;;) {
        const failure = await this.validate(runId, code, tests, repairIterations);
        if (!failure) break;

        if (repairIterations >= this.config.pipeline.maxRepairAttempts) {
          throw new RepairExhaustedError(repairIterations, {
            details: {
              failedArtifact: failure.artifact,
              error: failure.error,
              lastCode: code,
            },
          });
        }

        repairIterations++;
        await this.publish(`Repair ${repairIterations} requested after ${failure.artifact} failed`, {
          ...this.base(runId),
          type: 'RepairAttempted',
          payload: {
            iteration: repairIterations,
            failedArtifact: failure.failedTest,
            errorMessage: failure.error,
          },
        });

        const repaired = await this.repairStage.invoke(
          {
            task,
            old_code: code,
            failed_test: failure.failedTest,
            error_message: failure.error,
          },
          ctx,
        );
        code = repaired.fixed_code;
        await this.publish(`Repair ${repairIterations} applied`, {
          ...this.base(runId),
          type: 'CodeRepaired',
          payload: { iteration: repairIterations, code },
        });
      }

      const durationMs = Date.now() - startTime;
      await this.publish('Run succeeded', {
        ...this.base(runId),
        type: 'RunFinished',
        payload: { status: 'success', repairIterations, durationMs },
      });
      await this.logger.debug(
        `Run ${runId} passed all generated tests after ${repairIterations} repair(s) in ${durationMs}ms`,
      );

      return { runId, task, signature, code, tests, repairIterations, durationMs };
    } catch (error: unknown) {
      await this.publish('Run failed', {
        ...this.base(runId),
        type: 'RunFinished',
        payload: {
          status: 'failure',
          repairIterations,
          durationMs: Date.now() - startTime,
          summary: error instanceof Error ? error.message : String(error),
        },
      });
      throw error;
    }
  }

  /**
   * Runs the code alone, then each test with it, stopping at the first failure.
   */
  async validate(
    runId: string,
    code: string,
    tests: GeneratedTests,
    iteration = 0,
  ): Promise<ValidationFailure | undefined> {
    const main = { name: MAIN_CODE, source: code };

    const codeError = await this.execute(runId, MAIN_CODE, { units: [main] }, iteration);
    if (codeError !== undefined) {
      return { artifact: MAIN_CODE, failedTest: MAIN_CODE, error: codeError };
    }

    for (const name of TEST_NAMES) {
      const source = tests[name];
      const testError = await this.execute(runId, name, { units: [main, { name, source }] }, iteration);
      if (testError !== undefined) {
        return { artifact: name, failedTest: source, error: testError };
      }
    }

    return undefined;
  }

  private async execute(
    runId: string,
    artifact: string,
    program: SandboxProgram,
    iteration: number,
  ): Promise<string | undefined> {
    const start = Date.now();
    const outcome = await this.sandbox.run(program);
    const error = outcome.status === 'failure' ? outcome.error : undefined;

    const summary =
      error === undefined ? `${artifact} passed` : `${artifact} failed: ${excerpt(error, 200)}`;
    await this.publish(summary, {
      ...this.base(runId),
      type: 'ExecutionFinished',
      payload: {
        artifact,
        iteration,
        success: error === undefined,
        error,
        durationMs: Date.now() - start,
      },
    });
    return error;
  }

  private base(runId: string) {
    return { schemaVersion: 1, timestamp: new Date().toISOString(), runId };
  }

  private async publish(message: string, event: PipelineEvent): Promise<void> {
    await this.logger.trace(event, message);
    await this.eventBus?.emit(event);
  }
}
