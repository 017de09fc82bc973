import {
  ConfigError,
  GenerationError,
  UsageError,
  excerpt,
  extractJsonObject,
  unwrapCodeFence,
  type Logger,
  type ModelRequest,
  type RetryConfig,
} from '@synthloop/shared';
import { executeProviderRequest, type ProviderAdapter } from '@synthloop/adapters';
import type { Example } from '../examples/bank';
import type { StageDefinition, StageName } from './definitions';
import { hasStringFields, isRecord, missingFields, type Fields } from './fields';
import { primeStage, type Demo } from './prime';
import { renderStagePrompt } from './prompt';

const REPLY_EXCERPT_CHARS = 500;

export interface StageOptions {
  adapter: ProviderAdapter;
  retry: RetryConfig;
  maxDemos: number;
  /** Per-attempt limit for one model request */
  timeoutMs?: number;
}

export interface StageContext {
  runId: string;
  logger: Logger;
  abortSignal?: AbortSignal;
}

/**
 * A primed model call that turns named input fields into named output fields.
 */
export class Stage<I extends string, O extends string> {
  readonly demos: readonly Demo<I, O>[];

  constructor(
    readonly definition: StageDefinition<I, O>,
    examples: readonly Example[],
    private readonly options: StageOptions,
  ) {
    this.demos = primeStage(definition, examples, { maxDemos: options.maxDemos });
  }

  get name(): StageName {
    return this.definition.name;
  }

  async invoke(inputs: Fields<I>, ctx: StageContext): Promise<Fields<O>> {
    const inputNames = this.definition.inputs.map((f) => f.name);
    const missing = missingFields(inputs, inputNames);
    if (missing.length > 0) {
      throw new UsageError(`Stage "${this.name}" is missing inputs: ${missing.join(', ')}`);
    }

    const request: ModelRequest = {
      messages: renderStagePrompt(this.definition, this.demos, inputs),
      jsonMode: this.options.adapter.capabilities().supportsJsonMode,
      metadata: { stage: this.name },
    };
    const { adapter } = this.options;
    const logger = ctx.logger.child({ stage: this.name });

    try {
      return await executeProviderRequest(
        {
          runId: ctx.runId,
          logger,
          abortSignal: ctx.abortSignal,
          timeoutMs: this.options.timeoutMs,
          retryOptions: this.options.retry,
        },
        adapter.id(),
        adapter.model(),
        async (signal) => {
          const response = await adapter.generate(request, {
            runId: ctx.runId,
            logger,
            abortSignal: signal,
          });
          return this.parseReply(response.text);
        },
      );
    } catch (error: unknown) {
      if (error instanceof GenerationError || error instanceof ConfigError || ctx.abortSignal?.aborted) {
        throw error;
      }
      const reason = error instanceof Error ? error.message : String(error);
      throw new GenerationError(this.name, `Model request failed: ${reason}`, { cause: error });
    }
  }

  /**
   * Reads the output fields from a model reply. Each value loses a single
   * surrounding markdown fence if it has one.
   */
  parseReply(text: string | undefined): Fields<O> {
    if (!text || !text.trim()) {
      throw new GenerationError(this.name, 'Empty reply from model');
    }

    let parsed: unknown;
    try {
      parsed = extractJsonObject(text, `${this.name} stage`);
    } catch (error: unknown) {
      throw new GenerationError(this.name, error instanceof Error ? error.message : String(error), {
        cause: error,
        details: { reply: excerpt(text, REPLY_EXCERPT_CHARS) },
      });
    }
    if (!isRecord(parsed)) {
      throw new GenerationError(this.name, 'Reply is not a JSON object', {
        details: { reply: excerpt(text, REPLY_EXCERPT_CHARS) },
      });
    }

    const outputNames = this.definition.outputs.map((f) => f.name);
    const outputs: Record<string, unknown> = {};
    for (const name of outputNames) {
      const value = parsed[name];
      outputs[name] = typeof value === 'string' && value.trim() ? unwrapCodeFence(value) : undefined;
    }

    if (!hasStringFields(outputs, outputNames)) {
      throw new GenerationError(
        this.name,
        `Reply is missing output fields: ${missingFields(outputs, outputNames).join(', ')}`,
        { details: { reply: excerpt(text, REPLY_EXCERPT_CHARS) } },
      );
    }
    return outputs;
  }
}
