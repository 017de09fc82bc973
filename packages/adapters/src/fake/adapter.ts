import {
  ProviderError,
  type FakeReply,
  type FakeResponses,
  type ModelRequest,
  type ModelResponse,
  type ProviderCapabilities,
  type ProviderConfig,
} from '@synthloop/shared';

import type { ProviderAdapter } from '../adapter';
import type { AdapterContext } from '../types';

/**
 * Offline adapter that answers each stage from a scripted queue.
 *
 * The requesting stage is read from `request.metadata.stage`. Field-map replies are
 * wrapped into the JSON object the stages expect; string replies are returned verbatim,
 * which lets tests feed malformed output.
 */
export class FakeAdapter implements ProviderAdapter {
  private readonly modelId: string;
  private readonly queues = new Map<string, FakeReply[]>();
  /** Every request received, in order */
  readonly requests: ModelRequest[] = [];

  constructor(config: Pick<ProviderConfig, 'model' | 'responses'> = { model: 'fake' }) {
    this.modelId = config.model;
    this.enqueueAll(config.responses ?? {});
  }

  id(): string {
    return 'fake';
  }

  model(): string {
    return this.modelId;
  }

  capabilities(): ProviderCapabilities {
    return { supportsJsonMode: true };
  }

  enqueue(stage: string, ...replies: FakeReply[]): this {
    const queue = this.queues.get(stage) ?? [];
    queue.push(...replies);
    this.queues.set(stage, queue);
    return this;
  }

  enqueueAll(responses: FakeResponses): this {
    for (const [stage, replies] of Object.entries(responses)) {
      this.enqueue(stage, ...replies);
    }
    return this;
  }

  /** Number of requests received for a stage */
  callCount(stage: string): number {
    return this.requests.filter((r) => stageOf(r) === stage).length;
  }

  async generate(request: ModelRequest, _context: AdapterContext): Promise<ModelResponse> {
    this.requests.push(request);
    const stage = stageOf(request);
    const reply = this.queues.get(stage)?.shift();

    if (reply === undefined) {
      throw new ProviderError(`Fake provider has no scripted reply left for stage "${stage}"`);
    }

    if (typeof reply === 'string') {
      return { text: reply };
    }
    return { text: JSON.stringify({ reasoning: 'Scripted reply.', ...reply }) };
  }
}

function stageOf(request: ModelRequest): string {
  const stage = request.metadata?.stage;
  return typeof stage === 'string' ? stage : 'default';
}
