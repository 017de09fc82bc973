import Anthropic from '@anthropic-ai/sdk';
import {
  ConfigError,
  RateLimitError,
  TimeoutError,
  type ChatMessage,
  type ModelRequest,
  type ModelResponse,
  type ProviderCapabilities,
  type ProviderConfig,
  type Usage,
} from '@synthloop/shared';
import type { ProviderAdapter } from '../adapter';
import type { AdapterContext } from '../types';

const DEFAULT_API_KEY_ENV = 'ANTHROPIC_API_KEY';

export class AnthropicAdapter implements ProviderAdapter {
  private client: Anthropic;
  private modelId: string;
  private maxTokens: number;
  private temperature?: number;

  constructor(config: ProviderConfig, env: NodeJS.ProcessEnv = process.env) {
    const keyEnv = config.api_key_env ?? DEFAULT_API_KEY_ENV;
    const apiKey = config.api_key || env[keyEnv];
    if (!apiKey) {
      throw new ConfigError(
        `Missing API Key for Anthropic provider. Checked config.api_key and env var ${keyEnv}`,
      );
    }
    this.modelId = config.model;
    this.maxTokens = config.maxTokens;
    this.temperature = config.temperature;
    this.client = new Anthropic({
      apiKey,
      baseURL: config.baseUrl,
      // Retries and backoff are driven by executeProviderRequest
      maxRetries: 0,
    });
  }

  id(): string {
    return 'anthropic';
  }

  model(): string {
    return this.modelId;
  }

  capabilities(): ProviderCapabilities {
    return { supportsJsonMode: false };
  }

  async generate(req: ModelRequest, ctx: AdapterContext): Promise<ModelResponse> {
    try {
      const { system, messages } = this.mapMessages(req.messages);

      const response = await this.client.messages.create(
        {
          model: this.modelId,
          max_tokens: req.maxTokens ?? this.maxTokens,
          system,
          messages,
          temperature: req.temperature ?? this.temperature,
        },
        {
          signal: ctx.abortSignal,
          timeout: ctx.timeoutMs,
        },
      );

      const text = response.content.flatMap((b) => (b.type === 'text' ? [b.text] : [])).join('');

      const usage: Usage = {
        inputTokens: response.usage.input_tokens,
        outputTokens: response.usage.output_tokens,
        totalTokens: response.usage.input_tokens + response.usage.output_tokens,
      };

      return {
        text,
        usage,
        raw: response,
      };
    } catch (error) {
      throw this.mapError(error);
    }
  }

  // Anthropic takes the system prompt separately and expects alternating turns.
  private mapMessages(messages: ChatMessage[]): {
    system?: string;
    messages: Anthropic.MessageParam[];
  } {
    let system: string | undefined;
    const mappedMessages: Anthropic.MessageParam[] = [];

    for (const m of messages) {
      if (m.role === 'system') {
        system = system ? system + '\n' + m.content : m.content;
        continue;
      }
      const previous = mappedMessages[mappedMessages.length - 1];
      if (previous && previous.role === m.role && typeof previous.content === 'string') {
        previous.content = previous.content + '\n\n' + m.content;
      } else {
        mappedMessages.push({ role: m.role, content: m.content });
      }
    }

    return { system, messages: mappedMessages };
  }

  private mapError(error: unknown): Error {
    if (error instanceof Anthropic.APIError) {
      if (error.status === 429) {
        return new RateLimitError(error.message, { cause: error });
      }
      if (error.status === 401) {
        return new ConfigError(error.message, { cause: error });
      }
    }
    if (error instanceof Anthropic.APIConnectionTimeoutError) {
      return new TimeoutError(error.message, { cause: error });
    }
    if (error instanceof Error) return error;
    return new Error(String(error));
  }
}
