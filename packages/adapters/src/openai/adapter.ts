import OpenAI, { APIError, APIConnectionTimeoutError } from 'openai';
import {
  ConfigError,
  RateLimitError,
  TimeoutError,
  type ChatMessage,
  type ModelRequest,
  type ModelResponse,
  type ProviderCapabilities,
  type ProviderConfig,
} from '@synthloop/shared';
import type { ProviderAdapter } from '../adapter';
import type { AdapterContext } from '../types';

const DEFAULT_API_KEY_ENV = 'OPENAI_API_KEY';

export class OpenAIAdapter implements ProviderAdapter {
  private client: OpenAI;
  private modelId: string;
  private maxTokens: number;
  private temperature?: number;

  constructor(config: ProviderConfig, env: NodeJS.ProcessEnv = process.env) {
    const keyEnv = config.api_key_env ?? DEFAULT_API_KEY_ENV;
    const apiKey = config.api_key || env[keyEnv];
    if (!apiKey) {
      throw new ConfigError(
        `Missing API Key for OpenAI provider. Checked config.api_key and env var ${keyEnv}`,
      );
    }
    this.modelId = config.model;
    this.maxTokens = config.maxTokens;
    this.temperature = config.temperature;
    this.client = new OpenAI({
      apiKey,
      baseURL: config.baseUrl,
      // Retries and backoff are driven by executeProviderRequest
      maxRetries: 0,
    });
  }

  id(): string {
    return 'openai';
  }

  model(): string {
    return this.modelId;
  }

  capabilities(): ProviderCapabilities {
    return { supportsJsonMode: true };
  }

  async generate(req: ModelRequest, ctx: AdapterContext): Promise<ModelResponse> {
    try {
      const completion = await this.client.chat.completions.create(
        {
          model: this.modelId,
          messages: this.mapMessages(req.messages),
          max_tokens: req.maxTokens ?? this.maxTokens,
          temperature: req.temperature ?? this.temperature ?? 0.2,
          response_format: req.jsonMode ? { type: 'json_object' } : undefined,
        },
        {
          signal: ctx.abortSignal,
          timeout: ctx.timeoutMs,
        },
      );

      const choice = completion.choices[0];
      const usage = completion.usage
        ? {
            inputTokens: completion.usage.prompt_tokens,
            outputTokens: completion.usage.completion_tokens,
            totalTokens: completion.usage.total_tokens,
          }
        : undefined;

      return {
        text: choice?.message.content ?? undefined,
        usage,
        raw: completion,
      };
    } catch (error) {
      throw this.mapError(error);
    }
  }

  private mapMessages(messages: ChatMessage[]): OpenAI.Chat.ChatCompletionMessageParam[] {
    return messages.map((m) =>
      m.name ? { role: m.role, content: m.content, name: m.name } : { role: m.role, content: m.content },
    );
  }

  private mapError(error: unknown): unknown {
    if (error instanceof APIError) {
      if (error.status === 429) {
        return new RateLimitError(error.message, { cause: error });
      }
      if (error.status === 401) {
        return new ConfigError(error.message, { cause: error });
      }
    }
    if (error instanceof APIConnectionTimeoutError) {
      return new TimeoutError(error.message, { cause: error });
    }
    return error;
  }
}
