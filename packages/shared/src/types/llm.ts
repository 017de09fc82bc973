/**
 * A message in a conversation with an LLM provider.
 */
export interface ChatMessage {
  /** The role of the message sender */
  role: 'system' | 'user' | 'assistant';
  /** The text content of the message */
  content: string;
  /** Optional name identifier for the message sender */
  name?: string;
}

/**
 * Request payload for generating a model response.
 *
 * @example
 * ```typescript
 * const request: ModelRequest = {
 *   messages: [{ role: 'user', content: 'Hello!' }],
 *   maxTokens: 1000,
 *   temperature: 0.7
 * };
 * ```
 */
export interface ModelRequest {
  /** Conversation history to send to the model */
  messages: ChatMessage[];
  /** Maximum tokens to generate in the response */
  maxTokens?: number;
  /** Sampling temperature (0-2, higher = more random) */
  temperature?: number;
  /** Request JSON-formatted output */
  jsonMode?: boolean;
  /** Additional metadata to pass through (e.g. the requesting stage) */
  metadata?: Record<string, unknown>;
}

/**
 * Token usage statistics from a model response.
 */
export interface Usage {
  /** Number of tokens in the input/prompt */
  inputTokens?: number;
  /** Number of tokens generated in the output */
  outputTokens?: number;
  /** Total tokens (input + output) */
  totalTokens?: number;
}

/**
 * Response from a model generation request.
 */
export interface ModelResponse {
  /** Generated text content */
  text?: string;
  /** Token usage statistics */
  usage?: Usage;
  /** Raw provider-specific response data */
  raw?: unknown;
}

/**
 * Describes the capabilities of an LLM provider adapter.
 */
export interface ProviderCapabilities {
  /** Whether the provider supports JSON mode output */
  supportsJsonMode: boolean;
}
