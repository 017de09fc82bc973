import { z } from 'zod';

/**
 * Scripted replies for the fake provider: stage name -> queue of replies.
 * A reply is either a map of output fields or the raw text to return.
 */
export const FakeReplySchema = z.union([z.string(), z.record(z.string(), z.string())]);
export const FakeResponsesSchema = z.record(z.string(), z.array(FakeReplySchema));

export const ProviderSettingsSchema = z.object({
  type: z.enum(['openai', 'anthropic', 'fake']).default('openai'),
  /** Defaults per provider type, see `DEFAULT_MODELS` */
  model: z.string().optional(),
  api_key_env: z.string().optional(),
  api_key: z.string().optional(),
  baseUrl: z.string().url().optional(),
  /** Generation-length ceiling per stage call */
  maxTokens: z.number().int().min(1).default(1000),
  temperature: z.number().min(0).max(2).optional(),
  /** Per-attempt request timeout */
  timeoutMs: z.number().int().min(1).default(60_000),
  responses: FakeResponsesSchema.optional(),
});

export const DEFAULT_MODELS: Record<z.infer<typeof ProviderSettingsSchema>['type'], string> = {
  openai: 'gpt-4o',
  anthropic: 'claude-3-5-sonnet-latest',
  fake: 'fake',
};

export const ProviderConfigSchema = ProviderSettingsSchema.transform((provider) => ({
  ...provider,
  model: provider.model ?? DEFAULT_MODELS[provider.type],
}));

export const PipelineConfigSchema = z.object({
  /** Upper bound on repair iterations before the run is abandoned */
  maxRepairAttempts: z.number().int().min(0).default(5),
});

export const PrimingConfigSchema = z.object({
  maxDemos: z.number().int().min(0).default(4),
});

/**
 * Backoff for stage invocations (transient endpoint errors and malformed replies).
 */
export const RetryConfigSchema = z.object({
  maxRetries: z.number().int().min(0).default(3),
  initialDelayMs: z.number().int().min(0).default(1000),
  maxDelayMs: z.number().int().min(0).default(10_000),
  backoffFactor: z.number().min(1).default(2),
});

export const SandboxConfigSchema = z.object({
  mode: z.enum(['process', 'inline']).default('process'),
  timeoutMs: z.number().int().min(100).default(10_000),
  maxOldSpaceMb: z.number().int().min(16).default(128),
  maxOutputBytes: z.number().int().min(1024).default(1_048_576),
});

export const ConfigSchema = z.object({
  configVersion: z.literal(1).default(1),
  provider: ProviderConfigSchema.default({}),
  pipeline: PipelineConfigSchema.default({}),
  priming: PrimingConfigSchema.default({}),
  retry: RetryConfigSchema.default({}),
  sandbox: SandboxConfigSchema.default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type ProviderConfig = z.infer<typeof ProviderConfigSchema>;
export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;
export type PrimingConfig = z.infer<typeof PrimingConfigSchema>;
export type RetryConfig = z.infer<typeof RetryConfigSchema>;
export type SandboxConfig = z.infer<typeof SandboxConfigSchema>;
export type FakeReply = z.infer<typeof FakeReplySchema>;
export type FakeResponses = z.infer<typeof FakeResponsesSchema>;
