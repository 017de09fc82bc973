import { describe, it, expect } from 'vitest';
import { ConfigError } from '@synthloop/shared';
import { createPipeline } from './factory';
import { CodeGenerationPipeline } from './pipeline';
import { RecordingLogger, sampleExamples, testConfig } from './__fixtures__/test-config';
import { ProviderRegistry } from './registry';

describe('createPipeline', () => {
  it('builds a pipeline from configuration', () => {
    const pipeline = createPipeline(testConfig(), {
      examples: sampleExamples,
      logger: new RecordingLogger(),
    });

    expect(pipeline).toBeInstanceOf(CodeGenerationPipeline);
    expect(pipeline.signatureStage.demos).toHaveLength(2);
  });

  it('fails before any stage runs when the provider is not available', () => {
    expect(() =>
      createPipeline(testConfig(), {
        examples: sampleExamples,
        logger: new RecordingLogger(),
        registry: new ProviderRegistry(),
      }),
    ).toThrow(ConfigError);
  });
});
