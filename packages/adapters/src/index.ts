export const name = '@synthloop/adapters';

export * from './types';

export * from './adapter';

export * from './common';

export * from './openai/adapter';
export * from './anthropic/adapter';
export * from './fake/adapter';
