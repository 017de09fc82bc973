export const name = '@synthloop/shared';

export * from './types/events';
export * from './types/llm';
export * from './logger';
export * from './redaction';
export * from './errors';
export * from './text-utils';
export * from './config/schema';
