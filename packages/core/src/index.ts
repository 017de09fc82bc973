export const name = '@synthloop/core';

export * from './examples/bank';
export * from './stages';
export * from './pipeline';
export * from './config/loader';
export * from './registry';
export * from './factory';
