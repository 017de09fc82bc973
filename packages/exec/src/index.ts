export const name = '@synthloop/exec';

export * from './sandbox';
