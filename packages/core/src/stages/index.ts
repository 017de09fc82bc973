export * from './definitions';
export * from './fields';
export * from './prime';
export * from './prompt';
export * from './stage';
