export type { Logger, MaybePromise } from './types';
export { ConsoleLogger } from './consoleLogger';
export { JsonlLogger } from './jsonlLogger';
