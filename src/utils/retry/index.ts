export { RetryManager } from './RetryExecutor';
export type { RetryOptions, RetryResult } from './types';
