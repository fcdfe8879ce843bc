/**
 * gatewatch package entry: the programmatic API
 */

export * from './lib';
