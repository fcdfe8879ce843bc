/**
 * Utilities barrel export
 */

export * from './logger';
export * from './config';
export * from './retry';
export * from './async';
export * from './clock';
export * from './ids';
