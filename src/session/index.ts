/**
 * Session sub-module barrel export
 */

export * from './types';
export * from './ExpectChannel';
export * from './SessionTransitions';
export * from './SessionStateMachine';
export * from './ChildTerminal';
export * from './VpnSession';
