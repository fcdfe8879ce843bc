/**
 * Orchestrator module - cycle scheduling and interrupt cleanup
 */

export * from './CycleOrchestrator';
export * from './EmergencyCleanup';
