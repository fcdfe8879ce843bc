/**
 * Models barrel export
 */

export * from './MonitorModels';
export * from './Config';
