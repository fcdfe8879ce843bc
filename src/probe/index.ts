export * from './types';
export * from './PingProbe';
export * from './HttpProbe';
