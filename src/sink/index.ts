export * from './ResultSink';
