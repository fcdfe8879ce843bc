export * from './Alerter';
