export { ConfigManager } from './ConfigManager';
export {
  applyParameter,
  loadEnvParameters,
  loadEnvSessionConfig,
  loadParametersFile,
  loadTargets,
  parseBooleanParameter,
  parseIntegerParameter
} from './ConfigLoader';
export { validateParameters } from './ConfigValidator';
export {
  ConfigError,
  ConfigSource,
  DATALOG_FILE_DEFAULT,
  DEFAULT_PARAMETERS,
  DEFAULT_PROBE_CONFIG,
  DEFAULT_SINK_CONFIG,
  ENV_MAPPINGS,
  PARAMS_FILE_DEFAULT,
  TARGETS_FILE_DEFAULT,
  defaultSessionConfig
} from './types';
export type { ConfigMetadata, ValidationResult } from './types';
