/**
 * ConfigManager - layered parameter resolution
 * defaults < params file < environment < command line
 */

import path from 'path';
import { MonitorParameters } from '../../models/Config';
import { ConfigMetadata, ConfigSource, DEFAULT_PARAMETERS, ValidationResult } from './types';
import { loadEnvParameters, loadParametersFile } from './ConfigLoader';
import { validateParameters } from './ConfigValidator';

function pickDefined<T extends object>(partial: Partial<T>): Partial<T> {
  const result: Partial<T> = {};
  for (const key in partial) {
    if (partial[key] !== undefined) {
      result[key] = partial[key];
    }
  }
  return result;
}

export class ConfigManager {
  private params: MonitorParameters;
  private metadata: ConfigMetadata;

  constructor(initial?: Partial<MonitorParameters>) {
    this.params = { ...DEFAULT_PARAMETERS, ...initial };
    this.metadata = {
      sources: [ConfigSource.DEFAULT],
      loadedAt: new Date()
    };
  }

  /**
   * Merge the optional parameters file.
   *
   * @returns false when the file does not exist
   * @throws ConfigError when the file exists but cannot be read or parsed
   */
  async loadFromFile(filePath: string): Promise<boolean> {
    const fileParams = await loadParametersFile(filePath);
    if (fileParams === null) {
      return false;
    }

    this.merge(fileParams, ConfigSource.FILE);
    this.metadata.filePath = path.resolve(filePath);
    return true;
  }

  loadFromEnvironment(env: NodeJS.ProcessEnv = process.env): void {
    const envParams = loadEnvParameters(env);
    if (Object.keys(envParams).length > 0) {
      this.merge(envParams, ConfigSource.ENVIRONMENT);
    }
  }

  /**
   * Apply command-line overrides; undefined values leave the current value alone
   */
  applyOverrides(overrides: Partial<MonitorParameters>): void {
    const defined = pickDefined(overrides);
    if (Object.keys(defined).length > 0) {
      this.merge(defined, ConfigSource.COMMAND_LINE);
    }
  }

  getParameters(): MonitorParameters {
    return { ...this.params };
  }

  getMetadata(): ConfigMetadata {
    return { ...this.metadata, sources: [...this.metadata.sources] };
  }

  validate(): ValidationResult {
    return validateParameters(this.params);
  }

  private merge(partial: Partial<MonitorParameters>, source: ConfigSource): void {
    this.params = { ...this.params, ...partial };
    if (!this.metadata.sources.includes(source)) {
      this.metadata.sources.push(source);
    }
    this.metadata.loadedAt = new Date();
  }
}
