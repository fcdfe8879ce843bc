/**
 * Shared types and defaults for configuration utilities
 */

import { MonitorParameters, ProbeConfig, SessionConfig, SinkConfig } from '../../models/Config';

/**
 * Configuration loading error. Always fatal to a run.
 */
export class ConfigError extends Error {
  constructor(message: string, public configPath?: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Where the current parameter values came from, lowest precedence first
 */
export enum ConfigSource {
  DEFAULT = 'default',
  FILE = 'file',
  ENVIRONMENT = 'environment',
  COMMAND_LINE = 'command-line'
}

export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

/**
 * Configuration metadata
 *
 * Never snapshots process.env: it holds the VPN password.
 */
export interface ConfigMetadata {
  sources: ConfigSource[];
  loadedAt: Date;
  filePath?: string;
}

export const PARAMS_FILE_DEFAULT = 'gatewatch_params.csv';
export const TARGETS_FILE_DEFAULT = 'gatewatch_targets.csv';
export const DATALOG_FILE_DEFAULT = 'gatewatch_datalog.csv';

export const DEFAULT_PARAMETERS: MonitorParameters = {
  vpnName: 'VPN Gateway',
  vpnAddress: '',
  username: '',
  password: '',
  targetsFile: TARGETS_FILE_DEFAULT,
  cycles: 200,
  delaySeconds: 1800,
  datalogFile: DATALOG_FILE_DEFAULT,
  quiet: false,
  targetPings: 2
};

/**
 * Environment variables mapped to parameter file keys
 */
export const ENV_MAPPINGS: Record<string, string> = {
  'GATEWATCH_VPNNAME': 'vpnname',
  'GATEWATCH_VPNURLIP': 'vpnurlip',
  'GATEWATCH_USERNAME': 'username',
  'GATEWATCH_PASSWORD': 'password',
  'GATEWATCH_TARGETS': 'targets',
  'GATEWATCH_CYCLES': 'cycles',
  'GATEWATCH_DELAY': 'delay',
  'GATEWATCH_DATALOG': 'datalog',
  'GATEWATCH_QUIET': 'quiet',
  'GATEWATCH_TARGET_PINGS': 'targetpings'
};

const WINDOWS_VPNCLI =
  'c:\\"Program Files (x86)"\\Cisco\\"Cisco AnyConnect Secure Mobility Client"\\vpncli';

/**
 * Session defaults for the current (or given) platform
 */
export function defaultSessionConfig(platform: NodeJS.Platform = process.platform): SessionConfig {
  const common = {
    shellPrompt: '>',
    toolPrompt: 'VPN>',
    commandDelay: 500,
    expectTimeout: 120000,
    logCredentials: false
  };

  if (platform === 'win32') {
    return {
      ...common,
      shell: process.env.COMSPEC || 'cmd.exe',
      shellArgs: [],
      environment: {},
      toolCommand: WINDOWS_VPNCLI,
      preemptProcesses: ['vpnui.exe', 'vpncli.exe'],
      toolProcesses: ['vpncli.exe']
    };
  }

  return {
    ...common,
    shell: '/bin/sh',
    shellArgs: ['-i'],
    environment: { PS1: '> ' },
    toolCommand: '/opt/cisco/anyconnect/bin/vpn',
    preemptProcesses: ['vpnui', 'vpn'],
    toolProcesses: ['vpn']
  };
}

export const DEFAULT_SINK_CONFIG: SinkConfig = {
  maxAttempts: 5,
  retryDelay: 15000
};

export const DEFAULT_PROBE_CONFIG: ProbeConfig = {
  gatewayPings: 2,
  pingTimeout: 1000,
  webTimeout: 5000
};
