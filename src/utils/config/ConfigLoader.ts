/**
 * ConfigLoader - parameter file, environment and target file loading
 */

import fs from 'fs/promises';
import path from 'path';
import { MonitorParameters, SessionConfig } from '../../models/Config';
import { TargetMap } from '../../models/MonitorModels';
import { ConfigError, ENV_MAPPINGS } from './types';

const TRUE_VALUES = ['true', 'yes', 'on', '1'];

/**
 * Parse an integer parameter; anything but an optionally signed run of digits is rejected
 */
export function parseIntegerParameter(raw: string, name: string, origin?: string): number {
  const value = raw.trim();
  if (!/^[+-]?\d+$/.test(value)) {
    throw new ConfigError(`Parameter ${name} must be an integer, got "${raw}"`, origin);
  }
  return parseInt(value, 10);
}

export function parseBooleanParameter(raw: string): boolean {
  return TRUE_VALUES.includes(raw.trim().toLowerCase());
}

/**
 * Apply one named parameter to a partial parameter set.
 *
 * @returns false when the name is not a known parameter
 */
export function applyParameter(
  target: Partial<MonitorParameters>,
  name: string,
  raw: string,
  origin?: string
): boolean {
  const key = name.trim().toLowerCase();
  const value = raw.trim();

  switch (key) {
    case 'vpnname':
      target.vpnName = value;
      return true;
    case 'vpnurlip':
      target.vpnAddress = value;
      return true;
    case 'username':
      target.username = value;
      return true;
    case 'password':
      target.password = value;
      return true;
    case 'targets':
      target.targetsFile = value;
      return true;
    case 'cycles':
      target.cycles = parseIntegerParameter(value, key, origin);
      return true;
    case 'delay':
      target.delaySeconds = parseIntegerParameter(value, key, origin);
      return true;
    case 'datalog':
      target.datalogFile = value;
      return true;
    case 'quiet':
      target.quiet = parseBooleanParameter(value);
      return true;
    case 'targetpings':
      target.targetPings = parseIntegerParameter(value, key, origin);
      return true;
    default:
      return false;
  }
}

function isParameterName(name: string): boolean {
  return Object.values(ENV_MAPPINGS).includes(name.trim().toLowerCase());
}

/**
 * Read a whole file, returning null when it does not exist.
 * Any other failure to read an existing file is a ConfigError.
 */
async function readOptionalFile(filePath: string, description: string): Promise<string | null> {
  try {
    return await fs.readFile(path.resolve(filePath), 'utf-8');
  } catch (error: unknown) {
    if (isNodeError(error) && error.code === 'ENOENT') {
      return null;
    }
    throw new ConfigError(
      `Failed to read the ${description} ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      filePath
    );
  }
}

function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * Non-blank lines with their 1-based line numbers
 */
function splitLines(content: string): Array<{ lineNumber: number; text: string }> {
  return content
    .split(/\r?\n/)
    .map((text, index) => ({ lineNumber: index + 1, text }))
    .filter(line => line.text.trim() !== '');
}

/**
 * Load the optional parameters file (lines of `name,value`). Unknown names are
 * ignored; a known name without a value field is a ConfigError.
 *
 * @returns null when the file does not exist
 */
export async function loadParametersFile(filePath: string): Promise<Partial<MonitorParameters> | null> {
  const content = await readOptionalFile(filePath, 'params file');
  if (content === null) return null;

  const params: Partial<MonitorParameters> = {};
  for (const { lineNumber, text } of splitLines(content)) {
    const [name, ...values] = text.split(',');
    if (values.length === 0) {
      if (isParameterName(name)) {
        throw new ConfigError(
          `Malformed entry on line ${lineNumber} of the params file ${filePath}: expected "name,value"`,
          filePath
        );
      }
      continue;
    }
    applyParameter(params, name, values[0], filePath);
  }
  return params;
}

/**
 * Build a partial parameter set from environment variables using ENV_MAPPINGS
 */
export function loadEnvParameters(env: NodeJS.ProcessEnv = process.env): Partial<MonitorParameters> {
  const params: Partial<MonitorParameters> = {};

  Object.entries(ENV_MAPPINGS).forEach(([envVar, name]) => {
    const envValue = env[envVar];
    if (envValue !== undefined) {
      applyParameter(params, name, envValue, envVar);
    }
  });

  return params;
}

/**
 * Apply the session tunables that may come from the environment
 */
export function loadEnvSessionConfig(
  base: SessionConfig,
  env: NodeJS.ProcessEnv = process.env
): SessionConfig {
  const config = { ...base };

  if (env.GATEWATCH_CMD_DELAY_MS !== undefined) {
    config.commandDelay = parseIntegerParameter(env.GATEWATCH_CMD_DELAY_MS, 'GATEWATCH_CMD_DELAY_MS');
  }
  if (env.GATEWATCH_EXPECT_TIMEOUT_MS !== undefined) {
    config.expectTimeout = parseIntegerParameter(env.GATEWATCH_EXPECT_TIMEOUT_MS, 'GATEWATCH_EXPECT_TIMEOUT_MS');
  }
  if (env.GATEWATCH_VPN_CLI) {
    config.toolCommand = env.GATEWATCH_VPN_CLI;
  }

  return config;
}

/**
 * Load the optional targets file (lines of `address,label`).
 *
 * Only the first two fields of a line are significant. An absent file yields an
 * empty map; a present file that cannot be read, or a line without a label, is a
 * ConfigError.
 */
export async function loadTargets(filePath: string): Promise<{ targets: TargetMap; found: boolean }> {
  const content = await readOptionalFile(filePath, 'targets file');
  const targets: TargetMap = new Map();
  if (content === null) {
    return { targets, found: false };
  }

  splitLines(content).forEach(({ lineNumber, text }) => {
    const fields = text.split(',');
    if (fields.length < 2) {
      throw new ConfigError(
        `Malformed entry on line ${lineNumber} of the targets file ${filePath}: expected "address,label"`,
        filePath
      );
    }
    targets.set(fields[0].trim(), fields[1].trim());
  });

  return { targets, found: true };
}
