#!/usr/bin/env node

/**
 * Command Line Interface for gatewatch
 * Loads parameters (file, .env/environment, flags), wires the monitor and
 * runs the test cycles until done or interrupted.
 */

import { EventEmitter } from 'events';
import { Command, InvalidArgumentError } from 'commander';
import * as dotenv from 'dotenv';
import { MonitorParameters } from './models/Config';
import { Monitor, MonitorOptions, createMonitor, loadParameters, resolveSessionConfig } from './lib';
import { EmergencyCleanup } from './orchestrator/EmergencyCleanup';
import { PARAMS_FILE_DEFAULT } from './utils/config/types';
import { LogLevel, logger, parseLogLevel } from './utils/logger';
import { CLIError, Print, handleCommandError, logInfo, logWarning } from './cli/output';
import { attachReporter } from './cli/reporter';
import { ShutdownHandle, setupGracefulShutdown } from './cli/setup';

export const VERSION = '1.0.0';

export interface CliOptions {
  params: string;
  vpnname?: string;
  vpnurlip?: string;
  username?: string;
  password?: string;
  targets?: string;
  cycles?: number;
  delay?: number;
  datalog?: string;
  quiet?: boolean;
  targetPings?: number;
  logLevel?: string;
  logDir?: string;
}

export interface CliIO {
  print: Print;
  env: NodeJS.ProcessEnv;
  /** Installs interrupt handling; the CLI entry passes setupGracefulShutdown */
  installShutdown?: (cleanup: EmergencyCleanup, abort: () => void) => ShutdownHandle;
  /** Collaborator overrides handed to createMonitor */
  monitorOptions?: MonitorOptions;
}

function parseInteger(value: string): number {
  if (!/^[+-]?\d+$/.test(value.trim())) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parseInt(value, 10);
}

/**
 * Map parsed flags onto parameter overrides; flags not given stay undefined
 */
export function toOverrides(options: CliOptions): Partial<MonitorParameters> {
  return {
    vpnName: options.vpnname,
    vpnAddress: options.vpnurlip,
    username: options.username,
    password: options.password,
    targetsFile: options.targets,
    cycles: options.cycles,
    delaySeconds: options.delay,
    datalogFile: options.datalog,
    quiet: options.quiet ? true : undefined,
    targetPings: options.targetPings
  };
}

/**
 * Resolve parameters and run the monitor.
 *
 * @returns the process exit code
 */
export async function runMonitor(options: CliOptions, io: CliIO): Promise<number> {
  if (options.logLevel) {
    logger.setLevel(parseLogLevel(options.logLevel, LogLevel.INFO));
  }
  if (options.logDir) {
    logger.enableFileLogging(options.logDir);
  }

  const loaded = await loadParameters({
    paramsFile: options.params,
    env: io.env,
    overrides: toOverrides(options)
  });

  if (!loaded.fileFound) {
    logInfo(`Running without a params file (${options.params})`, io.print);
  }

  const params = loaded.params;
  if (params.vpnAddress.trim() === '') {
    io.print('Cannot run without a VPN site URL or IP address.');
    return 0;
  }

  if (!loaded.validation.valid) {
    throw new CLIError(`Invalid parameters: ${loaded.validation.errors.join('; ')}`, 'INVALID_PARAMETERS');
  }
  loaded.validation.warnings.forEach(warning => logWarning(warning, io.print));

  logger.info('Parameters resolved', {
    sources: loaded.metadata.sources,
    vpnName: params.vpnName,
    vpnAddress: params.vpnAddress,
    cycles: params.cycles,
    delaySeconds: params.delaySeconds
  });

  const monitor: Monitor = createMonitor(params, {
    logger,
    sessionConfig: resolveSessionConfig({}, io.env),
    ...io.monitorOptions
  });

  const shutdown = io.installShutdown?.(monitor.cleanup, () => monitor.orchestrator.abort());
  attachReporter(monitor.orchestrator, monitor.sink instanceof EventEmitter ? monitor.sink : null, { print: io.print });

  try {
    await monitor.orchestrator.run();
  } catch (error) {
    if (!shutdown?.isStopping()) {
      await monitor.cleanup.run();
      throw error;
    }
    // The interrupt owns the exit; an error from the cycle it cut short is expected
    logger.debug('Run ended during shutdown', {
      error: error instanceof Error ? error.message : String(error)
    });
  }

  if (shutdown?.isStopping()) {
    await shutdown.settled();
  }
  return 0;
}

export function createProgram(io: CliIO, onExit: (code: number) => void): Command {
  const program = new Command();

  program
    .name('gatewatch')
    .description('Periodically verify a VPN gateway and the hosts reachable through it')
    .version(`gatewatch version ${VERSION}`, '-v, --version', 'output the version number')
    .option('--params <file>', 'parameters file (name,value lines)', PARAMS_FILE_DEFAULT)
    .option('-n, --vpnname <name>', 'VPN gateway display name')
    .option('-a, --vpnurlip <address>', 'VPN gateway URL or IP address')
    .option('-u, --username <user>', 'VPN username')
    .option('-p, --password <pass>', 'VPN password')
    .option('-t, --targets <file>', 'targets file (address,label lines)')
    .option('-c, --cycles <n>', 'number of test cycles; negative runs until interrupted', parseInteger)
    .option('-d, --delay <seconds>', 'seconds between test cycles', parseInteger)
    .option('-l, --datalog <file>', 'result log file')
    .option('-q, --quiet', 'suppress alert sounds')
    .option('--target-pings <n>', 'echo requests per target probe', parseInteger)
    .option('--log-level <level>', 'log level (error, warn, info, http, debug)')
    .option('--log-dir <dir>', 'also write JSON logs to this directory')
    .action(async (options: CliOptions) => {
      onExit(await runMonitor(options, io));
    });

  return program;
}

export async function main(argv: string[] = process.argv): Promise<void> {
  dotenv.config();

  let exitCode = 0;
  const shutdown: { handle?: ShutdownHandle } = {};
  const io: CliIO = {
    print: (line) => console.log(line),
    env: process.env,
    installShutdown: (cleanup, abort) => {
      shutdown.handle = setupGracefulShutdown(cleanup, { abort });
      return shutdown.handle;
    }
  };

  await createProgram(io, (code) => {
    exitCode = code;
  }).parseAsync(argv);

  if (shutdown.handle?.isStopping()) {
    return;
  }
  await logger.close();
  process.exit(exitCode);
}

if (require.main === module) {
  main().catch((error: unknown) => handleCommandError(error));
}
