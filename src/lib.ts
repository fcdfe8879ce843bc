/**
 * Programmatic library API for gatewatch
 *
 * Parameter loading and monitor assembly without the CLI. This module has
 * NO Commander imports and NO process-level side effects (signal handlers,
 * unhandledRejection listeners, etc.); embedders call
 * `monitor.orchestrator.abort()` and `monitor.cleanup.run()` themselves.
 */

import { MonitorParameters, ProbeConfig, SessionConfig, SinkConfig } from './models/Config';
import { ConfigManager } from './utils/config/ConfigManager';
import { loadEnvSessionConfig, loadTargets } from './utils/config/ConfigLoader';
import { ConfigMetadata, PARAMS_FILE_DEFAULT, ValidationResult, defaultSessionConfig } from './utils/config/types';
import { MonitorLogger, logger as defaultLogger } from './utils/logger';
import { Clock } from './utils/clock';
import { ProcessLifecycleManager, getProcessLifecycleManager } from './core/ProcessLifecycleManager';
import { ChildTerminal } from './session/ChildTerminal';
import { VpnSession } from './session/VpnSession';
import { PingProbe } from './probe/PingProbe';
import { HttpProbe } from './probe/HttpProbe';
import { Probe, WebProbe } from './probe/types';
import { ResultSink } from './sink/ResultSink';
import { Alerter } from './alert/Alerter';
import {
  CycleOrchestrator,
  MonitorSession,
  PulseEmitter,
  RecordSink,
  TargetLoader
} from './orchestrator/CycleOrchestrator';
import { Closable, EmergencyCleanup } from './orchestrator/EmergencyCleanup';

export interface LoadParametersOptions {
  /** Parameters file; defaults to gatewatch_params.csv in the working directory */
  paramsFile?: string;
  env?: NodeJS.ProcessEnv;
  /** Highest-precedence values, e.g. from command-line flags */
  overrides?: Partial<MonitorParameters>;
}

export interface LoadedParameters {
  params: MonitorParameters;
  /** Whether the parameters file existed */
  fileFound: boolean;
  validation: ValidationResult;
  metadata: ConfigMetadata;
}

/**
 * Resolve parameters: defaults < parameters file < environment < overrides.
 *
 * @throws ConfigError when the parameters file exists but cannot be read or parsed
 */
export async function loadParameters(options: LoadParametersOptions = {}): Promise<LoadedParameters> {
  const manager = new ConfigManager();
  const fileFound = await manager.loadFromFile(options.paramsFile ?? PARAMS_FILE_DEFAULT);
  manager.loadFromEnvironment(options.env ?? process.env);
  if (options.overrides) {
    manager.applyOverrides(options.overrides);
  }

  return {
    params: manager.getParameters(),
    fileFound,
    validation: manager.validate(),
    metadata: manager.getMetadata()
  };
}

/**
 * Session settings for this platform with environment tunables applied
 */
export function resolveSessionConfig(
  overrides: Partial<SessionConfig> = {},
  env: NodeJS.ProcessEnv = process.env
): SessionConfig {
  return loadEnvSessionConfig({ ...defaultSessionConfig(), ...overrides }, env);
}

export interface MonitorOptions {
  logger?: MonitorLogger;
  sessionConfig?: SessionConfig;
  sinkConfig?: Partial<SinkConfig>;
  probeConfig?: Partial<ProbeConfig>;
  /** Collaborator overrides; real implementations are built for any left out */
  session?: MonitorSession;
  probe?: Probe;
  webProbe?: WebProbe;
  sink?: RecordSink & Closable;
  alerter?: PulseEmitter;
  loadTargets?: TargetLoader;
  clock?: Clock;
  sleep?: (ms: number, signal: AbortSignal) => Promise<void>;
}

export interface Monitor {
  orchestrator: CycleOrchestrator;
  session: MonitorSession;
  sink: RecordSink & Closable;
  /** Releases the session and the result log on an interrupt */
  cleanup: EmergencyCleanup;
}

/**
 * Wire a monitor for one run
 */
export function createMonitor(params: MonitorParameters, options: MonitorOptions = {}): Monitor {
  const logger = options.logger ?? defaultLogger;

  let session: MonitorSession;
  let processManager: ProcessLifecycleManager | null = null;
  if (options.session) {
    session = options.session;
  } else {
    processManager = getProcessLifecycleManager();
    session = createVpnSession(options.sessionConfig ?? resolveSessionConfig(), processManager, logger);
  }
  const sink = options.sink ?? new ResultSink(params.datalogFile, { config: options.sinkConfig, logger });

  const orchestrator = new CycleOrchestrator(params, {
    session,
    probe: options.probe ?? new PingProbe(undefined, logger),
    webProbe: options.webProbe ?? new HttpProbe(undefined, logger),
    sink,
    alerter: options.alerter ?? new Alerter({ quiet: params.quiet }),
    loadTargets: options.loadTargets ?? loadTargets,
    probeConfig: options.probeConfig,
    clock: options.clock,
    sleep: options.sleep,
    logger
  });

  const cleanup = new EmergencyCleanup(logger);
  cleanup.registerSession(session);
  cleanup.registerSink(sink);
  if (processManager) {
    cleanup.registerProcesses(processManager);
  }

  return { orchestrator, session, sink, cleanup };
}

function createVpnSession(
  config: SessionConfig,
  processManager: ProcessLifecycleManager,
  logger: MonitorLogger
): VpnSession {
  return new VpnSession({
    config,
    terminal: new ChildTerminal(
      { shell: config.shell, shellArgs: config.shellArgs, environment: config.environment },
      processManager,
      logger
    ),
    reaper: processManager,
    logger
  });
}

export { Outcome, RecordKind, formatRecord } from './models/MonitorModels';
export type { CycleRecord, CycleReport, RunSummary, TargetMap, TargetTally } from './models/MonitorModels';
export type { MonitorParameters, ProbeConfig, SessionConfig, SinkConfig } from './models/Config';
export { loadTargets } from './utils/config/ConfigLoader';
export { ConfigError, DEFAULT_PARAMETERS, defaultSessionConfig } from './utils/config/types';
export { MonitorLogger, LogLevel, createLogger } from './utils/logger';
export { CycleOrchestrator } from './orchestrator/CycleOrchestrator';
export type { MonitorSession, RecordSink, PulseEmitter, TargetLoader } from './orchestrator/CycleOrchestrator';
export { EmergencyCleanup } from './orchestrator/EmergencyCleanup';
export { VpnSession } from './session/VpnSession';
export { SessionFatalError, SessionState } from './session/types';
export { PingProbe } from './probe/PingProbe';
export { HttpProbe } from './probe/HttpProbe';
export { classifyRepetitions } from './probe/types';
export { ResultSink, SinkError, SinkFatalError, classifyIoError } from './sink/ResultSink';
export { Alerter } from './alert/Alerter';
