/**
 * CycleOrchestrator - runs the monitoring test cycles
 *
 * One cycle: reload targets, probe the gateway, open a VPN session when the
 * gateway answers, probe every target through it, close the session, append
 * the cycle's records to the result log. Cycles repeat with a fixed delay
 * until the count runs out or abort() is called.
 */

import { EventEmitter } from 'events';
import {
  CycleRecord,
  CycleReport,
  Outcome,
  RecordKind,
  RunSummary,
  TargetMap,
  TargetTally
} from '../models/MonitorModels';
import { MonitorParameters, ProbeConfig } from '../models/Config';
import { Probe, WebProbe, isWebAddress } from '../probe/types';
import { SessionFailure, SessionResult } from '../session/types';
import { SinkFatalError } from '../sink/ResultSink';
import { GATEWAY_ALERT_PULSES, TARGET_ALERT_PULSES } from '../alert/Alerter';
import { DEFAULT_PROBE_CONFIG } from '../utils/config/types';
import { Clock, dateAndTimeOfDay, systemClock } from '../utils/clock';
import { abortableDelay } from '../utils/async';
import { MonitorLogger, logger as defaultLogger } from '../utils/logger';

/**
 * The VPN session as the orchestrator drives it
 */
export interface MonitorSession {
  connect(site: string, username: string, password: string): Promise<SessionResult>;
  disconnect(): Promise<SessionResult>;
}

export interface RecordSink {
  write(records: readonly CycleRecord[]): Promise<Outcome>;
}

export interface PulseEmitter {
  pulse(count: number): Promise<void>;
}

export type TargetLoader = (path: string) => Promise<{ targets: TargetMap; found: boolean }>;

export interface CycleOrchestratorDeps {
  session: MonitorSession;
  probe: Probe;
  webProbe: WebProbe;
  sink: RecordSink;
  alerter: PulseEmitter;
  loadTargets: TargetLoader;
  probeConfig?: Partial<ProbeConfig>;
  clock?: Clock;
  sleep?: (ms: number, signal: AbortSignal) => Promise<void>;
  logger?: MonitorLogger;
}

/**
 * Orchestrator events
 */
export interface OrchestratorEvents {
  'cycle:start': (cycle: number, totalCycles: number) => void;
  'targets:missing': (path: string) => void;
  'item:tested': (record: CycleRecord, failure?: SessionFailure) => void;
  'cycle:end': (report: CycleReport) => void;
  'run:waiting': (delaySeconds: number) => void;
  'run:end': (summary: RunSummary) => void;
}

export class CycleOrchestrator extends EventEmitter {
  private readonly params: MonitorParameters;
  private readonly deps: CycleOrchestratorDeps;
  private readonly probeConfig: ProbeConfig;
  private readonly clock: Clock;
  private readonly sleep: (ms: number, signal: AbortSignal) => Promise<void>;
  private readonly logger: MonitorLogger;
  private abortController = new AbortController();

  constructor(params: MonitorParameters, deps: CycleOrchestratorDeps) {
    super();
    this.params = params;
    this.deps = deps;
    this.probeConfig = { ...DEFAULT_PROBE_CONFIG, ...deps.probeConfig };
    this.clock = deps.clock ?? systemClock;
    this.sleep = deps.sleep ?? abortableDelay;
    this.logger = (deps.logger ?? defaultLogger).child({ component: 'CycleOrchestrator' });
  }

  /**
   * Run cycles until the count is exhausted (never, for a negative count) or
   * abort() is called. There is no wait after the final cycle.
   *
   * @throws ConfigError when the targets file exists but cannot be read
   * @throws SessionFatalError when a session cannot be established at all
   * @throws SinkFatalError when the result log cannot be written
   */
  async run(): Promise<RunSummary> {
    const startTime = this.clock();
    let remaining = this.params.cycles;
    let cycle = 0;

    this.logger.info('Starting test cycles', {
      cycles: remaining < 0 ? 'infinite' : remaining,
      delaySeconds: this.params.delaySeconds
    });

    while (remaining !== 0 && !this.isAborted()) {
      cycle++;
      await this.runCycle(cycle);

      if (remaining > 0) {
        remaining--;
      }

      if (remaining !== 0 && !this.isAborted()) {
        this.emit('run:waiting', this.params.delaySeconds);
        await this.sleep(this.params.delaySeconds * 1000, this.abortController.signal);
      }
    }

    const summary: RunSummary = {
      cyclesRun: cycle,
      aborted: this.isAborted(),
      startTime,
      endTime: this.clock()
    };
    this.logger.info(`${cycle} test cycles completed`, { aborted: summary.aborted });
    this.emit('run:end', summary);
    return summary;
  }

  /**
   * Run one cycle and flush its records
   */
  async runCycle(cycle: number): Promise<CycleReport> {
    const { session, probe, alerter } = this.deps;
    const params = this.params;
    const log = this.logger.child({ cycle });

    this.emit('cycle:start', cycle, params.cycles);

    const { targets, found } = await this.deps.loadTargets(params.targetsFile);
    if (!found) {
      log.debug(`No targets file at ${params.targetsFile}`);
      this.emit('targets:missing', params.targetsFile);
    }

    const records: CycleRecord[] = [];
    const tally: TargetTally = { good: 0, warn: 0, fail: 0 };
    const report: CycleReport = {
      cycle,
      gatewayProbe: Outcome.FAIL,
      targets: tally,
      records,
      recorded: Outcome.FAIL
    };

    report.gatewayProbe = await probe.probe(params.vpnAddress, this.probeConfig.gatewayPings, this.probeConfig.pingTimeout);
    this.record(records, cycle, RecordKind.GATEWAY_PROBE, report.gatewayProbe, params.vpnAddress, params.vpnName);

    if (report.gatewayProbe !== Outcome.GOOD) {
      log.warn(`Gateway ${params.vpnAddress} probe: ${report.gatewayProbe}`);
      await alerter.pulse(GATEWAY_ALERT_PULSES);
    } else {
      const opened = await session.connect(params.vpnAddress, params.username, params.password);
      report.sessionOpen = opened.outcome;
      this.record(records, cycle, RecordKind.SESSION_OPEN, opened.outcome, params.vpnAddress, params.vpnName, opened.failure);

      if (opened.outcome !== Outcome.GOOD) {
        await alerter.pulse(GATEWAY_ALERT_PULSES);
      } else {
        try {
          await this.probeTargets(cycle, targets, records, tally, log);
        } finally {
          const closed = await session.disconnect();
          report.sessionClose = closed.outcome;
          this.record(records, cycle, RecordKind.SESSION_CLOSE, closed.outcome, params.vpnAddress, params.vpnName, closed.failure);
          if (closed.outcome !== Outcome.GOOD) {
            await alerter.pulse(GATEWAY_ALERT_PULSES);
          }
        }
      }
    }

    report.recorded = await this.flush(records, log);
    this.emit('cycle:end', report);
    return report;
  }

  abort(): void {
    this.logger.info('Aborting test cycles');
    this.abortController.abort();
  }

  isAborted(): boolean {
    return this.abortController.signal.aborted;
  }

  private async probeTargets(
    cycle: number,
    targets: TargetMap,
    records: CycleRecord[],
    tally: TargetTally,
    log: MonitorLogger
  ): Promise<void> {
    for (const [address, label] of targets) {
      let outcome: Outcome;
      try {
        outcome = isWebAddress(address)
          ? await this.deps.webProbe.webProbe(address, this.probeConfig.webTimeout)
          : await this.deps.probe.probe(address, this.params.targetPings, this.probeConfig.pingTimeout);
      } catch (error) {
        log.error(`Probe of ${address} raised an error`, {
          error: error instanceof Error ? error.message : String(error)
        });
        outcome = Outcome.FAIL;
      }

      this.record(records, cycle, RecordKind.TARGET_PROBE, outcome, address, label);

      if (outcome === Outcome.GOOD) {
        tally.good++;
      } else {
        if (outcome === Outcome.WARN) {
          tally.warn++;
        } else {
          tally.fail++;
        }
        await this.deps.alerter.pulse(TARGET_ALERT_PULSES);
      }
    }
  }

  /**
   * Contention is reported and the cycle's records are dropped. Any other sink
   * failure ends the run, after giving the session a chance to close.
   */
  private async flush(records: CycleRecord[], log: MonitorLogger): Promise<Outcome> {
    try {
      const outcome = await this.deps.sink.write(records);
      if (outcome !== Outcome.GOOD) {
        log.warn(`Results of this cycle were not recorded (${records.length} records dropped)`);
      }
      return outcome;
    } catch (error) {
      if (error instanceof SinkFatalError) {
        await this.closeSessionAfterFatal(log);
      }
      throw error;
    }
  }

  private async closeSessionAfterFatal(log: MonitorLogger): Promise<void> {
    try {
      await this.deps.session.disconnect();
    } catch (error) {
      log.error('Unable to close the VPN session', {
        error: error instanceof Error ? error.message : String(error)
      });
    }
  }

  private record(
    records: CycleRecord[],
    cycle: number,
    kind: RecordKind,
    outcome: Outcome,
    address: string,
    label: string,
    failure?: SessionFailure
  ): void {
    const { date, time } = dateAndTimeOfDay(this.clock());
    const record: CycleRecord = { cycle, date, time, kind, outcome, address, label };
    records.push(record);
    this.emit('item:tested', record, failure);
  }
}
