/**
 * EmergencyCleanup - the resources an interrupt must release
 *
 * Holds only what the shutdown path needs: the live session, the result sink
 * and the tracker of spawned processes. Ordinary calls never route through it.
 */

import { SessionResult } from '../session/types';
import { MonitorLogger, logger as defaultLogger } from '../utils/logger';

export interface Disconnectable {
  disconnect(): Promise<SessionResult>;
}

export interface Closable {
  close(): Promise<void>;
}

export interface ProcessShutdown {
  shutdown(): Promise<void>;
}

export interface CleanupReport {
  sessionClosed: boolean;
  sinkClosed: boolean;
}

export class EmergencyCleanup {
  private session: Disconnectable | null = null;
  private sink: Closable | null = null;
  private processes: ProcessShutdown | null = null;
  private running: Promise<CleanupReport> | null = null;
  private readonly logger: MonitorLogger;

  constructor(logger: MonitorLogger = defaultLogger) {
    this.logger = logger.child({ component: 'EmergencyCleanup' });
  }

  registerSession(session: Disconnectable): void {
    this.session = session;
  }

  registerSink(sink: Closable): void {
    this.sink = sink;
  }

  /**
   * Processes still tracked once the session is closed are killed last
   */
  registerProcesses(processes: ProcessShutdown): void {
    this.processes = processes;
  }

  /**
   * Disconnect the session, close the sink and stop leftover processes, each
   * best-effort.
   * Runs once; later calls return the first run's result.
   */
  run(): Promise<CleanupReport> {
    if (!this.running) {
      this.running = this.release();
    }
    return this.running;
  }

  private async release(): Promise<CleanupReport> {
    const report: CleanupReport = { sessionClosed: false, sinkClosed: false };

    if (this.session) {
      try {
        await this.session.disconnect();
        report.sessionClosed = true;
      } catch (error) {
        this.logger.warn('Unable to close the VPN session during shutdown', {
          error: error instanceof Error ? error.message : String(error)
        });
      }
    }

    if (this.sink) {
      try {
        await this.sink.close();
        report.sinkClosed = true;
      } catch (error) {
        this.logger.warn('Unable to close the datalog file during shutdown', {
          error: error instanceof Error ? error.message : String(error)
        });
      }
    }

    if (this.processes) {
      try {
        await this.processes.shutdown();
      } catch (error) {
        this.logger.warn('Unable to stop the remaining child processes during shutdown', {
          error: error instanceof Error ? error.message : String(error)
        });
      }
    }

    return report;
  }
}
