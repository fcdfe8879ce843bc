/**
 * VpnSession - the one interactive VPN client session of a run
 *
 * Responsible for:
 * - Ending competing VPN client instances before a session is opened
 * - Driving login, connect and disconnect through the state machine
 * - Converging every failure on the same teardown so that no call leaves
 *   a half-open session behind
 *
 * connect() and disconnect() never interleave: a call made while another is in
 * flight waits for it, and a disconnect() made during a disconnect joins it.
 */

import { Outcome } from '../models/MonitorModels';
import { SessionConfig } from '../models/Config';
import { MonitorLogger } from '../utils/logger';
import { generateId } from '../utils/ids';
import { SessionStateMachine, RunResult, TransitionEvent } from './SessionStateMachine';
import { ProtocolContext } from './SessionTransitions';
import {
  DEFAULT_PATTERNS,
  PatternName,
  PatternSet,
  ProcessReaper,
  SessionFatalError,
  SessionResult,
  SessionState,
  SessionTerminal
} from './types';

export interface VpnSessionOptions {
  config: SessionConfig;
  terminal: SessionTerminal;
  reaper: ProcessReaper;
  logger: MonitorLogger;
  sleep?: (ms: number) => Promise<void>;
}

export class VpnSession {
  private readonly config: SessionConfig;
  private readonly terminal: SessionTerminal;
  private readonly reaper: ProcessReaper;
  private readonly logger: MonitorLogger;
  private readonly machine: SessionStateMachine;
  private state: SessionState = SessionState.UNSTARTED;
  private context: ProtocolContext | null = null;
  private queue: Promise<void> = Promise.resolve();
  private disconnecting: Promise<SessionResult> | null = null;

  constructor(options: VpnSessionOptions) {
    this.config = options.config;
    this.terminal = options.terminal;
    this.reaper = options.reaper;
    this.logger = options.logger.child({ component: 'VpnSession', sessionId: generateId('session') });
    this.machine = new SessionStateMachine({
      terminal: this.terminal,
      logger: this.logger,
      commandDelay: this.config.commandDelay,
      expectTimeout: this.config.expectTimeout,
      logCredentials: this.config.logCredentials,
      sleep: options.sleep
    });
    this.machine.on('transition', ({ to }: TransitionEvent) => {
      this.state = to;
    });
  }

  getState(): SessionState {
    return this.state;
  }

  isConnected(): boolean {
    return this.state === SessionState.CONNECTED && this.terminal.isAlive();
  }

  /**
   * Open a VPN connection to `site`.
   *
   * @returns GOOD only when every step matched in order; FAIL otherwise, with the
   * child and any VPN client process already terminated
   * @throws SessionFatalError when competing clients cannot be ended or the shell
   * cannot be started
   */
  connect(site: string, username: string, password: string): Promise<SessionResult> {
    return this.serialize(() => this.openSession(site, username, password));
  }

  /**
   * Close the VPN connection and end the client. A no-op returning GOOD when no
   * session process is alive, so it is safe to call speculatively.
   */
  disconnect(): Promise<SessionResult> {
    if (this.disconnecting) {
      return this.disconnecting;
    }

    const closing = this.serialize(async () => {
      try {
        return await this.closeSession();
      } finally {
        this.disconnecting = null;
      }
    });
    this.disconnecting = closing;
    return closing;
  }

  private serialize<T>(operation: () => Promise<T>): Promise<T> {
    const run = this.queue.then(operation);
    this.queue = run.then(() => undefined, () => undefined);
    return run;
  }

  private async openSession(site: string, username: string, password: string): Promise<SessionResult> {
    if (this.terminal.isAlive()) {
      this.logger.warn('Previous session still running; terminating it before connecting');
      await this.teardown();
    }

    await this.endCompetingClients();

    this.context = { site, username, password, toolCommand: this.config.toolCommand };
    this.logger.info(`Connecting to ${site}`);

    try {
      this.terminal.start();
    } catch (error) {
      this.state = SessionState.TERMINATED;
      const message = error instanceof Error ? error.message : String(error);
      throw new SessionFatalError(`Unable to spawn the shell that runs the VPN client: ${message}`, 'spawn');
    }
    this.state = SessionState.SPAWNED;

    const result = await this.machine.run(SessionState.SPAWNED, SessionState.CONNECTED, this.context, this.patterns(site));
    if (result.failure) {
      return this.failed('connect', result);
    }

    this.logger.info(`Connected to ${site}`);
    return { outcome: Outcome.GOOD };
  }

  private async closeSession(): Promise<SessionResult> {
    if (!this.terminal.isAlive()) {
      if (this.state !== SessionState.UNSTARTED) {
        this.state = SessionState.TERMINATED;
      }
      return { outcome: Outcome.GOOD };
    }

    if (this.state !== SessionState.CONNECTED || !this.context) {
      const failedIn = this.state;
      this.logger.warn(`Disconnect requested in state ${failedIn}; terminating the session`);
      await this.teardown();
      return {
        outcome: Outcome.FAIL,
        failure: { state: failedIn, reason: 'the session was not connected', severity: 'recoverable', output: '' }
      };
    }

    const result = await this.machine.run(
      SessionState.CONNECTED,
      SessionState.TERMINATED,
      this.context,
      this.patterns(this.context.site)
    );
    if (result.failure) {
      return this.failed('disconnect', result);
    }

    await this.teardown();
    this.logger.info('Disconnected');
    return { outcome: Outcome.GOOD };
  }

  /**
   * Force-terminate the shell and any VPN client process. Never throws.
   */
  async teardown(): Promise<void> {
    try {
      await this.terminal.terminate();
    } catch (error) {
      this.logger.warn('Unable to terminate the session shell', {
        error: error instanceof Error ? error.message : String(error)
      });
    }

    for (const name of this.config.toolProcesses) {
      try {
        await this.reaper.killByName(name);
      } catch (error) {
        this.logger.warn(`Unable to end ${name}`, {
          error: error instanceof Error ? error.message : String(error)
        });
      }
    }

    this.state = SessionState.TERMINATED;
  }

  private async failed(operation: 'connect' | 'disconnect', result: RunResult): Promise<SessionResult> {
    const failure = result.failure;
    await this.teardown();

    if (!failure) {
      return { outcome: Outcome.FAIL };
    }

    this.logger.warn(`Session ${operation} failed: ${failure.reason}`, {
      state: failure.state,
      severity: failure.severity,
      output: failure.output
    });

    if (failure.severity === 'fatal') {
      throw new SessionFatalError(`Unable to start a session: ${failure.reason}`, operation, failure.output);
    }
    return { outcome: Outcome.FAIL, failure };
  }

  private async endCompetingClients(): Promise<void> {
    for (const name of this.config.preemptProcesses) {
      try {
        await this.reaper.killByName(name);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        throw new SessionFatalError(`Unable to end an existing VPN client (${name}): ${message}`, 'preempt');
      }
    }
  }

  private patterns(site: string): PatternSet {
    return {
      ...DEFAULT_PATTERNS,
      [PatternName.SHELL_PROMPT]: this.config.shellPrompt,
      [PatternName.TOOL_PROMPT]: this.config.toolPrompt,
      [PatternName.SITE_CONNECTED]: `Connected to ${site}`
    };
  }
}
