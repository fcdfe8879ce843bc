/**
 * SessionStateMachine - drives a SessionTerminal through the transition table
 */

import { EventEmitter } from 'events';
import {
  PatternSet,
  SessionFailure,
  SessionState,
  SessionTerminal
} from './types';
import {
  ACTIONS,
  EOF,
  MatchKey,
  ProtocolContext,
  TIMEOUT,
  Transition,
  WAIT_STEPS,
  transition
} from './SessionTransitions';
import { MonitorLogger } from '../utils/logger';
import { delay } from '../utils/async';

export interface SessionStateMachineOptions {
  terminal: SessionTerminal;
  logger: MonitorLogger;
  /** Wait before every line sent, in milliseconds */
  commandDelay: number;
  /** Bound on every wait for output, in milliseconds */
  expectTimeout: number;
  /** Log credential lines verbatim instead of as [HIDDEN] */
  logCredentials?: boolean;
  sleep?: (ms: number) => Promise<void>;
}

export interface TransitionEvent {
  from: SessionState;
  to: SessionState;
  /** Pattern name, TIMEOUT or EOF; undefined for action states */
  key?: MatchKey;
}

export interface RunResult {
  state: SessionState;
  failure?: SessionFailure;
}

/**
 * Emits 'transition' with a TransitionEvent on every state change.
 */
export class SessionStateMachine extends EventEmitter {
  private readonly options: SessionStateMachineOptions;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: SessionStateMachineOptions) {
    super();
    this.options = options;
    this.sleep = options.sleep ?? delay;
  }

  /**
   * Advance from `from` until `goal` is reached or an error edge is taken.
   * Error edges stop immediately; teardown is the caller's job.
   */
  async run(from: SessionState, goal: SessionState, ctx: ProtocolContext, patterns: PatternSet): Promise<RunResult> {
    const { terminal, logger, expectTimeout } = this.options;
    let state = from;

    while (state !== goal) {
      let next: Transition;
      let key: MatchKey | undefined;
      let output = '';

      const action = ACTIONS[state];
      const step = WAIT_STEPS[state];
      if (action) {
        next = action;
      } else if (!step) {
        next = transition(state, EOF);
      } else {
        const expected = step.expect;
        const result = await terminal.expect(expected.map(name => patterns[name]), expectTimeout);

        if (result.status === 'matched') {
          key = expected[result.index];
        } else {
          key = result.status === 'timeout' ? TIMEOUT : EOF;
        }
        output = result.before;
        next = transition(state, key);
      }

      logger.debug(`Session ${state} -> ${next.next}`, { matched: key });
      this.emit('transition', { from: state, to: next.next, key });

      if (next.failure) {
        return {
          state: next.next,
          failure: { state, reason: next.failure.reason, severity: next.failure.severity, output }
        };
      }

      if (next.send) {
        const outbound = next.send(ctx);
        await this.sleep(this.options.commandDelay);
        logger.inputSent(outbound.line, Boolean(outbound.hidden) && !this.options.logCredentials);
        try {
          terminal.sendLine(outbound.line);
        } catch (error) {
          return {
            state: SessionState.TERMINATED,
            failure: {
              state,
              reason: `unable to send input: ${error instanceof Error ? error.message : String(error)}`,
              severity: 'recoverable',
              output
            }
          };
        }
      }

      state = next.next;
    }

    return { state };
  }
}
