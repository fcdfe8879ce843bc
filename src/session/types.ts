/**
 * Session sub-module shared types
 *
 * States, pattern names, terminal seams and errors used by the
 * VPN client automation.
 */

import { Outcome } from '../models/MonitorModels';

/**
 * Lifecycle states of the interactive session
 */
export enum SessionState {
  UNSTARTED = 'unstarted',
  SPAWNED = 'spawned',
  SHELL_READY = 'shell_ready',
  TOOL_READY = 'tool_ready',
  DISCONNECTED = 'disconnected',
  CREDENTIALS_SENT = 'credentials_sent',
  PASSWORD_SENT = 'password_sent',
  BANNER_PROMPT = 'banner_prompt',
  LINK_UP = 'link_up',
  SITE_CONFIRMED = 'site_confirmed',
  CONNECTED = 'connected',
  DISCONNECT_SENT = 'disconnect_sent',
  TOOL_EXITED = 'tool_exited',
  TERMINATED = 'terminated'
}

/**
 * Named output patterns the VPN client is known to print
 */
export enum PatternName {
  SHELL_PROMPT = 'shellPrompt',
  TOOL_PROMPT = 'toolPrompt',
  USERNAME_PROMPT = 'usernamePrompt',
  PASSWORD_PROMPT = 'passwordPrompt',
  DOMAIN_UNRESOLVED = 'domainUnresolved',
  CONNECT_UNAVAILABLE = 'connectUnavailable',
  SERVER_UNVERIFIED = 'serverUnverified',
  ACCEPT_PROMPT = 'acceptPrompt',
  LOGIN_FAILED = 'loginFailed',
  STATE_CONNECTED = 'stateConnected',
  RETRY_SUGGESTED = 'retrySuggested',
  DRIVER_ERROR = 'driverError',
  SITE_CONNECTED = 'siteConnected'
}

export type Pattern = string | RegExp;

export type PatternSet = Record<PatternName, Pattern>;

/**
 * Output of the VPN client, as observed on AnyConnect's CLI.
 * SITE_CONNECTED is a placeholder; the site name is substituted per connect.
 */
export const DEFAULT_PATTERNS: Omit<PatternSet, PatternName.SHELL_PROMPT | PatternName.TOOL_PROMPT | PatternName.SITE_CONNECTED> = {
  [PatternName.USERNAME_PROMPT]: 'Username:',
  [PatternName.PASSWORD_PROMPT]: 'Password:',
  [PatternName.DOMAIN_UNRESOLVED]: 'unsuccessful domain name',
  [PatternName.CONNECT_UNAVAILABLE]: 'Connect not available.',
  [PatternName.SERVER_UNVERIFIED]: 'cannot verify server',
  [PatternName.ACCEPT_PROMPT]: 'accept?',
  [PatternName.LOGIN_FAILED]: 'Login failed',
  [PatternName.STATE_CONNECTED]: 'state: Connected',
  [PatternName.RETRY_SUGGESTED]: 'Please try connecting again',
  [PatternName.DRIVER_ERROR]: 'driver encountered an error'
};

/**
 * What ended a wait for output
 */
export type ExpectStatus = 'matched' | 'timeout' | 'eof';

export interface ExpectResult {
  status: ExpectStatus;
  /** Index into the pattern list when matched, -1 otherwise */
  index: number;
  /** Output consumed before the match, or everything unconsumed on timeout/eof */
  before: string;
  /** Matched text */
  match?: string;
}

/**
 * Interactive child process as seen by the session
 */
export interface SessionTerminal {
  /** Spawn the shell. Throws when it cannot be started. */
  start(): void;
  isAlive(): boolean;
  sendLine(line: string): void;
  expect(patterns: Pattern[], timeout: number): Promise<ExpectResult>;
  /** Force-terminate the child and anything it started */
  terminate(): Promise<void>;
}

/**
 * Kills system-wide instances of a program by image name
 */
export interface ProcessReaper {
  killByName(name: string): Promise<void>;
}

/**
 * recoverable: a later cycle may succeed. nonrecoverable: operator action is needed.
 * fatal: the session could not be established at all; raised as SessionFatalError.
 */
export type FailureSeverity = 'recoverable' | 'nonrecoverable' | 'fatal';

export interface SessionFailure {
  /** State the session was in when the step failed */
  state: SessionState;
  /** What went wrong, e.g. 'login failed' or 'timeout' */
  reason: string;
  severity: FailureSeverity;
  /** Unconsumed output captured at the failure */
  output: string;
}

/**
 * Result of a connect or disconnect call
 */
export interface SessionResult {
  outcome: Outcome;
  failure?: SessionFailure;
}

/**
 * Raised when exclusivity of the VPN client or the shell start cannot be guaranteed
 */
export class SessionFatalError extends Error {
  constructor(
    message: string,
    public readonly operation: string,
    public readonly output: string = ''
  ) {
    super(message);
    this.name = 'SessionFatalError';
  }
}
