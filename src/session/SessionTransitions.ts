/**
 * Transition table for the VPN client conversation
 *
 * Each waiting state lists the patterns it expects. A match (or a timeout, or
 * the end of output) selects a transition: the next state, an optional line
 * to send on entering it, and for error edges a failure description.
 * Action states move on without waiting for output.
 */

import { FailureSeverity, PatternName, SessionState } from './types';

export const TIMEOUT = 'TIMEOUT';
export const EOF = 'EOF';

export type MatchKey = PatternName | typeof TIMEOUT | typeof EOF;

/**
 * Values substituted into outgoing lines
 */
export interface ProtocolContext {
  site: string;
  username: string;
  password: string;
  toolCommand: string;
}

export interface Outbound {
  line: string;
  /** Carries a credential and must not be logged */
  hidden?: boolean;
}

export interface Transition {
  next: SessionState;
  send?: (ctx: ProtocolContext) => Outbound;
  failure?: {
    reason: string;
    severity: FailureSeverity;
  };
}

export interface WaitStep {
  expect: PatternName[];
  on: Partial<Record<MatchKey, Transition>>;
}

function fail(reason: string, severity: FailureSeverity = 'recoverable'): Transition {
  return { next: SessionState.TERMINATED, failure: { reason, severity } };
}

const lost = {
  [TIMEOUT]: fail('timed out waiting for the VPN client'),
  [EOF]: fail('the VPN client exited unexpectedly')
};

/**
 * States that wait for output
 */
export const WAIT_STEPS: Partial<Record<SessionState, WaitStep>> = {
  [SessionState.SPAWNED]: {
    expect: [PatternName.SHELL_PROMPT],
    on: {
      [PatternName.SHELL_PROMPT]: {
        next: SessionState.SHELL_READY,
        send: ctx => ({ line: ctx.toolCommand })
      },
      [TIMEOUT]: fail('the shell did not show its prompt', 'fatal'),
      [EOF]: fail('the shell exited before showing its prompt', 'fatal')
    }
  },

  [SessionState.SHELL_READY]: {
    expect: [PatternName.TOOL_PROMPT],
    on: {
      [PatternName.TOOL_PROMPT]: {
        next: SessionState.TOOL_READY,
        send: () => ({ line: 'disconnect' })
      },
      [TIMEOUT]: fail('unable to start the VPN client', 'nonrecoverable'),
      [EOF]: fail('unable to start the VPN client', 'nonrecoverable')
    }
  },

  [SessionState.TOOL_READY]: {
    expect: [PatternName.TOOL_PROMPT],
    on: {
      [PatternName.TOOL_PROMPT]: {
        next: SessionState.DISCONNECTED,
        send: ctx => ({ line: `connect ${ctx.site}` })
      },
      [TIMEOUT]: fail('unable to reset the VPN connection'),
      [EOF]: lost[EOF]
    }
  },

  [SessionState.DISCONNECTED]: {
    expect: [
      PatternName.USERNAME_PROMPT,
      PatternName.DOMAIN_UNRESOLVED,
      PatternName.CONNECT_UNAVAILABLE,
      PatternName.SERVER_UNVERIFIED
    ],
    on: {
      [PatternName.USERNAME_PROMPT]: {
        next: SessionState.CREDENTIALS_SENT,
        send: ctx => ({ line: ctx.username, hidden: true })
      },
      [PatternName.DOMAIN_UNRESOLVED]: fail('the VPN site name could not be resolved'),
      [PatternName.CONNECT_UNAVAILABLE]: fail('connect is not available', 'nonrecoverable'),
      [PatternName.SERVER_UNVERIFIED]: fail('the VPN server could not be verified'),
      ...lost
    }
  },

  [SessionState.CREDENTIALS_SENT]: {
    expect: [PatternName.PASSWORD_PROMPT],
    on: {
      [PatternName.PASSWORD_PROMPT]: {
        next: SessionState.PASSWORD_SENT,
        send: ctx => ({ line: ctx.password, hidden: true })
      },
      ...lost
    }
  },

  [SessionState.PASSWORD_SENT]: {
    expect: [PatternName.ACCEPT_PROMPT, PatternName.LOGIN_FAILED],
    on: {
      [PatternName.ACCEPT_PROMPT]: {
        next: SessionState.BANNER_PROMPT,
        send: () => ({ line: 'y' })
      },
      [PatternName.LOGIN_FAILED]: fail('login failed'),
      ...lost
    }
  },

  [SessionState.BANNER_PROMPT]: {
    expect: [PatternName.STATE_CONNECTED, PatternName.RETRY_SUGGESTED, PatternName.DRIVER_ERROR],
    on: {
      [PatternName.STATE_CONNECTED]: { next: SessionState.LINK_UP },
      [PatternName.RETRY_SUGGESTED]: fail('the VPN client asked to try connecting again'),
      [PatternName.DRIVER_ERROR]: fail('the VPN driver encountered an error; reboot the host', 'nonrecoverable'),
      ...lost
    }
  },

  [SessionState.LINK_UP]: {
    expect: [PatternName.SITE_CONNECTED],
    on: {
      [PatternName.SITE_CONNECTED]: { next: SessionState.SITE_CONFIRMED },
      ...lost
    }
  },

  [SessionState.SITE_CONFIRMED]: {
    expect: [PatternName.TOOL_PROMPT],
    on: {
      [PatternName.TOOL_PROMPT]: { next: SessionState.CONNECTED },
      ...lost
    }
  },

  [SessionState.DISCONNECT_SENT]: {
    expect: [PatternName.TOOL_PROMPT],
    on: {
      [PatternName.TOOL_PROMPT]: {
        next: SessionState.TOOL_EXITED,
        send: () => ({ line: 'exit' })
      },
      [TIMEOUT]: fail('the VPN client did not confirm the disconnect'),
      [EOF]: lost[EOF]
    }
  },

  [SessionState.TOOL_EXITED]: {
    expect: [PatternName.SHELL_PROMPT],
    on: {
      [PatternName.SHELL_PROMPT]: { next: SessionState.TERMINATED },
      [TIMEOUT]: fail('the VPN client did not exit'),
      [EOF]: fail('the shell exited before showing its prompt')
    }
  }
};

/**
 * States that act without waiting
 */
export const ACTIONS: Partial<Record<SessionState, Transition>> = {
  [SessionState.CONNECTED]: {
    next: SessionState.DISCONNECT_SENT,
    send: () => ({ line: 'disconnect' })
  }
};

/**
 * Look up the transition for a match in a waiting state. Anything the table
 * does not name is an unanticipated failure.
 */
export function transition(state: SessionState, key: MatchKey): Transition {
  const step = WAIT_STEPS[state];
  if (!step) {
    return fail(`no output is expected in state ${state}`);
  }
  return step.on[key] ?? fail(`unexpected ${key} in state ${state}`);
}
