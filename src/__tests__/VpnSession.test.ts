import { Outcome } from '../models/MonitorModels';
import { SessionConfig } from '../models/Config';
import { VpnSession } from '../session/VpnSession';
import { ProcessReaper, SessionFatalError, SessionState } from '../session/types';
import { createLogger } from '../utils/logger';
import { CONNECT_REPLIES, DISCONNECT_REPLIES, SITE, ScriptedTerminal } from '../../tests/helpers/ScriptedTerminal';

const config: SessionConfig = {
  shell: '/bin/sh',
  shellArgs: [],
  environment: {},
  shellPrompt: '$ ',
  toolCommand: 'vpn',
  toolPrompt: 'VPN> ',
  preemptProcesses: ['vpnui', 'vpn'],
  toolProcesses: ['vpn'],
  commandDelay: 0,
  expectTimeout: 20,
  logCredentials: false
};

describe('VpnSession', () => {
  const logger = createLogger({ enableConsole: false });
  let terminal: ScriptedTerminal;
  let reaper: jest.Mocked<ProcessReaper>;
  let session: VpnSession;

  const connect = () => session.connect(SITE, 'test-user', 'test-secret');

  beforeEach(() => {
    terminal = new ScriptedTerminal('$ ', [...CONNECT_REPLIES, ...DISCONNECT_REPLIES]);
    reaper = { killByName: jest.fn((_name: string) => Promise.resolve()) };
    session = new VpnSession({ config, terminal, reaper, logger, sleep: () => Promise.resolve() });
  });

  describe('connect', () => {
    it('should end competing clients and connect', async () => {
      const result = await connect();

      expect(result).toEqual({ outcome: Outcome.GOOD });
      expect(reaper.killByName.mock.calls).toEqual([['vpnui'], ['vpn']]);
      expect(session.getState()).toBe(SessionState.CONNECTED);
      expect(session.isConnected()).toBe(true);
    });

    it('should tear the session down when the login fails', async () => {
      terminal.script([...CONNECT_REPLIES.slice(0, 4), 'Login failed.\n']);

      const result = await connect();

      expect(result.outcome).toBe(Outcome.FAIL);
      expect(result.failure?.reason).toBe('login failed');
      expect(terminal.terminate).toHaveBeenCalledTimes(1);
      expect(reaper.killByName.mock.calls).toEqual([['vpnui'], ['vpn'], ['vpn']]);
      expect(terminal.isAlive()).toBe(false);
      expect(session.getState()).toBe(SessionState.TERMINATED);
    });

    it('should report a client that never starts as a failure, not a fatal error', async () => {
      terminal.script(['vpn: command not found\n']);

      const result = await connect();

      expect(result.outcome).toBe(Outcome.FAIL);
      expect(result.failure?.severity).toBe('nonrecoverable');
      expect(terminal.terminate).toHaveBeenCalledTimes(1);
    });

    it('should raise SessionFatalError when a competing client cannot be ended', async () => {
      reaper.killByName.mockRejectedValueOnce(new Error('access denied'));

      const error = await connect().catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(SessionFatalError);
      expect(error).toMatchObject({
        operation: 'preempt',
        message: 'Unable to end an existing VPN client (vpnui): access denied'
      });
      expect(terminal.starts).toBe(0);
    });

    it('should raise SessionFatalError when the shell cannot be spawned', async () => {
      terminal.startError = new Error('spawn /bin/sh ENOENT');

      await expect(connect()).rejects.toMatchObject({
        name: 'SessionFatalError',
        operation: 'spawn',
        message: 'Unable to spawn the shell that runs the VPN client: spawn /bin/sh ENOENT'
      });
      expect(session.getState()).toBe(SessionState.TERMINATED);
    });

    it('should raise SessionFatalError with the output when the shell prompt never shows', async () => {
      terminal = new ScriptedTerminal('Microsoft Windows [Version 10.0]\n');
      session = new VpnSession({ config, terminal, reaper, logger, sleep: () => Promise.resolve() });

      await expect(connect()).rejects.toMatchObject({
        operation: 'connect',
        message: 'Unable to start a session: the shell did not show its prompt',
        output: 'Microsoft Windows [Version 10.0]\n'
      });
      expect(terminal.terminate).toHaveBeenCalledTimes(1);
    });

    it('should terminate a session left running before connecting again', async () => {
      await connect();
      terminal.script(CONNECT_REPLIES);

      const result = await connect();

      expect(result.outcome).toBe(Outcome.GOOD);
      expect(terminal.terminate).toHaveBeenCalledTimes(1);
      expect(terminal.starts).toBe(2);
    });
  });

  describe('disconnect', () => {
    it('should disconnect, exit the client and tear down', async () => {
      await connect();

      const result = await session.disconnect();

      expect(result).toEqual({ outcome: Outcome.GOOD });
      expect(terminal.sent.slice(-2)).toEqual(['disconnect', 'exit']);
      expect(terminal.terminate).toHaveBeenCalledTimes(1);
      expect(reaper.killByName.mock.calls).toEqual([['vpnui'], ['vpn'], ['vpn']]);
      expect(session.getState()).toBe(SessionState.TERMINATED);
      expect(session.isConnected()).toBe(false);
    });

    it('should be a no-op when no session was started', async () => {
      await expect(session.disconnect()).resolves.toEqual({ outcome: Outcome.GOOD });
      await expect(session.disconnect()).resolves.toEqual({ outcome: Outcome.GOOD });

      expect(terminal.terminate).not.toHaveBeenCalled();
      expect(terminal.sent).toEqual([]);
      expect(session.getState()).toBe(SessionState.UNSTARTED);
    });

    it('should be a no-op after a completed disconnect', async () => {
      await connect();
      await session.disconnect();

      await expect(session.disconnect()).resolves.toEqual({ outcome: Outcome.GOOD });
      expect(terminal.terminate).toHaveBeenCalledTimes(1);
    });

    it('should fail and tear down when the client does not confirm', async () => {
      await connect();
      terminal.script(['  >> state: Disconnecting\n']);

      const result = await session.disconnect();

      expect(result.outcome).toBe(Outcome.FAIL);
      expect(result.failure?.reason).toBe('the VPN client did not confirm the disconnect');
      expect(result.failure?.output).toBe('  >> state: Disconnecting\n');
      expect(terminal.terminate).toHaveBeenCalledTimes(1);
    });

    it('should fail and tear down a running shell that never connected', async () => {
      terminal.start();

      const result = await session.disconnect();

      expect(result).toEqual({
        outcome: Outcome.FAIL,
        failure: {
          state: SessionState.UNSTARTED,
          reason: 'the session was not connected',
          severity: 'recoverable',
          output: ''
        }
      });
      expect(terminal.terminate).toHaveBeenCalledTimes(1);
    });
  });

  describe('overlapping calls', () => {
    it('should let a disconnect made during connect wait for the connection', async () => {
      const connecting = connect();
      const closing = session.disconnect();

      await expect(connecting).resolves.toEqual({ outcome: Outcome.GOOD });
      await expect(closing).resolves.toEqual({ outcome: Outcome.GOOD });
      expect(terminal.sent.slice(-2)).toEqual(['disconnect', 'exit']);
      expect(terminal.terminate).toHaveBeenCalledTimes(1);
      expect(session.getState()).toBe(SessionState.TERMINATED);
    });

    it('should join a disconnect already in flight', async () => {
      await connect();
      const sentBefore = terminal.sent.length;

      const first = session.disconnect();
      const second = session.disconnect();

      expect(second).toBe(first);
      await expect(first).resolves.toEqual({ outcome: Outcome.GOOD });
      expect(terminal.sent.slice(sentBefore)).toEqual(['disconnect', 'exit']);
      expect(terminal.terminate).toHaveBeenCalledTimes(1);
    });

    it('should keep serving calls after one throws', async () => {
      terminal.startError = new Error('spawn /bin/sh ENOENT');
      await expect(connect()).rejects.toBeInstanceOf(SessionFatalError);

      terminal.startError = null;
      await expect(connect()).resolves.toEqual({ outcome: Outcome.GOOD });
    });
  });

  describe('teardown', () => {
    it('should end only the client process, leaving the UI alone', async () => {
      await session.teardown();

      expect(reaper.killByName.mock.calls).toEqual([['vpn']]);
    });

    it('should never throw when terminating fails', async () => {
      terminal.terminate.mockRejectedValueOnce(new Error('EPERM'));
      reaper.killByName.mockRejectedValue(new Error('EPERM'));

      await expect(session.teardown()).resolves.toBeUndefined();
      expect(reaper.killByName.mock.calls).toEqual([['vpn']]);
      expect(session.getState()).toBe(SessionState.TERMINATED);
    });
  });
});
