/**
 * ChildTerminal - SessionTerminal backed by a piped child process
 *
 * stdout and stderr are merged into one ExpectChannel, the way a console
 * shows them. Process tracking goes through ProcessLifecycleManager.
 */

import { ChildProcess } from 'child_process';
import { ExpectChannel } from './ExpectChannel';
import { ExpectResult, Pattern, SessionTerminal } from './types';
import { ProcessLifecycleManager } from '../core/ProcessLifecycleManager';
import { MonitorLogger } from '../utils/logger';

export interface ChildTerminalOptions {
  shell: string;
  shellArgs: string[];
  environment: Record<string, string>;
  /** Time allowed for the child to exit after SIGKILL, in milliseconds */
  exitTimeout?: number;
}

export class ChildTerminal implements SessionTerminal {
  private child: ChildProcess | null = null;
  private channel: ExpectChannel | null = null;

  constructor(
    private readonly options: ChildTerminalOptions,
    private readonly processManager: ProcessLifecycleManager,
    private readonly logger: MonitorLogger,
    private readonly platform: NodeJS.Platform = process.platform
  ) {}

  start(): void {
    if (this.isAlive()) {
      throw new Error('The session shell is already running');
    }

    const child = this.processManager.startProcess(this.options.shell, this.options.shellArgs, {
      env: { ...process.env, ...this.options.environment }
    });

    const channel = new ExpectChannel({
      write: (data) => {
        child.stdin?.write(data);
      },
      lineEnding: this.platform === 'win32' ? '\r\n' : '\n'
    });

    child.stdout?.setEncoding('utf8');
    child.stderr?.setEncoding('utf8');
    child.stdout?.on('data', (chunk: string) => channel.feed(chunk));
    child.stderr?.on('data', (chunk: string) => channel.feed(chunk));
    child.stdin?.on('error', (error) => {
      this.logger.debug('Session stdin closed', { error: error.message });
    });
    child.once('exit', (code, signal) => {
      this.logger.debug('Session shell exited', { pid: child.pid, code, signal });
      channel.end();
    });
    child.once('error', (error) => {
      this.logger.warn('Session shell error', { error: error.message });
      channel.end();
    });

    this.logger.debug('Session shell started', { shell: this.options.shell, pid: child.pid });
    this.child = child;
    this.channel = channel;
  }

  isAlive(): boolean {
    const pid = this.child?.pid;
    return pid !== undefined && this.processManager.isProcessRunning(pid);
  }

  sendLine(line: string): void {
    if (!this.channel || !this.isAlive()) {
      throw new Error('The session shell is not running');
    }
    this.channel.sendLine(line);
  }

  expect(patterns: Pattern[], timeout: number): Promise<ExpectResult> {
    if (!this.channel) {
      return Promise.resolve({ status: 'eof', index: -1, before: '' });
    }
    return this.channel.expect(patterns, timeout);
  }

  async terminate(): Promise<void> {
    const pid = this.child?.pid;
    this.child = null;
    this.channel = null;

    if (pid === undefined || !this.processManager.isProcessRunning(pid)) {
      this.processManager.prune();
      return;
    }

    await this.processManager.killProcess(pid, 'SIGKILL');
    try {
      await this.processManager.waitForProcess(pid, this.options.exitTimeout ?? 5000);
    } catch (error) {
      this.logger.warn('Session shell did not exit after SIGKILL', {
        pid,
        error: error instanceof Error ? error.message : String(error)
      });
    }
    this.processManager.prune();
  }
}
