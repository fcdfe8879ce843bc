import { spawn, ChildProcess } from 'child_process';
import { EventEmitter } from 'events';

/**
 * Process tracking information
 */
export interface ProcessInfo {
  pid: number;
  command: string;
  args: string[];
  startTime: Date;
  pgid?: number;
  status: 'running' | 'terminated' | 'killed' | 'exited';
  exitCode?: number;
}

/**
 * Process lifecycle events
 */
export interface ProcessEvents {
  processStarted: (processInfo: ProcessInfo) => void;
  processExited: (processInfo: ProcessInfo, code: number | null, signal: string | null) => void;
  processKilled: (processInfo: ProcessInfo) => void;
  cleanupComplete: (processCount: number) => void;
  error: (error: Error, processInfo?: ProcessInfo) => void;
}

export interface StartProcessOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * ProcessLifecycleManager
 *
 * Tracks the child processes gatewatch spawns (the shell hosting the VPN client)
 * and terminates system-wide instances of the VPN client by process name.
 *
 * Signal handlers are not registered here; the CLI owns SIGINT and SIGTERM.
 * The synchronous 'exit' handler only kills lingering children.
 */
export class ProcessLifecycleManager extends EventEmitter {
  private processes = new Map<number, ProcessInfo>();
  private childProcesses = new Map<number, ChildProcess>();
  private isShuttingDown = false;
  private cleanupTimeout = 5000;
  private static globalExitHandlerRegistered = false;

  constructor(private readonly platform: NodeJS.Platform = process.platform) {
    super();
    this.registerExitHandler();
  }

  /**
   * Start a new process with piped stdio.
   * Outside Windows the child leads its own process group so that killing it also
   * reaches the VPN client it started.
   */
  public startProcess(command: string, args: string[] = [], options: StartProcessOptions = {}): ChildProcess {
    if (this.isShuttingDown) {
      throw new Error('Cannot start new processes during shutdown');
    }

    const detached = this.platform !== 'win32';
    let childProcess: ChildProcess;
    try {
      childProcess = spawn(command, args, {
        ...options,
        detached,
        windowsHide: true,
        stdio: 'pipe'
      });
    } catch (error) {
      const wrappedError = new Error(`Failed to spawn process: ${command} ${args.join(' ')} - ${error}`);
      this.emit('error', wrappedError);
      throw wrappedError;
    }

    if (!childProcess.pid) {
      const error = new Error(`Failed to start process: ${command} ${args.join(' ')}`);
      // spawn reports ENOENT asynchronously; swallow the late duplicate
      childProcess.once('error', () => undefined);
      this.emit('error', error);
      throw error;
    }

    const processInfo: ProcessInfo = {
      pid: childProcess.pid,
      command,
      args,
      startTime: new Date(),
      pgid: detached ? childProcess.pid : undefined,
      status: 'running'
    };

    this.processes.set(childProcess.pid, processInfo);
    this.childProcesses.set(childProcess.pid, childProcess);

    this.setupProcessHandlers(childProcess, processInfo);

    this.emit('processStarted', processInfo);

    return childProcess;
  }

  private setupProcessHandlers(childProcess: ChildProcess, processInfo: ProcessInfo): void {
    childProcess.on('exit', (code, signal) => {
      processInfo.status = 'exited';
      processInfo.exitCode = code ?? undefined;

      this.emit('processExited', processInfo, code, signal);
      this.childProcesses.delete(processInfo.pid);
    });

    childProcess.on('error', (error) => {
      processInfo.status = 'terminated';
      this.childProcesses.delete(processInfo.pid);
      if (this.listenerCount('error') > 0) {
        this.emit('error', error, processInfo);
      }
    });
  }

  /**
   * Kill a specific process and its process group
   */
  public async killProcess(pid: number, signal: NodeJS.Signals = 'SIGTERM'): Promise<boolean> {
    const processInfo = this.processes.get(pid);
    const childProcess = this.childProcesses.get(pid);

    if (!processInfo || !childProcess) {
      return false;
    }

    try {
      if (processInfo.pgid) {
        process.kill(-processInfo.pgid, signal);
      } else {
        childProcess.kill(signal);
      }

      processInfo.status = 'killed';
      this.emit('processKilled', processInfo);

      return true;
    } catch (error) {
      if (this.listenerCount('error') > 0) {
        this.emit('error', error instanceof Error ? error : new Error(String(error)), processInfo);
      }
      return false;
    }
  }

  /**
   * Forcefully terminate every process on the system with the given image name.
   * Resolves whether or not anything was running; rejects only when the kill
   * command itself cannot be run.
   */
  public killByName(name: string): Promise<void> {
    const [command, args] = this.platform === 'win32'
      ? ['taskkill', ['/f', '/im', name]]
      : ['pkill', ['-KILL', '-x', name]];

    return new Promise((resolve, reject) => {
      const killer = spawn(command, args, { stdio: 'ignore', windowsHide: true });
      killer.once('error', (error) => {
        reject(new Error(`Unable to run ${command} for ${name}: ${error.message}`));
      });
      killer.once('close', () => resolve());
    });
  }

  public getProcesses(): ProcessInfo[] {
    return Array.from(this.processes.values());
  }

  public getRunningProcesses(): ProcessInfo[] {
    return this.getProcesses().filter(p => p.status === 'running' || p.status === 'killed')
      .filter(p => this.childProcesses.has(p.pid));
  }

  /**
   * Check if a process has not exited yet
   */
  public isProcessRunning(pid: number): boolean {
    return this.childProcesses.has(pid);
  }

  /**
   * Wait for a process to exit
   */
  public async waitForProcess(pid: number, timeout?: number): Promise<ProcessInfo | null> {
    const processInfo = this.processes.get(pid);
    const childProcess = this.childProcesses.get(pid);

    if (!processInfo) {
      return null;
    }

    if (!childProcess) {
      return processInfo;
    }

    return new Promise((resolve, reject) => {
      let timeoutHandle: NodeJS.Timeout | undefined;

      const cleanup = () => {
        if (timeoutHandle) {
          clearTimeout(timeoutHandle);
        }
      };

      if (timeout && timeout > 0) {
        timeoutHandle = setTimeout(() => {
          childProcess.removeListener('exit', onExit);
          reject(new Error(`Process ${pid} did not exit within ${timeout}ms`));
        }, timeout);
      }

      const onExit = () => {
        cleanup();
        resolve(this.processes.get(pid) || null);
      };

      childProcess.once('exit', onExit);
    });
  }

  /**
   * Forget processes that have exited
   */
  public prune(): void {
    for (const [pid] of this.processes) {
      if (!this.childProcesses.has(pid)) {
        this.processes.delete(pid);
      }
    }
  }

  /**
   * Kill every tracked process, escalating to SIGKILL after half the timeout
   */
  public async shutdown(timeout: number = this.cleanupTimeout): Promise<void> {
    if (this.isShuttingDown) {
      return;
    }

    this.isShuttingDown = true;

    const runningProcesses = this.getRunningProcesses();
    if (runningProcesses.length === 0) {
      this.emit('cleanupComplete', 0);
      return;
    }

    await this.killAllProcesses('SIGTERM');

    try {
      await this.waitForAllProcessesToExit(timeout / 2);
    } catch {
      await this.killAllProcesses('SIGKILL');
      await this.waitForAllProcessesToExit(timeout / 2).catch(() => undefined);
    }

    const remainingProcesses = this.getRunningProcesses().length;
    this.emit('cleanupComplete', runningProcesses.length - remainingProcesses);
  }

  private async killAllProcesses(signal: NodeJS.Signals = 'SIGTERM'): Promise<number> {
    let killedCount = 0;

    for (const pid of Array.from(this.childProcesses.keys())) {
      if (await this.killProcess(pid, signal)) {
        killedCount++;
      }
    }

    return killedCount;
  }

  private async waitForAllProcessesToExit(timeout: number): Promise<void> {
    return new Promise((resolve, reject) => {
      const startTime = Date.now();

      const checkProcesses = () => {
        const runningProcesses = this.getRunningProcesses();

        if (runningProcesses.length === 0) {
          resolve();
          return;
        }

        if (Date.now() - startTime >= timeout) {
          reject(new Error(`Timeout waiting for processes to exit: ${runningProcesses.length} still running`));
          return;
        }

        setTimeout(checkProcesses, 100);
      };

      checkProcesses();
    });
  }

  /**
   * Kill lingering children when Node exits. Synchronous and never calls
   * process.exit, so it is safe to register from library code.
   */
  private registerExitHandler(): void {
    if (ProcessLifecycleManager.globalExitHandlerRegistered) {
      return;
    }

    process.on('exit', () => {
      if (!_globalProcessManager) return;
      for (const processInfo of _globalProcessManager.getRunningProcesses()) {
        try {
          if (processInfo.pgid) {
            process.kill(-processInfo.pgid, 'SIGKILL');
          } else {
            process.kill(processInfo.pid, 'SIGKILL');
          }
        } catch {
          // already gone
        }
      }
    });

    ProcessLifecycleManager.globalExitHandlerRegistered = true;
  }
}

/**
 * Lazily created process-wide manager
 */
let _globalProcessManager: ProcessLifecycleManager | null = null;

export function getProcessLifecycleManager(): ProcessLifecycleManager {
  if (!_globalProcessManager) {
    _globalProcessManager = new ProcessLifecycleManager();
  }
  return _globalProcessManager;
}
