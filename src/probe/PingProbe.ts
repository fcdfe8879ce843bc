import { spawn } from 'child_process';
import { Outcome } from '../models/MonitorModels';
import { MonitorLogger, logger as defaultLogger } from '../utils/logger';
import { Probe, classifyRepetitions } from './types';

export type PingResult = {
  code: number | null;
  stdout: string;
  stderr: string;
};

/**
 * Sends one echo request to `host` and reports how the ping command ended
 */
export type PingRunner = (host: string, timeout: number) => Promise<PingResult>;

/**
 * Arguments for a single echo request with a per-reply timeout in milliseconds
 */
export function pingArgs(host: string, timeout: number, platform: NodeJS.Platform = process.platform): string[] {
  if (platform === 'win32') {
    return ['-n', '1', '-w', String(timeout), host];
  }
  if (platform === 'darwin') {
    return ['-c', '1', '-W', String(timeout), host];
  }
  return ['-c', '1', '-W', String(Math.max(1, Math.ceil(timeout / 1000))), host];
}

export function createPingRunner(platform: NodeJS.Platform = process.platform): PingRunner {
  return (host, timeout) => new Promise((resolve) => {
    const child = spawn('ping', pingArgs(host, timeout, platform), { windowsHide: true });
    let stdout = '';
    let stderr = '';

    child.stdout.on('data', (chunk) => {
      stdout += chunk.toString();
    });
    child.stderr.on('data', (chunk) => {
      stderr += chunk.toString();
    });

    child.on('error', (error) => {
      resolve({ code: 1, stdout: '', stderr: error.message });
    });

    child.on('close', (code) => {
      resolve({ code, stdout, stderr });
    });
  });
}

/**
 * Windows ping exits 0 for "Destination host unreachable"; only a TTL in the
 * reply line proves an echo came back.
 */
export function isEchoReply(result: PingResult, platform: NodeJS.Platform = process.platform): boolean {
  if (result.code !== 0) return false;
  return platform === 'win32' ? /TTL=/i.test(result.stdout) : true;
}

export class PingProbe implements Probe {
  private readonly logger: MonitorLogger;

  constructor(
    private readonly runner: PingRunner = createPingRunner(),
    logger: MonitorLogger = defaultLogger,
    private readonly platform: NodeJS.Platform = process.platform
  ) {
    this.logger = logger.child({ component: 'PingProbe' });
  }

  async probe(address: string, repetitions: number, timeout: number): Promise<Outcome> {
    const started = Date.now();

    // a leading dash would be read as a ping option
    if (address.trim() === '' || address.startsWith('-')) {
      this.logger.warn(`Refusing to ping invalid address "${address}"`);
      return Outcome.FAIL;
    }

    let replies = 0;
    for (let i = 0; i < repetitions; i++) {
      const result = await this.runner(address, timeout);
      if (isEchoReply(result, this.platform)) {
        replies++;
      } else if (result.stderr) {
        this.logger.debug(`No reply from ${address}`, { stderr: result.stderr.trim() });
      }
    }

    const outcome = classifyRepetitions(repetitions, replies);
    this.logger.probeComplete(address, outcome, Date.now() - started);
    return outcome;
  }
}
