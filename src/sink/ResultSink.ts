/**
 * ResultSink - append-only result log that tolerates contention
 *
 * Every write opens the log for append, writes all rows and closes it again,
 * so other programs may read or lock the file between cycles. A write that
 * finds the file held by another process is retried a fixed number of times;
 * any other I/O failure is fatal. close() waits for the write in progress.
 *
 * Events:
 * - 'retry' (error: SinkError, attempt: number, delay: number)
 * - 'recovered' (attempts: number)
 * - 'abandoned' (error: SinkError, attempts: number)
 */

import { EventEmitter } from 'events';
import { promises as fs } from 'fs';
import { CycleRecord, Outcome, formatRecord } from '../models/MonitorModels';
import { SinkConfig } from '../models/Config';
import { DEFAULT_SINK_CONFIG } from '../utils/config/types';
import { RetryManager } from '../utils/retry';
import { MonitorLogger, logger as defaultLogger } from '../utils/logger';

export type SinkErrorKind = 'contention' | 'fatal';

/**
 * I/O failure tagged as retryable contention or fatal
 */
export class SinkError extends Error {
  constructor(
    message: string,
    public readonly kind: SinkErrorKind,
    public readonly code?: string
  ) {
    super(message);
    this.name = 'SinkError';
  }
}

/**
 * Raised when the result log cannot be written for a reason other than contention
 */
export class SinkFatalError extends Error {
  constructor(message: string, public readonly path: string, public readonly code?: string) {
    super(message);
    this.name = 'SinkFatalError';
  }
}

/** Error codes meaning another process holds the file */
export const CONTENTION_CODES: readonly string[] = ['EACCES', 'EPERM', 'EBUSY'];

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Tag a raw I/O error. Errors already tagged pass through unchanged.
 */
export function classifyIoError(error: unknown): SinkError {
  if (error instanceof SinkError) return error;
  const code = errorCode(error);
  const message = error instanceof Error ? error.message : String(error);
  const kind: SinkErrorKind = code !== undefined && CONTENTION_CODES.includes(code) ? 'contention' : 'fatal';
  return new SinkError(message, kind, code);
}

export interface AppendHandle {
  write(text: string): Promise<void>;
  close(): Promise<void>;
}

/**
 * Opens a file for appending
 */
export interface AppendTarget {
  open(path: string): Promise<AppendHandle>;
}

export const fileAppendTarget: AppendTarget = {
  async open(path) {
    const handle = await fs.open(path, 'a');
    return {
      write: async (text) => {
        await handle.appendFile(text, 'utf8');
      },
      close: () => handle.close()
    };
  }
};

export interface ResultSinkOptions {
  config?: Partial<SinkConfig>;
  target?: AppendTarget;
  logger?: MonitorLogger;
  /** Wait between contended attempts; resolves early when the signal aborts */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export class ResultSink extends EventEmitter {
  private readonly config: SinkConfig;
  private readonly target: AppendTarget;
  private readonly logger: MonitorLogger;
  private readonly sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  private readonly closing = new AbortController();
  private pending: Promise<Outcome> | null = null;

  constructor(public readonly path: string, options: ResultSinkOptions = {}) {
    super();
    this.config = { ...DEFAULT_SINK_CONFIG, ...options.config };
    this.target = options.target ?? fileAppendTarget;
    this.logger = (options.logger ?? defaultLogger).child({ component: 'ResultSink' });
    this.sleep = options.sleep;
  }

  /**
   * Append the records, one line each. Once the sink is closed, records are
   * dropped and FAIL is returned.
   *
   * @returns GOOD once written; FAIL when the file stayed held by another
   * process through every attempt
   * @throws SinkFatalError on any other I/O failure
   */
  write(records: readonly CycleRecord[]): Promise<Outcome> {
    if (this.isClosed()) {
      this.logger.warn(`The datalog file is closed; ${records.length} records dropped`);
      return Promise.resolve(Outcome.FAIL);
    }

    const writing: Promise<Outcome> = this.append(records).finally(() => {
      if (this.pending === writing) {
        this.pending = null;
      }
    });
    this.pending = writing;
    return writing;
  }

  isClosed(): boolean {
    return this.closing.signal.aborted;
  }

  /**
   * Stop accepting records and let a write in progress finish. A write waiting
   * out contention stops at its next wait.
   */
  async close(): Promise<void> {
    this.closing.abort();
    const writing = this.pending;
    if (!writing) {
      return;
    }
    try {
      await writing;
    } catch (error) {
      this.logger.warn('The last write to the datalog file failed while closing', {
        error: error instanceof Error ? error.message : String(error)
      });
    }
  }

  private async append(records: readonly CycleRecord[]): Promise<Outcome> {
    if (records.length === 0) {
      return Outcome.GOOD;
    }

    const text = records.map(record => `${formatRecord(record)}\n`).join('');
    const retry = new RetryManager({
      maxAttempts: this.config.maxAttempts,
      delay: this.config.retryDelay,
      signal: this.closing.signal,
      sleep: this.sleep,
      shouldRetry: (error) => error instanceof SinkError && error.kind === 'contention',
      onRetry: (error, attempt, delay) => {
        this.logger.warn(`Cannot open the datalog file; retrying in ${delay}ms`, { attempt, error: error.message });
        this.emit('retry', classifyIoError(error), attempt, delay);
      }
    });

    const result = await retry.executeWithDetails(async () => {
      try {
        await this.appendOnce(text);
      } catch (error) {
        throw classifyIoError(error);
      }
    });

    if (result.success) {
      if (result.attempts > 1) {
        this.logger.info('The datalog file has been updated', { attempts: result.attempts });
        this.emit('recovered', result.attempts);
      }
      return Outcome.GOOD;
    }

    const error = classifyIoError(result.error);
    if (error.kind === 'fatal') {
      this.logger.error(`Failed to access the datalog file ${this.path}`, { error: error.message, code: error.code });
      throw new SinkFatalError(`Failed to access the datalog file ${this.path}: ${error.message}`, this.path, error.code);
    }

    if (result.aborted) {
      this.logger.warn('The datalog file was closed while waiting for it; results dropped', {
        attempts: result.attempts
      });
      return Outcome.FAIL;
    }

    this.logger.warn('Unable to open the datalog file; aborting this attempt to record results', {
      attempts: result.attempts
    });
    this.emit('abandoned', error, result.attempts);
    return Outcome.FAIL;
  }

  private async appendOnce(text: string): Promise<void> {
    const handle = await this.target.open(this.path);
    try {
      await handle.write(text);
    } finally {
      await handle.close();
    }
  }
}
