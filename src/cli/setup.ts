/**
 * CLI-only process lifecycle helpers.
 *
 * This module installs global signal handlers and is intentionally
 * NOT exported from the library public API (src/lib.ts or src/index.ts).
 * It must only be imported from the CLI entry point (src/cli.ts).
 */

import { logger } from '../utils/logger';
import { EmergencyCleanup } from '../orchestrator/EmergencyCleanup';
import { FATAL_EXIT_MARKER, Print } from './output';

/**
 * The process events the shutdown handlers listen to
 */
export interface ProcessEvents {
  on(event: 'SIGINT' | 'SIGTERM', listener: () => void): unknown;
  on(event: 'unhandledRejection', listener: (reason: unknown) => void): unknown;
  on(event: 'uncaughtException', listener: (error: Error) => void): unknown;
}

export interface ShutdownOptions {
  /** Called before cleanup so no further cycle starts */
  abort?: () => void;
  /** Defaults to the global `process`; replaceable for testing */
  proc?: ProcessEvents;
  exit?: (code: number) => void;
  print?: Print;
}

/**
 * Lets the entry point defer to a shutdown already in progress
 */
export interface ShutdownHandle {
  isStopping(): boolean;
  /** Resolves once the interrupt's cleanup has finished */
  settled(): Promise<void>;
}

/**
 * Install process-level signal and error handlers.
 *
 * SIGINT and SIGTERM run the emergency cleanup once and exit 0; a second
 * signal during cleanup exits at once. unhandledRejection and
 * uncaughtException run the same cleanup and exit 1, unless an interrupt
 * is already stopping the process.
 *
 * @example
 * // In a CLI entry point only:
 * const cleanup = new EmergencyCleanup();
 * setupGracefulShutdown(cleanup, { abort: () => orchestrator.abort() });
 */
export function setupGracefulShutdown(cleanup: EmergencyCleanup, options: ShutdownOptions = {}): ShutdownHandle {
  const proc: ProcessEvents = options.proc ?? process;
  const exit = options.exit ?? process.exit;
  const print = options.print ?? ((line: string) => console.log(line));
  let stopping = false;
  let stopped: Promise<void> = Promise.resolve();

  const stop = async (): Promise<void> => {
    print('---- gatewatch stopped with Control-C ----');
    options.abort?.();
    const report = await cleanup.run();
    if (report.sessionClosed) {
      print('VPN connection closed');
    }
    if (report.sinkClosed) {
      print('Datalog file closed');
    }
    exit(0);
  };

  const onSignal = (signal: string) => {
    if (stopping) {
      exit(0);
      return;
    }
    stopping = true;
    logger.info(`Received ${signal}, shutting down`);
    stopped = stop().catch((error: unknown) => {
      logger.error('Shutdown failed', { error: error instanceof Error ? error.message : String(error) });
      exit(0);
    });
  };

  const fail = (message: string, detail: unknown) => {
    logger.error(message, { error: detail instanceof Error ? detail.stack ?? detail.message : String(detail) });
    if (stopping) {
      return;
    }
    cleanup.run()
      .then(
        () => undefined,
        (cleanupError: unknown) => logger.error('Emergency cleanup failed', { error: String(cleanupError) })
      )
      .finally(() => {
        print(FATAL_EXIT_MARKER);
        exit(1);
      });
  };

  proc.on('SIGINT', () => onSignal('SIGINT'));
  proc.on('SIGTERM', () => onSignal('SIGTERM'));

  proc.on('unhandledRejection', (reason: unknown) => {
    fail('Unhandled Rejection', reason);
  });

  proc.on('uncaughtException', (error: Error) => {
    fail('Uncaught Exception', error);
  });

  return {
    isStopping: () => stopping,
    settled: () => stopped
  };
}
