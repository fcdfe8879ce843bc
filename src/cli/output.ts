/**
 * Shared output helpers for the CLI.
 * Colored console output, CLI errors and the fatal exit path.
 */

import chalk from 'chalk';
import { ConfigError } from '../utils/config/types';
import { SessionFatalError } from '../session/types';
import { SinkFatalError } from '../sink/ResultSink';

export const FATAL_EXIT_MARKER = 'gatewatch fatal error exit.';

export type Print = (line: string) => void;

const defaultPrint: Print = (line) => console.log(line);

export function logSuccess(message: string, print: Print = defaultPrint): void {
  print(`${chalk.green('✓')} ${message}`);
}

export function logError(message: string, print: Print = defaultPrint): void {
  print(`${chalk.red('✗')} ${message}`);
}

export function logWarning(message: string, print: Print = defaultPrint): void {
  print(`${chalk.yellow('⚠')} ${message}`);
}

export function logInfo(message: string, print: Print = defaultPrint): void {
  print(`${chalk.blue('ℹ')} ${message}`);
}

/**
 * Output captured from the VPN client, framed for postmortem reading
 */
export function printDiagnostic(output: string, print: Print = defaultPrint): void {
  print('---- Start diagnostic information ----');
  print(output.trimEnd());
  print('----  End diagnostic information  ----');
}

/**
 * Enhanced error class for CLI-specific errors with optional error codes.
 */
export class CLIError extends Error {
  constructor(message: string, public code?: string) {
    super(message);
    this.name = 'CLIError';
  }
}

/**
 * Report a fatal error, print the fatal exit marker and exit 1.
 */
export function handleCommandError(
  error: unknown,
  exit: (code: number) => never = process.exit,
  print: Print = defaultPrint
): never {
  if (error instanceof CLIError) {
    logError(error.message, print);
    if (error.code) {
      logInfo(`Error code: ${error.code}`, print);
    }
  } else if (error instanceof SessionFatalError) {
    logError(error.message, print);
    if (error.output) {
      printDiagnostic(error.output, print);
    }
  } else if (error instanceof ConfigError || error instanceof SinkFatalError) {
    logError(error.message, print);
  } else if (error instanceof Error) {
    logError(`Unexpected error: ${error.message}`, print);
  } else {
    logError(`Unexpected error: ${String(error)}`, print);
  }
  print(FATAL_EXIT_MARKER);
  return exit(1);
}
