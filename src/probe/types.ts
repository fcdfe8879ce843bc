/**
 * Probe capability: reachability checks classified as Good, Warn or Fail
 */

import { Outcome } from '../models/MonitorModels';

/**
 * Repeated reachability check (ICMP echo)
 */
export interface Probe {
  probe(address: string, repetitions: number, timeout: number): Promise<Outcome>;
}

/**
 * Single-shot web check. Only an HTTP 200 counts as Good; never Warn.
 */
export interface WebProbe {
  webProbe(url: string, timeout: number): Promise<Outcome>;
}

/**
 * Classify `successes` out of `repetitions` attempts.
 * Good iff all succeeded, Fail iff none did, Warn otherwise.
 */
export function classifyRepetitions(repetitions: number, successes: number): Outcome {
  if (!Number.isInteger(repetitions) || repetitions < 1) {
    throw new RangeError(`Repetitions must be a positive integer, got ${repetitions}`);
  }
  if (successes < 0 || successes > repetitions) {
    throw new RangeError(`Successes must be between 0 and ${repetitions}, got ${successes}`);
  }
  if (successes === repetitions) return Outcome.GOOD;
  if (successes === 0) return Outcome.FAIL;
  return Outcome.WARN;
}

/**
 * Whether an address is checked with the web probe instead of ping
 */
export function isWebAddress(address: string): boolean {
  return /^https?:\/\//i.test(address);
}
