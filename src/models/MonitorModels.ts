/**
 * Core monitoring models for gatewatch
 */

/**
 * Tri-state classification of a probe or protocol step
 */
export enum Outcome {
  GOOD = 'Good',
  WARN = 'Warn',
  FAIL = 'Fail'
}

/**
 * Kind of item recorded in the result log.
 * Values are the labels written to the log file.
 */
export enum RecordKind {
  GATEWAY_PROBE = 'VPN ping',
  SESSION_OPEN = 'VPN open',
  SESSION_CLOSE = 'VPN close',
  TARGET_PROBE = 'Target ping'
}

/**
 * Downstream hosts to test through the gateway: address -> label.
 * Iteration follows the order the entries were read.
 */
export type TargetMap = Map<string, string>;

/**
 * One row of the result log. Never mutated after creation.
 */
export interface CycleRecord {
  readonly cycle: number;
  /** YYYY/MM/DD */
  readonly date: string;
  /** HH:MM:SS */
  readonly time: string;
  readonly kind: RecordKind;
  readonly outcome: Outcome;
  readonly address: string;
  readonly label: string;
}

/**
 * Per-cycle tally of target probe outcomes
 */
export interface TargetTally {
  good: number;
  warn: number;
  fail: number;
}

/**
 * Everything that happened in one test cycle
 */
export interface CycleReport {
  cycle: number;
  gatewayProbe: Outcome;
  /** Undefined when no connect was attempted */
  sessionOpen?: Outcome;
  /** Undefined when no session was opened */
  sessionClose?: Outcome;
  targets: TargetTally;
  records: CycleRecord[];
  /** Outcome of flushing the records to the result log */
  recorded: Outcome;
}

/**
 * Summary returned once the orchestrator stops
 */
export interface RunSummary {
  cyclesRun: number;
  aborted: boolean;
  startTime: Date;
  endTime: Date;
}

/**
 * Render a record as one line of the result log (without line terminator)
 */
export function formatRecord(record: CycleRecord): string {
  return [
    record.cycle,
    record.date,
    record.time,
    record.kind,
    record.outcome,
    record.address,
    record.label
  ].join(',');
}
