/**
 * Console reporter: renders orchestrator and sink events as run output
 */

import { EventEmitter } from 'events';
import chalk from 'chalk';
import { CycleRecord, CycleReport, Outcome, RecordKind, RunSummary } from '../models/MonitorModels';
import { SessionFailure } from '../session/types';
import { SinkError } from '../sink/ResultSink';
import { Clock, dateAndTimeOfDay, systemClock } from '../utils/clock';
import { Print, printDiagnostic } from './output';

export function colorOutcome(outcome: Outcome): string {
  switch (outcome) {
    case Outcome.GOOD:
      return chalk.green(outcome);
    case Outcome.WARN:
      return chalk.yellow(outcome);
    default:
      return chalk.red(outcome);
  }
}

function itemName(record: CycleRecord): string {
  if (record.kind === RecordKind.TARGET_PROBE) {
    return `ping ${record.address.padEnd(15)}`;
  }
  return `${record.kind} `.padEnd(21, '-');
}

/**
 * `%3d YYYY/MM/DD HH:MM:SS -- <item> <Outcome> <label>`
 */
export function formatItemLine(record: CycleRecord, color = true): string {
  const outcome = color ? colorOutcome(record.outcome) : record.outcome;
  return `${String(record.cycle).padStart(3)} ${record.date} ${record.time} -- ${itemName(record)} ${outcome} ${record.label}`;
}

export function cycleTotalLabel(totalCycles: number): string {
  return totalCycles < 0 ? 'Infinite' : String(totalCycles);
}

export interface ReporterOptions {
  print?: Print;
  clock?: Clock;
}

/**
 * Subscribe to a CycleOrchestrator and, optionally, a ResultSink
 */
export function attachReporter(orchestrator: EventEmitter, sink: EventEmitter | null, options: ReporterOptions = {}): void {
  const print = options.print ?? ((line: string) => console.log(line));
  const clock = options.clock ?? systemClock;
  let currentCycle = 0;
  let totalCycles = 0;
  let reportedMissingTargets = false;

  const stamp = (): string => {
    const { date, time } = dateAndTimeOfDay(clock());
    return `${String(currentCycle).padStart(3)} ${date} ${time}`;
  };

  orchestrator.on('cycle:start', (cycle: number, total: number) => {
    currentCycle = cycle;
    totalCycles = total;
    print(`${stamp()} Start test cycle ${cycle} of ${cycleTotalLabel(total)}`);
  });

  orchestrator.on('targets:missing', (path: string) => {
    if (!reportedMissingTargets) {
      reportedMissingTargets = true;
      print(`Running without a targets file (${path})`);
    }
  });

  orchestrator.on('item:tested', (record: CycleRecord, failure?: SessionFailure) => {
    print(formatItemLine(record));
    if (failure) {
      print(`    ${failure.reason}`);
      if (failure.output.trim() !== '') {
        printDiagnostic(failure.output, print);
      }
    }
  });

  orchestrator.on('cycle:end', (report: CycleReport) => {
    if (report.recorded !== Outcome.GOOD) {
      print(chalk.red('Unable to record test results'));
    }
    print(`${stamp()} End test cycle ${report.cycle} of ${cycleTotalLabel(totalCycles)}`);
    const { good, warn, fail } = report.targets;
    print(`${stamp()} Test cycle target results: Good: ${good}, Warn: ${warn}, Fail: ${fail}`);
  });

  orchestrator.on('run:waiting', () => {
    print(`${stamp()} Waiting to run next test cycle.\n`);
  });

  orchestrator.on('run:end', (summary: RunSummary) => {
    print(`${stamp()} ${summary.cyclesRun} test cycles completed.`);
  });

  if (sink) {
    sink.on('retry', () => {
      print(chalk.yellow('Cannot open the datalog file; retrying'));
    });
    sink.on('recovered', () => {
      print('The datalog file has been updated');
    });
    sink.on('abandoned', (error: SinkError) => {
      print(chalk.red(`Unable to open the datalog file (${error.code ?? error.message})`));
      print('Aborting this attempt to record results');
      print('Skipping forward to the next test cycle');
    });
  }
}
