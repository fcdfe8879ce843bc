/**
 * Tests for src/cli/reporter.ts
 */

jest.mock('chalk', () => {
  const identity = (s: string) => s;
  const proxy: Record<string, unknown> = {};
  ['green', 'red', 'yellow', 'blue'].forEach((c) => { proxy[c] = identity; });
  return { default: Object.assign(identity, proxy), __esModule: true };
});

import { EventEmitter } from 'events';
import { CycleRecord, CycleReport, Outcome, RecordKind } from '../../models/MonitorModels';
import { SessionState } from '../../session/types';
import { SinkError } from '../../sink/ResultSink';
import { attachReporter, cycleTotalLabel, formatItemLine } from '../../cli/reporter';

const clock = () => new Date(2026, 9, 18, 9, 15, 0);

const gatewayRecord: CycleRecord = {
  cycle: 7,
  date: '2026/10/18',
  time: '09:15:00',
  kind: RecordKind.GATEWAY_PROBE,
  outcome: Outcome.GOOD,
  address: 'vpn.example.test',
  label: 'Branch Office'
};

const targetRecord: CycleRecord = {
  ...gatewayRecord,
  kind: RecordKind.TARGET_PROBE,
  outcome: Outcome.WARN,
  address: '10.0.0.2',
  label: 'file server'
};

describe('formatItemLine', () => {
  it('pads session items with dashes to a common width', () => {
    expect(formatItemLine(gatewayRecord, false))
      .toBe('  7 2026/10/18 09:15:00 -- VPN ping ------------ Good Branch Office');
    expect(formatItemLine({ ...gatewayRecord, kind: RecordKind.SESSION_CLOSE, outcome: Outcome.FAIL }, false))
      .toBe('  7 2026/10/18 09:15:00 -- VPN close ----------- Fail Branch Office');
  });

  it('shows the pinged address of a target', () => {
    expect(formatItemLine(targetRecord, false))
      .toBe('  7 2026/10/18 09:15:00 -- ping 10.0.0.2        Warn file server');
  });
});

describe('cycleTotalLabel', () => {
  it('names a negative count Infinite', () => {
    expect(cycleTotalLabel(-1)).toBe('Infinite');
    expect(cycleTotalLabel(200)).toBe('200');
  });
});

describe('attachReporter', () => {
  let lines: string[];
  let orchestrator: EventEmitter;
  let sink: EventEmitter;

  beforeEach(() => {
    lines = [];
    orchestrator = new EventEmitter();
    sink = new EventEmitter();
    attachReporter(orchestrator, sink, { print: line => lines.push(line), clock });
  });

  it('prints the cycle banner, items and totals', () => {
    const report: CycleReport = {
      cycle: 7,
      gatewayProbe: Outcome.GOOD,
      targets: { good: 0, warn: 1, fail: 0 },
      records: [gatewayRecord, targetRecord],
      recorded: Outcome.GOOD
    };

    orchestrator.emit('cycle:start', 7, -1);
    orchestrator.emit('item:tested', gatewayRecord);
    orchestrator.emit('item:tested', targetRecord);
    orchestrator.emit('cycle:end', report);
    orchestrator.emit('run:waiting', 1800);

    expect(lines).toEqual([
      '  7 2026/10/18 09:15:00 Start test cycle 7 of Infinite',
      '  7 2026/10/18 09:15:00 -- VPN ping ------------ Good Branch Office',
      '  7 2026/10/18 09:15:00 -- ping 10.0.0.2        Warn file server',
      '  7 2026/10/18 09:15:00 End test cycle 7 of Infinite',
      '  7 2026/10/18 09:15:00 Test cycle target results: Good: 0, Warn: 1, Fail: 0',
      '  7 2026/10/18 09:15:00 Waiting to run next test cycle.\n'
    ]);
  });

  it('prints the failure reason and the captured output of a session step', () => {
    orchestrator.emit('cycle:start', 1, 3);
    orchestrator.emit('item:tested', { ...gatewayRecord, cycle: 1, kind: RecordKind.SESSION_OPEN, outcome: Outcome.FAIL }, {
      state: SessionState.PASSWORD_SENT,
      reason: 'login failed',
      severity: 'recoverable',
      output: 'Login failed.\n'
    });

    expect(lines.slice(1)).toEqual([
      '  1 2026/10/18 09:15:00 -- VPN open ------------ Fail Branch Office',
      '    login failed',
      '---- Start diagnostic information ----',
      'Login failed.',
      '----  End diagnostic information  ----'
    ]);
  });

  it('mentions a missing targets file once per run', () => {
    orchestrator.emit('targets:missing', 'gatewatch_targets.csv');
    orchestrator.emit('targets:missing', 'gatewatch_targets.csv');

    expect(lines).toEqual(['Running without a targets file (gatewatch_targets.csv)']);
  });

  it('reports a cycle whose results were not recorded', () => {
    orchestrator.emit('cycle:start', 2, 2);
    orchestrator.emit('cycle:end', {
      cycle: 2,
      gatewayProbe: Outcome.FAIL,
      targets: { good: 0, warn: 0, fail: 0 },
      records: [],
      recorded: Outcome.FAIL
    });

    expect(lines[1]).toBe('Unable to record test results');
  });

  it('reports result log contention', () => {
    sink.emit('retry', new SinkError('busy', 'contention', 'EBUSY'), 1, 15000);
    sink.emit('recovered', 2);
    sink.emit('abandoned', new SinkError('busy', 'contention', 'EBUSY'), 5);

    expect(lines).toEqual([
      'Cannot open the datalog file; retrying',
      'The datalog file has been updated',
      'Unable to open the datalog file (EBUSY)',
      'Aborting this attempt to record results',
      'Skipping forward to the next test cycle'
    ]);
  });

  it('prints the number of cycles run at the end', () => {
    orchestrator.emit('cycle:start', 3, 3);
    orchestrator.emit('run:end', { cyclesRun: 3, aborted: false, startTime: clock(), endTime: clock() });

    expect(lines[1]).toBe('  3 2026/10/18 09:15:00 3 test cycles completed.');
  });
});
