/**
 * ExpectChannel - send-line / wait-for-pattern buffer over a text stream
 *
 * Output chunks are fed in as they arrive; `expect` resolves on the earliest
 * match among the given patterns, on timeout, or when the stream ends.
 */

import { ExpectResult, Pattern } from './types';

/**
 * Strip ANSI escape sequences (CSI and OSC) from terminal text
 */
export function stripAnsiCodes(text: string): string {
  return text
    .replace(/\u001b\][^\u0007]*\u0007/g, '')
    .replace(/\u001b\[[0-9;?]*[A-Za-z]/g, '');
}

export interface ExpectChannelOptions {
  /** Sink for outgoing text */
  write: (data: string) => void;
  /** Appended to every line sent */
  lineEnding?: string;
  /** Oldest output is dropped beyond this many characters */
  maxBuffer?: number;
}

interface PendingExpect {
  patterns: Pattern[];
  resolve: (result: ExpectResult) => void;
  timer: NodeJS.Timeout;
}

interface PatternHit {
  index: number;
  start: number;
  end: number;
}

export class ExpectChannel {
  private buffer = '';
  private ended = false;
  private pending: PendingExpect | null = null;
  private readonly write: (data: string) => void;
  private readonly lineEnding: string;
  private readonly maxBuffer: number;

  constructor(options: ExpectChannelOptions) {
    this.write = options.write;
    this.lineEnding = options.lineEnding ?? '\n';
    this.maxBuffer = options.maxBuffer ?? 64 * 1024;
  }

  /**
   * Append output received from the child
   */
  feed(chunk: string): void {
    this.buffer += stripAnsiCodes(chunk).replace(/\r/g, '');
    if (this.buffer.length > this.maxBuffer) {
      this.buffer = this.buffer.slice(this.buffer.length - this.maxBuffer);
    }
    this.settle();
  }

  /**
   * Mark the stream as finished; pending and later waits resolve with 'eof'
   * unless the remaining output still matches.
   */
  end(): void {
    this.ended = true;
    this.settle();
  }

  isEnded(): boolean {
    return this.ended;
  }

  sendLine(line: string): void {
    this.write(line + this.lineEnding);
  }

  /**
   * Unconsumed output
   */
  peek(): string {
    return this.buffer;
  }

  /**
   * Wait for the earliest occurrence of any pattern. When two patterns match at
   * the same position the one listed first wins.
   */
  expect(patterns: Pattern[], timeout: number): Promise<ExpectResult> {
    if (this.pending) {
      return Promise.reject(new Error('An expect is already in progress on this channel'));
    }

    const immediate = this.consume(patterns);
    if (immediate) {
      return Promise.resolve(immediate);
    }
    if (this.ended) {
      return Promise.resolve(this.unmatched('eof'));
    }

    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.pending = null;
        resolve(this.unmatched('timeout'));
      }, timeout);
      this.pending = { patterns, resolve, timer };
    });
  }

  private settle(): void {
    if (!this.pending) return;
    const { patterns, resolve, timer } = this.pending;

    const result = this.consume(patterns) ?? (this.ended ? this.unmatched('eof') : null);
    if (result) {
      clearTimeout(timer);
      this.pending = null;
      resolve(result);
    }
  }

  private consume(patterns: Pattern[]): ExpectResult | null {
    let best: PatternHit | null = null;

    for (let i = 0; i < patterns.length; i++) {
      const hit = this.locate(patterns[i], i);
      if (hit && (best === null || hit.start < best.start)) {
        best = hit;
      }
    }

    if (best === null) return null;
    const { index, start, end } = best;

    const result: ExpectResult = {
      status: 'matched',
      index,
      before: this.buffer.slice(0, start),
      match: this.buffer.slice(start, end)
    };
    this.buffer = this.buffer.slice(end);
    return result;
  }

  private locate(pattern: Pattern, index: number): PatternHit | null {
    if (typeof pattern === 'string') {
      const start = this.buffer.indexOf(pattern);
      return start === -1 ? null : { index, start, end: start + pattern.length };
    }

    const regex = new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, ''));
    const match = regex.exec(this.buffer);
    return match ? { index, start: match.index, end: match.index + match[0].length } : null;
  }

  private unmatched(status: 'timeout' | 'eof'): ExpectResult {
    return { status, index: -1, before: this.buffer };
  }
}
