/**
 * Audible alerts: the terminal bell, rung a number of times
 */

import { delay } from '../utils/async';

export const BELL = '\u0007';

/** Pulses for a gateway probe, session open or session close failure */
export const GATEWAY_ALERT_PULSES = 3;
/** Pulses for a target that is not Good */
export const TARGET_ALERT_PULSES = 1;

export interface AlerterOptions {
  quiet?: boolean;
  /** Gap between pulses, in milliseconds */
  spacing?: number;
  stream?: Pick<NodeJS.WritableStream, 'write'>;
  sleep?: (ms: number) => Promise<void>;
}

export class Alerter {
  private readonly quiet: boolean;
  private readonly spacing: number;
  private readonly stream: Pick<NodeJS.WritableStream, 'write'>;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: AlerterOptions = {}) {
    this.quiet = options.quiet ?? false;
    this.spacing = options.spacing ?? 300;
    this.stream = options.stream ?? process.stdout;
    this.sleep = options.sleep ?? delay;
  }

  async pulse(count: number): Promise<void> {
    if (this.quiet) return;
    for (let i = 0; i < count; i++) {
      this.stream.write(BELL);
      await this.sleep(this.spacing);
    }
  }
}
