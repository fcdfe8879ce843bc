import axios from 'axios';
import { Outcome } from '../models/MonitorModels';
import { MonitorLogger, logger as defaultLogger } from '../utils/logger';
import { WebProbe } from './types';

/**
 * Fetches `url` and resolves with the HTTP status, whatever it is.
 * Rejects only when no response arrives.
 */
export type StatusFetcher = (url: string, timeout: number) => Promise<number>;

export const axiosStatusFetcher: StatusFetcher = async (url, timeout) => {
  const response = await axios.get(url, {
    timeout,
    maxRedirects: 5,
    responseType: 'text',
    validateStatus: () => true
  });
  return response.status;
};

export class HttpProbe implements WebProbe {
  private readonly logger: MonitorLogger;

  constructor(
    private readonly fetchStatus: StatusFetcher = axiosStatusFetcher,
    logger: MonitorLogger = defaultLogger
  ) {
    this.logger = logger.child({ component: 'HttpProbe' });
  }

  async webProbe(url: string, timeout: number): Promise<Outcome> {
    const started = Date.now();
    let outcome = Outcome.FAIL;

    try {
      const status = await this.fetchStatus(url, timeout);
      if (status === 200) {
        outcome = Outcome.GOOD;
      } else {
        this.logger.debug(`${url} answered with HTTP ${status}`);
      }
    } catch (error) {
      this.logger.debug(`No response from ${url}`, {
        error: error instanceof Error ? error.message : String(error)
      });
    }

    this.logger.probeComplete(url, outcome, Date.now() - started);
    return outcome;
  }
}
