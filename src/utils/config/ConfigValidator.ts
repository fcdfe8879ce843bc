/**
 * ConfigValidator - validation of resolved parameters
 */

import { MonitorParameters } from '../../models/Config';
import { ValidationResult } from './types';

/** Longest wait a single timer can hold (2^31 - 1 ms), in whole seconds */
export const MAX_DELAY_SECONDS = Math.floor(2147483647 / 1000);

/**
 * Validate a resolved parameter set, returning errors and warnings.
 */
export function validateParameters(params: MonitorParameters): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (params.vpnAddress.trim() === '') {
    errors.push('vpnurlip must be a non-empty URL or IP address');
  }

  if (params.delaySeconds < 0) {
    errors.push('delay must be zero or a positive number of seconds');
  } else if (params.delaySeconds > MAX_DELAY_SECONDS) {
    errors.push(`delay must be at most ${MAX_DELAY_SECONDS} seconds`);
  }

  if (params.targetPings < 1) {
    errors.push('targetpings must be at least 1');
  } else if (params.targetPings === 1) {
    warnings.push('targetpings is 1: target probes can only report Good or Fail');
  }

  if (params.cycles === 0) {
    warnings.push('cycles is 0: no test cycle will run');
  }

  if (params.vpnAddress.trim() !== '' && params.username === '') {
    warnings.push('username is empty: the VPN login will most likely be rejected');
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings
  };
}
