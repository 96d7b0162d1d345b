import { RetryBackoffConfig } from '../types';

export const NO_BACKOFF: RetryBackoffConfig = {
  initialDelayMs: 0,
  maxDelayMs: 0,
  multiplier: 1
};

/**
 * Exponential backoff delay before the given retry (1 = first retry)
 */
export function backoffDelay(retry: number, config: RetryBackoffConfig): number {
  if (retry < 1 || config.initialDelayMs <= 0) {
    return 0;
  }
  const delay = config.initialDelayMs * Math.pow(config.multiplier, retry - 1);
  return Math.min(delay, config.maxDelayMs);
}

export function sleep(ms: number): Promise<void> {
  if (ms <= 0) {
    return Promise.resolve();
  }
  return new Promise(resolve => setTimeout(resolve, ms));
}
