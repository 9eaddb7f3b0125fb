/**
 * retry.ts — fetch with exponential backoff, Retry-After support and a
 * per-attempt timeout.
 */

import { config } from '../config/config.js';

export interface RetryOptions {
  maxRetries: number;
  baseDelayMs: number;
  retryableStatuses: number[];
  /** Per-attempt timeout; 0 disables it */
  timeoutMs: number;
  sleep: (ms: number) => Promise<void>;
}

const DEFAULT_OPTIONS: RetryOptions = {
  maxRetries: 2,
  baseDelayMs: 1000,
  retryableStatuses: [429, 500, 502, 503],
  timeoutMs: 60000,
  sleep: ms => new Promise(resolve => setTimeout(resolve, ms)),
};

/** Delay before the next attempt; 429 honours Retry-After (seconds) */
function backoffDelay(attempt: number, baseDelayMs: number, response?: Response): number {
  if (response?.status === 429) {
    const retryAfter = response.headers.get('retry-after');
    const seconds = retryAfter ? parseInt(retryAfter, 10) : NaN;
    if (!isNaN(seconds) && seconds > 0) {
      return seconds * 1000;
    }
  }
  return baseDelayMs * Math.pow(2, attempt);
}

export async function fetchWithRetry(
  url: string,
  init: RequestInit,
  options?: Partial<RetryOptions>,
): Promise<Response> {
  const opts: RetryOptions = {
    maxRetries: options?.maxRetries ?? config.ai.maxRetries,
    baseDelayMs: options?.baseDelayMs ?? DEFAULT_OPTIONS.baseDelayMs,
    retryableStatuses: options?.retryableStatuses ?? DEFAULT_OPTIONS.retryableStatuses,
    timeoutMs: options?.timeoutMs ?? config.ai.timeoutMs,
    sleep: options?.sleep ?? DEFAULT_OPTIONS.sleep,
  };

  for (let attempt = 0; ; attempt++) {
    const attemptInit: RequestInit = opts.timeoutMs > 0 && !init.signal
      ? { ...init, signal: AbortSignal.timeout(opts.timeoutMs) }
      : init;

    let response: Response;
    try {
      response = await fetch(url, attemptInit);
    } catch (err) {
      if (attempt >= opts.maxRetries) {
        throw err;
      }
      const delayMs = backoffDelay(attempt, opts.baseDelayMs);
      console.log(`🔄 Retry ${attempt + 1}/${opts.maxRetries} in ${delayMs}ms (network error)`);
      await opts.sleep(delayMs);
      continue;
    }

    if (response.ok || !opts.retryableStatuses.includes(response.status) || attempt >= opts.maxRetries) {
      return response;
    }

    const delayMs = backoffDelay(attempt, opts.baseDelayMs, response);
    console.log(`🔄 Retry ${attempt + 1}/${opts.maxRetries} in ${delayMs}ms (status ${response.status})`);
    await opts.sleep(delayMs);
  }
}
