import { Logger } from '@nestjs/common';
import { FetchError } from './fetch-error';
import { DEFAULT_RETRY_ATTEMPTS, DEFAULT_RETRY_DELAY_MS, FETCH_TIMEOUT_MS } from './constants';

export interface RetryOptions {
  /** Retries after the first attempt. */
  attempts: number;
  delayMs: number;
  timeoutMs: number;
}

export const DEFAULT_RETRY_OPTIONS: RetryOptions = {
  attempts: DEFAULT_RETRY_ATTEMPTS,
  delayMs: DEFAULT_RETRY_DELAY_MS,
  timeoutMs: FETCH_TIMEOUT_MS,
};

const IDEMPOTENT_METHODS = new Set(['GET', 'DELETE']);

const logger = new Logger('HttpRetry');

function isRetriableStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * fetch() with a fixed pause between attempts. Only GET and DELETE are
 * retried; anything else gets a single attempt.
 *
 * Resolves with the response when it is ok or 404 (callers treat 404 as
 * "no data"). Rejects with FetchError for any other status, or once the
 * retries for transport errors, 429 and 5xx are used up.
 */
export async function fetchWithRetry(
  url: string,
  init: RequestInit = {},
  options: RetryOptions = DEFAULT_RETRY_OPTIONS,
): Promise<Response> {
  const method = (init.method ?? 'GET').toUpperCase();
  const maxAttempts = IDEMPOTENT_METHODS.has(method) ? options.attempts + 1 : 1;
  let lastError: FetchError | undefined;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    if (attempt > 1) {
      logger.warn(`${method} ${url} failed (${lastError?.message}), retry ${attempt - 1}/${options.attempts}`);
      await sleep(options.delayMs);
    }

    let response: Response;
    try {
      response = await fetch(url, { ...init, signal: AbortSignal.timeout(options.timeoutMs) });
    } catch (error) {
      const reason = error instanceof Error ? error.message : 'Unknown error';
      lastError = new FetchError(`Request failed: ${reason}`, url, undefined, { cause: error });
      continue;
    }

    if (response.ok || response.status === 404) {
      return response;
    }

    lastError = new FetchError(`HTTP ${response.status} ${response.statusText}`.trim(), url, response.status);
    if (!isRetriableStatus(response.status)) {
      throw lastError;
    }
  }

  throw lastError ?? new FetchError('Request failed', url);
}
