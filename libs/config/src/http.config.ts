import { registerAs } from '@nestjs/config';
import {
  DEFAULT_RETRY_ATTEMPTS,
  DEFAULT_RETRY_DELAY_MS,
  FETCH_TIMEOUT_MS,
  type RetryOptions,
} from '@routecast/common';

export const httpConfig = registerAs('http', (): { retry: RetryOptions } => ({
  retry: {
    attempts: parseInt(process.env.HTTP_RETRY_ATTEMPTS || String(DEFAULT_RETRY_ATTEMPTS), 10),
    delayMs: parseInt(process.env.HTTP_RETRY_DELAY_MS || String(DEFAULT_RETRY_DELAY_MS), 10),
    timeoutMs: parseInt(process.env.HTTP_TIMEOUT_MS || String(FETCH_TIMEOUT_MS), 10),
  },
}));
