import type { AxiosResponse } from 'axios';
import { getProviderStatusCounter } from '../metrics/pipeline.metrics';
import { ProviderError, errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = { maxAttempts: 4, baseDelayMs: 500 };

export const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export function parseRetryAfterMs(headerValue: unknown): number | undefined {
  if (typeof headerValue !== 'string') return undefined;
  const trimmed = headerValue.trim();
  if (!trimmed) return undefined;
  if (/^\d+(\.\d+)?$/.test(trimmed)) {
    return Math.max(0, Math.round(Number(trimmed) * 1000));
  }
  const date = Date.parse(trimmed);
  if (!Number.isNaN(date)) {
    return Math.max(0, date - Date.now());
  }
  return undefined;
}

function describeFailure(resp: AxiosResponse): string {
  const data: unknown = resp.data;
  if (data && typeof data === 'object' && 'error' in data) {
    const inner = data.error;
    if (inner && typeof inner === 'object' && 'message' in inner) {
      return `${resp.status} ${String(inner.message)}`;
    }
    return `${resp.status} ${String(inner)}`;
  }
  return `HTTP ${resp.status}`;
}

/**
 * Sends a request until it returns 2xx. 429 and 5xx responses and transport
 * errors are retried with exponential backoff; other statuses fail at once.
 * `send` must build a fresh request body on every call.
 */
export async function sendWithRetry(
  provider: string,
  operation: string,
  send: () => Promise<AxiosResponse>,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY
): Promise<AxiosResponse> {
  let wait = policy.baseDelayMs;
  for (let attempt = 1; ; attempt++) {
    let resp: AxiosResponse;
    try {
      resp = await send();
    } catch (err) {
      if (attempt >= policy.maxAttempts) {
        throw new ProviderError(provider, `${operation} failed: ${errorMessage(err)}`);
      }
      logger.warn('provider.transport_error_retry', { provider, operation, attempt, error: errorMessage(err) });
      await sleep(wait);
      wait *= 2;
      continue;
    }

    getProviderStatusCounter().inc({ provider, status: String(resp.status) });
    if (resp.status >= 200 && resp.status < 300) return resp;

    const retryable = resp.status === 429 || resp.status >= 500;
    if (!retryable || attempt >= policy.maxAttempts) {
      throw new ProviderError(provider, `${operation} failed: ${describeFailure(resp)}`, resp.status);
    }
    const retryAfter = parseRetryAfterMs(resp.headers?.['retry-after']);
    logger.warn('provider.retryable_status', { provider, operation, attempt, status: resp.status });
    await sleep(retryAfter ?? wait);
    wait *= 2;
  }
}
