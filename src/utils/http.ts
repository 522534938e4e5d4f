import { RequestError } from './errors';

const DEFAULT_TIMEOUT_MS = 10_000;
const DEFAULT_MAX_RETRIES = 3;
const DEFAULT_BASE_DELAY_MS = 1000;
const MAX_RETRY_DELAY_MS = 30_000;
const TRANSIENT_CODES = ['ECONNRESET', 'ETIMEDOUT', 'ECONNREFUSED', 'EAI_AGAIN', 'UND_ERR_SOCKET'];

export interface RetryPolicy {
  maxRetries?: number;
  baseDelay?: number;
  timeoutMs?: number;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

export interface RetriedResponse {
  response: Response;
  attempts: number;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Rate limits, request timeouts and server errors. Auth and other 4xx answers are final. */
export function isRetryableStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

function errorCode(error: Error): string | undefined {
  const { cause } = error;
  if (typeof cause === 'object' && cause !== null && 'code' in cause && typeof cause.code === 'string') {
    return cause.code;
  }
  return undefined;
}

/** Timeouts and connection-level failures that did not reach the provider. */
export function isTransientError(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  if (error.name === 'TimeoutError' || error.name === 'AbortError') return true;
  const code = errorCode(error);
  if (code && TRANSIENT_CODES.includes(code)) return true;
  return error.name === 'TypeError' && error.message === 'fetch failed';
}

/** `Retry-After` as delta seconds or an HTTP date, in ms from `now`. */
export function parseRetryAfter(header: string | null, now: number): number | undefined {
  if (!header) return undefined;
  const trimmed = header.trim();
  if (/^\d+$/.test(trimmed)) return Number(trimmed) * 1000;

  const at = Date.parse(trimmed);
  if (Number.isNaN(at)) return undefined;
  return Math.max(0, at - now);
}

function backoff(baseDelay: number, attempt: number): number {
  return baseDelay * 2 ** (attempt - 1) + Math.random() * Math.min(baseDelay, 250);
}

/**
 * Fetches with a per-attempt timeout and retries transient failures and
 * retryable statuses. The last response is returned once retries run out so
 * the caller can classify it; requests that never got a response throw
 * `RequestError`. Both carry the number of attempts made.
 */
export async function fetchWithRetry(
  input: string,
  init: RequestInit = {},
  policy: RetryPolicy = {},
): Promise<RetriedResponse> {
  const maxRetries = policy.maxRetries ?? DEFAULT_MAX_RETRIES;
  const baseDelay = policy.baseDelay ?? DEFAULT_BASE_DELAY_MS;
  const timeoutMs = policy.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const wait = policy.sleep ?? sleep;
  const now = policy.now ?? Date.now;

  for (let attempt = 1; ; attempt++) {
    const finalAttempt = attempt > maxRetries;

    let response: Response;
    try {
      response = await fetch(input, { ...init, signal: AbortSignal.timeout(timeoutMs) });
    } catch (error) {
      if (finalAttempt || !isTransientError(error)) {
        throw new RequestError(error instanceof Error ? error.message : String(error), attempt, error);
      }
      await wait(backoff(baseDelay, attempt));
      continue;
    }

    if (response.ok || finalAttempt || !isRetryableStatus(response.status)) {
      return { response, attempts: attempt };
    }

    const retryAfter = parseRetryAfter(response.headers.get('Retry-After'), now());
    await wait(Math.min(retryAfter ?? backoff(baseDelay, attempt), MAX_RETRY_DELAY_MS));
  }
}
