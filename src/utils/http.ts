import { createHash } from 'crypto';

import { CancelledError, HttpStatusError, TransientNetworkError } from './errors.js';
import { logger } from './logger.js';
import { RESOLVER_DEFAULTS, USER_AGENT } from '../constants/index.js';

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;
export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface HttpClientOptions {
  /** Retries after the first attempt */
  retries: number;
  /** Per-attempt timeout in milliseconds */
  timeoutMs: number;
  /** Base delay of the exponential backoff in milliseconds */
  backoffMs: number;
  /** Run-wide cancellation signal */
  signal?: AbortSignal;
  fetch?: FetchLike;
  sleep?: SleepFn;
}

/** Error codes that are considered transient and worth retrying */
const TRANSIENT_ERROR_CODES = new Set([
  'ECONNRESET',
  'ETIMEDOUT',
  'ECONNREFUSED',
  'EPIPE',
  'ENOTFOUND',
  'EAI_AGAIN',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
  'UND_ERR_SOCKET'
]);

/**
 * Sleep that rejects with CancelledError as soon as the signal fires.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError());
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new CancelledError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Creates an AbortSignal that fires on the per-attempt timeout or on the
 * run-wide signal, whichever comes first.
 */
export function createSignalWithTimeout(timeoutMs: number, signal?: AbortSignal): AbortSignal {
  const timeoutSignal = AbortSignal.timeout(timeoutMs);
  return signal ? AbortSignal.any([signal, timeoutSignal]) : timeoutSignal;
}

/**
 * Parses the Retry-After header value (seconds or HTTP date).
 */
export function parseRetryAfter(retryAfter: string | null, now: number = Date.now()): number | undefined {
  if (!retryAfter) return undefined;

  const seconds = Number(retryAfter);
  if (Number.isFinite(seconds) && seconds >= 0) {
    return seconds * 1000;
  }

  const date = Date.parse(retryAfter);
  if (!Number.isNaN(date)) {
    const delay = date - now;
    return delay > 0 ? delay : undefined;
  }

  return undefined;
}

function isTransientStatus(response: Response): boolean {
  if (response.status === 408 || response.status === 429 || response.status >= 500) {
    return true;
  }
  // GitHub signals an exhausted rate limit with 403
  return response.status === 403 && response.headers.get('x-ratelimit-remaining') === '0';
}

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Walks the cause chain of a fetch rejection to decide whether it is worth
 * retrying. Undici reports network failures as `TypeError: fetch failed`.
 */
export function isTransientError(error: unknown): boolean {
  let current: unknown = error;
  while (current instanceof Error) {
    if (current instanceof TransientNetworkError) return true;
    if (current.name === 'TimeoutError' || current.name === 'AbortError') return true;
    const code = errorCode(current);
    if (code && TRANSIENT_ERROR_CODES.has(code)) return true;
    if (current instanceof TypeError && current.message === 'fetch failed') return true;
    const message = current.message.toLowerCase();
    if (message.includes('socket hang up') || message.includes('other side closed')) return true;
    current = current.cause;
  }
  return false;
}

/**
 * GET-only HTTP client with per-attempt timeouts, exponential backoff on
 * transient failures and cooperative cancellation between attempts.
 */
export class HttpClient {
  private readonly options: HttpClientOptions;
  private readonly fetchImpl: FetchLike;
  private readonly sleepImpl: SleepFn;

  constructor(options: HttpClientOptions) {
    this.options = options;
    this.fetchImpl = options.fetch ?? ((url, init) => fetch(url, init));
    this.sleepImpl = options.sleep ?? sleep;
  }

  async getText(url: string, headers: Record<string, string> = {}): Promise<string> {
    return this.request(url, headers, (response) => response.text());
  }

  async getJson(url: string, headers: Record<string, string> = {}): Promise<{ body: unknown; headers: Headers }> {
    return this.request(url, { Accept: 'application/json', ...headers }, async (response) => ({
      body: await response.json(),
      headers: response.headers
    }));
  }

  /**
   * Downloads `url` and returns the hex sha256 of its bytes.
   */
  async getSha256(url: string, headers: Record<string, string> = {}): Promise<string> {
    return this.request(url, headers, async (response) => {
      const bytes = new Uint8Array(await response.arrayBuffer());
      return createHash('sha256').update(bytes).digest('hex');
    });
  }

  private backoffDelay(attempt: number, retryAfterMs?: number): number {
    if (retryAfterMs !== undefined) return Math.min(retryAfterMs, RESOLVER_DEFAULTS.MAX_RETRY_AFTER_MS);
    const delay = this.options.backoffMs * 2 ** attempt;
    return Math.floor(delay + delay * 0.25 * Math.random());
  }

  private async request<T>(
    url: string,
    headers: Record<string, string>,
    read: (response: Response) => Promise<T>
  ): Promise<T> {
    const { retries, timeoutMs, signal } = this.options;
    let lastError: TransientNetworkError | undefined;

    for (let attempt = 0; attempt <= retries; attempt++) {
      if (signal?.aborted) {
        throw new CancelledError();
      }

      try {
        const response = await this.fetchImpl(url, {
          headers: { 'User-Agent': USER_AGENT, ...headers },
          signal: createSignalWithTimeout(timeoutMs, signal)
        });

        if (response.ok) {
          return await read(response);
        }
        if (isTransientStatus(response)) {
          throw new TransientNetworkError(url, `${url} responded ${response.status}`, {
            status: response.status,
            retryAfterMs: parseRetryAfter(response.headers.get('retry-after'))
          });
        }
        throw new HttpStatusError(url, response.status, response.statusText);
      } catch (error) {
        if (signal?.aborted) {
          throw new CancelledError();
        }
        if (error instanceof HttpStatusError || !isTransientError(error)) {
          throw error;
        }

        lastError = error instanceof TransientNetworkError
          ? error
          : new TransientNetworkError(url, describeTransient(error, timeoutMs), { cause: error });
        logger.debug(`Attempt ${attempt + 1}/${retries + 1} for ${url} failed: ${lastError.message}`);

        if (attempt < retries) {
          await this.sleepImpl(this.backoffDelay(attempt, lastError.retryAfterMs), signal);
        }
      }
    }

    throw new TransientNetworkError(
      url,
      `gave up after ${retries + 1} attempts: ${lastError?.message ?? 'unknown error'}`,
      { status: lastError?.status, cause: lastError }
    );
  }
}

function describeTransient(error: unknown, timeoutMs: number): string {
  if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
    return `timed out after ${timeoutMs}ms`;
  }
  if (error instanceof Error) {
    const code = errorCode(error.cause);
    return code ? `${error.message} [${code}]` : error.message;
  }
  return String(error);
}
