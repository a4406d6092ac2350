import { ConnectionError, HttpError, ScraperError, TimeoutError } from '../errors';
import { describeError, type Logger } from '../utils/logger';

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface RetryPolicy {
  /** Additional attempts after the first request. */
  maxRetries: number;
  backoffBaseMs: number;
  retryableStatusCodes: readonly number[];
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetries: 3,
  backoffBaseMs: 1000,
  retryableStatusCodes: [500, 502, 503, 504]
};

export interface HttpClientOptions {
  logger: Logger;
  timeoutMs: number;
  headers?: Record<string, string>;
  retryPolicy?: RetryPolicy;
  fetchImpl?: FetchLike;
  sleep?: (ms: number) => Promise<void>;
}

export interface HttpResponse {
  url: string;
  status: number;
  body: string;
  attempts: number;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
}

export function backoffDelay(policy: RetryPolicy, retryNumber: number): number {
  return policy.backoffBaseMs * 2 ** (retryNumber - 1);
}

interface AttemptResult {
  status: number;
  /** Null when the response was not 2xx and its body was discarded. */
  body: string | null;
}

function isTransientFailure(error: unknown): boolean {
  return error instanceof ConnectionError || error instanceof TimeoutError;
}

/**
 * GET-only client. The timeout covers the whole request, body included.
 * Transient server errors, dropped connections and timeouts are retried with
 * exponential backoff; everything else fails on the first try.
 */
export class HttpClient {
  private readonly retryPolicy: RetryPolicy;
  private readonly fetchImpl: FetchLike;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(private readonly options: HttpClientOptions) {
    this.retryPolicy = options.retryPolicy ?? DEFAULT_RETRY_POLICY;
    this.fetchImpl = options.fetchImpl ?? ((url, init) => fetch(url, init));
    this.sleep = options.sleep ?? sleep;
  }

  private readBody(response: Response, signal: AbortSignal): Promise<string> {
    return new Promise<string>((resolveBody, rejectBody) => {
      const onAbort = () => rejectBody(new Error('Response body read aborted'));
      if (signal.aborted) {
        onAbort();
        return;
      }
      signal.addEventListener('abort', onAbort, { once: true });
      void response.text().then(
        (text) => {
          signal.removeEventListener('abort', onAbort);
          resolveBody(text);
        },
        (error: unknown) => {
          signal.removeEventListener('abort', onAbort);
          rejectBody(error);
        }
      );
    });
  }

  private async discardBody(response: Response, url: string): Promise<void> {
    try {
      await response.body?.cancel();
    } catch (error) {
      this.options.logger.debug('Failed to discard response body', { url, error: describeError(error) });
    }
  }

  private async fetchOnce(url: string, headers: Record<string, string>): Promise<AttemptResult> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.options.timeoutMs);

    try {
      let response: Response;
      try {
        response = await this.fetchImpl(url, {
          method: 'GET',
          headers,
          redirect: 'follow',
          signal: controller.signal
        });
      } catch (error) {
        if (controller.signal.aborted) {
          throw new TimeoutError(`Request timed out after ${this.options.timeoutMs}ms: ${url}`, error);
        }
        throw new ConnectionError(`Connection failed for ${url}: ${describeError(error)}`, error);
      }

      if (!response.ok) {
        await this.discardBody(response, url);
        return { status: response.status, body: null };
      }

      try {
        return { status: response.status, body: await this.readBody(response, controller.signal) };
      } catch (error) {
        if (controller.signal.aborted) {
          throw new TimeoutError(`Response body timed out after ${this.options.timeoutMs}ms: ${url}`, error);
        }
        throw new ScraperError(`Failed to read response body from ${url}: ${describeError(error)}`, { cause: error });
      }
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private async backoff(url: string, attempt: number, reason: string): Promise<void> {
    const delay = backoffDelay(this.retryPolicy, attempt);
    this.options.logger.debug('Retrying transient HTTP failure', {
      url,
      reason,
      attempt,
      delayMs: delay
    });
    await this.sleep(delay);
  }

  async get(url: string, extraHeaders: Record<string, string> = {}): Promise<HttpResponse> {
    const headers = { ...(this.options.headers ?? {}), ...extraHeaders };
    let attempt = 0;

    for (;;) {
      attempt += 1;
      const canRetry = attempt - 1 < this.retryPolicy.maxRetries;

      let result: AttemptResult;
      try {
        result = await this.fetchOnce(url, headers);
      } catch (error) {
        if (canRetry && isTransientFailure(error)) {
          await this.backoff(url, attempt, describeError(error));
          continue;
        }
        throw error;
      }

      if (result.body === null) {
        if (canRetry && this.retryPolicy.retryableStatusCodes.includes(result.status)) {
          await this.backoff(url, attempt, `HTTP ${result.status}`);
          continue;
        }
        throw new HttpError(result.status, `Returned HTTP ${result.status} for ${url}`);
      }

      return { url, status: result.status, body: result.body, attempts: attempt };
    }
  }
}
