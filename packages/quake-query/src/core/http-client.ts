/**
 * HTTP Transport for Quake Query
 *
 * Sends the encoded query URL and returns the raw response body. Failures
 * come back as values, never as exceptions:
 * - TimeoutError: the request outlived its timeout and was aborted
 * - TransportError: network failure, external abort, or non-2xx status
 *
 * Retries are opt-in (maxRetries defaults to 0). When enabled they apply to
 * retryable statuses and network failures, with exponential backoff and
 * jitter. Timeouts are never retried.
 *
 * USAGE:
 * ```typescript
 * const transport = new HTTPTransport({ timeoutMs: 10000 });
 * const body = await transport.send(url);
 * if (!body.success) console.error(body.error.toLogString());
 * ```
 */

import { TimeoutError, TransportError } from './types/errors.js';
import { err, ok, type Result } from './types/result.js';
import { createLogger } from './utils/logger.js';

const logger = createLogger('http-client');

// ============================================================================
// Contracts
// ============================================================================

/**
 * Per-request options (override transport defaults)
 */
export interface TransportRequestOptions {
  /** Override request timeout */
  readonly timeoutMs?: number;

  /** AbortSignal for external cancellation */
  readonly signal?: AbortSignal;
}

/**
 * Collaborator that carries a serialized query to the feed
 */
export interface Transport {
  send(
    url: string,
    options?: TransportRequestOptions
  ): Promise<Result<string, TransportError | TimeoutError>>;
}

/**
 * HTTP transport configuration
 */
export interface HTTPClientConfig {
  /** Retry attempts after the first request (default: 0) */
  readonly maxRetries: number;

  /** Initial delay before first retry in milliseconds (default: 1000) */
  readonly initialDelayMs: number;

  /** Exponential backoff multiplier (default: 2) */
  readonly backoffMultiplier: number;

  /** Maximum delay between retries in milliseconds (default: 30000) */
  readonly maxDelayMs: number;

  /** Request timeout in milliseconds (default: 30000) */
  readonly timeoutMs: number;

  /** User-Agent header */
  readonly userAgent: string;

  /** Jitter factor to prevent thundering herd (0-1, default: 0.1) */
  readonly jitterFactor: number;
}

// ============================================================================
// HTTP Transport Implementation
// ============================================================================

export class HTTPTransport implements Transport {
  private readonly config: HTTPClientConfig;

  constructor(config?: Partial<HTTPClientConfig>) {
    this.config = {
      maxRetries: 0,
      initialDelayMs: 1000,
      backoffMultiplier: 2,
      maxDelayMs: 30000,
      timeoutMs: 30000,
      userAgent: 'quake-query/0.1',
      jitterFactor: 0.1,
      ...config,
    };
  }

  async send(
    url: string,
    options?: TransportRequestOptions
  ): Promise<Result<string, TransportError | TimeoutError>> {
    try {
      return ok(await this.fetchWithRetry(url, options));
    } catch (error) {
      if (error instanceof TransportError || error instanceof TimeoutError) {
        return err(error);
      }
      return err(
        new TransportError(
          `Failed to read response: ${error instanceof Error ? error.message : String(error)}`,
          url,
          undefined,
          { cause: error }
        )
      );
    }
  }

  /**
   * Fetch with retry logic; throws TransportError or TimeoutError
   */
  private async fetchWithRetry(url: string, options?: TransportRequestOptions): Promise<string> {
    const maxAttempts = this.config.maxRetries + 1;

    for (let attempt = 1; ; attempt++) {
      const isLastAttempt = attempt >= maxAttempts;

      try {
        return await this.fetchWithTimeout(url, options);
      } catch (error) {
        if (isLastAttempt || options?.signal?.aborted || !this.isRetryableError(error)) {
          throw error;
        }

        logger.warn('Transport attempt failed', {
          attempt,
          maxAttempts,
          error: error instanceof Error ? error.message : String(error),
          url,
        });
      }

      await this.sleep(this.calculateBackoffDelay(attempt));
    }
  }

  /**
   * One timed attempt. The timeout covers the headers and the body read.
   */
  private async fetchWithTimeout(url: string, options?: TransportRequestOptions): Promise<string> {
    const timeoutMs = options?.timeoutMs ?? this.config.timeoutMs;
    const callerSignal = options?.signal;

    const controller = new AbortController();
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs);

    // Follow the caller's signal for this attempt only
    const onCallerAbort = () => controller.abort();
    if (callerSignal?.aborted) {
      controller.abort();
    } else {
      callerSignal?.addEventListener('abort', onCallerAbort, { once: true });
    }

    try {
      const response = await fetch(url, {
        method: 'GET',
        headers: {
          'User-Agent': this.config.userAgent,
          Accept: 'application/json',
        },
        redirect: 'follow',
        signal: controller.signal,
      });

      if (!response.ok) {
        throw new TransportError(
          `HTTP ${response.status}: ${response.statusText}`,
          url,
          response.status
        );
      }

      return await this.readBody(response, controller.signal);
    } catch (error) {
      if (error instanceof TransportError) {
        throw error;
      }

      if (timedOut) {
        throw new TimeoutError(url, timeoutMs);
      }

      if (callerSignal?.aborted) {
        throw new TransportError('Request aborted by caller', url, undefined, { cause: error });
      }

      throw new TransportError(
        `Network error: ${error instanceof Error ? error.message : String(error)}`,
        url,
        undefined,
        { cause: error }
      );
    } finally {
      clearTimeout(timeoutId);
      callerSignal?.removeEventListener('abort', onCallerAbort);
    }
  }

  /**
   * Read the body as text, rejecting as soon as the signal aborts
   */
  private readBody(response: Response, signal: AbortSignal): Promise<string> {
    return new Promise<string>((resolve, reject) => {
      const onAbort = () => reject(new Error('Response body read aborted'));
      if (signal.aborted) {
        onAbort();
        return;
      }
      signal.addEventListener('abort', onAbort, { once: true });

      void response.text().then(
        (body) => {
          signal.removeEventListener('abort', onAbort);
          resolve(body);
        },
        (error: unknown) => {
          signal.removeEventListener('abort', onAbort);
          reject(error);
        }
      );
    });
  }

  /**
   * Calculate exponential backoff delay with jitter
   */
  private calculateBackoffDelay(attempt: number): number {
    const exponentialDelay =
      this.config.initialDelayMs * Math.pow(this.config.backoffMultiplier, attempt - 1);

    const cappedDelay = Math.min(exponentialDelay, this.config.maxDelayMs);

    // Jitter range: [delay * (1 - jitterFactor), delay * (1 + jitterFactor)]
    const jitterRange = cappedDelay * this.config.jitterFactor;
    const jitter = Math.random() * 2 * jitterRange - jitterRange;

    return Math.max(0, Math.floor(cappedDelay + jitter));
  }

  /**
   * Determine if HTTP status code is retryable
   */
  private isRetryableStatus(status: number): boolean {
    return (
      status === 408 || // Request Timeout
      status === 429 || // Too Many Requests
      status === 500 || // Internal Server Error
      status === 502 || // Bad Gateway
      status === 503 || // Service Unavailable
      status === 504    // Gateway Timeout
    );
  }

  /**
   * Network failures and retryable statuses only; timeouts surface immediately
   */
  private isRetryableError(error: unknown): boolean {
    if (!(error instanceof TransportError)) {
      return false;
    }
    return error.statusCode === undefined || this.isRetryableStatus(error.statusCode);
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}

/**
 * Create HTTP transport with custom config
 */
export function createHTTPTransport(config?: Partial<HTTPClientConfig>): HTTPTransport {
  return new HTTPTransport(config);
}
