/**
 * Resilient Fetch Utility
 *
 * Network plumbing shared by the LLM transport and the search backends:
 * - per-attempt timeout so a request can never hang forever
 * - retry with exponential backoff for 429/5xx and network failures
 * - Retry-After header support for rate limits
 *
 * Retries live here, below the agent loops, which never retry on their own.
 */

import { ProviderError, ErrorCategory, toError } from '../errors/index.js';

// =============================================================================
// TYPES
// =============================================================================

export interface NetworkConfig {
  /** Per-attempt timeout in milliseconds (default: 30000) */
  timeout?: number;
  /** Total attempts including the first one (default: 1) */
  maxAttempts?: number;
  /** Base delay between retries in ms (default: 1000) */
  baseRetryDelay?: number;
  /** Maximum delay between retries in ms, Retry-After included (default: 30000) */
  maxRetryDelay?: number;
  /** HTTP status codes that trigger retry (default: [429, 500, 502, 503, 504]) */
  retryableStatusCodes?: number[];
}

export interface ResilientFetchOptions {
  url: string;
  init: RequestInit;
  /** Name used in error messages */
  providerName: string;
  networkConfig?: NetworkConfig;
  /** Called before sleeping ahead of the next attempt */
  onRetry?: (attempt: number, delay: number, error: Error) => void;
}

export interface ResilientFetchResult {
  response: Response;
  /** Number of attempts made */
  attempts: number;
  /** Total duration in milliseconds */
  duration: number;
}

const DEFAULT_CONFIG: Required<NetworkConfig> = {
  timeout: 30000,
  maxAttempts: 1,
  baseRetryDelay: 1000,
  maxRetryDelay: 30000,
  retryableStatusCodes: [429, 500, 502, 503, 504],
};

// =============================================================================
// RESILIENT FETCH
// =============================================================================

/**
 * Perform a fetch with timeout and retry.
 *
 * Non-retryable responses (including 4xx) are returned to the caller as-is.
 * A retryable status on the last attempt, a timeout or a network failure
 * rejects with a {@link ProviderError}.
 */
export async function resilientFetch(options: ResilientFetchOptions): Promise<ResilientFetchResult> {
  const { url, init, providerName, networkConfig = {}, onRetry } = options;
  const config = { ...DEFAULT_CONFIG, ...networkConfig };
  const maxAttempts = Math.max(1, config.maxAttempts);
  const startTime = Date.now();
  let attempts = 0;

  while (true) {
    attempts++;

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), config.timeout);

    let failure: ProviderError;
    let delay: number;

    try {
      const response = await fetch(url, { ...init, signal: controller.signal });
      clearTimeout(timeoutId);

      if (!config.retryableStatusCodes.includes(response.status)) {
        return { response, attempts, duration: Date.now() - startTime };
      }

      const body = await response.text().catch(() => '');
      failure = ProviderError.fromStatus(providerName, response.status, body);
      const retryAfter = parseRetryAfter(response.headers.get('Retry-After'));
      delay = retryAfter === null ? calculateBackoff(attempts, config) : Math.min(retryAfter, config.maxRetryDelay);
    } catch (error) {
      clearTimeout(timeoutId);
      const err = toError(error);

      failure =
        err.name === 'AbortError'
          ? new ProviderError(
              `${providerName} request timed out after ${config.timeout}ms`,
              ErrorCategory.TRANSIENT,
              true,
              providerName,
              undefined,
              err
            )
          : ProviderError.network(providerName, err);
      delay = calculateBackoff(attempts, config);
    }

    if (attempts >= maxAttempts) {
      throw failure;
    }

    onRetry?.(attempts, delay, failure);
    await sleep(delay);
  }
}

// =============================================================================
// HELPERS
// =============================================================================

/**
 * Parse a Retry-After header value: seconds or an HTTP-date.
 */
export function parseRetryAfter(header: string | null): number | null {
  if (!header) return null;

  const seconds = Number(header);
  if (Number.isFinite(seconds)) {
    return Math.max(0, seconds * 1000);
  }

  const date = Date.parse(header);
  if (Number.isNaN(date)) {
    return null;
  }
  const delay = date - Date.now();
  return delay > 0 ? delay : null;
}

/**
 * Exponential backoff with ±25% jitter, clamped to `maxRetryDelay`.
 */
function calculateBackoff(attempt: number, config: Required<NetworkConfig>): number {
  const exponentialDelay = config.baseRetryDelay * Math.pow(2, attempt - 1);
  const jitter = exponentialDelay * 0.25 * (Math.random() * 2 - 1);
  return Math.min(exponentialDelay + jitter, config.maxRetryDelay);
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
