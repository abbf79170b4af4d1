/**
 * Network layer interface and implementation.
 *
 * HttpClient: HTTP GET requests with timeout and abort support.
 */

import type { Logger } from "../logging/types.js";
import { getErrorMessage } from "../../shared/error-utils.js";

// ============================================================================
// HTTP Client Interface
// ============================================================================

/**
 * Options for HTTP requests.
 */
export interface HttpRequestOptions {
  /** Timeout in milliseconds until response headers arrive. Default: 5000 */
  readonly timeout?: number;
  /** External abort signal to cancel the request */
  readonly signal?: AbortSignal;
  /** Extra request headers */
  readonly headers?: Readonly<Record<string, string>>;
}

/**
 * HTTP client for making fetch requests with timeout support.
 */
export interface HttpClient {
  /**
   * HTTP GET request with timeout support.
   * The timeout covers the wait for response headers; reading the body is
   * bounded only by the external signal.
   *
   * @returns Response object (non-2xx statuses resolve normally)
   * @throws DOMException with name "AbortError" on timeout or abort
   * @throws TypeError on network error (connection refused, DNS failure)
   *
   * @example
   * const response = await httpClient.fetch(url, { timeout: 30_000 });
   * if (response.ok) {
   *   const data: unknown = await response.json();
   * }
   */
  fetch(url: string, options?: HttpRequestOptions): Promise<Response>;
}

// ============================================================================
// Configuration
// ============================================================================

/**
 * Configuration for DefaultNetworkLayer.
 */
export interface NetworkLayerConfig {
  /** Default timeout for HTTP requests in ms. Default: 5000 */
  readonly defaultTimeout?: number;
  /** Headers sent with every request (e.g. User-Agent) */
  readonly defaultHeaders?: Readonly<Record<string, string>>;
}

// ============================================================================
// Default Implementation
// ============================================================================

/**
 * Default implementation of HttpClient over the global fetch.
 */
export class DefaultNetworkLayer implements HttpClient {
  private readonly config: Required<NetworkLayerConfig>;
  private readonly logger: Logger;

  constructor(logger: Logger, config: NetworkLayerConfig = {}) {
    this.logger = logger;
    this.config = {
      defaultTimeout: config.defaultTimeout ?? 5000,
      defaultHeaders: config.defaultHeaders ?? {},
    };
  }

  async fetch(url: string, options?: HttpRequestOptions): Promise<Response> {
    const timeout = options?.timeout ?? this.config.defaultTimeout;
    const externalSignal = options?.signal;

    this.logger.debug("Fetch", { url, method: "GET" });

    const controller = new AbortController();
    const timeoutId = setTimeout(() => {
      if (!controller.signal.aborted) {
        controller.abort();
      }
    }, timeout);

    const onExternalAbort = (): void => {
      if (!controller.signal.aborted) {
        controller.abort();
      }
    };

    if (externalSignal) {
      if (externalSignal.aborted) {
        controller.abort();
      } else {
        // Stays attached after headers arrive so aborting also cancels the body
        externalSignal.addEventListener("abort", onExternalAbort, { once: true });
      }
    }

    try {
      const response = await fetch(url, {
        signal: controller.signal,
        headers: { ...this.config.defaultHeaders, ...options?.headers },
      });
      this.logger.debug("Fetch complete", { url, status: response.status });
      return response;
    } catch (error) {
      this.logger.warn("Fetch failed", { url, error: getErrorMessage(error) });
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
