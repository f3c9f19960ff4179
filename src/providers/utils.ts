/**
 * Shared Provider Utilities
 *
 * Common HTTP plumbing for the aggregator client, the direct providers and the
 * token exchange, so every outbound call classifies failures the same way.
 */

import type { EngineId } from "../core/types";
import { SearchError } from "../core/types";

/**
 * Options for HTTP requests
 */
export interface FetchOptions {
  /** Request method */
  method: "GET" | "POST";
  /** Request headers */
  headers: Record<string, string>;
  /** Request body (for POST requests) */
  body?: string;
  /** Request timeout in milliseconds */
  timeoutMs?: number;
  /** Caller cancellation, combined with the timeout */
  signal?: AbortSignal;
  /** Called with every response before its status is checked */
  onResponse?: (response: Response) => void;
}

/**
 * Result of a fetch operation
 */
export interface FetchResult<T> {
  /** Parsed response data */
  data: T;
  /** Response status code */
  status: number;
  /** Time taken in milliseconds */
  tookMs: number;
}

/**
 * Read a secret from the environment variable named in config
 *
 * @throws SearchError if the variable is not set
 */
export function getEnvSecret(engineId: EngineId, envVarName: string): string {
  const value = process.env[envVarName];
  if (!value) {
    throw new SearchError(engineId, "config_error", `Missing environment variable: ${envVarName}`);
  }
  return value;
}

interface SentRequest {
  response: Response;
  started: number;
}

/**
 * Send a request and reject unless the response status is 2xx
 */
async function sendRequest(
  engineId: EngineId,
  url: string,
  options: FetchOptions,
  providerDisplayName?: string,
): Promise<SentRequest> {
  const started = Date.now();
  let response: Response;

  // Set up abort controller for timeout and caller cancellation
  const controller = new AbortController();
  let timedOut = false;
  const timeoutId = options.timeoutMs
    ? setTimeout(() => {
        timedOut = true;
        controller.abort();
      }, options.timeoutMs)
    : undefined;
  const forwardAbort = () => controller.abort();
  if (options.signal?.aborted) {
    controller.abort();
  } else {
    options.signal?.addEventListener("abort", forwardAbort, { once: true });
  }

  try {
    response = await fetch(url, {
      method: options.method,
      headers: options.headers,
      body: options.body,
      signal: controller.signal,
    });
  } catch (error) {
    if (timedOut) {
      throw new SearchError(engineId, "timeout", `Request timeout after ${options.timeoutMs}ms`);
    }

    throw new SearchError(
      engineId,
      "network_error",
      `Network error: ${error instanceof Error ? error.message : String(error)}`,
    );
  } finally {
    if (timeoutId) {
      clearTimeout(timeoutId);
    }
    options.signal?.removeEventListener("abort", forwardAbort);
  }

  options.onResponse?.(response);

  // Handle HTTP errors
  if (!response.ok) {
    let errorBody = "";
    try {
      errorBody = await response.text();
    } catch {
      // the status line is enough when the body cannot be read
    }

    // Detect rate limiting (HTTP 429)
    const reason = response.status === 429 ? "rate_limit" : "api_error";
    const errorPrefix = providerDisplayName ? `${providerDisplayName} API error` : "API error";
    throw new SearchError(
      engineId,
      reason,
      `${errorPrefix}: HTTP ${response.status} ${response.statusText}${errorBody ? ` - ${errorBody.slice(0, 200)}` : ""}`,
      response.status,
    );
  }

  return { response, started };
}

/**
 * Perform an HTTP fetch with error handling and timeout support
 *
 * @param engineId - Engine ID for error messages
 * @param url - URL to fetch
 * @param options - Fetch options
 * @param providerDisplayName - Optional provider display name for error messages
 * @returns Parsed JSON response, still untyped: callers narrow it with type guards
 * @throws SearchError on timeouts, network errors, HTTP errors, or parse errors
 */
export async function fetchWithErrorHandling(
  engineId: EngineId,
  url: string,
  options: FetchOptions,
  providerDisplayName?: string,
): Promise<FetchResult<unknown>> {
  const { response, started } = await sendRequest(engineId, url, options, providerDisplayName);

  // Parse JSON response
  let data: unknown;
  try {
    data = await response.json();
  } catch (error) {
    const errorPrefix = providerDisplayName
      ? `Invalid JSON response from ${providerDisplayName}`
      : "Invalid JSON response";
    throw new SearchError(
      engineId,
      "parse_error",
      `${errorPrefix}: ${error instanceof Error ? error.message : String(error)}`,
      response.status,
    );
  }

  return {
    data,
    status: response.status,
    tookMs: Date.now() - started,
  };
}

/**
 * Same as {@link fetchWithErrorHandling} for endpoints that answer with text or HTML
 */
export async function fetchTextWithErrorHandling(
  engineId: EngineId,
  url: string,
  options: FetchOptions,
  providerDisplayName?: string,
): Promise<FetchResult<string>> {
  const { response, started } = await sendRequest(engineId, url, options, providerDisplayName);

  let data: string;
  try {
    data = await response.text();
  } catch (error) {
    throw new SearchError(
      engineId,
      "network_error",
      `Failed to read response body: ${error instanceof Error ? error.message : String(error)}`,
      response.status,
    );
  }

  return {
    data,
    status: response.status,
    tookMs: Date.now() - started,
  };
}

/**
 * Build a URL with query parameters
 *
 * @param baseUrl - Base URL
 * @param params - Query parameters
 * @returns URL with query string
 */
export function buildUrl(
  baseUrl: string,
  params: Record<string, string | number | boolean | undefined>,
): string {
  const searchParams = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (value === undefined) {
      continue;
    }
    searchParams.append(key, String(value));
  }
  return `${baseUrl}?${searchParams.toString()}`;
}

/**
 * Join a base URL and a path without doubling the slash
 */
export function joinUrl(baseUrl: string, path: string): string {
  return `${baseUrl.replace(/\/+$/, "")}/${path.replace(/^\/+/, "")}`;
}
