/**
 * Provider API Response Types
 *
 * Upstream JSON shapes this relay narrows to. Payloads arrive as `unknown`
 * and are read through the guards below.
 */

// ============ SearXNG (aggregator) ============

/**
 * Aggregator search response
 */
export interface SearxngApiResponse {
  query?: string;
  results: unknown[];
  number_of_results?: number;
  suggestions?: string[];
  answers?: unknown[];
  unresponsive_engines?: unknown[];
}

// ============ Reddit OAuth ============

/**
 * OAuth client-credentials token response
 */
export interface OAuthTokenResponse {
  access_token: string;
  expires_in?: number;
  token_type?: string;
}

// ============ Type Guards ============

/**
 * Narrow an unknown JSON value to a plain object
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Read a string field, treating any other type as absent
 */
export function readString(obj: Record<string, unknown>, key: string): string | undefined {
  const value = obj[key];
  return typeof value === "string" ? value : undefined;
}

/**
 * Read a finite numeric field, treating any other type as absent
 */
export function readNumber(obj: Record<string, unknown>, key: string): number | undefined {
  const value = obj[key];
  return typeof value === "number" && Number.isFinite(value) ? value : undefined;
}

/**
 * Type guard to check if a value is a valid aggregator response
 */
export function isSearxngResponse(value: unknown): value is SearxngApiResponse {
  return isRecord(value) && Array.isArray(value.results);
}

/**
 * Type guard for the token endpoint's answer
 */
export function isOAuthTokenResponse(value: unknown): value is OAuthTokenResponse {
  return (
    isRecord(value) &&
    typeof value.access_token === "string" &&
    value.access_token.length > 0 &&
    (value.expires_in === undefined || typeof value.expires_in === "number")
  );
}
