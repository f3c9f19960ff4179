/**
 * Core search types and error handling
 */

export type EngineId = string;

/** Where an attempt's engine list came from */
export type EngineSetSource = "explicit" | "smart" | "fallback";

/**
 * Ordered, de-duplicated list of engines for one probe
 */
export interface EngineSet {
  engines: EngineId[];
  source: EngineSetSource;
}

export type ResultKind = "text" | "image";

/**
 * Uniform result record every adapter produces.
 *
 * `url` and `title` are always non-empty. `content` defaults to "" and is
 * truncated to 500 characters plus "..." when longer. Optional fields are
 * omitted rather than set to undefined.
 */
export interface ResultRecord {
  url: string;
  title: string;
  content: string;
  /** ISO-8601 timestamp */
  publishedAt?: string;
  /** e.g. "r/typescript | 42 points | 7 comments" */
  metadata?: string;
  imageSrc?: string;
  thumbnailSrc?: string;
  kind: ResultKind;
  sourceEngine: EngineId;
}

/**
 * Query handed to a directly-queried engine
 */
export interface SearchQuery {
  query: string;
  limit?: number;
  signal?: AbortSignal;
}

export interface SearchResponse {
  engineId: EngineId;
  items: ResultRecord[];
  tookMs: number;
}

export type SearchFailureReason =
  | "network_error"
  | "timeout"
  | "api_error"
  | "rate_limit"
  | "no_results"
  | "parse_error"
  | "auth_error"
  | "config_error"
  | "unknown";

/**
 * Error thrown when a search provider fails
 */
export class SearchError extends Error {
  engineId: EngineId;
  reason: SearchFailureReason;
  statusCode?: number;

  constructor(
    engineId: EngineId,
    reason: SearchFailureReason,
    message: string,
    statusCode?: number,
  ) {
    super(message);
    this.name = "SearchError";
    this.engineId = engineId;
    this.reason = reason;
    this.statusCode = statusCode;
  }
}
