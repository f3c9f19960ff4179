/**
 * Configuration types for searchrelay
 */

import type { EngineId } from "../core/types";

/**
 * The SearXNG instance every attempt is sent to
 */
export interface AggregatorConfig {
  /** Base URL; requests go to `{endpoint}/search` */
  endpoint: string;
  /** Per-probe timeout in milliseconds */
  timeoutMs: number;
  language: string;
  safesearch: 0 | 1 | 2;
}

export interface RetryConfig {
  /** When false, a single probe is made and failures propagate */
  enabled: boolean;
  /** Total number of probes, including the first */
  maxRetries: number;
  /** Lower bound of the jittered pause before attempts after the first */
  minDelayMs: number;
  /** Upper bound of the jittered pause */
  maxDelayMs: number;
  /** Engine sets tried cyclically from the second attempt on */
  fallbackChains: EngineId[][];
}

export interface ScraperConfig {
  timeoutMs: number;
  /** Characters kept from a fetched page before "..." */
  maxLength: number;
  userAgent: string;
}

export interface EngineConfigBase {
  /** Engine name as it appears in engine lists, e.g. "reddit api" */
  id: EngineId;

  /** Whether this engine is enabled */
  enabled: boolean;

  /** Human-readable display name */
  displayName: string;

  /** Request timeout in milliseconds */
  timeoutMs: number;
}

export interface RedditPullpushConfig extends EngineConfigBase {
  type: "reddit-pullpush";
  endpoint: string;
  pageSize: number;
}

export interface RedditApiConfig extends EngineConfigBase {
  type: "reddit-api";
  endpoint: string;
  tokenEndpoint: string;
  clientIdEnv: string;
  clientSecretEnv: string;
  userAgent: string;
  pageSize: number;
  /** Requests are withheld while fewer than this remain in the quota window */
  safetyFloor: number;
}

export interface SourcesConfig extends EngineConfigBase {
  type: "sources";
  endpoint: string;
  /** Restrict to one source (e.g. "producthunt"); empty searches all */
  sourceName?: string;
  limit: number;
}

/** Engines this process queries itself instead of through the aggregator */
export type EngineConfig = RedditPullpushConfig | RedditApiConfig | SourcesConfig;

export interface SearchRelayConfig {
  aggregator: AggregatorConfig;
  retry: RetryConfig;
  scraper: ScraperConfig;

  /**
   * Replace an explicitly requested "reddit" engine with google and a
   * `site:reddit.com` query prefix (unless "reddit" is a direct engine)
   */
  redditRewrite: boolean;

  /** Directly queried engines */
  engines: EngineConfig[];
}
