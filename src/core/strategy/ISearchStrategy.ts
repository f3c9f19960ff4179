/**
 * Search Strategy Interface
 *
 * A strategy decides how many probes a search gets and which engines each one
 * uses. The retry strategy walks smart selection and the fallback chains; the
 * single-probe strategy makes one plain request.
 */

import type { RetryConfig } from "../../config/types";
import type { ProbeRequest, ProbeResult } from "../../providers/searxng";
import type { Clock, RandomSource } from "../clock";
import type { ProviderRegistry } from "../provider";
import type { EngineSelector } from "../selection/EngineSelector";
import type { EngineId, EngineSetSource, ResultRecord } from "../types";

/**
 * Anything that can send a probe to the aggregator
 */
export interface AggregatorProbe {
  probe(request: ProbeRequest): Promise<ProbeResult>;
}

/**
 * Context object providing dependencies to search strategies
 */
export interface StrategyContext {
  aggregator: AggregatorProbe;
  /** Engines queried directly instead of through the aggregator */
  providerRegistry: ProviderRegistry;
  selector: EngineSelector;
  retry: RetryConfig;
  clock: Clock;
  random: RandomSource;
}

/**
 * Options for configuring search strategy behavior
 */
export interface StrategyOptions {
  /** Engines chosen by the caller; used unchanged for every attempt */
  engineOverride?: EngineId[];

  /** Result limit passed to direct providers */
  limit?: number;

  signal?: AbortSignal;
}

/**
 * One planned probe. Frozen once built.
 */
export interface Attempt {
  readonly index: number;
  readonly engineSet: { readonly engines: readonly EngineId[]; readonly source: EngineSetSource };
  /** Aggregator category filter; absent when the caller chose engines */
  readonly categories?: readonly string[];
  readonly headers: Readonly<Record<string, string>>;
  /** Pause before sending, in milliseconds */
  readonly preDelayMs: number;
}

export type AttemptOutcome = "success" | "empty" | "http_error" | "timeout" | "transport_error";

/**
 * Metadata about a single attempt
 */
export interface AttemptReport {
  index: number;
  engines: EngineId[];
  source: EngineSetSource;
  outcome: AttemptOutcome;
  /** HTTP status of the aggregator probe, when one was received */
  status?: number;
  resultCount: number;
  message?: string;
  /** Direct engines that failed or were throttled during this attempt */
  skippedEngines?: EngineId[];
}

/**
 * Result from executing a search strategy
 */
export interface StrategyResult {
  results: ResultRecord[];
  attempts: AttemptReport[];
}

export interface ISearchStrategy {
  execute(query: string, options: StrategyOptions, context: StrategyContext): Promise<StrategyResult>;
}
