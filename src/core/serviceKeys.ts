/**
 * Service Keys for Dependency Injection Container
 *
 * Centralized constants for all service identifiers, and the map from each key
 * to the type registered under it.
 *
 * @example
 * ```typescript
 * import { ServiceKeys } from '../core/serviceKeys';
 *
 * container.singleton(ServiceKeys.CONFIG, () => config);
 * const config = container.get(ServiceKeys.CONFIG);
 * ```
 */

import type { SearchRelayConfig } from "../config/types";
import type { ResultAssembler } from "./assembler";
import type { Clock, RandomSource } from "./clock";
import type { ContentFetcher } from "./enrichment/PageContentFetcher";
import type { SearchOrchestrator } from "./orchestrator";
import type { ProviderRegistry } from "./provider";
import type { EngineSelector } from "./selection/EngineSelector";
import type { AggregatorProbe } from "./strategy/ISearchStrategy";

/**
 * All service keys used in the DI container
 */
export const ServiceKeys = {
  /** Application configuration */
  CONFIG: "config",

  /** Time source for delays, token expiry and response times */
  CLOCK: "clock",

  /** Randomness for headers and retry jitter */
  RANDOM: "random",

  /** Keyword-based engine selection */
  ENGINE_SELECTOR: "engineSelector",

  /** Aggregator client */
  AGGREGATOR: "aggregator",

  /** Registry of directly queried engines */
  PROVIDER_REGISTRY: "providerRegistry",

  /** Page content enrichment */
  CONTENT_FETCHER: "contentFetcher",

  /** Main search orchestrator */
  ORCHESTRATOR: "orchestrator",

  /** Response envelope builder */
  ASSEMBLER: "assembler",
} as const;

/**
 * Type representing any valid service key
 */
export type ServiceKey = (typeof ServiceKeys)[keyof typeof ServiceKeys];

export interface ServiceMap {
  [ServiceKeys.CONFIG]: SearchRelayConfig;
  [ServiceKeys.CLOCK]: Clock;
  [ServiceKeys.RANDOM]: RandomSource;
  [ServiceKeys.ENGINE_SELECTOR]: EngineSelector;
  [ServiceKeys.AGGREGATOR]: AggregatorProbe;
  [ServiceKeys.PROVIDER_REGISTRY]: ProviderRegistry;
  [ServiceKeys.CONTENT_FETCHER]: ContentFetcher;
  [ServiceKeys.ORCHESTRATOR]: SearchOrchestrator;
  [ServiceKeys.ASSEMBLER]: ResultAssembler;
}

/**
 * The part of a container the tool surfaces need; tests can supply their own
 */
export interface ServiceResolver {
  get<K extends ServiceKey>(key: K): ServiceMap[K];
}
