// Public API surface for consumers importing the library (non-CLI).

export { type AppContainer, type BootstrapOptions, bootstrapContainer } from "../bootstrap/container";
// Config helpers
export { getDefaultConfig, loadConfig } from "../config/load";
export type {
  AggregatorConfig,
  EngineConfig,
  RedditApiConfig,
  RedditPullpushConfig,
  RetryConfig,
  ScraperConfig,
  SearchRelayConfig,
  SourcesConfig,
} from "../config/types";
export { SearchRequestSchema, validateConfig, validateSearchRequest } from "../config/validation";
export type { Clock, RandomSource } from "../core/clock";
export { EngineSelector } from "../core/selection/EngineSelector";
export { ServiceKeys, type ServiceMap, type ServiceResolver } from "../core/serviceKeys";
export type { EngineId, ResultRecord, SearchFailureReason } from "../core/types";
export { SearchError } from "../core/types";
// Types
export type {
  AttemptReport,
  EngineExplanation,
  EnvelopeResult,
  SearchEnvelope,
  WebSearchInput,
} from "../tool/interface";
export { clearContainerCache, explainEngines, webSearch, type WebSearchOptions } from "../tool/webSearchTool";
