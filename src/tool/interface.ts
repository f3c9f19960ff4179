/**
 * Input and output interfaces for the web search tool
 */

import type { SearchRequestInput } from "../config/validation";
import type { CategoryScore } from "../core/selection/EngineSelector";
import type { EngineId, EngineSetSource } from "../core/types";

export type { EnvelopeResult, SearchEnvelope } from "../core/assembler";
export type { AttemptReport } from "../core/strategy/ISearchStrategy";

/**
 * Search request, as accepted from callers
 *
 * - `query`: search text (required, non-blank)
 * - `max_results`: 1 to 100, default 10
 * - `include_raw_content`: fetch each result page, default false
 * - `content_format`: "markdown" (default) or "text" for fetched pages
 * - `engines`: comma-separated string or list; overrides smart selection
 */
export type WebSearchInput = SearchRequestInput;

/**
 * How a query would be routed, without searching
 */
export interface EngineExplanation {
  query: string;

  /** Score of every keyword category, in catalog order */
  scores: CategoryScore[];

  /** Winning category, absent when nothing matched */
  category?: string;

  engines: EngineId[];
  source: EngineSetSource;

  /** Aggregator categories sent with the first attempt */
  categories: string[];
}
