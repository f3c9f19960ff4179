/**
 * Single Probe Strategy - one plain request, no retries
 *
 * Used when anti-blocking retries are disabled. An empty answer is returned
 * as zero results; any failure propagates to the caller.
 */

import { AGGREGATOR_ENGINE_ID } from "../../providers/searxng";
import { createLogger } from "../logger";
import { SearchError } from "../types";
import { AttemptExecutor } from "./AttemptExecutor";
import { planAttempt } from "./attemptPlanner";
import type { ISearchStrategy, StrategyContext, StrategyOptions, StrategyResult } from "./ISearchStrategy";

const log = createLogger("SingleProbe");

export class SingleProbeStrategy implements ISearchStrategy {
  async execute(
    query: string,
    options: StrategyOptions,
    context: StrategyContext,
  ): Promise<StrategyResult> {
    const attempt = planAttempt(0, query, options, context, "static");
    const { report, records, error } = await new AttemptExecutor(context).run(attempt, query, options);

    if (report.outcome === "success" || report.outcome === "empty") {
      return { results: records, attempts: [report] };
    }

    log.error(`Search failed with ${report.outcome}`);
    throw error ?? new SearchError(AGGREGATOR_ENGINE_ID, "unknown", `Search failed with ${report.outcome}`);
  }
}
