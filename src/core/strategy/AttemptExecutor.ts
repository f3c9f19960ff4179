/**
 * Runs one planned attempt
 *
 * The engine set is split: engines registered as direct providers are queried
 * by this process, the rest go to the aggregator in a single probe. Direct
 * engines are searched one after another after the probe; a failing or
 * throttled direct engine is skipped for this attempt only.
 */

import { AGGREGATOR_ENGINE_ID } from "../../providers/searxng";
import { createLogger } from "../logger";
import type { EngineId, ResultRecord } from "../types";
import { SearchError } from "../types";
import type {
  Attempt,
  AttemptOutcome,
  AttemptReport,
  StrategyContext,
  StrategyOptions,
} from "./ISearchStrategy";

const log = createLogger("Attempt");

export interface AttemptRun {
  report: AttemptReport;
  records: ResultRecord[];
  /** The aggregator failure, when there was one */
  error?: SearchError;
}

/**
 * Map a probe failure onto an attempt outcome. A 200 with an undecodable body
 * counts as empty.
 */
export function classifyFailure(error: SearchError): AttemptOutcome {
  switch (error.reason) {
    case "timeout":
      return "timeout";
    case "api_error":
    case "rate_limit":
      return "http_error";
    case "parse_error":
      return "empty";
    default:
      return "transport_error";
  }
}

function toSearchError(engineId: EngineId, error: unknown): SearchError {
  if (error instanceof SearchError) {
    return error;
  }
  return new SearchError(engineId, "unknown", error instanceof Error ? error.message : String(error));
}

export class AttemptExecutor {
  constructor(private readonly context: StrategyContext) {}

  async run(attempt: Attempt, query: string, options: StrategyOptions): Promise<AttemptRun> {
    const { providerRegistry, aggregator } = this.context;
    const engines = attempt.engineSet.engines;
    const directEngines = engines.filter((engine) => providerRegistry.has(engine));
    const aggregatorEngines = engines.filter((engine) => !providerRegistry.has(engine));

    const records: ResultRecord[] = [];
    let status: number | undefined;
    let failure: SearchError | undefined;

    if (aggregatorEngines.length > 0) {
      try {
        const probe = await aggregator.probe({
          query,
          engines: aggregatorEngines,
          categories: attempt.categories,
          headers: attempt.headers,
          signal: options.signal,
        });
        status = probe.status;
        records.push(...probe.records);
      } catch (error) {
        failure = toSearchError(AGGREGATOR_ENGINE_ID, error);
        status = failure.statusCode;
      }
    }

    const skippedEngines: EngineId[] = [];
    for (const engineId of directEngines) {
      const provider = providerRegistry.get(engineId);
      if (!provider) {
        continue;
      }
      try {
        const response = await provider.search({ query, limit: options.limit, signal: options.signal });
        records.push(...response.items);
      } catch (error) {
        const searchError = toSearchError(engineId, error);
        log.warn(`Skipping ${engineId} for attempt ${attempt.index + 1}: ${searchError.message}`);
        skippedEngines.push(engineId);
      }
    }

    let outcome: AttemptOutcome;
    if (records.length > 0) {
      outcome = "success";
    } else if (failure) {
      outcome = classifyFailure(failure);
    } else {
      outcome = "empty";
    }

    const report: AttemptReport = {
      index: attempt.index,
      engines: [...engines],
      source: attempt.engineSet.source,
      outcome,
      resultCount: records.length,
    };
    if (status !== undefined) report.status = status;
    if (failure) report.message = failure.message;
    if (skippedEngines.length > 0) report.skippedEngines = skippedEngines;

    return { report, records, error: failure };
  }
}
