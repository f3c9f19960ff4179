/**
 * SearXNG aggregator client
 *
 * Sends one form-encoded probe to `{endpoint}/search` and normalizes the JSON
 * results. Failures surface as SearchError; the calling strategy decides
 * whether they are retried.
 */

import type { AggregatorConfig } from "../config/types";
import { createLogger } from "../core/logger";
import type { EngineId, ResultRecord } from "../core/types";
import { SearchError } from "../core/types";
import { adaptAggregatorResults } from "./adapters";
import { isSearxngResponse } from "./types";
import { fetchWithErrorHandling, joinUrl } from "./utils";

const log = createLogger("SearXNG");

export const AGGREGATOR_ENGINE_ID: EngineId = "searxng";

export interface ProbeRequest {
  query: string;
  engines: readonly EngineId[];
  /** Aggregator category filter; omitted when the caller chose engines */
  categories?: readonly string[];
  headers: Record<string, string>;
  signal?: AbortSignal;
}

export interface ProbeResult {
  status: number;
  records: ResultRecord[];
  /** Engines the aggregator reported as unresponsive */
  unresponsive: string[];
  tookMs: number;
}

export class SearxngClient {
  constructor(private readonly config: AggregatorConfig) {}

  /**
   * Build the form body for a probe
   */
  buildForm(request: Pick<ProbeRequest, "query" | "engines" | "categories">): URLSearchParams {
    const form = new URLSearchParams({
      q: request.query,
      format: "json",
      engines: request.engines.join(","),
      pageno: "1",
      language: this.config.language,
      safesearch: String(this.config.safesearch),
    });
    if (request.categories?.length) {
      form.set("categories", request.categories.join(","));
    }
    return form;
  }

  /**
   * Send one probe
   *
   * @throws SearchError on timeout, transport failure, non-200 or undecodable JSON
   */
  async probe(request: ProbeRequest): Promise<ProbeResult> {
    const { data, status, tookMs } = await fetchWithErrorHandling(
      AGGREGATOR_ENGINE_ID,
      joinUrl(this.config.endpoint, "search"),
      {
        method: "POST",
        headers: request.headers,
        body: this.buildForm(request).toString(),
        timeoutMs: this.config.timeoutMs,
        signal: request.signal,
      },
      "SearXNG",
    );

    if (!isSearxngResponse(data)) {
      throw new SearchError(AGGREGATOR_ENGINE_ID, "parse_error", "SearXNG response has no results array", status);
    }

    const unresponsive = Array.isArray(data.unresponsive_engines)
      ? data.unresponsive_engines.map((entry) => (Array.isArray(entry) ? String(entry[0]) : String(entry)))
      : [];
    if (unresponsive.length > 0) {
      log.debug(`Unresponsive engines: ${unresponsive.join(", ")}`);
    }

    return {
      status,
      records: adaptAggregatorResults(data.results, AGGREGATOR_ENGINE_ID),
      unresponsive,
      tookMs,
    };
  }
}
