/**
 * Multi-source vector search service
 *
 * `GET {endpoint}/search?q=&n=&source=`; one configured engine per source.
 */

import type { SourcesConfig } from "../config/types";
import type { ResultRecord, SearchQuery } from "../core/types";
import { adaptGenericResults } from "./adapters";
import { BaseProvider } from "./BaseProvider";
import { buildUrl, type FetchResult, fetchWithErrorHandling, joinUrl } from "./utils";

export class SourceSearchProvider extends BaseProvider<SourcesConfig> {
  protected getDocsUrl(): string {
    return this.config.endpoint;
  }

  protected request(query: SearchQuery): Promise<FetchResult<unknown>> {
    const url = buildUrl(joinUrl(this.config.endpoint, "search"), {
      q: query.query,
      n: query.limit ?? this.config.limit,
      source: this.config.sourceName || undefined,
    });

    return fetchWithErrorHandling(
      this.id,
      url,
      {
        method: "GET",
        headers: { Accept: "application/json" },
        timeoutMs: this.config.timeoutMs,
        signal: query.signal,
      },
      this.config.displayName,
    );
  }

  protected adapt(payload: unknown): ResultRecord[] {
    return adaptGenericResults(payload, this.id);
  }
}
