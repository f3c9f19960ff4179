/**
 * Reddit search through the PullPush submission API
 *
 * Used instead of reddit.com/search.json, which blocks datacenter addresses.
 */

import type { RedditPullpushConfig } from "../config/types";
import type { ResultRecord, SearchQuery } from "../core/types";
import { adaptFlatSubmissions } from "./adapters";
import { BaseProvider } from "./BaseProvider";
import { buildUrl, type FetchResult, fetchWithErrorHandling } from "./utils";

export class RedditPullpushProvider extends BaseProvider<RedditPullpushConfig> {
  protected getDocsUrl(): string {
    return "https://api.pullpush.io/";
  }

  protected request(query: SearchQuery): Promise<FetchResult<unknown>> {
    const url = buildUrl(this.config.endpoint, {
      q: query.query,
      size: query.limit ?? this.config.pageSize,
      sort: "score",
      order: "desc",
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
      "PullPush",
    );
  }

  protected adapt(payload: unknown): ResultRecord[] {
    return adaptFlatSubmissions(payload, this.id);
  }
}
