/**
 * Base class for direct providers
 *
 * Subclasses issue the request and adapt the payload; the base class turns an
 * undecodable body into an empty result set so a malformed upstream never
 * fails the attempt.
 */

import type { EngineConfigBase } from "../config/types";
import { createLogger } from "../core/logger";
import type { ProviderMetadata, SearchProvider } from "../core/provider";
import type { EngineId, ResultRecord, SearchQuery, SearchResponse } from "../core/types";
import { SearchError } from "../core/types";
import type { FetchResult } from "./utils";

const log = createLogger("Provider");

export abstract class BaseProvider<TConfig extends EngineConfigBase> implements SearchProvider {
  readonly id: EngineId;

  constructor(protected readonly config: TConfig) {
    this.id = config.id;
  }

  protected abstract getDocsUrl(): string;

  /** Perform the HTTP call; failures throw SearchError */
  protected abstract request(query: SearchQuery): Promise<FetchResult<unknown>>;

  /** Convert the decoded payload; must not throw */
  protected abstract adapt(payload: unknown): ResultRecord[];

  async search(query: SearchQuery): Promise<SearchResponse> {
    let response: FetchResult<unknown>;
    try {
      response = await this.request(query);
    } catch (error) {
      if (error instanceof SearchError && error.reason === "parse_error") {
        log.warn(`${this.id}: ${error.message}; treating as no results`);
        return { engineId: this.id, items: [], tookMs: 0 };
      }
      throw error;
    }

    return { engineId: this.id, items: this.adapt(response.data), tookMs: response.tookMs };
  }

  getMetadata(): ProviderMetadata {
    return {
      id: this.id,
      displayName: this.config.displayName,
      docsUrl: this.getDocsUrl(),
    };
  }
}
