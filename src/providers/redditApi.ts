/**
 * Reddit search through the official OAuth API
 *
 * Every request is gated by the quota governor and authenticated with a
 * cached client-credentials token. Both are owned by this instance, so one
 * registered provider means one token and one quota budget per credential set.
 */

import type { RedditApiConfig } from "../config/types";
import { TokenManager } from "../core/auth/TokenManager";
import { type Clock, systemClock } from "../core/clock";
import { RateLimitGovernor } from "../core/ratelimit/RateLimitGovernor";
import type { ResultRecord, SearchQuery } from "../core/types";
import { SearchError } from "../core/types";
import { adaptRedditListing } from "./adapters";
import { BaseProvider } from "./BaseProvider";
import { PROVIDER_DEFAULTS } from "./constants";
import { buildUrl, type FetchResult, fetchWithErrorHandling, getEnvSecret } from "./utils";

export interface RedditApiProviderDeps {
  tokens?: TokenManager;
  governor?: RateLimitGovernor;
  clock?: Clock;
}

export class RedditApiProvider extends BaseProvider<RedditApiConfig> {
  readonly tokens: TokenManager;
  readonly governor: RateLimitGovernor;

  constructor(config: RedditApiConfig, deps: RedditApiProviderDeps = {}) {
    super(config);
    const clock = deps.clock ?? systemClock;
    this.tokens =
      deps.tokens ??
      new TokenManager({
        engineId: config.id,
        tokenEndpoint: config.tokenEndpoint,
        clientId: getEnvSecret(config.id, config.clientIdEnv),
        clientSecret: getEnvSecret(config.id, config.clientSecretEnv),
        userAgent: config.userAgent,
        timeoutMs: PROVIDER_DEFAULTS.TOKEN_TIMEOUT_MS,
        refreshMarginMs: PROVIDER_DEFAULTS.TOKEN_REFRESH_MARGIN_MS,
        defaultTtlSeconds: PROVIDER_DEFAULTS.TOKEN_TTL_SECONDS,
        clock,
      });
    this.governor =
      deps.governor ??
      new RateLimitGovernor({
        safetyFloor: config.safetyFloor,
        initialRemaining: PROVIDER_DEFAULTS.INITIAL_RATE_REMAINING,
        clock,
      });
  }

  protected getDocsUrl(): string {
    return "https://www.reddit.com/dev/api/";
  }

  /**
   * @throws SearchError "rate_limit" when the quota floor is reached,
   *         "auth_error" when no token can be obtained
   */
  protected async request(query: SearchQuery): Promise<FetchResult<unknown>> {
    if (this.governor.shouldThrottle()) {
      throw new SearchError(this.id, "rate_limit", "Quota safety floor reached; request withheld");
    }

    const token = await this.tokens.acquireToken(query.signal);
    const url = buildUrl(this.config.endpoint, {
      q: query.query,
      limit: query.limit ?? this.config.pageSize,
      sort: "relevance",
      t: "all",
      type: "link",
      restrict_sr: false,
    });

    try {
      return await fetchWithErrorHandling(
        this.id,
        url,
        {
          method: "GET",
          headers: {
            Authorization: `Bearer ${token}`,
            "User-Agent": this.config.userAgent,
          },
          timeoutMs: this.config.timeoutMs,
          signal: query.signal,
          onResponse: (response) => this.governor.update(response.headers),
        },
        "Reddit",
      );
    } catch (error) {
      // A rejected token will not recover until it is replaced
      if (error instanceof SearchError && error.statusCode === 401) {
        this.tokens.invalidate();
      }
      throw error;
    }
  }

  protected adapt(payload: unknown): ResultRecord[] {
    return adaptRedditListing(payload, this.id);
  }
}
