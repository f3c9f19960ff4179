/**
 * Creates direct providers from engine configuration
 */

import type { EngineConfig } from "../../config/types";
import { RedditPullpushProvider } from "../../providers/pullpush";
import { RedditApiProvider } from "../../providers/redditApi";
import { SourceSearchProvider } from "../../providers/sources";
import type { Clock } from "../clock";
import type { SearchProvider } from "./index";

export interface ProviderFactoryDeps {
  clock?: Clock;
}

export const ProviderFactory = {
  /**
   * @throws SearchError "config_error" when a provider's credentials are missing
   */
  createProvider(config: EngineConfig, deps: ProviderFactoryDeps = {}): SearchProvider {
    switch (config.type) {
      case "reddit-pullpush":
        return new RedditPullpushProvider(config);
      case "reddit-api":
        return new RedditApiProvider(config, { clock: deps.clock });
      case "sources":
        return new SourceSearchProvider(config);
    }
  },
};
