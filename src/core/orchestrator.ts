/**
 * Search Orchestrator
 *
 * Entry point of the search pipeline: applies the reddit rewrite, picks the
 * strategy for the configured retry mode and runs it.
 */

import type { SearchRelayConfig } from "../config/types";
import type { Clock, RandomSource } from "./clock";
import { createLogger } from "./logger";
import type { ProviderRegistry } from "./provider";
import { rewriteRedditToGoogle } from "./rewrite";
import type { EngineSelector } from "./selection/EngineSelector";
import type { AggregatorProbe, AttemptReport, StrategyContext } from "./strategy/ISearchStrategy";
import type { StrategyName } from "./strategy/StrategyFactory";
import { StrategyFactory } from "./strategy/StrategyFactory";
import type { EngineId, ResultRecord } from "./types";

const log = createLogger("Orchestrator");

export interface SearchOptions {
  /** Explicit engines, used for every attempt */
  engines?: EngineId[];

  /** Maximum results per direct provider */
  limit?: number;

  /** Caller cancellation */
  signal?: AbortSignal;
}

export interface OrchestratorResult {
  /** Query as sent upstream, after any rewrite */
  query: string;

  /** Records of the winning attempt */
  results: ResultRecord[];

  /** One report per attempt made */
  attempts: AttemptReport[];
}

export interface OrchestratorDeps {
  aggregator: AggregatorProbe;
  providerRegistry: ProviderRegistry;
  selector: EngineSelector;
  clock: Clock;
  random: RandomSource;
}

export class SearchOrchestrator {
  constructor(
    private readonly config: SearchRelayConfig,
    private readonly deps: OrchestratorDeps,
  ) {}

  getStrategyName(): StrategyName {
    return this.config.retry.enabled ? "retry" : "single";
  }

  async run(query: string, options: SearchOptions = {}): Promise<OrchestratorResult> {
    const directEngines = this.deps.providerRegistry.list().map((provider) => provider.id);
    const rewritten = this.config.redditRewrite
      ? rewriteRedditToGoogle(query, options.engines, directEngines)
      : { query, engines: options.engines };
    if (rewritten.query !== query) {
      log.debug(`Rewrote query to "${rewritten.query}" with engines ${rewritten.engines?.join(",")}`);
    }

    const strategyName = this.getStrategyName();
    const strategy = StrategyFactory.createStrategy(strategyName);

    const context: StrategyContext = {
      aggregator: this.deps.aggregator,
      providerRegistry: this.deps.providerRegistry,
      selector: this.deps.selector,
      retry: this.config.retry,
      clock: this.deps.clock,
      random: this.deps.random,
    };

    const { results, attempts } = await strategy.execute(
      rewritten.query,
      { engineOverride: rewritten.engines, limit: options.limit, signal: options.signal },
      context,
    );

    return { query: rewritten.query, results, attempts };
  }
}
