/**
 * Bootstrap the Dependency Injection Container
 *
 * Sets up all services and their dependencies
 */

import { loadConfig } from "../config/load";
import type { SearchRelayConfig } from "../config/types";
import { ResultAssembler } from "../core/assembler";
import { type Clock, mathRandom, type RandomSource, systemClock } from "../core/clock";
import { Container } from "../core/container";
import { PageContentFetcher } from "../core/enrichment/PageContentFetcher";
import { createLogger } from "../core/logger";
import { SearchOrchestrator } from "../core/orchestrator";
import { ProviderRegistry } from "../core/provider";
import { ProviderFactory } from "../core/provider/ProviderFactory";
import { EngineSelector } from "../core/selection/EngineSelector";
import { ServiceKeys, type ServiceMap } from "../core/serviceKeys";
import { SearxngClient } from "../providers/searxng";

const log = createLogger("Bootstrap");

export type AppContainer = Container<ServiceMap>;

/**
 * Bootstrap options
 */
export interface BootstrapOptions {
  /** Time source (tests pass a fake) */
  clock?: Clock;
  /** Random source (tests pass a fake) */
  random?: RandomSource;
}

/**
 * Bootstrap the DI container with all services
 *
 * @param configOrPath - Either a config file path (string) or a config object directly
 */
export function bootstrapContainer(
  configOrPath?: string | SearchRelayConfig,
  options: BootstrapOptions = {},
): AppContainer {
  const container = new Container<ServiceMap>();

  // Config object provided directly (useful for testing), else load from file
  const config = typeof configOrPath === "object" ? configOrPath : loadConfig(configOrPath);

  container.singleton(ServiceKeys.CONFIG, () => config);
  container.singleton(ServiceKeys.CLOCK, () => options.clock ?? systemClock);
  container.singleton(ServiceKeys.RANDOM, () => options.random ?? mathRandom);
  container.singleton(ServiceKeys.ENGINE_SELECTOR, () => new EngineSelector());
  container.singleton(ServiceKeys.AGGREGATOR, () => new SearxngClient(config.aggregator));

  // Register provider registry
  container.singleton(ServiceKeys.PROVIDER_REGISTRY, (c) => {
    const registry = new ProviderRegistry();
    const clock = c.get(ServiceKeys.CLOCK);

    for (const engineConfig of config.engines) {
      if (!engineConfig.enabled) {
        continue;
      }

      try {
        registry.register(ProviderFactory.createProvider(engineConfig, { clock }));
        log.debug(`Registered provider: ${engineConfig.id}`);
      } catch (error) {
        // A misconfigured direct engine is left to the aggregator
        const errorMsg = error instanceof Error ? error.message : String(error);
        log.debug(`Skipping provider ${engineConfig.id}: ${errorMsg}`);
      }
    }

    return registry;
  });

  container.singleton(ServiceKeys.CONTENT_FETCHER, () => new PageContentFetcher(config.scraper));

  container.singleton(
    ServiceKeys.ORCHESTRATOR,
    (c) =>
      new SearchOrchestrator(config, {
        aggregator: c.get(ServiceKeys.AGGREGATOR),
        providerRegistry: c.get(ServiceKeys.PROVIDER_REGISTRY),
        selector: c.get(ServiceKeys.ENGINE_SELECTOR),
        clock: c.get(ServiceKeys.CLOCK),
        random: c.get(ServiceKeys.RANDOM),
      }),
  );

  container.singleton(
    ServiceKeys.ASSEMBLER,
    (c) =>
      new ResultAssembler({
        fetcher: c.get(ServiceKeys.CONTENT_FETCHER),
        clock: c.get(ServiceKeys.CLOCK),
      }),
  );

  return container;
}
