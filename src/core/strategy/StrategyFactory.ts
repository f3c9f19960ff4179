/**
 * Strategy Factory
 *
 * Resolves a strategy by name; custom strategies can be registered for tests
 * or embedding applications.
 */

import type { ISearchStrategy } from "./ISearchStrategy";
import { RetryFallbackStrategy } from "./RetryFallbackStrategy";
import { SingleProbeStrategy } from "./SingleProbeStrategy";

export type StrategyName = "retry" | "single";

type StrategyConstructor = new () => ISearchStrategy;

const BUILT_IN: Record<StrategyName, StrategyConstructor> = {
  retry: RetryFallbackStrategy,
  single: SingleProbeStrategy,
};

const registry = new Map<string, StrategyConstructor>(Object.entries(BUILT_IN));

export const StrategyFactory = {
  createStrategy(name: string): ISearchStrategy {
    const Strategy = registry.get(name);
    if (!Strategy) {
      throw new Error(`Unknown strategy: ${name}. Available: ${[...registry.keys()].join(", ")}`);
    }
    return new Strategy();
  },

  registerStrategy(name: string, strategy: StrategyConstructor): void {
    registry.set(name, strategy);
  },

  getAvailableStrategies(): string[] {
    return [...registry.keys()];
  },

  /** Restore the built-in strategies only */
  reset(): void {
    registry.clear();
    for (const [name, strategy] of Object.entries(BUILT_IN)) {
      registry.set(name, strategy);
    }
  },
};
