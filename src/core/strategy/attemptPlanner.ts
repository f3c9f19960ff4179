/**
 * Builds the immutable plan for one attempt
 */

import { buildRandomizedHeaders, buildStaticHeaders } from "../../providers/headers";
import { uniform } from "../clock";
import { dedupeEngines } from "../selection/EngineSelector";
import type { EngineSet } from "../types";
import type { Attempt, StrategyContext, StrategyOptions } from "./ISearchStrategy";

export type HeaderMode = "randomized" | "static";

/**
 * Engine set for attempt `index`: the caller's override for every attempt,
 * otherwise smart selection first and then the fallback chains in a cycle
 */
export function chooseEngineSet(
  index: number,
  query: string,
  options: StrategyOptions,
  context: Pick<StrategyContext, "selector" | "retry">,
): EngineSet {
  if (options.engineOverride?.length) {
    return { engines: dedupeEngines(options.engineOverride), source: "explicit" };
  }
  if (index === 0) {
    return context.selector.selectEngines(query);
  }
  const chains = context.retry.fallbackChains;
  const chain = chains[(index - 1) % chains.length];
  if (!chain) {
    return context.selector.selectEngines(query);
  }
  return { engines: dedupeEngines(chain), source: "fallback" };
}

export function planAttempt(
  index: number,
  query: string,
  options: StrategyOptions,
  context: StrategyContext,
  headerMode: HeaderMode,
): Attempt {
  const engineSet = chooseEngineSet(index, query, options, context);

  // An explicit engine choice must not be widened by category defaults
  const categories =
    engineSet.source === "explicit"
      ? undefined
      : Object.freeze(context.selector.categoriesForEngines(engineSet.engines));

  const headers =
    headerMode === "randomized" ? buildRandomizedHeaders(context.random) : buildStaticHeaders();

  const preDelayMs =
    index > 0
      ? Math.round(uniform(context.random, context.retry.minDelayMs, context.retry.maxDelayMs))
      : 0;

  return Object.freeze({
    index,
    engineSet: Object.freeze({ ...engineSet, engines: Object.freeze([...engineSet.engines]) }),
    categories,
    headers: Object.freeze(headers),
    preDelayMs,
  });
}
