/**
 * Main web search tool function
 *
 * This is the single public interface that runs the whole search pipeline
 */

import { type AppContainer, bootstrapContainer } from "../bootstrap/container";
import type { SearchEnvelope } from "../core/assembler";
import { createLogger } from "../core/logger";
import { type ServiceResolver, ServiceKeys } from "../core/serviceKeys";
import { validateSearchRequest } from "../config/validation";
import type { EngineExplanation, WebSearchInput } from "./interface";

const log = createLogger("WebSearch");

/**
 * Options for webSearch function
 */
export interface WebSearchOptions {
  /** Explicit config file path */
  configPath?: string;
  /** Container override for testing (dependency injection) */
  containerOverride?: ServiceResolver;
  /** Cancels pending probes, delays and page fetches */
  signal?: AbortSignal;
}

// One container per config path, so token and quota state outlive a request
const containers = new Map<string, AppContainer>();

function getContainer(configPath?: string): AppContainer {
  const key = configPath ?? "";
  let container = containers.get(key);
  if (!container) {
    container = bootstrapContainer(configPath);
    containers.set(key, container);
  }
  return container;
}

/**
 * Forget cached containers; the next call reloads configuration
 */
export function clearContainerCache(): void {
  containers.clear();
}

function resolveOptions(options?: string | WebSearchOptions): WebSearchOptions {
  // A string argument is a config path
  return typeof options === "string" ? { configPath: options } : (options ?? {});
}

/**
 * Execute a web search
 *
 * This function:
 * 1. Validates the request
 * 2. Reuses the DI container for the config path (or uses provided override)
 * 3. Runs the orchestrator with the configured strategy
 * 4. Assembles the response envelope, fetching page content when asked
 *
 * @param input Search request
 * @param options Optional config path or options object
 * @throws ZodError when the request is invalid
 * @throws SearchError in single-probe mode when the probe fails
 */
export async function webSearch(
  input: WebSearchInput,
  options?: string | WebSearchOptions,
): Promise<SearchEnvelope> {
  const opts = resolveOptions(options);
  const request = validateSearchRequest(input);

  const container = opts.containerOverride ?? getContainer(opts.configPath);
  const startedAt = container.get(ServiceKeys.CLOCK).now();

  log.info(`Search request: ${request.query}`);

  const outcome = await container.get(ServiceKeys.ORCHESTRATOR).run(request.query, {
    engines: request.engines,
    limit: request.max_results,
    signal: opts.signal,
  });

  return container.get(ServiceKeys.ASSEMBLER).assemble(request, outcome, startedAt, opts.signal);
}

/**
 * Show how a query would be routed: category scores, the chosen engines and
 * the aggregator categories of the first attempt
 */
export function explainEngines(
  query: string,
  options?: string | Omit<WebSearchOptions, "signal">,
): EngineExplanation {
  const opts = resolveOptions(options);
  const container = opts.containerOverride ?? getContainer(opts.configPath);
  const selector = container.get(ServiceKeys.ENGINE_SELECTOR);

  const { engines, source } = selector.selectEngines(query);
  const explanation: EngineExplanation = {
    query,
    scores: selector.scoreQuery(query),
    engines,
    source,
    categories: selector.categoriesForEngines(engines),
  };
  const category = selector.selectCategory(query);
  if (category) {
    explanation.category = category;
  }
  return explanation;
}
