/**
 * Consolidated Test Utilities and Helpers
 *
 * Fakes for the clock, randomness, the aggregator and direct providers, plus
 * factories for records, configuration and fetch responses.
 */

import { vi } from "vitest";
import { getDefaultConfig } from "../../src/config/load";
import type { SearchRelayConfig } from "../../src/config/types";
import type { Clock, RandomSource } from "../../src/core/clock";
import type { ProviderMetadata, SearchProvider } from "../../src/core/provider";
import { ProviderRegistry } from "../../src/core/provider";
import { EngineSelector } from "../../src/core/selection/EngineSelector";
import type { AggregatorProbe, StrategyContext } from "../../src/core/strategy/ISearchStrategy";
import type { EngineId, ResultRecord, SearchQuery, SearchResponse } from "../../src/core/types";
import type { ProbeRequest, ProbeResult } from "../../src/providers/searxng";

// ============ Result Factories ============

/**
 * Create a single mock result record
 */
export function createMockResult(overrides: Partial<ResultRecord> = {}): ResultRecord {
  return {
    title: "Test Result",
    url: "https://example.com",
    content: "Test content",
    kind: "text",
    sourceEngine: "test",
    ...overrides,
  };
}

/**
 * Create an array of mock result records
 */
export function createMockResults(count: number = 2, engineId: EngineId = "test"): ResultRecord[] {
  return Array.from({ length: count }, (_, i) =>
    createMockResult({
      title: `Test Result ${i + 1}`,
      url: `https://example${i + 1}.com`,
      content: `This is test result ${i + 1}`,
      sourceEngine: engineId,
    }),
  );
}

// ============ Time and Randomness ============

/**
 * Clock whose sleeps return immediately and advance virtual time
 */
export class FakeClock implements Clock {
  readonly sleeps: number[] = [];

  constructor(public current: number = 1_700_000_000_000) {}

  now(): number {
    return this.current;
  }

  advance(ms: number): void {
    this.current += ms;
  }

  async sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      throw signal.reason;
    }
    this.sleeps.push(ms);
    this.current += ms;
  }
}

/**
 * Random source that replays the given values in a cycle
 */
export class SequenceRandom implements RandomSource {
  private index = 0;

  constructor(private readonly values: readonly number[] = [0.5]) {}

  next(): number {
    const value = this.values[this.index % this.values.length] ?? 0;
    this.index++;
    return value;
  }
}

// ============ Aggregator ============

export type ProbeStep = ProbeResult | Error | ((request: ProbeRequest) => Promise<ProbeResult>);

/**
 * Build a probe result
 */
export function probeResult(records: ResultRecord[] = [], status: number = 200): ProbeResult {
  return { status, records, unresponsive: [], tookMs: 5 };
}

/**
 * Aggregator stand-in that answers from a script and records every request
 */
export class FakeAggregator implements AggregatorProbe {
  readonly requests: ProbeRequest[] = [];

  constructor(
    private readonly steps: ProbeStep[] = [],
    private readonly fallback: ProbeStep = probeResult(),
  ) {}

  async probe(request: ProbeRequest): Promise<ProbeResult> {
    this.requests.push(request);
    const step = this.steps.shift() ?? this.fallback;
    if (step instanceof Error) {
      throw step;
    }
    if (typeof step === "function") {
      return step(request);
    }
    return step;
  }
}

// ============ Provider Factories ============

/**
 * Interface for fake provider options
 */
export interface FakeProviderOptions {
  results?: ResultRecord[];
  shouldFail?: boolean;
  failure?: Error;
}

/**
 * Fake Search Provider for Unit Testing
 */
export class FakeSearchProvider implements SearchProvider {
  readonly queries: SearchQuery[] = [];

  constructor(
    public readonly id: string,
    private options: FakeProviderOptions = {},
  ) {}

  async search(query: SearchQuery): Promise<SearchResponse> {
    this.queries.push(query);

    if (this.options.shouldFail) {
      throw this.options.failure ?? new Error("Provider error");
    }

    const limit = query.limit ?? 10;
    const items = (this.options.results ?? createMockResults(2, this.id)).slice(0, limit);

    return {
      engineId: this.id,
      items,
      tookMs: 10,
    };
  }

  getMetadata(): ProviderMetadata {
    return {
      id: this.id,
      displayName: `${this.id} (Fake)`,
    };
  }
}

/**
 * Create a fake provider with optional custom results or error behavior
 */
export function createFakeProvider(
  id: string,
  optionsOrResults: FakeProviderOptions | ResultRecord[] = {},
): FakeSearchProvider {
  // Handle array shorthand: createFakeProvider("reddit", [...results])
  if (Array.isArray(optionsOrResults)) {
    return new FakeSearchProvider(id, { results: optionsOrResults });
  }
  return new FakeSearchProvider(id, optionsOrResults);
}

/**
 * Registry holding the given providers
 */
export function createRegistry(...providers: SearchProvider[]): ProviderRegistry {
  const registry = new ProviderRegistry();
  for (const provider of providers) {
    registry.register(provider);
  }
  return registry;
}

// ============ Config Factories ============

/**
 * Built-in defaults with overrides applied
 */
export function createTestConfig(overrides: Partial<SearchRelayConfig> = {}): SearchRelayConfig {
  return {
    ...getDefaultConfig(),
    ...overrides,
  };
}

/**
 * Strategy context backed entirely by fakes
 */
export function createStrategyContext(overrides: Partial<StrategyContext> = {}): StrategyContext {
  return {
    aggregator: new FakeAggregator(),
    providerRegistry: new ProviderRegistry(),
    selector: new EngineSelector(),
    retry: getDefaultConfig().retry,
    clock: new FakeClock(),
    random: new SequenceRandom(),
    ...overrides,
  };
}

// ============ Fetch Stand-ins ============

/**
 * JSON response with the given status
 */
export function jsonResponse(body: unknown, status: number = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json", ...headers },
  });
}

/**
 * Install a fetch mock answering every call with `handler`; setup.ts restores
 * the real fetch after each test
 */
export function mockFetch(handler: (url: string, init?: RequestInit) => Response | Promise<Response>) {
  const mock = vi.fn<typeof fetch>(async (input, init) => {
    const url = typeof input === "string" ? input : input instanceof URL ? input.toString() : input.url;
    return handler(url, init);
  });
  globalThis.fetch = mock;
  return mock;
}

/**
 * URL and init of the nth fetch call
 */
export function fetchCall(mock: ReturnType<typeof mockFetch>, n: number = 0): { url: string; init?: RequestInit } {
  const call = mock.mock.calls[n];
  if (!call) {
    throw new Error(`fetch was called ${mock.mock.calls.length} times, expected call #${n}`);
  }
  const [input, init] = call;
  const url = typeof input === "string" ? input : input instanceof URL ? input.toString() : input.url;
  return { url, init };
}

/**
 * fetch handler that never answers and rejects once its request is aborted
 */
export function hangUntilAborted(_url: string, init?: RequestInit): Promise<Response> {
  return new Promise<Response>((_resolve, reject) => {
    const signal = init?.signal;
    if (signal?.aborted) {
      reject(new Error("aborted"));
      return;
    }
    signal?.addEventListener("abort", () => reject(new Error("aborted")), { once: true });
  });
}
