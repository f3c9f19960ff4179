/**
 * Unit tests for SingleProbeStrategy
 */

import { describe, expect, test } from "vitest";
import { SingleProbeStrategy } from "../../../../src/core/strategy/SingleProbeStrategy";
import { SearchError } from "../../../../src/core/types";
import { STATIC_USER_AGENT } from "../../../../src/providers/headers";
import { createMockResults, createStrategyContext, FakeAggregator, FakeClock, probeResult } from "../../../__helpers__";

describe("SingleProbeStrategy", () => {
  const strategy = new SingleProbeStrategy();

  test("makes one probe with fixed headers and no delay", async () => {
    const records = createMockResults(3);
    const aggregator = new FakeAggregator([probeResult(records)]);
    const clock = new FakeClock();
    const context = createStrategyContext({ aggregator, clock });

    const result = await strategy.execute("python programming", {}, context);

    expect(result.results).toEqual(records);
    expect(aggregator.requests).toHaveLength(1);
    expect(aggregator.requests[0]?.headers).toMatchObject({
      "X-Forwarded-For": "127.0.0.1",
      "User-Agent": STATIC_USER_AGENT,
    });
    expect(aggregator.requests[0]?.categories).toEqual(["general", "it"]);
    expect(clock.sleeps).toEqual([]);
  });

  test("returns zero results for an empty answer", async () => {
    const context = createStrategyContext({ aggregator: new FakeAggregator([probeResult([])]) });

    const result = await strategy.execute("zzz", {}, context);

    expect(result.results).toEqual([]);
    expect(result.attempts).toHaveLength(1);
    expect(result.attempts[0]?.outcome).toBe("empty");
  });

  test("propagates upstream failures", async () => {
    const failure = new SearchError("searxng", "api_error", "SearXNG API error: HTTP 502", 502);
    const aggregator = new FakeAggregator([failure, probeResult(createMockResults(1))]);
    const context = createStrategyContext({ aggregator });

    await expect(strategy.execute("zzz", {}, context)).rejects.toBe(failure);
    expect(aggregator.requests).toHaveLength(1);
  });

  test("wraps unexpected errors as SearchError", async () => {
    const context = createStrategyContext({ aggregator: new FakeAggregator([new Error("boom")]) });

    await expect(strategy.execute("zzz", {}, context)).rejects.toMatchObject({
      name: "SearchError",
      reason: "unknown",
      message: "boom",
    });
  });
});
