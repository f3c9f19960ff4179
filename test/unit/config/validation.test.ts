/**
 * Unit tests for configuration and request validation
 */

import { describe, expect, test } from "vitest";
import {
  formatValidationErrors,
  validateConfig,
  validateConfigSafe,
  validateSearchRequest,
} from "../../../src/config/validation";

describe("validateSearchRequest", () => {
  test("applies defaults", () => {
    expect(validateSearchRequest({ query: "rust async" })).toEqual({
      query: "rust async",
      max_results: 10,
      include_raw_content: false,
      content_format: "markdown",
      engines: undefined,
    });
  });

  test("splits and trims a comma-separated engine string", () => {
    expect(validateSearchRequest({ query: "q", engines: " google, ,reddit ," }).engines).toEqual([
      "google",
      "reddit",
    ]);
  });

  test("cleans an engine list and treats an all-blank list as absent", () => {
    expect(validateSearchRequest({ query: "q", engines: [" github ", ""] }).engines).toEqual(["github"]);
    expect(validateSearchRequest({ query: "q", engines: ["", "  "] }).engines).toBeUndefined();
  });

  test("trims the query and rejects a blank one", () => {
    expect(validateSearchRequest({ query: "  spaced  " }).query).toBe("spaced");
    expect(() => validateSearchRequest({ query: "   " })).toThrow();
  });

  test("bounds max_results to 1..100", () => {
    expect(() => validateSearchRequest({ query: "q", max_results: 0 })).toThrow();
    expect(() => validateSearchRequest({ query: "q", max_results: 101 })).toThrow();
    expect(validateSearchRequest({ query: "q", max_results: 100 }).max_results).toBe(100);
  });

  test("rejects an unknown content format", () => {
    expect(() => validateSearchRequest({ query: "q", content_format: "html" })).toThrow();
  });
});

describe("validateConfig", () => {
  test("fills every section from defaults", () => {
    const config = validateConfig({});

    expect(config.aggregator).toEqual({
      endpoint: "http://localhost:8999",
      timeoutMs: 30_000,
      language: "auto",
      safesearch: 1,
    });
    expect(config.retry.enabled).toBe(true);
    expect(config.retry.maxRetries).toBe(3);
    expect(config.retry.fallbackChains[0]).toEqual(["google", "duckduckgo", "brave"]);
    expect(config.scraper.maxLength).toBe(10_000);
    expect(config.redditRewrite).toBe(true);
    expect(config.engines).toEqual([]);
  });

  test("fills engine defaults by type", () => {
    const config = validateConfig({
      engines: [{ id: "reddit api", type: "reddit-api", displayName: "Reddit" }],
    });

    expect(config.engines[0]).toMatchObject({
      id: "reddit api",
      enabled: true,
      clientIdEnv: "REDDIT_CLIENT_ID",
      safetyFloor: 50,
    });
  });

  test("rejects a minimum delay above the maximum", () => {
    expect(() => validateConfig({ retry: { minDelayMs: 5000, maxDelayMs: 1000 } })).toThrow(
      "minDelayMs must not exceed maxDelayMs",
    );
  });

  test("rejects duplicate engine ids", () => {
    const engine = { id: "reddit", type: "reddit-pullpush", displayName: "Reddit" };
    expect(() => validateConfig({ engines: [engine, engine] })).toThrow("engine ids must be unique");
  });

  test("rejects an out-of-range safesearch level", () => {
    expect(validateConfigSafe({ aggregator: { safesearch: 3 } }).success).toBe(false);
  });

  test("requires an endpoint for sources engines", () => {
    expect(validateConfigSafe({ engines: [{ id: "ph", type: "sources", displayName: "PH" }] }).success).toBe(false);
  });
});

describe("formatValidationErrors", () => {
  test("prefixes messages with their path", () => {
    const result = validateConfigSafe({ retry: { maxRetries: 0 } });
    if (result.success) {
      throw new Error("expected validation to fail");
    }

    expect(formatValidationErrors(result.error)).toEqual([
      "retry.maxRetries: Number must be greater than 0",
    ]);
  });
});
