/**
 * Unit tests for RedditApiProvider
 */

import { beforeEach, describe, expect, test, vi } from "vitest";
import { RedditApiConfigSchema } from "../../../src/config/validation";
import { SearchError } from "../../../src/core/types";
import { RedditApiProvider } from "../../../src/providers/redditApi";
import { FakeClock, fetchCall, jsonResponse, mockFetch } from "../../__helpers__";

const TOKEN_URL = "https://www.reddit.com/api/v1/access_token";

const config = RedditApiConfigSchema.parse({
  id: "reddit api",
  type: "reddit-api",
  displayName: "Reddit API",
});

function listing(title: string) {
  return { data: { children: [{ data: { permalink: "/r/a/1", title, subreddit: "a", thumbnail: "self" } }] } };
}

/**
 * Token endpoint plus a search endpoint answering with the given quota headers
 */
function mockReddit(quota: Record<string, string> = {}, searchStatus = 200) {
  return mockFetch((url) => {
    if (url === TOKEN_URL) {
      return jsonResponse({ access_token: "test-token", expires_in: 3600 });
    }
    return searchStatus === 200
      ? jsonResponse(listing("found"), 200, quota)
      : jsonResponse({ message: "Unauthorized" }, searchStatus, quota);
  });
}

describe("RedditApiProvider", () => {
  beforeEach(() => {
    vi.stubEnv("REDDIT_CLIENT_ID", "test-client");
    vi.stubEnv("REDDIT_CLIENT_SECRET", "test-secret");
  });

  test("searches with a bearer token", async () => {
    const fetchMock = mockReddit();
    const provider = new RedditApiProvider(config, { clock: new FakeClock() });

    const response = await provider.search({ query: "rust", limit: 10 });

    expect(fetchMock).toHaveBeenCalledTimes(2);
    const search = fetchCall(fetchMock, 1);
    expect(search.url).toBe(
      "https://oauth.reddit.com/search?q=rust&limit=10&sort=relevance&t=all&type=link&restrict_sr=false",
    );
    expect(search.init?.headers).toEqual({
      Authorization: "Bearer test-token",
      "User-Agent": "searchrelay:reddit_api:1.0",
    });
    expect(response.items).toEqual([
      {
        url: "https://www.reddit.com/r/a/1",
        title: "found",
        content: "",
        metadata: "r/a",
        kind: "text",
        sourceEngine: "reddit api",
      },
    ]);
  });

  test("reuses the token across searches", async () => {
    const fetchMock = mockReddit();
    const provider = new RedditApiProvider(config, { clock: new FakeClock() });

    await provider.search({ query: "one" });
    await provider.search({ query: "two" });

    expect(fetchMock.mock.calls.filter(([input]) => input === TOKEN_URL)).toHaveLength(1);
    expect(fetchMock).toHaveBeenCalledTimes(3);
  });

  test("withholds requests once the quota drops below the floor", async () => {
    const fetchMock = mockReddit({ "x-ratelimit-remaining": "10.0", "x-ratelimit-reset": "300" });
    const clock = new FakeClock();
    const provider = new RedditApiProvider(config, { clock });

    await provider.search({ query: "first" });
    expect(provider.governor.getBudget().remaining).toBe(10);

    const error = await provider.search({ query: "second" }).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(SearchError);
    expect(error).toMatchObject({ reason: "rate_limit" });
    expect(fetchMock).toHaveBeenCalledTimes(2);

    clock.advance(300_001);
    await provider.search({ query: "third" });
    expect(fetchMock).toHaveBeenCalledTimes(3);
  });

  test("drops a token the API rejects", async () => {
    mockReddit({}, 401);
    const provider = new RedditApiProvider(config, { clock: new FakeClock() });

    await expect(provider.search({ query: "q" })).rejects.toMatchObject({ reason: "api_error", statusCode: 401 });
    expect(provider.tokens.getState()).toBeUndefined();
  });

  test("fails with config_error when credentials are missing", () => {
    vi.stubEnv("REDDIT_CLIENT_ID", "");
    expect(() => new RedditApiProvider(config)).toThrow("Missing environment variable: REDDIT_CLIENT_ID");
  });
});
