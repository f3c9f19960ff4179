/**
 * Unit tests for RedditPullpushProvider
 */

import { describe, expect, test } from "vitest";
import { RedditPullpushConfigSchema } from "../../../src/config/validation";
import { RedditPullpushProvider } from "../../../src/providers/pullpush";
import { fetchCall, jsonResponse, mockFetch } from "../../__helpers__";

const config = RedditPullpushConfigSchema.parse({
  id: "reddit",
  type: "reddit-pullpush",
  displayName: "Reddit (PullPush)",
});

describe("RedditPullpushProvider", () => {
  const provider = new RedditPullpushProvider(config);

  test("searches submissions sorted by score", async () => {
    const fetchMock = mockFetch(() =>
      jsonResponse({ data: [{ permalink: "/r/rust/1", title: "Async in Rust", subreddit: "rust" }] }),
    );

    const response = await provider.search({ query: "rust async", limit: 5 });

    expect(fetchCall(fetchMock).url).toBe(
      "https://api.pullpush.io/reddit/submission/search?q=rust+async&size=5&sort=score&order=desc",
    );
    expect(response.engineId).toBe("reddit");
    expect(response.items).toEqual([
      {
        url: "https://www.reddit.com/r/rust/1",
        title: "Async in Rust",
        content: "",
        metadata: "r/rust",
        kind: "text",
        sourceEngine: "reddit",
      },
    ]);
  });

  test("uses the configured page size without a limit", async () => {
    const fetchMock = mockFetch(() => jsonResponse({ data: [] }));
    await provider.search({ query: "q" });
    expect(fetchCall(fetchMock).url).toContain("size=25");
  });

  test("treats an undecodable body as no results", async () => {
    mockFetch(() => new Response("not json", { status: 200 }));
    await expect(provider.search({ query: "q" })).resolves.toEqual({ engineId: "reddit", items: [], tookMs: 0 });
  });

  test("rethrows HTTP failures", async () => {
    mockFetch(() => new Response("", { status: 500 }));
    await expect(provider.search({ query: "q" })).rejects.toMatchObject({ reason: "api_error", statusCode: 500 });
  });

  test("reports its metadata", () => {
    expect(provider.getMetadata()).toEqual({
      id: "reddit",
      displayName: "Reddit (PullPush)",
      docsUrl: "https://api.pullpush.io/",
    });
  });
});
