/**
 * Unit tests for SourceSearchProvider
 */

import { describe, expect, test } from "vitest";
import { SourcesConfigSchema } from "../../../src/config/validation";
import { SourceSearchProvider } from "../../../src/providers/sources";
import { fetchCall, jsonResponse, mockFetch } from "../../__helpers__";

function createProvider(sourceName?: string) {
  return new SourceSearchProvider(
    SourcesConfigSchema.parse({
      id: "producthunt",
      type: "sources",
      displayName: "Product Hunt",
      endpoint: "http://sources.local:8000/",
      sourceName,
    }),
  );
}

describe("SourceSearchProvider", () => {
  test("queries one source with the result limit", async () => {
    const fetchMock = mockFetch(() =>
      jsonResponse({ results: [{ title: "Launch", url: "https://example.com/launch", content: "Ship it" }] }),
    );

    const response = await createProvider("producthunt").search({ query: "saas ideas" });

    expect(fetchCall(fetchMock).url).toBe("http://sources.local:8000/search?q=saas+ideas&n=10&source=producthunt");
    expect(response.items).toEqual([
      {
        url: "https://example.com/launch",
        title: "Launch",
        content: "Ship it",
        kind: "text",
        sourceEngine: "producthunt",
      },
    ]);
  });

  test("searches every source when none is configured", async () => {
    const fetchMock = mockFetch(() => jsonResponse({ results: [] }));
    await createProvider().search({ query: "saas", limit: 3 });
    expect(fetchCall(fetchMock).url).toBe("http://sources.local:8000/search?q=saas&n=3");
  });

  test("returns no records for an unexpected payload", async () => {
    mockFetch(() => jsonResponse({ items: [] }));
    const response = await createProvider().search({ query: "saas" });
    expect(response.items).toEqual([]);
  });
});
