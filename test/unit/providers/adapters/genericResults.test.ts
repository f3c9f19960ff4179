/**
 * Unit tests for the generic flat adapter
 */

import { describe, expect, test } from "vitest";
import { adaptGenericResults } from "../../../../src/providers/adapters";

describe("adaptGenericResults", () => {
  test("maps title, url and content without deriving anything else", () => {
    const records = adaptGenericResults(
      {
        results: [
          { title: "Launch", url: "https://example.com/launch", content: "A long description", score: 0.8 },
          { title: "Plain", url: "https://example.com/plain" },
        ],
      },
      "sources",
    );

    expect(records).toEqual([
      {
        url: "https://example.com/launch",
        title: "Launch",
        content: "A long description",
        kind: "text",
        sourceEngine: "sources",
      },
      { url: "https://example.com/plain", title: "Plain", content: "", kind: "text", sourceEngine: "sources" },
    ]);
  });

  test("does not truncate content", () => {
    const [record] = adaptGenericResults(
      { results: [{ title: "t", url: "https://example.com", content: "y".repeat(800) }] },
      "sources",
    );
    expect(record?.content).toHaveLength(800);
  });

  test("drops entries missing title or url", () => {
    const records = adaptGenericResults(
      { results: [{ title: "t" }, { url: "https://example.com" }, null, { title: "ok", url: "https://ok.example" }] },
      "sources",
    );
    expect(records.map((r) => r.title)).toEqual(["ok"]);
  });

  test.each([undefined, [], { results: {} }, { items: [] }])("returns no records for %j", (payload) => {
    expect(adaptGenericResults(payload, "sources")).toEqual([]);
  });
});
