/**
 * Normalizer for the aggregator's own JSON results
 *
 * The aggregator already merged its engines' output; this only enforces the
 * record invariants and renames fields.
 */

import type { EngineId, ResultRecord } from "../../core/types";
import { isRecord, readString } from "../types";
import { makeRecord, truncateContent } from "./common";

export function adaptAggregatorResults(
  results: readonly unknown[],
  fallbackEngine: EngineId = "searxng",
): ResultRecord[] {
  const records: ResultRecord[] = [];

  for (const item of results) {
    if (!isRecord(item)) {
      continue;
    }
    const url = readString(item, "url") ?? "";
    const title = (readString(item, "title") ?? "").trim();
    if (!url || !title) {
      continue;
    }

    const imageSrc = readString(item, "img_src");
    const isImage = readString(item, "template") === "images.html" || Boolean(imageSrc);

    records.push(
      makeRecord({
        url,
        title,
        content: truncateContent(readString(item, "content") ?? ""),
        publishedAt: readString(item, "publishedDate"),
        metadata: readString(item, "metadata"),
        imageSrc,
        thumbnailSrc: readString(item, "thumbnail_src"),
        kind: isImage ? "image" : "text",
        sourceEngine: readString(item, "engine") ?? fallbackEngine,
      }),
    );
  }

  return records;
}
