/**
 * Nested-listing adapter for Reddit's OAuth search API
 *
 * Input: `{ data: { children: [{ data: submission }, ...] } }`. Same truncation
 * and metadata rules as the flat adapter, but results keep listing order and
 * a thumbnail only decorates the record.
 */

import type { EngineId, ResultRecord } from "../../core/types";
import { isRecord, readNumber, readString } from "../types";
import {
  buildMetadataLine,
  hasThumbnail,
  makeRecord,
  REDDIT_BASE_URL,
  toIsoTimestamp,
  truncateContent,
} from "./common";

export function adaptRedditListing(payload: unknown, engineId: EngineId = "reddit api"): ResultRecord[] {
  if (!isRecord(payload) || !isRecord(payload.data)) {
    return [];
  }
  const children = payload.data.children;
  if (!Array.isArray(children)) {
    return [];
  }

  const results: ResultRecord[] = [];

  for (const child of children) {
    if (!isRecord(child) || !isRecord(child.data)) {
      continue;
    }
    const post = child.data;

    const title = readString(post, "title") ?? "";
    const permalink = readString(post, "permalink") ?? "";
    if (!title || !permalink) {
      continue;
    }
    const url = `${REDDIT_BASE_URL}${permalink}`;

    const thumbnail = readString(post, "thumbnail") ?? "";
    const withImage = hasThumbnail(thumbnail);

    results.push(
      makeRecord({
        url,
        title,
        content: truncateContent(readString(post, "selftext") ?? ""),
        publishedAt: toIsoTimestamp(readNumber(post, "created_utc")),
        metadata: buildMetadataLine(
          readString(post, "subreddit"),
          readNumber(post, "score"),
          readNumber(post, "num_comments"),
        ),
        imageSrc: withImage ? (readString(post, "url") ?? url) : undefined,
        thumbnailSrc: withImage ? thumbnail : undefined,
        kind: withImage ? "image" : "text",
        sourceEngine: engineId,
      }),
    );
  }

  return results;
}
