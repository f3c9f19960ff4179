/**
 * Flat-list adapter for PullPush-style submission search
 *
 * Input: `{ data: [submission, ...] }`. Posts with a real preview image become
 * image records and are emitted before all text records.
 */

import type { EngineId, ResultRecord } from "../../core/types";
import { isRecord, readNumber, readString } from "../types";
import {
  buildMetadataLine,
  isThumbnailUrl,
  makeRecord,
  REDDIT_BASE_URL,
  toIsoTimestamp,
  truncateContent,
} from "./common";

export function adaptFlatSubmissions(payload: unknown, engineId: EngineId = "reddit"): ResultRecord[] {
  if (!isRecord(payload) || !Array.isArray(payload.data)) {
    return [];
  }

  const imageResults: ResultRecord[] = [];
  const textResults: ResultRecord[] = [];

  for (const post of payload.data) {
    if (!isRecord(post)) {
      continue;
    }

    const permalink = readString(post, "permalink") ?? "";
    const url = permalink ? `${REDDIT_BASE_URL}${permalink}` : "";
    const title = readString(post, "title") ?? "";
    if (!url || !title) {
      continue;
    }

    const thumbnail = readString(post, "thumbnail") ?? "";
    if (isThumbnailUrl(thumbnail)) {
      imageResults.push(
        makeRecord({
          url,
          title,
          imageSrc: readString(post, "url") ?? url,
          thumbnailSrc: thumbnail,
          kind: "image",
          sourceEngine: engineId,
        }),
      );
      continue;
    }

    textResults.push(
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
        sourceEngine: engineId,
      }),
    );
  }

  return [...imageResults, ...textResults];
}
