/**
 * Helpers shared by the per-engine result adapters
 */

import type { EngineId, ResultRecord } from "../../core/types";

export const REDDIT_BASE_URL = "https://www.reddit.com";

/** Longest content body kept before the ellipsis */
export const MAX_CONTENT_LENGTH = 500;

/** Reddit's placeholder values for posts without a real preview image */
export const THUMBNAIL_SENTINELS: ReadonlySet<string> = new Set([
  "self",
  "default",
  "nsfw",
  "spoiler",
  "",
]);

/**
 * Cut `text` to MAX_CONTENT_LENGTH characters and append "..." when it was longer
 */
export function truncateContent(text: string, maxLength = MAX_CONTENT_LENGTH): string {
  if (text.length <= maxLength) {
    return text;
  }
  return `${text.slice(0, maxLength)}...`;
}

/**
 * Build "r/{subreddit} | {score} points | {n} comments", dropping zero counts.
 * No subreddit means no metadata line at all.
 */
export function buildMetadataLine(
  subreddit: string | undefined,
  score: number | undefined,
  numComments: number | undefined,
): string | undefined {
  if (!subreddit) {
    return undefined;
  }
  let metadata = `r/${subreddit}`;
  if (score) {
    metadata += ` | ${score} points`;
  }
  if (numComments) {
    metadata += ` | ${numComments} comments`;
  }
  return metadata;
}

/**
 * Convert a unix timestamp in seconds to ISO-8601; zero and garbage yield undefined
 */
export function toIsoTimestamp(createdUtc: number | undefined): string | undefined {
  if (!createdUtc) {
    return undefined;
  }
  const date = new Date(createdUtc * 1000);
  return Number.isNaN(date.getTime()) ? undefined : date.toISOString();
}

/**
 * True when the thumbnail is a non-sentinel value
 */
export function hasThumbnail(thumbnail: string): boolean {
  return !THUMBNAIL_SENTINELS.has(thumbnail);
}

/**
 * True when the thumbnail is an absolute URL with a host and a path. A bare
 * "/" counts as a path; "https://host" without one does not.
 */
export function isThumbnailUrl(thumbnail: string): boolean {
  if (!hasThumbnail(thumbnail)) {
    return false;
  }
  try {
    const parsed = new URL(thumbnail);
    // URL normalizes a missing path to "/", so look at the raw text
    const afterScheme = thumbnail.split("//")[1] ?? "";
    const authorityAndPath = afterScheme.split(/[?#]/)[0] ?? "";
    return parsed.hostname.length > 0 && authorityAndPath.includes("/");
  } catch {
    return false;
  }
}

/**
 * Assemble a record, omitting optional fields that have no value
 */
export function makeRecord(fields: {
  url: string;
  title: string;
  content?: string;
  publishedAt?: string;
  metadata?: string;
  imageSrc?: string;
  thumbnailSrc?: string;
  kind?: ResultRecord["kind"];
  sourceEngine: EngineId;
}): ResultRecord {
  const record: ResultRecord = {
    url: fields.url,
    title: fields.title,
    content: fields.content ?? "",
    kind: fields.kind ?? "text",
    sourceEngine: fields.sourceEngine,
  };
  if (fields.publishedAt) record.publishedAt = fields.publishedAt;
  if (fields.metadata) record.metadata = fields.metadata;
  if (fields.imageSrc) record.imageSrc = fields.imageSrc;
  if (fields.thumbnailSrc) record.thumbnailSrc = fields.thumbnailSrc;
  return record;
}
