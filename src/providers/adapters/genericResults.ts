import type { EngineId, ResultRecord } from "../../core/types";
import { isRecord, readString } from "../types";
import { makeRecord } from "./common";

/**
 * Generic flat adapter: `{ results: [{ title, url, content }] }`.
 * Records without a title or url are dropped; nothing else is derived.
 */
export function adaptGenericResults(payload: unknown, engineId: EngineId): ResultRecord[] {
  if (!isRecord(payload) || !Array.isArray(payload.results)) {
    return [];
  }

  const results: ResultRecord[] = [];
  for (const item of payload.results) {
    if (!isRecord(item)) {
      continue;
    }
    const title = readString(item, "title") ?? "";
    const url = readString(item, "url") ?? "";
    if (!title || !url) {
      continue;
    }
    results.push(
      makeRecord({ title, url, content: readString(item, "content") ?? "", sourceEngine: engineId }),
    );
  }
  return results;
}
