/**
 * Result Assembler
 *
 * Turns the winning attempt into the response envelope: bounds the records,
 * optionally enriches them with page content, and scores them by rank.
 */

import { randomUUID } from "node:crypto";
import type { ValidatedSearchRequest } from "../config/validation";
import type { Clock } from "./clock";
import type { ContentFetcher } from "./enrichment/PageContentFetcher";
import { createLogger } from "./logger";
import type { OrchestratorResult } from "./orchestrator";
import type { AttemptReport } from "./strategy/ISearchStrategy";
import type { ResultRecord } from "./types";

const log = createLogger("Assembler");

const TOP_SCORE = 0.9;
const SCORE_STEP = 0.05;

export interface EnvelopeResult {
  url: string;
  title: string;
  content: string;
  score: number;
  raw_content: string | null;
  published_date?: string;
  metadata?: string;
  img_src?: string;
  thumbnail_src?: string;
  engine: string;
}

export interface SearchEnvelope {
  query: string;
  follow_up_questions: null;
  answer: null;
  images: string[];
  results: EnvelopeResult[];
  /** Seconds */
  response_time: number;
  request_id: string;
  attempts: AttemptReport[];
}

export interface ResultAssemblerDeps {
  fetcher: ContentFetcher;
  clock: Clock;
  generateId?: () => string;
}

/**
 * Rank-derived score: 0.9 for the first result, 0.05 less for each one after
 */
export function rankScore(index: number): number {
  return Number((TOP_SCORE - index * SCORE_STEP).toFixed(10));
}

function toEnvelopeResult(record: ResultRecord, index: number, rawContent: string | null): EnvelopeResult {
  const result: EnvelopeResult = {
    url: record.url,
    title: record.title,
    content: record.content,
    score: rankScore(index),
    raw_content: rawContent,
    engine: record.sourceEngine,
  };
  if (record.publishedAt) result.published_date = record.publishedAt;
  if (record.metadata) result.metadata = record.metadata;
  if (record.imageSrc) result.img_src = record.imageSrc;
  if (record.thumbnailSrc) result.thumbnail_src = record.thumbnailSrc;
  return result;
}

export class ResultAssembler {
  private readonly generateId: () => string;

  constructor(private readonly deps: ResultAssemblerDeps) {
    this.generateId = deps.generateId ?? randomUUID;
  }

  async assemble(
    request: ValidatedSearchRequest,
    outcome: OrchestratorResult,
    startedAt: number,
    signal?: AbortSignal,
  ): Promise<SearchEnvelope> {
    const bounded = outcome.results.slice(0, request.max_results);

    const rawContents = request.include_raw_content
      ? await this.enrich(bounded, request.content_format, signal)
      : new Map<string, string>();

    const results = bounded.map((record, index) =>
      toEnvelopeResult(
        record,
        index,
        request.include_raw_content ? (rawContents.get(record.url) ?? null) : null,
      ),
    );

    const responseTime = (this.deps.clock.now() - startedAt) / 1000;
    log.info(`Search completed: ${results.length} results in ${responseTime.toFixed(2)}s`);

    return {
      query: request.query,
      follow_up_questions: null,
      answer: null,
      images: [],
      results,
      response_time: responseTime,
      request_id: this.generateId(),
      attempts: outcome.attempts,
    };
  }

  /**
   * Fetch every distinct URL concurrently. Content is keyed by URL, so the
   * order in which fetches finish does not matter.
   */
  private async enrich(
    records: readonly ResultRecord[],
    format: ValidatedSearchRequest["content_format"],
    signal?: AbortSignal,
  ): Promise<Map<string, string>> {
    const urls = [...new Set(records.map((record) => record.url))];
    const settled = await Promise.allSettled(
      urls.map(async (url) => ({ url, content: await this.deps.fetcher.fetch(url, format, signal) })),
    );

    const contents = new Map<string, string>();
    for (const entry of settled) {
      if (entry.status === "rejected") {
        log.warn(`Content fetch failed: ${entry.reason instanceof Error ? entry.reason.message : String(entry.reason)}`);
        continue;
      }
      if (entry.value.content) {
        contents.set(entry.value.url, entry.value.content);
      }
    }
    return contents;
  }
}
