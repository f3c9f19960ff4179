/**
 * Page content enrichment
 *
 * Downloads a result page and reduces it to readable text or markdown. Page
 * chrome (scripts, navigation, headers, footers, asides, iframes) is removed
 * before extraction. Every failure degrades to `undefined`; enrichment never
 * fails a search.
 */

import { type CheerioAPI, load } from "cheerio";
import type { ScraperConfig } from "../../config/types";
import { fetchTextWithErrorHandling } from "../../providers/utils";
import { createLogger } from "../logger";

const log = createLogger("Enrichment");

export type ContentFormat = "text" | "markdown";

/**
 * Anything that can turn a URL into page content
 */
export interface ContentFetcher {
  fetch(url: string, format: ContentFormat, signal?: AbortSignal): Promise<string | undefined>;
}

const STRIPPED_TAGS = "script, style, nav, header, footer, aside, iframe, noscript";
const BLOCK_SELECTOR = "h1, h2, h3, h4, h5, h6, p, li, pre, blockquote";

function collapseWhitespace(value: string): string {
  return value.replace(/\s+/g, " ").trim();
}

/**
 * Cut to `maxLength` characters, marking the cut with "..."
 */
export function truncateText(text: string, maxLength: number): string {
  return text.length > maxLength ? `${text.slice(0, maxLength)}...` : text;
}

/**
 * Whitespace-collapsed text of the cleaned document
 */
export function extractText($: CheerioAPI): string {
  return collapseWhitespace($("body").text() || $.root().text());
}

/**
 * Render block elements as markdown, in document order. Blocks nested in
 * another block (a paragraph in a quote, say) are rendered by their outermost
 * block only.
 */
export function extractMarkdown($: CheerioAPI): string {
  const blocks: string[] = [];

  $(BLOCK_SELECTOR).each((_, element) => {
    const node = $(element);
    if (node.parents(BLOCK_SELECTOR).length > 0) {
      return;
    }

    const tag = String(node.prop("tagName") ?? "").toLowerCase();
    if (tag === "pre") {
      const code = node.text().replace(/^\n+|\s+$/g, "");
      if (code) blocks.push(`\`\`\`\n${code}\n\`\`\``);
      return;
    }

    const text = collapseWhitespace(node.text());
    if (!text) {
      return;
    }

    const heading = /^h([1-6])$/.exec(tag);
    if (heading?.[1]) {
      blocks.push(`${"#".repeat(Number(heading[1]))} ${text}`);
    } else if (tag === "li") {
      blocks.push(`- ${text}`);
    } else if (tag === "blockquote") {
      blocks.push(`> ${text}`);
    } else {
      blocks.push(text);
    }
  });

  return blocks.length > 0 ? blocks.join("\n\n") : extractText($);
}

/**
 * Convert an HTML document to the requested format
 */
export function htmlToContent(html: string, format: ContentFormat): string {
  const $ = load(html);
  $(STRIPPED_TAGS).remove();
  return format === "markdown" ? extractMarkdown($) : extractText($);
}

export class PageContentFetcher implements ContentFetcher {
  constructor(private readonly config: ScraperConfig) {}

  async fetch(url: string, format: ContentFormat, signal?: AbortSignal): Promise<string | undefined> {
    try {
      const { data } = await fetchTextWithErrorHandling("scraper", url, {
        method: "GET",
        headers: { "User-Agent": this.config.userAgent },
        timeoutMs: this.config.timeoutMs,
        signal,
      });

      const content = htmlToContent(data, format);
      return content ? truncateText(content, this.config.maxLength) : undefined;
    } catch (error) {
      log.warn(`Error fetching content from ${url}: ${error instanceof Error ? error.message : String(error)}`);
      return undefined;
    }
  }
}
