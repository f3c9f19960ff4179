#!/usr/bin/env -S npx tsx
/**
 * searchrelay CLI
 *
 * Web search through a SearXNG instance with smart engine selection and
 * retry/fallback
 */

import type { EngineExplanation, SearchEnvelope } from "./tool/interface";
import { explainEngines, webSearch } from "./tool/webSearchTool";

// Parse command line arguments
const args = process.argv.slice(2);

// Parse --config first and remove from args (global option that can appear anywhere)
const configIdx = args.indexOf("--config");
let configPath: string | undefined;
if (configIdx !== -1) {
  configPath = args[configIdx + 1];
  if (!configPath || configPath.startsWith("--")) {
    console.error("Error: --config requires a file path");
    process.exit(1);
  }
  args.splice(configIdx, 2);
}

// Show help
if (args.length === 0 || args.includes("--help") || args.includes("-h")) {
  console.log(`
searchrelay - Web search with smart engine selection and retry/fallback

USAGE:
    searchrelay <query> [options]
    searchrelay explain <query>

ARGUMENTS:
    <query>     Search query (required)
    explain     Show which engines a query would use, without searching

OPTIONS:
    --json                      Output the full response envelope as JSON
    --engines <engine,list>     Use specific engines (comma-separated)
    --limit <number>            Maximum number of results (1-100, default 10)
    --raw                       Fetch the content of every result page
    --format <text|markdown>    Format of fetched page content (default: markdown)
    --config <path>             Path to configuration file
    --help, -h                  Show this help message

EXAMPLES:
    searchrelay "python asyncio tutorial"
    searchrelay "rust borrow checker" --engines github,stackoverflow --json
    searchrelay "best mechanical keyboard" --raw --format text --limit 3
    searchrelay explain "arxiv transformer paper"

CONFIGURATION:
    Config files are searched in order:
    1. ./searchrelay.config.json
    2. $XDG_CONFIG_HOME/searchrelay/config.json
    3. ~/.config/searchrelay/config.json

ENVIRONMENT:
    SEARXNG_URL           SearXNG base URL (default http://localhost:8999)
    MAX_SEARCH_RETRIES    Number of attempts (default 3)
    ENABLE_ANTI_CAPTCHA   "false" makes a single plain request
    SEARCHRELAY_LOG_LEVEL debug | info | warn | error | silent
`);
  process.exit(0);
}

// Parse options
const options: {
  json: boolean;
  raw: boolean;
  engines?: string[];
  limit?: number;
  format?: "text" | "markdown";
} = {
  json: args.includes("--json"),
  raw: args.includes("--raw"),
};

// Parse --engines
const enginesIdx = args.indexOf("--engines");
if (enginesIdx !== -1) {
  const enginesArg = args[enginesIdx + 1];
  if (enginesArg !== undefined) {
    options.engines = enginesArg.split(",").map((e) => e.trim());
  }
}

// Parse --limit
const limitIdx = args.indexOf("--limit");
if (limitIdx !== -1) {
  const limitArg = args[limitIdx + 1];
  if (limitArg !== undefined) {
    const limit = parseInt(limitArg, 10);
    if (Number.isNaN(limit) || limit < 1 || limit > 100) {
      console.error(`Invalid limit: ${limitArg}. Must be a number between 1 and 100`);
      process.exit(1);
    }
    options.limit = limit;
  }
}

// Parse --format
const formatIdx = args.indexOf("--format");
if (formatIdx !== -1 && args[formatIdx + 1]) {
  const format = args[formatIdx + 1];
  if (format === "text" || format === "markdown") {
    options.format = format;
  } else {
    console.error(`Invalid format: ${format}. Must be 'text' or 'markdown'`);
    process.exit(1);
  }
}

// Extract query (non-option arguments)
// Filter out option flags (--*) and their values
const optionsWithValues = ["--engines", "--limit", "--format"];
const explain = args[0] === "explain";
const queryParts = args.slice(explain ? 1 : 0).filter((arg, idx, rest) => {
  if (arg.startsWith("--")) {
    return false;
  }
  const prevArg = rest[idx - 1];
  return !(prevArg && optionsWithValues.includes(prevArg));
});

const query = queryParts.join(" ").trim();

if (!query) {
  console.error("Error: Query is required");
  console.error("Run with --help for usage information");
  process.exit(1);
}

/**
 * Print results in human-readable format
 */
function printHumanReadable(result: SearchEnvelope) {
  console.log(`\nQuery: "${result.query}"`);
  console.log(`Found ${result.results.length} results in ${result.response_time.toFixed(2)}s\n`);

  if (result.results.length === 0) {
    console.log("No results found.");
  }

  result.results.forEach((item, i) => {
    console.log(`\n${i + 1}. ${item.title}`);
    console.log(`   ${item.url}`);
    console.log(`   Engine: ${item.engine}  Score: ${item.score.toFixed(2)}`);
    if (item.metadata) {
      console.log(`   ${item.metadata}`);
    }
    if (item.content) {
      console.log(`   ${item.content.substring(0, 200)}${item.content.length > 200 ? "..." : ""}`);
    }
    if (item.raw_content) {
      console.log(`   [page content: ${item.raw_content.length} chars]`);
    }
  });

  // Print attempt log
  console.log(`\n${"=".repeat(60)}`);
  console.log("Attempts");
  console.log(`${"=".repeat(60)}`);
  for (const attempt of result.attempts) {
    const status = attempt.status !== undefined ? ` HTTP ${attempt.status}` : "";
    const skipped = attempt.skippedEngines?.length ? ` (skipped: ${attempt.skippedEngines.join(", ")})` : "";
    console.log(
      `${String(attempt.index + 1).padEnd(3)} ${attempt.source.padEnd(9)} ${attempt.outcome}${status}  ${attempt.engines.join(",")}${skipped}`,
    );
  }

  console.log();
}

function printExplanation(explanation: EngineExplanation) {
  console.log(`\nQuery: "${explanation.query}"`);
  console.log(`Category: ${explanation.category ?? "(none, using defaults)"}`);
  console.log(`Engines: ${explanation.engines.join(", ")}`);
  console.log(`Aggregator categories: ${explanation.categories.join(", ")}\n`);
  for (const score of explanation.scores) {
    const matched = score.matched.length > 0 ? `  [${score.matched.join(", ")}]` : "";
    console.log(`  ${score.name.padEnd(10)} ${score.score}${matched}`);
  }
  console.log();
}

async function main() {
  try {
    if (explain) {
      const explanation = explainEngines(query, { configPath });
      if (options.json) {
        console.log(JSON.stringify(explanation, null, 2));
      } else {
        printExplanation(explanation);
      }
      return;
    }

    const result = await webSearch(
      {
        query,
        max_results: options.limit,
        engines: options.engines,
        include_raw_content: options.raw,
        content_format: options.format,
      },
      { configPath },
    );

    if (options.json) {
      console.log(JSON.stringify(result, null, 2));
    } else {
      printHumanReadable(result);
    }
  } catch (error) {
    console.error("Search failed:", error instanceof Error ? error.message : String(error));
    process.exit(1);
  }
}

await main();
