/**
 * Reddit query rewrite
 *
 * The aggregator's own reddit engine returns poor matches, so an explicit
 * "reddit" engine becomes google restricted to reddit.com. Deployments that
 * configure "reddit" as a direct engine keep it as is.
 */

import type { EngineId } from "./types";

const REDDIT_ENGINE = "reddit";
const REPLACEMENT_ENGINE = "google";
const SITE_FILTER = "site:reddit.com";

export interface RewrittenQuery {
  query: string;
  engines?: EngineId[];
}

export function rewriteRedditToGoogle(
  query: string,
  engines: readonly EngineId[] | undefined,
  directEngines: readonly EngineId[] = [],
): RewrittenQuery {
  if (!engines || engines.length === 0) {
    return { query, engines: engines ? [...engines] : undefined };
  }
  if (!engines.includes(REDDIT_ENGINE) || directEngines.includes(REDDIT_ENGINE)) {
    return { query, engines: [...engines] };
  }

  const rewritten = engines.filter((engine) => engine !== REDDIT_ENGINE);
  if (!rewritten.includes(REPLACEMENT_ENGINE)) {
    rewritten.unshift(REPLACEMENT_ENGINE);
  }

  return {
    query: query.includes(SITE_FILTER) ? query : `${SITE_FILTER} ${query}`,
    engines: rewritten,
  };
}
