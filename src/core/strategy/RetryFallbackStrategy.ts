/**
 * Retry/Fallback Strategy - probes until one attempt returns results
 *
 * Attempt 0 uses smart selection, later attempts walk the fallback chains
 * cyclically, and an explicit engine choice is reused for every attempt.
 * Every probe carries randomized headers and every probe after the first waits
 * a jittered delay. Attempts run strictly in order; the first one with results
 * ends the search. Running out of attempts is a normal outcome and yields an
 * empty result list, never an error.
 */

import { createLogger } from "../logger";
import { AttemptExecutor } from "./AttemptExecutor";
import { planAttempt } from "./attemptPlanner";
import type {
  AttemptReport,
  ISearchStrategy,
  StrategyContext,
  StrategyOptions,
  StrategyResult,
} from "./ISearchStrategy";

const log = createLogger("RetryFallback");

export class RetryFallbackStrategy implements ISearchStrategy {
  async execute(
    query: string,
    options: StrategyOptions,
    context: StrategyContext,
  ): Promise<StrategyResult> {
    const maxRetries = context.retry.maxRetries;
    const executor = new AttemptExecutor(context);
    const attempts: AttemptReport[] = [];

    for (let index = 0; index < maxRetries; index++) {
      if (options.signal?.aborted) {
        log.warn(`Search cancelled before attempt ${index + 1}`);
        break;
      }

      const attempt = planAttempt(index, query, options, context, "randomized");
      log.info(
        `Search attempt ${index + 1}/${maxRetries} with engines: ${attempt.engineSet.engines.join(",")}`,
      );

      if (attempt.preDelayMs > 0) {
        log.info(`Waiting ${(attempt.preDelayMs / 1000).toFixed(1)}s before retry...`);
        try {
          await context.clock.sleep(attempt.preDelayMs, options.signal);
        } catch (error) {
          log.warn(`Search cancelled while waiting: ${error instanceof Error ? error.message : String(error)}`);
          break;
        }
      }

      const { report, records } = await executor.run(attempt, query, options);
      attempts.push(report);

      if (report.outcome === "success") {
        log.info(`Search successful on attempt ${index + 1}`);
        return { results: records, attempts };
      }

      const detail = report.message ? `: ${report.message}` : "";
      log.warn(`Attempt ${index + 1} ended with ${report.outcome}${detail}`);
    }

    log.error(`All ${maxRetries} search attempts failed`);
    return { results: [], attempts };
  }
}
