/**
 * Quota governor for one rate-limited upstream
 *
 * Tracks the most recent `x-ratelimit-*` headers and withholds requests while
 * fewer than `safetyFloor` calls remain in the current window. Once the
 * announced reset time has passed the window is assumed refreshed, even
 * without a new response.
 */

import { type Clock, systemClock } from "../clock";
import { createLogger } from "../logger";

const log = createLogger("RateLimit");

export interface RateBudget {
  remaining: number;
  /** Epoch ms at which the quota window resets */
  resetAt: number;
  used?: number;
  safetyFloor: number;
}

/** Anything with a case-insensitive `get`, such as the fetch `Headers` class */
export interface HeaderSource {
  get(name: string): string | null;
}

export interface RateLimitGovernorOptions {
  /** Stop sending when fewer than this remain (default 50) */
  safetyFloor?: number;
  /** Assumed quota before the first response (default 1000) */
  initialRemaining?: number;
  clock?: Clock;
}

/**
 * Parse a header value the way the upstream formats it ("598.0"), truncating
 * toward zero. Anything unparsable yields undefined.
 */
export function parseQuotaHeader(value: string | null): number | undefined {
  if (value === null || value.trim() === "") {
    return undefined;
  }
  const parsed = Number(value.trim());
  return Number.isFinite(parsed) ? Math.trunc(parsed) : undefined;
}

export class RateLimitGovernor {
  private remaining: number;
  private resetAt = 0;
  private used: number | undefined;
  private readonly safetyFloor: number;
  private readonly clock: Clock;

  constructor(options: RateLimitGovernorOptions = {}) {
    this.safetyFloor = options.safetyFloor ?? 50;
    this.remaining = options.initialRemaining ?? 1000;
    this.clock = options.clock ?? systemClock;
  }

  /**
   * Whether the next request should be withheld
   */
  shouldThrottle(): boolean {
    const now = this.clock.now();
    if (now > this.resetAt) {
      return false;
    }
    if (this.remaining < this.safetyFloor) {
      const waitSeconds = Math.ceil((this.resetAt - now) / 1000);
      log.warn(
        `${this.remaining} requests remaining, backing off for ${waitSeconds}s until reset`,
      );
      return true;
    }
    return false;
  }

  /**
   * Record the quota headers of a response. Each header is applied
   * independently; malformed values leave the previous state in place.
   */
  update(headers: HeaderSource): void {
    const remaining = parseQuotaHeader(headers.get("x-ratelimit-remaining"));
    const reset = parseQuotaHeader(headers.get("x-ratelimit-reset"));
    const used = parseQuotaHeader(headers.get("x-ratelimit-used"));

    if (remaining !== undefined) {
      this.remaining = remaining;
    }
    if (reset !== undefined) {
      this.resetAt = this.clock.now() + reset * 1000;
    }
    if (used !== undefined) {
      this.used = used;
      log.debug(`used=${used}, remaining=${this.remaining}, reset_in=${reset ?? "?"}s`);
    }
  }

  getBudget(): RateBudget {
    const budget: RateBudget = {
      remaining: this.remaining,
      resetAt: this.resetAt,
      safetyFloor: this.safetyFloor,
    };
    if (this.used !== undefined) {
      budget.used = this.used;
    }
    return budget;
  }
}
