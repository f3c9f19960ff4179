/**
 * Request headers for aggregator probes
 *
 * Retried probes rotate the User-Agent and spoof forwarding addresses so the
 * aggregator's upstream engines see varied clients.
 */

import { pick, type RandomSource, randomInt } from "../core/clock";

export const USER_AGENTS = [
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/91.0.4472.124 Safari/537.36",
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/91.0.4472.124 Safari/537.36",
  "Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/91.0.4472.124 Safari/537.36",
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:89.0) Gecko/20100101 Firefox/89.0",
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 10.15; rv:89.0) Gecko/20100101 Firefox/89.0",
  "Mozilla/5.0 (compatible; SearchRelay/1.0)",
  "Mozilla/5.0 (compatible; SearchBot/1.0)",
] as const;

export const STATIC_USER_AGENT = "Mozilla/5.0 (compatible; SearchRelay/1.0)";

/**
 * Browser-like headers with a random User-Agent and forwarding addresses
 */
export function buildRandomizedHeaders(random: RandomSource): Record<string, string> {
  return {
    "X-Forwarded-For": `192.168.1.${randomInt(random, 1, 254)}`,
    "X-Real-IP": `10.0.0.${randomInt(random, 1, 254)}`,
    "User-Agent": pick(random, USER_AGENTS),
    "Content-Type": "application/x-www-form-urlencoded",
    Accept: "application/json,text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
    "Accept-Language": "en-US,en;q=0.5",
    DNT: "1",
  };
}

/**
 * Fixed headers for the single-probe mode
 */
export function buildStaticHeaders(): Record<string, string> {
  return {
    "X-Forwarded-For": "127.0.0.1",
    "X-Real-IP": "127.0.0.1",
    "User-Agent": STATIC_USER_AGENT,
    "Content-Type": "application/x-www-form-urlencoded",
    Accept: "application/json",
  };
}
