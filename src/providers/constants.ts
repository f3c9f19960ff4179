export const PROVIDER_DEFAULTS = {
  /** Lifetime assumed for OAuth tokens without expires_in */
  TOKEN_TTL_SECONDS: 3600,
  /** Refresh this long before the declared expiry */
  TOKEN_REFRESH_MARGIN_MS: 60_000,
  TOKEN_TIMEOUT_MS: 10_000,
  /** Quota assumed before the first rate-limit headers arrive */
  INITIAL_RATE_REMAINING: 1000,
} as const;
