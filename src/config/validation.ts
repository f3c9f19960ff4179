/**
 * Zod schemas for configuration and request validation
 */

import { z } from "zod";

const DEFAULT_FALLBACK_CHAINS = [
  ["google", "duckduckgo", "brave"],
  ["google", "brave", "wikipedia"],
  ["duckduckgo", "brave", "wikipedia"],
  ["google", "duckduckgo", "wikipedia", "wikidata"],
];

const engineList = z.array(z.string().min(1)).min(1);

export const AggregatorConfigSchema = z.object({
  endpoint: z.string().url().default("http://localhost:8999"),
  timeoutMs: z.number().int().positive().default(30_000),
  language: z.string().min(1).default("auto"),
  safesearch: z.union([z.literal(0), z.literal(1), z.literal(2)]).default(1),
});

export const RetryConfigSchema = z
  .object({
    enabled: z.boolean().default(true),
    maxRetries: z.number().int().positive().default(3),
    minDelayMs: z.number().int().nonnegative().default(1000),
    maxDelayMs: z.number().int().nonnegative().default(3000),
    fallbackChains: z.array(engineList).min(1).default(DEFAULT_FALLBACK_CHAINS),
  })
  .refine((retry) => retry.minDelayMs <= retry.maxDelayMs, {
    message: "minDelayMs must not exceed maxDelayMs",
    path: ["minDelayMs"],
  });

export const ScraperConfigSchema = z.object({
  timeoutMs: z.number().int().positive().default(10_000),
  maxLength: z.number().int().positive().default(10_000),
  userAgent: z.string().min(1).default("Mozilla/5.0 (compatible; SearchRelay/1.0)"),
});

// Base engine configuration
export const EngineConfigBaseSchema = z.object({
  id: z.string().min(1),
  enabled: z.boolean().default(true),
  displayName: z.string().min(1),
  timeoutMs: z.number().int().positive().default(10_000),
});

// Provider-specific schemas
export const RedditPullpushConfigSchema = EngineConfigBaseSchema.extend({
  type: z.literal("reddit-pullpush"),
  endpoint: z.string().url().default("https://api.pullpush.io/reddit/submission/search"),
  pageSize: z.number().int().positive().default(25),
});

export const RedditApiConfigSchema = EngineConfigBaseSchema.extend({
  type: z.literal("reddit-api"),
  endpoint: z.string().url().default("https://oauth.reddit.com/search"),
  tokenEndpoint: z.string().url().default("https://www.reddit.com/api/v1/access_token"),
  clientIdEnv: z.string().min(1).default("REDDIT_CLIENT_ID"),
  clientSecretEnv: z.string().min(1).default("REDDIT_CLIENT_SECRET"),
  userAgent: z.string().min(1).default("searchrelay:reddit_api:1.0"),
  pageSize: z.number().int().positive().default(25),
  safetyFloor: z.number().int().nonnegative().default(50),
});

export const SourcesConfigSchema = EngineConfigBaseSchema.extend({
  type: z.literal("sources"),
  endpoint: z.string().url(),
  sourceName: z.string().optional(),
  limit: z.number().int().positive().default(10),
});

// Union type for all engine configs
export const EngineConfigSchema = z.discriminatedUnion("type", [
  RedditPullpushConfigSchema,
  RedditApiConfigSchema,
  SourcesConfigSchema,
]);

// Main configuration schema
export const SearchRelayConfigSchema = z
  .object({
    aggregator: AggregatorConfigSchema.default({}),
    retry: RetryConfigSchema.default({}),
    scraper: ScraperConfigSchema.default({}),
    redditRewrite: z.boolean().default(true),
    engines: z.array(EngineConfigSchema).default([]),
  })
  .refine((config) => new Set(config.engines.map((e) => e.id)).size === config.engines.length, {
    message: "engine ids must be unique",
    path: ["engines"],
  });

/**
 * Inbound search request (Tavily-compatible field names)
 */
export const SearchRequestSchema = z.object({
  query: z.string().trim().min(1),
  max_results: z.number().int().positive().max(100).default(10),
  include_raw_content: z.boolean().default(false),
  content_format: z.enum(["text", "markdown"]).default("markdown"),
  /** Comma-separated string or list; blank entries are ignored */
  engines: z
    .union([z.string(), z.array(z.string())])
    .optional()
    .transform((value) => {
      if (value === undefined) {
        return undefined;
      }
      const list = (typeof value === "string" ? value.split(",") : value)
        .map((engine) => engine.trim())
        .filter((engine) => engine.length > 0);
      return list.length > 0 ? list : undefined;
    }),
});

// Export inferred types from schemas
export type ValidatedSearchRelayConfig = z.infer<typeof SearchRelayConfigSchema>;
export type ValidatedEngineConfig = z.infer<typeof EngineConfigSchema>;
export type SearchRequestInput = z.input<typeof SearchRequestSchema>;
export type ValidatedSearchRequest = z.output<typeof SearchRequestSchema>;

/**
 * Validate configuration against schema
 * @throws ZodError if validation fails
 */
export function validateConfig(config: unknown): ValidatedSearchRelayConfig {
  return SearchRelayConfigSchema.parse(config);
}

/**
 * Validate configuration safely (returns result object instead of throwing)
 */
export function validateConfigSafe(config: unknown):
  | {
      success: true;
      data: ValidatedSearchRelayConfig;
    }
  | {
      success: false;
      error: z.ZodError;
    } {
  const result = SearchRelayConfigSchema.safeParse(config);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, error: result.error };
}

/**
 * Validate an inbound search request
 * @throws ZodError if validation fails
 */
export function validateSearchRequest(input: unknown): ValidatedSearchRequest {
  return SearchRequestSchema.parse(input);
}

/**
 * Format Zod validation errors into human-readable messages
 */
export function formatValidationErrors(error: z.ZodError): string[] {
  return error.issues.map((err) => {
    const path = err.path.join(".");
    return path ? `${path}: ${err.message}` : err.message;
  });
}
