/**
 * Configuration loader with multi-path resolution and validation
 *
 * Config resolution order:
 * 1. Explicit path (if provided)
 * 2. Local directory (./searchrelay.config.json)
 * 3. XDG config ($XDG_CONFIG_HOME/searchrelay/config.json)
 * 4. Built-in defaults
 *
 * Environment overrides are applied on top of whichever source won.
 */

import { existsSync, readFileSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import { createLogger } from "../core/logger";
import type { SearchRelayConfig } from "./types";
import { formatValidationErrors, validateConfigSafe } from "./validation";

const log = createLogger("Config");

const LOCAL_CONFIG_NAME = "searchrelay.config.json";

/**
 * Get XDG config path ($XDG_CONFIG_HOME/searchrelay/config.json)
 */
function getXdgConfigPath(): string {
  const xdg = process.env.XDG_CONFIG_HOME;
  const baseDir = xdg ?? join(homedir(), ".config");
  return join(baseDir, "searchrelay", "config.json");
}

/**
 * Get all possible config file paths in order of preference
 */
export function getConfigPaths(explicitPath?: string): string[] {
  const paths: string[] = [];

  if (explicitPath) {
    paths.push(explicitPath);
  }
  paths.push(join(process.cwd(), LOCAL_CONFIG_NAME));
  paths.push(getXdgConfigPath());

  return paths;
}

/**
 * Configuration used when no file is found: every field at its schema default
 */
export function getDefaultConfig(): SearchRelayConfig {
  const result = validateConfigSafe({});
  if (!result.success) {
    throw new Error(`Built-in defaults are invalid: ${formatValidationErrors(result.error).join("; ")}`);
  }
  return result.data;
}

function parseBoolean(value: string): boolean {
  return value.trim().toLowerCase() === "true";
}

function parsePositiveInt(name: string, value: string): number | undefined {
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed < 1) {
    log.warn(`Ignoring ${name}=${value}: expected a positive integer`);
    return undefined;
  }
  return parsed;
}

/**
 * Apply environment variable overrides
 *
 * - SEARXNG_URL: aggregator base URL
 * - MAX_SEARCH_RETRIES: probe count
 * - ENABLE_ANTI_CAPTCHA: "true" enables retries with randomized headers
 * - SCRAPER_TIMEOUT: page fetch timeout in seconds
 * - SCRAPER_MAX_LENGTH: characters kept per fetched page
 * - SCRAPER_USER_AGENT: User-Agent for page fetches
 */
export function applyEnvOverrides(
  config: SearchRelayConfig,
  env: NodeJS.ProcessEnv = process.env,
): SearchRelayConfig {
  const aggregator = { ...config.aggregator };
  const retry = { ...config.retry };
  const scraper = { ...config.scraper };

  if (env.SEARXNG_URL) {
    aggregator.endpoint = env.SEARXNG_URL;
  }
  if (env.MAX_SEARCH_RETRIES) {
    retry.maxRetries = parsePositiveInt("MAX_SEARCH_RETRIES", env.MAX_SEARCH_RETRIES) ?? retry.maxRetries;
  }
  if (env.ENABLE_ANTI_CAPTCHA) {
    retry.enabled = parseBoolean(env.ENABLE_ANTI_CAPTCHA);
  }
  if (env.SCRAPER_TIMEOUT) {
    const seconds = parsePositiveInt("SCRAPER_TIMEOUT", env.SCRAPER_TIMEOUT);
    if (seconds !== undefined) {
      scraper.timeoutMs = seconds * 1000;
    }
  }
  if (env.SCRAPER_MAX_LENGTH) {
    scraper.maxLength = parsePositiveInt("SCRAPER_MAX_LENGTH", env.SCRAPER_MAX_LENGTH) ?? scraper.maxLength;
  }
  if (env.SCRAPER_USER_AGENT) {
    scraper.userAgent = env.SCRAPER_USER_AGENT;
  }

  return { ...config, aggregator, retry, scraper };
}

/**
 * Options for loading configuration
 */
export interface LoadConfigOptions {
  /** Environment used for overrides (defaults to process.env) */
  env?: NodeJS.ProcessEnv;
}

/**
 * Load configuration from the first available config file
 *
 * @param explicitPath Optional explicit path to config file
 * @returns Parsed and validated configuration
 * @throws Error if the explicit path is missing, or a config file cannot be parsed or validated
 *
 * @example
 * ```typescript
 * const config = loadConfig();
 * const custom = loadConfig("./searchrelay.config.json");
 * ```
 */
export function loadConfig(explicitPath?: string, options: LoadConfigOptions = {}): SearchRelayConfig {
  const env = options.env ?? process.env;

  if (explicitPath && !existsSync(explicitPath)) {
    throw new Error(`Config file not found: ${explicitPath}`);
  }

  for (const path of getConfigPaths(explicitPath)) {
    if (!existsSync(path)) {
      continue;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(path, "utf8"));
    } catch (error) {
      throw new Error(
        `Failed to parse config file at ${path}: ${error instanceof Error ? error.message : String(error)}`,
      );
    }

    const result = validateConfigSafe(raw);
    if (!result.success) {
      const errors = formatValidationErrors(result.error);
      throw new Error(`Invalid configuration in ${path}:\n${errors.map((e) => `  - ${e}`).join("\n")}`);
    }

    log.debug(`Loaded configuration from ${path}`);
    return applyEnvOverrides(result.data, env);
  }

  return applyEnvOverrides(getDefaultConfig(), env);
}
