/**
 * OAuth client-credentials token lifecycle
 *
 * One instance per credential set. The cached token is handed out until it is
 * within `refreshMarginMs` of expiry; then the next caller performs a fresh
 * exchange. Concurrent callers share a single in-flight exchange, bounded by
 * its own timeout; a caller's signal only cancels that caller's wait.
 */

import { isOAuthTokenResponse } from "../../providers/types";
import { fetchWithErrorHandling } from "../../providers/utils";
import { type Clock, systemClock } from "../clock";
import { createLogger } from "../logger";
import type { EngineId } from "../types";
import { SearchError } from "../types";

const log = createLogger("TokenManager");

export interface TokenState {
  accessToken: string;
  /** Epoch ms after which the token must not be used */
  expiresAt: number;
}

export interface TokenManagerOptions {
  engineId: EngineId;
  tokenEndpoint: string;
  clientId: string;
  clientSecret: string;
  userAgent: string;
  /** Exchange timeout (default 10s) */
  timeoutMs?: number;
  /** Safety margin subtracted from the server-declared lifetime (default 60s) */
  refreshMarginMs?: number;
  /** Lifetime assumed when the server omits expires_in (default 3600s) */
  defaultTtlSeconds?: number;
  clock?: Clock;
}

/**
 * Settle with `promise`, or reject early when this caller's signal aborts.
 * The shared exchange keeps running for the other callers.
 */
function untilAborted<T>(promise: Promise<T>, signal: AbortSignal | undefined, onAbort: () => Error): Promise<T> {
  if (!signal) {
    return promise;
  }
  if (signal.aborted) {
    return Promise.reject(onAbort());
  }
  return new Promise<T>((resolve, reject) => {
    const abort = () => reject(onAbort());
    signal.addEventListener("abort", abort, { once: true });
    void promise.then(
      (value) => {
        signal.removeEventListener("abort", abort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", abort);
        reject(error);
      },
    );
  });
}

export class TokenManager {
  private state: TokenState | undefined;
  private pending: Promise<string> | undefined;
  private readonly clock: Clock;
  private readonly timeoutMs: number;
  private readonly refreshMarginMs: number;
  private readonly defaultTtlSeconds: number;

  constructor(private readonly options: TokenManagerOptions) {
    this.clock = options.clock ?? systemClock;
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.refreshMarginMs = options.refreshMarginMs ?? 60_000;
    this.defaultTtlSeconds = options.defaultTtlSeconds ?? 3600;
  }

  /**
   * Return a bearer token that is valid right now
   *
   * @throws SearchError with reason "auth_error" when the exchange fails,
   *         "network_error" when this caller's signal aborts first
   */
  async acquireToken(signal?: AbortSignal): Promise<string> {
    if (this.state && this.clock.now() < this.state.expiresAt) {
      return this.state.accessToken;
    }
    if (signal?.aborted) {
      throw this.abortError();
    }

    if (!this.pending) {
      const pending = this.exchange().finally(() => {
        this.pending = undefined;
      });
      // callers that stayed get the failure from their own await
      void pending.catch((error: unknown) => {
        log.debug(`Token exchange for ${this.options.engineId} failed: ${error instanceof Error ? error.message : String(error)}`);
      });
      this.pending = pending;
    }
    return untilAborted(this.pending, signal, () => this.abortError());
  }

  /** Snapshot of the cached token, if any */
  getState(): TokenState | undefined {
    return this.state ? { ...this.state } : undefined;
  }

  /** Drop the cached token so the next call re-authenticates */
  invalidate(): void {
    this.state = undefined;
  }

  private abortError(): SearchError {
    return new SearchError(this.options.engineId, "network_error", "Token request aborted");
  }

  private async exchange(): Promise<string> {
    const { engineId, clientId, clientSecret, tokenEndpoint, userAgent } = this.options;
    const credentials = Buffer.from(`${clientId}:${clientSecret}`).toString("base64");

    let data: unknown;
    try {
      ({ data } = await fetchWithErrorHandling(
        engineId,
        tokenEndpoint,
        {
          method: "POST",
          headers: {
            Authorization: `Basic ${credentials}`,
            "User-Agent": userAgent,
            "Content-Type": "application/x-www-form-urlencoded",
          },
          body: "grant_type=client_credentials",
          timeoutMs: this.timeoutMs,
        },
        "OAuth token endpoint",
      ));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      const status = error instanceof SearchError ? error.statusCode : undefined;
      throw new SearchError(engineId, "auth_error", `Token exchange failed: ${message}`, status);
    }

    if (!isOAuthTokenResponse(data)) {
      throw new SearchError(engineId, "auth_error", "Token exchange returned no access_token");
    }

    const ttlSeconds = data.expires_in ?? this.defaultTtlSeconds;
    this.state = {
      accessToken: data.access_token,
      expiresAt: this.clock.now() + ttlSeconds * 1000 - this.refreshMarginMs,
    };
    log.debug(`Obtained token for ${engineId}, valid for ${ttlSeconds}s`);
    return data.access_token;
  }
}
