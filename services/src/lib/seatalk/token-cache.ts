import { z } from "zod";

import { AuthConfigError, AuthRequestError, AuthResponseError } from "@/lib/errors";
import { logger } from "@/lib/logger";

const TOKEN_TIMEOUT_MS = 10_000;
const REFRESH_MARGIN_MS = 60_000;
const DEFAULT_LIFETIME_SECONDS = 3600;

const TokenResponseSchema = z
  .object({
    app_access_token: z.string().optional(),
    access_token: z.string().optional(),
    expire: z.coerce.number().optional(),
    expires_in: z.coerce.number().optional(),
  })
  .passthrough();

export type FetchFn = typeof fetch;

export interface TokenCacheOptions {
  tokenUrl: string;
  appId?: string;
  appSecret?: string;
  fetchFn?: FetchFn;
  /** Epoch milliseconds. */
  now?: () => number;
}

interface CachedToken {
  value: string;
  expiresAt: number;
}

/**
 * Single process-wide SeaTalk app access token. Concurrent callers that find
 * it expired may each refresh it; the last write wins.
 */
export class AppAccessTokenCache {
  private cached: CachedToken | null = null;
  private readonly fetchFn: FetchFn;
  private readonly now: () => number;

  constructor(private readonly options: TokenCacheOptions) {
    this.fetchFn = options.fetchFn ?? ((input, init) => fetch(input, init));
    this.now = options.now ?? Date.now;
  }

  async getToken(): Promise<string> {
    const now = this.now();
    if (this.cached && this.cached.expiresAt - now > REFRESH_MARGIN_MS) {
      return this.cached.value;
    }

    const { appId, appSecret, tokenUrl } = this.options;
    if (!appId || !appSecret) {
      throw new AuthConfigError("SEATALK_APP_ID/SEATALK_APP_SECRET are not configured");
    }

    const response = await this.fetchFn(tokenUrl, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ app_id: appId, app_secret: appSecret }),
      signal: AbortSignal.timeout(TOKEN_TIMEOUT_MS),
    });

    const contentType = (response.headers.get("content-type") ?? "").toLowerCase();
    logger.info("SeaTalk token request", { url: tokenUrl, status: response.status, contentType });

    const text = await response.text();
    if (response.status !== 200 || !contentType.includes("application/json")) {
      throw new AuthRequestError(`Token request failed: status=${response.status} body=${text.slice(0, 200)}`, {
        status: response.status,
      });
    }

    let body: unknown;
    try {
      body = JSON.parse(text);
    } catch {
      throw new AuthResponseError("Token response is not valid JSON");
    }

    const parsed = TokenResponseSchema.safeParse(body);
    const token = parsed.success ? parsed.data.app_access_token || parsed.data.access_token : undefined;
    if (!parsed.success || !token) {
      throw new AuthResponseError(`Token response has no token: ${text.slice(0, 200)}`);
    }

    this.cached = {
      value: token,
      expiresAt: resolveExpiry(parsed.data.expire ?? parsed.data.expires_in, now),
    };
    return token;
  }
}

// SeaTalk returns `expire` as an absolute epoch second; other issuers send a
// lifetime in seconds. Anything later than "now" is taken as absolute.
export function resolveExpiry(expire: number | undefined, nowMs: number): number {
  const value = expire && expire > 0 ? expire : DEFAULT_LIFETIME_SECONDS;
  const nowSeconds = Math.floor(nowMs / 1000);
  return value > nowSeconds ? value * 1000 : nowMs + value * 1000;
}
