import { Value } from "@sinclair/typebox/value";

import { directoryLogger } from "../logger.js";
import {
  DirectoryUnavailableError,
  describeError,
} from "../services/sync/errors.js";
import { TokenResponseSchema } from "../types/index.js";

const DEFAULT_EXPIRES_IN_SECONDS = 300;
const EXPIRY_SKEW_MS = 30_000;

export interface TokenProviderOptions {
  tokenUrl: string;
  clientId: string;
  clientSecret: string;
  requestTimeoutMs: number;
  now?: () => number;
}

/**
 * OAuth2 client-credentials token cache.
 *
 * A cached token is reused until 30 seconds before it expires. Callers that
 * arrive while a refresh is in flight wait for that refresh instead of
 * starting their own.
 */
export class AccessTokenProvider {
  private token: string | null = null;
  private expiresAt = 0;
  private refreshing: Promise<string> | null = null;
  private readonly now: () => number;

  constructor(private readonly options: TokenProviderOptions) {
    this.now = options.now ?? Date.now;
  }

  async getAccessToken(): Promise<string> {
    if (this.token !== null && this.now() < this.expiresAt - EXPIRY_SKEW_MS) {
      return this.token;
    }

    this.refreshing ??= this.requestToken().finally(() => {
      this.refreshing = null;
    });

    return this.refreshing;
  }

  /** Forget the cached token, e.g. after the directory answered 401 */
  invalidate(): void {
    this.token = null;
    this.expiresAt = 0;
  }

  private async requestToken(): Promise<string> {
    const { tokenUrl, clientId, clientSecret, requestTimeoutMs } = this.options;
    const basic = Buffer.from(`${clientId}:${clientSecret}`).toString("base64");

    directoryLogger.debug({ tokenUrl }, "Requesting access token");

    let response: Response;
    try {
      response = await fetch(tokenUrl, {
        method: "POST",
        headers: {
          Authorization: `Basic ${basic}`,
          "Content-Type": "application/x-www-form-urlencoded",
          Accept: "application/json",
        },
        body: "grant_type=client_credentials",
        signal: AbortSignal.timeout(requestTimeoutMs),
      });
    } catch (error) {
      throw new DirectoryUnavailableError(
        `Token request failed: ${describeError(error)}`,
        { cause: error }
      );
    }

    if (!response.ok) {
      directoryLogger.error(
        { status: response.status, statusText: response.statusText },
        "Token endpoint rejected the request"
      );
      throw new DirectoryUnavailableError(
        `Token request failed: ${String(response.status)} ${response.statusText}`,
        { status: response.status }
      );
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new DirectoryUnavailableError("Token response is not JSON", {
        cause: error,
      });
    }

    if (!Value.Check(TokenResponseSchema, body)) {
      throw new DirectoryUnavailableError(
        "Token response is missing access_token"
      );
    }

    const expiresIn = body.expires_in ?? DEFAULT_EXPIRES_IN_SECONDS;
    this.token = body.access_token;
    this.expiresAt = this.now() + expiresIn * 1000;

    directoryLogger.debug({ expiresIn }, "Access token refreshed");
    return body.access_token;
  }
}
