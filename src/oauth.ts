import { randomBytes } from "crypto";
import { FetchTransport, type Transport } from "./client/transport.js";
import { resolveBaseUrl, type OAuthConfig } from "./config.js";
import { Credentials } from "./credentials.js";
import { AuthorizationError, TokenExpiredError, ValidationError } from "./errors.js";

const AUTHORIZE_URL = "https://threads.net/oauth/authorize";
const SHORT_LIVED_TTL_MS = 60 * 60 * 1000;

interface TokenResponse {
  access_token?: unknown;
  token_type?: string;
  user_id?: unknown;
}

interface LongLivedTokenResponse {
  access_token?: unknown;
  token_type?: string;
  expires_in?: unknown;
}

export interface AuthorizationRequest {
  url: string;
  /** CSRF nonce; keep it until the callback arrives */
  state: string;
}

/**
 * OAuth 2.0 authorization code flow for Threads.
 *
 * 1. `authorizationUrl()` gives the URL to send the user to and a state token
 *    the caller stores (cookie, session, ...).
 * 2. Threads redirects to the redirect URI. Pass that full URL and the stored
 *    state to `completeAuthorization()`, which trades the code for a
 *    short-lived token and then for a long-lived one (about 60 days).
 * 3. Before it runs out, `refreshLongLivedToken()` extends it.
 */
export class OAuthFlow {
  readonly config: OAuthConfig;
  private readonly transport: Transport;
  private readonly now: () => Date;

  constructor(
    config: OAuthConfig,
    options: { transport?: Transport; now?: () => Date } = {},
  ) {
    this.config = config;
    this.transport = options.transport ?? new FetchTransport({ baseUrl: resolveBaseUrl() });
    this.now = options.now ?? (() => new Date());
  }

  authorizationUrl(): AuthorizationRequest {
    const state = randomBytes(16).toString("hex");
    const authUrl = new URL(AUTHORIZE_URL);
    authUrl.searchParams.set("client_id", this.config.appId);
    authUrl.searchParams.set("redirect_uri", this.config.redirectUri);
    authUrl.searchParams.set("scope", this.config.scopes.join(","));
    authUrl.searchParams.set("response_type", "code");
    authUrl.searchParams.set("state", state);
    return { url: authUrl.toString(), state };
  }

  async completeAuthorization(
    callbackUrl: string,
    expectedState: string,
    options: { longLived?: boolean } = {},
  ): Promise<Credentials> {
    let url: URL;
    try {
      url = new URL(callbackUrl);
    } catch {
      throw new AuthorizationError(`Callback URL is not a valid URL: ${callbackUrl}`);
    }

    const error = url.searchParams.get("error");
    if (error) {
      const reason = url.searchParams.get("error_description") ?? url.searchParams.get("error_reason");
      throw new AuthorizationError(reason ? `OAuth error: ${error} (${reason})` : `OAuth error: ${error}`);
    }

    if (url.searchParams.get("state") !== expectedState) {
      throw new AuthorizationError("OAuth state mismatch; the callback did not come from this authorization request.");
    }

    const code = url.searchParams.get("code");
    if (!code) {
      throw new AuthorizationError("OAuth callback is missing the authorization code.");
    }

    const shortLived = await this.exchangeCodeForToken(code);
    if (options.longLived === false) return shortLived;
    return this.exchangeForLongLivedToken(shortLived);
  }

  private async exchangeCodeForToken(code: string): Promise<Credentials> {
    const res = await this.transport.request<TokenResponse>("POST", "oauth/access_token", {
      client_id: this.config.appId,
      client_secret: this.config.appSecret,
      grant_type: "authorization_code",
      redirect_uri: this.config.redirectUri,
      code,
    });

    if (typeof res.access_token !== "string" || res.access_token === "") {
      throw new AuthorizationError(`Token exchange response did not include an access_token: ${JSON.stringify(res)}`);
    }
    if (typeof res.user_id !== "string" && typeof res.user_id !== "number") {
      throw new AuthorizationError(`Token exchange response did not include a user_id: ${JSON.stringify(res)}`);
    }

    return new Credentials({
      userId: String(res.user_id),
      scopes: this.config.scopes,
      shortLived: true,
      accessToken: res.access_token,
      expiration: new Date(this.now().getTime() + SHORT_LIVED_TTL_MS),
    });
  }

  /** Trade a still-valid short-lived token for a long-lived one */
  async exchangeForLongLivedToken(credentials: Credentials): Promise<Credentials> {
    if (credentials.expired(this.now())) {
      throw new TokenExpiredError("The short-lived token has expired; the user must authorize again.");
    }

    const res = await this.transport.request<LongLivedTokenResponse>(
      "GET",
      "access_token",
      { grant_type: "th_exchange_token", client_secret: this.config.appSecret },
      credentials.accessToken,
    );
    return this.longLived(credentials, res);
  }

  /** Extend a still-valid long-lived token. The input is left untouched. */
  async refreshLongLivedToken(credentials: Credentials): Promise<Credentials> {
    if (credentials.shortLived) {
      throw new ValidationError("Only long-lived tokens can be refreshed; exchange the short-lived token first.");
    }
    if (credentials.expired(this.now())) {
      throw new TokenExpiredError("The long-lived token has expired; the user must authorize again.");
    }

    const res = await this.transport.request<LongLivedTokenResponse>(
      "GET",
      "refresh_access_token",
      { grant_type: "th_refresh_token" },
      credentials.accessToken,
    );
    return this.longLived(credentials, res);
  }

  private longLived(previous: Credentials, res: LongLivedTokenResponse): Credentials {
    if (typeof res.access_token !== "string" || res.access_token === "") {
      throw new AuthorizationError(`Token response did not include an access_token: ${JSON.stringify(res)}`);
    }
    if (typeof res.expires_in !== "number") {
      throw new AuthorizationError(`Token response did not include expires_in: ${JSON.stringify(res)}`);
    }

    return previous.with({
      shortLived: false,
      accessToken: res.access_token,
      expiration: new Date(this.now().getTime() + res.expires_in * 1000),
    });
  }
}
