import { setTimeout as delay } from "timers/promises";
import { AuthenticationError, errorMessage } from "../errors";
import { deviceCodeSchema, tokenResponseSchema } from "../types/schemas";
import type { StoredToken, TokenResponse } from "../types";
import { openInBrowser } from "../utils/browser";
import type { TokenStore } from "./token-store";

// Refresh a little before Trakt would start rejecting the token.
const EXPIRY_MARGIN_SECONDS = 300;
const DEVICE_CODE_GRANT = "urn:ietf:params:oauth:grant-type:device_code";
const REDIRECT_URI = "urn:ietf:wg:oauth:2.0:oob";

export interface TokenManagerOptions {
  clientId: string;
  clientSecret: string;
  apiUrl: string;
  store: TokenStore;
  fetch?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
  /** Milliseconds since the epoch. */
  now?: () => number;
  openUrl?: (url: string) => void;
}

export interface RequestOptions {
  method?: "GET" | "POST" | "PUT" | "DELETE";
  body?: unknown;
}

/**
 * Owns the OAuth device-flow token: loading it from the store, refreshing it
 * when it expires, and attaching it to API requests.
 */
export class TokenManager {
  private token: StoredToken | null = null;
  private readonly fetchImpl: typeof fetch;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => number;
  private readonly openUrl: (url: string) => void;

  constructor(private readonly options: TokenManagerOptions) {
    this.fetchImpl = options.fetch ?? fetch;
    this.sleep = options.sleep ?? ((ms) => delay(ms));
    this.now = options.now ?? (() => Date.now());
    this.openUrl = options.openUrl ?? openInBrowser;
  }

  isExpired(token: StoredToken) {
    const now = Math.floor(this.now() / 1000);
    return now >= token.expires_at - EXPIRY_MARGIN_SECONDS;
  }

  /**
   * Read the persisted token, refreshing it first when it has expired.
   * Returns null when nothing usable is stored.
   */
  async load(): Promise<StoredToken | null> {
    const token = this.options.store.read();
    if (!token) return null;

    if (this.isExpired(token)) {
      console.log("Token expired, refreshing...");
      return this.refresh(token);
    }
    this.token = token;
    return token;
  }

  /**
   * Run the device code flow: show the verification URL and user code, then
   * poll until the user approves, the server rejects, or the code expires.
   */
  async authenticate(): Promise<StoredToken> {
    console.log("Authentication required");
    const res = await this.devicePost("/oauth/device/code", {
      client_id: this.options.clientId,
    });
    if (!res.ok) {
      throw new AuthenticationError(
        `Failed to get device code: ${res.status}`,
        res.status,
      );
    }
    const parsed = deviceCodeSchema.safeParse(await res.json());
    if (!parsed.success) {
      throw new AuthenticationError("Malformed device code response");
    }
    const device = parsed.data;

    console.log(`Open: ${device.verification_url}`);
    console.log(`Enter code: ${device.user_code}`);
    this.openUrl(device.verification_url);

    const intervalMs = device.interval * 1000;
    const timeoutMs = device.expires_in * 1000;
    const startedAt = this.now();

    while (this.now() - startedAt < timeoutMs) {
      await this.sleep(intervalMs);

      const poll = await this.devicePost("/oauth/device/token", {
        code: device.device_code,
        client_id: this.options.clientId,
        client_secret: this.options.clientSecret,
        grant_type: DEVICE_CODE_GRANT,
      });

      if (poll.status === 200) {
        const token = this.save(await this.parseTokenResponse(poll));
        console.log("Authenticated successfully.");
        return token;
      }
      // 400: the user has not approved the code yet
      if (poll.status === 400) continue;
      if (poll.status === 429) {
        console.log("Slow down, waiting a bit longer...");
        await this.sleep(intervalMs);
        continue;
      }

      const text = await poll.text();
      throw new AuthenticationError(
        `Authentication failed with status ${poll.status}${text ? `: ${text}` : ""}`,
        poll.status,
      );
    }

    throw new AuthenticationError("Authentication timed out. Please try again.");
  }

  /** Exchange the refresh token; any failure falls back to a new device flow. */
  async refresh(token: StoredToken): Promise<StoredToken> {
    console.log("Refreshing tokens...");
    try {
      const res = await this.post("/oauth/token", {
        refresh_token: token.refresh_token,
        client_id: this.options.clientId,
        client_secret: this.options.clientSecret,
        redirect_uri: REDIRECT_URI,
        grant_type: "refresh_token",
      });
      if (!res.ok) {
        throw new AuthenticationError(`status ${res.status}`, res.status);
      }
      const refreshed = this.save(await this.parseTokenResponse(res));
      console.log("Token refreshed successfully.");
      return refreshed;
    } catch (e) {
      console.error(`Refresh failed (${errorMessage(e)}), re-authenticating...`);
      return this.authenticate();
    }
  }

  /** Persist a token response; expires_at is computed here and nowhere else. */
  save(data: TokenResponse): StoredToken {
    const token: StoredToken = {
      access_token: data.access_token,
      refresh_token: data.refresh_token,
      expires_in: data.expires_in,
      expires_at: Math.floor(this.now() / 1000) + data.expires_in,
    };
    this.options.store.write(token);
    this.token = token;
    return token;
  }

  /**
   * Authenticated API call. A 401 triggers one refresh and one retry; the
   * retry's response is returned whatever its status.
   */
  async request(
    endpoint: string,
    options: RequestOptions = {},
  ): Promise<Response> {
    const token = await this.ensureToken();
    const res = await this.send(endpoint, options, token);
    if (res.status !== 401) return res;

    console.log("Token rejected, refreshing and retrying request...");
    const refreshed = await this.refresh(token);
    return this.send(endpoint, options, refreshed);
  }

  private async ensureToken(): Promise<StoredToken> {
    if (this.token) {
      return this.isExpired(this.token)
        ? this.refresh(this.token)
        : this.token;
    }
    return (await this.load()) ?? (await this.authenticate());
  }

  private send(endpoint: string, options: RequestOptions, token: StoredToken) {
    return this.fetchImpl(this.url(endpoint), {
      method: options.method ?? "GET",
      headers: {
        "Content-Type": "application/json",
        "trakt-api-version": "2",
        "trakt-api-key": this.options.clientId,
        Authorization: `Bearer ${token.access_token}`,
      },
      body: options.body === undefined ? undefined : JSON.stringify(options.body),
    });
  }

  private post(endpoint: string, body: Record<string, unknown>) {
    return this.fetchImpl(this.url(endpoint), {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(body),
    });
  }

  // A transport failure during the device flow ends the run like any other
  // authentication failure.
  private async devicePost(endpoint: string, body: Record<string, unknown>) {
    try {
      return await this.post(endpoint, body);
    } catch (e) {
      throw new AuthenticationError(errorMessage(e));
    }
  }

  private url(endpoint: string) {
    return /^https?:\/\//.test(endpoint)
      ? endpoint
      : `${this.options.apiUrl}${endpoint}`;
  }

  private async parseTokenResponse(res: Response): Promise<TokenResponse> {
    const parsed = tokenResponseSchema.safeParse(await res.json());
    if (!parsed.success) {
      throw new AuthenticationError("Malformed token response");
    }
    return parsed.data;
  }
}
