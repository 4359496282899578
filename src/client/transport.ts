import { HttpError } from "../errors.js";
import type { GraphApiError, RequestMethod, RequestParams } from "./types.js";

const DEFAULT_BASE_URL = "https://graph.threads.net/v1.0";
const MAX_RATE_LIMIT_RETRIES = 2;
const DEFAULT_RATE_LIMIT_WAIT_MS = 60_000;

/**
 * Issues one call against the Threads API and resolves with the decoded JSON.
 * Non-2xx responses reject with {@link HttpError}.
 */
export interface Transport {
  request<T>(method: RequestMethod, path: string, params?: RequestParams, accessToken?: string): Promise<T>;
}

export interface FetchTransportOptions {
  baseUrl?: string;
  fetch?: typeof fetch;
  onRateLimit?: (message: string) => void;
  rateLimitWaitMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

function delay(ms: number): Promise<void> {
  return new Promise<void>((resolve) => setTimeout(resolve, ms));
}

function describeError(data: unknown): string | undefined {
  if (typeof data !== "object" || data === null || !("error" in data)) return undefined;
  const err: unknown = data.error;
  if (typeof err !== "object" || err === null) return undefined;
  const { type, message, code } = err as GraphApiError;
  return `[${type ?? "Unknown"}] ${message ?? "Unknown error"} (code: ${code ?? "?"})`;
}

function toSearchParams(params: RequestParams | undefined, accessToken: string | undefined): URLSearchParams {
  const search = new URLSearchParams();
  if (params) {
    for (const [k, v] of Object.entries(params)) {
      if (v !== undefined && v !== null) search.set(k, String(v));
    }
  }
  if (accessToken) search.set("access_token", accessToken);
  return search;
}

/**
 * {@link Transport} over the global `fetch`. Holds no per-request state, so
 * one instance can serve concurrent calls.
 */
export class FetchTransport implements Transport {
  readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;
  private readonly options: FetchTransportOptions;

  constructor(options: FetchTransportOptions = {}) {
    this.baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, "");
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.options = options;
  }

  private async parseResponse<T>(res: Response): Promise<T> {
    const text = await res.text();
    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch {
      if (!res.ok) {
        throw new HttpError(res.status, text, `Threads API error ${res.status}: ${text.slice(0, 200)}`);
      }
      return {} as T;
    }

    if (!res.ok) {
      const detail = describeError(data) ?? JSON.stringify(data);
      throw new HttpError(res.status, data, `Threads API error ${res.status}: ${detail}`);
    }

    return data as T;
  }

  async request<T>(
    method: RequestMethod,
    path: string,
    params?: RequestParams,
    accessToken?: string,
    retryCount = 0,
  ): Promise<T> {
    const search = toSearchParams(params, accessToken);
    let res: Response;

    if (method === "POST") {
      // Threads API uses form-encoded POST, not JSON body
      res = await this.fetchImpl(`${this.baseUrl}/${path}`, {
        method,
        headers: { "Content-Type": "application/x-www-form-urlencoded" },
        body: search.toString(),
      });
    } else {
      const query = search.toString();
      res = await this.fetchImpl(query ? `${this.baseUrl}/${path}?${query}` : `${this.baseUrl}/${path}`, { method });
    }

    if (res.status === 429 && retryCount < MAX_RATE_LIMIT_RETRIES) {
      const waitMs = this.options.rateLimitWaitMs ?? DEFAULT_RATE_LIMIT_WAIT_MS;
      this.options.onRateLimit?.(
        `Rate limited. Waiting ${(waitMs / 1000).toFixed(0)}s before retry ${retryCount + 1}/${MAX_RATE_LIMIT_RETRIES}.`,
      );
      await (this.options.sleep ?? delay)(waitMs);
      return this.request<T>(method, path, params, accessToken, retryCount + 1);
    }

    return this.parseResponse<T>(res);
  }
}

export { DEFAULT_BASE_URL };
