import type { ZodType, ZodTypeDef } from "zod";
import { ApiError, AuthError, RateLimitError } from "../errors.js";
import type { Logger } from "../logging/logger.js";
import { systemClock, type Clock } from "../utils/clock.js";
import { createRetryPolicy, parseRetryAfter, type RetryPolicy } from "./retry-policy.js";
import { Throttle } from "./throttle.js";

export type HttpMethod = "GET" | "POST";

/** Undefined values are left out of the query string. */
export type QueryParams = Record<string, string | number | undefined>;

export interface HttpRequest {
  readonly method: HttpMethod;
  readonly url: string;
  readonly params?: QueryParams;
  readonly headers?: Record<string, string>;
  readonly body?: unknown;
}

export interface HttpResponse {
  readonly status: number;
  readonly headers: Headers;
  readonly body: unknown;
}

export type FetchFn = (url: string, init: RequestInit) => Promise<Response>;

export interface FetcherOptions {
  readonly logger: Logger;
  readonly requestDelayMs?: number;
  readonly timeoutMs?: number;
  readonly retry?: RetryPolicy;
  readonly clock?: Clock;
  readonly fetchFn?: FetchFn;
}

const DEFAULT_REQUEST_DELAY_MS = 3_000;
const DEFAULT_TIMEOUT_MS = 30_000;

interface RawResponse {
  readonly status: number;
  readonly headers: Headers;
  readonly text: string;
}

/**
 * Single-request HTTP client shared by every source. Requests are spaced by
 * the throttle, 429s and transport failures are retried per the retry policy,
 * and every other failure surfaces as a typed error.
 */
export class ThrottledFetcher {
  private readonly logger: Logger;
  private readonly throttle: Throttle;
  private readonly policy: RetryPolicy;
  private readonly clock: Clock;
  private readonly timeoutMs: number;
  private readonly fetchFn: FetchFn;

  constructor(opts: FetcherOptions) {
    this.logger = opts.logger.child({ component: "fetcher" });
    this.clock = opts.clock ?? systemClock;
    this.throttle = new Throttle(opts.requestDelayMs ?? DEFAULT_REQUEST_DELAY_MS, this.clock);
    this.policy = opts.retry ?? createRetryPolicy();
    this.timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchFn = opts.fetchFn ?? ((url, init) => fetch(url, init));
  }

  async request(req: HttpRequest): Promise<HttpResponse> {
    const url = buildUrl(req.url, req.params);

    for (let attempt = 0; ; attempt++) {
      const throttledMs = await this.throttle.wait();
      if (throttledMs > 0) this.logger.debug({ url, throttledMs }, "Waited for request spacing");

      let raw: RawResponse;
      try {
        raw = await this.send(url, req);
      } catch (err) {
        this.throttle.markCompleted();
        const reason = err instanceof Error ? err.message : String(err);
        if (attempt >= this.policy.maxRetries) {
          throw new ApiError(0, reason, url);
        }
        await this.backoff(attempt, null, { url, reason });
        continue;
      }
      this.throttle.markCompleted();

      if (this.policy.isRetryableStatus(raw.status)) {
        if (attempt >= this.policy.maxRetries) {
          throw new RateLimitError(url, attempt + 1);
        }
        const retryAfterMs = parseRetryAfter(raw.headers.get("retry-after"), this.clock.now());
        await this.backoff(attempt, retryAfterMs, { url, status: raw.status });
        continue;
      }

      if (raw.status === 401 || raw.status === 403) {
        throw new AuthError(raw.status, url);
      }
      if (raw.status < 200 || raw.status >= 300) {
        throw new ApiError(raw.status, raw.text, url);
      }

      return { status: raw.status, headers: raw.headers, body: parseBody(raw.text) };
    }
  }

  private async backoff(
    attempt: number,
    retryAfterMs: number | null,
    context: Record<string, unknown>,
  ): Promise<void> {
    const delayMs = this.policy.delayFor(attempt, retryAfterMs);
    this.logger.warn(
      { ...context, retry: attempt + 1, maxRetries: this.policy.maxRetries, delayMs },
      "Retrying request after backoff",
    );
    await this.clock.sleep(delayMs);
  }

  private async send(url: string, req: HttpRequest): Promise<RawResponse> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    const headers: Record<string, string> = { Accept: "application/json", ...req.headers };
    const init: RequestInit = { method: req.method, headers, signal: controller.signal };
    if (req.body !== undefined) {
      headers["Content-Type"] = "application/json";
      init.body = JSON.stringify(req.body);
    }

    try {
      const response = await this.fetchFn(url, init);
      const text = await response.text();
      return { status: response.status, headers: response.headers, text };
    } finally {
      clearTimeout(timeout);
    }
  }
}

export function buildUrl(base: string, params?: QueryParams): string {
  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(params ?? {})) {
    if (value !== undefined) search.set(key, String(value));
  }
  const query = search.toString();
  if (query === "") return base;
  return `${base}${base.includes("?") ? "&" : "?"}${query}`;
}

function parseBody(text: string): unknown {
  if (text.trim() === "") return null;
  try {
    return JSON.parse(text) as unknown;
  } catch {
    return text;
  }
}

/** Validates a response body at the parse boundary; a shape mismatch is fatal for the fetch. */
export function decodeBody<T>(
  schema: ZodType<T, ZodTypeDef, unknown>,
  response: HttpResponse,
  url: string,
): T {
  const result = schema.safeParse(response.body);
  if (!result.success) {
    const detail = result.error.issues
      .slice(0, 3)
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("; ");
    throw new ApiError(response.status, `unexpected response shape (${detail})`, url);
  }
  return result.data;
}
