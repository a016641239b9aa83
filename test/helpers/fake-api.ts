import type { FetchFn } from "../../src/http/fetcher.js";
import type { Clock } from "../../src/utils/clock.js";

/** Clock whose sleeps return immediately and move time forward by the requested amount. */
export class FakeClock implements Clock {
  readonly sleeps: number[] = [];

  constructor(private current = Date.UTC(2025, 10, 15, 12, 0, 0)) {}

  now(): number {
    return this.current;
  }

  async sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    this.current += ms;
  }

  advance(ms: number): void {
    this.current += ms;
  }
}

export interface RecordedRequest {
  readonly method: string;
  readonly url: URL;
  readonly headers: Headers;
  readonly body: unknown;
}

export interface ReplyInit {
  readonly status?: number;
  readonly body?: unknown;
  readonly headers?: Record<string, string>;
}

/** An Error reply makes the fake fetch reject, like a dropped connection. */
export type Reply = ReplyInit | Error;
export type Handler = (req: RecordedRequest) => Reply;

interface Route {
  readonly method: string;
  readonly path: string;
  readonly handler: Handler;
}

/** In-process stand-in for the upstream REST APIs, served through an injected fetch. */
export class FakeApi {
  readonly requests: RecordedRequest[] = [];
  private readonly routes: Route[] = [];

  on(method: string, path: string, reply: Reply | Handler): this {
    const handler: Handler = typeof reply === "function" ? reply : () => reply;
    this.routes.push({ method, path, handler });
    return this;
  }

  /** Replies in order; the last reply repeats once the list runs out. */
  sequence(method: string, path: string, replies: readonly Reply[]): this {
    let i = 0;
    return this.on(method, path, () => {
      const reply = replies[Math.min(i, replies.length - 1)] ?? { status: 500 };
      i++;
      return reply;
    });
  }

  requestsTo(path: string): RecordedRequest[] {
    return this.requests.filter((r) => r.url.pathname === path);
  }

  readonly fetch: FetchFn = async (url, init) => {
    const request: RecordedRequest = {
      method: init.method ?? "GET",
      url: new URL(url),
      headers: new Headers(init.headers),
      body: typeof init.body === "string" ? JSON.parse(init.body) : undefined,
    };
    this.requests.push(request);

    const route = this.routes.find(
      (r) => r.method === request.method && r.path === request.url.pathname,
    );
    if (!route) {
      return new Response(`no route for ${request.method} ${request.url.pathname}`, { status: 404 });
    }

    const reply = route.handler(request);
    if (reply instanceof Error) throw reply;
    const text = reply.body === undefined ? "" : typeof reply.body === "string" ? reply.body : JSON.stringify(reply.body);
    return new Response(text, { status: reply.status ?? 200, headers: reply.headers });
  };
}
