import { ApiError } from "./errors.js";
import { stderrLogger, type Logger } from "./log.js";
import { sleep as defaultSleep, type Sleep } from "./timing.js";

export const API_KEY_HEADER = "X-Cisco-Meraki-API-Key";

export interface RequestOptions {
  method: string;
  path: string;
  query?: Record<string, string | undefined>;
  body?: unknown;
}

/** What the rest of the code needs from an API client (tests provide fakes). */
export interface MerakiTransport {
  request(options: RequestOptions): Promise<unknown>;
  /** GET every page of a list endpoint and return the concatenated items */
  requestAll(options: RequestOptions, perPage?: number): Promise<unknown>;
}

export interface ClientOptions {
  fetch?: typeof fetch;
  sleep?: Sleep;
  logger?: Logger;
}

interface Page {
  value: unknown;
  next: string | undefined;
}

export class MerakiClient implements MerakiTransport {
  private readonly fetchFn: typeof fetch;
  private readonly sleep: Sleep;
  private readonly logger: Logger;

  constructor(
    private baseUrl: string,
    private apiKey: string,
    options: ClientOptions = {},
  ) {
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
    this.sleep = options.sleep ?? defaultSleep;
    this.logger = options.logger ?? stderrLogger;
  }

  buildUrl(options: Pick<RequestOptions, "path" | "query">): URL {
    const base = this.baseUrl.replace(/\/+$/, "");
    const url = new URL(`${base}${options.path}`);
    if (options.query) {
      for (const [k, v] of Object.entries(options.query)) {
        if (v !== undefined && v !== "") url.searchParams.set(k, v);
      }
    }
    return url;
  }

  async request(options: RequestOptions): Promise<unknown> {
    const page = await this.send(options.method, this.buildUrl(options), options.body);
    return page.value;
  }

  async requestAll(options: RequestOptions, perPage = 1000): Promise<unknown> {
    const first = this.buildUrl({
      path: options.path,
      query: { ...options.query, perPage: String(perPage) },
    });

    const items: unknown[] = [];
    const seen = new Set<string>();
    let url: URL | undefined = first;

    while (url && !seen.has(url.toString())) {
      seen.add(url.toString());
      const page = await this.send("GET", url);
      if (!Array.isArray(page.value)) {
        // Not a list endpoint
        return items.length ? items : page.value;
      }
      items.push(...page.value);
      url = page.next ? new URL(page.next, url) : undefined;
    }
    return items;
  }

  private async send(method: string, url: URL, body?: unknown): Promise<Page> {
    let resp = await this.fetchOnce(method, url, body);

    if (resp.status === 429) {
      const wait = retryAfterSeconds(resp.headers.get("Retry-After"));
      this.logger.info(`Rate limit hit. Waiting for ${wait} seconds...`);
      await this.sleep(wait * 1000);
      resp = await this.fetchOnce(method, url, body);
    }

    const text = await resp.text();

    if (!resp.ok) {
      let detail: unknown;
      try {
        detail = JSON.parse(text);
      } catch {
        detail = { statusCode: resp.status, message: text };
      }
      throw new ApiError({ status: resp.status, method, path: url.pathname, detail, body: text });
    }

    const next = parseNextLink(resp.headers.get("Link"));
    if (!text) return { value: {}, next };
    try {
      return { value: JSON.parse(text), next };
    } catch {
      throw new ApiError({
        status: resp.status,
        method,
        path: url.pathname,
        message:
          `Expected JSON from ${url.pathname} but got non-JSON response (status ${resp.status}). ` +
          `Check the base URL. Snippet: ${text.slice(0, 200)}`,
        detail: { statusCode: resp.status, body: text.slice(0, 500) },
        body: text,
      });
    }
  }

  private async fetchOnce(method: string, url: URL, body?: unknown): Promise<Response> {
    const headers: Record<string, string> = {
      Accept: "application/json",
      [API_KEY_HEADER]: this.apiKey,
    };
    if (body !== undefined) {
      headers["Content-Type"] = "application/json";
    }

    try {
      return await this.fetchFn(url, {
        method,
        headers,
        body: body !== undefined ? JSON.stringify(body) : undefined,
      });
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      throw new ApiError({
        status: 500,
        method,
        path: url.pathname,
        message: `Request to ${url.pathname} failed: ${message}`,
        detail: { statusCode: 500, message },
        body: message,
      });
    }
  }
}

/** Seconds to wait from a Retry-After header; 1 when absent or unparsable */
export function retryAfterSeconds(header: string | null): number {
  if (!header) return 1;
  const n = Number.parseInt(header, 10);
  return Number.isFinite(n) && n >= 0 ? n : 1;
}

/** Extract the rel=next target from an RFC 8288 Link header */
export function parseNextLink(header: string | null): string | undefined {
  if (!header) return undefined;
  for (const part of header.split(",")) {
    const m = part.match(/<([^>]+)>\s*;\s*rel="?next"?/);
    if (m) return m[1];
  }
  return undefined;
}
