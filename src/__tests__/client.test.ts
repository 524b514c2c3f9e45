import { describe, expect, test, vi } from "vitest";
import { API_KEY_HEADER, MerakiClient, parseNextLink, retryAfterSeconds } from "../client.js";
import { ApiError } from "../errors.js";
import { MemoryLogger } from "../log.js";

const BASE = "https://api.meraki.com/api/v1";

function fetchSequence(...responses: Response[]) {
  const calls: { url: string; init?: RequestInit }[] = [];
  const fn: typeof fetch = async (input, init) => {
    calls.push({ url: String(input), init });
    const next = responses.shift();
    if (!next) throw new Error("unexpected fetch");
    return next;
  };
  return { fn, calls };
}

const json = (value: unknown, init: ResponseInit = {}) => new Response(JSON.stringify(value), { status: 200, ...init });

async function catchError(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (err: unknown) {
    return err;
  }
  throw new Error("expected a rejection");
}

describe("MerakiClient", () => {
  describe("buildUrl", () => {
    const client = new MerakiClient(BASE, "test-api-key");

    test("joins base URL and path", () => {
      expect(client.buildUrl({ path: "/organizations" }).toString()).toBe(`${BASE}/organizations`);
    });

    test("appends query params", () => {
      const url = client.buildUrl({ path: "/networks/N_1/clients", query: { timespan: "3600", perPage: "10" } });
      expect(url.searchParams.get("timespan")).toBe("3600");
      expect(url.searchParams.get("perPage")).toBe("10");
    });

    test("skips undefined and empty query values", () => {
      const url = client.buildUrl({ path: "/organizations", query: { a: "1", b: undefined, c: "" } });
      expect(url.searchParams.get("a")).toBe("1");
      expect(url.searchParams.has("b")).toBe(false);
      expect(url.searchParams.has("c")).toBe(false);
    });

    test("strips trailing slashes from base URL", () => {
      const c = new MerakiClient(`${BASE}///`, "test-api-key");
      expect(c.buildUrl({ path: "/organizations" }).toString()).toBe(`${BASE}/organizations`);
    });
  });

  describe("request", () => {
    test("sends the API key and Accept headers", async () => {
      const { fn, calls } = fetchSequence(json([]));
      const client = new MerakiClient(BASE, "test-api-key", { fetch: fn });

      await client.request({ method: "GET", path: "/organizations" });
      const headers = new Headers(calls[0].init?.headers);
      expect(headers.get(API_KEY_HEADER)).toBe("test-api-key");
      expect(headers.get("Accept")).toBe("application/json");
      expect(headers.has("Content-Type")).toBe(false);
    });

    test("sets Content-Type and serializes the body", async () => {
      const { fn, calls } = fetchSequence(json({ ok: true }));
      const client = new MerakiClient(BASE, "test-api-key", { fetch: fn });

      await client.request({ method: "PUT", path: "/networks/N_1/trafficShaping", body: { rules: [] } });
      expect(calls[0].init?.method).toBe("PUT");
      expect(new Headers(calls[0].init?.headers).get("Content-Type")).toBe("application/json");
      expect(calls[0].init?.body).toBe('{"rules":[]}');
    });

    test("returns {} for an empty response", async () => {
      const { fn } = fetchSequence(new Response("", { status: 200 }));
      const client = new MerakiClient(BASE, "test-api-key", { fetch: fn });
      expect(await client.request({ method: "PUT", path: "/x" })).toEqual({});
    });

    test("waits Retry-After seconds and retries once on 429", async () => {
      const { fn, calls } = fetchSequence(
        new Response("", { status: 429, headers: { "Retry-After": "2" } }),
        json([{ id: "O_1" }]),
      );
      const sleep = vi.fn(async (_ms: number) => {});
      const logger = new MemoryLogger();
      const client = new MerakiClient(BASE, "test-api-key", { fetch: fn, sleep, logger });

      expect(await client.request({ method: "GET", path: "/organizations" })).toEqual([{ id: "O_1" }]);
      expect(calls).toHaveLength(2);
      expect(sleep).toHaveBeenCalledWith(2000);
      expect(logger.lines).toEqual(["Rate limit hit. Waiting for 2 seconds..."]);
    });

    test("a second 429 is an ApiError, not another retry", async () => {
      const { fn, calls } = fetchSequence(
        new Response("", { status: 429, headers: { "Retry-After": "1" } }),
        new Response('{"errors":["Too many requests"]}', { status: 429 }),
      );
      const sleep = vi.fn(async (_ms: number) => {});
      const client = new MerakiClient(BASE, "test-api-key", { fetch: fn, sleep, logger: new MemoryLogger() });

      const err = await catchError(client.request({ method: "GET", path: "/organizations" }));
      expect(err).toBeInstanceOf(ApiError);
      if (!(err instanceof ApiError)) return;
      expect(err.status).toBe(429);
      expect(err.detail).toEqual({ errors: ["Too many requests"] });
      expect(calls).toHaveLength(2);
      expect(sleep).toHaveBeenCalledTimes(1);
    });

    test("throws ApiError with the parsed JSON body", async () => {
      const { fn } = fetchSequence(json({ errors: ["Not found"] }, { status: 404 }));
      const client = new MerakiClient(BASE, "test-api-key", { fetch: fn });

      const err = await catchError(client.request({ method: "GET", path: "/organizations/O_9" }));
      expect(err).toBeInstanceOf(ApiError);
      if (!(err instanceof ApiError)) return;
      expect(err.message).toBe("HTTP 404");
      expect(err.status).toBe(404);
      expect(err.path).toBe("/api/v1/organizations/O_9");
      expect(err.detail).toEqual({ errors: ["Not found"] });
      expect(err.body).toBe('{"errors":["Not found"]}');
    });

    test("falls back to statusCode/message for non-JSON errors", async () => {
      const { fn } = fetchSequence(new Response("Internal Server Error", { status: 500 }));
      const client = new MerakiClient(BASE, "test-api-key", { fetch: fn });

      const err = await catchError(client.request({ method: "GET", path: "/organizations" }));
      expect(err).toBeInstanceOf(ApiError);
      if (!(err instanceof ApiError)) return;
      expect(err.detail).toEqual({ statusCode: 500, message: "Internal Server Error" });
    });

    test("reports non-JSON success bodies", async () => {
      const { fn } = fetchSequence(new Response("<html>login</html>", { status: 200 }));
      const client = new MerakiClient(BASE, "test-api-key", { fetch: fn });

      const err = await catchError(client.request({ method: "GET", path: "/organizations" }));
      expect(err).toBeInstanceOf(ApiError);
      if (!(err instanceof ApiError)) return;
      expect(err.message).toContain("Expected JSON from /api/v1/organizations");
      expect(err.message).toContain("Snippet: <html>login</html>");
    });

    test("turns transport failures into ApiError status 500", async () => {
      const fn: typeof fetch = async () => {
        throw new Error("connect ECONNREFUSED");
      };
      const client = new MerakiClient(BASE, "test-api-key", { fetch: fn });

      const err = await catchError(client.request({ method: "GET", path: "/organizations" }));
      expect(err).toBeInstanceOf(ApiError);
      if (!(err instanceof ApiError)) return;
      expect(err.status).toBe(500);
      expect(err.message).toBe("Request to /api/v1/organizations failed: connect ECONNREFUSED");
      expect(err.body).toBe("connect ECONNREFUSED");
    });
  });

  describe("requestAll", () => {
    test("follows rel=next links and concatenates pages", async () => {
      const next = `${BASE}/organizations/O_1/networks?perPage=1000&startingAfter=N_2`;
      const { fn, calls } = fetchSequence(
        json([{ id: "N_1" }, { id: "N_2" }], { headers: { Link: `<${next}>; rel=next` } }),
        json([{ id: "N_3" }]),
      );
      const client = new MerakiClient(BASE, "test-api-key", { fetch: fn });

      const result = await client.requestAll({ method: "GET", path: "/organizations/O_1/networks" });
      expect(result).toEqual([{ id: "N_1" }, { id: "N_2" }, { id: "N_3" }]);
      expect(calls.map((c) => c.url)).toEqual([`${BASE}/organizations/O_1/networks?perPage=1000`, next]);
    });

    test("uses the given page size", async () => {
      const { fn, calls } = fetchSequence(json([]));
      const client = new MerakiClient(BASE, "test-api-key", { fetch: fn });

      await client.requestAll({ method: "GET", path: "/networks/N_1/clients", query: { timespan: "60" } }, 50);
      expect(calls[0].url).toBe(`${BASE}/networks/N_1/clients?timespan=60&perPage=50`);
    });

    test("returns a non-list response as is", async () => {
      const { fn } = fetchSequence(json({ id: "O_1" }));
      const client = new MerakiClient(BASE, "test-api-key", { fetch: fn });
      expect(await client.requestAll({ method: "GET", path: "/organizations/O_1" })).toEqual({ id: "O_1" });
    });

    test("stops when a next link repeats", async () => {
      const self = `${BASE}/organizations?perPage=1000`;
      const { fn, calls } = fetchSequence(json([{ id: "O_1" }], { headers: { Link: `<${self}>; rel=next` } }));
      const client = new MerakiClient(BASE, "test-api-key", { fetch: fn });

      expect(await client.requestAll({ method: "GET", path: "/organizations" })).toEqual([{ id: "O_1" }]);
      expect(calls).toHaveLength(1);
    });
  });
});

describe("retryAfterSeconds", () => {
  test("parses integer seconds", () => {
    expect(retryAfterSeconds("5")).toBe(5);
  });

  test("defaults to 1 when absent or unparsable", () => {
    expect(retryAfterSeconds(null)).toBe(1);
    expect(retryAfterSeconds("soon")).toBe(1);
  });
});

describe("parseNextLink", () => {
  test("finds the next relation among several", () => {
    const header = '<https://a/x?startingAfter=1>; rel=first, <https://a/x?startingAfter=9>; rel="next"';
    expect(parseNextLink(header)).toBe("https://a/x?startingAfter=9");
  });

  test("returns undefined without a next relation", () => {
    expect(parseNextLink("<https://a/x>; rel=prev")).toBeUndefined();
    expect(parseNextLink(null)).toBeUndefined();
  });
});
