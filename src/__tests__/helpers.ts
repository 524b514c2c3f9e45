import type { MerakiTransport, RequestOptions } from "../client.js";
import { ApiError } from "../errors.js";
import { MemoryLogger } from "../log.js";
import { createContext, type ReportContext } from "../reports/context.js";

type Handler = (options: RequestOptions) => unknown;
type Route = unknown;

function isHandler(route: Route): route is Handler {
  return typeof route === "function";
}

export interface RecordedCall extends RequestOptions {
  all: boolean;
}

export function apiError(status: number, path = "/", message = `HTTP ${status}`): ApiError {
  return new ApiError({ status, method: "GET", path, detail: { errors: [message] }, body: message, message });
}

/**
 * In-process stand-in for the Dashboard API, keyed by "METHOD /path".
 * A route may be a value, an Error to throw, or a function of the request.
 * Unknown routes answer 404.
 */
export class FakeTransport implements MerakiTransport {
  readonly calls: RecordedCall[] = [];

  constructor(private readonly routes: Record<string, Route> = {}) {}

  on(key: string, route: Route): this {
    this.routes[key] = route;
    return this;
  }

  async request(options: RequestOptions): Promise<unknown> {
    this.calls.push({ ...options, all: false });
    return this.answer(options);
  }

  async requestAll(options: RequestOptions): Promise<unknown> {
    this.calls.push({ ...options, all: true });
    return this.answer({ ...options, method: "GET" });
  }

  paths(): string[] {
    return this.calls.map((c) => `${c.method} ${c.path}`);
  }

  private answer(options: RequestOptions): unknown {
    const key = `${options.method} ${options.path}`;
    if (!(key in this.routes)) throw apiError(404, options.path, `No route for ${key}`);
    const route = this.routes[key];
    if (route instanceof Error) throw route;
    return isHandler(route) ? route(options) : route;
  }
}

export interface TestContext extends ReportContext {
  logger: MemoryLogger;
  transport: FakeTransport;
  sleeps: number[];
}

export const FIXED_NOW = new Date(2024, 2, 5, 14, 7, 9);

/** Report context over a fake transport with a recording logger and an instant sleep */
export function testContext(transport: FakeTransport): TestContext {
  const logger = new MemoryLogger();
  const sleeps: number[] = [];
  const ctx = createContext(transport, {
    logger,
    sleep: async (ms) => {
      sleeps.push(ms);
    },
    now: () => FIXED_NOW,
  });
  return { ...ctx, logger, transport, sleeps };
}

/** Routes that resolve organization "Acme" / network "HQ" */
export function targetRoutes(): Record<string, Route> {
  return {
    "GET /organizations": [
      { id: "O_1", name: "Acme" },
      { id: "O_2", name: "Other" },
    ],
    "GET /organizations/O_1/networks": [
      { id: "N_1", name: "HQ", productTypes: ["appliance", "switch", "wireless"] },
      { id: "N_2", name: "Branch", productTypes: ["wireless"] },
    ],
  };
}
