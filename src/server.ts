import { readFileSync } from "node:fs";
import { Hono, type Context, type MiddlewareHandler } from "hono";
import { deleteCookie, getCookie, setCookie } from "hono/cookie";
import { logger } from "hono/logger";
import { nanoid } from "nanoid";
import {
  getNetworkTraffic,
  getOrganizationSummary,
  getVpnStatus,
  listNetworkClients,
  listNetworkDevices,
  listNetworks,
  listOrganizations,
  listSsids,
  type Device,
  type Organization,
} from "./api.js";
import { API_KEY_SET, Chatbot, type ClientFactory } from "./chatbot.js";
import type { MerakiTransport } from "./client.js";
import { buildOverview, filterDevices, overviewSample, summarizeDevices, timeRange, trafficSeries } from "./dashboard.js";
import { ApiError, InputError, NotFoundError, describeError } from "./errors.js";
import { isRecord } from "./json.js";
import { CALL_INTERVAL_MS, sleep as defaultSleep, type Sleep } from "./timing.js";

export const SESSION_COOKIE = "session";

/** Seconds a session lives after its key is stored */
export const SESSION_TTL_SECONDS = 7 * 24 * 60 * 60;

export interface Session {
  id: string;
  apiKey: string;
  /** Epoch milliseconds */
  expiresAt: number;
}

/** In-memory sessions keyed by the id held in the session cookie; only sessions holding a key are stored */
export class SessionStore {
  private readonly sessions = new Map<string, Session>();

  constructor(
    private readonly ttlSeconds = SESSION_TTL_SECONDS,
    private readonly now: () => number = Date.now,
  ) {}

  create(apiKey: string): Session {
    const session: Session = { id: nanoid(32), apiKey, expiresAt: this.now() + this.ttlSeconds * 1000 };
    this.sessions.set(session.id, session);
    return session;
  }

  /** Live session for the id; an expired one is dropped */
  get(id: string | undefined): Session | undefined {
    if (!id) return undefined;
    const session = this.sessions.get(id);
    if (session && session.expiresAt <= this.now()) {
      this.sessions.delete(id);
      return undefined;
    }
    return session;
  }

  delete(id: string): void {
    this.sessions.delete(id);
  }

  get size(): number {
    return this.sessions.size;
  }
}

type AppEnv = {
  Variables: {
    session: Session | undefined;
    client: MerakiTransport;
  };
};

export interface ServerOptions {
  createClient: ClientFactory;
  sessions?: SessionStore;
  /** Chat page HTML; read from public/chat.html when omitted */
  chatPage?: string;
  /** Request logging through hono/logger */
  log?: boolean;
  sleep?: Sleep;
}

export function loadChatPage(): string {
  return readFileSync(new URL("../public/chat.html", import.meta.url), "utf8");
}

export function renderChatPage(template: string, apiKeySet: boolean): string {
  return template.replaceAll("{{API_KEY_SET}}", String(apiKeySet));
}

/** JSON response for API payloads of unknown shape */
const rawJson = (value: unknown) =>
  new Response(JSON.stringify(value), { headers: { "Content-Type": "application/json" } });

/** Strip the raw API object from device payloads */
const publicDevice = ({ raw: _raw, ...device }: Device) => device;

export function createApp(options: ServerOptions): Hono<AppEnv> {
  const sessions = options.sessions ?? new SessionStore();
  const pause = options.sleep ?? defaultSleep;
  let chatPage = options.chatPage;

  const app = new Hono<AppEnv>();

  if (options.log !== false) app.use("*", logger());

  const sessionMiddleware: MiddlewareHandler<AppEnv> = async (c, next) => {
    c.set("session", sessions.get(getCookie(c, SESSION_COOKIE)));
    await next();
  };
  app.use("*", sessionMiddleware);

  const endSession = (c: Context<AppEnv>): void => {
    const session = c.get("session");
    if (!session) return;
    sessions.delete(session.id);
    deleteCookie(c, SESSION_COOKIE, { path: "/" });
    c.set("session", undefined);
  };

  const startSession = (c: Context<AppEnv>, apiKey: string): void => {
    endSession(c);
    const session = sessions.create(apiKey);
    setCookie(c, SESSION_COOKIE, session.id, {
      httpOnly: true,
      sameSite: "Lax",
      maxAge: SESSION_TTL_SECONDS,
      path: "/",
    });
    c.set("session", session);
  };

  app.onError((err, c) => {
    if (err instanceof InputError) return c.json(describeError(err), 400);
    if (err instanceof NotFoundError) return c.json(describeError(err), 404);
    if (err instanceof ApiError) return c.json(describeError(err), 502);
    console.error(err);
    return c.json(describeError(err), 500);
  });

  // ── Chat ─────────────────────────────────────────────────────────────

  app.get("/", (c) => {
    chatPage ??= loadChatPage();
    return c.html(renderChatPage(chatPage, c.get("session") !== undefined));
  });

  app.post("/process_command", async (c) => {
    const form = await c.req.parseBody();
    const command = typeof form.command === "string" ? form.command : "";

    const bot = new Chatbot(options.createClient, c.get("session")?.apiKey);
    const response = await bot.process(command);

    if (response === API_KEY_SET) {
      const key = command.trim().split(/\s+/)[1];
      if (key) startSession(c, key);
    }
    return c.json({ response });
  });

  app.post("/clear_api_key", (c) => {
    endSession(c);
    return c.json({ success: true });
  });

  // ── Dashboard API ────────────────────────────────────────────────────

  const api = new Hono<AppEnv>();

  api.post("/session", async (c) => {
    const body: unknown = await c.req.json().catch(() => undefined);
    const apiKey = isRecord(body) && typeof body.apiKey === "string" ? body.apiKey.trim() : "";
    if (!apiKey) throw new InputError("apiKey is required");

    let organizations: Organization[];
    try {
      organizations = await listOrganizations(options.createClient(apiKey));
    } catch (err: unknown) {
      if (!(err instanceof ApiError)) throw err;
      return c.json({ error: "Invalid API key", detail: err.detail }, 401);
    }
    if (!organizations.length) {
      return c.json({ error: "No organizations found or invalid API key." }, 401);
    }

    startSession(c, apiKey);
    return c.json({ organizations });
  });

  api.delete("/session", (c) => {
    endSession(c);
    return c.json({ success: true });
  });

  api.use("*", async (c, next) => {
    const apiKey = c.get("session")?.apiKey;
    if (!apiKey) return c.json({ error: "Not authenticated. POST /api/session with an apiKey first." }, 401);
    c.set("client", options.createClient(apiKey));
    await next();
  });

  api.get("/organizations", async (c) => c.json(await listOrganizations(c.get("client"))));

  api.get("/organizations/:orgId/networks", async (c) =>
    c.json(await listNetworks(c.get("client"), c.req.param("orgId"))),
  );

  api.get("/organizations/:orgId/overview", async (c) => {
    const client = c.get("client");
    const networks = await listNetworks(client, c.req.param("orgId"));
    const devicesByNetwork = new Map<string, Device[]>();
    for (const network of overviewSample(networks)) {
      devicesByNetwork.set(network.id, await listNetworkDevices(client, network.id));
      await pause(CALL_INTERVAL_MS);
    }
    return c.json(buildOverview(networks, devicesByNetwork));
  });

  api.get("/organizations/:orgId/summary", async (c) =>
    rawJson(await getOrganizationSummary(c.get("client"), c.req.param("orgId"))),
  );

  api.get("/networks/:networkId/devices", async (c) => {
    const devices = await listNetworkDevices(c.get("client"), c.req.param("networkId"));
    const filtered = filterDevices(devices, { models: c.req.queries("model"), search: c.req.query("search") });
    return c.json({
      total: devices.length,
      devices: filtered.map(publicDevice),
      summary: summarizeDevices(filtered),
    });
  });

  api.get("/networks/:networkId/wireless", async (c) => {
    const ssids = await listSsids(c.get("client"), c.req.param("networkId"));
    return c.json({ ssids, enabled: ssids.filter((s) => s.enabled).length });
  });

  api.get("/networks/:networkId/clients", async (c) => {
    const range = c.req.query("range") ?? "day";
    const timespan = timeRange(range);
    const client = c.get("client");
    const networkId = c.req.param("networkId");
    const clients = await listNetworkClients(client, networkId, timespan);
    const traffic = await getNetworkTraffic(client, networkId, timespan);
    return c.json({ range, timespan, clients, traffic: trafficSeries(traffic) });
  });

  api.get("/networks/:networkId/vpn", async (c) => rawJson(await getVpnStatus(c.get("client"), c.req.param("networkId"))));

  app.route("/api", api);

  return app;
}
