import { mkdtempSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { describe, expect, test } from "vitest";
import { InputError } from "../errors.js";
import {
  analyzeTraffic,
  appTrafficCsv,
  buildNetworkTrafficReport,
  clientTrafficCsv,
  parseHours,
  saveNetworkTrafficReport,
  toClientTraffic,
  trafficSummaryText,
} from "../reports/networkTraffic.js";
import { FIXED_NOW, FakeTransport, apiError, targetRoutes, testContext } from "./helpers.js";

const MB = 1024 * 1024;

const CLIENTS = [
  { description: "Laptop", ip: "10.0.0.10", manufacturer: "Dell", usage: { sent: MB, recv: 3 * MB, total: 4 * MB } },
  { description: "Phone", ip: "10.0.0.11", manufacturer: "Apple", usage: { sent: 0, recv: 2 * MB, total: 2 * MB } },
  ...[3, 4, 5, 6, 7].map((n) => ({
    description: `Host${n}`,
    ip: `10.0.0.${n}`,
    manufacturer: "Apple",
    usage: { sent: MB / 2, recv: MB / 2, total: MB },
  })),
];

function trafficNetwork() {
  return new FakeTransport({
    ...targetRoutes(),
    "GET /networks/N_1/clients": CLIENTS,
    "GET /networks/N_1/trafficAnalysis": {
      applicationUsage: [
        { application: "Netflix", category: "Video", received: 2 * MB, sent: MB },
        { application: "DNS" },
      ],
    },
    "GET /networks/N_1/devices": [
      { serial: "Q-MX", name: "Edge", model: "MX68" },
      { serial: "Q-MS", model: "MS120" },
      { serial: "Q-MR", model: "MR46" },
      { serial: "Q-MS2", name: "Access", model: "MS210" },
    ],
    "GET /devices/Q-MX/appliance/uplinks/usageHistory": [{ interface: "wan1" }],
    "GET /devices/Q-MS/switch/ports": [{ portId: "1" }],
    "GET /devices/Q-MS2/switch/ports": apiError(500, "/devices/Q-MS2/switch/ports", "Boom"),
  });
}

describe("parseHours", () => {
  test("defaults to one hour", () => {
    expect(parseHours(undefined)).toBe(1);
    expect(parseHours("")).toBe(1);
  });

  test("accepts the supported spans", () => {
    expect(parseHours("12")).toBe(12);
    expect(parseHours(24)).toBe(24);
  });

  test("rejects anything else", () => {
    expect(() => parseHours("2")).toThrow(new InputError("hours must be one of 1, 3, 12, 24, got '2'"));
  });
});

describe("analyzeTraffic", () => {
  const analysis = analyzeTraffic(CLIENTS.map(toClientTraffic));

  test("sorts clients and totals sent and received", () => {
    expect(analysis.clients.map((c) => c.description)).toEqual([
      "Laptop", "Phone", "Host3", "Host4", "Host5", "Host6", "Host7",
    ]);
    expect(analysis.totalSent).toBe(3.5 * MB);
    expect(analysis.totalReceived).toBe(7.5 * MB);
    expect(analysis.total).toBe(11 * MB);
    expect(analysis.byManufacturer).toEqual({ Dell: 4 * MB, Apple: 7 * MB });
  });

  test("shares the top five and groups the rest as Others", () => {
    expect(analysis.share.map((s) => [s.label, s.percent])).toEqual([
      ["Laptop (10.0.0.10)", 36.4],
      ["Phone (10.0.0.11)", 18.2],
      ["Host3 (10.0.0.3)", 9.1],
      ["Host4 (10.0.0.4)", 9.1],
      ["Host5 (10.0.0.5)", 9.1],
      ["Others", 18.2],
    ]);
  });

  test("no Others slice for five clients or fewer", () => {
    const small = analyzeTraffic(CLIENTS.slice(0, 2).map(toClientTraffic));
    expect(small.share.map((s) => s.label)).toEqual(["Laptop (10.0.0.10)", "Phone (10.0.0.11)"]);
  });

  test("empty input", () => {
    expect(analyzeTraffic([])).toEqual({
      clients: [],
      totalSent: 0,
      totalReceived: 0,
      total: 0,
      byManufacturer: {},
      share: [],
    });
  });
});

describe("buildNetworkTrafficReport", () => {
  test("gathers client, application and device traffic", async () => {
    const ctx = testContext(trafficNetwork());
    const report = await buildNetworkTrafficReport(ctx, { org: "Acme", network: "HQ", hours: "3" });

    expect(report.networkId).toBe("N_1");
    expect(report.hours).toBe(3);
    expect(report.clientTraffic).toHaveLength(7);
    expect(report.applicationTraffic).toHaveLength(2);
    expect(report.deviceTraffic).toEqual([
      { name: "Edge", model: "MX68", serial: "Q-MX", usage: [{ interface: "wan1" }] },
      { name: "Q-MS", model: "MS120", serial: "Q-MS", ports: [{ portId: "1" }] },
    ]);
    expect(ctx.logger.lines).toContain("Warning: Could not get traffic data for device Access: Boom");
  });

  test("queries clients over the hour span and uplinks over the last hour", async () => {
    const ctx = testContext(trafficNetwork());
    await buildNetworkTrafficReport(ctx, { org: "Acme", network: "HQ", hours: 12 });

    const query = (path: string) => ctx.transport.calls.find((c) => c.path === path)?.query;
    expect(query("/networks/N_1/clients")).toEqual({ timespan: "43200" });
    expect(query("/devices/Q-MX/appliance/uplinks/usageHistory")).toEqual({ timespan: "3600" });
  });

  test("continues without client or application data", async () => {
    const ctx = testContext(
      new FakeTransport({
        ...targetRoutes(),
        "GET /networks/N_1/clients": apiError(400, "/networks/N_1/clients", "Bad timespan"),
        "GET /networks/N_1/trafficAnalysis": {},
        "GET /networks/N_1/devices": [],
      }),
    );
    const report = await buildNetworkTrafficReport(ctx, { org: "Acme", network: "HQ" });

    expect(report.clientTraffic).toEqual([]);
    expect(report.applicationTraffic).toEqual([]);
    expect(ctx.logger.lines).toContain("Warning: Error getting client traffic: Bad timespan");
    expect(ctx.logger.lines).toContain("Application traffic data not available for this network");
  });

  test("continues without device data when the device list fails", async () => {
    const ctx = testContext(
      trafficNetwork().on("GET /networks/N_1/devices", apiError(500, "/networks/N_1/devices", "Boom")),
    );
    const report = await buildNetworkTrafficReport(ctx, { org: "Acme", network: "HQ" });

    expect(report.deviceTraffic).toEqual([]);
    expect(report.clientTraffic).toHaveLength(7);
    expect(report.applicationTraffic).toHaveLength(2);
    expect(ctx.logger.lines).toContain("Warning: Error getting device traffic: Boom");
  });
});

describe("traffic output", () => {
  const analysis = analyzeTraffic(CLIENTS.map(toClientTraffic));

  test("client CSV in megabytes", () => {
    const lines = clientTrafficCsv(analysis).split("\r\n");
    expect(lines[0]).toBe("Description,Hostname,IP,MAC,Manufacturer,OS,User,Sent (MB),Received (MB),Total (MB)");
    expect(lines[1]).toBe("Laptop,Unknown,10.0.0.10,Unknown,Dell,Unknown,Unknown,1,3,4");
    expect(lines[3]).toBe("Host3,Unknown,10.0.0.3,Unknown,Apple,Unknown,Unknown,0.5,0.5,1");
  });

  test("application CSV skips incomplete rows", () => {
    const apps = [{ application: "Netflix", category: "Video", received: 2 * MB, sent: MB }, { application: "DNS" }];
    expect(appTrafficCsv(apps)).toBe(
      "Application,Category,Received (MB),Sent (MB),Total (MB)\r\nNetflix,Video,2,1,3\r\n",
    );
  });

  test("summary text", () => {
    expect(trafficSummaryText(analysis, FIXED_NOW)).toBe(
      [
        "Network Traffic Summary - 2024-03-05 14:07:09",
        "=".repeat(80),
        "",
        "Total Traffic:",
        "  Sent: 3.5 MB",
        "  Received: 7.5 MB",
        "  Total: 11 MB",
        "",
        "Top 10 Clients by Traffic:",
        "  1. Laptop (10.0.0.10): 4 MB",
        "  2. Phone (10.0.0.11): 2 MB",
        "  3. Host3 (10.0.0.3): 1 MB",
        "  4. Host4 (10.0.0.4): 1 MB",
        "  5. Host5 (10.0.0.5): 1 MB",
        "  6. Host6 (10.0.0.6): 1 MB",
        "  7. Host7 (10.0.0.7): 1 MB",
        "",
        "Traffic by Manufacturer:",
        "  Apple: 7 MB",
        "  Dell: 4 MB",
        "",
        "Traffic Share:",
        "  Laptop (10.0.0.10): 36.4%",
        "  Phone (10.0.0.11): 18.2%",
        "  Host3 (10.0.0.3): 9.1%",
        "  Host4 (10.0.0.4): 9.1%",
        "  Host5 (10.0.0.5): 9.1%",
        "  Others: 18.2%",
        "",
      ].join("\n"),
    );
  });

  test("saves under traffic_data, skipping empty sections", async () => {
    const dir = mkdtempSync(join(tmpdir(), "meraki-traffic-"));
    try {
      const full = await buildNetworkTrafficReport(testContext(trafficNetwork()), { org: "Acme", network: "HQ" });
      const paths = await saveNetworkTrafficReport(full, dir, FIXED_NOW);
      const sub = join(dir, "traffic_data");
      expect(paths).toEqual([
        join(sub, "client_traffic_20240305_140709.csv"),
        join(sub, "client_traffic_summary_20240305_140709.txt"),
        join(sub, "app_traffic_20240305_140709.csv"),
        join(sub, "raw_traffic_data_20240305_140709.json"),
      ]);
      expect(Object.keys(JSON.parse(readFileSync(paths[3], "utf-8")))).toEqual([
        "clientTraffic",
        "applicationTraffic",
        "deviceTraffic",
      ]);

      const empty = { ...full, clientTraffic: [], applicationTraffic: [] };
      expect(await saveNetworkTrafficReport(empty, dir, FIXED_NOW)).toEqual([
        join(sub, "raw_traffic_data_20240305_140709.json"),
      ]);
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });
});
