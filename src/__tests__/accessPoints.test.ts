import { mkdtempSync, readFileSync, readdirSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { InputError, NotFoundError } from "../errors.js";
import {
  accessPointCsv,
  accessPointSummary,
  buildAccessPointReport,
  saveAccessPointReport,
} from "../reports/accessPoints.js";
import { FIXED_NOW, FakeTransport, apiError, targetRoutes, testContext } from "./helpers.js";

function apNetwork() {
  return new FakeTransport({
    ...targetRoutes(),
    "GET /networks/N_1/devices": [
      {
        serial: "Q-AP1",
        name: "Lobby",
        model: "MR46",
        mac: "aa:01",
        lanIp: "10.0.0.2",
        firmware: "wireless-29",
        status: "online",
        tags: ["lobby"],
        lastReportedAt: "2024-03-05T10:00:00Z",
        networkId: "N_1",
      },
      { serial: "Q-AP2", model: "CW9162I", status: "offline" },
      { serial: "Q-SW1", name: "Core", model: "MS120-8" },
    ],
    "GET /devices/Q-AP1/wireless/status": {},
    "GET /devices/Q-AP1/clients": [{ usage: { sent: 1024, recv: 2048 } }, { usage: { sent: 0, recv: 1024 } }],
    "GET /devices/Q-AP1/wireless/connectionStats": { assoc: 0, auth: 1, success: 40 },
    "GET /devices/Q-AP1/wireless/latencyStats": { backgroundTraffic: {} },
    "GET /devices/Q-AP2/wireless/status": apiError(500),
  });
}

describe("buildAccessPointReport", () => {
  test("collects details for each access point and skips failing ones", async () => {
    const ctx = testContext(apNetwork());
    const report = await buildAccessPointReport(ctx, { org: "Acme", network: "HQ", days: "2" });

    expect(report.totalAccessPoints).toBe(1);
    expect(report.timespanDays).toBe(2);
    expect(report.timestamp).toBe("2024-03-05T14:07:09");
    expect(report.totalClients).toBe(2);
    expect(report.totalTraffic).toEqual({
      sent: 1024,
      received: 3072,
      total: 4096,
      sentHuman: "1.00 KB",
      receivedHuman: "3.00 KB",
      totalHuman: "4.00 KB",
    });
    expect(report.apStatusSummary).toEqual({ online: 1 });
    expect(report.apModelSummary).toEqual({ MR46: 1 });

    const [ap] = report.accessPoints;
    expect(ap.name).toBe("Lobby");
    expect(ap.tags).toEqual(["lobby"]);
    expect(ap.wirelessStatus).toEqual({
      status: "Unknown",
      connectionStats: { assoc: 0, auth: 1, success: 40 },
      latencyStats: { backgroundTraffic: {} },
    });
    expect(ap.currentClientsDetails).toHaveLength(2);
  });

  test("uses five minutes for current clients and the day span for statistics", async () => {
    const ctx = testContext(apNetwork());
    await buildAccessPointReport(ctx, { org: "Acme", network: "HQ", days: 2 });

    const query = (path: string) => ctx.transport.calls.find((c) => c.path === path)?.query;
    expect(query("/devices/Q-AP1/clients")).toEqual({ timespan: "300" });
    expect(query("/devices/Q-AP1/wireless/connectionStats")).toEqual({ timespan: "172800" });
    expect(query("/devices/Q-AP1/wireless/latencyStats")).toEqual({ timespan: "172800" });
  });

  test("logs progress, warns on skipped APs and paces calls", async () => {
    const ctx = testContext(apNetwork());
    await buildAccessPointReport(ctx, { org: "Acme", network: "HQ" });

    expect(ctx.logger.lines).toEqual([
      "Getting organization ID for: Acme",
      "Organization ID found: O_1",
      "Getting network ID for: HQ",
      "Network ID found: N_1",
      "Getting devices in the network...",
      "Found 2 access points",
      "Getting details for AP: Lobby",
      "Getting details for AP: Q-AP2",
      "Warning: Error retrieving details for AP Q-AP2: HTTP 500",
    ]);
    expect(ctx.sleeps).toEqual([200]);
  });

  test("fails when the network has no access points", async () => {
    const ctx = testContext(new FakeTransport({ ...targetRoutes(), "GET /networks/N_1/devices": [{ serial: "Q-SW1", model: "MS120" }] }));
    await expect(buildAccessPointReport(ctx, { org: "Acme", network: "HQ" })).rejects.toThrow(
      new NotFoundError("No access points found in the network"),
    );
  });

  test("fails for an unknown organization", async () => {
    const ctx = testContext(apNetwork());
    await expect(buildAccessPointReport(ctx, { org: "Nope", network: "HQ" })).rejects.toThrow("Organization 'Nope' not found");
  });

  test("rejects a non-positive day count before calling the API", async () => {
    const ctx = testContext(apNetwork());
    await expect(buildAccessPointReport(ctx, { org: "Acme", network: "HQ", days: "0" })).rejects.toThrow(
      new InputError("days must be a positive integer, got '0'"),
    );
    expect(ctx.transport.calls).toHaveLength(0);
  });
});

describe("access point output", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "meraki-ap-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  test("CSV has one row per access point", async () => {
    const report = await buildAccessPointReport(testContext(apNetwork()), { org: "Acme", network: "HQ" });
    expect(accessPointCsv(report).split("\r\n")).toEqual([
      "Name,Serial,Model,MAC Address,LAN IP,Status,Firmware,Current Clients,Current Traffic (Sent),Current Traffic (Received),Current Traffic (Total),Last Reported",
      "Lobby,Q-AP1,MR46,aa:01,10.0.0.2,online,wireless-29,2,1.00 KB,3.00 KB,4.00 KB,2024-03-05T10:00:00Z",
      "",
    ]);
  });

  test("summary lists status, models, traffic and a detail table", async () => {
    const report = await buildAccessPointReport(testContext(apNetwork()), { org: "Acme", network: "HQ" });
    const lines = accessPointSummary(report);

    expect(lines.slice(0, 14)).toEqual([
      "Success! Found 1 access points.",
      "",
      "Access Point Status Summary:",
      "  online: 1 APs",
      "",
      "Access Point Model Summary:",
      "  MR46: 1 APs",
      "",
      "Total Connected Clients: 2",
      "",
      "Current Traffic:",
      "  Sent:     1.00 KB",
      "  Received: 3.00 KB",
      "  Total:    4.00 KB",
    ]);
    expect(lines.at(-3)).toBe("Name                 Model      Status     Clients  Traffic");
    expect(lines.at(-1)).toBe("Lobby                MR46       online     2        4.00 KB");
  });

  test("saves JSON and CSV files named by timestamp", async () => {
    const report = await buildAccessPointReport(testContext(apNetwork()), { org: "Acme", network: "HQ" });
    const paths = await saveAccessPointReport(report, dir, FIXED_NOW);

    expect(paths).toEqual([
      join(dir, "meraki_ap_status_20240305_140709.json"),
      join(dir, "meraki_ap_status_20240305_140709.csv"),
    ]);
    expect(readdirSync(dir).sort()).toEqual([
      "meraki_ap_status_20240305_140709.csv",
      "meraki_ap_status_20240305_140709.json",
    ]);
    expect(JSON.parse(readFileSync(paths[0], "utf-8")).totalClients).toBe(2);
  });
});
