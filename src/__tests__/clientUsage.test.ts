import { mkdtempSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { describe, expect, test } from "vitest";
import {
  NOT_WIRELESS,
  buildClientUsageReport,
  clientUsageCsv,
  clientUsageSummary,
  saveClientUsageReport,
  toClientUsage,
} from "../reports/clientUsage.js";
import { FIXED_NOW, FakeTransport, targetRoutes, testContext } from "./helpers.js";

function usageNetwork() {
  return new FakeTransport({
    ...targetRoutes(),
    "GET /networks/N_1/clients": [
      { id: "k1", description: "Laptop", mac: "aa:01", os: "Windows 11", ssid: "Corp", usage: { sent: 1024, recv: 3072, total: 4096 } },
      { id: "k2", mac: "aa:02", usage: { sent: 100, recv: 200, total: 300 } },
      { id: "k3", description: "Phone", mac: "aa:03", os: "iOS", ssid: null, usage: { sent: 2048, recv: 8192, total: 10240 } },
    ],
  });
}

describe("toClientUsage", () => {
  test("defaults missing fields and marks clients without an ssid as wired", () => {
    expect(toClientUsage({ id: "k2" })).toEqual({
      id: "k2",
      description: "Unknown",
      mac: "Unknown",
      ip: "Unknown",
      user: "Unknown",
      firstSeen: "Unknown",
      lastSeen: "Unknown",
      manufacturer: "Unknown",
      os: "Unknown",
      usage: { sent: 0, recv: 0, total: 0 },
      status: "Unknown",
      ssid: NOT_WIRELESS,
    });
  });

  test("a present but empty ssid is Unknown", () => {
    expect(toClientUsage({ ssid: null }).ssid).toBe("Unknown");
  });
});

describe("buildClientUsageReport", () => {
  test("sorts clients by usage and totals by OS and SSID", async () => {
    const ctx = testContext(usageNetwork());
    const report = await buildClientUsageReport(ctx, { org: "Acme", network: "HQ" });

    expect(report?.clients.map((c) => c.id)).toEqual(["k3", "k1", "k2"]);
    expect(report?.totalClients).toBe(3);
    expect(report?.totalUsage).toEqual({
      sentBytes: 3172,
      receivedBytes: 11464,
      totalBytes: 14636,
      sentHuman: "3.10 KB",
      receivedHuman: "11.20 KB",
      totalHuman: "14.29 KB",
    });
    expect(report?.usageByOs).toEqual({ iOS: 10240, "Windows 11": 4096, Other: 300 });
    expect(report?.usageBySsid).toEqual({ Other: 10240, Corp: 4096, [NOT_WIRELESS]: 300 });
  });

  test("queries the day span in seconds", async () => {
    const ctx = testContext(usageNetwork());
    await buildClientUsageReport(ctx, { org: "Acme", network: "HQ", days: "3" });

    const call = ctx.transport.calls.find((c) => c.path === "/networks/N_1/clients");
    expect(call?.query).toEqual({ timespan: "259200" });
    expect(call?.all).toBe(true);
  });

  test("returns undefined when no clients were seen", async () => {
    const ctx = testContext(new FakeTransport({ ...targetRoutes(), "GET /networks/N_1/clients": [] }));
    expect(await buildClientUsageReport(ctx, { org: "Acme", network: "HQ" })).toBeUndefined();
    expect(ctx.logger.lines.at(-1)).toBe("No clients found in the network for the specified time period");
  });
});

describe("client usage output", () => {
  test("summary", async () => {
    const report = await buildClientUsageReport(testContext(usageNetwork()), { org: "Acme", network: "HQ" });
    if (!report) throw new Error("expected a report");

    expect(clientUsageSummary(report)).toEqual([
      "Success! Found 3 clients.",
      "",
      "Total Network Usage:",
      "  Sent:     3.10 KB",
      "  Received: 11.20 KB",
      "  Total:    14.29 KB",
      "",
      "Usage by Operating System:",
      "  iOS: 10.00 KB",
      "  Windows 11: 4.00 KB",
      "  Other: 300 B",
      "",
      "Usage by SSID/Connection:",
      "  Other: 10.00 KB",
      "  Corp: 4.00 KB",
      "  Not Wireless: 300 B",
      "",
      "Top 5 Clients by Usage:",
      "  1. Phone: 10.00 KB",
      "  2. Laptop: 4.00 KB",
      "  3. aa:02: 300 B",
    ]);
  });

  test("CSV rows follow usage order", async () => {
    const report = await buildClientUsageReport(testContext(usageNetwork()), { org: "Acme", network: "HQ" });
    if (!report) throw new Error("expected a report");

    const lines = clientUsageCsv(report).split("\r\n");
    expect(lines[0]).toBe(
      "Client ID,Description,MAC Address,IP Address,User,OS,Manufacturer,SSID,First Seen,Last Seen,Status,Sent (B),Received (B),Total (B),Sent,Received,Total",
    );
    expect(lines[1]).toBe(
      "k3,Phone,aa:03,Unknown,Unknown,iOS,Unknown,Unknown,Unknown,Unknown,Unknown,2048,8192,10240,2.00 KB,8.00 KB,10.00 KB",
    );
    expect(lines).toHaveLength(5);
  });

  test("saves JSON and CSV", async () => {
    const report = await buildClientUsageReport(testContext(usageNetwork()), { org: "Acme", network: "HQ" });
    if (!report) throw new Error("expected a report");
    const dir = mkdtempSync(join(tmpdir(), "meraki-usage-"));
    try {
      const paths = await saveClientUsageReport(report, dir, FIXED_NOW);
      expect(paths).toEqual([
        join(dir, "meraki_client_usage_20240305_140709.json"),
        join(dir, "meraki_client_usage_20240305_140709.csv"),
      ]);
      expect(JSON.parse(readFileSync(paths[0], "utf-8")).usageByOs.iOS).toBe(10240);
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });
});
