import { listNetworkClients, usageOf, type Usage } from "../api.js";
import { recordsToCsv } from "../csv.js";
import { bytesToHuman } from "../format.js";
import { str, type JsonRecord } from "../json.js";
import { resolveTarget } from "../resolve.js";
import { SECONDS_PER_DAY, byValueDesc, parsePositiveInt, sum, sumBy } from "./common.js";
import type { ReportContext } from "./context.js";
import { reportFileName, toJsonFile, writeReportFiles } from "./persist.js";

export const NOT_WIRELESS = "Not Wireless";

export interface ClientUsage {
  id: string;
  description: string;
  mac: string;
  ip: string;
  user: string;
  firstSeen: string;
  lastSeen: string;
  manufacturer: string;
  os: string;
  usage: Usage;
  status: string;
  ssid: string;
}

export interface UsageTotals {
  sentBytes: number;
  receivedBytes: number;
  totalBytes: number;
  sentHuman: string;
  receivedHuman: string;
  totalHuman: string;
}

export interface ClientUsageReport {
  organization: string;
  network: string;
  timespanDays: number;
  totalClients: number;
  totalUsage: UsageTotals;
  usageByOs: Record<string, number>;
  usageBySsid: Record<string, number>;
  /** Sorted by total usage, largest first */
  clients: ClientUsage[];
}

export interface ClientUsageOptions {
  org: string;
  network: string;
  days?: number | string;
}

export function toClientUsage(client: JsonRecord): ClientUsage {
  return {
    id: str(client, "id", "Unknown"),
    description: str(client, "description", "Unknown"),
    mac: str(client, "mac", "Unknown"),
    ip: str(client, "ip", "Unknown"),
    user: str(client, "user", "Unknown"),
    firstSeen: str(client, "firstSeen", "Unknown"),
    lastSeen: str(client, "lastSeen", "Unknown"),
    manufacturer: str(client, "manufacturer", "Unknown"),
    os: str(client, "os", "Unknown"),
    usage: usageOf(client),
    status: str(client, "status", "Unknown"),
    ssid: "ssid" in client ? str(client, "ssid", "Unknown") : NOT_WIRELESS,
  };
}

const osBucket = (c: ClientUsage) => (c.os === "Unknown" ? "Other" : c.os);
const ssidBucket = (c: ClientUsage) => (c.ssid === "Unknown" || c.ssid === "" ? "Other" : c.ssid);

/** Returns undefined when the network had no clients in the period */
export async function buildClientUsageReport(
  ctx: ReportContext,
  opts: ClientUsageOptions,
): Promise<ClientUsageReport | undefined> {
  const days = parsePositiveInt(opts.days, "days", 7);
  const { network } = await resolveTarget(ctx, opts.org, opts.network);

  ctx.logger.info(`Getting client usage data for the past ${days} days...`);
  const raw = await listNetworkClients(ctx.client, network.id, days * SECONDS_PER_DAY);
  if (!raw.length) {
    ctx.logger.info("No clients found in the network for the specified time period");
    return undefined;
  }
  ctx.logger.info(`Found ${raw.length} clients`);

  const clients = raw.map(toClientUsage).sort((a, b) => b.usage.total - a.usage.total);
  const sent = sum(clients, (c) => c.usage.sent);
  const received = sum(clients, (c) => c.usage.recv);
  const total = sum(clients, (c) => c.usage.total);

  return {
    organization: opts.org,
    network: opts.network,
    timespanDays: days,
    totalClients: raw.length,
    totalUsage: {
      sentBytes: sent,
      receivedBytes: received,
      totalBytes: total,
      sentHuman: bytesToHuman(sent),
      receivedHuman: bytesToHuman(received),
      totalHuman: bytesToHuman(total),
    },
    usageByOs: sumBy(clients, osBucket, (c) => c.usage.total),
    usageBySsid: sumBy(clients, ssidBucket, (c) => c.usage.total),
    clients,
  };
}

export const USAGE_CSV_COLUMNS = [
  "Client ID",
  "Description",
  "MAC Address",
  "IP Address",
  "User",
  "OS",
  "Manufacturer",
  "SSID",
  "First Seen",
  "Last Seen",
  "Status",
  "Sent (B)",
  "Received (B)",
  "Total (B)",
  "Sent",
  "Received",
  "Total",
] as const;

export function clientUsageCsv(report: ClientUsageReport): string {
  return recordsToCsv(
    USAGE_CSV_COLUMNS,
    report.clients.map((c) => ({
      "Client ID": c.id,
      Description: c.description,
      "MAC Address": c.mac,
      "IP Address": c.ip,
      User: c.user,
      OS: c.os,
      Manufacturer: c.manufacturer,
      SSID: c.ssid,
      "First Seen": c.firstSeen,
      "Last Seen": c.lastSeen,
      Status: c.status,
      "Sent (B)": c.usage.sent,
      "Received (B)": c.usage.recv,
      "Total (B)": c.usage.total,
      Sent: bytesToHuman(c.usage.sent),
      Received: bytesToHuman(c.usage.recv),
      Total: bytesToHuman(c.usage.total),
    })),
  );
}

export function clientUsageSummary(report: ClientUsageReport): string[] {
  const lines = [
    `Success! Found ${report.totalClients} clients.`,
    "",
    "Total Network Usage:",
    `  Sent:     ${report.totalUsage.sentHuman}`,
    `  Received: ${report.totalUsage.receivedHuman}`,
    `  Total:    ${report.totalUsage.totalHuman}`,
    "",
    "Usage by Operating System:",
  ];
  for (const [os, bytes] of byValueDesc(report.usageByOs)) lines.push(`  ${os}: ${bytesToHuman(bytes)}`);
  lines.push("", "Usage by SSID/Connection:");
  for (const [ssid, bytes] of byValueDesc(report.usageBySsid)) lines.push(`  ${ssid}: ${bytesToHuman(bytes)}`);
  lines.push("", "Top 5 Clients by Usage:");
  report.clients.slice(0, 5).forEach((c, i) => {
    const label = c.description !== "Unknown" ? c.description : c.mac;
    lines.push(`  ${i + 1}. ${label}: ${bytesToHuman(c.usage.total)}`);
  });
  return lines;
}

export async function saveClientUsageReport(report: ClientUsageReport, outputDir: string, now: Date): Promise<string[]> {
  return writeReportFiles(outputDir, {
    [reportFileName("meraki_client_usage", "json", now)]: toJsonFile(report),
    [reportFileName("meraki_client_usage", "csv", now)]: clientUsageCsv(report),
  });
}
