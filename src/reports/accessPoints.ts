import {
  getConnectionStats,
  getLatencyStats,
  getWirelessStatus,
  listDeviceClients,
  listNetworkDevices,
  usageOf,
} from "../api.js";
import { recordsToCsv } from "../csv.js";
import { NotFoundError } from "../errors.js";
import { fixed, localIsoTimestamp } from "../format.js";
import { str, type JsonRecord } from "../json.js";
import { isAccessPoint } from "../models.js";
import { resolveTarget } from "../resolve.js";
import { CALL_INTERVAL_MS } from "../timing.js";
import {
  SECONDS_PER_DAY,
  countBy,
  isSkippable,
  parsePositiveInt,
  sum,
  trafficTotals,
  type TrafficTotals,
} from "./common.js";
import type { ReportContext } from "./context.js";
import { reportFileName, toJsonFile, writeReportFiles } from "./persist.js";

/** Clients seen in the last five minutes count as "current" */
const CURRENT_CLIENTS_TIMESPAN = 300;

export interface AccessPointDetail {
  name: string;
  serial: string;
  model: string;
  mac: string;
  tags: string[];
  lanIp: string;
  firmware: string;
  networkId: string;
  status: string;
  lastReportedAt: string;
  wirelessStatus: {
    status: string;
    connectionStats: unknown;
    latencyStats: unknown;
  };
  currentClients: number;
  currentClientsDetails: JsonRecord[];
  currentTraffic: TrafficTotals;
}

export interface AccessPointReport {
  organization: string;
  network: string;
  timespanDays: number;
  timestamp: string;
  totalAccessPoints: number;
  totalClients: number;
  totalTraffic: TrafficTotals;
  apStatusSummary: Record<string, number>;
  apModelSummary: Record<string, number>;
  accessPoints: AccessPointDetail[];
}

export interface AccessPointOptions {
  org: string;
  network: string;
  days?: number | string;
}

export async function buildAccessPointReport(ctx: ReportContext, opts: AccessPointOptions): Promise<AccessPointReport> {
  const days = parsePositiveInt(opts.days, "days", 7);
  const { network } = await resolveTarget(ctx, opts.org, opts.network);

  ctx.logger.info("Getting devices in the network...");
  const accessPoints = (await listNetworkDevices(ctx.client, network.id)).filter((d) => isAccessPoint(d.model));
  if (!accessPoints.length) throw new NotFoundError("No access points found in the network");
  ctx.logger.info(`Found ${accessPoints.length} access points`);

  const timespan = days * SECONDS_PER_DAY;
  const details: AccessPointDetail[] = [];

  for (const ap of accessPoints) {
    if (!ap.serial) continue;
    ctx.logger.info(`Getting details for AP: ${ap.name ?? ap.serial}`);

    try {
      const status = await getWirelessStatus(ctx.client, ap.serial);
      const clients = await listDeviceClients(ctx.client, ap.serial, CURRENT_CLIENTS_TIMESPAN);
      const connectionStats = await getConnectionStats(ctx.client, ap.serial, timespan);
      const latencyStats = await getLatencyStats(ctx.client, ap.serial, timespan);

      const sent = sum(clients, (c) => usageOf(c).sent);
      const received = sum(clients, (c) => usageOf(c).recv);

      details.push({
        name: ap.name ?? "Unnamed",
        serial: ap.serial,
        model: ap.model || "Unknown",
        mac: ap.mac ?? "Unknown",
        tags: ap.tags,
        lanIp: ap.lanIp ?? "Unknown",
        firmware: ap.firmware ?? "Unknown",
        networkId: ap.networkId ?? "Unknown",
        status: ap.status ?? "Unknown",
        lastReportedAt: ap.lastReportedAt ?? "Unknown",
        wirelessStatus: {
          status: str(status, "status", "Unknown"),
          connectionStats,
          latencyStats,
        },
        currentClients: clients.length,
        currentClientsDetails: clients,
        currentTraffic: trafficTotals(sent, received),
      });

      await ctx.sleep(CALL_INTERVAL_MS);
    } catch (err: unknown) {
      if (!isSkippable(err)) throw err;
      ctx.logger.warn(`Error retrieving details for AP ${ap.serial}: ${err.message}`);
    }
  }

  return {
    organization: opts.org,
    network: opts.network,
    timespanDays: days,
    timestamp: localIsoTimestamp(ctx.now()),
    totalAccessPoints: details.length,
    totalClients: sum(details, (ap) => ap.currentClients),
    totalTraffic: trafficTotals(
      sum(details, (ap) => ap.currentTraffic.sent),
      sum(details, (ap) => ap.currentTraffic.received),
    ),
    apStatusSummary: countBy(details, (ap) => ap.status),
    apModelSummary: countBy(details, (ap) => ap.model),
    accessPoints: details,
  };
}

export const AP_CSV_COLUMNS = [
  "Name",
  "Serial",
  "Model",
  "MAC Address",
  "LAN IP",
  "Status",
  "Firmware",
  "Current Clients",
  "Current Traffic (Sent)",
  "Current Traffic (Received)",
  "Current Traffic (Total)",
  "Last Reported",
] as const;

export function accessPointCsv(report: AccessPointReport): string {
  return recordsToCsv(
    AP_CSV_COLUMNS,
    report.accessPoints.map((ap) => ({
      Name: ap.name,
      Serial: ap.serial,
      Model: ap.model,
      "MAC Address": ap.mac,
      "LAN IP": ap.lanIp,
      Status: ap.status,
      Firmware: ap.firmware,
      "Current Clients": ap.currentClients,
      "Current Traffic (Sent)": ap.currentTraffic.sentHuman,
      "Current Traffic (Received)": ap.currentTraffic.receivedHuman,
      "Current Traffic (Total)": ap.currentTraffic.totalHuman,
      "Last Reported": ap.lastReportedAt,
    })),
  );
}

export function accessPointSummary(report: AccessPointReport): string[] {
  const lines = [`Success! Found ${report.totalAccessPoints} access points.`, "", "Access Point Status Summary:"];
  for (const [status, count] of Object.entries(report.apStatusSummary)) lines.push(`  ${status}: ${count} APs`);
  lines.push("", "Access Point Model Summary:");
  for (const [model, count] of Object.entries(report.apModelSummary)) lines.push(`  ${model}: ${count} APs`);
  lines.push(
    "",
    `Total Connected Clients: ${report.totalClients}`,
    "",
    "Current Traffic:",
    `  Sent:     ${report.totalTraffic.sentHuman}`,
    `  Received: ${report.totalTraffic.receivedHuman}`,
    `  Total:    ${report.totalTraffic.totalHuman}`,
    "",
    "Access Point Details:",
    "-".repeat(60),
    `${fixed("Name", 20)} ${fixed("Model", 10)} ${fixed("Status", 10)} ${fixed("Clients", 8)} Traffic`,
    "-".repeat(60),
  );

  const sorted = [...report.accessPoints].sort((a, b) => b.currentClients - a.currentClients);
  for (const ap of sorted) {
    lines.push(
      `${fixed(ap.name, 20)} ${ap.model.padEnd(10)} ${ap.status.padEnd(10)} ${String(ap.currentClients).padEnd(8)} ${ap.currentTraffic.totalHuman}`,
    );
  }
  return lines;
}

export async function saveAccessPointReport(report: AccessPointReport, outputDir: string, now: Date): Promise<string[]> {
  return writeReportFiles(outputDir, {
    [reportFileName("meraki_ap_status", "json", now)]: toJsonFile(report),
    [reportFileName("meraki_ap_status", "csv", now)]: accessPointCsv(report),
  });
}
