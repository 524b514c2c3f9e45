import { join } from "node:path";
import {
  getSwitchPorts,
  getTrafficAnalysis,
  getUplinksUsage,
  listNetworkClients,
  listNetworkDevices,
  usageOf,
  type Device,
  type Usage,
} from "../api.js";
import { recordsToCsv, type CsvValue } from "../csv.js";
import { InputError } from "../errors.js";
import { bytesToMegabytes, displayTimestamp } from "../format.js";
import { isRecord, num, records, str, type JsonRecord } from "../json.js";
import { isAppliance, isSwitch } from "../models.js";
import { resolveTarget } from "../resolve.js";
import { byValueDesc, isSkippable, sum, sumBy } from "./common.js";
import type { ReportContext } from "./context.js";
import { reportFileName, toJsonFile, writeReportFiles } from "./persist.js";

export const TRAFFIC_HOURS = [1, 3, 12, 24] as const;
export const TRAFFIC_DIR = "traffic_data";
const UPLINK_TIMESPAN = 3600;

export interface ClientTraffic {
  description: string;
  dhcpHostname: string;
  id: string;
  ip: string;
  mac: string;
  manufacturer: string;
  os: string;
  user: string;
  usage: Usage;
}

export interface DeviceTraffic {
  name: string;
  model: string;
  serial: string;
  usage?: unknown;
  ports?: unknown;
}

export interface TrafficShare {
  label: string;
  bytes: number;
  percent: number;
}

export interface TrafficAnalysis {
  /** Sorted by total usage, largest first */
  clients: ClientTraffic[];
  totalSent: number;
  totalReceived: number;
  total: number;
  byManufacturer: Record<string, number>;
  /** Top five clients plus an `Others` slice when the rest carried traffic */
  share: TrafficShare[];
}

export interface NetworkTrafficReport {
  organization: string;
  network: string;
  networkId: string;
  hours: number;
  clientTraffic: ClientTraffic[];
  applicationTraffic: JsonRecord[];
  deviceTraffic: DeviceTraffic[];
  analysis: TrafficAnalysis;
}

export interface NetworkTrafficOptions {
  org: string;
  network: string;
  hours?: number | string;
}

export function parseHours(raw: number | string | undefined): number {
  if (raw === undefined || raw === "") return 1;
  const n = Number(raw);
  if (!TRAFFIC_HOURS.some((h) => h === n)) {
    throw new InputError(`hours must be one of ${TRAFFIC_HOURS.join(", ")}, got '${raw}'`);
  }
  return n;
}

export function toClientTraffic(client: JsonRecord): ClientTraffic {
  return {
    description: str(client, "description", "Unknown"),
    dhcpHostname: str(client, "dhcpHostname", "Unknown"),
    id: str(client, "id", "Unknown"),
    ip: str(client, "ip", "Unknown"),
    mac: str(client, "mac", "Unknown"),
    manufacturer: str(client, "manufacturer", "Unknown"),
    os: str(client, "os", "Unknown"),
    user: str(client, "user", "Unknown"),
    usage: usageOf(client),
  };
}

export function analyzeTraffic(clients: readonly ClientTraffic[]): TrafficAnalysis {
  const sorted = [...clients].sort((a, b) => b.usage.total - a.usage.total);
  const totalSent = sum(clients, (c) => c.usage.sent);
  const totalReceived = sum(clients, (c) => c.usage.recv);

  const slices = sorted.slice(0, 5).map((c) => ({ label: `${c.description} (${c.ip})`, bytes: c.usage.total }));
  const others = sum(sorted.slice(5), (c) => c.usage.total);
  if (others > 0) slices.push({ label: "Others", bytes: others });
  const sliceTotal = sum(slices, (s) => s.bytes);

  return {
    clients: sorted,
    totalSent,
    totalReceived,
    total: totalSent + totalReceived,
    byManufacturer: sumBy(clients, (c) => c.manufacturer, (c) => c.usage.total),
    share: slices.map((s) => ({
      ...s,
      percent: sliceTotal > 0 ? Math.round((s.bytes / sliceTotal) * 1000) / 10 : 0,
    })),
  };
}

async function clientTraffic(ctx: ReportContext, networkId: string, timespan: number): Promise<ClientTraffic[]> {
  try {
    const clients = await listNetworkClients(ctx.client, networkId, timespan);
    ctx.logger.info(`Found ${clients.length} clients in the network`);
    return clients.map(toClientTraffic);
  } catch (err: unknown) {
    if (!isSkippable(err)) throw err;
    ctx.logger.warn(`Error getting client traffic: ${err.message}`);
    return [];
  }
}

async function applicationTraffic(ctx: ReportContext, networkId: string): Promise<JsonRecord[]> {
  try {
    const analysis = await getTrafficAnalysis(ctx.client, networkId);
    if (!isRecord(analysis) || !("applicationUsage" in analysis)) {
      ctx.logger.info("Application traffic data not available for this network");
      return [];
    }
    return records(analysis.applicationUsage);
  } catch (err: unknown) {
    if (!isSkippable(err)) throw err;
    ctx.logger.warn(`Error getting application traffic: ${err.message}`);
    return [];
  }
}

async function deviceTraffic(ctx: ReportContext, networkId: string): Promise<DeviceTraffic[]> {
  let devices: Device[];
  try {
    devices = await listNetworkDevices(ctx.client, networkId);
  } catch (err: unknown) {
    if (!isSkippable(err)) throw err;
    ctx.logger.warn(`Error getting device traffic: ${err.message}`);
    return [];
  }

  const result: DeviceTraffic[] = [];
  for (const device of devices) {
    const base = { name: device.name ?? device.serial, model: device.model, serial: device.serial };
    try {
      if (isAppliance(device.model)) {
        result.push({ ...base, usage: await getUplinksUsage(ctx.client, device.serial, UPLINK_TIMESPAN) });
      } else if (isSwitch(device.model)) {
        result.push({ ...base, ports: await getSwitchPorts(ctx.client, device.serial) });
      }
    } catch (err: unknown) {
      if (!isSkippable(err)) throw err;
      ctx.logger.warn(`Could not get traffic data for device ${base.name}: ${err.message}`);
    }
  }
  return result;
}

export async function buildNetworkTrafficReport(
  ctx: ReportContext,
  opts: NetworkTrafficOptions,
): Promise<NetworkTrafficReport> {
  const hours = parseHours(opts.hours);
  const { network } = await resolveTarget(ctx, opts.org, opts.network);
  ctx.logger.info(`Gathering traffic data for the past ${hours} hour(s)...`);
  const timespan = hours * 3600;

  ctx.logger.info("Fetching client traffic data...");
  const clients = await clientTraffic(ctx, network.id, timespan);
  ctx.logger.info("Fetching application traffic data...");
  const apps = await applicationTraffic(ctx, network.id);
  ctx.logger.info("Fetching device traffic data...");
  const devices = await deviceTraffic(ctx, network.id);

  return {
    organization: opts.org,
    network: opts.network,
    networkId: network.id,
    hours,
    clientTraffic: clients,
    applicationTraffic: apps,
    deviceTraffic: devices,
    analysis: analyzeTraffic(clients),
  };
}

export const CLIENT_TRAFFIC_COLUMNS = [
  "Description",
  "Hostname",
  "IP",
  "MAC",
  "Manufacturer",
  "OS",
  "User",
  "Sent (MB)",
  "Received (MB)",
  "Total (MB)",
] as const;

export function clientTrafficCsv(analysis: TrafficAnalysis): string {
  return recordsToCsv(
    CLIENT_TRAFFIC_COLUMNS,
    analysis.clients.map((c) => ({
      Description: c.description,
      Hostname: c.dhcpHostname,
      IP: c.ip,
      MAC: c.mac,
      Manufacturer: c.manufacturer,
      OS: c.os,
      User: c.user,
      "Sent (MB)": bytesToMegabytes(c.usage.sent),
      "Received (MB)": bytesToMegabytes(c.usage.recv),
      "Total (MB)": bytesToMegabytes(c.usage.total),
    })),
  );
}

export const APP_TRAFFIC_COLUMNS = ["Application", "Category", "Received (MB)", "Sent (MB)", "Total (MB)"] as const;

/** Rows without an application name or both counters are left out */
export function appTrafficCsv(apps: readonly JsonRecord[]): string {
  const rows: Record<string, CsvValue>[] = [];
  for (const app of apps) {
    if (!("application" in app && "received" in app && "sent" in app)) continue;
    const received = num(app, "received");
    const sent = num(app, "sent");
    rows.push({
      Application: str(app, "application", ""),
      Category: str(app, "category", "Unknown"),
      "Received (MB)": bytesToMegabytes(received),
      "Sent (MB)": bytesToMegabytes(sent),
      "Total (MB)": bytesToMegabytes(received + sent),
    });
  }
  return recordsToCsv(APP_TRAFFIC_COLUMNS, rows);
}

export function trafficSummaryText(analysis: TrafficAnalysis, now: Date): string {
  const lines = [
    `Network Traffic Summary - ${displayTimestamp(now)}`,
    "=".repeat(80),
    "",
    "Total Traffic:",
    `  Sent: ${bytesToMegabytes(analysis.totalSent)} MB`,
    `  Received: ${bytesToMegabytes(analysis.totalReceived)} MB`,
    `  Total: ${bytesToMegabytes(analysis.total)} MB`,
    "",
    "Top 10 Clients by Traffic:",
  ];
  analysis.clients.slice(0, 10).forEach((c, i) => {
    lines.push(`  ${i + 1}. ${c.description} (${c.ip}): ${bytesToMegabytes(c.usage.total)} MB`);
  });
  lines.push("", "Traffic by Manufacturer:");
  for (const [maker, bytes] of byValueDesc(analysis.byManufacturer)) {
    lines.push(`  ${maker}: ${bytesToMegabytes(bytes)} MB`);
  }
  lines.push("", "Traffic Share:");
  for (const slice of analysis.share) lines.push(`  ${slice.label}: ${slice.percent.toFixed(1)}%`);
  return lines.join("\n") + "\n";
}

/** Files go under `<outputDir>/traffic_data/`; the app CSV is only written when there is application data */
export async function saveNetworkTrafficReport(
  report: NetworkTrafficReport,
  outputDir: string,
  now: Date,
): Promise<string[]> {
  const files: Record<string, string> = {};
  if (report.clientTraffic.length) {
    files[reportFileName("client_traffic", "csv", now)] = clientTrafficCsv(report.analysis);
    files[reportFileName("client_traffic_summary", "txt", now)] = trafficSummaryText(report.analysis, now);
  }
  if (report.applicationTraffic.length) {
    files[reportFileName("app_traffic", "csv", now)] = appTrafficCsv(report.applicationTraffic);
  }
  files[reportFileName("raw_traffic_data", "json", now)] = toJsonFile({
    clientTraffic: report.clientTraffic,
    applicationTraffic: report.applicationTraffic,
    deviceTraffic: report.deviceTraffic,
  });
  return writeReportFiles(join(outputDir, TRAFFIC_DIR), files);
}
