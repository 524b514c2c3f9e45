import { listClientEvents, listNetworkClients } from "../api.js";
import { optStr, str, type JsonRecord } from "../json.js";
import { resolveTarget } from "../resolve.js";
import { CALL_INTERVAL_MS } from "../timing.js";
import { SECONDS_PER_DAY, byValueDesc, countBy, isSkippable } from "./common.js";
import type { ReportContext } from "./context.js";
import { reportFileName, toJsonFile, writeReportFiles } from "./persist.js";

export interface ClientEvent extends JsonRecord {
  clientId: string;
  clientMac: string;
  clientDescription: string;
}

export interface ClientEventsReport {
  organization: string;
  network: string;
  timespanSeconds: number;
  clientCount: number;
  eventCount: number;
  /** Event type → count, largest first */
  eventTypes: [string, number][];
  events: ClientEvent[];
}

export interface ClientEventsOptions {
  org: string;
  network: string;
  timespan?: number;
}

export async function buildClientEventsReport(ctx: ReportContext, opts: ClientEventsOptions): Promise<ClientEventsReport> {
  const timespan = opts.timespan ?? SECONDS_PER_DAY;
  const { network } = await resolveTarget(ctx, opts.org, opts.network);

  ctx.logger.info("Getting clients for network...");
  const clients = await listNetworkClients(ctx.client, network.id, timespan);
  if (!clients.length) {
    ctx.logger.info("No clients found in the network");
  } else {
    ctx.logger.info(`Found ${clients.length} clients`);
  }

  const events: ClientEvent[] = [];
  for (const client of clients) {
    const clientId = str(client, "id", "");
    if (!clientId) continue;
    ctx.logger.info(`Getting events for client: ${optStr(client, "description") ?? clientId}`);

    try {
      for (const event of await listClientEvents(ctx.client, network.id, clientId, timespan)) {
        events.push({
          ...event,
          clientId,
          clientMac: str(client, "mac", "Unknown"),
          clientDescription: str(client, "description", "Unknown"),
        });
      }
      await ctx.sleep(CALL_INTERVAL_MS);
    } catch (err: unknown) {
      if (!isSkippable(err)) throw err;
      ctx.logger.warn(`Error retrieving events for client ${clientId}: ${err.message}`);
    }
  }

  return {
    organization: opts.org,
    network: opts.network,
    timespanSeconds: timespan,
    clientCount: clients.length,
    eventCount: events.length,
    eventTypes: byValueDesc(countBy(events, (e) => str(e, "type", "Unknown"))),
    events,
  };
}

export function clientEventsSummary(report: ClientEventsReport): string[] {
  const lines = [`Success! Found ${report.eventCount} events from ${report.clientCount} clients.`];
  if (report.events.length) {
    lines.push("", "Event Summary:", "-".repeat(60));
    for (const [type, count] of report.eventTypes) lines.push(`${type}: ${count} events`);
  }
  return lines;
}

export async function saveClientEventsReport(report: ClientEventsReport, outputDir: string, now: Date): Promise<string[]> {
  return writeReportFiles(outputDir, {
    [reportFileName("meraki_client_events", "json", now)]: toJsonFile(report),
  });
}
