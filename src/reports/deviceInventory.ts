import { listNetworkDevices, listNetworks, listOrganizations } from "../api.js";
import { localIsoTimestamp } from "../format.js";
import { CALL_INTERVAL_MS } from "../timing.js";
import { isSkippable } from "./common.js";
import type { ReportContext } from "./context.js";
import { reportFileName, toJsonFile, writeReportFiles } from "./persist.js";

export interface InventoryDevice {
  name: string;
  model: string;
  serial: string;
  mac: string;
  firmware: string;
  status: "Online" | "Offline";
  network: string;
  networkId: string;
}

export interface OrganizationInventory {
  id: string;
  name: string;
  totalDevices: number;
  devices: InventoryDevice[];
  /** Set when the organization's networks or devices could not be read */
  error?: string;
}

export interface DeviceInventoryReport {
  timestamp: string;
  totalOrganizations: number;
  totalDevices: number;
  organizations: OrganizationInventory[];
}

export async function buildDeviceInventory(ctx: ReportContext): Promise<DeviceInventoryReport> {
  const organizations = await listOrganizations(ctx.client);
  if (!organizations.length) ctx.logger.info("No organizations found for this API key.");

  const result: OrganizationInventory[] = [];
  for (const org of organizations) {
    ctx.logger.info(`Fetching devices for organization: ${org.name} (ID: ${org.id})`);
    const devices: InventoryDevice[] = [];
    try {
      for (const network of await listNetworks(ctx.client, org.id)) {
        ctx.logger.info(`Devices in network: ${network.name} (ID: ${network.id})`);
        for (const d of await listNetworkDevices(ctx.client, network.id)) {
          devices.push({
            name: d.name ?? "Unnamed",
            model: d.model || "Unknown",
            serial: d.serial || "N/A",
            mac: d.mac ?? "N/A",
            firmware: d.firmware ?? "Unknown",
            status: d.status === "online" ? "Online" : "Offline",
            network: network.name,
            networkId: network.id,
          });
        }
        await ctx.sleep(CALL_INTERVAL_MS);
      }
    } catch (err: unknown) {
      if (!isSkippable(err)) throw err;
      ctx.logger.warn(`Error retrieving devices for ${org.name}: ${err.message}`);
      result.push({ id: org.id, name: org.name, totalDevices: 0, devices: [], error: err.message });
      continue;
    }
    result.push({ id: org.id, name: org.name, totalDevices: devices.length, devices });
  }

  return {
    timestamp: localIsoTimestamp(ctx.now()),
    totalOrganizations: result.length,
    totalDevices: result.reduce((n, o) => n + o.totalDevices, 0),
    organizations: result,
  };
}

export function deviceInventorySummary(report: DeviceInventoryReport): string[] {
  const lines: string[] = [];
  for (const org of report.organizations) {
    lines.push(`Organization: ${org.name} (ID: ${org.id})`);
    if (org.error) {
      lines.push(`  Error: ${org.error}`, "");
      continue;
    }
    for (const d of org.devices) {
      lines.push(
        `- ${d.name} (${d.model})`,
        `  Serial: ${d.serial}`,
        `  MAC: ${d.mac}`,
        `  Firmware: ${d.firmware}`,
        `  Status: ${d.status}`,
      );
    }
    lines.push(
      org.totalDevices ? `Total devices found in '${org.name}': ${org.totalDevices}` : `No devices found in '${org.name}'.`,
      "",
    );
  }
  return lines;
}

export async function saveDeviceInventory(report: DeviceInventoryReport, outputDir: string, now: Date): Promise<string[]> {
  return writeReportFiles(outputDir, {
    [reportFileName("meraki_devices", "json", now)]: toJsonFile(report),
  });
}
