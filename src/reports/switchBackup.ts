import { join } from "node:path";
import { getRoutingInterfaces, getStaticRoutes, getSwitchAcls, getSwitchPorts, listNetworkDevices } from "../api.js";
import { NotFoundError } from "../errors.js";
import { displayTimestamp, safeFileName } from "../format.js";
import type { JsonRecord } from "../json.js";
import { isSwitch } from "../models.js";
import { resolveTarget } from "../resolve.js";
import { CALL_INTERVAL_MS } from "../timing.js";
import { isSkippable } from "./common.js";
import type { ReportContext } from "./context.js";
import { reportFileName, writeReportFiles } from "./persist.js";

export const SWITCH_CONFIG_DIR = "switch_configs";

export interface SwitchConfig {
  name: string;
  serial: string;
  deviceInfo: JsonRecord;
  routingInterfaces: unknown;
  ports: unknown;
  staticRoutes?: unknown;
  acls?: unknown;
  backupDate: string;
}

export interface SwitchBackup {
  organization: string;
  network: string;
  switches: SwitchConfig[];
}

export interface SwitchBackupOptions {
  org: string;
  network: string;
}

export async function buildSwitchBackup(ctx: ReportContext, opts: SwitchBackupOptions): Promise<SwitchBackup> {
  const { network } = await resolveTarget(ctx, opts.org, opts.network);
  const switches = (await listNetworkDevices(ctx.client, network.id)).filter((d) => isSwitch(d.model));
  if (!switches.length) throw new NotFoundError("No switches found in the network");
  ctx.logger.info(`Found ${switches.length} switches in the network.`);

  const configs: SwitchConfig[] = [];
  for (const sw of switches) {
    const name = sw.name ?? sw.serial;
    ctx.logger.info(`Backing up configuration for switch: ${name} (${sw.serial})`);

    try {
      const config: SwitchConfig = {
        name,
        serial: sw.serial,
        deviceInfo: sw.raw,
        routingInterfaces: await getRoutingInterfaces(ctx.client, sw.serial),
        ports: await getSwitchPorts(ctx.client, sw.serial),
        backupDate: displayTimestamp(ctx.now()),
      };

      try {
        config.staticRoutes = await getStaticRoutes(ctx.client, sw.serial);
      } catch (err: unknown) {
        if (!isSkippable(err)) throw err;
        ctx.logger.info(`  Note: No static routes available for ${name}`);
      }
      try {
        config.acls = await getSwitchAcls(ctx.client, network.id);
      } catch (err: unknown) {
        if (!isSkippable(err)) throw err;
        ctx.logger.info("  Note: No ACLs available for network");
      }

      configs.push(config);
      await ctx.sleep(CALL_INTERVAL_MS);
    } catch (err: unknown) {
      if (!isSkippable(err)) throw err;
      ctx.logger.warn(`Error getting configuration for ${name}: ${err.message}`);
    }
  }

  return { organization: opts.org, network: opts.network, switches: configs };
}

function infoValue(value: unknown): string {
  return typeof value === "string" ? value : JSON.stringify(value);
}

function section(title: string, data: unknown): string[] {
  return [`${title}:`, "-".repeat(80), JSON.stringify(data, null, 4), ""];
}

export function switchConfigText(config: SwitchConfig, backup: Pick<SwitchBackup, "organization" | "network">): string {
  const lines = [
    `Configuration for ${config.name} (${config.serial})`,
    `Backup Date: ${config.backupDate}`,
    `Network: ${backup.network}`,
    `Organization: ${backup.organization}`,
    "=".repeat(80),
    "",
    "DEVICE INFORMATION:",
    "-".repeat(80),
    ...Object.entries(config.deviceInfo).map(([key, value]) => `${key}: ${infoValue(value)}`),
    "",
    ...section("ROUTING INTERFACES", config.routingInterfaces),
    ...section("PORT CONFIGURATIONS", config.ports),
  ];
  if (config.staticRoutes !== undefined) lines.push(...section("STATIC ROUTES", config.staticRoutes));
  if (config.acls !== undefined) lines.push(...section("ACCESS CONTROL LISTS", config.acls));
  return lines.join("\n") + "\n";
}

export function switchConfigFileName(config: SwitchConfig, now: Date): string {
  return reportFileName(`${safeFileName(config.name)}_${config.serial}`, "txt", now);
}

/** One text file per switch under `<outputDir>/switch_configs/` */
export async function saveSwitchBackup(backup: SwitchBackup, outputDir: string, now: Date): Promise<string[]> {
  const files: Record<string, string> = {};
  for (const config of backup.switches) files[switchConfigFileName(config, now)] = switchConfigText(config, backup);
  return writeReportFiles(join(outputDir, SWITCH_CONFIG_DIR), files);
}
