// Typed accessors over the command registry. Responses are narrowed from
// untyped JSON; fields the reports need get typed, the rest stays in `raw`.

import type { MerakiTransport } from "./client.js";
import { findCommand } from "./commands.js";
import { executeAllPages, executeCommand } from "./execute.js";
import { isRecord, optNum, optStr, record, records, str, strings, num, type JsonRecord } from "./json.js";

export interface Organization {
  id: string;
  name: string;
}

export interface Network {
  id: string;
  name: string;
  organizationId?: string;
  productTypes: string[];
}

export interface Device {
  serial: string;
  name?: string;
  model: string;
  mac?: string;
  status?: string;
  firmware?: string;
  lanIp?: string;
  networkId?: string;
  lastReportedAt?: string;
  tags: string[];
  raw: JsonRecord;
}

export interface Ssid {
  number?: number;
  name?: string;
  enabled: boolean;
  authMode?: string;
}

export interface Usage {
  sent: number;
  recv: number;
  total: number;
}

function call(
  client: MerakiTransport,
  operationId: string,
  args: Record<string, string>,
  extraQuery: Record<string, string> = {},
  body?: unknown,
): Promise<unknown> {
  return executeCommand(findCommand(operationId), { args, extraQuery, body }, client);
}

function callAll(
  client: MerakiTransport,
  operationId: string,
  args: Record<string, string>,
  extraQuery: Record<string, string> = {},
): Promise<unknown> {
  return executeAllPages(findCommand(operationId), { args, extraQuery }, client);
}

// ── Parsers ──────────────────────────────────────────────────────────

export function toOrganization(rec: JsonRecord): Organization {
  return { id: str(rec, "id", ""), name: str(rec, "name", "") };
}

export function toNetwork(rec: JsonRecord): Network {
  return {
    id: str(rec, "id", ""),
    name: str(rec, "name", ""),
    organizationId: optStr(rec, "organizationId"),
    productTypes: strings(rec, "productTypes"),
  };
}

export function toDevice(rec: JsonRecord): Device {
  return {
    serial: str(rec, "serial", ""),
    name: optStr(rec, "name"),
    model: str(rec, "model", ""),
    mac: optStr(rec, "mac"),
    status: optStr(rec, "status"),
    firmware: optStr(rec, "firmware"),
    lanIp: optStr(rec, "lanIp"),
    networkId: optStr(rec, "networkId"),
    lastReportedAt: optStr(rec, "lastReportedAt"),
    tags: strings(rec, "tags"),
    raw: rec,
  };
}

export function toSsid(rec: JsonRecord): Ssid {
  return {
    number: optNum(rec, "number"),
    name: optStr(rec, "name"),
    enabled: rec.enabled === true,
    authMode: optStr(rec, "authMode"),
  };
}

/** The `usage` counters of a client; missing values count as 0 */
export function usageOf(rec: JsonRecord): Usage {
  const usage = record(rec, "usage");
  return { sent: num(usage, "sent"), recv: num(usage, "recv"), total: num(usage, "total") };
}

// ── Organizations & networks ─────────────────────────────────────────

export async function listOrganizations(client: MerakiTransport): Promise<Organization[]> {
  return records(await call(client, "getOrganizations", {})).map(toOrganization);
}

export async function getOrganizationSummary(client: MerakiTransport, organizationId: string): Promise<unknown> {
  return call(client, "getOrganizationSummary", { organizationId });
}

export async function listNetworks(client: MerakiTransport, organizationId: string): Promise<Network[]> {
  return records(await callAll(client, "getOrganizationNetworks", { organizationId })).map(toNetwork);
}

export async function listNetworkDevices(client: MerakiTransport, networkId: string): Promise<Device[]> {
  return records(await call(client, "getNetworkDevices", { networkId })).map(toDevice);
}

export async function getNetworkTraffic(
  client: MerakiTransport,
  networkId: string,
  timespan: number,
): Promise<JsonRecord[]> {
  return records(await call(client, "getNetworkTraffic", { networkId }, { timespan: String(timespan) }));
}

export async function getTrafficAnalysis(client: MerakiTransport, networkId: string): Promise<unknown> {
  return call(client, "getNetworkTrafficAnalysis", { networkId });
}

// ── Clients ──────────────────────────────────────────────────────────

export async function listNetworkClients(
  client: MerakiTransport,
  networkId: string,
  timespan: number,
): Promise<JsonRecord[]> {
  return records(await callAll(client, "getNetworkClients", { networkId }, { timespan: String(timespan) }));
}

/** Events of one client; accepts both `{ events: [...] }` and a bare array */
export async function listClientEvents(
  client: MerakiTransport,
  networkId: string,
  clientId: string,
  timespan: number,
): Promise<JsonRecord[]> {
  const result = await call(client, "getNetworkClientEvents", { networkId, clientId }, { timespan: String(timespan) });
  if (isRecord(result)) return records(result.events);
  return records(result);
}

// ── Devices ──────────────────────────────────────────────────────────

export async function listDeviceClients(
  client: MerakiTransport,
  serial: string,
  timespan: number,
): Promise<JsonRecord[]> {
  return records(await call(client, "getDeviceClients", { serial }, { timespan: String(timespan) }));
}

// ── Wireless ─────────────────────────────────────────────────────────

export async function listSsids(client: MerakiTransport, networkId: string): Promise<Ssid[]> {
  return records(await call(client, "getNetworkWirelessSsids", { networkId })).map(toSsid);
}

export async function getWirelessStatus(client: MerakiTransport, serial: string): Promise<JsonRecord> {
  const result = await call(client, "getDeviceWirelessStatus", { serial });
  return isRecord(result) ? result : {};
}

export async function getConnectionStats(client: MerakiTransport, serial: string, timespan: number): Promise<unknown> {
  return call(client, "getDeviceWirelessConnectionStats", { serial }, { timespan: String(timespan) });
}

export async function getLatencyStats(client: MerakiTransport, serial: string, timespan: number): Promise<unknown> {
  return call(client, "getDeviceWirelessLatencyStats", { serial }, { timespan: String(timespan) });
}

// ── Switch ───────────────────────────────────────────────────────────

export async function getSwitchPorts(client: MerakiTransport, serial: string): Promise<unknown> {
  return call(client, "getDeviceSwitchPorts", { serial });
}

export async function getRoutingInterfaces(client: MerakiTransport, serial: string): Promise<unknown> {
  return call(client, "getDeviceSwitchRoutingInterfaces", { serial });
}

export async function getStaticRoutes(client: MerakiTransport, serial: string): Promise<unknown> {
  return call(client, "getDeviceSwitchRoutingStaticRoutes", { serial });
}

export async function getSwitchAcls(client: MerakiTransport, networkId: string): Promise<unknown> {
  return call(client, "getNetworkSwitchAccessControlLists", { networkId });
}

// ── Appliance ────────────────────────────────────────────────────────

export async function getVpnStatus(client: MerakiTransport, networkId: string): Promise<unknown> {
  return call(client, "getNetworkApplianceVpnStatus", { networkId });
}

export async function getUplinksUsage(client: MerakiTransport, serial: string, timespan: number): Promise<unknown> {
  return call(client, "getDeviceApplianceUplinksUsage", { serial }, { timespan: String(timespan) });
}

// ── Traffic shaping ──────────────────────────────────────────────────

export async function getTrafficShaping(client: MerakiTransport, networkId: string): Promise<JsonRecord> {
  const result = await call(client, "getNetworkTrafficShaping", { networkId });
  return isRecord(result) ? result : {};
}

export async function updateTrafficShaping(
  client: MerakiTransport,
  networkId: string,
  body: JsonRecord,
): Promise<unknown> {
  return call(client, "updateNetworkTrafficShaping", { networkId }, {}, body);
}
