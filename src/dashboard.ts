// Aggregations behind the dashboard JSON API.

import type { Device, Network } from "./api.js";
import { InputError } from "./errors.js";
import { num, optStr, type JsonRecord } from "./json.js";
import { classifyDevice, isAccessPoint } from "./models.js";
import { countBy } from "./reports/common.js";

/** Networks sampled for device counts on the overview */
export const OVERVIEW_SAMPLE = 5;

export const TIME_RANGES = {
  hour: 3600,
  "3h": 10800,
  "12h": 43200,
  day: 86400,
  week: 604800,
} as const;

export type TimeRange = keyof typeof TIME_RANGES;

const isTimeRange = (name: string): name is TimeRange => Object.hasOwn(TIME_RANGES, name);

export function timeRange(name: string): number {
  if (!isTimeRange(name)) {
    throw new InputError(`Unknown time range '${name}'. Use one of: ${Object.keys(TIME_RANGES).join(", ")}`);
  }
  return TIME_RANGES[name];
}

export const isWirelessNetwork = (network: Network) =>
  network.productTypes.some((t) => t.toLowerCase() === "wireless");

export const deviceStatus = (device: Device) => (device.status === "online" ? "Online" : "Offline");

export interface Overview {
  totalNetworks: number;
  wirelessNetworks: number;
  /** Counted over the sampled networks only */
  totalDevices: number;
  accessPoints: number;
  sampledNetworks: number;
  networksByProductType: Record<string, number>;
  devicesByStatus: Record<string, number>;
}

/** `devicesByNetwork` holds the devices of the networks that were sampled */
export function buildOverview(networks: readonly Network[], devicesByNetwork: ReadonlyMap<string, Device[]>): Overview {
  const devices = [...devicesByNetwork.values()].flat();
  return {
    totalNetworks: networks.length,
    wirelessNetworks: networks.filter(isWirelessNetwork).length,
    totalDevices: devices.length,
    accessPoints: devices.filter((d) => isAccessPoint(d.model)).length,
    sampledNetworks: devicesByNetwork.size,
    networksByProductType: countBy(
      networks.flatMap((n) => n.productTypes),
      (t) => t,
    ),
    devicesByStatus: countBy(devices, deviceStatus),
  };
}

export function overviewSample(networks: readonly Network[]): Network[] {
  return networks.slice(0, OVERVIEW_SAMPLE);
}

export interface DeviceFilter {
  models?: readonly string[];
  search?: string;
}

export function filterDevices(devices: readonly Device[], filter: DeviceFilter): Device[] {
  const models = new Set(filter.models ?? []);
  const needle = filter.search?.trim().toLowerCase() ?? "";
  return devices.filter((d) => {
    if (models.size && !models.has(d.model)) return false;
    if (!needle) return true;
    return (d.name ?? "").toLowerCase().includes(needle) || d.serial.toLowerCase().includes(needle);
  });
}

export interface DeviceSummary {
  byType: Record<string, number>;
  byStatus: Record<string, number>;
  models: string[];
}

export function summarizeDevices(devices: readonly Device[]): DeviceSummary {
  return {
    byType: countBy(devices, (d) => classifyDevice(d.model)),
    byStatus: countBy(devices, deviceStatus),
    models: [...new Set(devices.map((d) => d.model))].sort(),
  };
}

export interface TrafficPoint {
  startTs: string;
  bytes: number;
}

/** Points that carry a start time, in time order */
export function trafficSeries(entries: readonly JsonRecord[]): TrafficPoint[] {
  const points: TrafficPoint[] = [];
  for (const entry of entries) {
    const startTs = optStr(entry, "startTs");
    if (startTs) points.push({ startTs, bytes: num(entry, "bytes") });
  }
  return points.sort((a, b) => a.startTs.localeCompare(b.startTs));
}
