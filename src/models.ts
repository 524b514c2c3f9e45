// Device families by model prefix.

export type DeviceType = "Wireless AP" | "Switch" | "Security Appliance" | "Camera" | "Sensor" | "Unknown";

const PREFIXES: [string, DeviceType][] = [
  ["MR", "Wireless AP"],
  ["CW", "Wireless AP"],
  ["MS", "Switch"],
  ["MX", "Security Appliance"],
  ["MV", "Camera"],
  ["MT", "Sensor"],
];

export function classifyDevice(model: string | undefined): DeviceType {
  if (!model) return "Unknown";
  for (const [prefix, type] of PREFIXES) {
    if (model.startsWith(prefix)) return type;
  }
  return "Unknown";
}

export const isAccessPoint = (model: string | undefined) => classifyDevice(model) === "Wireless AP";
export const isSwitch = (model: string | undefined) => classifyDevice(model) === "Switch";
export const isAppliance = (model: string | undefined) => classifyDevice(model) === "Security Appliance";
