// ---------------------------------------------------------------------------
// Command registry: every Dashboard API endpoint the tools call
// ---------------------------------------------------------------------------

import { TRAFFIC_SHAPING_SCHEMA, type SchemaObject } from "./schema.js";

export interface CmdDef {
  /** Command group (null = top-level command) */
  group: string | null;
  /** Action name (e.g. "list", "get", "update") */
  action: string;
  /** Dashboard API operationId */
  operationId: string;
  /** HTTP method */
  method: string;
  /** URL path template, relative to the API base URL */
  path: string;
  /** Human-readable summary */
  summary: string;
  /** Positional CLI arguments, one per path placeholder */
  args: { name: string; desc: string }[];
  /** Whether it supports perPage/startingAfter/endingBefore paging */
  paginatable: boolean;
  /** Whether it accepts a JSON request body */
  hasBody: boolean;
  /** Extra query params beyond paging */
  extraQuery: { name: string; required: boolean; desc: string }[];
  /** Request body schema, for help text and MCP input schemas */
  bodySchema?: SchemaObject;
}

const ORG_ARG = { name: "organizationId", desc: "Organization ID" };
const NETWORK_ARG = { name: "networkId", desc: "Network ID" };
const SERIAL_ARG = { name: "serial", desc: "Device serial number" };
const TIMESPAN = (desc: string) => ({ name: "timespan", required: false, desc });

export const COMMANDS: CmdDef[] = [
  // ── Organizations ───────────────────────────────────────────────────
  {
    group: "organizations", action: "list", operationId: "getOrganizations",
    method: "GET", path: "/organizations",
    summary: "List the organizations the API key can access",
    args: [], paginatable: false, hasBody: false, extraQuery: [],
  },
  {
    group: "organizations", action: "get", operationId: "getOrganization",
    method: "GET", path: "/organizations/{organizationId}",
    summary: "Get one organization",
    args: [ORG_ARG], paginatable: false, hasBody: false, extraQuery: [],
  },
  {
    group: "organizations", action: "summary", operationId: "getOrganizationSummary",
    method: "GET", path: "/organizations/{organizationId}/summary",
    summary: "Get the organization summary",
    args: [ORG_ARG], paginatable: false, hasBody: false, extraQuery: [],
  },
  {
    group: "organizations", action: "inventory", operationId: "getOrganizationInventoryDevices",
    method: "GET", path: "/organizations/{organizationId}/inventory/devices",
    summary: "List every device in the organization's inventory",
    args: [ORG_ARG], paginatable: true, hasBody: false, extraQuery: [],
  },

  // ── Networks ────────────────────────────────────────────────────────
  {
    group: "networks", action: "list", operationId: "getOrganizationNetworks",
    method: "GET", path: "/organizations/{organizationId}/networks",
    summary: "List the networks in an organization",
    args: [ORG_ARG], paginatable: true, hasBody: false, extraQuery: [],
  },
  {
    group: "networks", action: "get", operationId: "getNetwork",
    method: "GET", path: "/networks/{networkId}",
    summary: "Get one network",
    args: [NETWORK_ARG], paginatable: false, hasBody: false, extraQuery: [],
  },
  {
    group: "networks", action: "devices", operationId: "getNetworkDevices",
    method: "GET", path: "/networks/{networkId}/devices",
    summary: "List the devices in a network",
    args: [NETWORK_ARG], paginatable: false, hasBody: false, extraQuery: [],
  },
  {
    group: "networks", action: "traffic", operationId: "getNetworkTraffic",
    method: "GET", path: "/networks/{networkId}/traffic",
    summary: "Get traffic data for a network",
    args: [NETWORK_ARG], paginatable: false, hasBody: false,
    extraQuery: [TIMESPAN("Timespan in seconds (e.g. 86400)")],
  },
  {
    group: "networks", action: "traffic-analysis", operationId: "getNetworkTrafficAnalysis",
    method: "GET", path: "/networks/{networkId}/trafficAnalysis",
    summary: "Get traffic analysis (application usage) for a network",
    args: [NETWORK_ARG], paginatable: false, hasBody: false, extraQuery: [],
  },

  // ── Clients ─────────────────────────────────────────────────────────
  {
    group: "clients", action: "list", operationId: "getNetworkClients",
    method: "GET", path: "/networks/{networkId}/clients",
    summary: "List clients seen in a network with their usage",
    args: [NETWORK_ARG], paginatable: true, hasBody: false,
    extraQuery: [TIMESPAN("Lookback in seconds (default 86400)")],
  },
  {
    group: "clients", action: "events", operationId: "getNetworkClientEvents",
    method: "GET", path: "/networks/{networkId}/clients/{clientId}/events",
    summary: "List events for one client",
    args: [NETWORK_ARG, { name: "clientId", desc: "Client ID" }],
    paginatable: false, hasBody: false,
    extraQuery: [TIMESPAN("Lookback in seconds")],
  },

  // ── Devices ─────────────────────────────────────────────────────────
  {
    group: "devices", action: "get", operationId: "getDevice",
    method: "GET", path: "/devices/{serial}",
    summary: "Get one device",
    args: [SERIAL_ARG], paginatable: false, hasBody: false, extraQuery: [],
  },
  {
    group: "devices", action: "clients", operationId: "getDeviceClients",
    method: "GET", path: "/devices/{serial}/clients",
    summary: "List clients of a device",
    args: [SERIAL_ARG], paginatable: false, hasBody: false,
    extraQuery: [TIMESPAN("Lookback in seconds")],
  },
  {
    group: "devices", action: "statuses", operationId: "getNetworkDeviceStatuses",
    method: "GET", path: "/networks/{networkId}/devices/{serial}/statuses",
    summary: "Get status information for a device",
    args: [NETWORK_ARG, SERIAL_ARG], paginatable: false, hasBody: false, extraQuery: [],
  },

  // ── Wireless ────────────────────────────────────────────────────────
  {
    group: "wireless", action: "ssids", operationId: "getNetworkWirelessSsids",
    method: "GET", path: "/networks/{networkId}/wireless/ssids",
    summary: "List the SSIDs of a network",
    args: [NETWORK_ARG], paginatable: false, hasBody: false, extraQuery: [],
  },
  {
    group: "wireless", action: "status", operationId: "getDeviceWirelessStatus",
    method: "GET", path: "/devices/{serial}/wireless/status",
    summary: "Get the wireless status of an access point",
    args: [SERIAL_ARG], paginatable: false, hasBody: false, extraQuery: [],
  },
  {
    group: "wireless", action: "connection-stats", operationId: "getDeviceWirelessConnectionStats",
    method: "GET", path: "/devices/{serial}/wireless/connectionStats",
    summary: "Get connection statistics of an access point",
    args: [SERIAL_ARG], paginatable: false, hasBody: false,
    extraQuery: [TIMESPAN("Lookback in seconds")],
  },
  {
    group: "wireless", action: "latency-stats", operationId: "getDeviceWirelessLatencyStats",
    method: "GET", path: "/devices/{serial}/wireless/latencyStats",
    summary: "Get latency statistics of an access point",
    args: [SERIAL_ARG], paginatable: false, hasBody: false,
    extraQuery: [TIMESPAN("Lookback in seconds")],
  },

  // ── Switch ──────────────────────────────────────────────────────────
  {
    group: "switch", action: "ports", operationId: "getDeviceSwitchPorts",
    method: "GET", path: "/devices/{serial}/switch/ports",
    summary: "List the port configuration of a switch",
    args: [SERIAL_ARG], paginatable: false, hasBody: false, extraQuery: [],
  },
  {
    group: "switch", action: "routing-interfaces", operationId: "getDeviceSwitchRoutingInterfaces",
    method: "GET", path: "/devices/{serial}/switch/routing/interfaces",
    summary: "List the layer 3 interfaces of a switch",
    args: [SERIAL_ARG], paginatable: false, hasBody: false, extraQuery: [],
  },
  {
    group: "switch", action: "static-routes", operationId: "getDeviceSwitchRoutingStaticRoutes",
    method: "GET", path: "/devices/{serial}/switch/routing/staticRoutes",
    summary: "List the static routes of a switch",
    args: [SERIAL_ARG], paginatable: false, hasBody: false, extraQuery: [],
  },
  {
    group: "switch", action: "acls", operationId: "getNetworkSwitchAccessControlLists",
    method: "GET", path: "/networks/{networkId}/switch/accessControlLists",
    summary: "Get the switch access control lists of a network",
    args: [NETWORK_ARG], paginatable: false, hasBody: false, extraQuery: [],
  },

  // ── Appliance ───────────────────────────────────────────────────────
  {
    group: "appliance", action: "vpn-status", operationId: "getNetworkApplianceVpnStatus",
    method: "GET", path: "/networks/{networkId}/appliance/vpn/status",
    summary: "Get the VPN status of a network",
    args: [NETWORK_ARG], paginatable: false, hasBody: false, extraQuery: [],
  },
  {
    group: "appliance", action: "uplinks-usage", operationId: "getDeviceApplianceUplinksUsage",
    method: "GET", path: "/devices/{serial}/appliance/uplinks/usageHistory",
    summary: "Get uplink usage history of a security appliance",
    args: [SERIAL_ARG], paginatable: false, hasBody: false,
    extraQuery: [TIMESPAN("Lookback in seconds (default 3600)")],
  },

  // ── Traffic shaping ─────────────────────────────────────────────────
  {
    group: "traffic-shaping", action: "get", operationId: "getNetworkTrafficShaping",
    method: "GET", path: "/networks/{networkId}/trafficShaping",
    summary: "Get the traffic shaping settings of a network",
    args: [NETWORK_ARG], paginatable: false, hasBody: false, extraQuery: [],
  },
  {
    group: "traffic-shaping", action: "update", operationId: "updateNetworkTrafficShaping",
    method: "PUT", path: "/networks/{networkId}/trafficShaping",
    summary: "Update the traffic shaping settings of a network",
    args: [NETWORK_ARG], paginatable: false, hasBody: true, extraQuery: [],
    bodySchema: TRAFFIC_SHAPING_SCHEMA,
  },
];

// ---------------------------------------------------------------------------
// Group descriptions
// ---------------------------------------------------------------------------

export const GROUP_DESCRIPTIONS: Record<string, string> = {
  organizations: "Organizations — IDs, summary and device inventory",
  networks: "Networks — devices, traffic and traffic analysis",
  clients: "Clients — usage and per-client events",
  devices: "Devices — details, clients and statuses",
  wireless: "Wireless — SSIDs and access point statistics",
  switch: "Switches — ports, layer 3 interfaces, static routes, ACLs",
  appliance: "Security appliances — VPN status and uplink usage",
  "traffic-shaping": "Raw traffic shaping settings (see also: meraki-cli shaping)",
};

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export function findCommand(operationId: string): CmdDef {
  const cmd = COMMANDS.find((c) => c.operationId === operationId);
  if (!cmd) throw new Error(`Unknown operation: ${operationId}`);
  return cmd;
}

export function camelCase(s: string): string {
  return s.replace(/-([a-z])/g, (_, c: string) => c.toUpperCase());
}

/** Generate a tool name from a command definition: group_action or just action */
export function toolName(cmd: CmdDef): string {
  if (cmd.group) {
    return `${cmd.group.replace(/-/g, "_")}_${cmd.action.replace(/-/g, "_")}`;
  }
  return cmd.action.replace(/-/g, "_");
}
