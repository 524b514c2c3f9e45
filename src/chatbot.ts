// Line-oriented command processor behind `meraki-cli chat` and the web chat page.

import { getVpnStatus, listNetworkClients, listNetworkDevices, listNetworks, listOrganizations, listSsids } from "./api.js";
import type { MerakiTransport } from "./client.js";
import { ApiError } from "./errors.js";
import { str } from "./json.js";

export type ClientFactory = (apiKey: string) => MerakiTransport;

export const API_KEY_SET = "API key has been set successfully.";
export const DEFAULT_CLIENTS_TIMESPAN = 3600;

export const HELP_TEXT = `
Available Commands:
------------------
help                            - Show this help message
set_api_key YOUR_API_KEY        - Set your Meraki API key
get_organizations (orgs)        - List all organizations you have access to
get_networks ORG_ID (networks)  - List all networks in an organization
get_devices NETWORK_ID (devices)- List all devices in a network
get_ssids NETWORK_ID (ssids)    - List all SSIDs in a network
get_clients NETWORK_ID [TIMESPAN]- List clients in a network (default timespan: 1 hour)
get_vpn NETWORK_ID (vpn)        - Get VPN status for a network

Short command aliases are shown in parentheses.
`;

const CLIENTS_USAGE = "Usage: get_clients NETWORK_ID [TIMESPAN_SECONDS]";

function listing(header: string, lines: string[]): string {
  return `${header}:\n${lines.join("\n")}`;
}

export class Chatbot {
  private client: MerakiTransport | undefined;

  constructor(
    private readonly createClient: ClientFactory,
    private apiKey?: string,
  ) {
    if (apiKey) this.client = createClient(apiKey);
  }

  get hasApiKey(): boolean {
    return this.apiKey !== undefined;
  }

  setApiKey(apiKey: string): string {
    this.apiKey = apiKey;
    this.client = this.createClient(apiKey);
    return API_KEY_SET;
  }

  async process(command: string): Promise<string> {
    const parts = command.trim().split(/\s+/).filter(Boolean);
    if (!parts.length) return "Please enter a command.";

    const cmd = parts[0].toLowerCase();
    const arg = parts[1];

    if (cmd === "help") return HELP_TEXT;
    if (cmd === "set_api_key") {
      if (!arg) return "Please provide an API key. Usage: set_api_key YOUR_API_KEY";
      return this.setApiKey(arg);
    }

    const client = this.client;
    if (!client) return "Please set your API key first using: set_api_key YOUR_API_KEY";

    switch (cmd) {
      case "get_organizations":
      case "orgs":
        return this.attempt("organizations", async () => {
          const orgs = await listOrganizations(client);
          return listing(
            `Found ${orgs.length} organizations`,
            orgs.map((o) => `ID: ${o.id} - Name: ${o.name}`),
          );
        });

      case "get_networks":
      case "networks":
        if (!arg) return "Please provide an organization ID. Usage: get_networks ORG_ID";
        return this.attempt("networks", async () => {
          const networks = await listNetworks(client, arg);
          return listing(
            `Found ${networks.length} networks in organization ${arg}`,
            networks.map((n) => `ID: ${n.id} - Name: ${n.name} - Type: ${n.productTypes.join(",")}`),
          );
        });

      case "get_devices":
      case "devices":
        if (!arg) return "Please provide a network ID. Usage: get_devices NETWORK_ID";
        return this.attempt("devices", async () => {
          const devices = await listNetworkDevices(client, arg);
          return listing(
            `Found ${devices.length} devices in network ${arg}`,
            devices.map(
              (d) =>
                `Name: ${d.name ?? "Unnamed"} - Model: ${str(d.raw, "model", "N/A")} - Serial: ${str(d.raw, "serial", "N/A")}`,
            ),
          );
        });

      case "get_ssids":
      case "ssids":
        if (!arg) return "Please provide a network ID. Usage: get_ssids NETWORK_ID";
        return this.attempt("SSIDs", async () => {
          const ssids = await listSsids(client, arg);
          return listing(
            `Found ${ssids.length} SSIDs in network ${arg}`,
            ssids.map(
              (s) =>
                `Number: ${s.number ?? "N/A"} - Name: ${s.name ?? "Unnamed"} - ` +
                `Status: ${s.enabled ? "Enabled" : "Disabled"} - Auth Mode: ${s.authMode ?? "N/A"}`,
            ),
          );
        });

      case "get_clients":
      case "clients": {
        if (!arg) return `Please provide a network ID. ${CLIENTS_USAGE}`;
        const timespan = parts[2] === undefined ? DEFAULT_CLIENTS_TIMESPAN : Number(parts[2]);
        if (!Number.isInteger(timespan) || timespan < 1) {
          return `Please provide the timespan as a whole number of seconds. ${CLIENTS_USAGE}`;
        }
        return this.attempt("clients", async () => {
          const clients = await listNetworkClients(client, arg, timespan);
          return listing(
            `Found ${clients.length} clients in network ${arg}`,
            clients.map(
              (c) =>
                `Description: ${str(c, "description", "N/A")} - MAC: ${str(c, "mac", "N/A")} - ` +
                `IP: ${str(c, "ip", "N/A")} - VLAN: ${str(c, "vlan", "N/A")}`,
            ),
          );
        });
      }

      case "get_vpn":
      case "vpn":
        if (!arg) return "Please provide a network ID. Usage: get_vpn NETWORK_ID";
        return this.attempt("VPN status", async () => JSON.stringify(await getVpnStatus(client, arg), null, 2));

      default:
        return `Unknown command: ${cmd}. Type 'help' to see available commands.`;
    }
  }

  private async attempt(what: string, run: () => Promise<string>): Promise<string> {
    try {
      return await run();
    } catch (err: unknown) {
      if (err instanceof ApiError) {
        return `Failed to retrieve ${what}. Status code: ${err.status} - ${err.body}`;
      }
      throw err;
    }
  }
}
