import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import {
  CallToolRequestSchema,
  GetPromptRequestSchema,
  ListPromptsRequestSchema,
  ListResourcesRequestSchema,
  ListResourceTemplatesRequestSchema,
  ListToolsRequestSchema,
  ReadResourceRequestSchema,
} from "@modelcontextprotocol/sdk/types.js";
import { MerakiClient, type MerakiTransport } from "./client.js";
import { COMMANDS, findCommand, toolName, type CmdDef } from "./commands.js";
import { requireApiKey, resolveConfig, type Config } from "./config.js";
import { describeError } from "./errors.js";
import { executeAllPages, executeCommand, missingArgs, type ExecuteParams } from "./execute.js";
import { describeSchema, toJsonSchema } from "./schema.js";
import { VERSION } from "./version.js";

// ---------------------------------------------------------------------------
// Build JSON Schema input for each tool
// ---------------------------------------------------------------------------

export interface ToolInputSchema {
  type: "object";
  properties: Record<string, unknown>;
  required?: string[];
}

export function buildInputSchema(cmd: CmdDef): ToolInputSchema {
  const properties: Record<string, unknown> = {};
  const required: string[] = [];

  for (const arg of cmd.args) {
    properties[arg.name] = { type: "string", description: arg.desc };
    required.push(arg.name);
  }

  if (cmd.paginatable) {
    properties.perPage = { type: "integer", description: "Page size (omit to auto-fetch all pages)" };
    properties.startingAfter = { type: "string", description: "Return items after this cursor" };
    properties.endingBefore = { type: "string", description: "Return items before this cursor" };
  }

  for (const qp of cmd.extraQuery) {
    properties[qp.name] = { type: "string", description: qp.desc };
    if (qp.required) required.push(qp.name);
  }

  if (cmd.hasBody) {
    const description = cmd.bodySchema
      ? `Request body:\n${describeSchema(cmd.bodySchema)}`
      : "Request body object";
    const schema = cmd.bodySchema ? toJsonSchema(cmd.bodySchema) : { type: "object" };
    properties.body = { ...schema, description, additionalProperties: true };
    required.push("body");
  }

  return {
    type: "object",
    properties,
    required: required.length ? required : undefined,
  };
}

const toolMap = new Map<string, CmdDef>(COMMANDS.map((cmd) => [toolName(cmd), cmd]));

const READ_ONLY_METHODS = new Set(["GET", "HEAD", "OPTIONS"]);

const text = (value: unknown) => JSON.stringify(value, null, 2);

function stringArg(args: Record<string, unknown> | undefined, name: string): string | undefined {
  const v = args?.[name];
  if (v === undefined || v === null || v === "") return undefined;
  return typeof v === "string" ? v : String(v);
}

/** Map MCP tool arguments onto request parameters */
export function toExecuteParams(cmd: CmdDef, args: Record<string, unknown> | undefined): ExecuteParams {
  const pathArgs: Record<string, string> = {};
  for (const arg of cmd.args) {
    const v = stringArg(args, arg.name);
    if (v) pathArgs[arg.name] = v;
  }
  const extraQuery: Record<string, string> = {};
  for (const qp of cmd.extraQuery) {
    const v = stringArg(args, qp.name);
    if (v !== undefined) extraQuery[qp.name] = v;
  }
  return {
    args: pathArgs,
    perPage: stringArg(args, "perPage"),
    startingAfter: stringArg(args, "startingAfter"),
    endingBefore: stringArg(args, "endingBefore"),
    extraQuery,
    body: args?.body,
  };
}

// ---------------------------------------------------------------------------
// Resources and prompts
// ---------------------------------------------------------------------------

const RESOURCE_TEMPLATES = [
  {
    uriTemplate: "meraki://organizations/{organizationId}/networks",
    name: "Networks",
    description: "Every network in an organization",
    mimeType: "application/json",
    pattern: /^meraki:\/\/organizations\/([^/]+)\/networks$/,
    operationId: "getOrganizationNetworks",
    arg: "organizationId",
  },
  {
    uriTemplate: "meraki://networks/{networkId}/devices",
    name: "Devices",
    description: "Devices claimed into a network",
    mimeType: "application/json",
    pattern: /^meraki:\/\/networks\/([^/]+)\/devices$/,
    operationId: "getNetworkDevices",
    arg: "networkId",
  },
  {
    uriTemplate: "meraki://networks/{networkId}/clients",
    name: "Clients",
    description: "Clients seen on a network in the last day",
    mimeType: "application/json",
    pattern: /^meraki:\/\/networks\/([^/]+)\/clients$/,
    operationId: "getNetworkClients",
    arg: "networkId",
  },
] as const;

const PROMPTS = [
  {
    name: "access-point-health",
    description: "Review access point status, client load and wireless quality for a network",
    steps: (networkId: string) => [
      `Review the health of the access points in network "${networkId}".`,
      "",
      "Steps:",
      `1. Use the **networks_devices** tool (networkId: "${networkId}") and keep the devices whose model starts with MR or CW.`,
      "2. For each access point, use **wireless_status**, **wireless_connection_stats** and **wireless_latency_stats** (serial: <serial>).",
      "3. Use **devices_clients** (serial: <serial>, timespan: 300) to count current clients.",
      "",
      "Then report:",
      "- A table: name, model, status, current clients, connection failures, average latency.",
      "- Access points that are offline or have not reported recently.",
      "- Access points carrying a disproportionate share of clients.",
    ],
  },
  {
    name: "client-usage-review",
    description: "Summarize client bandwidth usage by client, operating system and SSID",
    steps: (networkId: string) => [
      `Review client bandwidth usage in network "${networkId}".`,
      "",
      "Steps:",
      `1. Use the **clients_list** tool (networkId: "${networkId}", timespan: "604800") to fetch a week of clients.`,
      "2. Group usage.total by os (missing → Other) and by ssid (no ssid → Not Wireless).",
      "",
      "Then report:",
      "- Total sent, received and total traffic.",
      "- The top 10 clients by total usage.",
      "- Usage by operating system and by SSID, largest first.",
    ],
  },
  {
    name: "traffic-shaping-audit",
    description: "Audit bandwidth limits and shaping rules against observed application traffic",
    steps: (networkId: string) => [
      `Audit traffic shaping for network "${networkId}".`,
      "",
      "Steps:",
      `1. Use the **traffic_shaping_get** tool (networkId: "${networkId}") to read the current settings.`,
      `2. Use the **networks_traffic_analysis** tool (networkId: "${networkId}") for application usage.`,
      "",
      "Then analyze:",
      "- Whether global and per-client limits are set and plausible.",
      "- Rules that match applications with no observed traffic.",
      "- Heavy applications that no rule shapes.",
      "- Propose rule changes as traffic_shaping_update bodies, without applying them.",
    ],
  },
] as const;

// ---------------------------------------------------------------------------
// MCP Server
// ---------------------------------------------------------------------------

export interface McpServerOptions {
  transport?: Transport;
  config?: Config;
  /** API client to use instead of one built from the configuration */
  client?: MerakiTransport;
}

export async function startMcpServer(options: McpServerOptions = {}): Promise<Server> {
  const config = options.config ?? resolveConfig({});
  const readOnly = config.readOnly;

  const server = new Server(
    { name: "meraki-cli", version: VERSION },
    { capabilities: { tools: {}, resources: {}, prompts: {} } },
  );

  function getClient(): MerakiTransport {
    if (options.client) return options.client;
    requireApiKey(config);
    return new MerakiClient(config.baseUrl, config.apiKey);
  }

  // ── ListTools ─────────────────────────────────────────────────────
  server.setRequestHandler(ListToolsRequestSchema, async () => {
    const cmds = readOnly ? COMMANDS.filter((cmd) => READ_ONLY_METHODS.has(cmd.method)) : COMMANDS;
    return {
      tools: cmds.map((cmd) => ({
        name: toolName(cmd),
        description: `${cmd.summary}. API: ${cmd.method} ${cmd.path}`,
        inputSchema: buildInputSchema(cmd),
      })),
    };
  });

  // ── CallTool ──────────────────────────────────────────────────────
  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    const cmd = toolMap.get(name);

    if (!cmd) {
      return { content: [{ type: "text", text: text({ error: `Unknown tool: ${name}` }) }], isError: true };
    }

    if (readOnly && !READ_ONLY_METHODS.has(cmd.method)) {
      return {
        content: [{
          type: "text",
          text: text({
            error: `Read-only mode: ${cmd.method} ${cmd.path} is not allowed`,
            hint: "Unset MERAKI_READ_ONLY to enable write operations",
          }),
        }],
        isError: true,
      };
    }

    const params = toExecuteParams(cmd, args);
    const missing = missingArgs(cmd, params);
    if (missing.length) {
      return {
        content: [{ type: "text", text: text({ error: `Missing required arguments: ${missing.join(", ")}` }) }],
        isError: true,
      };
    }

    try {
      const client = getClient();
      const autoPage = cmd.paginatable && !params.perPage && !params.startingAfter && !params.endingBefore;
      const result = autoPage
        ? await executeAllPages(cmd, params, client)
        : await executeCommand(cmd, params, client);
      return { content: [{ type: "text", text: text(result) }] };
    } catch (err: unknown) {
      return { content: [{ type: "text", text: text(describeError(err)) }], isError: true };
    }
  });

  // ── Resources ─────────────────────────────────────────────────────
  server.setRequestHandler(ListResourcesRequestSchema, async () => ({
    resources: [
      {
        uri: "meraki://organizations",
        name: "Organizations",
        description: "Organizations the API key can access",
        mimeType: "application/json",
      },
    ],
  }));

  server.setRequestHandler(ListResourceTemplatesRequestSchema, async () => ({
    resourceTemplates: RESOURCE_TEMPLATES.map(({ uriTemplate, name, description, mimeType }) => ({
      uriTemplate,
      name,
      description,
      mimeType,
    })),
  }));

  server.setRequestHandler(ReadResourceRequestSchema, async (request) => {
    const uri = request.params.uri;
    const client = getClient();
    const contents = (result: unknown) => ({
      contents: [{ uri, mimeType: "application/json", text: text(result) }],
    });

    if (uri === "meraki://organizations") {
      return contents(await executeCommand(findCommand("getOrganizations"), { args: {} }, client));
    }

    for (const template of RESOURCE_TEMPLATES) {
      const match = uri.match(template.pattern);
      if (match) {
        const args = { [template.arg]: decodeURIComponent(match[1]) };
        return contents(await executeAllPages(findCommand(template.operationId), { args }, client));
      }
    }

    throw new Error(`Unknown resource URI: ${uri}`);
  });

  // ── Prompts ───────────────────────────────────────────────────────
  server.setRequestHandler(ListPromptsRequestSchema, async () => ({
    prompts: PROMPTS.map((p) => ({
      name: p.name,
      description: p.description,
      arguments: [{ name: "networkId", description: "Network ID", required: true }],
    })),
  }));

  server.setRequestHandler(GetPromptRequestSchema, async (request) => {
    const { name, arguments: promptArgs } = request.params;
    const prompt = PROMPTS.find((p) => p.name === name);
    if (!prompt) throw new Error(`Unknown prompt: ${name}`);
    const networkId = promptArgs?.networkId;
    if (!networkId) throw new Error(`Prompt ${name} requires a networkId argument`);

    return {
      description: prompt.description,
      messages: [
        {
          role: "user" as const,
          content: { type: "text" as const, text: prompt.steps(networkId).join("\n") },
        },
      ],
    };
  });

  // ── Start ─────────────────────────────────────────────────────────
  await server.connect(options.transport ?? new StdioServerTransport());
  return server;
}
