#!/usr/bin/env node

import { Command } from "commander";
import { readFileSync } from "node:fs";
import { createInterface } from "node:readline";
import { serve } from "@hono/node-server";
import { Chatbot } from "./chatbot.js";
import { MerakiClient } from "./client.js";
import { COMMANDS, GROUP_DESCRIPTIONS, camelCase, type CmdDef } from "./commands.js";
import { requireApiKey, requireTarget, resolveConfig, saveConfig, type Config } from "./config.js";
import { InputError, describeError } from "./errors.js";
import { executeAllPages, executeCommand, missingArgs, resolveRequest, type ExecuteParams } from "./execute.js";
import type { JsonRecord } from "./json.js";
import { stderrLogger } from "./log.js";
import { OUTPUT_FORMATS, formatOutput, pickFields } from "./output.js";
import { buildAccessPointReport, accessPointSummary, saveAccessPointReport } from "./reports/accessPoints.js";
import { buildClientEventsReport, clientEventsSummary, saveClientEventsReport } from "./reports/clientEvents.js";
import { buildClientUsageReport, clientUsageSummary, saveClientUsageReport } from "./reports/clientUsage.js";
import { parsePositiveInt, SECONDS_PER_DAY } from "./reports/common.js";
import { createContext, type ReportContext } from "./reports/context.js";
import { buildDeviceInventory, deviceInventorySummary, saveDeviceInventory } from "./reports/deviceInventory.js";
import { buildNetworkTrafficReport, saveNetworkTrafficReport, trafficSummaryText } from "./reports/networkTraffic.js";
import { buildSwitchBackup, saveSwitchBackup } from "./reports/switchBackup.js";
import {
  addRule,
  addRuleBody,
  buildRule,
  deleteRule,
  deleteRuleBody,
  globalLimitsBody,
  perClientLimitsBody,
  ruleLines,
  setGlobalLimits,
  setPerClientLimits,
  showShaping,
  type LimitsInput,
  type RuleInput,
} from "./reports/trafficShaping.js";
import { resolveTarget } from "./resolve.js";
import { describeSchema, structuredSchema } from "./schema.js";
import { createApp } from "./server.js";
import { VERSION } from "./version.js";

// ---------------------------------------------------------------------------
// CLI setup
// ---------------------------------------------------------------------------

const program = new Command();

program
  .name("meraki-cli")
  .version(VERSION)
  .description(
    "CLI, reports and front-ends for the Meraki Dashboard API\n\n" +
    "Command output is JSON by default; progress and warnings go to stderr.\n\n" +
    "Configuration (in priority order):\n" +
    "  1. CLI flags:      --api-key, --org, --network, --base-url, --output-dir\n" +
    "  2. Env vars:       MERAKI_API_KEY, MERAKI_ORG, MERAKI_NETWORK, MERAKI_BASE_URL, MERAKI_OUTPUT_DIR\n" +
    "  3. Config file:    ~/.config/meraki-cli/config.json\n\n" +
    "Quick start:\n" +
    "  $ meraki-cli configure --api-key YOUR_KEY --org \"My Org\" --network \"Branch 1\"\n" +
    "  $ meraki-cli organizations list\n" +
    "  $ meraki-cli report ap-status --days 7",
  )
  .option("--base-url <url>", "Dashboard API base URL")
  .option("--api-key <key>", "Meraki Dashboard API key")
  .option("--org <name>", "Organization name (reports and shaping)")
  .option("--network <name>", "Network name (reports and shaping)")
  .option("--output-dir <dir>", "Directory for report files")
  .option("--format <fmt>", `Output format: ${OUTPUT_FORMATS.join(", ")}`, "json")
  .option("--dry-run", "Print the HTTP request instead of executing it")
  .option("--fields <list>", "Comma-separated list of fields to include in output")
  .option("--read-only", "Refuse every request that is not a GET");

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function fail(err: unknown): never {
  console.error(JSON.stringify(describeError(err), null, 2));
  process.exit(1);
}

/** Run an action, printing any error as JSON on stderr */
function run(action: () => Promise<void> | void): Promise<void> {
  return Promise.resolve()
    .then(action)
    .catch(fail);
}

function optString(opts: Record<string, unknown>, key: string): string | undefined {
  const v = opts[key];
  return typeof v === "string" && v !== "" ? v : undefined;
}

function globals() {
  const opts: Record<string, unknown> = program.opts();
  const format = optString(opts, "format") ?? "json";
  if (!OUTPUT_FORMATS.some((f) => f === format)) {
    throw new InputError(`Unknown format '${format}'. Use one of: ${OUTPUT_FORMATS.join(", ")}`);
  }
  return {
    config: resolveConfig(opts),
    format,
    fields: optString(opts, "fields")?.split(",").filter(Boolean) ?? [],
    dryRun: opts.dryRun === true,
  };
}

function makeClient(config: Config): MerakiClient {
  requireApiKey(config);
  return new MerakiClient(config.baseUrl, config.apiKey);
}

function print(result: unknown, format: string, fields: string[]): void {
  console.log(formatOutput(fields.length ? pickFields(result, fields) : result, format));
}

function assertWritable(config: Config, method: string, path: string): void {
  if (config.readOnly && method !== "GET") {
    throw new InputError(`Read-only mode: ${method} ${path} is not allowed`);
  }
}

function dryRunRequest(config: Config, method: string, path: string, query: Record<string, string>, body: unknown) {
  return {
    dryRun: true,
    method,
    url: `${config.baseUrl.replace(/\/+$/, "")}${path}`,
    query,
    body: body ?? null,
    headers: {
      "X-Cisco-Meraki-API-Key": config.apiKey ? "***" : "(missing)",
      "Content-Type": body !== undefined ? "application/json" : undefined,
    },
  };
}

async function resolveBody(data: string): Promise<unknown> {
  if (data === "-") {
    const chunks: Buffer[] = [];
    for await (const chunk of process.stdin) {
      chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
    }
    return JSON.parse(Buffer.concat(chunks).toString("utf-8"));
  }
  if (data.startsWith("@")) {
    return JSON.parse(readFileSync(data.slice(1), "utf-8"));
  }
  return JSON.parse(data);
}

function parseQuery(raw: string | undefined): Record<string, string> {
  const query: Record<string, string> = {};
  if (!raw) return query;
  for (const pair of raw.split(",")) {
    const [k, ...v] = pair.split("=");
    if (k) query[k] = v.join("=");
  }
  return query;
}

// ── configure ─────────────────────────────────────────────────────────

program
  .command("configure")
  .description("Save connection settings to ~/.config/meraki-cli/config.json")
  .option("--base-url <url>", "Dashboard API base URL")
  .option("--api-key <key>", "API key")
  .option("--org <name>", "Default organization name")
  .option("--network <name>", "Default network name")
  .option("--output-dir <dir>", "Default report directory")
  .option("--read-only", "Refuse write requests by default")
  .action((opts: Record<string, unknown>) =>
    run(() => {
      const toSave: Partial<Config> = {};
      const baseUrl = optString(opts, "baseUrl");
      const apiKey = optString(opts, "apiKey");
      const org = optString(opts, "org");
      const network = optString(opts, "network");
      const outputDir = optString(opts, "outputDir");
      if (baseUrl) toSave.baseUrl = baseUrl;
      if (apiKey) toSave.apiKey = apiKey;
      if (org) toSave.org = org;
      if (network) toSave.network = network;
      if (outputDir) toSave.outputDir = outputDir;
      if (opts.readOnly === true) toSave.readOnly = true;
      if (Object.keys(toSave).length === 0) {
        throw new InputError("Provide at least one of --base-url, --api-key, --org, --network, --output-dir, --read-only");
      }
      const path = saveConfig(toSave);
      console.log(JSON.stringify({ ok: true, saved: Object.keys(toSave), path }));
    }),
  );

// ── operations ────────────────────────────────────────────────────────

program
  .command("operations")
  .description("List all available API operations with method, path, and description")
  .action(() => {
    const ops = COMMANDS.map((cmd) => ({
      command: cmd.group ? `${cmd.group} ${cmd.action}` : cmd.action,
      operationId: cmd.operationId,
      method: cmd.method,
      path: cmd.path,
      summary: cmd.summary,
      paginatable: cmd.paginatable,
      hasBody: cmd.hasBody,
    }));
    console.log(JSON.stringify(ops, null, 2));
  });

// ── schema ────────────────────────────────────────────────────────────

program
  .command("schema <operationId>")
  .description("Show arguments, query parameters and body schema for an operation (by operationId or command name)")
  .action((query: string) =>
    run(() => {
      const parts = query.split(/\s+/);
      const cmd = COMMANDS.find(
        (c) => c.operationId === query || (c.group === parts[0] && c.action === parts[1]),
      );
      if (!cmd) throw new InputError(`Operation not found: ${query}. Run 'meraki-cli operations' to list them`);

      const result: JsonRecord = {
        command: cmd.group ? `${cmd.group} ${cmd.action}` : cmd.action,
        operationId: cmd.operationId,
        method: cmd.method,
        path: cmd.path,
        summary: cmd.summary,
        args: cmd.args,
      };
      if (cmd.extraQuery.length) result.queryParameters = cmd.extraQuery;
      if (cmd.bodySchema) result.requestSchema = structuredSchema(cmd.bodySchema);
      console.log(JSON.stringify(result, null, 2));
    }),
  );

// ── raw ───────────────────────────────────────────────────────────────

program
  .command("raw <method> <path>")
  .description("Make a raw API request (e.g. meraki-cli raw GET /organizations)")
  .option("-d, --data <json>", "Request body JSON (or @file.json, or - for stdin)")
  .option("-q, --query <params>", "Query params as key=value,key=value")
  .action((method: string, path: string, opts: Record<string, unknown>) =>
    run(async () => {
      const { config, format, fields, dryRun } = globals();
      const verb = method.toUpperCase();
      const query = parseQuery(optString(opts, "query"));
      const data = optString(opts, "data");
      const body = data ? await resolveBody(data) : undefined;

      if (dryRun) {
        console.log(JSON.stringify(dryRunRequest(config, verb, path, query, body), null, 2));
        return;
      }
      assertWritable(config, verb, path);
      print(await makeClient(config).request({ method: verb, path, query, body }), format, fields);
    }),
  );

// ── mcp ───────────────────────────────────────────────────────────────

program
  .command("mcp")
  .description("Start MCP server (stdio): exposes all operations as LLM tools")
  .action(() =>
    run(async () => {
      const { startMcpServer } = await import("./mcp.js");
      await startMcpServer({ config: resolveConfig(program.opts()) });
    }),
  );

// ── serve ─────────────────────────────────────────────────────────────

program
  .command("serve")
  .description("Serve the chat page and the dashboard JSON API")
  .option("--port <n>", "Port to listen on", "3000")
  .action((opts: Record<string, unknown>) =>
    run(() => {
      const { config } = globals();
      const port = parsePositiveInt(optString(opts, "port"), "port", 3000);
      const app = createApp({ createClient: (apiKey) => new MerakiClient(config.baseUrl, apiKey) });
      serve({ fetch: app.fetch, port }, (info) => {
        console.error(`Server running on http://localhost:${info.port}`);
      });
    }),
  );

// ── chat ──────────────────────────────────────────────────────────────

const EXIT_WORDS = new Set(["exit", "quit", "bye"]);

program
  .command("chat")
  .description("Interactive command chat in the terminal")
  .action(() =>
    run(async () => {
      const { config } = globals();
      const bot = new Chatbot((apiKey) => new MerakiClient(config.baseUrl, apiKey), config.apiKey);
      const rl = createInterface({ input: process.stdin, output: process.stdout, prompt: "Meraki> " });

      console.log("Welcome to Meraki Dashboard API Chatbot! Type 'help' to see available commands, 'exit' to quit.");
      rl.prompt();
      for await (const line of rl) {
        if (EXIT_WORDS.has(line.trim().toLowerCase())) break;
        try {
          console.log(await bot.process(line));
        } catch (err: unknown) {
          console.error(JSON.stringify(describeError(err)));
        }
        rl.prompt();
      }
      rl.close();
      console.log("Goodbye!");
    }),
  );

// ── report ────────────────────────────────────────────────────────────

function reportContext(config: Config): ReportContext {
  return createContext(makeClient(config));
}

function targetConfig() {
  const { config } = globals();
  requireApiKey(config);
  requireTarget(config);
  return config;
}

function finish(summary: string[], files: string[]): void {
  for (const line of summary) stderrLogger.info(line);
  console.log(JSON.stringify({ saved: files }, null, 2));
}

const report = program.command("report").description("Reports that aggregate Dashboard data into files");

report
  .command("ap-status")
  .description("Access point status, clients and traffic")
  .option("--days <n>", "Days of wireless statistics", "7")
  .action((opts: Record<string, unknown>) =>
    run(async () => {
      const config = targetConfig();
      const ctx = reportContext(config);
      const result = await buildAccessPointReport(ctx, { org: config.org, network: config.network, days: optString(opts, "days") });
      finish(accessPointSummary(result), await saveAccessPointReport(result, config.outputDir, ctx.now()));
    }),
  );

report
  .command("client-events")
  .description("Events of every client seen in the network")
  .option("--timespan <seconds>", "Lookback in seconds", String(SECONDS_PER_DAY))
  .action((opts: Record<string, unknown>) =>
    run(async () => {
      const config = targetConfig();
      const ctx = reportContext(config);
      const timespan = parsePositiveInt(optString(opts, "timespan"), "timespan", SECONDS_PER_DAY);
      const result = await buildClientEventsReport(ctx, { org: config.org, network: config.network, timespan });
      finish(clientEventsSummary(result), await saveClientEventsReport(result, config.outputDir, ctx.now()));
    }),
  );

report
  .command("client-usage")
  .description("Client bandwidth usage by client, OS and SSID")
  .option("--days <n>", "Days to analyze", "7")
  .action((opts: Record<string, unknown>) =>
    run(async () => {
      const config = targetConfig();
      const ctx = reportContext(config);
      const result = await buildClientUsageReport(ctx, { org: config.org, network: config.network, days: optString(opts, "days") });
      if (!result) {
        console.log(JSON.stringify({ saved: [], message: "No clients found in the network for the specified time period" }));
        return;
      }
      finish(clientUsageSummary(result), await saveClientUsageReport(result, config.outputDir, ctx.now()));
    }),
  );

report
  .command("devices")
  .description("Device inventory across every organization and network")
  .action(() =>
    run(async () => {
      const { config } = globals();
      const ctx = reportContext(config);
      const result = await buildDeviceInventory(ctx);
      finish(deviceInventorySummary(result), await saveDeviceInventory(result, config.outputDir, ctx.now()));
    }),
  );

report
  .command("traffic")
  .description("Client, application and device traffic")
  .option("--hours <n>", "Hours to analyze: 1, 3, 12 or 24", "1")
  .action((opts: Record<string, unknown>) =>
    run(async () => {
      const config = targetConfig();
      const ctx = reportContext(config);
      const result = await buildNetworkTrafficReport(ctx, {
        org: config.org,
        network: config.network,
        hours: optString(opts, "hours"),
      });
      const now = ctx.now();
      const summary = result.clientTraffic.length ? trafficSummaryText(result.analysis, now).trimEnd().split("\n") : [];
      finish(summary, await saveNetworkTrafficReport(result, config.outputDir, now));
    }),
  );

report
  .command("switch-backup")
  .description("Back up switch ports, routing interfaces, static routes and ACLs")
  .action(() =>
    run(async () => {
      const config = targetConfig();
      const ctx = reportContext(config);
      const backup = await buildSwitchBackup(ctx, { org: config.org, network: config.network });
      finish(["Configuration backup complete!"], await saveSwitchBackup(backup, config.outputDir, ctx.now()));
    }),
  );

// ── shaping ───────────────────────────────────────────────────────────

const shaping = program
  .command("shaping")
  .description("Read and edit the network's traffic shaping settings");

async function shapingNetwork(ctx: ReportContext, config: Config, opts: Record<string, unknown>): Promise<string> {
  const networkId = optString(opts, "networkId");
  if (networkId) return networkId;
  requireTarget(config);
  return (await resolveTarget(ctx, config.org, config.network)).network.id;
}

/** Shared setup for shaping commands; writes honor --read-only and --dry-run */
async function withShaping(
  opts: Record<string, unknown>,
  write: boolean,
  action: (ctx: ReportContext, networkId: string, dryRun: boolean) => Promise<unknown>,
): Promise<void> {
  const { config, format, fields, dryRun } = globals();
  const ctx = reportContext(config);
  const networkId = await shapingNetwork(ctx, config, opts);
  if (write && !dryRun) assertWritable(config, "PUT", `/networks/${networkId}/trafficShaping`);
  const result = await action(ctx, networkId, dryRun && write);
  if (result !== undefined) print(result, format, fields);
}

function dryRunShaping(networkId: string, body: JsonRecord) {
  return { dryRun: true, method: "PUT", path: `/networks/${networkId}/trafficShaping`, body };
}

function limitsInput(opts: Record<string, unknown>): LimitsInput {
  return {
    disable: opts.disable === true,
    limitUp: optString(opts, "limitUp"),
    limitDown: optString(opts, "limitDown"),
  };
}

const NETWORK_ID_OPT = ["--network-id <id>", "Network ID (skips name resolution)"] as const;

shaping
  .command("show")
  .description("Show the current traffic shaping settings")
  .option(...NETWORK_ID_OPT)
  .action((opts: Record<string, unknown>) =>
    run(() => withShaping(opts, false, (ctx, networkId) => showShaping(ctx, networkId))),
  );

shaping
  .command("set-global")
  .description("Set or disable the global bandwidth limits (Kbps)")
  .option(...NETWORK_ID_OPT)
  .option("--limit-up <kbps>", "Upload limit")
  .option("--limit-down <kbps>", "Download limit")
  .option("--disable", "Remove the global limits")
  .action((opts: Record<string, unknown>) =>
    run(() =>
      withShaping(opts, true, async (ctx, networkId, dryRun) => {
        const input = limitsInput(opts);
        if (dryRun) return dryRunShaping(networkId, globalLimitsBody(await showShaping(ctx, networkId), input));
        return setGlobalLimits(ctx, networkId, input);
      }),
    ),
  );

shaping
  .command("set-per-client")
  .description("Set or disable the per-client bandwidth limits (Kbps)")
  .option(...NETWORK_ID_OPT)
  .option("--limit-up <kbps>", "Upload limit per client")
  .option("--limit-down <kbps>", "Download limit per client")
  .option("--disable", "Disable per-client limits")
  .action((opts: Record<string, unknown>) =>
    run(() =>
      withShaping(opts, true, async (ctx, networkId, dryRun) => {
        const input = limitsInput(opts);
        if (dryRun) return dryRunShaping(networkId, perClientLimitsBody(await showShaping(ctx, networkId), input));
        return setPerClientLimits(ctx, networkId, input);
      }),
    ),
  );

shaping
  .command("rules")
  .description("List the shaping rules, numbered for delete-rule")
  .option(...NETWORK_ID_OPT)
  .action((opts: Record<string, unknown>) =>
    run(() =>
      withShaping(opts, false, async (ctx, networkId) => {
        for (const line of ruleLines(await showShaping(ctx, networkId))) console.log(line);
        return undefined;
      }),
    ),
  );

shaping
  .command("add-rule")
  .description("Append a shaping rule")
  .option(...NETWORK_ID_OPT)
  .requiredOption("--type <type>", "application, applicationCategory, host, port or ipRange")
  .requiredOption("--value <value>", "What the rule matches (e.g. 'Netflix', 'google.com', '80', '192.168.1.0/24')")
  .option("--direction <dir>", "src, dst or any", "any")
  .option("--dscp <tag>", "DSCP tag 0-63")
  .option("--limit-up <kbps>", "Per-client upload limit for matching traffic")
  .option("--limit-down <kbps>", "Per-client download limit for matching traffic")
  .action((opts: Record<string, unknown>) =>
    run(() =>
      withShaping(opts, true, async (ctx, networkId, dryRun) => {
        const input: RuleInput = {
          type: optString(opts, "type") ?? "",
          value: optString(opts, "value") ?? "",
          direction: optString(opts, "direction"),
          dscpTag: optString(opts, "dscp"),
          limitUp: optString(opts, "limitUp"),
          limitDown: optString(opts, "limitDown"),
        };
        if (dryRun) return dryRunShaping(networkId, addRuleBody(await showShaping(ctx, networkId), buildRule(input)));
        return addRule(ctx, networkId, input);
      }),
    ),
  );

shaping
  .command("delete-rule <number>")
  .description("Delete a shaping rule by its number in 'shaping rules'")
  .option(...NETWORK_ID_OPT)
  .action((num: string, opts: Record<string, unknown>) =>
    run(() =>
      withShaping(opts, true, async (ctx, networkId, dryRun) => {
        const index = parsePositiveInt(num, "rule number", 1);
        if (dryRun) return dryRunShaping(networkId, deleteRuleBody(await showShaping(ctx, networkId), index));
        return deleteRule(ctx, networkId, index);
      }),
    ),
  );

// ---------------------------------------------------------------------------
// Register all registry commands
// ---------------------------------------------------------------------------

function registerCommands() {
  const groups = new Map<string, CmdDef[]>();
  const topLevel: CmdDef[] = [];

  for (const cmd of COMMANDS) {
    if (cmd.group) {
      const list = groups.get(cmd.group) ?? [];
      list.push(cmd);
      groups.set(cmd.group, list);
    } else {
      topLevel.push(cmd);
    }
  }

  for (const cmd of topLevel) {
    registerAction(program, cmd);
  }

  for (const [groupName, cmds] of groups) {
    const groupCmd = program.command(groupName).description(GROUP_DESCRIPTIONS[groupName] ?? groupName);
    for (const cmd of cmds) {
      registerAction(groupCmd, cmd);
    }
  }
}

function registerAction(parent: Command, cmd: CmdDef) {
  const argParts = cmd.args.map((a) => `<${a.name}>`).join(" ");
  const sub = parent.command(argParts ? `${cmd.action} ${argParts}` : cmd.action).description(cmd.summary);

  if (cmd.paginatable) {
    sub.option("--per-page <n>", "Page size");
    sub.option("--starting-after <cursor>", "Return items after this cursor");
    sub.option("--ending-before <cursor>", "Return items before this cursor");
    sub.option("--all", "Fetch all pages automatically");
  }

  if (cmd.hasBody) {
    sub.option("-d, --data <json>", "Request body as JSON string (or @file.json to read from file, or - for stdin)");
    if (cmd.bodySchema) {
      sub.addHelpText(
        "after",
        `\nRequest body schema:\n  (* = required)\n${describeSchema(cmd.bodySchema)}\n` +
        `\n  Tip: use 'meraki-cli schema ${cmd.operationId}' for the structured schema`,
      );
    }
  }

  for (const qp of cmd.extraQuery) {
    sub.option(qp.required ? `--${qp.name} <value>` : `--${qp.name} [value]`, qp.desc);
  }

  sub.action(() =>
    run(async () => {
      const opts: Record<string, unknown> = sub.opts();
      const { config, format, fields, dryRun } = globals();

      const argsMap: Record<string, string> = {};
      cmd.args.forEach((arg, i) => {
        const value = sub.args[i];
        if (value) argsMap[arg.name] = value;
      });

      const extraQuery: Record<string, string> = {};
      for (const qp of cmd.extraQuery) {
        const val = optString(opts, camelCase(qp.name));
        if (val !== undefined) extraQuery[qp.name] = val;
      }

      const data = optString(opts, "data");
      const params: ExecuteParams = {
        args: argsMap,
        perPage: optString(opts, "perPage"),
        startingAfter: optString(opts, "startingAfter"),
        endingBefore: optString(opts, "endingBefore"),
        extraQuery,
        body: cmd.hasBody && data ? await resolveBody(data) : undefined,
      };

      const missing = missingArgs(cmd, params);
      if (missing.length) throw new InputError(`Missing required arguments: ${missing.join(", ")}`);

      if (dryRun) {
        const req = resolveRequest(cmd, params);
        console.log(JSON.stringify(dryRunRequest(config, req.method, req.path, req.query, req.body), null, 2));
        return;
      }

      assertWritable(config, cmd.method, cmd.path);
      const client = makeClient(config);
      const result = opts.all === true && cmd.paginatable
        ? await executeAllPages(cmd, params, client)
        : await executeCommand(cmd, params, client);
      print(result, format, fields);
    }),
  );
}

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

registerCommands();

program.parseAsync(process.argv).catch(fail);
