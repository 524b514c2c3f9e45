import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import { ConfigError } from "./errors.js";
import { isRecord } from "./json.js";

export const DEFAULT_BASE_URL = "https://api.meraki.com/api/v1";

export interface Config {
  baseUrl: string;
  apiKey?: string;
  /** Organization name */
  org?: string;
  /** Network name */
  network?: string;
  outputDir: string;
  readOnly: boolean;
}

type Env = Record<string, string | undefined>;

export function configDir(env: Env = process.env): string {
  return env.MERAKI_CONFIG_DIR || join(env.HOME ?? homedir(), ".config", "meraki-cli");
}

export function configFile(env: Env = process.env): string {
  return join(configDir(env), "config.json");
}

export function loadFileConfig(env: Env = process.env): Partial<Config> {
  const file = configFile(env);
  if (!existsSync(file)) return {};
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(file, "utf-8"));
  } catch {
    return {};
  }
  if (!isRecord(parsed)) return {};

  const rec = parsed;
  const out: Partial<Config> = {};
  if (typeof rec.baseUrl === "string") out.baseUrl = rec.baseUrl;
  if (typeof rec.apiKey === "string") out.apiKey = rec.apiKey;
  if (typeof rec.org === "string") out.org = rec.org;
  if (typeof rec.network === "string") out.network = rec.network;
  if (typeof rec.outputDir === "string") out.outputDir = rec.outputDir;
  if (typeof rec.readOnly === "boolean") out.readOnly = rec.readOnly;
  return out;
}

export function saveConfig(config: Partial<Config>, env: Env = process.env): string {
  mkdirSync(configDir(env), { recursive: true });
  const existing = loadFileConfig(env);
  const merged = { ...existing, ...config };
  const file = configFile(env);
  writeFileSync(file, JSON.stringify(merged, null, 2) + "\n");
  return file;
}

function opt(cliOpts: Record<string, unknown>, key: string): string | undefined {
  const v = cliOpts[key];
  return typeof v === "string" && v !== "" ? v : undefined;
}

export function resolveConfig(cliOpts: Record<string, unknown>, env: Env = process.env): Config {
  const file = loadFileConfig(env);
  return {
    baseUrl: opt(cliOpts, "baseUrl") || env.MERAKI_BASE_URL || file.baseUrl || DEFAULT_BASE_URL,
    apiKey: opt(cliOpts, "apiKey") || env.MERAKI_API_KEY || file.apiKey,
    org: opt(cliOpts, "org") || env.MERAKI_ORG || file.org,
    network: opt(cliOpts, "network") || env.MERAKI_NETWORK || file.network,
    outputDir: opt(cliOpts, "outputDir") || env.MERAKI_OUTPUT_DIR || file.outputDir || ".",
    readOnly: !!(cliOpts.readOnly || env.MERAKI_READ_ONLY === "1" || file.readOnly),
  };
}

export function requireApiKey(config: Config): asserts config is Config & { apiKey: string } {
  if (!config.apiKey) {
    throw new ConfigError(
      "Missing API key. Set via --api-key, MERAKI_API_KEY env var, or run: meraki-cli configure",
    );
  }
}

export function requireTarget(config: Config): asserts config is Config & { org: string; network: string } {
  if (!config.org) {
    throw new ConfigError(
      "Missing organization name. Set via --org, MERAKI_ORG env var, or run: meraki-cli configure",
    );
  }
  if (!config.network) {
    throw new ConfigError(
      "Missing network name. Set via --network, MERAKI_NETWORK env var, or run: meraki-cli configure",
    );
  }
}
