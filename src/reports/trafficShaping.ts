import { getTrafficShaping, updateTrafficShaping } from "../api.js";
import { InputError } from "../errors.js";
import { optNum, record, records, str, type JsonRecord } from "../json.js";
import { parsePositiveInt } from "./common.js";
import type { ReportContext } from "./context.js";

export const RULE_TYPES = ["application", "applicationCategory", "host", "port", "ipRange"] as const;
export type RuleType = (typeof RULE_TYPES)[number];

export const DIRECTIONS = ["src", "dst", "any"] as const;
export type Direction = (typeof DIRECTIONS)[number];

type IntInput = number | string | undefined;

export interface LimitsInput {
  /** Turn the limits off instead of setting them */
  disable?: boolean;
  limitUp?: IntInput;
  limitDown?: IntInput;
}

export interface RuleInput {
  type: string;
  value: string;
  direction?: string;
  dscpTag?: IntInput;
  limitUp?: IntInput;
  limitDown?: IntInput;
}

const isRuleType = (s: string): s is RuleType => RULE_TYPES.some((t) => t === s);
const isDirection = (s: string): s is Direction => DIRECTIONS.some((d) => d === s);

const given = (v: IntInput): v is number | string => v !== undefined && v !== "";

function limit(v: IntInput, name: string): number | undefined {
  return given(v) ? parsePositiveInt(v, name, 0) : undefined;
}

function parseDscp(raw: number | string): number {
  const n = typeof raw === "number" ? raw : Number(raw.trim());
  if (!Number.isInteger(n) || n < 0 || n > 63) {
    throw new InputError(`DSCP tag must be an integer between 0 and 63, got '${raw}'`);
  }
  return n;
}

// ── Update bodies ────────────────────────────────────────────────────

/** Supplied limits replace the current ones; absent ones keep the current value */
export function globalLimitsBody(current: JsonRecord, input: LimitsInput): JsonRecord {
  if (input.disable) return { globalBandwidthLimits: { limitUp: null, limitDown: null } };
  const existing = record(current, "globalBandwidthLimits");
  return {
    globalBandwidthLimits: {
      limitUp: limit(input.limitUp, "limitUp") ?? optNum(existing, "limitUp") ?? null,
      limitDown: limit(input.limitDown, "limitDown") ?? optNum(existing, "limitDown") ?? null,
    },
  };
}

/** A limit absent from both the input and the current settings is left out */
export function perClientLimitsBody(current: JsonRecord, input: LimitsInput): JsonRecord {
  if (input.disable) return { perClientBandwidthLimits: { settings: "disabled" } };
  const existing = record(record(current, "perClientBandwidthLimits"), "bandwidthLimits");

  const limits: JsonRecord = {};
  const up = limit(input.limitUp, "limitUp") ?? optNum(existing, "limitUp");
  const down = limit(input.limitDown, "limitDown") ?? optNum(existing, "limitDown");
  if (up) limits.limitUp = up;
  if (down) limits.limitDown = down;

  const settings: JsonRecord = { settings: "custom" };
  if (Object.keys(limits).length) settings.bandwidthLimits = limits;
  return { perClientBandwidthLimits: settings };
}

export function buildRule(input: RuleInput): JsonRecord {
  if (!isRuleType(input.type)) {
    throw new InputError(`Rule type must be one of ${RULE_TYPES.join(", ")}, got '${input.type}'`);
  }
  const value = input.value.trim();
  if (!value) throw new InputError("Rule value must not be empty");
  const direction = input.direction ?? "any";
  if (!isDirection(direction)) {
    throw new InputError(`Direction must be one of ${DIRECTIONS.join(", ")}, got '${direction}'`);
  }

  const rule: JsonRecord = { type: input.type, value, definition: { type: direction } };
  if (given(input.dscpTag)) rule.dscpTagValue = parseDscp(input.dscpTag);

  const up = limit(input.limitUp, "limitUp");
  const down = limit(input.limitDown, "limitDown");
  if (up !== undefined || down !== undefined) {
    const bandwidthLimits: JsonRecord = {};
    if (up !== undefined) bandwidthLimits.limitUp = up;
    if (down !== undefined) bandwidthLimits.limitDown = down;
    rule.perClientBandwidthLimits = { settings: "custom", bandwidthLimits };
  }
  return rule;
}

export function addRuleBody(current: JsonRecord, rule: JsonRecord): JsonRecord {
  return { rules: [...records(current.rules), rule] };
}

/** `index` is 1-based, as printed by {@link ruleLines} */
export function deleteRuleBody(current: JsonRecord, index: number): JsonRecord {
  const rules = records(current.rules);
  if (!rules.length) throw new InputError("No rules to delete.");
  if (!Number.isInteger(index) || index < 1 || index > rules.length) {
    throw new InputError(`Invalid rule number ${index}: choose 1-${rules.length}`);
  }
  return { rules: rules.filter((_, i) => i !== index - 1) };
}

export function ruleLines(current: JsonRecord): string[] {
  const rules = records(current.rules);
  if (!rules.length) return ["No traffic shaping rules configured."];
  return rules.map((rule, i) => `${i + 1}. ${str(rule, "type", "unknown")}: ${str(rule, "value", "unknown")}`);
}

// ── Operations ───────────────────────────────────────────────────────

export function showShaping(ctx: ReportContext, networkId: string): Promise<JsonRecord> {
  return getTrafficShaping(ctx.client, networkId);
}

async function update(
  ctx: ReportContext,
  networkId: string,
  build: (current: JsonRecord) => JsonRecord,
): Promise<unknown> {
  const body = build(await getTrafficShaping(ctx.client, networkId));
  return updateTrafficShaping(ctx.client, networkId, body);
}

export async function setGlobalLimits(ctx: ReportContext, networkId: string, input: LimitsInput): Promise<unknown> {
  const result = await update(ctx, networkId, (current) => globalLimitsBody(current, input));
  ctx.logger.info(input.disable ? "Global bandwidth limits disabled." : "Global bandwidth limits updated successfully.");
  return result;
}

export async function setPerClientLimits(ctx: ReportContext, networkId: string, input: LimitsInput): Promise<unknown> {
  const result = await update(ctx, networkId, (current) => perClientLimitsBody(current, input));
  ctx.logger.info(
    input.disable ? "Per-client bandwidth limits disabled." : "Per-client bandwidth limits updated successfully.",
  );
  return result;
}

export async function addRule(ctx: ReportContext, networkId: string, input: RuleInput): Promise<unknown> {
  const rule = buildRule(input);
  const result = await update(ctx, networkId, (current) => addRuleBody(current, rule));
  ctx.logger.info("Traffic shaping rule added successfully.");
  return result;
}

export async function deleteRule(ctx: ReportContext, networkId: string, index: number): Promise<unknown> {
  const result = await update(ctx, networkId, (current) => deleteRuleBody(current, index));
  ctx.logger.info("Traffic shaping rule deleted successfully.");
  return result;
}
