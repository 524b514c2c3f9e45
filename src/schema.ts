// Request body schemas for endpoints that take a body.

export interface SchemaObject {
  type?: string;
  enum?: (string | number)[];
  properties?: Record<string, SchemaObject>;
  required?: string[];
  items?: SchemaObject;
  description?: string;
  minimum?: number;
  maximum?: number;
  nullable?: boolean;
}

const BANDWIDTH_LIMITS: SchemaObject = {
  type: "object",
  description: "Bandwidth limits in Kbps (null = unlimited)",
  properties: {
    limitUp: { type: "integer", minimum: 1, nullable: true, description: "Upload limit in Kbps" },
    limitDown: { type: "integer", minimum: 1, nullable: true, description: "Download limit in Kbps" },
  },
};

const PER_CLIENT_LIMITS: SchemaObject = {
  type: "object",
  description: "Per-client bandwidth limits",
  properties: {
    settings: { type: "string", enum: ["network default", "ignore", "custom", "disabled"] },
    bandwidthLimits: BANDWIDTH_LIMITS,
  },
};

export const TRAFFIC_SHAPING_RULE_SCHEMA: SchemaObject = {
  type: "object",
  required: ["type", "value"],
  properties: {
    type: {
      type: "string",
      enum: ["application", "applicationCategory", "host", "port", "ipRange"],
      description: "What the rule matches on",
    },
    value: { type: "string", description: "Application, category, host name, port or CIDR range" },
    definition: {
      type: "object",
      properties: { type: { type: "string", enum: ["src", "dst", "any"] } },
      description: "Traffic direction",
    },
    dscpTagValue: { type: "integer", minimum: 0, maximum: 63, description: "DSCP tag to apply" },
    perClientBandwidthLimits: PER_CLIENT_LIMITS,
  },
};

export const TRAFFIC_SHAPING_SCHEMA: SchemaObject = {
  type: "object",
  description: "Traffic shaping settings",
  properties: {
    globalBandwidthLimits: BANDWIDTH_LIMITS,
    perClientBandwidthLimits: PER_CLIENT_LIMITS,
    rules: { type: "array", items: TRAFFIC_SHAPING_RULE_SCHEMA, description: "Shaping rules, applied in order" },
  },
};

/** Flatten a schema into a list of property descriptions for help text */
export function describeSchema(schema: SchemaObject, maxDepth = 2): string {
  return describeSchemaObject(schema, "", maxDepth);
}

function describeSchemaObject(schema: SchemaObject, indent: string, depth: number): string {
  const lines: string[] = [];
  const required = new Set(schema.required ?? []);

  for (const [name, prop] of Object.entries(schema.properties ?? {})) {
    const req = required.has(name) ? "*" : " ";
    const desc = prop.description ? `  ${prop.description.split("\n")[0].slice(0, 70)}` : "";
    lines.push(`${indent}  ${req} ${name}: ${propType(prop)}${desc}`);
    if (depth > 0 && prop.properties) {
      lines.push(describeSchemaObject(prop, indent + "  ", depth - 1));
    }
  }

  return lines.join("\n");
}

function propType(prop: SchemaObject): string {
  if (prop.enum) return `${prop.type ?? "string"} [${prop.enum.join("|")}]`;
  if (prop.type === "array") return `array<${prop.items?.type ?? "?"}>`;
  const base = prop.type ?? "object";
  return prop.nullable ? `${base}|null` : base;
}

/** Structured property list (for JSON output of `meraki-cli schema`) */
export function structuredSchema(schema: SchemaObject, maxDepth = 2): Record<string, unknown>[] {
  const result: Record<string, unknown>[] = [];
  const required = new Set(schema.required ?? []);

  for (const [name, prop] of Object.entries(schema.properties ?? {})) {
    const entry: Record<string, unknown> = {
      name,
      type: propType(prop),
      required: required.has(name),
    };
    if (prop.description) entry.description = prop.description.split("\n")[0];
    if (prop.enum) entry.enum = prop.enum;
    if (prop.properties && maxDepth > 0) {
      entry.properties = structuredSchema(prop, maxDepth - 1);
    }
    result.push(entry);
  }

  return result;
}

/** Convert to a self-contained JSON Schema object */
export function toJsonSchema(schema: SchemaObject, maxDepth = 4): Record<string, unknown> {
  if (maxDepth <= 0) return { type: "object" };

  const type = schema.nullable && schema.type ? [schema.type, "null"] : schema.type ?? "object";
  const result: Record<string, unknown> = { type };
  if (schema.description) result.description = schema.description;
  if (schema.enum) result.enum = schema.enum;
  if (schema.minimum !== undefined) result.minimum = schema.minimum;
  if (schema.maximum !== undefined) result.maximum = schema.maximum;

  if (schema.type === "array" && schema.items) {
    result.items = toJsonSchema(schema.items, maxDepth - 1);
  }

  if (schema.properties) {
    const props: Record<string, unknown> = {};
    for (const [name, prop] of Object.entries(schema.properties)) {
      props[name] = toJsonSchema(prop, maxDepth - 1);
    }
    result.properties = props;
  }
  if (schema.required) result.required = schema.required;

  return result;
}
