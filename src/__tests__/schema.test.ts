import { describe, expect, test } from "vitest";
import {
  TRAFFIC_SHAPING_RULE_SCHEMA,
  TRAFFIC_SHAPING_SCHEMA,
  describeSchema,
  structuredSchema,
  toJsonSchema,
} from "../schema.js";

describe("describeSchema", () => {
  const lines = describeSchema(TRAFFIC_SHAPING_SCHEMA).split("\n");

  test("lists top-level properties with type and description", () => {
    expect(lines[0]).toBe("    globalBandwidthLimits: object  Bandwidth limits in Kbps (null = unlimited)");
    expect(lines).toContain("    rules: array<object>  Shaping rules, applied in order");
  });

  test("nests child properties with nullable types and enums", () => {
    expect(lines[1]).toBe("      limitUp: integer|null  Upload limit in Kbps");
    expect(lines).toContain("      settings: string [network default|ignore|custom|disabled]");
  });

  test("marks required properties with *", () => {
    const ruleLines = describeSchema(TRAFFIC_SHAPING_RULE_SCHEMA).split("\n");
    expect(ruleLines[0]).toBe(
      "  * type: string [application|applicationCategory|host|port|ipRange]  What the rule matches on",
    );
    expect(ruleLines[1]).toBe("  * value: string  Application, category, host name, port or CIDR range");
  });

  test("stops at maxDepth", () => {
    const flat = describeSchema(TRAFFIC_SHAPING_SCHEMA, 0).split("\n");
    expect(flat).toHaveLength(3);
  });
});

describe("structuredSchema", () => {
  test("returns name, type, required, description and enum", () => {
    const [type, value] = structuredSchema(TRAFFIC_SHAPING_RULE_SCHEMA);
    expect(type).toEqual({
      name: "type",
      type: "string [application|applicationCategory|host|port|ipRange]",
      required: true,
      description: "What the rule matches on",
      enum: ["application", "applicationCategory", "host", "port", "ipRange"],
    });
    expect(value.required).toBe(true);
  });

  test("nests object properties", () => {
    const global = structuredSchema(TRAFFIC_SHAPING_SCHEMA)[0];
    expect(global.properties).toEqual([
      { name: "limitUp", type: "integer|null", required: false, description: "Upload limit in Kbps" },
      { name: "limitDown", type: "integer|null", required: false, description: "Download limit in Kbps" },
    ]);
  });
});

describe("toJsonSchema", () => {
  test("converts nullable types, bounds and nesting", () => {
    const schema = toJsonSchema(TRAFFIC_SHAPING_SCHEMA);
    expect(schema.type).toBe("object");
    expect(schema.properties).toMatchObject({
      globalBandwidthLimits: {
        type: "object",
        properties: {
          limitUp: { type: ["integer", "null"], minimum: 1, description: "Upload limit in Kbps" },
        },
      },
    });
  });

  test("keeps array items and required lists", () => {
    const schema = toJsonSchema(TRAFFIC_SHAPING_SCHEMA);
    expect(schema.properties).toMatchObject({
      rules: {
        type: "array",
        items: { type: "object", required: ["type", "value"] },
      },
    });
  });

  test("collapses to a bare object past maxDepth", () => {
    const schema = toJsonSchema(TRAFFIC_SHAPING_SCHEMA, 1);
    expect(schema.properties).toEqual({
      globalBandwidthLimits: { type: "object" },
      perClientBandwidthLimits: { type: "object" },
      rules: { type: "object" },
    });
  });
});
