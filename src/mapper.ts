// Decision model → MCP tool and resource mapping. Pure functions, no I/O.

import { parseNumeric } from "./feel/values.js";
import type { Decision, DecisionModel, InputClause } from "./model.js";

// --- Names and URIs ---

export function toModelSlug(name: string): string {
  return (
    name
      .toLowerCase()
      .replace(/[^a-z0-9]+/g, "-")
      .replace(/^-|-$/g, "") || "model"
  );
}

export function toToolName(decisionName: string): string {
  return (
    decisionName
      .toLowerCase()
      .replace(/[^a-z0-9]+/g, "_")
      .replace(/^_|_$/g, "") || "decision"
  );
}

export function buildModelUri(modelSlug: string): string {
  return `dmn://${modelSlug}/model`;
}

export function buildDecisionUri(modelSlug: string, decisionName: string): string {
  return `dmn://${modelSlug}/decisions/${toToolName(decisionName)}`;
}

// --- Tool shapes ---
// Plain objects matching the MCP tool schema, kept free of SDK types.

export type JsonSchemaProperty = {
  type?: "number" | "string" | "boolean";
  description?: string;
  enum?: Array<string | number>;
};

export type ToolInputSchema = {
  type: "object";
  properties: Record<string, JsonSchemaProperty>;
  additionalProperties: boolean;
};

export type McpToolMeta = {
  name: string;
  title: string;
  description: string;
  inputSchema: ToolInputSchema;
};

const TYPE_REFS: Record<string, JsonSchemaProperty["type"]> = {
  number: "number",
  integer: "number",
  string: "string",
  boolean: "boolean",
};

function inputProperty(input: InputClause): JsonSchemaProperty {
  const type = input.typeRef ? TYPE_REFS[input.typeRef.toLowerCase()] : undefined;
  const property: JsonSchemaProperty = {};
  if (type) property.type = type;
  if (input.allowedValues.length > 0) {
    const numbers = input.allowedValues.map(parseNumeric);
    property.enum =
      type === "number" && numbers.every((n): n is number => n !== null)
        ? numbers
        : [...input.allowedValues];
  }
  property.description = input.typeRef
    ? `Input '${input.label}' (${input.typeRef})`
    : `Input '${input.label}'`;
  return property;
}

export function buildToolInputSchema(decision: Decision): ToolInputSchema {
  const properties: Record<string, JsonSchemaProperty> = {};
  if (decision.kind === "table") {
    for (const input of decision.table.inputs) {
      properties[input.label] = inputProperty(input);
    }
  }
  return { type: "object", properties, additionalProperties: true };
}

export function buildDescription(decision: Decision): string {
  const parts: string[] = [];
  if (decision.description) parts.push(decision.description, "");

  if (decision.kind === "table") {
    const table = decision.table;
    const policy =
      table.hitPolicy === "COLLECT" && table.aggregation !== "NONE"
        ? `COLLECT ${table.aggregation}`
        : table.hitPolicy;
    parts.push(`Decision table, hit policy ${policy}, ${table.rules.length} rule(s)`);
    parts.push(`Inputs: ${table.inputs.map((i) => i.label).join(", ") || "(none)"}`);
    parts.push(`Outputs: ${table.outputs.map((o) => o.label).join(", ") || "(none)"}`);
  } else {
    parts.push(`Literal FEEL expression: ${decision.literal.expression}`);
  }

  if (decision.requires.length > 0) {
    parts.push(`Requires: ${decision.requires.join(", ")}`);
  }
  return parts.join("\n");
}

export function buildDecisionTool(decision: Decision): McpToolMeta {
  return {
    name: toToolName(decision.name),
    title: decision.name,
    description: buildDescription(decision),
    inputSchema: buildToolInputSchema(decision),
  };
}

// --- Resource shapes ---

export type McpResourceMeta = {
  uri: string;
  name: string;
  title: string;
  description: string;
  mimeType: string;
};

export function buildModelResource(model: DecisionModel, modelSlug: string): McpResourceMeta {
  const n = model.decisions.length;
  return {
    uri: buildModelUri(modelSlug),
    name: "model",
    title: `Decision model: ${model.name}`,
    description:
      `Summary of all ${n} decision(s) and ${model.bkms.length} business knowledge model(s) in '${model.name}'. ` +
      `Returns JSON with each decision's inputs, outputs and requirements.`,
    mimeType: "application/json",
  };
}

export function buildDecisionResource(decision: Decision, modelSlug: string): McpResourceMeta {
  return {
    uri: buildDecisionUri(modelSlug, decision.name),
    name: toToolName(decision.name),
    title: decision.name,
    description: buildDescription(decision),
    mimeType: "application/json",
  };
}

// --- JSON serialization ---

function decisionSummary(decision: Decision): Record<string, unknown> {
  const entry: Record<string, unknown> = { name: decision.name, kind: decision.kind };
  if (decision.description) entry["description"] = decision.description;
  if (decision.requires.length > 0) entry["requires"] = decision.requires;

  if (decision.kind === "literal") {
    entry["expression"] = decision.literal.expression;
    return entry;
  }

  const table = decision.table;
  entry["hitPolicy"] = table.hitPolicy;
  if (table.hitPolicy === "COLLECT") entry["aggregation"] = table.aggregation;
  entry["inputs"] = table.inputs.map((input) => {
    const out: Record<string, unknown> = { label: input.label };
    if (input.typeRef) out["typeRef"] = input.typeRef;
    if (input.allowedValues.length > 0) out["allowedValues"] = input.allowedValues;
    return out;
  });
  entry["outputs"] = table.outputs.map((output) => {
    const out: Record<string, unknown> = { label: output.label };
    if (output.typeRef) out["typeRef"] = output.typeRef;
    if (output.priorities.length > 0) out["priorities"] = output.priorities;
    if (output.defaultValue) out["default"] = output.defaultValue.text;
    return out;
  });
  entry["rules"] = table.rules.map((rule) => {
    const out: Record<string, unknown> = {
      inputs: rule.inputEntries.map((e) => e.text),
      outputs: rule.outputEntries.map((e) => e.text),
    };
    if (rule.id) out["id"] = rule.id;
    if (rule.description) out["description"] = rule.description;
    return out;
  });
  return entry;
}

export function decisionToJson(decision: Decision): string {
  return JSON.stringify(decisionSummary(decision), null, 2);
}

export function modelToJson(model: DecisionModel): string {
  const payload = {
    name: model.name,
    version: model.version,
    description: model.description ?? null,
    decisions: model.decisions.map((d) => {
      const summary = decisionSummary(d);
      delete summary["rules"];
      return { ...summary, tool: toToolName(d.name) };
    }),
    bkms: model.bkms.map((b) => ({
      name: b.name,
      parameters: b.parameters,
      expression: b.expression,
    })),
  };
  return JSON.stringify(payload, null, 2);
}
