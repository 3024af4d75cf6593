import { describe, it, expect } from "vitest";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import {
  toModelSlug,
  toToolName,
  buildModelUri,
  buildDecisionUri,
  buildToolInputSchema,
  buildDescription,
  buildDecisionTool,
  buildModelResource,
  buildDecisionResource,
  decisionToJson,
  modelToJson,
} from "../src/mapper.js";
import { parseDict, parseFile } from "../src/loader.js";
import type { Decision } from "../src/model.js";

const FIXTURES = fileURLToPath(new URL("./fixtures/", import.meta.url));
const model = parseFile(join(FIXTURES, "loan.yaml"));

function decision(name: string): Decision {
  const found = model.decisions.find((d) => d.name === name);
  if (!found) throw new Error(`no decision ${name}`);
  return found;
}

describe("toModelSlug / toToolName", () => {
  it("slugs model names with hyphens", () => {
    expect(toModelSlug("Loan Approval")).toBe("loan-approval");
    expect(toModelSlug("  Credit -- Rules v2 ")).toBe("credit-rules-v2");
    expect(toModelSlug("!!!")).toBe("model");
  });

  it("slugs decision names with underscores", () => {
    expect(toToolName("Age Category")).toBe("age_category");
    expect(toToolName("Risk-Level (v2)")).toBe("risk_level_v2");
    expect(toToolName("  ")).toBe("decision");
  });
});

describe("URIs", () => {
  it("builds model and decision URIs", () => {
    expect(buildModelUri("loan-approval")).toBe("dmn://loan-approval/model");
    expect(buildDecisionUri("loan-approval", "Risk Level")).toBe(
      "dmn://loan-approval/decisions/risk_level"
    );
  });
});

describe("buildToolInputSchema", () => {
  it("maps table inputs to schema properties", () => {
    expect(buildToolInputSchema(decision("Risk Level"))).toEqual({
      type: "object",
      properties: {
        "credit score": { type: "number", description: "Input 'credit score' (number)" },
        employment: {
          type: "string",
          enum: ["employed", "self-employed", "unemployed"],
          description: "Input 'employment' (string)",
        },
      },
      additionalProperties: true,
    });
  });

  it("uses numeric enums for number inputs", () => {
    const numeric = parseDict({
      name: "N",
      decisions: [
        {
          name: "Grade",
          table: {
            inputs: [
              { label: "level", typeRef: "integer", allowedValues: [1, 2, 3] },
              { label: "code" },
            ],
            outputs: [{ label: "out" }],
            rules: [],
          },
        },
      ],
    });
    expect(buildToolInputSchema(numeric.decisions[0]).properties).toEqual({
      level: { type: "number", enum: [1, 2, 3], description: "Input 'level' (integer)" },
      code: { description: "Input 'code'" },
    });
  });

  it("has no declared properties for literal decisions", () => {
    expect(buildToolInputSchema(decision("Installment"))).toEqual({
      type: "object",
      properties: {},
      additionalProperties: true,
    });
  });
});

describe("buildDescription", () => {
  it("summarises a table decision", () => {
    expect(buildDescription(decision("Age Category"))).toBe(
      [
        "Buckets the applicant by age",
        "",
        "Decision table, hit policy FIRST, 3 rule(s)",
        "Inputs: age",
        "Outputs: category",
      ].join("\n")
    );
  });

  it("lists requirements", () => {
    expect(buildDescription(decision("Approval"))).toBe(
      [
        "Decision table, hit policy PRIORITY, 3 rule(s)",
        "Inputs: Age Category, Risk Level",
        "Outputs: status",
        "Requires: Age Category, Risk Level",
      ].join("\n")
    );
  });

  it("shows the expression of a literal decision", () => {
    expect(buildDescription(decision("Installment"))).toBe(
      "Literal FEEL expression: monthly installment(amount, term)"
    );
  });

  it("names the collect aggregation", () => {
    const collect = parseDict({
      name: "C",
      decisions: [{ name: "Total", table: { hitPolicy: "C+", outputs: [{ label: "x" }] } }],
    });
    expect(buildDescription(collect.decisions[0])).toBe(
      "Decision table, hit policy COLLECT SUM, 0 rule(s)\nInputs: (none)\nOutputs: x"
    );
  });
});

describe("tools and resources", () => {
  it("builds a tool per decision", () => {
    const tool = buildDecisionTool(decision("Age Category"));
    expect(tool.name).toBe("age_category");
    expect(tool.title).toBe("Age Category");
    expect(tool.inputSchema.properties).toHaveProperty("age");
  });

  it("builds the model resource", () => {
    expect(buildModelResource(model, "loan-approval")).toEqual({
      uri: "dmn://loan-approval/model",
      name: "model",
      title: "Decision model: Loan Approval",
      description:
        "Summary of all 4 decision(s) and 1 business knowledge model(s) in 'Loan Approval'. " +
        "Returns JSON with each decision's inputs, outputs and requirements.",
      mimeType: "application/json",
    });
  });

  it("builds a decision resource", () => {
    const resource = buildDecisionResource(decision("Installment"), "loan-approval");
    expect(resource).toEqual({
      uri: "dmn://loan-approval/decisions/installment",
      name: "installment",
      title: "Installment",
      description: "Literal FEEL expression: monthly installment(amount, term)",
      mimeType: "application/json",
    });
  });
});

describe("JSON serialization", () => {
  it("serializes a table decision with its rules", () => {
    expect(JSON.parse(decisionToJson(decision("Age Category")))).toEqual({
      name: "Age Category",
      kind: "table",
      description: "Buckets the applicant by age",
      hitPolicy: "FIRST",
      inputs: [{ label: "age", typeRef: "number" }],
      outputs: [{ label: "category", typeRef: "string", default: '"Unknown"' }],
      rules: [
        { inputs: ["< 18"], outputs: ['"Minor"'] },
        { inputs: ["[18..64]"], outputs: ['"Adult"'] },
        { inputs: [">= 65"], outputs: ['"Senior"'] },
      ],
    });
  });

  it("keeps rule ids and descriptions", () => {
    const parsed = JSON.parse(decisionToJson(decision("Risk Level")));
    expect(parsed.rules[0]).toEqual({
      id: "low",
      description: "Good score with an income",
      inputs: [">= 700", '"employed", "self-employed"'],
      outputs: ['"Low"'],
    });
  });

  it("summarises the model without rules", () => {
    const parsed = JSON.parse(modelToJson(model));
    expect(parsed.name).toBe("Loan Approval");
    expect(parsed.version).toBe("1.0");
    expect(parsed.description).toBe("Credit decisions for personal loans");
    expect(parsed.decisions).toHaveLength(4);
    expect(parsed.decisions[0].tool).toBe("age_category");
    expect(parsed.decisions[0].rules).toBeUndefined();
    expect(parsed.decisions[2]).toEqual({
      name: "Installment",
      kind: "literal",
      expression: "monthly installment(amount, term)",
      tool: "installment",
    });
    expect(parsed.decisions[3].requires).toEqual(["Age Category", "Risk Level"]);
    expect(parsed.bkms).toEqual([
      { name: "monthly installment", parameters: ["amount", "months"], expression: "amount / months" },
    ]);
  });
});
