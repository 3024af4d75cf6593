import { afterEach, describe, it, expect } from "vitest";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { createDmnServer, type DmnServerOptions } from "../src/server.js";
import { ModelError } from "../src/errors.js";
import { setLogLevel, setLogSink } from "../src/log.js";

const FIXTURES = fileURLToPath(new URL("./fixtures/", import.meta.url));
const LOAN = join(FIXTURES, "loan.yaml");

async function connectClient(modelPath: string, options: DmnServerOptions = {}) {
  const { server } = createDmnServer(modelPath, { warnOnValidation: false, ...options });

  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  await server.connect(serverTransport);

  const client = new Client({ name: "test-client", version: "0.1.0" }, { capabilities: {} });
  await client.connect(clientTransport);

  return client;
}

function firstText(content: unknown): string {
  if (!Array.isArray(content)) return "";
  const [first] = content;
  if (typeof first !== "object" || first === null) return "";
  const text: unknown = Reflect.get(first, "text");
  return typeof text === "string" ? text : "";
}

afterEach(() => {
  setLogSink();
  setLogLevel("warn");
});

describe("createDmnServer", () => {
  it("throws on a missing model", () => {
    expect(() => createDmnServer("/nonexistent/model.yaml")).toThrow();
  });

  it("loads the loan model", () => {
    const dmn = createDmnServer(LOAN, { warnOnValidation: false });
    expect(dmn.modelSlug).toBe("loan-approval");
    expect(dmn.model.decisions).toHaveLength(4);
    expect(dmn.engine.decisionNames()).toContain("Approval");
  });

  it("rejects an invalid model", () => {
    expect(() => createDmnServer(join(FIXTURES, "cyclic.yaml"))).toThrow(ModelError);
    expect(() => createDmnServer(join(FIXTURES, "cyclic.yaml"))).toThrow(
      "Decision requirement cycle: a -> b -> a"
    );
  });

  it("rejects an unknown decision filter", () => {
    expect(() => createDmnServer(LOAN, { decisions: ["Ghost"] })).toThrow(
      `No decision named 'Ghost' in ${LOAN}`
    );
  });
});

describe("tools/list", () => {
  it("exposes one tool per decision", async () => {
    const client = await connectClient(LOAN);
    const { tools } = await client.listTools();
    expect(tools.map((t) => t.name)).toEqual(["age_category", "risk_level", "installment", "approval"]);
    const risk = tools.find((t) => t.name === "risk_level");
    expect(risk?.inputSchema.properties).toHaveProperty("employment");
    await client.close();
  });

  it("limits tools to the selected decisions", async () => {
    const client = await connectClient(LOAN, { decisions: ["Approval"] });
    const { tools } = await client.listTools();
    expect(tools.map((t) => t.name)).toEqual(["approval"]);
    await client.close();
  });
});

describe("tools/call", () => {
  it("evaluates a decision and returns JSON text", async () => {
    const client = await connectClient(LOAN);
    const result = await client.callTool({ name: "age_category", arguments: { age: 70 } });
    expect(result.isError).toBeFalsy();
    expect(firstText(result.content)).toBe('"Senior"');
    await client.close();
  });

  it("evaluates required decisions for the caller", async () => {
    const client = await connectClient(LOAN);
    const result = await client.callTool({
      name: "approval",
      arguments: { age: 30, "credit score": 650, employment: "employed" },
    });
    expect(firstText(result.content)).toBe('"Review"');
    await client.close();
  });

  it("returns null for a literal decision that cannot be computed", async () => {
    const client = await connectClient(LOAN);
    const result = await client.callTool({ name: "installment", arguments: {} });
    expect(result.isError).toBeFalsy();
    expect(firstText(result.content)).toBe("null");
    await client.close();
  });

  it("reports evaluation errors as tool errors", async () => {
    const client = await connectClient(LOAN);
    const result = await client.callTool({
      name: "risk_level",
      arguments: { "credit score": 720, employment: "retired" },
    });
    expect(result.isError).toBe(true);
    expect(firstText(result.content)).toBe(
      "Input value for 'employment' not in allowed values: retired"
    );
    await client.close();
  });

  it("reports unknown tools", async () => {
    const client = await connectClient(LOAN);
    const result = await client.callTool({ name: "nope", arguments: {} });
    expect(result.isError).toBe(true);
    expect(firstText(result.content)).toBe("Unknown tool: nope");
    await client.close();
  });
});

describe("resources", () => {
  it("lists the model and every exposed decision", async () => {
    const client = await connectClient(LOAN);
    const { resources } = await client.listResources();
    expect(resources.map((r) => r.uri)).toEqual([
      "dmn://loan-approval/model",
      "dmn://loan-approval/decisions/age_category",
      "dmn://loan-approval/decisions/risk_level",
      "dmn://loan-approval/decisions/installment",
      "dmn://loan-approval/decisions/approval",
    ]);
    await client.close();
  });

  it("reads the model summary as JSON", async () => {
    const client = await connectClient(LOAN);
    const result = await client.readResource({ uri: "dmn://loan-approval/model" });
    expect(result.contents).toHaveLength(1);
    expect(result.contents[0].mimeType).toBe("application/json");
    const parsed: unknown = JSON.parse(firstText(result.contents));
    expect(parsed).toMatchObject({ name: "Loan Approval", version: "1.0" });
    await client.close();
  });

  it("reads a decision with its rules", async () => {
    const client = await connectClient(LOAN);
    const result = await client.readResource({ uri: "dmn://loan-approval/decisions/age_category" });
    const parsed: unknown = JSON.parse(firstText(result.contents));
    expect(parsed).toMatchObject({ name: "Age Category", hitPolicy: "FIRST" });
    expect(parsed).toHaveProperty("rules");
    await client.close();
  });

  it("rejects unknown URIs", async () => {
    const client = await connectClient(LOAN);
    await expect(
      client.readResource({ uri: "dmn://loan-approval/decisions/nope" })
    ).rejects.toThrow();
    await client.close();
  });
});

describe("logging", () => {
  it("logs the served model at info level", () => {
    const lines: string[] = [];
    setLogSink((line) => lines.push(line));
    createDmnServer(LOAN, { warnOnValidation: false });
    expect(lines).toEqual([]);

    setLogLevel("info");
    createDmnServer(LOAN, { warnOnValidation: false });
    expect(lines).toEqual([
      "[dmn-engine] info: Serving 'Loan Approval' with 4 decision tool(s); model summary at dmn://loan-approval/model",
    ]);
  });

  it("logs validation warnings unless disabled", () => {
    const lines: string[] = [];
    setLogSink((line) => lines.push(line));
    const path = join(FIXTURES, "warnings.yaml");
    createDmnServer(path, { warnOnValidation: false });
    expect(lines).toEqual([]);
    createDmnServer(path);
    expect(lines).toEqual([
      "[dmn-engine] warning: Decision 'Pick': PRIORITY table declares no output priorities; the first match wins",
    ]);
  });
});
