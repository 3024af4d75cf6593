#!/usr/bin/env node
// DMN engine CLI
// Usage: dmn-engine [model.yaml] [--data <file|json>] [--decision <name>]
//                   [--transport stdio|http] [--port 8000]

import { existsSync } from "node:fs";
import { parseArgs } from "node:util";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { readContext } from "./context.js";
import { DecisionEngine, type EngineOptions } from "./engine.js";
import { ModelError, errorMessage } from "./errors.js";
import type { Value } from "./feel/values.js";
import { parseFile } from "./loader.js";
import { isLogLevel, log, setLogLevel } from "./log.js";
import { createDmnServer, type DmnMcpServer } from "./server.js";
import { validate } from "./validator.js";

function printUsage(): void {
  process.stderr.write(
    `Usage: dmn-engine [path/to/model.yaml] [options]

Options:
  --data <file|json>     Evaluate once against this input (JSON/YAML file or inline JSON)
  --decision <name>      Evaluate (or serve) only this decision
  --transport <type>     Transport when serving: stdio (default) or http
  --port <number>        Port for HTTP transport (default: 8000)
  --max-bkm-depth <n>    Maximum nested BKM invocations (default: 64)
  --log-level <level>    debug, info, warn, error or silent (default: info)
  --no-warnings          Suppress model validation warnings
  --help, -h             Show this help

Examples:
  dmn-engine loan.yaml --data '{"age": 70}'       # print the results as JSON
  dmn-engine loan.yaml --data applicant.json --decision "Age Category"
  dmn-engine loan.yaml                            # serve decisions via MCP over stdio
  dmn-engine loan.yaml --transport http --port 9000

Without --data the model is served over MCP: one tool per decision.
`
  );
}

function fail(message: string): never {
  process.stderr.write(`Error: ${message}\n`);
  process.exit(1);
}

function evaluateOnce(
  modelPath: string,
  dataSource: string,
  decision: string | undefined,
  warnOnValidation: boolean,
  engineOptions: EngineOptions
): Record<string, Value> {
  const model = parseFile(modelPath);
  const result = validate(model);
  if (warnOnValidation) {
    for (const w of result.warnings) log.warn(w);
  }
  if (!result.isValid) {
    throw new ModelError(`Invalid model ${modelPath}:\n${result.errors.join("\n")}`);
  }

  const engine = new DecisionEngine(model, engineOptions);
  const context = readContext(dataSource);
  if (decision !== undefined) {
    return { [decision]: engine.evaluateDecision(decision, context) };
  }
  return engine.evaluate(context);
}

async function main(): Promise<void> {
  const { values, positionals } = parseArgs({
    args: process.argv.slice(2),
    options: {
      data: { type: "string" },
      decision: { type: "string" },
      transport: { type: "string", default: "stdio" },
      port: { type: "string", default: "8000" },
      "max-bkm-depth": { type: "string" },
      "log-level": { type: "string", default: "info" },
      "no-warnings": { type: "boolean", default: false },
      help: { type: "boolean", default: false, short: "h" },
    },
    allowPositionals: true,
  });

  if (values.help) {
    printUsage();
    process.exit(0);
  }

  const level = values["log-level"] ?? "info";
  if (!isLogLevel(level)) fail(`unknown log level: ${level}`);
  setLogLevel(level);

  const engineOptions: EngineOptions = {};
  const depthText = values["max-bkm-depth"];
  if (depthText !== undefined) {
    const depth = Number(depthText);
    if (!Number.isInteger(depth) || depth < 1) fail(`invalid --max-bkm-depth: ${depthText}`);
    engineOptions.maxBkmDepth = depth;
  }

  const modelPath = positionals[0] ?? "model.yaml";
  if (!existsSync(modelPath)) fail(`model not found: ${modelPath}`);

  const warnOnValidation = !values["no-warnings"];

  // --- One-shot evaluation ---

  if (values.data !== undefined) {
    try {
      const results = evaluateOnce(modelPath, values.data, values.decision, warnOnValidation, engineOptions);
      process.stdout.write(JSON.stringify(results, null, 2) + "\n");
    } catch (err) {
      fail(errorMessage(err));
    }
    return;
  }

  // --- MCP serving ---

  let dmnServer: DmnMcpServer;
  try {
    dmnServer = createDmnServer(modelPath, {
      ...engineOptions,
      warnOnValidation,
      decisions: values.decision !== undefined ? [values.decision] : undefined,
    });
  } catch (err) {
    fail(errorMessage(err));
  }

  const transport = values.transport ?? "stdio";

  if (transport === "http") {
    // Streamable HTTP transport
    const port = parseInt(values.port ?? "8000", 10);
    const { StreamableHTTPServerTransport } = await import(
      "@modelcontextprotocol/sdk/server/streamableHttp.js"
    );
    const http = await import("node:http");

    let sessionTransport: InstanceType<typeof StreamableHTTPServerTransport> | null = null;

    const httpServer = http.createServer(async (req, res) => {
      if (!sessionTransport) {
        sessionTransport = new StreamableHTTPServerTransport({
          sessionIdGenerator: undefined, // stateless
        });
        await dmnServer.server.connect(sessionTransport);
      }
      await sessionTransport.handleRequest(req, res);
    });

    httpServer.listen(port, () => {
      log.info(`HTTP transport listening on http://localhost:${port}/mcp`);
    });
  } else if (transport === "stdio") {
    const stdioTransport = new StdioServerTransport();
    await dmnServer.server.connect(stdioTransport);
  } else {
    fail(`unknown transport: ${transport}`);
  }
}

main().catch((err: unknown) => {
  process.stderr.write(`Fatal: ${errorMessage(err)}\n`);
  process.exit(1);
});
