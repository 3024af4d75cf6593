// DMN MCP Server
// Loads a decision model and exposes each decision as an MCP tool, plus the
// model and its decisions as MCP resources.

import { resolve } from "node:path";
import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
  CallToolRequestSchema,
  ListResourcesRequestSchema,
  ListToolsRequestSchema,
  ReadResourceRequestSchema,
} from "@modelcontextprotocol/sdk/types.js";
import { DecisionEngine, type EngineOptions } from "./engine.js";
import { ModelError, errorMessage } from "./errors.js";
import { isContext, toValue } from "./feel/values.js";
import { parseFile } from "./loader.js";
import { log } from "./log.js";
import {
  buildDecisionResource,
  buildDecisionTool,
  buildDecisionUri,
  buildModelResource,
  buildModelUri,
  decisionToJson,
  modelToJson,
  toModelSlug,
  type McpResourceMeta,
  type McpToolMeta,
} from "./mapper.js";
import type { Decision, DecisionModel } from "./model.js";
import { validate } from "./validator.js";

export interface DmnServerOptions extends EngineOptions {
  warnOnValidation?: boolean;
  /** Expose only these decisions (by name); default is all. */
  decisions?: string[];
}

export interface DmnMcpServer {
  server: Server;
  engine: DecisionEngine;
  model: DecisionModel;
  modelSlug: string;
}

type ToolResult = {
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
};

function textResult(text: string, isError = false): ToolResult {
  return isError ? { content: [{ type: "text", text }], isError } : { content: [{ type: "text", text }] };
}

/**
 * Create an MCP Server for a decision model file.
 *
 * @param modelPath  Path to the YAML or JSON model
 * @param options    warnOnValidation: log validation warnings; decisions: limit the exposed tools
 */
export function createDmnServer(
  modelPath: string,
  options: DmnServerOptions = {}
): DmnMcpServer {
  const { warnOnValidation = true, decisions: only, ...engineOptions } = options;

  const resolvedPath = resolve(modelPath);
  const model = parseFile(resolvedPath);
  const result = validate(model);

  if (warnOnValidation) {
    for (const w of result.warnings) log.warn(w);
  }
  if (!result.isValid) {
    throw new ModelError(`Invalid model ${resolvedPath}:\n${result.errors.join("\n")}`);
  }

  for (const name of only ?? []) {
    if (!model.decisions.some((d) => d.name === name)) {
      throw new ModelError(`No decision named '${name}' in ${resolvedPath}`);
    }
  }

  const engine = new DecisionEngine(model, engineOptions);
  const modelSlug = toModelSlug(model.name);

  const exposed = model.decisions.filter((d) => !only || only.includes(d.name));
  const toolIndex = new Map<string, Decision>();
  const tools: McpToolMeta[] = [];
  for (const decision of exposed) {
    const tool = buildDecisionTool(decision);
    if (toolIndex.has(tool.name)) {
      throw new ModelError(`Decisions '${toolIndex.get(tool.name)?.name}' and '${decision.name}' map to the same tool name '${tool.name}'`);
    }
    toolIndex.set(tool.name, decision);
    tools.push(tool);
  }

  const modelUri = buildModelUri(modelSlug);
  const resourceList: McpResourceMeta[] = [
    buildModelResource(model, modelSlug),
    ...exposed.map((d) => buildDecisionResource(d, modelSlug)),
  ];
  const resourceIndex = new Map<string, Decision>(
    exposed.map((d) => [buildDecisionUri(modelSlug, d.name), d])
  );

  const server = new Server(
    { name: `dmn-${modelSlug}`, version: "0.1.0" },
    {
      capabilities: {
        tools: {},
        resources: {},
      },
    }
  );

  log.info(`Serving '${model.name}' with ${tools.length} decision tool(s); model summary at ${modelUri}`);

  // --- handlers ---

  server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const decision = toolIndex.get(request.params.name);
    if (!decision) {
      return textResult(`Unknown tool: ${request.params.name}`, true);
    }

    const context = toValue(request.params.arguments ?? {});
    if (!isContext(context)) {
      return textResult("Tool arguments must be an object", true);
    }

    try {
      const value = engine.evaluateDecision(decision.name, context);
      return textResult(JSON.stringify(value, null, 2));
    } catch (err) {
      log.debug(`Tool '${request.params.name}' failed: ${errorMessage(err)}`);
      return textResult(errorMessage(err), true);
    }
  });

  server.setRequestHandler(ListResourcesRequestSchema, async () => ({
    resources: resourceList,
  }));

  server.setRequestHandler(ReadResourceRequestSchema, async (request) => {
    const uri = request.params.uri;

    if (uri === modelUri) {
      return {
        contents: [{ uri, mimeType: "application/json", text: modelToJson(model) }],
      };
    }

    const decision = resourceIndex.get(uri);
    if (!decision) {
      throw new Error(`Unknown resource URI: ${uri}`);
    }
    return {
      contents: [{ uri, mimeType: "application/json", text: decisionToJson(decision) }],
    };
  });

  return { server, engine, model, modelSlug };
}
