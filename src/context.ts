// Input data for an evaluation: inline JSON or a JSON/YAML file.

import { readFileSync } from "node:fs";
import { extname } from "node:path";
import yaml from "js-yaml";
import { ModelError, errorMessage } from "./errors.js";
import { isContext, toValue, type Context } from "./feel/values.js";

const YAML_EXTENSIONS = new Set([".yaml", ".yml"]);

/** Parse context text; `origin` names the source in error messages. */
export function parseContext(text: string, format: "json" | "yaml", origin: string): Context {
  let data: unknown;
  try {
    data = format === "json" ? JSON.parse(text) : yaml.load(text, { schema: yaml.DEFAULT_SCHEMA });
  } catch (err) {
    throw new ModelError(`Invalid input data in ${origin}: ${errorMessage(err)}`);
  }
  const value = toValue(data);
  if (!isContext(value)) {
    throw new ModelError(`Input data in ${origin} must be an object`);
  }
  return value;
}

/**
 * Read an evaluation context. An argument starting with `{` is inline JSON;
 * anything else is a path to a .json, .yaml or .yml file.
 */
export function readContext(source: string): Context {
  const trimmed = source.trim();
  if (trimmed.startsWith("{")) {
    return parseContext(trimmed, "json", "inline data");
  }
  const raw = readFileSync(source, "utf-8");
  const format = YAML_EXTENSIONS.has(extname(source).toLowerCase()) ? "yaml" : "json";
  return parseContext(raw, format, source);
}
