/**
 * Tool Catalog
 *
 * The tool definitions sent to the model live in catalog.json. They are
 * loaded once and checked against the handler table: every catalog entry
 * needs a handler and every handler an entry.
 */

import { readFileSync } from "fs";
import { assetPath } from "../assets.js";
import { createComponentLogger } from "../logging.js";
import type { JsonSchemaProperty, ToolDefinition, ToolInputSchema } from "../llm/types.js";
import { TOOL_NAMES, isToolName } from "./types.js";

const log = createComponentLogger("tools.catalog");

export const CATALOG_PATH = assetPath("src/tools/catalog.json");

// ============================================
// VALIDATION
// ============================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseProperty(value: unknown, where: string): JsonSchemaProperty {
  if (!isRecord(value)) {
    throw new Error(`${where}: property schema must be an object`);
  }
  const property: JsonSchemaProperty = {};
  if (typeof value.type === "string") property.type = value.type;
  if (typeof value.description === "string") property.description = value.description;
  if (Array.isArray(value.enum)) {
    property.enum = value.enum.filter((item): item is string => typeof item === "string");
  }
  if ("default" in value) property.default = value.default;
  if (value.items !== undefined) property.items = parseProperty(value.items, `${where}.items`);
  if (value.properties !== undefined) {
    if (!isRecord(value.properties)) throw new Error(`${where}.properties must be an object`);
    property.properties = Object.fromEntries(
      Object.entries(value.properties).map(([key, child]) => [key, parseProperty(child, `${where}.${key}`)]),
    );
  }
  return property;
}

function parseSchema(value: unknown, name: string): ToolInputSchema {
  if (!isRecord(value) || value.type !== "object" || !isRecord(value.properties)) {
    throw new Error(`${name}: input_schema must be an object schema with properties`);
  }

  const properties = Object.fromEntries(
    Object.entries(value.properties).map(([key, child]) => [key, parseProperty(child, `${name}.${key}`)]),
  );

  const required = value.required ?? [];
  if (!Array.isArray(required) || !required.every((key): key is string => typeof key === "string")) {
    throw new Error(`${name}: required must be a list of property names`);
  }
  for (const key of required) {
    if (!(key in properties)) {
      throw new Error(`${name}: required property "${key}" is not declared`);
    }
  }

  return { type: "object", properties, required };
}

/** Validate raw catalog data; throws on the first problem found */
export function parseCatalog(data: unknown): ToolDefinition[] {
  if (!Array.isArray(data)) {
    throw new Error("Tool catalog must be a list");
  }

  const seen = new Set<string>();
  const tools = data.map((entry: unknown, index): ToolDefinition => {
    if (!isRecord(entry) || typeof entry.name !== "string" || typeof entry.description !== "string") {
      throw new Error(`Tool catalog entry ${index} needs a name and a description`);
    }
    if (seen.has(entry.name)) {
      throw new Error(`Duplicate tool in catalog: ${entry.name}`);
    }
    seen.add(entry.name);
    if (!isToolName(entry.name)) {
      throw new Error(`Tool "${entry.name}" has no handler`);
    }
    return { name: entry.name, description: entry.description, input_schema: parseSchema(entry.input_schema, entry.name) };
  });

  const missing = TOOL_NAMES.filter(name => !seen.has(name));
  if (missing.length > 0) {
    throw new Error(`Tool catalog is missing: ${missing.join(", ")}`);
  }

  return tools;
}

// ============================================
// LOADING
// ============================================

let cached: ToolDefinition[] | null = null;

export function loadCatalog(path: string = CATALOG_PATH): ToolDefinition[] {
  if (cached && path === CATALOG_PATH) return cached;

  const tools = parseCatalog(JSON.parse(readFileSync(path, "utf-8")));
  log.debug("Tool catalog loaded", { count: tools.length });

  if (path === CATALOG_PATH) cached = tools;
  return tools;
}

export function getToolNames(): string[] {
  return loadCatalog().map(tool => tool.name);
}
