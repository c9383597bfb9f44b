/**
 * Prompt Template Helper
 *
 * Reads .md prompt files from runtime/prompts/ and injects values into
 * |* Field *| placeholders.
 *
 * Usage:
 *   const prompt = await loadPrompt("self-improve.md", {
 *     "Current Prompt": currentPrompt,
 *     "Conversation": transcript,
 *   });
 */

import { readFile } from "fs/promises";
import { assetPath } from "./assets.js";
import { createComponentLogger } from "./logging.js";

const log = createComponentLogger("prompt-template");

/**
 * Replace every |* FieldName *| placeholder. Field names match
 * case-insensitively; unknown fields render as [MISSING: Name].
 */
export function renderTemplate(template: string, fields: Record<string, string>, source = "inline"): string {
  const lookup = new Map(Object.entries(fields).map(([key, value]) => [key.toLowerCase(), value]));

  return template.replace(/\|\*\s*([^*]+?)\s*\*\|/g, (_match, fieldName: string) => {
    const key = fieldName.trim();
    const value = lookup.get(key.toLowerCase());
    if (value !== undefined) {
      return value;
    }
    log.warn("Unresolved prompt placeholder", { field: key, template: source });
    return `[MISSING: ${key}]`;
  });
}

/**
 * Load a prompt template relative to runtime/prompts/ and inject field values.
 */
export async function loadPrompt(
  relativePath: string,
  fields: Record<string, string> = {},
): Promise<string> {
  const fullPath = assetPath(`prompts/${relativePath}`);

  let template: string;
  try {
    template = await readFile(fullPath, "utf-8");
  } catch (e) {
    log.error("Failed to read prompt template", e, { path: fullPath });
    throw new Error(`Prompt template not found: ${fullPath}`);
  }

  return renderTemplate(template, fields, relativePath);
}

let defaultSystemPrompt: Promise<string> | null = null;

/** The default system prompt, read once per process */
export function loadSystemPrompt(): Promise<string> {
  if (!defaultSystemPrompt) {
    defaultSystemPrompt = loadPrompt("system.md").then(text => text.trim());
    defaultSystemPrompt.catch(() => {
      defaultSystemPrompt = null;
    });
  }
  return defaultSystemPrompt;
}
