/**
 * Prompt Templates
 *
 * Template sets live beside this file as `<language>.json`. Loading
 * validates every required key up front; a broken set is a configuration
 * defect and throws TemplateError before any conversation starts.
 */

import { access, readFile } from "fs/promises";
import { resolve, dirname } from "path";
import { fileURLToPath } from "url";
import { createComponentLogger } from "../logging.js";
import { TemplateError, isErrorKind, type ErrorKind } from "../errors.js";
import { DIRECTIVE_KEYWORD } from "../tool-loop/parser.js";

const log = createComponentLogger("prompts");

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

export const DEFAULT_LANGUAGE = "en";
const LANGUAGE_PATTERN = /^[a-z]{2,3}(-[A-Za-z]{2,4})?$/;

export interface PromptTemplates {
  defaultPrompts: {
    noTools: string;
    withTools: string;
  };
  toolConfiguration: {
    intro: string;
    toolListHeader: string;
    listFormat: string;
    parametersFormat: string;
    usageInstructions: string;
    toolResponse: string;
  };
  responses: {
    outputPrefix: string;
    outputSuffix: string;
    successAcknowledgment: string;
    errorFormat: string;
    toolResultFormat: string;
    toolErrorFormat: string;
  };
  errorDescriptions: Partial<Record<ErrorKind, string>> & { unknown: string };
}

// ============================================
// SUBSTITUTION
// ============================================

/**
 * Replace `{key}` placeholders in one pass. Placeholders without a value
 * are left as they are, and substituted text is never rescanned.
 */
export function fillTemplate(template: string, values: Record<string, string>): string {
  return template.replace(/\{(\w+)\}/g, (match, key: string) =>
    Object.hasOwn(values, key) ? values[key] : match
  );
}

// ============================================
// VALIDATION
// ============================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function section(raw: Record<string, unknown>, name: string): Record<string, unknown> {
  const value = raw[name];
  if (!isRecord(value)) {
    throw new TemplateError(`Prompt template section "${name}" is missing`, name);
  }
  return value;
}

function required(values: Record<string, unknown>, sectionName: string, key: string): string {
  const value = values[key];
  if (typeof value !== "string" || !value.trim()) {
    const path = `${sectionName}.${key}`;
    throw new TemplateError(`Prompt template key "${path}" is missing or empty`, path);
  }
  return value;
}

function optional(values: Record<string, unknown>, key: string): string {
  const value = values[key];
  return typeof value === "string" ? value : "";
}

/** Validate a parsed template file. */
export function parseTemplates(raw: unknown): PromptTemplates {
  if (!isRecord(raw)) {
    throw new TemplateError("Prompt templates must be a JSON object");
  }

  const prompts = section(raw, "default_prompts");
  const tools = section(raw, "tool_configuration");
  const responses = section(raw, "responses");
  const errors = section(raw, "error_descriptions");

  const usageInstructions = required(tools, "tool_configuration", "usage_instructions");
  if (!usageInstructions.includes(DIRECTIVE_KEYWORD)) {
    throw new TemplateError(
      `Prompt template key "tool_configuration.usage_instructions" must document "${DIRECTIVE_KEYWORD}"`,
      "tool_configuration.usage_instructions",
    );
  }

  const errorDescriptions: PromptTemplates["errorDescriptions"] = {
    unknown: required(errors, "error_descriptions", "unknown"),
  };
  for (const [kind, description] of Object.entries(errors)) {
    if (!isErrorKind(kind)) {
      log.warn("Ignoring description for unknown error kind", { kind });
      continue;
    }
    if (typeof description === "string" && description.trim()) {
      errorDescriptions[kind] = description;
    }
  }

  return {
    defaultPrompts: {
      noTools: required(prompts, "default_prompts", "no_tools"),
      withTools: required(prompts, "default_prompts", "with_tools"),
    },
    toolConfiguration: {
      intro: required(tools, "tool_configuration", "intro"),
      toolListHeader: required(tools, "tool_configuration", "tool_list_header"),
      listFormat: required(tools, "tool_configuration", "list_format"),
      parametersFormat: required(tools, "tool_configuration", "parameters_format"),
      usageInstructions,
      toolResponse: required(tools, "tool_configuration", "tool_response"),
    },
    responses: {
      outputPrefix: optional(responses, "output_prefix"),
      outputSuffix: optional(responses, "output_suffix"),
      successAcknowledgment: required(responses, "responses", "success_acknowledgment"),
      errorFormat: required(responses, "responses", "error_format"),
      toolResultFormat: required(responses, "responses", "tool_result_format"),
      toolErrorFormat: required(responses, "responses", "tool_error_format"),
    },
    errorDescriptions,
  };
}

// ============================================
// LOADING
// ============================================

async function readTemplateFile(path: string): Promise<unknown> {
  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (err) {
    throw new TemplateError(`Prompt templates not found: ${path}`, undefined, { cause: err });
  }
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new TemplateError(`Prompt templates are not valid JSON: ${path}`, undefined, { cause: err });
  }
}

/**
 * Load the template set for a language, falling back to English when the
 * language has no file of its own.
 */
export async function loadTemplates(
  language: string = DEFAULT_LANGUAGE,
  dir: string = __dirname,
): Promise<PromptTemplates> {
  let chosen = language;
  if (!LANGUAGE_PATTERN.test(language)) {
    log.warn("Invalid prompt language, using default", { language, fallback: DEFAULT_LANGUAGE });
    chosen = DEFAULT_LANGUAGE;
  }

  let path = resolve(dir, `${chosen}.json`);
  if (chosen !== DEFAULT_LANGUAGE) {
    try {
      await access(path);
    } catch {
      log.warn("No prompt templates for language, using default", { language: chosen, fallback: DEFAULT_LANGUAGE });
      path = resolve(dir, `${DEFAULT_LANGUAGE}.json`);
    }
  }

  const templates = parseTemplates(await readTemplateFile(path));
  log.debug("Prompt templates loaded", { path });
  return templates;
}
