/**
 * Argument Binder
 *
 * Turns the raw text between a directive's parentheses into typed
 * arguments checked against the tool's parameter schema.
 *
 *   location='New York', days=3, metric=true
 *
 * Pairs split on top-level commas; keys split from values on the first
 * top-level `=`, or `:` when a pair has no `=`. Quotes may be single or
 * double, with backslash escapes.
 */

import {
  InvalidArgumentsError,
  MissingParameterError,
  TypeMismatchError,
  UnknownParameterError,
  UnknownToolError,
} from "../errors.js";
import type { ToolSnapshot } from "../tools/registry.js";
import type {
  ArgumentValue,
  BoundArguments,
  ParameterSpec,
  ToolDefinition,
  ToolInvocationRequest,
} from "../tools/types.js";

const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const WHOLE = /^[+-]?\d+$/;

// ============================================
// LEXING
// ============================================

/**
 * Positions of `target` outside quotes and nested parentheses.
 */
function topLevelIndexes(text: string, target: string): number[] {
  const found: number[] = [];
  let quote: string | null = null;
  let depth = 0;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (quote) {
      if (ch === "\\") i++;
      else if (ch === quote) quote = null;
      continue;
    }
    if (ch === '"' || ch === "'") quote = ch;
    else if (ch === "(") depth++;
    else if (ch === ")") depth = Math.max(0, depth - 1);
    else if (ch === target && depth === 0) found.push(i);
  }

  return found;
}

export function splitTopLevel(text: string, separator = ","): string[] {
  const parts: string[] = [];
  let start = 0;
  for (const index of topLevelIndexes(text, separator)) {
    parts.push(text.slice(start, index));
    start = index + 1;
  }
  parts.push(text.slice(start));
  return parts;
}

/** Strip one pair of matching quotes and resolve backslash escapes inside them. */
export function unquote(value: string): { text: string; quoted: boolean } {
  const first = value[0];
  if (value.length >= 2 && (first === '"' || first === "'") && value[value.length - 1] === first) {
    const inner = value.slice(1, -1).replace(/\\(.)/g, "$1");
    return { text: inner, quoted: true };
  }
  return { text: value, quoted: false };
}

// ============================================
// COERCION
// ============================================

function coerce(toolName: string, key: string, spec: ParameterSpec, raw: string): ArgumentValue {
  const mismatch = () => new TypeMismatchError(toolName, key, spec.type, raw);
  const trimmed = raw.trim();

  switch (spec.type) {
    case "string":
      return raw;
    case "number": {
      if (!DECIMAL.test(trimmed)) throw mismatch();
      const value = Number(trimmed);
      if (!Number.isFinite(value)) throw mismatch();
      return value;
    }
    case "integer": {
      if (!WHOLE.test(trimmed)) throw mismatch();
      const value = Number(trimmed);
      if (!Number.isSafeInteger(value)) throw mismatch();
      return value;
    }
    case "boolean": {
      const lower = trimmed.toLowerCase();
      if (lower === "true") return true;
      if (lower === "false") return false;
      throw mismatch();
    }
  }
}

// ============================================
// BINDING
// ============================================

function splitPair(toolName: string, pair: string): [string, string] {
  const equals = topLevelIndexes(pair, "=");
  const candidates = equals.length > 0 ? equals : topLevelIndexes(pair, ":");
  if (candidates.length === 0) {
    throw new InvalidArgumentsError(toolName, `expected key=value, got "${pair.trim()}"`);
  }
  const separator = candidates[0];
  return [pair.slice(0, separator).trim(), pair.slice(separator + 1).trim()];
}

export function bindArguments(tool: ToolDefinition, rawParameters: string): BoundArguments {
  const bound: BoundArguments = {};

  for (const pair of splitTopLevel(rawParameters)) {
    if (!pair.trim()) continue;

    const [key, rawValue] = splitPair(tool.name, pair);
    if (!key) {
      throw new InvalidArgumentsError(tool.name, `missing parameter name in "${pair.trim()}"`);
    }
    if (!Object.hasOwn(tool.parameters, key)) {
      throw new UnknownParameterError(tool.name, key);
    }
    if (Object.hasOwn(bound, key)) {
      throw new InvalidArgumentsError(tool.name, `parameter "${key}" given more than once`);
    }

    bound[key] = coerce(tool.name, key, tool.parameters[key], unquote(rawValue).text);
  }

  for (const [key, spec] of Object.entries(tool.parameters)) {
    if (Object.hasOwn(bound, key)) continue;
    if (spec.default !== undefined) bound[key] = spec.default;
    else if (spec.required) throw new MissingParameterError(tool.name, key);
  }

  return bound;
}

/**
 * Look the tool up, then bind. The unknown-tool check always comes first.
 */
export function resolveInvocation(
  tools: ToolSnapshot,
  request: ToolInvocationRequest,
): { tool: ToolDefinition; args: BoundArguments } {
  const tool = tools.get(request.toolName);
  if (!tool) throw new UnknownToolError(request.toolName);
  return { tool, args: bindArguments(tool, request.rawParameters) };
}
