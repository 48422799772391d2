/**
 * Tool Types
 *
 * A tool is an immutable descriptor: a dotted name, a description the model
 * reads, an ordered parameter schema, and an executor supplied by whoever
 * registers it. The conversation loop never looks inside the executor.
 */

import type { ErrorKind } from "../errors.js";

/** Dotted namespace form, e.g. `weather.get_forecast`. */
export const TOOL_NAME_PATTERN = /^[a-zA-Z_][a-zA-Z0-9_.]*$/;

/** Parameter keys are plain identifiers. */
export const PARAMETER_NAME_PATTERN = /^[a-zA-Z_][a-zA-Z0-9_]*$/;

export type ParameterType = "string" | "number" | "integer" | "boolean";

export type ArgumentValue = string | number | boolean;

export interface ParameterSpec {
  type: ParameterType;
  required?: boolean;
  /** Applied when the parameter is omitted. A parameter with a default is never reported missing. */
  default?: ArgumentValue;
  description?: string;
}

/** Insertion order is the order parameters are documented in the prompt. */
export type ParameterSchema = Readonly<Record<string, ParameterSpec>>;

export type BoundArguments = Record<string, ArgumentValue>;

export interface ToolContext {
  conversationId: string;
  /** Fires when the turn is cancelled or times out */
  signal?: AbortSignal;
}

export type ToolExecuteFn = (args: BoundArguments, ctx: ToolContext) => unknown;

export interface ToolDefinition {
  readonly name: string;
  readonly description: string;
  readonly parameters: ParameterSchema;
  readonly execute: ToolExecuteFn;
}

/** What the parser extracts from a directive, before any binding. */
export interface ToolInvocationRequest {
  toolName: string;
  rawParameters: string;
}

export type ToolResult =
  | { toolName: string; success: true; value: unknown; durationMs: number }
  | { toolName: string; success: false; error: string; errorKind: ErrorKind; durationMs: number };

/** Executor-free view of a tool, for listings. */
export interface ToolSummary {
  name: string;
  description: string;
  parameters: Array<{ name: string } & ParameterSpec>;
}
