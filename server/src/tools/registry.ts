/**
 * Tool Registry
 *
 * Holds the tools available to conversations. Readers take a snapshot and
 * keep it for a whole turn; writers build a new snapshot and swap the single
 * reference, so nobody ever sees a half-applied registration.
 */

import { createComponentLogger } from "../logging.js";
import {
  PARAMETER_NAME_PATTERN,
  TOOL_NAME_PATTERN,
  type ArgumentValue,
  type BoundArguments,
  type ParameterSpec,
  type ToolContext,
  type ToolDefinition,
  type ToolSummary,
} from "./types.js";

const log = createComponentLogger("tools.registry");

// ============================================
// SNAPSHOT
// ============================================

export class ToolSnapshot {
  private readonly byName: ReadonlyMap<string, ToolDefinition>;

  constructor(readonly version: number, tools: Iterable<ToolDefinition>) {
    const map = new Map<string, ToolDefinition>();
    for (const tool of tools) map.set(tool.name, tool);
    this.byName = map;
  }

  get size(): number {
    return this.byName.size;
  }

  get isEmpty(): boolean {
    return this.byName.size === 0;
  }

  get(name: string): ToolDefinition | undefined {
    return this.byName.get(name);
  }

  has(name: string): boolean {
    return this.byName.has(name);
  }

  /** Tools in registration order. */
  list(): ToolDefinition[] {
    return [...this.byName.values()];
  }

  summaries(): ToolSummary[] {
    return this.list().map(tool => ({
      name: tool.name,
      description: tool.description,
      parameters: Object.entries(tool.parameters).map(([name, spec]) => ({ name, ...spec })),
    }));
  }
}

// ============================================
// VALIDATION
// ============================================

function defaultMatches(spec: ParameterSpec, value: ArgumentValue): boolean {
  switch (spec.type) {
    case "string":
      return typeof value === "string";
    case "number":
      return typeof value === "number" && Number.isFinite(value);
    case "integer":
      return typeof value === "number" && Number.isInteger(value);
    case "boolean":
      return typeof value === "boolean";
  }
}

export function validateToolDefinition(tool: ToolDefinition): void {
  if (!TOOL_NAME_PATTERN.test(tool.name)) {
    throw new Error(`Invalid tool name "${tool.name}": must match ${TOOL_NAME_PATTERN}`);
  }
  if (!tool.description.trim()) {
    throw new Error(`Tool "${tool.name}" needs a description`);
  }
  for (const [key, spec] of Object.entries(tool.parameters)) {
    if (!PARAMETER_NAME_PATTERN.test(key)) {
      throw new Error(`Tool "${tool.name}" has an invalid parameter name "${key}"`);
    }
    if (spec.default !== undefined && !defaultMatches(spec, spec.default)) {
      throw new Error(`Default for "${tool.name}.${key}" is not a valid ${spec.type}`);
    }
  }
}

function freezeTool(tool: ToolDefinition): ToolDefinition {
  const parameters: Record<string, ParameterSpec> = {};
  for (const [key, spec] of Object.entries(tool.parameters)) {
    parameters[key] = Object.freeze({ ...spec });
  }
  return Object.freeze({
    name: tool.name,
    description: tool.description,
    parameters: Object.freeze(parameters),
    // called through the definition so class-based tools keep `this`
    execute: (args: BoundArguments, ctx: ToolContext) => tool.execute(args, ctx),
  });
}

// ============================================
// REGISTRY
// ============================================

export class ToolRegistry {
  private current = new ToolSnapshot(0, []);

  /** The snapshot a turn should hold on to. */
  snapshot(): ToolSnapshot {
    return this.current;
  }

  register(tool: ToolDefinition): void {
    this.registerAll([tool]);
  }

  /** Registers every tool or none of them. */
  registerAll(tools: ToolDefinition[]): void {
    const next = new Map<string, ToolDefinition>();
    for (const tool of this.current.list()) next.set(tool.name, tool);

    for (const tool of tools) {
      validateToolDefinition(tool);
      if (next.has(tool.name)) {
        throw new Error(`Tool "${tool.name}" is already registered`);
      }
      next.set(tool.name, freezeTool(tool));
    }

    this.publish(next.values());
    log.info("Tools registered", { tools: tools.map(t => t.name), total: this.current.size });
  }

  unregister(name: string): boolean {
    if (!this.current.has(name)) return false;
    this.publish(this.current.list().filter(tool => tool.name !== name));
    log.info("Tool unregistered", { tool: name, total: this.current.size });
    return true;
  }

  private publish(tools: Iterable<ToolDefinition>): void {
    this.current = new ToolSnapshot(this.current.version + 1, tools);
  }
}
