/**
 * Prompt Builder
 *
 * Renders the system prompt for a turn from a template set and the tool
 * snapshot the turn holds. Pure: same inputs, same prompt.
 */

import { fillTemplate, type PromptTemplates } from "./templates.js";
import type { ToolSnapshot } from "../tools/registry.js";
import type { ArgumentValue, ParameterSchema, ToolDefinition } from "../tools/types.js";

function formatDefault(value: ArgumentValue): string {
  return typeof value === "string" ? JSON.stringify(value) : String(value);
}

/** `location: string (required), days: integer = 1, metric: boolean` */
export function renderParameters(parameters: ParameterSchema): string {
  return Object.entries(parameters)
    .map(([key, spec]) => {
      if (spec.default !== undefined) return `${key}: ${spec.type} = ${formatDefault(spec.default)}`;
      if (spec.required) return `${key}: ${spec.type} (required)`;
      return `${key}: ${spec.type}`;
    })
    .join(", ");
}

export class PromptBuilder {
  constructor(private readonly templates: PromptTemplates) {}

  /**
   * @param override Replaces the base prompt. The tool section is still
   *   appended so the directive syntax stays documented.
   */
  build(tools: ToolSnapshot, override?: string): string {
    const { defaultPrompts, toolConfiguration } = this.templates;

    if (tools.isEmpty) {
      return override ?? defaultPrompts.noTools;
    }

    return [
      override ?? defaultPrompts.withTools,
      "",
      toolConfiguration.intro,
      "",
      toolConfiguration.toolListHeader,
      ...tools.list().map(tool => this.toolLine(tool)),
      "",
      toolConfiguration.usageInstructions,
      toolConfiguration.toolResponse,
    ].join("\n");
  }

  private toolLine(tool: ToolDefinition): string {
    const { listFormat, parametersFormat } = this.templates.toolConfiguration;
    const line = fillTemplate(listFormat, { name: tool.name, description: tool.description });
    if (Object.keys(tool.parameters).length === 0) return line;
    return `${line} ${fillTemplate(parametersFormat, { params: renderParameters(tool.parameters) })}`;
  }
}
