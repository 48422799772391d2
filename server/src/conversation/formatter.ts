/**
 * Response Formatter
 *
 * Maps a finished turn to the text the user sees, and tool results to the
 * messages the model sees. Only configured strings reach the user; error
 * messages and stacks stay in the logs.
 */

import { fillTemplate, type PromptTemplates } from "../prompts/templates.js";
import type { ErrorKind } from "../errors.js";
import type { ToolResult } from "../tools/types.js";

/** Render a tool's return value as text for the model. */
export function stringifyToolValue(value: unknown): string {
  if (value === undefined || value === null) return "";
  if (typeof value === "string") return value;
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    // circular or BigInt
    return String(value);
  }
}

export class ResponseFormatter {
  constructor(private readonly templates: PromptTemplates) {}

  formatAnswer(answer: string): string {
    const { outputPrefix, outputSuffix } = this.templates.responses;
    return `${outputPrefix}${answer}${outputSuffix}`;
  }

  /**
   * A turn whose only outcome was a successful tool call. `notes` is the
   * text the model wrote around its directives, shown before the acknowledgment.
   */
  formatAcknowledgment(notes: string[] = []): string {
    return this.formatAnswer([...notes, this.templates.responses.successAcknowledgment].join("\n"));
  }

  describeError(kind: ErrorKind): string {
    const descriptions = this.templates.errorDescriptions;
    return descriptions[kind] ?? descriptions.unknown;
  }

  formatError(kind: ErrorKind): string {
    return fillTemplate(this.templates.responses.errorFormat, { error: this.describeError(kind) });
  }

  formatToolResult(result: ToolResult): string {
    const { toolResultFormat, toolErrorFormat } = this.templates.responses;
    if (result.success) {
      return fillTemplate(toolResultFormat, {
        tool_name: result.toolName,
        result: stringifyToolValue(result.value),
      });
    }
    return fillTemplate(toolErrorFormat, { tool_name: result.toolName, error: result.error });
  }
}
