/**
 * Test Support
 *
 * Shared fixtures for tests: a compact template set with short, exact
 * strings, and a model client that replays a script.
 */

import type { ILLMClient, LLMMessage, LLMProvider, LLMRequestOptions, LLMResponse, ModelInfo } from "./llm/types.js";
import type { PromptTemplates } from "./prompts/templates.js";

export function testTemplates(overrides: Partial<PromptTemplates["responses"]> = {}): PromptTemplates {
  return {
    defaultPrompts: {
      noTools: "NO TOOLS PROMPT",
      withTools: "TOOLS PROMPT",
    },
    toolConfiguration: {
      intro: "Intro.",
      toolListHeader: "Tools:",
      listFormat: "- {name}: {description}",
      parametersFormat: "[{params}]",
      usageInstructions: "Call with: Using tool: name(key=value)",
      toolResponse: "Then answer.",
    },
    responses: {
      outputPrefix: "",
      outputSuffix: "",
      successAcknowledgment: "Done.",
      errorFormat: "Sorry: {error}",
      toolResultFormat: "{tool_name} => {result}",
      toolErrorFormat: "{tool_name} failed: {error}",
      ...overrides,
    },
    errorDescriptions: {
      connection: "server unreachable",
      iteration_limit: "too many tool calls",
      cancelled: "cancelled",
      unknown: "something broke",
    },
  };
}

/** A reply, a failure to throw, or "hang" to never answer (until aborted). */
export type ScriptStep = string | Error | "hang";

export type Script = ScriptStep[] | ((call: number, messages: LLMMessage[]) => ScriptStep);

/**
 * Model client that replays a script. Records every message list it is
 * sent, copied at call time.
 */
export class ScriptedClient implements ILLMClient {
  provider: LLMProvider = "ollama";
  readonly calls: LLMMessage[][] = [];
  readonly options: Array<LLMRequestOptions | undefined> = [];
  version = "0.0.0-test";
  models: ModelInfo[] = [{ name: "mistral:latest" }];
  connectionError?: Error;

  constructor(private readonly script: Script) {}

  async chat(messages: LLMMessage[], options?: LLMRequestOptions): Promise<LLMResponse> {
    const call = this.calls.length;
    this.calls.push(messages.map(m => ({ ...m })));
    this.options.push(options);

    const step = typeof this.script === "function" ? this.script(call, messages) : this.script[call];
    if (step === undefined) throw new Error(`No scripted reply for call ${call}`);
    if (step instanceof Error) throw step;
    if (step === "hang") return new Promise<LLMResponse>(() => {});

    return {
      content: step,
      model: options?.model || "mistral",
      provider: this.provider,
      usage: { inputTokens: 10, outputTokens: 5 },
    };
  }

  async testConnection(): Promise<string> {
    if (this.connectionError) throw this.connectionError;
    return this.version;
  }

  async listModels(): Promise<ModelInfo[]> {
    if (this.connectionError) throw this.connectionError;
    return this.models;
  }
}
