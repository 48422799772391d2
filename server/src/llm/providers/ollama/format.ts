/**
 * Ollama Format Helpers
 *
 * Converts between our LLM message format and the Ollama chat API, and
 * validates the JSON the server sends back.
 */

import type { LLMMessage, ModelInfo } from "../../types.js";

export interface OllamaChatMessage {
  role: string;
  content: string;
}

export interface OllamaChatReply {
  model?: string;
  content: string;
  promptEvalCount?: number;
  evalCount?: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalNumber(value: unknown): number | undefined {
  return typeof value === "number" && Number.isFinite(value) ? value : undefined;
}

export function formatMessagesForAPI(messages: LLMMessage[]): OllamaChatMessage[] {
  return messages.map(m => ({ role: m.role, content: m.content }));
}

/** Returns null when the body is not a chat reply. */
export function parseChatReply(body: unknown): OllamaChatReply | null {
  if (!isRecord(body) || !isRecord(body.message)) return null;
  const content = body.message.content;
  if (typeof content !== "string") return null;
  return {
    model: typeof body.model === "string" ? body.model : undefined,
    content,
    promptEvalCount: optionalNumber(body.prompt_eval_count),
    evalCount: optionalNumber(body.eval_count),
  };
}

export function parseVersion(body: unknown): string | null {
  if (!isRecord(body) || typeof body.version !== "string") return null;
  return body.version;
}

export function parseModelList(body: unknown): ModelInfo[] | null {
  if (!isRecord(body) || !Array.isArray(body.models)) return null;
  const models: ModelInfo[] = [];
  for (const entry of body.models) {
    if (!isRecord(entry) || typeof entry.name !== "string") continue;
    models.push({
      name: entry.name,
      sizeBytes: optionalNumber(entry.size),
      modifiedAt: typeof entry.modified_at === "string" ? entry.modified_at : undefined,
    });
  }
  return models;
}
