/**
 * LLM Module — Barrel Export
 *
 * Structure:
 *   types.ts          — Pure type definitions (no runtime values)
 *   providers/ollama/ — Ollama chat client and wire format
 */

export type {
  LLMProvider,
  LLMRole,
  LLMMessage,
  LLMRequestOptions,
  LLMResponse,
  ModelInfo,
  ILLMClient,
} from "./types.js";

export { OllamaClient } from "./providers/ollama/index.js";
export type { OllamaClientOptions } from "./providers/ollama/index.js";
