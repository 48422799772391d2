/**
 * LLM Type Definitions
 *
 * Pure types and interfaces for the model client. The conversation loop
 * only depends on ILLMClient; the Ollama provider is the one implementation.
 */

// ============================================
// CORE TYPES
// ============================================

export type LLMProvider = "ollama";

export type LLMRole = "system" | "user" | "assistant" | "tool";

export interface LLMMessage {
  role: LLMRole;
  content: string;
}

export interface LLMRequestOptions {
  model?: string;
  temperature?: number;
  /** Caller-driven cancellation, combined with the client's request timeout */
  signal?: AbortSignal;
}

export interface LLMResponse {
  content: string;
  model: string;
  provider: LLMProvider;
  usage?: {
    inputTokens: number;
    outputTokens: number;
  };
}

export interface ModelInfo {
  name: string;
  sizeBytes?: number;
  modifiedAt?: string;
}

// ============================================
// LLM CLIENT INTERFACE
// ============================================

export interface ILLMClient {
  provider: LLMProvider;

  /**
   * Send the full message list and return the model's reply.
   * Rejects with ConnectionError, AuthError, ModelError or CancelledError.
   */
  chat(messages: LLMMessage[], options?: LLMRequestOptions): Promise<LLMResponse>;

  /** Resolves to the server version when reachable, rejects otherwise. */
  testConnection(): Promise<string>;

  listModels(): Promise<ModelInfo[]>;
}
