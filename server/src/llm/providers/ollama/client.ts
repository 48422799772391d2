/**
 * Ollama LLM Client
 *
 * Talks to a local Ollama server over its HTTP API:
 * - POST /api/chat    (non-streaming chat)
 * - GET  /api/version (connectivity check)
 * - GET  /api/tags    (installed models)
 *
 * Every request carries the configured timeout. A caller signal is merged
 * in, so a cancelled turn aborts the in-flight request. No retries here;
 * the conversation loop surfaces failures immediately.
 */

import { createComponentLogger } from "../../../logging.js";
import {
  AuthError,
  CancelledError,
  ConnectionError,
  ConversationError,
  ModelError,
} from "../../../errors.js";
import type {
  ILLMClient,
  LLMMessage,
  LLMProvider,
  LLMRequestOptions,
  LLMResponse,
  ModelInfo,
} from "../../types.js";
import { formatMessagesForAPI, parseChatReply, parseModelList, parseVersion } from "./format.js";

const log = createComponentLogger("ollama");

export interface OllamaClientOptions {
  host: string;
  port: number;
  model: string;
  temperature?: number;
  /** Per-request timeout (default: 30s) */
  timeoutMs?: number;
}

export class OllamaClient implements ILLMClient {
  provider: LLMProvider = "ollama";
  readonly baseUrl: string;
  private defaultModel: string;
  private defaultTemperature: number;
  private timeoutMs: number;

  constructor(options: OllamaClientOptions) {
    this.baseUrl = `http://${options.host}:${options.port}`;
    this.defaultModel = options.model;
    this.defaultTemperature = options.temperature ?? 0.7;
    this.timeoutMs = options.timeoutMs ?? 30_000;
  }

  async chat(messages: LLMMessage[], options?: LLMRequestOptions): Promise<LLMResponse> {
    const model = options?.model || this.defaultModel;
    const body = {
      model,
      messages: formatMessagesForAPI(messages),
      stream: false,
      options: { temperature: options?.temperature ?? this.defaultTemperature },
    };

    const startTime = Date.now();
    const data = await this.request("/api/chat", {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(body),
    }, options?.signal);

    const reply = parseChatReply(data);
    if (!reply) {
      throw new ModelError("Ollama returned a chat response without message content");
    }

    log.debug("Chat completed", {
      model,
      durationMs: Date.now() - startTime,
      contentLength: reply.content.length,
    });

    return {
      content: reply.content,
      model: reply.model || model,
      provider: this.provider,
      usage: {
        inputTokens: reply.promptEvalCount ?? 0,
        outputTokens: reply.evalCount ?? 0,
      },
    };
  }

  async testConnection(): Promise<string> {
    const version = parseVersion(await this.request("/api/version", { method: "GET" }));
    if (version === null) {
      throw new ModelError("Ollama returned an unexpected version response");
    }
    return version;
  }

  async listModels(): Promise<ModelInfo[]> {
    const models = parseModelList(await this.request("/api/tags", { method: "GET" }));
    if (models === null) {
      throw new ModelError("Ollama returned an unexpected model list");
    }
    return models;
  }

  /**
   * Perform a request and return the parsed JSON body.
   * Maps every failure onto the conversation error taxonomy.
   */
  private async request(path: string, init: RequestInit, signal?: AbortSignal): Promise<unknown> {
    if (signal?.aborted) throw new CancelledError();

    const controller = new AbortController();
    const timer = setTimeout(() => {
      controller.abort(new ConnectionError(`Ollama did not respond within ${this.timeoutMs}ms`));
    }, this.timeoutMs);
    const onAbort = () => controller.abort(new CancelledError());
    signal?.addEventListener("abort", onAbort, { once: true });

    try {
      let response: Response;
      try {
        response = await fetch(`${this.baseUrl}${path}`, { ...init, signal: controller.signal });
      } catch (err) {
        throw this.abortReason(controller.signal) ?? new ConnectionError(
          `Cannot reach Ollama at ${this.baseUrl}: ${err instanceof Error ? err.message : String(err)}`,
          { cause: err },
        );
      }

      if (response.status === 401 || response.status === 403) {
        throw new AuthError(`Ollama rejected the request (${response.status})`);
      }
      if (!response.ok) {
        const text = await response.text();
        throw new ModelError(`Ollama API error: ${response.status} ${text}`.trim(), response.status);
      }

      try {
        return await response.json();
      } catch (err) {
        throw this.abortReason(controller.signal) ?? new ModelError(
          "Ollama returned a body that is not valid JSON",
          response.status,
          { cause: err },
        );
      }
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
    }
  }

  private abortReason(signal: AbortSignal): ConversationError | undefined {
    if (!signal.aborted) return undefined;
    const reason: unknown = signal.reason;
    return reason instanceof ConversationError ? reason : new CancelledError();
  }
}
