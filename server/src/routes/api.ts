/**
 * API Routes
 *
 * Service info, model-server health, models, tools, conversation turns,
 * conversation reset, and diagnostics.
 */

import type { Hono } from "hono";
import { createComponentLogger } from "../logging.js";
import { toConversationError } from "../errors.js";
import type { ConversationManager } from "../conversation/manager.js";
import type { ILLMClient } from "../llm/types.js";
import type { ToolRegistry } from "../tools/registry.js";

const log = createComponentLogger("api");

export interface ApiDependencies {
  manager: ConversationManager;
  client: ILLMClient;
  registry: ToolRegistry;
  model: string;
  version?: string;
}

interface ConversationBody {
  text: string;
  conversationId?: string;
  systemPrompt?: string;
  timeoutMs?: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalString(body: Record<string, unknown>, key: string): string | undefined | Error {
  const value = body[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "string") return new Error(`${key} must be a string`);
  return value;
}

/** Validate a POST /api/conversation body. Returns the problem as a string. */
export function parseConversationBody(body: unknown): ConversationBody | string {
  if (!isRecord(body)) return "body must be a JSON object";

  const text = body.text;
  if (typeof text !== "string" || !text.trim()) return "text is required";

  const conversationId = optionalString(body, "conversationId");
  if (conversationId instanceof Error) return conversationId.message;
  const systemPrompt = optionalString(body, "systemPrompt");
  if (systemPrompt instanceof Error) return systemPrompt.message;

  const timeoutMs = body.timeoutMs;
  if (timeoutMs !== undefined && (typeof timeoutMs !== "number" || !Number.isInteger(timeoutMs) || timeoutMs < 1)) {
    return "timeoutMs must be a positive integer";
  }

  return { text, conversationId: conversationId || undefined, systemPrompt, timeoutMs };
}

export function registerApiRoutes(app: Hono, deps: ApiDependencies): void {
  const { manager, client, registry } = deps;

  app.get("/", (c) => c.json({
    service: "toolchat",
    version: deps.version ?? "0.1.0",
    model: deps.model,
    status: "running",
  }));

  // ============================================
  // MODEL SERVER
  // ============================================

  app.get("/api/health", async (c) => {
    try {
      const version = await client.testConnection();
      return c.json({ status: "ok", provider: client.provider, version, model: deps.model });
    } catch (error) {
      const err = toConversationError(error);
      log.warn("Health check failed", { kind: err.kind, error: err.message });
      return c.json({ status: "unavailable", provider: client.provider, errorKind: err.kind }, 503);
    }
  });

  app.get("/api/models", async (c) => {
    try {
      const models = await client.listModels();
      return c.json({ models, count: models.length });
    } catch (error) {
      const err = toConversationError(error);
      log.warn("Model listing failed", { kind: err.kind, error: err.message });
      return c.json({ error: "Could not list models", errorKind: err.kind }, 502);
    }
  });

  // ============================================
  // TOOLS
  // ============================================

  app.get("/api/tools", (c) => {
    const snapshot = registry.snapshot();
    return c.json({ version: snapshot.version, tools: snapshot.summaries() });
  });

  // ============================================
  // CONVERSATION
  // ============================================

  app.post("/api/conversation", async (c) => {
    let raw: unknown;
    try {
      raw = await c.req.json();
    } catch {
      return c.json({ error: "body must be valid JSON" }, 400);
    }

    const body = parseConversationBody(raw);
    if (typeof body === "string") {
      return c.json({ error: body }, 400);
    }

    const reply = await manager.process({ ...body, signal: c.req.raw.signal });
    return c.json({
      conversationId: reply.conversationId,
      text: reply.text,
      error: reply.error,
      errorKind: reply.errorKind,
      toolCalls: reply.toolCalls,
      iterations: reply.iterations,
    });
  });

  app.delete("/api/conversation/:id", (c) => {
    const conversationId = c.req.param("id");
    const reset = manager.reset(conversationId);
    return c.json({ conversationId, reset }, reset ? 200 : 404);
  });

  app.get("/api/diagnostics", (c) => c.json(manager.getDiagnostics()));
}
