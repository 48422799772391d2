import { describe, it, expect } from "vitest";
import { Hono } from "hono";
import { registerApiRoutes, parseConversationBody } from "./api.js";
import { ConversationManager } from "../conversation/manager.js";
import { ResponseFormatter } from "../conversation/formatter.js";
import { PromptBuilder } from "../prompts/builder.js";
import { ToolRegistry } from "../tools/registry.js";
import { ConnectionError } from "../errors.js";
import { ScriptedClient, testTemplates, type Script } from "../testing.js";

function createTestApp(script: Script) {
  const client = new ScriptedClient(script);
  const registry = new ToolRegistry();
  registry.register({
    name: "weather.get_forecast",
    description: "Get the weather forecast",
    parameters: { location: { type: "string", required: true } },
    execute: (args) => `Sunny in ${String(args.location)}`,
  });
  const templates = testTemplates();
  const manager = new ConversationManager({
    client,
    registry,
    builder: new PromptBuilder(templates),
    formatter: new ResponseFormatter(templates),
    maxToolIterations: 3,
    maxConcurrentRequests: 2,
    history: { maxMessages: 100, pruneTarget: 80 },
  });

  const app = new Hono();
  registerApiRoutes(app, { manager, client, registry, model: "mistral" });
  return { app, client, manager };
}

function post(app: Hono, body: unknown) {
  return app.request("/api/conversation", {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: typeof body === "string" ? body : JSON.stringify(body),
  });
}

describe("API routes", () => {
  it("GET / describes the service", async () => {
    const { app } = createTestApp([]);
    const res = await app.request("/");
    expect(await res.json()).toEqual({ service: "toolchat", version: "0.1.0", model: "mistral", status: "running" });
  });

  describe("GET /api/health", () => {
    it("reports the model server version", async () => {
      const { app } = createTestApp([]);
      const res = await app.request("/api/health");

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ status: "ok", provider: "ollama", version: "0.0.0-test", model: "mistral" });
    });

    it("returns 503 when the model server is unreachable", async () => {
      const { app, client } = createTestApp([]);
      client.connectionError = new ConnectionError("Cannot reach Ollama");

      const res = await app.request("/api/health");

      expect(res.status).toBe(503);
      expect(await res.json()).toEqual({ status: "unavailable", provider: "ollama", errorKind: "connection" });
    });
  });

  it("GET /api/models lists models", async () => {
    const { app } = createTestApp([]);
    const res = await app.request("/api/models");
    expect(await res.json()).toEqual({ models: [{ name: "mistral:latest" }], count: 1 });
  });

  it("GET /api/models returns 502 when listing fails", async () => {
    const { app, client } = createTestApp([]);
    client.connectionError = new ConnectionError("down");

    const res = await app.request("/api/models");

    expect(res.status).toBe(502);
    expect(await res.json()).toEqual({ error: "Could not list models", errorKind: "connection" });
  });

  it("GET /api/tools lists the registered tools", async () => {
    const { app } = createTestApp([]);
    const res = await app.request("/api/tools");

    expect(await res.json()).toEqual({
      version: 1,
      tools: [{
        name: "weather.get_forecast",
        description: "Get the weather forecast",
        parameters: [{ name: "location", type: "string", required: true }],
      }],
    });
  });

  describe("POST /api/conversation", () => {
    it("runs a turn with a tool call", async () => {
      const { app } = createTestApp([
        "Using tool: weather.get_forecast(location=Oslo)",
        "It is sunny in Oslo.",
      ]);

      const res = await post(app, { text: "Weather in Oslo?", conversationId: "c1" });

      expect(res.status).toBe(200);
      const body = await res.json();
      expect(body).toMatchObject({
        conversationId: "c1",
        text: "It is sunny in Oslo.",
        error: false,
        iterations: 1,
        toolCalls: [{ toolName: "weather.get_forecast", args: { location: "Oslo" }, success: true }],
      });
    });

    it("reports a failed turn through the error template", async () => {
      const { app } = createTestApp([new ConnectionError("down")]);

      const res = await post(app, { text: "Hello", conversationId: "c1" });

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        conversationId: "c1",
        text: "Sorry: server unreachable",
        error: true,
        errorKind: "connection",
        toolCalls: [],
        iterations: 0,
      });
    });

    it("passes the system prompt override to the model", async () => {
      const { app, client } = createTestApp(["ok"]);

      await post(app, { text: "Hi", systemPrompt: "Answer in French." });

      expect(client.calls[0][0].content.split("\n")[0]).toBe("Answer in French.");
    });

    it("rejects a missing text with 400", async () => {
      const { app, client } = createTestApp(["unused"]);

      const res = await post(app, { conversationId: "c1" });

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: "text is required" });
      expect(client.calls).toHaveLength(0);
    });

    it("rejects a body that is not JSON", async () => {
      const { app } = createTestApp([]);
      const res = await post(app, "{not json");
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: "body must be valid JSON" });
    });
  });

  it("DELETE /api/conversation/:id resets a known conversation", async () => {
    const { app, manager } = createTestApp(["ok"]);
    await post(app, { text: "Hi", conversationId: "c1" });

    const first = await app.request("/api/conversation/c1", { method: "DELETE" });
    const second = await app.request("/api/conversation/c1", { method: "DELETE" });

    expect(first.status).toBe(200);
    expect(await first.json()).toEqual({ conversationId: "c1", reset: true });
    expect(second.status).toBe(404);
    expect(manager.getHistory("c1")).toBeUndefined();
  });

  it("GET /api/diagnostics reports turn statistics", async () => {
    const { app } = createTestApp(["ok"]);
    await post(app, { text: "Hi", conversationId: "c1" });

    const res = await app.request("/api/diagnostics");

    expect(await res.json()).toMatchObject({
      conversations: 1,
      historyMessages: 2,
      activeTurns: 0,
      queuedTurns: 0,
      tools: 1,
      stats: { turns: 1, succeeded: 1, failed: 0 },
    });
  });
});

describe("parseConversationBody", () => {
  it("accepts the optional fields", () => {
    expect(parseConversationBody({ text: "Hi", conversationId: "c1", systemPrompt: "Be brief.", timeoutMs: 5000 }))
      .toEqual({ text: "Hi", conversationId: "c1", systemPrompt: "Be brief.", timeoutMs: 5000 });
  });

  it("names the first problem", () => {
    expect(parseConversationBody([])).toBe("body must be a JSON object");
    expect(parseConversationBody({ text: "   " })).toBe("text is required");
    expect(parseConversationBody({ text: "Hi", conversationId: 7 })).toBe("conversationId must be a string");
    expect(parseConversationBody({ text: "Hi", timeoutMs: 0 })).toBe("timeoutMs must be a positive integer");
  });
});
