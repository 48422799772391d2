/**
 * Toolchat Server - Main Entry Point
 *
 * Loads configuration, prompt templates and stored conversations,
 * registers tools, and starts the HTTP API in front of the Ollama model
 * server. History is saved again on shutdown.
 */

import "./env.js";
import { Hono } from "hono";
import { cors } from "hono/cors";
import { serve } from "@hono/node-server";
import { loadConfig } from "./config.js";
import { initServerLogging } from "./logging.js";
import { OllamaClient } from "./llm/index.js";
import { loadTemplates } from "./prompts/templates.js";
import { PromptBuilder } from "./prompts/builder.js";
import { ToolRegistry } from "./tools/registry.js";
import { builtinTools } from "./tools/builtin/index.js";
import { ConversationManager } from "./conversation/manager.js";
import { ResponseFormatter } from "./conversation/formatter.js";
import { HistoryStore } from "./conversation/store.js";
import { registerApiRoutes } from "./routes/api.js";

const log = initServerLogging();

async function main(): Promise<void> {
  const config = loadConfig();

  // A broken template set aborts start-up
  const templates = await loadTemplates(config.promptLanguage);

  const registry = new ToolRegistry();
  if (config.builtinTools) {
    registry.registerAll(builtinTools());
  }

  const client = new OllamaClient({
    host: config.ollama.host,
    port: config.ollama.port,
    model: config.ollama.model,
    temperature: config.ollama.temperature,
    timeoutMs: config.ollama.requestTimeoutMs,
  });

  const manager = new ConversationManager({
    client,
    registry,
    builder: new PromptBuilder(templates),
    formatter: new ResponseFormatter(templates),
    model: config.ollama.model,
    temperature: config.ollama.temperature,
    systemPrompt: config.systemPrompt,
    maxToolIterations: config.maxToolIterations,
    maxConcurrentRequests: config.maxConcurrentRequests,
    history: config.history,
  });

  const store = config.history.persist ? new HistoryStore(config.dataDir) : null;
  if (store) {
    const restored = manager.restoreHistories(await store.load());
    log.info("Conversations restored", { conversations: restored, path: store.filePath });
  }

  const app = new Hono();
  app.use("*", cors());
  app.onError((err, c) => {
    log.error("Unhandled request error", err, { path: c.req.path });
    return c.json({ error: "Internal server error" }, 500);
  });
  registerApiRoutes(app, { manager, client, registry, model: config.ollama.model });

  try {
    const version = await client.testConnection();
    log.info("Connected to Ollama", { baseUrl: client.baseUrl, version });
  } catch (err) {
    // Not fatal: the health endpoint reports it and turns fail with the connection template
    log.warn("Ollama is not reachable yet", { baseUrl: client.baseUrl, error: err instanceof Error ? err.message : String(err) });
  }

  const server = serve({ fetch: app.fetch, port: config.httpPort }, (info) => {
    log.info("HTTP API listening", {
      port: info.port,
      model: config.ollama.model,
      language: config.promptLanguage,
      tools: registry.snapshot().size,
    });
  });

  const shutdown = async (signal: string): Promise<void> => {
    log.info("Shutting down", { signal });
    await new Promise<void>((resolve) => server.close(() => resolve()));
    if (store) await store.save(manager.exportHistories());
    await log.close();
  };
  const onSignal = (signal: string) => {
    shutdown(signal).then(
      () => process.exit(0),
      (err: unknown) => {
        log.fatal("Shutdown failed", err);
        process.exit(1);
      },
    );
  };
  process.once("SIGINT", () => onSignal("SIGINT"));
  process.once("SIGTERM", () => onSignal("SIGTERM"));
}

main().catch((err: unknown) => {
  log.fatal("Server failed to start", err);
  process.exit(1);
});
