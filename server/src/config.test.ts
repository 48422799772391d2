import { describe, it, expect } from "vitest";
import { homedir } from "os";
import { join } from "path";
import { loadConfig } from "./config.js";

describe("loadConfig", () => {
  it("applies defaults for an empty environment", () => {
    const config = loadConfig({});

    expect(config.ollama).toEqual({
      host: "localhost",
      port: 11434,
      model: "mistral",
      temperature: 0.7,
      requestTimeoutMs: 30_000,
    });
    expect(config.systemPrompt).toBeUndefined();
    expect(config.promptLanguage).toBe("en");
    expect(config.maxToolIterations).toBe(5);
    expect(config.maxConcurrentRequests).toBe(5);
    expect(config.history).toEqual({ maxMessages: 100, pruneTarget: 80, persist: true });
    expect(config.dataDir).toBe(join(homedir(), ".toolchat", "data"));
    expect(config.httpPort).toBe(3000);
    expect(config.builtinTools).toBe(true);
  });

  it("reads overrides", () => {
    const config = loadConfig({
      OLLAMA_HOST: "gpu-box",
      OLLAMA_PORT: "8080",
      OLLAMA_MODEL: "llama3",
      SYSTEM_PROMPT: "  Be brief.  ",
      MAX_TOOL_ITERATIONS: "2",
      BUILTIN_TOOLS: "false",
      HISTORY_PERSIST: "false",
      DATA_DIR: "/srv/toolchat",
    });

    expect(config.ollama.host).toBe("gpu-box");
    expect(config.ollama.port).toBe(8080);
    expect(config.ollama.model).toBe("llama3");
    expect(config.systemPrompt).toBe("Be brief.");
    expect(config.maxToolIterations).toBe(2);
    expect(config.builtinTools).toBe(false);
    expect(config.history.persist).toBe(false);
    expect(config.dataDir).toBe("/srv/toolchat");
  });

  it("treats a blank system prompt as no override", () => {
    expect(loadConfig({ SYSTEM_PROMPT: "   " }).systemPrompt).toBeUndefined();
  });

  it("rejects non-integer limits", () => {
    expect(() => loadConfig({ MAX_TOOL_ITERATIONS: "three" })).toThrow(
      'MAX_TOOL_ITERATIONS must be an integer >= 1 (got "three")'
    );
  });

  it("rejects a prune target above the history cap", () => {
    expect(() => loadConfig({ HISTORY_MAX_MESSAGES: "10", HISTORY_PRUNE_TARGET: "20" })).toThrow(
      "HISTORY_PRUNE_TARGET (20) cannot exceed HISTORY_MAX_MESSAGES (10)"
    );
  });
});
