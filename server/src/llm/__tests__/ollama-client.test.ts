/**
 * Tests for the Ollama client
 *
 * Covers: request shape, response parsing, error mapping (connection,
 * auth, model, malformed body), timeout, caller cancellation, version
 * and model listing.
 */

import { describe, it, expect, afterEach, vi } from "vitest";
import { OllamaClient } from "../providers/ollama/index.js";
import { AuthError, CancelledError, ConnectionError, ModelError } from "../../errors.js";

type FetchStub = (input: string | URL | Request, init?: RequestInit) => Promise<Response>;

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

/** A fetch that never settles on its own, only when its signal aborts. */
const hangingFetch: FetchStub = (_input, init) =>
  new Promise<Response>((_resolve, reject) => {
    const signal = init?.signal;
    if (signal) signal.addEventListener("abort", () => reject(signal.reason), { once: true });
  });

function client(timeoutMs = 30_000): OllamaClient {
  return new OllamaClient({ host: "localhost", port: 11434, model: "mistral", temperature: 0.2, timeoutMs });
}

describe("OllamaClient", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  // ============================================
  // CHAT
  // ============================================

  it("posts a non-streaming chat request and parses the reply", async () => {
    const fetchMock = vi.fn<FetchStub>().mockResolvedValue(jsonResponse({
      model: "mistral:latest",
      message: { role: "assistant", content: "Hello there" },
      prompt_eval_count: 12,
      eval_count: 3,
      done: true,
    }));
    vi.stubGlobal("fetch", fetchMock);

    const response = await client().chat([
      { role: "system", content: "Be kind." },
      { role: "user", content: "Hi" },
    ]);

    expect(response).toEqual({
      content: "Hello there",
      model: "mistral:latest",
      provider: "ollama",
      usage: { inputTokens: 12, outputTokens: 3 },
    });

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("http://localhost:11434/api/chat");
    expect(init?.method).toBe("POST");
    expect(JSON.parse(String(init?.body))).toEqual({
      model: "mistral",
      messages: [
        { role: "system", content: "Be kind." },
        { role: "user", content: "Hi" },
      ],
      stream: false,
      options: { temperature: 0.2 },
    });
  });

  it("uses the per-call model and temperature", async () => {
    const fetchMock = vi.fn<FetchStub>().mockResolvedValue(jsonResponse({ message: { content: "ok" } }));
    vi.stubGlobal("fetch", fetchMock);

    const response = await client().chat([{ role: "user", content: "Hi" }], { model: "llama3", temperature: 0 });

    expect(response.model).toBe("llama3");
    expect(response.usage).toEqual({ inputTokens: 0, outputTokens: 0 });
    const body = JSON.parse(String(fetchMock.mock.calls[0][1]?.body));
    expect(body.model).toBe("llama3");
    expect(body.options).toEqual({ temperature: 0 });
  });

  // ============================================
  // ERROR MAPPING
  // ============================================

  it("maps a network failure to ConnectionError", async () => {
    vi.stubGlobal("fetch", vi.fn<FetchStub>().mockRejectedValue(new TypeError("fetch failed")));

    const error = await client().chat([{ role: "user", content: "Hi" }]).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ConnectionError);
    expect(error).toMatchObject({
      kind: "connection",
      message: "Cannot reach Ollama at http://localhost:11434: fetch failed",
    });
  });

  it.each([401, 403])("maps HTTP %i to AuthError", async (status) => {
    vi.stubGlobal("fetch", vi.fn<FetchStub>().mockResolvedValue(new Response("denied", { status })));

    const error = await client().chat([{ role: "user", content: "Hi" }]).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AuthError);
    expect(error).toMatchObject({ kind: "auth", message: `Ollama rejected the request (${status})` });
  });

  it("maps other non-2xx statuses to ModelError with the status", async () => {
    vi.stubGlobal("fetch", vi.fn<FetchStub>().mockResolvedValue(
      new Response('{"error":"model \\"nope\\" not found"}', { status: 404 }),
    ));

    const error = await client().chat([{ role: "user", content: "Hi" }]).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ModelError);
    expect(error).toMatchObject({
      kind: "model",
      status: 404,
      message: 'Ollama API error: 404 {"error":"model \\"nope\\" not found"}',
    });
  });

  it("rejects a body without message content", async () => {
    vi.stubGlobal("fetch", vi.fn<FetchStub>().mockResolvedValue(jsonResponse({ done: true })));

    await expect(client().chat([{ role: "user", content: "Hi" }])).rejects.toThrow(
      "Ollama returned a chat response without message content",
    );
  });

  it("rejects a body that is not JSON", async () => {
    vi.stubGlobal("fetch", vi.fn<FetchStub>().mockResolvedValue(new Response("<html>", { status: 200 })));

    const error = await client().chat([{ role: "user", content: "Hi" }]).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ModelError);
    expect(error).toMatchObject({ message: "Ollama returned a body that is not valid JSON" });
  });

  // ============================================
  // TIMEOUT + CANCELLATION
  // ============================================

  it("times out as a ConnectionError", async () => {
    vi.stubGlobal("fetch", hangingFetch);

    const error = await client(20).chat([{ role: "user", content: "Hi" }]).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ConnectionError);
    expect(error).toMatchObject({ message: "Ollama did not respond within 20ms" });
  });

  it("aborts the request when the caller signal fires", async () => {
    vi.stubGlobal("fetch", hangingFetch);
    const controller = new AbortController();

    const pending = client().chat([{ role: "user", content: "Hi" }], { signal: controller.signal });
    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(CancelledError);
  });

  it("does not call the server when already cancelled", async () => {
    const fetchMock = vi.fn<FetchStub>();
    vi.stubGlobal("fetch", fetchMock);
    const controller = new AbortController();
    controller.abort();

    await expect(
      client().chat([{ role: "user", content: "Hi" }], { signal: controller.signal }),
    ).rejects.toBeInstanceOf(CancelledError);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  // ============================================
  // VERSION + MODELS
  // ============================================

  it("returns the server version", async () => {
    const fetchMock = vi.fn<FetchStub>().mockResolvedValue(jsonResponse({ version: "0.5.4" }));
    vi.stubGlobal("fetch", fetchMock);

    await expect(client().testConnection()).resolves.toBe("0.5.4");
    expect(fetchMock.mock.calls[0][0]).toBe("http://localhost:11434/api/version");
  });

  it("lists installed models and skips malformed entries", async () => {
    vi.stubGlobal("fetch", vi.fn<FetchStub>().mockResolvedValue(jsonResponse({
      models: [
        { name: "mistral:latest", size: 4100000000, modified_at: "2026-01-01T00:00:00Z" },
        { size: 12 },
        { name: "llama3:8b" },
      ],
    })));

    await expect(client().listModels()).resolves.toEqual([
      { name: "mistral:latest", sizeBytes: 4100000000, modifiedAt: "2026-01-01T00:00:00Z" },
      { name: "llama3:8b", sizeBytes: undefined, modifiedAt: undefined },
    ]);
  });
});
