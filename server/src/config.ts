/**
 * Server Configuration
 *
 * Environment variables for the model server connection, the conversation
 * loop limits and the HTTP listener. `.env` is loaded from the project root.
 */

import { config as loadDotenv } from "dotenv";
import { resolve, dirname, join } from "path";
import { homedir } from "os";
import { fileURLToPath } from "url";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

export interface AppConfig {
  ollama: {
    host: string;
    port: number;
    model: string;
    temperature: number;
    requestTimeoutMs: number;
  };
  /** Replaces the template-selected base prompt when set */
  systemPrompt?: string;
  promptLanguage: string;
  maxToolIterations: number;
  maxConcurrentRequests: number;
  history: {
    maxMessages: number;
    pruneTarget: number;
    /** Save history under `dataDir` on shutdown, load it at start-up */
    persist: boolean;
  };
  dataDir: string;
  httpPort: number;
  builtinTools: boolean;
}

export const DEFAULT_HOST = "localhost";
export const DEFAULT_PORT = 11434;
export const DEFAULT_MODEL = "mistral";

/** Load `.env` into process.env. Existing variables win. */
export function loadEnvFile(path = resolve(__dirname, "../../.env")): void {
  loadDotenv({ path });
}

function readInt(env: NodeJS.ProcessEnv, key: string, fallback: number, min = 1): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new Error(`${key} must be an integer >= ${min} (got "${raw}")`);
  }
  return value;
}

function readFloat(env: NodeJS.ProcessEnv, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new Error(`${key} must be a number (got "${raw}")`);
  }
  return value;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const maxMessages = readInt(env, "HISTORY_MAX_MESSAGES", 100);
  const pruneTarget = readInt(env, "HISTORY_PRUNE_TARGET", Math.min(80, maxMessages));
  if (pruneTarget > maxMessages) {
    throw new Error(`HISTORY_PRUNE_TARGET (${pruneTarget}) cannot exceed HISTORY_MAX_MESSAGES (${maxMessages})`);
  }

  const systemPrompt = env.SYSTEM_PROMPT?.trim();

  return {
    ollama: {
      host: env.OLLAMA_HOST || DEFAULT_HOST,
      port: readInt(env, "OLLAMA_PORT", DEFAULT_PORT),
      model: env.OLLAMA_MODEL || DEFAULT_MODEL,
      temperature: readFloat(env, "OLLAMA_TEMPERATURE", 0.7),
      requestTimeoutMs: readInt(env, "REQUEST_TIMEOUT_MS", 30_000),
    },
    systemPrompt: systemPrompt || undefined,
    promptLanguage: env.PROMPT_LANGUAGE || "en",
    maxToolIterations: readInt(env, "MAX_TOOL_ITERATIONS", 5),
    maxConcurrentRequests: readInt(env, "MAX_CONCURRENT_REQUESTS", 5),
    history: { maxMessages, pruneTarget, persist: env.HISTORY_PERSIST !== "false" },
    dataDir: env.DATA_DIR || join(homedir(), ".toolchat", "data"),
    httpPort: readInt(env, "PORT", 3000),
    builtinTools: env.BUILTIN_TOOLS !== "false",
  };
}
