/**
 * History Store
 *
 * Keeps committed conversation history in a JSON file under the data
 * directory so conversations survive a restart. The server loads it at
 * start-up and saves it on shutdown.
 */

import { promises as fs } from "fs";
import * as path from "path";
import { createComponentLogger } from "../logging.js";
import type { LLMMessage, LLMRole } from "../llm/types.js";

const log = createComponentLogger("conversation.store");

export const STORE_VERSION = 1;
export const STORE_FILENAME = "conversations.json";

export type StoredHistories = Record<string, LLMMessage[]>;

const ROLES: readonly LLMRole[] = ["system", "user", "assistant", "tool"];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isMessage(value: unknown): value is LLMMessage {
  if (!isRecord(value) || typeof value.content !== "string") return false;
  const role = value.role;
  return ROLES.some(known => known === role);
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/**
 * Validate the parsed store file. Conversations with any malformed message
 * are skipped; an unknown file version yields nothing.
 */
export function parseStoredHistories(raw: unknown): StoredHistories {
  if (!isRecord(raw) || raw.version !== STORE_VERSION || !isRecord(raw.conversations)) {
    log.warn("Unrecognized history file format, starting empty");
    return {};
  }

  const histories: StoredHistories = {};
  for (const [conversationId, messages] of Object.entries(raw.conversations)) {
    if (!Array.isArray(messages) || !messages.every(isMessage)) {
      log.warn("Skipping malformed stored conversation", { conversationId });
      continue;
    }
    histories[conversationId] = messages.map(m => ({ role: m.role, content: m.content }));
  }
  return histories;
}

export class HistoryStore {
  readonly filePath: string;

  constructor(dataDir: string, filename = STORE_FILENAME) {
    this.filePath = path.join(dataDir, filename);
  }

  async load(): Promise<StoredHistories> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, "utf-8");
    } catch (err) {
      if (isNotFound(err)) return {};
      throw err;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (err) {
      // Keep the broken file for inspection and start over
      const backupPath = `${this.filePath}.corrupt_${Date.now()}`;
      await fs.rename(this.filePath, backupPath);
      log.warn("Corrupt history file moved aside", {
        backupPath,
        error: err instanceof Error ? err.message : String(err),
      });
      return {};
    }

    const histories = parseStoredHistories(raw);
    log.info("Conversation history loaded", { conversations: Object.keys(histories).length });
    return histories;
  }

  /** Write atomically: a temp file renamed over the old one. */
  async save(histories: StoredHistories): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    const json = JSON.stringify({
      version: STORE_VERSION,
      savedAt: new Date().toISOString(),
      conversations: histories,
    }, null, 2);

    const tmpPath = `${this.filePath}.tmp_${Date.now()}`;
    await fs.writeFile(tmpPath, json, "utf-8");
    await fs.rename(tmpPath, this.filePath);
    log.info("Conversation history saved", { conversations: Object.keys(histories).length });
  }
}
