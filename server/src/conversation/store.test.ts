import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { HistoryStore, parseStoredHistories } from "./store.js";

describe("HistoryStore", () => {
  let dataDir: string;

  beforeEach(() => {
    dataDir = fs.mkdtempSync(path.join(os.tmpdir(), "toolchat-store-"));
  });

  afterEach(() => {
    fs.rmSync(dataDir, { recursive: true, force: true });
  });

  it("loads nothing when no file exists yet", async () => {
    expect(await new HistoryStore(dataDir).load()).toEqual({});
  });

  it("loads what it saved, creating the directory", async () => {
    const store = new HistoryStore(path.join(dataDir, "nested"));
    await store.save({
      c1: [
        { role: "user", content: "q1" },
        { role: "assistant", content: "a1" },
      ],
    });

    expect(await store.load()).toEqual({
      c1: [
        { role: "user", content: "q1" },
        { role: "assistant", content: "a1" },
      ],
    });
    expect(fs.readdirSync(path.join(dataDir, "nested"))).toEqual(["conversations.json"]);
  });

  it("moves a corrupt file aside and starts empty", async () => {
    const store = new HistoryStore(dataDir);
    fs.writeFileSync(store.filePath, "{not json");

    expect(await store.load()).toEqual({});

    const files = fs.readdirSync(dataDir);
    expect(files).toHaveLength(1);
    expect(files[0].startsWith("conversations.json.corrupt_")).toBe(true);
  });
});

describe("parseStoredHistories", () => {
  it("skips conversations with malformed messages", () => {
    expect(parseStoredHistories({
      version: 1,
      conversations: {
        good: [{ role: "user", content: "hi" }],
        badRole: [{ role: "narrator", content: "hi" }],
        notArray: "hi",
      },
    })).toEqual({ good: [{ role: "user", content: "hi" }] });
  });

  it("ignores an unknown file version", () => {
    expect(parseStoredHistories({ version: 2, conversations: {} })).toEqual({});
  });
});
