/**
 * File Transport
 *
 * Appends JSON lines to a daily log file, rotating by size.
 * Node.js only.
 */

import * as fs from "fs";
import * as path from "path";
import type { LogTransport, LogEntry, LogLevel } from "../types.js";

export interface FileTransportOptions {
  minLevel?: LogLevel;
  logDir: string;
  /** Base filename (default: "toolchat") */
  filename?: string;
  /** Max file size in bytes before rotation (default: 10MB) */
  maxSize?: number;
  /** Rotated files to keep (default: 5) */
  maxFiles?: number;
}

export class FileTransport implements LogTransport {
  name = "file";
  minLevel: LogLevel;
  private logDir: string;
  private filename: string;
  private maxSize: number;
  private maxFiles: number;
  private currentPath: string;
  private stream: fs.WriteStream | null = null;
  private currentSize = 0;
  private queue: string[] = [];
  private writing = false;

  constructor(options: FileTransportOptions) {
    this.minLevel = options.minLevel || "info";
    this.logDir = options.logDir;
    this.filename = options.filename || "toolchat";
    this.maxSize = options.maxSize || 10 * 1024 * 1024;
    this.maxFiles = options.maxFiles || 5;
    this.currentPath = this.pathForToday();

    fs.mkdirSync(this.logDir, { recursive: true });
    this.openStream();
  }

  private pathForToday(): string {
    const date = new Date().toISOString().slice(0, 10); // YYYY-MM-DD
    return path.join(this.logDir, `${this.filename}-${date}.log`);
  }

  private openStream(): void {
    this.currentPath = this.pathForToday();

    try {
      this.currentSize = fs.statSync(this.currentPath).size;
    } catch {
      this.currentSize = 0; // file does not exist yet
    }

    this.stream = fs.createWriteStream(this.currentPath, { flags: "a" });
    this.stream.on("error", (err: Error) => {
      console.error("[FileTransport] Write error:", err);
    });
  }

  log(entry: LogEntry): void {
    this.queue.push(JSON.stringify(entry) + "\n");
    this.drain();
  }

  private drain(): void {
    const stream = this.stream;
    const line = this.queue[0];
    if (this.writing || line === undefined || !stream) return;

    this.queue.shift();
    this.writing = true;

    let target = stream;
    const bytes = Buffer.byteLength(line);
    if (this.currentSize + bytes > this.maxSize) {
      target = this.rotate();
    } else if (this.pathForToday() !== this.currentPath) {
      stream.end();
      this.openStream();
      target = this.stream ?? stream;
    }

    target.write(line, (err?: Error | null) => {
      if (!err) this.currentSize += bytes;
      this.writing = false;
      this.drain();
    });
  }

  private rotate(): fs.WriteStream {
    this.stream?.end();

    for (let i = this.maxFiles - 1; i >= 1; i--) {
      const oldPath = `${this.currentPath}.${i}`;
      if (!fs.existsSync(oldPath)) continue;
      if (i === this.maxFiles - 1) {
        fs.unlinkSync(oldPath);
      } else {
        fs.renameSync(oldPath, `${this.currentPath}.${i + 1}`);
      }
    }

    if (fs.existsSync(this.currentPath)) {
      fs.renameSync(this.currentPath, `${this.currentPath}.1`);
    }

    this.openStream();
    if (!this.stream) throw new Error("FileTransport: failed to reopen log stream");
    return this.stream;
  }

  async flush(): Promise<void> {
    while (this.queue.length > 0 || this.writing) {
      await new Promise(resolve => setTimeout(resolve, 10));
    }
  }

  async close(): Promise<void> {
    await this.flush();
    const stream = this.stream;
    this.stream = null;
    if (!stream) return;
    await new Promise<void>(resolve => stream.end(() => resolve()));
  }
}
