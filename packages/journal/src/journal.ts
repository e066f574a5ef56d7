import { createHash } from "node:crypto";
import { appendFile, readFile, mkdir, writeFile, rename, open } from "node:fs/promises";
import { existsSync } from "node:fs";
import { dirname } from "node:path";
import { v4 as uuid } from "uuid";
import type { JournalEvent, JournalEventType } from "@servicemap/schemas";
import { parseJournalEvent, validateJournalEventData } from "@servicemap/schemas";

export interface JournalOptions {
  /** fsync after every append. Default: true */
  fsync?: boolean;
  /** How to handle a broken hash chain on init. "truncate" (default) keeps the valid prefix; "strict" throws. */
  recovery?: "truncate" | "strict";
}

export type JournalListener = (event: JournalEvent) => void;

function hashLine(line: string): string {
  return createHash("sha256").update(line).digest("hex");
}

function toLines(content: string): string[] {
  return content.trim().split("\n").filter(Boolean);
}

/**
 * Append-only JSONL event log. Each event carries the SHA-256 of the previous
 * line in `hash_prev`, so any edit to history breaks the chain.
 */
export class Journal {
  private readonly filePath: string;
  private readonly fsync: boolean;
  private readonly recovery: "truncate" | "strict";
  private lastHash: string | undefined;
  private nextSeq = 0;
  private listeners: JournalListener[] = [];
  private writeLock: Promise<void> = Promise.resolve();
  private sessionIndex = new Map<string, JournalEvent[]>();

  constructor(filePath: string, options?: JournalOptions) {
    this.filePath = filePath;
    this.fsync = options?.fsync ?? true;
    this.recovery = options?.recovery ?? "truncate";
  }

  async init(): Promise<void> {
    const dir = dirname(this.filePath);
    if (!existsSync(dir)) {
      await mkdir(dir, { recursive: true });
    }
    if (!existsSync(this.filePath)) return;

    const lines = toLines(await readFile(this.filePath, "utf-8"));

    // A crash mid-append leaves a partial last line.
    const last = lines[lines.length - 1];
    if (last !== undefined && !isJson(last)) {
      lines.pop();
      await this.rewrite(lines);
      console.error("[journal] truncated incomplete last line");
    }

    const index = new Map<string, JournalEvent[]>();
    let prevHash: string | undefined;
    let maxSeq = -1;
    for (const [i, line] of lines.entries()) {
      const event = parseJournalEvent(JSON.parse(line));
      if (i > 0 && event.hash_prev !== prevHash) {
        if (this.recovery === "strict") {
          throw new Error(`Journal integrity violation at event ${i} (seq=${event.seq}): hash chain broken`);
        }
        await this.rewrite(lines.slice(0, i));
        console.error(`[journal] recovered from corruption at event ${i}, truncated ${lines.length - i} events`);
        break;
      }
      prevHash = hashLine(line);
      const bucket = index.get(event.session_id);
      if (bucket) bucket.push(event);
      else index.set(event.session_id, [event]);
      if (event.seq > maxSeq) maxSeq = event.seq;
    }

    this.sessionIndex = index;
    this.lastHash = prevHash;
    this.nextSeq = maxSeq + 1;
  }

  on(listener: JournalListener): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter((l) => l !== listener);
    };
  }

  emit(
    sessionId: string,
    type: JournalEventType,
    payload: Record<string, unknown>,
  ): Promise<JournalEvent> {
    return this.serialize(() => this.append(sessionId, type, payload));
  }

  async readAll(): Promise<JournalEvent[]> {
    if (!existsSync(this.filePath)) return [];
    return toLines(await readFile(this.filePath, "utf-8"))
      .map((line) => parseJournalEvent(JSON.parse(line)));
  }

  async readSession(sessionId: string): Promise<JournalEvent[]> {
    return [...(this.sessionIndex.get(sessionId) ?? [])];
  }

  async verifyIntegrity(): Promise<{ valid: boolean; brokenAt?: number }> {
    const events = await this.readAll();
    let prevHash: string | undefined;
    for (const [i, event] of events.entries()) {
      if (i > 0 && event.hash_prev !== prevHash) {
        return { valid: false, brokenAt: i };
      }
      prevHash = hashLine(JSON.stringify(event));
    }
    return { valid: true };
  }

  /** Wait for pending writes. Call before process exit. */
  async close(): Promise<void> {
    await this.writeLock;
  }

  private serialize<T>(task: () => Promise<T>): Promise<T> {
    const run = this.writeLock.then(task);
    // The chain only orders writes; callers still see the rejection.
    this.writeLock = run.then(() => undefined, () => undefined);
    return run;
  }

  private async append(
    sessionId: string,
    type: JournalEventType,
    payload: Record<string, unknown>,
  ): Promise<JournalEvent> {
    const event: JournalEvent = {
      event_id: uuid(),
      seq: this.nextSeq,
      timestamp: new Date().toISOString(),
      session_id: sessionId,
      type,
      payload,
      ...(this.lastHash !== undefined ? { hash_prev: this.lastHash } : {}),
    };

    const validation = validateJournalEventData(event);
    if (!validation.valid) {
      throw new Error(`Invalid journal event: ${validation.errors.join(", ")}`);
    }

    const line = JSON.stringify(event);
    if (this.fsync) {
      const fh = await open(this.filePath, "a");
      try {
        await fh.write(line + "\n", undefined, "utf-8");
        await fh.sync();
      } finally {
        await fh.close();
      }
    } else {
      await appendFile(this.filePath, line + "\n", "utf-8");
    }

    // Commit in-memory state only after the write landed.
    this.nextSeq = event.seq + 1;
    this.lastHash = hashLine(line);
    const bucket = this.sessionIndex.get(sessionId);
    if (bucket) bucket.push(event);
    else this.sessionIndex.set(sessionId, [event]);

    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (err) {
        console.error("[journal] listener failed:", err);
      }
    }
    return event;
  }

  private async rewrite(lines: string[]): Promise<void> {
    const tmpPath = `${this.filePath}.tmp`;
    await writeFile(tmpPath, lines.length > 0 ? lines.join("\n") + "\n" : "", "utf-8");
    await rename(tmpPath, this.filePath);
  }
}

function isJson(line: string): boolean {
  try {
    JSON.parse(line);
    return true;
  } catch {
    return false;
  }
}
