/**
 * @yieldsplit/event-store — File-based JSONL EventStore implementation.
 *
 * Stores records as one JSON object per line in a `.jsonl` file.
 *
 * Crash safety:
 * - Each append is written in a single call and fsynced before returning
 * - Partial or malformed lines (torn writes) are skipped on load
 * - The file is the source of truth; the in-memory index is derived
 */

import {
  appendFileSync,
  closeSync,
  existsSync,
  fsyncSync,
  mkdirSync,
  openSync,
  readFileSync,
} from "node:fs";
import { dirname } from "node:path";
import { isDomainEvent } from "@yieldsplit/types";
import { EventLog } from "./event-log.js";
import type { EventLogOptions } from "./event-log.js";
import type { StoredEvent } from "./types.js";

export interface JsonlEventStoreOptions extends EventLogOptions {
  readonly filePath: string;
}

export class JsonlEventStore extends EventLog {
  private readonly _filePath: string;

  /**
   * Open (or lazily create) the log at `options.filePath`.
   * The parent directory is created if it doesn't exist.
   */
  constructor(options: JsonlEventStoreOptions) {
    super(options);
    this._filePath = options.filePath;
    mkdirSync(dirname(this._filePath), { recursive: true });
    this._load();
  }

  get filePath(): string {
    return this._filePath;
  }

  protected persist(records: readonly StoredEvent[]): void {
    const data = records.map((r) => JSON.stringify(r) + "\n").join("");
    const fd = openSync(this._filePath, "a");
    try {
      appendFileSync(fd, data, "utf-8");
      fsyncSync(fd);
    } finally {
      closeSync(fd);
    }
  }

  private _load(): void {
    if (!existsSync(this._filePath)) {
      return;
    }

    const lines = readFileSync(this._filePath, "utf-8").split("\n");
    for (const line of lines) {
      const record = parseRecord(line.trim());
      if (record !== undefined && record.globalPosition === this.globalPosition() + 1) {
        this.index(record);
      }
    }
  }
}

function parseRecord(line: string): StoredEvent | undefined {
  if (line.length === 0) {
    return undefined;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch {
    // Torn write at the tail of the file.
    return undefined;
  }

  if (raw === null || typeof raw !== "object") {
    return undefined;
  }
  const r = raw as Record<string, unknown>;
  if (
    !isDomainEvent(r.event) ||
    typeof r.streamId !== "string" ||
    typeof r.version !== "number" ||
    typeof r.globalPosition !== "number" ||
    typeof r.appendedAt !== "string" ||
    typeof r.hash !== "string" ||
    typeof r.previousHash !== "string"
  ) {
    return undefined;
  }

  return {
    event: r.event,
    streamId: r.streamId,
    version: r.version,
    globalPosition: r.globalPosition,
    appendedAt: r.appendedAt,
    hash: r.hash,
    previousHash: r.previousHash,
  };
}
