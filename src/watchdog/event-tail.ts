import fs from "node:fs";

import { isMissingFileError } from "../core/utils.js";

export type TailedEvent = Record<string, unknown>;

/**
 * Incremental reader for an append-only JSONL file. Each call returns the events
 * completed since the previous call; an unterminated trailing line is held back
 * until its newline arrives, and lines that are not JSON objects are skipped.
 */
export class EventTail {
  private offset = 0;
  private partial = "";

  constructor(public readonly filePath: string) {}

  readNew(): TailedEvent[] {
    const chunk = this.readFromOffset();
    if (chunk.length === 0) return [];

    const text = this.partial + chunk;
    const lines = text.split("\n");
    this.partial = lines.pop() ?? "";

    const events: TailedEvent[] = [];
    for (const line of lines) {
      const event = parseEventLine(line);
      if (event) events.push(event);
    }
    return events;
  }

  private readFromOffset(): string {
    let fd: number;
    try {
      fd = fs.openSync(this.filePath, "r");
    } catch (err) {
      if (isMissingFileError(err)) return "";
      throw err;
    }

    try {
      const size = fs.fstatSync(fd).size;
      if (size < this.offset) {
        // Truncated or replaced; start over.
        this.offset = 0;
        this.partial = "";
      }
      if (size === this.offset) return "";

      const buffer = Buffer.alloc(size - this.offset);
      const bytesRead = fs.readSync(fd, buffer, 0, buffer.length, this.offset);
      this.offset += bytesRead;
      return buffer.subarray(0, bytesRead).toString("utf8");
    } finally {
      fs.closeSync(fd);
    }
  }
}

function parseEventLine(line: string): TailedEvent | null {
  const trimmed = line.trim();
  if (!trimmed) return null;

  let parsed: unknown;
  try {
    parsed = JSON.parse(trimmed);
  } catch {
    return null;
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) return null;
  return Object.fromEntries(Object.entries(parsed));
}
