import fs from "node:fs";
import path from "node:path";

import fse from "fs-extra";

import { formatErrorLines, formatErrorMessage } from "./error-format.js";
import { isoNow } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type JsonValue = string | number | boolean | null | JsonArray | JsonObject;
export type JsonArray = JsonValue[];
export interface JsonObject {
  [key: string]: JsonValue;
}

export const RUN_EVENT_KINDS = [
  "run_start",
  "task_start",
  "task_end",
  "run_end",
  "report_publish_error",
] as const;

export type RunEventKind = (typeof RUN_EVENT_KINDS)[number];

export type RunEvent = JsonObject & {
  event: RunEventKind;
  run_id: string;
  timestamp: string;
  task?: string;
};

export type RunEventInput = JsonObject & {
  event: RunEventKind;
  runId?: string;
  task?: string;
  timestamp?: string;
};

export type OutputSink = (line: string) => void;

type EventDefaults = {
  runId?: string;
};

type LogFailureAction = "write" | "close";

// =============================================================================
// EVENT LOG
// =============================================================================

/**
 * Append-only JSONL writer for the run event stream.
 *
 * Each event is a single `write` on a file opened in append mode, so concurrent
 * readers (the watchdog) only ever observe whole lines or a missing tail.
 */
export class JsonlLogger {
  private readonly fileDescriptor: number;
  private readonly isDebugEnabled: boolean;
  private closed = false;

  constructor(
    public readonly filePath: string,
    private readonly defaults: EventDefaults = {},
  ) {
    fse.ensureDirSync(path.dirname(filePath));
    this.fileDescriptor = fs.openSync(filePath, "a");
    this.isDebugEnabled = resolveLoggerDebugEnabled();
  }

  log(event: RunEventInput): RunEvent {
    const normalized = normalizeRunEvent(event, this.defaults);
    this.append(normalized);
    return normalized;
  }

  close(): void {
    if (this.closed) return;
    try {
      fs.fsyncSync(this.fileDescriptor);
      fs.closeSync(this.fileDescriptor);
    } catch (err) {
      console.warn(formatLogFailureWarning("close", this.filePath, err, this.isDebugEnabled));
    } finally {
      this.closed = true;
    }
  }

  private append(event: RunEvent): void {
    if (this.closed) return;
    try {
      fs.writeSync(this.fileDescriptor, `${JSON.stringify(event)}\n`);
      fs.fsyncSync(this.fileDescriptor);
    } catch (err) {
      console.warn(formatLogFailureWarning("write", this.filePath, err, this.isDebugEnabled));
    }
  }
}

export function normalizeRunEvent(event: RunEventInput, defaults: EventDefaults = {}): RunEvent {
  const { runId: providedRunId, task, timestamp, event: kind, ...rest } = event;

  const runId = providedRunId ?? defaults.runId;
  if (!runId) {
    throw new Error("run_id is required for run events");
  }

  const result: RunEvent = {
    event: kind,
    run_id: runId,
    timestamp: timestamp ?? isoNow(),
  };
  if (task !== undefined) {
    result.task = task;
  }
  for (const [key, value] of Object.entries(rest)) {
    result[key] = value;
  }

  return result;
}

// =============================================================================
// SIDE LOGS
// =============================================================================

export function appendSideLogLine(filePath: string, line: string): void {
  try {
    fse.ensureDirSync(path.dirname(filePath));
    fs.appendFileSync(filePath, `${isoNow()} ${line}\n`, "utf8");
  } catch (err) {
    console.warn(`Warning: failed to append to ${filePath}: ${formatErrorMessage(err)}`);
  }
}

// =============================================================================
// INTERNALS
// =============================================================================

function formatLogFailureWarning(
  action: LogFailureAction,
  filePath: string,
  error: unknown,
  isDebugEnabled: boolean,
): string {
  const summary = formatErrorMessage(error);
  const actionLabel =
    action === "write" ? `write run event to ${filePath}` : `close event log ${filePath}`;
  const message = `Warning: failed to ${actionLabel}: ${summary}`;

  if (!isDebugEnabled) {
    return message;
  }

  const stackLine = formatErrorLines(error, { mode: "debug" }).find(
    (line) => line.kind === "stack",
  );
  return stackLine ? `${message}\n${stackLine.text}` : message;
}

function resolveLoggerDebugEnabled(): boolean {
  let debugFlag = false;

  for (const arg of process.argv) {
    if (arg === "--") break;
    if (arg === "--debug") debugFlag = true;
    if (arg === "--no-debug") debugFlag = false;
  }

  return debugFlag;
}
