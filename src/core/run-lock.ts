/*
Purpose: the single cross-invocation mutual-exclusion file for main-phase runs.
Assumptions: one host; a lock whose pid is gone was left by a killed scheduler.
Usage: const lock = new RunLock(path); lock.assertPhaseMayStart(phase, runId); lock.acquire(...); lock.release().
*/

import fs from "node:fs";
import path from "node:path";

import fse from "fs-extra";
import { z } from "zod";

import { formatErrorMessage } from "./error-format.js";
import { RunLockError } from "./errors.js";
import type { OutputSink } from "./logger.js";
import { PHASES, type Phase } from "./task-graph.js";
import { isMissingFileError, isProcessAlive } from "./utils.js";

export const RUN_LOCK_FILE = "run.lock";

// Phases whose start is refused while another run holds the lock.
const LOCK_CHECKED_PHASES: readonly Phase[] = ["main", "post", "legacy"];

const RunLockRecordSchema = z.object({
  run_id: z.string().min(1),
  phase: z.enum(PHASES),
  started_at: z.string(),
  pid: z.number().int(),
});

export type RunLockRecord = z.infer<typeof RunLockRecordSchema>;

export type RunLockOptions = {
  isAlive?: (pid: number) => boolean;
  // Receives warnings about stale or unreleasable locks.
  output?: OutputSink;
};

export function phaseAcquiresLock(phase: Phase, dryRun: boolean): boolean {
  return phase === "main" && !dryRun;
}

export class RunLock {
  private held: RunLockRecord | null = null;
  private readonly isAlive: (pid: number) => boolean;
  private readonly output: OutputSink;

  constructor(
    public readonly lockPath: string,
    opts: RunLockOptions = {},
  ) {
    this.isAlive = opts.isAlive ?? isProcessAlive;
    this.output = opts.output ?? ((line) => console.warn(line));
  }

  read(): RunLockRecord | null {
    let raw: string;
    try {
      raw = fs.readFileSync(this.lockPath, "utf8");
    } catch (err) {
      if (isMissingFileError(err)) return null;
      throw new RunLockError(`Failed to read run lock at ${this.lockPath}`, err);
    }

    let parsedJson: unknown;
    try {
      parsedJson = JSON.parse(raw);
    } catch (err) {
      throw new RunLockError(
        `Run lock at ${this.lockPath} is unreadable (${formatErrorMessage(err)}). Remove it if no run is active.`,
        err,
      );
    }

    const parsed = RunLockRecordSchema.safeParse(parsedJson);
    if (!parsed.success) {
      throw new RunLockError(
        `Run lock at ${this.lockPath} is malformed. Remove it if no run is active.`,
        parsed.error,
      );
    }
    return parsed.data;
  }

  /**
   * Throws when another live run holds the lock. Stale locks (dead pid) are removed.
   */
  assertPhaseMayStart(phase: Phase, runId: string): void {
    if (!LOCK_CHECKED_PHASES.includes(phase)) return;

    const existing = this.read();
    if (!existing || existing.run_id === runId) return;

    if (!this.isAlive(existing.pid)) {
      this.output(
        `[WARN] removing stale run lock at ${this.lockPath} (run ${existing.run_id}, pid ${existing.pid} is not running)`,
      );
      fse.removeSync(this.lockPath);
      return;
    }

    throw new RunLockError(
      `Active run lock detected at ${this.lockPath} (run ${existing.run_id}, phase ${existing.phase}, pid ${existing.pid}). Finish that run first.`,
    );
  }

  acquire(record: RunLockRecord): void {
    fse.ensureDirSync(path.dirname(this.lockPath));
    try {
      fs.writeFileSync(this.lockPath, JSON.stringify(record), { encoding: "utf8", flag: "wx" });
    } catch (err) {
      throw new RunLockError(`Failed to acquire run lock at ${this.lockPath}`, err);
    }
    this.held = record;
  }

  get isHeld(): boolean {
    return this.held !== null;
  }

  /** Idempotent; only removes the file when it still names our run. */
  release(): void {
    const held = this.held;
    if (!held) return;
    this.held = null;

    try {
      const current = this.read();
      if (current && current.run_id !== held.run_id) return;
      fse.removeSync(this.lockPath);
    } catch (err) {
      this.output(
        `[WARN] failed to release run lock at ${this.lockPath}: ${formatErrorMessage(err)}`,
      );
    }
  }
}
