/*
Purpose: watch a running scheduler from outside, printing periodic status and stopping it when the active task's log stops growing.
Assumptions: the scheduler appends to run-events.jsonl, shared by every run, and stamps its pid on run_start; the watchdog follows only that run and only ever signals the scheduler pid.
Usage: const outcome = await new StallWatchdog({ pid, logsDir, settings }).run();
*/

import fs from "node:fs";
import path from "node:path";

import type { WatchdogConfig } from "../core/config.js";
import { formatErrorMessage } from "../core/error-format.js";
import { RUN_EVENTS_FILE } from "../core/executor.js";
import { appendSideLogLine, type OutputSink } from "../core/logger.js";
import { formatDuration, isMissingFileError, isProcessAlive, isTruthyFlag, sleep } from "../core/utils.js";

import { EventTail, type TailedEvent } from "./event-tail.js";

export const WATCH_STATUS_FILE = "watch-status.log";
export const WATCH_ALERTS_FILE = "watch-alerts.log";
export const STALL_KILL_GRACE_MS = 2_000;

export const STALL_TIMEOUT_ENV = "PHASEGATE_STALL_TIMEOUT";
export const WATCH_POLL_ENV = "PHASEGATE_WATCH_POLL";
export const STATUS_INTERVAL_ENV = "PHASEGATE_STATUS_INTERVAL";
export const STALL_KILL_ENV = "PHASEGATE_STALL_KILL";

// =============================================================================
// TYPES
// =============================================================================

export type WatchdogSettings = {
  stallTimeoutSec: number;
  pollIntervalSec: number;
  statusIntervalSec: number;
  killOnStall: boolean;
};

export type ProcessControl = {
  isAlive(pid: number): boolean;
  kill(pid: number, signal: NodeJS.Signals): void;
};

export type WatchdogOptions = {
  pid: number;
  logsDir: string;
  settings: WatchdogSettings;
  output?: OutputSink;
  process?: ProcessControl;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
  debug?: boolean;
};

// "continue" means the next poll should run.
export type PollOutcome = "continue" | "exited" | "run_end" | "stalled";

type TaskView = "RUNNING" | "OK" | "PAUSED" | `FAIL(${number})`;

type ActiveTask = {
  name: string;
  log: string | null;
  interactive: boolean;
};

// =============================================================================
// SETTINGS
// =============================================================================

function readNumber(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === "") return fallback;
  const parsed = Number(value);
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : fallback;
}

export function resolveWatchdogSettings(
  config: WatchdogConfig,
  env: NodeJS.ProcessEnv = process.env,
): WatchdogSettings {
  const pollIntervalSec = readNumber(env[WATCH_POLL_ENV], config.poll_interval_sec);
  return {
    stallTimeoutSec: readNumber(env[STALL_TIMEOUT_ENV], config.stall_timeout_sec),
    pollIntervalSec: pollIntervalSec > 0 ? pollIntervalSec : config.poll_interval_sec,
    statusIntervalSec: readNumber(env[STATUS_INTERVAL_ENV], config.status_interval_sec),
    killOnStall: isTruthyFlag(env[STALL_KILL_ENV], config.kill_on_stall),
  };
}

export const defaultProcessControl: ProcessControl = {
  isAlive: isProcessAlive,
  kill: (pid, signal) => {
    try {
      process.kill(pid, signal);
    } catch (err) {
      if (!(err instanceof Error && "code" in err && err.code === "ESRCH")) throw err;
    }
  },
};

// =============================================================================
// WATCHDOG
// =============================================================================

export class StallWatchdog {
  private readonly tail: EventTail;
  private readonly statusPath: string;
  private readonly alertsPath: string;
  private readonly output: OutputSink;
  private readonly proc: ProcessControl;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;

  private runId: string | null = null;
  private phase: string | null = null;
  private runStartedAt: number | null = null;
  private tasksTotal: number | null = null;
  private statuses = new Map<string, TaskView>();
  private started = new Map<string, ActiveTask>();
  private active: ActiveTask | null = null;
  private lastLogMtime: number | null = null;
  private nextStatusAt: number | null;

  constructor(private readonly opts: WatchdogOptions) {
    this.tail = new EventTail(path.join(opts.logsDir, RUN_EVENTS_FILE));
    this.statusPath = path.join(opts.logsDir, WATCH_STATUS_FILE);
    this.alertsPath = path.join(opts.logsDir, WATCH_ALERTS_FILE);
    this.output = opts.output ?? ((line) => console.log(line));
    this.proc = opts.process ?? defaultProcessControl;
    this.now = opts.now ?? Date.now;
    this.sleep = opts.sleep ?? sleep;

    const statusMs = opts.settings.statusIntervalSec * 1000;
    this.nextStatusAt = statusMs > 0 ? this.now() + statusMs : null;
  }

  get activeTask(): string | null {
    return this.active?.name ?? null;
  }

  async run(): Promise<PollOutcome> {
    this.output(`[WATCH] monitoring scheduler pid ${this.opts.pid}`);
    for (;;) {
      const outcome = await this.poll();
      if (outcome !== "continue") return outcome;
      await this.sleep(this.opts.settings.pollIntervalSec * 1000);
    }
  }

  /** One observation: process liveness, new events, status line, stall check. */
  async poll(): Promise<PollOutcome> {
    if (!this.proc.isAlive(this.opts.pid)) {
      this.output("[WATCH] scheduler exited");
      return "exited";
    }

    let events: TailedEvent[];
    try {
      events = this.tail.readNew();
    } catch (err) {
      this.debug(`[WATCH] event log unreadable, retrying: ${formatErrorMessage(err)}`);
      events = [];
    }

    for (const event of events) {
      if (this.applyEvent(event) === "run_end") {
        this.output("[WATCH] run_end");
        return "run_end";
      }
    }

    const now = this.now();
    this.maybeReportStatus(now);
    return this.checkStall(now);
  }

  // ===========================================================================
  // EVENTS
  // ===========================================================================

  private applyEvent(event: TailedEvent): "run_end" | null {
    if (event.event === "run_start") {
      // Earlier runs share the log; only the watched scheduler's run counts.
      if (event.pid !== this.opts.pid) return null;
      this.runId = stringField(event, "run_id");
      this.phase = stringField(event, "phase");
      this.tasksTotal = typeof event.tasks_total === "number" ? event.tasks_total : null;
      this.runStartedAt = this.now();
      this.statuses = new Map();
      this.started = new Map();
      this.setActive(null);
      return null;
    }

    if (this.runId === null || event.run_id !== this.runId) return null;

    switch (event.event) {
      case "task_start": {
        const name = stringField(event, "task");
        if (!name) return null;
        const task: ActiveTask = {
          name,
          log: stringField(event, "log"),
          interactive: event.interactive === true,
        };
        this.statuses.set(name, "RUNNING");
        this.started.delete(name);
        this.started.set(name, task);
        this.setActive(task);
        this.output(`[TASK] start ${name}`);
        return null;
      }

      case "task_end": {
        const name = stringField(event, "task");
        if (!name) return null;
        const code = typeof event.exit_code === "number" ? event.exit_code : -1;
        this.statuses.set(name, taskView(event.status, code));
        this.started.delete(name);
        this.output(`[TASK] done ${name} exit=${code}`);
        if (this.active?.name === name) {
          this.setActive(this.latestRunning());
        }
        return null;
      }

      case "run_end":
        return "run_end";

      default:
        return null;
    }
  }

  private setActive(task: ActiveTask | null): void {
    this.active = task;
    this.lastLogMtime = null;
  }

  private latestRunning(): ActiveTask | null {
    let latest: ActiveTask | null = null;
    for (const task of this.started.values()) latest = task;
    return latest;
  }

  private interactiveDiscoveryActive(): boolean {
    return this.phase === "discovery" && this.active?.interactive === true;
  }

  // ===========================================================================
  // STATUS
  // ===========================================================================

  formatStatusLine(now: number): string {
    const views = [...this.statuses.entries()];
    const running = views.filter(([, view]) => view === "RUNNING").map(([name]) => name);
    const done = views.length - running.length;
    const total = this.tasksTotal ?? views.length;
    const elapsed =
      this.runStartedAt === null ? "00:00" : formatDuration((now - this.runStartedAt) / 1000);
    const runningText = running.length > 0 ? running.join(",") : "-";
    return `[STATUS] phase=${this.phase ?? "-"} run_id=${this.runId ?? "-"} running=${runningText} done=${done}/${total} elapsed=${elapsed}`;
  }

  private maybeReportStatus(now: number): void {
    if (this.nextStatusAt === null || now < this.nextStatusAt || this.phase === null) return;

    const line = this.formatStatusLine(now);
    appendSideLogLine(this.statusPath, line);
    if (!this.interactiveDiscoveryActive()) {
      this.output(line);
    }
    this.nextStatusAt = now + this.opts.settings.statusIntervalSec * 1000;
  }

  // ===========================================================================
  // STALL
  // ===========================================================================

  private async checkStall(now: number): Promise<PollOutcome> {
    const { stallTimeoutSec } = this.opts.settings;
    const active = this.active;
    if (!active?.log || stallTimeoutSec <= 0 || this.interactiveDiscoveryActive()) {
      return "continue";
    }

    let mtime: number;
    try {
      mtime = fs.statSync(active.log).mtimeMs;
    } catch (err) {
      if (!isMissingFileError(err)) {
        this.debug(`[WATCH] cannot stat ${active.log}: ${formatErrorMessage(err)}`);
      }
      return "continue";
    }

    if (this.lastLogMtime === null || mtime !== this.lastLogMtime) {
      this.lastLogMtime = mtime;
      return "continue";
    }

    const stalledFor = Math.floor((now - mtime) / 1000);
    if (stalledFor < stallTimeoutSec) return "continue";

    const alert = `[ALERT] task '${active.name}' stalled for ${stalledFor}s (log: ${active.log})`;
    this.output(alert);
    appendSideLogLine(this.alertsPath, alert);

    if (this.opts.settings.killOnStall) {
      await this.stopScheduler();
    }
    return "stalled";
  }

  private async stopScheduler(): Promise<void> {
    const { pid } = this.opts;
    this.proc.kill(pid, "SIGTERM");
    await this.sleep(STALL_KILL_GRACE_MS);
    if (this.proc.isAlive(pid)) {
      this.proc.kill(pid, "SIGKILL");
    }
  }

  private debug(line: string): void {
    if (this.opts.debug) this.output(line);
  }
}

// =============================================================================
// INTERNALS
// =============================================================================

function stringField(event: TailedEvent, key: string): string | null {
  const value = event[key];
  return typeof value === "string" ? value : null;
}

function taskView(status: unknown, exitCode: number): TaskView {
  if (status === "paused") return "PAUSED";
  return exitCode === 0 ? "OK" : `FAIL(${exitCode})`;
}
