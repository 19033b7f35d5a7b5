/*
Purpose: drive one or more phases end to end, each as a scheduler process paired with a watchdog process.
Assumptions: both children re-enter this CLI; the scheduler writes its own summaries, which decide what a later invocation may skip.
Usage: const code = await runProtocol({ config });
*/

import fs from "node:fs";
import path from "node:path";

import { execa } from "execa";
import fse from "fs-extra";

import type { ProjectConfig } from "./config.js";
import type { OutputSink } from "./logger.js";
import { SUMMARY_DIR } from "./run-summary.js";
import { PAUSED_EXIT_CODE } from "./scheduler.js";
import type { Phase } from "./task-graph.js";
import { isTruthyFlag } from "./utils.js";

export const SCHEDULER_PID_FILE = "scheduler.pid";
export const RESUME_ENV = "PHASEGATE_RESUME";
export const SKIP_DISCOVERY_ENV = "PHASEGATE_SKIP_DISCOVERY";

const WATCHDOG_EXIT_WAIT_MS = 5_000;

// Entries that do not make a project root count as an existing codebase.
const HOST_SCAFFOLD_ENTRIES = [
  ".git",
  ".gitignore",
  ".DS_Store",
  ".phasegate",
  "phasegate.yaml",
  "phasegate.yml",
  "phasegate.json",
  "AGENTS.md",
];

// =============================================================================
// TYPES
// =============================================================================

export type ChildHandle = {
  pid?: number;
  exited: Promise<number>;
  terminate(signal?: NodeJS.Signals): void;
};

export type ProtocolSpawner = {
  scheduler(phase: Phase): ChildHandle;
  watchdog(schedulerPid: number): ChildHandle;
};

export type ProtocolOptions = {
  config: ProjectConfig;
  // Runs exactly this phase instead of auto-detecting.
  phase?: Phase;
  env?: NodeJS.ProcessEnv;
  output?: OutputSink;
  spawner?: ProtocolSpawner;
};

// =============================================================================
// PHASE SELECTION
// =============================================================================

export function detectPhases(config: ProjectConfig, env: NodeJS.ProcessEnv = process.env): Phase[] {
  const ignored = new Set(HOST_SCAFFOLD_ENTRIES);
  ignored.add(path.basename(config.config_path));
  const logsRelative = path.relative(config.project_root, config.logs_dir);
  if (logsRelative && !logsRelative.startsWith("..") && !path.isAbsolute(logsRelative)) {
    ignored.add(logsRelative.split(path.sep)[0] ?? logsRelative);
  }

  const entries = fs.existsSync(config.project_root) ? fs.readdirSync(config.project_root) : [];
  const hasExistingCode = entries.some((entry) => !ignored.has(entry));
  if (!hasExistingCode) return ["discovery"];
  return isTruthyFlag(env[SKIP_DISCOVERY_ENV]) ? ["legacy"] : ["legacy", "discovery"];
}

export function latestSummaryPath(logsDir: string, phase: Phase): string | null {
  const dir = path.join(logsDir, SUMMARY_DIR);
  if (!fs.existsSync(dir)) return null;

  const prefix = `run-summary-${phase}-`;
  const candidates = fs
    .readdirSync(dir)
    .filter((name) => name.startsWith(prefix) && name.endsWith(".md"))
    .map((name) => {
      const filePath = path.join(dir, name);
      return { filePath, mtimeMs: fs.statSync(filePath).mtimeMs };
    })
    .sort((a, b) => a.mtimeMs - b.mtimeMs || a.filePath.localeCompare(b.filePath));

  return candidates.at(-1)?.filePath ?? null;
}

export function summarySucceeded(text: string): boolean {
  if (text.includes("- Error:") || text.includes("PAUSED")) return false;
  return !text.split("\n").some((line) => line.includes("FAIL (") || line.includes("BLOCKED"));
}

export function phaseCompleted(logsDir: string, phase: Phase): boolean {
  const summaryPath = latestSummaryPath(logsDir, phase);
  if (!summaryPath) return false;
  return summarySucceeded(fs.readFileSync(summaryPath, "utf8"));
}

// =============================================================================
// CHILD PROCESSES
// =============================================================================

function reenterCli(args: string[], cliEntry: string, env: NodeJS.ProcessEnv): ChildHandle {
  const subprocess = execa(process.execPath, [...process.execArgv, cliEntry, ...args], {
    env,
    stdio: "inherit",
    reject: false,
  });
  return {
    pid: subprocess.pid,
    exited: subprocess.then((result) => result.exitCode ?? 1),
    terminate: (signal = "SIGTERM") => {
      subprocess.kill(signal);
    },
  };
}

export function createCliSpawner(
  config: ProjectConfig,
  env: NodeJS.ProcessEnv = process.env,
  cliEntry: string = process.argv[1] ?? "",
): ProtocolSpawner {
  const base = ["--config", config.config_path];
  return {
    scheduler: (phase) => reenterCli([...base, "run", "--phase", phase], cliEntry, env),
    watchdog: (pid) => reenterCli([...base, "watch", "--pid", String(pid)], cliEntry, env),
  };
}

// =============================================================================
// PUBLIC API
// =============================================================================

/** Exit code of the protocol: 0 when every phase finished or discovery paused. */
export async function runProtocol(opts: ProtocolOptions): Promise<number> {
  const { config } = opts;
  const env = opts.env ?? process.env;
  const output: OutputSink = opts.output ?? ((line) => console.log(line));
  const spawner = opts.spawner ?? createCliSpawner(config, env);

  const phases = opts.phase ? [opts.phase] : detectPhases(config, env);
  const resume = isTruthyFlag(env[RESUME_ENV], true);
  let discoveryDone = false;

  for (const phase of phases) {
    if (resume && phaseCompleted(config.logs_dir, phase)) {
      output(`[RESUME] skip ${phase} (already completed)`);
      continue;
    }

    output(`[PHASE] starting ${phase}`);
    const code = await runSupervisedPhase(config, phase, spawner);

    if (code === PAUSED_EXIT_CODE && phase === "discovery") {
      output("[PAUSED] discovery interview paused. Re-run to continue.");
      return 0;
    }
    if (code !== 0) {
      output(`[ALERT] phase '${phase}' failed (exit=${code})`);
      return code;
    }
    if (phase === "discovery") discoveryDone = true;
  }

  if (discoveryDone) {
    output("Discovery complete. Review its output, then start development with:");
    output("  phasegate run --phase main");
  }
  return 0;
}

async function runSupervisedPhase(
  config: ProjectConfig,
  phase: Phase,
  spawner: ProtocolSpawner,
): Promise<number> {
  const scheduler = spawner.scheduler(phase);
  if (scheduler.pid === undefined) {
    return scheduler.exited;
  }

  const pidPath = path.join(config.logs_dir, SCHEDULER_PID_FILE);
  await fse.outputFile(pidPath, String(scheduler.pid));
  const watchdog = spawner.watchdog(scheduler.pid);

  try {
    return await scheduler.exited;
  } finally {
    const watchdogExited = await settlesWithin(watchdog.exited, WATCHDOG_EXIT_WAIT_MS);
    if (!watchdogExited) watchdog.terminate("SIGTERM");
    await fse.remove(pidPath);
  }
}

async function settlesWithin(promise: Promise<unknown>, ms: number): Promise<boolean> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<boolean>((resolve) => {
    timer = setTimeout(() => resolve(false), ms);
  });
  try {
    return await Promise.race([promise.then(() => true), timeout]);
  } finally {
    if (timer) clearTimeout(timer);
  }
}
