/*
Purpose: run one phase end to end: select, preflight, lock, schedule, supervise, finalize.
Assumptions: scheduling decisions come from scheduler.ts; this module performs the side effects they imply.
Usage: const result = await runPhase({ config, phase: "main", dryRun: false, includeManual: false });
*/

import path from "node:path";

import { consumePauseMarker, pauseMarkerExists } from "../session/pause-marker.js";

import type { ProjectConfig, RunnerConfig } from "./config.js";
import { formatErrorMessage } from "./error-format.js";
import { ConfigError, DeadlockError, TaskError } from "./errors.js";
import { JsonlLogger, appendSideLogLine, type OutputSink } from "./logger.js";
import { runPreflight } from "./preflight.js";
import { publishReport } from "./report-hook.js";
import { RUN_LOCK_FILE, RunLock, phaseAcquiresLock } from "./run-lock.js";
import { writeRunSummary, type RunSummaryPaths } from "./run-summary.js";
import { applyRunnerNoop, buildRunnerCommand, isRunnerNoop, resolveRunner } from "./runners.js";
import {
  advance,
  applyExits,
  collectOutcome,
  computeExitCode,
  initialState,
  isFinished,
  isPauseExit,
  runningTasks,
  type SchedulerState,
  type TaskExit,
  type TaskStatus,
  type Transition,
} from "./scheduler.js";
import {
  normalizeTasks,
  resolveTaskPaths,
  selectTasks,
  taskTemplateContext,
  type Phase,
  type ResolvedTaskPaths,
  type TaskDefinition,
} from "./task-graph.js";
import {
  DryRunTaskLauncher,
  createDefaultLauncher,
  type ChildExit,
  type LaunchedTask,
  type TaskLauncher,
} from "./task-launcher.js";
import { defaultRunId, formatDuration } from "./utils.js";
import { resolveFrameworkVersion } from "./version.js";
import { ensureWorkspace, type EnsureWorkspaceOptions } from "./workspaces.js";

export const RUN_EVENTS_FILE = "run-events.jsonl";
export const PROGRESS_LOG_FILE = "progress.log";

const SHUTDOWN_GRACE_MS = 5_000;
const STOP_SIGNALS: NodeJS.Signals[] = ["SIGINT", "SIGTERM"];

// =============================================================================
// TYPES
// =============================================================================

export type RunPhaseOptions = {
  config: ProjectConfig;
  phase: Phase;
  dryRun: boolean;
  includeManual: boolean;
  runId?: string;
  launcher?: TaskLauncher;
  provisionWorkspace?: (opts: EnsureWorkspaceOptions) => Promise<unknown>;
  output?: OutputSink;
  hasTerminal?: boolean;
  env?: NodeJS.ProcessEnv;
  handleSignals?: boolean;
  now?: () => number;
};

export type RunPhaseResult = {
  runId: string;
  exitCode: number;
  state: SchedulerState;
  error: string | null;
  summaryPaths: RunSummaryPaths;
};

type RunningTask = {
  handle: LaunchedTask;
  paths: ResolvedTaskPaths;
  interactive: boolean;
};

// =============================================================================
// TICK WAITER
// =============================================================================

/** Sleeps until the next tick, or earlier when a child exits or a stop signal arrives. */
class TickWaiter {
  private pending: { timer: NodeJS.Timeout; resolve: () => void } | null = null;

  wait(ms: number): Promise<void> {
    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.pending = null;
        resolve();
      }, ms);
      this.pending = { timer, resolve };
    });
  }

  wake(): void {
    const pending = this.pending;
    if (!pending) return;
    this.pending = null;
    clearTimeout(pending.timer);
    pending.resolve();
  }
}

// =============================================================================
// PUBLIC API
// =============================================================================

export async function runPhase(opts: RunPhaseOptions): Promise<RunPhaseResult> {
  const { config, phase, dryRun } = opts;
  const env = opts.env ?? process.env;
  const output: OutputSink = opts.output ?? ((line) => console.log(line));
  const now = opts.now ?? Date.now;

  const tasks = selectTasks(normalizeTasks(config.tasks), phase, opts.includeManual);
  if (tasks.length === 0) {
    throw new ConfigError(`No tasks selected for phase '${phase}'`);
  }

  let runners: Record<string, RunnerConfig> = config.runners;
  if (isRunnerNoop(env)) {
    runners = applyRunnerNoop(runners);
    output("[PREFLIGHT] PHASEGATE_RUNNER_NOOP=1: runner commands set to no-op");
  }

  await runPreflight({
    projectRoot: config.project_root,
    logsDir: config.logs_dir,
    phase,
    runners,
    tasks,
    hasTerminal: opts.hasTerminal ?? Boolean(process.stdin.isTTY && process.stdout.isTTY),
    reporting: config.reporting,
  });

  const runId = opts.runId ?? defaultRunId();
  const startedAtMs = now();
  const startedAt = new Date(startedAtMs).toISOString();
  const frameworkVersion = await resolveFrameworkVersion(config.version_file, config.project_root);

  const logger = new JsonlLogger(path.join(config.logs_dir, RUN_EVENTS_FILE), { runId });
  const lock = new RunLock(path.join(config.logs_dir, RUN_LOCK_FILE), { output });
  try {
    lock.assertPhaseMayStart(phase, runId);
    if (phaseAcquiresLock(phase, dryRun)) {
      lock.acquire({ run_id: runId, phase, started_at: startedAt, pid: process.pid });
    }
  } catch (err) {
    logger.close();
    throw err;
  }

  logger.log({
    event: "run_start",
    timestamp: startedAt,
    phase,
    project_root: config.project_root,
    config: config.config_path,
    framework_version: frameworkVersion,
    tasks_total: tasks.length,
    tasks: tasks.map((task) => task.name),
    dry_run: dryRun,
    pid: process.pid,
  });

  const launcher = dryRun ? new DryRunTaskLauncher() : (opts.launcher ?? createDefaultLauncher(env));
  const provisionWorkspace = opts.provisionWorkspace ?? ensureWorkspace;
  const taskByName = new Map(tasks.map((task) => [task.name, task]));
  const running = new Map<string, RunningTask>();
  const exitQueue: TaskExit[] = [];
  const waiter = new TickWaiter();

  let state = initialState(tasks);
  let runError: string | null = null;
  const stop: { signal: NodeJS.Signals | null } = { signal: null };

  const onSignal = (signal: NodeJS.Signals): void => {
    stop.signal = signal;
    waiter.wake();
  };
  const handleSignals = opts.handleSignals ?? true;
  if (handleSignals) {
    for (const signal of STOP_SIGNALS) process.on(signal, onSignal);
  }

  const observeExit = (task: TaskDefinition, entry: RunningTask, exit: ChildExit): void => {
    const paused = isPauseExit({
      exitCode: exit.exitCode,
      signaled: exit.signaled,
      interactive: task.interactive,
      pauseMarkerConfigured: entry.paths.pauseMarker !== undefined,
      pauseMarkerPresent: pauseMarkerExists(entry.paths.pauseMarker),
    });
    exitQueue.push({ task: task.name, exitCode: exit.exitCode, paused });
    waiter.wake();
  };

  const recordTransition = (transition: Transition): void => {
    if (transition.kind === "complete" || transition.kind === "pause") {
      const status = transition.kind === "pause" ? "paused" : "completed";
      logger.log({
        event: "task_end",
        task: transition.task,
        exit_code: transition.exitCode,
        status,
      });
      running.delete(transition.task);
      output(
        transition.kind === "pause"
          ? `[PAUSED] ${transition.task} exit=${transition.exitCode}`
          : `[DONE] ${transition.task} exit=${transition.exitCode}`,
      );
    } else if (transition.kind === "block") {
      output(`[BLOCKED] ${transition.task} <- ${transition.deps.join(", ")}`);
    }
  };

  const startTask = async (task: TaskDefinition): Promise<void> => {
    const context = taskTemplateContext(task, runId, phase);
    const paths = resolveTaskPaths(task, context, {
      projectRoot: config.project_root,
      logsDir: config.logs_dir,
    });
    const runner = resolveRunner(runners, task.runner, task.name);

    const marker =
      paths.pauseMarker && !dryRun ? consumePauseMarker(paths.pauseMarker) : null;
    const resumed = marker !== null;
    if (resumed) {
      output(`[RESUME] ${task.name} (paused at ${marker.paused_at || "unknown time"})`);
    }

    const command = buildRunnerCommand({
      runner,
      context,
      promptPath: paths.prompt,
      resume: resumed,
    });

    logger.log({
      event: "task_start",
      task: task.name,
      command,
      branch: paths.branch,
      worktree: paths.worktree,
      log: paths.log,
      interactive: task.interactive,
      resumed,
    });

    if (dryRun) {
      output(`[DRY-RUN] ${task.name} in ${paths.worktree} :: ${command}`);
    } else {
      await provisionWorkspace({
        repoRoot: config.project_root,
        workspacePath: paths.worktree,
        branch: paths.branch,
      });
      output(
        task.interactive
          ? `[START] ${task.name} (interactive) -> ${paths.log}`
          : `[START] ${task.name} -> ${paths.log}`,
      );
    }

    const handle = await launcher.launch({
      task,
      runner,
      command,
      paths,
      runId,
      phase,
      resumed,
      session: config.session,
    });
    const entry: RunningTask = { handle, paths, interactive: task.interactive };
    running.set(task.name, entry);
    void handle.exited.then(
      (exit) => observeExit(task, entry, exit),
      (err: unknown) => {
        output(`[ERROR] ${task.name}: ${formatErrorMessage(err)}`);
        observeExit(task, entry, { exitCode: -1, signaled: false });
      },
    );
  };

  const progressIntervalMs = config.scheduler.progress_interval_sec * 1000;
  let lastProgressAt = startedAtMs;
  const reportProgress = (): void => {
    if (progressIntervalMs <= 0) return;
    const current = now();
    if (current - lastProgressAt < progressIntervalMs) return;
    lastProgressAt = current;

    const names = runningTasks(state, tasks);
    if (names.length === 0) return;
    const line = `[PROGRESS] running=${names.join(",")} elapsed=${formatDuration((current - startedAtMs) / 1000)}`;
    const anyInteractive = names.some((name) => taskByName.get(name)?.interactive === true);
    if (anyInteractive) {
      // The operator's terminal belongs to the interactive session.
      appendSideLogLine(path.join(config.logs_dir, PROGRESS_LOG_FILE), line);
    } else {
      output(line);
    }
  };

  try {
    while (!isFinished(state, tasks)) {
      if (stop.signal) {
        throw new TaskError(`Interrupted by ${stop.signal}`);
      }

      const result = advance(state, tasks, exitQueue.splice(0));
      state = result.state;

      for (const [index, transition] of result.transitions.entries()) {
        if (transition.kind !== "start") {
          recordTransition(transition);
          continue;
        }
        const task = taskByName.get(transition.task);
        if (!task) continue;
        try {
          await startTask(task);
        } catch (err) {
          // This start and every later one of the tick never ran: NOT STARTED, not INTERRUPTED.
          const notStarted: TaskStatus = { state: "pending" };
          const unlaunched = result.transitions
            .slice(index)
            .filter((pendingStart) => pendingStart.kind === "start")
            .map((pendingStart) => pendingStart.task);
          state = { ...state, ...Object.fromEntries(unlaunched.map((name) => [name, notStarted])) };
          throw err;
        }
      }

      if (result.deadlock) {
        throw new DeadlockError(result.deadlock);
      }
      if (isFinished(state, tasks)) break;

      reportProgress();
      if (exitQueue.length === 0 && !stop.signal) {
        await waiter.wait(config.scheduler.tick_interval_ms);
      }
    }
  } catch (err) {
    runError = formatErrorMessage(err);
    output(`[ERROR] ${runError}`);
    state = await stopRunningTasks(state, running, recordTransition);
  } finally {
    if (handleSignals) {
      for (const signal of STOP_SIGNALS) process.off(signal, onSignal);
    }
    lock.release();
  }

  const finishedAtMs = now();
  const finishedAt = new Date(finishedAtMs).toISOString();
  const summaryPaths = await writeRunSummary(config.logs_dir, {
    runId,
    phase,
    startedAt,
    finishedAt,
    frameworkVersion,
    error: runError,
    tasks,
    state,
  });

  const exitCode = computeExitCode(state, tasks, runError);
  const outcome = collectOutcome(state, tasks);
  logger.log({
    event: "run_end",
    timestamp: finishedAt,
    phase,
    duration_sec: Math.round((finishedAtMs - startedAtMs) / 10) / 100,
    completed: outcome.completed,
    blocked: outcome.blocked,
    paused: outcome.paused,
    error: runError,
    exit_code: exitCode,
  });
  output(`Summary saved to ${summaryPaths.latest}`);

  if (!dryRun) {
    const publishError = await publishReport({
      reporting: config.reporting,
      phase,
      runId,
      frameworkVersion,
      cwd: config.project_root,
      env,
    });
    if (publishError) {
      output(`[REPORT] ${publishError}`);
      logger.log({ event: "report_publish_error", phase, error: publishError });
    }
  }

  logger.close();
  return { runId, exitCode, state, error: runError, summaryPaths };
}

// =============================================================================
// INTERNALS
// =============================================================================

/**
 * Sends SIGTERM to every running child and records the exits that arrive within the
 * grace period; children that outlive it are left recorded as running (INTERRUPTED).
 */
async function stopRunningTasks(
  state: SchedulerState,
  running: Map<string, RunningTask>,
  recordTransition: (transition: Transition) => void,
): Promise<SchedulerState> {
  if (running.size === 0) return state;

  const entries = [...running.entries()];
  for (const [, entry] of entries) {
    entry.handle.terminate("SIGTERM");
  }

  const settled = await Promise.all(
    entries.map(async ([name, entry]) => {
      const exit = await waitWithTimeout(entry.handle.exited, SHUTDOWN_GRACE_MS);
      if (!exit) {
        entry.handle.terminate("SIGKILL");
        return null;
      }
      const paused = isPauseExit({
        exitCode: exit.exitCode,
        signaled: exit.signaled,
        interactive: entry.interactive,
        pauseMarkerConfigured: entry.paths.pauseMarker !== undefined,
        pauseMarkerPresent: pauseMarkerExists(entry.paths.pauseMarker),
      });
      const taskExit: TaskExit = { task: name, exitCode: exit.exitCode, paused };
      return taskExit;
    }),
  );

  const exits = settled.filter((exit): exit is TaskExit => exit !== null);
  const applied = applyExits(state, exits);
  for (const transition of applied.transitions) {
    recordTransition(transition);
  }
  return applied.state;
}

async function waitWithTimeout(exited: Promise<ChildExit>, ms: number): Promise<ChildExit | null> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<null>((resolve) => {
    timer = setTimeout(() => resolve(null), ms);
  });
  try {
    return await Promise.race([exited.catch(() => null), timeout]);
  } finally {
    if (timer) clearTimeout(timer);
  }
}
