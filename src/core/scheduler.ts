/*
Purpose: pure per-tick scheduling transitions over a phase's task list.
Assumptions: the caller observes child exits and reports them here; nothing in this module touches processes or files.
Usage: let { state, transitions, deadlock } = advance(state, tasks, exits) each tick.
*/

import type { TaskDefinition } from "./task-graph.js";

// =============================================================================
// TYPES
// =============================================================================

export type TaskStatus =
  | { state: "pending" }
  | { state: "running" }
  | { state: "completed"; exitCode: number }
  | { state: "blocked"; deps: string[] }
  | { state: "paused"; exitCode: number };

export type SchedulerState = Readonly<Record<string, TaskStatus>>;

export type TaskExit = {
  task: string;
  exitCode: number;
  paused: boolean;
};

export type Transition =
  | { kind: "start"; task: string }
  | { kind: "block"; task: string; deps: string[] }
  | { kind: "complete"; task: string; exitCode: number }
  | { kind: "pause"; task: string; exitCode: number };

export type AdvanceResult = {
  state: SchedulerState;
  transitions: Transition[];
  // Pending task names when no further progress is possible.
  deadlock?: string[];
};

export const PAUSED_EXIT_CODE = 2;
export const INTERRUPT_EXIT_CODES: readonly number[] = [130, 143];

// =============================================================================
// STATE
// =============================================================================

export function initialState(tasks: TaskDefinition[]): SchedulerState {
  const state: Record<string, TaskStatus> = {};
  for (const task of tasks) {
    state[task.name] = { state: "pending" };
  }
  return state;
}

export function statusOf(state: SchedulerState, name: string): TaskStatus {
  return state[name] ?? { state: "pending" };
}

export function runningTasks(state: SchedulerState, tasks: TaskDefinition[]): string[] {
  return tasks.filter((task) => statusOf(state, task.name).state === "running").map((t) => t.name);
}

export function pendingTasks(state: SchedulerState, tasks: TaskDefinition[]): string[] {
  return tasks.filter((task) => statusOf(state, task.name).state === "pending").map((t) => t.name);
}

export function isFinished(state: SchedulerState, tasks: TaskDefinition[]): boolean {
  return tasks.every((task) => {
    const status = statusOf(state, task.name).state;
    return status !== "pending" && status !== "running";
  });
}

function succeeded(status: TaskStatus): boolean {
  return status.state === "completed" && status.exitCode === 0;
}

function failed(status: TaskStatus): boolean {
  return (
    status.state === "blocked" ||
    status.state === "paused" ||
    (status.state === "completed" && status.exitCode !== 0)
  );
}

// =============================================================================
// EXIT CLASSIFICATION
// =============================================================================

export type ExitObservation = {
  exitCode: number;
  signaled: boolean;
  interactive: boolean;
  pauseMarkerConfigured: boolean;
  pauseMarkerPresent: boolean;
};

/**
 * A child that left a pause marker behind paused. So did one that exited with the
 * paused sentinel or was interrupted while a marker path was configured for it.
 */
export function isPauseExit(obs: ExitObservation): boolean {
  if (obs.interactive && obs.pauseMarkerPresent) return true;
  if (!obs.pauseMarkerConfigured) return false;
  return (
    obs.exitCode === PAUSED_EXIT_CODE ||
    INTERRUPT_EXIT_CODES.includes(obs.exitCode) ||
    obs.signaled
  );
}

// =============================================================================
// TICK
// =============================================================================

/** Records observed exits of running tasks; exits for any other task are ignored. */
export function applyExits(
  prev: SchedulerState,
  exits: TaskExit[],
): { state: SchedulerState; transitions: Transition[] } {
  const state: Record<string, TaskStatus> = { ...prev };
  const transitions: Transition[] = [];

  for (const exit of exits) {
    if (statusOf(state, exit.task).state !== "running") continue;
    if (exit.paused) {
      state[exit.task] = { state: "paused", exitCode: exit.exitCode };
      transitions.push({ kind: "pause", task: exit.task, exitCode: exit.exitCode });
    } else {
      state[exit.task] = { state: "completed", exitCode: exit.exitCode };
      transitions.push({ kind: "complete", task: exit.task, exitCode: exit.exitCode });
    }
  }

  return { state, transitions };
}

/**
 * One scheduling tick. Exits observed since the previous tick are applied first,
 * then pending tasks are visited in input order; a block decided earlier in the
 * same pass is already visible to later tasks.
 */
export function advance(
  prev: SchedulerState,
  tasks: TaskDefinition[],
  exits: TaskExit[],
): AdvanceResult {
  const applied = applyExits(prev, exits);
  const state: Record<string, TaskStatus> = { ...applied.state };
  const transitions: Transition[] = [...applied.transitions];

  for (const task of tasks) {
    if (statusOf(state, task.name).state !== "pending") continue;

    const failedDeps = task.dependsOn.filter((dep) => failed(statusOf(state, dep)));
    if (failedDeps.length > 0) {
      state[task.name] = { state: "blocked", deps: failedDeps };
      transitions.push({ kind: "block", task: task.name, deps: failedDeps });
      continue;
    }

    if (task.dependsOn.every((dep) => succeeded(statusOf(state, dep)))) {
      state[task.name] = { state: "running" };
      transitions.push({ kind: "start", task: task.name });
    }
  }

  if (transitions.length === 0 && runningTasks(state, tasks).length === 0) {
    const pending = pendingTasks(state, tasks);
    if (pending.length > 0) {
      return { state, transitions, deadlock: pending };
    }
  }

  return { state, transitions };
}

// =============================================================================
// OUTCOME
// =============================================================================

export type RunOutcome = {
  completed: Record<string, number>;
  blocked: Record<string, string[]>;
  paused: Record<string, number>;
};

export function collectOutcome(state: SchedulerState, tasks: TaskDefinition[]): RunOutcome {
  const outcome: RunOutcome = { completed: {}, blocked: {}, paused: {} };
  for (const task of tasks) {
    const status = statusOf(state, task.name);
    if (status.state === "completed") outcome.completed[task.name] = status.exitCode;
    if (status.state === "blocked") outcome.blocked[task.name] = status.deps;
    if (status.state === "paused") outcome.paused[task.name] = status.exitCode;
  }
  return outcome;
}

/**
 * 1 for a fatal error or any failed task, 2 when tasks paused and nothing failed,
 * 1 for anything else left unfinished or blocked, otherwise 0.
 */
export function computeExitCode(
  state: SchedulerState,
  tasks: TaskDefinition[],
  runError: string | null,
): number {
  if (runError !== null) return 1;

  const statuses = tasks.map((task) => statusOf(state, task.name));
  if (statuses.some((s) => s.state === "completed" && s.exitCode !== 0)) return 1;
  if (statuses.some((s) => s.state === "paused")) return PAUSED_EXIT_CODE;
  if (statuses.some((s) => s.state !== "completed")) return 1;
  return 0;
}
