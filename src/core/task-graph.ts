/*
Purpose: validate raw task definitions into an ordered task list and select a phase's subset.
Assumptions: input order is the scheduling tie-break, so nothing here sorts.
Usage: selectTasks(normalizeTasks(config.tasks), "main", false).
*/

import path from "node:path";

import { ConfigError } from "./errors.js";
import {
  PATH_PLACEHOLDERS,
  findUnknownPlaceholders,
  resolvePathTemplate,
  type PathTemplateContext,
} from "./templates.js";

// =============================================================================
// TYPES
// =============================================================================

export const PHASES = ["discovery", "main", "post", "legacy"] as const;
export type Phase = (typeof PHASES)[number];

export const DEFAULT_RUNNER = "codex";
export const DEFAULT_BRANCH_TEMPLATE = "task/{task}";

export type TaskDefinition = {
  name: string;
  dependsOn: string[];
  phase: Phase;
  manual: boolean;
  interactive: boolean;
  runner: string;
  worktree: string;
  branch: string;
  prompt: string;
  log?: string;
  pauseMarker?: string;
};

const REQUIRED_FIELDS = ["worktree", "prompt"] as const;

// =============================================================================
// NORMALIZE
// =============================================================================

export function isPhase(value: unknown): value is Phase {
  return typeof value === "string" && (PHASES as readonly string[]).includes(value);
}

export function normalizeTasks(rawTasks: unknown): TaskDefinition[] {
  if (!Array.isArray(rawTasks)) {
    throw new ConfigError("Config 'tasks' must be a list");
  }

  const seen = new Set<string>();
  const ordered: TaskDefinition[] = [];

  for (const entry of rawTasks) {
    const task = normalizeTask(entry, seen);
    seen.add(task.name);
    ordered.push(task);
  }

  for (const task of ordered) {
    for (const dep of task.dependsOn) {
      if (!seen.has(dep)) {
        throw new ConfigError(`Task '${task.name}' depends on unknown task '${dep}'`);
      }
    }
  }

  return ordered;
}

function normalizeTask(entry: unknown, seen: Set<string>): TaskDefinition {
  if (!isRecord(entry)) {
    throw new ConfigError("Each task must be a mapping");
  }

  const name = entry.name;
  if (typeof name !== "string" || name.trim().length === 0) {
    throw new ConfigError("Each task must have a non-empty 'name'");
  }
  if (seen.has(name)) {
    throw new ConfigError(`Duplicate task name: ${name}`);
  }

  for (const field of REQUIRED_FIELDS) {
    if (!(field in entry)) {
      throw new ConfigError(`Task '${name}' missing required field '${field}'`);
    }
  }

  const dependsOn = entry.depends_on ?? [];
  if (!Array.isArray(dependsOn)) {
    throw new ConfigError(`Task '${name}': 'depends_on' must be a list`);
  }
  const deps = dependsOn.map((dep) => {
    if (typeof dep !== "string") {
      throw new ConfigError(`Task '${name}': 'depends_on' entries must be task names`);
    }
    return dep;
  });

  const phase = entry.phase ?? "main";
  if (!isPhase(phase)) {
    throw new ConfigError(`Task '${name}': invalid phase '${String(phase)}'`);
  }

  return {
    name,
    dependsOn: deps,
    phase,
    manual: readBoolean(entry, "manual", name),
    interactive: readBoolean(entry, "interactive", name),
    runner: readOptionalString(entry, "runner", name) ?? DEFAULT_RUNNER,
    worktree: readRequiredString(entry, "worktree", name),
    branch: readOptionalString(entry, "branch", name) ?? DEFAULT_BRANCH_TEMPLATE,
    prompt: readRequiredString(entry, "prompt", name),
    log: readOptionalString(entry, "log", name),
    pauseMarker: readOptionalString(entry, "pause_marker", name),
  };
}

// =============================================================================
// SELECT
// =============================================================================

export function selectTasks(
  tasks: TaskDefinition[],
  phase: Phase,
  includeManual: boolean,
): TaskDefinition[] {
  const selected = tasks.filter(
    (task) => task.phase === phase && (includeManual || !task.manual),
  );
  const selectedNames = new Set(selected.map((task) => task.name));

  for (const task of selected) {
    const missing = task.dependsOn.filter((dep) => !selectedNames.has(dep));
    if (missing.length > 0) {
      throw new ConfigError(
        `Task '${task.name}' depends on excluded tasks: ${missing.join(", ")}`,
      );
    }
    assertTaskTemplates(task);
  }

  return selected;
}

export function assertTaskTemplates(task: TaskDefinition): void {
  const templates: Array<[string, string | undefined]> = [
    ["worktree", task.worktree],
    ["branch", task.branch],
    ["log", task.log],
    ["pause_marker", task.pauseMarker],
  ];

  for (const [field, template] of templates) {
    if (template === undefined) continue;
    const unknown = findUnknownPlaceholders(template, PATH_PLACEHOLDERS);
    if (unknown.length > 0) {
      throw new ConfigError(
        `Task '${task.name}': '${field}' uses unknown placeholder {${unknown[0]}}`,
      );
    }
  }
}

// =============================================================================
// PATH RESOLUTION
// =============================================================================

export type ResolvedTaskPaths = {
  worktree: string;
  branch: string;
  prompt: string;
  log: string;
  // Undefined for batch tasks without an explicit pause_marker.
  pauseMarker?: string;
};

export type TaskPathRoots = {
  projectRoot: string;
  logsDir: string;
};

export function taskTemplateContext(
  task: TaskDefinition,
  runId: string,
  phase: Phase,
): PathTemplateContext {
  return { run_id: runId, phase, task: task.name };
}

export function resolveTaskPaths(
  task: TaskDefinition,
  context: PathTemplateContext,
  roots: TaskPathRoots,
): ResolvedTaskPaths {
  const resolve = (value: string): string => path.resolve(roots.projectRoot, value);

  const pauseMarker = task.pauseMarker
    ? resolve(resolvePathTemplate(task.pauseMarker, context))
    : task.interactive
      ? path.join(roots.logsDir, `${task.name}.paused`)
      : undefined;

  return {
    worktree: resolve(resolvePathTemplate(task.worktree, context)),
    branch: resolvePathTemplate(task.branch, context),
    prompt: resolve(task.prompt),
    log: task.log
      ? resolve(resolvePathTemplate(task.log, context))
      : path.join(roots.logsDir, `${task.name}.log`),
    pauseMarker,
  };
}

// =============================================================================
// INTERNALS
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readBoolean(entry: Record<string, unknown>, field: string, name: string): boolean {
  const value = entry[field] ?? false;
  if (typeof value !== "boolean") {
    throw new ConfigError(`Task '${name}': '${field}' must be boolean`);
  }
  return value;
}

function readRequiredString(entry: Record<string, unknown>, field: string, name: string): string {
  const value = entry[field];
  if (typeof value !== "string" || value.length === 0) {
    throw new ConfigError(`Task '${name}': '${field}' must be a non-empty string`);
  }
  return value;
}

function readOptionalString(
  entry: Record<string, unknown>,
  field: string,
  name: string,
): string | undefined {
  const value = entry[field];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "string" || value.length === 0) {
    throw new ConfigError(`Task '${name}': '${field}' must be a non-empty string`);
  }
  return value;
}
