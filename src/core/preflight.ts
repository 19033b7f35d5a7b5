/*
Purpose: collect every environment problem for a phase before anything runs.
Assumptions: tasks are already normalized and selected for the phase.
Usage: await runPreflight({ ... }) throws one PreflightError listing all problems.
*/

import fs from "node:fs";
import path from "node:path";

import { isInsideWorkTree } from "../git/git.js";

import type { ReportingConfig, RunnerConfig } from "./config.js";
import { formatErrorMessage } from "./error-format.js";
import { PreflightError } from "./errors.js";
import { findOnPath, firstShellWord, type PathLookupDeps } from "./platform.js";
import {
  resolveTaskPaths,
  taskTemplateContext,
  type Phase,
  type ResolvedTaskPaths,
  type TaskDefinition,
} from "./task-graph.js";
import { COMMAND_PLACEHOLDERS, REPORT_PLACEHOLDERS, findUnknownPlaceholders } from "./templates.js";
import { checkExistingWorkspace, describeWorkspaceProblem } from "./workspaces.js";

export const PREFLIGHT_RUN_ID = "preflight";

// Shell interpreters are assumed present; their scripts are checked at run time.
const SHELL_PROGRAMS = new Set(["bash", "sh", "zsh"]);

export type PreflightInput = {
  projectRoot: string;
  logsDir: string;
  phase: Phase;
  runners: Record<string, RunnerConfig>;
  tasks: TaskDefinition[];
  hasTerminal: boolean;
  reporting?: ReportingConfig;
  pathLookup?: PathLookupDeps;
};

export async function runPreflight(input: PreflightInput): Promise<void> {
  const problems = await collectPreflightProblems(input);
  if (problems.length > 0) {
    throw new PreflightError(problems);
  }
}

export async function collectPreflightProblems(input: PreflightInput): Promise<string[]> {
  const problems: string[] = [];
  const lookup = input.pathLookup ?? {};

  const gitPresent = findOnPath("git", lookup) !== null;
  if (!gitPresent) {
    problems.push("git is not available on PATH");
  }

  let repoUsable = false;
  if (!fs.existsSync(input.projectRoot)) {
    problems.push(`project_root does not exist: ${input.projectRoot}`);
  } else if (gitPresent) {
    repoUsable = await isInsideWorkTree(input.projectRoot);
    if (!repoUsable) {
      problems.push(`project_root is not a git repository: ${input.projectRoot}`);
    }
  }

  const logsProblem = checkLogsDirWritable(input.logsDir);
  if (logsProblem) problems.push(logsProblem);

  problems.push(...checkRunners(input.runners, input.tasks, lookup));
  if (input.reporting?.command) {
    const problem = placeholderProblem("reporting.command", input.reporting.command, REPORT_PLACEHOLDERS);
    if (problem) problems.push(problem);
  }

  const resolved = input.tasks.map((task) => ({
    task,
    paths: resolveTaskPaths(task, taskTemplateContext(task, PREFLIGHT_RUN_ID, input.phase), {
      projectRoot: input.projectRoot,
      logsDir: input.logsDir,
    }),
  }));

  problems.push(...checkCollisions(resolved));

  for (const { task, paths } of resolved) {
    problems.push(...checkTaskFiles(task, paths));
    if (repoUsable) {
      const worktreeProblem = await checkExistingWorktree(paths.worktree, input.projectRoot);
      if (worktreeProblem) problems.push(worktreeProblem);
    }
    if (task.interactive && !input.hasTerminal) {
      problems.push(
        `Task '${task.name}' is interactive but no terminal is attached (stdin and stdout must be a TTY)`,
      );
    }
  }

  return problems;
}

// =============================================================================
// CHECKS
// =============================================================================

function checkLogsDirWritable(logsDir: string): string | null {
  try {
    fs.mkdirSync(logsDir, { recursive: true });
    const marker = path.join(logsDir, ".write_check");
    fs.writeFileSync(marker, "ok", "utf8");
    fs.rmSync(marker, { force: true });
    return null;
  } catch (err) {
    return `logs_dir is not writable: ${logsDir} (${formatErrorMessage(err)})`;
  }
}

function checkRunners(
  runners: Record<string, RunnerConfig>,
  tasks: TaskDefinition[],
  lookup: PathLookupDeps,
): string[] {
  const problems: string[] = [];
  const checked = new Set<string>();

  for (const task of tasks) {
    if (checked.has(task.runner)) continue;
    checked.add(task.runner);

    const runner = Object.prototype.hasOwnProperty.call(runners, task.runner)
      ? runners[task.runner]
      : undefined;
    if (!runner) {
      problems.push(`Runner '${task.runner}' for task '${task.name}' not found in config`);
      continue;
    }

    const templates = [
      { label: `Runner '${task.runner}' command`, template: runner.command },
      { label: `Runner '${task.runner}' resume_command`, template: runner.resume_command },
    ];
    for (const { label, template } of templates) {
      const problem = template ? placeholderProblem(label, template, COMMAND_PLACEHOLDERS) : null;
      if (problem) problems.push(problem);
    }

    const program = firstShellWord(runner.command);
    if (!program) {
      problems.push(`Runner '${task.runner}' command cannot be parsed: ${runner.command}`);
      continue;
    }
    if (SHELL_PROGRAMS.has(program) || program.includes("{")) continue;
    if (findOnPath(program, lookup) === null) {
      problems.push(`Runner '${task.runner}' binary not found on PATH: ${program}`);
    }
  }

  return problems;
}

type ResolvedTask = {
  task: TaskDefinition;
  paths: ResolvedTaskPaths;
};

function checkCollisions(resolved: ResolvedTask[]): string[] {
  const problems: string[] = [];
  const kinds: Array<{ label: string; pick: (paths: ResolvedTaskPaths) => string }> = [
    { label: "Worktree path", pick: (paths) => paths.worktree },
    { label: "Branch", pick: (paths) => paths.branch },
    { label: "Log path", pick: (paths) => paths.log },
  ];

  for (const kind of kinds) {
    const owners = new Map<string, string>();
    for (const { task, paths } of resolved) {
      const value = kind.pick(paths);
      const owner = owners.get(value);
      if (owner !== undefined) {
        problems.push(`${kind.label} collision: '${owner}' and '${task.name}' both use ${value}`);
      } else {
        owners.set(value, task.name);
      }
    }
  }

  return problems;
}

function checkTaskFiles(task: TaskDefinition, paths: ResolvedTaskPaths): string[] {
  const problems: string[] = [];

  const promptStat = statOrNull(paths.prompt);
  if (!promptStat) {
    problems.push(`Prompt file not found: ${paths.prompt}`);
  } else if (promptStat.isDirectory()) {
    problems.push(`Prompt path is a directory: ${paths.prompt}`);
  }

  if (statOrNull(paths.log)?.isDirectory()) {
    problems.push(`Log path is a directory: ${paths.log}`);
  }

  if (paths.pauseMarker && statOrNull(paths.pauseMarker)?.isDirectory()) {
    problems.push(`Task '${task.name}': pause marker path is a directory: ${paths.pauseMarker}`);
  }

  return problems;
}

async function checkExistingWorktree(worktree: string, projectRoot: string): Promise<string | null> {
  if (!fs.existsSync(worktree)) return null;
  const check = await checkExistingWorkspace(worktree, projectRoot);
  return check === "ok" ? null : describeWorkspaceProblem(check, worktree, projectRoot);
}

function placeholderProblem(
  label: string,
  template: string,
  allowed: readonly string[],
): string | null {
  const unknown = findUnknownPlaceholders(template, allowed);
  if (unknown.length === 0) return null;
  const names = (keys: readonly string[]) => keys.map((key) => `{${key}}`).join(", ");
  return `${label} uses unknown placeholder ${names(unknown)} (allowed: ${names(allowed)})`;
}

function statOrNull(filePath: string): fs.Stats | null {
  try {
    return fs.statSync(filePath);
  } catch {
    return null;
  }
}
