import path from "node:path";

import { statusOf, type SchedulerState, type TaskStatus } from "./scheduler.js";
import type { Phase, TaskDefinition } from "./task-graph.js";
import { writeTextFile } from "./utils.js";

export const SUMMARY_DIR = "summaries";
export const LATEST_SUMMARY_FILE = "run-summary.md";

export type RunSummaryInput = {
  runId: string;
  phase: Phase;
  startedAt: string;
  finishedAt: string;
  frameworkVersion: string;
  error: string | null;
  tasks: TaskDefinition[];
  state: SchedulerState;
};

export type RunSummaryPaths = {
  latest: string;
  history: string;
};

export function summaryPaths(logsDir: string, phase: Phase, runId: string): RunSummaryPaths {
  const dir = path.join(logsDir, SUMMARY_DIR);
  return {
    latest: path.join(dir, LATEST_SUMMARY_FILE),
    history: path.join(dir, `run-summary-${phase}-${runId}.md`),
  };
}

export function formatTaskStatus(status: TaskStatus): string {
  switch (status.state) {
    case "completed":
      return status.exitCode === 0 ? "OK" : `FAIL (${status.exitCode})`;
    case "blocked":
      return `BLOCKED (deps: ${status.deps.join(", ")})`;
    case "paused":
      return "PAUSED";
    case "running":
      return "INTERRUPTED";
    case "pending":
      return "NOT STARTED";
  }
}

export function renderRunSummary(input: RunSummaryInput): string {
  const lines = [
    "# Run Summary",
    "",
    `- Run ID: ${input.runId}`,
    `- Phase: ${input.phase}`,
    `- Started: ${input.startedAt}`,
    `- Finished: ${input.finishedAt}`,
    `- Framework version: ${input.frameworkVersion}`,
    "",
  ];

  if (input.error) {
    lines.push(`- Error: ${input.error}`, "");
  }

  for (const task of input.tasks) {
    lines.push(`- ${task.name}: ${formatTaskStatus(statusOf(input.state, task.name))}`);
  }

  return `${lines.join("\n")}\n`;
}

export async function writeRunSummary(
  logsDir: string,
  input: RunSummaryInput,
): Promise<RunSummaryPaths> {
  const paths = summaryPaths(logsDir, input.phase, input.runId);
  const content = renderRunSummary(input);
  await writeTextFile(paths.latest, content);
  await writeTextFile(paths.history, content);
  return paths;
}
