import type { RunnerConfig } from "./config.js";
import { ConfigError } from "./errors.js";
import {
  resolveTemplate,
  type CommandPlaceholder,
  type CommandTemplateContext,
  type PathTemplateContext,
} from "./templates.js";
import { isTruthyFlag, quoteShellArg } from "./utils.js";

export const RUNNER_NOOP_ENV = "PHASEGATE_RUNNER_NOOP";
export const NOOP_RUNNER_COMMAND = "cat {prompt} > /dev/null";

const NOOP_RUNNER: RunnerConfig = {
  command: NOOP_RUNNER_COMMAND,
  supports_session_attach: false,
  prompt_mode: "stdin",
};

export function isRunnerNoop(env: NodeJS.ProcessEnv = process.env): boolean {
  return isTruthyFlag(env[RUNNER_NOOP_ENV]);
}

/**
 * Replaces every runner with one that only reads its prompt, keeping the names so
 * task references still resolve.
 */
export function applyRunnerNoop(
  runners: Record<string, RunnerConfig>,
): Record<string, RunnerConfig> {
  return Object.fromEntries(Object.keys(runners).map((name) => [name, { ...NOOP_RUNNER }]));
}

export function resolveRunner(
  runners: Record<string, RunnerConfig>,
  runnerName: string,
  taskName: string,
): RunnerConfig {
  const runner = Object.prototype.hasOwnProperty.call(runners, runnerName)
    ? runners[runnerName]
    : undefined;
  if (!runner) {
    throw new ConfigError(`Runner '${runnerName}' for task '${taskName}' not found in config`);
  }
  return runner;
}

export type BuildRunnerCommandInput = {
  runner: RunnerConfig;
  context: PathTemplateContext;
  promptPath: string;
  resume: boolean;
};

export function usesResumeCommand(runner: RunnerConfig, resume: boolean): boolean {
  return resume && runner.supports_session_attach && runner.resume_command !== undefined;
}

export function buildRunnerCommand(input: BuildRunnerCommandInput): string {
  const { runner, context, promptPath, resume } = input;
  const template =
    usesResumeCommand(runner, resume) && runner.resume_command
      ? runner.resume_command
      : runner.command;

  const values: CommandTemplateContext = { ...context, prompt: quoteShellArg(promptPath) };
  return resolveTemplate<CommandPlaceholder>(template, values);
}
