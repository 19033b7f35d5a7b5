import { execa } from "execa";

import type { ReportingConfig } from "./config.js";
import { formatErrorMessage } from "./error-format.js";
import { isPhase, type Phase } from "./task-graph.js";
import { resolveTemplate, type ReportPlaceholder } from "./templates.js";
import { isTruthyFlag, quoteShellArg } from "./utils.js";

export const REPORTING_ENABLED_ENV = "PHASEGATE_REPORTING_ENABLED";
export const REPORTING_PHASES_ENV = "PHASEGATE_REPORTING_PHASES";

export type ReportHookInput = {
  reporting: ReportingConfig;
  phase: Phase;
  runId: string;
  frameworkVersion: string;
  cwd: string;
  env?: NodeJS.ProcessEnv;
};

export function parsePhaseList(value: string | undefined, fallback: Phase[]): Phase[] {
  if (value === undefined || value.trim() === "") return fallback;
  return value
    .split(",")
    .map((item) => item.trim())
    .filter(isPhase);
}

export function reportingApplies(input: ReportHookInput): boolean {
  const env = input.env ?? process.env;
  const enabled = isTruthyFlag(env[REPORTING_ENABLED_ENV], input.reporting.enabled);
  if (!enabled) return false;
  const phases = parsePhaseList(env[REPORTING_PHASES_ENV], input.reporting.phases);
  return phases.includes(input.phase);
}

export function buildReportCommand(template: string, input: ReportHookInput): string {
  const values: Record<ReportPlaceholder, string> = {
    run_id: quoteShellArg(input.runId),
    phase: quoteShellArg(input.phase),
    framework_version: quoteShellArg(input.frameworkVersion),
    flags: input.reporting.flags.map(quoteShellArg).join(" "),
  };
  return resolveTemplate<ReportPlaceholder>(template, values);
}

/**
 * Runs the configured publish command. Resolves to an error message on failure and
 * null on success or when reporting does not apply to this phase.
 */
export async function publishReport(input: ReportHookInput): Promise<string | null> {
  if (!reportingApplies(input)) return null;

  const template = input.reporting.command;
  if (!template) {
    return "reporting.command is required when reporting is enabled";
  }

  try {
    const command = buildReportCommand(template, input);
    const res = await execa(command, {
      shell: true,
      cwd: input.cwd,
      env: input.env ?? process.env,
      stdio: "pipe",
      reject: false,
    });
    if (res.exitCode === 0) return null;

    const stderr = String(res.stderr ?? "").trim();
    const stdout = String(res.stdout ?? "").trim();
    return stderr || stdout || `report command exited with code ${res.exitCode ?? -1}`;
  } catch (err) {
    return formatErrorMessage(err);
  }
}
