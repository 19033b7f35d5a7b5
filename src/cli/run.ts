import type { ProjectConfig } from "../core/config.js";
import { runPhase } from "../core/executor.js";
import type { Phase } from "../core/task-graph.js";

import { toUserFacingError } from "./error-format.js";

export type RunCommandOptions = {
  phase: Phase;
  dryRun: boolean;
  includeManual: boolean;
  runId?: string;
};

const RUN_COMMAND_FAILURE_TITLE = "Run failed.";

/** Runs one phase; resolves to the process exit code (0, 1 or 2). */
export async function runCommand(config: ProjectConfig, opts: RunCommandOptions): Promise<number> {
  try {
    const result = await runPhase({
      config,
      phase: opts.phase,
      dryRun: opts.dryRun,
      includeManual: opts.includeManual,
      runId: opts.runId,
    });
    return result.exitCode;
  } catch (error) {
    throw toUserFacingError(error, { title: RUN_COMMAND_FAILURE_TITLE });
  }
}
