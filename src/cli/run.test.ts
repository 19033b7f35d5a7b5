import { afterEach, describe, expect, it, vi } from "vitest";

import { ProjectConfigSchema, type ProjectConfig } from "../core/config.js";
import {
  DeadlockError,
  PreflightError,
  RunLockError,
  USER_FACING_ERROR_CODES,
  UserFacingError,
} from "../core/errors.js";

import { runCommand } from "./run.js";

const runPhaseMock = vi.hoisted(() => vi.fn());

vi.mock("../core/executor.js", () => ({
  runPhase: (...args: unknown[]) => runPhaseMock(...args),
}));

const config: ProjectConfig = { ...ProjectConfigSchema.parse({}), config_path: "phasegate.yaml" };
const options = { phase: "main", dryRun: false, includeManual: false } as const;

async function captureError(): Promise<UserFacingError> {
  const error = await runCommand(config, options).then(
    () => undefined,
    (err: unknown) => err,
  );
  if (!(error instanceof UserFacingError)) {
    throw new Error("Expected a UserFacingError");
  }
  return error;
}

describe("runCommand", () => {
  afterEach(() => {
    runPhaseMock.mockReset();
  });

  it("returns the phase exit code", async () => {
    runPhaseMock.mockResolvedValue({ exitCode: 2 });

    await expect(runCommand(config, { ...options, runId: "r1" })).resolves.toBe(2);
    expect(runPhaseMock).toHaveBeenCalledWith({
      config,
      phase: "main",
      dryRun: false,
      includeManual: false,
      runId: "r1",
    });
  });

  it("wraps preflight failures with a hint", async () => {
    runPhaseMock.mockRejectedValue(new PreflightError(["Prompt not found: prompts/a.md"]));

    const error = await captureError();

    expect(error.code).toBe(USER_FACING_ERROR_CODES.preflight);
    expect(error.title).toBe("Run failed.");
    expect(error.message).toBe("Preflight failed:\n- Prompt not found: prompts/a.md");
    expect(error.hint).toBe("Fix the problems listed above and re-run; nothing was started.");
  });

  it("wraps lock and deadlock failures", async () => {
    runPhaseMock.mockRejectedValueOnce(new RunLockError("Run lock held by pid 7"));
    const lockError = await captureError();
    expect(lockError.code).toBe(USER_FACING_ERROR_CODES.lock);
    expect(lockError.hint).toBe(
      "Wait for it to finish, or delete the lock file if its process is gone.",
    );

    runPhaseMock.mockRejectedValueOnce(new DeadlockError(["a", "b"]));
    const deadlock = await captureError();
    expect(deadlock.code).toBe(USER_FACING_ERROR_CODES.task);
    expect(deadlock.hint).toBe("Check depends_on for cycles between: a, b.");
  });

  it("passes user-facing errors through unchanged", async () => {
    const original = new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Config error",
      message: "bad",
    });
    runPhaseMock.mockRejectedValue(original);

    await expect(captureError()).resolves.toBe(original);
  });
});
