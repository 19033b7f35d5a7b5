export class OrchestratorError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = "OrchestratorError";
  }
}

export class ConfigError extends OrchestratorError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ConfigError";
  }
}

export class PreflightError extends OrchestratorError {
  constructor(public readonly problems: string[], cause?: unknown) {
    super(`Preflight failed:\n- ${problems.join("\n- ")}`, cause);
    this.name = "PreflightError";
  }
}

export class WorkspaceError extends OrchestratorError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "WorkspaceError";
  }
}

export class TaskError extends OrchestratorError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "TaskError";
  }
}

export class DeadlockError extends OrchestratorError {
  constructor(public readonly pendingTasks: string[]) {
    super(
      `No runnable tasks remaining. Check for cyclic dependencies: ${pendingTasks.join(", ")}`,
    );
    this.name = "DeadlockError";
  }
}

export class RunLockError extends OrchestratorError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "RunLockError";
  }
}

export class GitError extends OrchestratorError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "GitError";
  }
}

// =============================================================================
// USER-FACING ERRORS
// =============================================================================

export const USER_FACING_ERROR_CODES = {
  config: "CONFIG_ERROR",
  preflight: "PREFLIGHT_ERROR",
  lock: "LOCK_ERROR",
  workspace: "WORKSPACE_ERROR",
  git: "GIT_ERROR",
  task: "TASK_ERROR",
  unknown: "UNKNOWN_ERROR",
} as const;

export type UserFacingErrorCode =
  (typeof USER_FACING_ERROR_CODES)[keyof typeof USER_FACING_ERROR_CODES];

export type UserFacingErrorInput = {
  code: UserFacingErrorCode;
  title: string;
  message: string;
  hint?: string;
  next?: string;
  cause?: unknown;
  exitCode?: number;
};

export class UserFacingError extends Error {
  readonly code: UserFacingErrorCode;
  readonly title: string;
  readonly hint?: string;
  readonly next?: string;
  readonly cause?: unknown;
  readonly exitCode?: number;

  constructor(input: UserFacingErrorInput) {
    super(input.message);
    this.name = "UserFacingError";
    this.code = input.code;
    this.title = input.title;
    this.hint = input.hint;
    this.next = input.next;
    this.cause = input.cause;
    this.exitCode = input.exitCode;
  }
}

export function resolveUserFacingErrorCode(error: unknown): UserFacingErrorCode {
  if (error instanceof UserFacingError) return error.code;
  if (error instanceof ConfigError) return USER_FACING_ERROR_CODES.config;
  if (error instanceof PreflightError) return USER_FACING_ERROR_CODES.preflight;
  if (error instanceof RunLockError) return USER_FACING_ERROR_CODES.lock;
  if (error instanceof WorkspaceError) return USER_FACING_ERROR_CODES.workspace;
  if (error instanceof GitError) return USER_FACING_ERROR_CODES.git;
  if (error instanceof TaskError || error instanceof DeadlockError) {
    return USER_FACING_ERROR_CODES.task;
  }

  return USER_FACING_ERROR_CODES.unknown;
}
