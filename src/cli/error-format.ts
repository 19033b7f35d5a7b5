/*
Purpose: turn scheduler failures into the operator-facing error block printed by the phasegate CLI.
Assumptions: stderr is the default stream; non-TTY output disables color.
Usage: console.error(renderCliError(err, { debug })); throw toUserFacingError(err, { title: "Run failed." });
*/

import { CommanderError } from "commander";

import {
  createAnsiFormatter,
  formatErrorLines,
  formatErrorMessage,
  resolveColorEnabled,
  type AnsiFormatter,
  type ErrorFormatLine,
} from "../core/error-format.js";
import {
  ConfigError,
  DeadlockError,
  GitError,
  PreflightError,
  RunLockError,
  UserFacingError,
  WorkspaceError,
  resolveUserFacingErrorCode,
} from "../core/errors.js";

export type CliErrorFormatOptions = {
  debug?: boolean;
  useColor?: boolean;
  stream?: { isTTY?: boolean };
};

type ErrorCopy = { title: string; hint?: string };

// =============================================================================
// ERROR COPY
// =============================================================================

function copyFor(error: unknown): ErrorCopy {
  if (error instanceof PreflightError) {
    return {
      title: "Preflight failed.",
      hint: "Fix the problems listed above and re-run; nothing was started.",
    };
  }
  if (error instanceof RunLockError) {
    return {
      title: "Another run is active.",
      hint: "Wait for it to finish, or delete the lock file if its process is gone.",
    };
  }
  if (error instanceof DeadlockError) {
    return {
      title: "Tasks cannot be scheduled.",
      hint: `Check depends_on for cycles between: ${error.pendingTasks.join(", ")}.`,
    };
  }
  if (error instanceof ConfigError) {
    return { title: "Invalid configuration.", hint: "Fix phasegate.yaml (or --config) and re-run." };
  }
  if (error instanceof WorkspaceError) {
    return {
      title: "Worktree problem.",
      hint: "Remove the path or point the task's worktree at a fresh location.",
    };
  }
  if (error instanceof CommanderError) {
    return { title: "Invalid arguments.", hint: "Run phasegate --help for usage." };
  }
  if (error instanceof GitError) {
    return { title: "git command failed." };
  }
  return { title: "Command failed." };
}

/**
 * Wraps scheduler errors with the CLI's title and hint. `title` replaces the
 * per-error title, for commands that name the step that failed.
 */
export function toUserFacingError(
  error: unknown,
  overrides: { title?: string } = {},
): UserFacingError {
  if (error instanceof UserFacingError) return error;

  const copy = copyFor(error);
  return new UserFacingError({
    code: resolveUserFacingErrorCode(error),
    title: overrides.title ?? copy.title,
    message: formatErrorMessage(error),
    hint: copy.hint,
    cause: error,
  });
}

// =============================================================================
// RENDERING
// =============================================================================

export function renderCliError(error: unknown, options: CliErrorFormatOptions = {}): string {
  const mode = options.debug ? "debug" : "short";
  let lines = formatErrorLines(error, { mode });
  if (!(error instanceof UserFacingError)) {
    // Debug details still describe the original error; only the copy changes.
    lines = applyCopy(lines, copyFor(error));
  }

  const stream = options.stream ?? process.stderr;
  const format = createAnsiFormatter(resolveColorEnabled({ stream, useColor: options.useColor }));
  return lines.map((line) => renderLine(line, format)).join("\n");
}

function applyCopy(lines: ErrorFormatLine[], copy: ErrorCopy): ErrorFormatLine[] {
  const body = lines.filter((line) => line.kind === "message" || line.kind === "problem");
  const details = lines.filter(
    (line) => line.kind !== "title" && line.kind !== "message" && line.kind !== "problem",
  );
  const hint: ErrorFormatLine[] = copy.hint ? [{ kind: "hint", text: copy.hint }] : [];
  return [{ kind: "title", text: copy.title }, ...body, ...hint, ...details];
}

function renderLine(line: ErrorFormatLine, format: AnsiFormatter): string {
  switch (line.kind) {
    case "title":
      return `${format("Error:", ["red", "bold"])} ${format(line.text, ["bold"])}`;
    case "message":
      return line.text;
    case "problem":
      return `  ${format("-", ["red"])} ${line.text}`;
    case "hint":
      return `${format("Hint:", ["yellow"])} ${line.text}`;
    case "next":
      return `${format("Next:", ["cyan"])} ${line.text}`;
    case "stack":
      return `${format("Stack:", ["dim"])}\n${format(line.text.replace(/^/gm, "  "), ["dim"])}`;
    default:
      return format(`${line.kind[0].toUpperCase()}${line.kind.slice(1)}: ${line.text}`, ["dim"]);
  }
}
