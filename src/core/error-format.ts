/*
Purpose: turn any thrown value into ordered, labelled lines for CLI and log output.
Assumptions: UserFacingError carries the title/hint/next copy; everything else gets a generic title.
Usage: formatErrorLines(err, { mode: "debug" }), createAnsiFormatter(useColor).
*/

import { PreflightError, UserFacingError, resolveUserFacingErrorCode } from "./errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type ErrorFormatMode = "short" | "debug";

export type ErrorFormatLineKind =
  | "title"
  | "message"
  | "problem"
  | "hint"
  | "next"
  | "code"
  | "name"
  | "cause"
  | "stack";

export type ErrorFormatLine = {
  kind: ErrorFormatLineKind;
  text: string;
};

export type AnsiStyle = "red" | "yellow" | "cyan" | "bold" | "dim";

export type AnsiFormatter = (text: string, styles: AnsiStyle[]) => string;

const GENERIC_TITLE = "Command failed.";

const ANSI_CODES: Record<AnsiStyle, [number, number]> = {
  red: [31, 39],
  yellow: [33, 39],
  cyan: [36, 39],
  bold: [1, 22],
  dim: [2, 22],
};

// =============================================================================
// MESSAGES
// =============================================================================

export function formatErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

export function formatErrorLines(
  error: unknown,
  options: { mode: ErrorFormatMode },
): ErrorFormatLine[] {
  const lines: ErrorFormatLine[] = [];

  const preflight = findPreflightError(error);
  const pushMessage = (message: string): void => {
    if (!preflight) {
      lines.push({ kind: "message", text: message });
      return;
    }
    // One line per problem instead of the joined message.
    const count = preflight.problems.length;
    lines.push({ kind: "message", text: `${count} problem${count === 1 ? "" : "s"} found:` });
    for (const problem of preflight.problems) lines.push({ kind: "problem", text: problem });
  };

  if (error instanceof UserFacingError) {
    lines.push({ kind: "title", text: error.title });
    pushMessage(error.message);
    if (error.hint) lines.push({ kind: "hint", text: error.hint });
    if (error.next) lines.push({ kind: "next", text: error.next });
  } else {
    lines.push({ kind: "title", text: GENERIC_TITLE });
    pushMessage(formatErrorMessage(error));
  }

  if (options.mode === "short") {
    return lines;
  }

  lines.push({ kind: "code", text: resolveUserFacingErrorCode(error) });
  if (error instanceof Error) {
    lines.push({ kind: "name", text: error.name });
  }

  const cause = resolveCause(error);
  if (cause !== undefined) {
    lines.push({ kind: "cause", text: formatErrorMessage(cause) });
  }

  if (error instanceof Error && error.stack) {
    lines.push({ kind: "stack", text: error.stack });
  }

  return lines;
}

// =============================================================================
// COLOR
// =============================================================================

export function resolveColorEnabled(options: {
  stream?: { isTTY?: boolean };
  useColor?: boolean;
}): boolean {
  if (!options.stream?.isTTY) return false;
  if (options.useColor !== undefined) return options.useColor;
  if (process.env.NO_COLOR !== undefined) return false;
  return true;
}

export function createAnsiFormatter(useColor: boolean): AnsiFormatter {
  if (!useColor) {
    return (text) => text;
  }

  return (text, styles) =>
    styles.reduce((acc, style) => {
      const [open, close] = ANSI_CODES[style];
      return `\x1b[${open}m${acc}\x1b[${close}m`;
    }, text);
}

// =============================================================================
// INTERNALS
// =============================================================================

function resolveCause(error: unknown): unknown {
  if (!error || typeof error !== "object" || !("cause" in error)) {
    return undefined;
  }

  return error.cause ?? undefined;
}

function findPreflightError(error: unknown): PreflightError | null {
  if (error instanceof PreflightError) return error;
  const cause = resolveCause(error);
  return cause instanceof PreflightError ? cause : null;
}
