import { describe, expect, it } from "vitest";

import { ConfigError, DeadlockError, PreflightError } from "./errors.js";
import { createAnsiFormatter, formatErrorLines, resolveColorEnabled } from "./error-format.js";

describe("formatErrorLines", () => {
  it("gives plain errors a generic title in short mode", () => {
    const lines = formatErrorLines(new Error("boom"), { mode: "short" });

    expect(lines).toEqual([
      { kind: "title", text: "Command failed." },
      { kind: "message", text: "boom" },
    ]);
  });

  it("maps domain errors to codes in debug mode", () => {
    const error = new ConfigError("bad config", new Error("yaml parse"));
    error.stack = "ConfigError: bad config";

    const lines = formatErrorLines(error, { mode: "debug" });

    expect(lines.map((line) => line.kind)).toEqual([
      "title",
      "message",
      "code",
      "name",
      "cause",
      "stack",
    ]);
    expect(lines[2]).toEqual({ kind: "code", text: "CONFIG_ERROR" });
    expect(lines[4]).toEqual({ kind: "cause", text: "yaml parse" });
  });

  it("lists every preflight problem in the message", () => {
    const error = new PreflightError(["git is not available on PATH", "Prompt file not found: p.md"]);

    expect(error.message).toBe(
      "Preflight failed:\n- git is not available on PATH\n- Prompt file not found: p.md",
    );
  });

  it("splits preflight problems into one line each", () => {
    const error = new PreflightError(["git is not available on PATH", "Prompt file not found: p.md"]);

    expect(formatErrorLines(error, { mode: "short" })).toEqual([
      { kind: "title", text: "Command failed." },
      { kind: "message", text: "2 problems found:" },
      { kind: "problem", text: "git is not available on PATH" },
      { kind: "problem", text: "Prompt file not found: p.md" },
    ]);
  });

  it("names pending tasks in deadlock errors", () => {
    const error = new DeadlockError(["b", "c"]);

    expect(error.message).toBe(
      "No runnable tasks remaining. Check for cyclic dependencies: b, c",
    );
    expect(formatErrorLines(error, { mode: "debug" })[2]).toEqual({
      kind: "code",
      text: "TASK_ERROR",
    });
  });
});

describe("color helpers", () => {
  it("never colors non-TTY streams", () => {
    expect(resolveColorEnabled({ stream: { isTTY: false }, useColor: true })).toBe(false);
  });

  it("wraps text in ANSI codes when enabled", () => {
    const format = createAnsiFormatter(true);

    expect(format("x", ["red"])).toBe("\x1b[31mx\x1b[39m");
    expect(createAnsiFormatter(false)("x", ["red", "bold"])).toBe("x");
  });
});
