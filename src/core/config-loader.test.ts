import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { describe, expect, it } from "vitest";

import { discoverConfigPath, loadProjectConfig } from "./config-loader.js";
import { ConfigError, UserFacingError } from "./errors.js";

function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), "config-loader-"));
}

function writeConfig(dir: string, name: string, content: string): string {
  const configPath = path.join(dir, name);
  fs.writeFileSync(configPath, content, "utf8");
  return configPath;
}

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error("Expected function to throw");
}

describe("loadProjectConfig", () => {
  it("applies defaults and resolves paths against the config directory", () => {
    const dir = makeTempDir();
    const configPath = writeConfig(
      dir,
      "phasegate.yaml",
      [
        "project_root: repo",
        "runners:",
        "  codex:",
        "    command: codex exec {prompt}",
        "tasks:",
        "  - name: a",
        "    worktree: ../wt/{task}",
        "    prompt: prompts/a.md",
        "",
      ].join("\n"),
    );

    const config = loadProjectConfig(configPath, {});

    expect(config.config_path).toBe(configPath);
    expect(config.project_root).toBe(path.join(dir, "repo"));
    expect(config.logs_dir).toBe(path.join(dir, "repo", "logs"));
    expect(config.version_file).toBe(path.join(dir, "repo", "VERSION"));
    expect(config.runners.codex).toEqual({
      command: "codex exec {prompt}",
      supports_session_attach: false,
      prompt_mode: "stdin",
    });
    expect(config.scheduler).toEqual({ tick_interval_ms: 1000, progress_interval_sec: 30 });
    expect(config.session).toEqual({ pause_command: "/pause", pause_grace_sec: 20 });
    expect(config.watchdog).toEqual({
      stall_timeout_sec: 900,
      poll_interval_sec: 2,
      status_interval_sec: 10,
      kill_on_stall: true,
    });
    expect(config.tasks).toHaveLength(1);
  });

  it("reads JSON configs", () => {
    const dir = makeTempDir();
    const configPath = writeConfig(
      dir,
      "phasegate.json",
      JSON.stringify({ logs_dir: "out/logs", tasks: [] }),
    );

    const config = loadProjectConfig(configPath, {});

    expect(config.logs_dir).toBe(path.join(dir, "out", "logs"));
  });

  it("expands environment variables", () => {
    const dir = makeTempDir();
    const configPath = writeConfig(
      dir,
      "phasegate.yaml",
      "runners:\n  codex:\n    command: ${RUNNER_BIN} {prompt}\n",
    );

    const config = loadProjectConfig(configPath, { RUNNER_BIN: "/opt/bin/codex" });

    expect(config.runners.codex?.command).toBe("/opt/bin/codex {prompt}");
  });

  it("names the location of an unset environment variable", () => {
    const dir = makeTempDir();
    const configPath = writeConfig(
      dir,
      "phasegate.yaml",
      "runners:\n  codex:\n    command: ${MISSING_BIN} {prompt}\n",
    );

    const err = captureError(() => loadProjectConfig(configPath, {}));

    expect(err).toBeInstanceOf(UserFacingError);
    const cause = err instanceof UserFacingError ? err.cause : undefined;
    expect(cause).toBeInstanceOf(ConfigError);
    expect(cause instanceof Error ? cause.message : "").toBe(
      `Environment variable MISSING_BIN is not set but is referenced in ${configPath} (runners.codex.command).`,
    );
  });

  it("reports schema issues with their paths", () => {
    const dir = makeTempDir();
    const configPath = writeConfig(
      dir,
      "phasegate.yaml",
      [
        "runners:",
        "  claude:",
        "    command: claude",
        "    supports_session_attach: true",
        "    prompt_mode: file",
        "",
      ].join("\n"),
    );

    const err = captureError(() => loadProjectConfig(configPath, {}));
    const cause = err instanceof UserFacingError ? err.cause : undefined;
    const message = cause instanceof Error ? cause.message : "";

    expect(message).toContain(`Invalid project config at ${configPath}:`);
    expect(message).toContain(
      'runners.claude.prompt_mode: Expected one of "stdin", "arg", received "file"',
    );
  });

  it("requires resume_command when a runner supports session attach", () => {
    const dir = makeTempDir();
    const configPath = writeConfig(
      dir,
      "phasegate.yaml",
      "runners:\n  claude:\n    command: claude\n    supports_session_attach: true\n",
    );

    const err = captureError(() => loadProjectConfig(configPath, {}));
    const cause = err instanceof UserFacingError ? err.cause : undefined;

    expect(cause instanceof Error ? cause.message : "").toContain(
      "runners.claude.resume_command: resume_command is required when supports_session_attach is true",
    );
  });

  it("includes the YAML error position", () => {
    const dir = makeTempDir();
    const configPath = writeConfig(dir, "phasegate.yaml", "tasks: [\n");

    const err = captureError(() => loadProjectConfig(configPath, {}));
    const cause = err instanceof UserFacingError ? err.cause : undefined;

    expect(cause instanceof Error ? cause.message : "").toMatch(
      /^Failed to parse YAML config at .*\(line \d+, column \d+\)/,
    );
  });

  it("throws a user-facing error when the file is missing", () => {
    const dir = makeTempDir();
    const missing = path.join(dir, "phasegate.yaml");

    const err = captureError(() => loadProjectConfig(missing, {}));

    expect(err).toBeInstanceOf(UserFacingError);
    expect(err instanceof UserFacingError ? err.title : "").toBe("Project config missing.");
  });
});

describe("discoverConfigPath", () => {
  it("prefers an existing default file", () => {
    const dir = makeTempDir();
    writeConfig(dir, "phasegate.json", "{}");

    expect(discoverConfigPath(dir)).toBe(path.join(dir, "phasegate.json"));
  });

  it("falls back to the first default name", () => {
    const dir = makeTempDir();

    expect(discoverConfigPath(dir)).toBe(path.join(dir, "phasegate.yaml"));
  });
});
