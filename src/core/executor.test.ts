import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { execa } from "execa";
import fse from "fs-extra";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { writePauseMarker } from "../session/pause-marker.js";

import { ProjectConfigSchema, type ProjectConfig } from "./config.js";
import { RUN_EVENTS_FILE, runPhase, type RunPhaseOptions } from "./executor.js";
import { RUN_LOCK_FILE } from "./run-lock.js";
import type { LaunchRequest, LaunchedTask, TaskLauncher } from "./task-launcher.js";

// =============================================================================
// HELPERS
// =============================================================================

type FakeLauncher = TaskLauncher & { requests: LaunchRequest[] };

function fakeLauncher(
  onLaunch: (request: LaunchRequest) => number = () => 0,
): FakeLauncher {
  const requests: LaunchRequest[] = [];
  return {
    requests,
    async launch(request: LaunchRequest): Promise<LaunchedTask> {
      requests.push(request);
      const exitCode = onLaunch(request);
      return {
        pid: 4242,
        exited: Promise.resolve({ exitCode, signaled: false }),
        terminate: () => undefined,
      };
    },
  };
}

type EventLine = { event: string; task?: string; [key: string]: unknown };

function readEvents(logsDir: string): EventLine[] {
  return fs
    .readFileSync(path.join(logsDir, RUN_EVENTS_FILE), "utf8")
    .trim()
    .split("\n")
    .map((line): EventLine => JSON.parse(line));
}

// =============================================================================
// TESTS
// =============================================================================

describe("runPhase", () => {
  let tmpDir: string;
  let projectRoot: string;
  let logsDir: string;
  let lines: string[];
  let provisionWorkspace: ReturnType<typeof vi.fn>;

  beforeEach(async () => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "executor-"));
    projectRoot = path.join(tmpDir, "repo");
    logsDir = path.join(projectRoot, "logs");
    await fse.ensureDir(path.join(projectRoot, "prompts"));
    for (const name of ["a", "b", "c"]) {
      await fse.writeFile(path.join(projectRoot, "prompts", `${name}.md`), `Do ${name}\n`);
    }
    await fse.writeFile(path.join(projectRoot, "VERSION"), "1.2.3\n");
    await execa("git", ["init", "-b", "main"], { cwd: projectRoot });

    lines = [];
    provisionWorkspace = vi.fn(async () => undefined);
  });

  afterEach(async () => {
    await fse.remove(tmpDir);
  });

  function task(name: string, extra: Record<string, unknown> = {}): Record<string, unknown> {
    return { name, worktree: `../wt/${name}`, prompt: `prompts/${name}.md`, runner: "shell", ...extra };
  }

  function makeConfig(tasks: unknown[], extra: Record<string, unknown> = {}): ProjectConfig {
    const parsed = ProjectConfigSchema.parse({
      runners: {
        shell: {
          command: "bash run.sh {prompt}",
          resume_command: "bash resume.sh {task}",
          supports_session_attach: true,
        },
      },
      tasks,
      scheduler: { tick_interval_ms: 0, progress_interval_sec: 0 },
      ...extra,
    });
    return {
      ...parsed,
      project_root: projectRoot,
      logs_dir: logsDir,
      version_file: path.join(projectRoot, "VERSION"),
      config_path: path.join(projectRoot, "phasegate.yaml"),
    };
  }

  function options(config: ProjectConfig, overrides: Partial<RunPhaseOptions> = {}): RunPhaseOptions {
    return {
      config,
      phase: "main",
      dryRun: false,
      includeManual: false,
      runId: "run-1",
      provisionWorkspace,
      output: (line) => lines.push(line),
      hasTerminal: true,
      env: {},
      handleSignals: false,
      ...overrides,
    };
  }

  it("blocks dependents of a failed task and exits 1", async () => {
    const launcher = fakeLauncher((request) => (request.task.name === "a" ? 7 : 0));
    const config = makeConfig([
      task("a"),
      task("b", { depends_on: ["a"] }),
      task("c", { depends_on: ["b"] }),
    ]);

    const result = await runPhase(options(config, { launcher }));

    expect(result.exitCode).toBe(1);
    expect(result.error).toBeNull();
    expect(launcher.requests.map((r) => r.task.name)).toEqual(["a"]);
    expect(lines).toEqual([
      `[START] a -> ${path.join(logsDir, "a.log")}`,
      "[DONE] a exit=7",
      "[BLOCKED] b <- a",
      "[BLOCKED] c <- b",
      `Summary saved to ${path.join(logsDir, "summaries", "run-summary.md")}`,
    ]);

    const summary = fs.readFileSync(result.summaryPaths.latest, "utf8");
    expect(summary).toContain("- Framework version: 1.2.3\n");
    expect(summary).toContain("- a: FAIL (7)\n- b: BLOCKED (deps: a)\n- c: BLOCKED (deps: b)\n");
    expect(fs.readFileSync(result.summaryPaths.history, "utf8")).toBe(summary);

    const events = readEvents(logsDir);
    expect(events.map((e) => e.event)).toEqual(["run_start", "task_start", "task_end", "run_end"]);
    expect(events[0]).toMatchObject({ run_id: "run-1", phase: "main", tasks_total: 3, pid: process.pid });
    expect(events[2]).toMatchObject({ task: "a", exit_code: 7, status: "completed" });
    expect(events[3]).toMatchObject({
      run_id: "run-1",
      completed: { a: 7 },
      blocked: { b: ["a"], c: ["b"] },
      exit_code: 1,
    });
  });

  it("runs independent tasks and provisions each worktree", async () => {
    const launcher = fakeLauncher();
    const config = makeConfig([task("a"), task("b"), task("c", { depends_on: ["a", "b"] })]);

    const result = await runPhase(options(config, { launcher }));

    expect(result.exitCode).toBe(0);
    expect(launcher.requests.map((r) => r.task.name)).toEqual(["a", "b", "c"]);
    expect(launcher.requests[0]?.command).toBe(
      `bash run.sh ${path.join(projectRoot, "prompts", "a.md")}`,
    );
    expect(provisionWorkspace).toHaveBeenCalledWith({
      repoRoot: projectRoot,
      workspacePath: path.join(tmpDir, "wt", "a"),
      branch: "task/a",
    });
    expect(provisionWorkspace).toHaveBeenCalledTimes(3);
  });

  it("holds the run lock while a main run is active and releases it afterwards", async () => {
    const lockPath = path.join(logsDir, RUN_LOCK_FILE);
    let lockSeen = false;
    const launcher = fakeLauncher(() => {
      lockSeen = fs.existsSync(lockPath);
      return 0;
    });

    await runPhase(options(makeConfig([task("a")]), { launcher }));

    expect(lockSeen).toBe(true);
    expect(fs.existsSync(lockPath)).toBe(false);
  });

  it("prints the plan without launching or provisioning in a dry run", async () => {
    const launcher = fakeLauncher();
    const config = makeConfig([task("a"), task("b", { depends_on: ["a"] })]);

    const result = await runPhase(options(config, { launcher, dryRun: true }));

    expect(result.exitCode).toBe(0);
    expect(launcher.requests).toEqual([]);
    expect(provisionWorkspace).not.toHaveBeenCalled();
    expect(lines.slice(0, 2)).toEqual([
      `[DRY-RUN] a in ${path.join(tmpDir, "wt", "a")} :: bash run.sh ${path.join(projectRoot, "prompts", "a.md")}`,
      "[DONE] a exit=0",
    ]);
    expect(fs.existsSync(path.join(logsDir, RUN_LOCK_FILE))).toBe(false);
  });

  it("records an interactive pause and resumes the task on the next run", async () => {
    const config = makeConfig([task("a", { interactive: true })]);
    const markerPath = path.join(logsDir, "a.paused");

    const pausing = fakeLauncher((request) => {
      writePauseMarker(request.paths.pauseMarker ?? "", {
        paused_at: "2026-01-01T00:00:00Z",
        reason: "operator",
        command: "/pause",
      });
      return 2;
    });
    const first = await runPhase(options(config, { launcher: pausing }));

    expect(first.exitCode).toBe(2);
    expect(lines).toContain("[START] a (interactive) -> " + path.join(logsDir, "a.log"));
    expect(lines).toContain("[PAUSED] a exit=2");
    expect(fs.readFileSync(first.summaryPaths.latest, "utf8")).toContain("- a: PAUSED\n");
    expect(fs.existsSync(markerPath)).toBe(true);

    lines = [];
    const resuming = fakeLauncher();
    const second = await runPhase(options(config, { launcher: resuming, runId: "run-2" }));

    expect(second.exitCode).toBe(0);
    expect(lines[0]).toBe("[RESUME] a (paused at 2026-01-01T00:00:00Z)");
    expect(resuming.requests[0]?.resumed).toBe(true);
    expect(resuming.requests[0]?.command).toBe("bash resume.sh a");
    expect(fs.existsSync(markerPath)).toBe(false);
  });

  it("reports a dependency cycle as a run error", async () => {
    const launcher = fakeLauncher();
    const config = makeConfig([
      task("a", { depends_on: ["b"] }),
      task("b", { depends_on: ["a"] }),
    ]);

    const result = await runPhase(options(config, { launcher }));

    const message = "No runnable tasks remaining. Check for cyclic dependencies: a, b";
    expect(result.exitCode).toBe(1);
    expect(result.error).toBe(message);
    expect(lines[0]).toBe(`[ERROR] ${message}`);
    const summary = fs.readFileSync(result.summaryPaths.latest, "utf8");
    expect(summary).toContain(`- Error: ${message}\n`);
    expect(summary).toContain("- a: NOT STARTED\n- b: NOT STARTED\n");
    expect(fs.existsSync(path.join(logsDir, RUN_LOCK_FILE))).toBe(false);
  });

  it("leaves a task not started when its worktree cannot be provisioned", async () => {
    const launcher = fakeLauncher();
    provisionWorkspace.mockRejectedValueOnce(new Error("worktree busy"));

    const result = await runPhase(options(makeConfig([task("a")]), { launcher }));

    expect(result.exitCode).toBe(1);
    expect(result.error).toBe("worktree busy");
    expect(result.state.a).toEqual({ state: "pending" });
    expect(launcher.requests).toEqual([]);
  });

  it("leaves every start of the failing tick not started", async () => {
    const launcher = fakeLauncher();
    provisionWorkspace.mockRejectedValueOnce(new Error("worktree busy"));

    const result = await runPhase(options(makeConfig([task("a"), task("b")]), { launcher }));

    expect(result.exitCode).toBe(1);
    expect(result.state).toEqual({ a: { state: "pending" }, b: { state: "pending" } });
    expect(launcher.requests).toEqual([]);
    const events = readEvents(logsDir);
    expect(events.map((e) => e.event)).toEqual(["run_start", "task_start", "run_end"]);
    expect(events[1]).toMatchObject({ task: "a" });
    const summary = fs.readFileSync(result.summaryPaths.latest, "utf8");
    expect(summary).toContain("- a: NOT STARTED\n- b: NOT STARTED\n");
  });

  it("refuses a post run while another run holds the lock", async () => {
    await fse.outputFile(
      path.join(logsDir, RUN_LOCK_FILE),
      JSON.stringify({ run_id: "other", phase: "main", started_at: "x", pid: process.pid }),
    );
    const config = makeConfig([task("a", { phase: "post" })]);

    await expect(
      runPhase(options(config, { phase: "post", launcher: fakeLauncher() })),
    ).rejects.toThrow(/Active run lock detected .* \(run other, phase main, pid \d+\)/);
    expect(fs.existsSync(path.join(logsDir, RUN_LOCK_FILE))).toBe(true);
  });

  it("logs a failed report without changing the exit code", async () => {
    const config = makeConfig([task("a")], {
      reporting: { enabled: true, command: "echo broken >&2; exit 3" },
    });

    const result = await runPhase(options(config, { launcher: fakeLauncher() }));

    expect(result.exitCode).toBe(0);
    expect(lines.at(-1)).toBe("[REPORT] broken");
    const events = readEvents(logsDir);
    expect(events.at(-1)).toMatchObject({
      event: "report_publish_error",
      phase: "main",
      error: "broken",
    });
  });

  it("swaps every runner for the no-op command when asked", async () => {
    const launcher = fakeLauncher();

    await runPhase(
      options(makeConfig([task("a")]), { launcher, env: { PHASEGATE_RUNNER_NOOP: "1" } }),
    );

    expect(lines[0]).toBe("[PREFLIGHT] PHASEGATE_RUNNER_NOOP=1: runner commands set to no-op");
    expect(launcher.requests[0]?.command).toBe(
      `cat ${path.join(projectRoot, "prompts", "a.md")} > /dev/null`,
    );
  });

  it("rejects a phase with no selected tasks", async () => {
    await expect(
      runPhase(options(makeConfig([task("a")]), { phase: "post" })),
    ).rejects.toThrow("No tasks selected for phase 'post'");
  });
});
