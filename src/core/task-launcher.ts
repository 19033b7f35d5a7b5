/*
Purpose: start one task's child process and report its exit asynchronously.
Assumptions: the scheduler records task_start before calling launch() and task_end after `exited` settles.
Usage: const handle = await launcher.launch(request); handle.exited.then(...).
*/

import fs from "node:fs";
import path from "node:path";

import { execa } from "execa";
import fse from "fs-extra";

import type { RunnerConfig, SessionConfig } from "./config.js";
import type { Phase, ResolvedTaskPaths, TaskDefinition } from "./task-graph.js";
import { signalExitCode } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type LaunchRequest = {
  task: TaskDefinition;
  runner: RunnerConfig;
  command: string;
  paths: ResolvedTaskPaths;
  runId: string;
  phase: Phase;
  resumed: boolean;
  session: SessionConfig;
};

export type ChildExit = {
  exitCode: number;
  signaled: boolean;
};

export type LaunchedTask = {
  pid?: number;
  exited: Promise<ChildExit>;
  terminate(signal?: NodeJS.Signals): void;
};

export interface TaskLauncher {
  launch(request: LaunchRequest): Promise<LaunchedTask>;
}

// =============================================================================
// BATCH TASKS
// =============================================================================

/**
 * Runs the runner command through the shell inside the worktree, with stdout and
 * stderr both appended to the task log.
 */
export class ShellTaskLauncher implements TaskLauncher {
  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  async launch(request: LaunchRequest): Promise<LaunchedTask> {
    await fse.ensureDir(path.dirname(request.paths.log));
    const logFd = fs.openSync(request.paths.log, "w");

    const subprocess = execa(request.command, {
      shell: true,
      cwd: request.paths.worktree,
      env: this.env,
      stdio: ["ignore", logFd, logFd],
      reject: false,
    });

    const exited = subprocess.then(
      (result) => {
        fs.closeSync(logFd);
        return toChildExit(result.exitCode, result.signal);
      },
      (err: unknown) => {
        fs.closeSync(logFd);
        throw err;
      },
    );

    return {
      pid: subprocess.pid,
      exited,
      terminate: (signal = "SIGTERM") => {
        subprocess.kill(signal);
      },
    };
  }
}

// =============================================================================
// INTERACTIVE TASKS
// =============================================================================

export type SessionLauncherOptions = {
  // Script the `session` subcommand is reached through.
  cliEntry?: string;
  env?: NodeJS.ProcessEnv;
};

export function buildSessionArgs(request: LaunchRequest): string[] {
  const { paths, runner, session } = request;
  const args = [
    "session",
    "--cwd",
    paths.worktree,
    "--command",
    request.command,
    "--prompt",
    paths.prompt,
    "--prompt-mode",
    runner.prompt_mode,
    "--transcript",
    paths.log,
    "--pause-command",
    session.pause_command,
    "--pause-grace",
    String(session.pause_grace_sec),
  ];

  if (paths.pauseMarker) {
    args.push("--pause-marker", paths.pauseMarker);
  }
  if (request.resumed) {
    args.push("--append");
  }
  if (request.resumed && runner.supports_session_attach) {
    // The runner restores its own conversation; seeding again would repeat the prompt.
    args.push("--no-seed");
  }

  return args;
}

/**
 * Re-enters this CLI's `session` subcommand with the operator's terminal inherited,
 * so the pseudo-terminal bridge owns stdin for the lifetime of the task.
 */
export class SessionTaskLauncher implements TaskLauncher {
  private readonly cliEntry: string;
  private readonly env: NodeJS.ProcessEnv;

  constructor(opts: SessionLauncherOptions = {}) {
    this.cliEntry = opts.cliEntry ?? process.argv[1] ?? "";
    this.env = opts.env ?? process.env;
  }

  async launch(request: LaunchRequest): Promise<LaunchedTask> {
    const subprocess = execa(
      process.execPath,
      [...process.execArgv, this.cliEntry, ...buildSessionArgs(request)],
      {
        cwd: request.paths.worktree,
        env: this.env,
        stdio: "inherit",
        reject: false,
      },
    );

    return {
      pid: subprocess.pid,
      exited: subprocess.then((result) => toChildExit(result.exitCode, result.signal)),
      terminate: (signal = "SIGTERM") => {
        subprocess.kill(signal);
      },
    };
  }
}

// =============================================================================
// ROUTING
// =============================================================================

export class RoutingTaskLauncher implements TaskLauncher {
  constructor(
    private readonly batch: TaskLauncher,
    private readonly interactive: TaskLauncher,
  ) {}

  launch(request: LaunchRequest): Promise<LaunchedTask> {
    return request.task.interactive
      ? this.interactive.launch(request)
      : this.batch.launch(request);
  }
}

/** Spawns nothing; every task exits 0 immediately. */
export class DryRunTaskLauncher implements TaskLauncher {
  async launch(): Promise<LaunchedTask> {
    return {
      exited: Promise.resolve({ exitCode: 0, signaled: false }),
      terminate: () => undefined,
    };
  }
}

export function createDefaultLauncher(env: NodeJS.ProcessEnv = process.env): TaskLauncher {
  return new RoutingTaskLauncher(new ShellTaskLauncher(env), new SessionTaskLauncher({ env }));
}

function toChildExit(exitCode: number | undefined, signal: string | undefined): ChildExit {
  if (exitCode !== undefined) return { exitCode, signaled: false };
  if (signal) return { exitCode: signalExitCode(signal), signaled: true };
  return { exitCode: -1, signaled: false };
}
