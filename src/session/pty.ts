import * as nodePty from "node-pty";

// =============================================================================
// TYPES
// =============================================================================

export type PtyExit = {
  exitCode: number;
  // Terminating signal number, when the child was killed by one.
  signal?: number;
};

export type Disposable = {
  dispose(): void;
};

/** The slice of a node-pty process the session bridge relies on. */
export interface PtyProcess {
  readonly pid: number;
  onData(listener: (data: string) => void): Disposable;
  onExit(listener: (exit: PtyExit) => void): Disposable;
  write(data: string): void;
  resize(cols: number, rows: number): void;
  kill(signal?: string): void;
}

export type PtySpawnOptions = {
  cwd: string;
  env: NodeJS.ProcessEnv;
  cols: number;
  rows: number;
};

export type PtyFactory = (file: string, args: string[], opts: PtySpawnOptions) => PtyProcess;

// =============================================================================
// NODE-PTY
// =============================================================================

export const spawnNodePty: PtyFactory = (file, args, opts) =>
  nodePty.spawn(file, args, {
    name: "xterm-256color",
    cwd: opts.cwd,
    env: opts.env,
    cols: opts.cols,
    rows: opts.rows,
  });
