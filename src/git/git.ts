import fs from "node:fs";
import path from "node:path";

import { execa, type Options } from "execa";

import { GitError } from "../core/errors.js";

export type GitResult = { stdout: string; stderr: string; exitCode: number };

export async function git(cwd: string, args: string[], opts: Options = {}): Promise<GitResult> {
  const res = await execa("git", args, {
    cwd,
    stdio: "pipe",
    env: process.env,
    ...opts,
    reject: false,
  });
  const stdout = typeof res.stdout === "string" ? res.stdout : String(res.stdout ?? "");
  const stderr = typeof res.stderr === "string" ? res.stderr : String(res.stderr ?? "");
  const exitCode = res.exitCode ?? -1;

  if (res.failed || exitCode !== 0) {
    const detail = stderr.trim() || `exit code ${exitCode}`;
    throw new GitError(`git ${args.join(" ")} failed (cwd=${cwd}): ${detail}`, {
      stdout,
      stderr,
      exitCode,
    });
  }

  return { stdout, stderr, exitCode };
}

export async function isInsideWorkTree(cwd: string): Promise<boolean> {
  if (!fs.existsSync(cwd)) return false;
  const res = await execa("git", ["rev-parse", "--is-inside-work-tree"], {
    cwd,
    stdio: "pipe",
    reject: false,
  });
  return res.exitCode === 0 && String(res.stdout).trim() === "true";
}

/**
 * Real path of the repository's shared git directory. Two worktrees of the same
 * repository return the same value.
 */
export async function gitCommonDir(cwd: string): Promise<string> {
  const res = await git(cwd, ["rev-parse", "--git-common-dir"]);
  const resolved = path.resolve(cwd, res.stdout.trim());
  return fs.realpathSync(resolved);
}

/** Real path of the top of the working tree that contains `cwd`. */
export async function workTreeRoot(cwd: string): Promise<string> {
  const res = await git(cwd, ["rev-parse", "--show-toplevel"]);
  return fs.realpathSync(res.stdout.trim());
}

export async function headSha(cwd: string): Promise<string> {
  const res = await git(cwd, ["rev-parse", "HEAD"]);
  return res.stdout.trim();
}

export async function addWorktreeWithNewBranch(
  repoRoot: string,
  worktreePath: string,
  branch: string,
): Promise<void> {
  await git(repoRoot, ["worktree", "add", "-b", branch, worktreePath]);
}

export async function addWorktreeForBranch(
  repoRoot: string,
  worktreePath: string,
  branch: string,
): Promise<void> {
  await git(repoRoot, ["worktree", "add", worktreePath, branch]);
}

export async function branchExists(cwd: string, branch: string): Promise<boolean> {
  const res = await execa("git", ["rev-parse", "--verify", "--quiet", `refs/heads/${branch}`], {
    cwd,
    stdio: "pipe",
    reject: false,
  });
  return res.exitCode === 0;
}
