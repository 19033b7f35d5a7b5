import fs from "node:fs";

import {
  addWorktreeForBranch,
  addWorktreeWithNewBranch,
  branchExists,
  gitCommonDir,
  isInsideWorkTree,
  workTreeRoot,
} from "../git/git.js";

import { formatErrorMessage } from "./error-format.js";
import { WorkspaceError } from "./errors.js";
import { pathExists } from "./utils.js";

export type EnsureWorkspaceOptions = {
  repoRoot: string;
  workspacePath: string;
  branch: string;
};

export type EnsureWorkspaceResult = {
  workspacePath: string;
  created: boolean;
};

/**
 * Makes sure `workspacePath` is a worktree of `repoRoot` checked out on `branch`.
 *
 * An existing path is accepted as-is only when it is the root of a linked worktree
 * of the same repository; the checked-out branch is left untouched so a resumed
 * task keeps its work.
 */
export async function ensureWorkspace(
  opts: EnsureWorkspaceOptions,
): Promise<EnsureWorkspaceResult> {
  const { repoRoot, workspacePath, branch } = opts;

  if (await pathExists(workspacePath)) {
    await assertWorktreeOfRepo(workspacePath, repoRoot);
    return { workspacePath, created: false };
  }

  try {
    if (await branchExists(repoRoot, branch)) {
      await addWorktreeForBranch(repoRoot, workspacePath, branch);
    } else {
      await addWorktreeWithNewBranch(repoRoot, workspacePath, branch);
    }
  } catch (err) {
    throw new WorkspaceError(
      `Failed to create worktree ${workspacePath} on branch ${branch}: ${formatErrorMessage(err)}`,
      err,
    );
  }

  return { workspacePath, created: true };
}

export type ExistingWorkspaceCheck = "ok" | "not_worktree" | "not_root" | "main_checkout" | "foreign";

/** Classifies an existing path against the linked worktrees of `repoRoot`. */
export async function checkExistingWorkspace(
  candidate: string,
  repoRoot: string,
): Promise<ExistingWorkspaceCheck> {
  if (!(await isInsideWorkTree(candidate))) return "not_worktree";

  const [candidateRoot, repoTop] = await Promise.all([workTreeRoot(candidate), workTreeRoot(repoRoot)]);
  if (candidateRoot !== fs.realpathSync(candidate)) return "not_root";

  const [candidateCommon, repoCommon] = await Promise.all([
    gitCommonDir(candidate),
    gitCommonDir(repoRoot),
  ]);
  if (candidateCommon !== repoCommon) return "foreign";
  if (candidateRoot === repoTop) return "main_checkout";
  return "ok";
}

export function describeWorkspaceProblem(
  check: Exclude<ExistingWorkspaceCheck, "ok">,
  workspacePath: string,
  repoRoot: string,
): string {
  switch (check) {
    case "not_worktree":
      return `Worktree path exists but is not a git worktree: ${workspacePath}`;
    case "not_root":
      return `Worktree path is a directory inside a checkout, not a worktree root: ${workspacePath}`;
    case "main_checkout":
      return `Worktree path is the main checkout of ${repoRoot}, not an isolated worktree: ${workspacePath}`;
    case "foreign":
      return `Worktree path belongs to a different repository: ${workspacePath} (expected ${repoRoot})`;
  }
}

async function assertWorktreeOfRepo(workspacePath: string, repoRoot: string): Promise<void> {
  const check = await checkExistingWorkspace(workspacePath, repoRoot);
  if (check !== "ok") {
    throw new WorkspaceError(describeWorkspaceProblem(check, workspacePath, repoRoot));
  }
}
