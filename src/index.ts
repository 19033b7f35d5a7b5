#!/usr/bin/env node
import fs from "node:fs";
import { pathToFileURL } from "node:url";

import { CommanderError, type Command } from "commander";

import { renderCliError } from "./cli/error-format.js";
import { buildCli } from "./cli/index.js";
import { UserFacingError } from "./core/errors.js";

// Help and version output are exits, not failures.
const SILENT_COMMANDER_EXITS = new Set([
  "commander.help",
  "commander.helpDisplayed",
  "commander.version",
]);

/** Runs the phasegate CLI, leaving the status on `process.exitCode`. Never throws. */
export async function main(argv: string[]): Promise<void> {
  const program = buildCli();
  routeFailuresToRenderer(program);

  try {
    await program.parseAsync(argv);
  } catch (error) {
    if (error instanceof CommanderError && SILENT_COMMANDER_EXITS.has(error.code)) {
      process.exitCode = error.exitCode;
      return;
    }

    console.error(renderCliError(error, { debug: debugRequested(argv) }));
    process.exitCode = failureExitCode(error);
  }
}

function routeFailuresToRenderer(command: Command): void {
  command.exitOverride();
  command.configureOutput({ outputError: () => undefined });
  for (const sub of command.commands) routeFailuresToRenderer(sub);
}

// Parse failures happen before commander stores options, so read argv directly.
function debugRequested(argv: string[]): boolean {
  const end = argv.indexOf("--");
  const flags = end === -1 ? argv : argv.slice(0, end);
  return flags.lastIndexOf("--debug") > flags.lastIndexOf("--no-debug");
}

function failureExitCode(error: unknown): number {
  const code =
    error instanceof UserFacingError || error instanceof CommanderError ? (error.exitCode ?? 1) : 1;
  // 0 and 2 mean success and pause to the coordinator; a failure is never either.
  return code === 0 || code === 2 ? 1 : code;
}

// =============================================================================
// DIRECT EXECUTION
// =============================================================================

function isDirectExecution(): boolean {
  const entry = process.argv[1];
  if (!entry || !fs.existsSync(entry)) return false;
  // npm links the bin through a symlink.
  return import.meta.url === pathToFileURL(fs.realpathSync(entry)).href;
}

if (isDirectExecution()) {
  void main(process.argv);
}
