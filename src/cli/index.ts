import { Command, InvalidArgumentError, Option } from "commander";

import { PHASES, isPhase, type Phase } from "../core/task-graph.js";

import { loadConfigForCli } from "./config.js";
import { protocolCommand } from "./protocol.js";
import { runCommand } from "./run.js";
import { sessionCommand } from "./session.js";
import { watchCommand } from "./watch.js";

type GlobalOptions = {
  config?: string;
  debug?: boolean;
};

function parsePhase(value: string): Phase {
  if (!isPhase(value)) {
    throw new InvalidArgumentError(`Expected one of: ${PHASES.join(", ")}`);
  }
  return value;
}

function parseNonNegativeNumber(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new InvalidArgumentError("Expected a non-negative number");
  }
  return parsed;
}

function parsePid(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Expected a process id");
  }
  return parsed;
}

export function buildCli(): Command {
  const program = new Command();

  const resolveConfig = () => {
    const globals = program.opts<GlobalOptions>();
    return loadConfigForCli({ explicitConfigPath: globals.config }).config;
  };

  program
    .name("phasegate")
    .description("Phase-aware task scheduler for agent runs in isolated git worktrees")
    .version("0.1.0")
    .option("--config <path>", "Project config path (defaults to ./phasegate.yaml)")
    .option("--debug", "Show error codes, causes and stack traces", false);

  program
    .command("run")
    .description("Run one phase's tasks in dependency order")
    .addOption(
      new Option("--phase <phase>", "Phase to run")
        .choices([...PHASES])
        .argParser(parsePhase)
        .default("main"),
    )
    .option("--dry-run", "Print what would run without provisioning or launching", false)
    .option("--include-manual", "Also run tasks marked manual", false)
    .option("--run-id <id>", "Run ID (default: timestamp)")
    .action(
      async (opts: { phase: Phase; dryRun: boolean; includeManual: boolean; runId?: string }) => {
        process.exitCode = await runCommand(resolveConfig(), opts);
      },
    );

  program
    .command("session")
    .description("Bridge this terminal to an interactive task (started by `run`)")
    .requiredOption("--cwd <dir>", "Working directory of the child")
    .requiredOption("--command <line>", "Shell command line to run under a pseudo-terminal")
    .option("--prompt <path>", "Prompt file to seed the session with")
    .addOption(
      new Option("--prompt-mode <mode>", "How the prompt is delivered")
        .choices(["stdin", "arg"])
        .default("stdin"),
    )
    .requiredOption("--transcript <path>", "Transcript file")
    .option("--pause-marker <path>", "Marker written when the operator pauses")
    .option("--pause-command <text>", "Input line that pauses the session", "/pause")
    .option("--pause-grace <sec>", "Seconds before a paused child is terminated", parseNonNegativeNumber, 20)
    .option("--append", "Append to the transcript instead of truncating it", false)
    .option("--no-seed", "Do not send the prompt (the runner restores its own session)")
    .action(
      async (opts: {
        cwd: string;
        command: string;
        prompt?: string;
        promptMode: "stdin" | "arg";
        transcript: string;
        pauseMarker?: string;
        pauseCommand: string;
        pauseGrace: number;
        append: boolean;
        seed: boolean;
      }) => {
        process.exitCode = await sessionCommand(opts);
      },
    );

  program
    .command("watch")
    .description("Watch a running scheduler for stalls and print status")
    .requiredOption("--pid <pid>", "Scheduler process id", parsePid)
    .action(async (opts: { pid: number }) => {
      const globals = program.opts<GlobalOptions>();
      process.exitCode = await watchCommand(resolveConfig(), {
        pid: opts.pid,
        debug: globals.debug === true,
      });
    });

  program
    .command("protocol")
    .description("Run the phase sequence with a watchdog, skipping phases already completed")
    .addOption(new Option("--phase <phase>", "Run only this phase").choices([...PHASES]).argParser(parsePhase))
    .action(async (opts: { phase?: Phase }) => {
      process.exitCode = await protocolCommand(resolveConfig(), opts);
    });

  return program;
}
