/*
Purpose: bridge the operator's terminal to an agent running under a pseudo-terminal, with a transcript and a pause command.
Assumptions: launched as the `session` subcommand with the operator's stdio inherited; the parent scheduler reads the exit code.
Usage: const code = await runInteractiveSession(options);
*/

import fs from "node:fs";
import path from "node:path";
import { StringDecoder } from "node:string_decoder";

import fse from "fs-extra";

import { formatErrorMessage } from "../core/error-format.js";
import { isoNow, quoteShellArg } from "../core/utils.js";

import { writePauseMarker } from "./pause-marker.js";
import { spawnNodePty, type PtyExit, type PtyFactory, type PtyProcess } from "./pty.js";

export const SESSION_PAUSED_EXIT_CODE = 2;
export const PAUSE_KILL_WAIT_MS = 1_000;

const SESSION_SHELL = "/bin/sh";

// =============================================================================
// TYPES
// =============================================================================

export type PromptMode = "stdin" | "arg";

export type SessionOptions = {
  cwd: string;
  command: string;
  promptPath?: string;
  promptMode: PromptMode;
  transcriptPath: string;
  pauseMarkerPath?: string;
  pauseCommand: string;
  pauseGraceSec: number;
  // Open the transcript for append instead of truncating it.
  append: boolean;
  // False when the runner restores its own conversation on resume.
  seed: boolean;
  env?: NodeJS.ProcessEnv;
};

export type SessionInput = {
  isTTY?: boolean;
  setRawMode?(mode: boolean): unknown;
  on(event: "data", listener: (chunk: Buffer | string) => void): unknown;
  off(event: "data", listener: (chunk: Buffer | string) => void): unknown;
  resume(): unknown;
  pause(): unknown;
};

export type SessionOutput = {
  columns?: number;
  rows?: number;
  write(chunk: string): unknown;
};

export type SessionIo = {
  stdin: SessionInput;
  stdout: SessionOutput;
  spawnPty: PtyFactory;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function defaultSessionIo(): SessionIo {
  return { stdin: process.stdin, stdout: process.stdout, spawnPty: spawnNodePty };
}

/**
 * Runs the session to completion. Resolves to 2 when the operator paused, otherwise
 * to the child's exit code (128 + n for a child killed by signal n).
 */
export async function runInteractiveSession(
  options: SessionOptions,
  io: SessionIo = defaultSessionIo(),
): Promise<number> {
  const prompt = options.seed ? readPrompt(options.promptPath, io.stdout) : null;
  const commandLine =
    options.promptMode === "arg" && prompt !== null
      ? `${options.command} ${quoteShellArg(prompt)}`
      : options.command;

  fse.ensureDirSync(path.dirname(options.transcriptPath));
  const transcriptFd = fs.openSync(options.transcriptPath, options.append ? "a" : "w");
  const restoreTerminal = enterRawMode(io.stdin);

  try {
    const child = io.spawnPty(SESSION_SHELL, ["-c", commandLine], {
      cwd: options.cwd,
      env: options.env ?? process.env,
      cols: io.stdout.columns ?? 80,
      rows: io.stdout.rows ?? 24,
    });
    if (options.promptMode === "stdin" && prompt !== null) {
      child.write(`${prompt}\n`);
    }
    return await bridge(child, options, io, transcriptFd);
  } finally {
    restoreTerminal();
    fs.closeSync(transcriptFd);
  }
}

// =============================================================================
// INTERNALS
// =============================================================================

function readPrompt(promptPath: string | undefined, stdout: SessionOutput): string | null {
  if (!promptPath) return null;
  try {
    return fs.readFileSync(promptPath, "utf8").trimEnd();
  } catch (err) {
    stdout.write(`[SESSION] Prompt not sent: ${formatErrorMessage(err)}\r\n`);
    return null;
  }
}

function enterRawMode(stdin: SessionInput): () => void {
  if (!stdin.isTTY || !stdin.setRawMode) return () => undefined;
  stdin.setRawMode(true);
  return () => {
    stdin.setRawMode?.(false);
  };
}

function exitCodeOf(exit: PtyExit): number {
  return exit.signal ? 128 + exit.signal : exit.exitCode;
}

function bridge(
  child: PtyProcess,
  options: SessionOptions,
  io: SessionIo,
  transcriptFd: number,
): Promise<number> {
  return new Promise<number>((resolve) => {
    let inputBuffer = "";
    let pauseRequested = false;
    let exited = false;
    let settled = false;
    const timers: NodeJS.Timeout[] = [];

    const record = (text: string): void => {
      fs.writeSync(transcriptFd, text);
    };

    const finish = (code: number): void => {
      if (settled) return;
      settled = true;
      for (const timer of timers) clearTimeout(timer);
      dataSubscription.dispose();
      exitSubscription.dispose();
      io.stdin.off("data", onInput);
      io.stdin.pause();
      resolve(code);
    };

    const forceStop = (): void => {
      child.kill("SIGTERM");
      timers.push(
        setTimeout(() => {
          if (!exited) child.kill("SIGKILL");
          finish(SESSION_PAUSED_EXIT_CODE);
        }, PAUSE_KILL_WAIT_MS),
      );
    };

    const requestPause = (): void => {
      pauseRequested = true;
      const notice = `\r\n[PAUSE] Session paused at ${isoNow()}. Re-run to resume.\r\n`;
      io.stdout.write(notice);
      record(notice);
      if (options.pauseMarkerPath) {
        writePauseMarker(options.pauseMarkerPath, {
          paused_at: isoNow(),
          reason: "operator requested pause",
          command: options.pauseCommand,
        });
      }
      timers.push(setTimeout(forceStop, options.pauseGraceSec * 1000));
    };

    // Keeps a multi-byte character split across chunks intact.
    const decoder = new StringDecoder("utf8");
    const onInput = (chunk: Buffer | string): void => {
      const text = typeof chunk === "string" ? chunk : decoder.write(chunk);
      if (!text) return;
      child.write(text);
      record(text);

      inputBuffer += text;
      let newline = inputBuffer.search(/[\r\n]/);
      while (newline >= 0) {
        const line = inputBuffer.slice(0, newline).trim();
        inputBuffer = inputBuffer.slice(newline + 1);
        if (!pauseRequested && line === options.pauseCommand) {
          requestPause();
        }
        newline = inputBuffer.search(/[\r\n]/);
      }
    };

    const dataSubscription = child.onData((data) => {
      io.stdout.write(data);
      record(data);
    });
    const exitSubscription = child.onExit((exit) => {
      exited = true;
      finish(pauseRequested ? SESSION_PAUSED_EXIT_CODE : exitCodeOf(exit));
    });

    io.stdin.on("data", onInput);
    io.stdin.resume();
  });
}
