import { runInteractiveSession, type PromptMode } from "../session/session.js";

export type SessionCommandOptions = {
  cwd: string;
  command: string;
  prompt?: string;
  promptMode: PromptMode;
  transcript: string;
  pauseMarker?: string;
  pauseCommand: string;
  pauseGrace: number;
  append: boolean;
  seed: boolean;
};

export async function sessionCommand(opts: SessionCommandOptions): Promise<number> {
  return runInteractiveSession({
    cwd: opts.cwd,
    command: opts.command,
    promptPath: opts.prompt,
    promptMode: opts.promptMode,
    transcriptPath: opts.transcript,
    pauseMarkerPath: opts.pauseMarker,
    pauseCommand: opts.pauseCommand,
    pauseGraceSec: opts.pauseGrace,
    append: opts.append,
    seed: opts.seed,
  });
}
