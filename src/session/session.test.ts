import { EventEmitter } from "node:events";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import fse from "fs-extra";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { readPauseMarker } from "./pause-marker.js";
import type { Disposable, PtyExit, PtyProcess, PtySpawnOptions } from "./pty.js";
import { runInteractiveSession, type SessionIo, type SessionOptions } from "./session.js";

// =============================================================================
// FAKES
// =============================================================================

class FakePty implements PtyProcess {
  readonly pid = 3131;
  readonly written: string[] = [];
  readonly signals: string[] = [];
  private readonly events = new EventEmitter();

  onData(listener: (data: string) => void): Disposable {
    this.events.on("data", listener);
    return { dispose: () => this.events.off("data", listener) };
  }

  onExit(listener: (exit: PtyExit) => void): Disposable {
    this.events.on("exit", listener);
    return { dispose: () => this.events.off("exit", listener) };
  }

  write(data: string): void {
    this.written.push(data);
  }

  resize(): void {}

  kill(signal = "SIGHUP"): void {
    this.signals.push(signal);
  }

  emitData(data: string): void {
    this.events.emit("data", data);
  }

  emitExit(exit: PtyExit): void {
    this.events.emit("exit", exit);
  }
}

class FakeStdin extends EventEmitter {
  isTTY = true;
  readonly rawModes: boolean[] = [];

  setRawMode(mode: boolean): this {
    this.rawModes.push(mode);
    return this;
  }

  resume(): this {
    return this;
  }

  pause(): this {
    return this;
  }
}

// =============================================================================
// TESTS
// =============================================================================

describe("runInteractiveSession", () => {
  let tmpDir: string;
  let promptPath: string;
  let transcriptPath: string;
  let markerPath: string;
  let pty: FakePty;
  let stdin: FakeStdin;
  let stdout: string[];
  let spawns: Array<{ file: string; args: string[]; opts: PtySpawnOptions }>;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "session-"));
    promptPath = path.join(tmpDir, "prompt.md");
    transcriptPath = path.join(tmpDir, "logs", "a.log");
    markerPath = path.join(tmpDir, "logs", "a.paused");
    fs.writeFileSync(promptPath, "Plan the work\n\n");

    pty = new FakePty();
    stdin = new FakeStdin();
    stdout = [];
    spawns = [];
  });

  afterEach(async () => {
    vi.useRealTimers();
    await fse.remove(tmpDir);
  });

  function io(): SessionIo {
    return {
      stdin,
      stdout: { columns: 120, rows: 40, write: (chunk) => stdout.push(chunk) },
      spawnPty: (file, args, opts) => {
        spawns.push({ file, args, opts });
        return pty;
      },
    };
  }

  function options(overrides: Partial<SessionOptions> = {}): SessionOptions {
    return {
      cwd: tmpDir,
      command: "agent --interactive",
      promptPath,
      promptMode: "stdin",
      transcriptPath,
      pauseMarkerPath: markerPath,
      pauseCommand: "/pause",
      pauseGraceSec: 5,
      append: false,
      seed: true,
      env: { TERM: "xterm" },
      ...overrides,
    };
  }

  it("seeds the prompt on stdin and returns the child's exit code", async () => {
    const done = runInteractiveSession(options(), io());

    expect(spawns).toEqual([
      {
        file: "/bin/sh",
        args: ["-c", "agent --interactive"],
        opts: { cwd: tmpDir, env: { TERM: "xterm" }, cols: 120, rows: 40 },
      },
    ]);
    expect(pty.written).toEqual(["Plan the work\n"]);
    expect(stdin.rawModes).toEqual([true]);

    pty.emitData("ready> ");
    pty.emitExit({ exitCode: 3 });

    await expect(done).resolves.toBe(3);
    expect(stdout).toEqual(["ready> "]);
    expect(fs.readFileSync(transcriptPath, "utf8")).toBe("ready> ");
    expect(stdin.rawModes).toEqual([true, false]);
  });

  it("passes the prompt as the final argument in arg mode", async () => {
    const done = runInteractiveSession(options({ promptMode: "arg" }), io());

    expect(spawns[0]?.args).toEqual(["-c", "agent --interactive 'Plan the work'"]);
    expect(pty.written).toEqual([]);

    pty.emitExit({ exitCode: 0 });
    await expect(done).resolves.toBe(0);
  });

  it("does not seed a resumed session that restores its own conversation", async () => {
    const done = runInteractiveSession(options({ seed: false, append: true }), io());

    expect(pty.written).toEqual([]);
    pty.emitExit({ exitCode: 0 });
    await expect(done).resolves.toBe(0);
  });

  it("maps a signal exit to 128 plus the signal number", async () => {
    const done = runInteractiveSession(options(), io());

    pty.emitExit({ exitCode: 0, signal: 15 });

    await expect(done).resolves.toBe(143);
  });

  it("appends to the transcript on resume and truncates otherwise", async () => {
    fse.outputFileSync(transcriptPath, "earlier\n");

    const resumed = runInteractiveSession(options({ append: true }), io());
    pty.emitData("again\n");
    pty.emitExit({ exitCode: 0 });
    await resumed;
    expect(fs.readFileSync(transcriptPath, "utf8")).toBe("earlier\nagain\n");

    pty = new FakePty();
    const fresh = runInteractiveSession(options(), io());
    pty.emitData("fresh\n");
    pty.emitExit({ exitCode: 0 });
    await fresh;
    expect(fs.readFileSync(transcriptPath, "utf8")).toBe("fresh\n");
  });

  it("forwards operator input and records it in the transcript", async () => {
    const done = runInteractiveSession(options({ seed: false }), io());

    stdin.emit("data", Buffer.from("hello\r"));
    pty.emitExit({ exitCode: 0 });

    await expect(done).resolves.toBe(0);
    expect(pty.written).toEqual(["hello\r"]);
    expect(fs.readFileSync(transcriptPath, "utf8")).toBe("hello\r");
    expect(fs.existsSync(markerPath)).toBe(false);
  });

  it("keeps a multi-byte character split across input chunks", async () => {
    const done = runInteractiveSession(options({ seed: false }), io());

    stdin.emit("data", Buffer.from([0xc3]));
    stdin.emit("data", Buffer.from([0xa9, 0x0d]));
    pty.emitExit({ exitCode: 0 });

    await expect(done).resolves.toBe(0);
    expect(pty.written).toEqual(["\u00e9\r"]);
    expect(fs.readFileSync(transcriptPath, "utf8")).toBe("\u00e9\r");
  });

  it("pauses on the pause command, then terminates and kills after the grace period", async () => {
    vi.useFakeTimers();
    const done = runInteractiveSession(options({ seed: false }), io());

    stdin.emit("data", "  /pa");
    stdin.emit("data", "use  \r");

    expect(stdout).toHaveLength(1);
    expect(stdout[0]).toMatch(
      /^\r\n\[PAUSE\] Session paused at \d{4}-\d\d-\d\dT[\d:.]+Z\. Re-run to resume\.\r\n$/,
    );
    expect(readPauseMarker(markerPath)).toMatchObject({ command: "/pause" });

    await vi.advanceTimersByTimeAsync(4_999);
    expect(pty.signals).toEqual([]);

    await vi.advanceTimersByTimeAsync(1);
    expect(pty.signals).toEqual(["SIGTERM"]);

    await vi.advanceTimersByTimeAsync(1_000);
    expect(pty.signals).toEqual(["SIGTERM", "SIGKILL"]);
    await expect(done).resolves.toBe(2);
    expect(stdin.rawModes).toEqual([true, false]);
  });

  it("reports a pause even when the child exits on its own during the grace period", async () => {
    const done = runInteractiveSession(options({ seed: false }), io());

    stdin.emit("data", "/pause\n");
    pty.emitExit({ exitCode: 0 });

    await expect(done).resolves.toBe(2);
    expect(pty.signals).toEqual([]);
  });

  it("ignores the pause command inside other text", async () => {
    const done = runInteractiveSession(options({ seed: false }), io());

    stdin.emit("data", "please /pause now\r");
    pty.emitExit({ exitCode: 0 });

    await expect(done).resolves.toBe(0);
    expect(fs.existsSync(markerPath)).toBe(false);
  });
});
