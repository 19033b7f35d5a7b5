import fs from "node:fs";
import path from "node:path";

export type PathLookupDeps = {
  env?: NodeJS.ProcessEnv;
  isExecutable?: (filePath: string) => boolean;
};

function defaultIsExecutable(filePath: string): boolean {
  try {
    fs.accessSync(filePath, fs.constants.X_OK);
    return fs.statSync(filePath).isFile();
  } catch {
    return false;
  }
}

export function findOnPath(command: string, deps: PathLookupDeps = {}): string | null {
  const env = deps.env ?? process.env;
  const isExecutable = deps.isExecutable ?? defaultIsExecutable;

  if (command.includes("/")) {
    return isExecutable(command) ? command : null;
  }

  const dirs = (env.PATH ?? "").split(path.delimiter).filter((dir) => dir.length > 0);
  for (const dir of dirs) {
    const candidate = path.join(dir, command);
    if (isExecutable(candidate)) return candidate;
  }
  return null;
}

const ASSIGNMENT = /^[A-Za-z_][A-Za-z0-9_]*=/;

/**
 * The program a shell command line would run: the first word after any leading
 * `NAME=value` assignments, with simple quoting removed. Null for empty input or
 * an unterminated quote.
 */
export function firstShellWord(commandLine: string): string | null {
  let current = "";
  let inWord = false;
  let quote: "'" | '"' | null = null;

  for (let i = 0; i < commandLine.length; i += 1) {
    const ch = commandLine[i];
    if (quote) {
      if (ch === quote) {
        quote = null;
      } else if (ch === "\\" && quote === '"' && i + 1 < commandLine.length) {
        i += 1;
        current += commandLine[i];
      } else {
        current += ch;
      }
      continue;
    }

    if (ch === "'" || ch === '"') {
      quote = ch;
      inWord = true;
    } else if (ch === "\\" && i + 1 < commandLine.length) {
      i += 1;
      current += commandLine[i];
      inWord = true;
    } else if (/\s/.test(ch)) {
      if (inWord) {
        if (!ASSIGNMENT.test(current)) return current;
        current = "";
        inWord = false;
      }
    } else {
      current += ch;
      inWord = true;
    }
  }

  if (quote) return null;
  return inWord && !ASSIGNMENT.test(current) ? current : null;
}
