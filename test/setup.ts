import { afterEach, beforeEach } from "vitest";

// =============================================================================
// PHASEGATE_* ENV ISOLATION
// =============================================================================

const ENV_PREFIX = "PHASEGATE_";

let snapshot: Record<string, string | undefined> = {};

function captureEnv(): Record<string, string | undefined> {
  const captured: Record<string, string | undefined> = {};
  for (const [key, value] of Object.entries(process.env)) {
    if (key.startsWith(ENV_PREFIX)) {
      captured[key] = value;
    }
  }
  return captured;
}

beforeEach(() => {
  snapshot = captureEnv();
  for (const key of Object.keys(snapshot)) {
    delete process.env[key];
  }
});

afterEach(() => {
  for (const key of Object.keys(process.env)) {
    if (key.startsWith(ENV_PREFIX)) {
      delete process.env[key];
    }
  }
  for (const [key, value] of Object.entries(snapshot)) {
    if (value !== undefined) {
      process.env[key] = value;
    }
  }
});
