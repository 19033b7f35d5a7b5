import fs from "node:fs";
import path from "node:path";

import fse from "fs-extra";
import yaml from "js-yaml";
import { z } from "zod";

const PauseMarkerSchema = z.object({
  paused_at: z.string(),
  reason: z.string().default(""),
  command: z.string().default(""),
});

export type PauseMarker = z.infer<typeof PauseMarkerSchema>;

export function formatPauseMarker(marker: PauseMarker): string {
  return yaml.dump(marker, { schema: yaml.FAILSAFE_SCHEMA, lineWidth: -1 });
}

export function writePauseMarker(markerPath: string, marker: PauseMarker): void {
  fse.ensureDirSync(path.dirname(markerPath));
  fs.writeFileSync(markerPath, formatPauseMarker(marker), "utf8");
}

/**
 * Null when the marker is absent. A marker that exists but does not parse still
 * counts as a pause, with the raw text kept as the reason.
 */
export function readPauseMarker(markerPath: string): PauseMarker | null {
  if (!fs.existsSync(markerPath)) return null;

  const raw = fs.readFileSync(markerPath, "utf8");
  let doc: unknown;
  try {
    // Failsafe keeps paused_at a string instead of a Date.
    doc = yaml.load(raw, { schema: yaml.FAILSAFE_SCHEMA });
  } catch {
    doc = null;
  }

  const parsed = PauseMarkerSchema.safeParse(doc);
  if (parsed.success) return parsed.data;
  return { paused_at: "", reason: raw.trim(), command: "" };
}

export function pauseMarkerExists(markerPath: string | undefined): boolean {
  return markerPath !== undefined && fs.existsSync(markerPath);
}

/** Reads and deletes the marker so the next start of the task counts as a resume. */
export function consumePauseMarker(markerPath: string): PauseMarker | null {
  const marker = readPauseMarker(markerPath);
  if (marker) {
    fse.removeSync(markerPath);
  }
  return marker;
}
