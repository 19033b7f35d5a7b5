import { ConfigError } from "./errors.js";

// =============================================================================
// PLACEHOLDERS
// =============================================================================

export const PATH_PLACEHOLDERS = ["run_id", "phase", "task"] as const;
export type PathPlaceholder = (typeof PATH_PLACEHOLDERS)[number];
export type PathTemplateContext = Record<PathPlaceholder, string>;

export const COMMAND_PLACEHOLDERS = [...PATH_PLACEHOLDERS, "prompt"] as const;
export type CommandPlaceholder = (typeof COMMAND_PLACEHOLDERS)[number];
export type CommandTemplateContext = Record<CommandPlaceholder, string>;

export const REPORT_PLACEHOLDERS = ["run_id", "phase", "framework_version", "flags"] as const;
export type ReportPlaceholder = (typeof REPORT_PLACEHOLDERS)[number];

// `${VAR}` is left for the shell.
const PLACEHOLDER_PATTERN = /(?<!\$)\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

// =============================================================================
// RESOLUTION
// =============================================================================

export function findUnknownPlaceholders(
  template: string,
  allowed: readonly string[] = PATH_PLACEHOLDERS,
): string[] {
  const unknown: string[] = [];
  for (const match of template.matchAll(PLACEHOLDER_PATTERN)) {
    const key = match[1];
    if (!allowed.includes(key) && !unknown.includes(key)) {
      unknown.push(key);
    }
  }
  return unknown;
}

export function resolveTemplate<K extends string>(
  template: string,
  values: Record<K, string>,
): string {
  const allowed: string[] = Object.keys(values);
  const unknown = findUnknownPlaceholders(template, allowed);
  if (unknown.length > 0) {
    throw new ConfigError(
      `Unknown template key {${unknown[0]}} in value: ${template} (allowed: ${allowed
        .map((key) => `{${key}}`)
        .join(", ")})`,
    );
  }

  const lookup = new Map<string, string>(Object.entries<string>(values));
  return template.replace(PLACEHOLDER_PATTERN, (whole, key: string) => lookup.get(key) ?? whole);
}

export function resolvePathTemplate(template: string, context: PathTemplateContext): string {
  return resolveTemplate<PathPlaceholder>(template, context);
}
