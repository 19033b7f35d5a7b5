import path from "node:path";

import type { ProjectConfig } from "../core/config.js";
import { discoverConfigPath, loadProjectConfig } from "../core/config-loader.js";

// =============================================================================
// CONFIG DISCOVERY (CLI)
// =============================================================================

export type LoadConfigForCliArgs = {
  explicitConfigPath?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
};

/** `--config` when given, else the first phasegate.{yaml,yml,json} in the working directory. */
export function loadConfigForCli(args: LoadConfigForCliArgs = {}): {
  config: ProjectConfig;
  configPath: string;
} {
  const cwd = args.cwd ?? process.cwd();
  const configPath = args.explicitConfigPath
    ? path.resolve(cwd, args.explicitConfigPath)
    : discoverConfigPath(cwd);

  const config = loadProjectConfig(configPath, args.env ?? process.env);
  return { config, configPath };
}
