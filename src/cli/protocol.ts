import type { ProjectConfig } from "../core/config.js";
import { runProtocol } from "../core/coordinator.js";
import type { Phase } from "../core/task-graph.js";

export async function protocolCommand(
  config: ProjectConfig,
  opts: { phase?: Phase },
): Promise<number> {
  return runProtocol({ config, phase: opts.phase });
}
