import type { ProjectConfig } from "../core/config.js";
import { StallWatchdog, resolveWatchdogSettings } from "../watchdog/watchdog.js";

export type WatchCommandOptions = {
  pid: number;
  debug: boolean;
};

/** Watches the scheduler until it exits, its run ends or a stall is detected. */
export async function watchCommand(config: ProjectConfig, opts: WatchCommandOptions): Promise<number> {
  const watchdog = new StallWatchdog({
    pid: opts.pid,
    logsDir: config.logs_dir,
    settings: resolveWatchdogSettings(config.watchdog),
    debug: opts.debug,
  });
  const outcome = await watchdog.run();
  return outcome === "stalled" ? 1 : 0;
}
