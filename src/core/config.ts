import { z } from "zod";

import { PHASES } from "./task-graph.js";

// =============================================================================
// SCHEMAS
// =============================================================================

export const PhaseSchema = z.enum(PHASES);

export const RunnerSchema = z
  .object({
    command: z.string().min(1),
    resume_command: z.string().min(1).optional(),
    // Declares that resume_command reattaches to the runner's previous session.
    supports_session_attach: z.boolean().default(false),
    prompt_mode: z.enum(["stdin", "arg"]).default("stdin"),
  })
  .strict()
  .superRefine((runner, ctx) => {
    if (runner.supports_session_attach && !runner.resume_command) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["resume_command"],
        message: "resume_command is required when supports_session_attach is true",
      });
    }
  });

const SchedulerSchema = z
  .object({
    tick_interval_ms: z.number().int().nonnegative().default(1000),
    progress_interval_sec: z.number().nonnegative().default(30),
  })
  .strict();

const SessionSchema = z
  .object({
    pause_command: z.string().min(1).default("/pause"),
    pause_grace_sec: z.number().nonnegative().default(20),
  })
  .strict();

const WatchdogSchema = z
  .object({
    stall_timeout_sec: z.number().nonnegative().default(900),
    poll_interval_sec: z.number().positive().default(2),
    status_interval_sec: z.number().nonnegative().default(10),
    kill_on_stall: z.boolean().default(true),
  })
  .strict();

const ReportingSchema = z
  .object({
    enabled: z.boolean().default(false),
    phases: z.array(PhaseSchema).default(["legacy", "post", "main"]),
    // Placeholders: {run_id} {phase} {framework_version} {flags}
    command: z.string().min(1).optional(),
    flags: z.array(z.string()).default([]),
  })
  .strict();

export const ProjectConfigSchema = z
  .object({
    project_root: z.string().min(1).default("."),
    logs_dir: z.string().min(1).default("logs"),
    version_file: z.string().min(1).default("VERSION"),

    runners: z.record(RunnerSchema).default({}),

    // Validated by normalizeTasks so task errors read the same from every entrypoint.
    tasks: z.unknown().default([]),

    scheduler: SchedulerSchema.default({}),
    session: SessionSchema.default({}),
    watchdog: WatchdogSchema.default({}),
    reporting: ReportingSchema.default({}),
  })
  .strict();

export type RunnerConfig = z.infer<typeof RunnerSchema>;
export type SchedulerConfig = z.infer<typeof SchedulerSchema>;
export type SessionConfig = z.infer<typeof SessionSchema>;
export type WatchdogConfig = z.infer<typeof WatchdogSchema>;
export type ReportingConfig = z.infer<typeof ReportingSchema>;

export type ProjectConfig = z.infer<typeof ProjectConfigSchema> & {
  // Absolute path of the file the config was loaded from.
  config_path: string;
};
