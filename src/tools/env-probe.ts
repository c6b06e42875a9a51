import { z } from "zod";
import type { ProbeConfig } from "../types/config.js";
import type { EnvDiff } from "../types/snapshot.js";
import type { Executor } from "../execution/executor.js";
import { EnvProbeError, describeError } from "../shared/errors.js";
import { SHELL_NAMES, inferShellName, type ShellName } from "../probe/presets.js";
import { runProbe } from "../probe/orchestrator.js";
import { filterForApply } from "../probe/apply-filter.js";
import { logger } from "../logger.js";

export const TOOL_NAME = "env_probe";

export const EnvProbeInputSchema = z.object({
  script: z.string().describe("Script text to run in the target shell"),
  shell: z.enum(SHELL_NAMES).optional().describe("Shell preset; inferred from interpreter when omitted"),
  interpreter: z.string().min(1).optional().describe("Interpreter path or name on PATH"),
  env: z.record(z.string(), z.string()).optional().describe("Extra variables for the spawned shell only"),
  apply_filter: z
    .boolean()
    .default(true)
    .describe("Move conventionally skipped names (PWD, SHLVL, ...) from `changed` to `skipped`"),
});

export interface ToolContext {
  readonly config: ProbeConfig;
  readonly executor?: Executor;
}

export interface EnvProbeSuccess {
  status: "success";
  tool: typeof TOOL_NAME;
  shell: ShellName;
  interpreter: string;
  duration_ms: number;
  changed: EnvDiff;
  skipped: string[];
  stderr: string;
}

export interface EnvProbeFailure {
  status: "error";
  tool: typeof TOOL_NAME;
  error_code: string;
  message: string;
  context: Record<string, unknown>;
}

export type EnvProbeResponse = EnvProbeSuccess | EnvProbeFailure;

function failure(code: string, message: string, context: Record<string, unknown> = {}): EnvProbeFailure {
  return { status: "error", tool: TOOL_NAME, error_code: code, message, context };
}

/** Explicit shell/interpreter in the call win over the configured target. */
function resolveTarget(input: z.output<typeof EnvProbeInputSchema>, config: ProbeConfig): { shell: ShellName; interpreter?: string } {
  if (input.shell !== undefined || input.interpreter !== undefined) {
    return {
      shell: input.shell ?? inferShellName(input.interpreter ?? "sh"),
      interpreter: input.interpreter,
    };
  }
  return { shell: config.shell, interpreter: config.interpreter ?? undefined };
}

export async function handleEnvProbe(args: unknown, ctx: ToolContext): Promise<EnvProbeResponse> {
  const parsed = EnvProbeInputSchema.safeParse(args);
  if (!parsed.success) {
    return failure("INVALID_INPUT", "Invalid env_probe arguments", {
      issues: parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
    });
  }
  const input = parsed.data;
  const target = resolveTarget(input, ctx.config);

  try {
    const report = await runProbe(input.script, {
      shell: target.shell,
      interpreter: target.interpreter,
      env: input.env,
      tempDir: ctx.config.temp_dir ?? undefined,
      timeoutMs: ctx.config.timeout_ms,
      executor: ctx.executor,
    });
    const { apply, skipped } = input.apply_filter
      ? filterForApply(report.changed, ctx.config.apply_exclude)
      : { apply: report.changed, skipped: [] };
    return {
      status: "success",
      tool: TOOL_NAME,
      shell: target.shell,
      interpreter: report.interpreter,
      duration_ms: report.durationMs,
      changed: apply,
      skipped,
      stderr: report.stderr,
    };
  } catch (err) {
    if (err instanceof EnvProbeError) {
      logger.error({ tool: TOOL_NAME, code: err.code, error: err.message }, "Probe failed");
      return failure(err.code, err.message, err.context ?? {});
    }
    logger.error({ tool: TOOL_NAME, error: describeError(err) }, "Tool execution error");
    return failure("INTERNAL_ERROR", describeError(err));
  }
}
