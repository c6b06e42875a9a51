// Process execution layer: the probe's only contact with the OS.
// LocalExecutor spawns the target interpreter; runScript wraps a composite
// script with the strategy's run command and no-op epilogue and turns a
// non-zero exit into an error. Nothing here retries.
import { execFile } from "node:child_process";
import type { Command, ScriptFragment } from "../types/command.js";
import type { ShellStrategy } from "../probe/presets.js";
import { EnvProbeError, EnvProbeErrorCode } from "../shared/errors.js";
import { logger } from "../logger.js";

/** Result of command execution. */
export interface ExecResult {
  readonly stdout: string;
  readonly stderr: string;
  readonly exitCode: number;
  readonly signal?: string;
  readonly durationMs: number;
}

export interface ExecOptions {
  readonly signal?: AbortSignal;
  /** 0 or absent means wait indefinitely. */
  readonly timeoutMs?: number;
}

/** Executor interface; tests supply an in-memory implementation. */
export interface Executor {
  execute(command: Command, options?: ExecOptions): Promise<ExecResult>;
}

/** Local executor using child_process. */
export class LocalExecutor implements Executor {
  async execute(command: Command, options: ExecOptions = {}): Promise<ExecResult> {
    if (command.argv.length === 0) {
      throw new EnvProbeError(EnvProbeErrorCode.SPAWN_FAILED, "Cannot spawn an empty command");
    }
    const start = performance.now();
    const [cmd, ...args] = command.argv;

    return new Promise<ExecResult>((resolve, reject) => {
      const child = execFile(
        cmd,
        args,
        {
          timeout: options.timeoutMs ?? 0,
          signal: options.signal,
          // 10MB ceiling for whatever the user's script prints.
          maxBuffer: 10 * 1024 * 1024,
          env: command.env ? { ...process.env, ...command.env } : process.env,
          windowsHide: true,
          encoding: "utf8",
        },
        (error, stdout, stderr) => {
          const durationMs = Math.round(performance.now() - start);
          if (!error) {
            resolve({ stdout, stderr, exitCode: 0, durationMs });
            return;
          }
          const code: unknown = error.code;
          if (typeof code === "number") {
            resolve({ stdout, stderr, exitCode: code, durationMs });
          } else if (error.name === "AbortError") {
            reject(new EnvProbeError(EnvProbeErrorCode.PROBE_ABORTED, `Probe aborted: ${cmd}`, { stdout, stderr }));
          } else if (code === "ERR_CHILD_PROCESS_STDIO_MAXBUFFER") {
            reject(new EnvProbeError(EnvProbeErrorCode.EXECUTION_FAILED, `Output limit exceeded: ${cmd}`, { stderr }));
          } else if (error.signal) {
            resolve({ stdout, stderr, exitCode: 128, signal: error.signal, durationMs });
          } else {
            reject(
              new EnvProbeError(EnvProbeErrorCode.SPAWN_FAILED, `Command failed to spawn: ${cmd}`, {
                cause: error.message,
                errno: typeof code === "string" ? code : undefined,
              }),
            );
          }
        },
      );
      // Nothing is ever written to the script's stdin; a reader gets EOF.
      child.stdin?.end();
    });
  }
}

export interface RunScriptOptions extends ExecOptions {
  /** Extra variables for the child, layered over the caller's environment. */
  readonly env?: Record<string, string>;
}

/**
 * Run a composite script in the strategy's interpreter. The no-op epilogue
 * keeps the final probe from being the script's last command: shells such as
 * bash exec the last command of `-c` in place, which would give that probe a
 * different SHLVL than the first one.
 */
export async function runScript(
  executor: Executor,
  strategy: ShellStrategy,
  script: ScriptFragment,
  options: RunScriptOptions = {},
): Promise<ExecResult> {
  const base = strategy.runCommand(strategy.interpreter, script + strategy.compose(strategy.noopCommand));
  const command: Command = options.env ? { argv: base.argv, env: { ...base.env, ...options.env } } : base;

  const result = await executor.execute(command, { signal: options.signal, timeoutMs: options.timeoutMs });
  logger.debug(
    { interpreter: strategy.interpreter, exitCode: result.exitCode, durationMs: result.durationMs },
    "Interpreter exited",
  );
  if (result.stderr) {
    logger.debug({ interpreter: strategy.interpreter, stderr: result.stderr }, "Interpreter stderr");
  }
  if (result.exitCode !== 0) {
    throw new EnvProbeError(
      EnvProbeErrorCode.EXECUTION_FAILED,
      `Interpreter exited with ${result.exitCode}: ${strategy.interpreter}`,
      {
        interpreter: strategy.interpreter,
        exitCode: result.exitCode,
        signal: result.signal,
        stdout: result.stdout,
        stderr: result.stderr,
      },
    );
  }
  return result;
}
