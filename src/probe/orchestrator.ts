import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { ScriptFragment } from "../types/command.js";
import type { EnvDiff, ProbePhase, ProbeReport } from "../types/snapshot.js";
import { EnvProbeError, EnvProbeErrorCode, describeError } from "../shared/errors.js";
import { LocalExecutor, runScript, type Executor } from "../execution/executor.js";
import { logger } from "../logger.js";
import { resolveStrategy, type ShellStrategy, type StrategyOverrides } from "./presets.js";
import { diffSnapshots, readSnapshotFile } from "./diff.js";

export interface ProbeOptions extends StrategyOverrides {
  /** Extra variables for the spawned interpreter only. */
  env?: Record<string, string>;
  /** Parent directory for the per-call temp directory. Defaults to os.tmpdir(). */
  tempDir?: string;
  timeoutMs?: number;
  signal?: AbortSignal;
  executor?: Executor;
}

const TEMP_PREFIX = "env-probe-";

/** Probe before, the user's input, probe after. */
export function buildCompositeScript(
  strategy: ShellStrategy,
  input: string,
  beforeFile: string,
  afterFile: string,
): ScriptFragment {
  return (
    strategy.compose(strategy.snapshotCommand(beforeFile)) +
    strategy.preprocess(input) +
    strategy.compose(strategy.snapshotCommand(afterFile))
  );
}

async function allocateTempDir(parent: string): Promise<string> {
  try {
    return await mkdtemp(join(parent, TEMP_PREFIX));
  } catch (err) {
    throw new EnvProbeError(EnvProbeErrorCode.TEMP_FILE_FAILED, `Could not create temp directory in ${parent}`, {
      cause: describeError(err),
    });
  }
}

// Removal failures never replace the probe's own result or error.
async function removeTempDir(dir: string): Promise<void> {
  try {
    await rm(dir, { recursive: true, force: true });
  } catch (err) {
    logger.warn({ dir, error: describeError(err) }, "Could not remove probe temp directory");
  }
}

/**
 * Run `input` in the target interpreter and report which environment
 * variables it added or changed. The caller's own environment is untouched.
 */
export async function runProbe(input: string, options: ProbeOptions = {}): Promise<ProbeReport> {
  if (options.signal?.aborted) {
    throw new EnvProbeError(EnvProbeErrorCode.PROBE_ABORTED, "Probe aborted before start");
  }
  const strategy = resolveStrategy(options);
  const executor = options.executor ?? new LocalExecutor();

  const state: { phase: ProbePhase } = { phase: "init" };
  const enter = (next: ProbePhase): void => {
    logger.debug({ interpreter: strategy.interpreter, from: state.phase, to: next }, "Probe phase");
    state.phase = next;
  };

  let dir: string;
  try {
    dir = await allocateTempDir(options.tempDir ?? tmpdir());
  } catch (err) {
    enter("failed");
    throw err;
  }
  const beforeFile = join(dir, "before.json");
  const afterFile = join(dir, "after.json");

  try {
    enter("composing");
    const script = buildCompositeScript(strategy, input, beforeFile, afterFile);

    enter("executing");
    const result = await runScript(executor, strategy, script, {
      env: options.env,
      signal: options.signal,
      timeoutMs: options.timeoutMs,
    });

    enter("parsing");
    const before = await readSnapshotFile(beforeFile);
    const after = await readSnapshotFile(afterFile);

    enter("diffing");
    const changed = diffSnapshots(before, after);

    enter("cleaning-up");
    await removeTempDir(dir);
    enter("done");
    return {
      changed,
      interpreter: strategy.interpreter,
      stdout: result.stdout,
      stderr: result.stderr,
      durationMs: result.durationMs,
    };
  } catch (err) {
    logger.debug({ interpreter: strategy.interpreter, phase: state.phase, error: describeError(err) }, "Probe failed");
    enter("cleaning-up");
    await removeTempDir(dir);
    enter("failed");
    throw err;
  }
}

/** The changed variables only. */
export async function probeEnv(input: string, options: ProbeOptions = {}): Promise<EnvDiff> {
  const report = await runProbe(input, options);
  return report.changed;
}
