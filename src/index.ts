export type { Command, ScriptFragment } from "./types/command.js";
export type { EnvSnapshot, EnvDiff, ProbePhase, ProbeReport } from "./types/snapshot.js";
export type { ProbeConfig } from "./types/config.js";
export { EnvProbeError, EnvProbeErrorCode } from "./shared/errors.js";
export { composeCommand, composePowerShell, powershellLiteral } from "./probe/compose.js";
export { ensureTrailingNewline } from "./probe/preprocess.js";
export { NODE_PROBE_SOURCE, nodeProbeCommand, powershellProbeCommand } from "./probe/snapshot.js";
export {
  PRESETS,
  SHELL_NAMES,
  inferShellName,
  isShellName,
  resolveStrategy,
  type ShellName,
  type ShellStrategy,
  type StrategyOverrides,
} from "./probe/presets.js";
export { diffSnapshots, parseSnapshot, readSnapshotFile } from "./probe/diff.js";
export { buildCompositeScript, probeEnv, runProbe, type ProbeOptions } from "./probe/orchestrator.js";
export { DEFAULT_APPLY_EXCLUDES, filterForApply, type ApplySplit } from "./probe/apply-filter.js";
export { LocalExecutor, runScript, type ExecOptions, type ExecResult, type Executor } from "./execution/executor.js";
export { loadConfig, DEFAULT_CONFIG, type ConfigResult } from "./config/loader.js";
