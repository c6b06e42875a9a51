import { win32 } from "node:path";
import type { Command, ScriptFragment } from "../types/command.js";
import { composeCommand, composePowerShell } from "./compose.js";
import { ensureTrailingNewline } from "./preprocess.js";
import { nodeProbeCommand, powershellProbeCommand } from "./snapshot.js";

export const SHELL_NAMES = ["sh", "bash", "zsh", "fish", "pwsh", "powershell"] as const;
export type ShellName = (typeof SHELL_NAMES)[number];

/**
 * Everything the orchestrator needs to know about a target interpreter.
 * Each slot has a preset default and can be replaced individually.
 */
export interface ShellStrategy {
  readonly interpreter: string;
  /** Command that runs a whole script inside `interpreter`. */
  readonly runCommand: (interpreter: string, script: ScriptFragment) => Command;
  readonly compose: (command: Command) => ScriptFragment;
  readonly preprocess: (input: string) => string;
  /** Command that writes the current environment to `targetFile` as JSON. */
  readonly snapshotCommand: (targetFile: string) => Command;
  /** Fixed epilogue appended after the final probe. */
  readonly noopCommand: Command;
}

export type StrategyOverrides = Partial<ShellStrategy> & { shell?: ShellName };

function runWithDashC(interpreter: string, script: ScriptFragment): Command {
  return { argv: [interpreter, "-c", script] };
}

function runPowerShell(interpreter: string, script: ScriptFragment): Command {
  return { argv: [interpreter, "-NoProfile", "-NonInteractive", "-Command", script] };
}

function posixStrategy(interpreter: string): ShellStrategy {
  return {
    interpreter,
    runCommand: runWithDashC,
    compose: composeCommand,
    preprocess: ensureTrailingNewline,
    snapshotCommand: nodeProbeCommand,
    noopCommand: { argv: ["true"] },
  };
}

function powershellStrategy(interpreter: string): ShellStrategy {
  return {
    interpreter,
    runCommand: runPowerShell,
    compose: composePowerShell,
    preprocess: ensureTrailingNewline,
    snapshotCommand: powershellProbeCommand(interpreter),
    noopCommand: { argv: ["Out-Null"] },
  };
}

// fish quotes like sh for everything the node probe emits, so it shares the preset.
export const PRESETS: Record<ShellName, (interpreter: string) => ShellStrategy> = {
  sh: posixStrategy,
  bash: posixStrategy,
  zsh: posixStrategy,
  fish: posixStrategy,
  pwsh: powershellStrategy,
  powershell: powershellStrategy,
};

export function isShellName(value: string): value is ShellName {
  return (SHELL_NAMES as readonly string[]).includes(value);
}

/** Guess the preset from an interpreter path, e.g. `/usr/bin/zsh` or `pwsh.exe`. */
export function inferShellName(interpreter: string): ShellName {
  const base = win32.basename(interpreter).toLowerCase().replace(/\.exe$/, "");
  return isShellName(base) ? base : "sh";
}

/**
 * Pick the preset named by `shell` (or inferred from `interpreter`, falling
 * back to `sh`) and overlay any slots the caller supplied.
 */
export function resolveStrategy(overrides: StrategyOverrides = {}): ShellStrategy {
  const shell = overrides.shell ?? (overrides.interpreter ? inferShellName(overrides.interpreter) : "sh");
  const interpreter = overrides.interpreter ?? shell;
  const preset = PRESETS[shell](interpreter);
  return {
    interpreter,
    runCommand: overrides.runCommand ?? preset.runCommand,
    compose: overrides.compose ?? preset.compose,
    preprocess: overrides.preprocess ?? preset.preprocess,
    snapshotCommand: overrides.snapshotCommand ?? preset.snapshotCommand,
    noopCommand: overrides.noopCommand ?? preset.noopCommand,
  };
}
