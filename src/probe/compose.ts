import type { Command, ScriptFragment } from "../types/command.js";

/**
 * Default composer for POSIX shells and fish: each token in single quotes,
 * space separated, one line.
 *
 * Tokens are not escaped. A token containing `'` closes the quote early, so
 * `["echo", "it's"]` becomes `'echo' 'it's'` and every later quote in the
 * script is out of step. Only compose tokens the caller controls.
 */
export function composeCommand(command: Command): ScriptFragment {
  return command.argv.map((token) => `'${token}'`).join(" ") + "\n";
}

/** Quote a PowerShell literal string; `'` is doubled inside single quotes. */
export function powershellLiteral(token: string): string {
  return `'${token.replaceAll("'", "''")}'`;
}

/** PowerShell needs the call operator to run a quoted command name. */
export function composePowerShell(command: Command): ScriptFragment {
  return "& " + command.argv.map(powershellLiteral).join(" ") + "\n";
}
