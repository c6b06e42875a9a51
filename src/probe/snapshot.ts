// Probe commands: each one, run by the target shell, writes the environment it
// inherited to a JSON file. Most shells cannot serialize structured data, so
// the default probe borrows the host Node.js binary as the serializer.
import type { Command } from "../types/command.js";
import { powershellLiteral } from "./compose.js";

/**
 * Program run by `node -e`. It contains no quote characters so it survives
 * single-quoting in every supported shell; `process.argv[1]` is the first
 * argument after the program text.
 */
export const NODE_PROBE_SOURCE =
  "require(`node:fs`).writeFileSync(process.argv[1],JSON.stringify(process.env))";

export function nodeProbeCommand(targetFile: string): Command {
  return { argv: [process.execPath, "-e", NODE_PROBE_SOURCE, targetFile] };
}

/** PowerShell source that serializes `env:` to `targetFile`. */
export function powershellProbeSource(targetFile: string): string {
  return [
    "$vars = [ordered]@{}",
    "Get-ChildItem env: | ForEach-Object { $vars[$_.Name] = $_.Value }",
    `$vars | ConvertTo-Json -Compress | Set-Content -LiteralPath ${powershellLiteral(targetFile)} -Encoding utf8`,
  ].join("; ");
}

/**
 * Self-probe for PowerShell: a second instance of the same interpreter runs
 * the serializer. `-EncodedCommand` takes UTF-16LE base64, so the source
 * never passes through native-argument quoting.
 */
export function powershellProbeCommand(interpreter: string): (targetFile: string) => Command {
  return (targetFile) => ({
    argv: [
      interpreter,
      "-NoProfile",
      "-NonInteractive",
      "-EncodedCommand",
      Buffer.from(powershellProbeSource(targetFile), "utf16le").toString("base64"),
    ],
  });
}
