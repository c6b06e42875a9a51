import type { ShellName } from "../probe/presets.js";

/** On-disk configuration for the MCP server. */
export interface ProbeConfig {
  shell: ShellName;
  interpreter: string | null;
  temp_dir: string | null;
  timeout_ms: number;
  apply_exclude: string[];
}
