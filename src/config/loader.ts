// Config loader: reads ~/.config/shell-env-probe/config.yaml and fills gaps from defaults.
// On first run (no config file) it writes DEFAULT_CONFIG_YAML and returns firstRun: true.
// Invalid YAML or out-of-schema values are logged and replaced by defaults.
import { readFileSync, writeFileSync, mkdirSync, existsSync } from "node:fs";
import { join, dirname } from "node:path";
import { homedir } from "node:os";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import type { ProbeConfig } from "../types/config.js";
import { SHELL_NAMES } from "../probe/presets.js";
import { DEFAULT_APPLY_EXCLUDES } from "../probe/apply-filter.js";
import { describeError } from "../shared/errors.js";
import { logger } from "../logger.js";

const DEFAULT_CONFIG_DIR = join(homedir(), ".config", "shell-env-probe");
const DEFAULT_CONFIG_PATH = join(DEFAULT_CONFIG_DIR, "config.yaml");

export const DEFAULT_CONFIG: ProbeConfig = {
  shell: "sh",
  interpreter: null,
  temp_dir: null,
  timeout_ms: 0,
  apply_exclude: [...DEFAULT_APPLY_EXCLUDES],
};

/** Default config YAML written on first run. */
const DEFAULT_CONFIG_YAML = `# shell-env-probe configuration
# Generated automatically on first run. All values shown are defaults.

# Target shell preset: sh | bash | zsh | fish | pwsh | powershell
shell: sh

# Interpreter path; null uses the preset name looked up on PATH
interpreter: null

# Parent directory for per-probe temp files; null uses the OS temp directory
temp_dir: null

# Kill the interpreter after this many milliseconds; 0 waits indefinitely
timeout_ms: 0

# Variables reported but not marked for applying
apply_exclude:
${DEFAULT_APPLY_EXCLUDES.map((name) => `  - "${name}"`).join("\n")}
`;

const ConfigSchema = z
  .object({
    shell: z.enum(SHELL_NAMES),
    interpreter: z.string().min(1).nullable(),
    temp_dir: z.string().min(1).nullable(),
    timeout_ms: z.number().int().nonnegative(),
    apply_exclude: z.array(z.string()),
  })
  .partial()
  .strict();

export interface ConfigResult {
  config: ProbeConfig;
  configPath: string;
  firstRun: boolean;
}

export function loadConfig(explicitPath?: string): ConfigResult {
  const configPath = explicitPath ?? DEFAULT_CONFIG_PATH;

  if (!existsSync(configPath)) {
    logger.info({ configPath }, "No config file found, generating defaults (first run)");
    try {
      mkdirSync(dirname(configPath), { recursive: true });
      writeFileSync(configPath, DEFAULT_CONFIG_YAML, "utf-8");
    } catch (err) {
      logger.warn({ configPath, error: describeError(err) }, "Could not write default config file");
    }
    return { config: defaults(), configPath, firstRun: true };
  }

  let raw: unknown;
  try {
    raw = parseYaml(readFileSync(configPath, "utf-8"));
  } catch (err) {
    logger.error({ configPath, error: describeError(err) }, "Failed to parse config, using defaults");
    return { config: defaults(), configPath, firstRun: false };
  }

  const parsed = ConfigSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    logger.error(
      { configPath, issues: parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`) },
      "Invalid config, using defaults",
    );
    return { config: defaults(), configPath, firstRun: false };
  }

  const config: ProbeConfig = { ...defaults() };
  if (parsed.data.shell !== undefined) config.shell = parsed.data.shell;
  if (parsed.data.interpreter !== undefined) config.interpreter = parsed.data.interpreter;
  if (parsed.data.temp_dir !== undefined) config.temp_dir = parsed.data.temp_dir;
  if (parsed.data.timeout_ms !== undefined) config.timeout_ms = parsed.data.timeout_ms;
  if (parsed.data.apply_exclude !== undefined) config.apply_exclude = parsed.data.apply_exclude;
  return { config, configPath, firstRun: false };
}

function defaults(): ProbeConfig {
  return { ...DEFAULT_CONFIG, apply_exclude: [...DEFAULT_CONFIG.apply_exclude] };
}
