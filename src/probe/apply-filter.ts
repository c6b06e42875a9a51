import type { EnvDiff } from "../types/snapshot.js";

/**
 * Names a consumer normally leaves alone when loading a diff into its own
 * environment. The probe never filters; this is for the consumer to apply.
 */
export const DEFAULT_APPLY_EXCLUDES: readonly string[] = [
  "PWD",
  "OLDPWD",
  "SHLVL",
  "_",
  "LOG_LEVEL",
  "ENV_PROBE_CONFIG",
];

export interface ApplySplit {
  readonly apply: EnvDiff;
  readonly skipped: string[];
}

export function filterForApply(diff: EnvDiff, excludes: readonly string[] = DEFAULT_APPLY_EXCLUDES): ApplySplit {
  const excluded = new Set(excludes);
  const apply: [string, string][] = [];
  const skipped: string[] = [];
  for (const [name, value] of Object.entries(diff)) {
    if (excluded.has(name)) {
      skipped.push(name);
    } else {
      apply.push([name, value]);
    }
  }
  return { apply: Object.fromEntries(apply), skipped };
}
