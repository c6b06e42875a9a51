/** Point-in-time capture of every environment variable visible to a process. */
export type EnvSnapshot = Record<string, string>;

/**
 * Variables present after the script ran that were absent before or held a
 * different value. Removed variables never appear here.
 */
export type EnvDiff = Record<string, string>;

export type ProbePhase =
  | "init"
  | "composing"
  | "executing"
  | "parsing"
  | "diffing"
  | "cleaning-up"
  | "done"
  | "failed";

/** Full outcome of one probe run. */
export interface ProbeReport {
  readonly changed: EnvDiff;
  readonly interpreter: string;
  readonly stdout: string;
  readonly stderr: string;
  readonly durationMs: number;
}
