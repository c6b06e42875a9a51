export enum EnvProbeErrorCode {
  SPAWN_FAILED = "SPAWN_FAILED",
  EXECUTION_FAILED = "EXECUTION_FAILED",
  SNAPSHOT_PARSE_FAILED = "SNAPSHOT_PARSE_FAILED",
  TEMP_FILE_FAILED = "TEMP_FILE_FAILED",
  PROBE_ABORTED = "PROBE_ABORTED",
}

export class EnvProbeError extends Error {
  readonly code: EnvProbeErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: EnvProbeErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = "EnvProbeError";
    this.code = code;
    this.context = context;
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
