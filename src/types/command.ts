/**
 * A structured command: an ordered token list plus optional extra environment.
 * Probe strategies never build raw command strings. They produce Command
 * objects, and the composer turns those into interpreter source.
 */
export interface Command {
  readonly argv: readonly string[];
  /** Layered over the caller's environment by the executor only. */
  readonly env?: Record<string, string>;
}

/** Interpreter-specific source text, one or more complete lines. */
export type ScriptFragment = string;
