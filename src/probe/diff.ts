import { readFile } from "node:fs/promises";
import { z } from "zod";
import type { EnvDiff, EnvSnapshot } from "../types/snapshot.js";
import { EnvProbeError, EnvProbeErrorCode, describeError } from "../shared/errors.js";

// Validated as entries so a variable named `__proto__` stays an own key.
const SnapshotEntriesSchema = z.array(z.tuple([z.string(), z.string()]));

function notFlat(source: string, issues: string[]): EnvProbeError {
  return new EnvProbeError(EnvProbeErrorCode.SNAPSHOT_PARSE_FAILED, `Snapshot is not a flat string map: ${source}`, {
    file: source,
    issues,
  });
}

/** Parse probe output. Windows PowerShell prefixes a UTF-8 BOM, which is dropped. */
export function parseSnapshot(raw: string, source: string): EnvSnapshot {
  let data: unknown;
  try {
    data = JSON.parse(raw.replace(/^\uFEFF/, ""));
  } catch (err) {
    throw new EnvProbeError(EnvProbeErrorCode.SNAPSHOT_PARSE_FAILED, `Snapshot is not valid JSON: ${source}`, {
      file: source,
      cause: describeError(err),
    });
  }
  if (typeof data !== "object" || data === null || Array.isArray(data)) {
    throw notFlat(source, ["<root>: Expected object"]);
  }
  const entries = Object.entries(data);
  const parsed = SnapshotEntriesSchema.safeParse(entries);
  if (!parsed.success) {
    throw notFlat(
      source,
      parsed.error.issues.map((issue) => {
        const index = issue.path[0];
        const name = typeof index === "number" ? entries[index]?.[0] : undefined;
        return `${name ?? "<root>"}: ${issue.message}`;
      }),
    );
  }
  return Object.fromEntries(parsed.data);
}

export async function readSnapshotFile(file: string): Promise<EnvSnapshot> {
  let raw: string;
  try {
    raw = await readFile(file, "utf-8");
  } catch (err) {
    throw new EnvProbeError(EnvProbeErrorCode.SNAPSHOT_PARSE_FAILED, `Snapshot file could not be read: ${file}`, {
      file,
      cause: describeError(err),
    });
  }
  return parseSnapshot(raw, file);
}

/**
 * Entries of `after` that are new or hold a different value, in `after`'s
 * order. Variables that disappeared are not reported.
 */
export function diffSnapshots(before: EnvSnapshot, after: EnvSnapshot): EnvDiff {
  const changed: [string, string][] = [];
  for (const [name, value] of Object.entries(after)) {
    if (Object.prototype.hasOwnProperty.call(before, name) && before[name] === value) continue;
    changed.push([name, value]);
  }
  return Object.fromEntries(changed);
}
