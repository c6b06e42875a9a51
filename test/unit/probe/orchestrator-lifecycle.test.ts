jest.mock("node:fs/promises", () => {
  const actual = jest.requireActual<typeof import("node:fs/promises")>("node:fs/promises");
  return { ...actual, rm: jest.fn(actual.rm) };
});

import fs from "node:fs/promises";
import os from "os";
import path from "path";
import { probeEnv, runProbe } from "../../../src/probe/orchestrator.js";
import { EnvProbeErrorCode } from "../../../src/shared/errors.js";
import { logger } from "../../../src/logger.js";
import { FakeShell } from "../../helpers/fake-shell.js";

const rmMock = jest.mocked(fs.rm);

describe("runProbe temp directory removal", () => {
  let tmpRoot: string;

  beforeEach(async () => {
    tmpRoot = await fs.mkdtemp(path.join(os.tmpdir(), "env-probe-test-"));
    rmMock.mockClear();
  });

  afterEach(async () => {
    await fs.rm(tmpRoot, { recursive: true, force: true });
  });

  it("still returns the diff when removal fails", async () => {
    rmMock.mockRejectedValueOnce(new Error("EBUSY: resource busy"));
    const warn = jest.spyOn(logger, "warn");

    await expect(probeEnv("set FOO=bar", { executor: new FakeShell(), tempDir: tmpRoot })).resolves.toEqual({
      FOO: "bar",
    });
    expect(rmMock).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith(
      expect.objectContaining({ error: "EBUSY: resource busy" }),
      "Could not remove probe temp directory",
    );
    expect(await fs.readdir(tmpRoot)).toHaveLength(1);
    warn.mockRestore();
  });

  it("keeps the execution error when removal also fails", async () => {
    rmMock.mockRejectedValueOnce(new Error("EBUSY: resource busy"));

    await expect(runProbe("set FOO=bar", { executor: new FakeShell({}, 2), tempDir: tmpRoot })).rejects.toMatchObject({
      code: EnvProbeErrorCode.EXECUTION_FAILED,
    });
    expect(rmMock).toHaveBeenCalledTimes(1);
  });

  it("removes the directory on success", async () => {
    await probeEnv("set FOO=bar", { executor: new FakeShell(), tempDir: tmpRoot });
    expect(rmMock).toHaveBeenCalledWith(expect.stringContaining("env-probe-"), { recursive: true, force: true });
    expect(await fs.readdir(tmpRoot)).toEqual([]);
  });
});

describe("runProbe phases", () => {
  let tmpRoot: string;
  let debug: jest.SpyInstance;

  const phases = (): string[] =>
    debug.mock.calls.flatMap((call: unknown[]) => {
      const [fields, message] = call;
      if (message !== "Probe phase" || typeof fields !== "object" || fields === null || !("to" in fields)) return [];
      return [String(fields.to)];
    });

  beforeEach(async () => {
    tmpRoot = await fs.mkdtemp(path.join(os.tmpdir(), "env-probe-test-"));
    debug = jest.spyOn(logger, "debug");
  });

  afterEach(async () => {
    debug.mockRestore();
    await fs.rm(tmpRoot, { recursive: true, force: true });
  });

  it("walks every phase through to done", async () => {
    await runProbe("set FOO=bar", { executor: new FakeShell(), tempDir: tmpRoot });
    expect(phases()).toEqual(["composing", "executing", "parsing", "diffing", "cleaning-up", "done"]);
  });

  it("cleans up before entering failed when the interpreter fails", async () => {
    await expect(runProbe("set FOO=bar", { executor: new FakeShell({}, 2), tempDir: tmpRoot })).rejects.toMatchObject({
      code: EnvProbeErrorCode.EXECUTION_FAILED,
    });
    expect(phases()).toEqual(["composing", "executing", "cleaning-up", "failed"]);
  });

  it("enters failed when the temp directory cannot be created", async () => {
    await expect(
      runProbe("set FOO=bar", { executor: new FakeShell(), tempDir: path.join(tmpRoot, "missing", "deeper") }),
    ).rejects.toMatchObject({ code: EnvProbeErrorCode.TEMP_FILE_FAILED });
    expect(phases()).toEqual(["failed"]);
  });
});
