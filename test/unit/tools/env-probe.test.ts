import fs from "fs/promises";
import os from "os";
import path from "path";
import { DEFAULT_CONFIG } from "../../../src/config/loader.js";
import { handleEnvProbe, type ToolContext } from "../../../src/tools/env-probe.js";
import type { ProbeConfig } from "../../../src/types/config.js";
import { FakeShell } from "../../helpers/fake-shell.js";

describe("handleEnvProbe", () => {
  let tmpDir: string;
  let config: ProbeConfig;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "env-probe-tool-"));
    config = { ...DEFAULT_CONFIG, temp_dir: tmpDir };
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  const context = (executor: FakeShell, overrides: Partial<ProbeConfig> = {}): ToolContext => ({
    config: { ...config, ...overrides },
    executor,
  });

  it("returns changed variables with excluded names split out", async () => {
    const shell = new FakeShell({ PWD: "/home/test" });
    const response = await handleEnvProbe({ script: "set FOO=bar\nset PWD=/elsewhere" }, context(shell));
    expect(response).toEqual({
      status: "success",
      tool: "env_probe",
      shell: "sh",
      interpreter: "sh",
      duration_ms: 1,
      changed: { FOO: "bar" },
      skipped: ["PWD"],
      stderr: "",
    });
  });

  it("reports everything when apply_filter is false", async () => {
    const shell = new FakeShell({ PWD: "/home/test" });
    const response = await handleEnvProbe(
      { script: "set FOO=bar\nset PWD=/elsewhere", apply_filter: false },
      context(shell),
    );
    expect(response).toMatchObject({ status: "success", changed: { PWD: "/elsewhere", FOO: "bar" }, skipped: [] });
  });

  it("passes extra env to the shell", async () => {
    const shell = new FakeShell();
    await handleEnvProbe({ script: "", env: { TOKEN: "test-secret" } }, context(shell));
    expect(shell.calls[0].env).toEqual({ TOKEN: "test-secret" });
  });

  it("infers the shell from an explicit interpreter", async () => {
    const shell = new FakeShell();
    const response = await handleEnvProbe({ script: "", interpreter: "/usr/bin/zsh" }, context(shell));
    expect(response).toMatchObject({ status: "success", shell: "zsh", interpreter: "/usr/bin/zsh" });
    expect(shell.calls[0].argv.slice(0, 2)).toEqual(["/usr/bin/zsh", "-c"]);
  });

  it("uses the configured target when the call names none", async () => {
    const shell = new FakeShell();
    const response = await handleEnvProbe({ script: "" }, context(shell, { shell: "bash", interpreter: "/opt/bash" }));
    expect(response).toMatchObject({ status: "success", shell: "bash", interpreter: "/opt/bash" });
  });

  it("forwards the configured timeout", async () => {
    const shell = new FakeShell();
    await handleEnvProbe({ script: "" }, context(shell, { timeout_ms: 1500 }));
    expect(shell.options[0].timeoutMs).toBe(1500);
  });

  it("runs PowerShell with its own flags", async () => {
    const shell = new FakeShell();
    // The fake only understands POSIX probe lines, so no snapshot appears.
    const response = await handleEnvProbe({ script: "", shell: "pwsh" }, context(shell));
    expect(shell.calls[0].argv.slice(0, 4)).toEqual(["pwsh", "-NoProfile", "-NonInteractive", "-Command"]);
    expect(response).toMatchObject({ status: "error", error_code: "SNAPSHOT_PARSE_FAILED" });
  });

  it("maps probe failures to error responses", async () => {
    const shell = new FakeShell({}, 1);
    const response = await handleEnvProbe({ script: "set FOO=bar" }, context(shell));
    expect(response).toMatchObject({
      status: "error",
      tool: "env_probe",
      error_code: "EXECUTION_FAILED",
      message: "Interpreter exited with 1: sh",
      context: { exitCode: 1, stderr: "fake failure\n" },
    });
  });

  it("rejects invalid arguments", async () => {
    const shell = new FakeShell();
    const response = await handleEnvProbe({ script: 42 }, context(shell));
    expect(response).toMatchObject({ status: "error", error_code: "INVALID_INPUT" });
    expect(shell.calls).toHaveLength(0);
  });

  it("rejects an unknown shell preset", async () => {
    const response = await handleEnvProbe({ script: "", shell: "csh" }, context(new FakeShell()));
    expect(response).toMatchObject({ status: "error", error_code: "INVALID_INPUT" });
  });
});
