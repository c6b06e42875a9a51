import { EnvProbeError, EnvProbeErrorCode, describeError } from "../../../src/shared/errors.js";

describe("EnvProbeError", () => {
  it("creates error with code and message", () => {
    const err = new EnvProbeError(EnvProbeErrorCode.SPAWN_FAILED, "Command failed to spawn: zsh");
    expect(err.code).toBe(EnvProbeErrorCode.SPAWN_FAILED);
    expect(err.message).toBe("Command failed to spawn: zsh");
    expect(err.name).toBe("EnvProbeError");
    expect(err instanceof Error).toBe(true);
  });

  it("includes optional context", () => {
    const err = new EnvProbeError(EnvProbeErrorCode.EXECUTION_FAILED, "Interpreter exited with 2: sh", { exitCode: 2 });
    expect(err.context).toEqual({ exitCode: 2 });
  });
});

describe("describeError", () => {
  it("uses the message of Error instances", () => {
    expect(describeError(new Error("boom"))).toBe("boom");
  });

  it("stringifies anything else", () => {
    expect(describeError(42)).toBe("42");
  });
});
