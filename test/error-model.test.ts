import { describe, expect, it } from "vitest";

import {
  IOError,
  TemplateError,
  ValidationError,
  normalizeError,
  normalizeOutputFormat,
  resolveOutputFormatFromArgv,
  toIOError,
  toJsonErrorPayload
} from "../src/core/errors.js";

function errnoError(code: string, message: string): Error {
  return Object.assign(new Error(message), { code });
}

describe("error model", () => {
  it("maps validation errors to exit code 2", () => {
    const error = normalizeError(new ValidationError("InvalidName", "bad name"));
    expect(error.code).toBe("VALIDATION");
    expect(error.kind).toBe("InvalidName");
    expect(error.exitCode).toBe(2);
  });

  it("maps template defects to exit code 3", () => {
    const error = new TemplateError("UnknownToken", "unknown token");
    expect(error.code).toBe("TEMPLATE");
    expect(error.exitCode).toBe(3);
    expect(error.name).toBe("TemplateError");
  });

  it("maps unknown runtime errors to an IO write failure with exit code 1", () => {
    const error = normalizeError(new Error("boom"));
    expect(error).toBeInstanceOf(IOError);
    expect(error.kind).toBe("WriteFailure");
    expect(error.exitCode).toBe(1);
  });

  it("maps commander usage errors to invalid option validation errors", () => {
    const commanderError = Object.assign(new Error("error: unknown option '--typo'"), {
      code: "commander.unknownOption"
    });
    const error = normalizeError(commanderError);
    expect(error).toBeInstanceOf(ValidationError);
    expect(error.kind).toBe("InvalidOption");
    expect(error.details).toEqual({ commanderCode: "commander.unknownOption" });
  });

  it("maps errno codes to IO error kinds", () => {
    expect(toIOError(errnoError("EACCES", "denied"), "writing core.py").kind).toBe("PermissionDenied");
    expect(toIOError(errnoError("EPERM", "denied"), "writing core.py").kind).toBe("PermissionDenied");
    expect(toIOError(errnoError("ENOSPC", "full"), "writing core.py").kind).toBe("DiskFull");
    expect(toIOError(errnoError("EEXIST", "exists"), "writing core.py").kind).toBe("AlreadyExists");
    expect(toIOError(errnoError("EIO", "io"), "writing core.py").kind).toBe("WriteFailure");

    const mapped = toIOError(errnoError("ENOSPC", "no space left on device"), "writing core.py");
    expect(mapped.message).toBe("No space left while writing core.py: no space left on device");
    expect(mapped.details).toEqual({ errno: "ENOSPC" });
  });

  it("keeps IO errors untouched when mapping", () => {
    const original = new IOError("InProgress", "locked");
    expect(toIOError(original, "locking")).toBe(original);
  });

  it("validates output format values", () => {
    expect(normalizeOutputFormat("json")).toBe("json");
    expect(normalizeOutputFormat("text")).toBe("text");
    expect(normalizeOutputFormat(undefined)).toBe("text");
    expect(() => normalizeOutputFormat("yaml")).toThrow('Invalid --format value "yaml"');
  });

  it("reads the output format from raw argv", () => {
    expect(resolveOutputFormatFromArgv(["node", "cli", "create", "x", "--format", "json"])).toBe("json");
    expect(resolveOutputFormatFromArgv(["node", "cli", "create", "x", "--format=json"])).toBe("json");
    expect(resolveOutputFormatFromArgv(["node", "cli", "create", "x"])).toBe("text");
  });

  it("renders machine-readable JSON error payloads", () => {
    const payload = toJsonErrorPayload(new ValidationError("InvalidType", "invalid type", { details: { received: "BOGUS" } }));
    expect(payload).toEqual({
      error: {
        code: "VALIDATION",
        type: "ValidationError",
        kind: "InvalidType",
        message: "invalid type",
        exitCode: 2,
        details: { received: "BOGUS" }
      }
    });
  });
});
