import type { OutputFormat } from "./types.js";

const EXIT_CODE_OPERATIONAL_FAILURE = 1;
const EXIT_CODE_CONTRACT_OR_CONFIG_FAILURE = 2;
const EXIT_CODE_TEMPLATE_DEFECT = 3;

export type ValidationErrorKind =
  | "EmptyName"
  | "InvalidName"
  | "InvalidType"
  | "InvalidDomain"
  | "InvalidPath"
  | "InvalidOption"
  | "InvalidManifest"
  | "DuplicateTarget";

export type IOErrorKind = "AlreadyExists" | "InProgress" | "PermissionDenied" | "DiskFull" | "WriteFailure";

export type TemplateErrorKind = "UnknownToken" | "UnresolvedToken";

interface ScaffoldErrorOptions {
  cause?: unknown;
  details?: Record<string, unknown>;
}

export class ScaffoldError extends Error {
  readonly code: string;
  readonly kind: string;
  readonly exitCode: number;
  readonly details?: Record<string, unknown>;

  constructor(message: string, code: string, kind: string, exitCode: number, options: ScaffoldErrorOptions = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = new.target.name;
    this.code = code;
    this.kind = kind;
    this.exitCode = exitCode;
    if (options.details !== undefined) {
      this.details = options.details;
    }
  }
}

/** Rejected input. Always raised before the filesystem is touched. */
export class ValidationError extends ScaffoldError {
  declare readonly kind: ValidationErrorKind;

  constructor(kind: ValidationErrorKind, message: string, options: ScaffoldErrorOptions = {}) {
    super(message, "VALIDATION", kind, EXIT_CODE_CONTRACT_OR_CONFIG_FAILURE, options);
  }
}

export class IOError extends ScaffoldError {
  declare readonly kind: IOErrorKind;

  constructor(kind: IOErrorKind, message: string, options: ScaffoldErrorOptions = {}) {
    super(message, "IO", kind, EXIT_CODE_OPERATIONAL_FAILURE, options);
  }
}

/** A template outside the token vocabulary. Indicates a defect in the template tables. */
export class TemplateError extends ScaffoldError {
  declare readonly kind: TemplateErrorKind;

  constructor(kind: TemplateErrorKind, message: string, options: ScaffoldErrorOptions = {}) {
    super(message, "TEMPLATE", kind, EXIT_CODE_TEMPLATE_DEFECT, options);
  }
}

function hasStringCode(error: unknown): error is { code: string; message?: unknown } {
  if (!error || typeof error !== "object") return false;
  if (!("code" in error)) return false;
  return typeof error.code === "string";
}

export function errnoCode(error: unknown): string | undefined {
  if (!hasStringCode(error)) return undefined;
  return error.code;
}

export function toIOError(error: unknown, action: string): IOError {
  if (error instanceof IOError) return error;
  const code = errnoCode(error);
  const reason = error instanceof Error ? error.message : String(error);
  const details = code ? { errno: code } : undefined;
  const options = { cause: error, ...(details ? { details } : {}) };

  if (code === "EACCES" || code === "EPERM") {
    return new IOError("PermissionDenied", `Permission denied while ${action}: ${reason}`, options);
  }
  if (code === "ENOSPC" || code === "EDQUOT") {
    return new IOError("DiskFull", `No space left while ${action}: ${reason}`, options);
  }
  if (code === "EEXIST") {
    return new IOError("AlreadyExists", `Path already exists while ${action}: ${reason}`, options);
  }
  return new IOError("WriteFailure", `Failed while ${action}: ${reason}`, options);
}

export function normalizeError(error: unknown): ScaffoldError {
  if (error instanceof ScaffoldError) return error;
  if (hasStringCode(error) && error.code.startsWith("commander.")) {
    const message = error instanceof Error ? error.message : String(error.message ?? error.code);
    return new ValidationError("InvalidOption", message, {
      cause: error,
      details: {
        commanderCode: error.code
      }
    });
  }
  if (error instanceof Error) {
    return new IOError("WriteFailure", error.message, { cause: error });
  }
  return new IOError("WriteFailure", String(error));
}

export function normalizeOutputFormat(value: string | undefined): OutputFormat {
  const normalized = value?.trim().toLowerCase() ?? "text";
  if (normalized === "text" || normalized === "json") {
    return normalized;
  }
  throw new ValidationError("InvalidOption", `Invalid --format value "${String(value)}". Expected "text" or "json".`);
}

export function resolveOutputFormatFromArgv(argv: string[]): OutputFormat {
  for (let index = 0; index < argv.length; index += 1) {
    const token = argv[index];
    if (!token) continue;
    if (token === "--format") {
      const next = argv[index + 1];
      if (!next) return "text";
      return next.trim().toLowerCase() === "json" ? "json" : "text";
    }
    if (!token.startsWith("--format=")) continue;
    const value = token.slice("--format=".length).trim().toLowerCase();
    return value === "json" ? "json" : "text";
  }
  return "text";
}

export function toJsonErrorPayload(error: ScaffoldError): Record<string, unknown> {
  return {
    error: {
      code: error.code,
      type: error.name,
      kind: error.kind,
      message: error.message,
      exitCode: error.exitCode,
      ...(error.details ? { details: error.details } : {})
    }
  };
}
