import { chmod, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { describe, expect, it } from "vitest";

import { ValidationError } from "../src/core/errors.js";
import {
  assertOutputDirectoryWritable,
  moduleDirectory,
  parseDeploymentTarget,
  parseDomain,
  parseModuleNames,
  parseModuleSpec,
  parseModuleType
} from "../src/core/spec.js";
import { fromPascalCase, fromSnakeCase } from "../src/core/text.js";

const WORKSPACE = join(tmpdir(), "modscaffold-spec-workspace");

function captureError(action: () => unknown): ValidationError {
  try {
    action();
  } catch (error) {
    if (error instanceof ValidationError) return error;
    throw error;
  }
  throw new Error("Expected a ValidationError.");
}

describe("module names", () => {
  it("derives every case variant from a kebab-case name", () => {
    expect(parseModuleNames("user-management")).toEqual({
      kebab: "user-management",
      snake: "user_management",
      pascal: "UserManagement",
      title: "User Management"
    });
  });

  it("trims surrounding whitespace", () => {
    expect(parseModuleNames("  billing  ").kebab).toBe("billing");
  });

  it("rejects empty names", () => {
    const error = captureError(() => parseModuleNames("   "));
    expect(error.kind).toBe("EmptyName");
    expect(error.message).toBe("Module name is required.");
  });

  it("rejects names outside ASCII kebab-case", () => {
    expect(captureError(() => parseModuleNames("User-Management")).kind).toBe("InvalidName");
    expect(captureError(() => parseModuleNames("user_management")).kind).toBe("InvalidName");
    expect(captureError(() => parseModuleNames("user--management")).kind).toBe("InvalidName");
    expect(captureError(() => parseModuleNames("api-2go")).kind).toBe("InvalidName");
    expect(captureError(() => parseModuleNames("-leading")).kind).toBe("InvalidName");
  });

  it("never transliterates non-ASCII input", () => {
    const error = captureError(() => parseModuleNames("café"));
    expect(error.kind).toBe("InvalidName");
    expect(error.message).toBe('Module name "café" contains non-ASCII characters.');
  });

  it("rejects names longer than 64 characters", () => {
    expect(parseModuleNames("a".repeat(64)).kebab).toHaveLength(64);
    expect(captureError(() => parseModuleNames("a".repeat(65))).kind).toBe("InvalidName");
  });

  it("rejects names whose package name is a Python keyword", () => {
    const error = captureError(() => parseModuleNames("import"));
    expect(error.kind).toBe("InvalidName");
    expect(error.message).toBe('Module name "import" is a reserved Python keyword.');
  });

  it("reverses snake and Pascal case exactly", () => {
    for (const name of ["user-management", "payments-v2", "a", "order-line-item"]) {
      const names = parseModuleNames(name);
      expect(fromSnakeCase(names.snake)).toBe(name);
      expect(fromPascalCase(names.pascal)).toBe(name);
    }
    expect(fromSnakeCase("Not_Snake")).toBeNull();
    expect(fromPascalCase("notPascal")).toBeNull();
  });
});

describe("module fields", () => {
  it("matches module types case-insensitively and stores them upper case", () => {
    expect(parseModuleType("core")).toBe("CORE");
    expect(parseModuleType(" Integration ")).toBe("INTEGRATION");
  });

  it("rejects unknown module types with the accepted values", () => {
    const error = captureError(() => parseModuleType("BOGUS"));
    expect(error.kind).toBe("InvalidType");
    expect(error.message).toBe('Invalid module type "BOGUS". Expected one of: CORE, INTEGRATION, SUPPORTING, TECHNICAL.');
    expect(error.details).toEqual({ received: "BOGUS" });
  });

  it("defaults the domain and rejects placeholder syntax", () => {
    expect(parseDomain(undefined)).toBe("general");
    expect(parseDomain("e-commerce & retail")).toBe("e-commerce & retail");
    expect(captureError(() => parseDomain("{{module_name}}")).kind).toBe("InvalidDomain");
    expect(captureError(() => parseDomain("   ")).kind).toBe("InvalidDomain");
    expect(captureError(() => parseDomain("x".repeat(65))).kind).toBe("InvalidDomain");
  });

  it("parses deployment targets", () => {
    expect(parseDeploymentTarget(undefined)).toBe("kubernetes");
    expect(parseDeploymentTarget("Docker-Compose")).toBe("docker-compose");
    expect(captureError(() => parseDeploymentTarget("heroku")).kind).toBe("InvalidOption");
  });
});

describe("parseModuleSpec", () => {
  it("builds a frozen spec with defaults", () => {
    const spec = parseModuleSpec({ name: "user-management", type: "core", domain: "ecommerce" }, { workspaceRoot: WORKSPACE });

    expect(spec.type).toBe("CORE");
    expect(spec.domain).toBe("ecommerce");
    expect(spec.flags).toEqual({
      withDocker: false,
      mcpServer: false,
      outputDir: WORKSPACE,
      overwrite: false,
      deploymentTarget: "kubernetes"
    });
    expect(Object.isFrozen(spec)).toBe(true);
    expect(Object.isFrozen(spec.flags)).toBe(true);
    expect(Object.isFrozen(spec.name)).toBe(true);
    expect(moduleDirectory(spec)).toBe(join(WORKSPACE, "user-management"));
  });

  it("resolves output directories inside the workspace", () => {
    const spec = parseModuleSpec({ name: "billing", type: "CORE", outputDir: "modules/finance" }, { workspaceRoot: WORKSPACE });
    expect(spec.flags.outputDir).toBe(join(WORKSPACE, "modules", "finance"));
  });

  it("rejects output directories that escape the workspace", () => {
    const error = captureError(() =>
      parseModuleSpec({ name: "billing", type: "CORE", outputDir: "../elsewhere" }, { workspaceRoot: WORKSPACE })
    );
    expect(error.kind).toBe("InvalidPath");
  });

  it("validates the name before the type", () => {
    const error = captureError(() => parseModuleSpec({ name: "", type: "BOGUS" }, { workspaceRoot: WORKSPACE }));
    expect(error.kind).toBe("EmptyName");
  });
});

describe("assertOutputDirectoryWritable", () => {
  it("accepts missing directories below a writable ancestor", async () => {
    const root = await mkdtemp(join(tmpdir(), "modscaffold-spec-"));
    try {
      await expect(assertOutputDirectoryWritable(join(root, "not", "yet", "created"))).resolves.toBeUndefined();
    } finally {
      await rm(root, { recursive: true, force: true });
    }
  });

  it.skipIf(process.platform === "win32" || process.getuid?.() === 0)("rejects a directory without write permission", async () => {
    const root = await mkdtemp(join(tmpdir(), "modscaffold-spec-"));
    try {
      await chmod(root, 0o555);

      await expect(assertOutputDirectoryWritable(join(root, "modules"))).rejects.toMatchObject({
        code: "VALIDATION",
        kind: "InvalidPath",
        message: `Output directory "${root}" is not writable.`
      });
    } finally {
      await chmod(root, 0o755);
      await rm(root, { recursive: true, force: true });
    }
  });

  it("rejects output paths below a regular file", async () => {
    const root = await mkdtemp(join(tmpdir(), "modscaffold-spec-"));
    try {
      const filePath = join(root, "occupied.txt");
      await writeFile(filePath, "not a directory\n", "utf8");

      await expect(assertOutputDirectoryWritable(join(filePath, "modules"))).rejects.toMatchObject({
        code: "VALIDATION",
        kind: "InvalidPath"
      });
    } finally {
      await rm(root, { recursive: true, force: true });
    }
  });
});
