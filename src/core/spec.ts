import { constants } from "node:fs";
import { access, stat } from "node:fs/promises";
import { dirname, isAbsolute, join, relative, resolve, sep } from "node:path";

import { z } from "zod";

import { ValidationError } from "./errors.js";
import { isAscii, isKebabName, toPascalCase, toSnakeCase, toTitleCase } from "./text.js";
import type { DeploymentTarget, ModuleNames, ModuleRequest, ModuleSpec, ModuleType } from "./types.js";

export const MODULE_TYPES = ["CORE", "INTEGRATION", "SUPPORTING", "TECHNICAL"] as const satisfies readonly ModuleType[];
export const DEPLOYMENT_TARGETS = ["kubernetes", "docker-compose", "lambda"] as const satisfies readonly DeploymentTarget[];

export const DEFAULT_DOMAIN = "general";
export const DEFAULT_DEPLOYMENT_TARGET: DeploymentTarget = "kubernetes";

const MAX_NAME_LENGTH = 64;

// Generated packages are imported by their snake_case name.
const PYTHON_KEYWORDS = new Set([
  "and",
  "as",
  "assert",
  "async",
  "await",
  "break",
  "class",
  "continue",
  "def",
  "del",
  "elif",
  "else",
  "except",
  "finally",
  "for",
  "from",
  "global",
  "if",
  "import",
  "in",
  "is",
  "lambda",
  "nonlocal",
  "not",
  "or",
  "pass",
  "raise",
  "return",
  "try",
  "while",
  "with",
  "yield"
]);

const moduleTypeSchema = z.enum(MODULE_TYPES);
const deploymentTargetSchema = z.enum(DEPLOYMENT_TARGETS);
const domainSchema = z
  .string()
  .min(1)
  .max(64)
  .regex(/^[A-Za-z0-9][A-Za-z0-9 _./&-]*$/);

export interface ParseModuleSpecOptions {
  /** Output directories must stay inside this root. Defaults to the current working directory. */
  workspaceRoot?: string;
}

export function normalizeModuleType(value: string | undefined): ModuleType | undefined {
  if (!value) return undefined;
  const parsed = moduleTypeSchema.safeParse(value.trim().toUpperCase());
  return parsed.success ? parsed.data : undefined;
}

export function parseModuleNames(raw: string): ModuleNames {
  const name = raw.trim();
  if (!name) {
    throw new ValidationError("EmptyName", "Module name is required.");
  }
  if (!isAscii(name)) {
    throw new ValidationError("InvalidName", `Module name "${name}" contains non-ASCII characters.`);
  }
  if (name.length > MAX_NAME_LENGTH) {
    throw new ValidationError("InvalidName", `Module name must be at most ${MAX_NAME_LENGTH} characters.`);
  }
  if (!isKebabName(name)) {
    throw new ValidationError(
      "InvalidName",
      `Module name "${name}" must be kebab-case: lowercase words starting with a letter, joined by single hyphens.`
    );
  }

  const snake = toSnakeCase(name);
  if (PYTHON_KEYWORDS.has(snake)) {
    throw new ValidationError("InvalidName", `Module name "${name}" is a reserved Python keyword.`);
  }

  return {
    kebab: name,
    snake,
    pascal: toPascalCase(name),
    title: toTitleCase(name)
  };
}

export function parseModuleType(raw: string): ModuleType {
  const moduleType = normalizeModuleType(raw);
  if (!moduleType) {
    throw new ValidationError(
      "InvalidType",
      `Invalid module type "${raw}". Expected one of: ${MODULE_TYPES.join(", ")}.`,
      { details: { received: raw } }
    );
  }
  return moduleType;
}

export function parseDomain(raw: string | undefined): string {
  const domain = raw?.trim() ?? DEFAULT_DOMAIN;
  const parsed = domainSchema.safeParse(domain);
  if (!parsed.success) {
    throw new ValidationError(
      "InvalidDomain",
      `Invalid domain "${domain}". Use 1-64 characters: letters, digits, spaces and _ . / & -.`
    );
  }
  return parsed.data;
}

export function parseDeploymentTarget(raw: string | undefined): DeploymentTarget {
  if (raw === undefined) return DEFAULT_DEPLOYMENT_TARGET;
  const parsed = deploymentTargetSchema.safeParse(raw.trim().toLowerCase());
  if (!parsed.success) {
    throw new ValidationError(
      "InvalidOption",
      `Invalid deployment target "${raw}". Expected one of: ${DEPLOYMENT_TARGETS.join(", ")}.`
    );
  }
  return parsed.data;
}

export function resolveOutputDir(raw: string | undefined, workspaceRoot: string): string {
  const root = resolve(workspaceRoot);
  const outputDir = resolve(root, raw?.trim() || ".");
  const rel = relative(root, outputDir);
  if (rel === ".." || rel.startsWith(`..${sep}`) || isAbsolute(rel)) {
    throw new ValidationError("InvalidPath", `Output directory "${outputDir}" is outside the workspace "${root}".`, {
      details: { outputDir, workspaceRoot: root }
    });
  }
  return outputDir;
}

export function parseModuleSpec(request: ModuleRequest, options: ParseModuleSpecOptions = {}): ModuleSpec {
  const name = parseModuleNames(request.name);
  const type = parseModuleType(request.type);
  const domain = parseDomain(request.domain);
  const deploymentTarget = parseDeploymentTarget(request.deploymentTarget);
  const outputDir = resolveOutputDir(request.outputDir, options.workspaceRoot ?? process.cwd());

  return Object.freeze({
    name: Object.freeze(name),
    type,
    domain,
    flags: Object.freeze({
      withDocker: request.withDocker ?? false,
      mcpServer: request.mcpServer ?? false,
      outputDir,
      overwrite: request.overwrite ?? false,
      deploymentTarget
    })
  });
}

export function moduleDirectory(spec: ModuleSpec): string {
  return join(spec.flags.outputDir, spec.name.kebab);
}

async function nearestExistingPath(path: string): Promise<string> {
  let current = path;
  for (;;) {
    try {
      await stat(current);
      return current;
    } catch (error) {
      const parent = dirname(current);
      if (parent === current) throw error;
      current = parent;
    }
  }
}

/** Read-only check; nothing is created. Missing directories are judged by their nearest existing ancestor. */
export async function assertOutputDirectoryWritable(outputDir: string): Promise<void> {
  const existing = await nearestExistingPath(outputDir);
  const existingStats = await stat(existing);
  if (!existingStats.isDirectory()) {
    throw new ValidationError("InvalidPath", `Output path "${existing}" is not a directory.`, {
      details: { outputDir }
    });
  }

  try {
    await access(existing, constants.W_OK);
  } catch (error) {
    throw new ValidationError("InvalidPath", `Output directory "${existing}" is not writable.`, {
      cause: error,
      details: { outputDir }
    });
  }
}
