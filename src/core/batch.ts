import { readFile } from "node:fs/promises";
import { isAbsolute, relative, sep } from "node:path";

import { z } from "zod";

import { ValidationError, errnoCode, normalizeError } from "./errors.js";
import { generateFromSpec } from "./generate.js";
import type { GenerateModuleOptions } from "./generate.js";
import { moduleDirectory, parseModuleSpec } from "./spec.js";
import type { BatchEntryOutcome, BatchManifest, BatchModuleEntry, BatchResult, ModuleRequest, ModuleSpec } from "./types.js";

const MAX_BATCH_MODULES = 100;

const defaultsSchema = z
  .object({
    domain: z.string().optional(),
    withDocker: z.boolean().optional(),
    mcpServer: z.boolean().optional(),
    deploymentTarget: z.string().optional()
  })
  .strict();

const moduleEntrySchema = defaultsSchema
  .extend({
    name: z.string(),
    type: z.string(),
    outputDir: z.string().optional()
  })
  .strict();

const manifestSchema: z.ZodType<BatchManifest> = z
  .object({
    outputDir: z.string().optional(),
    defaults: defaultsSchema.optional(),
    modules: z.array(moduleEntrySchema).min(1).max(MAX_BATCH_MODULES)
  })
  .strict();

export interface GenerateBatchOptions extends Omit<GenerateModuleOptions, "onProgress"> {
  /** Takes precedence over the manifest's `outputDir`; entries with their own `outputDir` keep it. */
  outputDir?: string;
  overwrite?: boolean;
  onModuleSettled?: (outcome: BatchEntryOutcome) => void;
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ");
}

export function parseBatchManifest(raw: string): BatchManifest {
  let payload: unknown;
  try {
    payload = JSON.parse(raw);
  } catch (error) {
    throw new ValidationError("InvalidManifest", `Batch manifest is not valid JSON: ${error instanceof Error ? error.message : String(error)}`, {
      cause: error
    });
  }

  const parsed = manifestSchema.safeParse(payload);
  if (!parsed.success) {
    throw new ValidationError("InvalidManifest", `Batch manifest is invalid: ${describeIssues(parsed.error)}`, {
      details: { issues: parsed.error.issues.length }
    });
  }
  return parsed.data;
}

export async function loadBatchManifest(path: string): Promise<BatchManifest> {
  let raw: string;
  try {
    raw = await readFile(path, "utf8");
  } catch (error) {
    const code = errnoCode(error);
    throw new ValidationError("InvalidManifest", `Cannot read batch manifest "${path}"${code ? ` (${code})` : ""}.`, {
      cause: error,
      details: { path }
    });
  }
  return parseBatchManifest(raw);
}

function toModuleRequest(entry: BatchModuleEntry, manifest: BatchManifest, options: GenerateBatchOptions): ModuleRequest {
  const defaults = manifest.defaults ?? {};
  return {
    name: entry.name,
    type: entry.type,
    domain: entry.domain ?? defaults.domain,
    outputDir: entry.outputDir ?? options.outputDir ?? manifest.outputDir,
    withDocker: entry.withDocker ?? defaults.withDocker,
    mcpServer: entry.mcpServer ?? defaults.mcpServer,
    deploymentTarget: entry.deploymentTarget ?? defaults.deploymentTarget,
    overwrite: options.overwrite
  };
}

function isInside(path: string, ancestor: string): boolean {
  const rel = relative(ancestor, path);
  return rel !== "" && rel !== ".." && !rel.startsWith(`..${sep}`) && !isAbsolute(rel);
}

/** Every entry is validated, and targets checked for clashes, before anything is written. */
export function planBatch(manifest: BatchManifest, options: GenerateBatchOptions = {}): ModuleSpec[] {
  const parseOptions = options.workspaceRoot !== undefined ? { workspaceRoot: options.workspaceRoot } : {};
  const claimed = new Map<string, number>();

  return manifest.modules.map((entry, index) => {
    let spec: ModuleSpec;
    try {
      spec = parseModuleSpec(toModuleRequest(entry, manifest, options), parseOptions);
    } catch (error) {
      if (!(error instanceof ValidationError)) throw error;
      throw new ValidationError(error.kind, `modules[${index}]: ${error.message}`, {
        cause: error,
        details: { index, name: entry.name, ...error.details }
      });
    }

    const target = moduleDirectory(spec);
    const previous = claimed.get(target);
    if (previous !== undefined) {
      throw new ValidationError("DuplicateTarget", `modules[${index}] and modules[${previous}] both target "${target}".`, {
        details: { index, previous, modulePath: target }
      });
    }
    for (const [claimedTarget, claimedIndex] of claimed) {
      if (isInside(target, claimedTarget) || isInside(claimedTarget, target)) {
        throw new ValidationError(
          "DuplicateTarget",
          `modules[${index}] targets "${target}", which overlaps "${claimedTarget}" of modules[${claimedIndex}].`,
          { details: { index, previous: claimedIndex, modulePath: target } }
        );
      }
    }
    claimed.set(target, index);
    return spec;
  });
}

export async function generateBatch(manifest: BatchManifest, options: GenerateBatchOptions = {}): Promise<BatchResult> {
  const specs = planBatch(manifest, options);
  const generationOptions = options.dryRun !== undefined ? { dryRun: options.dryRun } : {};

  const settled = await Promise.allSettled(
    specs.map(async (spec) => {
      try {
        const result = await generateFromSpec(spec, generationOptions);
        options.onModuleSettled?.({ name: spec.name.kebab, ok: true, result });
        return result;
      } catch (error) {
        options.onModuleSettled?.({ name: spec.name.kebab, ok: false, error: normalizeError(error) });
        throw error;
      }
    })
  );

  const outcomes = settled.map((entry, index): BatchEntryOutcome => {
    const name = specs[index]?.name.kebab ?? `modules[${index}]`;
    if (entry.status === "fulfilled") {
      return { name, ok: true, result: entry.value };
    }
    return { name, ok: false, error: normalizeError(entry.reason) };
  });

  const succeeded = outcomes.filter((outcome) => outcome.ok).length;
  return { outcomes, succeeded, failed: outcomes.length - succeeded };
}
