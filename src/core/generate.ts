import { renderTemplateSet } from "./render.js";
import { assertOutputDirectoryWritable, moduleDirectory, parseModuleSpec } from "./spec.js";
import type { ParseModuleSpecOptions } from "./spec.js";
import { lookupTemplateSet } from "./templates.js";
import type { GenerationResult, ModuleRequest, ModuleSpec, RenderedFile, TemplateSet } from "./types.js";
import { materializeModule, plannedDirectories } from "./write.js";
import type { MaterializeProgress } from "./write.js";

export interface GenerateModuleOptions extends ParseModuleSpecOptions {
  /** Render and report without touching the filesystem. */
  dryRun?: boolean;
  onProgress?: (event: MaterializeProgress) => void;
}

export interface PreparedModule {
  spec: ModuleSpec;
  templateSet: TemplateSet;
  files: RenderedFile[];
  modulePath: string;
}

/** Validation, lookup and rendering. No I/O. */
export function prepareModule(spec: ModuleSpec): PreparedModule {
  const templateSet = lookupTemplateSet(spec.type, spec.flags);
  return {
    spec,
    templateSet,
    files: renderTemplateSet(templateSet, spec),
    modulePath: moduleDirectory(spec)
  };
}

interface WriteMeasurements {
  directories: string[];
  bytesWritten: number;
  elapsedMs: number;
}

function toResult(prepared: PreparedModule, measured: WriteMeasurements, written: boolean): GenerationResult {
  return {
    moduleName: prepared.spec.name.kebab,
    moduleType: prepared.spec.type,
    domain: prepared.spec.domain,
    modulePath: prepared.modulePath,
    files: prepared.files,
    directories: measured.directories,
    totalBytes: measured.bytesWritten,
    elapsedMs: measured.elapsedMs,
    written,
    generatedAt: new Date().toISOString()
  };
}

export async function generateFromSpec(
  spec: ModuleSpec,
  options: Omit<GenerateModuleOptions, "workspaceRoot"> = {}
): Promise<GenerationResult> {
  const prepared = prepareModule(spec);

  if (options.dryRun) {
    const startedAt = performance.now();
    const directories = plannedDirectories(prepared.templateSet.directories, prepared.files);
    const bytesWritten = prepared.files.reduce((sum, file) => sum + file.byteSize, 0);
    // Nothing is written on dry runs; the report counts the bytes that would be.
    return toResult(prepared, { directories, bytesWritten, elapsedMs: performance.now() - startedAt }, false);
  }

  await assertOutputDirectoryWritable(spec.flags.outputDir);
  const outcome = await materializeModule(prepared.modulePath, prepared.templateSet.directories, prepared.files, {
    overwrite: spec.flags.overwrite,
    ...(options.onProgress ? { onProgress: options.onProgress } : {})
  });
  return toResult(prepared, outcome, true);
}

export async function generateModule(request: ModuleRequest, options: GenerateModuleOptions = {}): Promise<GenerationResult> {
  const spec = parseModuleSpec(request, options.workspaceRoot !== undefined ? { workspaceRoot: options.workspaceRoot } : {});
  return generateFromSpec(spec, options);
}
