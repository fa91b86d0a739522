export type { DeploymentTarget, ModuleType, OutputFormat } from "./types/common.js";
export type { ModuleFlags, ModuleNames, ModuleRequest, ModuleSpec, TemplateFlags } from "./types/spec.js";
export type { RenderedFile, TemplateEntry, TemplateSet } from "./types/artifacts.js";
export type { GeneratedFileSummary, GenerationReport, GenerationResult } from "./types/result.js";
export type { BatchCommandOptions, CreateCommandOptions, TypesCommandOptions } from "./types/commands.js";
export type { BatchDefaults, BatchEntryOutcome, BatchManifest, BatchModuleEntry, BatchResult } from "./types/batch.js";
