export { generateBatch, loadBatchManifest, parseBatchManifest, planBatch } from "./core/batch.js";
export type { GenerateBatchOptions } from "./core/batch.js";
export {
  IOError,
  ScaffoldError,
  TemplateError,
  ValidationError,
  normalizeError,
  toJsonErrorPayload
} from "./core/errors.js";
export type { IOErrorKind, TemplateErrorKind, ValidationErrorKind } from "./core/errors.js";
export { generateFromSpec, generateModule, prepareModule } from "./core/generate.js";
export type { GenerateModuleOptions, PreparedModule } from "./core/generate.js";
export { renderTemplateSet } from "./core/render.js";
export { formatReport, summarizeGeneration } from "./core/report.js";
export {
  DEFAULT_DEPLOYMENT_TARGET,
  DEFAULT_DOMAIN,
  DEPLOYMENT_TARGETS,
  MODULE_TYPES,
  assertOutputDirectoryWritable,
  moduleDirectory,
  parseModuleSpec
} from "./core/spec.js";
export type { ParseModuleSpecOptions } from "./core/spec.js";
export { listTemplateSets, lookupTemplateSet } from "./core/templates.js";
export { TOKEN_NAMES } from "./core/templates/tokens.js";
export type { TokenName } from "./core/templates/tokens.js";
export { fromPascalCase, fromSnakeCase, toPascalCase, toSnakeCase, toTitleCase } from "./core/text.js";
export { materializeModule } from "./core/write.js";
export type { MaterializeOptions, MaterializeOutcome, MaterializeProgress } from "./core/write.js";
export type {
  BatchDefaults,
  BatchEntryOutcome,
  BatchManifest,
  BatchModuleEntry,
  BatchResult,
  DeploymentTarget,
  GeneratedFileSummary,
  GenerationReport,
  GenerationResult,
  ModuleFlags,
  ModuleNames,
  ModuleRequest,
  ModuleSpec,
  ModuleType,
  OutputFormat,
  RenderedFile,
  TemplateEntry,
  TemplateFlags,
  TemplateSet
} from "./core/types.js";
