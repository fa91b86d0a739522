import type { ScaffoldError } from "../errors.js";
import type { GenerationResult } from "./result.js";

export interface BatchDefaults {
  domain?: string | undefined;
  withDocker?: boolean | undefined;
  mcpServer?: boolean | undefined;
  deploymentTarget?: string | undefined;
}

export interface BatchModuleEntry extends BatchDefaults {
  name: string;
  type: string;
  outputDir?: string | undefined;
}

export interface BatchManifest {
  outputDir?: string | undefined;
  defaults?: BatchDefaults | undefined;
  modules: BatchModuleEntry[];
}

export type BatchEntryOutcome =
  | { name: string; ok: true; result: GenerationResult }
  | { name: string; ok: false; error: ScaffoldError };

export interface BatchResult {
  outcomes: BatchEntryOutcome[];
  succeeded: number;
  failed: number;
}
