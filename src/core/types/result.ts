import type { ModuleType } from "./common.js";
import type { RenderedFile } from "./artifacts.js";

export interface GenerationResult {
  moduleName: string;
  moduleType: ModuleType;
  domain: string;
  modulePath: string;
  files: RenderedFile[];
  directories: string[];
  totalBytes: number;
  elapsedMs: number;
  written: boolean;
  generatedAt: string;
}

export interface GeneratedFileSummary {
  path: string;
  bytes: number;
}

export interface GenerationReport {
  module: string;
  type: ModuleType;
  domain: string;
  location: string;
  fileCount: number;
  totalBytes: number;
  elapsedMs: number;
  dryRun: boolean;
  generatedAt: string;
  files: GeneratedFileSummary[];
}
