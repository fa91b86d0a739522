import type { ModuleType } from "./common.js";
import type { TemplateFlags } from "./spec.js";

export interface TemplateEntry {
  /** Logical name, e.g. `core` or `tests/test_core`. */
  key: string;
  /** Relative output path; may contain placeholders. */
  path: string;
  body: string;
}

export interface TemplateSet {
  id: string;
  moduleType: ModuleType;
  flags: Readonly<TemplateFlags>;
  directories: readonly string[];
  templates: readonly TemplateEntry[];
}

export interface RenderedFile {
  path: string;
  content: string;
  byteSize: number;
}
