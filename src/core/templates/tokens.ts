import type { ModuleSpec } from "../types.js";
import { MODULE_TYPE_PROFILES, buildDeploymentGuidance } from "./guidance.js";

export const FRAMEWORK_VERSION = "1.1.0";

export const TOKEN_NAMES = [
  "module_name",
  "module_snake",
  "class_name",
  "module_title",
  "module_type",
  "module_type_lower",
  "domain",
  "deployment_target",
  "type_summary",
  "primary_operation",
  "type_guidance",
  "deployment_guidance",
  "framework_version"
] as const;

export type TokenName = (typeof TOKEN_NAMES)[number];
export type TokenValues = Readonly<Record<TokenName, string>>;

const TOKEN_NAME_SET: ReadonlySet<string> = new Set(TOKEN_NAMES);

export const PLACEHOLDER_PATTERN = /\{\{\s*([A-Za-z0-9_]+)\s*\}\}/g;
export const LEFTOVER_PLACEHOLDER_PATTERN = /\{\{[^{}\n]*\}\}/;

export function isTokenName(value: string): value is TokenName {
  return TOKEN_NAME_SET.has(value);
}

/** Placeholder names in first-seen order, duplicates removed. */
export function extractPlaceholders(text: string): string[] {
  const names = new Set<string>();
  for (const match of text.matchAll(PLACEHOLDER_PATTERN)) {
    if (match[1]) names.add(match[1]);
  }
  return Array.from(names);
}

export function buildTokenValues(spec: ModuleSpec): TokenValues {
  const profile = MODULE_TYPE_PROFILES[spec.type];
  return Object.freeze({
    module_name: spec.name.kebab,
    module_snake: spec.name.snake,
    class_name: spec.name.pascal,
    module_title: spec.name.title,
    module_type: spec.type,
    module_type_lower: spec.type.toLowerCase(),
    domain: spec.domain,
    deployment_target: spec.flags.deploymentTarget,
    type_summary: profile.summary,
    primary_operation: profile.primaryOperation,
    type_guidance: profile.guidance,
    deployment_guidance: buildDeploymentGuidance(spec.flags.withDocker, spec.flags.deploymentTarget),
    framework_version: FRAMEWORK_VERSION
  });
}
