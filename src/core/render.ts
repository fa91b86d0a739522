import { TemplateError } from "./errors.js";
import { byteLength, normalizeContent } from "./text.js";
import { LEFTOVER_PLACEHOLDER_PATTERN, PLACEHOLDER_PATTERN, buildTokenValues, isTokenName } from "./templates/tokens.js";
import type { TokenValues } from "./templates/tokens.js";
import type { ModuleSpec, RenderedFile, TemplateEntry, TemplateSet } from "./types.js";

// Substituted values are never scanned again, so a value cannot inject a placeholder.
function substitute(text: string, values: TokenValues): string {
  return text.replace(PLACEHOLDER_PATTERN, (match: string, name: string) => (isTokenName(name) ? values[name] : match));
}

function assertResolved(setId: string, template: TemplateEntry, field: "path" | "body", rendered: string): void {
  const leftover = LEFTOVER_PLACEHOLDER_PATTERN.exec(rendered);
  if (!leftover) return;
  throw new TemplateError(
    "UnresolvedToken",
    `Template "${template.key}" in set "${setId}" left ${leftover[0]} unresolved in its ${field}.`,
    { details: { templateSet: setId, template: template.key, placeholder: leftover[0] } }
  );
}

export function renderTemplate(setId: string, template: TemplateEntry, values: TokenValues): RenderedFile {
  const path = substitute(template.path, values);
  assertResolved(setId, template, "path", path);

  const content = normalizeContent(substitute(template.body, values));
  assertResolved(setId, template, "body", content);

  return { path, content, byteSize: byteLength(content) };
}

export function renderTemplateSet(set: TemplateSet, spec: ModuleSpec): RenderedFile[] {
  const values = buildTokenValues(spec);
  return set.templates.map((template) => renderTemplate(set.id, template, values));
}
