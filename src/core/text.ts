const KEBAB_NAME_PATTERN = /^[a-z][a-z0-9]*(?:-[a-z][a-z0-9]*)*$/;
const SNAKE_NAME_PATTERN = /^[a-z][a-z0-9]*(?:_[a-z][a-z0-9]*)*$/;
const PASCAL_NAME_PATTERN = /^(?:[A-Z][a-z0-9]*)+$/;

export function isKebabName(value: string): boolean {
  return KEBAB_NAME_PATTERN.test(value);
}

export function isAscii(value: string): boolean {
  return /^[\x20-\x7E]*$/.test(value);
}

function capitalize(part: string): string {
  return part.charAt(0).toUpperCase() + part.slice(1);
}

export function toSnakeCase(kebab: string): string {
  return kebab.replaceAll("-", "_");
}

export function toPascalCase(kebab: string): string {
  return kebab.split("-").map(capitalize).join("");
}

export function toTitleCase(kebab: string): string {
  return kebab.split("-").map(capitalize).join(" ");
}

/** Inverse of {@link toSnakeCase} for names produced from kebab-case input. */
export function fromSnakeCase(snake: string): string | null {
  if (!SNAKE_NAME_PATTERN.test(snake)) return null;
  return snake.replaceAll("_", "-");
}

/** Inverse of {@link toPascalCase}; every word starts with a letter, so word boundaries are the capitals. */
export function fromPascalCase(pascal: string): string | null {
  if (!PASCAL_NAME_PATTERN.test(pascal)) return null;
  return pascal.replace(/(?!^)([A-Z])/g, "-$1").toLowerCase();
}

export function normalizeContent(content: string): string {
  return content.replace(/\r\n/g, "\n").trimEnd() + "\n";
}

export function byteLength(content: string): number {
  return Buffer.byteLength(content, "utf8");
}
