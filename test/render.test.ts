import { tmpdir } from "node:os";

import { describe, expect, it } from "vitest";

import { TemplateError } from "../src/core/errors.js";
import { renderTemplate, renderTemplateSet } from "../src/core/render.js";
import { parseModuleSpec } from "../src/core/spec.js";
import { lookupTemplateSet } from "../src/core/templates.js";
import { LEFTOVER_PLACEHOLDER_PATTERN, buildTokenValues } from "../src/core/templates/tokens.js";
import type { ModuleSpec } from "../src/core/types.js";

function spec(overrides: { name?: string; type?: string; domain?: string; mcpServer?: boolean; withDocker?: boolean } = {}): ModuleSpec {
  return parseModuleSpec(
    {
      name: overrides.name ?? "user-management",
      type: overrides.type ?? "CORE",
      domain: overrides.domain ?? "ecommerce",
      mcpServer: overrides.mcpServer ?? false,
      withDocker: overrides.withDocker ?? false
    },
    { workspaceRoot: tmpdir() }
  );
}

describe("token substitution", () => {
  it("renders the requirements file for a core module", () => {
    const moduleSpec = spec();
    const files = renderTemplateSet(lookupTemplateSet(moduleSpec.type, moduleSpec.flags), moduleSpec);
    const requirements = files.find((file) => file.path === "requirements.txt");

    expect(requirements?.content).toBe(
      [
        "# User Management (CORE, ecommerce)",
        "",
        "# Core dependencies",
        "pydantic>=1.8.0",
        "python-dotenv>=0.19.0",
        "",
        "# Development dependencies",
        "pytest>=6.2.0",
        "pytest-asyncio>=0.15.0",
        "pytest-cov>=2.12.0",
        "black>=21.0.0",
        "mypy>=0.910",
        ""
      ].join("\n")
    );
  });

  it("substitutes placeholders in output paths", () => {
    const moduleSpec = spec({ name: "payment-gateway", type: "INTEGRATION", mcpServer: true });
    const paths = renderTemplateSet(lookupTemplateSet(moduleSpec.type, moduleSpec.flags), moduleSpec).map((file) => file.path);

    expect(paths).toContain("payment-gateway_server.py");
    expect(paths.some((path) => path.includes("{{"))).toBe(false);
  });

  it("leaves no placeholders in any rendered combination", () => {
    for (const type of ["CORE", "INTEGRATION", "SUPPORTING", "TECHNICAL"]) {
      for (const mcpServer of [false, true]) {
        for (const withDocker of [false, true]) {
          const moduleSpec = spec({ type, mcpServer, withDocker });
          for (const file of renderTemplateSet(lookupTemplateSet(moduleSpec.type, moduleSpec.flags), moduleSpec)) {
            expect(LEFTOVER_PLACEHOLDER_PATTERN.test(file.content), file.path).toBe(false);
            expect(file.content.endsWith("\n")).toBe(true);
            expect(file.content.endsWith("\n\n")).toBe(false);
          }
        }
      }
    }
  });

  it("normalizes line endings and trailing whitespace", () => {
    const values = buildTokenValues(spec());
    const file = renderTemplate("custom", { key: "note", path: "NOTE.md", body: "Name: {{ class_name }}\r\nType: {{module_type}}\n\n\n" }, values);

    expect(file).toEqual({ path: "NOTE.md", content: "Name: UserManagement\nType: CORE\n", byteSize: 32 });
  });

  it("counts UTF-8 bytes", () => {
    const values = buildTokenValues({ ...spec(), domain: "café" });
    const file = renderTemplate("custom", { key: "domain", path: "DOMAIN.txt", body: "{{domain}}" }, values);

    expect(file.content).toBe("café\n");
    expect(file.byteSize).toBe(6);
  });

  it("does not expand placeholders that appear inside substituted values", () => {
    const values = buildTokenValues({ ...spec(), domain: "{{module_name}}" });

    expect(() => renderTemplate("custom", { key: "domain", path: "DOMAIN.txt", body: "{{domain}}" }, values)).toThrow(
      'Template "domain" in set "custom" left {{module_name}} unresolved in its body.'
    );
  });

  it("raises UnresolvedToken for placeholders outside the vocabulary", () => {
    const values = buildTokenValues(spec());
    const run = () => renderTemplate("custom", { key: "broken", path: "broken.py", body: "print('{{ author }}')" }, values);

    expect(run).toThrow(TemplateError);
    try {
      run();
    } catch (error) {
      expect(error).toMatchObject({ code: "TEMPLATE", kind: "UnresolvedToken", exitCode: 3 });
    }
  });

  it("renders identical output for identical specs", () => {
    const first = spec({ type: "SUPPORTING", mcpServer: true, withDocker: true });
    const second = spec({ type: "SUPPORTING", mcpServer: true, withDocker: true });
    const set = lookupTemplateSet(first.type, first.flags);

    expect(renderTemplateSet(set, first)).toEqual(renderTemplateSet(set, second));
  });
});
