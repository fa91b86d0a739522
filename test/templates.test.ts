import { describe, expect, it } from "vitest";

import { TemplateError } from "../src/core/errors.js";
import { assertKnownTokens, listTemplateSets, lookupTemplateSet } from "../src/core/templates.js";
import { TOKEN_NAMES, extractPlaceholders } from "../src/core/templates/tokens.js";

const STANDARD_FILES = [
  "__init__.py",
  "core.py",
  "interface.py",
  "types.py",
  "tests/test_core.py",
  "tests/test_contracts.py",
  "docs/README.md",
  "examples/basic_usage.py",
  "AI_COMPLETION.md",
  "requirements.txt"
];

const MCP_FILES = [
  "__init__.py",
  "core.py",
  "interface.py",
  "types.py",
  "{{module_name}}_server.py",
  "mcp_config.json",
  "AI_COMPLETION.md",
  "requirements.txt",
  "pytest.ini",
  "tests/test_mcp_core.py",
  "tests/test_mcp_protocol.py",
  "tests/test_ai_integration.py",
  "docs/README.md",
  "docs/API.md",
  "docs/INTEGRATION.md",
  "examples/mcp_client_example.py",
  "schemas/operation.schema.json",
  "tools/tools.json",
  "resources/resources.json",
  "prompts/prompts.json"
];

const DOCKER_FILES = [
  "Dockerfile",
  "docker-compose.yml",
  "k8s/deployment.yaml",
  "k8s/service.yaml",
  "k8s/configmap.yaml",
  ".github/workflows/ci.yml",
  "scripts/build.sh",
  "scripts/deploy.sh"
];

function paths(moduleType: "CORE" | "INTEGRATION" | "SUPPORTING" | "TECHNICAL", mcpServer: boolean, withDocker: boolean): string[] {
  return lookupTemplateSet(moduleType, { mcpServer, withDocker }).templates.map((template) => template.path);
}

describe("template repository", () => {
  it("returns the standard ten-file layout", () => {
    expect(paths("CORE", false, false)).toEqual(STANDARD_FILES);
    expect(lookupTemplateSet("CORE", { mcpServer: false, withDocker: false }).directories).toEqual([
      "tests",
      "docs",
      "examples"
    ]);
  });

  it("returns the MCP server layout with its empty directories", () => {
    expect(paths("INTEGRATION", true, false)).toEqual(MCP_FILES);
    const directories = lookupTemplateSet("INTEGRATION", { mcpServer: true, withDocker: false }).directories;
    expect(directories).toContain("config");
    expect(directories).toContain("logs");
  });

  it("appends the containerization files when docker is requested", () => {
    expect(paths("SUPPORTING", false, true)).toEqual([...STANDARD_FILES, ...DOCKER_FILES]);
    expect(paths("TECHNICAL", true, true)).toEqual([...MCP_FILES, ...DOCKER_FILES]);
  });

  it("enumerates all sixteen combinations with unique ids", () => {
    const sets = listTemplateSets();
    expect(sets).toHaveLength(16);
    expect(new Set(sets.map((set) => set.id)).size).toBe(16);
    expect(sets.map((set) => set.templates.length).sort((a, b) => a - b)).toEqual([
      10, 10, 10, 10, 18, 18, 18, 18, 20, 20, 20, 20, 28, 28, 28, 28
    ]);
  });

  it("memoizes and freezes each set", () => {
    const first = lookupTemplateSet("CORE", { mcpServer: true, withDocker: true });
    const second = lookupTemplateSet("CORE", { mcpServer: true, withDocker: true });

    expect(second).toBe(first);
    expect(first.id).toBe("core+mcp+docker");
    expect(Object.isFrozen(first)).toBe(true);
    expect(Object.isFrozen(first.templates)).toBe(true);
    expect(Object.isFrozen(first.flags)).toBe(true);
  });

  it("uses a type-specific core.py per module type", () => {
    const bodies = (["CORE", "INTEGRATION", "SUPPORTING", "TECHNICAL"] as const).map(
      (moduleType) => lookupTemplateSet(moduleType, { mcpServer: false, withDocker: false }).templates[1]?.body
    );
    expect(new Set(bodies).size).toBe(4);
  });

  it("only uses placeholders from the token vocabulary", () => {
    const vocabulary = new Set<string>(TOKEN_NAMES);
    for (const set of listTemplateSets()) {
      for (const template of set.templates) {
        for (const token of extractPlaceholders(`${template.path}\n${template.body}`)) {
          expect(vocabulary.has(token), `${set.id}/${template.key} uses ${token}`).toBe(true);
        }
      }
    }
  });

  it("rejects templates that reference unknown tokens", () => {
    const run = () => assertKnownTokens("custom", [{ key: "broken", path: "broken.py", body: "print('{{ author }}')\n" }]);

    expect(run).toThrow(TemplateError);
    expect(run).toThrow('Template "broken" in set "custom" uses unknown token "author".');
  });
});
