import { TemplateError } from "./errors.js";
import { MODULE_TYPES } from "./spec.js";
import {
  BUILD_SCRIPT_TEMPLATE,
  CI_WORKFLOW_TEMPLATE,
  COMPOSE_TEMPLATES,
  DEPLOY_SCRIPT_TEMPLATE,
  DOCKERFILE_TEMPLATE,
  K8S_CONFIGMAP_TEMPLATE,
  K8S_DEPLOYMENT_TEMPLATE,
  K8S_SERVICE_TEMPLATE,
  MCP_DOCKERFILE_TEMPLATE
} from "./templates/containerization.js";
import { CORE_MODULE_TEMPLATES } from "./templates/core-modules.js";
import {
  MCP_CLIENT_EXAMPLE_TEMPLATE,
  OPERATION_SCHEMA_TEMPLATE,
  PROMPTS_CATALOG_TEMPLATE,
  RESOURCES_CATALOG_TEMPLATE,
  TOOLS_CATALOG_TEMPLATE
} from "./templates/mcp/discovery.js";
import {
  MCP_AI_COMPLETION_TEMPLATE,
  MCP_API_TEMPLATE,
  MCP_INTEGRATION_TEMPLATE,
  MCP_README_TEMPLATE
} from "./templates/mcp/documentation.js";
import {
  MCP_CONFIG_TEMPLATE,
  MCP_CORE_TEMPLATES,
  MCP_INIT_TEMPLATE,
  MCP_INTERFACE_TEMPLATE,
  MCP_PYTEST_TEMPLATE,
  MCP_REQUIREMENTS_TEMPLATE,
  MCP_RUNNER_TEMPLATE,
  MCP_TYPES_TEMPLATE
} from "./templates/mcp/server.js";
import { MCP_TEST_AI_INTEGRATION_TEMPLATE, MCP_TEST_CORE_TEMPLATE, MCP_TEST_PROTOCOL_TEMPLATE } from "./templates/mcp/tests.js";
import {
  AI_COMPLETION_TEMPLATE,
  INIT_TEMPLATE,
  INTERFACE_TEMPLATE,
  README_TEMPLATE,
  REQUIREMENTS_TEMPLATE,
  TEST_CONTRACTS_TEMPLATE,
  TEST_CORE_TEMPLATE,
  TYPES_TEMPLATE,
  USAGE_EXAMPLE_TEMPLATE
} from "./templates/package-files.js";
import { extractPlaceholders, isTokenName } from "./templates/tokens.js";
import type { ModuleType, TemplateEntry, TemplateFlags, TemplateSet } from "./types.js";

const STANDARD_DIRECTORIES = ["tests", "docs", "examples"] as const;
const MCP_DIRECTORIES = ["tests", "docs", "examples", "config", "logs", "schemas", "tools", "resources", "prompts"] as const;
const DOCKER_DIRECTORIES = ["k8s", ".github/workflows", "scripts"] as const;

const cache = new Map<string, TemplateSet>();

function entry(key: string, path: string, body: string): TemplateEntry {
  return Object.freeze({ key, path, body });
}

function standardTemplates(moduleType: ModuleType): TemplateEntry[] {
  return [
    entry("init", "__init__.py", INIT_TEMPLATE),
    entry("core", "core.py", CORE_MODULE_TEMPLATES[moduleType]),
    entry("interface", "interface.py", INTERFACE_TEMPLATE),
    entry("types", "types.py", TYPES_TEMPLATE),
    entry("tests/test_core", "tests/test_core.py", TEST_CORE_TEMPLATE),
    entry("tests/test_contracts", "tests/test_contracts.py", TEST_CONTRACTS_TEMPLATE),
    entry("docs/readme", "docs/README.md", README_TEMPLATE),
    entry("examples/basic_usage", "examples/basic_usage.py", USAGE_EXAMPLE_TEMPLATE),
    entry("ai_completion", "AI_COMPLETION.md", AI_COMPLETION_TEMPLATE),
    entry("requirements", "requirements.txt", REQUIREMENTS_TEMPLATE)
  ];
}

function mcpTemplates(moduleType: ModuleType): TemplateEntry[] {
  return [
    entry("init", "__init__.py", MCP_INIT_TEMPLATE),
    entry("core", "core.py", MCP_CORE_TEMPLATES[moduleType]),
    entry("interface", "interface.py", MCP_INTERFACE_TEMPLATE),
    entry("types", "types.py", MCP_TYPES_TEMPLATE),
    entry("server", "{{module_name}}_server.py", MCP_RUNNER_TEMPLATE),
    entry("mcp_config", "mcp_config.json", MCP_CONFIG_TEMPLATE),
    entry("ai_completion", "AI_COMPLETION.md", MCP_AI_COMPLETION_TEMPLATE),
    entry("requirements", "requirements.txt", MCP_REQUIREMENTS_TEMPLATE),
    entry("pytest_ini", "pytest.ini", MCP_PYTEST_TEMPLATE),
    entry("tests/test_mcp_core", "tests/test_mcp_core.py", MCP_TEST_CORE_TEMPLATE),
    entry("tests/test_mcp_protocol", "tests/test_mcp_protocol.py", MCP_TEST_PROTOCOL_TEMPLATE),
    entry("tests/test_ai_integration", "tests/test_ai_integration.py", MCP_TEST_AI_INTEGRATION_TEMPLATE),
    entry("docs/readme", "docs/README.md", MCP_README_TEMPLATE),
    entry("docs/api", "docs/API.md", MCP_API_TEMPLATE),
    entry("docs/integration", "docs/INTEGRATION.md", MCP_INTEGRATION_TEMPLATE),
    entry("examples/mcp_client_example", "examples/mcp_client_example.py", MCP_CLIENT_EXAMPLE_TEMPLATE),
    entry("schemas/operation", "schemas/operation.schema.json", OPERATION_SCHEMA_TEMPLATE),
    entry("tools/catalog", "tools/tools.json", TOOLS_CATALOG_TEMPLATE),
    entry("resources/catalog", "resources/resources.json", RESOURCES_CATALOG_TEMPLATE),
    entry("prompts/catalog", "prompts/prompts.json", PROMPTS_CATALOG_TEMPLATE)
  ];
}

function containerTemplates(moduleType: ModuleType, mcpServer: boolean): TemplateEntry[] {
  return [
    entry("docker/dockerfile", "Dockerfile", mcpServer ? MCP_DOCKERFILE_TEMPLATE : DOCKERFILE_TEMPLATE),
    entry("docker/compose", "docker-compose.yml", COMPOSE_TEMPLATES[moduleType]),
    entry("k8s/deployment", "k8s/deployment.yaml", K8S_DEPLOYMENT_TEMPLATE),
    entry("k8s/service", "k8s/service.yaml", K8S_SERVICE_TEMPLATE),
    entry("k8s/configmap", "k8s/configmap.yaml", K8S_CONFIGMAP_TEMPLATE),
    entry("ci/workflow", ".github/workflows/ci.yml", CI_WORKFLOW_TEMPLATE),
    entry("scripts/build", "scripts/build.sh", BUILD_SCRIPT_TEMPLATE),
    entry("scripts/deploy", "scripts/deploy.sh", DEPLOY_SCRIPT_TEMPLATE)
  ];
}

export function templateSetId(moduleType: ModuleType, flags: TemplateFlags): string {
  const parts: string[] = [moduleType.toLowerCase()];
  if (flags.mcpServer) parts.push("mcp");
  if (flags.withDocker) parts.push("docker");
  return parts.join("+");
}

export function assertKnownTokens(id: string, templates: readonly TemplateEntry[]): void {
  for (const template of templates) {
    for (const token of extractPlaceholders(`${template.path}\n${template.body}`)) {
      if (!isTokenName(token)) {
        throw new TemplateError("UnknownToken", `Template "${template.key}" in set "${id}" uses unknown token "${token}".`, {
          details: { templateSet: id, template: template.key, token }
        });
      }
    }
  }
}

function buildTemplateSet(moduleType: ModuleType, flags: TemplateFlags): TemplateSet {
  const id = templateSetId(moduleType, flags);
  const templates = flags.mcpServer ? mcpTemplates(moduleType) : standardTemplates(moduleType);
  const directories: string[] = flags.mcpServer ? [...MCP_DIRECTORIES] : [...STANDARD_DIRECTORIES];
  if (flags.withDocker) {
    templates.push(...containerTemplates(moduleType, flags.mcpServer));
    directories.push(...DOCKER_DIRECTORIES);
  }

  assertKnownTokens(id, templates);

  return Object.freeze({
    id,
    moduleType,
    flags: Object.freeze({ withDocker: flags.withDocker, mcpServer: flags.mcpServer }),
    directories: Object.freeze(directories),
    templates: Object.freeze(templates)
  });
}

export function lookupTemplateSet(moduleType: ModuleType, flags: TemplateFlags): TemplateSet {
  const id = templateSetId(moduleType, flags);
  const cached = cache.get(id);
  if (cached) return cached;

  const set = buildTemplateSet(moduleType, flags);
  cache.set(id, set);
  return set;
}

export function listTemplateSets(): TemplateSet[] {
  const sets: TemplateSet[] = [];
  for (const moduleType of MODULE_TYPES) {
    for (const mcpServer of [false, true]) {
      for (const withDocker of [false, true]) {
        sets.push(lookupTemplateSet(moduleType, { withDocker, mcpServer }));
      }
    }
  }
  return sets;
}
