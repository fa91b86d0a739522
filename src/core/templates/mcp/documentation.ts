export const MCP_README_TEMPLATE = `# {{module_title}} MCP Server

**Type**: {{module_type}}
**Domain**: {{domain}}
**Protocol**: Model Context Protocol (stdio transport)

{{type_summary}}

## Quick Start

\`\`\`bash
pip install -r requirements.txt
python {{module_name}}_server.py
\`\`\`

## Discovery

| Kind | Catalog | Entries |
| --- | --- | --- |
| Tools | \`tools/tools.json\` | \`{{module_snake}}_{{primary_operation}}\`, \`{{module_snake}}_health_check\`, \`{{module_snake}}_get_capabilities\` |
| Resources | \`resources/resources.json\` | \`{{module_name}}://schema/api\`, \`{{module_name}}://metrics\` |
| Prompts | \`prompts/prompts.json\` | \`{{module_snake}}_usage\` |

Input schemas live in \`schemas/\`. Server settings live in \`mcp_config.json\`.

## Development

\`\`\`bash
pytest
pytest -m protocol
pytest -m ai_integration
\`\`\`

See \`docs/API.md\` for the tool reference and \`docs/INTEGRATION.md\` for client setup.
`;

export const MCP_API_TEMPLATE = `# {{module_title}} MCP API

## Tools

### \`{{module_snake}}_{{primary_operation}}\`

Executes the primary {{domain}} operation.

| Argument | Type | Required | Description |
| --- | --- | --- | --- |
| \`data\` | object | yes | Input data for the operation |
| \`options\` | object | no | Optional processing parameters |

Returns a JSON text block: \`{"success": bool, "data": object | null, "error": string | null}\`.

### \`{{module_snake}}_health_check\`

No arguments. Returns \`status\`, \`module\`, \`server\` and \`timestamp\`.

### \`{{module_snake}}_get_capabilities\`

No arguments. Returns the module name, type, domain and the tool, resource and prompt names.

## Resources

- \`{{module_name}}://schema/api\`: JSON schema of the primary operation
- \`{{module_name}}://metrics\`: request and error counters

## Prompts

- \`{{module_snake}}_usage(task)\`: instructions for accomplishing a {{domain}} task with this server

## Errors

Unknown tools, resources and prompts raise \`ValueError\`, reported by the MCP runtime as JSON-RPC errors.
`;

export const MCP_INTEGRATION_TEMPLATE = `# Integrating {{module_title}}

## Claude Desktop / MCP clients

Add the server to the client configuration:

\`\`\`json
{
  "mcpServers": {
    "{{module_name}}": {
      "command": "python",
      "args": ["{{module_name}}_server.py"]
    }
  }
}
\`\`\`

## From another module

\`\`\`python
from {{module_snake}} import create_mcp_server

server = create_mcp_server()
await server.initialize()
result = await server.execute_primary_operation({"example": True})
\`\`\`

## Deployment

{{deployment_guidance}}
`;

export const MCP_AI_COMPLETION_TEMPLATE = `# AI Completion Guide for the {{class_name}} MCP Server

**Module Type**: {{module_type}}
**Domain**: {{domain}}
**Framework**: Standardized Modules v{{framework_version}} (MCP)

## Module Purpose

{{type_summary}}

## Implementation Checklist

- [ ] Implement \`execute_primary_operation()\` in \`core.py\` (\`AI_IMPLEMENTATION_REQUIRED\` markers)
- [ ] Replace \`_process_business_logic()\` with real {{domain}} logic
- [ ] Extend \`schemas/operation.schema.json\` with the real input fields
- [ ] Keep \`tools/tools.json\`, \`resources/resources.json\` and \`prompts/prompts.json\` in sync with \`core.py\`
- [ ] Make \`tests/test_mcp_core.py\`, \`tests/test_mcp_protocol.py\` and \`tests/test_ai_integration.py\` pass

## Module Type Guidance

{{type_guidance}}

## Suggested Prompt

\`\`\`text
Implement execute_primary_operation() in {{module_name}}/core.py for the {{domain}} domain.
Keep the MCP tool names, update schemas/operation.schema.json for the new input fields,
and add pytest cases for each tool.
\`\`\`

## Deployment

{{deployment_guidance}}
`;
