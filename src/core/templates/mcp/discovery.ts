export const OPERATION_SCHEMA_TEMPLATE = `{
  "$schema": "https://json-schema.org/draft/2020-12/schema",
  "title": "{{class_name}} {{primary_operation}} input",
  "description": "{{type_summary}}",
  "type": "object",
  "properties": {
    "data": {
      "type": "object",
      "description": "Input data for the {{domain}} operation"
    },
    "options": {
      "type": "object",
      "description": "Optional processing parameters"
    }
  },
  "required": ["data"]
}
`;

export const TOOLS_CATALOG_TEMPLATE = `{
  "module": "{{module_name}}",
  "tools": [
    {
      "name": "{{module_snake}}_{{primary_operation}}",
      "description": "Execute the primary {{domain}} operation",
      "input_schema": "schemas/operation.schema.json"
    },
    {
      "name": "{{module_snake}}_health_check",
      "description": "Check health status of {{module_name}}",
      "input_schema": null
    },
    {
      "name": "{{module_snake}}_get_capabilities",
      "description": "Describe capabilities and API of {{module_name}}",
      "input_schema": null
    }
  ]
}
`;

export const RESOURCES_CATALOG_TEMPLATE = `{
  "module": "{{module_name}}",
  "resources": [
    {
      "uri": "{{module_name}}://schema/api",
      "name": "{{module_title}} API schema",
      "mime_type": "application/json"
    },
    {
      "uri": "{{module_name}}://metrics",
      "name": "{{module_title}} metrics",
      "mime_type": "application/json"
    }
  ]
}
`;

export const PROMPTS_CATALOG_TEMPLATE = `{
  "module": "{{module_name}}",
  "prompts": [
    {
      "name": "{{module_snake}}_usage",
      "description": "How to use {{module_name}} for {{domain}} tasks",
      "arguments": [
        {
          "name": "task",
          "description": "Task to accomplish",
          "required": true
        }
      ]
    }
  ]
}
`;

export const MCP_CLIENT_EXAMPLE_TEMPLATE = `"""
Example MCP client for {{module_name}}

Starts the server over stdio, lists its tools and calls the health check.
Run with: python examples/mcp_client_example.py
"""

import asyncio

from mcp import ClientSession, StdioServerParameters
from mcp.client.stdio import stdio_client

SERVER = StdioServerParameters(command="python", args=["{{module_name}}_server.py"])


async def main() -> None:
    async with stdio_client(SERVER) as (read_stream, write_stream):
        async with ClientSession(read_stream, write_stream) as session:
            await session.initialize()
            tools = await session.list_tools()
            print("Tools:", [tool.name for tool in tools.tools])

            health = await session.call_tool("{{module_snake}}_health_check", {})
            print("Health:", health.content[0].text)

            # AI_TODO: Call {{module_snake}}_{{primary_operation}} with {{domain}} data


if __name__ == "__main__":
    asyncio.run(main())
`;
