export const MCP_TEST_CORE_TEMPLATE = `"""
Core tests for the {{class_name}} MCP server
"""

import pytest

from {{module_snake}}.core import {{class_name}}MCPServer
from {{module_snake}}.types import {{class_name}}Config


@pytest.fixture
async def mcp_server():
    server = {{class_name}}MCPServer({{class_name}}Config())
    await server.initialize()
    yield server
    await server.cleanup()


async def test_mcp_server_initialization(mcp_server):
    health = await mcp_server.health_check()
    assert health["status"] == "healthy"
    assert health["server"] == "{{module_name}}-mcp-server"


async def test_capabilities(mcp_server):
    capabilities = await mcp_server.get_capabilities()
    assert capabilities["type"] == "{{module_type}}"
    assert "{{module_snake}}_{{primary_operation}}" in capabilities["tools"]


async def test_api_schema_resource(mcp_server):
    schema = await mcp_server.get_api_schema()
    assert schema["operation"] == "{{primary_operation}}"
    assert schema["input"]["type"] == "object"


async def test_primary_operation_rejects_uninitialized_server():
    server = {{class_name}}MCPServer({{class_name}}Config())
    result = await server.execute_primary_operation({})
    assert not result.success


async def test_primary_operation(mcp_server):
    # AI_TODO: Use realistic {{domain}} input
    result = await mcp_server.execute_primary_operation({"tasks": []})
    assert result.success
`;

export const MCP_TEST_PROTOCOL_TEMPLATE = `"""
MCP protocol compliance tests for {{module_name}}
"""

import json

import pytest

from {{module_snake}}.core import {{class_name}}MCPServer
from {{module_snake}}.types import {{class_name}}Config

pytestmark = pytest.mark.protocol


@pytest.fixture
async def mcp_server():
    server = {{class_name}}MCPServer({{class_name}}Config())
    await server.initialize()
    yield server
    await server.cleanup()


async def test_server_name(mcp_server):
    assert mcp_server.server.name == "{{module_name}}-mcp-server"


async def test_tool_results_are_json(mcp_server):
    payload = await mcp_server.health_check()
    assert json.loads(json.dumps(payload, default=str))["module"] == "{{class_name}}"


async def test_metrics_track_requests(mcp_server):
    metrics = await mcp_server.get_metrics()
    assert metrics["requests"] == 0
    assert metrics["errors"] == 0


async def test_config_round_trip():
    config = {{class_name}}Config()
    assert config.validate()
    assert config.to_dict()["server_name"] == "{{module_name}}-mcp-server"
`;

export const MCP_TEST_AI_INTEGRATION_TEMPLATE = `"""
AI discoverability tests for {{module_name}}
"""

import json
from pathlib import Path

import pytest

pytestmark = pytest.mark.ai_integration

MODULE_ROOT = Path(__file__).resolve().parent.parent


def load_json(relative: str):
    return json.loads((MODULE_ROOT / relative).read_text(encoding="utf-8"))


def test_tools_catalog_matches_server():
    tools = load_json("tools/tools.json")["tools"]
    names = [tool["name"] for tool in tools]
    assert "{{module_snake}}_{{primary_operation}}" in names


def test_every_tool_has_description():
    for tool in load_json("tools/tools.json")["tools"]:
        assert tool["description"].strip()


def test_resources_use_module_scheme():
    for resource in load_json("resources/resources.json")["resources"]:
        assert resource["uri"].startswith("{{module_name}}://")


def test_prompts_declare_arguments():
    for prompt in load_json("prompts/prompts.json")["prompts"]:
        assert prompt["arguments"]


def test_operation_schema_is_object():
    schema = load_json("schemas/operation.schema.json")
    assert schema["type"] == "object"
    assert "data" in schema["properties"]
`;
