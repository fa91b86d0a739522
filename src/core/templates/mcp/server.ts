import type { ModuleType } from "../../types.js";

const MCP_SERVER_HEADER = `"""
{{class_name}} MCP Server - {{module_type}} module

MCP server for the {{domain}} domain.
{{type_summary}}
Exposes tools, resources and prompts for AI discovery and integration.
"""

import asyncio
import json
import logging
from datetime import datetime
from typing import Any, Dict, List

from mcp import types
from mcp.server import Server
from mcp.types import Prompt, PromptArgument, Resource, Tool

from .interface import {{class_name}}Interface
from .types import {{class_name}}Config, {{class_name}}Result

logger = logging.getLogger(__name__)

SERVER_NAME = "{{module_name}}-mcp-server"


class {{class_name}}MCPServer({{class_name}}Interface):
    """MCP server implementation for the {{module_title}} module."""

    def __init__(self, config: {{class_name}}Config):
        self.config = config
        self.server = Server(name=SERVER_NAME)
        self._initialized = False
        self._request_count = 0
        self._error_count = 0
        self._setup_mcp_handlers()

    def _setup_mcp_handlers(self) -> None:
        """Register MCP protocol handlers"""

        @self.server.list_tools()
        async def list_tools() -> List[Tool]:
            return [
                Tool(
                    name="{{module_snake}}_{{primary_operation}}",
                    description="Execute the primary {{domain}} operation",
                    inputSchema=self._load_schema("operation.schema.json"),
                ),
                Tool(
                    name="{{module_snake}}_health_check",
                    description="Check health status of {{module_name}}",
                    inputSchema={"type": "object", "properties": {}},
                ),
                Tool(
                    name="{{module_snake}}_get_capabilities",
                    description="Describe capabilities and API of {{module_name}}",
                    inputSchema={"type": "object", "properties": {}},
                ),
            ]

        @self.server.list_resources()
        async def list_resources() -> List[Resource]:
            return [
                Resource(
                    uri="{{module_name}}://schema/api",
                    name="{{module_title}} API schema",
                    mimeType="application/json",
                ),
                Resource(
                    uri="{{module_name}}://metrics",
                    name="{{module_title}} metrics",
                    mimeType="application/json",
                ),
            ]

        @self.server.list_prompts()
        async def list_prompts() -> List[Prompt]:
            return [
                Prompt(
                    name="{{module_snake}}_usage",
                    description="How to use {{module_name}} for {{domain}} tasks",
                    arguments=[PromptArgument(name="task", description="Task to accomplish", required=True)],
                ),
            ]

        @self.server.call_tool()
        async def call_tool(name: str, arguments: Dict[str, Any]) -> List[types.TextContent]:
            self._request_count += 1
            if name == "{{module_snake}}_{{primary_operation}}":
                result = await self.execute_primary_operation(arguments.get("data", {}))
                payload: Dict[str, Any] = {"success": result.success, "data": result.data, "error": result.error}
            elif name == "{{module_snake}}_health_check":
                payload = await self.health_check()
            elif name == "{{module_snake}}_get_capabilities":
                payload = await self.get_capabilities()
            else:
                self._error_count += 1
                raise ValueError(f"Unknown tool: {name}")
            return [types.TextContent(type="text", text=json.dumps(payload, default=str))]

        @self.server.read_resource()
        async def read_resource(uri: str) -> str:
            if uri == "{{module_name}}://schema/api":
                return json.dumps(await self.get_api_schema())
            if uri == "{{module_name}}://metrics":
                return json.dumps(await self.get_metrics())
            raise ValueError(f"Unknown resource: {uri}")

        @self.server.get_prompt()
        async def get_prompt(name: str, arguments: Dict[str, str]) -> types.GetPromptResult:
            if name != "{{module_snake}}_usage":
                raise ValueError(f"Unknown prompt: {name}")
            task = arguments.get("task", "")
            text = f"Use the {{module_snake}}_{{primary_operation}} tool to accomplish: {task}"
            return types.GetPromptResult(
                description="{{module_title}} usage",
                messages=[types.PromptMessage(role="user", content=types.TextContent(type="text", text=text))],
            )

    def _load_schema(self, file_name: str) -> Dict[str, Any]:
        from pathlib import Path

        schema_path = Path(__file__).parent / "schemas" / file_name
        return json.loads(schema_path.read_text(encoding="utf-8"))

    async def initialize(self) -> bool:
        """Initialize module resources"""
        try:
            # AI_TODO: Acquire {{domain}} resources (database, clients, caches)
            self._initialized = True
            logger.info("{{class_name}} MCP server initialized")
            return True
        except Exception as e:
            logger.error(f"Failed to initialize {{class_name}} MCP server: {e}")
            return False
`;

const MCP_PRIMARY_OPERATIONS: Readonly<Record<ModuleType, string>> = Object.freeze({
  CORE: `
    async def execute_primary_operation(self, data: Dict[str, Any]) -> {{class_name}}Result:
        """Validate and process a {{domain}} business request"""
        if not self._initialized:
            return {{class_name}}Result(success=False, error="Server not initialized")
        if not self._validate_input(data):
            return {{class_name}}Result(success=False, error="Input validation failed")
        # AI_IMPLEMENTATION_REQUIRED: Core {{domain}} business processing
        processed = await self._process_business_logic(data)
        await self._create_audit_entry(data, processed)
        return {{class_name}}Result(success=True, data=processed)

    async def _create_audit_entry(self, input_data: Dict[str, Any], output_data: Dict[str, Any]) -> None:
        # AI_TODO: Persist an immutable audit trail
        logger.info("Audit entry recorded for %s", SERVER_NAME)
`,
  INTEGRATION: `
    async def execute_primary_operation(self, data: Dict[str, Any]) -> {{class_name}}Result:
        """Forward a request to the external {{domain}} service with retries"""
        if not self._initialized:
            return {{class_name}}Result(success=False, error="Server not initialized")
        if not self._validate_input(data):
            return {{class_name}}Result(success=False, error="Input validation failed")
        for attempt in range(self.config.max_retries + 1):
            try:
                # AI_IMPLEMENTATION_REQUIRED: Call the external service (circuit breaker + rate limit)
                processed = await self._process_business_logic(data)
                return {{class_name}}Result(success=True, data=processed)
            except Exception as e:
                if attempt == self.config.max_retries:
                    self._error_count += 1
                    return {{class_name}}Result(success=False, error=str(e))
                await asyncio.sleep(2 ** attempt)
        return {{class_name}}Result(success=False, error="Max retries exceeded")
`,
  SUPPORTING: `
    async def execute_primary_operation(self, data: Dict[str, Any]) -> {{class_name}}Result:
        """Start a {{domain}} workflow and run its tasks"""
        if not self._initialized:
            return {{class_name}}Result(success=False, error="Server not initialized")
        if not self._validate_input(data) or not isinstance(data.get("tasks"), list):
            return {{class_name}}Result(success=False, error="Workflow definition requires a task list")
        # AI_IMPLEMENTATION_REQUIRED: Schedule tasks, track state and compensate on failure
        processed = await self._process_business_logic(data)
        return {{class_name}}Result(success=True, data={"workflow": processed, "tasks": len(data["tasks"])})
`,
  TECHNICAL: `
    async def execute_primary_operation(self, data: Dict[str, Any]) -> {{class_name}}Result:
        """Serve an infrastructure request (cache, metrics or logging)"""
        if not self._initialized:
            return {{class_name}}Result(success=False, error="Server not initialized")
        if not self._validate_input(data):
            return {{class_name}}Result(success=False, error="Input validation failed")
        # AI_IMPLEMENTATION_REQUIRED: Dispatch on data["operation"] (cache_get, cache_set, record_metric)
        processed = await self._process_business_logic(data)
        return {{class_name}}Result(success=True, data=processed)
`
});

const MCP_SERVER_FOOTER = `
    def _validate_input(self, data: Dict[str, Any]) -> bool:
        # AI_TODO: Apply {{domain}} validation rules
        return isinstance(data, dict)

    async def _process_business_logic(self, data: Dict[str, Any]) -> Dict[str, Any]:
        # AI_IMPLEMENTATION_REQUIRED: Replace with real {{domain}} logic
        return {
            "input": data,
            "processed_at": datetime.utcnow().isoformat(),
            "processor": "{{class_name}}",
        }

    async def get_capabilities(self) -> Dict[str, Any]:
        """Describe the module for AI discovery"""
        return {
            "name": "{{module_name}}",
            "type": "{{module_type}}",
            "domain": "{{domain}}",
            "summary": "{{type_summary}}",
            "tools": ["{{module_snake}}_{{primary_operation}}", "{{module_snake}}_health_check", "{{module_snake}}_get_capabilities"],
            "resources": ["{{module_name}}://schema/api", "{{module_name}}://metrics"],
            "prompts": ["{{module_snake}}_usage"],
        }

    async def get_api_schema(self) -> Dict[str, Any]:
        return {
            "operation": "{{primary_operation}}",
            "input": self._load_schema("operation.schema.json"),
        }

    async def get_metrics(self) -> Dict[str, Any]:
        return {
            "requests": self._request_count,
            "errors": self._error_count,
            "timestamp": datetime.utcnow().isoformat(),
        }

    async def health_check(self) -> Dict[str, Any]:
        return {
            "status": "healthy" if self._initialized else "not_initialized",
            "module": "{{class_name}}",
            "server": SERVER_NAME,
            "timestamp": datetime.utcnow().isoformat(),
        }

    async def cleanup(self) -> None:
        # AI_TODO: Release {{domain}} resources
        self._initialized = False
        logger.info("{{class_name}} MCP server cleaned up")


def create_{{module_snake}}_mcp_server(config: {{class_name}}Config) -> {{class_name}}MCPServer:
    """Factory function to create a {{class_name}}MCPServer instance"""
    return {{class_name}}MCPServer(config)
`;

export const MCP_CORE_TEMPLATES: Readonly<Record<ModuleType, string>> = Object.freeze({
  CORE: MCP_SERVER_HEADER + MCP_PRIMARY_OPERATIONS.CORE + MCP_SERVER_FOOTER,
  INTEGRATION: MCP_SERVER_HEADER + MCP_PRIMARY_OPERATIONS.INTEGRATION + MCP_SERVER_FOOTER,
  SUPPORTING: MCP_SERVER_HEADER + MCP_PRIMARY_OPERATIONS.SUPPORTING + MCP_SERVER_FOOTER,
  TECHNICAL: MCP_SERVER_HEADER + MCP_PRIMARY_OPERATIONS.TECHNICAL + MCP_SERVER_FOOTER
});

export const MCP_INTERFACE_TEMPLATE = `"""
MCP interface definition for {{class_name}}
"""

from abc import ABC, abstractmethod
from typing import Any, Dict

from .types import {{class_name}}Result


class {{class_name}}Interface(ABC):
    """Contract shared by every {{module_title}} MCP server implementation."""

    @abstractmethod
    async def initialize(self) -> bool:
        """Acquire resources. Returns True when the server is ready."""

    @abstractmethod
    async def health_check(self) -> Dict[str, Any]:
        """Return health status information."""

    @abstractmethod
    async def get_capabilities(self) -> Dict[str, Any]:
        """Describe tools, resources and prompts for discovery."""

    @abstractmethod
    async def get_api_schema(self) -> Dict[str, Any]:
        """Return the JSON schema of the primary operation."""

    @abstractmethod
    async def execute_primary_operation(self, data: Dict[str, Any]) -> {{class_name}}Result:
        """Run the module's primary {{domain}} operation."""

    @abstractmethod
    async def cleanup(self) -> None:
        """Release resources on shutdown."""
`;

export const MCP_TYPES_TEMPLATE = `"""
Type definitions for the {{class_name}} MCP server
"""

from dataclasses import asdict, dataclass, field
from datetime import datetime
from typing import Any, Dict, List, Optional


@dataclass
class {{class_name}}Config:
    """Configuration for {{class_name}}MCPServer"""

    server_name: str = "{{module_name}}-mcp-server"
    log_level: str = "INFO"
    timeout_seconds: int = 30
    max_retries: int = 3
    rate_limit_per_minute: int = 100
    # AI_TODO: Add {{domain}} configuration fields

    def validate(self) -> bool:
        return self.timeout_seconds > 0 and self.max_retries >= 0 and self.rate_limit_per_minute > 0

    def to_dict(self) -> Dict[str, Any]:
        return asdict(self)


@dataclass
class {{class_name}}Result:
    """Result of an MCP tool invocation"""

    success: bool
    data: Optional[Dict[str, Any]] = None
    error: Optional[str] = None
    timestamp: datetime = field(default_factory=datetime.utcnow)

    def to_dict(self) -> Dict[str, Any]:
        return {
            "success": self.success,
            "data": self.data,
            "error": self.error,
            "timestamp": self.timestamp.isoformat(),
        }


@dataclass
class ToolDescriptor:
    """Discovery record for one MCP tool"""

    name: str
    description: str
    input_schema: Dict[str, Any]
    examples: List[Dict[str, Any]] = field(default_factory=list)

    def to_dict(self) -> Dict[str, Any]:
        return asdict(self)
`;

export const MCP_INIT_TEMPLATE = `"""
{{class_name}} MCP Server

{{type_summary}}
"""

from typing import Any, Dict, Optional

from .core import {{class_name}}MCPServer
from .types import {{class_name}}Config, {{class_name}}Result

__version__ = "1.0.0"

__all__ = [
    "{{class_name}}MCPServer",
    "{{class_name}}Config",
    "{{class_name}}Result",
    "create_mcp_server",
    "get_mcp_server_info",
]


def get_mcp_server_info() -> Dict[str, Any]:
    return {
        "name": "{{module_name}}",
        "type": "{{module_type}}",
        "domain": "{{domain}}",
        "version": __version__,
    }


def create_mcp_server(config: Optional[{{class_name}}Config] = None) -> {{class_name}}MCPServer:
    return {{class_name}}MCPServer(config or {{class_name}}Config())
`;

export const MCP_RUNNER_TEMPLATE = `#!/usr/bin/env python3
"""
Stdio runner for the {{module_name}} MCP server.

Usage: python {{module_name}}_server.py
"""

import asyncio
import logging
import sys

from mcp.server.stdio import stdio_server

from {{module_snake}} import create_mcp_server
from {{module_snake}}.types import {{class_name}}Config


def setup_logging(level: str) -> None:
    logging.basicConfig(
        level=getattr(logging, level.upper(), logging.INFO),
        format="%(asctime)s - %(name)s - %(levelname)s - %(message)s",
        stream=sys.stderr,
    )


async def run_mcp_server() -> None:
    config = {{class_name}}Config()
    setup_logging(config.log_level)
    mcp_server = create_mcp_server(config)
    if not await mcp_server.initialize():
        raise SystemExit("Failed to initialize {{module_name}} MCP server")
    try:
        async with stdio_server() as (read_stream, write_stream):
            await mcp_server.server.run(
                read_stream,
                write_stream,
                mcp_server.server.create_initialization_options(),
            )
    finally:
        await mcp_server.cleanup()


def main() -> None:
    asyncio.run(run_mcp_server())


if __name__ == "__main__":
    main()
`;

export const MCP_CONFIG_TEMPLATE = `{
  "mcp_server": {
    "name": "{{module_name}}",
    "version": "1.0.0",
    "type": "{{module_type}}",
    "domain": "{{domain}}",
    "protocol_version": "2024-11-05"
  },
  "transport": {
    "type": "stdio",
    "options": {
      "buffer_size": 8192,
      "timeout": 30
    }
  },
  "capabilities": {
    "tools": {
      "enabled": true,
      "max_concurrent": 10
    },
    "resources": {
      "enabled": true,
      "cache_ttl": 300
    },
    "prompts": {
      "enabled": true,
      "template_cache": true
    }
  },
  "logging": {
    "level": "INFO",
    "file": "logs/{{module_name}}_mcp.log"
  },
  "performance": {
    "max_request_size": "10MB",
    "request_timeout": 30,
    "rate_limit": {
      "enabled": true,
      "requests_per_minute": 100
    }
  },
  "ai_integration": {
    "auto_discovery": true,
    "schema_validation": true,
    "completion_hints": true
  }
}
`;

export const MCP_REQUIREMENTS_TEMPLATE = `# {{module_title}} MCP server ({{module_type}}, {{domain}})

mcp>=1.0.0
pydantic>=2.0.0
python-dotenv>=1.0.0

# Development dependencies
pytest>=7.4.0
pytest-asyncio>=0.21.0
pytest-cov>=4.1.0
mypy>=1.5.0
`;

export const MCP_PYTEST_TEMPLATE = `[pytest]
testpaths = tests
python_files = test_*.py
python_classes = Test*
python_functions = test_*
asyncio_mode = auto
addopts =
    --verbose
    --tb=short
    --cov={{module_snake}}
    --cov-report=term-missing
markers =
    protocol: MCP protocol compliance tests
    ai_integration: AI discoverability tests
`;
