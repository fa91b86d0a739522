export const INIT_TEMPLATE = `"""
{{class_name}} Module

Provides {{module_type_lower}} functionality for the {{domain}} domain.

Usage:
    from {{module_snake}} import {{class_name}}, {{class_name}}Config

    config = {{class_name}}Config()
    module = {{class_name}}(config)
    await module.initialize()
"""

from .core import {{class_name}}
from .types import {{class_name}}Config, {{class_name}}Result
from .interface import {{class_name}}Interface

__version__ = "1.0.0"

__all__ = [
    "{{class_name}}",
    "{{class_name}}Config",
    "{{class_name}}Result",
    "{{class_name}}Interface",
    "__version__",
]

MODULE_TYPE = "{{module_type}}"
MODULE_DOMAIN = "{{domain}}"
MODULE_NAME = "{{module_snake}}"
`;

export const INTERFACE_TEMPLATE = `"""
Interface definition for {{class_name}}

Defines the contract that the {{class_name}} implementation must follow.
"""

from abc import ABC, abstractmethod
from typing import Any, Dict

from .types import {{class_name}}Config, {{class_name}}Result


class {{class_name}}Interface(ABC):
    """Abstract contract for the {{module_title}} {{module_type_lower}} module."""

    @abstractmethod
    async def initialize(self) -> bool:
        """Acquire resources. Returns True when the module is ready."""

    @abstractmethod
    async def health_check(self) -> Dict[str, Any]:
        """Return health status information."""

    @abstractmethod
    async def cleanup(self) -> None:
        """Release resources on shutdown."""


# AI_TODO: Add module-specific interface methods
# Declare the operations external consumers rely on, starting with {{primary_operation}}().
`;

export const TYPES_TEMPLATE = `"""
Type definitions for {{class_name}}

Data models, configuration and result types used by the {{class_name}} module.
"""

from dataclasses import dataclass, field
from datetime import datetime
from enum import Enum
from typing import Any, Dict, List, Optional


@dataclass
class {{class_name}}Config:
    """Configuration for {{class_name}}"""

    # AI_TODO: Define configuration parameters specific to this module
    enabled: bool = True
    debug_mode: bool = False
    log_level: str = "INFO"

    timeout_seconds: int = 30
    max_retries: int = 3
    rate_limit_per_minute: int = 100

    base_url: Optional[str] = None
    api_key: Optional[str] = None

    def validate(self) -> bool:
        """Validate configuration parameters"""
        if self.timeout_seconds <= 0:
            return False
        if self.max_retries < 0:
            return False
        if self.rate_limit_per_minute <= 0:
            return False
        return True


@dataclass
class {{class_name}}Result:
    """Result object for {{class_name}} operations"""

    success: bool
    data: Optional[Dict[str, Any]] = None
    error: Optional[str] = None
    timestamp: Optional[datetime] = None

    def __post_init__(self):
        if self.timestamp is None:
            self.timestamp = datetime.utcnow()

    @property
    def is_success(self) -> bool:
        return self.success

    @property
    def has_error(self) -> bool:
        return self.error is not None


class OperationStatus(Enum):
    """Status of a long-running operation"""

    PENDING = "pending"
    IN_PROGRESS = "in_progress"
    COMPLETED = "completed"
    FAILED = "failed"
    CANCELLED = "cancelled"


@dataclass
class WorkflowState:
    """State of a workflow operation (if applicable)"""

    id: str
    definition: Dict[str, Any]
    status: OperationStatus
    created_at: datetime
    completed_at: Optional[datetime] = None
    tasks: Dict[str, Any] = field(default_factory=dict)
    error: Optional[str] = None


# AI_TODO: Add module-specific data models for the {{domain}} domain

ConfigDict = Dict[str, Any]
ResultDict = Dict[str, Any]
MetricsDict = Dict[str, List[float]]
`;

export const REQUIREMENTS_TEMPLATE = `# {{module_title}} ({{module_type}}, {{domain}})

# Core dependencies
pydantic>=1.8.0
python-dotenv>=0.19.0

# Development dependencies
pytest>=6.2.0
pytest-asyncio>=0.15.0
pytest-cov>=2.12.0
black>=21.0.0
mypy>=0.910
`;

export const USAGE_EXAMPLE_TEMPLATE = `"""
Basic usage example for {{class_name}}

Run with: python -m examples.basic_usage
"""

import asyncio

from {{module_snake}} import {{class_name}}, {{class_name}}Config


async def main() -> None:
    config = {{class_name}}Config(debug_mode=True)
    if not config.validate():
        raise SystemExit("Invalid configuration")

    module = {{class_name}}(config)
    await module.initialize()
    try:
        health = await module.health_check()
        print(f"{{module_title}} health: {health}")

        # AI_TODO: Replace with a realistic {{domain}} call to {{primary_operation}}()
    finally:
        await module.cleanup()


if __name__ == "__main__":
    asyncio.run(main())
`;

export const TEST_CORE_TEMPLATE = `"""
Unit tests for {{class_name}}

Covers initialization, the main {{primary_operation}}() operation and error paths.
"""

import pytest

from {{module_snake}}.core import {{class_name}}
from {{module_snake}}.types import {{class_name}}Config, {{class_name}}Result


class Test{{class_name}}:
    """Test suite for {{class_name}}"""

    @pytest.fixture
    def config(self) -> {{class_name}}Config:
        return {{class_name}}Config(
            enabled=True,
            debug_mode=True,
            timeout_seconds=10,
            max_retries=2,
        )

    @pytest.fixture
    async def module_instance(self, config: {{class_name}}Config) -> {{class_name}}:
        instance = {{class_name}}(config)
        await instance.initialize()
        yield instance
        await instance.cleanup()

    @pytest.mark.asyncio
    async def test_initialization_success(self, config: {{class_name}}Config):
        instance = {{class_name}}(config)
        assert await instance.initialize() is True
        await instance.cleanup()

    @pytest.mark.asyncio
    async def test_health_check(self, module_instance: {{class_name}}):
        health = await module_instance.health_check()
        assert health["status"] == "healthy"
        assert health["module"] == "{{class_name}}"

    @pytest.mark.asyncio
    async def test_config_validation(self):
        assert {{class_name}}Config().validate() is True
        assert {{class_name}}Config(timeout_seconds=0).validate() is False
        assert {{class_name}}Config(max_retries=-1).validate() is False

    @pytest.mark.asyncio
    async def test_main_operation(self, module_instance: {{class_name}}):
        # AI_TODO: Call {{primary_operation}}() with realistic {{domain}} data
        assert hasattr(module_instance, "{{primary_operation}}")

    @pytest.mark.asyncio
    async def test_result_defaults(self):
        result = {{class_name}}Result(success=True)
        assert result.is_success
        assert not result.has_error
        assert result.timestamp is not None

    @pytest.mark.asyncio
    async def test_cleanup(self, config: {{class_name}}Config):
        instance = {{class_name}}(config)
        await instance.initialize()
        await instance.cleanup()
        health = await instance.health_check()
        assert health["status"] == "not_initialized"
`;

export const TEST_CONTRACTS_TEMPLATE = `"""
Contract tests for {{class_name}}

Verifies that the implementation complies with {{class_name}}Interface
and the framework conventions.
"""

import inspect

import pytest

from {{module_snake}}.core import {{class_name}}
from {{module_snake}}.interface import {{class_name}}Interface
from {{module_snake}}.types import {{class_name}}Config, {{class_name}}Result


class Test{{class_name}}Compliance:
    """Compliance with framework standards"""

    def test_implements_interface(self):
        assert issubclass({{class_name}}, {{class_name}}Interface)
        missing = getattr({{class_name}}, "__abstractmethods__", frozenset())
        assert not missing, f"Missing interface methods: {sorted(missing)}"

    def test_required_methods_exist(self):
        for method_name in ["initialize", "health_check", "cleanup", "{{primary_operation}}"]:
            method = getattr({{class_name}}, method_name, None)
            assert callable(method), f"Missing required method: {method_name}"

    def test_lifecycle_methods_are_async(self):
        for method_name in ["initialize", "health_check", "cleanup"]:
            assert inspect.iscoroutinefunction(getattr({{class_name}}, method_name))

    def test_config_type_compliance(self):
        config = {{class_name}}Config()
        assert hasattr(config, "validate")
        assert isinstance(config.timeout_seconds, int)

    def test_result_type_compliance(self):
        result = {{class_name}}Result(success=False, error="failure")
        assert result.has_error
        assert not result.is_success

    @pytest.mark.asyncio
    async def test_health_check_contract(self):
        instance = {{class_name}}({{class_name}}Config())
        health = await instance.health_check()
        for key in ["status", "module", "timestamp"]:
            assert key in health

    def test_docstring_compliance(self):
        assert {{class_name}}.__doc__
        for method_name in ["initialize", "health_check", "cleanup"]:
            assert getattr({{class_name}}, method_name).__doc__
`;

export const README_TEMPLATE = `# {{module_title}} Module

**Type**: {{module_type}}
**Domain**: {{domain}}

## Overview

{{type_summary}}

This {{module_type_lower}} module provides {{domain}} domain functionality. Business logic is left as
\`AI_TODO\` markers; the structure, tests and configuration are ready to use.

## Layout

| Path | Purpose |
| --- | --- |
| \`core.py\` | {{class_name}} implementation |
| \`interface.py\` | Abstract contract |
| \`types.py\` | Configuration and result types |
| \`tests/\` | Unit and contract tests |
| \`examples/\` | Runnable usage example |

## Usage

\`\`\`python
from {{module_snake}} import {{class_name}}, {{class_name}}Config

module = {{class_name}}({{class_name}}Config())
await module.initialize()
\`\`\`

## Development

\`\`\`bash
pip install -r requirements.txt
pytest
pytest --cov={{module_snake}}
\`\`\`

## AI Completion

See \`AI_COMPLETION.md\` for prompts and completion guidance.
`;

export const AI_COMPLETION_TEMPLATE = `# AI Completion Guide for {{class_name}}

**Module Type**: {{module_type}}
**Domain**: {{domain}}
**Framework**: Standardized Modules v{{framework_version}}

## Module Purpose

{{type_summary}}

Implement the {{domain}} business logic; the scaffold already provides structure, tests and configuration.

## Implementation Checklist

- [ ] Review the contract in \`interface.py\`
- [ ] Implement \`{{primary_operation}}()\` and the \`AI_TODO\` markers in \`core.py\`
- [ ] Add domain fields to \`{{class_name}}Config\` and \`{{class_name}}Result\` in \`types.py\`
- [ ] Extend \`tests/test_core.py\` with {{domain}} scenarios
- [ ] Keep \`tests/test_contracts.py\` passing

## Module Type Guidance

{{type_guidance}}

## Suggested Prompt

\`\`\`text
Implement {{primary_operation}}() in {{module_name}}/core.py for the {{domain}} domain.
Follow {{class_name}}Interface, keep all AI_TODO contracts, and add pytest cases for
success, validation failure and error handling.
\`\`\`

## Deployment

{{deployment_guidance}}

## Quality Gates

- \`pytest --cov={{module_snake}}\` with at least 80% coverage
- \`mypy {{module_snake}}\` without errors
- No remaining \`AI_TODO\` or \`AI_IMPLEMENTATION_REQUIRED\` markers
`;
