import type { ModuleType } from "../types.js";

const CORE_BUSINESS_TEMPLATE = `"""
{{class_name}} - Core Business Module

Core business logic for the {{domain}} domain: business rule enforcement,
data validation and domain entity management.
"""

import logging
from datetime import datetime
from typing import Any, Dict

from .interface import {{class_name}}Interface
from .types import {{class_name}}Config, {{class_name}}Result

logger = logging.getLogger(__name__)


class {{class_name}}({{class_name}}Interface):
    """Core business logic implementation for the {{domain}} domain."""

    def __init__(self, config: {{class_name}}Config):
        self.config = config
        self._initialized = False
        logger.info("Initializing {{class_name}} for {{domain}} domain")

    async def initialize(self) -> bool:
        """Initialize the module with necessary resources"""
        try:
            # AI_TODO: Implement initialization logic
            # - Set up database connections
            # - Initialize external service clients
            # - Load and validate configuration
            self._initialized = True
            logger.info("{{class_name}} initialized")
            return True
        except Exception as e:
            logger.error(f"Failed to initialize {{class_name}}: {e}")
            return False

    async def process(self, data: Dict[str, Any]) -> {{class_name}}Result:
        """Main processing method for {{domain}} business operations"""
        if not self._initialized:
            raise RuntimeError("{{class_name}} not initialized. Call initialize() first.")

        try:
            if not self._validate_input(data):
                return {{class_name}}Result(success=False, error="Input validation failed")

            # AI_IMPLEMENTATION_REQUIRED: Core business processing
            processed = await self._process_business_logic(data)
            await self._create_audit_entry(data, processed)
            return {{class_name}}Result(success=True, data=processed)
        except Exception as e:
            logger.error(f"Processing failed in {{class_name}}: {e}")
            return {{class_name}}Result(success=False, error=str(e))

    def _validate_input(self, data: Dict[str, Any]) -> bool:
        """Validate input data against business rules"""
        # AI_TODO: Implement {{domain}} validation
        # - Check required fields
        # - Validate data types and formats
        # - Apply business rule constraints
        return isinstance(data, dict)

    async def _process_business_logic(self, data: Dict[str, Any]) -> Dict[str, Any]:
        """Core business logic processing"""
        # AI_IMPLEMENTATION_REQUIRED: Implement domain-specific business logic
        return {
            "input": data,
            "processed_at": datetime.utcnow().isoformat(),
            "processor": "{{class_name}}",
            "domain": "{{domain}}",
        }

    async def _create_audit_entry(self, input_data: Dict[str, Any], output_data: Dict[str, Any]) -> None:
        """Create audit trail entry for compliance"""
        # AI_TODO: Persist an immutable audit trail
        logger.info(
            "Audit entry: module=%s input_hash=%s output_hash=%s",
            "{{class_name}}",
            hash(str(input_data)),
            hash(str(output_data)),
        )

    async def health_check(self) -> Dict[str, Any]:
        """Health check for monitoring and alerting"""
        return {
            "status": "healthy" if self._initialized else "not_initialized",
            "module": "{{class_name}}",
            "domain": "{{domain}}",
            "timestamp": datetime.utcnow().isoformat(),
        }

    async def cleanup(self) -> None:
        """Cleanup resources on shutdown"""
        # AI_TODO: Close connections and flush pending operations
        self._initialized = False
        logger.info("{{class_name}} cleaned up")


def create_{{module_snake}}(config: {{class_name}}Config) -> {{class_name}}:
    """Factory function to create a {{class_name}} instance"""
    return {{class_name}}(config)
`;

const INTEGRATION_TEMPLATE = `"""
{{class_name}} - Integration Module

External service integration for the {{domain}} domain with circuit breaking,
retry with exponential backoff and rate limiting.
"""

import asyncio
import logging
from datetime import datetime, timedelta
from typing import Any, Dict, Optional

from .interface import {{class_name}}Interface
from .types import {{class_name}}Config, {{class_name}}Result

logger = logging.getLogger(__name__)

FAILURE_THRESHOLD = 5
CIRCUIT_RESET_AFTER = timedelta(minutes=5)


class CircuitBreakerOpenError(Exception):
    """Raised when the circuit breaker is open"""


class RateLimitExceeded(Exception):
    """Raised when the rate limit is exceeded"""


class {{class_name}}({{class_name}}Interface):
    """Integration module with fault tolerance patterns."""

    def __init__(self, config: {{class_name}}Config):
        self.config = config
        self._initialized = False
        self._circuit_state = "closed"
        self._failure_count = 0
        self._last_failure_time: Optional[datetime] = None
        self._rate_limit_tokens = config.rate_limit_per_minute
        self._last_token_refresh = datetime.utcnow()

    async def initialize(self) -> bool:
        """Initialize the HTTP client and resources"""
        try:
            # AI_TODO: Create the HTTP client session for {{domain}} services
            self._initialized = True
            logger.info("{{class_name}} initialized")
            return True
        except Exception as e:
            logger.error(f"Failed to initialize {{class_name}}: {e}")
            return False

    async def call_external_service(self, endpoint: str, data: Dict[str, Any]) -> {{class_name}}Result:
        """Call an external service with fault tolerance"""
        try:
            if not self._is_circuit_closed():
                raise CircuitBreakerOpenError("Circuit breaker is open")
            if not self._check_rate_limit():
                raise RateLimitExceeded("Rate limit exceeded")

            result = await self._call_with_retry(endpoint, data)
            self._reset_circuit_breaker()
            return {{class_name}}Result(success=True, data=result)
        except Exception as e:
            self._record_failure()
            logger.error(f"External service call failed: {e}")
            return {{class_name}}Result(success=False, error=str(e))

    async def _call_with_retry(self, endpoint: str, data: Dict[str, Any]) -> Dict[str, Any]:
        """Call the endpoint, retrying with exponential backoff"""
        for attempt in range(self.config.max_retries + 1):
            try:
                # AI_IMPLEMENTATION_REQUIRED: Perform the HTTP request
                # POST f"{self.config.base_url}/{endpoint}" with Bearer self.config.api_key
                return {"endpoint": endpoint, "echo": data}
            except Exception as e:
                if attempt == self.config.max_retries:
                    raise
                wait_time = 2 ** attempt
                logger.warning(f"Retry {attempt + 1}/{self.config.max_retries} after {wait_time}s: {e}")
                await asyncio.sleep(wait_time)
        raise RuntimeError("Max retries exceeded")

    def _is_circuit_closed(self) -> bool:
        if self._circuit_state == "closed":
            return True
        if self._last_failure_time and datetime.utcnow() - self._last_failure_time > CIRCUIT_RESET_AFTER:
            self._circuit_state = "half-open"
            return True
        return False

    def _check_rate_limit(self) -> bool:
        now = datetime.utcnow()
        if now - self._last_token_refresh >= timedelta(minutes=1):
            self._rate_limit_tokens = self.config.rate_limit_per_minute
            self._last_token_refresh = now
        if self._rate_limit_tokens > 0:
            self._rate_limit_tokens -= 1
            return True
        return False

    def _record_failure(self) -> None:
        self._failure_count += 1
        self._last_failure_time = datetime.utcnow()
        if self._failure_count >= FAILURE_THRESHOLD:
            self._circuit_state = "open"
            logger.warning("Circuit breaker opened")

    def _reset_circuit_breaker(self) -> None:
        self._failure_count = 0
        self._circuit_state = "closed"

    async def health_check(self) -> Dict[str, Any]:
        """Health check including circuit breaker status"""
        return {
            "status": "healthy" if self._initialized else "not_initialized",
            "module": "{{class_name}}",
            "circuit_breaker": self._circuit_state,
            "failure_count": self._failure_count,
            "rate_limit_tokens": self._rate_limit_tokens,
            "timestamp": datetime.utcnow().isoformat(),
        }

    async def cleanup(self) -> None:
        """Close the HTTP client and release resources"""
        # AI_TODO: Close the HTTP client session
        self._initialized = False
        logger.info("{{class_name}} cleaned up")


def create_{{module_snake}}(config: {{class_name}}Config) -> {{class_name}}:
    """Factory function to create a {{class_name}} instance"""
    return {{class_name}}(config)
`;

const SUPPORTING_TEMPLATE = `"""
{{class_name}} - Supporting Module

Workflow orchestration for the {{domain}} domain: task scheduling,
state coordination and error recovery.
"""

import asyncio
import logging
from datetime import datetime
from typing import Any, Awaitable, Callable, Dict, Optional

from .interface import {{class_name}}Interface
from .types import {{class_name}}Config, {{class_name}}Result, OperationStatus, WorkflowState

logger = logging.getLogger(__name__)

TaskHandler = Callable[[str, Dict[str, Any]], Awaitable[{{class_name}}Result]]


class {{class_name}}({{class_name}}Interface):
    """Workflow orchestrator for {{domain}} processes."""

    def __init__(self, config: {{class_name}}Config):
        self.config = config
        self._initialized = False
        self._workflows: Dict[str, WorkflowState] = {}
        self._handlers: Dict[str, TaskHandler] = {}

    async def initialize(self) -> bool:
        """Register default task handlers"""
        try:
            # AI_TODO: Register {{domain}} task handlers
            self.register_task_handler("noop", self._noop_handler)
            self._initialized = True
            logger.info("{{class_name}} initialized")
            return True
        except Exception as e:
            logger.error(f"Failed to initialize {{class_name}}: {e}")
            return False

    async def start_workflow(self, workflow_id: str, definition: Dict[str, Any]) -> {{class_name}}Result:
        """Start a workflow from its definition"""
        if not self._validate_workflow_definition(definition):
            return {{class_name}}Result(success=False, error="Invalid workflow definition")
        if workflow_id in self._workflows:
            return {{class_name}}Result(success=False, error=f"Workflow {workflow_id} already exists")

        state = WorkflowState(
            id=workflow_id,
            definition=definition,
            status=OperationStatus.PENDING,
            created_at=datetime.utcnow(),
        )
        self._workflows[workflow_id] = state
        await self._execute_workflow(state)
        return {{class_name}}Result(success=state.status == OperationStatus.COMPLETED, data={"workflow_id": workflow_id, "status": state.status.value}, error=state.error)

    async def _execute_workflow(self, state: WorkflowState) -> None:
        """Run tasks in order; stop at the first failure"""
        state.status = OperationStatus.IN_PROGRESS
        for task in state.definition.get("tasks", []):
            handler = self._handlers.get(task.get("type", ""))
            if handler is None:
                state.status = OperationStatus.FAILED
                state.error = f"No handler for task type {task.get('type')}"
                return
            # AI_TODO: Add compensation steps for partially completed workflows
            result = await asyncio.wait_for(handler(task.get("id", ""), task.get("config", {})), self.config.timeout_seconds)
            state.tasks[task.get("id", "")] = result.data
            if not result.success:
                state.status = OperationStatus.FAILED
                state.error = result.error
                return
        state.status = OperationStatus.COMPLETED
        state.completed_at = datetime.utcnow()

    def register_task_handler(self, task_type: str, handler: TaskHandler) -> None:
        self._handlers[task_type] = handler

    async def _noop_handler(self, task_id: str, config: Dict[str, Any]) -> {{class_name}}Result:
        return {{class_name}}Result(success=True, data={"task_id": task_id})

    def _validate_workflow_definition(self, definition: Dict[str, Any]) -> bool:
        # AI_TODO: Validate {{domain}} workflow definitions
        return isinstance(definition.get("tasks"), list)

    async def get_workflow_status(self, workflow_id: str) -> Optional[Dict[str, Any]]:
        state = self._workflows.get(workflow_id)
        if state is None:
            return None
        return {"id": state.id, "status": state.status.value, "error": state.error}

    async def health_check(self) -> Dict[str, Any]:
        """Health check including workflow counts"""
        return {
            "status": "healthy" if self._initialized else "not_initialized",
            "module": "{{class_name}}",
            "active_workflows": sum(1 for w in self._workflows.values() if w.status == OperationStatus.IN_PROGRESS),
            "timestamp": datetime.utcnow().isoformat(),
        }

    async def cleanup(self) -> None:
        """Cancel pending workflows and release resources"""
        for state in self._workflows.values():
            if state.status in (OperationStatus.PENDING, OperationStatus.IN_PROGRESS):
                state.status = OperationStatus.CANCELLED
        self._initialized = False
        logger.info("{{class_name}} cleaned up")


def create_{{module_snake}}(config: {{class_name}}Config) -> {{class_name}}:
    """Factory function to create a {{class_name}} instance"""
    return {{class_name}}(config)
`;

const TECHNICAL_TEMPLATE = `"""
{{class_name}} - Technical Module

Infrastructure services for the {{domain}} domain: caching, metrics
and structured logging.
"""

import json
import logging
import time
from datetime import datetime
from typing import Any, Dict, List, Optional, Tuple

from .interface import {{class_name}}Interface
from .types import {{class_name}}Config

logger = logging.getLogger(__name__)


class {{class_name}}({{class_name}}Interface):
    """Cache, metrics and logging services."""

    def __init__(self, config: {{class_name}}Config):
        self.config = config
        self._initialized = False
        self._cache: Dict[str, Tuple[Any, Optional[float]]] = {}
        self._metrics: Dict[str, List[float]] = {}

    async def initialize(self) -> bool:
        """Initialize cache and metrics backends"""
        try:
            # AI_TODO: Connect to the real cache (e.g. Redis) and metrics backend
            self._initialized = True
            logger.info("{{class_name}} initialized")
            return True
        except Exception as e:
            logger.error(f"Failed to initialize {{class_name}}: {e}")
            return False

    async def cache_get(self, key: str) -> Optional[Any]:
        """Return a cached value, or None when missing or expired"""
        entry = self._cache.get(key)
        if entry is None:
            await self.record_metric("cache_miss", 1)
            return None
        value, expires_at = entry
        if expires_at is not None and expires_at < time.monotonic():
            del self._cache[key]
            await self.record_metric("cache_miss", 1)
            return None
        await self.record_metric("cache_hit", 1)
        return value

    async def cache_set(self, key: str, value: Any, ttl_seconds: Optional[int] = None) -> bool:
        expires_at = time.monotonic() + ttl_seconds if ttl_seconds else None
        self._cache[key] = (value, expires_at)
        return True

    async def cache_delete(self, key: str) -> bool:
        return self._cache.pop(key, None) is not None

    async def record_metric(self, metric_name: str, value: float) -> None:
        # AI_TODO: Forward metrics to the {{domain}} monitoring backend
        self._metrics.setdefault(metric_name, []).append(value)

    async def get_metrics(self, metric_name: Optional[str] = None) -> Dict[str, Any]:
        names = [metric_name] if metric_name else list(self._metrics)
        summary: Dict[str, Any] = {}
        for name in names:
            values = self._metrics.get(name, [])
            summary[name] = {
                "count": len(values),
                "sum": sum(values),
                "avg": sum(values) / len(values) if values else 0,
            }
        return summary

    async def log_structured(self, level: str, message: str, **fields: Any) -> None:
        payload = {"module": "{{class_name}}", "message": message, **fields}
        logger.log(getattr(logging, level.upper(), logging.INFO), json.dumps(payload, default=str))

    async def health_check(self) -> Dict[str, Any]:
        """Health check including cache size"""
        return {
            "status": "healthy" if self._initialized else "not_initialized",
            "module": "{{class_name}}",
            "cache_entries": len(self._cache),
            "metrics_tracked": len(self._metrics),
            "timestamp": datetime.utcnow().isoformat(),
        }

    async def cleanup(self) -> None:
        """Flush metrics and clear the cache"""
        # AI_TODO: Flush pending metrics before shutdown
        self._cache.clear()
        self._initialized = False
        logger.info("{{class_name}} cleaned up")


def create_{{module_snake}}(config: {{class_name}}Config) -> {{class_name}}:
    """Factory function to create a {{class_name}} instance"""
    return {{class_name}}(config)
`;

export const CORE_MODULE_TEMPLATES: Readonly<Record<ModuleType, string>> = Object.freeze({
  CORE: CORE_BUSINESS_TEMPLATE,
  INTEGRATION: INTEGRATION_TEMPLATE,
  SUPPORTING: SUPPORTING_TEMPLATE,
  TECHNICAL: TECHNICAL_TEMPLATE
});
