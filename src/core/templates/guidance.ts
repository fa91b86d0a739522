import type { DeploymentTarget, ModuleType } from "../types.js";

interface ModuleTypeProfile {
  summary: string;
  primaryOperation: string;
  guidance: string;
}

export const MODULE_TYPE_PROFILES: Readonly<Record<ModuleType, ModuleTypeProfile>> = Object.freeze({
  CORE: {
    summary: "Core business logic: rule enforcement, validation and domain entity management.",
    primaryOperation: "process",
    guidance: `**CORE modules** handle main business logic and should focus on:

1. **Business Rule Enforcement**: implement domain-specific validation and constraints
2. **Data Processing**: transform and process business entities
3. **Audit Trails**: track every business operation for compliance
4. **State Management**: manage business entity lifecycles
5. **Domain Events**: publish events for other systems to consume

**Key Patterns**:
- Repository pattern for data access
- Domain services for complex business logic
- Event sourcing for audit trails
- Validation pipelines for data integrity`
  },
  INTEGRATION: {
    summary: "External service communication with circuit breaking, retries and rate limiting.",
    primaryOperation: "call_external_service",
    guidance: `**INTEGRATION modules** handle external service communication and should focus on:

1. **Fault Tolerance**: circuit breakers and retry policies
2. **Rate Limiting**: respect external service limits
3. **Data Transformation**: convert between internal and external formats
4. **Authentication**: API keys, OAuth tokens and request signing
5. **Monitoring**: track external service health and latency

**Key Patterns**:
- Circuit breaker for fault tolerance
- Exponential backoff for retries
- Adapter pattern for service abstraction
- Bulkhead pattern for isolation`
  },
  SUPPORTING: {
    summary: "Workflow orchestration: task scheduling, state coordination and error recovery.",
    primaryOperation: "start_workflow",
    guidance: `**SUPPORTING modules** orchestrate workflows and should focus on:

1. **Workflow Management**: coordinate work between services
2. **Task Scheduling**: async and batch operations
3. **State Coordination**: distributed workflow state
4. **Error Recovery**: partial failures and compensation steps
5. **Process Monitoring**: workflow progress and duration

**Key Patterns**:
- Saga pattern for distributed transactions
- State machine for workflow management
- Command pattern for task execution
- Observer pattern for progress tracking`
  },
  TECHNICAL: {
    summary: "Infrastructure services: caching, metrics and structured logging.",
    primaryOperation: "cache_get",
    guidance: `**TECHNICAL modules** provide infrastructure services and should focus on:

1. **Cross-Cutting Concerns**: logging, monitoring, caching
2. **Performance**: caching and connection pooling
3. **Resource Management**: memory, connections and file handles
4. **Configuration Management**: environment-specific settings
5. **Observability**: metrics, traces and health monitoring

**Key Patterns**:
- Singleton pattern for shared resources
- Factory pattern for resource creation
- Decorator pattern for cross-cutting concerns
- Strategy pattern for interchangeable implementations`
  }
});

const DEPLOYMENT_COMMANDS: Readonly<Record<DeploymentTarget, string>> = Object.freeze({
  kubernetes: "./scripts/deploy.sh staging",
  "docker-compose": "docker compose up -d",
  lambda: "DEPLOYMENT_TARGET=lambda ./scripts/deploy.sh production"
});

export function buildDeploymentGuidance(withDocker: boolean, target: DeploymentTarget): string {
  if (!withDocker) {
    return `This module uses a standard Python deployment:

1. **Virtual Environment**: use venv or conda for isolation
2. **Dependencies**: install from requirements.txt
3. **Configuration**: environment variables or config files
4. **Process Management**: systemd, supervisor or another process manager
5. **Monitoring**: expose the health_check() result on an endpoint

\`\`\`bash
pip install -r requirements.txt
pytest
\`\`\``;
  }

  return `This module includes containerization support for **${target}**:

1. **Docker**: multi-stage Dockerfile for production images
2. **Kubernetes**: deployment, service and configmap manifests under k8s/
3. **CI**: GitHub Actions workflow in .github/workflows/ci.yml
4. **Scripts**: scripts/build.sh and scripts/deploy.sh

\`\`\`bash
# Local development
docker compose up

# Deployment
${DEPLOYMENT_COMMANDS[target]}
\`\`\``;
}
