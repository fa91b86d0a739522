import type { ModuleType } from "../types.js";

type BackingService = "postgres" | "redis";

const BACKING_SERVICES: Readonly<Record<ModuleType, readonly BackingService[]>> = Object.freeze({
  CORE: ["postgres", "redis"],
  INTEGRATION: ["redis"],
  SUPPORTING: ["postgres", "redis"],
  TECHNICAL: ["postgres", "redis"]
});

const SERVICE_BLOCKS: Readonly<Record<BackingService, { service: string; volume: string }>> = Object.freeze({
  postgres: {
    service: `  postgres:
    image: postgres:15-alpine
    environment:
      - POSTGRES_DB={{module_snake}}_dev
      - POSTGRES_USER=dev
      - POSTGRES_PASSWORD=dev
    ports:
      - "5432:5432"
    volumes:
      - postgres_data:/var/lib/postgresql/data`,
    volume: "  postgres_data:"
  },
  redis: {
    service: `  redis:
    image: redis:7-alpine
    ports:
      - "6379:6379"
    command: redis-server --appendonly yes
    volumes:
      - redis_data:/data`,
    volume: "  redis_data:"
  }
});

function buildComposeTemplate(moduleType: ModuleType): string {
  const services = BACKING_SERVICES[moduleType];
  const lines = [
    "services:",
    "  {{module_name}}:",
    "    build:",
    "      context: .",
    "      dockerfile: Dockerfile",
    "    environment:",
    "      - ENVIRONMENT=development",
    "      - LOG_LEVEL=DEBUG",
    "      - MODULE_TYPE={{module_type}}",
    "    depends_on:",
    ...services.map((service) => `      - ${service}`),
    "",
    ...services.flatMap((service) => [SERVICE_BLOCKS[service].service, ""]),
    "volumes:",
    ...services.map((service) => SERVICE_BLOCKS[service].volume)
  ];
  return `${lines.join("\n")}\n`;
}

export const COMPOSE_TEMPLATES: Readonly<Record<ModuleType, string>> = Object.freeze({
  CORE: buildComposeTemplate("CORE"),
  INTEGRATION: buildComposeTemplate("INTEGRATION"),
  SUPPORTING: buildComposeTemplate("SUPPORTING"),
  TECHNICAL: buildComposeTemplate("TECHNICAL")
});

const DOCKERFILE_HEAD = `# Multi-stage Dockerfile for {{module_name}} ({{module_type}})
FROM python:3.11-slim AS builder

ENV PYTHONUNBUFFERED=1 \\
    PYTHONDONTWRITEBYTECODE=1 \\
    PIP_NO_CACHE_DIR=1 \\
    PIP_DISABLE_PIP_VERSION_CHECK=1

WORKDIR /build
COPY requirements.txt .
RUN pip install --prefix=/install -r requirements.txt

FROM python:3.11-slim AS production

RUN groupadd -r appuser && useradd -r -g appuser appuser

ENV PYTHONUNBUFFERED=1 \\
    PYTHONDONTWRITEBYTECODE=1

COPY --from=builder /install /usr/local
WORKDIR /app
COPY --chown=appuser:appuser . /app/{{module_snake}}

USER appuser

HEALTHCHECK --interval=30s --timeout=10s --start-period=5s --retries=3 \\
    CMD python -c "import {{module_snake}}" || exit 1
`;

export const DOCKERFILE_TEMPLATE = `${DOCKERFILE_HEAD}
CMD ["python", "-m", "{{module_snake}}.examples.basic_usage"]
`;

export const MCP_DOCKERFILE_TEMPLATE = `${DOCKERFILE_HEAD}
CMD ["python", "{{module_snake}}/{{module_name}}_server.py"]
`;

export const K8S_DEPLOYMENT_TEMPLATE = `apiVersion: apps/v1
kind: Deployment
metadata:
  name: {{module_name}}
  labels:
    app: {{module_name}}
    tier: {{module_type_lower}}
spec:
  replicas: 2
  strategy:
    type: RollingUpdate
    rollingUpdate:
      maxSurge: 1
      maxUnavailable: 0
  selector:
    matchLabels:
      app: {{module_name}}
  template:
    metadata:
      labels:
        app: {{module_name}}
        tier: {{module_type_lower}}
    spec:
      securityContext:
        runAsNonRoot: true
        runAsUser: 1000
        fsGroup: 1000
      containers:
        - name: {{module_name}}
          image: {{module_name}}:latest
          envFrom:
            - configMapRef:
                name: {{module_name}}-config
          resources:
            requests:
              memory: "256Mi"
              cpu: "250m"
            limits:
              memory: "512Mi"
              cpu: "500m"
          livenessProbe:
            exec:
              command: ["python", "-c", "import {{module_snake}}"]
            initialDelaySeconds: 30
            periodSeconds: 10
          securityContext:
            allowPrivilegeEscalation: false
            readOnlyRootFilesystem: true
            capabilities:
              drop:
                - ALL
`;

export const K8S_SERVICE_TEMPLATE = `apiVersion: v1
kind: Service
metadata:
  name: {{module_name}}
  labels:
    app: {{module_name}}
spec:
  selector:
    app: {{module_name}}
  ports:
    - port: 80
      targetPort: 8000
      name: http
  type: ClusterIP
`;

export const K8S_CONFIGMAP_TEMPLATE = `apiVersion: v1
kind: ConfigMap
metadata:
  name: {{module_name}}-config
data:
  ENVIRONMENT: "production"
  LOG_LEVEL: "INFO"
  MODULE_TYPE: "{{module_type}}"
  MODULE_DOMAIN: "{{domain}}"
  DEPLOYMENT_TARGET: "{{deployment_target}}"
`;

export const CI_WORKFLOW_TEMPLATE = `name: {{module_name}} CI

on:
  push:
    paths:
      - "{{module_name}}/**"
  pull_request:
    paths:
      - "{{module_name}}/**"

jobs:
  test:
    runs-on: ubuntu-latest
    defaults:
      run:
        working-directory: {{module_name}}
    steps:
      - uses: actions/checkout@v4
      - uses: actions/setup-python@v5
        with:
          python-version: "3.11"
      - run: pip install -r requirements.txt
      - run: python -m pytest tests/ -v

  image:
    needs: test
    runs-on: ubuntu-latest
    steps:
      - uses: actions/checkout@v4
      - run: docker build -t {{module_name}}:ci {{module_name}}
`;

export const BUILD_SCRIPT_TEMPLATE = `#!/usr/bin/env bash
set -euo pipefail

cd "$(dirname "$0")/.."

echo "Building {{module_name}}..."
docker build -t {{module_name}}:latest .

echo "Running tests in container..."
docker run --rm --entrypoint python {{module_name}}:latest -m pytest {{module_snake}}/tests -q

echo "Built {{module_name}}:latest"
`;

export const DEPLOY_SCRIPT_TEMPLATE = `#!/usr/bin/env bash
set -euo pipefail

cd "$(dirname "$0")/.."

ENVIRONMENT="\${1:-staging}"
TARGET="\${DEPLOYMENT_TARGET:-{{deployment_target}}}"

echo "Deploying {{module_name}} to \${ENVIRONMENT} via \${TARGET}..."

case "\${TARGET}" in
  kubernetes)
    kubectl apply -f k8s/
    kubectl rollout status deployment/{{module_name}} --timeout=300s
    ;;
  docker-compose)
    docker compose up -d --build
    ;;
  lambda)
    echo "Package {{module_snake}} and publish it with your Lambda tooling." >&2
    exit 1
    ;;
  *)
    echo "Unknown deployment target: \${TARGET}" >&2
    exit 2
    ;;
esac

echo "Deployment complete."
`;
