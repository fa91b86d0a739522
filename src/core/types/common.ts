export type ModuleType = "CORE" | "INTEGRATION" | "SUPPORTING" | "TECHNICAL";
export type DeploymentTarget = "kubernetes" | "docker-compose" | "lambda";
export type OutputFormat = "text" | "json";
