import type { DeploymentTarget, ModuleType } from "./common.js";

export interface ModuleNames {
  /** File and directory names, e.g. `user-management`. */
  kebab: string;
  /** Python identifiers, e.g. `user_management`. */
  snake: string;
  /** Type names, e.g. `UserManagement`. */
  pascal: string;
  /** Headings, e.g. `User Management`. */
  title: string;
}

export interface TemplateFlags {
  withDocker: boolean;
  mcpServer: boolean;
}

export interface ModuleFlags extends TemplateFlags {
  outputDir: string;
  overwrite: boolean;
  deploymentTarget: DeploymentTarget;
}

export interface ModuleSpec {
  name: ModuleNames;
  type: ModuleType;
  domain: string;
  flags: ModuleFlags;
}

export interface ModuleRequest {
  name: string;
  type: string;
  domain?: string | undefined;
  outputDir?: string | undefined;
  withDocker?: boolean | undefined;
  mcpServer?: boolean | undefined;
  overwrite?: boolean | undefined;
  deploymentTarget?: string | undefined;
}
