import { select } from "@clack/prompts";

import { ValidationError } from "../errors.js";
import { MODULE_TYPES } from "../spec.js";
import { MODULE_TYPE_PROFILES } from "../templates/guidance.js";
import type { CreateCommandOptions, ModuleRequest, ModuleType } from "../types.js";
import { unwrapPrompt } from "./interaction.js";

export interface CollectModuleRequestContext {
  /** Prompt for missing values instead of failing. */
  interactive: boolean;
  /** Set by `create-mcp-server`; overrides `--mcp-server`. */
  forceMcpServer?: boolean;
}

async function promptModuleType(): Promise<ModuleType> {
  return unwrapPrompt<ModuleType>(
    await select<ModuleType>({
      message: "Module type",
      initialValue: "CORE",
      options: MODULE_TYPES.map((moduleType) => ({
        value: moduleType,
        label: moduleType,
        hint: MODULE_TYPE_PROFILES[moduleType].summary
      }))
    })
  );
}

export async function collectModuleRequest(
  name: string,
  options: CreateCommandOptions,
  context: CollectModuleRequestContext
): Promise<ModuleRequest> {
  let type = options.type?.trim();
  if (!type) {
    if (!context.interactive) {
      throw new ValidationError("InvalidType", `Module type is required. Pass --type <${MODULE_TYPES.join("|")}>.`);
    }
    type = await promptModuleType();
  }

  return {
    name,
    type,
    domain: options.domain,
    outputDir: options.outputDir,
    withDocker: options.withDocker ?? false,
    mcpServer: context.forceMcpServer ?? options.mcpServer ?? false,
    overwrite: options.force ?? false,
    deploymentTarget: options.deploymentTarget
  };
}
