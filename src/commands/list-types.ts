import { log } from "@clack/prompts";

import { normalizeOutputFormat } from "../core/errors.js";
import { MODULE_TYPES } from "../core/spec.js";
import { MODULE_TYPE_PROFILES } from "../core/templates/guidance.js";
import { lookupTemplateSet } from "../core/templates.js";
import type { ModuleType, TypesCommandOptions } from "../core/types.js";
import { writeJson } from "./display.js";

export interface ModuleTypeListing {
  type: ModuleType;
  summary: string;
  primaryOperation: string;
  fileCounts: {
    standard: number;
    standardWithDocker: number;
    mcpServer: number;
    mcpServerWithDocker: number;
  };
}

function fileCount(moduleType: ModuleType, mcpServer: boolean, withDocker: boolean): number {
  return lookupTemplateSet(moduleType, { mcpServer, withDocker }).templates.length;
}

export function listModuleTypes(): ModuleTypeListing[] {
  return MODULE_TYPES.map((moduleType) => ({
    type: moduleType,
    summary: MODULE_TYPE_PROFILES[moduleType].summary,
    primaryOperation: MODULE_TYPE_PROFILES[moduleType].primaryOperation,
    fileCounts: {
      standard: fileCount(moduleType, false, false),
      standardWithDocker: fileCount(moduleType, false, true),
      mcpServer: fileCount(moduleType, true, false),
      mcpServerWithDocker: fileCount(moduleType, true, true)
    }
  }));
}

export function runListTypes(options: TypesCommandOptions): void {
  const format = normalizeOutputFormat(options.format);
  const listings = listModuleTypes();

  if (format === "json") {
    writeJson({ types: listings });
    return;
  }

  for (const listing of listings) {
    const counts = listing.fileCounts;
    log.info(
      [
        `${listing.type}: ${listing.summary}`,
        `primary operation: ${listing.primaryOperation}`,
        `files: ${counts.standard} standard, ${counts.mcpServer} MCP server (+${counts.standardWithDocker - counts.standard} with --with-docker)`
      ].join("\n")
    );
  }
}
