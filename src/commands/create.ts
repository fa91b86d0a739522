import { log } from "@clack/prompts";

import { normalizeOutputFormat } from "../core/errors.js";
import { generateFromSpec } from "../core/generate.js";
import { collectModuleRequest } from "../core/prompts/collect-create-input.js";
import { isInteractiveTerminal } from "../core/prompts/interaction.js";
import { formatReport, summarizeGeneration } from "../core/report.js";
import { moduleDirectory, parseModuleSpec } from "../core/spec.js";
import type { CreateCommandOptions, GenerationResult } from "../core/types.js";
import { writeModuleWithProgress } from "./create/module-write.js";
import { toDisplayPath, writeJson } from "./display.js";

export interface CreateFlavor {
  /** `create-mcp-server` always generates the MCP layout. */
  mcpServer?: boolean;
  interactive?: boolean;
}

export async function runCreate(name: string, options: CreateCommandOptions, flavor: CreateFlavor = {}): Promise<GenerationResult> {
  const format = normalizeOutputFormat(options.format);
  const interactive = flavor.interactive ?? (format === "text" && !options.yes && isInteractiveTerminal());
  const request = await collectModuleRequest(name, options, {
    interactive,
    ...(flavor.mcpServer !== undefined ? { forceMcpServer: flavor.mcpServer } : {})
  });
  const spec = parseModuleSpec(request);
  const displayPath = toDisplayPath(moduleDirectory(spec));

  const dryRun = options.dryRun ?? false;
  const result =
    dryRun || format === "json" ? await generateFromSpec(spec, { dryRun }) : await writeModuleWithProgress(spec, displayPath);
  const report = summarizeGeneration(result);

  if (format === "json") {
    writeJson(report);
    return result;
  }

  if (dryRun) {
    log.warn("Dry run: nothing was written.");
  } else {
    log.success(`Module created at \`${displayPath}\`.`);
    if (spec.flags.overwrite) {
      log.warn("Replaced any existing module directory because --force was set.");
    }
  }
  log.info(formatReport(report, "text"));
  return result;
}
