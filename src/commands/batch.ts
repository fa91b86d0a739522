import { resolve } from "node:path";

import { log, spinner } from "@clack/prompts";

import { generateBatch, loadBatchManifest } from "../core/batch.js";
import type { GenerateBatchOptions } from "../core/batch.js";
import { normalizeOutputFormat, toJsonErrorPayload } from "../core/errors.js";
import { summarizeGeneration } from "../core/report.js";
import type { BatchCommandOptions, BatchResult } from "../core/types.js";
import { toDisplayPath, writeJson } from "./display.js";

const SPINNER_ERROR_CODE = 2;

/** Highest exit code among failed entries, 0 when every module was generated. */
export function batchExitCode(result: BatchResult): number {
  let exitCode = 0;
  for (const outcome of result.outcomes) {
    if (!outcome.ok) exitCode = Math.max(exitCode, outcome.error.exitCode);
  }
  return exitCode;
}

function toJsonPayload(result: BatchResult): Record<string, unknown> {
  return {
    succeeded: result.succeeded,
    failed: result.failed,
    modules: result.outcomes.map((outcome) =>
      outcome.ok
        ? { name: outcome.name, ok: true, report: summarizeGeneration(outcome.result) }
        : { name: outcome.name, ok: false, ...toJsonErrorPayload(outcome.error) }
    )
  };
}

export async function runBatch(manifestPath: string, options: BatchCommandOptions): Promise<BatchResult> {
  const format = normalizeOutputFormat(options.format);
  const manifest = await loadBatchManifest(resolve(process.cwd(), manifestPath));
  const dryRun = options.dryRun ?? false;
  const total = manifest.modules.length;

  const batchOptions: GenerateBatchOptions = {
    overwrite: options.force ?? false,
    dryRun,
    ...(options.outputDir !== undefined ? { outputDir: options.outputDir } : {})
  };

  if (format === "json") {
    const result = await generateBatch(manifest, batchOptions);
    writeJson(toJsonPayload(result));
    return result;
  }

  const batchSpinner = spinner();
  batchSpinner.start(`${dryRun ? "Planning" : "Generating"} ${total} modules...`);
  let settled = 0;
  let result: BatchResult;
  try {
    result = await generateBatch(manifest, {
      ...batchOptions,
      onModuleSettled(outcome) {
        settled += 1;
        batchSpinner.message(`${outcome.ok ? "Finished" : "Failed"} ${settled}/${total}: ${outcome.name}`);
      }
    });
  } catch (error) {
    batchSpinner.stop("Batch rejected before any module was written.", SPINNER_ERROR_CODE);
    throw error;
  }
  batchSpinner.stop(`Batch complete: ${result.succeeded} succeeded, ${result.failed} failed.`, result.failed > 0 ? SPINNER_ERROR_CODE : 0);

  for (const outcome of result.outcomes) {
    if (outcome.ok) {
      const verb = outcome.result.written ? "created" : "planned";
      log.success(`${outcome.name}: ${outcome.result.files.length} files ${verb} at \`${toDisplayPath(outcome.result.modulePath)}\`.`);
    } else {
      log.error(`${outcome.name}: ${outcome.error.message}`);
    }
  }
  return result;
}
