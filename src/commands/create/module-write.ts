import { spinner } from "@clack/prompts";

import { generateFromSpec } from "../../core/generate.js";
import type { GenerationResult, ModuleSpec } from "../../core/types.js";

const SPINNER_ERROR_CODE = 2;

export async function writeModuleWithProgress(spec: ModuleSpec, displayPath: string): Promise<GenerationResult> {
  const buildSpinner = spinner();
  buildSpinner.start(`Building module in \`${displayPath}\`...`);

  try {
    const result = await generateFromSpec(spec, {
      onProgress(event) {
        if (event.stage === "directories") {
          buildSpinner.message(`Creating folders ${event.current}/${event.total}: ${event.path}`);
          return;
        }
        buildSpinner.message(`Writing files ${event.current}/${event.total}: ${event.path}`);
      }
    });

    buildSpinner.stop("Module build complete.");
    return result;
  } catch (error) {
    buildSpinner.stop("Module build failed.", SPINNER_ERROR_CODE);
    throw error;
  }
}
