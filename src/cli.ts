import { homedir } from "node:os";
import { resolve } from "node:path";

import { log } from "@clack/prompts";
import { Command } from "commander";

import { batchExitCode, runBatch } from "./commands/batch.js";
import { runCreate } from "./commands/create.js";
import { runListTypes } from "./commands/list-types.js";
import { normalizeError, resolveOutputFormatFromArgv, toJsonErrorPayload } from "./core/errors.js";
import { DEPLOYMENT_TARGETS, MODULE_TYPES } from "./core/spec.js";
import type { BatchCommandOptions, CreateCommandOptions, TypesCommandOptions } from "./core/types.js";
import packageJson from "../package.json" with { type: "json" };

const program = new Command();
const CLI_VERSION = packageJson.version;
const BLOCK_ART = ["[#][#]", "[#][ ]"];
const QUIET_COMMANDER_CODES = new Set(["commander.helpDisplayed", "commander.version"]);
// Help printed because no command was given.
const IMPLICIT_HELP_CODE = "commander.help";

const ANSI = {
  reset: "\u001B[0m",
  bold: "\u001B[1m",
  borderGray: "\u001B[38;5;245m",
  mutedGray: "\u001B[38;5;250m",
  white: "\u001B[97m",
  teal: "\u001B[38;5;37m"
} as const;

const COLOR_ENABLED = Boolean(process.stdout.isTTY) && process.env.NO_COLOR === undefined && process.env.TERM !== "dumb";

function paint(text: string, ...codes: string[]): string {
  if (!COLOR_ENABLED || text.length === 0) return text;
  return `${codes.join("")}${text}${ANSI.reset}`;
}

function compactPath(path: string): string {
  const home = homedir();
  return path.startsWith(home) ? `~${path.slice(home.length)}` : path;
}

function ellipsize(text: string, maxWidth: number): string {
  if (maxWidth <= 0) return "";
  if (text.length <= maxWidth) return text;
  if (maxWidth <= 1) return "…";
  const head = Math.max(1, Math.floor((maxWidth - 1) * 0.7));
  const tail = Math.max(0, maxWidth - 1 - head);
  return `${text.slice(0, head)}…${text.slice(text.length - tail)}`;
}

function renderInfoLeft(label: string, value: string, width: number): { plain: string; styled: string } {
  const labelBlock = `${label}:`.padEnd(11, " ");
  const valueWidth = Math.max(0, width - labelBlock.length);
  const valueFitted = ellipsize(value, valueWidth);
  const plain = `${labelBlock}${valueFitted}`;
  const styled = `${paint(labelBlock, ANSI.mutedGray)}${paint(valueFitted, ANSI.white)}`;
  return { plain, styled };
}

function renderBrandHeader(outputDir: string | undefined, format: string | undefined): void {
  if (!process.stdout.isTTY || format?.trim().toLowerCase() === "json") return;

  const directory = compactPath(process.cwd());
  const target = compactPath(resolve(process.cwd(), outputDir ?? "."));
  const terminalWidth = process.stdout.columns ?? 80;
  const maxInnerWidth = Math.max(36, terminalWidth - 4);
  const innerWidth = Math.min(78, maxInnerWidth);

  let rightWidth = Math.max(...BLOCK_ART.map((line) => line.length));
  let gapWidth = 3;
  let leftWidth = innerWidth - rightWidth - gapWidth;
  if (leftWidth < 28) {
    rightWidth = 0;
    gapWidth = 0;
    leftWidth = innerWidth;
  }

  const rows = [
    { left: "modscaffold", renderLeft: (text: string) => paint(text, ANSI.bold, ANSI.teal), right: BLOCK_ART[0] ?? "" },
    { left: "Standardized module generator", renderLeft: (text: string) => paint(text, ANSI.white), right: BLOCK_ART[1] ?? "" },
    { left: "", renderLeft: (text: string) => text, right: "" }
  ];
  const metaRows = [
    renderInfoLeft("version", `v${CLI_VERSION}`, leftWidth),
    renderInfoLeft("directory", directory, leftWidth),
    renderInfoLeft("output", target, leftWidth)
  ];

  const border = paint(`╭${"─".repeat(innerWidth + 2)}╮`, ANSI.borderGray);
  const bottomBorder = paint(`╰${"─".repeat(innerWidth + 2)}╯`, ANSI.borderGray);
  const vertical = paint("│", ANSI.borderGray);

  console.log(border);
  for (const row of rows) {
    const leftFitted = ellipsize(row.left, leftWidth);
    const leftRendered = `${row.renderLeft(leftFitted)}${" ".repeat(Math.max(0, leftWidth - leftFitted.length))}`;
    if (rightWidth > 0) {
      const rightFitted = ellipsize(row.right, rightWidth);
      const rightRendered = `${paint(rightFitted, ANSI.teal)}${" ".repeat(Math.max(0, rightWidth - rightFitted.length))}`;
      console.log(`${vertical} ${leftRendered}${" ".repeat(gapWidth)}${rightRendered} ${vertical}`);
    } else {
      console.log(`${vertical} ${leftRendered} ${vertical}`);
    }
  }
  for (const row of metaRows) {
    const leftRendered = `${row.styled}${" ".repeat(Math.max(0, leftWidth - row.plain.length))}`;
    if (rightWidth > 0) {
      console.log(`${vertical} ${leftRendered}${" ".repeat(gapWidth + rightWidth)} ${vertical}`);
    } else {
      console.log(`${vertical} ${leftRendered} ${vertical}`);
    }
  }
  console.log(bottomBorder);
  console.log("");
}

function addModuleOptions(command: Command): Command {
  return command
    .argument("<name>", "Module name in kebab-case, e.g. user-management")
    .option("--type <type>", MODULE_TYPES.join(" | "))
    .option("--domain <text>", "Business domain", "general")
    .option("--output-dir <path>", "Directory the module folder is created in", ".")
    .option("--with-docker", "Add Dockerfile, docker-compose, Kubernetes manifests and CI workflow", false)
    .option("--deployment-target <target>", DEPLOYMENT_TARGETS.join(" | "))
    .option("--force", "Replace an existing non-empty module directory")
    .option("--dry-run", "Render and report without writing files", false)
    .option("--format <format>", "text | json", "text")
    .option("-y, --yes", "Never prompt; fail when a required value is missing");
}

program
  .name("modscaffold")
  .description("Generate standardized Python module scaffolds from built-in templates.")
  .version(CLI_VERSION)
  .exitOverride()
  .configureOutput({
    outputError: () => undefined
  });

addModuleOptions(program.command("create").alias("create-module").description("Create a standardized module."))
  .option("--mcp-server", "Generate the MCP server layout", false)
  .option("--no-mcp-server", "Generate the standard layout")
  .action(async (name: string, rawOptions: CreateCommandOptions) => {
    renderBrandHeader(rawOptions.outputDir, rawOptions.format);
    await runCreate(name, rawOptions);
  });

addModuleOptions(program.command("create-mcp-server").description("Create a module exposed as an MCP server."))
  .action(async (name: string, rawOptions: CreateCommandOptions) => {
    renderBrandHeader(rawOptions.outputDir, rawOptions.format);
    await runCreate(name, rawOptions, { mcpServer: true });
  });

program
  .command("batch")
  .description("Create every module listed in a JSON manifest.")
  .argument("<manifest>", "Path to the batch manifest")
  .option("--output-dir <path>", "Directory module folders are created in (overrides the manifest)")
  .option("--force", "Replace existing non-empty module directories")
  .option("--dry-run", "Render and report without writing files", false)
  .option("--format <format>", "text | json", "text")
  .action(async (manifestPath: string, rawOptions: BatchCommandOptions) => {
    renderBrandHeader(rawOptions.outputDir, rawOptions.format);
    const result = await runBatch(manifestPath, rawOptions);
    const exitCode = batchExitCode(result);
    if (exitCode !== 0) {
      process.exitCode = exitCode;
    }
  });

program
  .command("types")
  .description("List module types, their primary operation and generated file counts.")
  .option("--format <format>", "text | json", "text")
  .action((rawOptions: TypesCommandOptions) => {
    runListTypes(rawOptions);
  });

async function main(): Promise<void> {
  const format = resolveOutputFormatFromArgv(process.argv);
  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    const normalized = normalizeError(error);
    const commanderCode = normalized.details?.commanderCode;
    if (typeof commanderCode === "string" && QUIET_COMMANDER_CODES.has(commanderCode)) {
      return;
    }
    if (commanderCode === IMPLICIT_HELP_CODE) {
      process.exitCode = normalized.exitCode;
      return;
    }

    if (format === "json") {
      process.stderr.write(`${JSON.stringify(toJsonErrorPayload(normalized), null, 2)}\n`);
    } else {
      log.error(normalized.message);
    }
    process.exitCode = normalized.exitCode;
  }
}

void main();
