import { mkdir, mkdtemp, readdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { generateBatch, loadBatchManifest, parseBatchManifest, planBatch } from "../src/core/batch.js";
import { ValidationError } from "../src/core/errors.js";
import type { BatchEntryOutcome, BatchManifest } from "../src/core/types.js";
import { batchExitCode } from "../src/commands/batch.js";

describe("parseBatchManifest", () => {
  it("accepts a manifest with defaults", () => {
    const manifest = parseBatchManifest(
      JSON.stringify({
        outputDir: "modules",
        defaults: { domain: "payments", withDocker: true },
        modules: [{ name: "payment-gateway", type: "INTEGRATION", mcpServer: true }]
      })
    );

    expect(manifest).toEqual({
      outputDir: "modules",
      defaults: { domain: "payments", withDocker: true },
      modules: [{ name: "payment-gateway", type: "INTEGRATION", mcpServer: true }]
    });
  });

  it("rejects malformed JSON", () => {
    expect(() => parseBatchManifest("{ modules: ")).toThrow(/^Batch manifest is not valid JSON: /);
  });

  it("rejects empty module lists and unknown keys", () => {
    for (const raw of [
      JSON.stringify({ modules: [] }),
      JSON.stringify({ modules: [{ name: "a", type: "CORE", author: "someone" }] }),
      JSON.stringify({ modules: [{ type: "CORE" }] })
    ]) {
      const run = () => parseBatchManifest(raw);
      expect(run).toThrow(ValidationError);
      expect(run).toThrow(/^Batch manifest is invalid: modules/);
    }
  });
});

describe("batch generation", () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), "modscaffold-batch-"));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("reports a missing manifest file as an invalid manifest", async () => {
    await expect(loadBatchManifest(join(root, "missing.json"))).rejects.toMatchObject({
      kind: "InvalidManifest",
      exitCode: 2,
      message: `Cannot read batch manifest "${join(root, "missing.json")}" (ENOENT).`
    });
  });

  it("loads a manifest from disk", async () => {
    const path = join(root, "modules.json");
    await writeFile(path, JSON.stringify({ modules: [{ name: "ledger", type: "CORE" }] }), "utf8");

    expect(await loadBatchManifest(path)).toEqual({ modules: [{ name: "ledger", type: "CORE" }] });
  });

  it("applies defaults and output directory precedence", () => {
    const manifest: BatchManifest = {
      outputDir: "from-manifest",
      defaults: { domain: "payments", mcpServer: true },
      modules: [
        { name: "billing", type: "CORE" },
        { name: "refunds", type: "SUPPORTING", domain: "returns", mcpServer: false, outputDir: "own" }
      ]
    };

    const fromManifest = planBatch(manifest, { workspaceRoot: root });
    expect(fromManifest[0]?.flags.outputDir).toBe(join(root, "from-manifest"));
    expect(fromManifest[0]?.domain).toBe("payments");
    expect(fromManifest[0]?.flags.mcpServer).toBe(true);
    expect(fromManifest[1]?.flags.outputDir).toBe(join(root, "own"));
    expect(fromManifest[1]?.domain).toBe("returns");
    expect(fromManifest[1]?.flags.mcpServer).toBe(false);

    const fromOption = planBatch(manifest, { workspaceRoot: root, outputDir: "from-flag" });
    expect(fromOption[0]?.flags.outputDir).toBe(join(root, "from-flag"));
    expect(fromOption[1]?.flags.outputDir).toBe(join(root, "own"));
  });

  it("prefixes entry validation errors with their index", () => {
    const run = () =>
      planBatch(
        { modules: [{ name: "ok", type: "CORE" }, { name: "broken", type: "BOGUS" }] },
        { workspaceRoot: root }
      );

    expect(run).toThrow(/^modules\[1\]: /);
    try {
      run();
    } catch (error) {
      expect(error).toMatchObject({ kind: "InvalidType", details: { index: 1, name: "broken" } });
    }
  });

  it("rejects duplicate targets before writing anything", async () => {
    const manifest: BatchManifest = {
      modules: [
        { name: "ledger", type: "CORE" },
        { name: "audit", type: "SUPPORTING" },
        { name: "ledger", type: "TECHNICAL", outputDir: "." }
      ]
    };

    await expect(generateBatch(manifest, { workspaceRoot: root })).rejects.toMatchObject({
      kind: "DuplicateTarget",
      message: `modules[2] and modules[0] both target "${join(root, "ledger")}".`
    });
    expect(await readdir(root)).toEqual([]);
  });

  it("rejects targets nested inside another entry's module directory", async () => {
    const manifest: BatchManifest = {
      modules: [
        { name: "outer", type: "CORE" },
        { name: "inner", type: "SUPPORTING", outputDir: "outer" }
      ]
    };

    await expect(generateBatch(manifest, { workspaceRoot: root })).rejects.toMatchObject({
      kind: "DuplicateTarget",
      message: `modules[1] targets "${join(root, "outer", "inner")}", which overlaps "${join(root, "outer")}" of modules[0].`
    });

    const reversed: BatchManifest = { modules: [...manifest.modules].reverse() };
    expect(() => planBatch(reversed, { workspaceRoot: root })).toThrow(
      `modules[1] targets "${join(root, "outer")}", which overlaps "${join(root, "outer", "inner")}" of modules[0].`
    );
    expect(await readdir(root)).toEqual([]);
  });

  it("allows sibling targets that share a name prefix", () => {
    const specs = planBatch(
      { modules: [{ name: "ledger", type: "CORE" }, { name: "ledger-audit", type: "CORE" }] },
      { workspaceRoot: root }
    );
    expect(specs).toHaveLength(2);
  });

  it("keeps generating when one module fails", async () => {
    await mkdir(join(root, "audit"));
    await writeFile(join(root, "audit", "notes.txt"), "keep\n", "utf8");
    const settled: BatchEntryOutcome[] = [];

    const result = await generateBatch(
      { modules: [{ name: "ledger", type: "CORE" }, { name: "audit", type: "SUPPORTING" }] },
      {
        workspaceRoot: root,
        onModuleSettled(outcome) {
          settled.push(outcome);
        }
      }
    );

    expect(result.succeeded).toBe(1);
    expect(result.failed).toBe(1);
    expect(result.outcomes.map((outcome) => [outcome.name, outcome.ok])).toEqual([
      ["ledger", true],
      ["audit", false]
    ]);
    const failure = result.outcomes[1];
    expect(failure?.ok === false ? failure.error.kind : undefined).toBe("AlreadyExists");
    expect(batchExitCode(result)).toBe(1);
    expect(settled).toHaveLength(2);
    expect(await readdir(join(root, "audit"))).toEqual(["notes.txt"]);
    expect((await readdir(join(root, "ledger"))).length).toBeGreaterThan(0);
  });

  it("plans every module without writing on dry runs", async () => {
    const result = await generateBatch(
      { modules: [{ name: "ledger", type: "CORE" }, { name: "audit", type: "SUPPORTING", mcpServer: true }] },
      { workspaceRoot: root, dryRun: true }
    );

    expect(result.succeeded).toBe(2);
    expect(result.outcomes.map((outcome) => (outcome.ok ? outcome.result.files.length : 0))).toEqual([10, 20]);
    expect(batchExitCode(result)).toBe(0);
    expect(await readdir(root)).toEqual([]);
  });
});
