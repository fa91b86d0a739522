import { mkdtemp, readdir, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { runCreate } from "../src/commands/create.js";
import { runListTypes } from "../src/commands/list-types.js";

const mocks = vi.hoisted(() => ({
  spinnerStart: vi.fn(),
  spinnerStop: vi.fn(),
  spinnerMessage: vi.fn(),
  select: vi.fn(),
  cancel: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  success: vi.fn(),
  error: vi.fn()
}));

vi.mock("@clack/prompts", () => ({
  spinner: () => ({
    start: mocks.spinnerStart,
    stop: mocks.spinnerStop,
    message: mocks.spinnerMessage
  }),
  select: mocks.select,
  cancel: mocks.cancel,
  isCancel: (value: unknown) => typeof value === "symbol",
  log: {
    info: mocks.info,
    warn: mocks.warn,
    success: mocks.success,
    error: mocks.error
  }
}));

describe("create command", () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), "modscaffold-create-"));
    vi.spyOn(process, "cwd").mockReturnValue(root);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    vi.clearAllMocks();
    await rm(root, { recursive: true, force: true });
  });

  it("writes the module behind a spinner and logs the report", async () => {
    const result = await runCreate("user-management", { type: "CORE", domain: "ecommerce" }, { interactive: false });

    expect(result.written).toBe(true);
    expect(await readdir(root)).toEqual(["user-management"]);
    expect(mocks.spinnerStart).toHaveBeenCalledWith("Building module in `user-management`...");
    expect(mocks.spinnerMessage).toHaveBeenLastCalledWith("Writing files 10/10: requirements.txt");
    expect(mocks.spinnerStop).toHaveBeenCalledWith("Module build complete.");
    expect(mocks.success).toHaveBeenCalledWith("Module created at `user-management`.");
    expect(mocks.warn).not.toHaveBeenCalled();
    expect(String(mocks.info.mock.calls[0]?.[0]).split("\n")[0]).toBe(
      'Generated CORE module "user-management" (domain: ecommerce)'
    );
  });

  it("warns when --force replaced the module directory", async () => {
    await runCreate("user-management", { type: "CORE" }, { interactive: false });
    await runCreate("user-management", { type: "TECHNICAL", force: true }, { interactive: false });

    expect(mocks.warn).toHaveBeenCalledWith("Replaced any existing module directory because --force was set.");
  });

  it("stops the spinner with an error code when the write fails", async () => {
    await runCreate("user-management", { type: "CORE" }, { interactive: false });

    await expect(runCreate("user-management", { type: "CORE" }, { interactive: false })).rejects.toMatchObject({
      kind: "AlreadyExists"
    });
    expect(mocks.spinnerStop).toHaveBeenLastCalledWith("Module build failed.", 2);
  });

  it("requires a type when prompts are disabled", async () => {
    await expect(runCreate("user-management", {}, { interactive: false })).rejects.toMatchObject({
      kind: "InvalidType",
      message: "Module type is required. Pass --type <CORE|INTEGRATION|SUPPORTING|TECHNICAL>."
    });
    expect(mocks.select).not.toHaveBeenCalled();
    expect(await readdir(root)).toEqual([]);
  });

  it("prompts for the module type when interactive", async () => {
    mocks.select.mockResolvedValue("SUPPORTING");

    const result = await runCreate("order-events", {}, { interactive: true });

    expect(result.moduleType).toBe("SUPPORTING");
    expect(mocks.select).toHaveBeenCalledTimes(1);
    expect(mocks.select.mock.calls[0]?.[0]).toMatchObject({ message: "Module type", initialValue: "CORE" });
  });

  it("always generates the MCP layout for create-mcp-server", async () => {
    const result = await runCreate(
      "payment-gateway",
      { type: "INTEGRATION", mcpServer: false },
      { interactive: false, mcpServer: true }
    );

    expect(result.files).toHaveLength(20);
    expect(result.files.map((file) => file.path)).toContain("payment-gateway_server.py");
  });

  it("plans without writing on dry runs", async () => {
    const result = await runCreate("user-management", { type: "CORE", dryRun: true }, { interactive: false });

    expect(result.written).toBe(false);
    expect(mocks.spinnerStart).not.toHaveBeenCalled();
    expect(mocks.warn).toHaveBeenCalledWith("Dry run: nothing was written.");
    expect(await readdir(root)).toEqual([]);
  });

  it("prints the report as JSON on stdout", async () => {
    const write = vi.spyOn(process.stdout, "write").mockImplementation(() => true);

    await runCreate("user-management", { type: "CORE", format: "json" });

    const output = write.mock.calls.map(([chunk]) => String(chunk)).join("");
    const report = JSON.parse(output) as { module: string; fileCount: number; dryRun: boolean; location: string };
    expect(report).toMatchObject({
      module: "user-management",
      fileCount: 10,
      dryRun: false,
      location: join(root, "user-management")
    });
    expect(mocks.spinnerStart).not.toHaveBeenCalled();
    expect(mocks.info).not.toHaveBeenCalled();
  });
});

describe("types command", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("lists every module type as JSON", () => {
    const write = vi.spyOn(process.stdout, "write").mockImplementation(() => true);

    runListTypes({ format: "json" });

    const output = write.mock.calls.map(([chunk]) => String(chunk)).join("");
    const { types: listings } = JSON.parse(output) as { types: Array<{ type: string; primaryOperation: string }> };
    expect(listings.map((listing) => listing.type)).toEqual(["CORE", "INTEGRATION", "SUPPORTING", "TECHNICAL"]);
    expect(listings[1]?.primaryOperation).toBe("call_external_service");
  });
});
