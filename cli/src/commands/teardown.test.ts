// cli/src/commands/teardown.test.ts
import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import chalk from "chalk";

vi.mock("../lib/az.js", async (importOriginal) => ({
  ...(await importOriginal<typeof import("../lib/az.js")>()),
  createAzRunner: vi.fn(),
}));

import { AzCommandError, createAzRunner } from "../lib/az.js";
import { createFakeAz, type FakeAz } from "../test-utils/fixtures.js";
import { teardownCommand } from "./teardown.js";

const mockCreateAzRunner = vi.mocked(createAzRunner);

describe("teardown command", () => {
  const originalLevel = chalk.level;
  const mockConsoleLog = vi.spyOn(console, "log").mockImplementation(() => {});
  const mockConsoleError = vi.spyOn(console, "error").mockImplementation(() => {});
  const mockProcessExit = vi.spyOn(process, "exit").mockImplementation(() => {
    throw new Error("process.exit called");
  });
  let az: FakeAz;

  beforeEach(() => {
    vi.clearAllMocks();
    chalk.level = 0;
    az = createFakeAz();
    mockCreateAzRunner.mockReturnValue(az.run);
  });

  afterEach(() => {
    chalk.level = originalLevel;
  });

  function printed(): string[] {
    return mockConsoleLog.mock.calls.map((call) => String(call[0]));
  }

  it("does nothing when the group does not exist", async () => {
    az.respond(["group", "exists"], "false");

    await teardownCommand({ resourceGroup: "shop-production-rg", yes: true });

    expect(printed()).toContain("No resource group 'shop-production-rg' found, nothing to clean up");
    expect(az.indexOf(["group", "delete"])).toBe(-1);
  });

  it("only reports without --yes", async () => {
    az.respond(["group", "exists"], "true");

    await teardownCommand({ resourceGroup: "shop-production-rg" });

    const lines = printed();
    expect(lines).toContain("⚠ Would delete resource group 'shop-production-rg' and every resource in it.");
    expect(lines).toContain("Re-run with --yes to delete it.");
    expect(az.indexOf(["group", "delete"])).toBe(-1);
  });

  it("deletes the group with --yes", async () => {
    az.respond(["group", "exists"], "true");

    await teardownCommand({ resourceGroup: "shop-production-rg", yes: true });

    expect(az.calls).toEqual([
      ["group", "exists", "--name", "shop-production-rg"],
      ["group", "delete", "--name", "shop-production-rg", "--yes", "--no-wait"],
    ]);
    expect(printed()).toContain(
      "✓ Deletion of 'shop-production-rg' started; Azure finishes it in the background"
    );
    expect(mockProcessExit).not.toHaveBeenCalled();
  });

  it("exits with status 1 when az fails", async () => {
    az.fail(
      ["group", "exists"],
      new AzCommandError(["group", "exists", "--name", "shop-production-rg"], 1, "AuthorizationFailed")
    );

    await expect(teardownCommand({ resourceGroup: "shop-production-rg", yes: true })).rejects.toThrow(
      "process.exit called"
    );

    expect(mockConsoleError).toHaveBeenCalledWith(
      "✗ az group exists --name shop-production-rg failed (exit 1): AuthorizationFailed"
    );
    expect(mockProcessExit).toHaveBeenCalledWith(1);
  });

  it("rethrows unexpected errors", async () => {
    az.fail(["group", "exists"], new Error("boom"));

    await expect(teardownCommand({ resourceGroup: "shop-production-rg" })).rejects.toThrow("boom");

    expect(mockProcessExit).not.toHaveBeenCalled();
  });
});
