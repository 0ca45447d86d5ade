// cli/src/commands/provision.test.ts
import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import chalk from "chalk";

vi.mock("../lib/az.js", async (importOriginal) => ({
  ...(await importOriginal<typeof import("../lib/az.js")>()),
  createAzRunner: vi.fn(),
}));

vi.mock("../lib/preflight.js", async (importOriginal) => ({
  ...(await importOriginal<typeof import("../lib/preflight.js")>()),
  runPreflight: vi.fn(),
}));

vi.mock("../lib/secrets.js", async (importOriginal) => ({
  ...(await importOriginal<typeof import("../lib/secrets.js")>()),
  createSecretGenerator: vi.fn(),
}));

vi.mock("../lib/provision.js", () => ({
  provision: vi.fn(),
}));

import { createAzRunner, type AzRunner } from "../lib/az.js";
import { PreconditionError, runPreflight } from "../lib/preflight.js";
import { createSecretGenerator } from "../lib/secrets.js";
import { provision } from "../lib/provision.js";
import { err, ok } from "../lib/result.js";
import { ProvisionError } from "../lib/sequencer.js";
import { buildSummary } from "../lib/summary.js";
import { fixedSecrets, TEST_PASSWORD, testAccount } from "../test-utils/fixtures.js";
import { provisionCommand } from "./provision.js";

const mockCreateAzRunner = vi.mocked(createAzRunner);
const mockRunPreflight = vi.mocked(runPreflight);
const mockCreateSecretGenerator = vi.mocked(createSecretGenerator);
const mockProvision = vi.mocked(provision);

describe("provision command", () => {
  const originalEnv = process.env;
  const originalLevel = chalk.level;
  const mockConsoleLog = vi.spyOn(console, "log").mockImplementation(() => {});
  const mockConsoleError = vi.spyOn(console, "error").mockImplementation(() => {});
  const mockProcessExit = vi.spyOn(process, "exit").mockImplementation(() => {
    throw new Error("process.exit called");
  });
  const az = vi.fn<AzRunner>(async () => "");

  beforeEach(() => {
    vi.clearAllMocks();
    chalk.level = 0;
    process.env = { PATH: originalEnv.PATH };
    mockCreateAzRunner.mockReturnValue(az);
    mockCreateSecretGenerator.mockReturnValue(fixedSecrets);
    mockRunPreflight.mockResolvedValue(testAccount);
  });

  afterEach(() => {
    process.env = originalEnv;
    chalk.level = originalLevel;
  });

  function printed(): string[] {
    return mockConsoleLog.mock.calls.map((call) => String(call[0]));
  }

  describe("successful run", () => {
    beforeEach(() => {
      mockProvision.mockImplementation(async (plan) => {
        const summary = buildSummary(plan, {
          hostname: "shop.azurewebsites.net",
          instrumentationKey: "ikey-123",
          skipped: [],
          artifacts: { requirements: "requirements.txt", envTemplate: ".env.template", startup: "startup.sh", webConfig: "web.config" },
        });
        return ok({ summary, summaryFile: "azure-deployment-summary.txt", completedSteps: [] });
      });
    });

    it("provisions the plan built from flags", async () => {
      await provisionCommand({ project: "shop", environment: "staging", secretGenerator: "node" });

      expect(mockCreateSecretGenerator).toHaveBeenCalledWith("node");
      expect(mockRunPreflight).toHaveBeenCalledWith(az, fixedSecrets);
      expect(mockProvision).toHaveBeenCalledTimes(1);

      const [plan, deps] = mockProvision.mock.calls[0];
      expect(plan.names.resourceGroup).toBe("shop-staging-rg");
      expect(plan.secrets.adminPassword).toBe(TEST_PASSWORD);
      expect(deps.account).toBe(testAccount);
      expect(deps.rollbackOnFailure).toBe(false);
      expect(mockProcessExit).not.toHaveBeenCalled();
      expect(printed()).toContain("\nProvisioning complete!\n");
    });

    it("reads the project from the environment", async () => {
      process.env.PROVISION_PROJECT = "blog";

      await provisionCommand({});

      expect(mockProvision.mock.calls[0][0].names.resourceGroup).toBe("blog-production-rg");
    });

    it("passes the rollback flag through", async () => {
      await provisionCommand({ project: "shop", rollbackOnFailure: true });

      expect(mockProvision.mock.calls[0][1].rollbackOnFailure).toBe(true);
    });
  });

  it("exits before touching Azure when the configuration is invalid", async () => {
    await expect(provisionCommand({})).rejects.toThrow("process.exit called");

    expect(mockProcessExit).toHaveBeenCalledWith(1);
    expect(mockConsoleError).toHaveBeenCalledWith(expect.stringContaining("  - project: Required"));
    expect(mockRunPreflight).not.toHaveBeenCalled();
    expect(mockProvision).not.toHaveBeenCalled();
  });

  it("exits when local preconditions fail", async () => {
    mockRunPreflight.mockRejectedValue(new PreconditionError(["Not signed in to Azure. Run 'az login' first: expired"]));

    await expect(provisionCommand({ project: "shop" })).rejects.toThrow("process.exit called");

    expect(mockConsoleError).toHaveBeenCalledWith(
      expect.stringContaining("  - Not signed in to Azure. Run 'az login' first: expired")
    );
    expect(mockProvision).not.toHaveBeenCalled();
  });

  describe("failed run", () => {
    it("points at teardown when resources were left behind", async () => {
      mockProvision.mockResolvedValue(
        err(new ProvisionError("Create Key Vault", new Error("VaultAlreadyExists"), ["Create resource group"], false))
      );

      await expect(provisionCommand({ project: "shop" })).rejects.toThrow("process.exit called");

      expect(mockConsoleError).toHaveBeenCalledWith("✗ Step 'Create Key Vault' failed: VaultAlreadyExists");
      expect(printed()).toContain(
        "⚠ Resources created so far remain in 'shop-production-rg'. " +
        "Remove them with: webapp-provision teardown --resource-group shop-production-rg --yes"
      );
      expect(mockProcessExit).toHaveBeenCalledWith(1);
    });

    it("lists what could not be rolled back", async () => {
      mockProvision.mockResolvedValue(
        err(new ProvisionError(
          "Create Key Vault",
          new Error("VaultAlreadyExists"),
          ["Create resource group"],
          true,
          [{ step: "Create resource group", reason: "AuthorizationFailed" }]
        ))
      );

      await expect(provisionCommand({ project: "shop", rollbackOnFailure: true })).rejects.toThrow("process.exit called");

      const lines = printed();
      expect(lines).toContain("⚠ Not rolled back: Create resource group (AuthorizationFailed)");
      expect(lines.some((line) => line.includes("webapp-provision teardown"))).toBe(false);
    });
  });
});
