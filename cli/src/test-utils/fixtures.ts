// cli/src/test-utils/fixtures.ts
import { vi } from "vitest";
import type { AzRunner } from "../lib/az.js";
import { loadConfig, type ConfigFlags } from "../lib/config.js";
import { buildPlan, type ProvisioningPlan } from "../lib/plan.js";
import type { AzureAccount } from "../lib/preflight.js";
import type { SecretGenerator } from "../lib/secrets.js";

/** 2025-10-09T12:19:05Z */
export const FIXED_NOW = new Date(1760012345 * 1000);

export const TEST_PASSWORD = "TestPassw0rdAbcdefGhijkl";
export const TEST_APP_SECRET = "test-app-secret-value";

export const fixedSecrets: SecretGenerator = {
  kind: "node",
  isAvailable: async () => true,
  randomBase64: async (bytes) =>
    bytes === 32 ? `${TEST_PASSWORD}MnopqrStuv+/==` : `${TEST_APP_SECRET}==`,
};

export const testAccount: AzureAccount = {
  id: "00000000-0000-0000-0000-000000000000",
  name: "Test Subscription",
  user: { name: "dev@example.com", type: "user" },
};

export async function makePlan(flags: ConfigFlags = {}, now: Date = FIXED_NOW): Promise<ProvisioningPlan> {
  const config = loadConfig({ env: {}, flags: { project: "app", ...flags } });
  return buildPlan(config, { now, secrets: fixedSecrets });
}

interface Rule {
  prefix: string[];
  respond: () => Promise<string>;
}

/**
 * In-process stand-in for the az CLI. Records every call; answers with the
 * most recently registered rule whose prefix matches, or "".
 */
export function createFakeAz() {
  const rules: Rule[] = [];
  const calls: string[][] = [];

  const matches = (args: readonly string[], prefix: string[]) =>
    prefix.every((part, index) => args[index] === part);

  const run = vi.fn<AzRunner>(async (args) => {
    calls.push([...args]);
    const rule = [...rules].reverse().find((candidate) => matches(args, candidate.prefix));
    return rule ? rule.respond() : "";
  });

  return {
    run,
    calls,
    respond(prefix: string[], output: string) {
      rules.push({ prefix, respond: async () => output });
    },
    fail(prefix: string[], error: Error = new Error(`az ${prefix.join(" ")} failed`)) {
      rules.push({ prefix, respond: async () => { throw error; } });
    },
    /** Index of the first call starting with `prefix`, or -1. */
    indexOf(prefix: string[]) {
      return calls.findIndex((args) => matches(args, prefix));
    },
  };
}

export type FakeAz = ReturnType<typeof createFakeAz>;
