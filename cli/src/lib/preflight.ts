// cli/src/lib/preflight.ts
import { z } from "zod";
import { azJson, type AzRunner } from "./az.js";
import type { SecretGenerator } from "./secrets.js";

const accountSchema = z.object({
  id: z.string(),
  name: z.string(),
  tenantId: z.string().optional(),
  user: z.object({
    name: z.string(),
    type: z.enum(["user", "servicePrincipal"]),
  }),
});

export type AzureAccount = z.infer<typeof accountSchema>;

export class PreconditionError extends Error {
  constructor(public readonly failures: string[]) {
    super(`Preconditions not met: ${failures.join("; ")}`);
    this.name = "PreconditionError";
  }
}

function reason(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Checks local prerequisites before anything touches Azure: the az CLI,
 * a signed-in account and the secret generator.
 */
export async function runPreflight(az: AzRunner, secrets: SecretGenerator): Promise<AzureAccount> {
  const failures: string[] = [];
  let account: AzureAccount | undefined;

  let installed = true;
  try {
    await az(["version", "--output", "none"]);
  } catch (error) {
    installed = false;
    failures.push(`Azure CLI (az) is not installed or not on PATH: ${reason(error)}`);
  }

  // Without az the account check can only repeat the failure above
  if (installed) {
    try {
      account = await azJson(az, ["account", "show"], accountSchema);
    } catch (error) {
      failures.push(`Not signed in to Azure. Run 'az login' first: ${reason(error)}`);
    }
  }

  if (!(await secrets.isAvailable())) {
    failures.push(`Secret generator '${secrets.kind}' is not available. Install openssl or pass --secret-generator node`);
  }

  if (failures.length > 0 || !account) {
    throw new PreconditionError(failures);
  }
  return account;
}

export function formatPreconditionError(error: PreconditionError): string {
  const lines = [
    "==============================================",
    "ERROR: Local preconditions not met:",
    "==============================================",
    ...error.failures.map((failure) => `  - ${failure}`),
  ];
  return lines.join("\n");
}
