// cli/src/lib/azure/keyvault.ts
import type { AzRunner } from "../az.js";
import { tagArgs, type ProvisioningPlan } from "../plan.js";
import type { AzureAccount } from "../preflight.js";

/**
 * Vault using access policies rather than Azure RBAC, so grants are plain
 * set-policy calls.
 */
export async function createKeyVault(az: AzRunner, plan: ProvisioningPlan): Promise<void> {
  await az([
    "keyvault", "create",
    "--name", plan.names.keyVault,
    "--resource-group", plan.names.resourceGroup,
    "--location", plan.location,
    "--enable-rbac-authorization", "false",
    ...tagArgs(plan),
    "--output", "none",
  ]);
}

/** Lets the signed-in user or service principal manage secrets. */
export async function grantAccountAccess(
  az: AzRunner,
  plan: ProvisioningPlan,
  account: AzureAccount
): Promise<void> {
  const principalFlag = account.user.type === "user" ? "--upn" : "--spn";
  await az([
    "keyvault", "set-policy",
    "--name", plan.names.keyVault,
    principalFlag, account.user.name,
    "--secret-permissions", "get", "list", "set", "delete",
    "--output", "none",
  ]);
}

/** Read-only secret access for a managed identity. */
export async function grantIdentityAccess(
  az: AzRunner,
  plan: ProvisioningPlan,
  principalId: string
): Promise<void> {
  await az([
    "keyvault", "set-policy",
    "--name", plan.names.keyVault,
    "--object-id", principalId,
    "--secret-permissions", "get", "list",
    "--output", "none",
  ]);
}

export async function setSecret(
  az: AzRunner,
  plan: ProvisioningPlan,
  name: string,
  value: string
): Promise<void> {
  await az([
    "keyvault", "secret", "set",
    "--vault-name", plan.names.keyVault,
    "--name", name,
    "--value", value,
    "--output", "none",
  ]);
}

export async function deleteKeyVault(az: AzRunner, plan: ProvisioningPlan): Promise<void> {
  await az([
    "keyvault", "delete",
    "--name", plan.names.keyVault,
    "--resource-group", plan.names.resourceGroup,
  ]);
}
