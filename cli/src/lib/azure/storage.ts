// cli/src/lib/azure/storage.ts
import { azValue, type AzRunner } from "../az.js";
import { tagArgs, type ProvisioningPlan } from "../plan.js";

export async function createStorageAccount(az: AzRunner, plan: ProvisioningPlan): Promise<void> {
  await az([
    "storage", "account", "create",
    "--name", plan.names.storageAccount,
    "--resource-group", plan.names.resourceGroup,
    "--location", plan.location,
    "--sku", plan.sku.storage,
    "--kind", "StorageV2",
    "--allow-blob-public-access", "true",
    ...tagArgs(plan),
    "--output", "none",
  ]);
}

export async function getStorageKey(az: AzRunner, plan: ProvisioningPlan): Promise<string> {
  return azValue(az, [
    "storage", "account", "keys", "list",
    "--account-name", plan.names.storageAccount,
    "--resource-group", plan.names.resourceGroup,
  ], "[0].value");
}

/**
 * Container with anonymous read access to blobs (not to the listing).
 */
export async function createBlobContainer(
  az: AzRunner,
  plan: ProvisioningPlan,
  container: string,
  accountKey: string
): Promise<void> {
  await az([
    "storage", "container", "create",
    "--name", container,
    "--account-name", plan.names.storageAccount,
    "--account-key", accountKey,
    "--public-access", "blob",
    "--output", "none",
  ]);
}

export async function deleteStorageAccount(az: AzRunner, plan: ProvisioningPlan): Promise<void> {
  await az([
    "storage", "account", "delete",
    "--name", plan.names.storageAccount,
    "--resource-group", plan.names.resourceGroup,
    "--yes",
  ]);
}
