// cli/src/lib/azure/resource-group.ts
import type { AzRunner } from "../az.js";
import { tagArgs, type ProvisioningPlan } from "../plan.js";

export async function createResourceGroup(az: AzRunner, plan: ProvisioningPlan): Promise<void> {
  await az([
    "group", "create",
    "--name", plan.names.resourceGroup,
    "--location", plan.location,
    ...tagArgs(plan),
    "--output", "none",
  ]);
}

export async function resourceGroupExists(az: AzRunner, name: string): Promise<boolean> {
  const stdout = await az(["group", "exists", "--name", name]);
  return stdout === "true";
}

/**
 * Deletes the group and everything in it. Returns once Azure has accepted the
 * request; the deletion itself continues in the background.
 */
export async function deleteResourceGroup(az: AzRunner, name: string): Promise<void> {
  await az(["group", "delete", "--name", name, "--yes", "--no-wait"]);
}

/**
 * Whether a resource of `resourceType` (e.g. "Microsoft.Web/serverFarms")
 * named `name` exists in the group.
 */
export async function resourceExists(
  az: AzRunner,
  resourceGroup: string,
  resourceType: string,
  name: string
): Promise<boolean> {
  const stdout = await az([
    "resource", "list",
    "--resource-group", resourceGroup,
    "--resource-type", resourceType,
    "--name", name,
    "--query", "[].name",
    "--output", "tsv",
  ]);
  return stdout.split("\n").some((line) => line.trim() === name);
}
