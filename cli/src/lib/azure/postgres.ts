// cli/src/lib/azure/postgres.ts
import type { AzRunner } from "../az.js";
import { tagArgs, type ProvisioningPlan } from "../plan.js";

/** Azure's sentinel range for "allow access from Azure services". */
export const AZURE_SERVICES_RULE = {
  name: "AllowAzureServices",
  startIp: "0.0.0.0",
  endIp: "0.0.0.0",
} as const;

export async function createPostgresServer(az: AzRunner, plan: ProvisioningPlan): Promise<void> {
  const { postgres } = plan.sku;
  await az([
    "postgres", "flexible-server", "create",
    "--resource-group", plan.names.resourceGroup,
    "--name", plan.names.dbServer,
    "--location", plan.location,
    "--admin-user", plan.adminUser,
    "--admin-password", plan.secrets.adminPassword,
    "--sku-name", postgres.skuName,
    "--tier", postgres.tier,
    "--storage-size", String(postgres.storageSizeGb),
    "--version", postgres.version,
    "--public-access", "None",
    "--yes",
    ...tagArgs(plan),
    "--output", "none",
  ]);
}

export async function createDatabase(az: AzRunner, plan: ProvisioningPlan): Promise<void> {
  await az([
    "postgres", "flexible-server", "db", "create",
    "--resource-group", plan.names.resourceGroup,
    "--server-name", plan.names.dbServer,
    "--database-name", plan.names.dbName,
    "--output", "none",
  ]);
}

export async function allowAzureServices(az: AzRunner, plan: ProvisioningPlan): Promise<void> {
  await az([
    "postgres", "flexible-server", "firewall-rule", "create",
    "--resource-group", plan.names.resourceGroup,
    "--name", plan.names.dbServer,
    "--rule-name", AZURE_SERVICES_RULE.name,
    "--start-ip-address", AZURE_SERVICES_RULE.startIp,
    "--end-ip-address", AZURE_SERVICES_RULE.endIp,
    "--output", "none",
  ]);
}

export async function deletePostgresServer(az: AzRunner, plan: ProvisioningPlan): Promise<void> {
  await az([
    "postgres", "flexible-server", "delete",
    "--resource-group", plan.names.resourceGroup,
    "--name", plan.names.dbServer,
    "--yes",
  ]);
}
