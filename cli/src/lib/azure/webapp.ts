// cli/src/lib/azure/webapp.ts
import { azValue, type AzRunner } from "../az.js";
import { STARTUP_FILE } from "../artifacts.js";
import {
  BLOB_CONTAINERS,
  connectionString,
  defaultHostName,
  tagArgs,
  vaultSecretUri,
  VAULT_SECRETS,
  type ProvisioningPlan,
} from "../plan.js";

export const APP_SERVICE_PLAN_TYPE = "Microsoft.Web/serverFarms";

export async function createAppServicePlan(az: AzRunner, plan: ProvisioningPlan): Promise<void> {
  await az([
    "appservice", "plan", "create",
    "--name", plan.names.appServicePlan,
    "--resource-group", plan.names.resourceGroup,
    "--location", plan.location,
    "--sku", plan.sku.appService,
    "--is-linux",
    ...tagArgs(plan),
    "--output", "none",
  ]);
}

export async function createWebApp(az: AzRunner, plan: ProvisioningPlan): Promise<void> {
  await az([
    "webapp", "create",
    "--name", plan.names.webApp,
    "--resource-group", plan.names.resourceGroup,
    "--plan", plan.names.appServicePlan,
    "--runtime", `PYTHON:${plan.pythonVersion}`,
    ...tagArgs(plan),
    "--output", "none",
  ]);
}

function keyVaultReference(plan: ProvisioningPlan, secretName: string): string {
  return `@Microsoft.KeyVault(SecretUri=${vaultSecretUri(plan, secretName)})`;
}

/**
 * Application settings for the Django app. SECRET_KEY and DB_PASSWORD are
 * Key Vault references resolved by App Service through the managed identity.
 */
export function buildAppSettings(plan: ProvisioningPlan, instrumentationKey: string): Record<string, string> {
  const [staticContainer, mediaContainer] = BLOB_CONTAINERS;
  return {
    SECRET_KEY: keyVaultReference(plan, VAULT_SECRETS.appSecretKey),
    DB_PASSWORD: keyVaultReference(plan, VAULT_SECRETS.dbPassword),
    DATABASE_URL: connectionString(plan),
    AZURE_STORAGE_ACCOUNT_NAME: plan.names.storageAccount,
    AZURE_STATIC_CONTAINER: staticContainer,
    AZURE_MEDIA_CONTAINER: mediaContainer,
    APPINSIGHTS_INSTRUMENTATIONKEY: instrumentationKey,
    DEBUG: "False",
    ALLOWED_HOSTS: defaultHostName(plan),
    DJANGO_LOG_LEVEL: "INFO",
  };
}

export async function setAppSettings(
  az: AzRunner,
  plan: ProvisioningPlan,
  settings: Record<string, string>
): Promise<void> {
  await az([
    "webapp", "config", "appsettings", "set",
    "--name", plan.names.webApp,
    "--resource-group", plan.names.resourceGroup,
    "--settings", ...Object.entries(settings).map(([key, value]) => `${key}=${value}`),
    "--output", "none",
  ]);
}

export async function setStartupCommand(az: AzRunner, plan: ProvisioningPlan): Promise<void> {
  await az([
    "webapp", "config", "set",
    "--name", plan.names.webApp,
    "--resource-group", plan.names.resourceGroup,
    "--startup-file", STARTUP_FILE,
    "--output", "none",
  ]);
}

export async function enableLogging(az: AzRunner, plan: ProvisioningPlan): Promise<void> {
  await az([
    "webapp", "log", "config",
    "--name", plan.names.webApp,
    "--resource-group", plan.names.resourceGroup,
    "--application-logging", "filesystem",
    "--web-server-logging", "filesystem",
    "--detailed-error-messages", "true",
    "--failed-request-tracing", "true",
    "--level", "information",
    "--output", "none",
  ]);
}

/** Enables the system-assigned identity and returns its principal id. */
export async function assignManagedIdentity(az: AzRunner, plan: ProvisioningPlan): Promise<string> {
  return azValue(az, [
    "webapp", "identity", "assign",
    "--name", plan.names.webApp,
    "--resource-group", plan.names.resourceGroup,
  ], "principalId");
}

export async function enforceHttps(az: AzRunner, plan: ProvisioningPlan): Promise<void> {
  await az([
    "webapp", "update",
    "--name", plan.names.webApp,
    "--resource-group", plan.names.resourceGroup,
    "--https-only", "true",
    "--output", "none",
  ]);
}

export async function getHostname(az: AzRunner, plan: ProvisioningPlan): Promise<string> {
  return azValue(az, [
    "webapp", "show",
    "--name", plan.names.webApp,
    "--resource-group", plan.names.resourceGroup,
  ], "defaultHostName");
}

export async function deleteWebApp(az: AzRunner, plan: ProvisioningPlan): Promise<void> {
  await az([
    "webapp", "delete",
    "--name", plan.names.webApp,
    "--resource-group", plan.names.resourceGroup,
  ]);
}

export async function deleteAppServicePlan(az: AzRunner, plan: ProvisioningPlan): Promise<void> {
  await az([
    "appservice", "plan", "delete",
    "--name", plan.names.appServicePlan,
    "--resource-group", plan.names.resourceGroup,
    "--yes",
  ]);
}
