// cli/src/commands/plan.ts
import { BLOB_CONTAINERS, buildResourceNames } from "../lib/plan.js";
import { resolveConfig, type ProvisionOptions } from "./provision.js";

/**
 * Print what `provision` would create, without calling Azure. Unique suffixes
 * depend on the clock, so a later run uses different names.
 */
export function planCommand(options: ProvisionOptions, now: Date = new Date()): void {
  const config = resolveConfig(options);
  const names = buildResourceNames(config, now);

  const lines = [
    `\n=== Plan for ${config.project} (${config.environment}) in ${config.location} ===\n`,
    `Resource group:      ${names.resourceGroup}`,
    `Storage account:     ${names.storageAccount} (${config.storageSku}, containers: ${BLOB_CONTAINERS.join(", ")})`,
    `PostgreSQL server:   ${names.dbServer} (${config.postgres.skuName}, ${config.postgres.tier}, v${config.postgres.version}, ${config.postgres.storageSizeGb} GB)`,
    `Database:            ${names.dbName} (admin: ${config.adminUser}, password: <generated>)`,
    `Key Vault:           ${names.keyVault}`,
    `App Insights:        ${names.appInsights}`,
    `App Service plan:    ${names.appServicePlan} (${config.appServiceSku}, Linux)`,
    `Web app:             ${names.webApp} (PYTHON:${config.pythonVersion}, ${config.wsgiModule})`,
    `Tags:                project=${config.project} environment=${config.environment} createdBy=${config.createdBy}`,
    `Output directory:    ${config.outputDir}`,
    `Rollback on failure: ${config.rollbackOnFailure ? "yes" : "no"}`,
  ];
  for (const line of lines) {
    console.log(line);
  }
}
