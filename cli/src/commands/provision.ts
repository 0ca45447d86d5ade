// cli/src/commands/provision.ts
import { createAzRunner } from "../lib/az.js";
import { ConfigError, formatConfigError, loadConfig, type ConfigFlags, type ProvisionConfig } from "../lib/config.js";
import { createLogger } from "../lib/logger.js";
import { buildPlan } from "../lib/plan.js";
import { formatPreconditionError, PreconditionError, runPreflight, type AzureAccount } from "../lib/preflight.js";
import { provision } from "../lib/provision.js";
import { createSecretGenerator } from "../lib/secrets.js";

export interface ProvisionOptions extends ConfigFlags {
  config?: string;
  verbose?: boolean;
}

export function resolveConfig(options: ProvisionOptions): ProvisionConfig {
  const { config: file, verbose: _verbose, ...flags } = options;
  try {
    return loadConfig({ file, env: process.env, flags });
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(formatConfigError(error));
      process.exit(1);
    }
    throw error;
  }
}

export async function provisionCommand(options: ProvisionOptions): Promise<void> {
  // Step 1: Resolve configuration (flag > env var > config file > default)
  const config = resolveConfig(options);
  const logger = createLogger({ verbose: options.verbose });

  console.log(`\n=== Provisioning ${config.project} (${config.environment}) in ${config.location} ===\n`);

  // Step 2: Local preconditions, before anything touches Azure
  logger.info("Checking local prerequisites...");
  const az = createAzRunner(logger);
  const secrets = createSecretGenerator(config.secretGenerator);
  let account: AzureAccount;
  try {
    account = await runPreflight(az, secrets);
  } catch (error) {
    if (error instanceof PreconditionError) {
      console.error(formatPreconditionError(error));
      process.exit(1);
    }
    throw error;
  }
  logger.success(`Signed in as ${account.user.name} (subscription: ${account.name})`);

  // Step 3: Plan
  const plan = await buildPlan(config, { secrets });
  logger.info(`Resource group: ${plan.names.resourceGroup}`);
  logger.info(`Web app: ${plan.names.webApp}`);
  console.log();

  // Step 4: Provision
  const result = await provision(plan, {
    az,
    account,
    logger,
    rollbackOnFailure: config.rollbackOnFailure,
  });

  if (!result.ok) {
    const { error } = result;
    logger.error(error.message);
    if (!error.rolledBack && error.completedSteps.length > 0) {
      logger.warn(
        `Resources created so far remain in '${plan.names.resourceGroup}'. ` +
        `Remove them with: webapp-provision teardown --resource-group ${plan.names.resourceGroup} --yes`
      );
    }
    for (const failure of error.compensationFailures) {
      logger.warn(`Not rolled back: ${failure.step} (${failure.reason})`);
    }
    process.exit(1);
  }

  console.log("\nProvisioning complete!\n");
}
