// cli/src/commands/teardown.ts
import { AzCommandError, createAzRunner } from "../lib/az.js";
import { deleteResourceGroup, resourceGroupExists } from "../lib/azure/resource-group.js";
import { createLogger } from "../lib/logger.js";

export interface TeardownOptions {
  resourceGroup: string;
  yes?: boolean;
  verbose?: boolean;
}

/**
 * Delete a resource group left behind by an earlier run, including everything
 * in it. Without --yes only reports what would be deleted.
 */
export async function teardownCommand(options: TeardownOptions): Promise<void> {
  const { resourceGroup, yes = false } = options;
  const logger = createLogger({ verbose: options.verbose });
  const az = createAzRunner(logger);

  console.log(`\n=== Tearing down resource group '${resourceGroup}' ===\n`);

  try {
    if (!(await resourceGroupExists(az, resourceGroup))) {
      console.log(`No resource group '${resourceGroup}' found, nothing to clean up`);
      return;
    }

    if (!yes) {
      logger.warn(`Would delete resource group '${resourceGroup}' and every resource in it.`);
      console.log("Re-run with --yes to delete it.");
      return;
    }

    await deleteResourceGroup(az, resourceGroup);
  } catch (error) {
    if (error instanceof AzCommandError) {
      logger.error(error.message);
      process.exit(1);
    }
    throw error;
  }

  logger.success(`Deletion of '${resourceGroup}' started; Azure finishes it in the background`);
  console.log(`\n=== Teardown requested for '${resourceGroup}' ===\n`);
}
