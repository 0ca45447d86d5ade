#!/usr/bin/env node
import { Command, Option } from "commander";
import { planCommand } from "./commands/plan.js";
import { provisionCommand, type ProvisionOptions } from "./commands/provision.js";
import { teardownCommand, type TeardownOptions } from "./commands/teardown.js";

function addConfigOptions(command: Command): Command {
  return command
    .option("--config <path>", "JSON file with provisioning settings")
    .option("-p, --project <name>", "Project name used as the prefix of every resource")
    .option("-e, --environment <name>", "Environment name (default: production)")
    .option("-l, --location <region>", "Azure region (default: West Europe)")
    .option("--admin-user <name>", "PostgreSQL admin user (default: djangoadmin)")
    .option("--python-version <version>", "Python runtime version (default: 3.11)")
    .option("--app-service-sku <sku>", "App Service plan SKU (default: B1)")
    .option("--storage-sku <sku>", "Storage account SKU (default: Standard_LRS)")
    .option("--postgres-sku <sku>", "PostgreSQL compute SKU (default: Standard_B1ms)")
    .option("--postgres-tier <tier>", "PostgreSQL tier (default: Burstable)")
    .option("--wsgi-module <module>", "WSGI module for gunicorn (default: <project>.wsgi)")
    .addOption(new Option("--secret-generator <kind>", "How secrets are generated").choices(["openssl", "node"]))
    .option("-o, --output-dir <path>", "Directory for generated files and the summary (default: .)")
    .option("--verbose", "Echo every az command");
}

const program = new Command();

program
  .name("webapp-provision")
  .description("Provision Azure App Service, PostgreSQL, Key Vault and storage for a Django app")
  .version("1.0.0");

addConfigOptions(
  program
    .command("provision")
    .description("Create all resources, write config files and a deployment summary")
)
  .option("--rollback-on-failure", "Delete resources created by this run when a step fails")
  .action(async (options: ProvisionOptions) => {
    try {
      await provisionCommand(options);
    } catch (error) {
      console.error("Provisioning failed:", error);
      process.exit(1);
    }
  });

addConfigOptions(
  program
    .command("plan")
    .description("Show the resource names and settings a provision run would use")
).action((options: ProvisionOptions) => {
  try {
    planCommand(options);
  } catch (error) {
    console.error("Planning failed:", error);
    process.exit(1);
  }
});

program
  .command("teardown")
  .description("Delete a resource group created by an earlier run")
  .requiredOption("-g, --resource-group <name>", "Resource group to delete")
  .option("-y, --yes", "Delete without asking for confirmation")
  .option("--verbose", "Echo every az command")
  .action(async (options: TeardownOptions) => {
    try {
      await teardownCommand(options);
    } catch (error) {
      console.error("Teardown failed:", error);
      process.exit(1);
    }
  });

await program.parseAsync();
