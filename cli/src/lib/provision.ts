// cli/src/lib/provision.ts
import type { AzRunner } from "./az.js";
import { writeArtifacts, type ArtifactPaths } from "./artifacts.js";
import { APP_INSIGHTS_TYPE, createAppInsights, deleteAppInsights, getInstrumentationKey } from "./azure/insights.js";
import {
  createKeyVault,
  deleteKeyVault,
  grantAccountAccess,
  grantIdentityAccess,
  setSecret,
} from "./azure/keyvault.js";
import {
  allowAzureServices,
  createDatabase,
  createPostgresServer,
  deletePostgresServer,
} from "./azure/postgres.js";
import {
  createResourceGroup,
  deleteResourceGroup,
  resourceExists,
  resourceGroupExists,
} from "./azure/resource-group.js";
import { createBlobContainer, createStorageAccount, deleteStorageAccount, getStorageKey } from "./azure/storage.js";
import {
  APP_SERVICE_PLAN_TYPE,
  assignManagedIdentity,
  buildAppSettings,
  createAppServicePlan,
  createWebApp,
  deleteAppServicePlan,
  deleteWebApp,
  enableLogging,
  enforceHttps,
  getHostname,
  setAppSettings,
  setStartupCommand,
} from "./azure/webapp.js";
import type { Logger } from "./logger.js";
import { BLOB_CONTAINERS, VAULT_SECRETS, type ProvisioningPlan } from "./plan.js";
import type { AzureAccount } from "./preflight.js";
import { err, ok, type Result } from "./result.js";
import { ProvisionError, runSequence, type Step } from "./sequencer.js";
import { buildSummary, formatSummary, writeSummary, type Summary } from "./summary.js";

/** Resources a run may create, and so may delete on rollback. */
export type CreatedResource =
  | "resourceGroup"
  | "storageAccount"
  | "dbServer"
  | "keyVault"
  | "appInsights"
  | "appServicePlan"
  | "webApp";

/** Values discovered while the run progresses. */
export interface ProvisionOutputs {
  /** Only resources this run created; pre-existing ones are never listed. */
  created: Set<CreatedResource>;
  storageKey?: string;
  instrumentationKey?: string;
  principalId?: string;
  artifacts?: ArtifactPaths;
  hostname?: string;
}

export interface ProvisionContext {
  readonly plan: ProvisioningPlan;
  readonly az: AzRunner;
  readonly account: AzureAccount;
  readonly outputs: ProvisionOutputs;
}

type OptionalOutput = Exclude<keyof ProvisionOutputs, "created">;

function required<K extends OptionalOutput>(
  outputs: ProvisionOutputs,
  key: K
): NonNullable<ProvisionOutputs[K]> {
  const value = outputs[key];
  if (value === undefined || value === null) {
    throw new Error(`${key} is not available: an earlier step did not produce it`);
  }
  return value;
}

/**
 * Names without a unique suffix may belong to an earlier run when the group
 * already existed. A fresh group cannot hold them yet.
 */
async function isNew(context: ProvisionContext, resourceType: string, name: string): Promise<boolean> {
  const { az, plan, outputs } = context;
  if (outputs.created.has("resourceGroup")) return true;
  return !(await resourceExists(az, plan.names.resourceGroup, resourceType, name));
}

function storeSecret(
  secretName: string,
  value: (context: ProvisionContext) => string
): Step<ProvisionContext> {
  return {
    name: `Store ${secretName} in Key Vault`,
    policy: "best-effort",
    run: async (context) => {
      await setSecret(context.az, context.plan, secretName, value(context));
    },
  };
}

export const PROVISION_STEPS: readonly Step<ProvisionContext>[] = [
  {
    name: "Create resource group",
    policy: "mandatory",
    async run({ az, plan, outputs }) {
      const existed = await resourceGroupExists(az, plan.names.resourceGroup);
      await createResourceGroup(az, plan);
      if (!existed) outputs.created.add("resourceGroup");
    },
    async compensate({ az, plan, outputs }) {
      if (outputs.created.has("resourceGroup")) {
        await deleteResourceGroup(az, plan.names.resourceGroup);
      }
    },
  },
  {
    name: "Create storage account and blob containers",
    policy: "mandatory",
    async run({ az, plan, outputs }) {
      await createStorageAccount(az, plan);
      outputs.created.add("storageAccount");
      outputs.storageKey = await getStorageKey(az, plan);
      for (const container of BLOB_CONTAINERS) {
        await createBlobContainer(az, plan, container, outputs.storageKey);
      }
    },
    async compensate({ az, plan, outputs }) {
      if (outputs.created.has("storageAccount")) await deleteStorageAccount(az, plan);
    },
  },
  {
    name: "Create PostgreSQL flexible server and database",
    policy: "mandatory",
    async run({ az, plan, outputs }) {
      await createPostgresServer(az, plan);
      outputs.created.add("dbServer");
      await createDatabase(az, plan);
      await allowAzureServices(az, plan);
    },
    async compensate({ az, plan, outputs }) {
      if (outputs.created.has("dbServer")) await deletePostgresServer(az, plan);
    },
  },
  {
    name: "Create Key Vault",
    policy: "mandatory",
    async run({ az, plan, account, outputs }) {
      await createKeyVault(az, plan);
      outputs.created.add("keyVault");
      await grantAccountAccess(az, plan, account);
    },
    async compensate({ az, plan, outputs }) {
      if (outputs.created.has("keyVault")) await deleteKeyVault(az, plan);
    },
  },
  storeSecret(VAULT_SECRETS.appSecretKey, ({ plan }) => plan.secrets.appSecretKey),
  storeSecret(VAULT_SECRETS.dbPassword, ({ plan }) => plan.secrets.adminPassword),
  storeSecret(VAULT_SECRETS.storageKey, ({ outputs }) => required(outputs, "storageKey")),
  {
    name: "Create Application Insights",
    policy: "mandatory",
    async run(context) {
      const { az, plan, outputs } = context;
      const fresh = await isNew(context, APP_INSIGHTS_TYPE, plan.names.appInsights);
      await createAppInsights(az, plan);
      if (fresh) outputs.created.add("appInsights");
      outputs.instrumentationKey = await getInstrumentationKey(az, plan);
    },
    async compensate({ az, plan, outputs }) {
      if (outputs.created.has("appInsights")) await deleteAppInsights(az, plan);
    },
  },
  {
    name: "Create App Service plan and web app",
    policy: "mandatory",
    async run(context) {
      const { az, plan, outputs } = context;
      const fresh = await isNew(context, APP_SERVICE_PLAN_TYPE, plan.names.appServicePlan);
      await createAppServicePlan(az, plan);
      if (fresh) outputs.created.add("appServicePlan");
      await createWebApp(az, plan);
      outputs.created.add("webApp");
    },
    async compensate({ az, plan, outputs }) {
      if (outputs.created.has("webApp")) await deleteWebApp(az, plan);
      if (outputs.created.has("appServicePlan")) await deleteAppServicePlan(az, plan);
    },
  },
  {
    name: "Configure app settings",
    policy: "mandatory",
    async run({ az, plan, outputs }) {
      await setAppSettings(az, plan, buildAppSettings(plan, required(outputs, "instrumentationKey")));
    },
  },
  {
    name: "Configure startup command and logging",
    policy: "mandatory",
    async run({ az, plan }) {
      await setStartupCommand(az, plan);
      await enableLogging(az, plan);
    },
  },
  {
    name: "Assign managed identity and grant Key Vault access",
    policy: "mandatory",
    async run({ az, plan, outputs }) {
      outputs.principalId = await assignManagedIdentity(az, plan);
      await grantIdentityAccess(az, plan, outputs.principalId);
    },
  },
  {
    name: "Enforce HTTPS",
    policy: "mandatory",
    run: ({ az, plan }) => enforceHttps(az, plan),
  },
  {
    name: "Write configuration files",
    policy: "mandatory",
    async run({ plan, outputs }) {
      outputs.artifacts = await writeArtifacts(plan.outputDir, plan, required(outputs, "instrumentationKey"));
    },
  },
  {
    name: "Fetch web app hostname",
    policy: "mandatory",
    async run({ az, plan, outputs }) {
      outputs.hostname = await getHostname(az, plan);
    },
  },
];

export interface ProvisionDeps {
  az: AzRunner;
  account: AzureAccount;
  logger: Logger;
  rollbackOnFailure?: boolean;
}

export interface ProvisionReport {
  summary: Summary;
  summaryFile: string;
  completedSteps: string[];
}

/**
 * Provision every resource in the plan, write the artifacts and the summary.
 * Resolves with an error result instead of throwing when a step fails.
 */
export async function provision(
  plan: ProvisioningPlan,
  deps: ProvisionDeps
): Promise<Result<ProvisionReport, ProvisionError>> {
  const { az, account, logger, rollbackOnFailure = false } = deps;
  const context: ProvisionContext = { plan, az, account, outputs: { created: new Set() } };

  const outcome = await runSequence(PROVISION_STEPS, context, { logger, rollback: rollbackOnFailure });
  if (!outcome.ok) {
    return outcome;
  }

  const { outputs } = context;
  let summary: Summary;
  let summaryFile: string;
  try {
    summary = buildSummary(plan, {
      hostname: required(outputs, "hostname"),
      instrumentationKey: required(outputs, "instrumentationKey"),
      skipped: outcome.value.skipped,
      artifacts: required(outputs, "artifacts"),
    });
    summaryFile = await writeSummary(plan.outputDir, summary);
  } catch (error) {
    return err(new ProvisionError("Write summary", error, outcome.value.completed, false));
  }

  for (const line of formatSummary(summary)) {
    console.log(line);
  }
  logger.success(`Summary with credentials written to ${summaryFile}`);

  return ok({ summary, summaryFile, completedSteps: outcome.value.completed });
}
