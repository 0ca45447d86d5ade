import type { ProvisionConfig } from "./config.js";
import { checkName, compactName, hyphenName, RESOURCE_KINDS, timestampSuffix, type ResourceKind } from "./naming.js";
import { generateAppSecret, generatePassword, type SecretGenerator } from "./secrets.js";

export type ResourceNames = { readonly [K in ResourceKind]: string };

export interface PlanSecrets {
  readonly adminPassword: string;
  readonly appSecretKey: string;
}

export interface ProvisioningPlan {
  readonly project: string;
  readonly environment: string;
  readonly location: string;
  readonly names: ResourceNames;
  readonly sku: {
    readonly appService: string;
    readonly storage: string;
    readonly postgres: {
      readonly skuName: string;
      readonly tier: string;
      readonly version: string;
      readonly storageSizeGb: number;
    };
  };
  readonly adminUser: string;
  readonly pythonVersion: string;
  readonly wsgiModule: string;
  readonly tags: Readonly<Record<string, string>>;
  readonly secrets: PlanSecrets;
  readonly outputDir: string;
  /** ISO timestamp the unique suffixes were derived from. */
  readonly createdAt: string;
  readonly suffix: string;
}

export const BLOB_CONTAINERS = ["static", "media"] as const;

/** Key Vault secret names. */
export const VAULT_SECRETS = {
  appSecretKey: "django-secret-key",
  dbPassword: "db-password",
  storageKey: "storage-key",
} as const;

export const POSTGRES_PORT = 5432;

export class PlanError extends Error {
  constructor(public readonly problems: string[]) {
    super(`Generated resource names are invalid: ${problems.join("; ")}`);
    this.name = "PlanError";
  }
}

/**
 * Resource names for a run starting at `now`. Names that must be globally
 * unique carry a suffix derived from the Unix timestamp.
 */
export function buildResourceNames(config: Pick<ProvisionConfig, "project" | "environment">, now: Date): ResourceNames {
  const { project, environment } = config;
  const ts = timestampSuffix(now);

  const names: ResourceNames = {
    resourceGroup: hyphenName([project, environment, "rg"], undefined, 90),
    webApp: hyphenName([project, environment], ts, 60),
    appServicePlan: hyphenName([project, environment, "plan"], undefined, 40),
    dbServer: hyphenName([project, environment, "db"], ts, 63),
    dbName: `${project.toLowerCase().replace(/[^a-z0-9]/g, "_")}_db`,
    storageAccount: compactName([project, environment], timestampSuffix(now, 8), 24),
    // Shorten project and environment rather than the "kv" marker
    keyVault: hyphenName([project, environment], `kv-${timestampSuffix(now, 6)}`, 24),
    appInsights: hyphenName([project, environment, "insights"], undefined, 255),
  };

  const problems = RESOURCE_KINDS.flatMap((kind) => checkName(kind, names[kind]));
  if (problems.length > 0) {
    throw new PlanError(problems);
  }
  return names;
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  const nestedValues: unknown[] = Object.values(value);
  for (const nested of nestedValues) {
    if (typeof nested === "object" && nested !== null) {
      deepFreeze(nested);
    }
  }
  return Object.freeze(value);
}

export interface PlanOptions {
  now?: Date;
  secrets: SecretGenerator;
}

export async function buildPlan(config: ProvisionConfig, options: PlanOptions): Promise<ProvisioningPlan> {
  const now = options.now ?? new Date();
  const names = buildResourceNames(config, now);

  const plan: ProvisioningPlan = {
    project: config.project,
    environment: config.environment,
    location: config.location,
    names,
    sku: {
      appService: config.appServiceSku,
      storage: config.storageSku,
      postgres: { ...config.postgres },
    },
    adminUser: config.adminUser,
    pythonVersion: config.pythonVersion,
    wsgiModule: config.wsgiModule,
    tags: {
      project: config.project,
      environment: config.environment,
      createdBy: config.createdBy,
    },
    secrets: {
      adminPassword: await generatePassword(options.secrets),
      appSecretKey: await generateAppSecret(options.secrets),
    },
    outputDir: config.outputDir,
    createdAt: now.toISOString(),
    suffix: timestampSuffix(now),
  };

  return deepFreeze(plan);
}

export function dbHost(plan: ProvisioningPlan): string {
  return `${plan.names.dbServer}.postgres.database.azure.com`;
}

export function connectionString(plan: ProvisioningPlan): string {
  const { adminUser, secrets, names } = plan;
  return `postgresql://${adminUser}:${secrets.adminPassword}@${dbHost(plan)}:${POSTGRES_PORT}/${names.dbName}?sslmode=require`;
}

export function defaultHostName(plan: ProvisioningPlan): string {
  return `${plan.names.webApp}.azurewebsites.net`;
}

export function vaultSecretUri(plan: ProvisioningPlan, secretName: string): string {
  return `https://${plan.names.keyVault}.vault.azure.net/secrets/${secretName}/`;
}

/** az `--tags` arguments: key=value pairs. */
export function tagArgs(plan: ProvisioningPlan): string[] {
  return ["--tags", ...Object.entries(plan.tags).map(([key, value]) => `${key}=${value}`)];
}
