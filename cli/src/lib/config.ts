import fs from "fs";
import { z } from "zod";

const LABEL = /^[A-Za-z][A-Za-z0-9-]*$/;
const RESERVED_ADMIN_USERS = ["admin", "administrator", "azure_superuser", "azure_pg_admin", "guest", "postgres", "public", "root"];

const postgresSchema = z
  .object({
    skuName: z.string().min(1).default("Standard_B1ms"),
    tier: z.enum(["Burstable", "GeneralPurpose", "MemoryOptimized"]).default("Burstable"),
    version: z.string().regex(/^\d+$/, "must be a major version number").default("14"),
    storageSizeGb: z.coerce.number().int().min(32).max(16384).default(32),
  })
  .strict();

const provisionConfigSchema = z
  .object({
    // Required
    project: z
      .string()
      .trim()
      .min(2)
      .max(20)
      .regex(LABEL, "must start with a letter and contain only letters, digits and hyphens")
      .transform((value) => value.toLowerCase()),
    // Optional with defaults
    environment: z
      .string()
      .trim()
      .min(1)
      .max(12)
      .regex(LABEL, "must start with a letter and contain only letters, digits and hyphens")
      .transform((value) => value.toLowerCase())
      .default("production"),
    location: z.string().min(1).default("West Europe"),
    adminUser: z
      .string()
      .regex(/^[A-Za-z][A-Za-z0-9_]{0,62}$/, "must start with a letter and contain only letters, digits and underscores")
      .refine((value) => !RESERVED_ADMIN_USERS.includes(value.toLowerCase()), "is reserved by Azure Database for PostgreSQL")
      .default("djangoadmin"),
    pythonVersion: z.string().regex(/^3\.\d+$/, "must look like 3.11").default("3.11"),
    appServiceSku: z.string().min(1).default("B1"),
    storageSku: z
      .enum(["Standard_LRS", "Standard_GRS", "Standard_RAGRS", "Standard_ZRS", "Premium_LRS"])
      .default("Standard_LRS"),
    postgres: postgresSchema.default({}),
    wsgiModule: z.string().regex(/^[A-Za-z_][A-Za-z0-9_.]*$/, "must be a dotted Python module path").optional(),
    createdBy: z.string().min(1).default("webapp-provision"),
    secretGenerator: z.enum(["openssl", "node"]).default("openssl"),
    outputDir: z.string().min(1).default("."),
    rollbackOnFailure: z.boolean().default(false),
  })
  .strict()
  .transform((config) => ({
    ...config,
    wsgiModule: config.wsgiModule ?? `${config.project.replace(/-/g, "_")}.wsgi`,
  }));

export type ProvisionConfig = z.output<typeof provisionConfigSchema>;
export type SecretGeneratorKind = ProvisionConfig["secretGenerator"];

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid provisioning configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

/** Values taken from command-line flags. */
export interface ConfigFlags {
  project?: string;
  environment?: string;
  location?: string;
  adminUser?: string;
  pythonVersion?: string;
  appServiceSku?: string;
  storageSku?: string;
  postgresSku?: string;
  postgresTier?: string;
  wsgiModule?: string;
  secretGenerator?: string;
  outputDir?: string;
  rollbackOnFailure?: boolean;
}

export interface ConfigSources {
  /** Path to a JSON file with the same shape as ProvisionConfig. */
  file?: string;
  env?: Record<string, string | undefined>;
  flags?: ConfigFlags;
}

type RawConfig = Record<string, unknown>;

function isRecord(value: unknown): value is RawConfig {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readConfigFile(file: string): RawConfig {
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(file, "utf8"));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError([`${file}: ${reason}`]);
  }

  if (!isRecord(parsed)) {
    throw new ConfigError([`${file}: expected a JSON object`]);
  }
  return parsed;
}

function fromEnv(env: Record<string, string | undefined>): RawConfig {
  return {
    project: env.PROVISION_PROJECT,
    environment: env.PROVISION_ENVIRONMENT,
    location: env.PROVISION_LOCATION,
    adminUser: env.PROVISION_ADMIN_USER,
    pythonVersion: env.PROVISION_PYTHON_VERSION,
    appServiceSku: env.PROVISION_APP_SERVICE_SKU,
    storageSku: env.PROVISION_STORAGE_SKU,
    postgres: {
      skuName: env.PROVISION_POSTGRES_SKU,
      tier: env.PROVISION_POSTGRES_TIER,
      version: env.PROVISION_POSTGRES_VERSION,
    },
    createdBy: env.PROVISION_CREATED_BY,
    secretGenerator: env.PROVISION_SECRET_GENERATOR,
    outputDir: env.PROVISION_OUTPUT_DIR,
  };
}

function fromFlags(flags: ConfigFlags): RawConfig {
  return {
    project: flags.project,
    environment: flags.environment,
    location: flags.location,
    adminUser: flags.adminUser,
    pythonVersion: flags.pythonVersion,
    appServiceSku: flags.appServiceSku,
    storageSku: flags.storageSku,
    postgres: {
      skuName: flags.postgresSku,
      tier: flags.postgresTier,
    },
    wsgiModule: flags.wsgiModule,
    secretGenerator: flags.secretGenerator,
    outputDir: flags.outputDir,
    rollbackOnFailure: flags.rollbackOnFailure,
  };
}

/**
 * Merge layers left to right. Undefined values never override, nested
 * objects merge key by key.
 */
function mergeLayers(layers: RawConfig[]): RawConfig {
  const merged: RawConfig = {};
  for (const values of layers) {
    for (const [key, value] of Object.entries(values)) {
      if (value === undefined) continue;
      if (isRecord(value)) {
        const current = merged[key];
        merged[key] = mergeLayers(isRecord(current) ? [current, value] : [value]);
      } else {
        merged[key] = value;
      }
    }
  }
  return merged;
}

/**
 * Resolve configuration: flag > env var > config file > default.
 */
export function loadConfig(sources: ConfigSources = {}): ProvisionConfig {
  const { file, env = {}, flags = {} } = sources;

  const raw = mergeLayers([
    file ? readConfigFile(file) : {},
    fromEnv(env),
    fromFlags(flags),
  ]);

  const result = provisionConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      return `${path}: ${issue.message}`;
    });
    throw new ConfigError(issues);
  }

  return result.data;
}

export function formatConfigError(error: ConfigError): string {
  const lines = [
    "==============================================",
    "ERROR: Invalid provisioning configuration:",
    "==============================================",
    ...error.issues.map((issue) => `  - ${issue}`),
    "",
    "Set values with flags, PROVISION_* environment variables or --config <file>.",
  ];
  return lines.join("\n");
}
