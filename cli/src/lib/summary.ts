// cli/src/lib/summary.ts
import fs from "fs/promises";
import path from "path";
import type { ArtifactPaths } from "./artifacts.js";
import { connectionString, type ProvisioningPlan, type ResourceNames } from "./plan.js";
import type { SkippedStep } from "./sequencer.js";

export const SUMMARY_FILE = "azure-deployment-summary.txt";

export interface Summary {
  project: string;
  environment: string;
  location: string;
  createdAt: string;
  resources: ResourceNames;
  hostname: string;
  url: string;
  adminUser: string;
  adminPassword: string;
  connectionString: string;
  instrumentationKey: string;
  skipped: SkippedStep[];
  artifacts: ArtifactPaths;
}

export interface SummaryInputs {
  hostname: string;
  instrumentationKey: string;
  skipped: SkippedStep[];
  artifacts: ArtifactPaths;
}

export function buildSummary(plan: ProvisioningPlan, inputs: SummaryInputs): Summary {
  return {
    project: plan.project,
    environment: plan.environment,
    location: plan.location,
    createdAt: plan.createdAt,
    resources: { ...plan.names },
    hostname: inputs.hostname,
    url: `https://${inputs.hostname}`,
    adminUser: plan.adminUser,
    adminPassword: plan.secrets.adminPassword,
    connectionString: connectionString(plan),
    instrumentationKey: inputs.instrumentationKey,
    skipped: [...inputs.skipped],
    artifacts: { ...inputs.artifacts },
  };
}

export interface FormatOptions {
  /** Print the admin password as is. Off for the console, on for the file. */
  revealSecrets?: boolean;
}

const MASK = "********";

function row(label: string, value: string, indent = ""): string {
  return `${indent}${`${label}:`.padEnd(22 - indent.length)}${value}`;
}

export function formatSummary(summary: Summary, options: FormatOptions = {}): string[] {
  const { revealSecrets = false } = options;
  const { resources } = summary;
  const password = revealSecrets ? summary.adminPassword : MASK;
  const connection = revealSecrets
    ? summary.connectionString
    : summary.connectionString.replace(`:${summary.adminPassword}@`, `:${MASK}@`);

  const lines = [
    "==============================================",
    "Azure deployment summary",
    "==============================================",
    row("Project", summary.project),
    row("Environment", summary.environment),
    row("Location", summary.location),
    row("Created at", summary.createdAt),
    "",
    "Resources",
    row("Resource group", resources.resourceGroup, "  "),
    row("Web app", resources.webApp, "  "),
    row("App Service plan", resources.appServicePlan, "  "),
    row("PostgreSQL server", resources.dbServer, "  "),
    row("Database", resources.dbName, "  "),
    row("Storage account", resources.storageAccount, "  "),
    row("Key Vault", resources.keyVault, "  "),
    row("App Insights", resources.appInsights, "  "),
    "",
    row("Application URL", summary.url),
    "",
    "Database",
    row("Admin user", summary.adminUser, "  "),
    row("Admin password", password, "  "),
    row("Connection string", connection, "  "),
    "",
    row("Instrumentation key", summary.instrumentationKey),
    "",
    "Generated files",
    ...Object.values(summary.artifacts).map((file) => `  ${file}`),
  ];

  if (summary.skipped.length > 0) {
    lines.push("", "Skipped best-effort steps");
    lines.push(...summary.skipped.map(({ step, reason }) => `  - ${step}: ${reason}`));
  }

  lines.push("==============================================");
  return lines;
}

/**
 * Persist the summary with secrets in clear text, readable by the owner only.
 */
export async function writeSummary(outputDir: string, summary: Summary): Promise<string> {
  const file = path.resolve(outputDir, SUMMARY_FILE);
  const content = `${formatSummary(summary, { revealSecrets: true }).join("\n")}\n`;
  await fs.mkdir(outputDir, { recursive: true });
  await fs.writeFile(file, content, { mode: 0o600 });
  return file;
}
