// cli/src/lib/artifacts.ts
import fs from "fs/promises";
import path from "path";
import {
  BLOB_CONTAINERS,
  dbHost,
  defaultHostName,
  POSTGRES_PORT,
  type ProvisioningPlan,
} from "./plan.js";

export const STARTUP_FILE = "startup.sh";

export const ARTIFACT_FILES = {
  requirements: "requirements.txt",
  envTemplate: ".env.template",
  startup: STARTUP_FILE,
  webConfig: "web.config",
} as const;

export type ArtifactName = keyof typeof ARTIFACT_FILES;
export type ArtifactPaths = Record<ArtifactName, string>;

const REQUIREMENTS = [
  "Django>=4.2,<5.0",
  "gunicorn>=21.2,<23.0",
  "psycopg2-binary>=2.9,<3.0",
  "django-storages[azure]>=1.14,<2.0",
  "whitenoise>=6.5,<7.0",
  "python-dotenv>=1.0,<2.0",
  "dj-database-url>=2.1,<3.0",
  "opencensus-ext-azure>=1.1,<2.0",
];

export function renderRequirements(): string {
  return `${REQUIREMENTS.join("\n")}\n`;
}

/**
 * Local .env for the Django app. Secrets stay placeholders; the deployed app
 * reads them from Key Vault.
 */
export function renderEnvTemplate(plan: ProvisioningPlan, instrumentationKey: string): string {
  const [staticContainer, mediaContainer] = BLOB_CONTAINERS;
  const lines = [
    "# Django settings",
    "SECRET_KEY=your-secret-key-here",
    "DEBUG=False",
    `ALLOWED_HOSTS=${defaultHostName(plan)}`,
    "DJANGO_LOG_LEVEL=INFO",
    "",
    "# Database",
    `DB_NAME=${plan.names.dbName}`,
    `DB_USER=${plan.adminUser}`,
    "DB_PASSWORD=your-database-password",
    `DB_HOST=${dbHost(plan)}`,
    `DB_PORT=${POSTGRES_PORT}`,
    "",
    "# Azure Storage",
    `AZURE_STORAGE_ACCOUNT_NAME=${plan.names.storageAccount}`,
    "AZURE_STORAGE_ACCOUNT_KEY=your-storage-account-key",
    `AZURE_STATIC_CONTAINER=${staticContainer}`,
    `AZURE_MEDIA_CONTAINER=${mediaContainer}`,
    "",
    "# Application Insights",
    `APPINSIGHTS_INSTRUMENTATIONKEY=${instrumentationKey}`,
  ];
  return `${lines.join("\n")}\n`;
}

/**
 * App Service startup command: static files, migrations, then gunicorn
 * replaces the shell.
 */
export function renderStartupScript(plan: ProvisioningPlan): string {
  const lines = [
    "#!/bin/bash",
    "set -e",
    "",
    'echo "Collecting static files..."',
    "python manage.py collectstatic --noinput",
    "",
    'echo "Applying database migrations..."',
    "python manage.py migrate --noinput",
    "",
    'echo "Starting Gunicorn..."',
    `exec gunicorn --bind=0.0.0.0:8000 --workers=4 --timeout 600 ${plan.wsgiModule}:application`,
  ];
  return `${lines.join("\n")}\n`;
}

// Only read by Windows App Service plans
export function renderWebConfig(plan: ProvisioningPlan): string {
  const pythonDir = `python${plan.pythonVersion.replace(".", "")}x64`;
  const settingsModule = plan.wsgiModule.replace(/\.wsgi$/, ".settings");
  return `<?xml version="1.0" encoding="utf-8"?>
<configuration>
  <system.webServer>
    <handlers>
      <add name="PythonHandler" path="*" verb="*" modules="httpPlatformHandler" resourceType="Unspecified" />
    </handlers>
    <httpPlatform processPath="%HOME%\\${pythonDir}\\python.exe"
                  arguments="%HOME%\\site\\wwwroot\\manage.py runserver %HTTP_PLATFORM_PORT%"
                  stdoutLogEnabled="true"
                  stdoutLogFile="%HOME%\\LogFiles\\python.log"
                  startupTimeLimit="60">
      <environmentVariables>
        <environmentVariable name="DJANGO_SETTINGS_MODULE" value="${settingsModule}" />
      </environmentVariables>
    </httpPlatform>
  </system.webServer>
</configuration>
`;
}

/**
 * Write all four artifacts into `outputDir`, creating it when missing.
 */
export async function writeArtifacts(
  outputDir: string,
  plan: ProvisioningPlan,
  instrumentationKey: string
): Promise<ArtifactPaths> {
  await fs.mkdir(outputDir, { recursive: true });

  const paths: ArtifactPaths = {
    requirements: path.resolve(outputDir, ARTIFACT_FILES.requirements),
    envTemplate: path.resolve(outputDir, ARTIFACT_FILES.envTemplate),
    startup: path.resolve(outputDir, ARTIFACT_FILES.startup),
    webConfig: path.resolve(outputDir, ARTIFACT_FILES.webConfig),
  };

  await fs.writeFile(paths.requirements, renderRequirements());
  await fs.writeFile(paths.envTemplate, renderEnvTemplate(plan, instrumentationKey));
  await fs.writeFile(paths.startup, renderStartupScript(plan));
  await fs.chmod(paths.startup, 0o755);
  await fs.writeFile(paths.webConfig, renderWebConfig(plan));

  return paths;
}
