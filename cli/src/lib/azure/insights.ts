// cli/src/lib/azure/insights.ts
import { azValue, type AzRunner } from "../az.js";
import { tagArgs, type ProvisioningPlan } from "../plan.js";

export const APP_INSIGHTS_TYPE = "Microsoft.Insights/components";

export async function createAppInsights(az: AzRunner, plan: ProvisioningPlan): Promise<void> {
  await az([
    "monitor", "app-insights", "component", "create",
    "--app", plan.names.appInsights,
    "--location", plan.location,
    "--resource-group", plan.names.resourceGroup,
    "--application-type", "web",
    ...tagArgs(plan),
    "--output", "none",
  ]);
}

export async function getInstrumentationKey(az: AzRunner, plan: ProvisioningPlan): Promise<string> {
  return azValue(az, [
    "monitor", "app-insights", "component", "show",
    "--app", plan.names.appInsights,
    "--resource-group", plan.names.resourceGroup,
  ], "instrumentationKey");
}

export async function deleteAppInsights(az: AzRunner, plan: ProvisioningPlan): Promise<void> {
  await az([
    "monitor", "app-insights", "component", "delete",
    "--app", plan.names.appInsights,
    "--resource-group", plan.names.resourceGroup,
  ]);
}
