import { createHash } from "crypto";

export interface NameRule {
  minLength: number;
  maxLength: number;
  pattern: RegExp;
  description: string;
}

/**
 * Azure naming constraints for the resources a plan creates.
 */
export const NAME_RULES = {
  resourceGroup: {
    minLength: 1,
    maxLength: 90,
    pattern: /^[A-Za-z0-9._()-]*[A-Za-z0-9_()-]$/,
    description: "letters, digits, periods, underscores, hyphens and parentheses; may not end with a period",
  },
  webApp: {
    minLength: 2,
    maxLength: 60,
    pattern: /^[a-z0-9][a-z0-9-]*[a-z0-9]$/,
    description: "lowercase letters, digits and hyphens; may not start or end with a hyphen",
  },
  appServicePlan: {
    minLength: 1,
    maxLength: 40,
    pattern: /^[A-Za-z0-9-]+$/,
    description: "letters, digits and hyphens",
  },
  dbServer: {
    minLength: 3,
    maxLength: 63,
    pattern: /^[a-z][a-z0-9-]*[a-z0-9]$/,
    description: "lowercase letters, digits and hyphens; starts with a letter, ends with a letter or digit",
  },
  dbName: {
    minLength: 1,
    maxLength: 63,
    pattern: /^[a-z_][a-z0-9_]*$/,
    description: "lowercase letters, digits and underscores",
  },
  storageAccount: {
    minLength: 3,
    maxLength: 24,
    pattern: /^[a-z0-9]+$/,
    description: "lowercase letters and digits only",
  },
  keyVault: {
    minLength: 3,
    maxLength: 24,
    pattern: /^[A-Za-z](?!.*--)[A-Za-z0-9-]*[A-Za-z0-9]$/,
    description: "letters, digits and single hyphens; starts with a letter, ends with a letter or digit",
  },
  appInsights: {
    minLength: 1,
    maxLength: 255,
    pattern: /^[^%&\\?/]+$/,
    description: "any characters except %&\\?/",
  },
} as const satisfies Record<string, NameRule>;

export type ResourceKind = keyof typeof NAME_RULES;

export const RESOURCE_KINDS: readonly ResourceKind[] = [
  "resourceGroup",
  "webApp",
  "appServicePlan",
  "dbServer",
  "dbName",
  "storageAccount",
  "keyVault",
  "appInsights",
];

/**
 * Lowercase, replace anything but letters and digits with single hyphens and
 * trim hyphens from both ends.
 */
export function toLabel(value: string): string {
  return value
    .toLowerCase()
    .replace(/[^a-z0-9]/g, "-")
    .replace(/-+/g, "-") // Collapse multiple hyphens
    .replace(/^-/, "")
    .replace(/-$/, "");
}

function shortHash(value: string): string {
  return createHash("md5").update(value).digest("hex").substring(0, 6);
}

/**
 * Join parts with hyphens and append the suffix, truncating the joined prefix
 * so the suffix always survives. Without a suffix an over-long name is cut and
 * given a 6-char hash of the full name instead.
 */
export function hyphenName(parts: string[], suffix: string | undefined, maxLength: number): string {
  const base = parts.map(toLabel).filter(Boolean).join("-");
  const tail = suffix ?? "";

  if (!tail) {
    if (base.length <= maxLength) return base;
    const cut = base.substring(0, maxLength - 7).replace(/-+$/, "");
    return `${cut}-${shortHash(base)}`;
  }

  const room = maxLength - tail.length - 1;
  const head = base.substring(0, room).replace(/-+$/, "");
  return `${head}-${tail}`;
}

/**
 * Letters and digits only (storage accounts), suffix kept intact.
 */
export function compactName(parts: string[], suffix: string, maxLength: number): string {
  const base = parts.join("").toLowerCase().replace(/[^a-z0-9]/g, "");
  return `${base.substring(0, maxLength - suffix.length)}${suffix}`;
}

/** Unix time in seconds, optionally keeping only the last `digits` digits. */
export function timestampSuffix(date: Date, digits?: number): string {
  const seconds = String(Math.floor(date.getTime() / 1000));
  return digits === undefined ? seconds : seconds.slice(-digits);
}

/** Returns the list of constraint violations; empty when the name is valid. */
export function checkName(kind: ResourceKind, name: string): string[] {
  const rule: NameRule = NAME_RULES[kind];
  const problems: string[] = [];

  if (name.length < rule.minLength || name.length > rule.maxLength) {
    problems.push(`${kind} name '${name}' must be ${rule.minLength}-${rule.maxLength} characters (got ${name.length})`);
  }
  if (!rule.pattern.test(name)) {
    problems.push(`${kind} name '${name}' must contain ${rule.description}`);
  }
  return problems;
}
