// cli/src/lib/secrets.ts
import { randomBytes } from "crypto";
import { execa } from "execa";
import type { SecretGeneratorKind } from "./config.js";

export interface SecretGenerator {
  readonly kind: SecretGeneratorKind;
  /** Whether the backing tool can be used on this machine. */
  isAvailable(): Promise<boolean>;
  /** `bytes` random bytes, base64 encoded, without line breaks. */
  randomBase64(bytes: number): Promise<string>;
}

export const opensslGenerator: SecretGenerator = {
  kind: "openssl",
  async isAvailable() {
    const result = await execa("openssl", ["version"], { reject: false });
    return !result.failed;
  },
  async randomBase64(bytes) {
    const result = await execa("openssl", ["rand", "-base64", String(bytes)]);
    // openssl wraps base64 output at 64 columns
    return result.stdout.replace(/\s+/g, "");
  },
};

export const nodeGenerator: SecretGenerator = {
  kind: "node",
  async isAvailable() {
    return true;
  },
  async randomBase64(bytes) {
    return randomBytes(bytes).toString("base64");
  },
};

export function createSecretGenerator(kind: SecretGeneratorKind): SecretGenerator {
  return kind === "openssl" ? opensslGenerator : nodeGenerator;
}

const PASSWORD_LENGTH = 24;

/**
 * Database admin password: alphanumerics only so it can sit unescaped in a
 * connection string, with at least one upper, lower and digit as Azure
 * Database for PostgreSQL requires three character classes.
 */
export async function generatePassword(generator: SecretGenerator): Promise<string> {
  const raw = (await generator.randomBase64(32)).replace(/[^A-Za-z0-9]/g, "");
  if (raw.length < PASSWORD_LENGTH) {
    throw new Error(`Secret generator '${generator.kind}' returned too little random data`);
  }

  let password = raw.slice(0, PASSWORD_LENGTH);
  if (!/[A-Z]/.test(password)) password += "K";
  if (!/[a-z]/.test(password)) password += "q";
  if (!/[0-9]/.test(password)) password += "7";
  return password;
}

/** Django SECRET_KEY. */
export async function generateAppSecret(generator: SecretGenerator): Promise<string> {
  return (await generator.randomBase64(48)).replace(/=+$/, "");
}
