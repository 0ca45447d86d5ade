// cli/src/lib/az.ts
import { execa } from "execa";
import type { z } from "zod";
import type { Logger } from "./logger.js";

/**
 * Runs one az command and resolves with its trimmed stdout.
 * Rejects with AzCommandError when the command fails or az is missing.
 */
export type AzRunner = (args: readonly string[]) => Promise<string>;

const SECRET_FLAGS = new Set(["--admin-password", "--value", "--account-key"]);

// scheme://user:password@ inside any argument, e.g. DATABASE_URL=... in --settings
const URL_CREDENTIALS = /(:\/\/[^:/@\s]+:)[^@\s]+@/g;

/** Replace secret values so they never reach logs or error messages. */
export function redactArgs(args: readonly string[]): string[] {
  return args.map((arg, index) =>
    index > 0 && SECRET_FLAGS.has(args[index - 1]) ? "***" : arg.replace(URL_CREDENTIALS, "$1***@")
  );
}

export class AzCommandError extends Error {
  constructor(
    public readonly args: readonly string[],
    public readonly exitCode: number | undefined,
    public readonly stderr: string
  ) {
    const exit = exitCode === undefined ? "" : ` (exit ${exitCode})`;
    super(`az ${redactArgs(args).join(" ")} failed${exit}: ${stderr || "no error output"}`);
    this.name = "AzCommandError";
  }
}

export function createAzRunner(logger?: Logger): AzRunner {
  return async (args) => {
    logger?.command(redactArgs(args));

    const result = await execa("az", [...args, "--only-show-errors"], {
      reject: false,
    });

    if (result.failed) {
      throw new AzCommandError(args, result.exitCode, result.stderr.trim());
    }

    return result.stdout.trim();
  };
}

/**
 * Run a command with JSON output and validate the payload.
 */
export async function azJson<S extends z.ZodTypeAny>(
  az: AzRunner,
  args: readonly string[],
  schema: S
): Promise<z.infer<S>> {
  const stdout = await az([...args, "--output", "json"]);
  return schema.parse(JSON.parse(stdout));
}

/**
 * Run a query that returns a single value as tsv. An empty answer is an error:
 * every caller needs the value for a later step.
 */
export async function azValue(
  az: AzRunner,
  args: readonly string[],
  query: string
): Promise<string> {
  const fullArgs = [...args, "--query", query, "--output", "tsv"];
  const value = await az(fullArgs);
  if (!value) {
    throw new AzCommandError(fullArgs, 0, `query '${query}' returned no value`);
  }
  return value;
}
