// cli/src/lib/sequencer.ts
import type { Logger } from "./logger.js";
import { err, ok, type Result } from "./result.js";

/**
 * mandatory: a failure stops the run.
 * best-effort: a failure is logged and recorded, the run goes on.
 */
export type StepPolicy = "mandatory" | "best-effort";

export interface Step<C> {
  readonly name: string;
  readonly policy: StepPolicy;
  run(context: C): Promise<void>;
  /**
   * Undo what run() created. Only called when rollback is enabled, also for
   * the step that failed, so it must cope with a partial run().
   */
  compensate?(context: C): Promise<void>;
}

export interface SkippedStep {
  step: string;
  reason: string;
}

export interface SequenceOutcome {
  completed: string[];
  skipped: SkippedStep[];
}

export interface SequenceOptions {
  logger: Logger;
  /**
   * After a mandatory failure, run the compensations of the failed step and of
   * every completed step, newest first.
   */
  rollback?: boolean;
}

export class ProvisionError extends Error {
  constructor(
    public readonly step: string,
    cause: unknown,
    public readonly completedSteps: string[],
    public readonly rolledBack: boolean,
    public readonly compensationFailures: SkippedStep[] = []
  ) {
    super(`Step '${step}' failed: ${describe(cause)}`, { cause });
    this.name = "ProvisionError";
  }
}

export function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

async function compensate<C>(
  steps: readonly Step<C>[],
  context: C,
  logger: Logger
): Promise<SkippedStep[]> {
  const failures: SkippedStep[] = [];

  for (const step of [...steps].reverse()) {
    if (!step.compensate) continue;
    logger.info(`Rolling back: ${step.name}`);
    try {
      await step.compensate(context);
    } catch (error) {
      // Keep going: an earlier step's undo may still succeed
      const reason = describe(error);
      logger.error(`Rollback of '${step.name}' failed: ${reason}`);
      failures.push({ step: step.name, reason });
    }
  }

  return failures;
}

/**
 * Run steps strictly in order. Each step finishes before the next starts;
 * after a mandatory failure no later step runs.
 */
export async function runSequence<C>(
  steps: readonly Step<C>[],
  context: C,
  options: SequenceOptions
): Promise<Result<SequenceOutcome, ProvisionError>> {
  const { logger, rollback = false } = options;
  const completed: Step<C>[] = [];
  const skipped: SkippedStep[] = [];

  for (const [index, step] of steps.entries()) {
    logger.step(index + 1, steps.length, step.name);

    try {
      await step.run(context);
    } catch (error) {
      const reason = describe(error);

      if (step.policy === "best-effort") {
        logger.warn(`${step.name} failed, continuing: ${reason}`);
        skipped.push({ step: step.name, reason });
        continue;
      }

      logger.error(`${step.name} failed: ${reason}`);
      const compensationFailures = rollback ? await compensate([...completed, step], context, logger) : [];
      return err(new ProvisionError(
        step.name,
        error,
        completed.map((done) => done.name),
        rollback,
        compensationFailures
      ));
    }

    completed.push(step);
    logger.success(step.name);
  }

  return ok({ completed: completed.map((done) => done.name), skipped });
}
