import { errorMessage, toError } from "../errors.js";
import { logger } from "../logger.js";

export interface TeardownStep {
  label: string;
  action: () => Promise<void>;
}

/**
 * Run every step in order, whatever happens to the previous ones.
 * Returns the failures, in step order.
 */
export async function runAll(steps: readonly TeardownStep[]): Promise<Error[]> {
  const errors: Error[] = [];
  for (const step of steps) {
    try {
      await step.action();
    } catch (err) {
      logger.warn(`[down] ${step.label} failed: ${errorMessage(err)}`);
      errors.push(toError(err));
    }
  }
  return errors;
}
