import type { StepOutcome } from "./types.js";

/**
 * A change-set that is locally correct but globally broken: isolated tests
 * passed and the integrated run failed. Any other combination is not a
 * composition failure (an isolated failure is an ordinary rejection).
 */
export function detectComposition(isolated: StepOutcome | undefined, integration: StepOutcome | undefined): boolean {
  return isolated?.pass === true && integration?.pass === false;
}
