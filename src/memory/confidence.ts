/**
 * Confidence arithmetic for preference merging
 *
 * Reinforcement moves confidence a fraction of the remaining distance to 1.0,
 * so repeated signals increase it monotonically without ever exceeding 1.0.
 * Weakening scales it down and never deletes.
 */

/** Policy weights */
export const CONFIDENCE_POLICY = {
  /** "I love thrillers" */
  explicitAdditive: 0.6,
  /** Querying a genre or actor */
  implicit: 0.15,
  /** "I only watch films rated 8 or more" resets to this level */
  explicitExclusive: 0.9,
  /** Applied to the old value of an exclusive type on an explicit contradiction */
  contradictionFactor: 0.5,
  /** Applied on a negative mention ("I don't like horror") */
  negativeFactor: 0.5,
} as const;

export function clampConfidence(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

/** c' = c + (1 - c) * delta */
export function reinforce(current: number, delta: number): number {
  const c = clampConfidence(current);
  return clampConfidence(c + (1 - c) * clampConfidence(delta));
}

/** c' = c * factor */
export function weaken(current: number, factor: number): number {
  return clampConfidence(clampConfidence(current) * clampConfidence(factor));
}
