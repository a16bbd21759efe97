/**
 * Preference types
 */

/** Known preference types; any other string is accepted as an extension */
export type PreferenceType = 'genre' | 'actor' | 'rating_min' | (string & {});

/** Types where only one value is current at a time */
export const EXCLUSIVE_PREFERENCE_TYPES: ReadonlySet<string> = new Set(['rating_min']);

export function isExclusiveType(type: PreferenceType): boolean {
  return EXCLUSIVE_PREFERENCE_TYPES.has(type);
}

/** A confidence-weighted fact about a user's taste */
export interface Preference {
  userId: string;
  type: PreferenceType;
  value: string;
  /** In [0, 1] */
  confidence: number;
  createdAt: number;
  updatedAt: number;
  /** Id of the last signal (turn) that wrote this row */
  lastSignalId?: string;
}

/**
 * How an incoming confidence is combined with the stored one.
 *
 * - `reinforce`: c' = c + (1 - c) * delta (new rows start at delta)
 * - `reset`: c' = delta
 */
export type ConfidenceMode = 'reinforce' | 'reset';

export interface UpsertPreferenceOptions {
  mode?: ConfidenceMode;
  /** Writes carrying the same signal id as the stored row are ignored */
  signalId?: string;
}
