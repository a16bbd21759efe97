/**
 * User types
 *
 * The identity key supplied by the front end (e.g. `cli:alice`) is the user id.
 * Users are created on first contact and never deleted by the agent.
 */

export interface User {
  /** Opaque identity key */
  id: string;
  /** Display name, set once the user introduces themselves */
  displayName?: string;
  createdAt: number;
  lastActiveAt: number;
}
