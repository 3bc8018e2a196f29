import { Coordinates } from '@stepforge/shared';

/**
 * Per-session input state carried between batches. Replaced wholesale
 * when a batch converts successfully, never mutated.
 */
export interface SessionState {
  readonly cursor: Coordinates | null;
  readonly capsLockEnabled: boolean;
}

export function createSessionState(
  cursor: Coordinates | null = null,
): SessionState {
  return Object.freeze({ cursor, capsLockEnabled: false });
}
