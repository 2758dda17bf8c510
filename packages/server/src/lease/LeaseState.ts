/**
 * Lifecycle of one key as seen by this process.
 */
export enum LeaseState {
  /** Nothing in progress for the key */
  UNCLAIMED = 'UNCLAIMED',
  /** A claim update is in flight */
  CLAIMING = 'CLAIMING',
  /** Polling a held record after asking its holder to give it up */
  FORCE_LOADING = 'FORCE_LOADING',
  /** This process holds the lease and auto-saves it */
  ACTIVE = 'ACTIVE',
  /** Final save in progress; no further saves accepted */
  RELEASING = 'RELEASING',
  /** A save found another session or load count in the record */
  STOLEN = 'STOLEN',
  TERMINAL = 'TERMINAL',
}

export const VALID_TRANSITIONS: Record<LeaseState, LeaseState[]> = {
  [LeaseState.UNCLAIMED]: [LeaseState.CLAIMING, LeaseState.FORCE_LOADING],
  [LeaseState.CLAIMING]: [LeaseState.ACTIVE, LeaseState.FORCE_LOADING, LeaseState.TERMINAL],
  [LeaseState.FORCE_LOADING]: [LeaseState.ACTIVE, LeaseState.TERMINAL],
  [LeaseState.ACTIVE]: [LeaseState.RELEASING, LeaseState.STOLEN, LeaseState.TERMINAL],
  [LeaseState.RELEASING]: [LeaseState.STOLEN, LeaseState.TERMINAL],
  [LeaseState.STOLEN]: [LeaseState.TERMINAL],
  [LeaseState.TERMINAL]: [],
};

export function isValidTransition(from: LeaseState, to: LeaseState): boolean {
  return VALID_TRANSITIONS[from]?.includes(to) ?? false;
}

/**
 * Why a lease stopped being active.
 * - released: the application (or withLease) released it
 * - shutdown: released by service shutdown
 * - stolen: a save found the record owned by someone else
 * - forceLoaded: gave the record up because another process requested a force load
 */
export type ReleaseReason = 'released' | 'shutdown' | 'stolen' | 'forceLoaded';
