import { InvalidStatusError } from '../errors';

export type KnownStatus = 'open' | 'in_progress' | 'blocked' | 'deferred' | 'closed';

export const KNOWN_STATUSES: readonly KnownStatus[] = [
  'open',
  'in_progress',
  'blocked',
  'deferred',
  'closed',
];

// Internal to the store; never valid on an issue we display
const TOMBSTONE = 'tombstone';

/**
 * Normalize a raw status string.
 * Unknown non-empty statuses (from newer stores) are accepted; use
 * {@link isKnownStatus} to tell them apart.
 * @throws {InvalidStatusError} for a blank status or a tombstone
 */
export function parseStatus(raw: string): string {
  const status = raw.trim().toLowerCase();
  if (status === '' || status === TOMBSTONE) {
    throw new InvalidStatusError(raw);
  }
  return status;
}

export function isKnownStatus(status: string): status is KnownStatus {
  return KNOWN_STATUSES.some((known) => known === status);
}

/**
 * Whether the workflow allows moving from one known status to another.
 * Staying put is always allowed; a closed issue can otherwise only be reopened.
 */
export function canTransition(from: string, to: string): boolean {
  if (!isKnownStatus(from) || !isKnownStatus(to)) {
    return false;
  }
  if (from === to) {
    return true;
  }
  if (from === 'closed') {
    return to === 'open';
  }
  return true;
}
