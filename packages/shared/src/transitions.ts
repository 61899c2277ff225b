import { EntryStatus } from './enums.js';

/**
 * Allowed status transitions for a time-card entry.
 * PENDING is the only state with outgoing edges; decisions are never reversed.
 */
const ENTRY_TRANSITIONS: Record<EntryStatus, EntryStatus[]> = {
  [EntryStatus.PENDING]: [EntryStatus.APPROVED, EntryStatus.REJECTED],
  [EntryStatus.APPROVED]: [],
  [EntryStatus.REJECTED]: [],
};

/**
 * Checks whether `from → to` is a legal entry transition.
 * Staying in the same state is not a transition.
 */
export function canTransition(from: EntryStatus, to: EntryStatus): boolean {
  return ENTRY_TRANSITIONS[from].includes(to);
}

export type DecisionStatus = EntryStatus.APPROVED | EntryStatus.REJECTED;
