import type { DecisionStatus, TimeCardEntry } from '@timecard/shared';
import type { DeliveryFailed, Result } from '../errors/workflowErrors.js';

/**
 * Emitted once per committed decision. `entry` is the entry as stored after the decision.
 */
export type DecisionMade = {
  entry: TimeCardEntry;
  decision: DecisionStatus;
};

export type NotifyResult = Result<void, DeliveryFailed>;

export interface DecisionListener {
  notify(event: DecisionMade): Promise<NotifyResult>;
}
