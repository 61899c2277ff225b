import {
  EntryStatus,
  ValidationReason,
  type DecisionStatus,
  type TimeCardEntry,
} from '@timecard/shared';
import { err, ok, validationFailed, type Result } from '../errors/workflowErrors.js';
import type { EntryStore } from '../entries/entryStore.js';
import type { AppLogger } from '../logger.js';
import type { DecisionListener, NotifyResult } from './events.js';

export type DecisionOutcome = {
  entry: TimeCardEntry;
  notification: NotifyResult;
};

export interface ApprovalWorkflowOptions {
  store: EntryStore;
  listener: DecisionListener;
  logger: AppLogger;
}

/**
 * Admin decisions on pending entries. The store commits the decision first;
 * the listener runs afterwards and its outcome is reported, not enforced.
 */
export class ApprovalWorkflow {
  constructor(private readonly options: ApprovalWorkflowOptions) {}

  async approve(id: string, decidedBy: string): Promise<Result<DecisionOutcome>> {
    return this.decide(id, EntryStatus.APPROVED, decidedBy, null);
  }

  async reject(
    id: string,
    decidedBy: string,
    comment: string | null | undefined
  ): Promise<Result<DecisionOutcome>> {
    const trimmed = comment?.trim() ?? '';
    if (!trimmed) {
      return err(validationFailed(ValidationReason.MISSING_COMMENT));
    }
    return this.decide(id, EntryStatus.REJECTED, decidedBy, trimmed);
  }

  private async decide(
    id: string,
    decision: DecisionStatus,
    decidedBy: string,
    comment: string | null
  ): Promise<Result<DecisionOutcome>> {
    const updated = await this.options.store.updateStatus(id, decision, decidedBy, comment);
    if (!updated.ok) {
      this.options.logger.debug({ entryId: id, decision, error: updated.error }, 'Decision refused');
      return updated;
    }

    const entry = updated.value;
    this.options.logger.info({ entryId: id, decision, decidedBy }, 'Time card entry decided');

    const notification = await this.options.listener.notify({ entry, decision });
    return ok({ entry, notification });
  }
}
