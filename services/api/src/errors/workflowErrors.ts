import { EntryStatus, ValidationReason } from '@timecard/shared';
import { HttpError } from './HttpError.js';

export type ValidationFailed = { kind: 'ValidationFailed'; reason: ValidationReason };
export type NotFound = { kind: 'NotFound'; entryId: string };
export type InvalidTransition = {
  kind: 'InvalidTransition';
  entryId: string;
  currentStatus: EntryStatus;
};

export type WorkflowError = ValidationFailed | NotFound | InvalidTransition;

/**
 * Typed outcome of a workflow operation. Expected failures are values, not exceptions.
 */
export type Result<T, E = WorkflowError> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

export function validationFailed(reason: ValidationReason): ValidationFailed {
  return { kind: 'ValidationFailed', reason };
}

export function notFound(entryId: string): NotFound {
  return { kind: 'NotFound', entryId };
}

export function invalidTransition(entryId: string, currentStatus: EntryStatus): InvalidTransition {
  return { kind: 'InvalidTransition', entryId, currentStatus };
}

const VALIDATION_MESSAGES: Record<ValidationReason, string> = {
  [ValidationReason.FUTURE_DATE]: 'Entries cannot be submitted for dates in the future.',
  [ValidationReason.INVALID_INTERVAL]:
    'The end time must be after the start time, or hours must be between 0 and 24.',
  [ValidationReason.DUPLICATE_SLOT]: 'An entry already exists for that date and start time.',
  [ValidationReason.OVERLAP]: 'This entry overlaps another entry on the same date.',
  [ValidationReason.MISSING_COMMENT]: 'A comment is required when rejecting an entry.',
};

export function describeWorkflowError(error: WorkflowError): string {
  switch (error.kind) {
    case 'ValidationFailed':
      return VALIDATION_MESSAGES[error.reason];
    case 'NotFound':
      return 'Time card entry not found.';
    case 'InvalidTransition':
      return error.currentStatus === EntryStatus.APPROVED
        ? 'This entry has already been approved.'
        : 'This entry has already been rejected.';
  }
}

function statusCodeFor(error: WorkflowError): number {
  switch (error.kind) {
    case 'ValidationFailed':
      return error.reason === ValidationReason.DUPLICATE_SLOT ||
        error.reason === ValidationReason.OVERLAP
        ? 409
        : 422;
    case 'NotFound':
      return 404;
    case 'InvalidTransition':
      return 409;
  }
}

export function workflowErrorCode(error: WorkflowError): string {
  return error.kind === 'ValidationFailed' ? error.reason : error.kind;
}

export function toHttpError(error: WorkflowError): HttpError {
  return new HttpError(statusCodeFor(error), describeWorkflowError(error), {
    code: workflowErrorCode(error),
  });
}

/**
 * The notification for a decision could not be delivered. Reported, never thrown:
 * the decision it describes is already committed.
 */
export type DeliveryFailed = { kind: 'DeliveryFailed'; reason: string };

export function deliveryFailed(reason: string): DeliveryFailed {
  return { kind: 'DeliveryFailed', reason };
}
