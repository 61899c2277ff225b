/**
 * Lifecycle status of a time-card entry.
 * Flow: PENDING → APPROVED | REJECTED. Both decisions are terminal.
 * Matches the DB enum `entry_status`.
 */
export enum EntryStatus {
  PENDING = 'PENDING',
  APPROVED = 'APPROVED',
  REJECTED = 'REJECTED',
}

/**
 * Role of an employee account.
 */
export enum EmployeeRole {
  EMPLOYEE = 'EMPLOYEE',
  ADMIN = 'ADMIN',
}

/**
 * Reasons a candidate entry (or a rejection) fails validation.
 */
export enum ValidationReason {
  FUTURE_DATE = 'FutureDate',
  INVALID_INTERVAL = 'InvalidInterval',
  DUPLICATE_SLOT = 'DuplicateSlot',
  OVERLAP = 'Overlap',
  MISSING_COMMENT = 'MissingComment',
}

/**
 * Anomaly flags raised by period aggregation.
 */
export enum AnomalyKind {
  MISSING_DAY = 'MissingDay',
  EXCESS_HOURS = 'ExcessHours',
}
