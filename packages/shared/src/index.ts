// Enums
export { EntryStatus, EmployeeRole, ValidationReason, AnomalyKind } from './enums.js';

// Transition rules
export { canTransition, type DecisionStatus } from './transitions.js';

// Entry validation
export { validateEntry, candidateHours } from './validator.js';

// Period aggregation
export { summarizeEntries, computeEmployeeTotals, summarizeProjectHours } from './aggregation.js';

// Calendar helpers
export { toIsoDay, parseWorkingDays } from './time.js';

// Types
export type {
  Employee,
  Project,
  TimeCardEntry,
  EntryCandidate,
  ValidationResult,
  Anomaly,
  MissingDayAnomaly,
  ExcessHoursAnomaly,
  PeriodSummary,
  ProjectHours,
  EmployeeTotals,
} from './types.js';

// Schemas
export {
  CreateEntrySchema,
  RejectEntrySchema,
  PeriodQuerySchema,
  EntryFilterSchema,
  type CreateEntryInput,
  type EntryFilter,
} from './schemas.js';
