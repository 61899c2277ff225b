import type pg from 'pg';

export type AuditLogAction = 'ENTRY_SUBMITTED' | 'ENTRY_APPROVED' | 'ENTRY_REJECTED';

export type InsertAuditLogInput = {
  actorId: string | null;
  action: AuditLogAction;
  entityType: 'time_card_entry';
  entityId: string;
  oldValue?: unknown;
  newValue?: unknown;
};

function toJsonb(value: unknown): string | null {
  if (value === undefined || value === null) return null;
  return JSON.stringify(value);
}

export type AuditLogQueryFn = (text: string, params?: unknown[]) => Promise<unknown>;

/**
 * Canonical writer for `audit_log`. Runs on the caller's client so the row commits
 * (or rolls back) with the change it describes.
 */
export async function insertAuditLogQuery(
  queryFn: AuditLogQueryFn,
  input: InsertAuditLogInput
): Promise<void> {
  await queryFn(
    `
    INSERT INTO audit_log (actor_id, action, entity_type, entity_id, old_value, new_value)
    VALUES ($1, $2, $3, $4::uuid, $5::jsonb, $6::jsonb)
    `,
    [
      input.actorId,
      input.action,
      input.entityType,
      input.entityId,
      toJsonb(input.oldValue),
      toJsonb(input.newValue),
    ]
  );
}

export async function insertAuditLog(
  client: pg.PoolClient,
  input: InsertAuditLogInput
): Promise<void> {
  return insertAuditLogQuery((text, params) => client.query(text, params), input);
}
