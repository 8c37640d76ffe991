import type pg from 'pg';
import type { FieldSchema, RecordTableConfig } from 'bulk-select';

export const MESSAGE_STATUSES = ['unreplied', 'replied', 'archived'] as const;
export type MessageStatus = (typeof MESSAGE_STATUSES)[number];

/** Fields a selection filter may reference, keyed by their API name. */
export const MESSAGE_FIELDS: FieldSchema = {
  status: { column: 'status', type: 'string' },
  sender: { column: 'sender', type: 'string' },
  subject: { column: 'subject', type: 'string' },
  priority: { column: 'priority', type: 'number' },
  starred: { column: 'starred', type: 'boolean' },
  receivedAt: { column: 'received_at', type: 'timestamp' },
};

export const MESSAGES_TABLE: RecordTableConfig = {
  table: 'messages',
  idColumn: 'id',
  positionColumn: 'position',
  fields: MESSAGE_FIELDS,
};

// position is assigned on insert and never updated
export const DDL_CREATE_MESSAGES_TABLE = `
CREATE TABLE IF NOT EXISTS messages (
  id           TEXT         PRIMARY KEY,
  position     BIGSERIAL    NOT NULL UNIQUE,
  status       TEXT         NOT NULL DEFAULT 'unreplied',
  sender       TEXT         NOT NULL,
  subject      TEXT         NOT NULL,
  priority     INTEGER      NOT NULL DEFAULT 0,
  starred      BOOLEAN      NOT NULL DEFAULT FALSE,
  received_at  TIMESTAMPTZ  NOT NULL DEFAULT NOW()
)
`.trim();

export const DDL_CREATE_MESSAGES_STATUS_INDEX = `
CREATE INDEX IF NOT EXISTS idx_messages_status_position
  ON messages (status, position)
`.trim();

export async function applyMessageSchema(client: pg.ClientBase): Promise<void> {
  await client.query(DDL_CREATE_MESSAGES_TABLE);
  await client.query(DDL_CREATE_MESSAGES_STATUS_INDEX);
}
