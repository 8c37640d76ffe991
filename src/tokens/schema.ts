import type pg from 'pg';

export const DDL_CREATE_TOKENS_TABLE = `
CREATE TABLE IF NOT EXISTS selection_tokens (
  token             UUID         PRIMARY KEY,
  filter            JSONB        NOT NULL,
  selection         JSONB        NOT NULL,
  snapshot_version  BIGINT       NULL,
  single_use        BOOLEAN      NOT NULL DEFAULT FALSE,
  created_at        TIMESTAMPTZ  NOT NULL,
  expires_at        TIMESTAMPTZ  NOT NULL
)
`.trim();

export const DDL_CREATE_EXPIRES_INDEX = `
CREATE INDEX IF NOT EXISTS idx_selection_tokens_expires_at
  ON selection_tokens (expires_at)
`.trim();

export async function applyTokenSchema(client: pg.ClientBase): Promise<void> {
  await client.query(DDL_CREATE_TOKENS_TABLE);
  await client.query(DDL_CREATE_EXPIRES_INDEX);
}
