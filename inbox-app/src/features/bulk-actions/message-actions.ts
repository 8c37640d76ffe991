import type pg from 'pg';
import { z } from 'zod';
import { ActionError } from 'bulk-select';
import type { BulkAction } from 'bulk-select';
import type { ActionRegistry } from './registry.js';

// Each UPDATE is guarded by its target value, so re-applying an action is a no-op
const ARCHIVE_SQL = `UPDATE messages SET status = 'archived' WHERE id = $1 AND status <> 'archived'`;
const MARK_REPLIED_SQL = `UPDATE messages SET status = 'replied' WHERE id = $1 AND status = 'unreplied'`;
const SET_PRIORITY_SQL = 'UPDATE messages SET priority = $2 WHERE id = $1 AND priority <> $2';
const MESSAGE_STATE_SQL = 'SELECT status, priority FROM messages WHERE id = $1';

interface MessageState {
  status: string;
  priority: number;
}

const noParams = z.union([z.undefined(), z.null(), z.object({}).strict()]).transform(() => ({}));

const priorityParams = z.object({
  priority: z.number().int().min(0).max(5),
}).strict();

interface GuardedUpdate {
  kind: string;
  sql: string;
  params?: unknown[];
  /** Whether a message the UPDATE skipped is already in the target state. */
  reached: (message: MessageState) => boolean;
}

/**
 * Runs a guarded update. When no row changes, the message is either already in
 * the target state (success), in a state the action does not apply to
 * (`not_applicable`), or gone (`not_found`).
 */
function guardedUpdate(pool: pg.Pool, update: GuardedUpdate): BulkAction {
  return async (id) => {
    let current: MessageState | undefined;
    try {
      const updated = await pool.query(update.sql, [id, ...(update.params ?? [])]);
      if ((updated.rowCount ?? 0) > 0) return;
      const existing = await pool.query<MessageState>(MESSAGE_STATE_SQL, [id]);
      current = existing.rows[0];
    } catch (err) {
      throw new ActionError('database', `Failed to update message '${id}': ${String(err)}`, err);
    }
    if (current === undefined) throw new ActionError('not_found', `Message '${id}' no longer exists`);
    if (!update.reached(current)) {
      throw new ActionError('not_applicable', `Message '${id}' is ${current.status}; ${update.kind} does not apply`);
    }
  };
}

export function registerMessageActions(registry: ActionRegistry, pool: pg.Pool): ActionRegistry {
  return registry
    .register({
      kind: 'archive',
      params: noParams,
      build: () => guardedUpdate(pool, {
        kind: 'archive',
        sql: ARCHIVE_SQL,
        reached: (message) => message.status === 'archived',
      }),
    })
    .register({
      kind: 'mark-replied',
      params: noParams,
      build: () => guardedUpdate(pool, {
        kind: 'mark-replied',
        sql: MARK_REPLIED_SQL,
        reached: (message) => message.status === 'replied',
      }),
    })
    .register({
      kind: 'set-priority',
      params: priorityParams,
      build: ({ priority }) => guardedUpdate(pool, {
        kind: 'set-priority',
        sql: SET_PRIORITY_SQL,
        params: [priority],
        reached: (message) => message.priority === priority,
      }),
    });
}
