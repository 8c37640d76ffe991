import { describe, it, expect, vi } from 'vitest';
import pg from 'pg';
import { ActionError } from 'bulk-select';
import { ActionRegistry } from '../src/features/bulk-actions/registry.js';
import { registerMessageActions } from '../src/features/bulk-actions/message-actions.js';
import { InvalidActionParamsError } from '../src/domain/errors.js';

function makeRegistry(query: ReturnType<typeof vi.fn>) {
  const pool = { query } as unknown as pg.Pool;
  return registerMessageActions(new ActionRegistry(), pool);
}

describe('message actions', () => {
  it('registers archive, mark-replied and set-priority', () => {
    expect(makeRegistry(vi.fn()).kinds()).toEqual(['archive', 'mark-replied', 'set-priority']);
  });

  it('archive issues a guarded update for the record', async () => {
    const query = vi.fn().mockResolvedValue({ rows: [], rowCount: 1 });
    await makeRegistry(query).create('archive', undefined)('msg-1');
    expect(query).toHaveBeenCalledTimes(1);
    expect(query).toHaveBeenCalledWith(
      "UPDATE messages SET status = 'archived' WHERE id = $1 AND status <> 'archived'",
      ['msg-1'],
    );
  });

  it('treats an already-archived message as success', async () => {
    const query = vi.fn()
      .mockResolvedValueOnce({ rows: [], rowCount: 0 })
      .mockResolvedValueOnce({ rows: [{ status: 'archived', priority: 0 }], rowCount: 1 });
    await expect(makeRegistry(query).create('archive', {})('msg-1')).resolves.toBeUndefined();
    expect(query).toHaveBeenLastCalledWith('SELECT status, priority FROM messages WHERE id = $1', ['msg-1']);
  });

  it('treats an already-replied message as success', async () => {
    const query = vi.fn()
      .mockResolvedValueOnce({ rows: [], rowCount: 0 })
      .mockResolvedValueOnce({ rows: [{ status: 'replied', priority: 2 }], rowCount: 1 });
    await expect(makeRegistry(query).create('mark-replied', undefined)('msg-5')).resolves.toBeUndefined();
  });

  it('fails with not_applicable when marking an archived message replied', async () => {
    const query = vi.fn()
      .mockResolvedValueOnce({ rows: [], rowCount: 0 })
      .mockResolvedValueOnce({ rows: [{ status: 'archived', priority: 2 }], rowCount: 1 });
    const attempt = makeRegistry(query).create('mark-replied', undefined)('msg-6');
    await expect(attempt).rejects.toThrow(ActionError);
    await expect(attempt).rejects.toMatchObject({
      kind: 'not_applicable',
      message: "Message 'msg-6' is archived; mark-replied does not apply",
    });
  });

  it('treats a message already at the requested priority as success', async () => {
    const query = vi.fn()
      .mockResolvedValueOnce({ rows: [], rowCount: 0 })
      .mockResolvedValueOnce({ rows: [{ status: 'unreplied', priority: 3 }], rowCount: 1 });
    await expect(makeRegistry(query).create('set-priority', { priority: 3 })('msg-7')).resolves.toBeUndefined();
  });

  it('fails with not_found when the message is gone', async () => {
    const query = vi.fn().mockResolvedValue({ rows: [], rowCount: 0 });
    const attempt = makeRegistry(query).create('mark-replied', null)('msg-9');
    await expect(attempt).rejects.toThrow(ActionError);
    await expect(attempt).rejects.toMatchObject({ kind: 'not_found', message: "Message 'msg-9' no longer exists" });
  });

  it('mark-replied only moves unreplied messages', async () => {
    const query = vi.fn().mockResolvedValue({ rows: [], rowCount: 1 });
    await makeRegistry(query).create('mark-replied', undefined)('msg-2');
    expect(query).toHaveBeenCalledWith(
      "UPDATE messages SET status = 'replied' WHERE id = $1 AND status = 'unreplied'",
      ['msg-2'],
    );
  });

  it('set-priority passes the priority as a parameter', async () => {
    const query = vi.fn().mockResolvedValue({ rows: [], rowCount: 1 });
    await makeRegistry(query).create('set-priority', { priority: 4 })('msg-3');
    expect(query).toHaveBeenCalledWith(
      'UPDATE messages SET priority = $2 WHERE id = $1 AND priority <> $2',
      ['msg-3', 4],
    );
  });

  it('set-priority rejects out-of-range or missing params', () => {
    const registry = makeRegistry(vi.fn());
    expect(() => registry.create('set-priority', { priority: 6 })).toThrow(InvalidActionParamsError);
    expect(() => registry.create('set-priority', undefined)).toThrow(InvalidActionParamsError);
  });

  it('archive rejects unexpected params', () => {
    expect(() => makeRegistry(vi.fn()).create('archive', { force: true })).toThrow(InvalidActionParamsError);
  });

  it('reports driver failures as database errors', async () => {
    const query = vi.fn().mockRejectedValue(new Error('deadlock detected'));
    const attempt = makeRegistry(query).create('archive', undefined)('msg-4');
    await expect(attempt).rejects.toMatchObject({
      kind: 'database',
      message: "Failed to update message 'msg-4': Error: deadlock detected",
    });
  });
});
