import pg from 'pg';
import { v4 as uuidv4, validate as isUuid } from 'uuid';
import type { Clock } from '../clock.js';
import { systemClock } from '../clock.js';
import { StoreUnavailableError, TokenExpiredError, TokenNotFoundError } from '../errors.js';
import type { FilterDescriptor } from '../filter/types.js';
import { serializeFilter } from '../filter/parse.js';
import { serializeSelection } from '../selection/serialize.js';
import type {
  CreateTokenOptions,
  SelectionState,
  SelectionToken,
  SelectionTokenStore,
  SnapshotBasis,
  StoredSelection,
} from '../types.js';
import { applyTokenSchema } from './schema.js';
import { mapTokenRow } from './row-mapper.js';
import type { TokenRow } from './row-mapper.js';

export const DEFAULT_TOKEN_TTL_MS = 15 * 60_000;
export const MIN_TOKEN_TTL_MS = 1_000;
export const MAX_TOKEN_TTL_MS = 24 * 60 * 60_000;
/** Expired rows are kept this long so resolve() can still say "expired" rather than "not found". */
export const DEFAULT_PURGE_GRACE_MS = 24 * 60 * 60_000;

const INSERT_TOKEN_SQL = `
INSERT INTO selection_tokens (token, filter, selection, snapshot_version, single_use, created_at, expires_at)
VALUES ($1, $2::jsonb, $3::jsonb, $4, $5, $6, $7)
`.trim();

const SELECT_TOKEN_SQL = `
SELECT token, filter, selection, snapshot_version, single_use, created_at, expires_at
FROM selection_tokens
WHERE token = $1
`.trim();

const CONSUME_TOKEN_SQL = `
DELETE FROM selection_tokens
WHERE token = $1 AND expires_at > $2
RETURNING token, filter, selection, snapshot_version, single_use, created_at, expires_at
`.trim();

const RESTORE_TOKEN_SQL = `
INSERT INTO selection_tokens (token, filter, selection, snapshot_version, single_use, created_at, expires_at)
VALUES ($1, $2::jsonb, $3::jsonb, $4, $5, $6, $7)
ON CONFLICT (token) DO NOTHING
`.trim();

const DELETE_TOKEN_SQL = 'DELETE FROM selection_tokens WHERE token = $1';

const PURGE_TOKENS_SQL = 'DELETE FROM selection_tokens WHERE expires_at < $1';

export interface TokenStoreConfig {
  pool: pg.Pool;
  clock?: Clock;
  /** Default TTL for new tokens. */
  ttlMs?: number;
}

function tokenParams(stored: StoredSelection): unknown[] {
  return [
    stored.token,
    JSON.stringify(serializeFilter(stored.filter)),
    JSON.stringify(serializeSelection(stored.selection)),
    stored.snapshot.kind === 'pinned' ? stored.snapshot.version : null,
    stored.singleUse,
    stored.createdAt,
    stored.expiresAt,
  ];
}

function checkTtl(ttlMs: number): number {
  if (!Number.isInteger(ttlMs) || ttlMs < MIN_TOKEN_TTL_MS || ttlMs > MAX_TOKEN_TTL_MS) {
    throw new RangeError(
      `Token TTL must be an integer between ${MIN_TOKEN_TTL_MS} and ${MAX_TOKEN_TTL_MS} ms, got ${ttlMs}`,
    );
  }
  return ttlMs;
}

export class PostgresSelectionTokenStore implements SelectionTokenStore {
  private readonly pool: pg.Pool;
  private readonly clock: Clock;
  private readonly ttlMs: number;

  constructor(config: TokenStoreConfig) {
    this.pool = config.pool;
    this.clock = config.clock ?? systemClock;
    this.ttlMs = checkTtl(config.ttlMs ?? DEFAULT_TOKEN_TTL_MS);
  }

  async initializeSchema(): Promise<void> {
    let client: pg.PoolClient;
    try {
      client = await this.pool.connect();
    } catch (err) {
      throw new StoreUnavailableError(`Failed to connect to token store: ${String(err)}`, err);
    }
    try {
      await applyTokenSchema(client);
    } finally {
      client.release();
    }
  }

  async create(
    filter: FilterDescriptor,
    selection: SelectionState,
    snapshot: SnapshotBasis,
    options: CreateTokenOptions = {},
  ): Promise<SelectionToken> {
    const ttlMs = checkTtl(options.ttlMs ?? this.ttlMs);
    const createdAt = this.clock.now();
    const expiresAt = new Date(createdAt.getTime() + ttlMs);
    const token = uuidv4();
    const params = tokenParams({
      token,
      filter,
      selection,
      snapshot,
      singleUse: options.singleUse ?? false,
      createdAt,
      expiresAt,
    });
    try {
      await this.pool.query(INSERT_TOKEN_SQL, params);
    } catch (err) {
      throw new StoreUnavailableError(`Failed to create selection token: ${String(err)}`, err);
    }
    return { token, expiresAt };
  }

  async resolve(token: string): Promise<StoredSelection> {
    // Tokens are UUIDs; anything else cannot exist and would fail the cast server-side
    if (!isUuid(token)) throw new TokenNotFoundError(token);

    let result: pg.QueryResult<TokenRow>;
    try {
      result = await this.pool.query<TokenRow>(SELECT_TOKEN_SQL, [token]);
    } catch (err) {
      throw new StoreUnavailableError(`Failed to resolve selection token: ${String(err)}`, err);
    }
    const row = result.rows[0];
    if (row === undefined) throw new TokenNotFoundError(token);
    if (row.expires_at.getTime() <= this.clock.now().getTime()) {
      throw new TokenExpiredError(token, row.expires_at);
    }
    return mapTokenRow(row);
  }

  async consume(token: string): Promise<StoredSelection> {
    if (!isUuid(token)) throw new TokenNotFoundError(token);

    let result: pg.QueryResult<TokenRow>;
    try {
      result = await this.pool.query<TokenRow>(CONSUME_TOKEN_SQL, [token, this.clock.now()]);
    } catch (err) {
      throw new StoreUnavailableError(`Failed to consume selection token: ${String(err)}`, err);
    }
    const row = result.rows[0];
    if (row !== undefined) return mapTokenRow(row);

    // Missing, expired, or consumed by someone else; resolve() reports which
    await this.resolve(token);
    throw new TokenNotFoundError(token, `Selection token '${token}' was already used`);
  }

  async restore(stored: StoredSelection): Promise<void> {
    try {
      await this.pool.query(RESTORE_TOKEN_SQL, tokenParams(stored));
    } catch (err) {
      throw new StoreUnavailableError(`Failed to restore selection token: ${String(err)}`, err);
    }
  }

  async invalidate(token: string): Promise<void> {
    if (!isUuid(token)) return;
    try {
      await this.pool.query(DELETE_TOKEN_SQL, [token]);
    } catch (err) {
      throw new StoreUnavailableError(`Failed to invalidate selection token: ${String(err)}`, err);
    }
  }

  async purgeExpired(graceMs: number = DEFAULT_PURGE_GRACE_MS): Promise<number> {
    const cutoff = new Date(this.clock.now().getTime() - graceMs);
    let result: pg.QueryResult;
    try {
      result = await this.pool.query(PURGE_TOKENS_SQL, [cutoff]);
    } catch (err) {
      throw new StoreUnavailableError(`Failed to purge expired selection tokens: ${String(err)}`, err);
    }
    return result.rowCount ?? 0;
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
