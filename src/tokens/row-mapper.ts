import { parseFilterDescriptor } from '../filter/parse.js';
import { parseSelection } from '../selection/serialize.js';
import type { StoredSelection } from '../types.js';

export type TokenRow = {
  token: string;
  filter: unknown;                   // pg auto-parses JSONB
  selection: unknown;
  snapshot_version: string | null;   // pg returns BIGINT as string by default
  single_use: boolean;
  created_at: Date;                  // pg auto-parses TIMESTAMPTZ
  expires_at: Date;
};

export function mapTokenRow(row: TokenRow): StoredSelection {
  return {
    token: row.token,
    filter: parseFilterDescriptor(row.filter),
    selection: parseSelection(row.selection),
    snapshot: row.snapshot_version === null
      ? { kind: 'live' }
      : { kind: 'pinned', version: BigInt(row.snapshot_version) },
    singleUse: row.single_use,
    createdAt: row.created_at,
    expiresAt: row.expires_at,
  };
}
