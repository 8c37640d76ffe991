import type { MatchedRecord } from '../types.js';

export type RecordRow = {
  record_id: string;
  record_position: string; // pg returns BIGINT as string by default
};

export function mapRecordRow(row: RecordRow): MatchedRecord {
  return {
    id: String(row.record_id),
    position: BigInt(row.record_position),
  };
}
