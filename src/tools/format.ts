/**
 * Wire shapes for tool results
 *
 * Results go out as snake_case JSON text; bigint values are sent as strings.
 */

import type { QueryResult, UnsafeResult, WriteResult } from '../types.js';

export interface WireWriteResult {
  rows_affected: number;
  last_insert_id?: number;
}

export interface WireUnsafeResult {
  query_result?: QueryResult;
  write_result?: WireWriteResult;
  warning: string;
  skipped_check: string;
}

export function toWireWriteResult(result: WriteResult): WireWriteResult {
  return result.lastInsertId === undefined
    ? { rows_affected: result.rowsAffected }
    : { rows_affected: result.rowsAffected, last_insert_id: result.lastInsertId };
}

export function toWireUnsafeResult(result: UnsafeResult): WireUnsafeResult {
  if (result.queryResult !== undefined) {
    return {
      query_result: result.queryResult,
      warning: result.warning,
      skipped_check: result.skippedCheck,
    };
  }

  return {
    write_result: toWireWriteResult(result.writeResult),
    warning: result.warning,
    skipped_check: result.skippedCheck,
  };
}

export function toJsonText(payload: unknown): string {
  return JSON.stringify(
    payload,
    (_key, value: unknown) => (typeof value === 'bigint' ? value.toString() : value),
    2
  );
}
