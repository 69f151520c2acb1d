/**
 * Diff Engine
 *
 * Classifies every remote and local key of one entity type as new, changed,
 * unchanged or orphaned. Only the descriptor's comparable fields decide
 * whether a record changed; directory timestamps never do.
 */

import type { LocalRecord } from "./types.js";

export interface FieldChange<T> {
  id: string;
  record: T;
  changedFields: (keyof T & string)[];
}

export interface DiffResult<T> {
  toInsert: T[];
  toUpdate: FieldChange<T>[];
  toDelete: LocalRecord<T>[];
  unchanged: number;
}

export interface DiffOptions<T> {
  comparableFields: readonly (keyof T & string)[];
  /**
   * Local records this returns true for are never deleted, even when absent
   * from the remote set (their directory record was fetched but rejected).
   */
  isProtected?: (local: LocalRecord<T>) => boolean;
}

/**
 * Null-safe equality: null and undefined are equal to each other and unequal
 * to every other value.
 */
export function sameValue(a: unknown, b: unknown): boolean {
  const aMissing = a === null || a === undefined;
  const bMissing = b === null || b === undefined;
  if (aMissing || bMissing) return aMissing && bMissing;
  return a === b;
}

/**
 * Names of the comparable fields whose values differ, in field order
 */
export function changedFields<T>(
  remote: T,
  local: T,
  fields: readonly (keyof T & string)[]
): (keyof T & string)[] {
  return fields.filter((field) => !sameValue(remote[field], local[field]));
}

export function diff<T>(
  canonical: ReadonlyMap<string, T>,
  local: ReadonlyMap<string, LocalRecord<T>>,
  options: DiffOptions<T>
): DiffResult<T> {
  const result: DiffResult<T> = {
    toInsert: [],
    toUpdate: [],
    toDelete: [],
    unchanged: 0,
  };

  for (const [id, record] of canonical) {
    const existing = local.get(id);
    if (existing === undefined) {
      result.toInsert.push(record);
      continue;
    }

    const fields = changedFields<T>(record, existing, options.comparableFields);
    if (fields.length > 0) {
      result.toUpdate.push({ id, record, changedFields: fields });
    } else {
      result.unchanged++;
    }
  }

  for (const [id, record] of local) {
    if (canonical.has(id)) continue;
    if (options.isProtected?.(record) === true) continue;
    result.toDelete.push(record);
  }

  return result;
}
