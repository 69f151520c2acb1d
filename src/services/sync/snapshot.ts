import { syncLogger } from "../../logger.js";
import { SnapshotLoadError, describeError } from "./errors.js";

import type { MirrorStore } from "./store.js";
import type { EntityDescriptor, LocalRecord } from "./types.js";

export interface LocalSnapshot<T> {
  records: Map<string, LocalRecord<T>>;
  /** True when the read failed and the snapshot is empty in its place */
  degraded: boolean;
}

/**
 * Load the whole mirror of one entity type, keyed by id.
 *
 * A storage failure does not abort the stage: the snapshot comes back empty
 * and marked degraded, so every remote record is upserted again and reported
 * as INSERTED.
 */
export async function loadSnapshot<T>(
  descriptor: EntityDescriptor<T>,
  store: MirrorStore
): Promise<LocalSnapshot<T>> {
  let rows: LocalRecord<T>[];
  try {
    rows = await descriptor.load(store);
  } catch (cause) {
    const error = new SnapshotLoadError(descriptor.entityType, cause);
    syncLogger.warn(
      {
        stage: descriptor.stage,
        error: describeError(cause),
      },
      `${error.message}; continuing with an empty snapshot`
    );
    return { records: new Map(), degraded: true };
  }

  const records = new Map<string, LocalRecord<T>>();
  for (const row of rows) {
    records.set(descriptor.keyOf(row), row);
  }

  syncLogger.debug(
    { stage: descriptor.stage, count: records.size },
    "Loaded local snapshot"
  );

  return { records, degraded: false };
}
