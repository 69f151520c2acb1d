import type { EntityDescriptor, Normalized } from "./types.js";

/**
 * Source of canonical records for one entity type.
 *
 * The iteration is finite. It throws DirectoryUnavailableError when any page
 * fails, and a partially consumed iteration must not be treated as complete.
 */
export interface DirectoryReader {
  fetchAll<T>(descriptor: EntityDescriptor<T>): AsyncIterable<Normalized<T>>;
}
