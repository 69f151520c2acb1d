/**
 * Reconciliation error taxonomy
 */

export class DirectoryUnavailableError extends Error {
  code = "DIRECTORY_UNAVAILABLE" as const;
  status: number | null;

  constructor(message: string, options?: { status?: number; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "DirectoryUnavailableError";
    this.status = options?.status ?? null;
  }
}

export class SnapshotLoadError extends Error {
  code = "SNAPSHOT_LOAD_FAILED" as const;

  constructor(entityType: string, cause: unknown) {
    super(`Failed to load local ${entityType} snapshot`, { cause });
    this.name = "SnapshotLoadError";
  }
}

export class ApplyFailureError extends Error {
  code = "APPLY_FAILED" as const;
  entityId: string;

  constructor(entityId: string, cause: unknown) {
    super(`Failed to apply ${entityId}: ${describeError(cause)}`, { cause });
    this.name = "ApplyFailureError";
    this.entityId = entityId;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
