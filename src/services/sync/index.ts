// Sync Services - Re-exports
export { SyncOrchestrator, sumStats } from "./orchestrator.js";
export type { OrchestratorDeps } from "./orchestrator.js";
export { SyncScheduler } from "./scheduler.js";
export type { SchedulerStatus, SyncRunner } from "./scheduler.js";
export { ChangeNotifier } from "./notifier.js";
export type { SyncNotification } from "./notifier.js";
export { MembershipEditor } from "./membership-editor.js";
export { diff, changedFields, sameValue } from "./diff.js";
export { apply, summarize } from "./apply.js";
export { loadSnapshot } from "./snapshot.js";
export {
  DirectoryUnavailableError,
  SnapshotLoadError,
  ApplyFailureError,
} from "./errors.js";
export { userDescriptor, normalizeUser } from "./canonical/users.js";
export { groupDescriptor, normalizeGroup } from "./canonical/groups.js";
export {
  membershipsByUserDescriptor,
  membershipsByGroupDescriptor,
  edgeKey,
} from "./canonical/memberships.js";
export * from "./types.js";
export type { MirrorStore, MirrorTransaction, EdgeOwner } from "./store.js";
export type { DirectoryReader } from "./reader.js";
