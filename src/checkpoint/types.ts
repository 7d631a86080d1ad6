import type { CheckpointRef } from "../protocol/types.js";

/**
 * Version-control collaborator. `snapshot` captures the current workspace
 * state and returns a ref that `restore` can later bring back; `has` says
 * whether a ref from a persisted event log can still be restored.
 */
export interface VersionControl {
  readonly kind: string;
  snapshot(reason: string): Promise<CheckpointRef>;
  restore(ref: CheckpointRef): Promise<void>;
  has(ref: CheckpointRef): Promise<boolean>;
}
