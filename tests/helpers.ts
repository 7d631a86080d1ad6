import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { VersionControl } from "../src/checkpoint/types.js";
import { mergeCoreConfig, type CoreConfig, type PartialCoreConfig } from "../src/config/core-config.js";
import type { CheckpointRef, Workspace } from "../src/protocol/types.js";
import { openWorkspace } from "../src/workspace/workspace.js";

export interface TempWorkspace {
  workspace: Workspace;
  cleanup(): Promise<void>;
}

/**
 * Fresh directory under the OS temp dir, opened as a workspace.
 */
export async function createTempWorkspace(prefix: string = "helmsman-"): Promise<TempWorkspace> {
  const dir = await mkdtemp(join(tmpdir(), prefix));
  const workspace = await openWorkspace(dir);
  return {
    workspace,
    cleanup: () => rm(dir, { recursive: true, force: true }),
  };
}

/**
 * Defaults plus overrides, ignoring the user's global file and environment.
 * Read-before-write is off unless a test turns it on.
 */
export function testConfig(overrides: PartialCoreConfig = {}): CoreConfig {
  return mergeCoreConfig({ globalConfig: false, env: {}, overrides: { require_exploration: false, ...overrides } });
}

/**
 * Records snapshot reasons and restored refs. Refs are `ref-1`, `ref-2`, ...
 * and stay available unless listed in `lost`.
 */
export class FakeVersionControl implements VersionControl {
  readonly kind = "fake";
  readonly snapshots: string[] = [];
  readonly restores: CheckpointRef[] = [];
  readonly lost = new Set<CheckpointRef>();
  failNext = false;
  private seq = 0;

  async snapshot(reason: string): Promise<CheckpointRef> {
    if (this.failNext) {
      this.failNext = false;
      throw new Error("disk full");
    }
    this.snapshots.push(reason);
    return `ref-${++this.seq}`;
  }

  async restore(ref: CheckpointRef): Promise<void> {
    this.restores.push(ref);
  }

  async has(ref: CheckpointRef): Promise<boolean> {
    return !this.lost.has(ref);
  }
}
