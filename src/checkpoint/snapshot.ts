/**
 * File-snapshot version control for workspaces without git.
 *
 * Each snapshot is a manifest of workspace-relative path → sha256 of the
 * body; bodies live once in a content-addressed MemoryStorage. Snapshots
 * last as long as the process, so refs from a resumed session are gone.
 */

import { mkdir, readFile, rm, writeFile } from "node:fs/promises";
import { dirname, join, relative } from "node:path";
import { checkpointFailure } from "../protocol/errors.js";
import type { CheckpointRef, Workspace } from "../protocol/types.js";
import { MemoryStorage } from "../storage/memory.js";
import { manifestHash, sha256 } from "../utils/hash.js";
import { createLogger } from "../utils/logger.js";
import { shouldIgnoreInSnapshot, walkFiles } from "../utils/walk.js";
import type { VersionControl } from "./types.js";

const logger = createLogger("checkpoint:snapshot");

interface SnapshotEntry {
  reason: string;
  manifest: Map<string, string>;
}

export class SnapshotVersionControl implements VersionControl {
  readonly kind = "snapshot";
  private storage = new MemoryStorage();
  private snapshots = new Map<CheckpointRef, SnapshotEntry>();
  private seq = 0;

  constructor(private readonly workspace: Workspace) {}

  private async scan(): Promise<Map<string, string>> {
    const manifest = new Map<string, string>();
    for await (const file of walkFiles(this.workspace.root, { ignore: shouldIgnoreInSnapshot })) {
      const body = await readFile(file);
      const hash = sha256(body);
      await this.storage.store(hash, body);
      manifest.set(relative(this.workspace.root, file), hash);
    }
    return manifest;
  }

  async snapshot(reason: string): Promise<CheckpointRef> {
    const manifest = await this.scan();
    // Sequence prefix keeps refs unique when the tree has not changed
    const ref = `snap-${++this.seq}-${manifestHash(manifest).slice(0, 12)}`;
    this.snapshots.set(ref, { reason, manifest });
    logger.info({ ref, files: manifest.size, reason }, "Snapshot taken");
    return ref;
  }

  async has(ref: CheckpointRef): Promise<boolean> {
    return this.snapshots.has(ref);
  }

  async restore(ref: CheckpointRef): Promise<void> {
    const entry = this.snapshots.get(ref);
    if (!entry) {
      throw checkpointFailure(`unknown snapshot ${ref}`);
    }

    const current = new Map<string, string>();
    for await (const file of walkFiles(this.workspace.root, { ignore: shouldIgnoreInSnapshot })) {
      current.set(relative(this.workspace.root, file), sha256(await readFile(file)));
    }

    let written = 0;
    for (const [path, hash] of entry.manifest) {
      if (current.get(path) === hash) continue;
      const body = await this.storage.retrieve(hash);
      if (!body) {
        throw checkpointFailure(`content ${hash} missing for ${path}`);
      }
      const target = join(this.workspace.root, path);
      await mkdir(dirname(target), { recursive: true });
      await writeFile(target, body);
      written++;
    }

    let removed = 0;
    for (const path of current.keys()) {
      if (!entry.manifest.has(path)) {
        await rm(join(this.workspace.root, path), { force: true });
        removed++;
      }
    }

    logger.info({ ref, written, removed }, "Snapshot restored");
  }
}
