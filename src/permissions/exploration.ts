/**
 * Exploration Tracker
 *
 * Read-before-write discipline for one session. Successful read tools mark
 * files and directories as explored. Overwriting or editing an existing file
 * needs that file read first; creating a file needs its directory, or an
 * ancestor, listed or searched. Files the session wrote itself count as read.
 */

import { stat } from "node:fs/promises";
import { dirname } from "node:path";
import type { ToolDescriptor } from "../protocol/types.js";

export interface ExplorationGap {
  path: string;
  action: string;
}

async function exists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch {
    return false;
  }
}

export class ExplorationTracker {
  private files = new Set<string>();
  private directories = new Set<string>();

  /**
   * Record a successful call against its canonical target paths.
   */
  record(descriptor: ToolDescriptor, paths: readonly string[]): void {
    if (descriptor.mutating || descriptor.explores === "file") {
      for (const path of paths) {
        this.files.add(path);
        this.directories.add(dirname(path));
      }
      return;
    }
    if (descriptor.explores === "directory") {
      for (const path of paths) {
        this.directories.add(path);
      }
    }
  }

  hasRead(path: string): boolean {
    return this.files.has(path);
  }

  hasExplored(directory: string): boolean {
    let current = directory;
    for (;;) {
      if (this.directories.has(current)) return true;
      const parent = dirname(current);
      if (parent === current) return false;
      current = parent;
    }
  }

  /**
   * First target a mutating call may not touch yet, or null.
   */
  async check(descriptor: ToolDescriptor, paths: readonly string[]): Promise<ExplorationGap | null> {
    if (!descriptor.mutating) return null;
    for (const path of paths) {
      if (await exists(path)) {
        if (!this.files.has(path)) return { path, action: "read the file first" };
      } else if (!this.hasExplored(dirname(path))) {
        return { path, action: "list or search its directory first" };
      }
    }
    return null;
  }

  reset(): void {
    this.files.clear();
    this.directories.clear();
  }
}
