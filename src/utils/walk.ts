/**
 * Workspace tree walking shared by search and the snapshot backend.
 */

import { readdir } from "node:fs/promises";
import { join } from "node:path";
import { CONFIG_DIR_NAME } from "../config/core-config.js";

// Files/directories skipped during scanning
const IGNORE_PATTERNS = [
  /^\.git$/,
  /^node_modules$/,
  /^\.next$/,
  /^dist$/,
  /^build$/,
  /^coverage$/,
  /^\.cache$/,
  /^__pycache__$/,
  /\.pyc$/,
  /^\.DS_Store$/,
];

export function shouldIgnore(name: string): boolean {
  return name === CONFIG_DIR_NAME || IGNORE_PATTERNS.some((pattern) => pattern.test(name));
}

/**
 * Narrower skip list for snapshots: build output and caches are workspace
 * files like any other and must come back on undo.
 */
export function shouldIgnoreInSnapshot(name: string): boolean {
  return name === CONFIG_DIR_NAME || name === ".git" || name === "node_modules";
}

export interface WalkOptions {
  signal?: AbortSignal;
  ignore?: (name: string) => boolean;
}

/**
 * Yield every regular file under `dir` in a stable (sorted) order.
 * Symlinks are not followed.
 */
export async function* walkFiles(dir: string, options: WalkOptions = {}): AsyncGenerator<string> {
  const ignore = options.ignore ?? shouldIgnore;
  const entries = await readdir(dir, { withFileTypes: true });
  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  for (const entry of entries) {
    if (options.signal?.aborted) return;
    if (ignore(entry.name)) continue;
    const fullPath = join(dir, entry.name);
    if (entry.isDirectory()) {
      yield* walkFiles(fullPath, options);
    } else if (entry.isFile()) {
      yield fullPath;
    }
  }
}
