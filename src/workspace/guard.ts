/**
 * Workspace Guard
 *
 * Decides whether a path argument lands inside the authorized workspace.
 * Containment is checked on canonical paths by segment comparison, so a
 * sibling such as `/ws/proj2` never passes for root `/ws/proj`.
 */

import type { Stats } from "node:fs";
import { lstat, readlink, realpath } from "node:fs/promises";
import { basename, dirname, isAbsolute, join, relative, resolve, sep } from "node:path";
import { accessDenied, type CoreError } from "../protocol/errors.js";
import type { Workspace } from "../protocol/types.js";

export type AuthorizeResult =
  | { ok: true; path: string }
  | { ok: false; error: CoreError };

export interface AuthorizeOptions {
  mustExist: boolean;
}

/**
 * Pure containment check on already-canonical paths.
 */
export function isWithinRoot(target: string, root: string): boolean {
  const rel = relative(root, target);
  if (rel === "") return true;
  if (isAbsolute(rel)) return false;
  return rel !== ".." && !rel.startsWith(`..${sep}`);
}

/**
 * Workspace-relative form of a path for display. Paths outside the root are
 * returned unchanged.
 */
export function relativeToRoot(path: string, workspace: Workspace): string {
  const absolute = resolve(workspace.root, path);
  if (!isWithinRoot(absolute, workspace.root)) return path;
  return relative(workspace.root, absolute) || ".";
}

function errorCode(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error) {
    const code = error.code;
    return typeof code === "string" ? code : undefined;
  }
  return undefined;
}

// Matches the kernel's limit on chained symlinks
const MAX_LINK_HOPS = 40;

class LinkLoopError extends Error {
  readonly code = "ELOOP";

  constructor(path: string) {
    super(`Too many symbolic links while resolving ${path}`);
    this.name = "LinkLoopError";
  }
}

/**
 * Canonicalize a path that may not exist yet: realpath the deepest existing
 * ancestor and re-append the missing tail. A dangling symlink on the way is
 * followed to where it points, so writing through it cannot leave the root
 * unnoticed.
 */
async function canonicalize(absolute: string, mustExist: boolean, hops = 0): Promise<string> {
  try {
    return await realpath(absolute);
  } catch (error) {
    if (errorCode(error) !== "ENOENT" || mustExist) throw error;
  }

  const tail: string[] = [];
  let current = absolute;
  for (;;) {
    let entry: Stats | null = null;
    try {
      entry = await lstat(current);
    } catch (error) {
      if (errorCode(error) !== "ENOENT") throw error;
    }

    if (entry?.isSymbolicLink()) {
      if (hops >= MAX_LINK_HOPS) throw new LinkLoopError(absolute);
      const target = resolve(dirname(current), await readlink(current));
      return canonicalize(join(target, ...tail), false, hops + 1);
    }
    if (entry) {
      return join(await realpath(current), ...tail);
    }

    const parent = dirname(current);
    if (parent === current) {
      // Reached the filesystem root without finding anything
      return absolute;
    }
    tail.unshift(basename(current));
    current = parent;
  }
}

/**
 * Resolve and authorize a path argument against the workspace root.
 */
export async function authorize(
  path: unknown,
  workspace: Workspace,
  options: AuthorizeOptions
): Promise<AuthorizeResult> {
  if (typeof path !== "string" || path.trim() === "") {
    return {
      ok: false,
      error: accessDenied(String(path ?? ""), workspace.root, "is empty"),
    };
  }

  const absolute = resolve(workspace.root, path);

  let canonical: string;
  try {
    canonical = await canonicalize(absolute, options.mustExist);
  } catch (error) {
    const code = errorCode(error);
    const reason = code === "ENOENT" ? "does not exist" : `cannot be resolved (${code ?? "unknown error"})`;
    return { ok: false, error: accessDenied(path, workspace.root, reason) };
  }

  if (!isWithinRoot(canonical, workspace.root)) {
    return {
      ok: false,
      error: accessDenied(path, workspace.root, `is outside the workspace root ${workspace.root}`),
    };
  }

  return { ok: true, path: canonical };
}
