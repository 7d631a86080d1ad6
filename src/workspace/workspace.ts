import { existsSync } from "node:fs";
import { mkdir, readFile, realpath, stat, writeFile } from "node:fs/promises";
import { dirname, join, resolve } from "node:path";
import { z } from "zod";
import { CONFIG_DIR_NAME } from "../config/core-config.js";
import { CoreError } from "../protocol/errors.js";
import type { Workspace } from "../protocol/types.js";
import { createLogger } from "../utils/logger.js";

const logger = createLogger("workspace");

export const WORKSPACE_FILE_NAME = "workspace.json";

const WorkspaceFileSchema = z.object({
  version: z.literal(1),
  createdAt: z.string(),
});

export type WorkspaceFile = z.infer<typeof WorkspaceFileSchema>;

function freeze(root: string): Workspace {
  return Object.freeze({ root, configDir: join(root, CONFIG_DIR_NAME) });
}

/**
 * Open a directory as a workspace without writing anything.
 * The root is canonicalized once; the returned object is frozen.
 */
export async function openWorkspace(dir: string): Promise<Workspace> {
  const absolute = resolve(dir);
  let root: string;
  try {
    root = await realpath(absolute);
  } catch (error) {
    throw new CoreError("not_found", `Workspace directory not found: ${absolute}`, {
      details: { path: absolute },
      cause: error,
    });
  }
  const info = await stat(root);
  if (!info.isDirectory()) {
    throw new CoreError("invalid_arguments", `Workspace root is not a directory: ${root}`, {
      details: { path: root },
    });
  }
  return freeze(root);
}

/**
 * Initialize a workspace: create `.helmsman/` and its marker file.
 * Re-initializing keeps the original marker.
 */
export async function initWorkspace(dir: string): Promise<Workspace> {
  await mkdir(resolve(dir), { recursive: true });
  const workspace = await openWorkspace(dir);
  await mkdir(workspace.configDir, { recursive: true });

  const markerPath = join(workspace.configDir, WORKSPACE_FILE_NAME);
  if (!existsSync(markerPath)) {
    const marker: WorkspaceFile = { version: 1, createdAt: new Date().toISOString() };
    await writeFile(markerPath, JSON.stringify(marker, null, 2) + "\n", "utf-8");
    logger.info({ root: workspace.root }, "Workspace initialized");
  } else {
    logger.debug({ root: workspace.root }, "Workspace already initialized");
  }
  return workspace;
}

/**
 * Read the workspace marker, or null for an uninitialized workspace.
 */
export async function readWorkspaceFile(workspace: Workspace): Promise<WorkspaceFile | null> {
  const markerPath = join(workspace.configDir, WORKSPACE_FILE_NAME);
  if (!existsSync(markerPath)) return null;
  const parsed = WorkspaceFileSchema.safeParse(JSON.parse(await readFile(markerPath, "utf-8")));
  if (!parsed.success) {
    throw new CoreError("config_error", `Invalid workspace file: ${markerPath}`, {
      details: { path: markerPath, issues: parsed.error.issues },
    });
  }
  return parsed.data;
}

/**
 * Walk up from `start` to the nearest initialized workspace.
 */
export async function findWorkspace(start: string): Promise<Workspace | null> {
  let current = await realpath(resolve(start));
  for (;;) {
    if (existsSync(join(current, CONFIG_DIR_NAME, WORKSPACE_FILE_NAME))) {
      return freeze(current);
    }
    const parent = dirname(current);
    if (parent === current) return null;
    current = parent;
  }
}
