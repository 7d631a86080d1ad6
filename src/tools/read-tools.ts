/**
 * Read-only file tools: read_file, list_dir, search_files.
 *
 * Paths arrive already authorized by the Workspace Guard through
 * `ctx.resolvedPaths`; the bodies never resolve raw arguments themselves.
 */

import { readdir, readFile, stat } from "node:fs/promises";
import { relative } from "node:path";
import { z } from "zod";
import { toolExecutionError } from "../protocol/errors.js";
import { parseArgs, resolvedPath } from "./args.js";
import { TOOL_NAMES } from "./definitions.js";
import { walkFiles } from "../utils/walk.js";
import type { ToolCapability, ToolInvocationContext, ToolOutcome } from "./types.js";

// ===========================================================================
// read_file
// ===========================================================================

const DEFAULT_READ_LIMIT = 2000;

const ReadFileArgs = z.object({
  path: z.string().min(1),
  offset: z.number().int().positive().optional(),
  limit: z.number().int().positive().optional(),
});

export const readFileTool: ToolCapability = {
  name: TOOL_NAMES.READ_FILE,

  async invoke(args, ctx): Promise<ToolOutcome> {
    const parsed = parseArgs(TOOL_NAMES.READ_FILE, ReadFileArgs, args);
    if (!parsed.ok) return parsed;

    const target = resolvedPath(ctx.resolvedPaths, "path", ctx.workspace.root);
    try {
      const info = await stat(target);
      if (!info.isFile()) {
        return { ok: false, error: toolExecutionError(TOOL_NAMES.READ_FILE, `Not a file: ${parsed.data.path}`) };
      }
      const content = await readFile(target, { encoding: "utf-8", signal: ctx.signal });
      const lines = content.split("\n");
      const start = (parsed.data.offset ?? 1) - 1;
      const limit = parsed.data.limit ?? DEFAULT_READ_LIMIT;
      const window = lines.slice(start, start + limit);
      let output = window.join("\n");
      if (start + limit < lines.length) {
        output += `\n... (${lines.length - start - limit} more lines)`;
      }
      return { ok: true, output };
    } catch (error) {
      return { ok: false, error: toolExecutionError(TOOL_NAMES.READ_FILE, `Failed to read ${parsed.data.path}`, error) };
    }
  },
};

// ===========================================================================
// list_dir
// ===========================================================================

const ListDirArgs = z.object({
  path: z.string().min(1).optional(),
});

export const listDirTool: ToolCapability = {
  name: TOOL_NAMES.LIST_DIR,

  async invoke(args, ctx): Promise<ToolOutcome> {
    const parsed = parseArgs(TOOL_NAMES.LIST_DIR, ListDirArgs, args);
    if (!parsed.ok) return parsed;

    const target = resolvedPath(ctx.resolvedPaths, "path", ctx.workspace.root);
    try {
      const entries = await readdir(target, { withFileTypes: true });
      const names = entries
        .map((entry) => (entry.isDirectory() ? `${entry.name}/` : entry.name))
        .sort();
      return { ok: true, output: names.join("\n") };
    } catch (error) {
      return { ok: false, error: toolExecutionError(TOOL_NAMES.LIST_DIR, `Failed to list ${parsed.data.path ?? "."}`, error) };
    }
  },
};

// ===========================================================================
// search_files
// ===========================================================================

const DEFAULT_MAX_RESULTS = 100;

const SearchFilesArgs = z.object({
  pattern: z.string().min(1),
  path: z.string().min(1).optional(),
  max_results: z.number().int().positive().optional(),
});

async function searchFiles(
  regex: RegExp,
  root: string,
  maxResults: number,
  ctx: ToolInvocationContext
): Promise<string[]> {
  const matches: string[] = [];
  for await (const file of walkFiles(root, { signal: ctx.signal })) {
    let content: string;
    try {
      content = await readFile(file, "utf-8");
    } catch {
      continue; // unreadable files are skipped
    }
    const lines = content.split("\n");
    for (let i = 0; i < lines.length; i++) {
      if (regex.test(lines[i] ?? "")) {
        matches.push(`${relative(ctx.workspace.root, file)}:${i + 1}: ${(lines[i] ?? "").trim()}`);
        if (matches.length >= maxResults) return matches;
      }
    }
  }
  return matches;
}

export const searchFilesTool: ToolCapability = {
  name: TOOL_NAMES.SEARCH_FILES,

  async invoke(args, ctx): Promise<ToolOutcome> {
    const parsed = parseArgs(TOOL_NAMES.SEARCH_FILES, SearchFilesArgs, args);
    if (!parsed.ok) return parsed;

    let regex: RegExp;
    try {
      regex = new RegExp(parsed.data.pattern);
    } catch (error) {
      return { ok: false, error: toolExecutionError(TOOL_NAMES.SEARCH_FILES, `Invalid pattern: ${parsed.data.pattern}`, error) };
    }

    const root = resolvedPath(ctx.resolvedPaths, "path", ctx.workspace.root);
    try {
      const matches = await searchFiles(regex, root, parsed.data.max_results ?? DEFAULT_MAX_RESULTS, ctx);
      return { ok: true, output: matches.length > 0 ? matches.join("\n") : "No matches found" };
    } catch (error) {
      return { ok: false, error: toolExecutionError(TOOL_NAMES.SEARCH_FILES, "Search failed", error) };
    }
  },
};
