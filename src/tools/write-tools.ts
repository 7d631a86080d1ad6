/**
 * Mutating file tools: write_file, edit_file.
 */

import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { z } from "zod";
import { toolExecutionError } from "../protocol/errors.js";
import { parseArgs, resolvedPath } from "./args.js";
import { TOOL_NAMES } from "./definitions.js";
import type { ToolCapability, ToolOutcome } from "./types.js";

// ===========================================================================
// write_file
// ===========================================================================

const WriteFileArgs = z.object({
  path: z.string().min(1),
  content: z.string(),
});

export const writeFileTool: ToolCapability = {
  name: TOOL_NAMES.WRITE_FILE,

  async invoke(args, ctx): Promise<ToolOutcome> {
    const parsed = parseArgs(TOOL_NAMES.WRITE_FILE, WriteFileArgs, args);
    if (!parsed.ok) return parsed;

    const target = resolvedPath(ctx.resolvedPaths, "path", ctx.workspace.root);
    try {
      await mkdir(dirname(target), { recursive: true });
      await writeFile(target, parsed.data.content, { encoding: "utf-8", signal: ctx.signal });
      const bytes = Buffer.byteLength(parsed.data.content, "utf-8");
      return { ok: true, output: `Wrote ${bytes} bytes to ${parsed.data.path}` };
    } catch (error) {
      return { ok: false, error: toolExecutionError(TOOL_NAMES.WRITE_FILE, `Failed to write ${parsed.data.path}`, error) };
    }
  },
};

// ===========================================================================
// edit_file
// ===========================================================================

const EditFileArgs = z.object({
  path: z.string().min(1),
  old_text: z.string().min(1),
  new_text: z.string(),
});

function countOccurrences(haystack: string, needle: string): number {
  let count = 0;
  let index = haystack.indexOf(needle);
  while (index !== -1) {
    count++;
    index = haystack.indexOf(needle, index + needle.length);
  }
  return count;
}

export const editFileTool: ToolCapability = {
  name: TOOL_NAMES.EDIT_FILE,

  async invoke(args, ctx): Promise<ToolOutcome> {
    const parsed = parseArgs(TOOL_NAMES.EDIT_FILE, EditFileArgs, args);
    if (!parsed.ok) return parsed;

    const { path, old_text, new_text } = parsed.data;
    const target = resolvedPath(ctx.resolvedPaths, "path", ctx.workspace.root);

    let content: string;
    try {
      content = await readFile(target, "utf-8");
    } catch (error) {
      return { ok: false, error: toolExecutionError(TOOL_NAMES.EDIT_FILE, `Failed to read ${path}`, error) };
    }

    const occurrences = countOccurrences(content, old_text);
    if (occurrences === 0) {
      return { ok: false, error: toolExecutionError(TOOL_NAMES.EDIT_FILE, `old_text not found in ${path}`) };
    }
    if (occurrences > 1) {
      return {
        ok: false,
        error: toolExecutionError(
          TOOL_NAMES.EDIT_FILE,
          `old_text occurs ${occurrences} times in ${path}; include more context to make it unique`
        ),
      };
    }

    const index = content.indexOf(old_text);
    const updated = content.slice(0, index) + new_text + content.slice(index + old_text.length);
    try {
      await writeFile(target, updated, { encoding: "utf-8", signal: ctx.signal });
    } catch (error) {
      return { ok: false, error: toolExecutionError(TOOL_NAMES.EDIT_FILE, `Failed to write ${path}`, error) };
    }
    return { ok: true, output: `Edited ${path}` };
  },
};
