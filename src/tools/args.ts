import type { z } from "zod";
import { invalidArguments, type CoreError } from "../protocol/errors.js";

export type ParsedArgs<T> = { ok: true; data: T } | { ok: false; error: CoreError };

/**
 * Validate raw model-supplied arguments against a tool's zod schema.
 */
export function parseArgs<S extends z.ZodTypeAny>(
  tool: string,
  schema: S,
  args: unknown
): ParsedArgs<z.infer<S>> {
  const result = schema.safeParse(args ?? {});
  if (result.success) {
    return { ok: true, data: result.data };
  }
  const message = result.error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
  return { ok: false, error: invalidArguments(tool, message) };
}

/**
 * Look up a guard-approved path, falling back to the workspace root for
 * optional path arguments.
 */
export function resolvedPath(
  resolvedPaths: ReadonlyMap<string, string>,
  name: string,
  fallback: string
): string {
  return resolvedPaths.get(name) ?? fallback;
}

export const MAX_OUTPUT_LINES = 50;

export function truncateLines(text: string, maxLines: number = MAX_OUTPUT_LINES): string {
  const lines = text.split("\n");
  if (lines.length <= maxLines) return text;
  return `${lines.slice(0, maxLines).join("\n")}\n... (${lines.length - maxLines} more lines)`;
}
