/**
 * Structured error types.
 *
 * Dispatch reports expected failures as result envelopes carrying one of
 * these kinds; CoreError instances are thrown only across store, config and
 * checkpoint boundaries.
 */

export const CORE_ERROR_KINDS = [
  "not_found",
  "invalid_arguments",
  "mode_violation",
  "access_denied",
  "permission_denied",
  "exploration_required",
  "tool_execution_error",
  "tool_timeout",
  "checkpoint_failure",
  "session_not_found",
  "cancelled",
  "nothing_to_undo",
  "nothing_to_redo",
  "config_error",
] as const;

export type CoreErrorKind = (typeof CORE_ERROR_KINDS)[number];

const FATAL_KINDS: ReadonlySet<CoreErrorKind> = new Set(["config_error"]);

export class CoreError extends Error {
  readonly kind: CoreErrorKind;
  readonly recoverable: boolean;
  readonly details?: Record<string, unknown>;

  constructor(
    kind: CoreErrorKind,
    message: string,
    opts: { details?: Record<string, unknown>; cause?: unknown } = {}
  ) {
    super(message, opts.cause !== undefined ? { cause: opts.cause } : undefined);
    this.name = "CoreError";
    this.kind = kind;
    this.recoverable = !FATAL_KINDS.has(kind);
    if (opts.details) this.details = opts.details;
  }
}

// ===========================================================================
// Factories
// ===========================================================================

export function toolNotFound(name: string): CoreError {
  return new CoreError("not_found", `Unknown tool: ${name}`, { details: { tool: name } });
}

export function invalidArguments(tool: string, message: string): CoreError {
  return new CoreError("invalid_arguments", `Invalid arguments for ${tool}: ${message}`, {
    details: { tool },
  });
}

export function modeViolation(tool: string, mode: string, allowed: readonly string[]): CoreError {
  return new CoreError(
    "mode_violation",
    `Tool '${tool}' is not available in ${mode.toUpperCase()} mode`,
    { details: { tool, mode, allowedModes: [...allowed] } }
  );
}

export function accessDenied(path: string, root: string, reason: string): CoreError {
  return new CoreError("access_denied", `Access denied: '${path}' ${reason}`, {
    details: { path, root, reason },
  });
}

export function permissionDenied(tool: string, reason: string): CoreError {
  return new CoreError("permission_denied", `Permission denied for '${tool}': ${reason}`, {
    details: { tool },
  });
}

export function explorationRequired(tool: string, path: string, action: string): CoreError {
  return new CoreError("exploration_required", `Exploration required before ${tool} on '${path}': ${action}`, {
    details: { tool, path },
  });
}

export function toolExecutionError(tool: string, message: string, cause?: unknown): CoreError {
  return new CoreError("tool_execution_error", message, { details: { tool }, cause });
}

export function toolTimeout(tool: string, timeoutMs: number): CoreError {
  return new CoreError("tool_timeout", `Tool '${tool}' timed out after ${timeoutMs}ms`, {
    details: { tool, timeoutMs },
  });
}

export function checkpointFailure(reason: string, cause?: unknown): CoreError {
  return new CoreError("checkpoint_failure", `Checkpoint failed: ${reason}`, { cause });
}

export function sessionNotFound(id: string): CoreError {
  return new CoreError("session_not_found", `Session not found: ${id}`, { details: { id } });
}

export function cancelled(tool: string): CoreError {
  return new CoreError("cancelled", `Turn cancelled before '${tool}' ran`, { details: { tool } });
}

// ===========================================================================
// Helpers
// ===========================================================================

export function isCoreError(e: unknown): e is CoreError {
  return e instanceof CoreError;
}

/**
 * Normalize an unknown thrown value into an Error.
 */
export function asError(e: unknown): Error {
  if (e instanceof Error) return e;
  if (typeof e === "string") return new Error(e);
  if (e === null || e === undefined) return new Error("Unknown error");
  return new Error(String(e));
}

export function errorLogFields(e: unknown): Record<string, unknown> {
  const err = asError(e);
  const fields: Record<string, unknown> = { message: err.message };
  if (isCoreError(err)) {
    fields.kind = err.kind;
    fields.recoverable = err.recoverable;
    if (err.details) fields.details = err.details;
  }
  return fields;
}
