/**
 * Tool Capability Type Definitions
 *
 * Every built-in tool is one variant of the same capability interface:
 * a name plus an `invoke` body. Descriptors (what the model sees and what
 * policy reads) live separately in definitions.ts.
 */

import type { CoreError } from "../protocol/errors.js";
import type { SafetyClass, Workspace } from "../protocol/types.js";

// ===========================================================================
// Outcomes
// ===========================================================================

export type ToolOutcome =
  | { ok: true; output: string }
  | { ok: false; error: CoreError };

// ===========================================================================
// Invocation Context
// ===========================================================================

/**
 * Context provided to a capability for one invocation.
 */
export interface ToolInvocationContext {
  workspace: Workspace;
  /** Aborted on timeout or turn cancellation */
  signal: AbortSignal;
  /** Canonical, guard-approved paths keyed by argument name */
  resolvedPaths: ReadonlyMap<string, string>;
}

// ===========================================================================
// Capability
// ===========================================================================

export interface ToolCapability {
  readonly name: string;
  invoke(args: Record<string, unknown>, ctx: ToolInvocationContext): Promise<ToolOutcome>;
  /**
   * Per-call safety override. Returns the effective class for these
   * arguments, or undefined to use the descriptor's class.
   */
  classify?(args: Record<string, unknown>, safeCommands: readonly string[]): SafetyClass | undefined;
}
