/**
 * Tool Dispatcher
 *
 * The single path from a proposed call to an executed tool. Each step can
 * short-circuit with a result envelope:
 *
 *   lookup → mode eligibility → workspace guard → exploration →
 *   permission gate → checkpoint → bounded invocation → normalize and record
 *
 * Expected failures never throw; every proposed call ends with exactly one
 * envelope recorded on the session.
 */

import type { CheckpointManager } from "../checkpoint/manager.js";
import type { CoreConfig } from "../config/core-config.js";
import { isEligible } from "../mode/controller.js";
import type { ConfirmationProvider } from "../permissions/confirm.js";
import { effectiveSafety, type PermissionGate } from "../permissions/gate.js";
import {
  CoreError,
  asError,
  cancelled,
  explorationRequired,
  invalidArguments,
  isCoreError,
  modeViolation,
  permissionDenied,
  toolExecutionError,
  toolTimeout,
} from "../protocol/errors.js";
import type {
  ProposedToolCall,
  SafetyClass,
  ToolCallId,
  ToolDescriptor,
  ToolResultEnvelope,
  Workspace,
} from "../protocol/types.js";
import type { Session } from "../session/session.js";
import type { ToolRegistry } from "../tools/registry.js";
import type { ToolCapability, ToolOutcome } from "../tools/types.js";
import { createLogger } from "../utils/logger.js";
import { authorize, relativeToRoot } from "../workspace/guard.js";
import { BatchTracker, type BatchCompletionResult } from "./batch-tracker.js";

const logger = createLogger("dispatch");

// ===========================================================================
// Types
// ===========================================================================

export interface DispatchContext {
  session: Session;
  workspace: Workspace;
  checkpoints: CheckpointManager;
  /** Turn holding the proposed call records; omitted for direct calls */
  turnIndex?: number;
  signal?: AbortSignal;
}

export interface DispatcherDeps {
  registry: ToolRegistry;
  gate: PermissionGate;
  confirm: ConfirmationProvider;
  config: CoreConfig;
}

interface ExecutionResult {
  envelope: ToolResultEnvelope;
  rejectedByUser: boolean;
}

type InvokeResult =
  | { kind: "done"; outcome: ToolOutcome }
  | { kind: "threw"; error: unknown }
  | { kind: "aborted" };

type BoundedResult = Exclude<InvokeResult, { kind: "aborted" }> | { kind: "timeout" } | { kind: "cancelled" };

// ===========================================================================
// Tool Dispatcher
// ===========================================================================

export class ToolDispatcher {
  constructor(private readonly deps: DispatcherDeps) {}

  /**
   * Effective timeout for a tool: an explicit per-tool override, else the
   * larger of the global default and the tool's declared latency.
   */
  timeoutFor(descriptor: ToolDescriptor): number {
    const override = this.deps.config.tool_timeouts[descriptor.name];
    if (override !== undefined) return override;
    return Math.max(this.deps.config.tool_timeout_ms, descriptor.maxLatencyMs);
  }

  async dispatch(call: ProposedToolCall, ctx: DispatchContext): Promise<ToolResultEnvelope> {
    const { envelope } = await this.execute(call, ctx);
    this.record(call, envelope, ctx);
    return envelope;
  }

  /**
   * Run all calls proposed in one turn. Read-only batches run concurrently
   * up to `max_concurrent_reads`; anything else runs one call at a time.
   * Results are recorded in proposal order either way.
   */
  async dispatchBatch(calls: readonly ProposedToolCall[], ctx: DispatchContext): Promise<BatchCompletionResult> {
    const tracker = new BatchTracker(ctx.turnIndex ?? ctx.session.turns.length);
    for (const call of calls) {
      tracker.addCall(call.id, call.name);
    }

    const settle = (call: ProposedToolCall, result: ExecutionResult): void => {
      if (result.rejectedByUser) tracker.markRejected();
      this.record(call, result.envelope, ctx);
      tracker.resolve(call.id, result.envelope);
    };

    // A repeated id is answered without running; only the first call with an id executes
    const seen = new Set<ToolCallId>();
    const repeated = calls.map((call) => {
      if (seen.has(call.id)) return true;
      seen.add(call.id);
      return false;
    });
    const runnable = calls.filter((_, i) => !repeated[i]);
    const duplicateOf = (call: ProposedToolCall): ExecutionResult =>
      failure(call, invalidArguments(call.name, `duplicate tool call id '${call.id}'`), performance.now());

    if (runnable.length > 1 && runnable.every((call) => this.isReadOnlyCall(call))) {
      const results = await this.runConcurrently(runnable, ctx);
      let next = 0;
      calls.forEach((call, i) => {
        const result = repeated[i] ? duplicateOf(call) : results[next++];
        if (result) settle(call, result);
      });
    } else {
      for (const [i, call] of calls.entries()) {
        settle(call, repeated[i] ? duplicateOf(call) : await this.execute(call, ctx));
      }
    }

    return tracker.complete();
  }

  private async runConcurrently(
    calls: readonly ProposedToolCall[],
    ctx: DispatchContext
  ): Promise<ExecutionResult[]> {
    const results = new Array<ExecutionResult>(calls.length);
    let next = 0;
    const worker = async (): Promise<void> => {
      while (next < calls.length) {
        const i = next++;
        const call = calls[i];
        if (call) results[i] = await this.execute(call, ctx);
      }
    };
    const width = Math.min(this.deps.config.max_concurrent_reads, calls.length);
    await Promise.all(Array.from({ length: width }, () => worker()));
    return results;
  }

  private isReadOnlyCall(call: ProposedToolCall): boolean {
    const described = this.deps.registry.describe(call.name);
    if (!described.ok) return true; // fails at lookup without side effects
    const descriptor = described.descriptor;
    const safety = effectiveSafety(
      descriptor,
      this.deps.config.auto_execute_safe,
      this.deps.registry.capability(call.name)?.classify?.(call.args, this.deps.config.safe_commands)
    );
    return safety === "safe" && !isEffectivelyMutating(descriptor, safety);
  }

  // ===========================================================================
  // Pipeline
  // ===========================================================================

  private async execute(call: ProposedToolCall, ctx: DispatchContext): Promise<ExecutionResult> {
    const startTime = performance.now();
    const fail = (
      error: CoreError,
      extra: { rejectedByUser?: boolean; checkpointRef?: string } = {}
    ): ExecutionResult => failure(call, error, startTime, extra);

    if (ctx.signal?.aborted) {
      return fail(cancelled(call.name));
    }

    // 1. Lookup
    const described = this.deps.registry.describe(call.name);
    if (!described.ok) return fail(described.error);
    const descriptor = described.descriptor;
    const capability = this.deps.registry.capability(call.name);
    if (!capability) return fail(toolExecutionError(call.name, `No capability for tool '${call.name}'`));

    // 2. Mode eligibility
    const mode = ctx.session.currentMode();
    if (!isEligible(descriptor, mode)) {
      return fail(modeViolation(call.name, mode, descriptor.modes));
    }

    // 3. Workspace guard
    const resolvedPaths = new Map<string, string>();
    const targets: string[] = [];
    for (const arg of descriptor.pathArgs) {
      const value = call.args[arg.name];
      if (value === undefined || value === null) {
        if (arg.optional) {
          targets.push(ctx.workspace.root);
          continue;
        }
        return fail(invalidArguments(call.name, `missing path argument '${arg.name}'`));
      }
      if (typeof value !== "string") {
        return fail(invalidArguments(call.name, `path argument '${arg.name}' must be a string`));
      }
      const verdict = await authorize(value, ctx.workspace, { mustExist: arg.mustExist });
      if (!verdict.ok) return fail(verdict.error);
      resolvedPaths.set(arg.name, verdict.path);
      targets.push(verdict.path);
    }

    // 4. Exploration
    if (this.deps.config.require_exploration) {
      const gap = await ctx.session.exploration.check(descriptor, targets);
      if (gap) {
        return fail(explorationRequired(call.name, relativeToRoot(gap.path, ctx.workspace), gap.action));
      }
    }

    // 5. Permission gate
    const callSafety = capability.classify?.(call.args, this.deps.config.safe_commands);
    const verdict = this.deps.gate.decide(descriptor, ctx.session, callSafety);
    if (verdict === "deny") {
      this.deps.gate.recordPolicyDeny(descriptor, ctx.session);
      return fail(permissionDenied(call.name, "denied by policy"));
    }
    if (verdict === "ask") {
      const decision = await this.deps.gate.resolve(descriptor, call.args, ctx.session, this.deps.confirm);
      if (decision.value === "deny") {
        return fail(permissionDenied(call.name, "denied by user"), { rejectedByUser: true });
      }
    }

    // 6. Checkpoint
    const safety = effectiveSafety(descriptor, this.deps.config.auto_execute_safe, callSafety);
    let checkpointRef: string | undefined;
    if (isEffectivelyMutating(descriptor, safety) || safety === "destructive") {
      try {
        const checkpoint = await ctx.checkpoints.ensureCheckpoint(`Before ${call.name}: ${describeCall(call)}`);
        checkpointRef = checkpoint?.ref;
      } catch (error) {
        return fail(
          isCoreError(error) ? error : new CoreError("checkpoint_failure", asError(error).message, { cause: error })
        );
      }
    }

    if (ctx.signal?.aborted) {
      return fail(cancelled(call.name), { checkpointRef });
    }

    // 7. Bounded invocation
    const timeoutMs = this.timeoutFor(descriptor);
    const result = await this.invokeWithTimeout(capability, call, ctx, resolvedPaths, timeoutMs);

    // 8. Normalize
    switch (result.kind) {
      case "timeout":
        return fail(toolTimeout(call.name, timeoutMs), { checkpointRef });
      case "cancelled":
        return fail(cancelled(call.name), { checkpointRef });
      case "threw":
        return fail(toolExecutionError(call.name, asError(result.error).message, result.error), { checkpointRef });
      case "done": {
        const outcome = result.outcome;
        if (!outcome.ok) {
          return fail(outcome.error, { checkpointRef });
        }
        ctx.session.exploration.record(descriptor, targets);
        const durationMs = elapsedSince(startTime);
        logger.info({ tool: call.name, callId: call.id, durationMs }, "Tool executed");
        return {
          envelope: {
            callId: call.id,
            tool: call.name,
            ok: true,
            output: outcome.output,
            durationMs,
            ...(checkpointRef !== undefined ? { checkpointRef } : {}),
          },
          rejectedByUser: false,
        };
      }
    }
  }

  private async invokeWithTimeout(
    capability: ToolCapability,
    call: ProposedToolCall,
    ctx: DispatchContext,
    resolvedPaths: ReadonlyMap<string, string>,
    timeoutMs: number
  ): Promise<BoundedResult> {
    const controller = new AbortController();
    let timedOut = false;

    const onParentAbort = (): void => controller.abort();
    ctx.signal?.addEventListener("abort", onParentAbort, { once: true });
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs);

    try {
      const result = await new Promise<InvokeResult>((resolve) => {
        controller.signal.addEventListener("abort", () => resolve({ kind: "aborted" }), { once: true });
        capability
          .invoke(call.args, { workspace: ctx.workspace, signal: controller.signal, resolvedPaths })
          .then(
            (outcome) => resolve({ kind: "done", outcome }),
            (error: unknown) => resolve({ kind: "threw", error })
          );
      });
      if (result.kind === "aborted") {
        return timedOut ? { kind: "timeout" } : { kind: "cancelled" };
      }
      return result;
    } finally {
      clearTimeout(timer);
      ctx.signal?.removeEventListener("abort", onParentAbort);
    }
  }

  // ===========================================================================
  // Recording
  // ===========================================================================

  private record(call: ProposedToolCall, envelope: ToolResultEnvelope, ctx: DispatchContext): void {
    if (ctx.turnIndex !== undefined) {
      ctx.session.attachToolResult(ctx.turnIndex, call.id, envelope);
      return;
    }
    ctx.session.appendTurn({
      role: "tool",
      content: call.name,
      toolCalls: [{ id: call.id, name: call.name, args: call.args, result: envelope }],
    });
  }
}

function elapsedSince(startTime: number): number {
  return Math.max(0, Math.round(performance.now() - startTime));
}

function failure(
  call: ProposedToolCall,
  error: CoreError,
  startTime: number,
  extra: { rejectedByUser?: boolean; checkpointRef?: string } = {}
): ExecutionResult {
  logger.warn(
    { tool: call.name, callId: call.id, kind: error.kind, message: error.message },
    "Tool call failed"
  );
  return {
    envelope: {
      callId: call.id,
      tool: call.name,
      ok: false,
      error: {
        kind: error.kind,
        message: error.message,
        ...(error.details ? { details: error.details } : {}),
      },
      durationMs: elapsedSince(startTime),
      ...(extra.checkpointRef !== undefined ? { checkpointRef: extra.checkpointRef } : {}),
    },
    rejectedByUser: extra.rejectedByUser ?? false,
  };
}

/**
 * A read-only classification of a normally unsafe tool (a plain `ls` through
 * bash) also clears its mutating flag.
 */
function isEffectivelyMutating(descriptor: ToolDescriptor, safety: SafetyClass): boolean {
  if (!descriptor.mutating) return false;
  return !(safety === "safe" && descriptor.safety !== "safe");
}

function describeCall(call: ProposedToolCall): string {
  const summary = typeof call.args.command === "string"
    ? call.args.command
    : typeof call.args.path === "string"
      ? call.args.path
      : call.id;
  return summary.length > 50 ? `${summary.slice(0, 50)}...` : summary;
}
