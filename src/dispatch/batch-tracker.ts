/**
 * Batch Tracker
 *
 * Tracks the calls proposed in one assistant turn. Every proposed call must
 * get a result block back to the model, including calls that were refused,
 * failed or cancelled; the tracker produces those blocks in proposal order
 * and remembers whether the user rejected anything.
 */

import type { ToolCallId, ToolResultEnvelope } from "../protocol/types.js";
import { createLogger } from "../utils/logger.js";

const logger = createLogger("dispatch:batch");

// ===========================================================================
// Types
// ===========================================================================

export interface PendingCall {
  callId: ToolCallId;
  toolName: string;
  status: "pending" | "resolved";
  result: ToolResultEnvelope | null;
}

/**
 * Result block for sending back to the model driver.
 */
export interface ToolResultBlock {
  callId: ToolCallId;
  content: string;
  isError: boolean;
}

export interface BatchCompletionResult {
  turnIndex: number;
  hadRejection: boolean;
  cancelled: boolean;
  envelopes: ToolResultEnvelope[];
  blocks: ToolResultBlock[];
}

// ===========================================================================
// Batch Tracker
// ===========================================================================

export class BatchTracker {
  private calls: PendingCall[] = [];
  private hadRejection = false;
  private cancelled = false;

  constructor(readonly turnIndex: number) {}

  addCall(callId: ToolCallId, toolName: string): void {
    this.calls.push({ callId, toolName, status: "pending", result: null });
    logger.debug({ callId, toolName, batchSize: this.calls.length }, "Added call to batch");
  }

  /**
   * Resolve the earliest pending call with this id. Repeated ids resolve in
   * proposal order.
   */
  resolve(callId: ToolCallId, result: ToolResultEnvelope): void {
    const entry = this.calls.find((c) => c.callId === callId && c.status === "pending");
    if (!entry) {
      logger.warn({ callId }, "Result for a call outside the batch or already resolved");
      return;
    }
    entry.status = "resolved";
    entry.result = result;
    if (result.error?.kind === "cancelled") {
      this.cancelled = true;
    }
  }

  /**
   * The user denied a call; the loop stops after this batch.
   */
  markRejected(): void {
    this.hadRejection = true;
  }

  getPendingCount(): number {
    return this.calls.filter((entry) => entry.status === "pending").length;
  }

  isComplete(): boolean {
    return this.getPendingCount() === 0;
  }

  complete(): BatchCompletionResult {
    const envelopes: ToolResultEnvelope[] = [];
    const blocks: ToolResultBlock[] = [];
    for (const entry of this.calls) {
      if (!entry.result) {
        logger.error({ callId: entry.callId, toolName: entry.toolName }, "Batch completed with unresolved call");
        continue;
      }
      envelopes.push(entry.result);
      blocks.push(toResultBlock(entry.result));
    }

    logger.debug(
      { turnIndex: this.turnIndex, calls: envelopes.length, hadRejection: this.hadRejection },
      "Batch completed"
    );
    return {
      turnIndex: this.turnIndex,
      hadRejection: this.hadRejection,
      cancelled: this.cancelled,
      envelopes,
      blocks,
    };
  }
}

export function toResultBlock(result: ToolResultEnvelope): ToolResultBlock {
  if (result.ok) {
    return { callId: result.callId, content: result.output ?? "", isError: false };
  }
  const kind = result.error?.kind ?? "tool_execution_error";
  const message = result.error?.message ?? "Tool failed";
  return { callId: result.callId, content: `Error (${kind}): ${message}`, isError: true };
}
