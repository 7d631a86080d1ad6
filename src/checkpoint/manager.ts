/**
 * Checkpoint Manager
 *
 * At most one checkpoint per turn, taken before the first mutating call.
 * Undo/redo stacks are derived from an append-only event log, which is
 * what gets persisted with the session.
 */

import { CoreError, asError, checkpointFailure, isCoreError } from "../protocol/errors.js";
import type { Checkpoint, CheckpointEvent, CheckpointRef, CheckpointState } from "../protocol/types.js";
import { createLogger } from "../utils/logger.js";
import type { VersionControl } from "./types.js";

const logger = createLogger("checkpoint");

interface RedoEntry {
  checkpoint: Checkpoint;
  redoRef: CheckpointRef;
}

export interface CheckpointManagerOptions {
  enabled: boolean;
}

export class CheckpointManager {
  private events: CheckpointEvent[] = [];
  private history: Checkpoint[] = [];
  private redoStack: RedoEntry[] = [];
  private turnIndex = 0;
  private turnCheckpoint: Promise<Checkpoint> | null = null;

  constructor(
    private readonly vc: VersionControl | null,
    private readonly options: CheckpointManagerOptions = { enabled: true }
  ) {}

  get enabled(): boolean {
    return this.options.enabled && this.vc !== null;
  }

  /**
   * Start a new turn scope; the next mutating call snapshots again.
   */
  beginTurn(turnIndex: number): void {
    this.turnIndex = turnIndex;
    this.turnCheckpoint = null;
  }

  /**
   * Snapshot once per turn. Returns null when checkpointing is disabled.
   */
  async ensureCheckpoint(reason: string): Promise<Checkpoint | null> {
    const vc = this.vc;
    if (!this.options.enabled || !vc) return null;

    if (!this.turnCheckpoint) {
      const turnIndex = this.turnIndex;
      const pending = this.take(vc, reason, turnIndex);
      this.turnCheckpoint = pending;
      // A failed snapshot leaves the turn free to try again
      pending.catch(() => {
        if (this.turnCheckpoint === pending) this.turnCheckpoint = null;
      });
    }
    return this.turnCheckpoint;
  }

  private async take(vc: VersionControl, reason: string, turnIndex: number): Promise<Checkpoint> {
    let ref: CheckpointRef;
    try {
      ref = await vc.snapshot(reason);
    } catch (error) {
      logger.error({ reason, error: asError(error).message }, "Checkpoint snapshot failed");
      throw isCoreError(error) && error.kind === "checkpoint_failure" ? error : checkpointFailure(reason, error);
    }
    const checkpoint: Checkpoint = { ref, reason, createdAt: new Date().toISOString(), turnIndex };
    this.apply({ type: "created", checkpoint });
    logger.info({ ref, turnIndex }, "Checkpoint created");
    return checkpoint;
  }

  async undo(): Promise<Checkpoint> {
    const checkpoint = this.history[this.history.length - 1];
    if (!checkpoint) {
      throw new CoreError("nothing_to_undo", "No checkpoint to undo");
    }
    const vc = this.requireVc();
    await this.requireRestorable(vc, checkpoint.ref);
    const redoRef = await vc.snapshot(`Before undo of ${checkpoint.ref}`);
    await vc.restore(checkpoint.ref);
    this.apply({ type: "undone", ref: checkpoint.ref, redoRef, at: new Date().toISOString() });
    this.turnCheckpoint = null;
    logger.info({ ref: checkpoint.ref, redoRef }, "Checkpoint undone");
    return checkpoint;
  }

  async redo(): Promise<Checkpoint> {
    const entry = this.redoStack[this.redoStack.length - 1];
    if (!entry) {
      throw new CoreError("nothing_to_redo", "No undone checkpoint to redo");
    }
    const vc = this.requireVc();
    await this.requireRestorable(vc, entry.redoRef);
    await vc.restore(entry.redoRef);
    this.apply({ type: "redone", ref: entry.checkpoint.ref, at: new Date().toISOString() });
    this.turnCheckpoint = null;
    logger.info({ ref: entry.checkpoint.ref }, "Checkpoint redone");
    return entry.checkpoint;
  }

  private requireVc(): VersionControl {
    if (!this.vc) {
      throw checkpointFailure("no version control backend configured");
    }
    return this.vc;
  }

  private async requireRestorable(vc: VersionControl, ref: CheckpointRef): Promise<void> {
    if (!(await vc.has(ref))) {
      throw checkpointFailure(`checkpoint ${ref} is no longer available in the ${vc.kind} backend`);
    }
  }

  // ===========================================================================
  // Event log
  // ===========================================================================

  private apply(event: CheckpointEvent): void {
    switch (event.type) {
      case "created":
        this.history.push(event.checkpoint);
        this.redoStack = [];
        break;
      case "undone": {
        const checkpoint = this.history.pop();
        if (!checkpoint || checkpoint.ref !== event.ref) {
          throw checkpointFailure(`undo event for ${event.ref} does not match history`);
        }
        this.redoStack.push({ checkpoint, redoRef: event.redoRef });
        break;
      }
      case "redone": {
        const entry = this.redoStack.pop();
        if (!entry || entry.checkpoint.ref !== event.ref) {
          throw checkpointFailure(`redo event for ${event.ref} does not match history`);
        }
        this.history.push(entry.checkpoint);
        break;
      }
    }
    this.events.push(event);
  }

  listCheckpoints(): readonly Checkpoint[] {
    return this.history;
  }

  canUndo(): boolean {
    return this.history.length > 0;
  }

  canRedo(): boolean {
    return this.redoStack.length > 0;
  }

  getState(): CheckpointState {
    return { events: structuredClone(this.events) };
  }

  restoreState(state: CheckpointState): void {
    this.events = [];
    this.history = [];
    this.redoStack = [];
    this.turnCheckpoint = null;
    for (const event of state.events) {
      this.apply(structuredClone(event));
    }
    logger.debug({ events: this.events.length, undoable: this.history.length }, "Checkpoint state restored");
  }
}
