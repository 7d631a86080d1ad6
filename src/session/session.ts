import { ModeController } from "../mode/controller.js";
import { ExplorationTracker } from "../permissions/exploration.js";
import { CoreError } from "../protocol/errors.js";
import type {
  CheckpointState,
  ComplexityScore,
  Mode,
  ModeChangeReason,
  ModeHistoryEntry,
  PermissionDecision,
  SessionId,
  SessionRecord,
  ToolCallId,
  ToolCallRecord,
  ToolName,
  ToolResultEnvelope,
  Turn,
  TurnRole,
} from "../protocol/types.js";
import { createLogger } from "../utils/logger.js";
import { ulid } from "../utils/ulid.js";

const logger = createLogger("session");

export interface AppendTurnInput {
  role: TurnRole;
  content: string;
  toolCalls?: ToolCallRecord[];
  complexity?: ComplexityScore;
}

interface SessionState {
  id: SessionId;
  name?: string;
  createdAt: string;
  updatedAt: string;
  turns: Turn[];
  modeHistory: ModeHistoryEntry[];
  checkpoints: CheckpointState;
}

export class Session {
  private state: SessionState;
  readonly mode: ModeController;
  /** Read-before-write state; not persisted, a resumed session explores again */
  readonly exploration = new ExplorationTracker();
  private decisions: PermissionDecision[] = [];
  private sessionAllows = new Set<ToolName>();
  private lockTail: Promise<void> = Promise.resolve();

  private constructor(state: SessionState) {
    this.state = state;
    this.mode = ModeController.fromHistory(state.modeHistory, "plan");
    this.mode.onModeChange(({ to, reason }) => {
      this.state.modeHistory.push({ mode: to, at: new Date().toISOString(), reason });
      this.touch();
    });
  }

  static create(options: { id?: SessionId; name?: string; mode?: Mode } = {}): Session {
    const now = new Date().toISOString();
    const mode = options.mode ?? "plan";
    const session = new Session({
      id: options.id ?? ulid(),
      ...(options.name !== undefined ? { name: options.name } : {}),
      createdAt: now,
      updatedAt: now,
      turns: [],
      modeHistory: [{ mode, at: now, reason: "initial" }],
      checkpoints: { events: [] },
    });
    logger.info({ sessionId: session.id, mode }, "Session created");
    return session;
  }

  static fromRecord(record: SessionRecord): Session {
    const copy = structuredClone(record);
    return new Session({
      id: copy.id,
      ...(copy.name !== undefined ? { name: copy.name } : {}),
      createdAt: copy.createdAt,
      updatedAt: copy.updatedAt,
      turns: copy.turns,
      modeHistory: copy.modeHistory,
      checkpoints: copy.checkpoints,
    });
  }

  get id(): SessionId {
    return this.state.id;
  }

  get name(): string | undefined {
    return this.state.name;
  }

  set name(value: string | undefined) {
    if (value === undefined) {
      delete this.state.name;
    } else {
      this.state.name = value;
    }
  }

  get createdAt(): string {
    return this.state.createdAt;
  }

  get updatedAt(): string {
    return this.state.updatedAt;
  }

  get turns(): readonly Turn[] {
    return this.state.turns;
  }

  get modeHistory(): readonly ModeHistoryEntry[] {
    return this.state.modeHistory;
  }

  /**
   * Number of user turns recorded so far.
   */
  userTurnCount(): number {
    return this.state.turns.filter((t) => t.role === "user").length;
  }

  touch(): void {
    this.state.updatedAt = new Date().toISOString();
  }

  // ===========================================================================
  // Turns
  // ===========================================================================

  appendTurn(input: AppendTurnInput): Turn {
    const turn: Turn = {
      index: this.state.turns.length,
      role: input.role,
      content: input.content,
      mode: this.mode.currentMode(),
      createdAt: new Date().toISOString(),
      toolCalls: input.toolCalls ?? [],
      ...(input.complexity ? { complexity: input.complexity } : {}),
    };
    this.state.turns.push(turn);
    this.touch();
    logger.debug({ sessionId: this.id, index: turn.index, role: turn.role }, "Turn appended");
    return turn;
  }

  /**
   * Attach a result to a call recorded on an earlier turn. Each call gets at
   * most one result; when a turn repeats an id, results fill the records in
   * order.
   */
  attachToolResult(turnIndex: number, callId: ToolCallId, result: ToolResultEnvelope): void {
    const turn = this.state.turns[turnIndex];
    if (!turn) {
      throw new CoreError("not_found", `Turn ${turnIndex} does not exist`, {
        details: { sessionId: this.id, turnIndex },
      });
    }
    const matching = turn.toolCalls.filter((c) => c.id === callId);
    if (matching.length === 0) {
      throw new CoreError("not_found", `Tool call ${callId} is not part of turn ${turnIndex}`, {
        details: { sessionId: this.id, turnIndex, callId },
      });
    }
    const call = matching.find((c) => !c.result);
    if (!call) {
      throw new CoreError("invalid_arguments", `Tool call ${callId} already has a result`, {
        details: { sessionId: this.id, turnIndex, callId },
      });
    }
    call.result = result;
    this.touch();
  }

  // ===========================================================================
  // Mode
  // ===========================================================================

  currentMode(): Mode {
    return this.mode.currentMode();
  }

  recordMode(mode: Mode, reason: ModeChangeReason): void {
    this.mode.setMode(mode, reason);
  }

  // ===========================================================================
  // Permission decisions
  // ===========================================================================

  cachedDecision(tool: ToolName): PermissionDecision | undefined {
    if (!this.sessionAllows.has(tool)) return undefined;
    for (let i = this.decisions.length - 1; i >= 0; i--) {
      const decision = this.decisions[i];
      if (decision && decision.tool === tool && decision.scope === "session" && decision.value === "allow") {
        return decision;
      }
    }
    return undefined;
  }

  recordDecision(decision: PermissionDecision): void {
    this.decisions.push(decision);
    if (decision.scope === "session" && decision.value === "allow") {
      this.sessionAllows.add(decision.tool);
    }
  }

  decisionLog(): readonly PermissionDecision[] {
    return this.decisions;
  }

  // ===========================================================================
  // Checkpoints
  // ===========================================================================

  checkpointState(): CheckpointState {
    return structuredClone(this.state.checkpoints);
  }

  setCheckpointState(state: CheckpointState): void {
    this.state.checkpoints = structuredClone(state);
    this.touch();
  }

  // ===========================================================================
  // Concurrency
  // ===========================================================================

  /**
   * Run `fn` while holding the session's single logical lock. Calls queue
   * in arrival order.
   */
  runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    const run = this.lockTail.then(fn);
    // The next waiter starts once this one settles, whatever the outcome
    this.lockTail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  // ===========================================================================
  // Serialization
  // ===========================================================================

  toRecord(): SessionRecord {
    const copy = structuredClone(this.state);
    return {
      v: 1,
      id: copy.id,
      ...(copy.name !== undefined ? { name: copy.name } : {}),
      createdAt: copy.createdAt,
      updatedAt: copy.updatedAt,
      turns: copy.turns,
      modeHistory: copy.modeHistory,
      checkpoints: copy.checkpoints,
    };
  }
}
