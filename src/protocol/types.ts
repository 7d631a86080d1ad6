/**
 * helmsman - Core Type Definitions
 *
 * Shared vocabulary for the mode controller, permission gate, workspace
 * guard, dispatcher, checkpoint manager and session store.
 */

import type { CoreErrorKind } from "./errors.js";

// =============================================================================
// CORE IDENTIFIERS
// =============================================================================

export type SessionId = string;
export type ToolCallId = string;
export type CheckpointRef = string;
export type ToolName = string;

// =============================================================================
// MODES
// =============================================================================

export const MODES = ["plan", "build", "review"] as const;

export type Mode = (typeof MODES)[number];

export function isMode(value: unknown): value is Mode {
  return MODES.some((mode) => mode === value);
}

export type ModeChangeReason = "initial" | "command" | "complexity";

export type ModeHistoryEntry = {
  mode: Mode;
  at: string;
  reason: ModeChangeReason;
};

// =============================================================================
// WORKSPACE
// =============================================================================

export type Workspace = Readonly<{
  /** Absolute, canonical (symlink-free) root directory */
  root: string;
  /** Directory holding workspace-local state (.helmsman) */
  configDir: string;
}>;

// =============================================================================
// TOOL DESCRIPTORS
// =============================================================================

export type SafetyClass = "safe" | "sensitive" | "destructive";

export type PathArgSpec = {
  name: string;
  /** Target must already exist (reads); writes may create it */
  mustExist: boolean;
  optional?: boolean;
};

export type ToolInputSchema = {
  type: "object";
  properties: Record<string, unknown>;
  required?: string[];
};

export type ToolDescriptor = Readonly<{
  name: ToolName;
  description: string;
  input_schema: ToolInputSchema;
  modes: ReadonlyArray<Mode>;
  safety: SafetyClass;
  mutating: boolean;
  pathArgs: ReadonlyArray<PathArgSpec>;
  /** What a successful call counts as having explored */
  explores?: "file" | "directory";
  maxLatencyMs: number;
}>;

// =============================================================================
// PERMISSIONS
// =============================================================================

export type PermissionScope = "once" | "session" | "deny";
export type PermissionValue = "allow" | "deny";

export type PermissionDecision = {
  tool: ToolName;
  scope: PermissionScope;
  value: PermissionValue;
  decidedAt: string;
};

/** Gate verdict before any user interaction */
export type GateVerdict = "allow" | "deny" | "ask";

/** Answer returned by the confirmation collaborator */
export type ConfirmAnswer = "allow-once" | "allow-session" | "deny";

// =============================================================================
// COMPLEXITY
// =============================================================================

export type ComplexityFactors = {
  length: number;
  fileMentions: number;
  multiStep: number;
  history: number;
};

export type ComplexityScore = {
  score: number;
  factors: ComplexityFactors;
  signals: string[];
};

export type ModeRecommendation = {
  switchTo: "plan";
  reason: string;
};

// =============================================================================
// TOOL CALLS & RESULTS
// =============================================================================

export type ProposedToolCall = {
  id: ToolCallId;
  name: ToolName;
  args: Record<string, unknown>;
};

export type ToolResultError = {
  kind: CoreErrorKind;
  message: string;
  details?: Record<string, unknown>;
};

/**
 * Uniform result envelope. Every proposed call ends up with exactly one,
 * whatever happened to it.
 */
export type ToolResultEnvelope = {
  callId: ToolCallId;
  tool: ToolName;
  ok: boolean;
  output?: string;
  error?: ToolResultError;
  durationMs: number;
  checkpointRef?: CheckpointRef;
};

export type ToolCallRecord = {
  id: ToolCallId;
  name: ToolName;
  args: Record<string, unknown>;
  result?: ToolResultEnvelope;
};

// =============================================================================
// TURNS & SESSIONS
// =============================================================================

export type TurnRole = "user" | "assistant" | "tool";

export type Turn = {
  index: number;
  role: TurnRole;
  content: string;
  mode: Mode;
  createdAt: string;
  toolCalls: ToolCallRecord[];
  complexity?: ComplexityScore;
};

// =============================================================================
// CHECKPOINTS
// =============================================================================

export type Checkpoint = {
  ref: CheckpointRef;
  reason: string;
  createdAt: string;
  turnIndex: number;
};

export type CheckpointEvent =
  | { type: "created"; checkpoint: Checkpoint }
  | { type: "undone"; ref: CheckpointRef; redoRef: CheckpointRef; at: string }
  | { type: "redone"; ref: CheckpointRef; at: string };

export type CheckpointState = {
  events: CheckpointEvent[];
};

export type SessionRecord = {
  v: 1;
  id: SessionId;
  name?: string;
  createdAt: string;
  updatedAt: string;
  turns: Turn[];
  modeHistory: ModeHistoryEntry[];
  checkpoints: CheckpointState;
};

export type SessionSummary = {
  id: SessionId;
  name: string;
  updatedAt: string;
  turnCount: number;
  summary: string;
};
