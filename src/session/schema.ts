import { z } from "zod";
import { CORE_ERROR_KINDS } from "../protocol/errors.js";
import { MODES } from "../protocol/types.js";

// Zod schema for persisted session records (format version 1)

const ComplexityScoreSchema = z.object({
  score: z.number().min(0).max(1),
  factors: z.object({
    length: z.number(),
    fileMentions: z.number(),
    multiStep: z.number(),
    history: z.number(),
  }),
  signals: z.array(z.string()),
});

const ToolResultEnvelopeSchema = z.object({
  callId: z.string(),
  tool: z.string(),
  ok: z.boolean(),
  output: z.string().optional(),
  error: z
    .object({
      kind: z.enum(CORE_ERROR_KINDS),
      message: z.string(),
      details: z.record(z.unknown()).optional(),
    })
    .optional(),
  durationMs: z.number().nonnegative(),
  checkpointRef: z.string().optional(),
});

const ToolCallRecordSchema = z.object({
  id: z.string(),
  name: z.string(),
  args: z.record(z.unknown()),
  result: ToolResultEnvelopeSchema.optional(),
});

const TurnSchema = z.object({
  index: z.number().int().nonnegative(),
  role: z.enum(["user", "assistant", "tool"]),
  content: z.string(),
  mode: z.enum(MODES),
  createdAt: z.string(),
  toolCalls: z.array(ToolCallRecordSchema),
  complexity: ComplexityScoreSchema.optional(),
});

const CheckpointSchema = z.object({
  ref: z.string(),
  reason: z.string(),
  createdAt: z.string(),
  turnIndex: z.number().int().nonnegative(),
});

const CheckpointEventSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("created"), checkpoint: CheckpointSchema }),
  z.object({ type: z.literal("undone"), ref: z.string(), redoRef: z.string(), at: z.string() }),
  z.object({ type: z.literal("redone"), ref: z.string(), at: z.string() }),
]);

export const SessionRecordSchema = z.object({
  v: z.literal(1),
  id: z.string().min(1),
  name: z.string().optional(),
  createdAt: z.string(),
  updatedAt: z.string(),
  turns: z.array(TurnSchema),
  modeHistory: z.array(
    z.object({
      mode: z.enum(MODES),
      at: z.string(),
      reason: z.enum(["initial", "command", "complexity"]),
    })
  ),
  checkpoints: z.object({ events: z.array(CheckpointEventSchema) }),
});
