/**
 * Model driver and mode advisor abstractions.
 *
 * The core never talks to a model directly. A driver receives the
 * conversation so far plus the tools eligible in the current mode and
 * answers with text and proposed calls; prompt construction and transport
 * are the driver's business.
 */

import type {
  ComplexityScore,
  Mode,
  ModeRecommendation,
  ProposedToolCall,
  ToolDescriptor,
  Turn,
} from "../protocol/types.js";

// ============================================================================
// Model driver
// ============================================================================

export interface ConverseRequest {
  turns: readonly Turn[];
  /** Only tools eligible in `mode` */
  tools: readonly ToolDescriptor[];
  mode: Mode;
  signal?: AbortSignal;
}

export interface ConverseResponse {
  text: string;
  proposedToolCalls: ProposedToolCall[];
}

export interface ModelDriver {
  converse(request: ConverseRequest): Promise<ConverseResponse>;
}

/**
 * Replays a fixed list of responses, then answers with plain text and no
 * calls. Records every request it received.
 */
export class ScriptedModelDriver implements ModelDriver {
  readonly requests: ConverseRequest[] = [];
  private readonly responses: ConverseResponse[];

  constructor(responses: readonly ConverseResponse[]) {
    this.responses = [...responses];
  }

  async converse(request: ConverseRequest): Promise<ConverseResponse> {
    this.requests.push({ ...request, turns: [...request.turns], tools: [...request.tools] });
    return this.responses.shift() ?? { text: "", proposedToolCalls: [] };
  }
}

// ============================================================================
// Mode advisor
// ============================================================================

export type AdvisorAnswer = "accept" | "reject";

/**
 * Decides whether a complexity recommendation to switch to PLAN is taken.
 */
export interface ModeAdvisor {
  suggest(recommendation: ModeRecommendation, score: ComplexityScore): Promise<AdvisorAnswer>;
}

export class StaticModeAdvisor implements ModeAdvisor {
  readonly suggestions: ModeRecommendation[] = [];

  constructor(private readonly answer: AdvisorAnswer) {}

  async suggest(recommendation: ModeRecommendation): Promise<AdvisorAnswer> {
    this.suggestions.push(recommendation);
    return this.answer;
  }
}
