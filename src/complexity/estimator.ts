/**
 * Complexity Estimator
 *
 * Scores a request in [0,1] from four factors: matched multi-step signal
 * words, distinct file mentions, request length and conversation history.
 * Pure and deterministic; the score only ever produces a recommendation.
 */

import type { ComplexityScore, Mode, ModeRecommendation } from "../protocol/types.js";

interface Signal {
  label: string;
  pattern: RegExp;
  weight: number;
}

// Weighted signals, strongest first within each group
const SIGNALS: readonly Signal[] = [
  // Restructuring
  { label: "refactor", pattern: /\brefactor/i, weight: 0.35 },
  { label: "restructure", pattern: /\brestructur/i, weight: 0.35 },
  { label: "migrate", pattern: /\bmigrat/i, weight: 0.35 },
  { label: "rewrite", pattern: /\brewrit/i, weight: 0.3 },
  { label: "redesign", pattern: /\bredesign/i, weight: 0.3 },

  // Scope
  { label: "all files", pattern: /\ball\s+files?\b/i, weight: 0.3 },
  { label: "entire", pattern: /\bentire\b/i, weight: 0.25 },
  { label: "every", pattern: /\bevery\s+\w+/i, weight: 0.25 },
  { label: "across", pattern: /\bacross\s+the\b/i, weight: 0.25 },
  { label: "throughout", pattern: /\bthroughout\b/i, weight: 0.2 },

  // Multi-step
  { label: "first/then", pattern: /\bfirst\b.*\bthen\b/is, weight: 0.25 },
  { label: "step n", pattern: /\bstep\s+\d+/i, weight: 0.2 },
  { label: "and then", pattern: /\band\s+then\b/i, weight: 0.15 },
  { label: "after that", pattern: /\bafter\s+that\b/i, weight: 0.15 },
  { label: "finally", pattern: /\bfinally\b/i, weight: 0.15 },

  // Creation
  { label: "create a new", pattern: /\bcreate\s+a\s+new\b/i, weight: 0.2 },
  { label: "build a", pattern: /\bbuild\s+an?\b/i, weight: 0.2 },
  { label: "implement a", pattern: /\bimplement\s+an?\b/i, weight: 0.2 },
  { label: "set up", pattern: /\bset\s*up\b/i, weight: 0.15 },

  // Ambiguous scope
  { label: "fix bugs", pattern: /\bfix\s+(?:the\s+)?bugs?\b/i, weight: 0.2 },
  { label: "optimize", pattern: /\boptimi[sz]e\b/i, weight: 0.2 },
  { label: "improve", pattern: /\bimprove\b/i, weight: 0.15 },

  // Feature-sized work
  { label: "feature", pattern: /\bfeature\b/i, weight: 0.15 },
  { label: "system", pattern: /\bsystem\b/i, weight: 0.15 },
  { label: "multiple", pattern: /\b(?:multiple|several)\b/i, weight: 0.15 },
];

const MULTI_STEP_CAP = 0.6;
const FILE_MENTION_WEIGHT = 0.1;
const FILE_MENTION_CAP = 0.3;
const WORDS_PER_LENGTH_STEP = 40;
const LENGTH_WEIGHT = 0.05;
const LENGTH_CAP = 0.15;
const HISTORY_FREE_TURNS = 5;
const HISTORY_WEIGHT = 0.02;
const HISTORY_CAP = 0.1;

function round2(n: number): number {
  return Math.round(n * 100) / 100;
}

const TOKEN_TRIM = /^[`'"([{<]+|[`'")\]}>,;:!?.]+$/g;
const PATH_CHARS = /^[\w./-]+$/;
const HAS_EXTENSION = /[\w-]\.[A-Za-z][A-Za-z0-9]{0,5}$/;
const HAS_DIRECTORY = /[\w-]\/[\w.-]/;

/**
 * Distinct path-like tokens: something with a directory separator or a file
 * extension, e.g. `src/app.ts`, `README.md`, `lib/util`.
 */
export function extractFileMentions(text: string): string[] {
  const seen = new Set<string>();
  for (const raw of text.split(/\s+/)) {
    const token = raw.replace(TOKEN_TRIM, "");
    if (token === "" || !PATH_CHARS.test(token)) continue;
    if (HAS_EXTENSION.test(token) || HAS_DIRECTORY.test(token)) {
      seen.add(token);
    }
  }
  return [...seen];
}

function countWords(text: string): number {
  return text.split(/\s+/).filter((w) => w.length > 0).length;
}

export class ComplexityEstimator {
  /**
   * @param historyLength number of user turns before this request
   */
  score(requestText: string, historyLength: number): ComplexityScore {
    const signals: string[] = [];
    let signalWeight = 0;
    for (const signal of SIGNALS) {
      if (signal.pattern.test(requestText)) {
        signals.push(signal.label);
        signalWeight += signal.weight;
      }
    }

    const mentions = extractFileMentions(requestText).length;
    const factors = {
      length: round2(Math.min(LENGTH_CAP, LENGTH_WEIGHT * Math.floor(countWords(requestText) / WORDS_PER_LENGTH_STEP))),
      fileMentions: round2(Math.min(FILE_MENTION_CAP, FILE_MENTION_WEIGHT * Math.max(0, mentions - 1))),
      multiStep: round2(Math.min(MULTI_STEP_CAP, signalWeight)),
      history: round2(Math.min(HISTORY_CAP, HISTORY_WEIGHT * Math.max(0, historyLength - HISTORY_FREE_TURNS))),
    };

    const total = factors.length + factors.fileMentions + factors.multiStep + factors.history;
    return {
      score: round2(Math.min(1, Math.max(0, total))),
      factors,
      signals,
    };
  }

  /**
   * Suggest switching to PLAN. Only BUILD requests are escalated; PLAN and
   * REVIEW are already read-only.
   */
  recommend(score: ComplexityScore, threshold: number, mode: Mode): ModeRecommendation | null {
    if (mode !== "build" || score.score < threshold) return null;
    const detail = score.signals.length > 0 ? ` (${score.signals.slice(0, 3).join(", ")})` : "";
    return {
      switchTo: "plan",
      reason: `Complexity ${score.score.toFixed(2)} meets threshold ${threshold.toFixed(2)}${detail}`,
    };
  }

  explain(score: ComplexityScore, threshold: number): string {
    const { factors } = score;
    const lines = [
      `Complexity score: ${score.score.toFixed(2)} (threshold: ${threshold.toFixed(2)})`,
      `Suggest planning: ${score.score >= threshold ? "yes" : "no"}`,
      `Factors: multi-step ${factors.multiStep.toFixed(2)}, files ${factors.fileMentions.toFixed(2)}, ` +
        `length ${factors.length.toFixed(2)}, history ${factors.history.toFixed(2)}`,
    ];
    if (score.signals.length > 0) {
      lines.push("Signals detected:");
      for (const signal of score.signals.slice(0, 5)) {
        lines.push(`  - ${signal}`);
      }
    }
    return lines.join("\n");
  }
}
