/**
 * Mode Controller
 *
 * Owns the current operating mode. PLAN and REVIEW are read-only; BUILD
 * allows the full tool set. Switching is always explicit: complexity
 * recommendations are surfaced elsewhere and never change the mode here.
 */

import { invalidArguments } from "../protocol/errors.js";
import {
  MODES,
  isMode,
  type Mode,
  type ModeChangeReason,
  type ModeHistoryEntry,
  type ToolDescriptor,
} from "../protocol/types.js";
import { createLogger } from "../utils/logger.js";

const logger = createLogger("mode");

const READ_ONLY_MODES: ReadonlySet<Mode> = new Set<Mode>(["plan", "review"]);

export const MODE_DESCRIPTIONS: Record<Mode, string> = {
  plan: "Read-only analysis and planning; no file writes or commands",
  build: "Full tool access: edits, writes and shell commands",
  review: "Read-only inspection of existing changes",
};

export type ModeChangeListener = (change: {
  from: Mode;
  to: Mode;
  reason: ModeChangeReason;
}) => void;

export function isEligible(descriptor: ToolDescriptor, mode: Mode): boolean {
  return descriptor.modes.includes(mode);
}

export function isReadOnly(mode: Mode): boolean {
  return READ_ONLY_MODES.has(mode);
}

export class ModeController {
  private mode: Mode;
  private listeners: ModeChangeListener[] = [];

  constructor(initial: Mode = "plan") {
    this.mode = initial;
  }

  currentMode(): Mode {
    return this.mode;
  }

  /**
   * Switch modes. Listeners run before this returns, so the next dispatch
   * observes the new mode.
   */
  setMode(mode: unknown, reason: ModeChangeReason = "command"): true {
    if (!isMode(mode)) {
      throw invalidArguments("setMode", `unknown mode '${String(mode)}', expected one of ${MODES.join(", ")}`);
    }
    const from = this.mode;
    if (from === mode) return true;

    this.mode = mode;
    logger.info({ from, to: mode, reason }, "Mode changed");
    for (const listener of this.listeners) {
      listener({ from, to: mode, reason });
    }
    return true;
  }

  onModeChange(listener: ModeChangeListener): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter((l) => l !== listener);
    };
  }

  isReadOnly(): boolean {
    return isReadOnly(this.mode);
  }

  eligibleTools(registry: { list(mode: Mode): ToolDescriptor[] }): ToolDescriptor[] {
    return registry.list(this.mode);
  }

  /**
   * Rebuild from persisted history: the last entry wins.
   */
  static fromHistory(history: readonly ModeHistoryEntry[], fallback: Mode): ModeController {
    const last = history[history.length - 1];
    return new ModeController(last ? last.mode : fallback);
  }
}
