/**
 * Permission Gate
 *
 * Safe calls pass. Sensitive and destructive calls pass only with a cached
 * session-scoped allow or a fresh answer from the confirmation provider.
 * A policy deny list overrides everything.
 */

import type {
  GateVerdict,
  PermissionDecision,
  SafetyClass,
  ToolDescriptor,
} from "../protocol/types.js";
import type { Session } from "../session/session.js";
import { createLogger } from "../utils/logger.js";
import type { ConfirmationProvider } from "./confirm.js";

const logger = createLogger("permissions");

export interface GatePolicy {
  autoExecuteSafe: boolean;
  deniedTools: readonly string[];
}

/**
 * Safety class that applies to one call. A per-call `safe` classification
 * (a read-only shell command) only counts when auto-execution is enabled.
 */
export function effectiveSafety(
  descriptor: ToolDescriptor,
  autoExecuteSafe: boolean,
  callSafety?: SafetyClass
): SafetyClass {
  if (callSafety === "safe" && !autoExecuteSafe) return descriptor.safety;
  return callSafety ?? descriptor.safety;
}

export class PermissionGate {
  constructor(private readonly policy: GatePolicy) {}

  decide(descriptor: ToolDescriptor, session: Session, callSafety?: SafetyClass): GateVerdict {
    if (this.policy.deniedTools.includes(descriptor.name)) {
      return "deny";
    }
    const safety = effectiveSafety(descriptor, this.policy.autoExecuteSafe, callSafety);
    if (safety === "safe") {
      return "allow";
    }
    if (session.cachedDecision(descriptor.name)) {
      logger.debug({ tool: descriptor.name, sessionId: session.id }, "Session-scoped allow reused");
      return "allow";
    }
    return "ask";
  }

  /**
   * Ask the confirmation provider and record the answer on the session.
   */
  async resolve(
    descriptor: ToolDescriptor,
    args: Record<string, unknown>,
    session: Session,
    confirm: ConfirmationProvider
  ): Promise<PermissionDecision> {
    const answer = await confirm.ask(descriptor, args);
    const decidedAt = new Date().toISOString();

    let decision: PermissionDecision;
    switch (answer) {
      case "allow-once":
        decision = { tool: descriptor.name, scope: "once", value: "allow", decidedAt };
        break;
      case "allow-session":
        decision = { tool: descriptor.name, scope: "session", value: "allow", decidedAt };
        break;
      case "deny":
        decision = { tool: descriptor.name, scope: "deny", value: "deny", decidedAt };
        break;
    }

    session.recordDecision(decision);
    logger.info(
      { tool: descriptor.name, sessionId: session.id, scope: decision.scope, value: decision.value },
      "Permission decision recorded"
    );
    return decision;
  }

  /**
   * Record a policy-level deny so it shows up in the decision log.
   */
  recordPolicyDeny(descriptor: ToolDescriptor, session: Session): PermissionDecision {
    const decision: PermissionDecision = {
      tool: descriptor.name,
      scope: "deny",
      value: "deny",
      decidedAt: new Date().toISOString(),
    };
    session.recordDecision(decision);
    return decision;
  }
}
