/**
 * Agent Loop
 *
 * Composes the core for one user turn: score complexity, offer a switch to
 * PLAN, then alternate between the model driver and the dispatcher until the
 * model stops proposing calls, the user rejects one, the turn is cancelled
 * or the iteration limit is reached. The session is persisted at the end of
 * every turn, including failed and cancelled ones.
 */

import { CheckpointManager } from "../checkpoint/manager.js";
import { GitVersionControl } from "../checkpoint/git.js";
import { SnapshotVersionControl } from "../checkpoint/snapshot.js";
import type { VersionControl } from "../checkpoint/types.js";
import { ComplexityEstimator } from "../complexity/estimator.js";
import type { CoreConfig } from "../config/core-config.js";
import { ToolDispatcher } from "../dispatch/dispatcher.js";
import type { ConfirmationProvider } from "../permissions/confirm.js";
import { PermissionGate } from "../permissions/gate.js";
import type {
  Checkpoint,
  ComplexityScore,
  Mode,
  ModeRecommendation,
  ToolResultEnvelope,
  Workspace,
} from "../protocol/types.js";
import type { Session } from "../session/session.js";
import type { SessionStore } from "../session/store.js";
import { ToolRegistry } from "../tools/registry.js";
import { createLogger } from "../utils/logger.js";
import type { ModeAdvisor, ModelDriver } from "./driver.js";

const logger = createLogger("agent");

export interface AgentLoopOptions {
  session: Session;
  workspace: Workspace;
  config: CoreConfig;
  driver: ModelDriver;
  advisor: ModeAdvisor;
  confirm: ConfirmationProvider;
  store: SessionStore;
  /** Defaults to the backend named by `checkpoint_backend` */
  versionControl?: VersionControl | null;
  registry?: ToolRegistry;
  estimator?: ComplexityEstimator;
}

export interface TurnOutcome {
  complexity: ComplexityScore;
  recommendation: ModeRecommendation | null;
  accepted: boolean;
  assistantText: string;
  results: ToolResultEnvelope[];
  cancelled: boolean;
  iterations: number;
}

export interface RunTurnOptions {
  signal?: AbortSignal;
}

export function createVersionControl(config: CoreConfig, workspace: Workspace): VersionControl {
  return config.checkpoint_backend === "git"
    ? new GitVersionControl(workspace)
    : new SnapshotVersionControl(workspace);
}

export class AgentLoop {
  readonly session: Session;
  readonly registry: ToolRegistry;
  readonly checkpoints: CheckpointManager;
  private readonly dispatcher: ToolDispatcher;
  private readonly estimator: ComplexityEstimator;

  constructor(private readonly options: AgentLoopOptions) {
    const { config, session, workspace } = options;
    this.session = session;
    this.registry = options.registry ?? new ToolRegistry();
    this.estimator = options.estimator ?? new ComplexityEstimator();

    const vc = options.versionControl === undefined ? createVersionControl(config, workspace) : options.versionControl;
    this.checkpoints = new CheckpointManager(vc, { enabled: config.checkpoint_enabled });
    this.checkpoints.restoreState(session.checkpointState());

    this.dispatcher = new ToolDispatcher({
      registry: this.registry,
      gate: new PermissionGate({
        autoExecuteSafe: config.auto_execute_safe,
        deniedTools: config.denied_tools,
      }),
      confirm: options.confirm,
      config,
    });
  }

  currentMode(): Mode {
    return this.session.currentMode();
  }

  runTurn(text: string, options: RunTurnOptions = {}): Promise<TurnOutcome> {
    return this.session.runExclusive(() => this.runTurnLocked(text, options.signal));
  }

  private async runTurnLocked(text: string, signal: AbortSignal | undefined): Promise<TurnOutcome> {
    const { config, driver, advisor } = this.options;
    const session = this.session;

    // 1. Complexity
    const complexity = this.estimator.score(text, session.userTurnCount());

    // 2. Escalation suggestion
    const recommendation = config.auto_plan
      ? this.estimator.recommend(complexity, config.complexity_threshold, session.currentMode())
      : null;
    let accepted = false;
    if (recommendation) {
      accepted = (await advisor.suggest(recommendation, complexity)) === "accept";
      if (accepted) {
        session.recordMode(recommendation.switchTo, "complexity");
      }
      logger.info(
        { sessionId: session.id, score: complexity.score, accepted },
        "Planning suggested for complex request"
      );
    }

    // 3. User turn; one checkpoint scope per user request
    const userTurn = session.appendTurn({ role: "user", content: text, complexity });
    this.checkpoints.beginTurn(userTurn.index);

    const results: ToolResultEnvelope[] = [];
    let assistantText = "";
    let cancelled = false;
    let iterations = 0;
    let pendingCalls = false;

    try {
      // 4. Driver / dispatch rounds
      while (iterations < config.max_iterations) {
        if (signal?.aborted) {
          cancelled = true;
          break;
        }

        const mode = session.currentMode();
        const response = await driver.converse({
          turns: session.turns,
          tools: this.registry.list(mode),
          mode,
          ...(signal ? { signal } : {}),
        });
        iterations++;
        assistantText = response.text;

        const calls = response.proposedToolCalls;
        const turn = session.appendTurn({
          role: "assistant",
          content: response.text,
          toolCalls: calls.map((call) => ({ id: call.id, name: call.name, args: call.args })),
        });
        pendingCalls = calls.length > 0;
        if (!pendingCalls) break;

        const batch = await this.dispatcher.dispatchBatch(calls, {
          session,
          workspace: this.options.workspace,
          checkpoints: this.checkpoints,
          turnIndex: turn.index,
          ...(signal ? { signal } : {}),
        });
        results.push(...batch.envelopes);

        if (batch.cancelled || signal?.aborted) {
          cancelled = true;
          break;
        }
        if (batch.hadRejection) {
          logger.info({ sessionId: session.id }, "Stopping turn after user rejection");
          break;
        }
      }

      if (pendingCalls && iterations >= config.max_iterations) {
        logger.warn({ sessionId: session.id, iterations }, "Iteration limit reached");
      }
    } finally {
      // 5. Persist, whatever happened
      await this.persist();
    }

    return { complexity, recommendation, accepted, assistantText, results, cancelled, iterations };
  }

  /**
   * Explicit mode switch by the user.
   */
  setMode(mode: Mode): Promise<void> {
    return this.session.runExclusive(async () => {
      this.session.recordMode(mode, "command");
      await this.persist();
    });
  }

  undo(): Promise<Checkpoint> {
    return this.session.runExclusive(async () => {
      const checkpoint = await this.checkpoints.undo();
      await this.persist();
      return checkpoint;
    });
  }

  redo(): Promise<Checkpoint> {
    return this.session.runExclusive(async () => {
      const checkpoint = await this.checkpoints.redo();
      await this.persist();
      return checkpoint;
    });
  }

  private async persist(): Promise<void> {
    this.session.setCheckpointState(this.checkpoints.getState());
    await this.options.store.save(this.session);
  }
}
