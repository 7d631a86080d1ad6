/**
 * # helmsman
 *
 * Local orchestration core between a conversational model driver and a
 * developer's file system. Every effectful action the model proposes goes
 * through one dispatcher that enforces:
 *
 * - **Modes**: PLAN and REVIEW are read-only, BUILD may write and run commands
 * - **Workspace boundary**: path arguments must resolve inside the root
 * - **Permissions**: sensitive and destructive calls need an allow decision
 * - **Checkpoints**: one reversible snapshot per turn before the first write
 *
 * @example
 * ```typescript
 * import {
 *   AgentLoop, FileSessionStore, ScriptedConfirmProvider, Session,
 *   StaticModeAdvisor, initWorkspace, mergeCoreConfig,
 * } from "helmsman";
 *
 * const workspace = await initWorkspace(".");
 * const config = mergeCoreConfig({ workspaceRoot: workspace.root });
 * const loop = new AgentLoop({
 *   session: Session.create({ mode: config.default_mode }),
 *   workspace,
 *   config,
 *   driver: myDriver,
 *   advisor: new StaticModeAdvisor("accept"),
 *   confirm: new ScriptedConfirmProvider(["allow-once"]),
 *   store: new FileSessionStore(workspace.root),
 * });
 * const outcome = await loop.runTurn("Add a CHANGELOG entry for the 1.2 release");
 * ```
 *
 * @packageDocumentation
 */

// Protocol
export * from "./protocol/types.js";
export * from "./protocol/errors.js";

// Configuration
export * from "./config/core-config.js";

// Workspace
export * from "./workspace/workspace.js";
export * from "./workspace/guard.js";

// Modes & complexity
export * from "./mode/controller.js";
export * from "./complexity/estimator.js";

// Tools
export * from "./tools/definitions.js";
export * from "./tools/registry.js";
export type { ToolCapability, ToolInvocationContext, ToolOutcome } from "./tools/types.js";
export { isReadOnlyCommand, blockedReason } from "./tools/bash.js";

// Permissions
export * from "./permissions/gate.js";
export * from "./permissions/confirm.js";

// Checkpoints
export type { VersionControl } from "./checkpoint/types.js";
export * from "./checkpoint/manager.js";
export * from "./checkpoint/git.js";
export * from "./checkpoint/snapshot.js";

// Sessions
export * from "./session/session.js";
export * from "./session/store.js";

// Dispatch & agent loop
export * from "./dispatch/dispatcher.js";
export * from "./dispatch/batch-tracker.js";
export * from "./agent/driver.js";
export * from "./agent/loop.js";
