import { Command, InvalidArgumentError } from "commander";
import { CheckpointManager } from "../checkpoint/manager.js";
import { GitVersionControl } from "../checkpoint/git.js";
import { ComplexityEstimator } from "../complexity/estimator.js";
import { mergeCoreConfig, type CoreConfig } from "../config/core-config.js";
import { MODE_DESCRIPTIONS } from "../mode/controller.js";
import { errorLogFields, isCoreError } from "../protocol/errors.js";
import { isMode, type Mode, type Workspace } from "../protocol/types.js";
import { FileSessionStore } from "../session/store.js";
import { ToolRegistry } from "../tools/registry.js";
import { logger } from "../utils/logger.js";
import { findWorkspace, initWorkspace, openWorkspace } from "../workspace/workspace.js";

export interface CliIO {
  out(line: string): void;
  err(line: string): void;
  fail(exitCode: number): void;
}

const consoleIO: CliIO = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
  fail: (exitCode) => {
    process.exitCode = exitCode;
  },
};

type GlobalOptions = {
  workspace?: string;
  config?: string;
};

async function resolveWorkspace(opts: GlobalOptions): Promise<Workspace> {
  if (opts.workspace) return openWorkspace(opts.workspace);
  return (await findWorkspace(process.cwd())) ?? openWorkspace(process.cwd());
}

function resolveConfig(opts: GlobalOptions, workspace: Workspace): CoreConfig {
  return mergeCoreConfig({
    workspaceRoot: workspace.root,
    ...(opts.config ? { config: opts.config } : {}),
  });
}

export function parseNonNegativeInt(value: string): number {
  const n = Number.parseInt(value, 10);
  if (!Number.isFinite(n) || n < 0) {
    throw new InvalidArgumentError(`Expected a non-negative integer, got '${value}'`);
  }
  return n;
}

export function parsePositiveInt(value: string): number {
  const n = parseNonNegativeInt(value);
  if (n === 0) {
    throw new InvalidArgumentError(`Expected a positive integer, got '${value}'`);
  }
  return n;
}

/**
 * Build the `helmsman` command tree. Output goes through `io` so callers
 * can capture it.
 */
export function createProgram(io: CliIO = consoleIO): Command {
  const program = new Command();

  const run = (action: () => Promise<void>): Promise<void> =>
    action().catch((error: unknown) => {
      logger.error(errorLogFields(error), "Command failed");
      const message = error instanceof Error ? error.message : String(error);
      io.err(`Error${isCoreError(error) ? ` (${error.kind})` : ""}: ${message}`);
      io.fail(1);
    });

  program
    .name("helmsman")
    .description("Mode-aware tool orchestration for coding assistants")
    .option("-w, --workspace <path>", "Workspace root (default: nearest initialized parent of cwd)")
    .option("-c, --config <file>", "Extra config file layered over workspace config");

  program
    .command("init")
    .description("Initialize a workspace")
    .argument("[path]", "Directory to initialize", ".")
    .action((path: string) =>
      run(async () => {
        const workspace = await initWorkspace(path);
        io.out(`Initialized workspace at ${workspace.root}`);
      })
    );

  program
    .command("tools")
    .description("List tools available in a mode")
    .option("-m, --mode <mode>", "plan, build or review (default: configured default_mode)")
    .action((opts: { mode?: string }) =>
      run(async () => {
        const global = program.opts<GlobalOptions>();
        const config = resolveConfig(global, await resolveWorkspace(global));
        const requested = opts.mode ?? config.default_mode;
        if (!isMode(requested)) {
          throw new Error(`Unknown mode '${requested}'`);
        }
        const mode: Mode = requested;
        io.out(`${mode.toUpperCase()}: ${MODE_DESCRIPTIONS[mode]}`);
        for (const tool of new ToolRegistry().list(mode)) {
          io.out(`  ${tool.name.padEnd(14)} [${tool.safety}] ${tool.description}`);
        }
      })
    );

  program
    .command("complexity")
    .description("Score a request the way the agent loop would")
    .argument("<text...>", "Request text")
    .option("--history <n>", "Number of earlier user turns", parseNonNegativeInt, 0)
    .action((words: string[], opts: { history: number }) =>
      run(async () => {
        const global = program.opts<GlobalOptions>();
        const config = resolveConfig(global, await resolveWorkspace(global));
        const estimator = new ComplexityEstimator();
        const score = estimator.score(words.join(" "), opts.history);
        io.out(estimator.explain(score, config.complexity_threshold));
      })
    );

  program
    .command("config")
    .description("Print the resolved configuration")
    .action(() =>
      run(async () => {
        const global = program.opts<GlobalOptions>();
        const config = resolveConfig(global, await resolveWorkspace(global));
        io.out(JSON.stringify(config, null, 2));
      })
    );

  program
    .command("sessions")
    .description("List saved sessions, newest first")
    .option("-l, --limit <n>", "Maximum sessions to show", parsePositiveInt, 20)
    .action((opts: { limit: number }) =>
      run(async () => {
        const workspace = await resolveWorkspace(program.opts<GlobalOptions>());
        const sessions = await new FileSessionStore(workspace.root).list(opts.limit);
        if (sessions.length === 0) {
          io.out("No saved sessions");
          return;
        }
        for (const s of sessions) {
          io.out(`${s.id}  ${s.updatedAt}  ${s.name} (${s.turnCount} turns)`);
          if (s.summary) io.out(`    ${s.summary.slice(0, 60)}`);
        }
      })
    );

  program
    .command("show")
    .description("Print the turns of a saved session")
    .argument("<sessionId>", "Session id")
    .action((sessionId: string) =>
      run(async () => {
        const workspace = await resolveWorkspace(program.opts<GlobalOptions>());
        const session = await new FileSessionStore(workspace.root).load(sessionId);
        io.out(`${session.id}  ${session.name ?? ""}`.trimEnd());
        for (const turn of session.turns) {
          io.out(`[${turn.index}] ${turn.role} (${turn.mode}): ${turn.content}`);
          for (const call of turn.toolCalls) {
            const status = call.result
              ? call.result.ok
                ? "ok"
                : `error ${call.result.error?.kind ?? ""}`.trimEnd()
              : "pending";
            io.out(`    -> ${call.name} ${status}`);
          }
        }
      })
    );

  const applyHistory = (direction: "undo" | "redo") => (sessionId: string) =>
    run(async () => {
      const workspace = await resolveWorkspace(program.opts<GlobalOptions>());
      const store = new FileSessionStore(workspace.root);
      const session = await store.load(sessionId);
      const checkpoints = new CheckpointManager(new GitVersionControl(workspace));
      checkpoints.restoreState(session.checkpointState());
      const checkpoint = direction === "undo" ? await checkpoints.undo() : await checkpoints.redo();
      session.setCheckpointState(checkpoints.getState());
      await store.save(session);
      io.out(`${direction === "undo" ? "Restored" : "Re-applied"} checkpoint ${checkpoint.ref.slice(0, 12)} (${checkpoint.reason})`);
    });

  program
    .command("undo")
    .description("Restore the workspace to the session's latest checkpoint")
    .argument("<sessionId>", "Session id")
    .action(applyHistory("undo"));

  program
    .command("redo")
    .description("Re-apply the most recently undone checkpoint")
    .argument("<sessionId>", "Session id")
    .action(applyHistory("redo"));

  return program;
}
