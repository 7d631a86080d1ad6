/**
 * Basic Turn Demo
 *
 * Runs two user turns against a scripted model driver in a throwaway
 * workspace:
 * - A complex request that triggers a planning suggestion (declined)
 * - A write that is checkpointed, then undone
 *
 * Run with: npm run example
 */

import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  AgentLoop,
  MemorySessionStore,
  ScriptedConfirmProvider,
  ScriptedModelDriver,
  Session,
  StaticModeAdvisor,
  initWorkspace,
  mergeCoreConfig,
} from "../src/index.js";

async function main(): Promise<void> {
  const dir = await mkdtemp(join(tmpdir(), "helmsman-demo-"));
  try {
    const workspace = await initWorkspace(dir);
    await writeFile(join(workspace.root, "README.md"), "# Demo\n");

    const config = mergeCoreConfig({
      workspaceRoot: workspace.root,
      globalConfig: false,
      overrides: { default_mode: "build", checkpoint_backend: "snapshot" },
    });

    const driver = new ScriptedModelDriver([
      {
        text: "Let me read the README first.",
        proposedToolCalls: [{ id: "call-1", name: "read_file", args: { path: "README.md" } }],
      },
      {
        text: "Updating the README.",
        proposedToolCalls: [
          {
            id: "call-2",
            name: "write_file",
            args: { path: "README.md", content: "# Demo\n\nRewritten by the assistant.\n" },
          },
        ],
      },
      { text: "Done.", proposedToolCalls: [] },
    ]);

    const loop = new AgentLoop({
      session: Session.create({ mode: config.default_mode }),
      workspace,
      config,
      driver,
      advisor: new StaticModeAdvisor("reject"),
      confirm: new ScriptedConfirmProvider(["allow-once"]),
      store: new MemorySessionStore(),
    });

    console.log(`Workspace: ${workspace.root}`);
    console.log(`Mode: ${loop.currentMode().toUpperCase()}\n`);

    const outcome = await loop.runTurn(
      "Refactor the entire README and then rewrite every section in README.md and docs/intro.md"
    );

    console.log(`Complexity: ${outcome.complexity.score.toFixed(2)}`);
    if (outcome.recommendation) {
      console.log(`Suggestion: ${outcome.recommendation.reason} (declined)`);
    }
    for (const result of outcome.results) {
      const status = result.ok ? "ok" : `error ${result.error?.kind ?? ""}`;
      console.log(`  ${result.tool} [${status}]${result.checkpointRef ? ` checkpoint ${result.checkpointRef}` : ""}`);
    }
    console.log(`Assistant: ${outcome.assistantText}\n`);

    console.log("README after turn:");
    console.log(await readFile(join(workspace.root, "README.md"), "utf-8"));

    const undone = await loop.undo();
    console.log(`Undid checkpoint ${undone.ref} (${undone.reason})`);
    console.log(await readFile(join(workspace.root, "README.md"), "utf-8"));
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
