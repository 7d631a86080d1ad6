import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { existsSync } from "node:fs";
import { join } from "node:path";
import { AgentLoop } from "../src/agent/loop.js";
import {
  ScriptedModelDriver,
  StaticModeAdvisor,
  type AdvisorAnswer,
  type ConverseResponse,
  type ModelDriver,
} from "../src/agent/driver.js";
import type { PartialCoreConfig } from "../src/config/core-config.js";
import { ScriptedConfirmProvider, type ConfirmationProvider } from "../src/permissions/confirm.js";
import type { Mode } from "../src/protocol/types.js";
import { Session } from "../src/session/session.js";
import { MemorySessionStore } from "../src/session/store.js";
import { createTempWorkspace, FakeVersionControl, testConfig, type TempWorkspace } from "./helpers.js";

const COMPLEX_REQUEST =
  "Refactor the entire auth module and then migrate every handler in src/auth/login.ts and src/auth/session.ts";

const WRITE_NOTES: ConverseResponse = {
  text: "Writing notes",
  proposedToolCalls: [{ id: "c1", name: "write_file", args: { path: "notes.txt", content: "hello" } }],
};

const DONE: ConverseResponse = { text: "Done", proposedToolCalls: [] };

let temp: TempWorkspace;

beforeEach(async () => {
  temp = await createTempWorkspace();
});

afterEach(async () => {
  await temp.cleanup();
});

function setup(options: {
  responses?: ConverseResponse[];
  driver?: ModelDriver;
  advisor?: AdvisorAnswer;
  confirm?: ConfirmationProvider;
  mode?: Mode;
  priorUserTurns?: number;
  config?: PartialCoreConfig;
} = {}) {
  const session = Session.create({ mode: options.mode ?? "build" });
  for (let i = 0; i < (options.priorUserTurns ?? 0); i++) {
    session.appendTurn({ role: "user", content: `earlier request ${i}` });
  }
  const driver = new ScriptedModelDriver(options.responses ?? []);
  const advisor = new StaticModeAdvisor(options.advisor ?? "reject");
  const store = new MemorySessionStore();
  const vc = new FakeVersionControl();
  const loop = new AgentLoop({
    session,
    workspace: temp.workspace,
    config: testConfig(options.config),
    driver: options.driver ?? driver,
    advisor,
    confirm: options.confirm ?? new ScriptedConfirmProvider(["allow-once"]),
    store,
    versionControl: vc,
  });
  return { loop, session, driver, advisor, store, vc };
}

describe("AgentLoop", () => {
  it("proceeds in BUILD when the planning suggestion is declined", async () => {
    const { loop, session, driver, advisor, store, vc } = setup({
      responses: [WRITE_NOTES, DONE],
      priorUserTurns: 6,
    });

    const outcome = await loop.runTurn(COMPLEX_REQUEST);

    expect(outcome.complexity.score).toBe(0.72);
    expect(outcome.recommendation?.reason).toBe("Complexity 0.72 meets threshold 0.60 (refactor, migrate, entire)");
    expect(outcome.accepted).toBe(false);
    expect(advisor.suggestions).toHaveLength(1);
    expect(loop.currentMode()).toBe("build");
    expect(outcome.results.map((r) => r.ok)).toEqual([true]);
    expect(outcome.assistantText).toBe("Done");
    expect(outcome.iterations).toBe(2);
    expect(existsSync(join(temp.workspace.root, "notes.txt"))).toBe(true);
    expect(vc.snapshots).toEqual(["Before write_file: notes.txt"]);
    expect(driver.requests[0]?.tools.map((t) => t.name)).toContain("write_file");

    const saved = await store.load(session.id);
    expect(saved.turns.map((t) => t.role)).toEqual([
      ...Array.from({ length: 6 }, () => "user"),
      "user",
      "assistant",
      "assistant",
    ]);
    expect(saved.turns[6]?.complexity?.score).toBe(0.72);
    expect(saved.turns[7]?.toolCalls[0]?.result?.checkpointRef).toBe("ref-1");
    expect(saved.checkpointState().events).toHaveLength(1);
  });

  it("switches to PLAN when the suggestion is accepted", async () => {
    const { loop, session, driver, vc } = setup({ responses: [WRITE_NOTES, DONE], advisor: "accept" });

    const outcome = await loop.runTurn(COMPLEX_REQUEST);

    expect(outcome.accepted).toBe(true);
    expect(loop.currentMode()).toBe("plan");
    expect(session.modeHistory[session.modeHistory.length - 1]?.reason).toBe("complexity");
    expect(driver.requests[0]?.mode).toBe("plan");
    expect(driver.requests[0]?.tools.map((t) => t.name)).toEqual(["read_file", "list_dir", "search_files"]);
    expect(outcome.results[0]?.error?.kind).toBe("mode_violation");
    expect(session.turns[0]?.mode).toBe("plan");
    expect(vc.snapshots).toEqual([]);
    expect(existsSync(join(temp.workspace.root, "notes.txt"))).toBe(false);
  });

  it("does not suggest planning below the threshold, outside BUILD or with auto_plan off", async () => {
    const simple = setup();
    expect((await simple.loop.runTurn("Fix the typo in README.md")).recommendation).toBeNull();

    const planning = setup({ mode: "plan" });
    expect((await planning.loop.runTurn(COMPLEX_REQUEST)).recommendation).toBeNull();

    const off = setup({ config: { auto_plan: false } });
    await off.loop.runTurn(COMPLEX_REQUEST);
    expect(off.advisor.suggestions).toEqual([]);
  });

  it("stops after a batch the user rejected", async () => {
    const { loop, driver } = setup({
      responses: [WRITE_NOTES, WRITE_NOTES, DONE],
      confirm: new ScriptedConfirmProvider(["deny"]),
    });

    const outcome = await loop.runTurn("write the notes");

    expect(outcome.iterations).toBe(1);
    expect(driver.requests).toHaveLength(1);
    expect(outcome.results[0]?.error?.kind).toBe("permission_denied");
  });

  it("answers a repeated call id in the same response without running it", async () => {
    const twice: ConverseResponse = {
      text: "Writing twice",
      proposedToolCalls: [
        { id: "c1", name: "write_file", args: { path: "a.txt", content: "a" } },
        { id: "c1", name: "write_file", args: { path: "b.txt", content: "b" } },
      ],
    };
    const { loop, session } = setup({ responses: [twice, DONE] });

    const outcome = await loop.runTurn("write both");

    expect(outcome.results.map((r) => r.error?.kind)).toEqual([undefined, "invalid_arguments"]);
    expect(session.turns[1]?.toolCalls.map((c) => c.result?.ok)).toEqual([true, false]);
    expect(existsSync(join(temp.workspace.root, "a.txt"))).toBe(true);
    expect(existsSync(join(temp.workspace.root, "b.txt"))).toBe(false);
  });

  it("stops at the iteration limit", async () => {
    const read: ConverseResponse = {
      text: "reading",
      proposedToolCalls: [{ id: "r", name: "list_dir", args: {} }],
    };
    const { loop } = setup({ responses: [read, read, read, DONE], config: { max_iterations: 2 } });

    const outcome = await loop.runTurn("look around");

    expect(outcome.iterations).toBe(2);
    expect(outcome.results).toHaveLength(2);
  });

  it("persists a cancelled turn", async () => {
    const { loop, session, driver, store } = setup({ responses: [WRITE_NOTES] });
    const controller = new AbortController();
    controller.abort();

    const outcome = await loop.runTurn("write the notes", { signal: controller.signal });

    expect(outcome.cancelled).toBe(true);
    expect(outcome.iterations).toBe(0);
    expect(driver.requests).toHaveLength(0);
    expect((await store.load(session.id)).turns.map((t) => t.content)).toEqual(["write the notes"]);
  });

  it("persists the session when the driver fails", async () => {
    const failing: ModelDriver = {
      converse: async () => {
        throw new Error("driver offline");
      },
    };
    const { loop, session, store } = setup({ driver: failing });

    await expect(loop.runTurn("hello")).rejects.toThrow("driver offline");
    expect((await store.load(session.id)).turns).toHaveLength(1);
  });

  it("undoes and redoes the last checkpoint", async () => {
    const { loop, session, store, vc } = setup({ responses: [WRITE_NOTES, DONE] });
    await loop.runTurn("write the notes");

    const undone = await loop.undo();
    expect(undone.ref).toBe("ref-1");
    expect(vc.restores).toEqual(["ref-1"]);

    await loop.redo();
    expect(vc.restores).toEqual(["ref-1", "ref-2"]);
    expect((await store.load(session.id)).checkpointState().events.map((e) => e.type)).toEqual([
      "created",
      "undone",
      "redone",
    ]);
  });

  it("records explicit mode switches", async () => {
    const { loop, session, store } = setup({ mode: "plan" });

    await loop.setMode("build");

    expect(loop.currentMode()).toBe("build");
    expect((await store.load(session.id)).currentMode()).toBe("build");
  });
});
