import { describe, it, expect } from "vitest";
import { CheckpointManager } from "../src/checkpoint/manager.js";
import { CoreError } from "../src/protocol/errors.js";
import { FakeVersionControl } from "./helpers.js";

async function expectKind(promise: Promise<unknown>, kind: string): Promise<CoreError> {
  const error = await promise.then(
    () => {
      throw new Error(`expected a ${kind} rejection`);
    },
    (e: unknown) => e
  );
  expect(error).toBeInstanceOf(CoreError);
  if (!(error instanceof CoreError)) throw error;
  expect(error.kind).toBe(kind);
  return error;
}

describe("CheckpointManager", () => {
  it("takes at most one checkpoint per turn, even under concurrent calls", async () => {
    const vc = new FakeVersionControl();
    const manager = new CheckpointManager(vc);
    manager.beginTurn(1);

    const [a, b] = await Promise.all([
      manager.ensureCheckpoint("Before write_file: a.txt"),
      manager.ensureCheckpoint("Before write_file: b.txt"),
    ]);
    const c = await manager.ensureCheckpoint("Before bash: make");

    expect(a?.ref).toBe("ref-1");
    expect(b?.ref).toBe("ref-1");
    expect(c?.ref).toBe("ref-1");
    expect(a?.turnIndex).toBe(1);
    expect(vc.snapshots).toEqual(["Before write_file: a.txt"]);
  });

  it("takes a fresh checkpoint in the next turn", async () => {
    const vc = new FakeVersionControl();
    const manager = new CheckpointManager(vc);

    manager.beginTurn(0);
    await manager.ensureCheckpoint("first");
    manager.beginTurn(3);
    const second = await manager.ensureCheckpoint("second");

    expect(second).toMatchObject({ ref: "ref-2", reason: "second", turnIndex: 3 });
    expect(manager.listCheckpoints().map((c) => c.ref)).toEqual(["ref-1", "ref-2"]);
  });

  it("returns null when disabled or without a backend", async () => {
    const vc = new FakeVersionControl();
    const disabled = new CheckpointManager(vc, { enabled: false });

    expect(await disabled.ensureCheckpoint("ignored")).toBeNull();
    expect(disabled.enabled).toBe(false);
    expect(vc.snapshots).toEqual([]);
    expect(await new CheckpointManager(null).ensureCheckpoint("ignored")).toBeNull();
  });

  it("lets a turn retry after a failed snapshot", async () => {
    const vc = new FakeVersionControl();
    const manager = new CheckpointManager(vc);
    vc.failNext = true;

    const error = await expectKind(manager.ensureCheckpoint("Before write_file: a.txt"), "checkpoint_failure");
    expect(error.message).toBe("Checkpoint failed: Before write_file: a.txt");

    const retried = await manager.ensureCheckpoint("Before write_file: a.txt");
    expect(retried?.ref).toBe("ref-1");
  });

  it("undoes by saving the current state first, then redoes to it", async () => {
    const vc = new FakeVersionControl();
    const manager = new CheckpointManager(vc);
    await manager.ensureCheckpoint("Before write_file: a.txt");

    const undone = await manager.undo();

    expect(undone.ref).toBe("ref-1");
    expect(vc.snapshots).toEqual(["Before write_file: a.txt", "Before undo of ref-1"]);
    expect(vc.restores).toEqual(["ref-1"]);
    expect(manager.canUndo()).toBe(false);
    expect(manager.canRedo()).toBe(true);

    const redone = await manager.redo();

    expect(redone.ref).toBe("ref-1");
    expect(vc.restores).toEqual(["ref-1", "ref-2"]);
    expect(manager.canUndo()).toBe(true);
    expect(manager.canRedo()).toBe(false);
  });

  it("reports empty undo and redo stacks", async () => {
    const manager = new CheckpointManager(new FakeVersionControl());

    const undo = await expectKind(manager.undo(), "nothing_to_undo");
    expect(undo.message).toBe("No checkpoint to undo");
    const redo = await expectKind(manager.redo(), "nothing_to_redo");
    expect(redo.message).toBe("No undone checkpoint to redo");
  });

  it("clears the redo stack when a new checkpoint is taken", async () => {
    const manager = new CheckpointManager(new FakeVersionControl());
    await manager.ensureCheckpoint("first");
    await manager.undo();

    manager.beginTurn(1);
    await manager.ensureCheckpoint("second");

    expect(manager.canRedo()).toBe(false);
  });

  it("restores undo and redo stacks from persisted state", async () => {
    const manager = new CheckpointManager(new FakeVersionControl());
    await manager.ensureCheckpoint("first");
    manager.beginTurn(1);
    await manager.ensureCheckpoint("second");
    await manager.undo();

    const state = manager.getState();
    expect(state.events.map((e) => e.type)).toEqual(["created", "created", "undone"]);

    const vc = new FakeVersionControl();
    const restored = new CheckpointManager(vc);
    restored.restoreState(state);

    expect(restored.listCheckpoints().map((c) => c.reason)).toEqual(["first"]);
    expect(restored.canRedo()).toBe(true);

    await restored.redo();
    // The redo target is the state saved before the undo
    expect(vc.restores).toEqual(["ref-3"]);
  });

  it("refuses to undo a checkpoint the backend no longer holds", async () => {
    const vc = new FakeVersionControl();
    const manager = new CheckpointManager(vc);
    await manager.ensureCheckpoint("Before write_file: a.txt");
    vc.lost.add("ref-1");

    const error = await expectKind(manager.undo(), "checkpoint_failure");

    expect(error.message).toBe("Checkpoint failed: checkpoint ref-1 is no longer available in the fake backend");
    expect(vc.snapshots).toEqual(["Before write_file: a.txt"]);
    expect(vc.restores).toEqual([]);
    expect(manager.canUndo()).toBe(true);
  });

  it("refuses to redo when the saved state is gone", async () => {
    const vc = new FakeVersionControl();
    const manager = new CheckpointManager(vc);
    await manager.ensureCheckpoint("first");
    await manager.undo();
    vc.lost.add("ref-2");

    await expectKind(manager.redo(), "checkpoint_failure");
    expect(vc.restores).toEqual(["ref-1"]);
    expect(manager.canRedo()).toBe(true);
  });
});
