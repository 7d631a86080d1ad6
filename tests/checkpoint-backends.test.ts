import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { existsSync } from "node:fs";
import { mkdir, readFile, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { CHECKPOINT_PREFIX, GitVersionControl, type GitRunner } from "../src/checkpoint/git.js";
import { SnapshotVersionControl } from "../src/checkpoint/snapshot.js";
import { CoreError } from "../src/protocol/errors.js";
import type { Workspace } from "../src/protocol/types.js";
import { createTempWorkspace, type TempWorkspace } from "./helpers.js";

let temp: TempWorkspace;
let workspace: Workspace;

beforeEach(async () => {
  temp = await createTempWorkspace();
  workspace = temp.workspace;
});

afterEach(async () => {
  await temp.cleanup();
});

describe("SnapshotVersionControl", () => {
  it("restores modified files and removes files created later", async () => {
    await writeFile(join(workspace.root, "a.txt"), "one");
    const vc = new SnapshotVersionControl(workspace);
    const ref = await vc.snapshot("Before write_file: a.txt");

    await writeFile(join(workspace.root, "a.txt"), "two");
    await writeFile(join(workspace.root, "b.txt"), "new");
    await vc.restore(ref);

    expect(ref).toMatch(/^snap-1-[0-9a-f]{12}$/);
    expect(await readFile(join(workspace.root, "a.txt"), "utf-8")).toBe("one");
    expect(existsSync(join(workspace.root, "b.txt"))).toBe(false);
  });

  it("brings back deleted files in nested directories", async () => {
    await mkdir(join(workspace.root, "src", "lib"), { recursive: true });
    await writeFile(join(workspace.root, "src", "lib", "util.ts"), "export const x = 1;\n");
    const vc = new SnapshotVersionControl(workspace);
    const ref = await vc.snapshot("Before bash: rm -r src");

    await rm(join(workspace.root, "src"), { recursive: true });
    await vc.restore(ref);

    expect(await readFile(join(workspace.root, "src", "lib", "util.ts"), "utf-8")).toBe("export const x = 1;\n");
  });

  it("leaves workspace state files alone", async () => {
    const vc = new SnapshotVersionControl(workspace);
    const ref = await vc.snapshot("empty");

    await mkdir(join(workspace.root, ".helmsman", "sessions"), { recursive: true });
    await writeFile(join(workspace.root, ".helmsman", "sessions", "s.json"), "{}");
    await vc.restore(ref);

    expect(existsSync(join(workspace.root, ".helmsman", "sessions", "s.json"))).toBe(true);
  });

  it("gives unchanged trees distinct refs with the same content hash", async () => {
    await writeFile(join(workspace.root, "a.txt"), "same");
    const vc = new SnapshotVersionControl(workspace);

    const first = await vc.snapshot("first");
    const second = await vc.snapshot("second");

    expect(first).not.toBe(second);
    expect(first.slice("snap-1-".length)).toBe(second.slice("snap-2-".length));
  });

  it("reverts writes under build output directories", async () => {
    const vc = new SnapshotVersionControl(workspace);
    const ref = await vc.snapshot("Before write_file: build/out.txt");

    await mkdir(join(workspace.root, "build"), { recursive: true });
    await writeFile(join(workspace.root, "build", "out.txt"), "generated");
    await mkdir(join(workspace.root, "dist"), { recursive: true });
    await writeFile(join(workspace.root, "dist", "index.js"), "bundle");
    await vc.restore(ref);

    expect(existsSync(join(workspace.root, "build", "out.txt"))).toBe(false);
    expect(existsSync(join(workspace.root, "dist", "index.js"))).toBe(false);
  });

  it("only holds refs taken in this process", async () => {
    const vc = new SnapshotVersionControl(workspace);
    const ref = await vc.snapshot("first");

    expect(await vc.has(ref)).toBe(true);
    expect(await new SnapshotVersionControl(workspace).has(ref)).toBe(false);
  });

  it("rejects an unknown ref", async () => {
    const vc = new SnapshotVersionControl(workspace);
    await expect(vc.restore("snap-9-nope")).rejects.toThrow("Checkpoint failed: unknown snapshot snap-9-nope");
  });
});

describe("GitVersionControl", () => {
  function recordingRunner(): { calls: string[][]; run: GitRunner } {
    const calls: string[][] = [];
    const run: GitRunner = async (args) => {
      calls.push([...args]);
      if (args[0] === "rev-parse") return "abc123\n";
      if (args[0] === "log") {
        return `abc123|${CHECKPOINT_PREFIX} Before bash: make|2026-03-01T10:00:00+00:00\n`;
      }
      return "";
    };
    return { calls, run };
  }

  it("initializes a repository and commits the whole tree", async () => {
    const { calls, run } = recordingRunner();
    const vc = new GitVersionControl(workspace, run);

    const ref = await vc.snapshot("Before write_file: a.txt");

    expect(ref).toBe("abc123");
    expect(calls).toEqual([
      ["init", "--quiet"],
      ["add", "-A"],
      [
        "-c",
        "user.name=helmsman",
        "-c",
        "user.email=helmsman@localhost",
        "commit",
        "--quiet",
        "--allow-empty",
        "--no-verify",
        "-m",
        "[helmsman-checkpoint] Before write_file: a.txt",
      ],
      ["rev-parse", "HEAD"],
    ]);
  });

  it("skips init in an existing repository", async () => {
    await mkdir(join(workspace.root, ".git"));
    const { calls, run } = recordingRunner();

    await new GitVersionControl(workspace, run).snapshot("checkpoint");

    expect(calls[0]).toEqual(["add", "-A"]);
  });

  it("restores index and working tree to a commit", async () => {
    const { calls, run } = recordingRunner();

    await new GitVersionControl(workspace, run).restore("abc123");

    expect(calls).toEqual([["read-tree", "-u", "--reset", "abc123"]]);
  });

  it("wraps git failures as checkpoint failures", async () => {
    const failing: GitRunner = async () => {
      throw new Error("fatal: not a git repository");
    };
    const vc = new GitVersionControl(workspace, failing);

    const error = await vc.snapshot("Before bash: make").catch((e: unknown) => e);

    expect(error).toBeInstanceOf(CoreError);
    expect(error instanceof CoreError ? error.kind : undefined).toBe("checkpoint_failure");
    await expect(vc.restore("abc123")).rejects.toThrow("Checkpoint failed: git restore of abc123 failed");
  });

  it("checks that a checkpoint commit still exists", async () => {
    const { calls, run } = recordingRunner();
    expect(await new GitVersionControl(workspace, run).has("abc123")).toBe(true);
    expect(calls).toEqual([["cat-file", "-e", "abc123^{commit}"]]);

    const missing: GitRunner = async () => {
      throw new Error("fatal: Not a valid object name");
    };
    expect(await new GitVersionControl(workspace, missing).has("abc123")).toBe(false);
  });

  it("lists checkpoint commits", async () => {
    const { run } = recordingRunner();
    const checkpoints = await new GitVersionControl(workspace, run).listCheckpoints();

    expect(checkpoints).toEqual([
      { ref: "abc123", message: "Before bash: make", when: "2026-03-01T10:00:00+00:00" },
    ]);
  });
});
