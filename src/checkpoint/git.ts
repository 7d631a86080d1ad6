/**
 * Git-backed version control.
 *
 * Every checkpoint is a commit of the whole working tree (`add -A`), so the
 * ref is a commit hash. Restoring resets index and working tree to that
 * commit, which also removes files created after it.
 */

import { execFile } from "node:child_process";
import { existsSync } from "node:fs";
import { join } from "node:path";
import { promisify } from "node:util";
import { checkpointFailure } from "../protocol/errors.js";
import type { CheckpointRef, Workspace } from "../protocol/types.js";
import { createLogger } from "../utils/logger.js";
import type { VersionControl } from "./types.js";

const logger = createLogger("checkpoint:git");
const execFileAsync = promisify(execFile);

export const CHECKPOINT_PREFIX = "[helmsman-checkpoint]";

// Commits must succeed in repos without a configured identity
const IDENTITY_ARGS = ["-c", "user.name=helmsman", "-c", "user.email=helmsman@localhost"];

export type GitRunner = (args: readonly string[], cwd: string) => Promise<string>;

export const execGit: GitRunner = async (args, cwd) => {
  const { stdout } = await execFileAsync("git", [...args], { cwd, maxBuffer: 10 * 1024 * 1024 });
  return stdout;
};

export class GitVersionControl implements VersionControl {
  readonly kind = "git";

  constructor(
    private readonly workspace: Workspace,
    private readonly run: GitRunner = execGit
  ) {}

  private async git(...args: string[]): Promise<string> {
    return this.run(args, this.workspace.root);
  }

  isRepo(): boolean {
    return existsSync(join(this.workspace.root, ".git"));
  }

  async ensureRepo(): Promise<void> {
    if (this.isRepo()) return;
    await this.git("init", "--quiet");
    logger.info({ root: this.workspace.root }, "Initialized git repository");
  }

  async snapshot(reason: string): Promise<CheckpointRef> {
    try {
      await this.ensureRepo();
      await this.git("add", "-A");
      await this.git(...IDENTITY_ARGS, "commit", "--quiet", "--allow-empty", "--no-verify", "-m", `${CHECKPOINT_PREFIX} ${reason}`);
      const ref = (await this.git("rev-parse", "HEAD")).trim();
      logger.info({ ref, reason }, "Checkpoint committed");
      return ref;
    } catch (error) {
      throw checkpointFailure(`git snapshot failed: ${reason}`, error);
    }
  }

  async restore(ref: CheckpointRef): Promise<void> {
    try {
      await this.git("read-tree", "-u", "--reset", ref);
      logger.info({ ref }, "Checkpoint restored");
    } catch (error) {
      throw checkpointFailure(`git restore of ${ref} failed`, error);
    }
  }

  async has(ref: CheckpointRef): Promise<boolean> {
    try {
      await this.git("cat-file", "-e", `${ref}^{commit}`);
      return true;
    } catch (error) {
      logger.debug({ ref, error: String(error) }, "Checkpoint commit not found");
      return false;
    }
  }

  /**
   * Recent checkpoint commits, newest first.
   */
  async listCheckpoints(limit: number = 10): Promise<Array<{ ref: string; message: string; when: string }>> {
    const out = await this.git("log", `--grep=${CHECKPOINT_PREFIX}`, "--fixed-strings", `-n${limit}`, "--pretty=format:%H|%s|%cI");
    return out
      .split("\n")
      .filter((line) => line.length > 0)
      .map((line) => {
        const [ref = "", subject = "", when = ""] = line.split("|");
        return { ref, message: subject.replace(CHECKPOINT_PREFIX, "").trim(), when };
      });
  }
}
