/**
 * Bash tool - runs a shell command in the workspace root.
 *
 * Commands are classified before dispatch: a command that matches a configured
 * safe entry, with no shell operators, counts as read-only.
 * Catastrophic commands are refused outright. The child runs in its own
 * process group so an aborted call takes its descendants down with it.
 */

import { spawn } from "node:child_process";
import { z } from "zod";
import { CoreError, permissionDenied, toolExecutionError } from "../protocol/errors.js";
import type { SafetyClass } from "../protocol/types.js";
import { createLogger } from "../utils/logger.js";
import { parseArgs, truncateLines } from "./args.js";
import { TOOL_NAMES } from "./definitions.js";
import type { ToolCapability, ToolOutcome } from "./types.js";

const logger = createLogger("tool:bash");

export interface BlockedPattern {
  pattern: RegExp;
  reason: string;
}

// Never executed, whatever the user answers
const BLOCKED_PATTERNS: BlockedPattern[] = [
  { pattern: /^rm\s+.*-rf\s+\/$/, reason: "Attempts to delete root filesystem" },
  { pattern: /^rm\s+.*-rf\s+\/\s/, reason: "Attempts to delete root filesystem" },
  { pattern: /^dd\s+.*of=\/dev\//, reason: "Raw disk write operations" },
  { pattern: /^mkfs/, reason: "Filesystem creation" },
  { pattern: /^fdisk/, reason: "Disk partitioning" },
  { pattern: /^shutdown/, reason: "System shutdown" },
  { pattern: /^reboot/, reason: "System reboot" },
  { pattern: /^halt/, reason: "System halt" },
  { pattern: /^poweroff/, reason: "System poweroff" },
  { pattern: /:\(\)\s*\{\s*:\|:&\s*\}\s*;\s*:/, reason: "Fork bomb" },
];

// Chaining, piping, redirection and substitution make a prefix match meaningless
const SHELL_OPERATORS = /[;&|<>`\n]|\$\(/;

// Safe-list entries that may take further arguments. Anything else on the
// list (find, fd, git branch, ...) only counts as read-only when run bare.
const READ_ONLY_PREFIXES = new Set([
  "ls", "pwd", "cat", "head", "tail", "less", "more", "wc", "file", "tree",
  "echo", "which", "whoami", "date", "grep",
  "git status", "git log", "git diff", "git show",
]);

// Flags that make an otherwise read-only command write a file
const OUTPUT_FLAG = /^(-o|--output(=.*)?)$/;

/**
 * Returns the reason a command is refused, or null.
 */
export function blockedReason(command: string): string | null {
  const trimmed = command.trim();
  const hit = BLOCKED_PATTERNS.find((p) => p.pattern.test(trimmed));
  return hit ? hit.reason : null;
}

/**
 * True when the command exactly matches a safe entry, or extends one of the
 * read-only prefixes without an output flag.
 */
export function isReadOnlyCommand(command: string, safeCommands: readonly string[]): boolean {
  const normalized = command.trim().replace(/\s+/g, " ").toLowerCase();
  if (normalized === "" || SHELL_OPERATORS.test(normalized)) return false;
  return safeCommands.some((entry) => {
    const p = entry.trim().replace(/\s+/g, " ").toLowerCase();
    if (normalized === p) return true;
    if (!READ_ONLY_PREFIXES.has(p) || !normalized.startsWith(`${p} `)) return false;
    return !normalized.split(" ").some((token) => OUTPUT_FLAG.test(token));
  });
}

const BashArgs = z.object({
  command: z.string().min(1),
});

interface RunResult {
  exitCode: number | null;
  stdout: string;
  stderr: string;
  aborted: boolean;
}

function runShell(command: string, cwd: string, signal: AbortSignal): Promise<RunResult> {
  return new Promise((resolvePromise, reject) => {
    if (signal.aborted) {
      resolvePromise({ exitCode: null, stdout: "", stderr: "", aborted: true });
      return;
    }

    const child = spawn("/bin/sh", ["-c", command], {
      cwd,
      detached: true,
      stdio: ["ignore", "pipe", "pipe"],
    });

    let stdout = "";
    let stderr = "";
    let settled = false;

    const killGroup = (): void => {
      if (child.pid === undefined) return;
      try {
        process.kill(-child.pid, "SIGKILL");
      } catch (error) {
        logger.debug({ pid: child.pid, error: String(error) }, "Process group already gone");
      }
    };

    const onAbort = (): void => {
      killGroup();
      if (settled) return;
      settled = true;
      child.stdout.destroy();
      child.stderr.destroy();
      resolvePromise({ exitCode: null, stdout, stderr, aborted: true });
    };

    signal.addEventListener("abort", onAbort, { once: true });

    child.stdout.setEncoding("utf-8");
    child.stderr.setEncoding("utf-8");
    child.stdout.on("data", (chunk: string) => {
      stdout += chunk;
    });
    child.stderr.on("data", (chunk: string) => {
      stderr += chunk;
    });

    child.on("error", (error) => {
      signal.removeEventListener("abort", onAbort);
      if (settled) return;
      settled = true;
      reject(error);
    });

    child.on("close", (code) => {
      signal.removeEventListener("abort", onAbort);
      if (settled) return;
      settled = true;
      resolvePromise({ exitCode: code, stdout, stderr, aborted: false });
    });
  });
}

export const bashTool: ToolCapability = {
  name: TOOL_NAMES.BASH,

  classify(args, safeCommands): SafetyClass | undefined {
    const command = args.command;
    if (typeof command !== "string") return undefined;
    return isReadOnlyCommand(command, safeCommands) ? "safe" : undefined;
  },

  async invoke(args, ctx): Promise<ToolOutcome> {
    const parsed = parseArgs(TOOL_NAMES.BASH, BashArgs, args);
    if (!parsed.ok) return parsed;

    const { command } = parsed.data;
    const blocked = blockedReason(command);
    if (blocked) {
      logger.warn({ command, reason: blocked }, "Blocked command refused");
      return { ok: false, error: permissionDenied(TOOL_NAMES.BASH, `blocked command (${blocked})`) };
    }

    const startTime = performance.now();
    let result: RunResult;
    try {
      result = await runShell(command, ctx.workspace.root, ctx.signal);
    } catch (error) {
      return { ok: false, error: toolExecutionError(TOOL_NAMES.BASH, `Failed to spawn: ${command}`, error) };
    }

    if (result.aborted) {
      return {
        ok: false,
        error: new CoreError("cancelled", `Command aborted: ${command}`, { details: { tool: TOOL_NAMES.BASH } }),
      };
    }

    let output = result.stdout.replace(/\n$/, "");
    if (result.stderr) {
      output += `\n[stderr]\n${result.stderr.replace(/\n$/, "")}`;
    }
    output = truncateLines(output);

    logger.debug(
      { command, exitCode: result.exitCode, durationMs: Math.round(performance.now() - startTime) },
      "Command finished"
    );

    if (result.exitCode === 0) {
      return { ok: true, output };
    }
    return {
      ok: false,
      error: toolExecutionError(TOOL_NAMES.BASH, `Exit code ${result.exitCode ?? "unknown"}\n${output}`),
    };
  },
};
