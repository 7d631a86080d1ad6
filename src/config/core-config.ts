import { z } from "zod";
import { readFileSync, existsSync } from "node:fs";
import { homedir } from "node:os";
import { join, resolve } from "node:path";
import { CoreError } from "../protocol/errors.js";
import { MODES } from "../protocol/types.js";

export const CONFIG_DIR_NAME = ".helmsman";
export const CONFIG_FILE_NAME = "config.json";

export const DEFAULT_SAFE_COMMANDS = [
  "ls", "pwd", "cat", "head", "tail", "less", "wc", "file", "tree",
  "echo", "which", "whoami", "date",
  "find", "grep", "rg", "fd",
  "git status", "git log", "git diff", "git branch", "git show",
  "node --version", "npm --version", "npm ls",
];

// Zod schema for core configuration
const CoreConfigSchema = z.object({
  // Operating mode
  default_mode: z.enum(MODES).default("plan"),

  // Complexity escalation
  complexity_threshold: z.number().min(0).max(1).default(0.6),
  auto_plan: z.boolean().default(true),

  // Execution
  auto_execute_safe: z.boolean().default(true),
  safe_commands: z.array(z.string().min(1)).default(DEFAULT_SAFE_COMMANDS),
  denied_tools: z.array(z.string()).default([]),
  tool_timeout_ms: z.number().int().positive().default(30_000),
  tool_timeouts: z.record(z.number().int().positive()).default({}),
  max_concurrent_reads: z.number().int().positive().default(4),
  max_iterations: z.number().int().positive().default(10),
  require_exploration: z.boolean().default(true),

  // Checkpoints
  checkpoint_enabled: z.boolean().default(true),
  checkpoint_backend: z.enum(["git", "snapshot"]).default("git"),
});

const PartialCoreConfigSchema = CoreConfigSchema.partial();

export type CoreConfig = z.infer<typeof CoreConfigSchema>;
export type PartialCoreConfig = z.infer<typeof PartialCoreConfigSchema>;

export const DEFAULT_CORE_CONFIG: CoreConfig = CoreConfigSchema.parse({});

export function globalConfigPath(): string {
  return join(homedir(), CONFIG_DIR_NAME, CONFIG_FILE_NAME);
}

export function workspaceConfigPath(workspaceRoot: string): string {
  return join(workspaceRoot, CONFIG_DIR_NAME, CONFIG_FILE_NAME);
}

/**
 * Load a partial configuration layer from a JSON file.
 */
export function loadConfigFile(configPath: string): PartialCoreConfig {
  const absolutePath = resolve(configPath);

  if (!existsSync(absolutePath)) {
    throw new CoreError("config_error", `Config file not found: ${absolutePath}`, {
      details: { path: absolutePath },
    });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(absolutePath, "utf-8"));
  } catch (error) {
    throw new CoreError("config_error", `Config file is not valid JSON: ${absolutePath}`, {
      details: { path: absolutePath },
      cause: error,
    });
  }

  const parsed = PartialCoreConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new CoreError("config_error", `Invalid config in ${absolutePath}`, {
      details: { path: absolutePath, issues: parsed.error.issues },
    });
  }
  return parsed.data;
}

/**
 * Validate a complete configuration object
 */
export function validateCoreConfig(rawConfig: unknown): {
  valid: boolean;
  errors?: z.ZodError;
  config?: CoreConfig;
} {
  try {
    const config = CoreConfigSchema.parse(rawConfig);
    return { valid: true, config };
  } catch (error) {
    if (error instanceof z.ZodError) {
      return { valid: false, errors: error };
    }
    throw error;
  }
}

function parseBoolean(value: string): boolean | undefined {
  const v = value.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(v)) return true;
  if (["0", "false", "no", "off"].includes(v)) return false;
  return undefined;
}

/**
 * Read the HELMSMAN_* environment overrides. Unparseable values are ignored.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): PartialCoreConfig {
  const layer: PartialCoreConfig = {};

  const mode = env.HELMSMAN_MODE?.toLowerCase();
  if (mode === "plan" || mode === "build" || mode === "review") {
    layer.default_mode = mode;
  }
  if (env.HELMSMAN_COMPLEXITY_THRESHOLD !== undefined) {
    const n = Number(env.HELMSMAN_COMPLEXITY_THRESHOLD);
    if (Number.isFinite(n)) layer.complexity_threshold = n;
  }
  if (env.HELMSMAN_TOOL_TIMEOUT_MS !== undefined) {
    const n = Number.parseInt(env.HELMSMAN_TOOL_TIMEOUT_MS, 10);
    if (Number.isFinite(n)) layer.tool_timeout_ms = n;
  }
  if (env.HELMSMAN_AUTO_EXECUTE_SAFE !== undefined) {
    const b = parseBoolean(env.HELMSMAN_AUTO_EXECUTE_SAFE);
    if (b !== undefined) layer.auto_execute_safe = b;
  }
  if (env.HELMSMAN_REQUIRE_EXPLORATION !== undefined) {
    const b = parseBoolean(env.HELMSMAN_REQUIRE_EXPLORATION);
    if (b !== undefined) layer.require_exploration = b;
  }
  if (env.HELMSMAN_CHECKPOINT_ENABLED !== undefined) {
    const b = parseBoolean(env.HELMSMAN_CHECKPOINT_ENABLED);
    if (b !== undefined) layer.checkpoint_enabled = b;
  }

  return layer;
}

function defined(layer: PartialCoreConfig): PartialCoreConfig {
  return PartialCoreConfigSchema.parse(
    Object.fromEntries(Object.entries(layer).filter(([, value]) => value !== undefined))
  );
}

/**
 * Merge config layers.
 * Priority: overrides > env > workspace file > global file > defaults
 */
export function mergeCoreConfig(options: {
  workspaceRoot?: string;
  globalConfig?: string | false;
  config?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: PartialCoreConfig;
} = {}): CoreConfig {
  // Start with defaults
  let config: CoreConfig = { ...DEFAULT_CORE_CONFIG };

  const globalPath = options.globalConfig === false ? null : (options.globalConfig ?? globalConfigPath());
  if (globalPath && existsSync(globalPath)) {
    config = { ...config, ...loadConfigFile(globalPath) };
  }

  if (options.workspaceRoot) {
    const localPath = workspaceConfigPath(options.workspaceRoot);
    if (existsSync(localPath)) {
      config = { ...config, ...loadConfigFile(localPath) };
    }
  }

  // An explicitly named file must exist
  if (options.config) {
    config = { ...config, ...loadConfigFile(options.config) };
  }

  config = { ...config, ...configFromEnv(options.env ?? process.env) };

  if (options.overrides) {
    config = { ...config, ...defined(options.overrides) };
  }

  // Final validation
  const result = CoreConfigSchema.safeParse(config);
  if (!result.success) {
    throw new CoreError("config_error", "Invalid merged configuration", {
      details: { issues: result.error.issues },
    });
  }
  return result.data;
}
