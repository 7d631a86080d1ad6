/**
 * Tool Registry
 *
 * Static table of descriptors and their executable capabilities, built once
 * at construction. Lookups return result unions; nothing here throws for an
 * unknown name.
 */

import { isEligible } from "../mode/controller.js";
import { toolNotFound, type CoreError } from "../protocol/errors.js";
import type { Mode, ToolDescriptor } from "../protocol/types.js";
import { createLogger } from "../utils/logger.js";
import { bashTool } from "./bash.js";
import { BUILTIN_TOOL_DEFINITIONS } from "./definitions.js";
import { listDirTool, readFileTool, searchFilesTool } from "./read-tools.js";
import type { ToolCapability } from "./types.js";
import { editFileTool, writeFileTool } from "./write-tools.js";

const logger = createLogger("tools:registry");

export interface ToolEntry {
  descriptor: ToolDescriptor;
  capability: ToolCapability;
}

export type DescribeResult =
  | { ok: true; descriptor: ToolDescriptor }
  | { ok: false; error: CoreError };

const BUILTIN_CAPABILITIES: readonly ToolCapability[] = [
  readFileTool,
  listDirTool,
  searchFilesTool,
  writeFileTool,
  editFileTool,
  bashTool,
];

function freezeDescriptor(descriptor: ToolDescriptor): ToolDescriptor {
  return Object.freeze({
    ...descriptor,
    modes: Object.freeze([...descriptor.modes]),
    pathArgs: Object.freeze(descriptor.pathArgs.map((arg) => Object.freeze({ ...arg }))),
  });
}

/**
 * Pair the built-in descriptors with their capabilities.
 */
export function builtinToolEntries(): ToolEntry[] {
  return BUILTIN_TOOL_DEFINITIONS.map((descriptor) => {
    const capability = BUILTIN_CAPABILITIES.find((c) => c.name === descriptor.name);
    if (!capability) {
      throw new Error(`No capability registered for built-in tool '${descriptor.name}'`);
    }
    return { descriptor, capability };
  });
}

export class ToolRegistry {
  private entries = new Map<string, ToolEntry>();

  constructor(entries: readonly ToolEntry[] = builtinToolEntries()) {
    for (const entry of entries) {
      const name = entry.descriptor.name;
      if (this.entries.has(name)) {
        throw new Error(`Duplicate tool name: ${name}`);
      }
      if (entry.capability.name !== name) {
        throw new Error(`Capability '${entry.capability.name}' registered under descriptor '${name}'`);
      }
      this.entries.set(name, { descriptor: freezeDescriptor(entry.descriptor), capability: entry.capability });
    }
    logger.debug({ tools: [...this.entries.keys()] }, "Tool registry built");
  }

  describe(name: string): DescribeResult {
    const entry = this.entries.get(name);
    if (!entry) return { ok: false, error: toolNotFound(name) };
    return { ok: true, descriptor: entry.descriptor };
  }

  capability(name: string): ToolCapability | undefined {
    return this.entries.get(name)?.capability;
  }

  /**
   * Descriptors eligible in `mode`, in registration order.
   */
  list(mode: Mode): ToolDescriptor[] {
    return [...this.entries.values()]
      .map((entry) => entry.descriptor)
      .filter((descriptor) => isEligible(descriptor, mode));
  }

  all(): ToolDescriptor[] {
    return [...this.entries.values()].map((entry) => entry.descriptor);
  }
}
