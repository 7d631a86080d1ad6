/**
 * Tool Definitions
 *
 * Static descriptors for all built-in tools. The `input_schema` objects are
 * handed to the model driver unchanged; `modes`, `safety`, `mutating` and
 * `pathArgs` drive dispatch policy.
 */

import type { ToolDescriptor } from "../protocol/types.js";

// ===========================================================================
// Read Tools
// ===========================================================================

export const READ_FILE_DEFINITION: ToolDescriptor = {
  name: "read_file",
  description: "Read a text file from the workspace. Optionally limit to a line range.",
  input_schema: {
    type: "object",
    properties: {
      path: {
        type: "string",
        description: "File path (absolute or relative to the workspace root)",
      },
      offset: {
        type: "number",
        description: "1-based line to start from (default: 1)",
      },
      limit: {
        type: "number",
        description: "Maximum number of lines to return (default: 2000)",
      },
    },
    required: ["path"],
  },
  modes: ["plan", "build", "review"],
  safety: "safe",
  mutating: false,
  pathArgs: [{ name: "path", mustExist: true }],
  explores: "file",
  maxLatencyMs: 5_000,
};

export const LIST_DIR_DEFINITION: ToolDescriptor = {
  name: "list_dir",
  description: "List the entries of a workspace directory. Directories end with '/'.",
  input_schema: {
    type: "object",
    properties: {
      path: {
        type: "string",
        description: "Directory path (default: workspace root)",
      },
    },
  },
  modes: ["plan", "build", "review"],
  safety: "safe",
  mutating: false,
  pathArgs: [{ name: "path", mustExist: true, optional: true }],
  explores: "directory",
  maxLatencyMs: 5_000,
};

export const SEARCH_FILES_DEFINITION: ToolDescriptor = {
  name: "search_files",
  description: "Search workspace files for a regular expression. Returns 'path:line: text' matches.",
  input_schema: {
    type: "object",
    properties: {
      pattern: {
        type: "string",
        description: "JavaScript regular expression to search for",
      },
      path: {
        type: "string",
        description: "Directory to search under (default: workspace root)",
      },
      max_results: {
        type: "number",
        description: "Stop after this many matches (default: 100)",
      },
    },
    required: ["pattern"],
  },
  modes: ["plan", "build", "review"],
  safety: "safe",
  mutating: false,
  pathArgs: [{ name: "path", mustExist: true, optional: true }],
  explores: "directory",
  maxLatencyMs: 15_000,
};

// ===========================================================================
// Write Tools
// ===========================================================================

export const WRITE_FILE_DEFINITION: ToolDescriptor = {
  name: "write_file",
  description: "Create or overwrite a file in the workspace. Parent directories are created as needed.",
  input_schema: {
    type: "object",
    properties: {
      path: {
        type: "string",
        description: "File path (absolute or relative to the workspace root)",
      },
      content: {
        type: "string",
        description: "Full content to write",
      },
    },
    required: ["path", "content"],
  },
  modes: ["build"],
  safety: "sensitive",
  mutating: true,
  pathArgs: [{ name: "path", mustExist: false }],
  maxLatencyMs: 5_000,
};

export const EDIT_FILE_DEFINITION: ToolDescriptor = {
  name: "edit_file",
  description: "Replace one exact occurrence of old_text with new_text. Fails if old_text is missing or not unique.",
  input_schema: {
    type: "object",
    properties: {
      path: {
        type: "string",
        description: "File path (absolute or relative to the workspace root)",
      },
      old_text: {
        type: "string",
        description: "Exact text to replace; must occur exactly once",
      },
      new_text: {
        type: "string",
        description: "Replacement text",
      },
    },
    required: ["path", "old_text", "new_text"],
  },
  modes: ["build"],
  safety: "sensitive",
  mutating: true,
  pathArgs: [{ name: "path", mustExist: true }],
  maxLatencyMs: 5_000,
};

// ===========================================================================
// Shell Tool
// ===========================================================================

export const BASH_DEFINITION: ToolDescriptor = {
  name: "bash",
  description: "Run a shell command in the workspace root. Read-only commands may run without confirmation; everything else asks first.",
  input_schema: {
    type: "object",
    properties: {
      command: {
        type: "string",
        description: "The full shell command to execute (e.g., 'ls -la', 'npm test')",
      },
    },
    required: ["command"],
  },
  modes: ["build"],
  safety: "destructive",
  mutating: true,
  pathArgs: [],
  maxLatencyMs: 120_000,
};

// ===========================================================================
// Exports
// ===========================================================================

export const BUILTIN_TOOL_DEFINITIONS: readonly ToolDescriptor[] = [
  READ_FILE_DEFINITION,
  LIST_DIR_DEFINITION,
  SEARCH_FILES_DEFINITION,
  WRITE_FILE_DEFINITION,
  EDIT_FILE_DEFINITION,
  BASH_DEFINITION,
];

export const TOOL_NAMES = {
  READ_FILE: "read_file",
  LIST_DIR: "list_dir",
  SEARCH_FILES: "search_files",
  WRITE_FILE: "write_file",
  EDIT_FILE: "edit_file",
  BASH: "bash",
} as const;

export type BuiltinToolName = (typeof TOOL_NAMES)[keyof typeof TOOL_NAMES];
