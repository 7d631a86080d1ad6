import { describe, it, expect, vi } from "vitest";
import { ModeController, isReadOnly } from "../src/mode/controller.js";
import { CoreError } from "../src/protocol/errors.js";
import { ToolRegistry } from "../src/tools/registry.js";

describe("ModeController", () => {
  it("starts in PLAN by default", () => {
    const controller = new ModeController();
    expect(controller.currentMode()).toBe("plan");
    expect(controller.isReadOnly()).toBe(true);
  });

  it("switches modes and notifies listeners before returning", () => {
    const controller = new ModeController();
    const listener = vi.fn();
    controller.onModeChange(listener);

    expect(controller.setMode("build")).toBe(true);

    expect(controller.currentMode()).toBe("build");
    expect(listener).toHaveBeenCalledWith({ from: "plan", to: "build", reason: "command" });
  });

  it("does not notify when the mode is unchanged", () => {
    const controller = new ModeController("build");
    const listener = vi.fn();
    controller.onModeChange(listener);

    controller.setMode("build");

    expect(listener).not.toHaveBeenCalled();
  });

  it("rejects unknown modes and keeps the current one", () => {
    const controller = new ModeController("review");
    expect(() => controller.setMode("deploy")).toThrow(CoreError);
    try {
      controller.setMode("deploy");
    } catch (error) {
      expect(error instanceof CoreError && error.kind).toBe("invalid_arguments");
    }
    expect(controller.currentMode()).toBe("review");
  });

  it("stops notifying after unsubscribe", () => {
    const controller = new ModeController();
    const listener = vi.fn();
    const unsubscribe = controller.onModeChange(listener);
    unsubscribe();

    controller.setMode("build", "complexity");

    expect(listener).not.toHaveBeenCalled();
  });

  it("lists only read tools in PLAN and REVIEW", () => {
    const registry = new ToolRegistry();
    const readTools = ["read_file", "list_dir", "search_files"];

    expect(new ModeController("plan").eligibleTools(registry).map((t) => t.name)).toEqual(readTools);
    expect(new ModeController("review").eligibleTools(registry).map((t) => t.name)).toEqual(readTools);
    expect(new ModeController("build").eligibleTools(registry).map((t) => t.name)).toEqual([
      ...readTools,
      "write_file",
      "edit_file",
      "bash",
    ]);
  });

  it("rebuilds from history with the last entry winning", () => {
    const controller = ModeController.fromHistory(
      [
        { mode: "plan", at: "2026-01-01T00:00:00.000Z", reason: "initial" },
        { mode: "build", at: "2026-01-01T00:01:00.000Z", reason: "command" },
      ],
      "review"
    );
    expect(controller.currentMode()).toBe("build");
    expect(ModeController.fromHistory([], "review").currentMode()).toBe("review");
  });

  it("classifies read-only modes", () => {
    expect(isReadOnly("plan")).toBe(true);
    expect(isReadOnly("review")).toBe(true);
    expect(isReadOnly("build")).toBe(false);
  });
});
