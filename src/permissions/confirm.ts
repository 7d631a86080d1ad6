/**
 * Confirmation providers.
 *
 * The gate asks one of these whenever a sensitive or destructive call has
 * no cached session-scoped allow. Interactive front ends implement the
 * interface; the two below cover headless runs and tests.
 */

import type { ConfirmAnswer, ToolDescriptor } from "../protocol/types.js";

export interface ConfirmationProvider {
  ask(descriptor: ToolDescriptor, args: Record<string, unknown>): Promise<ConfirmAnswer>;
}

/**
 * Always returns the same answer.
 */
export class StaticConfirmProvider implements ConfirmationProvider {
  calls = 0;

  constructor(private readonly answer: ConfirmAnswer) {}

  async ask(): Promise<ConfirmAnswer> {
    this.calls++;
    return this.answer;
  }
}

/**
 * Answers from a fixed queue; once exhausted every further prompt is denied.
 */
export class ScriptedConfirmProvider implements ConfirmationProvider {
  readonly asked: Array<{ tool: string; args: Record<string, unknown> }> = [];
  private readonly answers: ConfirmAnswer[];

  constructor(answers: readonly ConfirmAnswer[]) {
    this.answers = [...answers];
  }

  async ask(descriptor: ToolDescriptor, args: Record<string, unknown>): Promise<ConfirmAnswer> {
    this.asked.push({ tool: descriptor.name, args });
    return this.answers.shift() ?? "deny";
  }

  remaining(): number {
    return this.answers.length;
  }
}
