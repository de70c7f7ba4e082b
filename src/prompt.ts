/**
 * Terminal front end for the confirmation dialogue.
 *
 * Reads one answer per line. When the input ends (Ctrl-D, a closed pipe)
 * every pending and future question resolves to null, which the dialogue
 * treats as a cancellation.
 */

import readline from "node:readline";
import { RULE_MENU_EXIT, RULE_MENU_RUN_ONCE, type ConfirmationPrompter, type PromptView } from "./trust/rule-builder.js";
import { toolKind, toolIdKey } from "./trust/tools.js";

export interface TerminalPrompter extends ConfirmationPrompter {
  close(): void;
}

export function renderView(view: PromptView): string {
  if (view.kind === "confirm") {
    const choices = view.allowRuleCreation
      ? "[y] yes  [n] no  [c] create a trust rule"
      : "[y] yes  [n] no";
    return [
      "",
      `Tool:    ${toolIdKey(view.toolId)} (${toolKind(view.toolId).label})`,
      `Command: ${view.command}`,
      view.summary,
      "",
      `Allow this action? ${choices}`,
    ].join("\n");
  }

  const lines = ["", `Create a trust rule for: ${view.command}`];
  view.candidates.forEach((candidate, index) => {
    const unavailable = candidate.valid ? "" : ` (unavailable: ${candidate.invalidReason ?? "invalid pattern"})`;
    lines.push(`  ${index + 1}. ${candidate.label}: "${candidate.pattern}"${unavailable}`);
  });
  lines.push(`  ${RULE_MENU_RUN_ONCE}. Run once without a rule`);
  lines.push(`  ${RULE_MENU_EXIT}. Cancel`);
  return lines.join("\n");
}

export function createTerminalPrompter(
  input: NodeJS.ReadableStream,
  output: NodeJS.WritableStream,
): TerminalPrompter {
  const rl = readline.createInterface({ input, terminal: false });
  const buffered: string[] = [];
  const waiting: Array<(line: string | null) => void> = [];
  let closed = false;

  rl.on("line", (line: string) => {
    const next = waiting.shift();
    if (next) next(line);
    else buffered.push(line);
  });

  rl.on("close", () => {
    closed = true;
    for (const resolve of waiting.splice(0)) resolve(null);
  });

  function nextLine(): Promise<string | null> {
    const line = buffered.shift();
    if (line !== undefined) return Promise.resolve(line);
    if (closed) return Promise.resolve(null);
    return new Promise((resolve) => waiting.push(resolve));
  }

  return {
    ask(view: PromptView): Promise<string | null> {
      output.write(`${renderView(view)}\n> `);
      return nextLine();
    },

    notify(message: string): void {
      output.write(`${message}\n`);
    },

    close(): void {
      rl.close();
    },
  };
}
