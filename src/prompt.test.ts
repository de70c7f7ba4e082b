import { describe, it, expect } from "vitest";
import { PassThrough } from "node:stream";
import { createTerminalPrompter, renderView } from "./prompt.js";
import { deriveCandidates } from "./trust/rule-builder.js";
import { nativeTool } from "./trust/tools.js";

const bash = nativeTool("execute_bash");

function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

function collect(stream: PassThrough): () => string {
  const chunks: string[] = [];
  stream.on("data", (chunk: Buffer) => chunks.push(chunk.toString("utf-8")));
  return () => chunks.join("");
}

describe("renderView", () => {
  it("renders the confirmation question", () => {
    const text = renderView({
      kind: "confirm",
      command: "git push",
      toolId: bash,
      decision: { outcome: "require_confirmation", reason: { kind: "default" } },
      summary: "Needs confirmation",
      allowRuleCreation: true,
    });

    expect(text).toBe([
      "",
      "Tool:    execute_bash (Run a shell command)",
      "Command: git push",
      "Needs confirmation",
      "",
      "Allow this action? [y] yes  [n] no  [c] create a trust rule",
    ].join("\n"));
  });

  it("renders the rule menu with unavailable candidates marked", () => {
    const text = renderView({ kind: "rule_menu", command: "ls *.txt", candidates: deriveCandidates("ls *.txt") });

    expect(text.split("\n")).toEqual([
      "",
      "Create a trust rule for: ls *.txt",
      `  1. Trust this exact command only: "ls *.txt" (unavailable: Pattern "ls *.txt" may only use '*' once, as its last character.)`,
      `  2. Trust all 'ls *.txt' commands: "ls *.txt *" (unavailable: Pattern "ls *.txt *" may only use '*' once, as its last character.)`,
      `  3. Trust all 'ls' commands: "ls *"`,
      "  4. Run once without a rule",
      "  5. Cancel",
    ]);
  });
});

describe("createTerminalPrompter", () => {
  it("answers with one line per question", async () => {
    const input = new PassThrough();
    const output = new PassThrough();
    const written = collect(output);
    const prompter = createTerminalPrompter(input, output);

    input.write("c\n3\n");
    const view = { kind: "rule_menu" as const, command: "make", candidates: deriveCandidates("make") };

    expect(await prompter.ask(view)).toBe("c");
    expect(await prompter.ask(view)).toBe("3");
    await flush();
    expect(written()).toContain("Create a trust rule for: make\n");
    prompter.close();
  });

  it("resolves null once the input ends", async () => {
    const input = new PassThrough();
    const output = new PassThrough();
    const prompter = createTerminalPrompter(input, output);
    const view = { kind: "rule_menu" as const, command: "make", candidates: [] };

    const pending = prompter.ask(view);
    input.end();

    expect(await pending).toBeNull();
    expect(await prompter.ask(view)).toBeNull();
  });

  it("writes notices on their own line", async () => {
    const input = new PassThrough();
    const output = new PassThrough();
    const written = collect(output);
    const prompter = createTerminalPrompter(input, output);

    prompter.notify("Added trusted command pattern \"make *\".");
    await flush();

    expect(written()).toBe("Added trusted command pattern \"make *\".\n");
    prompter.close();
  });
});
