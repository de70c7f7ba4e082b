import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import path from "node:path";
import os from "node:os";
import { handleToolsCommand, splitWords, TOOLS_HELP, type ToolsCommandContext } from "./commands.js";
import { nullLogger } from "./logger.js";
import { GLOBAL_SCOPE, createFileBackend, createTrustRuleStore, profileScope } from "./trust/store.js";
import { nativeTool } from "./trust/tools.js";

const bash = nativeTool("execute_bash");
const defaultProfile = profileScope("default");

let tmpDir: string;
let context: ToolsCommandContext;

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "tools-command-test-"));
  const store = createTrustRuleStore({
    backend: createFileBackend({
      profilesDir: path.join(tmpDir, "profiles"),
      globalConfigPath: path.join(tmpDir, "global_context.json"),
    }),
    logger: nullLogger,
  });
  context = { store, profile: "default" };
});

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

describe("splitWords", () => {
  it("keeps quoted patterns together", () => {
    expect(splitWords(`allow execute_bash --command "npm run *" 'git status'`)).toEqual({
      ok: true,
      value: ["allow", "execute_bash", "--command", "npm run *", "git status"],
    });
  });

  it("refuses unquoted shell operators", () => {
    expect(splitWords("allow execute_bash --command make && ls")).toEqual({
      ok: false,
      error: "Unexpected '&&'. Quote patterns that contain shell operators.",
    });
  });
});

describe("handleToolsCommand", () => {
  it("ignores other text", async () => {
    expect(await handleToolsCommand("hello", context)).toBeNull();
    expect(await handleToolsCommand("/toolsx", context)).toBeNull();
  });

  it("prints help", async () => {
    expect(await handleToolsCommand("/tools help", context)).toBe(TOOLS_HELP);
  });

  it("rejects unknown subcommands", async () => {
    expect(await handleToolsCommand("/tools frob", context)).toBe(`Unknown subcommand "frob".\n\n${TOOLS_HELP}`);
  });

  it("adds patterns with a shared description", async () => {
    const reply = await handleToolsCommand(
      `/tools allow execute_bash --command "npm *" "git status" --description "dev loop"`,
      context,
    );

    expect(reply).toBe([
      'Added 2 trusted command patterns to profile "default":',
      '  - "npm *"',
      '  - "git status"',
      "Description: dev loop",
      "Matching commands will run without confirmation.",
    ].join("\n"));
    expect(await context.store.rules(defaultProfile, bash)).toEqual([
      { pattern: "npm *", description: "dev loop" },
      { pattern: "git status", description: "dev loop" },
    ]);
  });

  it("reports patterns it could not add", async () => {
    const reply = await handleToolsCommand(`/tools allow execute_bash --command "git *" "rm -rf *"`, context);

    expect(reply).toBe([
      'Added 1 trusted command pattern to profile "default":',
      '  - "git *"',
      "Matching commands will run without confirmation.",
      "Could not add 1 trusted command pattern:",
      `  - "rm -rf *": Pattern "rm -rf *" contains the dangerous sequence 'rm -rf' (destructive command) and cannot be trusted.`,
    ].join("\n"));
  });

  it("adds to the global scope with --global", async () => {
    await handleToolsCommand(`/tools allow execute_bash --global --command "make *"`, context);

    expect(await context.store.rules(GLOBAL_SCOPE, bash)).toEqual([{ pattern: "make *" }]);
    expect(await context.store.rules(defaultProfile, bash)).toEqual([]);
  });

  it("names the tools patterns apply to", async () => {
    expect(await handleToolsCommand("/tools allow nope --command ls", context)).toBe(
      'Unknown tool "nope". Trusted command patterns apply to: execute_bash, execute_cmd.',
    );
    expect(await handleToolsCommand("/tools allow fs_read --command ls", context)).toBe(
      'Tool "fs_read" always asks for confirmation; trusted command patterns do not apply to it.',
    );
  });

  it("asks for patterns when none are given", async () => {
    expect(await handleToolsCommand("/tools allow execute_bash", context)).toBe(
      "Give at least one pattern with --command.",
    );
  });

  it("removes exact patterns and lists what remains", async () => {
    await context.store.addRule(defaultProfile, bash, { pattern: "git *" });
    await context.store.addRule(defaultProfile, bash, { pattern: "npm *" });

    const reply = await handleToolsCommand(`/tools remove execute_bash --command "git *" nope`, context);

    expect(reply).toBe([
      'Removed 1 trusted command pattern from profile "default":',
      '  - "git *"',
      'Not found in profile "default": "nope"',
      'Remaining for execute_bash: "npm *"',
    ].join("\n"));
  });

  it("clears a tool's patterns with --all", async () => {
    await context.store.addRule(GLOBAL_SCOPE, bash, { pattern: "git *" });
    await context.store.addRule(GLOBAL_SCOPE, bash, { pattern: "npm *" });

    expect(await handleToolsCommand("/tools remove execute_bash --all --global", context)).toBe(
      "Cleared 2 trusted command patterns for execute_bash in global.",
    );
    expect(await handleToolsCommand("/tools remove execute_bash --all", context)).toBe(
      'No trusted command patterns for execute_bash in profile "default".',
    );
  });

  it("lists global and profile rules separately", async () => {
    await context.store.addRule(GLOBAL_SCOPE, bash, { pattern: "git status" });
    await context.store.addRule(defaultProfile, bash, { pattern: "npm *", description: "build" });

    expect(await handleToolsCommand("/tools", context)).toBe([
      "Global:",
      "  execute_bash:",
      '    - "git status"',
      'Profile "default":',
      "  execute_bash:",
      '    - "npm *" (build)',
      "",
      "Always allowed: ls, cat, echo, pwd, which, head, tail, grep, dir, type, wc.",
      "Commands with chaining, redirection, substitution or destructive operations always ask.",
      "Use /tools help to edit trusted commands.",
    ].join("\n"));
  });

  it("lists empty scopes", async () => {
    const reply = await handleToolsCommand("/tools list", context);
    expect(reply?.split("\n").slice(0, 4)).toEqual([
      "Global:",
      "  (no trusted commands)",
      'Profile "default":',
      "  (no trusted commands)",
    ]);
  });
});
