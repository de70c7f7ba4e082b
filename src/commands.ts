/**
 * The /tools slash command: list, add and remove trusted command patterns.
 *
 *   /tools [list]
 *   /tools allow <tool> --command <pattern>... [--description <text>] [--global]
 *   /tools remove <tool> --command <pattern>... [--global]
 *   /tools remove <tool> --all [--global]
 *   /tools help
 *
 * Arguments are split with shell quoting rules, so `--command "git *"` is one
 * pattern and `--command git *` is two.
 */

import { parse } from "shell-quote";
import { err, ok, type Result, type StoreError } from "./errors.js";
import { builtinSafeCommands } from "./trust/builtin-safe.js";
import {
  GLOBAL_SCOPE,
  profileScope,
  scopeLabel,
  type Scope,
  type TrustRuleStore,
} from "./trust/store.js";
import { isConfirmableWithTrust, parseToolId, trustableToolNames, type ToolId } from "./trust/tools.js";

export interface ToolsCommandContext {
  store: TrustRuleStore;
  /** Profile that receives rules unless --global is given. */
  profile: string;
}

export const TOOLS_HELP = [
  "Usage:",
  "  /tools                                    List trusted command patterns",
  "  /tools allow <tool> --command <pattern>... [--description <text>] [--global]",
  "  /tools remove <tool> --command <pattern>... [--global]",
  "  /tools remove <tool> --all [--global]",
  "  /tools help",
  "",
  "A pattern is a literal command, or a prefix ending in a single '*' (e.g. \"npm run *\").",
  "Quote patterns that contain spaces.",
  `Patterns apply to: ${trustableToolNames().join(", ")}.`,
].join("\n");

// ---------------------------------------------------------------------------
// Argument parsing
// ---------------------------------------------------------------------------

interface ToolsArgs {
  tool?: string;
  patterns: string[];
  description?: string;
  global: boolean;
  all: boolean;
}

const FLAGS = new Set(["--command", "--description", "--global", "--all"]);

/** Split a line into words, keeping globs as their literal text. */
export function splitWords(text: string): Result<string[], string> {
  const words: string[] = [];
  for (const entry of parse(text, (key: string) => `$${key}`)) {
    if (typeof entry === "string") {
      words.push(entry);
    } else if ("pattern" in entry) {
      words.push(entry.pattern);
    } else if ("comment" in entry) {
      return err("Unexpected '#'. Quote patterns that contain it.");
    } else {
      return err(`Unexpected '${entry.op}'. Quote patterns that contain shell operators.`);
    }
  }
  return ok(words);
}

function parseArgs(words: string[]): Result<ToolsArgs, string> {
  const args: ToolsArgs = { patterns: [], global: false, all: false };
  let i = 0;
  while (i < words.length) {
    const word = words[i];
    i++;
    if (word === undefined) break;

    if (word === "--global") {
      args.global = true;
    } else if (word === "--all") {
      args.all = true;
    } else if (word === "--description") {
      const value = words[i];
      if (value === undefined || FLAGS.has(value)) {
        return err("--description needs a value.");
      }
      args.description = value;
      i++;
    } else if (word === "--command") {
      const start = args.patterns.length;
      while (i < words.length) {
        const value = words[i];
        if (value === undefined || FLAGS.has(value)) break;
        args.patterns.push(value);
        i++;
      }
      if (args.patterns.length === start) {
        return err("--command needs at least one pattern.");
      }
    } else if (word.startsWith("--")) {
      return err(`Unknown option "${word}".`);
    } else if (args.tool === undefined) {
      args.tool = word;
    } else {
      return err(`Unexpected argument "${word}".`);
    }
  }
  return ok(args);
}

function resolveTool(name: string | undefined): Result<ToolId, string> {
  if (!name) {
    return err("Name a tool, e.g. execute_bash.");
  }
  const toolId = parseToolId(name);
  if (toolId.kind === "custom") {
    return err(`Unknown tool "${name}". Trusted command patterns apply to: ${trustableToolNames().join(", ")}.`);
  }
  if (!isConfirmableWithTrust(toolId)) {
    return err(`Tool "${name}" always asks for confirmation; trusted command patterns do not apply to it.`);
  }
  return ok(toolId);
}

// ---------------------------------------------------------------------------
// Output helpers
// ---------------------------------------------------------------------------

function patterns(count: number): string {
  return `${count} trusted command pattern${count === 1 ? "" : "s"}`;
}

function saveWarning(scope: Scope, error: StoreError): string {
  return `Warning: changes apply to this session but were not saved for ${scopeLabel(scope)}: ${error.message}`;
}

// ---------------------------------------------------------------------------
// Subcommands
// ---------------------------------------------------------------------------

async function listRules(context: ToolsCommandContext): Promise<string> {
  const lines: string[] = [];
  const scopes = [GLOBAL_SCOPE, profileScope(context.profile)];

  for (const scope of scopes) {
    const config = await context.store.load(scope);
    const heading = scope.kind === "global" ? "Global" : `Profile "${scope.name}"`;
    lines.push(`${heading}:`);
    if (config.size === 0) {
      lines.push("  (no trusted commands)");
      continue;
    }
    for (const [tool, rules] of config) {
      lines.push(`  ${tool}:`);
      for (const rule of rules) {
        lines.push(`    - "${rule.pattern}"${rule.description ? ` (${rule.description})` : ""}`);
      }
    }
  }

  lines.push("");
  lines.push(`Always allowed: ${builtinSafeCommands().join(", ")}.`);
  lines.push("Commands with chaining, redirection, substitution or destructive operations always ask.");
  lines.push("Use /tools help to edit trusted commands.");
  return lines.join("\n");
}

async function allowRules(args: ToolsArgs, context: ToolsCommandContext): Promise<string> {
  const tool = resolveTool(args.tool);
  if (!tool.ok) return tool.error;
  if (args.patterns.length === 0) {
    return "Give at least one pattern with --command.";
  }
  if (args.all) {
    return "--all only applies to /tools remove.";
  }

  const scope = args.global ? GLOBAL_SCOPE : profileScope(context.profile);
  const added: string[] = [];
  const failed: Array<{ pattern: string; reason: string }> = [];
  let saveError: StoreError | undefined;

  for (const pattern of args.patterns) {
    const result = await context.store.addRule(
      scope,
      tool.value,
      args.description ? { pattern, description: args.description } : { pattern },
    );
    if (!result.ok) {
      failed.push({ pattern, reason: result.error.message });
      continue;
    }
    added.push(pattern);
    saveError = result.value.saveError ?? saveError;
  }

  const lines: string[] = [];
  if (added.length > 0) {
    lines.push(`Added ${patterns(added.length)} to ${scopeLabel(scope)}:`);
    for (const pattern of added) lines.push(`  - "${pattern}"`);
    if (args.description) lines.push(`Description: ${args.description}`);
    lines.push("Matching commands will run without confirmation.");
  }
  if (failed.length > 0) {
    lines.push(`Could not add ${patterns(failed.length)}:`);
    for (const { pattern, reason } of failed) lines.push(`  - "${pattern}": ${reason}`);
  }
  if (saveError) lines.push(saveWarning(scope, saveError));
  return lines.join("\n");
}

async function removeRules(args: ToolsArgs, context: ToolsCommandContext): Promise<string> {
  const tool = resolveTool(args.tool);
  if (!tool.ok) return tool.error;

  const scope = args.global ? GLOBAL_SCOPE : profileScope(context.profile);
  const toolName = tool.value.name;

  if (args.all) {
    if (args.patterns.length > 0) {
      return "Use either --all or --command, not both.";
    }
    const outcome = await context.store.removeAll(scope, tool.value);
    const lines = [
      outcome.removed === 0
        ? `No trusted command patterns for ${toolName} in ${scopeLabel(scope)}.`
        : `Cleared ${patterns(outcome.removed)} for ${toolName} in ${scopeLabel(scope)}.`,
    ];
    if (outcome.saveError) lines.push(saveWarning(scope, outcome.saveError));
    return lines.join("\n");
  }

  if (args.patterns.length === 0) {
    return "Give at least one pattern with --command, or use --all.";
  }

  const removed: string[] = [];
  const missing: string[] = [];
  let saveError: StoreError | undefined;
  for (const pattern of args.patterns) {
    const outcome = await context.store.removeRule(scope, tool.value, pattern);
    if (outcome.removed) removed.push(pattern);
    else missing.push(pattern);
    saveError = outcome.saveError ?? saveError;
  }

  const lines: string[] = [];
  if (removed.length > 0) {
    lines.push(`Removed ${patterns(removed.length)} from ${scopeLabel(scope)}:`);
    for (const pattern of removed) lines.push(`  - "${pattern}"`);
  }
  if (missing.length > 0) {
    lines.push(`Not found in ${scopeLabel(scope)}: ${missing.map((p) => `"${p}"`).join(", ")}`);
  }

  const remaining = await context.store.rules(scope, tool.value);
  lines.push(
    remaining.length === 0
      ? `No trusted command patterns left for ${toolName} in ${scopeLabel(scope)}.`
      : `Remaining for ${toolName}: ${remaining.map((rule) => `"${rule.pattern}"`).join(", ")}`,
  );
  if (saveError) lines.push(saveWarning(scope, saveError));
  return lines.join("\n");
}

// ---------------------------------------------------------------------------
// Entry point
// ---------------------------------------------------------------------------

/**
 * Handle a /tools line. Returns the reply, or null when the text is not a
 * /tools command.
 */
export async function handleToolsCommand(
  text: string,
  context: ToolsCommandContext,
): Promise<string | null> {
  const trimmed = text.trim();
  if (trimmed !== "/tools" && !trimmed.startsWith("/tools ")) {
    return null;
  }

  const words = splitWords(trimmed.slice("/tools".length));
  if (!words.ok) {
    return words.error;
  }

  const [subcommand = "list", ...rest] = words.value;
  if (subcommand === "list" && rest.length === 0) {
    return listRules(context);
  }
  if (subcommand === "help") {
    return TOOLS_HELP;
  }
  if (subcommand !== "allow" && subcommand !== "remove") {
    return `Unknown subcommand "${subcommand}".\n\n${TOOLS_HELP}`;
  }

  const args = parseArgs(rest);
  if (!args.ok) {
    return `${args.error}\n\n${TOOLS_HELP}`;
  }

  return subcommand === "allow" ? allowRules(args.value, context) : removeRules(args.value, context);
}
