#!/usr/bin/env node
/**
 * trustgate CLI. Evaluates commands against the trust rules of a profile and
 * manages those rules.
 *
 * `trustgate check <tool> -- <command>` prints the decision and exits 0 when
 * the command may run without asking, 1 otherwise.
 * `trustgate confirm <tool> -- <command>` asks on the terminal when needed.
 * `trustgate tools ...` takes the same arguments as the /tools command.
 *
 * See `trustgate help` for full command listing.
 */

import fs from "node:fs";
import path from "node:path";
import { quote } from "shell-quote";
import { handleToolsCommand } from "./commands.js";
import { ensureDataDirs, loadConfig, resolveDataDir as defaultDataDir, type Config } from "./config.js";
import { describeError } from "./errors.js";
import { createAppLogger, createStreamLogger, type AppLogger } from "./logger.js";
import { createTerminalPrompter } from "./prompt.js";
import { createTrustEngine, describeDecision, type TrustEngine } from "./trust/engine.js";
import { runConfirmation } from "./trust/rule-builder.js";
import { createFileBackend, createTrustRuleStore } from "./trust/store.js";
import { parseToolId } from "./trust/tools.js";

// Load .env if present (needed for ${VAR} references in config.yml)
if (fs.existsSync(".env")) {
  process.loadEnvFile(".env");
}

// ---------------------------------------------------------------------------
// Version
// ---------------------------------------------------------------------------

function readVersion(): string {
  const pkg: unknown = JSON.parse(fs.readFileSync(new URL("../package.json", import.meta.url), "utf-8"));
  if (pkg !== null && typeof pkg === "object" && "version" in pkg && typeof pkg.version === "string") {
    return pkg.version;
  }
  return "0.0.0";
}

const VERSION = readVersion();

// ---------------------------------------------------------------------------
// Arg parsing helpers
// ---------------------------------------------------------------------------

// Everything after a bare "--" is the command under evaluation.
const rawArgv = process.argv.slice(2);
const dashIndex = rawArgv.indexOf("--");
const argv = dashIndex === -1 ? rawArgv : rawArgv.slice(0, dashIndex);
const commandWords = dashIndex === -1 ? [] : rawArgv.slice(dashIndex + 1);

const VALUE_OPTIONS = new Set(["--data-dir", "--profile", "--config"]);

function flag(name: string): boolean {
  return argv.includes(name);
}

function opt(name: string, fallback?: string): string | undefined {
  const idx = argv.indexOf(name);
  return idx !== -1 ? argv[idx + 1] : fallback;
}

/** Arguments with the global value options and their values taken out. */
function positionals(): string[] {
  const result: string[] = [];
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === undefined) continue;
    if (VALUE_OPTIONS.has(arg)) {
      i++;
      continue;
    }
    result.push(arg);
  }
  return result;
}

// ---------------------------------------------------------------------------
// Config / environment
// ---------------------------------------------------------------------------

function resolveDataDir(): string {
  return opt("--data-dir") ?? defaultDataDir();
}

function createLogger(config: Config): AppLogger {
  return config.logging.file
    ? createAppLogger(config.data_dir)
    : createStreamLogger(process.stderr, config.logging.level);
}

interface Runtime {
  config: Config;
  engine: TrustEngine;
  profile: string;
}

function setup(): Runtime {
  const config = loadConfig(opt("--config"), resolveDataDir());
  ensureDataDirs(config);

  const store = createTrustRuleStore({
    backend: createFileBackend({
      profilesDir: config.paths.profiles_dir,
      globalConfigPath: config.paths.global_config,
    }),
    logger: createLogger(config),
  });

  return {
    config,
    engine: createTrustEngine({ store }),
    profile: opt("--profile") ?? config.profile,
  };
}

// ---------------------------------------------------------------------------
// Display helpers
// ---------------------------------------------------------------------------

function hr(char = "─", width = 60): string {
  return char.repeat(width);
}

function section(title: string): void {
  console.log("\n" + hr());
  console.log(`  ${title}`);
  console.log(hr());
}

// ---------------------------------------------------------------------------
// Command: check
// ---------------------------------------------------------------------------

function commandUnderEvaluation(args: string[]): string | undefined {
  const words = commandWords.length > 0 ? commandWords : args;
  const command = words.join(" ");
  return command.trim() ? command : undefined;
}

async function cmdCheck(toolName: string, command: string): Promise<number> {
  const { engine, profile } = setup();
  const decision = await engine.evaluate(command, parseToolId(toolName), profile);
  console.log(describeDecision(decision));
  return decision.outcome === "auto_approve" ? 0 : 1;
}

// ---------------------------------------------------------------------------
// Command: confirm
// ---------------------------------------------------------------------------

async function cmdConfirm(toolName: string, command: string): Promise<number> {
  const { engine, profile } = setup();
  const prompter = createTerminalPrompter(process.stdin, process.stdout);

  try {
    const result = await runConfirmation({
      engine,
      prompter,
      command,
      toolId: parseToolId(toolName),
      profile,
    });

    if (result.decision.outcome === "auto_approve") {
      console.log(describeDecision(result.decision));
    }
    console.log(result.approved ? "Approved" : "Cancelled");
    return result.approved ? 0 : 1;
  } finally {
    prompter.close();
  }
}

// ---------------------------------------------------------------------------
// Command: tools
// ---------------------------------------------------------------------------

async function cmdTools(args: string[]): Promise<number> {
  const { engine, profile } = setup();
  section(`TRUSTED COMMANDS (profile "${profile}")`);

  const line = args.length > 0 ? `/tools ${quote(args)}` : "/tools";
  const reply = await handleToolsCommand(line, { store: engine.store, profile });
  console.log(reply ?? "");
  return 0;
}

// ---------------------------------------------------------------------------
// Help
// ---------------------------------------------------------------------------

function showHelp(): void {
  const dataDir = resolveDataDir();
  console.log(`
trustgate ${VERSION}: decide which agent shell commands run without asking

Usage:
  trustgate <command> [options]

Commands:
  check <tool> -- <command>
    Print the decision for a command. Exit code 0 when it would run
    without confirmation, 1 when it needs confirmation.

  confirm <tool> -- <command>
    Evaluate a command and ask on the terminal when confirmation is needed.
    Offers to create a trust rule from the command.

  tools [list]
  tools allow <tool> --command <pattern>... [--description <text>] [--global]
  tools remove <tool> --command <pattern>... [--global]
  tools remove <tool> --all [--global]
    Show or edit trusted command patterns.

  version
    Show version number.

  help
    Show this help text.

Global options:
  --profile <name>   Profile whose rules apply (default: from config, or "default")
  --data-dir <path>  Data directory (default: ${dataDir})
  --config <path>    Config file (default: <data-dir>/config.yml)

Tools: execute_bash and execute_cmd accept trusted command patterns. Every
other tool always needs confirmation.
`);
}

// ---------------------------------------------------------------------------
// Main dispatcher
// ---------------------------------------------------------------------------

async function main(): Promise<number> {
  if (flag("--version") || flag("-v")) {
    console.log(VERSION);
    return 0;
  }

  const [command, ...args] = positionals();

  if (!command || command === "help" || flag("--help") || flag("-h")) {
    showHelp();
    return 0;
  }

  if (command === "version") {
    console.log(VERSION);
    return 0;
  }

  switch (command) {
    case "check":
    case "confirm": {
      const [toolName, ...rest] = args;
      const evaluated = commandUnderEvaluation(rest);
      if (!toolName || !evaluated) {
        console.error(`Usage: trustgate ${command} <tool> -- <command>`);
        return 1;
      }
      return command === "check" ? cmdCheck(toolName, evaluated) : cmdConfirm(toolName, evaluated);
    }

    case "tools":
      return cmdTools(args);

    default:
      console.error(`Unknown command: ${command}`);
      console.error(`Run 'trustgate help' for usage. Data directory: ${path.resolve(resolveDataDir())}`);
      return 1;
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error("Fatal:", describeError(err));
    process.exit(1);
  });
