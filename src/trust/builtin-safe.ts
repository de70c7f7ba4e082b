/**
 * Read-only commands that never need confirmation on their own.
 *
 * Only the first word is compared; arguments are left to the
 * dangerous-pattern screen, which always runs first. `find` is not listed:
 * its `-exec` and `-delete` flags write without any shell syntax.
 */

const BUILTIN_SAFE_COMMANDS: ReadonlySet<string> = new Set([
  "ls",
  "cat",
  "echo",
  "pwd",
  "which",
  "head",
  "tail",
  "grep",
  "dir",
  "type",
  "wc",
]);

/** First whitespace-delimited token, or "" for a blank command. */
export function firstToken(command: string): string {
  return command.trim().split(/\s+/, 1)[0] ?? "";
}

export function isBuiltinSafe(command: string): boolean {
  return BUILTIN_SAFE_COMMANDS.has(firstToken(command));
}

export function builtinSafeCommands(): string[] {
  return [...BUILTIN_SAFE_COMMANDS];
}
