/**
 * Trust rule patterns.
 *
 * A pattern is either a literal command (exact match) or a literal prefix
 * followed by a single trailing `*`. "npm *" trusts "npm install" and
 * "npm run build" because both start with "npm ", but not "npmx". Matching
 * is case- and whitespace-sensitive.
 */

import { ValidationError, err, ok, type Result } from "../errors.js";
import { describeDangerousMatch, findDangerousPattern } from "./dangerous-patterns.js";

export const WILDCARD = "*";

export function hasTrailingWildcard(pattern: string): boolean {
  return pattern.endsWith(WILDCARD);
}

export function matchesPattern(pattern: string, command: string): boolean {
  if (!hasTrailingWildcard(pattern)) {
    return pattern === command;
  }
  return command.startsWith(pattern.slice(0, -WILDCARD.length));
}

/**
 * Check that a pattern may be stored. Patterns that fail here never reach
 * the matcher.
 */
export function validatePattern(pattern: string): Result<void, ValidationError> {
  if (pattern.trim() === "") {
    return err(new ValidationError("empty_pattern", "Command pattern cannot be empty."));
  }

  const wildcardAt = pattern.indexOf(WILDCARD);
  if (wildcardAt !== -1 && wildcardAt !== pattern.length - 1) {
    return err(new ValidationError(
      "misplaced_wildcard",
      `Pattern "${pattern}" may only use '*' once, as its last character.`,
    ));
  }

  if (pattern.trim() === WILDCARD) {
    return err(new ValidationError(
      "too_broad",
      "Pattern '*' would trust every command. Use a more specific pattern.",
    ));
  }

  const dangerous = findDangerousPattern(pattern);
  if (dangerous) {
    return err(new ValidationError(
      "dangerous_pattern",
      `Pattern "${pattern}" contains the dangerous sequence ${describeDangerousMatch(dangerous)} and cannot be trusted.`,
    ));
  }

  return ok(undefined);
}
