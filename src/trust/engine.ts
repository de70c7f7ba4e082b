/**
 * Trust decisions for tool calls.
 *
 * For every call the engine answers one question: may it run now, or must a
 * human confirm it first? The checks run in a fixed order and the first one
 * that applies decides:
 *
 * 1. Tools that are not confirmable with trust always ask.
 * 2. A dangerous marker always asks. Nothing below can undo this.
 * 3. A builtin read-only command runs.
 * 4. The first matching trust rule runs it (global rules, then the
 *    profile's, each in stored order).
 * 5. Everything else asks.
 *
 * Steps 1-3 need no I/O. Rules are loaded only when step 4 is reached, and
 * the cache lives in the store instance, so engines for different sessions
 * never see each other's rules.
 */

import { firstToken, isBuiltinSafe } from "./builtin-safe.js";
import { describeDangerousMatch, findDangerousPattern, type DangerousPatternMatch } from "./dangerous-patterns.js";
import { matchesPattern } from "./pattern.js";
import {
  GLOBAL_SCOPE,
  profileScope,
  scopeLabel,
  type Scope,
  type TrustRule,
  type TrustRuleStore,
} from "./store.js";
import { isConfirmableWithTrust, toolIdKey, type ToolId } from "./tools.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type AutoApproveReason =
  | { kind: "builtin_safe"; command: string }
  | { kind: "user_rule"; pattern: string; scope: Scope; description?: string };

export type ConfirmationReason =
  | { kind: "dangerous_pattern"; match: DangerousPatternMatch }
  | { kind: "default" };

export type Decision =
  | { outcome: "auto_approve"; reason: AutoApproveReason }
  | { outcome: "require_confirmation"; reason: ConfirmationReason };

/** Rules of one scope, in the order they should be tried. */
export interface ScopedRules {
  scope: Scope;
  rules: readonly TrustRule[];
}

const REQUIRE_DEFAULT: Decision = { outcome: "require_confirmation", reason: { kind: "default" } };

// ---------------------------------------------------------------------------
// Pure decision
// ---------------------------------------------------------------------------

/**
 * Steps 1-3. Returns null when the decision depends on trust rules.
 */
export function screenCommand(command: string, toolId: ToolId): Decision | null {
  if (!isConfirmableWithTrust(toolId)) {
    return REQUIRE_DEFAULT;
  }

  const dangerous = findDangerousPattern(command);
  if (dangerous) {
    return { outcome: "require_confirmation", reason: { kind: "dangerous_pattern", match: dangerous } };
  }

  if (isBuiltinSafe(command)) {
    return { outcome: "auto_approve", reason: { kind: "builtin_safe", command: firstToken(command) } };
  }

  return null;
}

/** Step 4 over already-loaded rules. First match wins. */
export function matchRules(command: string, ruleSets: readonly ScopedRules[]): AutoApproveReason | null {
  for (const { scope, rules } of ruleSets) {
    const rule = rules.find((candidate) => matchesPattern(candidate.pattern, command));
    if (rule) {
      return rule.description
        ? { kind: "user_rule", pattern: rule.pattern, scope, description: rule.description }
        : { kind: "user_rule", pattern: rule.pattern, scope };
    }
  }
  return null;
}

/**
 * The whole decision over rules the caller already holds.
 */
export function decide(command: string, toolId: ToolId, ruleSets: readonly ScopedRules[]): Decision {
  const screened = screenCommand(command, toolId);
  if (screened) return screened;

  const matched = matchRules(command, ruleSets);
  return matched ? { outcome: "auto_approve", reason: matched } : REQUIRE_DEFAULT;
}

export function describeDecision(decision: Decision): string {
  const { reason } = decision;
  switch (reason.kind) {
    case "dangerous_pattern":
      return `Needs confirmation: contains ${describeDangerousMatch(reason.match)}`;
    case "default":
      return "Needs confirmation";
    case "builtin_safe":
      return `Allowed: "${reason.command}" is a builtin read-only command`;
    case "user_rule":
      return `Allowed: trusted by ${scopeLabel(reason.scope)} pattern "${reason.pattern}"` +
        (reason.description ? ` (${reason.description})` : "");
  }
}

// ---------------------------------------------------------------------------
// Engine
// ---------------------------------------------------------------------------

export interface TrustEngine {
  readonly store: TrustRuleStore;

  /** Decide whether `command` may run for `profile` without asking. */
  evaluate(command: string, toolId: ToolId, profile: string): Promise<Decision>;

  /**
   * Synchronous variant for rendering. Returns undefined when the answer
   * depends on rules that have not been loaded yet.
   */
  evaluateCached(command: string, toolId: ToolId, profile: string): Decision | undefined;

  /** Load the rules `profile` depends on ahead of the first call. */
  preload(profile: string): Promise<void>;
}

export interface TrustEngineOptions {
  store: TrustRuleStore;
  /** Consult the global scope before the profile. Default: true. */
  useGlobalRules?: boolean;
}

export function createTrustEngine(options: TrustEngineOptions): TrustEngine {
  const { store } = options;
  const useGlobalRules = options.useGlobalRules ?? true;

  function scopesFor(profile: string): Scope[] {
    return useGlobalRules ? [GLOBAL_SCOPE, profileScope(profile)] : [profileScope(profile)];
  }

  return {
    store,

    async evaluate(command: string, toolId: ToolId, profile: string): Promise<Decision> {
      const screened = screenCommand(command, toolId);
      if (screened) return screened;

      const key = toolIdKey(toolId);
      const ruleSets: ScopedRules[] = [];
      for (const scope of scopesFor(profile)) {
        const config = await store.load(scope);
        ruleSets.push({ scope, rules: config.get(key) ?? [] });
      }
      return decide(command, toolId, ruleSets);
    },

    evaluateCached(command: string, toolId: ToolId, profile: string): Decision | undefined {
      const screened = screenCommand(command, toolId);
      if (screened) return screened;

      const key = toolIdKey(toolId);
      const ruleSets: ScopedRules[] = [];
      for (const scope of scopesFor(profile)) {
        const config = store.cached(scope);
        if (!config) return undefined;
        ruleSets.push({ scope, rules: config.get(key) ?? [] });
      }
      return decide(command, toolId, ruleSets);
    },

    async preload(profile: string): Promise<void> {
      for (const scope of scopesFor(profile)) {
        await store.load(scope);
      }
    },
  };
}
