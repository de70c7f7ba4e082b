/**
 * Confirmation dialogue for a pending tool call, and rule creation from it.
 *
 * The dialogue is an explicit state machine driven by discrete events (a
 * decision, a key press, the result of saving a rule, the input closing),
 * so it runs the same against a terminal, a chat channel or a test:
 *
 *   evaluating ──► auto_approved ──► executed
 *        └──────► pending_confirmation ──y──► executed
 *                     │  └──n──► cancelled
 *                     └──c──► rule_creation ──1/2/3 (saved)──► executed
 *                                 ├──4──► executed (run once, no rule)
 *                                 └──5──► cancelled
 *
 * Closing the input in any non-terminal state cancels the call. There is no
 * timeout.
 */

import type { ValidationError, Result } from "../errors.js";
import { describeError } from "../errors.js";
import { hasTrailingWildcard, validatePattern, WILDCARD } from "./pattern.js";
import { profileScope, scopeLabel, type AddRuleOutcome, type Scope, type TrustRule } from "./store.js";
import { describeDecision, type Decision, type TrustEngine } from "./engine.js";
import { isConfirmableWithTrust, type ToolId } from "./tools.js";

// ---------------------------------------------------------------------------
// Candidates
// ---------------------------------------------------------------------------

export type CandidateKind = "exact" | "up_to_first_argument" | "first_word";

export interface Candidate {
  kind: CandidateKind;
  pattern: string;
  label: string;
  /** False when the pattern would be refused by the store. */
  valid: boolean;
  invalidReason?: string;
}

function candidate(kind: CandidateKind, pattern: string, label: string): Candidate {
  const check = validatePattern(pattern);
  return check.ok
    ? { kind, pattern, label, valid: true }
    : { kind, pattern, label, valid: false, invalidReason: check.error.message };
}

// A pattern ending in "*" is a prefix rule, so such a command has no exact form.
function exactCandidate(command: string): Candidate {
  const label = "Trust this exact command only";
  if (hasTrailingWildcard(command)) {
    return {
      kind: "exact",
      pattern: command,
      label,
      valid: false,
      invalidReason: `A command ending in '${WILDCARD}' cannot be trusted exactly; the pattern would match every command starting with "${command.slice(0, -WILDCARD.length)}".`,
    };
  }
  return candidate("exact", command, label);
}

/**
 * Patterns of decreasing specificity for a command:
 * the command itself, its first two words plus " *", its first word plus " *".
 *
 * "git restore --staged Makefile" gives "git restore --staged Makefile",
 * "git restore *" and "git *".
 */
export function deriveCandidates(command: string): Candidate[] {
  const tokens = command.trim().split(/\s+/).filter(Boolean);
  if (tokens.length === 0) {
    return [];
  }

  const candidates = [exactCandidate(command)];

  if (tokens.length >= 2) {
    const prefix = `${tokens[0]} ${tokens[1]}`;
    candidates.push(candidate("up_to_first_argument", `${prefix} ${WILDCARD}`, `Trust all '${prefix}' commands`));
  }

  candidates.push(candidate("first_word", `${tokens[0]} ${WILDCARD}`, `Trust all '${tokens[0]}' commands`));

  return candidates;
}

// ---------------------------------------------------------------------------
// State machine
// ---------------------------------------------------------------------------

export type ExecutedVia = "auto_approved" | "accepted" | "run_once" | "rule_created";
export type CancelledVia = "rejected" | "exited" | "closed";

export type FlowState =
  | { name: "evaluating" }
  | { name: "auto_approved"; decision: Decision }
  | { name: "pending_confirmation"; decision: Decision }
  | { name: "rule_creation"; decision: Decision; candidates: Candidate[]; saving?: Candidate }
  | { name: "executed"; via: ExecutedVia; rule?: TrustRule }
  | { name: "cancelled"; via: CancelledVia };

export type FlowEvent =
  | { type: "decision"; decision: Decision }
  | { type: "proceed" }
  | { type: "key"; key: string }
  | { type: "rule_saved"; result: Result<AddRuleOutcome, ValidationError> }
  | { type: "close" };

export type FlowEffect =
  | { type: "create_rule"; candidate: Candidate }
  | { type: "notice"; message: string };

export type TerminalState = Extract<FlowState, { name: "executed" | "cancelled" }>;

/** Menu keys in rule creation. 1-3 map onto the candidates in order. */
export const RULE_MENU_RUN_ONCE = "4";
export const RULE_MENU_EXIT = "5";

export interface ConfirmationFlowOptions {
  toolId: ToolId;
  command: string;
  /**
   * Whether an interactive rule context is available. Rule creation is only
   * offered when this is true and the tool is confirmable with trust.
   */
  ruleCreation: boolean;
}

export class ConfirmationFlow {
  private current: FlowState = { name: "evaluating" };

  constructor(private readonly options: ConfirmationFlowOptions) {}

  get state(): FlowState {
    return this.current;
  }

  get command(): string {
    return this.options.command;
  }

  get canCreateRule(): boolean {
    return this.options.ruleCreation && isConfirmableWithTrust(this.options.toolId);
  }

  isTerminal(): boolean {
    return this.current.name === "executed" || this.current.name === "cancelled";
  }

  terminalState(): TerminalState | undefined {
    const state = this.current;
    return state.name === "executed" || state.name === "cancelled" ? state : undefined;
  }

  /**
   * Apply one event. Events that do not apply to the current state leave it
   * unchanged; a notice explains why when the event came from the user.
   */
  send(event: FlowEvent): FlowEffect[] {
    const state = this.current;

    if (event.type === "close") {
      if (!this.isTerminal()) {
        this.current = { name: "cancelled", via: "closed" };
      }
      return [];
    }

    switch (state.name) {
      case "evaluating":
        if (event.type === "decision") {
          this.current = event.decision.outcome === "auto_approve"
            ? { name: "auto_approved", decision: event.decision }
            : { name: "pending_confirmation", decision: event.decision };
        }
        return [];

      case "auto_approved":
        if (event.type === "proceed") {
          this.current = { name: "executed", via: "auto_approved" };
        }
        return [];

      case "pending_confirmation":
        return event.type === "key" ? this.onConfirmKey(state, event.key) : [];

      case "rule_creation":
        if (event.type === "key") return this.onRuleKey(state, event.key);
        if (event.type === "rule_saved") return this.onRuleSaved(state, event.result);
        return [];

      case "executed":
      case "cancelled":
        return [];
    }
  }

  private onConfirmKey(
    state: Extract<FlowState, { name: "pending_confirmation" }>,
    rawKey: string,
  ): FlowEffect[] {
    const key = rawKey.trim().toLowerCase();
    if (key === "y") {
      this.current = { name: "executed", via: "accepted" };
      return [];
    }
    if (key === "n") {
      this.current = { name: "cancelled", via: "rejected" };
      return [];
    }
    if (key === "c") {
      if (!this.canCreateRule) {
        return [{ type: "notice", message: "Trust rules cannot be created for this tool here. Answer y or n." }];
      }
      this.current = {
        name: "rule_creation",
        decision: state.decision,
        candidates: deriveCandidates(this.options.command),
      };
      return [];
    }
    return [{ type: "notice", message: `Unrecognised choice "${rawKey.trim()}". Answer ${this.canCreateRule ? "y, n or c" : "y or n"}.` }];
  }

  private onRuleKey(
    state: Extract<FlowState, { name: "rule_creation" }>,
    rawKey: string,
  ): FlowEffect[] {
    if (state.saving) {
      return [{ type: "notice", message: "Still saving the previous choice." }];
    }

    const key = rawKey.trim();
    if (key === RULE_MENU_RUN_ONCE) {
      this.current = { name: "executed", via: "run_once" };
      return [];
    }
    if (key === RULE_MENU_EXIT) {
      this.current = { name: "cancelled", via: "exited" };
      return [];
    }

    const index = /^[1-3]$/.test(key) ? Number(key) - 1 : -1;
    const chosen = state.candidates[index];
    if (!chosen) {
      return [{ type: "notice", message: `Unrecognised choice "${key}". Pick one of the listed options.` }];
    }
    if (!chosen.valid) {
      return [{ type: "notice", message: `Cannot trust "${chosen.pattern}": ${chosen.invalidReason ?? "invalid pattern"}` }];
    }

    this.current = { ...state, saving: chosen };
    return [{ type: "create_rule", candidate: chosen }];
  }

  private onRuleSaved(
    state: Extract<FlowState, { name: "rule_creation" }>,
    result: Result<AddRuleOutcome, ValidationError>,
  ): FlowEffect[] {
    if (!state.saving) {
      return [];
    }

    if (!result.ok) {
      this.current = { name: "rule_creation", decision: state.decision, candidates: state.candidates };
      return [{ type: "notice", message: `Rule not added: ${result.error.message}` }];
    }

    this.current = { name: "executed", via: "rule_created", rule: result.value.rule };
    const effects: FlowEffect[] = [
      { type: "notice", message: `Added trusted command pattern "${result.value.rule.pattern}".` },
    ];
    if (result.value.saveError) {
      effects.push({
        type: "notice",
        message: `Warning: the rule applies to this session but could not be saved: ${result.value.saveError.message}`,
      });
    }
    return effects;
  }
}

// ---------------------------------------------------------------------------
// Driver
// ---------------------------------------------------------------------------

export type PromptView =
  | {
    kind: "confirm";
    command: string;
    toolId: ToolId;
    decision: Decision;
    summary: string;
    allowRuleCreation: boolean;
  }
  | { kind: "rule_menu"; command: string; candidates: Candidate[] };

/**
 * The interactive front end, as seen by the dialogue. `ask` shows a view and
 * resolves the next key, or null when input has ended.
 */
export interface ConfirmationPrompter {
  ask(view: PromptView): Promise<string | null>;
  notify(message: string): void;
}

export interface ConfirmationResult {
  approved: boolean;
  state: TerminalState;
  decision: Decision;
  /** Decision after a rule was created, for callers that want to check it. */
  reevaluated?: Decision;
}

export interface RunConfirmationOptions {
  engine: TrustEngine;
  prompter: ConfirmationPrompter;
  command: string;
  toolId: ToolId;
  profile: string;
  /** Where created rules go. Default: the profile. */
  ruleScope?: Scope;
  /** Offer rule creation at all. Default: true. */
  ruleCreation?: boolean;
}

export async function runConfirmation(options: RunConfirmationOptions): Promise<ConfirmationResult> {
  const { engine, prompter, command, toolId, profile } = options;
  const ruleScope = options.ruleScope ?? profileScope(profile);
  const flow = new ConfirmationFlow({ toolId, command, ruleCreation: options.ruleCreation ?? true });

  const decision = await engine.evaluate(command, toolId, profile);
  flow.send({ type: "decision", decision });
  flow.send({ type: "proceed" });

  let reevaluated: Decision | undefined;

  function apply(effects: FlowEffect[]): Array<{ type: "create_rule"; candidate: Candidate }> {
    const pending: Array<{ type: "create_rule"; candidate: Candidate }> = [];
    for (const effect of effects) {
      if (effect.type === "notice") prompter.notify(effect.message);
      else pending.push(effect);
    }
    return pending;
  }

  let terminal = flow.terminalState();
  while (!terminal) {
    const state = flow.state;
    const view: PromptView | undefined =
      state.name === "pending_confirmation"
        ? {
          kind: "confirm",
          command,
          toolId,
          decision: state.decision,
          summary: describeDecision(state.decision),
          allowRuleCreation: flow.canCreateRule,
        }
        : state.name === "rule_creation"
          ? { kind: "rule_menu", command, candidates: state.candidates }
          : undefined;

    if (!view) {
      // Only reachable if a state was added without a view.
      flow.send({ type: "close" });
      break;
    }

    const key = await prompter.ask(view);
    const effects = key === null ? flow.send({ type: "close" }) : flow.send({ type: "key", key });

    for (const { candidate: chosen } of apply(effects)) {
      let result: Result<AddRuleOutcome, ValidationError>;
      try {
        result = await engine.store.addRule(ruleScope, toolId, {
          pattern: chosen.pattern,
          description: `Added from confirmation of "${command}"`,
        });
      } catch (error) {
        prompter.notify(`Rule not added to ${scopeLabel(ruleScope)}: ${describeError(error)}`);
        flow.send({ type: "close" });
        break;
      }
      apply(flow.send({ type: "rule_saved", result }));
      if (result.ok) {
        reevaluated = await engine.evaluate(command, toolId, profile);
      }
    }

    terminal = flow.terminalState();
  }

  const state: TerminalState = flow.terminalState() ?? { name: "cancelled", via: "closed" };
  const result: ConfirmationResult = { approved: state.name === "executed", state, decision };
  if (reevaluated) result.reevaluated = reevaluated;
  return result;
}
