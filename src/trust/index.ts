/**
 * Trust subsystem: tool taxonomy, command screening, rule storage and the
 * confirmation dialogue.
 *
 * Re-exports from:
 * - tools.ts: which tools trust rules may apply to
 * - dangerous-patterns.ts, builtin-safe.ts, pattern.ts: pure checks
 * - store.ts: per-profile and global rule storage
 * - engine.ts: the auto-approve / confirm decision
 * - rule-builder.ts: confirmation state machine and rule candidates
 */

export {
  type ToolKind,
  type NativeToolName,
  type ToolId,
  NATIVE_TOOLS,
  nativeTool,
  parseToolId,
  toolIdKey,
  toolKind,
  isConfirmableWithTrust,
  trustableToolNames,
} from "./tools.js";

export {
  type DangerousCategory,
  type DangerousPatternMatch,
  findDangerousPattern,
  isDangerous,
  describeDangerousMatch,
} from "./dangerous-patterns.js";

export { isBuiltinSafe, builtinSafeCommands, firstToken } from "./builtin-safe.js";

export { WILDCARD, matchesPattern, validatePattern } from "./pattern.js";

export {
  type TrustRule,
  type TrustConfig,
  type Scope,
  type AddRuleOutcome,
  type RemoveRuleOutcome,
  type RemoveAllOutcome,
  type TrustConfigBackend,
  type FileBackendOptions,
  type TrustRuleStore,
  type TrustRuleStoreOptions,
  GLOBAL_SCOPE,
  profileScope,
  scopeKey,
  scopeLabel,
  serializeTrustConfig,
  createFileBackend,
  createTrustRuleStore,
  validateRule,
} from "./store.js";

export {
  type AutoApproveReason,
  type ConfirmationReason,
  type Decision,
  type ScopedRules,
  type TrustEngine,
  type TrustEngineOptions,
  screenCommand,
  matchRules,
  decide,
  describeDecision,
  createTrustEngine,
} from "./engine.js";

export {
  type Candidate,
  type CandidateKind,
  type FlowState,
  type FlowEvent,
  type FlowEffect,
  type TerminalState,
  type ConfirmationFlowOptions,
  type PromptView,
  type ConfirmationPrompter,
  type ConfirmationResult,
  type RunConfirmationOptions,
  ConfirmationFlow,
  deriveCandidates,
  runConfirmation,
  RULE_MENU_RUN_ONCE,
  RULE_MENU_EXIT,
} from "./rule-builder.js";
