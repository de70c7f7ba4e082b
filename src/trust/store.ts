/**
 * Trusted command rules, persisted per profile.
 *
 * Each profile keeps its rules in <profiles_dir>/<profile>/context.json;
 * a global file holds rules that apply to every profile. The store loads a
 * scope lazily, caches it for the session and writes the whole scope back
 * after every mutation.
 *
 * Failure policy:
 * - load never throws. A missing file is an empty config; an unreadable,
 *   unparseable or malformed file is logged and also treated as empty.
 * - save failures are returned to the caller. The in-memory change stays,
 *   so the session keeps trusting a rule that did not make it to disk.
 * - validation failures are returned and nothing is stored.
 *
 * Callers only ever see copies of the cached rules, so the cache changes
 * through the mutation methods alone.
 */

import fs from "node:fs";
import path from "node:path";
import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { StoreError, ValidationError, describeError, err, ok, type Result } from "../errors.js";
import type { AppLogger } from "../logger.js";
import { KeyedLock } from "../profile-lock.js";
import { isValidProfileName } from "../config.js";
import { validatePattern } from "./pattern.js";
import { isConfirmableWithTrust, parseToolId, toolIdKey, type ToolId } from "./tools.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface TrustRule {
  /** Literal command, or a literal prefix followed by a single trailing `*`. */
  pattern: string;
  description?: string;
}

/** Tool key -> ordered rules for one scope. */
export type TrustConfig = Map<string, TrustRule[]>;

export type Scope = { kind: "profile"; name: string } | { kind: "global" };

export function profileScope(name: string): Scope {
  return { kind: "profile", name };
}

export const GLOBAL_SCOPE: Scope = { kind: "global" };

export function scopeKey(scope: Scope): string {
  return scope.kind === "global" ? "global" : `profile:${scope.name}`;
}

export function scopeLabel(scope: Scope): string {
  return scope.kind === "global" ? "global" : `profile "${scope.name}"`;
}

export interface AddRuleOutcome {
  rule: TrustRule;
  /** Zero-based position of the rule in its tool's list. */
  position: number;
  /** Set when the rule is active for this session but was not persisted. */
  saveError?: StoreError;
}

export interface RemoveRuleOutcome {
  removed: boolean;
  saveError?: StoreError;
}

export interface RemoveAllOutcome {
  /** Number of rules cleared. */
  removed: number;
  saveError?: StoreError;
}

// ---------------------------------------------------------------------------
// On-disk format
// ---------------------------------------------------------------------------

const TrustedCommandSchema = Type.Object({
  command: Type.String(),
  description: Type.Optional(Type.Union([Type.String(), Type.Null()])),
});

const ContextFileSchema = Type.Object({
  trusted_commands: Type.Optional(
    Type.Record(Type.String(), Type.Array(TrustedCommandSchema)),
  ),
});

type ContextFile = Static<typeof ContextFileSchema>;

interface ParsedScope {
  config: TrustConfig;
  /** Other top-level keys of context.json, written back untouched. */
  extra: Record<string, unknown>;
}

function emptyScope(): ParsedScope {
  return { config: new Map(), extra: {} };
}

function cloneConfig(config: TrustConfig): TrustConfig {
  const copy: TrustConfig = new Map();
  for (const [tool, rules] of config) {
    copy.set(tool, rules.map((rule) => ({ ...rule })));
  }
  return copy;
}

/**
 * Serialise a scope to the context.json layout. Rule order is kept exactly;
 * a missing description is written as null.
 */
export function serializeTrustConfig(config: TrustConfig, extra: Record<string, unknown> = {}): string {
  const trusted: Record<string, Array<{ command: string; description: string | null }>> = {};
  for (const [tool, rules] of config) {
    trusted[tool] = rules.map((rule) => ({
      command: rule.pattern,
      description: rule.description ?? null,
    }));
  }
  return JSON.stringify({ ...extra, trusted_commands: trusted }, null, 2) + "\n";
}

// ---------------------------------------------------------------------------
// Backend
// ---------------------------------------------------------------------------

/**
 * Where scopes are read from and written to. `read` resolves undefined when
 * nothing has been stored yet and rejects on any other failure.
 */
export interface TrustConfigBackend {
  locate(scope: Scope): string;
  read(scope: Scope): Promise<string | undefined>;
  write(scope: Scope, contents: string): Promise<void>;
}

export interface FileBackendOptions {
  profilesDir: string;
  globalConfigPath: string;
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export function createFileBackend(options: FileBackendOptions): TrustConfigBackend {
  function locate(scope: Scope): string {
    if (scope.kind === "global") {
      return options.globalConfigPath;
    }
    if (!isValidProfileName(scope.name)) {
      throw new StoreError(`Invalid profile name "${scope.name}"`, scopeLabel(scope));
    }
    return path.join(options.profilesDir, scope.name, "context.json");
  }

  return {
    locate,

    async read(scope: Scope): Promise<string | undefined> {
      try {
        return await fs.promises.readFile(locate(scope), "utf-8");
      } catch (error) {
        if (isNotFound(error)) return undefined;
        throw error;
      }
    },

    async write(scope: Scope, contents: string): Promise<void> {
      const filePath = locate(scope);
      await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
      // Atomic replace: write beside the target, then rename over it.
      const tmpPath = `${filePath}.${process.pid}.tmp`;
      await fs.promises.writeFile(tmpPath, contents, "utf-8");
      await fs.promises.rename(tmpPath, filePath);
    },
  };
}

// ---------------------------------------------------------------------------
// Store
// ---------------------------------------------------------------------------

export interface TrustRuleStore {
  /** Load a copy of a scope's rules (cached after the first call). Never rejects. */
  load(scope: Scope): Promise<TrustConfig>;

  /** Drop the cached copy and read the scope from the backend again. */
  reload(scope: Scope): Promise<TrustConfig>;

  /** The cached config for a scope, if it has been loaded. */
  cached(scope: Scope): TrustConfig | undefined;

  /**
   * Validate and replace a scope's rules, then persist them. An invalid rule
   * refuses the whole config. The cache keeps a valid `config` even if the
   * write fails.
   */
  save(scope: Scope, config: TrustConfig): Promise<Result<void, StoreError | ValidationError>>;

  /** Validate and append a rule, then persist. */
  addRule(scope: Scope, toolId: ToolId, rule: TrustRule): Promise<Result<AddRuleOutcome, ValidationError>>;

  /** Remove the first rule whose pattern equals `pattern` exactly. */
  removeRule(scope: Scope, toolId: ToolId, pattern: string): Promise<RemoveRuleOutcome>;

  /** Clear every rule for a tool in a scope. */
  removeAll(scope: Scope, toolId: ToolId): Promise<RemoveAllOutcome>;

  /** A tool's rules in stored order. */
  rules(scope: Scope, toolId: ToolId): Promise<readonly TrustRule[]>;

  /** Write every cached scope back. Returns the failures. */
  flush(): Promise<StoreError[]>;
}

export interface TrustRuleStoreOptions {
  backend: TrustConfigBackend;
  logger: AppLogger;
  /** Shared with other components that serialise work per profile. */
  lock?: KeyedLock;
}

/**
 * Validate a rule against the tool it is being added for.
 */
export function validateRule(toolId: ToolId, rule: TrustRule): Result<void, ValidationError> {
  if (!isConfirmableWithTrust(toolId)) {
    return err(new ValidationError(
      "tool_not_trustable",
      `Tool "${toolIdKey(toolId)}" always asks for confirmation; trusted command patterns do not apply to it.`,
    ));
  }
  return validatePattern(rule.pattern);
}

export function createTrustRuleStore(options: TrustRuleStoreOptions): TrustRuleStore {
  const { backend, logger } = options;
  const lock = options.lock ?? new KeyedLock();
  const cache = new Map<string, ParsedScope>();

  function locationOf(scope: Scope): string | undefined {
    try {
      return backend.locate(scope);
    } catch {
      return undefined;
    }
  }

  function parseScope(scope: Scope, raw: string): ParsedScope {
    const label = scopeLabel(scope);
    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (error) {
      logger.warn(`Trust config for ${label} is not valid JSON; using no trusted commands`, {
        file: locationOf(scope),
        error: describeError(error),
      });
      return emptyScope();
    }

    if (!Value.Check(ContextFileSchema, data)) {
      const first = Value.Errors(ContextFileSchema, data).First();
      logger.warn(`Trust config for ${label} has an unexpected shape; using no trusted commands`, {
        file: locationOf(scope),
        error: first ? `${first.path || "(root)"}: ${first.message}` : "schema mismatch",
      });
      return emptyScope();
    }

    return toParsedScope(scope, data);
  }

  function toParsedScope(scope: Scope, data: ContextFile): ParsedScope {
    const config: TrustConfig = new Map();
    for (const [tool, entries] of Object.entries(data.trusted_commands ?? {})) {
      if (!isConfirmableWithTrust(parseToolId(tool))) {
        logger.warn(`Ignoring trusted commands stored for "${tool}" in ${scopeLabel(scope)}; that tool always asks`);
        continue;
      }
      const rules: TrustRule[] = entries.map((entry) =>
        entry.description == null
          ? { pattern: entry.command }
          : { pattern: entry.command, description: entry.description },
      );
      const kept: TrustRule[] = [];
      for (const rule of rules) {
        const check = validatePattern(rule.pattern);
        if (check.ok) {
          kept.push(rule);
        } else if (check.error.code === "too_broad") {
          logger.warn(`Ignoring stored pattern "${rule.pattern}" in ${scopeLabel(scope)}: ${check.error.message}`);
        } else {
          kept.push(rule);
          logger.warn(`Stored pattern in ${scopeLabel(scope)} would be rejected today: ${check.error.message}`);
        }
      }
      config.set(tool, kept);
    }

    const extra: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(data)) {
      if (key !== "trusted_commands") extra[key] = value;
    }
    return { config, extra };
  }

  async function readScope(scope: Scope): Promise<ParsedScope> {
    let raw: string | undefined;
    try {
      raw = await backend.read(scope);
    } catch (error) {
      logger.warn(`Could not read trust config for ${scopeLabel(scope)}; using no trusted commands`, {
        file: locationOf(scope),
        error: describeError(error),
      });
      return emptyScope();
    }
    return raw === undefined ? emptyScope() : parseScope(scope, raw);
  }

  /** Must run inside the scope's lock. */
  async function ensureLoaded(scope: Scope): Promise<ParsedScope> {
    const key = scopeKey(scope);
    const existing = cache.get(key);
    if (existing) return existing;
    const parsed = await readScope(scope);
    cache.set(key, parsed);
    return parsed;
  }

  /** Must run inside the scope's lock. */
  async function persist(scope: Scope, parsed: ParsedScope): Promise<Result<void, StoreError>> {
    let filePath: string | undefined;
    try {
      filePath = backend.locate(scope);
      await backend.write(scope, serializeTrustConfig(parsed.config, parsed.extra));
      return ok(undefined);
    } catch (error) {
      const storeError = error instanceof StoreError
        ? error
        : new StoreError(
          `Failed to save trust config for ${scopeLabel(scope)}: ${describeError(error)}`,
          scopeLabel(scope),
          filePath,
          { cause: error },
        );
      logger.error(storeError.message, storeError);
      return err(storeError);
    }
  }

  function withScope<T>(scope: Scope, fn: (parsed: ParsedScope) => Promise<T>): Promise<T> {
    return lock.run(scopeKey(scope), async () => fn(await ensureLoaded(scope)));
  }

  return {
    load(scope: Scope): Promise<TrustConfig> {
      return withScope(scope, async (parsed) => cloneConfig(parsed.config));
    },

    reload(scope: Scope): Promise<TrustConfig> {
      return lock.run(scopeKey(scope), async () => {
        cache.delete(scopeKey(scope));
        return cloneConfig((await ensureLoaded(scope)).config);
      });
    },

    cached(scope: Scope): TrustConfig | undefined {
      const parsed = cache.get(scopeKey(scope));
      return parsed ? cloneConfig(parsed.config) : undefined;
    },

    async save(scope: Scope, config: TrustConfig): Promise<Result<void, StoreError | ValidationError>> {
      for (const [tool, rules] of config) {
        for (const rule of rules) {
          const validation = validateRule(parseToolId(tool), rule);
          if (!validation.ok) return validation;
        }
      }

      return withScope(scope, async (parsed) => {
        const next: ParsedScope = { config: cloneConfig(config), extra: parsed.extra };
        cache.set(scopeKey(scope), next);
        return persist(scope, next);
      });
    },

    async addRule(scope: Scope, toolId: ToolId, rule: TrustRule): Promise<Result<AddRuleOutcome, ValidationError>> {
      const validation = validateRule(toolId, rule);
      if (!validation.ok) {
        return validation;
      }

      return withScope(scope, async (parsed) => {
        const key = toolIdKey(toolId);
        const rules = parsed.config.get(key) ?? [];
        const stored: TrustRule = rule.description
          ? { pattern: rule.pattern, description: rule.description }
          : { pattern: rule.pattern };
        rules.push(stored);
        parsed.config.set(key, rules);
        logger.info(`Added trusted command pattern "${rule.pattern}" for ${key} to ${scopeLabel(scope)}`);

        const saved = await persist(scope, parsed);
        const outcome: AddRuleOutcome = { rule: stored, position: rules.length - 1 };
        if (!saved.ok) outcome.saveError = saved.error;
        return ok(outcome);
      });
    },

    removeRule(scope: Scope, toolId: ToolId, pattern: string): Promise<RemoveRuleOutcome> {
      return withScope(scope, async (parsed) => {
        const key = toolIdKey(toolId);
        const rules = parsed.config.get(key) ?? [];
        const index = rules.findIndex((rule) => rule.pattern === pattern);
        if (index === -1) {
          return { removed: false };
        }

        rules.splice(index, 1);
        if (rules.length === 0) parsed.config.delete(key);
        logger.info(`Removed trusted command pattern "${pattern}" for ${key} from ${scopeLabel(scope)}`);

        const saved = await persist(scope, parsed);
        return saved.ok ? { removed: true } : { removed: true, saveError: saved.error };
      });
    },

    removeAll(scope: Scope, toolId: ToolId): Promise<RemoveAllOutcome> {
      return withScope(scope, async (parsed) => {
        const key = toolIdKey(toolId);
        const count = parsed.config.get(key)?.length ?? 0;
        parsed.config.delete(key);
        logger.info(`Cleared ${count} trusted command pattern(s) for ${key} in ${scopeLabel(scope)}`);

        const saved = await persist(scope, parsed);
        return saved.ok ? { removed: count } : { removed: count, saveError: saved.error };
      });
    },

    rules(scope: Scope, toolId: ToolId): Promise<readonly TrustRule[]> {
      return withScope(scope, async (parsed) => [...(parsed.config.get(toolIdKey(toolId)) ?? [])]);
    },

    async flush(): Promise<StoreError[]> {
      const failures: StoreError[] = [];
      const scopes = [...cache.keys()];
      for (const key of scopes) {
        const result = await lock.run(key, async () => {
          const parsed = cache.get(key);
          return parsed ? persist(scopeFromKey(key), parsed) : ok(undefined);
        });
        if (!result.ok) failures.push(result.error);
      }
      return failures;
    },
  };
}

function scopeFromKey(key: string): Scope {
  return key === "global" ? GLOBAL_SCOPE : profileScope(key.slice("profile:".length));
}
