/**
 * trustgate library entry point.
 *
 * Typical wiring for a host that runs agent tool calls:
 *
 *   const config = loadConfig();
 *   const store = createTrustRuleStore({
 *     backend: createFileBackend({
 *       profilesDir: config.paths.profiles_dir,
 *       globalConfigPath: config.paths.global_config,
 *     }),
 *     logger: createAppLogger(config.data_dir),
 *   });
 *   const engine = createTrustEngine({ store });
 *   const decision = await engine.evaluate("git status", nativeTool("execute_bash"), config.profile);
 */

export * from "./trust/index.js";

export { type Result, ok, err, StoreError, ValidationError, type ValidationErrorCode, describeError } from "./errors.js";

export { KeyedLock } from "./profile-lock.js";

export {
  type LogLevel,
  type LogEntry,
  type AppLogger,
  nullLogger,
  createAppLogger,
  createStreamLogger,
} from "./logger.js";

export {
  type Config,
  DEFAULT_PROFILE,
  loadConfig,
  configFromObject,
  ensureDataDirs,
  isValidProfileName,
  resolveDataDir,
} from "./config.js";

export { type ToolsCommandContext, handleToolsCommand, TOOLS_HELP } from "./commands.js";

export { type TerminalPrompter, createTerminalPrompter, renderView } from "./prompt.js";
