/**
 * Config loading and validation.
 *
 * Loads config.yml from the data directory, substitutes ${ENV_VAR}
 * references, applies defaults and validates at startup so misconfigurations
 * fail early. A missing config file means "all defaults".
 */

import fs from "node:fs";
import path from "node:path";
import { parse as parseYaml } from "yaml";
import type { LogLevel } from "./logger.js";

export interface Config {
  /** Profile whose trust rules apply when none is named explicitly. */
  profile: string;
  paths: {
    /** Each profile keeps its rules in <profiles_dir>/<profile>/context.json. */
    profiles_dir: string;
    /** Rules here apply to every profile. */
    global_config: string;
  };
  logging: {
    /** Write JSONL logs under <data_dir>/logs. When false, log to stderr. */
    file: boolean;
    level: LogLevel;
  };
  data_dir: string;
}

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];
const PROFILE_NAME_RE = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;
const KNOWN_TOP_LEVEL_KEYS = new Set(["profile", "paths", "logging"]);

export const DEFAULT_PROFILE = "default";

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && LOG_LEVELS.some((level) => level === value);
}

function section(raw: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = raw[key];
  return isRecord(value) ? value : {};
}

function stringOr(value: unknown, fallback: string): string {
  return typeof value === "string" && value.trim() ? value : fallback;
}

/**
 * Replace ${VAR} references with values from process.env.
 */
function substituteEnvVars(text: string): string {
  // Only uppercase env-style names, so a literal ${name} in a description
  // survives untouched.
  return text.replace(/\$\{([A-Z_][A-Z0-9_]*)\}/g, (_match, varName: string) => {
    const value = process.env[varName];
    if (value === undefined) {
      throw new Error(`Environment variable ${varName} is not set`);
    }
    return value;
  });
}

/**
 * Recursively substitute env vars in all string values of an object.
 */
function substituteDeep(obj: unknown): unknown {
  if (typeof obj === "string") {
    return substituteEnvVars(obj);
  }
  if (Array.isArray(obj)) {
    return obj.map(substituteDeep);
  }
  if (isRecord(obj)) {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = substituteDeep(value);
    }
    return result;
  }
  return obj;
}

export function isValidProfileName(name: string): boolean {
  return PROFILE_NAME_RE.test(name) && name !== "." && name !== "..";
}

export function resolveDataDir(): string {
  return path.resolve(process.env.TRUSTGATE_DATA_DIR || "./data");
}

/**
 * Build a config from parsed YAML. Exposed separately from loadConfig so
 * callers holding a config object (tests, embedding hosts) skip the file.
 */
export function configFromObject(parsed: unknown, dataDir: string): Config {
  const substituted = substituteDeep(parsed ?? {});
  if (!isRecord(substituted)) {
    throw new Error("Config errors:\n  - config root must be a mapping");
  }

  const paths = section(substituted, "paths");
  const logging = section(substituted, "logging");

  const config: Config = {
    profile: stringOr(process.env.TRUSTGATE_PROFILE, stringOr(substituted.profile, DEFAULT_PROFILE)),
    paths: {
      profiles_dir: path.resolve(dataDir, stringOr(paths.profiles_dir, "profiles")),
      global_config: path.resolve(dataDir, stringOr(paths.global_config, "global_context.json")),
    },
    logging: {
      file: logging.file !== false,
      level: isLogLevel(logging.level) ? logging.level : "info",
    },
    data_dir: dataDir,
  };

  validateConfig(config, substituted);

  return config;
}

export function loadConfig(configPath?: string, dataDirOverride?: string): Config {
  const dataDir = dataDirOverride ? path.resolve(dataDirOverride) : resolveDataDir();
  const cfgPath = configPath || path.join(dataDir, "config.yml");

  if (!fs.existsSync(cfgPath)) {
    if (configPath) {
      throw new Error(`Config file not found: ${cfgPath}`);
    }
    return configFromObject({}, dataDir);
  }

  const raw = fs.readFileSync(cfgPath, "utf-8");
  return configFromObject(parseYaml(raw), dataDir);
}

function validateConfig(config: Config, raw: Record<string, unknown>): void {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!isValidProfileName(config.profile)) {
    errors.push(
      `profile "${config.profile}" is not a valid profile name ` +
      "(letters, digits, '.', '_' and '-', not starting with a dot)",
    );
  }

  const logging = section(raw, "logging");
  if (logging.level !== undefined && !isLogLevel(logging.level)) {
    errors.push(`logging.level must be one of ${LOG_LEVELS.join(", ")}`);
  }

  for (const key of Object.keys(raw)) {
    if (!KNOWN_TOP_LEVEL_KEYS.has(key)) {
      warnings.push(`unknown key "${key}" is ignored`);
    }
  }

  if (path.resolve(config.paths.global_config).startsWith(path.resolve(config.paths.profiles_dir) + path.sep)) {
    warnings.push("paths.global_config lies inside paths.profiles_dir; it may be mistaken for a profile");
  }

  for (const w of warnings) {
    console.warn(`Config warning: ${w}`);
  }
  if (errors.length > 0) {
    throw new Error(`Config errors:\n  - ${errors.join("\n  - ")}`);
  }
}

/**
 * Ensure data directories exist.
 */
export function ensureDataDirs(config: Config): void {
  const dirs = [
    config.data_dir,
    config.paths.profiles_dir,
    path.dirname(config.paths.global_config),
  ];
  if (config.logging.file) {
    dirs.push(path.join(config.data_dir, "logs"));
  }

  for (const dir of dirs) {
    fs.mkdirSync(dir, { recursive: true });
  }
}
