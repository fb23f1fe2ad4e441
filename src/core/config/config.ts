// src/core/config/config.ts
// Configuration: defaults, environment variables, JSON files, overrides

import * as fs from "fs";
import * as path from "path";
import { z } from "zod";
import { isLogLevel, type LogLevel } from "../log/logger";
import { MAX_PARSE_DEPTH } from "../reader/parse";
import { MAX_PRINT_DEPTH, MAX_PRINT_LENGTH } from "../sexp/sexp";

// =========================================================================
// Configuration Types
// =========================================================================

export type EnvsConfig = {
  /** Directory holding meta.env and the env files it names */
  baseDir: string;
  /** Meta-env file name inside baseDir */
  metaFile: string;
  /** Env paths skipped by a full save */
  serializeBlacklist: string[];
};

export type LogConfig = {
  level: LogLevel;
};

export type RuntimeConfig = {
  /** Maximum list nesting accepted by the parser */
  maxParseDepth: number;
  /** Nesting printed before eliding with (..) */
  maxPrintDepth: number;
  /** List elements printed before eliding with ... */
  maxPrintLength: number;
};

export type NodalConfig = {
  envs: EnvsConfig;
  log: LogConfig;
  runtime: RuntimeConfig;
};

/** Any subset of the configuration; later layers override earlier ones. */
export type PartialConfig = {
  envs?: Partial<EnvsConfig>;
  log?: Partial<LogConfig>;
  runtime?: Partial<RuntimeConfig>;
};

// =========================================================================
// Default Configuration
// =========================================================================

export const DEFAULT_ENVS_CONFIG: EnvsConfig = {
  baseDir: ".",
  metaFile: "meta.env",
  serializeBlacklist: [],
};

export const DEFAULT_LOG_CONFIG: LogConfig = {
  level: "warn",
};

export const DEFAULT_RUNTIME_CONFIG: RuntimeConfig = {
  maxParseDepth: MAX_PARSE_DEPTH,
  maxPrintDepth: MAX_PRINT_DEPTH,
  maxPrintLength: MAX_PRINT_LENGTH,
};

export const DEFAULT_CONFIG: NodalConfig = {
  envs: DEFAULT_ENVS_CONFIG,
  log: DEFAULT_LOG_CONFIG,
  runtime: DEFAULT_RUNTIME_CONFIG,
};

export const DEFAULT_CONFIG_FILES = ["nodal.config.json"];

// =========================================================================
// Schema
// =========================================================================

const positiveInt = z.number().int().positive();

export const ConfigSchema = z
  .object({
    envs: z
      .object({
        baseDir: z.string().min(1),
        metaFile: z.string().min(1),
        serializeBlacklist: z.array(z.string()),
      })
      .partial()
      .strict(),
    log: z
      .object({
        level: z.enum(["debug", "info", "warn", "error", "silent"]),
      })
      .partial()
      .strict(),
    runtime: z
      .object({
        maxParseDepth: positiveInt,
        maxPrintDepth: positiveInt,
        maxPrintLength: positiveInt,
      })
      .partial()
      .strict(),
  })
  .partial()
  .strict();

// =========================================================================
// Configuration Loading
// =========================================================================

function envInt(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === "") return undefined;
  const n = parseInt(value, 10);
  return Number.isNaN(n) ? undefined : n;
}

/**
 * Load configuration from environment variables. Only variables that are set
 * appear in the result.
 */
export function configFromEnv(prefix = "NODAL", env: NodeJS.ProcessEnv = process.env): PartialConfig {
  const envs: Partial<EnvsConfig> = {};
  const log: Partial<LogConfig> = {};
  const runtime: Partial<RuntimeConfig> = {};

  const baseDir = env[`${prefix}_ENV_DIR`];
  if (baseDir) envs.baseDir = baseDir;
  const metaFile = env[`${prefix}_META_FILE`];
  if (metaFile) envs.metaFile = metaFile;
  const blacklist = env[`${prefix}_SERIALIZE_BLACKLIST`];
  if (blacklist !== undefined) {
    envs.serializeBlacklist = blacklist.split(",").map((s) => s.trim()).filter((s) => s.length > 0);
  }

  const level = env[`${prefix}_LOG_LEVEL`];
  if (level && isLogLevel(level)) log.level = level;

  const maxParseDepth = envInt(env[`${prefix}_MAX_PARSE_DEPTH`]);
  if (maxParseDepth !== undefined) runtime.maxParseDepth = maxParseDepth;
  const maxPrintDepth = envInt(env[`${prefix}_MAX_PRINT_DEPTH`]);
  if (maxPrintDepth !== undefined) runtime.maxPrintDepth = maxPrintDepth;
  const maxPrintLength = envInt(env[`${prefix}_MAX_PRINT_LENGTH`]);
  if (maxPrintLength !== undefined) runtime.maxPrintLength = maxPrintLength;

  return { envs, log, runtime };
}

/**
 * Load configuration from a JSON file.
 */
export function configFromFile(filePath: string): PartialConfig {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Config file not found: ${filePath}`);
  }

  const ext = path.extname(filePath).toLowerCase();
  if (ext !== ".json") {
    throw new Error(`Unsupported config file format: ${ext}`);
  }

  const content = fs.readFileSync(filePath, "utf8");
  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (e) {
    throw new Error(`Invalid JSON in ${filePath}: ${e instanceof Error ? e.message : String(e)}`);
  }
  return configFromObject(data);
}

/**
 * Create configuration from a plain object (e.g., parsed JSON).
 */
export function configFromObject(data: unknown): PartialConfig {
  const parsed = ConfigSchema.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
    throw new Error(`Invalid configuration: ${issues.join("; ")}`);
  }
  return parsed.data;
}

/**
 * Merge configs over the defaults, with later ones overriding earlier ones.
 */
export function mergeConfigs(...configs: PartialConfig[]): NodalConfig {
  const result: NodalConfig = {
    envs: { ...DEFAULT_CONFIG.envs },
    log: { ...DEFAULT_CONFIG.log },
    runtime: { ...DEFAULT_CONFIG.runtime },
  };

  for (const cfg of configs) {
    if (cfg.envs) result.envs = { ...result.envs, ...cfg.envs };
    if (cfg.log) result.log = { ...result.log, ...cfg.log };
    if (cfg.runtime) result.runtime = { ...result.runtime, ...cfg.runtime };
  }

  return result;
}

/**
 * Auto-detect and load configuration.
 * Priority: overrides > config file > environment > defaults
 */
export function loadConfig(options?: {
  configFile?: string;
  overrides?: PartialConfig;
  env?: NodeJS.ProcessEnv;
}): NodalConfig {
  const layers: PartialConfig[] = [configFromEnv("NODAL", options?.env)];

  if (options?.configFile) {
    layers.push(configFromFile(options.configFile));
  } else {
    const found = DEFAULT_CONFIG_FILES.find((p) => fs.existsSync(p));
    if (found) layers.push(configFromFile(found));
  }

  if (options?.overrides) layers.push(options.overrides);
  return mergeConfigs(...layers);
}

// =========================================================================
// Config Validation
// =========================================================================

export type ConfigValidation = {
  valid: boolean;
  errors: string[];
  warnings: string[];
};

export function validateConfig(config: NodalConfig): ConfigValidation {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (config.envs.metaFile.includes("/") || config.envs.metaFile.includes("\\")) {
    errors.push("metaFile must be a file name inside baseDir");
  }
  if (config.runtime.maxParseDepth < 1) {
    errors.push("maxParseDepth must be at least 1");
  }
  if (config.runtime.maxPrintDepth < 1) {
    errors.push("maxPrintDepth must be at least 1");
  }
  if (config.runtime.maxPrintLength < 1) {
    errors.push("maxPrintLength must be at least 1");
  }

  if (config.envs.serializeBlacklist.includes(config.envs.metaFile)) {
    warnings.push(`${config.envs.metaFile} is always written; blacklisting it has no effect`);
  }
  if (config.envs.serializeBlacklist.includes("lang.env")) {
    warnings.push("lang.env is blacklisted; definitions added to it will not be saved");
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}
