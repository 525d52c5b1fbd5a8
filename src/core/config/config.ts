// src/core/config/config.ts
// Engine configuration: defaults, environment, JSON files, overrides

import * as fs from "fs";
import * as path from "path";
import type { LintConfig, PassConfig } from "../../lint/types";

// =========================================================================
// Configuration Types
// =========================================================================

export type MatchConfig = {
  /** Let a later capture of the same name replace an earlier one instead of rejecting the pattern */
  allowShadowing: boolean;
  /** Maximum pattern nesting before matching is treated as non-terminating */
  maxDepth: number;
};

export type EngineConfig = {
  match: MatchConfig;
  lint: LintConfig;
  /** Trace case selection through the console log port */
  trace: boolean;
};

/** The settings one source actually gives; anything left out falls through to earlier layers. */
export type ConfigLayer = {
  match?: Partial<MatchConfig>;
  lint?: LintConfig;
  trace?: boolean;
};

// =========================================================================
// Default Configuration
// =========================================================================

export const DEFAULT_MATCH_CONFIG: MatchConfig = {
  allowShadowing: false,
  maxDepth: 1000,
};

export const DEFAULT_LINT_CONFIG: LintConfig = { passes: {} };

export const DEFAULT_CONFIG: EngineConfig = {
  match: DEFAULT_MATCH_CONFIG,
  lint: DEFAULT_LINT_CONFIG,
  trace: false,
};

export const DEFAULT_CONFIG_FILES = ["structmatch.config.json", ".structmatchrc.json"];

// =========================================================================
// Configuration Loading
// =========================================================================

/**
 * Load configuration from environment variables.
 */
export function configFromEnv(prefix = "STRUCTMATCH"): EngineConfig {
  const allowShadowing = parseBool(process.env[`${prefix}_ALLOW_SHADOWING`]) ?? DEFAULT_MATCH_CONFIG.allowShadowing;
  const maxDepth = parseInt(process.env[`${prefix}_MAX_DEPTH`] || "", 10) || DEFAULT_MATCH_CONFIG.maxDepth;
  const trace = parseBool(process.env[`${prefix}_TRACE`]) ?? DEFAULT_CONFIG.trace;

  return {
    match: { allowShadowing, maxDepth },
    lint: { passes: {} },
    trace,
  };
}

/**
 * Load the settings a JSON file gives. Keys it leaves out stay unset.
 */
export function configFromFile(filePath: string): ConfigLayer {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Config file not found: ${filePath}`);
  }

  const ext = path.extname(filePath).toLowerCase();
  if (ext !== ".json") {
    throw new Error(`Unsupported config file format: ${ext || "(none)"}`);
  }

  const data: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));
  if (!isObject(data)) {
    throw new Error(`Config file must hold a JSON object: ${filePath}`);
  }
  return layerFromObject(data);
}

/**
 * Read the settings a plain object (e.g., parsed JSON) gives. Both camelCase
 * and snake_case keys are accepted; values of the wrong type are left unset.
 */
export function layerFromObject(data: Record<string, unknown>): ConfigLayer {
  const layer: ConfigLayer = {};

  if (isObject(data.match)) {
    const match: Partial<MatchConfig> = {};
    const allowShadowing = pick(data.match, "allowShadowing", "allow_shadowing");
    const maxDepth = pick(data.match, "maxDepth", "max_depth");
    if (typeof allowShadowing === "boolean") match.allowShadowing = allowShadowing;
    if (typeof maxDepth === "number" && maxDepth > 0) match.maxDepth = maxDepth;
    layer.match = match;
  }
  if (isObject(data.lint)) {
    layer.lint = { passes: passesFromObject(data.lint.passes) };
  }
  if (typeof data.trace === "boolean") {
    layer.trace = data.trace;
  }

  return layer;
}

/**
 * Create a complete configuration from a plain object, defaults filling the gaps.
 */
export function configFromObject(data: Record<string, unknown>): EngineConfig {
  return mergeConfigs(layerFromObject(data));
}

/**
 * Merge configs with later ones overriding earlier ones.
 */
export function mergeConfigs(...configs: ConfigLayer[]): EngineConfig {
  let result: EngineConfig = { ...DEFAULT_CONFIG };

  for (const cfg of configs) {
    if (cfg.match) {
      result = { ...result, match: { ...result.match, ...cfg.match } };
    }
    if (cfg.lint) {
      result = { ...result, lint: { passes: { ...result.lint.passes, ...cfg.lint.passes } } };
    }
    if (cfg.trace !== undefined) {
      result = { ...result, trace: cfg.trace };
    }
  }

  return result;
}

/**
 * Auto-detect and load configuration.
 * Priority: overrides > config file > environment > defaults
 */
export function loadConfig(options?: {
  configFile?: string;
  overrides?: ConfigLayer;
  cwd?: string;
}): EngineConfig {
  let config = configFromEnv();

  if (options?.configFile) {
    config = mergeConfigs(config, configFromFile(options.configFile));
  } else {
    for (const name of DEFAULT_CONFIG_FILES) {
      const p = path.resolve(options?.cwd ?? process.cwd(), name);
      if (fs.existsSync(p)) {
        config = mergeConfigs(config, configFromFile(p));
        break;
      }
    }
  }

  if (options?.overrides) {
    config = mergeConfigs(config, options.overrides);
  }

  return config;
}

// =========================================================================
// Config Validation
// =========================================================================

export type ConfigValidation = {
  valid: boolean;
  errors: string[];
  warnings: string[];
};

export function validateConfig(config: EngineConfig): ConfigValidation {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!Number.isInteger(config.match.maxDepth) || config.match.maxDepth < 1) {
    errors.push("match.maxDepth must be a positive integer");
  } else if (config.match.maxDepth < 16) {
    warnings.push("match.maxDepth is very low, nested patterns may be rejected");
  }

  for (const [id, pass] of Object.entries(config.lint.passes)) {
    if (pass.enabled === false && pass.severityOverride !== undefined && pass.severityOverride !== "off") {
      warnings.push(`lint pass ${id} is disabled; its severity override has no effect`);
    }
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}

// =========================================================================
// Helpers
// =========================================================================

function isObject(x: unknown): x is Record<string, unknown> {
  return typeof x === "object" && x !== null && !Array.isArray(x);
}

function pick(data: Record<string, unknown>, ...keys: string[]): unknown {
  for (const key of keys) {
    if (data[key] !== undefined) return data[key];
  }
  return undefined;
}

function parseBool(raw: string | undefined): boolean | undefined {
  if (raw === undefined || raw === "") return undefined;
  const v = raw.trim().toLowerCase();
  if (v === "1" || v === "true" || v === "yes" || v === "on") return true;
  if (v === "0" || v === "false" || v === "no" || v === "off") return false;
  return undefined;
}

const SEVERITIES = ["error", "warning", "info", "off"] as const;

function passesFromObject(raw: unknown): Record<string, PassConfig> {
  if (!isObject(raw)) return {};
  const out: Record<string, PassConfig> = {};
  for (const [id, entry] of Object.entries(raw)) {
    if (!isObject(entry)) continue;
    const severity = SEVERITIES.find(s => s === entry.severityOverride);
    const pass: PassConfig = { enabled: entry.enabled !== false };
    if (severity) pass.severityOverride = severity;
    out[id] = pass;
  }
  return out;
}
