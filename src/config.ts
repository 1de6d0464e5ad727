/**
 * overlay-spec Configuration System
 * Loads the TOML run configuration and applies defaults and environment overrides
 */

import * as fs from 'fs';
import * as path from 'path';
import { parse, TomlError } from 'smol-toml';
import { ConfigError } from './errors.js';
import { expandHome, resolveReal } from './paths.js';
import {
  BaselineMode,
  BASELINE_MODES,
  OrderMode,
  OutputFormat,
  OUTPUT_FORMATS,
  OverlayConfig,
  OverlayOptions,
} from './types.js';

// Re-export for convenience
export type { OverlayConfig, OverlayOptions };

export const DEFAULT_OUTPUT_NAME = '.magma_overlay.spec';

// =============================================================================
// DEFAULT CONFIGURATION
// =============================================================================

const DEFAULTS = {
  baseline: 'origin/main',
  target: 'HEAD',
  fetch: false,
  options: {
    restrictPrefixes: ['package/'],
    order: 'spec-first',
    baselineMode: 'raw',
    outputFormat: 'curly',
    includeUncommitted: true,
  } satisfies OverlayOptions,
};

// =============================================================================
// ENVIRONMENT VARIABLES
// =============================================================================

/**
 * Environment variables that override the config file
 *
 * OVERLAY_SPEC_OUTPUT: string - Output path (the --output flag still wins)
 * OVERLAY_SPEC_FETCH: 'true' | 'false' - Run `git fetch --prune` first
 */

function getEnvBoolean(env: NodeJS.ProcessEnv, key: string, defaultValue: boolean): boolean {
  const value = env[key];
  if (value === undefined || value === '') return defaultValue;
  return value.toLowerCase() === 'true';
}

function getEnvString(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = env[key];
  return value ? value : undefined;
}

// =============================================================================
// TOML VALUE READERS
// =============================================================================

type Table = Record<string, unknown>;

function isTable(value: unknown): value is Table {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

function readTable(table: Table, key: string, label = key): Table {
  const value = table[key];
  if (value === undefined) return {};
  if (!isTable(value)) {
    throw new ConfigError(`config key '${label}' must be a table`);
  }
  return value;
}

function readString(table: Table, key: string, label = key): string | undefined {
  const value = table[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'string') {
    throw new ConfigError(`config key '${label}' must be a string`);
  }
  return value;
}

function readBoolean(table: Table, key: string, label = key): boolean | undefined {
  const value = table[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'boolean') {
    throw new ConfigError(`config key '${label}' must be a boolean`);
  }
  return value;
}

function readStringList(table: Table, key: string, label = key): string[] | undefined {
  const value = table[key];
  if (value === undefined) return undefined;
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
    throw new ConfigError(`config key '${label}' must be a list of strings`);
  }
  return [...value];
}

// =============================================================================
// MODE PARSING
// =============================================================================

/**
 * 'spec-first' keeps groups apart; any other value merges them alphabetically
 */
export function parseOrderMode(value: string | undefined): OrderMode {
  return (value ?? DEFAULTS.options.order) === 'spec-first' ? 'spec-first' : 'merged';
}

export function parseBaselineMode(value: string | undefined): BaselineMode {
  const mode = (value || DEFAULTS.options.baselineMode).toLowerCase();
  const known = BASELINE_MODES.find((m) => m === mode);
  if (!known) {
    throw new ConfigError(`unknown baseline_mode '${value}'. Use 'raw', 'merge-base', or 'fork-point'.`);
  }
  return known;
}

export function parseOutputFormat(value: string | undefined): OutputFormat {
  const format = (value || DEFAULTS.options.outputFormat).toLowerCase();
  const known = OUTPUT_FORMATS.find((f) => f === format);
  if (!known) {
    throw new ConfigError(`unknown output_format '${value}'. Use 'flat' or 'curly'.`);
  }
  return known;
}

// =============================================================================
// CONFIGURATION LOADING
// =============================================================================

/**
 * Resolve `repo_dir` to an absolute path. Relative values are taken from the
 * directory holding the config file.
 */
export function resolveRepoDir(raw: string, configPath: string): string {
  const expanded = expandHome(raw);
  if (path.isAbsolute(expanded)) {
    return resolveReal(expanded);
  }
  return resolveReal(path.join(path.dirname(configPath), expanded));
}

/**
 * Parse TOML text into an OverlayConfig
 */
export function parseConfig(
  text: string,
  configPath: string,
  env: NodeJS.ProcessEnv = process.env
): OverlayConfig {
  let raw: Table;
  try {
    raw = parse(text);
  } catch (error) {
    if (error instanceof TomlError) {
      throw new ConfigError(`invalid TOML in ${configPath}: ${error.message}`);
    }
    throw error;
  }

  const repoDirRaw = readString(raw, 'repo_dir');
  if (repoDirRaw === undefined) {
    throw new ConfigError("config must define 'repo_dir' (absolute or relative to the TOML).");
  }

  const selectors = readTable(raw, 'selectors');
  const opts = readTable(raw, 'options');

  const options: OverlayOptions = {
    restrictPrefixes:
      readStringList(opts, 'restrict_prefixes', 'options.restrict_prefixes') ??
      [...DEFAULTS.options.restrictPrefixes],
    order: parseOrderMode(readString(opts, 'order', 'options.order')),
    baselineMode: parseBaselineMode(readString(opts, 'baseline_mode', 'options.baseline_mode')),
    outputFormat: parseOutputFormat(readString(opts, 'output_format', 'options.output_format')),
    includeUncommitted:
      readBoolean(opts, 'include_uncommitted', 'options.include_uncommitted') ??
      DEFAULTS.options.includeUncommitted,
  };

  // include_specs and output may live at the top level or under [options]
  const topSpecs = readStringList(raw, 'include_specs') ?? [];
  const optionSpecs = readStringList(opts, 'include_specs', 'options.include_specs') ?? [];
  const includeSpecs = topSpecs.length > 0 ? topSpecs : optionSpecs;

  const output =
    getEnvString(env, 'OVERLAY_SPEC_OUTPUT') ??
    (readString(raw, 'output') || readString(opts, 'output', 'options.output') || undefined);

  const config: OverlayConfig = {
    configPath,
    repoDir: resolveRepoDir(repoDirRaw, configPath),
    baseline: readString(raw, 'baseline') ?? DEFAULTS.baseline,
    target: readString(raw, 'target') ?? DEFAULTS.target,
    fetch: getEnvBoolean(env, 'OVERLAY_SPEC_FETCH', readBoolean(raw, 'fetch') ?? DEFAULTS.fetch),
    selectors: {
      commits: readStringList(selectors, 'commits', 'selectors.commits') ?? [],
      ranges: readStringList(selectors, 'ranges', 'selectors.ranges') ?? [],
      paths: readStringList(selectors, 'paths', 'selectors.paths') ?? [],
    },
    options,
    includeSpecs,
    output,
  };

  return Object.freeze(config);
}

/**
 * Read and parse the config file at `configPath`
 */
export function loadConfig(configPath: string, env: NodeJS.ProcessEnv = process.env): OverlayConfig {
  const resolved = resolveReal(configPath);
  if (!fs.existsSync(resolved) || !fs.statSync(resolved).isFile()) {
    throw new ConfigError(`config not found: ${resolved}`);
  }
  return parseConfig(fs.readFileSync(resolved, 'utf-8'), resolved, env);
}
