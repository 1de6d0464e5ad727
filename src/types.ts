/**
 * overlay-spec Type Definitions
 * Configuration, run context and result shapes shared by every stage
 */

// =============================================================================
// CONFIGURATION TYPES
// =============================================================================

/**
 * How collected manifest and source entries are ordered in flat output
 */
export type OrderMode =
  | 'spec-first'     // all `.spec` entries, then all `.m` entries
  | 'merged';        // one alphabetical pass over the rendered lines

/**
 * How the configured baseline ref is turned into the diff start point
 */
export type BaselineMode = 'raw' | 'merge-base' | 'fork-point';

/**
 * Output layout of the manifest body
 */
export type OutputFormat = 'flat' | 'curly';

export const BASELINE_MODES: readonly BaselineMode[] = ['raw', 'merge-base', 'fork-point'];
export const OUTPUT_FORMATS: readonly OutputFormat[] = ['flat', 'curly'];

export interface SelectorConfig {
  /** Commit ids whose first-parent diff is added */
  commits: string[];
  /** `A..B` ranges whose diff is added */
  ranges: string[];
  /** Paths added verbatim (absolute or repo-relative) */
  paths: string[];
}

export interface OverlayOptions {
  restrictPrefixes: string[];
  order: OrderMode;
  baselineMode: BaselineMode;
  outputFormat: OutputFormat;
  includeUncommitted: boolean;
}

export interface OverlayConfig {
  /** Absolute path of the TOML file the config was read from */
  configPath: string;
  /** Absolute, resolved repository root */
  repoDir: string;
  baseline: string;
  target: string;
  fetch: boolean;
  selectors: SelectorConfig;
  options: OverlayOptions;
  /** Spec files always emitted at the top of the manifest */
  includeSpecs: string[];
  /** Output path from the config file, if any (unresolved) */
  output?: string;
}

// =============================================================================
// PIPELINE TYPES
// =============================================================================

/**
 * Result of resolving candidate paths against the working tree
 */
export interface ClassifiedPaths {
  /** Absolute paths of `.spec` files */
  specs: Set<string>;
  /** Absolute paths of `.m` files */
  sources: Set<string>;
  /** Explicitly requested relative paths that do not exist (fatal) */
  missingExplicit: string[];
  /** Diff-discovered relative paths that do not exist (warned) */
  dropped: string[];
}

export interface ExplicitSelection {
  /** Every explicit path, normalized, regardless of prefix */
  explicit: Set<string>;
  /** Explicit paths that pass the prefix filter */
  selected: Set<string>;
}

/**
 * Minimal logging sink used by library stages
 */
export interface Logger {
  debug(message: string): void;
  warn(message: string): void;
}

/**
 * Runs `git <args>` and returns stdout. Rejects with GitCommandError on a
 * non-zero exit.
 */
export type GitRunner = (args: string[]) => Promise<string>;

/**
 * Per-run state handed from stage to stage
 */
export interface RunContext {
  config: OverlayConfig;
  git: GitRunner;
  logger: Logger;
}

export interface GenerateResult {
  outputPath: string;
  specCount: number;
  sourceCount: number;
  /** Manifest lines including the outer braces */
  lines: string[];
  dropped: string[];
  written: boolean;
}
