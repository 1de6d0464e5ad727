/**
 * overlay-spec - Overlay manifest generator
 *
 * Turns git diffs and explicit selectors into a manifest of `.spec` and `.m`
 * files, written relative to the manifest's own directory.
 *
 * @packageDocumentation
 */

// Main entry
export { generateOverlay, resolveOutputPath, resolveIncludeSpecs, type GenerateOptions } from './generate.js';

// Configuration
export {
  loadConfig,
  parseConfig,
  resolveRepoDir,
  parseOrderMode,
  parseBaselineMode,
  parseOutputFormat,
  DEFAULT_OUTPUT_NAME,
} from './config.js';

// Git utilities
export {
  createGitRunner,
  parseNameStatus,
  parsePathList,
  fetchPrune,
  verifyRef,
  isAncestor,
  mergeBase,
  forkPoint,
  diffRefs,
  diffCommit,
  diffStaged,
  diffUnstaged,
  listUntracked,
} from './git.js';

// Collection
export {
  isUnderPrefixes,
  parseRange,
  maybeFetch,
  ensureTargetExists,
  validateSelectors,
  resolveEffectiveBaseline,
  collectFromBaseline,
  collectFromCommits,
  collectFromRanges,
  collectFromUncommitted,
  normalizeExplicitPaths,
  collectCandidates,
} from './collect.js';

// Classification
export { classifyPath, classifyPaths, SPEC_EXTENSION, SOURCE_EXTENSION } from './classify.js';
export type { PathKind } from './classify.js';

// Formatting and output
export { buildFlatLines, buildCurlyLines, buildManifestLines, SPEC_PREFIX } from './format.js';
export type { FormatOptions } from './format.js';
export { wrapManifest, renderManifest, tempPathFor, writeManifestAtomic } from './writer.js';

// Logging
export { createConsoleLogger } from './logger.js';

// Errors
export {
  OverlayError,
  ConfigError,
  GitCommandError,
  SelectionError,
  isOverlayError,
  FATAL_EXIT_CODE,
} from './errors.js';

// Types
export type {
  OrderMode,
  BaselineMode,
  OutputFormat,
  SelectorConfig,
  OverlayOptions,
  OverlayConfig,
  ClassifiedPaths,
  ExplicitSelection,
  Logger,
  GitRunner,
  RunContext,
  GenerateResult,
} from './types.js';
