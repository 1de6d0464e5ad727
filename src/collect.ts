/**
 * overlay-spec Path Collector
 * Gathers candidate repository-relative paths from diffs, selectors and the working tree
 */

import * as path from 'path';
import { GitCommandError, SelectionError } from './errors.js';
import {
  diffCommit,
  diffRefs,
  diffStaged,
  diffUnstaged,
  fetchPrune,
  forkPoint,
  isAncestor,
  listUntracked,
  mergeBase,
  verifyRef,
} from './git.js';
import { expandHome, isInside, resolveReal, toPosix } from './paths.js';
import { ExplicitSelection, RunContext } from './types.js';

// =============================================================================
// HELPERS
// =============================================================================

/**
 * True if the relative path starts with any allowed prefix
 */
export function isUnderPrefixes(rel: string, prefixes: readonly string[]): boolean {
  return prefixes.some((prefix) => rel.startsWith(prefix));
}

function addFiltered(into: Set<string>, paths: Iterable<string>, prefixes: readonly string[]): void {
  for (const rel of paths) {
    if (isUnderPrefixes(rel, prefixes)) {
      into.add(rel);
    }
  }
}

/**
 * Re-label a git failure with what the run was trying to do
 */
async function step<T>(description: string, run: () => Promise<T>): Promise<T> {
  try {
    return await run();
  } catch (error) {
    if (error instanceof GitCommandError) {
      throw new GitCommandError(description, error.args, error.stderr, error.code);
    }
    throw error;
  }
}

/**
 * Split `A..B` at the first `..`
 */
export function parseRange(range: string): { from: string; to: string } {
  const idx = range.indexOf('..');
  if (idx === -1) {
    throw new SelectionError(`range must be A..B, got: ${range}`);
  }
  return { from: range.slice(0, idx), to: range.slice(idx + 2) };
}

// =============================================================================
// VALIDATION
// =============================================================================

export async function maybeFetch(ctx: RunContext): Promise<void> {
  if (!ctx.config.fetch) return;
  await step('git fetch failed', () => fetchPrune(ctx.git));
}

export async function ensureTargetExists(ctx: RunContext): Promise<void> {
  const { target } = ctx.config;
  await step(`target ref invalid: ${target}`, () => verifyRef(ctx.git, target));
}

/**
 * Every selected commit and range tip must be reachable from the target.
 * Anything else would need content from outside the diff model.
 */
export async function validateSelectors(ctx: RunContext): Promise<void> {
  const { commits, ranges } = ctx.config.selectors;
  const { target } = ctx.config;

  for (const commit of commits) {
    const ok = await step(`cannot check ancestry of commit ${commit}`, () =>
      isAncestor(ctx.git, commit, target)
    );
    if (!ok) {
      throw new SelectionError(`commit ${commit} is not an ancestor of ${target}. Cannot include without copying.`);
    }
  }

  for (const range of ranges) {
    const { to } = parseRange(range);
    const ok = await step(`cannot check ancestry of range tip ${to}`, () =>
      isAncestor(ctx.git, to, target)
    );
    if (!ok) {
      throw new SelectionError(`range tip ${to} is not an ancestor of ${target}. Cannot include without copying.`);
    }
  }
}

// =============================================================================
// BASELINE RESOLUTION
// =============================================================================

/**
 * Turn the configured baseline into the ref the diff starts from
 */
export async function resolveEffectiveBaseline(ctx: RunContext): Promise<string> {
  const { baseline, target, options } = ctx.config;

  switch (options.baselineMode) {
    case 'raw':
      return baseline;
    case 'merge-base':
      return step(`git merge-base failed for ${baseline} and ${target}`, () =>
        mergeBase(ctx.git, baseline, target)
      );
    case 'fork-point': {
      const fork = await forkPoint(ctx.git, baseline, target);
      if (fork) return fork;
      ctx.logger.debug(`no fork point for ${baseline} and ${target}; using merge-base`);
      return step(`git merge-base fallback failed for ${baseline} and ${target}`, () =>
        mergeBase(ctx.git, baseline, target)
      );
    }
  }
}

// =============================================================================
// COLLECTION
// =============================================================================

export async function collectFromBaseline(ctx: RunContext, baseline: string): Promise<Set<string>> {
  const { target, options } = ctx.config;
  const paths = await step(`diff ${baseline}..${target} failed`, () =>
    diffRefs(ctx.git, baseline, target)
  );
  const result = new Set<string>();
  addFiltered(result, paths, options.restrictPrefixes);
  return result;
}

export async function collectFromCommits(ctx: RunContext): Promise<Set<string>> {
  const result = new Set<string>();
  for (const commit of ctx.config.selectors.commits) {
    const paths = await step(`diff-tree for ${commit} failed`, () => diffCommit(ctx.git, commit));
    addFiltered(result, paths, ctx.config.options.restrictPrefixes);
  }
  return result;
}

export async function collectFromRanges(ctx: RunContext): Promise<Set<string>> {
  const result = new Set<string>();
  for (const range of ctx.config.selectors.ranges) {
    const { from, to } = parseRange(range);
    const paths = await step(`diff for range ${range} failed`, () => diffRefs(ctx.git, from, to));
    addFiltered(result, paths, ctx.config.options.restrictPrefixes);
  }
  return result;
}

/**
 * Staged, unstaged and untracked paths. Untracked files count as added.
 */
export async function collectFromUncommitted(ctx: RunContext): Promise<Set<string>> {
  const prefixes = ctx.config.options.restrictPrefixes;
  const result = new Set<string>();

  addFiltered(result, await step('diff --cached failed', () => diffStaged(ctx.git)), prefixes);
  addFiltered(result, await step('diff (worktree) failed', () => diffUnstaged(ctx.git)), prefixes);
  addFiltered(result, await step('ls-files for untracked failed', () => listUntracked(ctx.git)), prefixes);

  return result;
}

/**
 * Normalize explicit path selectors to repo-relative POSIX paths.
 * Absolute paths must resolve inside the repository.
 */
export function normalizeExplicitPaths(
  explicitPaths: readonly string[],
  repoDir: string,
  prefixes: readonly string[]
): ExplicitSelection {
  const explicit = new Set<string>();
  const selected = new Set<string>();

  for (const raw of explicitPaths) {
    const expanded = expandHome(raw);
    let rel: string;

    if (path.isAbsolute(expanded)) {
      const resolved = resolveReal(expanded);
      if (!isInside(resolved, repoDir)) {
        throw new SelectionError(`explicit path not under repo_dir: ${raw}`);
      }
      rel = toPosix(path.relative(repoDir, resolved));
    } else {
      rel = path.posix.normalize(toPosix(expanded));
    }

    explicit.add(rel);
    if (isUnderPrefixes(rel, prefixes)) {
      selected.add(rel);
    }
  }

  return { explicit, selected };
}

/**
 * Union of every collection source, plus the unfiltered explicit set
 */
export async function collectCandidates(
  ctx: RunContext
): Promise<{ candidates: Set<string>; explicit: Set<string> }> {
  const candidates = new Set<string>();
  const merge = (label: string, paths: Set<string>): void => {
    ctx.logger.debug(`${label}: ${paths.size} path(s)`);
    for (const p of paths) candidates.add(p);
  };

  const baseline = await resolveEffectiveBaseline(ctx);
  merge(`baseline ${baseline}..${ctx.config.target}`, await collectFromBaseline(ctx, baseline));
  merge('commits', await collectFromCommits(ctx));
  merge('ranges', await collectFromRanges(ctx));
  if (ctx.config.options.includeUncommitted) {
    merge('uncommitted', await collectFromUncommitted(ctx));
  }

  const { explicit, selected } = normalizeExplicitPaths(
    ctx.config.selectors.paths,
    ctx.config.repoDir,
    ctx.config.options.restrictPrefixes
  );
  merge('explicit', selected);

  return { candidates, explicit };
}
