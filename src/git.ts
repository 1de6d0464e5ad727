/**
 * overlay-spec Git Utilities
 * Read-only repository queries and `--name-status` parsing
 */

import { execFile } from 'child_process';
import { GitCommandError } from './errors.js';
import { GitRunner } from './types.js';

const EXEC_MAX_BUFFER = 64 * 1024 * 1024;

/**
 * Create a runner that executes `git -C <repoDir> <args>`.
 * Non-ASCII paths are printed verbatim rather than octal-quoted.
 * No timeout is applied; a hung git hangs the run.
 */
export function createGitRunner(repoDir: string): GitRunner {
  return (args) => execGit(['-C', repoDir, '-c', 'core.quotePath=false', ...args]);
}

function execGit(args: string[]): Promise<string> {
  return new Promise((resolve, reject) => {
    execFile('git', args, { maxBuffer: EXEC_MAX_BUFFER, encoding: 'utf8' }, (error, stdout, stderr) => {
      if (error) {
        const code = typeof error.code === 'number' ? error.code : null;
        reject(new GitCommandError(`git ${args.join(' ')} failed`, args, stderr || error.message, code));
        return;
      }
      resolve(stdout);
    });
  });
}

// =============================================================================
// PARSING
// =============================================================================

/**
 * Parse `git diff --name-status` / `git diff-tree --name-status` output.
 * Renames report their destination path. Records with too few fields are skipped.
 */
export function parseNameStatus(text: string): string[] {
  const paths: string[] = [];

  for (const line of text.split('\n')) {
    if (!line.trim()) continue;

    const parts = line.replace(/\r$/, '').split('\t');
    const status = parts[0];

    if (status.startsWith('R')) {
      // R100, R097, ...
      if (parts.length < 3) continue;
      paths.push(parts[2]);
    } else {
      if (parts.length < 2) continue;
      paths.push(parts[1]);
    }
  }

  return paths;
}

/**
 * Parse one-path-per-line output such as `git ls-files`
 */
export function parsePathList(text: string): string[] {
  return text
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

// =============================================================================
// QUERIES
// =============================================================================

export async function fetchPrune(git: GitRunner): Promise<void> {
  await git(['fetch', '--prune']);
}

/**
 * Resolve a ref to its object id; rejects if the ref does not exist
 */
export async function verifyRef(git: GitRunner, ref: string): Promise<string> {
  const out = await git(['rev-parse', '--verify', ref]);
  return out.trim();
}

/**
 * `git merge-base --is-ancestor` answers through its exit code: 0 yes, 1 no.
 * Anything else (unknown ref, not a repository) is rethrown.
 */
export async function isAncestor(git: GitRunner, ancestor: string, descendant: string): Promise<boolean> {
  try {
    await git(['merge-base', '--is-ancestor', ancestor, descendant]);
    return true;
  } catch (error) {
    if (error instanceof GitCommandError && error.code === 1) {
      return false;
    }
    throw error;
  }
}

export async function mergeBase(git: GitRunner, a: string, b: string): Promise<string> {
  const out = await git(['merge-base', a, b]);
  return out.trim();
}

/**
 * Fork point of `b` relative to the reflog of `a`.
 * Returns null when git cannot determine one.
 */
export async function forkPoint(git: GitRunner, a: string, b: string): Promise<string | null> {
  try {
    const out = (await git(['merge-base', '--fork-point', a, b])).trim();
    return out || null;
  } catch (error) {
    if (error instanceof GitCommandError) return null;
    throw error;
  }
}

/**
 * Added, modified and renamed paths between two refs
 */
export async function diffRefs(git: GitRunner, from: string, to: string): Promise<string[]> {
  const out = await git(['diff', '--name-status', '--diff-filter=AMR', `${from}..${to}`]);
  return parseNameStatus(out);
}

/**
 * Added, modified and renamed paths of one commit against its first parent
 */
export async function diffCommit(git: GitRunner, commit: string): Promise<string[]> {
  const out = await git([
    'diff-tree', '--name-status', '--first-parent', '-r', `${commit}^!`, '--diff-filter=AMR',
  ]);
  return parseNameStatus(out);
}

export async function diffStaged(git: GitRunner): Promise<string[]> {
  const out = await git(['diff', '--cached', '--name-status', '--diff-filter=AMR']);
  return parseNameStatus(out);
}

export async function diffUnstaged(git: GitRunner): Promise<string[]> {
  const out = await git(['diff', '--name-status', '--diff-filter=AMR']);
  return parseNameStatus(out);
}

export async function listUntracked(git: GitRunner): Promise<string[]> {
  const out = await git(['ls-files', '--others', '--exclude-standard']);
  return parsePathList(out);
}
