/**
 * overlay-spec Classifier
 * Resolves candidate paths against the working tree and buckets them by extension
 */

import * as fs from 'fs';
import * as path from 'path';
import { resolveReal } from './paths.js';
import { ClassifiedPaths } from './types.js';

export const SPEC_EXTENSION = '.spec';
export const SOURCE_EXTENSION = '.m';

export type PathKind = 'spec' | 'source' | 'ignored';

/**
 * Classify a path by suffix. Anything other than `.spec` / `.m` is ignored.
 */
export function classifyPath(p: string): PathKind {
  if (p.endsWith(SPEC_EXTENSION)) return 'spec';
  if (p.endsWith(SOURCE_EXTENSION)) return 'source';
  return 'ignored';
}

/**
 * Resolve each candidate under `repoDir`.
 *
 * Missing candidates go to `missingExplicit` when they were requested by an
 * explicit selector and to `dropped` otherwise. Explicit paths outside the
 * allowed prefixes are never emitted, but are still checked for existence.
 */
export function classifyPaths(
  repoDir: string,
  candidates: Iterable<string>,
  explicit: ReadonlySet<string>
): ClassifiedPaths {
  const result: ClassifiedPaths = {
    specs: new Set(),
    sources: new Set(),
    missingExplicit: [],
    dropped: [],
  };

  const candidateSet = new Set(candidates);

  for (const rel of [...candidateSet].sort()) {
    const absolute = path.join(repoDir, rel);
    if (!fs.existsSync(absolute)) {
      if (explicit.has(rel)) {
        result.missingExplicit.push(rel);
      } else {
        result.dropped.push(rel);
      }
      continue;
    }

    const kind = classifyPath(rel);
    if (kind === 'spec') {
      result.specs.add(resolveReal(absolute));
    } else if (kind === 'source') {
      result.sources.add(resolveReal(absolute));
    }
  }

  for (const rel of [...explicit].sort()) {
    if (candidateSet.has(rel)) continue;
    if (!fs.existsSync(path.join(repoDir, rel))) {
      result.missingExplicit.push(rel);
    }
  }
  result.missingExplicit.sort();

  return result;
}
