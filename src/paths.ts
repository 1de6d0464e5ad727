/**
 * overlay-spec Path Helpers
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

/**
 * Expand a leading `~` or `~/` to the current user's home directory
 */
export function expandHome(p: string): string {
  if (p === '~') return os.homedir();
  if (p.startsWith('~/')) return path.join(os.homedir(), p.slice(2));
  return p;
}

/**
 * Absolute, normalized path with symlinks resolved for the part that exists.
 * Missing trailing segments are appended unresolved.
 */
export function resolveReal(p: string): string {
  const absolute = path.resolve(p);
  const missing: string[] = [];
  let current = absolute;

  for (;;) {
    try {
      const real = fs.realpathSync(current);
      return missing.length > 0 ? path.join(real, ...missing.reverse()) : real;
    } catch {
      const parent = path.dirname(current);
      if (parent === current) return absolute;
      missing.push(path.basename(current));
      current = parent;
    }
  }
}

/**
 * POSIX-style relative path from `from` to `to`
 */
export function relativePosix(to: string, from: string): string {
  return path.relative(from, to).split(path.sep).join('/');
}

/**
 * Convert a platform path to forward slashes
 */
export function toPosix(p: string): string {
  return p.split(path.sep).join('/');
}

/**
 * True if `child` equals `parent` or lies beneath it
 */
export function isInside(child: string, parent: string): boolean {
  const rel = path.relative(parent, child);
  if (rel === '') return true;
  return rel !== '..' && !rel.startsWith(`..${path.sep}`) && !path.isAbsolute(rel);
}
