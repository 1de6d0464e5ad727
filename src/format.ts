/**
 * overlay-spec Formatter
 * Renders classified paths as flat or directory-grouped ("curly") manifest lines
 *
 * All paths are written relative to the output file's directory. Manifest
 * (`.spec`) entries carry a `+` prefix; source entries are bare.
 */

import * as path from 'path';
import { ConfigError } from './errors.js';
import { relativePosix } from './paths.js';
import { ClassifiedPaths, OrderMode } from './types.js';

export const SPEC_PREFIX = '+';
const INDENT = '  ';

function specLine(rel: string): string {
  return `${SPEC_PREFIX}${rel}`;
}

/**
 * Collected specs minus anything already forced to the top
 */
function bodySpecs(specs: ReadonlySet<string>, includeSpecs: readonly string[]): string[] {
  const forced = new Set(includeSpecs);
  return [...specs].filter((p) => !forced.has(p));
}

function forcedLines(includeSpecs: readonly string[], outDir: string): string[] {
  return includeSpecs.map((p) => specLine(relativePosix(p, outDir)));
}

// =============================================================================
// FLAT LAYOUT
// =============================================================================

/**
 * One entry per line. `spec-first` keeps specs (sorted) ahead of sources
 * (sorted); `merged` sorts every rendered line together, `+` included.
 */
export function buildFlatLines(
  classified: Pick<ClassifiedPaths, 'specs' | 'sources'>,
  order: OrderMode,
  outDir: string,
  includeSpecs: readonly string[] = []
): string[] {
  const toRel = (p: string): string => relativePosix(p, outDir);
  const specs = bodySpecs(classified.specs, includeSpecs);
  const lines = forcedLines(includeSpecs, outDir);

  if (order === 'spec-first') {
    for (const p of [...specs].sort()) lines.push(specLine(toRel(p)));
    for (const p of [...classified.sources].sort()) lines.push(toRel(p));
  } else {
    const merged = [
      ...specs.map((p) => specLine(toRel(p))),
      ...[...classified.sources].map(toRel),
    ].sort();
    lines.push(...merged);
  }

  return lines;
}

// =============================================================================
// DIRECTORY TREE
// =============================================================================

interface DirNode {
  /** Segments from the output directory to this node */
  segments: string[];
  children: Map<string, DirNode>;
  sources: Set<string>;
  specs: Set<string>;
}

function createNode(segments: string[]): DirNode {
  return { segments, children: new Map(), sources: new Set(), specs: new Set() };
}

function hasEntries(node: DirNode): boolean {
  return node.sources.size > 0 || node.specs.size > 0;
}

function insert(root: DirNode, rel: string, kind: 'source' | 'spec'): void {
  const parent = path.posix.dirname(rel);
  const segments = parent === '.' ? [] : parent.split('/');

  let node = root;
  for (const segment of segments) {
    let child = node.children.get(segment);
    if (!child) {
      child = createNode([...node.segments, segment]);
      node.children.set(segment, child);
    }
    node = child;
  }

  const name = path.posix.basename(rel);
  if (kind === 'spec') node.specs.add(name);
  else node.sources.add(name);
}

/**
 * Pre-order walk, children visited in segment order
 */
function* walk(node: DirNode): Generator<DirNode> {
  yield node;
  for (const key of [...node.children.keys()].sort()) {
    const child = node.children.get(key);
    if (child) yield* walk(child);
  }
}

/**
 * Deepest directory containing every non-root directory that holds entries.
 * Only meaningful when more than one such directory exists.
 */
function findCommonAncestor(root: DirNode): DirNode | null {
  const populated = [...walk(root)].filter((n) => n.segments.length > 0 && hasEntries(n));
  if (populated.length < 2) return null;

  let node = root;
  while (node.children.size === 1 && (node === root || !hasEntries(node))) {
    const [only] = node.children.values();
    node = only;
  }

  return node === root ? null : node;
}

function entryLines(node: DirNode, indent: string): string[] {
  const lines: string[] = [];
  for (const name of [...node.sources].sort()) lines.push(`${indent}${name}`);
  for (const name of [...node.specs].sort()) lines.push(`${indent}${specLine(name)}`);
  return lines;
}

function block(header: string, body: string[], indent: string): string[] {
  return [`${indent}${header}/`, `${indent}{`, ...body, `${indent}}`];
}

// =============================================================================
// CURLY LAYOUT
// =============================================================================

/**
 * Group entries by directory.
 *
 * With a shared ancestor, everything nests under one `ancestor/` block and
 * each deeper directory becomes a sub-block one level in. Otherwise each
 * directory gets its own block. Root-level entries are listed unheaded first.
 */
export function buildCurlyLines(
  classified: Pick<ClassifiedPaths, 'specs' | 'sources'>,
  outDir: string,
  includeSpecs: readonly string[] = []
): string[] {
  const lines = forcedLines(includeSpecs, outDir);
  const root = createNode([]);

  for (const p of classified.sources) insert(root, relativePosix(p, outDir), 'source');
  for (const p of bodySpecs(classified.specs, includeSpecs)) insert(root, relativePosix(p, outDir), 'spec');

  lines.push(...entryLines(root, INDENT));

  const common = findCommonAncestor(root);
  if (common) {
    const body = entryLines(common, INDENT);
    for (const node of walk(common)) {
      if (node === common || !hasEntries(node)) continue;
      const sub = node.segments.slice(common.segments.length).join('/');
      body.push(...block(sub, entryLines(node, INDENT + INDENT), INDENT));
    }
    lines.push(...block(common.segments.join('/'), body, ''));
    return lines;
  }

  for (const node of walk(root)) {
    if (node === root || !hasEntries(node)) continue;
    lines.push(...block(node.segments.join('/'), entryLines(node, INDENT), ''));
  }

  return lines;
}

// =============================================================================
// DISPATCH
// =============================================================================

export interface FormatOptions {
  /** 'flat' or 'curly'; anything else is rejected */
  format: string;
  order: OrderMode;
  outDir: string;
  includeSpecs?: readonly string[];
}

export function buildManifestLines(
  classified: Pick<ClassifiedPaths, 'specs' | 'sources'>,
  options: FormatOptions
): string[] {
  const { format, order, outDir, includeSpecs = [] } = options;
  switch (format) {
    case 'flat':
      return buildFlatLines(classified, order, outDir, includeSpecs);
    case 'curly':
      return buildCurlyLines(classified, outDir, includeSpecs);
    default:
      throw new ConfigError(`unknown output_format '${format}'. Use 'flat' or 'curly'.`);
  }
}
