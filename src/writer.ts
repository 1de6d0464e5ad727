/**
 * overlay-spec Writer
 * Wraps the manifest body in its outer block and replaces the target atomically
 */

import * as fs from 'fs';
import * as path from 'path';

/**
 * Add the outer `{` / `}` pair around the body
 */
export function wrapManifest(body: readonly string[]): string[] {
  return ['{', ...body, '}'];
}

export function renderManifest(lines: readonly string[]): string {
  return lines.map((line) => `${line}\n`).join('');
}

/**
 * Hidden temp file beside the target: `<dir>/.<name>.tmp`
 */
export function tempPathFor(outPath: string): string {
  return path.join(path.dirname(outPath), `.${path.basename(outPath)}.tmp`);
}

/**
 * Write lines to a temp file in the target's directory, then rename it over
 * the target so readers never see a partial manifest.
 */
export async function writeManifestAtomic(outPath: string, lines: readonly string[]): Promise<string> {
  const tmpPath = tempPathFor(outPath);
  try {
    await fs.promises.writeFile(tmpPath, renderManifest(lines), 'utf-8');
    await fs.promises.rename(tmpPath, outPath);
  } catch (error) {
    await fs.promises.rm(tmpPath, { force: true });
    throw error;
  }
  return outPath;
}
