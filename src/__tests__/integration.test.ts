/**
 * Integration tests against a throwaway repository built with the real git binary
 */

import { execFileSync } from 'child_process';
import * as fs from 'fs';
import * as path from 'path';
import { describe, it, expect, beforeAll, afterAll, afterEach, vi } from 'vitest';
import { runOverlay } from '../cli/run.js';
import { generateOverlay } from '../generate.js';
import { createRecordingLogger, createTempDir, removeTempDir, writeFiles } from './helpers.js';

function hasGit(): boolean {
  try {
    execFileSync('git', ['--version'], { stdio: 'ignore' });
    return true;
  } catch {
    return false;
  }
}

function git(repo: string, args: string[]): string {
  return execFileSync(
    'git',
    ['-C', repo, '-c', 'user.name=Test', '-c', 'user.email=test@example.com', '-c', 'commit.gpgsign=false', ...args],
    { encoding: 'utf8', stdio: ['ignore', 'pipe', 'pipe'] }
  );
}

describe.skipIf(!hasGit())('overlay against a real repository', () => {
  let repo: string;
  let configDir: string;

  beforeAll(() => {
    repo = createTempDir();
    configDir = createTempDir();

    git(repo, ['init', '-q']);
    writeFiles(repo, { 'package/keep.m': 'keep\n', 'docs/readme.md': 'docs\n' });
    git(repo, ['add', '-A']);
    git(repo, ['commit', '-q', '-m', 'base']);
    git(repo, ['tag', 'base']);

    writeFiles(repo, { 'package/a/x.m': 'x\n', 'package/a/y.spec': 'y\n' });
    fs.mkdirSync(path.join(repo, 'package', 'b'));
    git(repo, ['mv', 'package/keep.m', 'package/b/kept.m']);
    git(repo, ['add', '-A']);
    git(repo, ['commit', '-q', '-m', 'feature']);

    git(repo, ['checkout', '-q', '--detach', 'base']);
    writeFiles(repo, { 'package/side.m': 'side\n' });
    git(repo, ['add', '-A']);
    git(repo, ['commit', '-q', '-m', 'side']);
    git(repo, ['tag', 'side']);
    git(repo, ['checkout', '-q', '-']);

    writeFiles(repo, { 'package/new.m': 'untracked\n' });
  });

  afterAll(() => {
    removeTempDir(repo);
    removeTempDir(configDir);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('collects the baseline diff, renames and untracked files', async () => {
    const configPath = path.join(configDir, 'overlay.toml');
    fs.writeFileSync(configPath, `repo_dir = ${JSON.stringify(repo)}\nbaseline = "base"\n`);

    const result = await generateOverlay({ configPath, logger: createRecordingLogger(), env: {} });

    expect(result.outputPath).toBe(path.join(repo, '.magma_overlay.spec'));
    expect(fs.readFileSync(result.outputPath, 'utf-8')).toBe(
      [
        '{',
        'package/',
        '{',
        '  new.m',
        '  a/',
        '  {',
        '    x.m',
        '    +y.spec',
        '  }',
        '  b/',
        '  {',
        '    kept.m',
        '  }',
        '}',
        '}',
        '',
      ].join('\n')
    );
  });

  it('exits 2 for a range that is not reachable from the target', async () => {
    const configPath = path.join(configDir, 'side.toml');
    const output = path.join(configDir, 'side.spec');
    fs.writeFileSync(
      configPath,
      `repo_dir = ${JSON.stringify(repo)}\nbaseline = "base"\noutput = ${JSON.stringify(output)}\n[selectors]\nranges = ["base..side"]\n`
    );
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});

    const code = await runOverlay(configPath, {}, { env: {} });

    expect(code).toBe(2);
    expect(error).toHaveBeenCalledWith(
      'ERROR: range tip side is not an ancestor of HEAD. Cannot include without copying.'
    );
    expect(fs.existsSync(output)).toBe(false);
  });
});
