/**
 * Tests for git queries and name-status parsing
 */

import { describe, it, expect } from 'vitest';
import { GitCommandError } from '../errors.js';
import {
  diffCommit,
  diffRefs,
  forkPoint,
  isAncestor,
  listUntracked,
  mergeBase,
  parseNameStatus,
  parsePathList,
  verifyRef,
} from '../git.js';
import { createFakeGit } from './helpers.js';

describe('parseNameStatus', () => {
  it('returns the path of added and modified records', () => {
    const text = 'A\tpackage/a/x.m\nM\tpackage/y.spec\n';
    expect(parseNameStatus(text)).toEqual(['package/a/x.m', 'package/y.spec']);
  });

  it('reports renames by their destination path', () => {
    const text = 'R097\tpackage/old.m\tpackage/new.m\n';
    expect(parseNameStatus(text)).toEqual(['package/new.m']);
  });

  it('skips records with too few fields', () => {
    const text = 'R100\tpackage/only-one.m\nM\n\nA\tpackage/kept.m\n';
    expect(parseNameStatus(text)).toEqual(['package/kept.m']);
  });

  it('tolerates CRLF line endings', () => {
    expect(parseNameStatus('M\tpackage/a.m\r\n')).toEqual(['package/a.m']);
  });

  it('returns nothing for empty output', () => {
    expect(parseNameStatus('')).toEqual([]);
  });
});

describe('parsePathList', () => {
  it('trims lines and drops blanks', () => {
    expect(parsePathList('package/a.m\n\n  package/b.spec  \n')).toEqual(['package/a.m', 'package/b.spec']);
  });
});

describe('git queries', () => {
  it('verifyRef returns the trimmed object id', async () => {
    const git = createFakeGit({ 'rev-parse --verify main': 'abc123\n' });
    await expect(verifyRef(git.run, 'main')).resolves.toBe('abc123');
  });

  it('verifyRef rejects for an unknown ref', async () => {
    const git = createFakeGit({ 'rev-parse --verify nope': { code: 128, stderr: 'fatal: Needed a single revision\n' } });
    await expect(verifyRef(git.run, 'nope')).rejects.toBeInstanceOf(GitCommandError);
  });

  it('isAncestor maps exit code 1 to false', async () => {
    const git = createFakeGit({
      'merge-base --is-ancestor c1 HEAD': '',
      'merge-base --is-ancestor c2 HEAD': { code: 1 },
    });
    await expect(isAncestor(git.run, 'c1', 'HEAD')).resolves.toBe(true);
    await expect(isAncestor(git.run, 'c2', 'HEAD')).resolves.toBe(false);
  });

  it('isAncestor rethrows other failures', async () => {
    const git = createFakeGit({ 'merge-base --is-ancestor bad HEAD': { code: 128, stderr: 'fatal: Not a valid commit name bad' } });
    await expect(isAncestor(git.run, 'bad', 'HEAD')).rejects.toThrow('fatal: Not a valid commit name bad');
  });

  it('forkPoint returns null when git fails or prints nothing', async () => {
    const failing = createFakeGit({ 'merge-base --fork-point main HEAD': { code: 1 } });
    const empty = createFakeGit({ 'merge-base --fork-point main HEAD': '\n' });
    const found = createFakeGit({ 'merge-base --fork-point main HEAD': 'f0f0\n' });

    await expect(forkPoint(failing.run, 'main', 'HEAD')).resolves.toBeNull();
    await expect(forkPoint(empty.run, 'main', 'HEAD')).resolves.toBeNull();
    await expect(forkPoint(found.run, 'main', 'HEAD')).resolves.toBe('f0f0');
  });

  it('mergeBase returns the trimmed commit', async () => {
    const git = createFakeGit({ 'merge-base main HEAD': 'base1\n' });
    await expect(mergeBase(git.run, 'main', 'HEAD')).resolves.toBe('base1');
  });

  it('diffRefs restricts to added, modified and renamed entries', async () => {
    const git = createFakeGit({ 'diff --name-status --diff-filter=AMR a..b': 'A\tpackage/x.m\n' });
    await expect(diffRefs(git.run, 'a', 'b')).resolves.toEqual(['package/x.m']);
  });

  it('diffCommit diffs a commit against its first parent', async () => {
    const git = createFakeGit({
      'diff-tree --name-status --first-parent -r c1^! --diff-filter=AMR': 'M\tpackage/y.spec\n',
    });
    await expect(diffCommit(git.run, 'c1')).resolves.toEqual(['package/y.spec']);
    expect(git.calls).toEqual([['diff-tree', '--name-status', '--first-parent', '-r', 'c1^!', '--diff-filter=AMR']]);
  });

  it('listUntracked lists other files honouring ignore rules', async () => {
    const git = createFakeGit({ 'ls-files --others --exclude-standard': 'package/new.m\n' });
    await expect(listUntracked(git.run)).resolves.toEqual(['package/new.m']);
  });
});

describe('GitCommandError', () => {
  it('appends captured stderr to the message', () => {
    const error = new GitCommandError('diff failed', ['diff'], 'fatal: bad revision\n', 128);
    expect(error.message).toBe('diff failed\nfatal: bad revision');
    expect(error.exitCode).toBe(2);
  });
});
