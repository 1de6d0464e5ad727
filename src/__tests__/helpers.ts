/**
 * Shared test fixtures for overlay-spec tests
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { GitCommandError } from '../errors.js';
import { GitRunner, Logger, OverlayConfig, OverlayOptions, RunContext, SelectorConfig } from '../types.js';

/**
 * Scripted git response: stdout text, or a failure with exit code and stderr
 */
export type FakeGitResponse = string | { code: number; stderr?: string };

export interface FakeGit {
  run: GitRunner;
  calls: string[][];
}

/**
 * In-process stand-in for git. Responses are keyed by the space-joined
 * argument list; unknown commands fail like an unknown ref would.
 */
export function createFakeGit(responses: Record<string, FakeGitResponse>): FakeGit {
  const calls: string[][] = [];
  const run: GitRunner = async (args) => {
    calls.push(args);
    const key = args.join(' ');
    const response = responses[key];
    if (response === undefined) {
      throw new GitCommandError(`git ${key} failed`, args, `fatal: unexpected command: ${key}\n`, 128);
    }
    if (typeof response === 'string') return response;
    throw new GitCommandError(`git ${key} failed`, args, response.stderr ?? '', response.code);
  };
  return { run, calls };
}

/**
 * Responses for a plain run: target exists, working tree clean
 */
export function baseGitResponses(overrides: Record<string, FakeGitResponse> = {}): Record<string, FakeGitResponse> {
  return {
    'rev-parse --verify HEAD': 'ffffffffffffffffffffffffffffffffffffffff\n',
    'diff --name-status --diff-filter=AMR origin/main..HEAD': '',
    'diff --cached --name-status --diff-filter=AMR': '',
    'diff --name-status --diff-filter=AMR': '',
    'ls-files --others --exclude-standard': '',
    ...overrides,
  };
}

export interface RecordingLogger extends Logger {
  warnings: string[];
  debugs: string[];
}

export function createRecordingLogger(): RecordingLogger {
  const warnings: string[] = [];
  const debugs: string[] = [];
  return {
    warnings,
    debugs,
    debug(message) {
      debugs.push(message);
    },
    warn(message) {
      warnings.push(message);
    },
  };
}

/**
 * Create a temp directory with symlinks resolved (macOS tmpdir is a symlink)
 */
export function createTempDir(prefix = 'overlay-spec-'): string {
  return fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), prefix)));
}

export function removeTempDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

/**
 * Write files (relative path → contents) beneath `root`
 */
export function writeFiles(root: string, files: Record<string, string>): void {
  for (const [rel, content] of Object.entries(files)) {
    const full = path.join(root, rel);
    fs.mkdirSync(path.dirname(full), { recursive: true });
    fs.writeFileSync(full, content);
  }
}

/**
 * Create a mock OverlayConfig with the loader's defaults
 */
export type MockConfigOverrides = Omit<Partial<OverlayConfig>, 'options' | 'selectors'> & {
  options?: Partial<OverlayOptions>;
  selectors?: Partial<SelectorConfig>;
};

export function createMockConfig(repoDir: string, overrides: MockConfigOverrides = {}): OverlayConfig {
  return {
    configPath: path.join(repoDir, 'overlay.toml'),
    repoDir,
    baseline: 'origin/main',
    target: 'HEAD',
    fetch: false,
    includeSpecs: [],
    ...overrides,
    selectors: {
      commits: [],
      ranges: [],
      paths: [],
      ...(overrides.selectors || {}),
    },
    options: {
      restrictPrefixes: ['package/'],
      order: 'spec-first',
      baselineMode: 'raw',
      outputFormat: 'curly',
      includeUncommitted: true,
      ...(overrides.options || {}),
    },
  };
}

export function createContext(config: OverlayConfig, git: GitRunner, logger: Logger = createRecordingLogger()): RunContext {
  return { config, git, logger };
}
