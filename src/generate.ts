/**
 * overlay-spec Pipeline
 * Loader → Inspector → Collector → Classifier → Formatter → Writer
 *
 * Every check that can fail runs before the writer, so a failed run never
 * touches an existing manifest.
 */

import * as fs from 'fs';
import * as path from 'path';
import { glob, hasMagic } from 'glob';
import { classifyPaths } from './classify.js';
import { collectCandidates, ensureTargetExists, maybeFetch, validateSelectors } from './collect.js';
import { DEFAULT_OUTPUT_NAME, loadConfig } from './config.js';
import { ConfigError, SelectionError } from './errors.js';
import { buildManifestLines } from './format.js';
import { createGitRunner } from './git.js';
import { createConsoleLogger } from './logger.js';
import { expandHome, resolveReal } from './paths.js';
import { GenerateResult, GitRunner, Logger, OverlayConfig, RunContext } from './types.js';
import { wrapManifest, writeManifestAtomic } from './writer.js';

export interface GenerateOptions {
  configPath: string;
  /** Output path override; wins over the environment and the config file */
  output?: string;
  /** Build the manifest but do not write it */
  dryRun?: boolean;
  /** Defaults to running the real git binary against `repo_dir` */
  git?: GitRunner;
  logger?: Logger;
  env?: NodeJS.ProcessEnv;
}

// =============================================================================
// PATH RESOLUTION
// =============================================================================

/**
 * Output path: explicit override, then config/env, then `<repo_dir>/.magma_overlay.spec`.
 * Relative paths resolve against `repo_dir`.
 */
export function resolveOutputPath(config: OverlayConfig, override?: string): string {
  const chosen = override || config.output;
  if (!chosen) {
    return resolveReal(path.join(config.repoDir, DEFAULT_OUTPUT_NAME));
  }
  const expanded = expandHome(chosen);
  return path.isAbsolute(expanded)
    ? resolveReal(expanded)
    : resolveReal(path.join(config.repoDir, expanded));
}

/**
 * Resolve `include_specs` to absolute paths, in configured order.
 * Glob patterns (braces included) expand relative to `repo_dir`; literal entries must exist.
 */
export async function resolveIncludeSpecs(includeSpecs: readonly string[], repoDir: string): Promise<string[]> {
  const resolved: string[] = [];
  const missing: string[] = [];

  for (const entry of includeSpecs) {
    const expanded = expandHome(entry);

    if (hasMagic(expanded, { magicalBraces: true })) {
      const matches = await glob(expanded, { cwd: repoDir, absolute: true, nodir: true });
      resolved.push(...matches.map(resolveReal).sort());
      continue;
    }

    const absolute = path.isAbsolute(expanded)
      ? resolveReal(expanded)
      : resolveReal(path.join(repoDir, expanded));
    if (!fs.existsSync(absolute)) {
      missing.push(entry);
      continue;
    }
    resolved.push(absolute);
  }

  if (missing.length > 0) {
    throw new SelectionError('include_specs entries missing at target:', missing);
  }

  return [...new Set(resolved)];
}

// =============================================================================
// RUN
// =============================================================================

export async function generateOverlay(options: GenerateOptions): Promise<GenerateResult> {
  const config = loadConfig(options.configPath, options.env ?? process.env);
  const logger = options.logger ?? createConsoleLogger();

  if (!fs.existsSync(config.repoDir) || !fs.statSync(config.repoDir).isDirectory()) {
    throw new ConfigError(`repo_dir does not exist: ${config.repoDir}`);
  }

  const outputPath = resolveOutputPath(config, options.output);
  const outDir = path.dirname(outputPath);
  if (!options.dryRun && !fs.existsSync(outDir)) {
    throw new ConfigError(`output directory does not exist: ${outDir}`);
  }

  const ctx: RunContext = {
    config,
    git: options.git ?? createGitRunner(config.repoDir),
    logger,
  };

  await maybeFetch(ctx);
  await ensureTargetExists(ctx);
  await validateSelectors(ctx);

  const { candidates, explicit } = await collectCandidates(ctx);
  logger.debug(`${candidates.size} candidate path(s)`);

  const classified = classifyPaths(config.repoDir, candidates, explicit);
  if (classified.missingExplicit.length > 0) {
    throw new SelectionError('explicitly selected paths missing at target:', classified.missingExplicit);
  }
  for (const rel of classified.dropped) {
    logger.warn(`path missing at target and was dropped: ${rel}`);
  }

  const includeSpecs = await resolveIncludeSpecs(config.includeSpecs, config.repoDir);

  const lines = wrapManifest(
    buildManifestLines(classified, {
      format: config.options.outputFormat,
      order: config.options.order,
      outDir,
      includeSpecs,
    })
  );

  if (!options.dryRun) {
    await writeManifestAtomic(outputPath, lines);
  }

  return {
    outputPath,
    specCount: classified.specs.size,
    sourceCount: classified.sources.size,
    lines,
    dropped: classified.dropped,
    written: !options.dryRun,
  };
}
