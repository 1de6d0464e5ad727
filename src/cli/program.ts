/**
 * overlay-spec command definition
 */

import { Command } from 'commander';
import { GenerateOptions } from '../generate.js';
import { CliOptions, runOverlay } from './run.js';

/**
 * Build the `overlay-spec` program. The action records its exit code on
 * `process.exitCode` so buffered stdout drains before the process ends.
 */
export function createProgram(overrides: Pick<GenerateOptions, 'git' | 'env'> = {}): Command {
  const program = new Command();

  program
    .name('overlay-spec')
    .description('Write an overlay manifest of changed .spec and .m files, relative to the output file')
    .version('0.1.0')
    .argument('<config>', 'path to overlay.toml')
    .option('-o, --output <path>', 'output manifest path (default: <repo_dir>/.magma_overlay.spec)')
    .option('--dry-run', 'print the manifest to stdout instead of writing it')
    .option('-v, --verbose', 'log each collection stage to stderr')
    .addHelpText(
      'after',
      `
Environment:
  OVERLAY_SPEC_OUTPUT   output path used when --output is not given
  OVERLAY_SPEC_FETCH    'true' to run git fetch --prune before diffing`
    )
    .action(async (config: string, options: CliOptions) => {
      process.exitCode = await runOverlay(config, options, overrides);
    });

  return program;
}
