/**
 * overlay-spec CLI runner
 * Maps a generate run onto console output and an exit code
 */

import { isOverlayError, SelectionError } from '../errors.js';
import { generateOverlay, GenerateOptions } from '../generate.js';
import { createConsoleLogger } from '../logger.js';
import { renderManifest } from '../writer.js';

export interface CliOptions {
  output?: string;
  dryRun?: boolean;
  verbose?: boolean;
}

/**
 * Print a failure the way every command does and return its exit code
 */
export function reportFailure(error: unknown): number {
  if (isOverlayError(error)) {
    console.error(`ERROR: ${error.message}`);
    if (error instanceof SelectionError) {
      for (const p of error.paths) {
        console.error(`  ${p}`);
      }
    }
    return error.exitCode;
  }
  console.error('Overlay generation failed:', error);
  return 1;
}

export async function runOverlay(
  configPath: string,
  options: CliOptions,
  overrides: Pick<GenerateOptions, 'git' | 'env'> = {}
): Promise<number> {
  try {
    const result = await generateOverlay({
      configPath,
      output: options.output,
      dryRun: options.dryRun,
      logger: createConsoleLogger(!!options.verbose),
      ...overrides,
    });

    if (options.dryRun) {
      process.stdout.write(renderManifest(result.lines));
      return 0;
    }

    console.log(`Wrote ${result.specCount} spec and ${result.sourceCount} source entries to ${result.outputPath}`);
    return 0;
  } catch (error) {
    return reportFailure(error);
  }
}
