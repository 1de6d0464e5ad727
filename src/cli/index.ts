#!/usr/bin/env node

/**
 * overlay-spec CLI
 * Generate an overlay manifest from a git repository and a TOML config
 */

import { createProgram } from './program.js';
import { reportFailure } from './run.js';

// =============================================================================
// PARSE AND RUN
// =============================================================================

createProgram()
  .parseAsync()
  .catch((error: unknown) => {
    process.exitCode = reportFailure(error);
  });
