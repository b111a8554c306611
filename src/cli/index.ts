#!/usr/bin/env tsx
/**
 * CLI Entry Point for Interval Drill
 *
 * Parses command-line arguments and routes to the command handlers defined
 * in `program.ts`.
 *
 * Usage:
 * ```bash
 * # Review everything that is due
 * npm run cli
 *
 * # Import a file into a deck
 * npm run cli -- add --deck capitals capitals.csv
 *
 * # Review only some decks, with a shorter longest interval
 * npm run cli -- --decks capitals,rivers --param-hours 720
 *
 * # Read questions and answers aloud
 * npm run cli -- --tts espeak
 *
 * # List decks
 * npm run cli -- decks
 * ```
 *
 * Environment Variables:
 * - INTERVAL_DRILL_DB: database path (default under the user config directory)
 * - INTERVAL_DRILL_TTS: speech command
 * - INTERVAL_DRILL_REVIEWS / INTERVAL_DRILL_HOURS: interval growth parameters
 * - NO_COLOR: disable colored output
 * - DEBUG: print stack traces on errors
 */

import { createProgram } from './program';
import { dim, red } from './utils/terminal';

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    const message = error instanceof Error ? error.message : String(error);
    console.error(red(`Error: ${message}`));

    // Show stack trace in development mode
    if (process.env.DEBUG && error instanceof Error) {
      console.error(dim(error.stack || ''));
    }

    process.exit(1);
  });
