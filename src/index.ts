#!/usr/bin/env node

/**
 * arbor CLI - Entry point
 */

import { runCLI } from './cli.js';

// Get command line arguments (skip first two: node and script path)
const args = process.argv.slice(2);

runCLI(args).catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
