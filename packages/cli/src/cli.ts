#!/usr/bin/env node
/**
 * wgpeers CLI
 */

import { createProgram } from './program.js';

const program = createProgram();

// If no command provided, show help
if (!process.argv.slice(2).length) {
  program.outputHelp();
  process.exit(0);
}

await program.parseAsync(process.argv);
