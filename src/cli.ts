#!/usr/bin/env node
/**
 * abbrev-pairs CLI
 *
 * Finds abbreviations defined in parentheses ("World Health Organization
 * (WHO)") in plain text and prints the abbreviation/definition pairs.
 */

import { createProgram } from './program.js';

const program = createProgram();

// Show help if no command
if (process.argv.length <= 2) {
  program.outputHelp();
  process.exit(0);
}

program.parse(process.argv);
