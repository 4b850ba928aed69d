#!/usr/bin/env node
// packages/cli/src/index.ts

import { buildProgram } from './program.js';
import { printError } from './utils.js';

buildProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    printError(error);
    process.exit(1);
  });
