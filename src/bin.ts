#!/usr/bin/env node
/**
 * aistack command line entry point
 */

import { buildProgram } from './cli/program.js';
import { errorMessage } from './utils/errors.js';

buildProgram()
  .parseAsync(process.argv)
  .catch((e: unknown) => {
    console.error(`[ERROR] ${errorMessage(e)}`);
    process.exitCode = 1;
  });
