#!/usr/bin/env node
/**
 * sysdash command line entry point
 */

import { main } from './cli/main.js';
import { EXIT_FAILURE } from './monitor/dashboard.js';
import { toErrorMessage } from './monitor/errors.js';

main().then(
  code => {
    process.exitCode = code;
  },
  (error: unknown) => {
    process.stderr.write(`Error: ${toErrorMessage(error)}\n`);
    process.exitCode = EXIT_FAILURE;
  },
);
