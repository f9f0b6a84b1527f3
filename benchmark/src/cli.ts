#!/usr/bin/env -S node --import tsx
/**
 * @cohort/benchmark CLI entry point
 */

import { createConsoleLogger } from '@cohort/core';
import { createProgram, reportFailure } from './program.js';

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    reportFailure(error, createConsoleLogger({ format: 'pretty' }));
    process.exitCode = 1;
  });
