#!/usr/bin/env node
/**
 * Parley CLI
 * Inspect saved group chats and manage the injected prompt.
 */

import { errorMessage } from '@parley/utils';
import { createProgram } from './program.js';

createProgram()
  .parseAsync(process.argv)
  .catch(err => {
    console.error(errorMessage(err));
    process.exitCode = 1;
  });
