#!/usr/bin/env node
/**
 * taskweave CLI entry point.
 */

import { describeError } from '../core/errors.js';
import { closeLogger } from '../core/logger.js';
import { createProgram } from './program.js';

try {
  await createProgram().parseAsync(process.argv);
} catch (err) {
  process.stderr.write(`Error: ${describeError(err)}\n`);
  process.exitCode = 1;
} finally {
  closeLogger();
}
