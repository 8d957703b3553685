#!/usr/bin/env node
/**
 * Statement CLI
 *
 * Extracts key fields from credit card statement PDFs and prints them as a
 * summary and/or table, optionally exporting JSON and run metrics.
 */

import { logger } from '@ccparse/shared';
import { runCli } from './lib/run';

if (require.main === module) {
  runCli(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      logger.error('ccstatement failed', error);
      process.exitCode = 1;
    });
}
