/**
 * Claims CLI
 *
 * Extracts FNOL fields from claim documents and prints or saves the
 * recommended route for each.
 */

import { logger } from '@claim-triage/core';
import { run } from './lib/commands';

run(process.argv.slice(2))
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    logger.error('Claims CLI failed', error);
    process.exitCode = 1;
  });
