#!/usr/bin/env tsx

/**
 * changegate CLI entrypoint
 */

import { resolve } from 'node:path';
import { config } from 'dotenv';
import { CLIError, EXIT_CODE, run } from './index';

// Engine settings may live in .env.local beside the ledger
config({ path: resolve(process.cwd(), '.env.local') });

run(process.argv.slice(2))
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((err: unknown) => {
    if (err instanceof CLIError) {
      console.error(`changegate: ${err.message}`);
      process.exitCode = err.exitCode;
      return;
    }

    const msg = err instanceof Error ? err.message : String(err);
    console.error(`changegate: ${msg}`);
    process.exitCode = EXIT_CODE.RUNTIME_ERROR;
  });
