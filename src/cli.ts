#!/usr/bin/env node

import { runCli } from './cli/mode.js';

runCli(process.argv.slice(2)).then(
  (code) => process.exit(code),
  (err: unknown) => {
    // eslint-disable-next-line no-console
    console.error('[compdb-wrap] unexpected failure', err);
    process.exit(1);
  },
);
