#!/usr/bin/env node
import { runCLI } from './cli/index.js';
import { formatCliError } from './errors.js';

runCLI().catch((error: unknown) => {
  const message = formatCliError(error instanceof Error ? error : new Error(String(error)));
  console.error(`\n${message}\n`);
  process.exit(1);
});
