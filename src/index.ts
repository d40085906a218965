#!/usr/bin/env node
import { createCli } from './cli.js';
import { toError } from './lib/logger.js';

createCli().parseAsync(process.argv).catch((error: unknown) => {
  console.error(`Error: ${toError(error).message}`);
  process.exit(1);
});
