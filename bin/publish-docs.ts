#!/usr/bin/env node
import { main } from '../lib/publisher/cli.js';

main(process.argv.slice(2)).catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
