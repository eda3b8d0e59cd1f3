#!/usr/bin/env node
import { EXIT_FAILED, main } from './main.js';

const controller = new AbortController();

// Interrupting the harness must still take the service down with it
const abort = (signal: string) => {
  console.error(`\nReceived ${signal}, stopping service...`);
  controller.abort();
};
process.once('SIGTERM', () => abort('SIGTERM'));
process.once('SIGINT', () => abort('SIGINT'));

main(process.argv.slice(2), controller.signal)
  .then((code) => process.exit(code))
  .catch((error) => {
    console.error('Fatal error:', error);
    process.exit(EXIT_FAILED);
  });
