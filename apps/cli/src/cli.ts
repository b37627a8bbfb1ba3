#!/usr/bin/env node
/**
 * restart-meter CLI entry point
 */

import { main } from './main.js';

main(process.argv.slice(2)).catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
