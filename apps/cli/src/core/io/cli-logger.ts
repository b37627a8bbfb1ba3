/**
 * Shared output utilities for CLI commands
 */

import { colors } from './cli-colors.js';

export function printError(message: string): void {
  console.error(`${colors.red}❌ ${message}${colors.reset}`);
}

/**
 * Plain report line, no decoration
 */
export function printLine(message: string): void {
  console.log(message);
}
