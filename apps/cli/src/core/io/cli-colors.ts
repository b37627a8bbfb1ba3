/**
 * Shared color utilities for CLI output
 */

export const colors = {
  reset: '\x1b[0m',
  red: '\x1b[31m',
};
