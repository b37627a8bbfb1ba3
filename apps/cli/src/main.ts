/**
 * Runs one invocation of the CLI and maps failures to exit status 1
 */

import { measureCommand, type MeasureOptions } from './commands/measure.js';
import { ArgumentError, createArgParser, generateHelp } from './core/io/arg-parser.js';
import { printError, printLine } from './core/io/cli-logger.js';
import { ConfigurationError } from './core/configuration-error.js';
import { LogSourceError, SupervisorError } from './core/restart-errors.js';

export interface MainDependencies {
  /** Defaults to the measure command's handler */
  run?: (options: MeasureOptions) => Promise<unknown>;
}

export function describeError(error: unknown): string {
  if (error instanceof SupervisorError) {
    return error.message;
  }
  if (error instanceof LogSourceError || error instanceof ConfigurationError) {
    return error.toString();
  }
  if (error instanceof ArgumentError) {
    return `${error.message}\nRun '${measureCommand.name} --help' for usage.`;
  }
  if (error instanceof Error) {
    return `Unexpected error: ${error.message}`;
  }
  return `Unexpected error: ${String(error)}`;
}

export async function main(argv: string[], deps: MainDependencies = {}): Promise<void> {
  const run = deps.run ?? measureCommand.handler;

  try {
    const options = createArgParser(measureCommand)(argv);

    if (options.help) {
      printLine(generateHelp(measureCommand));
      return;
    }

    await run(options);
  } catch (error) {
    printError(describeError(error));
    process.exit(1);
  }
}
