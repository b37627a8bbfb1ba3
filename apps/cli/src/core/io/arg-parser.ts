/**
 * Argument Parser - Functional parser generator for CLI arguments
 *
 * Builds a parser from a declarative command definition: the arg library
 * tokenizes argv, the command's zod schema validates the result.
 */

import arg from 'arg';
import { z } from 'zod';
import type { ArgDefinition, ArgSpec, CommandDefinition } from '../command-definition.js';

/**
 * The command line could not be parsed into the command's options
 */
export class ArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ArgumentError';
  }
}

/**
 * Type mapping from our declarative types to arg library types
 */
const ARG_TYPE_MAP: Record<ArgDefinition['type'], arg.Handler> = {
  string: String,
  boolean: Boolean,
  number: Number,
};

/**
 * Create a parser function for a command
 */
export function createArgParser<TOptions>(
  command: Pick<CommandDefinition<TOptions, unknown>, 'argSpec' | 'schema'>
): (argv: string[]) => TOptions {
  const argSpec = buildArgSpec(command.argSpec);

  return (argv: string[]) => {
    try {
      const rawArgs = arg(argSpec, { argv, permissive: false });

      if (rawArgs._.length > 0) {
        throw new ArgumentError(`Invalid arguments: unexpected argument '${rawArgs._[0]}'`);
      }

      const normalized = normalizeArgs(rawArgs, command.argSpec);
      return command.schema.parse(normalized);
    } catch (error) {
      if (error instanceof arg.ArgError) {
        throw new ArgumentError(`Invalid arguments: ${error.message}`);
      }
      if (error instanceof z.ZodError) {
        const issues = error.issues.map(i => `  ${i.path.join('.')}: ${i.message}`).join('\n');
        throw new ArgumentError(`Invalid arguments:\n${issues}`);
      }
      throw error;
    }
  };
}

/**
 * Build arg library specification from our declarative format
 */
function buildArgSpec(spec: ArgSpec): arg.Spec {
  const result: arg.Spec = {};

  for (const [key, def] of Object.entries(spec.args)) {
    result[key] = ARG_TYPE_MAP[def.type];
  }

  if (spec.aliases) {
    Object.assign(result, spec.aliases);
  }

  return result;
}

/**
 * Normalize parsed arguments to match zod schema expectations
 *
 * The arg library returns keys with the '--' prefix; schemas use camelCase.
 */
function normalizeArgs(
  rawArgs: Record<string, unknown>,
  spec: ArgSpec
): Record<string, unknown> {
  const normalized: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(rawArgs)) {
    if (key === '_') continue;
    if (value !== undefined) {
      normalized[kebabToCamel(key.replace(/^--/, ''))] = value;
    }
  }

  for (const [key, def] of Object.entries(spec.args)) {
    const normalizedKey = kebabToCamel(key.replace(/^--/, ''));
    if (normalized[normalizedKey] === undefined && def.default !== undefined) {
      normalized[normalizedKey] = def.default;
    }
  }

  return normalized;
}

function kebabToCamel(str: string): string {
  return str.replace(/-([a-z])/g, (_, letter: string) => letter.toUpperCase());
}

/**
 * Generate help text from command definition
 */
export function generateHelp(
  command: Pick<CommandDefinition<unknown, unknown>, 'name' | 'description' | 'argSpec' | 'examples'>
): string {
  const lines: string[] = [];

  lines.push(`${command.name} - ${command.description}`);
  lines.push('');
  lines.push('OPTIONS:');

  const entries = Object.entries(command.argSpec.args).map(([key, def]) => {
    const aliases = findAliases(key, command.argSpec.aliases);
    return { keyStr: [...aliases, key].join(', '), def };
  });
  const width = Math.max(...entries.map(e => e.keyStr.length)) + 2;

  for (const { keyStr, def } of entries) {
    let description = def.description;
    if (def.default !== undefined) {
      description += ` [default: ${def.default}]`;
    }

    lines.push(`  ${keyStr.padEnd(width)}${description}`);
  }

  if (command.examples.length > 0) {
    lines.push('');
    lines.push('EXAMPLES:');
    for (const example of command.examples) {
      lines.push(`  ${example}`);
    }
  }

  return lines.join('\n');
}

function findAliases(key: string, aliases?: Record<string, string>): string[] {
  if (!aliases) return [];

  return Object.entries(aliases)
    .filter(([, target]) => target === key)
    .map(([alias]) => alias);
}
