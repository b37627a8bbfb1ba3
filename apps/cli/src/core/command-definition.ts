/**
 * Command Definition - Unified structure for CLI command metadata
 *
 * Combines the argument specification, the validation schema and the
 * handler of a command in one typed value.
 */

import type { z } from 'zod';

/**
 * Declarative argument definition for CLI parsing
 */
export interface ArgDefinition {
  type: 'string' | 'boolean' | 'number';
  description: string;
  default?: string | number | boolean;
}

/**
 * Declarative argument specification
 */
export interface ArgSpec {
  args: Record<string, ArgDefinition>;
  aliases?: Record<string, string>;
}

/**
 * Anything that validates raw CLI input into the handler's options (a zod schema)
 */
export type OptionsSchema<TOptions> = Pick<z.ZodType<TOptions>, 'parse'>;

export type CommandHandler<TOptions, TResult> = (options: TOptions) => Promise<TResult>;

/**
 * Complete command definition with all metadata
 *
 * @template TOptions - What the handler receives after schema processing
 * @template TResult - What the handler resolves to
 */
export interface CommandDefinition<TOptions, TResult> {
  name: string;
  description: string;
  schema: OptionsSchema<TOptions>;
  argSpec: ArgSpec;
  examples: string[];
  handler: CommandHandler<TOptions, TResult>;
}

interface CommandDraft<TOptions, TResult> {
  name?: string;
  description?: string;
  schema?: OptionsSchema<TOptions>;
  argSpec: ArgSpec;
  examples: string[];
  handler?: CommandHandler<TOptions, TResult>;
}

/**
 * Type-safe command builder for creating command definitions.
 * Call schema() before handler(): changing the schema drops the handler.
 */
export class CommandBuilder<TOptions = unknown, TResult = unknown> {
  constructor(
    private readonly definition: CommandDraft<TOptions, TResult> = {
      argSpec: { args: {} },
      examples: [],
    }
  ) {}

  name(name: string): this {
    this.definition.name = name;
    return this;
  }

  description(desc: string): this {
    this.definition.description = desc;
    return this;
  }

  schema<TNext>(schema: OptionsSchema<TNext>): CommandBuilder<TNext, TResult> {
    const { name, description, argSpec, examples } = this.definition;
    return new CommandBuilder<TNext, TResult>({ name, description, argSpec, examples, schema });
  }

  args(spec: ArgSpec): this {
    this.definition.argSpec = {
      args: { ...this.definition.argSpec.args, ...spec.args },
      aliases: { ...this.definition.argSpec.aliases, ...spec.aliases },
    };
    return this;
  }

  examples(...examples: string[]): this {
    this.definition.examples = examples;
    return this;
  }

  handler<R>(fn: CommandHandler<TOptions, R>): CommandBuilder<TOptions, R> {
    const { name, description, argSpec, examples, schema } = this.definition;
    return new CommandBuilder<TOptions, R>({ name, description, argSpec, examples, schema, handler: fn });
  }

  build(): CommandDefinition<TOptions, TResult> {
    const { name, description, schema, argSpec, examples, handler } = this.definition;

    if (!name) throw new Error('Command name is required');
    if (!description) throw new Error('Command description is required');
    if (!schema) throw new Error('Command schema is required');
    if (!handler) throw new Error('Command handler is required');

    return { name, description, schema, argSpec, examples, handler };
  }
}
