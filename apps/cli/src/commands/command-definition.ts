/**
 * Command Definition - Unified structure for CLI command metadata
 *
 * Combines argument specifications, validation schemas, and handlers. The
 * loader only sees the type-erased RunnableCommand, so commands with
 * different option and result types can share one registry.
 */

import { z } from 'zod';
import type { BaseResult, CommandResults } from '../core/command-results.js';
import { BASE_ARGS, BASE_ALIASES } from './base-options-schema.js';

/**
 * Declarative argument definition for CLI parsing
 */
export interface ArgDefinition {
  type: 'string' | 'boolean';
  description: string;
  default?: string | boolean;
}

/**
 * Declarative argument specification
 */
export interface ArgSpec {
  args: Record<string, ArgDefinition>;
  aliases?: Record<string, string>;
}

export type CommandHandler<TOptions, TResult extends BaseResult> = (
  options: TOptions
) => Promise<CommandResults<TResult>>;

/**
 * Complete command definition with all metadata
 *
 * @template TOptions - What the handler receives after schema processing
 * @template TResult - The per-entity result type
 */
export interface CommandDefinition<TOptions, TResult extends BaseResult> {
  name: string;
  description: string;
  schema: z.ZodType<TOptions, z.ZodTypeDef, unknown>;
  argSpec: ArgSpec;
  examples: string[];
  handler: CommandHandler<TOptions, TResult>;
}

interface BuilderState<TOptions, TResult extends BaseResult> {
  name?: string;
  description?: string;
  argSpec: ArgSpec;
  examples: string[];
  schema?: z.ZodType<TOptions, z.ZodTypeDef, unknown>;
  handler?: CommandHandler<TOptions, TResult>;
}

/**
 * Type-safe command builder for creating command definitions
 *
 * `schema()` and `handler()` change the builder's type parameters, so they
 * return a new builder. Call `schema()` before `handler()`.
 */
export class CommandBuilder<TOptions = unknown, TResult extends BaseResult = BaseResult> {
  constructor(
    private readonly state: BuilderState<TOptions, TResult> = {
      examples: [],
      argSpec: { args: BASE_ARGS, aliases: BASE_ALIASES },
    }
  ) {}

  name(name: string): this {
    this.state.name = name;
    return this;
  }

  description(desc: string): this {
    this.state.description = desc;
    return this;
  }

  args(spec: ArgSpec): this {
    // Merge with defaults rather than replace
    this.state.argSpec = {
      args: { ...BASE_ARGS, ...spec.args },
      aliases: { ...BASE_ALIASES, ...spec.aliases },
    };
    return this;
  }

  examples(...examples: string[]): this {
    this.state.examples = examples;
    return this;
  }

  schema<O>(schema: z.ZodType<O, z.ZodTypeDef, unknown>): CommandBuilder<O, TResult> {
    const { name, description, argSpec, examples } = this.state;
    return new CommandBuilder<O, TResult>({ name, description, argSpec, examples, schema });
  }

  handler<R extends BaseResult>(fn: CommandHandler<TOptions, R>): CommandBuilder<TOptions, R> {
    const { name, description, argSpec, examples, schema } = this.state;
    return new CommandBuilder<TOptions, R>({ name, description, argSpec, examples, schema, handler: fn });
  }

  build(): CommandDefinition<TOptions, TResult> {
    const { name, description, schema, argSpec, examples, handler } = this.state;

    if (!name) throw new Error('Command name is required');
    if (!description) throw new Error('Command description is required');
    if (!schema) throw new Error('Command schema is required');
    if (!handler) throw new Error('Command handler is required');

    return { name, description, schema, argSpec, examples, handler };
  }
}
