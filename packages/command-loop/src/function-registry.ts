/**
 * Function registry: validated descriptors for a command set, the function
 * schemas sent with every request, and the execute contract the session
 * dispatches through.
 */

import type { FunctionSchema, JsonSchema } from "@chatcmd/chat-client";
import type { Command } from "./command.js";
import {
  ArgumentError,
  ExecutionError,
  RegistryError,
  UnknownFunctionError,
} from "./errors.js";
import { decode, encode, toJsonSchema } from "./schema/index.js";
import type { TypeDescriptor } from "./schema/index.js";

const NAME_PATTERN = /^[a-zA-Z0-9_-]{1,64}$/;

// ---------------------------------------------------------------------------
// Descriptors
// ---------------------------------------------------------------------------

export interface ParameterDescriptor {
  readonly name: string;
  readonly type: TypeDescriptor;
  readonly description: string;
  readonly optional: boolean;
  /** Substituted when the argument is missing. Only set for optional parameters. */
  readonly default?: unknown;
}

export interface FunctionDescriptor {
  readonly name: string;
  readonly description: string;
  /** Parameters in declaration order. */
  readonly parameters: ReadonlyMap<string, ParameterDescriptor>;
  readonly hasReturn: boolean;
  readonly returns?: TypeDescriptor;
  readonly schema: FunctionSchema;
}

interface RegistryEntry {
  readonly descriptor: FunctionDescriptor;
  readonly command: Command;
}

// ---------------------------------------------------------------------------
// FunctionRegistry
// ---------------------------------------------------------------------------

export class FunctionRegistry {
  private readonly _entries: ReadonlyMap<string, RegistryEntry>;

  constructor(entries: ReadonlyMap<string, RegistryEntry>) {
    this._entries = entries;
  }

  get size(): number {
    return this._entries.size;
  }

  get(name: string): FunctionDescriptor | undefined {
    return this._entries.get(name)?.descriptor;
  }

  names(): string[] {
    return Array.from(this._entries.keys());
  }

  descriptors(): FunctionDescriptor[] {
    return Array.from(this._entries.values(), (entry) => entry.descriptor);
  }

  /** Function schemas for the request body, in registration order. */
  schemas(): FunctionSchema[] {
    return Array.from(this._entries.values(), (entry) => entry.descriptor.schema);
  }

  /**
   * Run the function `name` with arguments given as name to JSON text.
   *
   * Returns the JSON text of the encoded return value, or `undefined` when
   * the function declares no return type.
   *
   * @throws {UnknownFunctionError} No function is registered under `name`.
   * @throws {ExecutionError} An argument is missing or undecodable, the
   *   handler threw, or its result does not fit the return type.
   */
  async execute(
    name: string,
    rawArguments: Readonly<Record<string, string>>,
  ): Promise<string | undefined> {
    const entry = this._entries.get(name);
    if (!entry) {
      throw new UnknownFunctionError(name);
    }

    const { descriptor, command } = entry;
    try {
      const args = prepareArguments(descriptor, rawArguments);
      const result = await command.invoke(args);
      if (!descriptor.returns) {
        return undefined;
      }
      return JSON.stringify(encode(result, descriptor.returns));
    } catch (error) {
      throw new ExecutionError(name, { cause: error });
    }
  }
}

function prepareArguments(
  descriptor: FunctionDescriptor,
  rawArguments: Readonly<Record<string, string>>,
): Record<string, unknown> {
  const args: Record<string, unknown> = {};
  for (const parameter of descriptor.parameters.values()) {
    const raw = Object.hasOwn(rawArguments, parameter.name)
      ? rawArguments[parameter.name]
      : undefined;

    if (raw === undefined) {
      if (!parameter.optional) {
        throw new ArgumentError(
          `Missing argument ${parameter.name} in function ${descriptor.name}`,
          { functionName: descriptor.name, parameter: parameter.name },
        );
      }
      args[parameter.name] = parameter.default;
      continue;
    }

    try {
      args[parameter.name] = decode(raw, parameter.type);
    } catch (error) {
      throw new ArgumentError(
        `Invalid argument ${parameter.name} in function ${descriptor.name}: ${
          error instanceof Error ? error.message : String(error)
        }`,
        { functionName: descriptor.name, parameter: parameter.name, cause: error },
      );
    }
  }
  return args;
}

// ---------------------------------------------------------------------------
// Builder
// ---------------------------------------------------------------------------

function describeCommand(command: Command): FunctionDescriptor {
  const { name } = command;
  if (!command.description?.trim()) {
    throw new RegistryError(`Missing documentation for function ${name}`, {
      functionName: name,
    });
  }

  const parameters = new Map<string, ParameterDescriptor>();
  const properties: Record<string, JsonSchema> = {};
  const required: string[] = [];

  for (const [parameterName, parameter] of Object.entries(command.parameters)) {
    if (!parameter.type) {
      throw new RegistryError(
        `Missing type for parameter ${parameterName} in function ${name}`,
        { functionName: name },
      );
    }
    if (!parameter.description?.trim()) {
      throw new RegistryError(
        `Missing documentation for parameter ${parameterName} in function ${name}`,
        { functionName: name },
      );
    }

    parameters.set(parameterName, {
      name: parameterName,
      type: parameter.type,
      description: parameter.description,
      optional: parameter.optional,
      ...(parameter.optional ? { default: parameter.default } : {}),
    });
    properties[parameterName] = {
      ...toJsonSchema(parameter.type),
      description: parameter.description,
    };
    if (!parameter.optional) {
      required.push(parameterName);
    }
  }

  if (command.returns) {
    // Surfaces unsupported return types at build time.
    toJsonSchema(command.returns);
  }

  return {
    name,
    description: command.description,
    parameters,
    hasReturn: command.returns !== undefined,
    returns: command.returns,
    schema: {
      name,
      description: command.description,
      parameters: { type: "object", properties, required },
    },
  };
}

/**
 * Validate a command set and build its registry. Commands whose name starts
 * with `_` are internal and left out.
 *
 * @throws {RegistryError} A function or parameter lacks documentation or a
 *   type, or a name is invalid or used twice.
 * @throws {SchemaError} A parameter or return type has no JSON Schema form.
 */
export function buildRegistry(commands: readonly Command[]): FunctionRegistry {
  const entries = new Map<string, RegistryEntry>();

  for (const command of commands) {
    const { name } = command;
    if (name.startsWith("_")) continue;

    if (!NAME_PATTERN.test(name)) {
      throw new RegistryError(
        `Invalid function name: ${name}. Names must match ${NAME_PATTERN.source}`,
        { functionName: name },
      );
    }
    if (entries.has(name)) {
      throw new RegistryError(`Duplicate function name: ${name}`, {
        functionName: name,
      });
    }

    entries.set(name, { descriptor: describeCommand(command), command });
  }

  return new FunctionRegistry(entries);
}
