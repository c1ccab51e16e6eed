/**
 * Command definitions: the operations a chat session exposes to the model.
 *
 * ```ts
 * const getStuff = defineCommand({
 *   name: "get_stuff",
 *   description: "Gets stuff",
 *   parameters: {
 *     name: param(t.string(), "Sample name"),
 *     count: param(t.integer(), "Sample count", { default: 123 }),
 *   },
 *   returns: t.string(),
 *   handler: ({ name, count }) => `${name}${count}`,
 * });
 * ```
 */

import { ArgumentError } from "./errors.js";
import { conforms } from "./schema/index.js";
import type { Infer, TypeDescriptor } from "./schema/index.js";

// ---------------------------------------------------------------------------
// Parameters
// ---------------------------------------------------------------------------

export interface Parameter<T extends TypeDescriptor = TypeDescriptor> {
  readonly type: T;
  readonly description: string;
  /** True when a default was given; the model may then leave the argument out. */
  readonly optional: boolean;
  readonly default?: unknown;
}

export type ParameterMap = { readonly [name: string]: Parameter };

/** The arguments object a handler receives for parameters `P`. */
export type ArgsOf<P extends ParameterMap> = {
  [K in keyof P]: P[K] extends Parameter<infer T extends TypeDescriptor>
    ? Infer<T>
    : never;
};

/** What a handler returns for a `returns` descriptor `R` (none: `void`). */
export type ReturnOf<R extends TypeDescriptor | undefined> =
  R extends TypeDescriptor ? Infer<R> : void;

/**
 * Declare a parameter. Passing `{ default }` makes it optional: a missing
 * argument is replaced by the default, which is not decoded.
 */
export function param<T extends TypeDescriptor>(
  type: T,
  description: string,
  options?: { default: Infer<T> },
): Parameter<T> {
  if (options && "default" in options) {
    return { type, description, optional: true, default: options.default };
  }
  return { type, description, optional: false };
}

// ---------------------------------------------------------------------------
// Commands
// ---------------------------------------------------------------------------

export interface CommandDefinition<
  P extends ParameterMap,
  R extends TypeDescriptor | undefined,
> {
  /** Function name sent to the model. Names starting with `_` are not exposed. */
  name: string;
  description: string;
  parameters: P;
  returns?: R;
  handler: (args: ArgsOf<P>) => ReturnOf<R> | Promise<ReturnOf<R>>;
}

/** A command with its handler types erased, as held by a registry. */
export interface Command {
  readonly name: string;
  readonly description: string;
  readonly parameters: ParameterMap;
  readonly returns?: TypeDescriptor;
  /** Run the handler with already-decoded arguments. */
  invoke(args: Readonly<Record<string, unknown>>): Promise<unknown>;
}

function assertArguments<P extends ParameterMap>(
  functionName: string,
  parameters: P,
  args: Readonly<Record<string, unknown>>,
): asserts args is ArgsOf<P> & Readonly<Record<string, unknown>> {
  for (const [parameter, { type }] of Object.entries(parameters)) {
    if (!conforms(args[parameter], type)) {
      throw new ArgumentError(
        `Invalid argument ${parameter} in function ${functionName}`,
        { functionName, parameter },
      );
    }
  }
}

export function defineCommand<
  P extends ParameterMap,
  R extends TypeDescriptor | undefined = undefined,
>(definition: CommandDefinition<P, R>): Command {
  const { name, description, parameters, returns, handler } = definition;
  return {
    name,
    description,
    parameters,
    returns,
    async invoke(args) {
      assertArguments(name, parameters, args);
      return handler(args);
    },
  };
}
