export const VERSION = "0.1.0";

// Type descriptors and schema translation
export {
  TypeKind,
  t,
  typeName,
  isOptional,
  toJsonSchema,
  decode,
  encode,
  conforms,
} from "./schema/index.js";
export type {
  TypeDescriptor,
  StringType,
  IntegerType,
  NumberType,
  BooleanType,
  OptionalType,
  ListType,
  MapType,
  RecordType,
  RecordFields,
  Infer,
  JsonValue,
} from "./schema/index.js";

// Commands
export { defineCommand, param } from "./command.js";
export type {
  Command,
  CommandDefinition,
  Parameter,
  ParameterMap,
  ArgsOf,
  ReturnOf,
} from "./command.js";

// Function registry
export { FunctionRegistry, buildRegistry } from "./function-registry.js";
export type {
  FunctionDescriptor,
  ParameterDescriptor,
} from "./function-registry.js";

// Errors
export {
  SchemaError,
  RegistryError,
  CodecError,
  UnknownFunctionError,
  ArgumentError,
  ExecutionError,
  SessionBusyError,
} from "./errors.js";

// Events
export type { EventKind, EventDataMap, SessionEvent } from "./events.js";
export { EventEmitter } from "./events.js";

// Session
export type { ChatSessionConfig, SessionState } from "./session.js";
export { ChatSession, withChatSession } from "./session.js";
