// Interface model, builder and introspection codec.

export {
  type Direction,
  type ArgSpec,
  type Annotation,
  type PropertyAccess,
  type ChangeNotify,
  type MethodSpec,
  type PropertySpec,
  type SignalSpec,
  type InterfaceSpec,
  type IntrospectionNode,
  EMITS_CHANGED_SIGNAL,
  argsSignature,
  isReadable,
  isWritable,
  parseChangeNotify,
  findMethod,
  findProperty,
  findSignal,
  freezeInterface,
  freezeNode,
} from "./model.ts";

export {
  MAX_NAME_LENGTH,
  toWireName,
  toSnakeCase,
  toCamelCase,
  isValidIdentifier,
  isValidMemberName,
  isValidInterfaceName,
} from "./naming.ts";

export {
  ModelValidationError,
  type ModelValidationErrorKind,
  XmlParseError,
  type XmlParseErrorKind,
} from "./errors.ts";

export {
  type ArgConfig,
  type AnnotationConfig,
  type MethodConfig,
  type PropertyConfig,
  type AccessorOptions,
  type SignalConfig,
  type InterfaceConfig,
  InterfaceBuilder,
  defineInterface,
} from "./builder.ts";

export { parseIntrospection, normalizeDoc } from "./introspection/parse.ts";
export {
  type XmlSink,
  INTROSPECTION_DOCTYPE,
  emitInterface,
  emitIntrospection,
  escapeAttribute,
} from "./introspection/emit.ts";
export { type PartitionedInterfaces, partitionInterfaces } from "./introspection/filter.ts";
