// Binding generator and the busbind-xmlgen command.

export { GENERATOR_NAME, GENERATOR_VERSION } from "./version.ts";
export {
  RESERVED_WORDS,
  PROXY_MEMBERS,
  safeIdentifier,
  nativeName,
  pascalCase,
  typeNameOf,
  NameScope,
  paramNames,
} from "./naming.ts";
export { tsType, tsTupleType, tsLabeledTupleType, tsResultType, usesVariant } from "./types.ts";
export {
  type GenerateOptions,
  type MethodPlan,
  type PropertyPlan,
  type SignalPlan,
  type InterfacePlan,
  planInterface,
  interfaceConfig,
  printLiteral,
  generateInterface,
  generatePlanned,
} from "./generate.ts";
export { type ModuleOptions, typeNamesFor, importLines, generateModule, describeInterface } from "./module.ts";
export {
  USAGE,
  type BusTarget,
  type XmlgenIo,
  type XmlgenErrorKind,
  XmlgenError,
  buildCli,
  runXmlgen,
  nodeIo,
} from "./xmlgen.ts";
