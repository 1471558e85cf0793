// D-Bus type signatures and the native value shapes they describe.

export { SignatureError, type SignatureErrorKind } from "./errors.ts";

export {
  type BasicCode,
  type BasicType,
  type ArrayType,
  type DictType,
  type StructType,
  type VariantType,
  type SingleType,
  type TypeSignature,
  type SignatureResult,
  MAX_SIGNATURE_LENGTH,
  MAX_ARRAY_DEPTH,
  MAX_STRUCT_DEPTH,
  MAX_TOTAL_DEPTH,
  basic,
  isBasicCode,
  parseSignature,
  tryParseSignature,
  parseSingleType,
  isValidSignature,
  typeToString,
  signatureToString,
} from "./signature.ts";

export {
  Variant,
  type ValueMismatch,
  isObjectPath,
  checkValue,
  isValueOf,
  checkBody,
  isBodyOf,
  formatMismatch,
} from "./values.ts";
