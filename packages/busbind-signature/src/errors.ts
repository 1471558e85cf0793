// Signature parse errors.

/** Kinds of signature faults. */
export type SignatureErrorKind =
  | "UnexpectedEnd"
  | "UnknownTypeCode"
  | "UnmatchedContainer"
  | "NestingTooDeep"
  | "InvalidDictEntry"
  | "EmptyStruct"
  | "TooLong"
  | "NotSingleType";

/** A malformed or over-deep signature. */
export class SignatureError extends Error {
  constructor(
    public readonly kind: SignatureErrorKind,
    public readonly signature: string,
    public readonly offset: number,
    message: string,
    /** The offending character, for `UnknownTypeCode`. */
    public readonly code?: string,
  ) {
    super(`${message} in signature "${signature}" at offset ${offset}`);
    this.name = "SignatureError";
  }

  static unexpectedEnd(signature: string, offset: number): SignatureError {
    return new SignatureError("UnexpectedEnd", signature, offset, "unexpected end");
  }

  static unknownTypeCode(signature: string, offset: number, code: string): SignatureError {
    return new SignatureError(
      "UnknownTypeCode",
      signature,
      offset,
      `unknown type code '${code}'`,
      code,
    );
  }

  static unmatchedContainer(signature: string, offset: number): SignatureError {
    return new SignatureError("UnmatchedContainer", signature, offset, "unmatched container");
  }

  static nestingTooDeep(signature: string, offset: number): SignatureError {
    return new SignatureError("NestingTooDeep", signature, offset, "nesting too deep");
  }

  static invalidDictEntry(signature: string, offset: number, detail: string): SignatureError {
    return new SignatureError("InvalidDictEntry", signature, offset, detail);
  }

  static emptyStruct(signature: string, offset: number): SignatureError {
    return new SignatureError("EmptyStruct", signature, offset, "empty struct");
  }

  static tooLong(signature: string): SignatureError {
    return new SignatureError(
      "TooLong",
      signature.slice(0, 32) + "…",
      255,
      `signature is ${signature.length} characters long`,
    );
  }

  static notSingleType(signature: string, count: number): SignatureError {
    return new SignatureError(
      "NotSingleType",
      signature,
      0,
      `expected exactly one complete type, found ${count}`,
    );
  }
}
