// Model construction and introspection parse errors.

export type ModelValidationErrorKind =
  | "invalidIdentifier"
  | "invalidInterfaceName"
  | "invalidSignature"
  | "invalidAnnotation"
  | "duplicateName"
  | "conflictingPropertyType"
  | "conflictingDirection"
  | "signalOutArg"
  | "constSetter"
  | "missingType";

/**
 * An interface description that cannot be built.
 *
 * Fatal to that interface only; `member` names the offending member, and is
 * undefined when the interface itself is at fault.
 */
export class ModelValidationError extends Error {
  constructor(
    public readonly kind: ModelValidationErrorKind,
    public readonly interfaceName: string,
    public readonly member: string | undefined,
    detail: string,
  ) {
    super(`${member === undefined ? interfaceName : `${interfaceName}.${member}`}: ${detail}`);
    this.name = "ModelValidationError";
  }
}

export type XmlParseErrorKind = "malformed" | "missingAttribute" | "invalidValue" | "unexpectedElement";

/** An introspection document that cannot be parsed. Fatal to that document. */
export class XmlParseError extends Error {
  constructor(
    public readonly kind: XmlParseErrorKind,
    message: string,
    public readonly line: number,
    public readonly column: number,
  ) {
    super(`${line}:${column}: ${message}`);
    this.name = "XmlParseError";
  }

  static malformed(message: string, line: number, column: number): XmlParseError {
    return new XmlParseError("malformed", message, line, column);
  }

  static missingAttribute(element: string, attribute: string, line: number, column: number): XmlParseError {
    return new XmlParseError(
      "missingAttribute",
      `<${element}> is missing required attribute "${attribute}"`,
      line,
      column,
    );
  }

  static invalidValue(
    element: string,
    attribute: string,
    value: string,
    line: number,
    column: number,
    detail?: string,
  ): XmlParseError {
    const suffix = detail === undefined ? "" : `: ${detail}`;
    return new XmlParseError(
      "invalidValue",
      `<${element}> has invalid ${attribute} "${value}"${suffix}`,
      line,
      column,
    );
  }

  static unexpectedElement(element: string, line: number, column: number): XmlParseError {
    return new XmlParseError("unexpectedElement", `unexpected <${element}>`, line, column);
  }
}
