// Tests for the signature grammar

import { describe, it, expect } from "vitest";
import {
  parseSignature,
  parseSingleType,
  tryParseSignature,
  signatureToString,
  isValidSignature,
  type SignatureErrorKind,
} from "./index.ts";
import { SignatureError } from "./errors.ts";

function errorKind(text: string): SignatureErrorKind | null {
  const result = tryParseSignature(text);
  return result.ok ? null : result.error.kind;
}

describe("parseSignature", () => {
  it("parses basic types", () => {
    expect(parseSignature("su")).toEqual([
      { kind: "basic", code: "s" },
      { kind: "basic", code: "u" },
    ]);
  });

  it("parses the empty signature", () => {
    expect(parseSignature("")).toEqual([]);
  });

  it("parses arrays, dicts, structs and variants", () => {
    expect(parseSignature("a{sv}")).toEqual([
      {
        kind: "dict",
        key: { kind: "basic", code: "s" },
        value: { kind: "variant" },
      },
    ]);
    expect(parseSignature("a(us)")).toEqual([
      {
        kind: "array",
        element: {
          kind: "struct",
          fields: [
            { kind: "basic", code: "u" },
            { kind: "basic", code: "s" },
          ],
        },
      },
    ]);
  });

  it("round-trips valid signatures", () => {
    const samples = [
      "",
      "y",
      "ay",
      "aay",
      "(us)",
      "a{sv}",
      "a{oa{sa{sv}}}",
      "(i(ss)av)",
      "sa{sv}as",
      "ybnqiuxtdhsogv",
      "a(oa{sv})",
    ];
    for (const sample of samples) {
      expect(signatureToString(parseSignature(sample))).toBe(sample);
    }
  });

  it("accepts 32 nested arrays and rejects 33", () => {
    expect(isValidSignature("a".repeat(32) + "y")).toBe(true);
    expect(errorKind("a".repeat(33) + "y")).toBe("NestingTooDeep");
  });

  it("accepts 32 nested structs and rejects 33", () => {
    expect(isValidSignature("(".repeat(32) + "y" + ")".repeat(32))).toBe(true);
    expect(errorKind("(".repeat(33) + "y" + ")".repeat(33))).toBe("NestingTooDeep");
  });

  it("counts dict entries as struct nesting", () => {
    // 31 structs around a dict entry is 32 levels
    expect(isValidSignature("(".repeat(31) + "a{sy}" + ")".repeat(31))).toBe(true);
    expect(errorKind("(".repeat(32) + "a{sy}" + ")".repeat(32))).toBe("NestingTooDeep");
  });

  it("reports the error kind for malformed signatures", () => {
    expect(errorKind("a")).toBe("UnexpectedEnd");
    expect(errorKind("a{s")).toBe("UnexpectedEnd");
    expect(errorKind("a{")).toBe("UnexpectedEnd");
    expect(errorKind("z")).toBe("UnknownTypeCode");
    expect(errorKind("(ir)")).toBe("UnknownTypeCode");
    expect(errorKind(")")).toBe("UnmatchedContainer");
    expect(errorKind("(ii")).toBe("UnmatchedContainer");
    expect(errorKind("a{sv")).toBe("UnmatchedContainer");
    expect(errorKind("(i}")).toBe("UnmatchedContainer");
    expect(errorKind("}")).toBe("UnmatchedContainer");
    expect(errorKind("{sv}")).toBe("InvalidDictEntry");
    expect(errorKind("a{vs}")).toBe("InvalidDictEntry");
    expect(errorKind("a{s}")).toBe("InvalidDictEntry");
    expect(errorKind("a{sss}")).toBe("InvalidDictEntry");
    expect(errorKind("()")).toBe("EmptyStruct");
    expect(errorKind("y".repeat(256))).toBe("TooLong");
  });

  it("carries the offending character and offset", () => {
    const result = tryParseSignature("a(uz)");
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe("UnknownTypeCode");
      expect(result.error.code).toBe("z");
      expect(result.error.offset).toBe(3);
    }
  });

  it("throws SignatureError from parseSignature", () => {
    expect(() => parseSignature("(")).toThrow(SignatureError);
  });
});

describe("parseSingleType", () => {
  it("parses exactly one complete type", () => {
    expect(parseSingleType("as")).toEqual({
      kind: "array",
      element: { kind: "basic", code: "s" },
    });
  });

  it("rejects zero or several types", () => {
    for (const text of ["", "ss"]) {
      try {
        parseSingleType(text);
        expect.unreachable();
      } catch (e) {
        expect(e).toBeInstanceOf(SignatureError);
        if (e instanceof SignatureError) {
          expect(e.kind).toBe("NotSingleType");
        }
      }
    }
  });
});
