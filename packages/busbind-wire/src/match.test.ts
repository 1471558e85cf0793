// Tests for match rules

import { describe, it, expect } from "vitest";
import { matchRuleToString, matchesRule } from "./match.ts";
import { methodCall, signalMessage, type MethodReturnMessage } from "./types.ts";

const changed = signalMessage({
  path: "/org/example/Light/1",
  interface: "org.example.Light",
  member: "Changed",
});

describe("matchRuleToString", () => {
  it("renders fields in bus syntax", () => {
    expect(
      matchRuleToString({
        type: "signal",
        interface: "org.example.Light",
        member: "Changed",
        pathNamespace: "/org/example",
      }),
    ).toBe(
      "type='signal',interface='org.example.Light',member='Changed',path_namespace='/org/example'",
    );
  });

  it("escapes apostrophes", () => {
    expect(matchRuleToString({ member: "it's" })).toBe("member='it'\\''s'");
  });

  it("renders an empty rule as an empty string", () => {
    expect(matchRuleToString({})).toBe("");
  });
});

describe("matchesRule", () => {
  it("matches when every set field agrees", () => {
    expect(matchesRule({ type: "signal", member: "Changed" }, changed)).toBe(true);
    expect(matchesRule({}, changed)).toBe(true);
  });

  it("rejects a differing field", () => {
    expect(matchesRule({ member: "Other" }, changed)).toBe(false);
    expect(matchesRule({ type: "method_call" }, changed)).toBe(false);
    expect(matchesRule({ sender: ":1.1" }, changed)).toBe(false);
  });

  it("matches path namespaces on element boundaries", () => {
    expect(matchesRule({ pathNamespace: "/org/example" }, changed)).toBe(true);
    expect(matchesRule({ pathNamespace: "/org/example/Light/1" }, changed)).toBe(true);
    expect(matchesRule({ pathNamespace: "/org/exam" }, changed)).toBe(false);
    expect(matchesRule({ pathNamespace: "/" }, changed)).toBe(true);
  });

  it("never matches header fields a reply does not carry", () => {
    const reply: MethodReturnMessage = {
      type: "method_return",
      replySerial: 1,
      signature: "",
      body: [],
    };
    expect(matchesRule({ member: "Changed" }, reply)).toBe(false);
    expect(matchesRule({ type: "method_return" }, reply)).toBe(true);
  });

  it("matches method calls by path", () => {
    const call = methodCall({ path: "/a", member: "Ping" });
    expect(matchesRule({ type: "method_call", path: "/a" }, call)).toBe(true);
    expect(matchesRule({ path: "/b" }, call)).toBe(false);
  });
});
