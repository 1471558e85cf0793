// Match rules select which inbound messages a subscriber receives.

import type { BusMessage, MessageType } from "./types.ts";

export interface MatchRule {
  type?: MessageType;
  sender?: string;
  interface?: string;
  member?: string;
  /** Exact object path. */
  path?: string;
  /** The path itself or anything below it. */
  pathNamespace?: string;
  destination?: string;
}

const RULE_KEYS: Array<[keyof MatchRule, string]> = [
  ["type", "type"],
  ["sender", "sender"],
  ["interface", "interface"],
  ["member", "member"],
  ["path", "path"],
  ["pathNamespace", "path_namespace"],
  ["destination", "destination"],
];

/** Render a rule in the bus daemon's `AddMatch` syntax. */
export function matchRuleToString(rule: MatchRule): string {
  const parts: string[] = [];
  for (const [key, wireKey] of RULE_KEYS) {
    const value = rule[key];
    if (value !== undefined) {
      parts.push(`${wireKey}='${value.replace(/'/g, "'\\''")}'`);
    }
  }
  return parts.join(",");
}

function fieldOf(message: BusMessage, key: "interface" | "member" | "path"): string | undefined {
  if (message.type === "method_call" || message.type === "signal") {
    return message[key];
  }
  return undefined;
}

function inNamespace(path: string | undefined, namespace: string): boolean {
  if (path === undefined) return false;
  if (namespace === "/") return true;
  return path === namespace || path.startsWith(`${namespace}/`);
}

/** Check a message against a rule. Every field set on the rule must match. */
export function matchesRule(rule: MatchRule, message: BusMessage): boolean {
  if (rule.type !== undefined && rule.type !== message.type) return false;
  if (rule.sender !== undefined && rule.sender !== message.sender) return false;
  if (rule.destination !== undefined && rule.destination !== message.destination) return false;
  if (rule.interface !== undefined && rule.interface !== fieldOf(message, "interface")) return false;
  if (rule.member !== undefined && rule.member !== fieldOf(message, "member")) return false;
  if (rule.path !== undefined && rule.path !== fieldOf(message, "path")) return false;
  if (rule.pathNamespace !== undefined && !inNamespace(fieldOf(message, "path"), rule.pathNamespace)) {
    return false;
  }
  return true;
}
